/**
 * Configuration management for ticketflow packages
 */

import { z } from "zod";
import { LLM_PROVIDERS } from "../llm/types.js";

/**
 * Base configuration schema that every ticketflow package can extend
 */
export const BaseConfigSchema = z.object({
  /** LLM provider; unset picks Anthropic when ANTHROPIC_API_KEY is present, else Ollama */
  llmProvider: z.enum(LLM_PROVIDERS).optional(),

  /** Model to use (provider-specific) */
  llmModel: z.string().optional(),

  /** Temperature for LLM responses */
  llmTemperature: z.number().min(0).max(2).default(0.7),

  /** Log level */
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),

  /** Ollama base URL */
  ollamaBaseUrl: z.string().default("http://localhost:11434"),

  /** Anthropic-compatible endpoint (Azure deployments); empty uses the public API */
  anthropicBaseUrl: z.string().optional(),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

/**
 * How a single environment variable maps onto a config key
 */
export interface EnvBinding {
  key: string;
  parse?: "string" | "number" | "boolean";
}

/**
 * Environment variables understood by {@link BaseConfigSchema}
 */
export const BASE_ENV_BINDINGS: Record<string, EnvBinding> = {
  LLM_PROVIDER: { key: "llmProvider" },
  LLM_MODEL: { key: "llmModel" },
  LLM_TEMPERATURE: { key: "llmTemperature", parse: "number" },
  LOG_LEVEL: { key: "logLevel" },
  OLLAMA_BASE_URL: { key: "ollamaBaseUrl" },
  ANTHROPIC_BASE_URL: { key: "anthropicBaseUrl" },
};

function coerce(raw: string, parse: EnvBinding["parse"]): unknown {
  switch (parse) {
    case "number":
      return Number(raw);
    case "boolean":
      return raw === "true" || raw === "1";
    default:
      return raw;
  }
}

/**
 * Load configuration from environment variables
 *
 * Base bindings are always applied; `bindings` adds package-specific ones.
 * Empty variables are treated as unset so schema defaults apply.
 *
 * @throws {z.ZodError} when a variable holds an invalid value
 *
 * @example
 * ```typescript
 * const config = loadConfig(OrchestratorConfigSchema, ORCHESTRATOR_ENV_BINDINGS);
 * ```
 */
export function loadConfig<T extends z.ZodTypeAny>(
  schema: T,
  bindings: Record<string, EnvBinding> = {},
  env: NodeJS.ProcessEnv = process.env
): z.infer<T> {
  const configFromEnv: Record<string, unknown> = {};

  for (const [name, binding] of Object.entries({ ...BASE_ENV_BINDINGS, ...bindings })) {
    const raw = env[name];
    if (raw !== undefined && raw !== "") {
      configFromEnv[binding.key] = coerce(raw, binding.parse);
    }
  }

  return schema.parse(configFromEnv);
}

/**
 * Load base configuration
 */
export function loadBaseConfig(env: NodeJS.ProcessEnv = process.env): BaseConfig {
  return loadConfig(BaseConfigSchema, {}, env);
}
