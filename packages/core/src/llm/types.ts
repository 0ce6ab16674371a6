/**
 * Type definitions for LLM Router
 */

/**
 * Supported LLM providers
 */
export const LLM_PROVIDERS = ["anthropic", "ollama"] as const;

export type LLMProvider = (typeof LLM_PROVIDERS)[number];

export function isLLMProvider(value: string): value is LLMProvider {
  return LLM_PROVIDERS.some((provider) => provider === value);
}

/**
 * Configuration for LLM Router
 */
export interface LLMConfig {
  /** The LLM provider to use */
  provider: LLMProvider;

  /** Model identifier (e.g., "llama3.2", "claude-opus-4-5") */
  model: string;

  /** Temperature for response randomness (0-1) */
  temperature: number;

  /** Maximum tokens in response (optional) */
  maxTokens?: number;
}

/**
 * Default models for each provider
 */
export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  ollama: "llama3.2:1b",
  anthropic: "claude-opus-4-5",
};

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: LLMConfig = {
  provider: "ollama",
  model: DEFAULT_MODELS.ollama,
  temperature: 0.7,
};
