/**
 * LLM Router - builds the LangChain chat model an agent engine talks to
 *
 * The provider comes from `LLM_PROVIDER`, an explicit override, or the
 * presence of `ANTHROPIC_API_KEY`, in that order. Anthropic may sit behind
 * an Azure-hosted endpoint (`ANTHROPIC_BASE_URL`); Ollama runs locally
 * (`OLLAMA_BASE_URL`).
 */

import { ChatAnthropic } from "@langchain/anthropic";
import { ChatOllama } from "@langchain/ollama";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";

import {
  type LLMConfig,
  type LLMProvider,
  DEFAULT_CONFIG,
  DEFAULT_MODELS,
  isLLMProvider,
} from "./types.js";
import { ConfigurationError, ProviderUnavailableError } from "./errors.js";
import type { BaseConfig } from "../config/index.js";

const DEFAULT_OLLAMA_URL = "http://localhost:11434";

export interface ProviderInfo {
  provider: LLMProvider;
  model: string;
  isLocal: boolean;
}

/**
 * @example
 * ```typescript
 * const router = new LLMRouter({ temperature: 0.2 });
 * await router.assertAvailable();
 * const engine = new LangChainAgentEngine({ router });
 * ```
 */
export class LLMRouter {
  private readonly config: LLMConfig;

  /**
   * @param overrides - Settings that win over defaults; `LLM_PROVIDER` and `LLM_MODEL` still win over these
   * @param env - Where provider variables are read from
   * @throws {ConfigurationError} on an unknown provider or a missing API key
   */
  constructor(
    overrides?: Partial<LLMConfig>,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {
    const provider = this.resolveProvider(overrides?.provider);
    this.requireCredentials(provider);

    this.config = {
      provider,
      model: env.LLM_MODEL || overrides?.model || DEFAULT_MODELS[provider],
      temperature: overrides?.temperature ?? DEFAULT_CONFIG.temperature,
      maxTokens: overrides?.maxTokens,
    };
  }

  /**
   * Build a router from loaded configuration
   *
   * The config replaces the provider, model and endpoint variables; only
   * the API key is still read from `env`.
   */
  static fromConfig(config: BaseConfig, env: NodeJS.ProcessEnv = process.env): LLMRouter {
    return new LLMRouter(
      { temperature: config.llmTemperature },
      {
        ANTHROPIC_API_KEY: env.ANTHROPIC_API_KEY,
        LLM_PROVIDER: config.llmProvider,
        LLM_MODEL: config.llmModel,
        OLLAMA_BASE_URL: config.ollamaBaseUrl,
        ANTHROPIC_BASE_URL: config.anthropicBaseUrl,
      }
    );
  }

  private resolveProvider(override: LLMProvider | undefined): LLMProvider {
    const fromEnv = this.env.LLM_PROVIDER;
    if (fromEnv) {
      if (!isLLMProvider(fromEnv)) {
        throw new ConfigurationError(
          `Unsupported LLM provider: ${fromEnv}. Use 'anthropic' or 'ollama'.`,
          "LLM_PROVIDER"
        );
      }
      return fromEnv;
    }
    return override ?? (this.env.ANTHROPIC_API_KEY ? "anthropic" : "ollama");
  }

  private requireCredentials(provider: LLMProvider): void {
    if (provider === "anthropic" && !this.env.ANTHROPIC_API_KEY) {
      throw new ConfigurationError(
        "ANTHROPIC_API_KEY is required for the Anthropic provider. Set it in your environment or .env file.",
        "ANTHROPIC_API_KEY",
        "anthropic"
      );
    }
  }

  private get ollamaBaseUrl(): string {
    return this.env.OLLAMA_BASE_URL || DEFAULT_OLLAMA_URL;
  }

  getConfig(): LLMConfig {
    return { ...this.config };
  }

  /**
   * Create a chat model; overrides apply to this model only
   */
  getModel(overrides?: Partial<LLMConfig>): BaseChatModel {
    const config: LLMConfig = { ...this.config, ...overrides };
    if (config.provider !== this.config.provider) {
      this.requireCredentials(config.provider);
    }

    if (config.provider === "anthropic") {
      return new ChatAnthropic({
        model: config.model,
        temperature: config.temperature,
        maxTokens: config.maxTokens,
        anthropicApiUrl: this.env.ANTHROPIC_BASE_URL || undefined,
      });
    }

    return new ChatOllama({
      model: config.model,
      temperature: config.temperature,
      baseUrl: this.ollamaBaseUrl,
    });
  }

  /**
   * Whether the configured provider can take requests
   *
   * For Anthropic only the key is checked; a bad key shows up on the first call.
   */
  async isAvailable(): Promise<boolean> {
    if (this.config.provider === "anthropic") {
      return Boolean(this.env.ANTHROPIC_API_KEY);
    }

    try {
      const response = await fetch(`${this.ollamaBaseUrl}/api/tags`);
      return response.ok;
    } catch {
      return false;
    }
  }

  /**
   * @throws {ProviderUnavailableError}
   */
  async assertAvailable(): Promise<void> {
    if (await this.isAvailable()) {
      return;
    }

    const reason = this.config.provider === "ollama"
      ? `no Ollama server answering at ${this.ollamaBaseUrl}`
      : "ANTHROPIC_API_KEY is not set";
    throw new ProviderUnavailableError(this.config.provider, reason);
  }

  getProviderInfo(): ProviderInfo {
    return {
      provider: this.config.provider,
      model: this.config.model,
      isLocal: this.config.provider === "ollama",
    };
  }
}
