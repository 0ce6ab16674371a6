/**
 * Errors raised while choosing and building chat models
 */

import type { LLMProvider } from "./types.js";

/**
 * Base error class for LLM Router errors
 */
export class LLMRouterError extends Error {
  constructor(
    message: string,
    public readonly provider?: LLMProvider,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "LLMRouterError";
  }
}

/**
 * A required setting is missing or holds an unsupported value
 */
export class ConfigurationError extends LLMRouterError {
  constructor(
    message: string,
    public readonly missingKey: string,
    provider?: LLMProvider
  ) {
    super(message, provider);
    this.name = "ConfigurationError";
  }
}

/**
 * The configured provider cannot be reached
 */
export class ProviderUnavailableError extends LLMRouterError {
  constructor(
    provider: LLMProvider,
    public readonly reason: string,
    options?: ErrorOptions
  ) {
    super(`LLM provider '${provider}' is unavailable: ${reason}`, provider, options);
    this.name = "ProviderUnavailableError";
  }
}
