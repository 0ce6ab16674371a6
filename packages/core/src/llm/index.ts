/**
 * LLM Router Module
 *
 * Chat models for the agent engine: Anthropic Claude (public API or an
 * Azure-hosted endpoint) or a local Ollama server.
 *
 * @example
 * ```typescript
 * import { LLMRouter } from "@ticketflow/core";
 *
 * const router = new LLMRouter();
 * await router.assertAvailable();
 * const model = router.getModel({ temperature: 0 });
 * ```
 */

// Main class
export { LLMRouter } from "./router.js";
export type { ProviderInfo } from "./router.js";

// Types
export type { LLMConfig, LLMProvider } from "./types.js";
export { DEFAULT_CONFIG, DEFAULT_MODELS, LLM_PROVIDERS, isLLMProvider } from "./types.js";

// Errors
export {
  LLMRouterError,
  ConfigurationError,
  ProviderUnavailableError,
} from "./errors.js";
