/**
 * @ticketflow/core - Core library for ticketflow packages
 *
 * Provides LLM routing, logging, and configuration shared by the
 * orchestrator and the CLI.
 */

// LLM Router
export {
  LLMRouter,
  LLMRouterError,
  ConfigurationError,
  ProviderUnavailableError,
  DEFAULT_CONFIG,
  DEFAULT_MODELS,
  LLM_PROVIDERS,
  isLLMProvider,
} from "./llm/index.js";
export type { LLMConfig, LLMProvider, ProviderInfo } from "./llm/index.js";

// Logging
export {
  getLogger,
  createLogger,
  resetLogger,
  getContext,
  getContextLogger,
  runJob,
  runStep,
  runWithContext
} from "./logger/index.js";
export type {
  Logger,
  LoggerConfig,
  JobContext,
  RotationConfig,
  LogLevel
} from "./logger/index.js";
export { LogLevels, isLogLevel } from "./logger/index.js";

// Configuration
export { loadConfig, loadBaseConfig, BaseConfigSchema, BASE_ENV_BINDINGS } from "./config/index.js";
export type { BaseConfig, EnvBinding } from "./config/index.js";
