/**
 * @ticketflow/orchestrator - session and task orchestration for agent jobs
 *
 * Single-flight job guard, agent session store with idle expiry, and
 * per-user event fan-out, composed by {@link Orchestrator}.
 */

export { Orchestrator, type OrchestratorOptions, type AskResult, type SummaryResult } from "./orchestrator/index.js";

// Components
export { EventChannel, type ChannelListener } from "./channel/index.js";
export {
  ConnectionRegistry,
  type ClientConnection,
  type BroadcastResult,
  type ConnectionRegistryOptions,
} from "./connections/index.js";
export {
  AgentSessionStore,
  DEFAULT_SESSION_TIMEOUT_MS,
  DEFAULT_REAPER_INTERVAL_MS,
  type AgentSession,
  type SessionStoreOptions,
} from "./sessions/index.js";
export { JobGuard, type JobKind, type GuardedJob, type GuardStatus, type GuardSnapshot } from "./guard/index.js";
export {
  BackgroundJobRunner,
  type EventSink,
  type JobExecution,
  type JobHandle,
  type JobOutcome,
  type JobResult,
  type JobWork,
} from "./jobs/index.js";

// Engines
export * from "./engine/index.js";

// Events and requests
export * from "./schemas/index.js";

// Errors
export {
  OrchestratorError,
  AlreadyBusyError,
  ForbiddenError,
  NothingToAbortError,
  EngineStartError,
  EngineRuntimeError,
  CancelledError,
  SessionNotFoundError,
  SessionBusyError,
  ShuttingDownError,
  isCancellation,
  errorMessage,
  type OrchestratorErrorCode,
} from "./errors.js";

// Configuration
export {
  OrchestratorConfigSchema,
  ORCHESTRATOR_ENV_BINDINGS,
  loadOrchestratorConfig,
  toSettings,
  type OrchestratorConfig,
  type OrchestratorSettings,
} from "./config/index.js";

export { raceWithSignal, throwIfCancelled, KeyedLock } from "./utils/index.js";
