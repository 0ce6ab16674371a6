export {
  AgentSessionStore,
  DEFAULT_SESSION_TIMEOUT_MS,
  DEFAULT_REAPER_INTERVAL_MS,
  type AgentSession,
  type SessionStoreOptions,
} from "./session-store.js";
