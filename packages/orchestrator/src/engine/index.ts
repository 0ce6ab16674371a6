export type { AgentEngine, EngineHandle, EngineStartOptions, SubmitOptions } from "./types.js";
export {
  ScriptedAgentEngine,
  ScriptedEngineHandle,
  echoTurn,
  type ScriptedEngineOptions,
  type ScriptedTurn,
  type ScriptedTurnContext,
} from "./scripted-engine.js";
export {
  LangChainAgentEngine,
  LangChainEngineHandle,
  DEFAULT_MAX_TURNS,
  textOf,
  type LangChainEngineOptions,
  type ToolFactory,
} from "./langchain-engine.js";
