export { Orchestrator, type OrchestratorOptions, type AskResult, type SummaryResult } from "./orchestrator.js";
