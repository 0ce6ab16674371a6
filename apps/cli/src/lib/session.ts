/**
 * Shared wiring for commands: flags, orchestrator construction, and
 * running a job in the foreground with Ctrl-C as abort
 */

import { userInfo } from "node:os";
import { Flags } from "@oclif/core";
import { LLMRouter, getLogger, isLLMProvider } from "@ticketflow/core";
import {
  LangChainAgentEngine,
  Orchestrator,
  ScriptedAgentEngine,
  loadOrchestratorConfig,
  toSettings,
  type AgentEngine,
  type JobHandle,
  type JobOutcome,
} from "@ticketflow/orchestrator";
import { ConsoleConnection, type Writer } from "./console-connection.js";

export const llmFlags = {
  provider: Flags.string({
    char: "p",
    description: "LLM provider to use (auto-detects based on API keys if not specified)",
    options: ["anthropic", "ollama"],
  }),
  model: Flags.string({
    char: "m",
    description: "Model to use (provider-specific)",
  }),
  "dry-run": Flags.boolean({
    description: "Echo prompts through a scripted engine instead of calling a model",
    default: false,
  }),
  user: Flags.string({
    char: "u",
    description: "User the job runs as",
    default: userInfo().username,
  }),
};

export interface EngineFlags {
  provider?: string;
  model?: string;
  "dry-run": boolean;
}

/**
 * Build an orchestrator for one CLI invocation, printing events for `owner`
 */
export async function createConsoleOrchestrator(
  owner: string,
  flags: EngineFlags,
  write?: Writer
): Promise<Orchestrator> {
  const config = loadOrchestratorConfig();
  if (flags.provider && isLLMProvider(flags.provider)) {
    config.llmProvider = flags.provider;
  }
  if (flags.model) {
    config.llmModel = flags.model;
  }

  const logger = getLogger({ level: config.logLevel });
  const settings = toSettings(config);
  let engine: AgentEngine;
  if (flags["dry-run"]) {
    engine = new ScriptedAgentEngine();
  } else {
    const router = LLMRouter.fromConfig(config);
    await router.assertAvailable();
    const { provider, model } = router.getProviderInfo();
    logger.info({ provider, model }, "Using LLM provider");
    engine = new LangChainAgentEngine({ router, maxTurns: settings.maxTurns });
  }

  const orchestrator = new Orchestrator({ engine, settings });
  orchestrator.connect(owner, new ConsoleConnection(write));
  return orchestrator;
}

/**
 * Wait for a job while Ctrl-C aborts it
 */
export async function runInForeground<T>(
  orchestrator: Orchestrator,
  owner: string,
  handle: JobHandle<T>
): Promise<JobOutcome<T>> {
  const onInterrupt = (): void => {
    if (orchestrator.status(owner).isMine) {
      orchestrator.abort(owner);
    }
  };

  process.on("SIGINT", onInterrupt);
  try {
    return await handle.done;
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}
