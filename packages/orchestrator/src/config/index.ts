/**
 * Orchestrator configuration
 *
 * Extends the shared base schema with session, agent and delivery settings.
 */

import { z } from "zod";
import { BaseConfigSchema, loadConfig, type EnvBinding } from "@ticketflow/core";

export const OrchestratorConfigSchema = BaseConfigSchema.extend({
  /** Idle time after which an agent session is closed */
  sessionTimeoutMinutes: z.number().positive().default(30),

  /** How often idle sessions are looked for */
  reaperIntervalSeconds: z.number().positive().default(60),

  /** Upper bound on model calls per agent turn */
  maxTurns: z.number().int().positive().default(100),

  /** Directory repositories are checked out into for agent tools */
  workDir: z.string().min(1).default("./data/repos"),

  /** A client send still pending after this long drops the connection */
  sendTimeoutSeconds: z.number().positive().default(10),
});

export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>;

export const ORCHESTRATOR_ENV_BINDINGS: Record<string, EnvBinding> = {
  SESSION_TIMEOUT_MINUTES: { key: "sessionTimeoutMinutes", parse: "number" },
  SESSION_REAPER_INTERVAL_SECONDS: { key: "reaperIntervalSeconds", parse: "number" },
  AGENT_MAX_TURNS: { key: "maxTurns", parse: "number" },
  AGENT_WORK_DIR: { key: "workDir" },
  CONNECTION_SEND_TIMEOUT_SECONDS: { key: "sendTimeoutSeconds", parse: "number" },
};

export function loadOrchestratorConfig(env: NodeJS.ProcessEnv = process.env): OrchestratorConfig {
  return loadConfig(OrchestratorConfigSchema, ORCHESTRATOR_ENV_BINDINGS, env);
}

/**
 * Runtime settings in the units the components take
 */
export interface OrchestratorSettings {
  sessionTimeoutMs: number;
  reaperIntervalMs: number;
  sendTimeoutMs: number;
  maxTurns: number;
  workDir: string;
}

export function toSettings(config: OrchestratorConfig): OrchestratorSettings {
  return {
    sessionTimeoutMs: config.sessionTimeoutMinutes * 60_000,
    reaperIntervalMs: config.reaperIntervalSeconds * 1000,
    sendTimeoutMs: config.sendTimeoutSeconds * 1000,
    maxTurns: config.maxTurns,
    workDir: config.workDir,
  };
}
