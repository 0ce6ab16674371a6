/**
 * Agent engine contract
 *
 * The orchestration core treats the LLM agent as an external resource
 * reached only through start / submit / close.
 */

import type { EngineEvent } from "../schemas/index.js";

export interface EngineStartOptions {
  /** User the conversation belongs to */
  owner: string;

  /** System instructions for the whole conversation */
  instructions?: string;

  /** Upper bound on model calls per turn */
  maxTurns?: number;

  /** Working directory for tools that touch the filesystem */
  workDir?: string;
}

export interface SubmitOptions {
  signal?: AbortSignal;
}

/**
 * One open conversation with the agent runtime
 *
 * Turns submitted to the same handle share conversational context.
 */
export interface EngineHandle {
  submit(prompt: string, options?: SubmitOptions): AsyncIterable<EngineEvent>;
  close(): Promise<void>;
}

export interface AgentEngine {
  start(options: EngineStartOptions): Promise<EngineHandle>;
}
