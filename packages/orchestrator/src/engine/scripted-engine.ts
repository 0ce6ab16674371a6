/**
 * ScriptedAgentEngine - in-process engine that replays canned events
 *
 * Used by tests and by the CLI's `--dry-run` mode. Each submitted turn is
 * answered by a script function; the default script echoes the prompt.
 */

import { setTimeout as delay } from "node:timers/promises";
import type { EngineEvent } from "../schemas/index.js";
import { EngineRuntimeError } from "../errors.js";
import { throwIfCancelled } from "../utils/index.js";
import type { AgentEngine, EngineHandle, EngineStartOptions, SubmitOptions } from "./types.js";

export interface ScriptedTurnContext {
  prompt: string;
  /** Zero-based index of this turn on its handle */
  turn: number;
  options: EngineStartOptions;
}

export type ScriptedTurn = (context: ScriptedTurnContext) => EngineEvent[];

export interface ScriptedEngineOptions {
  turn?: ScriptedTurn;

  /** Pause before each event; the pause honours the abort signal */
  eventDelayMs?: number;

  /** Make `start` reject with this error */
  failStart?: Error;
}

export const echoTurn: ScriptedTurn = ({ prompt }) => [
  { type: "text-chunk", content: prompt },
  { type: "final-result", content: prompt },
];

export class ScriptedEngineHandle implements EngineHandle {
  readonly prompts: string[] = [];
  closeCount = 0;

  constructor(
    readonly options: EngineStartOptions,
    private readonly turn: ScriptedTurn,
    private readonly eventDelayMs: number
  ) {}

  async *submit(prompt: string, submitOptions: SubmitOptions = {}): AsyncIterable<EngineEvent> {
    if (this.closeCount > 0) {
      throw new EngineRuntimeError("Engine handle is closed");
    }

    const { signal } = submitOptions;
    const turn = this.prompts.length;
    this.prompts.push(prompt);

    for (const event of this.turn({ prompt, turn, options: this.options })) {
      throwIfCancelled(signal);
      if (this.eventDelayMs > 0) {
        await delay(this.eventDelayMs, undefined, { signal });
      }
      yield event;
    }
  }

  async close(): Promise<void> {
    this.closeCount++;
  }

  get isClosed(): boolean {
    return this.closeCount > 0;
  }
}

export class ScriptedAgentEngine implements AgentEngine {
  readonly handles: ScriptedEngineHandle[] = [];
  private readonly turn: ScriptedTurn;
  private readonly eventDelayMs: number;
  private readonly failStart: Error | undefined;

  constructor(options: ScriptedEngineOptions = {}) {
    this.turn = options.turn ?? echoTurn;
    this.eventDelayMs = options.eventDelayMs ?? 0;
    this.failStart = options.failStart;
  }

  async start(options: EngineStartOptions): Promise<ScriptedEngineHandle> {
    if (this.failStart) {
      throw this.failStart;
    }
    const handle = new ScriptedEngineHandle(options, this.turn, this.eventDelayMs);
    this.handles.push(handle);
    return handle;
  }

  get startCount(): number {
    return this.handles.length;
  }
}
