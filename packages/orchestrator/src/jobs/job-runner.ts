/**
 * BackgroundJobRunner - runs one guarded, cancellable agent job
 *
 * A job takes the single-flight slot, streams its events to every
 * connection of its owner, and ends with exactly one terminal event
 * (`completed`, `aborted` or `error`) followed by exactly one release of
 * the slot. An aborted job keeps the slot until its body has unwound.
 */

import { randomUUID } from "node:crypto";
import { getContextLogger, runJob, type Logger } from "@ticketflow/core";
import { EventChannel } from "../channel/index.js";
import type { ConnectionRegistry } from "../connections/index.js";
import type { GuardedJob, JobGuard, JobKind } from "../guard/index.js";
import type { AgentEvent, EngineEvent, TerminalEvent } from "../schemas/index.js";
import { CancelledError, errorMessage, toCancelledError } from "../errors.js";
import { throwIfCancelled } from "../utils/index.js";

/**
 * Write-only event sink handed to a job; never blocks the job
 */
export type EventSink = (event: EngineEvent) => void;

/**
 * Everything a running job gets from the runner
 */
export interface JobExecution {
  jobId: string;
  owner: string;
  kind: JobKind;
  /** Fires when the owner aborts; check it at every suspension point */
  signal: AbortSignal;
  emit: EventSink;
  logger: Logger;
}

export interface JobResult<T> {
  success: boolean;
  payload: T;
}

export type JobWork<T> = (execution: JobExecution) => Promise<JobResult<T>>;

export type JobOutcome<T> =
  | { status: "completed"; success: boolean; payload: T }
  | { status: "aborted" }
  | { status: "failed"; error: Error };

export interface JobHandle<T> {
  readonly id: string;
  readonly owner: string;
  readonly kind: JobKind;
  /** Settles once the terminal event was broadcast and the slot released; never rejects */
  readonly done: Promise<JobOutcome<T>>;
  cancel(reason?: string): void;
}

export class BackgroundJobRunner {
  private active: JobHandle<unknown> | null = null;

  constructor(
    private readonly guard: JobGuard,
    private readonly registry: ConnectionRegistry
  ) {}

  /**
   * Start a job for the owner
   *
   * @throws {AlreadyBusyError} synchronously when another job holds the slot;
   *   in that case nothing is started
   */
  run<T>(owner: string, kind: JobKind, work: JobWork<T>): JobHandle<T> {
    const id = randomUUID();
    const controller = new AbortController();
    const job: GuardedJob = {
      id,
      kind,
      cancel: (reason?: string) => {
        if (!controller.signal.aborted) {
          controller.abort(new CancelledError(reason));
        }
      },
    };

    this.guard.acquire(owner, job);

    const done = runJob(id, owner, () => this.execute(owner, kind, id, controller.signal, work));
    const handle: JobHandle<T> = { id, owner, kind, done, cancel: job.cancel };

    this.active = handle;
    void done.then(() => {
      if (this.active === handle) {
        this.active = null;
      }
    });

    return handle;
  }

  private async execute<T>(
    owner: string,
    kind: JobKind,
    jobId: string,
    signal: AbortSignal,
    work: JobWork<T>
  ): Promise<JobOutcome<T>> {
    const logger = getContextLogger();
    const channel = new EventChannel<AgentEvent>(`job:${jobId}`);
    channel.subscribe((event) => {
      void this.registry.broadcast(owner, event);
    });

    const execution: JobExecution = {
      jobId,
      owner,
      kind,
      signal,
      emit: (event) => channel.push(event),
      logger,
    };

    // Anything the job emits after an abort is dropped
    const closeOnAbort = (): void => channel.close();
    signal.addEventListener("abort", closeOnAbort, { once: true });

    logger.info({ kind }, "Job started");

    let outcome: JobOutcome<T>;
    let terminal: TerminalEvent;
    try {
      // The slot stays held until the body itself settles, finally blocks included.
      // Deferred a tick so a synchronous throw inside work is handled like any other failure.
      const result = await Promise.resolve().then(() => {
        throwIfCancelled(signal);
        return work(execution);
      });
      if (signal.aborted) {
        throw toCancelledError(signal.reason);
      }
      outcome = { status: "completed", success: result.success, payload: result.payload };
      terminal = { type: "completed", success: result.success, payload: result.payload };
      logger.info({ kind, success: result.success }, "Job completed");
    } catch (error) {
      // Once the owner aborted, however the body unwound, the job counts as aborted
      if (signal.aborted) {
        outcome = { status: "aborted" };
        terminal = { type: "aborted" };
        logger.info({ kind }, "Job aborted");
      } else {
        const failure = error instanceof Error ? error : new Error(errorMessage(error));
        outcome = { status: "failed", error: failure };
        terminal = { type: "error", message: failure.message };
        logger.error({ err: failure, kind }, "Job failed");
      }
    } finally {
      signal.removeEventListener("abort", closeOnAbort);
    }

    channel.close();

    try {
      await this.registry.broadcast(owner, terminal);
    } finally {
      this.guard.release();
    }

    return outcome;
  }

  /**
   * Cancel the running job, if any, and wait for it to unwind
   */
  async cancelActive(reason = "Shutting down"): Promise<void> {
    const active = this.active;
    if (!active) {
      return;
    }
    active.cancel(reason);
    await active.done;
  }

  get activeJob(): Pick<JobHandle<unknown>, "id" | "owner" | "kind"> | null {
    return this.active;
  }
}
