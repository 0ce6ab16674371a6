/**
 * JobGuard - process-wide single-flight slot for expensive agent jobs
 *
 * Two states: idle, or busy with one owner and one job. Only one job runs
 * at a time because jobs share the working directory their repositories
 * are cloned into.
 */

import { getContextLogger } from "@ticketflow/core";
import { AlreadyBusyError, ForbiddenError, NothingToAbortError } from "../errors.js";

export type JobKind = "question" | "meeting" | "ticket";

/**
 * What the guard needs to know about the job holding the slot
 */
export interface GuardedJob {
  readonly id: string;
  readonly kind: JobKind;
  cancel(reason?: string): void;
}

export interface GuardStatus {
  isBusy: boolean;
  isMine: boolean;
}

export interface GuardSnapshot {
  owner: string;
  jobId: string;
  kind: JobKind;
  since: number;
}

type GuardState =
  | { state: "idle" }
  | { state: "busy"; owner: string; job: GuardedJob; since: number };

export class JobGuard {
  private current: GuardState = { state: "idle" };

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Take the slot
   *
   * @throws {AlreadyBusyError} if any job holds it
   */
  acquire(owner: string, job: GuardedJob): void {
    if (this.current.state === "busy") {
      throw new AlreadyBusyError();
    }

    this.current = { state: "busy", owner, job, since: this.now() };
    getContextLogger().info({ owner, jobId: job.id, kind: job.kind }, "Processing slot acquired");
  }

  /**
   * Free the slot unconditionally
   *
   * Must run exactly once for every successful acquire, whatever way the job ends.
   */
  release(): void {
    if (this.current.state === "busy") {
      const { owner, job, since } = this.current;
      getContextLogger().info(
        { owner, jobId: job.id, kind: job.kind, durationMs: this.now() - since },
        "Processing slot released"
      );
    }
    this.current = { state: "idle" };
  }

  /**
   * Ask the running job to cancel
   *
   * The slot stays busy until the cancelled job unwinds and releases it.
   *
   * @throws {NothingToAbortError} when idle
   * @throws {ForbiddenError} when `owner` does not hold the slot
   */
  abort(owner: string): void {
    if (this.current.state === "idle") {
      throw new NothingToAbortError();
    }
    if (this.current.owner !== owner) {
      throw new ForbiddenError(owner);
    }

    getContextLogger().info({ owner, jobId: this.current.job.id }, "Abort requested");
    this.current.job.cancel("Aborted by user");
  }

  status(owner: string): GuardStatus {
    const isBusy = this.current.state === "busy";
    return {
      isBusy,
      isMine: this.current.state === "busy" && this.current.owner === owner,
    };
  }

  snapshot(): GuardSnapshot | undefined {
    if (this.current.state === "idle") {
      return undefined;
    }
    const { owner, job, since } = this.current;
    return { owner, jobId: job.id, kind: job.kind, since };
  }

  get isBusy(): boolean {
    return this.current.state === "busy";
  }
}
