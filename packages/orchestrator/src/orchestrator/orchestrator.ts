/**
 * Orchestrator - composition root for agent jobs
 *
 * Owns one job guard, one connection registry, one session store and the
 * job runner that ties them together. Every job kind goes through the
 * same path: acquire the slot, stream the agent's events to the owner's
 * connections, broadcast one terminal event, release the slot.
 *
 * @example
 * ```typescript
 * const orchestrator = new Orchestrator({ engine: new LangChainAgentEngine() });
 * orchestrator.start();
 *
 * const disconnect = orchestrator.connect("alice", connection);
 * const { answer, sessionId } = await orchestrator.askWithSession("alice", {
 *   question: "What is left for the release?",
 *   projectKey: "PROJ",
 * });
 * ```
 */

import { join } from "node:path";
import { getContextLogger, runStep } from "@ticketflow/core";
import { ConnectionRegistry, type ClientConnection } from "../connections/index.js";
import {
  AgentSessionStore,
  DEFAULT_REAPER_INTERVAL_MS,
  DEFAULT_SESSION_TIMEOUT_MS,
  type AgentSession,
} from "../sessions/index.js";
import { JobGuard, type GuardSnapshot, type GuardStatus, type JobKind } from "../guard/index.js";
import { BackgroundJobRunner, type EventSink, type JobHandle, type JobWork } from "../jobs/index.js";
import type { AgentEngine, EngineHandle } from "../engine/index.js";
import type { OrchestratorSettings } from "../config/index.js";
import {
  AskRequestSchema,
  EngineEventSchema,
  MeetingRequestSchema,
  TicketWorkRequestSchema,
  type AskRequest,
  type MeetingRequest,
  type TicketWorkRequest,
} from "../schemas/index.js";
import {
  CancelledError,
  EngineRuntimeError,
  EngineStartError,
  OrchestratorError,
  ShuttingDownError,
  errorMessage,
  isCancellation,
} from "../errors.js";
import {
  MEETING_SYSTEM_PROMPT,
  QUESTION_SYSTEM_PROMPT,
  TICKET_SYSTEM_PROMPT,
  formatMeetingPrompt,
  formatQuestionPrompt,
  formatTicketPrompt,
} from "../prompts/index.js";
import { raceWithSignal } from "../utils/index.js";

export interface OrchestratorOptions {
  engine: AgentEngine;
  settings?: Partial<OrchestratorSettings>;

  /** Pre-built components, mostly for tests */
  guard?: JobGuard;
  registry?: ConnectionRegistry;
  sessions?: AgentSessionStore;
}

export interface AskResult {
  answer: string;
  sessionId: string;
}

export interface SummaryResult {
  summary: string;
}

const DEFAULT_SETTINGS: OrchestratorSettings = {
  sessionTimeoutMs: DEFAULT_SESSION_TIMEOUT_MS,
  reaperIntervalMs: DEFAULT_REAPER_INTERVAL_MS,
  sendTimeoutMs: 10_000,
  maxTurns: 100,
  workDir: "./data/repos",
};

export class Orchestrator {
  readonly guard: JobGuard;
  readonly registry: ConnectionRegistry;
  readonly sessions: AgentSessionStore;
  private readonly runner: BackgroundJobRunner;
  private readonly engine: AgentEngine;
  private readonly settings: OrchestratorSettings;
  private stopping = false;

  constructor(options: OrchestratorOptions) {
    this.engine = options.engine;
    this.settings = { ...DEFAULT_SETTINGS, ...options.settings };
    this.guard = options.guard ?? new JobGuard();
    this.registry = options.registry ?? new ConnectionRegistry({ sendTimeoutMs: this.settings.sendTimeoutMs });
    this.sessions =
      options.sessions ??
      new AgentSessionStore({
        timeoutMs: this.settings.sessionTimeoutMs,
        reaperIntervalMs: this.settings.reaperIntervalMs,
      });
    this.runner = new BackgroundJobRunner(this.guard, this.registry);
  }

  /**
   * Start background maintenance (the session reaper)
   */
  start(): void {
    this.sessions.start();
    getContextLogger().info(
      { sessionTimeoutMs: this.settings.sessionTimeoutMs, reaperIntervalMs: this.settings.reaperIntervalMs },
      "Orchestrator started"
    );
  }

  /**
   * Cancel the running job, close every session and connection
   *
   * New jobs are refused from the moment this is called.
   */
  async shutdown(): Promise<void> {
    if (this.stopping) {
      return;
    }
    this.stopping = true;

    await this.runner.cancelActive("Shutting down");
    await this.sessions.shutdown();
    this.registry.closeAll();
    getContextLogger().info("Orchestrator stopped");
  }

  /**
   * Attach a client connection to the owner's event stream
   *
   * @returns A function that detaches it again
   */
  connect(owner: string, connection: ClientConnection): () => void {
    if (this.stopping) {
      throw new ShuttingDownError();
    }
    this.registry.register(owner, connection);
    return () => {
      this.registry.unregister(owner, connection);
    };
  }

  status(owner: string): GuardStatus {
    return this.guard.status(owner);
  }

  /** Who holds the processing slot, if anyone */
  currentJob(): GuardSnapshot | undefined {
    return this.guard.snapshot();
  }

  /**
   * Cancel the owner's running job
   *
   * @throws {NothingToAbortError} when nothing is running
   * @throws {ForbiddenError} when another user's job is running
   */
  abort(owner: string): void {
    this.guard.abort(owner);
  }

  /**
   * Ask a question, continuing the given session when it is the owner's
   *
   * @throws {AlreadyBusyError} synchronously when another job is running
   */
  ask(owner: string, request: AskRequest): JobHandle<AskResult> {
    const { question, projectKey, sessionId } = AskRequestSchema.parse(request);

    return this.launch(owner, "question", async ({ signal, emit, logger }) => {
      // Another user's session is not touched, so its idle clock keeps running
      const holder = sessionId ? this.sessions.ownerOf(sessionId) : undefined;
      if (holder !== undefined && holder !== owner) {
        logger.warn({ sessionId }, "Session belongs to another user, starting a new one");
      }
      const existing = sessionId && holder === owner ? this.sessions.getSession(sessionId) : undefined;

      let session: AgentSession;
      let prompt: string;
      if (existing) {
        logger.info({ sessionId: existing.id }, "Continuing session");
        session = existing;
        prompt = question;
      } else {
        session = await raceWithSignal(
          this.sessions.createSession(owner, () => this.startEngine(owner, QUESTION_SYSTEM_PROMPT)),
          signal
        );
        prompt = await formatQuestionPrompt({ question, projectKey });
      }

      const { id } = session;
      const answer = await runStep("turn", () =>
        this.sessions.runTurn(id, (active) => this.streamTurn(active.handle, prompt, signal, emit))
      );

      return { success: true, payload: { answer, sessionId: id } };
    });
  }

  /**
   * Ask a question and wait for the answer
   *
   * @throws {CancelledError} when the owner aborted the job
   */
  async askWithSession(owner: string, request: AskRequest): Promise<AskResult> {
    const outcome = await this.ask(owner, request).done;
    switch (outcome.status) {
      case "completed":
        return outcome.payload;
      case "aborted":
        throw new CancelledError("Aborted by user");
      case "failed":
        throw outcome.error;
    }
  }

  /**
   * Turn a meeting transcription into ticket updates, in a one-shot conversation
   */
  processMeeting(owner: string, request: MeetingRequest): JobHandle<SummaryResult> {
    const parsed = MeetingRequestSchema.parse(request);

    return this.launch(owner, "meeting", async (execution) => {
      const prompt = await formatMeetingPrompt(parsed);
      const summary = await this.runOneShot(owner, MEETING_SYSTEM_PROMPT, prompt, execution.signal, execution.emit);
      return { success: true, payload: { summary } };
    });
  }

  /**
   * Let the agent implement a ticket in a working directory of its own
   */
  workTicket(owner: string, request: TicketWorkRequest): JobHandle<SummaryResult> {
    const parsed = TicketWorkRequestSchema.parse(request);

    return this.launch(owner, "ticket", async (execution) => {
      const prompt = await formatTicketPrompt(parsed);
      const summary = await this.runOneShot(
        owner,
        TICKET_SYSTEM_PROMPT,
        prompt,
        execution.signal,
        execution.emit,
        join(this.settings.workDir, parsed.issueKey)
      );
      return { success: true, payload: { summary } };
    });
  }

  private launch<T>(owner: string, kind: JobKind, work: JobWork<T>): JobHandle<T> {
    if (this.stopping) {
      throw new ShuttingDownError();
    }
    return this.runner.run(owner, kind, work);
  }

  private async startEngine(owner: string, instructions: string, workDir?: string): Promise<EngineHandle> {
    try {
      return await this.engine.start({
        owner,
        instructions,
        maxTurns: this.settings.maxTurns,
        workDir: workDir ?? this.settings.workDir,
      });
    } catch (error) {
      if (error instanceof OrchestratorError) {
        throw error;
      }
      throw new EngineStartError(errorMessage(error), { cause: error });
    }
  }

  /**
   * Start a throwaway engine handle, run one turn through it, close it
   */
  private async runOneShot(
    owner: string,
    instructions: string,
    prompt: string,
    signal: AbortSignal,
    emit: EventSink,
    workDir?: string
  ): Promise<string> {
    const starting = this.startEngine(owner, instructions, workDir);

    let handle: EngineHandle;
    try {
      handle = await raceWithSignal(starting, signal);
    } catch (error) {
      if (isCancellation(error, signal)) {
        // The engine may still come up after the abort; nobody else will close it
        void starting.then(
          (late) => this.closeHandle(late),
          (err: unknown) => getContextLogger().debug({ err }, "Engine start failed after abort")
        );
      }
      throw error;
    }

    try {
      return await runStep("turn", () => this.streamTurn(handle, prompt, signal, emit));
    } finally {
      await this.closeHandle(handle);
    }
  }

  /**
   * Drive one turn, forwarding every event to the job's sink
   *
   * Each wait on the engine is raced against the abort signal. Events that
   * do not match the event schema fail the turn.
   *
   * @returns The turn's final result, or the streamed text when there was none
   */
  private async streamTurn(
    handle: EngineHandle,
    prompt: string,
    signal: AbortSignal,
    emit: EventSink
  ): Promise<string> {
    const iterator = handle.submit(prompt, { signal })[Symbol.asyncIterator]();
    const chunks: string[] = [];
    let finalResult: string | undefined;

    try {
      for (;;) {
        const next = await raceWithSignal(iterator.next(), signal);
        if (next.done) {
          break;
        }

        const parsed = EngineEventSchema.safeParse(next.value);
        if (!parsed.success) {
          throw new EngineRuntimeError(`Malformed engine event: ${parsed.error.message}`);
        }

        const event = parsed.data;
        if (event.type === "text-chunk") {
          chunks.push(event.content);
        } else if (event.type === "final-result") {
          finalResult = event.content;
        }
        emit(event);
      }
    } catch (error) {
      const closing = iterator.return?.();
      if (closing) {
        void closing.catch((err: unknown) => {
          getContextLogger().debug({ err }, "Closing engine stream failed");
        });
      }
      if (isCancellation(error, signal) || error instanceof OrchestratorError) {
        throw error;
      }
      throw new EngineRuntimeError(errorMessage(error), { cause: error });
    }

    return finalResult ?? chunks.join("");
  }

  private async closeHandle(handle: EngineHandle): Promise<void> {
    try {
      await handle.close();
    } catch (err) {
      getContextLogger().warn({ err }, "Error closing engine handle");
    }
  }

  get isShuttingDown(): boolean {
    return this.stopping;
  }
}
