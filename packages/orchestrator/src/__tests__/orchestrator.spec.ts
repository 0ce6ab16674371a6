import { describe, it, expect, vi, afterEach } from "vitest";
import { Orchestrator } from "../orchestrator/index.js";
import { ScriptedAgentEngine, type AgentEngine, type SubmitOptions } from "../engine/index.js";
import { AgentSessionStore } from "../sessions/index.js";
import { raceWithSignal } from "../utils/index.js";
import type { EngineEvent } from "../schemas/index.js";
import {
  AlreadyBusyError,
  CancelledError,
  EngineRuntimeError,
  EngineStartError,
  ForbiddenError,
  NothingToAbortError,
  ShuttingDownError,
} from "../errors.js";
import { MEETING_SYSTEM_PROMPT, QUESTION_SYSTEM_PROMPT } from "../prompts/index.js";
import { RecordingConnection, deferred, flush } from "./helpers.js";

function answering(): ScriptedAgentEngine {
  return new ScriptedAgentEngine({
    turn: ({ turn }) => [
      { type: "text-chunk", content: "Looking" },
      { type: "final-result", content: `answer ${turn}` },
    ],
  });
}

/** Engine whose turns stall until aborted */
function stalling(): ScriptedAgentEngine {
  return new ScriptedAgentEngine({ eventDelayMs: 10_000 });
}

describe("Orchestrator", () => {
  let orchestrator: Orchestrator | undefined;

  afterEach(async () => {
    await orchestrator?.shutdown();
    orchestrator = undefined;
  });

  describe("askWithSession", () => {
    it("starts a session and streams the turn to the owner", async () => {
      const engine = answering();
      orchestrator = new Orchestrator({ engine });
      const connection = new RecordingConnection("alice-tab");
      orchestrator.connect("alice", connection);

      const result = await orchestrator.askWithSession("alice", { question: "What changed?", projectKey: "proj" });

      expect(result.answer).toBe("answer 0");
      expect(result.sessionId).toBe(orchestrator.sessions.getOwnerSession("alice")?.id);
      expect(connection.events).toEqual([
        { type: "text-chunk", content: "Looking" },
        { type: "final-result", content: "answer 0" },
        { type: "completed", success: true, payload: { answer: "answer 0", sessionId: result.sessionId } },
      ]);

      const [handle] = engine.handles;
      expect(handle?.options).toMatchObject({ owner: "alice", instructions: QUESTION_SYSTEM_PROMPT, maxTurns: 100 });
      expect(handle?.prompts[0]).toContain("What changed?");
      expect(handle?.prompts[0]).toContain("PROJ");
      expect(orchestrator.status("alice")).toEqual({ isBusy: false, isMine: false });
    });

    it("continues the owner's session with the bare question", async () => {
      const engine = answering();
      orchestrator = new Orchestrator({ engine });

      const first = await orchestrator.askWithSession("alice", { question: "What changed?" });
      const second = await orchestrator.askWithSession("alice", { question: "And then?", sessionId: first.sessionId });

      expect(second).toEqual({ answer: "answer 1", sessionId: first.sessionId });
      expect(engine.startCount).toBe(1);
      expect(engine.handles[0]?.prompts[1]).toBe("And then?");
      expect(orchestrator.sessions.list()[0]?.turnCount).toBe(2);
    });

    it("starts a new session for an unknown session id", async () => {
      const engine = answering();
      orchestrator = new Orchestrator({ engine });

      const result = await orchestrator.askWithSession("alice", { question: "Hello?", sessionId: "missing" });

      expect(result.sessionId).not.toBe("missing");
      expect(engine.startCount).toBe(1);
    });

    it("never continues another user's session", async () => {
      const engine = answering();
      orchestrator = new Orchestrator({ engine });

      const alice = await orchestrator.askWithSession("alice", { question: "Mine?" });
      const bob = await orchestrator.askWithSession("bob", { question: "Yours?", sessionId: alice.sessionId });

      expect(bob.sessionId).not.toBe(alice.sessionId);
      expect(bob.answer).toBe("answer 0");
      expect(engine.startCount).toBe(2);
      expect(engine.handles[0]?.prompts).toHaveLength(1);
      expect(orchestrator.sessions.size).toBe(2);
    });

    it("leaves the idle clock of another user's session alone", async () => {
      let now = 1_000;
      const sessions = new AgentSessionStore({ now: () => now });
      orchestrator = new Orchestrator({ engine: answering(), sessions });

      const alice = await orchestrator.askWithSession("alice", { question: "Mine?" });
      now = 5_000;
      await orchestrator.askWithSession("bob", { question: "Yours?", sessionId: alice.sessionId });

      const aliceSession = sessions.list().find((session) => session.id === alice.sessionId);
      expect(aliceSession?.lastActivity).toBe(1_000);
    });

    it("reports an engine's own AbortError as a failure when nobody aborted", async () => {
      const engine = new ScriptedAgentEngine({
        turn: () => {
          const timeout = new Error("upstream timeout");
          timeout.name = "AbortError";
          throw timeout;
        },
      });
      orchestrator = new Orchestrator({ engine });
      const connection = new RecordingConnection("alice-tab");
      orchestrator.connect("alice", connection);

      const failure = orchestrator.askWithSession("alice", { question: "Slow?" });

      await expect(failure).rejects.toBeInstanceOf(EngineRuntimeError);
      expect(connection.events).toEqual([{ type: "error", message: "upstream timeout" }]);
    });

    it("falls back to the streamed text when the engine gives no final result", async () => {
      const engine = new ScriptedAgentEngine({
        turn: () => [
          { type: "text-chunk", content: "Three tickets " },
          { type: "text-chunk", content: "are open." },
        ],
      });
      orchestrator = new Orchestrator({ engine });

      const result = await orchestrator.askWithSession("alice", { question: "Status?" });
      expect(result.answer).toBe("Three tickets are open.");
    });

    it("rejects with a cancellation when the owner aborts", async () => {
      const engine = stalling();
      orchestrator = new Orchestrator({ engine });

      const pending = orchestrator.askWithSession("alice", { question: "Slow?" });
      await vi.waitFor(() => {
        expect(engine.startCount).toBe(1);
      });
      orchestrator.abort("alice");

      await expect(pending).rejects.toBeInstanceOf(CancelledError);
      expect(orchestrator.sessions.size).toBe(1);
    });
  });

  describe("processMeeting", () => {
    it("runs a one-shot conversation and closes it", async () => {
      const engine = new ScriptedAgentEngine({
        turn: () => [{ type: "final-result", content: "Created PROJ-1" }],
      });
      orchestrator = new Orchestrator({ engine });
      const connection = new RecordingConnection("alice-tab");
      orchestrator.connect("alice", connection);

      const handle = orchestrator.processMeeting("alice", {
        transcription: "We agreed to add a login page.",
        projectKey: "PROJ",
      });

      await expect(handle.done).resolves.toEqual({
        status: "completed",
        success: true,
        payload: { summary: "Created PROJ-1" },
      });
      expect(connection.events).toEqual([
        { type: "final-result", content: "Created PROJ-1" },
        { type: "completed", success: true, payload: { summary: "Created PROJ-1" } },
      ]);
      expect(engine.handles[0]?.options.instructions).toBe(MEETING_SYSTEM_PROMPT);
      expect(engine.handles[0]?.prompts[0]).toContain("We agreed to add a login page.");
      expect(engine.handles[0]?.closeCount).toBe(1);
      expect(orchestrator.sessions.size).toBe(0);
    });

    it("reports an engine that fails to start as a job error", async () => {
      const engine = new ScriptedAgentEngine({ failStart: new Error("no model") });
      orchestrator = new Orchestrator({ engine });
      const connection = new RecordingConnection("alice-tab");
      orchestrator.connect("alice", connection);

      const outcome = await orchestrator.processMeeting("alice", { transcription: "Notes", projectKey: "PROJ" }).done;

      expect(outcome.status).toBe("failed");
      expect(outcome.status === "failed" ? outcome.error : undefined).toBeInstanceOf(EngineStartError);
      expect(connection.events).toEqual([{ type: "error", message: "Agent engine failed to start: no model" }]);
      expect(orchestrator.status("alice")).toEqual({ isBusy: false, isMine: false });
    });

    it("reports an engine that fails mid-turn as a job error", async () => {
      const partial: EngineEvent = { type: "text-chunk", content: "partial" };
      const close = vi.fn(async () => undefined);
      const engine: AgentEngine = {
        start: async () => ({
          async *submit() {
            yield partial;
            throw new Error("socket closed");
          },
          close,
        }),
      };
      orchestrator = new Orchestrator({ engine });
      const connection = new RecordingConnection("alice-tab");
      orchestrator.connect("alice", connection);

      const outcome = await orchestrator.processMeeting("alice", { transcription: "Notes", projectKey: "PROJ" }).done;

      expect(outcome.status === "failed" ? outcome.error : undefined).toBeInstanceOf(EngineRuntimeError);
      expect(connection.events).toEqual([partial, { type: "error", message: "socket closed" }]);
      expect(close).toHaveBeenCalledTimes(1);
    });
  });

  describe("workTicket", () => {
    it("works in a directory of the ticket's own", async () => {
      const engine = answering();
      orchestrator = new Orchestrator({ engine, settings: { workDir: "/tmp/work" } });

      const outcome = await orchestrator.workTicket("alice", { issueKey: "proj-7", projectKey: "proj" }).done;

      expect(outcome).toEqual({ status: "completed", success: true, payload: { summary: "answer 0" } });
      expect(engine.handles[0]?.options.workDir).toBe("/tmp/work/PROJ-7");
      expect(engine.handles[0]?.prompts[0]).toContain("## Ticket PROJ-7");
    });

    it("holds the slot until an aborted run has closed its engine", async () => {
      const closing = deferred();
      const close = vi.fn(() => closing.promise);
      let submitted = false;
      const engine: AgentEngine = {
        start: async () => ({
          async *submit(_prompt: string, options?: SubmitOptions) {
            submitted = true;
            await raceWithSignal(new Promise<never>(() => undefined), options?.signal);
          },
          close,
        }),
      };
      orchestrator = new Orchestrator({ engine, settings: { workDir: "/tmp/work" } });

      const job = orchestrator.workTicket("alice", { issueKey: "PROJ-7", projectKey: "PROJ" });
      await vi.waitFor(() => {
        expect(submitted).toBe(true);
      });
      orchestrator.abort("alice");
      await flush();

      expect(close).toHaveBeenCalledTimes(1);
      expect(orchestrator.status("alice")).toEqual({ isBusy: true, isMine: true });
      expect(() => orchestrator?.workTicket("bob", { issueKey: "PROJ-8", projectKey: "PROJ" })).toThrow(
        AlreadyBusyError
      );

      closing.resolve();

      await expect(job.done).resolves.toEqual({ status: "aborted" });
      expect(orchestrator.status("alice")).toEqual({ isBusy: false, isMine: false });
    });

    it("refuses an issue from another project without taking the slot", () => {
      orchestrator = new Orchestrator({ engine: answering() });

      expect(() => orchestrator?.workTicket("alice", { issueKey: "OTHER-1", projectKey: "PROJ" })).toThrow(
        "Issue does not belong to this project"
      );
      expect(orchestrator.status("alice")).toEqual({ isBusy: false, isMine: false });
    });
  });

  describe("single-flight", () => {
    it("lets only the owner abort, then frees the slot", async () => {
      const engine = stalling();
      orchestrator = new Orchestrator({ engine });
      const u1 = new RecordingConnection("u1-tab");
      const u2 = new RecordingConnection("u2-tab");
      orchestrator.connect("u1", u1);
      orchestrator.connect("u2", u2);

      const job = orchestrator.processMeeting("u1", { transcription: "Long meeting", projectKey: "PROJ" });
      await vi.waitFor(() => {
        expect(engine.startCount).toBe(1);
      });

      expect(orchestrator.status("u1")).toEqual({ isBusy: true, isMine: true });
      expect(orchestrator.status("u2")).toEqual({ isBusy: true, isMine: false });
      expect(orchestrator.currentJob()).toMatchObject({ owner: "u1", jobId: job.id, kind: "meeting" });

      expect(() => orchestrator?.processMeeting("u2", { transcription: "Mine", projectKey: "PROJ" })).toThrow(
        AlreadyBusyError
      );
      expect(() => orchestrator?.abort("u2")).toThrow(ForbiddenError);

      orchestrator.abort("u1");
      await expect(job.done).resolves.toEqual({ status: "aborted" });

      expect(u1.events).toEqual([{ type: "aborted" }]);
      expect(u2.events).toEqual([]);
      expect(orchestrator.status("u1")).toEqual({ isBusy: false, isMine: false });
      expect(() => orchestrator?.abort("u1")).toThrow(NothingToAbortError);
      expect(engine.handles[0]?.closeCount).toBe(1);
    });
  });

  describe("lifecycle", () => {
    it("detaches a connection through the returned function", async () => {
      orchestrator = new Orchestrator({ engine: answering() });
      const connection = new RecordingConnection("alice-tab");
      const disconnect = orchestrator.connect("alice", connection);

      disconnect();
      await orchestrator.askWithSession("alice", { question: "Anyone there?" });

      expect(connection.events).toEqual([]);
      expect(orchestrator.registry.connectionCount("alice")).toBe(0);
    });

    it("cancels the running job and refuses new work on shutdown", async () => {
      const engine = stalling();
      const current = new Orchestrator({ engine });
      orchestrator = current;
      current.start();
      const connection = new RecordingConnection("alice-tab");
      current.connect("alice", connection);

      const job = current.processMeeting("alice", { transcription: "Notes", projectKey: "PROJ" });
      await vi.waitFor(() => {
        expect(engine.startCount).toBe(1);
      });

      await current.shutdown();

      await expect(job.done).resolves.toEqual({ status: "aborted" });
      expect(connection.events).toEqual([{ type: "aborted" }]);
      expect(connection.closeCount).toBe(1);
      expect(current.sessions.isReaperRunning).toBe(false);
      expect(current.isShuttingDown).toBe(true);
      expect(() => current.processMeeting("alice", { transcription: "More", projectKey: "PROJ" })).toThrow(
        ShuttingDownError
      );
      expect(() => current.connect("alice", new RecordingConnection("late"))).toThrow(ShuttingDownError);
    });
  });
});
