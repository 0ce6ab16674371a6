/**
 * Error classes for the orchestration core
 *
 * Every error carries a stable `code` and the HTTP status a transport
 * layer should answer with.
 */

export type OrchestratorErrorCode =
  | "ALREADY_BUSY"
  | "FORBIDDEN"
  | "NOTHING_TO_ABORT"
  | "ENGINE_START_FAILED"
  | "ENGINE_RUNTIME_FAILED"
  | "CANCELLED"
  | "SESSION_NOT_FOUND"
  | "SESSION_BUSY"
  | "SHUTTING_DOWN";

/**
 * Base error class for orchestrator errors
 */
export class OrchestratorError extends Error {
  constructor(
    message: string,
    public readonly code: OrchestratorErrorCode,
    public readonly httpStatus: number,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "OrchestratorError";
  }
}

/**
 * The single execution slot is held by another job
 */
export class AlreadyBusyError extends OrchestratorError {
  constructor() {
    super("Another task is being processed. Please wait or abort it.", "ALREADY_BUSY", 409);
    this.name = "AlreadyBusyError";
  }
}

/**
 * Abort requested by someone other than the job's owner
 */
export class ForbiddenError extends OrchestratorError {
  constructor(public readonly requestedBy: string) {
    super("Cannot abort another user's task", "FORBIDDEN", 403);
    this.name = "ForbiddenError";
  }
}

export class NothingToAbortError extends OrchestratorError {
  constructor() {
    super("No task is processing", "NOTHING_TO_ABORT", 400);
    this.name = "NothingToAbortError";
  }
}

/**
 * The agent engine failed to initialize
 */
export class EngineStartError extends OrchestratorError {
  constructor(message: string, options?: ErrorOptions) {
    super(`Agent engine failed to start: ${message}`, "ENGINE_START_FAILED", 502, options);
    this.name = "EngineStartError";
  }
}

/**
 * A submitted turn failed (model error, tool transport error, malformed output)
 */
export class EngineRuntimeError extends OrchestratorError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "ENGINE_RUNTIME_FAILED", 502, options);
    this.name = "EngineRuntimeError";
  }
}

/**
 * Cooperative cancellation; reported as an `aborted` event, never as `error`
 */
export class CancelledError extends OrchestratorError {
  constructor(reason = "Job cancelled") {
    super(reason, "CANCELLED", 409);
    this.name = "CancelledError";
  }
}

export class SessionNotFoundError extends OrchestratorError {
  constructor(public readonly sessionId: string) {
    super(`Session not found: ${sessionId}`, "SESSION_NOT_FOUND", 404);
    this.name = "SessionNotFoundError";
  }
}

/**
 * A turn is already streaming through the session
 */
export class SessionBusyError extends OrchestratorError {
  constructor(public readonly sessionId: string) {
    super(`Session is processing another turn: ${sessionId}`, "SESSION_BUSY", 409);
    this.name = "SessionBusyError";
  }
}

export class ShuttingDownError extends OrchestratorError {
  constructor() {
    super("Orchestrator is shutting down", "SHUTTING_DOWN", 503);
    this.name = "ShuttingDownError";
  }
}

/**
 * True when `signal` has fired and the error is our own cancellation or a
 * platform AbortError (timers/promises, fetch, LangChain) it raised
 *
 * An AbortError from an operation's own timeout, with the signal still
 * live, is a failure.
 */
export function isCancellation(error: unknown, signal: AbortSignal | undefined): boolean {
  if (!signal?.aborted) {
    return false;
  }
  return error instanceof CancelledError || (error instanceof Error && error.name === "AbortError");
}

/**
 * Normalize an AbortSignal reason into a CancelledError
 */
export function toCancelledError(reason: unknown): CancelledError {
  if (reason instanceof CancelledError) {
    return reason;
  }
  if (reason instanceof Error && reason.message) {
    return new CancelledError(reason.message);
  }
  if (typeof reason === "string" && reason) {
    return new CancelledError(reason);
  }
  return new CancelledError();
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
