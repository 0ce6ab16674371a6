/**
 * Schemas for events streamed from agent jobs to client connections
 */

import { z } from "zod";

export const TextChunkEventSchema = z.object({
  type: z.literal("text-chunk"),
  content: z.string(),
});

export const ToolInvocationEventSchema = z.object({
  type: z.literal("tool-invocation"),
  name: z.string().min(1),
  input: z.unknown(),
});

export const ToolResultEventSchema = z.object({
  type: z.literal("tool-result"),
  content: z.string(),
});

export const FinalResultEventSchema = z.object({
  type: z.literal("final-result"),
  content: z.string(),
});

export const ErrorEventSchema = z.object({
  type: z.literal("error"),
  message: z.string(),
});

export const AbortedEventSchema = z.object({
  type: z.literal("aborted"),
});

export const CompletedEventSchema = z.object({
  type: z.literal("completed"),
  success: z.boolean(),
  payload: z.unknown(),
});

/**
 * Events an agent engine may produce during a turn
 */
export const EngineEventSchema = z.discriminatedUnion("type", [
  TextChunkEventSchema,
  ToolInvocationEventSchema,
  ToolResultEventSchema,
  FinalResultEventSchema,
]);

export type EngineEvent = z.infer<typeof EngineEventSchema>;

/**
 * Terminal events, emitted once per job by the job runner only
 */
export const TerminalEventSchema = z.discriminatedUnion("type", [
  ErrorEventSchema,
  AbortedEventSchema,
  CompletedEventSchema,
]);

export type TerminalEvent = z.infer<typeof TerminalEventSchema>;

/**
 * Everything a client connection can receive
 */
export const AgentEventSchema = z.discriminatedUnion("type", [
  TextChunkEventSchema,
  ToolInvocationEventSchema,
  ToolResultEventSchema,
  FinalResultEventSchema,
  ErrorEventSchema,
  AbortedEventSchema,
  CompletedEventSchema,
]);

export type AgentEvent = z.infer<typeof AgentEventSchema>;

export type AgentEventType = AgentEvent["type"];

export function isTerminalEvent(event: AgentEvent): event is TerminalEvent {
  return event.type === "completed" || event.type === "aborted" || event.type === "error";
}
