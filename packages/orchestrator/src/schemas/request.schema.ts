/**
 * Schemas for the job requests accepted by the orchestrator
 */

import { z } from "zod";

const ProjectKeySchema = z
  .string()
  .trim()
  .min(1)
  .transform((key) => key.toUpperCase());

export const AskRequestSchema = z.object({
  question: z.string().trim().min(1),
  projectKey: ProjectKeySchema.optional(),
  /** Continue this conversation; absent, unknown or foreign ids start a new one */
  sessionId: z.string().optional(),
});

export type AskRequest = z.input<typeof AskRequestSchema>;

export const MeetingRequestSchema = z.object({
  transcription: z.string().trim().min(1),
  projectKey: ProjectKeySchema,
  instructions: z.string().optional(),
});

export type MeetingRequest = z.input<typeof MeetingRequestSchema>;

export const TicketWorkRequestSchema = z
  .object({
    issueKey: z
      .string()
      .trim()
      .regex(/^[A-Za-z][A-Za-z0-9_]*-\d+$/, "Expected an issue key like PROJ-123")
      .transform((key) => key.toUpperCase()),
    projectKey: ProjectKeySchema,
    summary: z.string().optional(),
    instructions: z.string().optional(),
  })
  .refine((request) => request.issueKey.startsWith(`${request.projectKey}-`), {
    message: "Issue does not belong to this project",
    path: ["issueKey"],
  });

export type TicketWorkRequest = z.input<typeof TicketWorkRequestSchema>;
