/**
 * Prompt template for implementing a ticket in the cloned repositories
 */

import { PromptTemplate } from "@langchain/core/prompts";
import { customInstructionsSection } from "./meeting.prompt.js";

export const TICKET_SYSTEM_PROMPT = `You are a software developer implementing tickets in repositories checked out in your working directory.

Work step by step. If the ticket is unclear or something blocks you, stop and explain the blocker instead of pushing incomplete work.`;

export const ticketPrompt = PromptTemplate.fromTemplate(`## Ticket {issueKey}
Summary: {summary}
{customSection}
## What to do
1. Move the ticket to "In Progress".
2. Find the repository and files the change belongs in.
3. Create a branch named after the ticket and implement the change.
4. Commit with a message that references {issueKey} and push the branch with a merge request.
5. Comment on the ticket with what you implemented and the merge request link, then move it to "Code Review".`);

export interface TicketPromptInput {
  issueKey: string;
  summary?: string;
  instructions?: string;
}

export function formatTicketPrompt(input: TicketPromptInput): Promise<string> {
  return ticketPrompt.format({
    issueKey: input.issueKey,
    summary: input.summary?.trim() || "(read it from the ticket)",
    customSection: customInstructionsSection(input.instructions),
  });
}
