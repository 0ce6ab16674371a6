/**
 * Console rendering of agent events
 */

import type { AgentEvent } from "@ticketflow/orchestrator";

const MAX_TOOL_OUTPUT = 200;

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

function describeInput(input: unknown): string {
  if (input === undefined) {
    return "";
  }
  return ` ${truncate(JSON.stringify(input) ?? "", MAX_TOOL_OUTPUT)}`;
}

/**
 * Text to write for an event, or undefined when the event prints nothing
 *
 * Final results are not printed here: their text already arrived as
 * chunks, and commands print the job payload once the job completes.
 */
export function renderEvent(event: AgentEvent): string | undefined {
  switch (event.type) {
    case "text-chunk":
      return event.content;
    case "tool-invocation":
      return `\n→ ${event.name}${describeInput(event.input)}\n`;
    case "tool-result":
      return `  ${truncate(event.content.trim(), MAX_TOOL_OUTPUT)}\n`;
    case "final-result":
      return undefined;
    case "error":
      return `\nError: ${event.message}\n`;
    case "aborted":
      return "\nAborted.\n";
    case "completed":
      return event.success ? "\n" : "\nFinished without success.\n";
  }
}
