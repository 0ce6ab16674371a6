import type { AgentEvent, ClientConnection } from "@ticketflow/orchestrator";
import { renderEvent } from "./render-event.js";

export type Writer = (text: string) => void;

/**
 * Client connection that prints events to the terminal
 */
export class ConsoleConnection implements ClientConnection {
  readonly id = "console";

  constructor(private readonly write: Writer = (text) => process.stdout.write(text)) {}

  send(event: AgentEvent): void {
    const text = renderEvent(event);
    if (text) {
      this.write(text);
    }
  }
}
