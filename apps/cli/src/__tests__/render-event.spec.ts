import { describe, it, expect } from "vitest";
import { renderEvent } from "../lib/render-event.js";
import { ConsoleConnection } from "../lib/console-connection.js";

describe("renderEvent", () => {
  it("prints text chunks verbatim", () => {
    expect(renderEvent({ type: "text-chunk", content: "Creating PROJ-3" })).toBe("Creating PROJ-3");
  });

  it("prints tool calls with their input on a line of their own", () => {
    expect(renderEvent({ type: "tool-invocation", name: "search_issues", input: { jql: "project = PROJ" } })).toBe(
      '\n→ search_issues {"jql":"project = PROJ"}\n'
    );
    expect(renderEvent({ type: "tool-invocation", name: "list_projects" })).toBe("\n→ list_projects\n");
  });

  it("indents and truncates tool results", () => {
    expect(renderEvent({ type: "tool-result", content: "  3 issues found\n" })).toBe("  3 issues found\n");
    expect(renderEvent({ type: "tool-result", content: "x".repeat(250) })).toBe(`  ${"x".repeat(200)}…\n`);
  });

  it("leaves final results to the command", () => {
    expect(renderEvent({ type: "final-result", content: "All done" })).toBeUndefined();
  });

  it("prints terminal events", () => {
    expect(renderEvent({ type: "error", message: "socket closed" })).toBe("\nError: socket closed\n");
    expect(renderEvent({ type: "aborted" })).toBe("\nAborted.\n");
    expect(renderEvent({ type: "completed", success: true, payload: null })).toBe("\n");
    expect(renderEvent({ type: "completed", success: false, payload: null })).toBe("\nFinished without success.\n");
  });
});

describe("ConsoleConnection", () => {
  it("writes rendered events and skips silent ones", () => {
    const written: string[] = [];
    const connection = new ConsoleConnection((text) => written.push(text));

    connection.send({ type: "text-chunk", content: "Hello" });
    connection.send({ type: "final-result", content: "Hello" });
    connection.send({ type: "aborted" });

    expect(written).toEqual(["Hello", "\nAborted.\n"]);
  });
});
