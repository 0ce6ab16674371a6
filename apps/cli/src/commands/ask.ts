import { Args, Command, Flags } from "@oclif/core";
import { createInterface } from "node:readline/promises";
import type { Orchestrator } from "@ticketflow/orchestrator";
import { createConsoleOrchestrator, llmFlags, runInForeground } from "../lib/session.js";

export default class Ask extends Command {
  static override args = {
    question: Args.string({
      description: "Question about the project",
    }),
  };

  static override description = "Ask the agent about a project; interactive mode keeps the conversation going";

  static override examples = [
    "<%= config.bin %> <%= command.id %> \"What is blocking the release?\" --project PROJ",
    "<%= config.bin %> <%= command.id %> --project PROJ --interactive",
  ];

  static override flags = {
    ...llmFlags,
    project: Flags.string({
      char: "k",
      description: "Project the question is about",
    }),
    interactive: Flags.boolean({
      char: "i",
      description: "Keep asking follow-up questions in the same session",
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Ask);

    if (!args.question && !flags.interactive) {
      this.error("Provide a question or use --interactive");
    }

    const orchestrator = await createConsoleOrchestrator(flags.user, flags);
    orchestrator.start();
    try {
      let sessionId: string | undefined;
      if (args.question) {
        sessionId = await this.askOnce(orchestrator, flags.user, args.question, flags.project, sessionId);
      }
      if (flags.interactive) {
        await this.converse(orchestrator, flags.user, flags.project, sessionId);
      }
    } finally {
      await orchestrator.shutdown();
    }
  }

  private async converse(
    orchestrator: Orchestrator,
    owner: string,
    projectKey: string | undefined,
    initialSessionId: string | undefined
  ): Promise<void> {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    let sessionId = initialSessionId;
    this.log("Ask away. An empty line or \"exit\" ends the conversation.");

    try {
      for (;;) {
        const question = (await rl.question("> ")).trim();
        if (!question || question === "exit") {
          return;
        }
        sessionId = await this.askOnce(orchestrator, owner, question, projectKey, sessionId);
      }
    } finally {
      rl.close();
    }
  }

  /**
   * @returns The session to continue with next, if the turn produced one
   */
  private async askOnce(
    orchestrator: Orchestrator,
    owner: string,
    question: string,
    projectKey: string | undefined,
    sessionId: string | undefined
  ): Promise<string | undefined> {
    const handle = orchestrator.ask(owner, { question, projectKey, sessionId });
    const outcome = await runInForeground(orchestrator, owner, handle);

    switch (outcome.status) {
      case "completed":
        return outcome.payload.sessionId;
      case "aborted":
        return sessionId;
      case "failed":
        this.warn(`Question failed: ${outcome.error.message}`);
        return sessionId;
    }
  }
}
