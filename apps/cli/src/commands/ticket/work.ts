import { Args, Command, Flags } from "@oclif/core";
import { createConsoleOrchestrator, llmFlags, runInForeground } from "../../lib/session.js";

export default class TicketWork extends Command {
  static override args = {
    issueKey: Args.string({
      description: "Issue to implement, e.g. PROJ-123",
      required: true,
    }),
  };

  static override description = "Let the agent implement a ticket and open a merge request";

  static override examples = [
    "<%= config.bin %> <%= command.id %> PROJ-42 --project PROJ",
    "<%= config.bin %> <%= command.id %> PROJ-42 --project PROJ --summary \"Add login page\"",
  ];

  static override flags = {
    ...llmFlags,
    project: Flags.string({
      char: "k",
      description: "Project the issue belongs to",
      required: true,
    }),
    summary: Flags.string({
      char: "s",
      description: "Ticket summary, when known",
    }),
    instructions: Flags.string({
      char: "i",
      description: "Extra instructions for the agent",
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(TicketWork);

    const orchestrator = await createConsoleOrchestrator(flags.user, flags);
    try {
      const handle = orchestrator.workTicket(flags.user, {
        issueKey: args.issueKey,
        projectKey: flags.project,
        summary: flags.summary,
        instructions: flags.instructions,
      });
      this.log(`Working on ${args.issueKey.toUpperCase()}`);
      this.log("─".repeat(50));

      const outcome = await runInForeground(orchestrator, flags.user, handle);

      this.log("─".repeat(50));
      if (outcome.status === "completed") {
        this.log(outcome.payload.summary);
      } else if (outcome.status === "failed") {
        this.error(`Ticket work failed: ${outcome.error.message}`);
      }
    } finally {
      await orchestrator.shutdown();
    }
  }
}
