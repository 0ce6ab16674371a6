import { Args, Command, Flags } from "@oclif/core";
import { existsSync, readFileSync } from "node:fs";
import { createConsoleOrchestrator, llmFlags, runInForeground } from "../../lib/session.js";

export default class MeetingProcess extends Command {
  static override args = {
    input: Args.file({
      description: "Path to the meeting transcription",
      required: true,
    }),
  };

  static override description = "Turn a meeting transcription into ticket updates";

  static override examples = [
    "<%= config.bin %> <%= command.id %> standup.txt --project PROJ",
    "<%= config.bin %> <%= command.id %> standup.txt --project PROJ --provider anthropic",
    "<%= config.bin %> <%= command.id %> standup.txt --project PROJ --dry-run",
  ];

  static override flags = {
    ...llmFlags,
    project: Flags.string({
      char: "k",
      description: "Project key tickets are created in",
      required: true,
    }),
    instructions: Flags.string({
      char: "i",
      description: "Extra instructions for the agent",
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(MeetingProcess);

    if (!existsSync(args.input)) {
      this.error(`Input file not found: ${args.input}`);
    }

    const transcription = readFileSync(args.input, "utf-8");
    this.log(`Processing: ${args.input} (${transcription.length} chars)`);
    this.log("─".repeat(50));

    const orchestrator = await createConsoleOrchestrator(flags.user, flags);
    try {
      const handle = orchestrator.processMeeting(flags.user, {
        transcription,
        projectKey: flags.project,
        instructions: flags.instructions,
      });
      const outcome = await runInForeground(orchestrator, flags.user, handle);

      this.log("─".repeat(50));
      if (outcome.status === "completed") {
        this.log(outcome.payload.summary);
      } else if (outcome.status === "failed") {
        this.error(`Meeting processing failed: ${outcome.error.message}`);
      }
    } finally {
      await orchestrator.shutdown();
    }
  }
}
