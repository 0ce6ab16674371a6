/**
 * Prompt template for turning a meeting transcription into ticket updates
 */

import { PromptTemplate } from "@langchain/core/prompts";

export const MEETING_SYSTEM_PROMPT = `You are a project assistant that keeps an issue tracker in sync with what teams discuss in meetings.

Only act on work that was actually discussed. Prefer updating an existing ticket over creating a duplicate.
Label every ticket you create with "meeting-notes".`;

export const meetingPrompt = PromptTemplate.fromTemplate(`Process this meeting transcription for project {projectKey}.

## Transcription
{transcription}
{customSection}
## What to do
1. Identify action items, decisions, and bugs that were raised.
2. Look for existing tickets in {projectKey} that the discussion refers to and add the relevant notes to them.
3. Create tickets for new action items with a clear summary and the meeting context in the description.
4. Finish with a short summary of every ticket you created or updated.`);

export interface MeetingPromptInput {
  transcription: string;
  projectKey: string;
  instructions?: string;
}

export function formatMeetingPrompt(input: MeetingPromptInput): Promise<string> {
  return meetingPrompt.format({
    transcription: input.transcription,
    projectKey: input.projectKey,
    customSection: customInstructionsSection(input.instructions),
  });
}

/**
 * Optional "Custom instructions" block shared by all prompts
 */
export function customInstructionsSection(instructions: string | undefined): string {
  const trimmed = instructions?.trim();
  return trimmed ? `\n## Custom instructions\n${trimmed}\n` : "";
}
