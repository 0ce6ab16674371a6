/**
 * Prompt exports
 */

export {
  MEETING_SYSTEM_PROMPT,
  meetingPrompt,
  formatMeetingPrompt,
  customInstructionsSection,
  type MeetingPromptInput,
} from "./meeting.prompt.js";
export { QUESTION_SYSTEM_PROMPT, questionPrompt, formatQuestionPrompt, type QuestionPromptInput } from "./question.prompt.js";
export { TICKET_SYSTEM_PROMPT, ticketPrompt, formatTicketPrompt, type TicketPromptInput } from "./ticket.prompt.js";
