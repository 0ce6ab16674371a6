/**
 * Prompt template for questions about a project
 */

import { PromptTemplate } from "@langchain/core/prompts";

export const QUESTION_SYSTEM_PROMPT = `You answer questions about a software project using its tickets, past meetings and code.

Search every relevant source before answering. Cite ticket keys when you refer to tickets.
If the sources do not contain the answer, say so.`;

export const questionPrompt = PromptTemplate.fromTemplate(`## Project
{projectKey}

## Question
{question}`);

export interface QuestionPromptInput {
  question: string;
  projectKey?: string;
}

export function formatQuestionPrompt(input: QuestionPromptInput): Promise<string> {
  return questionPrompt.format({
    question: input.question,
    projectKey: input.projectKey ?? "(any)",
  });
}
