import { Intent } from '../rag/rag.types';

/**
 * Answer generation prompt
 * Grounds the answer in numbered context blocks the model must cite
 */

// Intent-specific instructions for answer formatting
export const ANSWER_INSTRUCTIONS: Record<Intent, string> = {
  [Intent.EDUCATION]:
    'Name degrees, institutions and years exactly as written. Mention thesis or notable coursework when present.',
  [Intent.EXPERIENCE]:
    'Summarise roles in reverse chronological order with employer, title and key outcomes.',
  [Intent.PERSONAL_PROJECT]:
    'Describe what each project does, the stack it uses and what was learned.',
  [Intent.SKILLS]:
    'Group skills by area. Back each group with the project or role where it was used.',
  [Intent.CASE_STUDY]:
    'Walk through problem, approach and measurable result.',
  [Intent.PROJECT_TOUR]:
    'Give a short tour: one bullet per project or repository with a one-line purpose.',
  [Intent.GENERAL]:
    'Answer briefly and point to the most relevant part of the portfolio.',
};

export function buildGenerateAnswerPrompt(
  query: string,
  context: string,
  intent: Intent,
  toolSummary: string,
): string {
  return `ROLE: Portfolio assistant answering on the developer's behalf.
RULES: ${ANSWER_INSTRUCTIONS[intent]} Use only the CONTEXT and TOOL DATA. Cite blocks as [n]. If the answer is not there, say so.

CONTEXT:
${context || '(none)'}

${toolSummary ? `TOOL DATA:\n${toolSummary}\n\n` : ''}Q: ${query}

A:`;
}

/**
 * Lower temperature where facts must be repeated verbatim
 */
export function getAnswerTemperature(intent: Intent): number {
  return intent === Intent.EDUCATION || intent === Intent.EXPERIENCE ? 0.3 : 0.6;
}
