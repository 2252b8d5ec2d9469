import { INTENTS } from '../rag/rag.types';

/**
 * Intent classification prompt
 * Used only when no routing rule matches the question
 */
export function buildClassifyIntentPrompt(query: string): string {
  return `Classify a visitor's question about a developer's portfolio.

MSG: "${query}"

INTENTS:
- EDUCATION: degrees, universities, courses, certifications
- EXPERIENCE: jobs, employers, roles, responsibilities, career history
- PERSONAL_PROJECT: side projects, apps or tools the developer built
- SKILLS: languages, frameworks, tools, strengths
- CASE_STUDY: in-depth write-ups, outcomes and lessons of a specific piece of work
- PROJECT_TOUR: walkthrough of repositories or an overview of everything built
- GENERAL: anything else, or when unsure

Output format (1 line only):
intent: [${INTENTS.join('|')}]`;
}
