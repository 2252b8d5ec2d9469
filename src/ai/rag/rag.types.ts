/**
 * Closed set of question categories the assistant routes on.
 * GENERAL is the designated default for ambiguous input.
 */
export enum Intent {
  EDUCATION = 'EDUCATION',
  EXPERIENCE = 'EXPERIENCE',
  PERSONAL_PROJECT = 'PERSONAL_PROJECT',
  SKILLS = 'SKILLS',
  CASE_STUDY = 'CASE_STUDY',
  PROJECT_TOUR = 'PROJECT_TOUR',
  GENERAL = 'GENERAL',
}

export const DEFAULT_INTENT = Intent.GENERAL;

export const INTENTS: readonly Intent[] = Object.values(Intent);

export function isIntent(value: unknown): value is Intent {
  return typeof value === 'string' && INTENTS.some((intent) => intent === value);
}

export const SOURCE_CATEGORIES = [
  'education',
  'experience',
  'projects',
  'case-study',
  'resume',
  'skills',
  'profile',
] as const;

export type SourceCategory = (typeof SOURCE_CATEGORIES)[number];

export function isSourceCategory(value: unknown): value is SourceCategory {
  return (
    typeof value === 'string' &&
    SOURCE_CATEGORIES.some((category) => category === value)
  );
}

/** Immutable unit of portfolio content. Its vector lives in the vector store. */
export interface DocumentChunk {
  readonly id: string;
  readonly content: string;
  readonly sourceCategory: SourceCategory;
  readonly title?: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export type RetrievalMethod = 'semantic' | 'lexical';

export interface RetrievalResult {
  chunk: DocumentChunk;
  /** Score of the method that was most confident about this chunk (0..1). */
  score: number;
  /** `score` plus the boost for chunks both methods matched; used for ordering. */
  fusedScore: number;
  method: RetrievalMethod;
  matchedBy: RetrievalMethod[];
}

export interface HybridRetrievalOutcome {
  results: RetrievalResult[];
  degraded: boolean;
  degradedReason?: string;
}

export interface ChunkRef {
  id: string;
  sourceCategory: SourceCategory;
  title?: string;
  score: number;
  method: RetrievalMethod;
  matchedBy: RetrievalMethod[];
  citation: string;
  excerpt: string;
}

export type ToolInput = Record<string, unknown>;

export interface ToolInvocationRecord {
  toolId: string;
  input: ToolInput;
  output: unknown;
  succeeded: boolean;
  error?: string;
  durationMs: number;
}

export interface ToolResult {
  toolId: string;
  succeeded: boolean;
  data: unknown;
  summary: string;
}

export enum ValidatorState {
  PENDING = 'PENDING',
  PASSED = 'PASSED',
  RETRY = 'RETRY',
  FAILED_SAFE = 'FAILED_SAFE',
}

export type ResponderStrategy = 'generative' | 'extractive';

export type PipelineStage =
  | 'classify'
  | 'retrieve'
  | 'dispatch'
  | 'respond'
  | 'validate';

export type TimedStage = Exclude<PipelineStage, 'validate'>;

export type QuickIntent = 'greeting' | 'goodbye' | 'thank';

export type ClassificationMethod =
  | 'forced'
  | 'quick'
  | 'rule'
  | 'model'
  | 'default';

export interface ClassificationResult {
  intent: Intent;
  method: ClassificationMethod;
  quickIntent?: QuickIntent;
  matched?: string;
  /** Set when the model path failed and the default intent was used instead. */
  degradedReason?: string;
}
