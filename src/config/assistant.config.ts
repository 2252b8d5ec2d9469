import { registerAs } from '@nestjs/config';
import {
  SOURCE_CATEGORIES,
  SourceCategory,
  TimedStage,
  isSourceCategory,
} from '../ai/rag/rag.types';

export interface ToolsConfig {
  githubOwner: string;
  githubToken?: string;
  weatherLocation: string;
  weatherLatitude: number;
  weatherLongitude: number;
}

export interface AssistantConfig {
  /** Semantic matches below this similarity are dropped. */
  similarityThreshold: number;
  /** Added to the score of chunks found by both search methods when ordering. */
  bothMatchedBoost: number;
  /** Tie-break order between equally scored chunks (earlier wins). */
  sourcePriority: SourceCategory[];
  /** Extra results requested per widening retry. */
  widenStep: number;
  contextCharBudget: number;
  minResponseLength: number;
  minGroundingRatio: number;
  maxRetries: number;
  useModelClassifier: boolean;
  maxToolInvocations: number;
  maxChainedToolInvocations: number;
  stageTimeouts: Record<TimedStage, number>;
  tools: ToolsConfig;
}

type Env = Record<string, string | undefined>;

const int = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const float = (value: string | undefined, fallback: number): number => {
  const parsed = parseFloat(value ?? '');
  return Number.isFinite(parsed) ? parsed : fallback;
};

function parseSourcePriority(value: string | undefined): SourceCategory[] {
  const configured = (value ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter(isSourceCategory);
  // Categories missing from the list keep their default relative order at the end
  const rest = SOURCE_CATEGORIES.filter((c) => !configured.includes(c));
  return [...new Set([...configured, ...rest])];
}

export function loadAssistantConfig(env: Env): AssistantConfig {
  return {
    similarityThreshold: float(env.ASSISTANT_SIMILARITY_THRESHOLD, 0.7),
    bothMatchedBoost: float(env.ASSISTANT_BOTH_MATCHED_BOOST, 0.1),
    sourcePriority: parseSourcePriority(
      env.ASSISTANT_SOURCE_PRIORITY ??
        'resume,experience,education,projects,case-study,skills,profile',
    ),
    widenStep: int(env.ASSISTANT_WIDEN_STEP, 8),
    contextCharBudget: int(env.ASSISTANT_CONTEXT_CHAR_BUDGET, 6000),
    minResponseLength: int(env.ASSISTANT_MIN_RESPONSE_LENGTH, 50),
    minGroundingRatio: float(env.ASSISTANT_MIN_GROUNDING_RATIO, 0.3),
    maxRetries: int(env.ASSISTANT_MAX_RETRIES, 2),
    useModelClassifier: env.ASSISTANT_MODEL_CLASSIFIER !== 'false',
    maxToolInvocations: int(env.ASSISTANT_MAX_TOOL_INVOCATIONS, 1),
    maxChainedToolInvocations: int(env.ASSISTANT_MAX_CHAINED_TOOLS, 3),
    stageTimeouts: {
      classify: int(env.ASSISTANT_CLASSIFY_TIMEOUT_MS, 3000),
      retrieve: int(env.ASSISTANT_RETRIEVE_TIMEOUT_MS, 4000),
      dispatch: int(env.ASSISTANT_DISPATCH_TIMEOUT_MS, 5000),
      respond: int(env.ASSISTANT_RESPOND_TIMEOUT_MS, 5000),
    },
    tools: {
      githubOwner: env.GITHUB_OWNER || '',
      githubToken: env.GITHUB_TOKEN || undefined,
      weatherLocation: env.WEATHER_LOCATION || 'Lisbon',
      weatherLatitude: float(env.WEATHER_LATITUDE, 38.72),
      weatherLongitude: float(env.WEATHER_LONGITUDE, -9.14),
    },
  };
}

export default registerAs('assistant', (): AssistantConfig =>
  loadAssistantConfig(process.env),
);
