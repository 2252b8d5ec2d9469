import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import {
  ChunkRef,
  ClassificationMethod,
  Intent,
  PipelineStage,
  QuickIntent,
  ResponderStrategy,
  SourceCategory,
  ToolInvocationRecord,
  ValidatorState,
} from '../rag.types';
import { RequestEventLog } from './request-event-log';

export interface RetrievalSummary {
  k: number;
  allowedSources: SourceCategory[] | null;
  retrieved: number;
  included: number;
  degraded: boolean;
}

export interface ValidationRecord {
  attempt: number;
  state: ValidatorState;
  reason?: string;
  /** `template` marks quick-intent replies that skip the responders. */
  strategy: ResponderStrategy | 'template';
  draftLength: number;
}

export interface RequestMetadata {
  classification: { method: ClassificationMethod; matched?: string };
  quickIntent?: QuickIntent;
  retrieval?: RetrievalSummary;
  degraded: boolean;
  degradedReasons: string[];
  toolInvocations: ToolInvocationRecord[];
  toolErrors: string[];
  responderStrategy?: ResponderStrategy;
  validation: {
    state: ValidatorState;
    reason?: string;
    history: ValidationRecord[];
  };
  grounded: boolean;
  stepsExecuted: string[];
  stageLatencies: Partial<Record<PipelineStage, number>>;
  timedOutStages: PipelineStage[];
  cancelled: boolean;
}

export interface RequestStateInit {
  userQuery: string;
  stream: boolean;
  signal?: AbortSignal;
  forceIntent?: Intent;
}

/**
 * Per-request state threaded through the pipeline by `RagService`.
 *
 * Only the orchestrator assigns the intent and advances the retry counter;
 * stages receive the state for the duration of their call and keep no
 * reference to it afterwards.
 */
export class RequestState {
  readonly requestId = randomUUID();
  readonly startedAt = performance.now();
  readonly userQuery: string;
  readonly stream: boolean;
  readonly signal: AbortSignal;
  readonly forceIntent?: Intent;
  readonly events: RequestEventLog;

  context = '';
  /** Chunks that make up `context`, in retrieval order. */
  contextSources: ChunkRef[] = [];
  draftResponse = '';
  /** Chunks cited by the final response; always a subset of the context that produced it. */
  sources: ChunkRef[] = [];

  readonly metadata: RequestMetadata = {
    classification: { method: 'default' },
    degraded: false,
    degradedReasons: [],
    toolInvocations: [],
    toolErrors: [],
    validation: { state: ValidatorState.PENDING, history: [] },
    grounded: false,
    stepsExecuted: [],
    stageLatencies: {},
    timedOutStages: [],
    cancelled: false,
  };

  private assignedIntent: Intent | null = null;
  private retries = 0;

  constructor(init: RequestStateInit) {
    this.userQuery = init.userQuery;
    this.stream = init.stream;
    this.signal = init.signal ?? new AbortController().signal;
    this.forceIntent = init.forceIntent;
    this.events = new RequestEventLog(this.startedAt);
  }

  get intent(): Intent | null {
    return this.assignedIntent;
  }

  get retryCount(): number {
    return this.retries;
  }

  assignIntent(intent: Intent): void {
    if (this.assignedIntent !== null) {
      throw new Error(
        `Intent already assigned (${this.assignedIntent}); it cannot change to ${intent}`,
      );
    }
    this.assignedIntent = intent;
  }

  requireIntent(): Intent {
    if (this.assignedIntent === null) {
      throw new Error('Intent has not been classified yet');
    }
    return this.assignedIntent;
  }

  incrementRetry(maxRetries: number): number {
    if (this.retries >= maxRetries) {
      throw new Error(`Retry budget of ${maxRetries} exhausted`);
    }
    this.retries += 1;
    return this.retries;
  }

  markDegraded(reason: string): void {
    this.metadata.degraded = true;
    if (!this.metadata.degradedReasons.includes(reason)) {
      this.metadata.degradedReasons.push(reason);
    }
  }

  elapsedMs(): number {
    return Math.round(performance.now() - this.startedAt);
  }
}
