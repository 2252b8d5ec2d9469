import { Injectable, Logger, MessageEvent } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { performance } from 'node:perf_hooks';
import { Observable } from 'rxjs';
import { IntentClassificationService } from './services/intent-classification.service';
import { ContextEnrichmentService } from './services/context-enrichment.service';
import {
  SAFE_FALLBACK_RESPONSE,
  ValidationService,
  ValidationVerdict,
} from './services/validation.service';
import { ResponderOutcome, ResponderRegistry, citedSources } from './responders';
import { LLMCacheService } from './services/llm-cache.service';
import { ToolDispatcherService } from '../tools/tool-dispatcher.service';
import { EventEmitterService } from '../events/event-emitter.service';
import { TelemetryService } from '../telemetry/telemetry.service';
import { QueryLogService } from '../../query-log/query-log.service';
import { RequestMetadata, RequestState } from './state/request-state';
import { RequestEvent, RequestEventType } from './state/request-event-log';
import {
  ChunkRef,
  ClassificationResult,
  DEFAULT_INTENT,
  Intent,
  ResponderStrategy,
  TimedStage,
  ToolResult,
  ValidatorState,
} from './rag.types';
import { AssistantConfig } from '../../config/assistant.config';
import { withStageTimeout } from '../../common/utils/stage-timeout';
import {
  RequestCancelledError,
  StageTimeoutError,
  errorMessage,
  isCancellation,
} from '../../common/utils/errors';

export interface HandleQueryOptions {
  stream?: boolean;
  forceIntent?: Intent;
  signal?: AbortSignal;
}

export interface QueryResult {
  response: string;
  sources: ChunkRef[];
  intent: Intent;
  confidence: number;
  metadata: RequestMetadata & {
    requestId: string;
    latencyMs: number;
    retryCount: number;
    /** Present only for streamed requests. */
    events?: readonly RequestEvent[];
  };
}

/**
 * Orchestrates one query: classify → enrich → dispatch → respond → validate,
 * with a bounded back-edge on RETRY. Every path ends in a QueryResult.
 */
@Injectable()
export class RagService {
  private readonly logger = new Logger(RagService.name);

  constructor(
    private readonly intentClassificationService: IntentClassificationService,
    private readonly contextEnrichmentService: ContextEnrichmentService,
    private readonly toolDispatcher: ToolDispatcherService,
    private readonly responderRegistry: ResponderRegistry,
    private readonly validationService: ValidationService,
    private readonly llmCacheService: LLMCacheService,
    private readonly eventEmitter: EventEmitterService,
    private readonly telemetry: TelemetryService,
    private readonly queryLogService: QueryLogService,
    private readonly configService: ConfigService,
  ) {}

  private get config(): AssistantConfig {
    return this.configService.getOrThrow<AssistantConfig>('assistant');
  }

  async handleQuery(
    userQuery: string,
    options: HandleQueryOptions = {},
  ): Promise<QueryResult> {
    return this.run(this.createState(userQuery, options));
  }

  createState(userQuery: string, options: HandleQueryOptions = {}): RequestState {
    return new RequestState({
      userQuery: typeof userQuery === 'string' ? userQuery : '',
      stream: options.stream ?? false,
      signal: options.signal,
      forceIntent: options.forceIntent,
    });
  }

  /**
   * Stream a request's events as they are appended, then a final `complete`
   * event carrying the result. Unsubscribing cancels the request.
   */
  streamQuery(
    userQuery: string,
    options: Omit<HandleQueryOptions, 'stream' | 'signal'> = {},
  ): Observable<MessageEvent> {
    return new Observable<MessageEvent>((subscriber) => {
      const controller = new AbortController();
      const state = this.createState(userQuery, {
        ...options,
        stream: true,
        signal: controller.signal,
      });
      let finished = false;

      const events = state.events.observe().subscribe((event) =>
        subscriber.next({ id: String(event.seq), type: event.type, data: event }),
      );

      this.run(state).then(
        (result) => {
          finished = true;
          subscriber.next({ type: 'complete', data: result });
          subscriber.complete();
        },
        (error: unknown) => {
          finished = true;
          subscriber.error(error);
        },
      );

      return () => {
        events.unsubscribe();
        if (!finished) controller.abort();
      };
    });
  }

  /** Drive a prepared request to a terminal state. Never rejects. */
  async run(state: RequestState): Promise<QueryResult> {
    const steps = state.metadata.stepsExecuted;

    this.logger.log(`\n${'='.repeat(80)}`);
    this.logger.log(`🔵 NEW QUERY: "${state.userQuery}"`);
    this.logger.log(`Request: ${state.requestId}`);
    this.logger.log(`${'='.repeat(80)}\n`);
    this.emit(state, 'request_started', { requestId: state.requestId, query: state.userQuery });

    try {
      await this.execute(state);
    } catch (error) {
      if (isCancellation(error)) {
        this.logger.warn(`⚠️ Request ${state.requestId} cancelled`);
        state.metadata.cancelled = true;
        this.emit(state, 'cancelled', {});
        this.failSafe(state, 'cancelled');
      } else {
        this.logger.error(
          `❌ Unexpected pipeline error: ${errorMessage(error)}`,
          error instanceof Error ? error.stack : undefined,
        );
        this.failSafe(state, `internal_error: ${errorMessage(error)}`);
      }
    }

    if (state.intent === null) {
      state.assignIntent(DEFAULT_INTENT);
    }
    return this.finish(state, steps);
  }

  private async execute(state: RequestState): Promise<void> {
    const config = this.config;
    const steps = state.metadata.stepsExecuted;

    // ===== STAGE 1: CLASSIFY =====
    this.logger.log('📋 STAGE 1: CLASSIFY');
    this.throwIfCancelled(state);
    const classification = await this.classify(state);
    const intent = classification.intent;
    state.assignIntent(intent);
    state.metadata.classification = {
      method: classification.method,
      matched: classification.matched,
    };
    if (classification.degradedReason) {
      state.markDegraded(classification.degradedReason);
      this.emit(state, 'classification_degraded', { reason: classification.degradedReason });
    }
    this.emit(state, 'intent_classified', { intent, method: classification.method });
    steps.push('intent_classification');
    this.logger.log(`├─ Intent: ${intent} (${classification.method})`);

    if (classification.quickIntent) {
      state.metadata.quickIntent = classification.quickIntent;
      steps.push('quick_intent');
      state.draftResponse = this.intentClassificationService.quickResponse(
        classification.quickIntent,
        state.userQuery,
      );
      this.emit(state, 'draft_generated', { strategy: 'template', length: state.draftResponse.length });
      const verdict = this.validateDraft(state, 'template', '');
      if (verdict.state === ValidatorState.RETRY) {
        this.failSafe(state, verdict.reason);
      }
      return;
    }

    let strategy: ResponderStrategy = 'generative';
    let widenings = 0;
    let needsContext = true;
    let toolResults: ToolResult[] | null = null;

    for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
      // ===== STAGE 2: ENRICH =====
      if (needsContext) {
        this.logger.log(`📋 STAGE 2: ENRICH (widenings: ${widenings})`);
        this.throwIfCancelled(state);
        await this.enrich(state, intent, widenings);
        steps.push(widenings > 0 ? 'context_widening' : 'context_enrichment');
        needsContext = false;
      }

      // ===== STAGE 3: DISPATCH (once per request) =====
      if (toolResults === null) {
        this.throwIfCancelled(state);
        toolResults = await this.dispatchTools(state, intent);
      }

      // ===== STAGE 4: RESPOND =====
      this.logger.log(`📋 STAGE 4: RESPOND (${strategy})`);
      this.throwIfCancelled(state);
      const outcome = await this.respond(state, intent, strategy, toolResults);
      steps.push(`response_${outcome.strategy}`);

      // ===== STAGE 5: VALIDATE =====
      this.throwIfCancelled(state);
      const evidence = [state.context, ...toolResults.map((t) => t.summary)]
        .filter(Boolean)
        .join('\n');
      const verdict = this.validateDraft(
        state,
        outcome.strategy,
        evidence,
        outcome.ok ? undefined : outcome.reason,
      );
      if (verdict.state !== ValidatorState.PASSED && outcome.cacheKey) {
        await this.llmCacheService.evict(outcome.cacheKey);
      }
      if (verdict.state !== ValidatorState.RETRY) return;

      const action = verdict.action;
      const retry = state.incrementRetry(config.maxRetries);
      this.emit(state, 'retry', { attempt: retry, action });
      this.telemetry.recordEvent('retry', { action });
      steps.push('retry');

      if (action === 'widen_context') {
        widenings += 1;
        needsContext = true;
      } else {
        strategy = strategy === 'generative' ? 'extractive' : 'generative';
      }
    }

    this.failSafe(state, 'retry_budget_exhausted');
  }

  private async classify(state: RequestState): Promise<ClassificationResult> {
    if (state.forceIntent) {
      return { intent: state.forceIntent, method: 'forced' };
    }
    try {
      return await this.timed(state, 'classify', (signal) =>
        this.intentClassificationService.classify(state.userQuery, signal),
      );
    } catch (error) {
      if (!(error instanceof StageTimeoutError)) throw error;
      return { intent: DEFAULT_INTENT, method: 'default', degradedReason: 'classify_timeout' };
    }
  }

  private async enrich(
    state: RequestState,
    intent: Intent,
    widenings: number,
  ): Promise<void> {
    try {
      await this.timed(state, 'retrieve', (signal) =>
        this.contextEnrichmentService.enrich(intent, state.userQuery, state, widenings, signal),
      );
    } catch (error) {
      if (!(error instanceof StageTimeoutError)) throw error;
      state.context = '';
      state.contextSources = [];
      state.metadata.retrieval = undefined;
      state.markDegraded('retrieve_timeout');
    }

    const retrieval = state.metadata.retrieval;
    if (retrieval?.degraded) {
      this.emit(state, 'retrieval_degraded', { reasons: [...state.metadata.degradedReasons] });
    }
    this.emit(state, 'context_enriched', {
      k: retrieval?.k ?? 0,
      retrieved: retrieval?.retrieved ?? 0,
      included: state.contextSources.length,
      contextLength: state.context.length,
    });
  }

  private async dispatchTools(state: RequestState, intent: Intent): Promise<ToolResult[]> {
    const requests = this.toolDispatcher.selectTools(intent, state.userQuery);
    if (requests.length === 0) return [];

    this.logger.log(`📋 STAGE 3: DISPATCH (${requests.map((r) => r.toolId).join(', ')})`);
    const started = performance.now();
    try {
      if (requests.length > 1) {
        return await this.toolDispatcher.dispatchChain(requests, state);
      }
      const result = await this.toolDispatcher.dispatch(requests[0].toolId, state, requests[0].input);
      return result ? [result] : [];
    } finally {
      this.recordStageLatency(state, 'dispatch', performance.now() - started);
      state.metadata.stepsExecuted.push('tool_dispatch');
    }
  }

  private async respond(
    state: RequestState,
    intent: Intent,
    strategy: ResponderStrategy,
    toolResults: readonly ToolResult[],
  ): Promise<ResponderOutcome> {
    const responder = this.responderRegistry.forIntent(intent);
    let outcome: ResponderOutcome;
    try {
      outcome = await this.timed(state, 'respond', (signal) =>
        responder.respond({
          query: state.userQuery,
          context: state.context,
          sources: state.contextSources,
          toolResults,
          strategy,
          attempt: state.retryCount,
          signal,
        }),
      );
    } catch (error) {
      if (!(error instanceof StageTimeoutError)) throw error;
      outcome = { ok: false, reason: 'respond_timeout', strategy };
    }

    state.metadata.responderStrategy = outcome.strategy;
    if (outcome.ok) {
      state.draftResponse = outcome.text;
      this.emit(state, 'draft_generated', { strategy: outcome.strategy, length: outcome.text.length });
    } else {
      state.draftResponse = '';
      this.emit(state, 'generation_failed', { strategy: outcome.strategy, reason: outcome.reason });
    }
    return outcome;
  }

  private validateDraft(
    state: RequestState,
    strategy: ResponderStrategy | 'template',
    evidence: string,
    generationError?: string,
  ): ValidationVerdict {
    const started = performance.now();
    const verdict = this.validationService.validate({
      draft: state.draftResponse,
      evidence,
      sourceCount: state.contextSources.length,
      retryCount: state.retryCount,
      generationError,
    });
    this.recordStageLatency(state, 'validate', performance.now() - started);
    state.metadata.stepsExecuted.push('validation');

    const reason = verdict.state === ValidatorState.PASSED ? undefined : verdict.reason;
    state.metadata.validation.history.push({
      attempt: state.retryCount + 1,
      state: verdict.state,
      reason,
      strategy,
      draftLength: state.draftResponse.length,
    });
    this.emit(state, 'validation', { state: verdict.state, reason, retryCount: state.retryCount });

    if (verdict.state === ValidatorState.PASSED) {
      state.metadata.validation.state = ValidatorState.PASSED;
      state.metadata.validation.reason = undefined;
      state.metadata.grounded = verdict.groundingRatio !== null;
      state.sources = citedSources(state.draftResponse, state.contextSources);
    } else if (verdict.state === ValidatorState.FAILED_SAFE) {
      this.failSafe(state, verdict.reason);
    }
    return verdict;
  }

  private failSafe(state: RequestState, reason: string): void {
    state.metadata.validation.state = ValidatorState.FAILED_SAFE;
    state.metadata.validation.reason = reason;
    state.metadata.grounded = false;
    state.draftResponse = SAFE_FALLBACK_RESPONSE;
    state.sources = [];
    this.emit(state, 'fallback', { reason });
    this.telemetry.recordEvent('fallback', { reason });
  }

  private async finish(state: RequestState, steps: string[]): Promise<QueryResult> {
    const intent = state.requireIntent();
    const latencyMs = state.elapsedMs();
    const validatorState = state.metadata.validation.state;
    const confidence = this.calculateConfidence(state);

    this.telemetry.recordLatency('total', latencyMs);
    this.telemetry.recordEvent(`request_${validatorState.toLowerCase()}`, { intent });
    this.emit(state, 'completed', { validatorState, latencyMs });
    state.events.close();

    if (!state.metadata.cancelled) {
      await this.queryLogService.record({
        query: state.userQuery,
        intent,
        latencyMs,
        chunksRetrieved: state.metadata.retrieval?.retrieved ?? 0,
        validatorState,
        retryCount: state.retryCount,
        degraded: state.metadata.degraded,
      });
    }

    this.logger.log(`├─ Steps: ${steps.join(' → ')}`);
    this.logger.log(`├─ Validator: ${validatorState}`);
    this.logger.log(`└─ ✅ COMPLETED in ${latencyMs}ms\n`);

    return {
      response: state.draftResponse,
      sources: state.sources,
      intent,
      confidence,
      metadata: {
        ...state.metadata,
        requestId: state.requestId,
        latencyMs,
        retryCount: state.retryCount,
        events: state.stream ? state.events.snapshot() : undefined,
      },
    };
  }

  /** Mean score of the cited sources plus a bonus for grounded answers, capped at 1. */
  private calculateConfidence(state: RequestState): number {
    if (state.metadata.validation.state !== ValidatorState.PASSED) return 0;
    if (state.metadata.quickIntent) return 1;
    if (state.sources.length === 0) return 0;

    const avgScore =
      state.sources.reduce((sum, source) => sum + Math.min(source.score, 1), 0) /
      state.sources.length;
    const groundingBonus = state.metadata.grounded ? 0.2 : 0;
    return Math.round(Math.min(avgScore + groundingBonus, 1) * 1000) / 1000;
  }

  private async timed<T>(
    state: RequestState,
    stage: TimedStage,
    task: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const started = performance.now();
    try {
      return await withStageTimeout(stage, this.config.stageTimeouts[stage], task, state.signal);
    } catch (error) {
      if (error instanceof StageTimeoutError) {
        this.logger.warn(`⏱️ Stage ${stage} timed out after ${error.timeoutMs}ms`);
        state.metadata.timedOutStages.push(stage);
        this.emit(state, 'stage_timeout', { stage, timeoutMs: error.timeoutMs });
        this.telemetry.recordEvent('stage_timeout', { stage });
      }
      throw error;
    } finally {
      this.recordStageLatency(state, stage, performance.now() - started);
    }
  }

  private recordStageLatency(
    state: RequestState,
    stage: TimedStage | 'validate',
    elapsed: number,
  ): void {
    const ms = Math.round(elapsed * 1000) / 1000;
    state.metadata.stageLatencies[stage] = (state.metadata.stageLatencies[stage] ?? 0) + ms;
    this.telemetry.recordLatency(stage, ms);
  }

  private throwIfCancelled(state: RequestState): void {
    if (state.signal.aborted) {
      throw new RequestCancelledError();
    }
  }

  private emit(
    state: RequestState,
    type: RequestEventType,
    payload: Record<string, unknown>,
  ): void {
    this.eventEmitter.emit(state, type, payload);
  }
}
