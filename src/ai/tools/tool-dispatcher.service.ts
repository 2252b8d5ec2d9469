import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { performance } from 'node:perf_hooks';
import { TOOL_PROVIDERS, ToolProvider, ToolRequest } from './tool.types';
import { EventEmitterService } from '../events/event-emitter.service';
import { TelemetryService } from '../telemetry/telemetry.service';
import { RequestState } from '../rag/state/request-state';
import { Intent, ToolInput, ToolResult } from '../rag/rag.types';
import { AssistantConfig } from '../../config/assistant.config';
import { withStageTimeout } from '../../common/utils/stage-timeout';
import {
  StageTimeoutError,
  errorMessage,
  isCancellation,
} from '../../common/utils/errors';

const GITHUB_CUES = /\b(github|repos?|repositories|open[\s-]?source|source\s+code)\b/i;
const WEATHER_CUES = /\b(weather|temperature|forecast|raining|sunny)\b/i;

@Injectable()
export class ToolDispatcherService {
  private readonly logger = new Logger(ToolDispatcherService.name);
  private readonly registry: ReadonlyMap<string, ToolProvider>;

  constructor(
    @Inject(TOOL_PROVIDERS) providers: ToolProvider[],
    private readonly eventEmitter: EventEmitterService,
    private readonly telemetry: TelemetryService,
    private readonly configService: ConfigService,
  ) {
    const registry = new Map<string, ToolProvider>();
    for (const provider of providers) {
      if (registry.has(provider.id)) {
        throw new Error(`Tool already registered: ${provider.id}`);
      }
      registry.set(provider.id, provider);
    }
    this.registry = registry;
  }

  listTools(): Array<{ id: string; description: string }> {
    return [...this.registry.values()].map(({ id, description }) => ({
      id,
      description,
    }));
  }

  /** Tools worth calling for a query; at most one of each. */
  selectTools(intent: Intent, query: string): ToolRequest[] {
    const requests: ToolRequest[] = [];
    if (intent === Intent.PROJECT_TOUR || GITHUB_CUES.test(query)) {
      requests.push({ toolId: 'github.repos', input: {} });
    }
    if (WEATHER_CUES.test(query)) {
      requests.push({ toolId: 'weather.current', input: {} });
    }
    return requests;
  }

  /**
   * Invoke one provider. Unknown ids and exhausted budgets return null;
   * provider errors and timeouts come back as a failed result. Only
   * cancellation of the request propagates.
   */
  async dispatch(
    toolId: string,
    state: RequestState,
    input: ToolInput = {},
    chained: boolean = false,
  ): Promise<ToolResult | null> {
    const provider = this.registry.get(toolId);
    if (!provider) {
      this.logger.debug(`⏭️ No tool registered as "${toolId}"`);
      this.eventEmitter.emit(state, 'tool_skipped', { toolId, reason: 'unknown_tool' });
      return null;
    }

    const config = this.configService.getOrThrow<AssistantConfig>('assistant');
    const cap = chained
      ? config.maxChainedToolInvocations
      : config.maxToolInvocations;
    if (state.metadata.toolInvocations.length >= cap) {
      this.logger.warn(`⚠️ Tool budget of ${cap} reached, skipping ${toolId}`);
      this.eventEmitter.emit(state, 'tool_skipped', { toolId, reason: 'invocation_cap', cap });
      return null;
    }

    const started = performance.now();
    this.logger.log(`├─ 🔧 Invoking ${toolId}`);

    try {
      const output = await withStageTimeout(
        'dispatch',
        config.stageTimeouts.dispatch,
        (signal) => provider.invoke(input, signal),
        state.signal,
      );
      const durationMs = Math.round(performance.now() - started);

      state.metadata.toolInvocations.push({
        toolId,
        input,
        output: output.data,
        succeeded: true,
        durationMs,
      });
      this.telemetry.recordLatency(`tool:${toolId}`, durationMs);
      this.eventEmitter.emit(state, 'tool_invoked', { toolId, durationMs });

      return { toolId, succeeded: true, data: output.data, summary: output.summary };
    } catch (error) {
      if (isCancellation(error)) throw error;

      const durationMs = Math.round(performance.now() - started);
      const message = errorMessage(error);
      this.logger.warn(`⚠️ Tool ${toolId} failed: ${message}`);

      if (error instanceof StageTimeoutError) {
        state.metadata.timedOutStages.push('dispatch');
      }
      state.metadata.toolInvocations.push({
        toolId,
        input,
        output: null,
        succeeded: false,
        error: message,
        durationMs,
      });
      state.metadata.toolErrors.push(`${toolId}: ${message}`);
      this.telemetry.recordEvent('tool_failed', { toolId });
      this.eventEmitter.emit(state, 'tool_failed', { toolId, error: message });

      return { toolId, succeeded: false, data: null, summary: '' };
    }
  }

  /**
   * Run several tools one after another under the chained budget.
   */
  async dispatchChain(
    requests: readonly ToolRequest[],
    state: RequestState,
  ): Promise<ToolResult[]> {
    const results: ToolResult[] = [];
    for (const request of requests) {
      const result = await this.dispatch(request.toolId, state, request.input, true);
      if (result) results.push(result);
    }
    return results;
  }
}
