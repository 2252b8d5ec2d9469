import { Logger } from '@nestjs/common';
import { LLMCacheService, LLMCallOptions } from '../services/llm-cache.service';
import {
  buildGenerateAnswerPrompt,
  getAnswerTemperature,
} from '../../prompts';
import {
  ChunkRef,
  Intent,
  ResponderStrategy,
  ToolResult,
} from '../rag.types';
import { errorMessage, isCancellation } from '../../../common/utils/errors';

export interface ResponderInput {
  query: string;
  context: string;
  sources: readonly ChunkRef[];
  toolResults: readonly ToolResult[];
  strategy: ResponderStrategy;
  /** Zero on the first attempt; retries never reuse a cached completion. */
  attempt?: number;
  signal?: AbortSignal;
}

/** `cacheKey` is set when the text came through the completion cache. */
export type ResponderOutcome =
  | { ok: true; text: string; strategy: ResponderStrategy; cacheKey?: string }
  | { ok: false; reason: string; strategy: ResponderStrategy; cacheKey?: string };

export const NO_CONTEXT_RESPONSE =
  "I couldn't find anything in my portfolio that answers that yet. Try asking about my education, work experience, projects or skills.";

const EXTRACTIVE_SOURCES = 3;

/** Remove `[n]` markers that do not point at one of the given sources. */
export function sanitizeCitations(text: string, sourceCount: number): string {
  return text
    .replace(/\s*\[(\d+)\]/g, (marker: string, n: string) => {
      const index = Number(n);
      return index >= 1 && index <= sourceCount ? marker : '';
    })
    .replace(/[ \t]{2,}/g, ' ')
    .trim();
}

/**
 * Sources whose marker appears in the answer. An answer with no markers
 * keeps every source it was generated from.
 */
export function citedSources(text: string, sources: readonly ChunkRef[]): ChunkRef[] {
  const cited = sources.filter((source) => text.includes(source.citation));
  return cited.length > 0 ? cited : [...sources];
}

export function firstSentence(text: string): string {
  const trimmed = text.trim();
  const end = trimmed.search(/[.!?](\s|$)/);
  return end === -1 ? trimmed : trimmed.slice(0, end + 1);
}

/**
 * Shared behaviour of the per-intent responders. `generative` asks the model
 * to answer from the numbered context; `extractive` stitches the top
 * excerpts together without a model call.
 */
export abstract class BaseResponder {
  abstract readonly intent: Intent;
  /** Opening line of extractive answers. */
  protected abstract readonly lead: string;
  protected readonly logger = new Logger(this.constructor.name);

  constructor(protected readonly llmCacheService: LLMCacheService) {}

  async respond(input: ResponderInput): Promise<ResponderOutcome> {
    const usableTools = input.toolResults.filter(
      (result) => result.succeeded && result.summary,
    );

    if (input.sources.length === 0 && usableTools.length === 0) {
      this.logger.debug('📭 No sources or tool data, using the generic answer');
      return { ok: true, text: NO_CONTEXT_RESPONSE, strategy: input.strategy };
    }

    if (input.strategy === 'extractive') {
      return {
        ok: true,
        text: this.extract(input, usableTools),
        strategy: 'extractive',
      };
    }

    const prompt = buildGenerateAnswerPrompt(
      input.query,
      input.context,
      this.intent,
      this.toolSummary(usableTools),
    );
    const options: LLMCallOptions = {
      temperature: getAnswerTemperature(this.intent),
      maxTokens: 600,
    };
    const cacheKey = this.llmCacheService.keyFor(prompt, options);

    try {
      const raw = await this.llmCacheService.cachedCall(
        prompt,
        { ...options, bypassCache: (input.attempt ?? 0) > 0 },
        input.signal,
      );
      const text = sanitizeCitations(raw, input.sources.length);
      if (!text) {
        return { ok: false, reason: 'empty_generation', strategy: 'generative', cacheKey };
      }
      return { ok: true, text, strategy: 'generative', cacheKey };
    } catch (error) {
      if (isCancellation(error)) throw error;
      this.logger.warn(`⚠️ Generation failed: ${errorMessage(error)}`);
      return {
        ok: false,
        reason: `generation_error: ${errorMessage(error)}`,
        strategy: 'generative',
      };
    }
  }

  protected extract(input: ResponderInput, tools: readonly ToolResult[]): string {
    const lines = input.sources
      .slice(0, EXTRACTIVE_SOURCES)
      .map((source) => this.extractLine(source));
    return [this.lead, ...lines, this.toolSummary(tools)]
      .filter(Boolean)
      .join('\n');
  }

  protected extractLine(source: ChunkRef): string {
    const label = source.title ? `${source.title}: ` : '';
    return `- ${label}${firstSentence(source.excerpt)} ${source.citation}`;
  }

  protected toolSummary(tools: readonly ToolResult[]): string {
    return tools.map((tool) => tool.summary).join('\n');
  }
}
