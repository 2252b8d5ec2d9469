import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SearchService } from './search.service';
import { AssistantConfig } from '../../../config/assistant.config';
import { RequestState } from '../state/request-state';
import {
  ChunkRef,
  Intent,
  RetrievalResult,
  SourceCategory,
} from '../rag.types';

export interface RetrievalPlan {
  k: number;
  /** `null` searches every category. */
  allowedSources: readonly SourceCategory[] | null;
}

export const RETRIEVAL_PLANS: Readonly<Record<Intent, RetrievalPlan>> = {
  [Intent.EDUCATION]: { k: 12, allowedSources: ['education'] },
  [Intent.EXPERIENCE]: { k: 14, allowedSources: ['experience', 'resume'] },
  [Intent.PERSONAL_PROJECT]: { k: 20, allowedSources: ['projects', 'case-study'] },
  [Intent.SKILLS]: {
    k: 14,
    allowedSources: ['skills', 'resume', 'experience', 'projects'],
  },
  [Intent.CASE_STUDY]: { k: 16, allowedSources: ['case-study', 'projects'] },
  [Intent.PROJECT_TOUR]: { k: 20, allowedSources: ['projects', 'case-study'] },
  [Intent.GENERAL]: { k: 10, allowedSources: null },
};

export interface EnrichmentResult {
  context: string;
  sources: ChunkRef[];
  degraded: boolean;
}

const EXCERPT_LENGTH = 200;
const BLOCK_SEPARATOR = '\n\n';

export function planFor(
  intent: Intent,
  widenings: number,
  widenStep: number,
): RetrievalPlan {
  const base = RETRIEVAL_PLANS[intent];
  return { k: base.k + Math.max(0, widenings) * widenStep, allowedSources: base.allowedSources };
}

@Injectable()
export class ContextEnrichmentService {
  private readonly logger = new Logger(ContextEnrichmentService.name);

  constructor(
    private readonly searchService: SearchService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Retrieve for the intent's plan and assemble the numbered context block.
   * Writes `context`, `contextSources` and the retrieval summary onto the state.
   */
  async enrich(
    intent: Intent,
    query: string,
    state: RequestState,
    widenings: number = 0,
    signal?: AbortSignal,
  ): Promise<EnrichmentResult> {
    const config = this.configService.getOrThrow<AssistantConfig>('assistant');
    const plan = planFor(intent, widenings, config.widenStep);

    this.logger.log(
      `├─ Enriching ${intent}: k=${plan.k}, sources=${plan.allowedSources?.join(',') ?? 'all'}`,
    );

    const outcome = await this.searchService.retrieve(
      query,
      plan.k,
      plan.allowedSources,
      signal,
    );
    // A stage that timed out must not write into the request afterwards
    signal?.throwIfAborted();

    const { context, included } = this.assembleContext(
      outcome.results,
      config.contextCharBudget,
    );
    const sources = included.map((result, index) => this.toChunkRef(result, index));

    state.context = context;
    state.contextSources = sources;
    state.metadata.retrieval = {
      k: plan.k,
      allowedSources: plan.allowedSources ? [...plan.allowedSources] : null,
      retrieved: outcome.results.length,
      included: sources.length,
      degraded: outcome.degraded,
    };
    if (outcome.degraded) {
      state.markDegraded(outcome.degradedReason ?? 'retrieval_degraded');
    }

    this.logger.log(
      `└─ Context: ${sources.length}/${outcome.results.length} chunks, ${context.length} chars`,
    );
    return { context, sources, degraded: outcome.degraded };
  }

  /**
   * Blocks are added in rank order until the budget is spent; everything
   * after the first block that does not fit is dropped.
   */
  assembleContext(
    results: readonly RetrievalResult[],
    budget: number,
  ): { context: string; included: RetrievalResult[] } {
    const blocks: string[] = [];
    const included: RetrievalResult[] = [];
    let used = 0;

    for (const result of results) {
      const block = this.formatBlock(result, included.length + 1);
      const cost = block.length + (blocks.length > 0 ? BLOCK_SEPARATOR.length : 0);

      if (used + cost > budget) {
        if (blocks.length === 0 && budget > 0) {
          blocks.push(block.slice(0, budget));
          included.push(result);
        }
        break;
      }

      blocks.push(block);
      included.push(result);
      used += cost;
    }

    return { context: blocks.join(BLOCK_SEPARATOR), included };
  }

  private formatBlock(result: RetrievalResult, citation: number): string {
    const { chunk } = result;
    const heading = chunk.title
      ? `[${citation}] (${chunk.sourceCategory}) ${chunk.title}`
      : `[${citation}] (${chunk.sourceCategory})`;
    return `${heading}\n${chunk.content.trim()}`;
  }

  private toChunkRef(result: RetrievalResult, index: number): ChunkRef {
    const excerpt = result.chunk.content.replace(/\s+/g, ' ').trim();
    return {
      id: result.chunk.id,
      sourceCategory: result.chunk.sourceCategory,
      title: result.chunk.title,
      score: result.fusedScore,
      method: result.method,
      matchedBy: [...result.matchedBy],
      citation: `[${index + 1}]`,
      excerpt:
        excerpt.length > EXCERPT_LENGTH
          ? `${excerpt.slice(0, EXCERPT_LENGTH - 3)}...`
          : excerpt,
    };
  }
}
