import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AssistantConfig } from '../../../config/assistant.config';
import { LexicalIndexService, tokenize } from './lexical-index.service';
import { SemanticIndexService, SemanticHit } from './semantic-index.service';
import {
  HybridRetrievalOutcome,
  RetrievalMethod,
  RetrievalResult,
  SourceCategory,
} from '../rag.types';
import { errorMessage, isCancellation } from '../../../common/utils/errors';

/**
 * Hybrid retriever: semantic and lexical lookups run side by side and are
 * merged by chunk id into one deterministic ranking.
 */
@Injectable()
export class SearchService {
  private readonly logger = new Logger(SearchService.name);

  constructor(
    private readonly semanticIndex: SemanticIndexService,
    private readonly lexicalIndex: LexicalIndexService,
    private readonly configService: ConfigService,
  ) {}

  private get config(): AssistantConfig {
    return this.configService.getOrThrow<AssistantConfig>('assistant');
  }

  async retrieve(
    query: string,
    k: number,
    allowedSources?: readonly SourceCategory[] | null,
    signal?: AbortSignal,
  ): Promise<HybridRetrievalOutcome> {
    const config = this.config;
    this.logger.debug(`\n${'='.repeat(60)}`);
    this.logger.debug(`🔍 HYBRID RETRIEVAL`);
    this.logger.debug(`${'='.repeat(60)}`);
    this.logger.debug(`📥 INPUT - Query: "${query}" | k=${k}`);
    this.logger.debug(
      `📥 INPUT - Sources: ${allowedSources?.join(', ') || 'all'}`,
    );

    if (k <= 0) {
      return { results: [], degraded: false };
    }

    const [semantic, lexical] = await Promise.all([
      this.semanticIndex
        .search(query, k, allowedSources, config.similarityThreshold, signal)
        .then(
          (hits): { hits: SemanticHit[]; error?: string } => ({ hits }),
          (error: unknown) => {
            if (isCancellation(error) || signal?.aborted) throw error;
            return { hits: [], error: errorMessage(error) };
          },
        ),
      Promise.resolve(this.lexicalIndex.search(tokenize(query), allowedSources, k)),
    ]);

    if (semantic.error) {
      this.logger.warn(
        `⚠️ Semantic search unavailable, using lexical results only: ${semantic.error}`,
      );
    }

    const maxRank = lexical.reduce((max, hit) => Math.max(max, hit.rank), 0);
    const merged = new Map<string, RetrievalResult>();

    const add = (
      chunkId: string,
      result: Omit<RetrievalResult, 'fusedScore' | 'matchedBy'>,
    ) => {
      const existing = merged.get(chunkId);
      if (!existing) {
        merged.set(chunkId, {
          ...result,
          fusedScore: result.score,
          matchedBy: [result.method],
        });
        return;
      }
      const matchedBy: RetrievalMethod[] = existing.matchedBy.includes(
        result.method,
      )
        ? existing.matchedBy
        : [...existing.matchedBy, result.method];
      // Semantic is added first, so it keeps ties
      const winner = result.score > existing.score ? result : existing;
      merged.set(chunkId, {
        chunk: winner.chunk,
        score: winner.score,
        method: winner.method,
        fusedScore: winner.score,
        matchedBy,
      });
    };

    for (const hit of semantic.hits) {
      add(hit.chunk.id, {
        chunk: hit.chunk,
        score: hit.similarity,
        method: 'semantic',
      });
    }
    for (const hit of lexical) {
      add(hit.chunk.id, {
        chunk: hit.chunk,
        score: maxRank > 0 ? hit.rank / maxRank : 0,
        method: 'lexical',
      });
    }

    const priority = (category: SourceCategory) => {
      const index = config.sourcePriority.indexOf(category);
      return index === -1 ? config.sourcePriority.length : index;
    };

    const results = [...merged.values()]
      .map((result) => ({
        ...result,
        matchedBy: [...result.matchedBy].sort(),
        fusedScore:
          result.matchedBy.length > 1
            ? result.score + config.bothMatchedBoost
            : result.score,
      }))
      .sort(
        (a, b) =>
          b.fusedScore - a.fusedScore ||
          priority(a.chunk.sourceCategory) - priority(b.chunk.sourceCategory) ||
          (a.chunk.id < b.chunk.id ? -1 : a.chunk.id > b.chunk.id ? 1 : 0),
      )
      .slice(0, k);

    this.logger.log(
      `├─ Retrieval: ${semantic.hits.length} semantic + ${lexical.length} lexical → ${results.length} merged`,
    );
    results.slice(0, 3).forEach((r, i) => {
      this.logger.debug(
        `  [${i + 1}] ${r.chunk.id} (${r.chunk.sourceCategory}) score=${r.fusedScore.toFixed(4)} via ${r.matchedBy.join('+')}`,
      );
    });
    this.logger.debug(`${'='.repeat(60)}\n`);

    return semantic.error
      ? { results, degraded: true, degradedReason: `semantic_unavailable: ${semantic.error}` }
      : { results, degraded: false };
  }
}
