import { Injectable, Logger } from '@nestjs/common';
import { EmbeddingsService } from '../../embeddings/embeddings.service';
import { QdrantService } from '../../vector-store/qdrant.service';
import { CorpusService } from './corpus.service';
import { DocumentChunk, SourceCategory } from '../rag.types';
import { readString } from '../../../common/utils/guards';

export interface NearestNeighbour {
  chunkId: string;
  /** Cosine distance, 0 for identical direction. */
  distance: number;
}

export interface SemanticHit {
  chunk: DocumentChunk;
  similarity: number;
}

@Injectable()
export class SemanticIndexService {
  private readonly logger = new Logger(SemanticIndexService.name);

  constructor(
    private readonly embeddingsService: EmbeddingsService,
    private readonly qdrantService: QdrantService,
    private readonly corpusService: CorpusService,
  ) {}

  async nearest(
    vector: number[],
    k: number,
    allowedSources?: readonly SourceCategory[] | null,
  ): Promise<NearestNeighbour[]> {
    const results = await this.qdrantService.searchVectors(
      vector,
      k,
      allowedSources ?? undefined,
    );
    return results.map((result) => ({
      chunkId: readString(result.payload, 'chunk_id') ?? result.id,
      distance: 1 - result.score,
    }));
  }

  /**
   * Embed the query and return corpus chunks at or above the similarity
   * threshold, most similar first. Embedding and vector store errors
   * propagate to the caller.
   */
  async search(
    query: string,
    k: number,
    allowedSources: readonly SourceCategory[] | null | undefined,
    threshold: number,
    signal?: AbortSignal,
  ): Promise<SemanticHit[]> {
    if (k <= 0) return [];

    const vector = await this.embeddingsService.generateEmbedding(query, signal);
    const neighbours = await this.nearest(vector, k, allowedSources);
    const snapshot = this.corpusService.snapshot();

    const hits: SemanticHit[] = [];
    for (const neighbour of neighbours) {
      const similarity = Math.min(1, Math.max(0, 1 - neighbour.distance));
      if (similarity < threshold) continue;

      const chunk = snapshot.get(neighbour.chunkId);
      if (!chunk) {
        this.logger.debug(
          `⏭️ Skipping ${neighbour.chunkId}: not in the loaded corpus`,
        );
        continue;
      }
      if (
        allowedSources &&
        allowedSources.length > 0 &&
        !allowedSources.includes(chunk.sourceCategory)
      ) {
        continue;
      }
      hits.push({ chunk, similarity });
    }

    this.logger.debug(
      `🔍 Semantic search: ${neighbours.length} neighbours, ${hits.length} above ${threshold}`,
    );
    return hits;
  }
}
