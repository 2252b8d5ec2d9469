import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { QdrantClient } from '@qdrant/js-client-rest';
import { QdrantConfig } from '../../config/qdrant.config';
import { SourceCategory } from '../rag/rag.types';
import { errorMessage } from '../../common/utils/errors';

export interface SearchResult {
  id: string;
  score: number;
  payload: Record<string, unknown>;
}

export interface StoredPoint {
  id: string;
  payload: Record<string, unknown>;
}

export interface CollectionInfo {
  exists: boolean;
  vectorCount?: number;
  vectorSize?: number;
  distance?: string;
}

/** Payload field holding a chunk's source category. */
export const SOURCE_CATEGORY_FIELD = 'source_category';

@Injectable()
export class QdrantService implements OnModuleInit {
  private readonly logger = new Logger(QdrantService.name);
  private client: QdrantClient;
  private config: QdrantConfig;

  constructor(private configService: ConfigService) {
    this.config = this.configService.getOrThrow<QdrantConfig>('qdrant');

    this.client = new QdrantClient({
      url: `${this.config.https ? 'https' : 'http'}://${this.config.host}:${this.config.port}`,
      apiKey: this.config.apiKey,
      timeout: this.config.timeout,
    });
  }

  async onModuleInit() {
    await this.initialize();
  }

  /**
   * Check the connection and the portfolio collection. The collection is
   * provisioned by the ingestion job, so a missing one is only reported.
   */
  async initialize(): Promise<void> {
    try {
      this.logger.log('Connecting to Qdrant...');
      await this.client.getCollections();

      this.logger.log(
        `✓ Connected to Qdrant at ${this.config.host}:${this.config.port}`,
      );

      const collectionInfo = await this.getCollection(
        this.config.collectionName,
      );
      if (collectionInfo.exists) {
        this.logger.log(
          `✓ Collection "${this.config.collectionName}" found (${collectionInfo.vectorCount ?? 0} vectors)`,
        );
      } else {
        this.logger.warn(
          `⚠ Collection "${this.config.collectionName}" does not exist. Answers will fall back to the safe response until it is ingested.`,
        );
      }
    } catch (error) {
      this.logger.error(`✗ Failed to connect to Qdrant: ${errorMessage(error)}`);

      if (process.env.NODE_ENV === 'development') {
        throw new Error(`Qdrant connection failed: ${errorMessage(error)}`);
      }

      this.logger.warn(
        '⚠ Retrieval will be degraded until Qdrant is accessible',
      );
    }
  }

  async collectionExists(collectionName: string): Promise<boolean> {
    try {
      const collections = await this.client.getCollections();
      return collections.collections.some((col) => col.name === collectionName);
    } catch (error) {
      this.logger.error(
        `Failed to check collection existence: ${errorMessage(error)}`,
      );
      return false;
    }
  }

  /**
   * Nearest neighbours of a query vector, optionally restricted to a set
   * of source categories.
   */
  async searchVectors(
    queryVector: number[],
    limit: number = 10,
    sources?: readonly SourceCategory[],
  ): Promise<SearchResult[]> {
    if (queryVector.length !== this.config.vectorSize) {
      throw new Error(
        `Query vector dimension mismatch: expected ${this.config.vectorSize}, got ${queryVector.length}`,
      );
    }

    try {
      const results = await this.client.search(this.config.collectionName, {
        vector: queryVector,
        limit,
        with_payload: true,
        filter:
          sources && sources.length > 0
            ? {
                must: [
                  {
                    key: SOURCE_CATEGORY_FIELD,
                    match: { any: [...sources] },
                  },
                ],
              }
            : undefined,
      });

      return results.map((result) => ({
        id: result.id.toString(),
        score: result.score,
        payload: result.payload ?? {},
      }));
    } catch (error) {
      this.logger.error(`Search failed: ${errorMessage(error)}`);
      throw error;
    }
  }

  /**
   * Read every point's payload, page by page.
   */
  async scrollAll(pageSize: number = 256): Promise<StoredPoint[]> {
    const points: StoredPoint[] = [];
    let offset: string | number | undefined;

    do {
      const page = await this.client.scroll(this.config.collectionName, {
        limit: pageSize,
        offset,
        with_payload: true,
        with_vector: false,
      });

      for (const point of page.points) {
        points.push({ id: point.id.toString(), payload: point.payload ?? {} });
      }

      const next = page.next_page_offset;
      offset =
        typeof next === 'string' || typeof next === 'number' ? next : undefined;
    } while (offset !== undefined);

    this.logger.debug(
      `📜 Scrolled ${points.length} points from "${this.config.collectionName}"`,
    );
    return points;
  }

  async getCollection(collectionName: string): Promise<CollectionInfo> {
    try {
      const exists = await this.collectionExists(collectionName);

      if (!exists) {
        return { exists: false };
      }

      const info = await this.client.getCollection(collectionName);

      let vectorSize: number | undefined;
      let distance: string | undefined;

      const vectors = info.config.params.vectors;
      if (
        vectors &&
        'size' in vectors &&
        typeof vectors.size === 'number' &&
        typeof vectors.distance === 'string'
      ) {
        vectorSize = vectors.size;
        distance = vectors.distance;
      }

      return {
        exists: true,
        vectorCount: info.points_count ?? undefined,
        vectorSize,
        distance,
      };
    } catch (error) {
      this.logger.error(`Failed to get collection info: ${errorMessage(error)}`);
      return { exists: false };
    }
  }
}
