import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { QdrantService, StoredPoint } from '../../vector-store/qdrant.service';
import { DocumentChunk, SourceCategory, isSourceCategory } from '../rag.types';
import { isRecord, readString } from '../../../common/utils/guards';
import { errorMessage } from '../../../common/utils/errors';

/**
 * Read-only view of the portfolio chunks. A snapshot never changes after it
 * is built; reloading produces a new one.
 */
export class CorpusSnapshot {
  readonly chunks: readonly DocumentChunk[];
  private readonly byId: ReadonlyMap<string, DocumentChunk>;

  constructor(chunks: DocumentChunk[]) {
    const unique = new Map<string, DocumentChunk>();
    for (const chunk of chunks) {
      if (!unique.has(chunk.id)) unique.set(chunk.id, Object.freeze(chunk));
    }
    this.chunks = Object.freeze(
      [...unique.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)),
    );
    this.byId = unique;
  }

  get size(): number {
    return this.chunks.length;
  }

  get(id: string): DocumentChunk | undefined {
    return this.byId.get(id);
  }

  /** Chunks whose category is allowed; every chunk when no filter is given. */
  subset(allowedSources?: readonly SourceCategory[] | null): readonly DocumentChunk[] {
    if (!allowedSources || allowedSources.length === 0) return this.chunks;
    return this.chunks.filter((chunk) =>
      allowedSources.includes(chunk.sourceCategory),
    );
  }
}

/** Map a stored payload onto a chunk; points without usable content are skipped. */
export function chunkFromPoint(point: StoredPoint): DocumentChunk | null {
  const payload = point.payload;
  const content = readString(payload, 'content') ?? readString(payload, 'text');
  const category = payload.source_category;
  if (!content || !content.trim() || !isSourceCategory(category)) {
    return null;
  }

  return {
    id: readString(payload, 'chunk_id') ?? point.id,
    content,
    sourceCategory: category,
    title: readString(payload, 'title'),
    metadata: isRecord(payload.metadata) ? { ...payload.metadata } : {},
  };
}

@Injectable()
export class CorpusService implements OnModuleInit {
  private readonly logger = new Logger(CorpusService.name);
  private current = new CorpusSnapshot([]);

  constructor(private readonly qdrantService: QdrantService) {}

  async onModuleInit() {
    try {
      await this.load();
    } catch (error) {
      this.logger.error(
        `❌ Failed to load portfolio corpus: ${errorMessage(error)}`,
      );
      this.logger.warn('⚠️ Continuing with an empty corpus');
    }
  }

  async load(): Promise<CorpusSnapshot> {
    this.logger.log('📚 Loading portfolio corpus...');
    const points = await this.qdrantService.scrollAll();

    const chunks: DocumentChunk[] = [];
    let skipped = 0;
    for (const point of points) {
      const chunk = chunkFromPoint(point);
      if (chunk) chunks.push(chunk);
      else skipped++;
    }

    this.current = new CorpusSnapshot(chunks);
    this.logger.log(`├─ Chunks loaded: ${this.current.size}`);
    if (skipped > 0) {
      this.logger.warn(`├─ Points skipped (no content or unknown category): ${skipped}`);
    }
    this.logger.log(`└─ Corpus ready`);
    return this.current;
  }

  snapshot(): CorpusSnapshot {
    return this.current;
  }
}
