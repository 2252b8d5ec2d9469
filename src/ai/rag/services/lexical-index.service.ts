import { Injectable, Logger } from '@nestjs/common';
import { CorpusService, CorpusSnapshot } from './corpus.service';
import { DocumentChunk, SourceCategory } from '../rag.types';

export interface LexicalHit {
  chunk: DocumentChunk;
  /** Raw BM25 score, always > 0. */
  rank: number;
}

interface DocumentStats {
  termFrequencies: Map<string, number>;
  length: number;
}

interface CorpusStats {
  documents: Map<string, DocumentStats>;
  documentFrequency: Map<string, number>;
  averageLength: number;
  total: number;
}

const STOPWORDS = new Set([
  'what', 'did', 'you', 'the', 'and', 'are', 'was', 'were', 'your', 'have',
  'has', 'had', 'for', 'with', 'about', 'tell', 'can', 'how', 'who', 'which',
  'this', 'that', 'from', 'does', 'any', 'some', 'there', 'their', 'they',
  'please', 'show', 'give', 'into', 'its', 'our', 'ours', 'yours', 'been',
]);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 2 && !STOPWORDS.has(token));
}

/**
 * BM25 over the corpus snapshot. Term statistics are computed once per
 * snapshot over the whole corpus, so a source filter narrows the candidates
 * without changing how a chunk scores.
 */
@Injectable()
export class LexicalIndexService {
  private readonly logger = new Logger(LexicalIndexService.name);
  private readonly k1 = 1.2; // Term saturation
  private readonly b = 0.75; // Length normalisation
  private readonly stats = new WeakMap<CorpusSnapshot, CorpusStats>();

  constructor(private readonly corpusService: CorpusService) {}

  search(
    terms: readonly string[],
    allowedSources: readonly SourceCategory[] | null | undefined,
    k: number,
  ): LexicalHit[] {
    const queryTerms = [...new Set(terms)];
    if (queryTerms.length === 0 || k <= 0) {
      this.logger.debug('⚠️ No usable terms for lexical search');
      return [];
    }

    const snapshot = this.corpusService.snapshot();
    const stats = this.statsFor(snapshot);

    const hits: LexicalHit[] = [];
    for (const chunk of snapshot.subset(allowedSources)) {
      const doc = stats.documents.get(chunk.id);
      if (!doc) continue;

      let rank = 0;
      for (const term of queryTerms) {
        const tf = doc.termFrequencies.get(term) ?? 0;
        if (tf === 0) continue;
        const df = stats.documentFrequency.get(term) ?? 0;
        const idf = Math.log(1 + (stats.total - df + 0.5) / (df + 0.5));
        const norm =
          (tf * (this.k1 + 1)) /
          (tf +
            this.k1 *
              (1 - this.b + (this.b * doc.length) / stats.averageLength));
        rank += idf * norm;
      }

      if (rank > 0) hits.push({ chunk, rank });
    }

    hits.sort(
      (a, b) =>
        b.rank - a.rank ||
        (a.chunk.id < b.chunk.id ? -1 : a.chunk.id > b.chunk.id ? 1 : 0),
    );

    this.logger.debug(
      `📝 Lexical search [${queryTerms.join(', ')}]: ${hits.length} hits`,
    );
    return hits.slice(0, k);
  }

  private statsFor(snapshot: CorpusSnapshot): CorpusStats {
    const cached = this.stats.get(snapshot);
    if (cached) return cached;

    const documents = new Map<string, DocumentStats>();
    const documentFrequency = new Map<string, number>();
    let totalLength = 0;

    for (const chunk of snapshot.chunks) {
      const tokens = tokenize(`${chunk.title ?? ''} ${chunk.content}`);
      const termFrequencies = new Map<string, number>();
      for (const token of tokens) {
        termFrequencies.set(token, (termFrequencies.get(token) ?? 0) + 1);
      }
      for (const term of termFrequencies.keys()) {
        documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
      }
      documents.set(chunk.id, { termFrequencies, length: tokens.length });
      totalLength += tokens.length;
    }

    const computed: CorpusStats = {
      documents,
      documentFrequency,
      averageLength: snapshot.size > 0 ? totalLength / snapshot.size || 1 : 1,
      total: snapshot.size,
    };
    this.stats.set(snapshot, computed);
    return computed;
  }
}
