import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as crypto from 'crypto';
import { OllamaService } from '../llm/ollama.service';
import { QdrantConfig } from '../../config/qdrant.config';

interface CachedEmbedding {
  vector: number[];
  expiresAt: number;
}

@Injectable()
export class EmbeddingsService {
  private readonly logger = new Logger(EmbeddingsService.name);
  private readonly vectorDimension: number;
  private readonly maxTextLength: number = 32000; // ~8192 tokens

  private embeddingCache: Map<string, CachedEmbedding> = new Map();
  private readonly cacheTTL: number = 3600000; // 1 hour in milliseconds
  private readonly maxCacheEntries: number = 1000;

  constructor(
    private readonly ollamaService: OllamaService,
    configService: ConfigService,
  ) {
    this.vectorDimension =
      configService.get<QdrantConfig>('qdrant')?.vectorSize ?? 768;
  }

  /**
   * Embed a query. Results are cached per normalised text for an hour.
   */
  async generateEmbedding(
    text: string,
    signal?: AbortSignal,
  ): Promise<number[]> {
    this.logger.debug(
      `🔢 Generating embedding for text: "${text.substring(0, 50)}..."`,
    );
    const processedText = this.preprocessText(text);
    if (!processedText) {
      throw new Error('Cannot embed empty text');
    }

    const cacheKey = this.generateCacheKey(processedText);
    const cachedEmbedding = this.getCachedEmbedding(cacheKey);

    if (cachedEmbedding) {
      this.logger.debug('✅ Using cached embedding');
      return cachedEmbedding;
    }

    this.logger.debug('🔄 Calling embedding model...');
    const embedding = await this.ollamaService.generateEmbedding(
      processedText,
      signal,
    );

    if (!this.validateEmbedding(embedding)) {
      this.logger.error('❌ Generated embedding failed validation');
      throw new Error('Generated embedding failed validation');
    }

    this.logger.debug(`✅ Embedding generated: ${embedding.length} dimensions`);
    this.cacheEmbedding(cacheKey, embedding);

    return embedding;
  }

  preprocessText(text: string): string {
    if (!text || typeof text !== 'string') {
      this.logger.warn('Invalid text provided, using empty string');
      return '';
    }

    let processed = text.trim().replace(/\s+/g, ' ').normalize('NFC');

    if (processed.length > this.maxTextLength) {
      this.logger.warn(
        `Text exceeds max length (${processed.length} > ${this.maxTextLength}), truncating...`,
      );
      processed = processed.substring(0, this.maxTextLength);
    }

    // Strip control characters
    return processed.replace(/[\x00-\x08\x0B-\x0C\x0E-\x1F\x7F]/g, '');
  }

  validateEmbedding(embedding: number[]): boolean {
    if (!Array.isArray(embedding)) {
      this.logger.error('Embedding is not an array');
      return false;
    }

    if (embedding.length !== this.vectorDimension) {
      this.logger.error(
        `Invalid embedding dimension: expected ${this.vectorDimension}, got ${embedding.length}`,
      );
      return false;
    }

    if (embedding.some((val) => !Number.isFinite(val))) {
      this.logger.error('Embedding contains NaN or infinite values');
      return false;
    }

    if (embedding.every((val) => val === 0)) {
      this.logger.error('Embedding is all zeros (invalid)');
      return false;
    }

    return true;
  }

  private generateCacheKey(text: string): string {
    return crypto.createHash('md5').update(text).digest('hex');
  }

  private getCachedEmbedding(cacheKey: string): number[] | null {
    const cached = this.embeddingCache.get(cacheKey);
    if (!cached) {
      return null;
    }

    if (cached.expiresAt <= Date.now()) {
      this.embeddingCache.delete(cacheKey);
      this.logger.debug(`Cache entry expired: ${cacheKey.substring(0, 8)}...`);
      return null;
    }

    this.logger.debug(`Cache hit for key: ${cacheKey.substring(0, 8)}...`);
    return cached.vector;
  }

  private cacheEmbedding(cacheKey: string, embedding: number[]): void {
    if (this.embeddingCache.size >= this.maxCacheEntries) {
      // Map iteration order is insertion order, so the first key is the oldest
      const oldest = this.embeddingCache.keys().next();
      if (!oldest.done) {
        this.embeddingCache.delete(oldest.value);
      }
    }

    this.embeddingCache.set(cacheKey, {
      vector: embedding,
      expiresAt: Date.now() + this.cacheTTL,
    });
  }

  getCacheStats(): { size: number; ttl: number } {
    return {
      size: this.embeddingCache.size,
      ttl: this.cacheTTL,
    };
  }
}
