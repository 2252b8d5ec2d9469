import { Injectable, Logger, Inject } from '@nestjs/common';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import type { Cache } from 'cache-manager';
import * as crypto from 'crypto';
import { OllamaService } from '../../llm/ollama.service';
import { errorMessage } from '../../../common/utils/errors';

export interface LLMCallOptions {
  temperature?: number;
  system?: string;
  model?: string;
  maxTokens?: number;
  /** Skip the cache read; the fresh completion replaces any stored entry. */
  bypassCache?: boolean;
}

/**
 * Completion calls shared by the classifier and the responders, cached by
 * prompt and options.
 */
@Injectable()
export class LLMCacheService {
  private readonly logger = new Logger(LLMCacheService.name);
  private readonly CACHE_TTL = 600000; // 10 minutes

  constructor(
    private readonly ollamaService: OllamaService,
    @Inject(CACHE_MANAGER) private cacheManager: Cache,
  ) {}

  /** Cache key of a call; `bypassCache` does not take part in it. */
  keyFor(prompt: string, options: LLMCallOptions = {}): string {
    const keyed: LLMCallOptions = { ...options };
    delete keyed.bypassCache;
    const hash = crypto
      .createHash('md5')
      .update(prompt + JSON.stringify(keyed))
      .digest('hex');
    return `llm:${hash}`;
  }

  async cachedCall(
    prompt: string,
    options: LLMCallOptions = {},
    signal?: AbortSignal,
  ): Promise<string> {
    const { bypassCache = false, ...callOptions } = options;
    const cacheKey = this.keyFor(prompt, callOptions);

    this.logger.debug(`\n${'='.repeat(60)}`);
    this.logger.debug(`🤖 LLM CACHE SERVICE CALL`);
    this.logger.debug(`${'='.repeat(60)}`);
    this.logger.debug(`📥 INPUT - Prompt length: ${prompt.length} chars`);
    this.logger.debug(`📥 INPUT - Model: ${callOptions.model || 'default'}`);
    this.logger.debug(`🔑 Cache key: ${cacheKey}${bypassCache ? ' (bypassed)' : ''}`);

    const cached = bypassCache ? undefined : await this.readCache(cacheKey);
    if (cached) {
      this.logger.debug(`⚡️ CACHE HIT - Returning cached response`);
      this.logger.debug(`${'='.repeat(60)}\n`);
      return cached;
    }

    this.logger.debug(`🔄 CACHE MISS - Calling LLM model...`);
    const result = await this.ollamaService.generateCompletion(prompt, {
      ...callOptions,
      signal,
    });

    this.logger.debug(`✅ LLM call completed`);
    this.logger.debug(`📨 Response: "${result.substring(0, 150)}..."`);

    await this.writeCache(cacheKey, result);
    this.logger.debug(`${'='.repeat(60)}\n`);
    return result;
  }

  /** Drop a stored completion, e.g. a draft the validator rejected. */
  async evict(cacheKey: string): Promise<void> {
    try {
      await this.cacheManager.del(cacheKey);
      this.logger.debug(`🗑️ Evicted ${cacheKey}`);
    } catch (error) {
      this.logger.warn(`⚠️ Cache eviction failed: ${errorMessage(error)}`);
    }
  }

  getFastModel(): string {
    return this.ollamaService.getFastLlmModel();
  }

  // A broken cache only costs a model call
  private async readCache(key: string): Promise<string | undefined> {
    try {
      return await this.cacheManager.get<string>(key);
    } catch (error) {
      this.logger.warn(`⚠️ Cache read failed: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private async writeCache(key: string, value: string): Promise<void> {
    try {
      await this.cacheManager.set(key, value, this.CACHE_TTL);
    } catch (error) {
      this.logger.warn(`⚠️ Cache write failed: ${errorMessage(error)}`);
    }
  }
}
