import { Injectable } from '@nestjs/common';
import { BaseResponder } from './base.responder';
import { LLMCacheService } from '../services/llm-cache.service';
import { Intent } from '../rag.types';

@Injectable()
export class GeneralResponder extends BaseResponder {
  readonly intent = Intent.GENERAL;
  protected readonly lead = 'Here is the most relevant part of my portfolio:';

  constructor(llmCacheService: LLMCacheService) {
    super(llmCacheService);
  }
}
