import { Injectable } from '@nestjs/common';
import { BaseResponder } from './base.responder';
import { LLMCacheService } from '../services/llm-cache.service';
import { Intent } from '../rag.types';

@Injectable()
export class ExperienceResponder extends BaseResponder {
  readonly intent = Intent.EXPERIENCE;
  protected readonly lead = 'A summary of my professional experience:';

  constructor(llmCacheService: LLMCacheService) {
    super(llmCacheService);
  }
}
