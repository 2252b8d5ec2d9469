import { Injectable } from '@nestjs/common';
import { BaseResponder } from './base.responder';
import { LLMCacheService } from '../services/llm-cache.service';
import { Intent } from '../rag.types';

@Injectable()
export class EducationResponder extends BaseResponder {
  readonly intent = Intent.EDUCATION;
  protected readonly lead = 'Here is what my portfolio records about my education:';

  constructor(llmCacheService: LLMCacheService) {
    super(llmCacheService);
  }
}
