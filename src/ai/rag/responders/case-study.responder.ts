import { Injectable } from '@nestjs/common';
import { BaseResponder } from './base.responder';
import { LLMCacheService } from '../services/llm-cache.service';
import { Intent } from '../rag.types';

@Injectable()
export class CaseStudyResponder extends BaseResponder {
  readonly intent = Intent.CASE_STUDY;
  protected readonly lead = 'From my case studies, the problem, approach and outcome:';

  constructor(llmCacheService: LLMCacheService) {
    super(llmCacheService);
  }
}
