import { Injectable } from '@nestjs/common';
import { BaseResponder } from './base.responder';
import { LLMCacheService } from '../services/llm-cache.service';
import { ChunkRef, Intent } from '../rag.types';

@Injectable()
export class SkillsResponder extends BaseResponder {
  readonly intent = Intent.SKILLS;
  protected readonly lead = 'My main skills, with where they show up in my work:';

  constructor(llmCacheService: LLMCacheService) {
    super(llmCacheService);
  }

  protected extractLine(source: ChunkRef): string {
    return `- [${source.sourceCategory}] ${source.excerpt} ${source.citation}`;
  }
}
