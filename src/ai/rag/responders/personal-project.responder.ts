import { Injectable } from '@nestjs/common';
import { BaseResponder } from './base.responder';
import { LLMCacheService } from '../services/llm-cache.service';
import { ChunkRef, Intent } from '../rag.types';

@Injectable()
export class PersonalProjectResponder extends BaseResponder {
  readonly intent = Intent.PERSONAL_PROJECT;
  protected readonly lead = 'Some of the projects I have built:';

  constructor(llmCacheService: LLMCacheService) {
    super(llmCacheService);
  }

  protected extractLine(source: ChunkRef): string {
    // Project titles read better as headings than as prefixes
    const heading = source.title ? `- ${source.title} ${source.citation}` : `- ${source.citation}`;
    return `${heading}\n  ${source.excerpt}`;
  }
}
