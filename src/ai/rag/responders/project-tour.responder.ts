import { Injectable } from '@nestjs/common';
import { BaseResponder, ResponderInput } from './base.responder';
import { LLMCacheService } from '../services/llm-cache.service';
import { Intent, ToolResult } from '../rag.types';

@Injectable()
export class ProjectTourResponder extends BaseResponder {
  readonly intent = Intent.PROJECT_TOUR;
  protected readonly lead = "Here's a quick tour of what I've built:";

  constructor(llmCacheService: LLMCacheService) {
    super(llmCacheService);
  }

  /** Live repository data leads the tour; portfolio write-ups follow. */
  protected extract(input: ResponderInput, tools: readonly ToolResult[]): string {
    const lines = input.sources.slice(0, 3).map((source) => this.extractLine(source));
    return [this.lead, this.toolSummary(tools), ...lines]
      .filter(Boolean)
      .join('\n');
  }
}
