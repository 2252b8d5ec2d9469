import { Module } from '@nestjs/common';
import { CacheModule } from '@nestjs/cache-manager';
import { RagService } from './rag.service';
import { EmbeddingsModule } from '../embeddings/embeddings.module';
import { QdrantModule } from '../vector-store/qdrant.module';
import { OllamaModule } from '../llm/ollama.module';
import { ToolsModule } from '../tools/tools.module';
import { EventsModule } from '../events/events.module';
import { TelemetryModule } from '../telemetry/telemetry.module';
import { QueryLogModule } from '../../query-log/query-log.module';
import { RESPONDERS } from './responders';
import {
  ContextEnrichmentService,
  CorpusService,
  IntentClassificationService,
  LexicalIndexService,
  LLMCacheService,
  SearchService,
  SemanticIndexService,
  ValidationService,
} from './services';

@Module({
  imports: [
    EmbeddingsModule,
    QdrantModule,
    OllamaModule,
    ToolsModule,
    EventsModule,
    TelemetryModule,
    QueryLogModule,
    CacheModule.register({
      ttl: 600000, // 10 minutes
      max: 500,
    }),
  ],
  providers: [
    RagService,
    LLMCacheService,
    CorpusService,
    LexicalIndexService,
    SemanticIndexService,
    SearchService,
    IntentClassificationService,
    ContextEnrichmentService,
    ValidationService,
    ...RESPONDERS,
  ],
  exports: [RagService, CorpusService],
})
export class RagModule {}
