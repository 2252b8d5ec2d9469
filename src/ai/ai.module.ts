import { Module } from '@nestjs/common';
import { RagModule } from './rag/rag.module';
import { TelemetryModule } from './telemetry/telemetry.module';
import { ToolsModule } from './tools/tools.module';
import { EmbeddingsModule } from './embeddings/embeddings.module';
import { AiController } from './ai.controller';

@Module({
  imports: [RagModule, TelemetryModule, ToolsModule, EmbeddingsModule],
  controllers: [AiController],
  exports: [RagModule],
})
export class AiModule {}
