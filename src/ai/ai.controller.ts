import { Body, Controller, Get, MessageEvent, Post, Query, Res, Sse } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { Observable } from 'rxjs';
import { QueryResult, RagService } from './rag/rag.service';
import { TelemetryService, TelemetrySnapshot } from './telemetry/telemetry.service';
import { ToolDispatcherService } from './tools/tool-dispatcher.service';
import { EmbeddingsService } from './embeddings/embeddings.service';
import { ChatRequestDto, ChatResponseDto, ChatStreamQueryDto } from './dto/chat.dto';

/** The slice of the HTTP response the chat endpoint watches for disconnects. */
export interface ClosableResponse {
  readonly writableFinished: boolean;
  on(event: 'close', listener: () => void): unknown;
  off(event: 'close', listener: () => void): unknown;
}

export interface MetricsResponse extends TelemetrySnapshot {
  embeddingCache: { size: number; ttl: number };
}

@ApiTags('Portfolio Assistant')
@Controller('portfolio')
export class AiController {
  constructor(
    private readonly ragService: RagService,
    private readonly telemetry: TelemetryService,
    private readonly toolDispatcher: ToolDispatcherService,
    private readonly embeddings: EmbeddingsService,
  ) {}

  @Post('chat')
  @ApiOperation({
    summary: 'Ask a question about the portfolio',
    description: `Classifies the question, retrieves matching portfolio chunks and answers with citations.

    Examples:
    - "What degree did you study?"
    - "Which companies have you worked for?"
    - "Walk me through your GitHub repos"

    For progress events as they happen, use GET /portfolio/chat-stream?query=YOUR_QUERY`,
  })
  @ApiOkResponse({ type: ChatResponseDto })
  async chat(
    @Body() request: ChatRequestDto,
    @Res({ passthrough: true }) res: ClosableResponse,
  ): Promise<QueryResult> {
    // A response closed before it finished means the client went away
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) controller.abort();
    };
    res.on('close', onClose);

    try {
      return await this.ragService.handleQuery(request.query, {
        stream: request.stream ?? false,
        forceIntent: request.forceIntent,
        signal: controller.signal,
      });
    } finally {
      res.off('close', onClose);
    }
  }

  @Sse('chat-stream')
  @ApiOperation({
    summary: 'Stream request progress (SSE)',
    description: `Emits one event per pipeline step (intent_classified, context_enriched, validation, ...) and a final "complete" event with the answer. Closing the connection cancels the request.`,
  })
  chatStream(@Query() query: ChatStreamQueryDto): Observable<MessageEvent> {
    return this.ragService.streamQuery(query.query, { forceIntent: query.intent });
  }

  @Get('metrics')
  @ApiOperation({ summary: 'In-process latency, event counters and embedding cache size' })
  metrics(): MetricsResponse {
    return {
      ...this.telemetry.snapshot(),
      embeddingCache: this.embeddings.getCacheStats(),
    };
  }

  @Get('tools')
  @ApiOperation({ summary: 'Live data providers the assistant can call' })
  tools(): Array<{ id: string; description: string }> {
    return this.toolDispatcher.listTools();
  }
}
