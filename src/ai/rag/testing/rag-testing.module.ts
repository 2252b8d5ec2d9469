import { Provider } from '@nestjs/common';
import { CacheModule } from '@nestjs/cache-manager';
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { getRepositoryToken } from '@nestjs/typeorm';
import { RagService } from '../rag.service';
import {
  ContextEnrichmentService,
  CorpusService,
  IntentClassificationService,
  LexicalIndexService,
  LLMCacheService,
  LLMCallOptions,
  SearchService,
  SemanticIndexService,
  ValidationService,
} from '../services';
import { RESPONDERS } from '../responders';
import { QdrantService, SearchResult, StoredPoint } from '../../vector-store/qdrant.service';
import { EmbeddingsService } from '../../embeddings/embeddings.service';
import { OllamaService } from '../../llm/ollama.service';
import { ToolDispatcherService } from '../../tools/tool-dispatcher.service';
import { GithubReposProvider } from '../../tools/github-repos.provider';
import { WeatherProvider } from '../../tools/weather.provider';
import { TOOL_PROVIDERS, ToolProvider } from '../../tools/tool.types';
import { EventEmitterService } from '../../events/event-emitter.service';
import { TelemetryService } from '../../telemetry/telemetry.service';
import { QueryLogService } from '../../../query-log/query-log.service';
import { QueryLog } from '../../../query-log/query-log.entity';
import { AssistantConfig, loadAssistantConfig } from '../../../config/assistant.config';
import { QdrantConfig } from '../../../config/qdrant.config';
import { SourceCategory } from '../rag.types';
import corpusFixture from './portfolio-corpus.json';

export const FIXTURE_POINTS: StoredPoint[] = corpusFixture;

export const TEST_VECTOR = [0.12, 0.34, 0.56];

export interface RagTestingOptions {
  config?: Partial<AssistantConfig>;
  points?: StoredPoint[];
  /** Cosine score the fake vector store reports per chunk id, whatever the query. */
  semanticScores?: Record<string, number>;
  /**
   * Model client behind a real in-memory LLMCacheService. Without it the
   * cache service itself is replaced by `fakes.llm`.
   */
  ollama?: Pick<OllamaService, 'generateCompletion' | 'getFastLlmModel'>;
}

export interface RagTestingFakes {
  llm: jest.Mock<Promise<string>, [string, LLMCallOptions?, AbortSignal?]>;
  evict: jest.Mock<Promise<void>, [string]>;
  embed: jest.Mock<Promise<number[]>, [string, AbortSignal?]>;
  searchVectors: ReturnType<typeof fakeQdrant>['searchVectors'];
  httpGet: jest.Mock;
  repository: { create: jest.Mock; save: jest.Mock };
}

export interface RagTestingContext {
  moduleRef: TestingModule;
  rag: RagService;
  fakes: RagTestingFakes;
}

export function testAssistantConfig(overrides: Partial<AssistantConfig> = {}): AssistantConfig {
  return { ...loadAssistantConfig({}), ...overrides };
}

/** In-memory stand-in for Qdrant over the given points. */
export function fakeQdrant(
  points: StoredPoint[],
  semanticScores: Record<string, number>,
) {
  const searchVectors = jest.fn(
    async (
      _vector: number[],
      limit: number = 10,
      sources?: readonly SourceCategory[],
    ): Promise<SearchResult[]> =>
      points
        .filter((point) => {
          const category = point.payload.source_category;
          return (
            semanticScores[String(point.payload.chunk_id)] !== undefined &&
            (!sources || sources.some((source) => source === category))
          );
        })
        .map((point) => ({
          id: point.id,
          score: semanticScores[String(point.payload.chunk_id)],
          payload: point.payload,
        }))
        .sort((a, b) => b.score - a.score)
        .slice(0, limit),
  );
  return {
    searchVectors,
    scrollAll: jest.fn(async () => points),
  };
}

/**
 * The query pipeline with real services and in-process fakes for the
 * vector store, embeddings, LLM, HTTP client and query log repository.
 */
export async function createRagTestingModule(
  options: RagTestingOptions = {},
): Promise<RagTestingContext> {
  const qdrant = fakeQdrant(
    options.points ?? FIXTURE_POINTS,
    options.semanticScores ?? {},
  );
  const fakes: RagTestingFakes = {
    llm: jest.fn<Promise<string>, [string, LLMCallOptions?, AbortSignal?]>(),
    evict: jest.fn<Promise<void>, [string]>().mockResolvedValue(undefined),
    embed: jest.fn<Promise<number[]>, [string, AbortSignal?]>().mockResolvedValue(TEST_VECTOR),
    searchVectors: qdrant.searchVectors,
    httpGet: jest.fn(),
    repository: {
      create: jest.fn((entry: object) => ({ ...entry })),
      save: jest.fn(async (row: object) => ({ id: 'log-1', ...row })),
    },
  };

  const qdrantConfig: QdrantConfig = {
    host: 'localhost',
    port: 6333,
    https: false,
    timeout: 1000,
    collectionName: 'portfolio-test',
    vectorSize: TEST_VECTOR.length,
  };

  const llmProviders: Provider[] = options.ollama
    ? [LLMCacheService, { provide: OllamaService, useValue: options.ollama }]
    : [
        {
          provide: LLMCacheService,
          useValue: {
            cachedCall: fakes.llm,
            keyFor: () => 'llm:test-key',
            evict: fakes.evict,
            getFastModel: () => 'fast-test-model',
          },
        },
      ];

  const moduleRef = await Test.createTestingModule({
    imports: options.ollama ? [CacheModule.register()] : [],
    providers: [
      RagService,
      CorpusService,
      LexicalIndexService,
      SemanticIndexService,
      SearchService,
      IntentClassificationService,
      ContextEnrichmentService,
      ValidationService,
      ...RESPONDERS,
      GithubReposProvider,
      WeatherProvider,
      {
        provide: TOOL_PROVIDERS,
        useFactory: (github: GithubReposProvider, weather: WeatherProvider): ToolProvider[] => [
          github,
          weather,
        ],
        inject: [GithubReposProvider, WeatherProvider],
      },
      ToolDispatcherService,
      EventEmitterService,
      TelemetryService,
      QueryLogService,
      {
        provide: ConfigService,
        useValue: new ConfigService({
          assistant: testAssistantConfig(options.config),
          qdrant: qdrantConfig,
        }),
      },
      { provide: QdrantService, useValue: qdrant },
      { provide: EmbeddingsService, useValue: { generateEmbedding: fakes.embed } },
      ...llmProviders,
      { provide: HttpService, useValue: { get: fakes.httpGet } },
      { provide: getRepositoryToken(QueryLog), useValue: fakes.repository },
    ],
  }).compile();

  // Runs CorpusService.onModuleInit, which loads the snapshot from the fake store
  await moduleRef.init();

  return { moduleRef, rag: moduleRef.get(RagService), fakes };
}

/** Text between the CONTEXT header and the question of a generation prompt. */
export function contextOf(prompt: string): string {
  const start = prompt.indexOf('CONTEXT:\n');
  const end = prompt.lastIndexOf('\n\nQ: ');
  return start === -1 || end === -1 ? '' : prompt.slice(start + 'CONTEXT:\n'.length, end);
}
