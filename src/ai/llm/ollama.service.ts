import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';
import { isAxiosError, isCancel } from 'axios';
import { GenerationError, errorMessage } from '../../common/utils/errors';
import { isRecord } from '../../common/utils/guards';

export interface CompletionOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  system?: string;
  signal?: AbortSignal;
}

interface OllamaGenerateResponse {
  model: string;
  response: string;
  done: boolean;
}

interface OllamaEmbeddingResponse {
  embedding: number[];
}

interface OpenAIChatResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
}

@Injectable()
export class OllamaService implements OnModuleInit {
  private readonly logger = new Logger(OllamaService.name);
  private readonly baseUrl: string;
  private readonly embeddingModel: string;
  private readonly llmModel: string;
  private readonly fastLlmModel: string;
  private readonly embeddingTimeout: number = 30000; // 30 seconds
  private readonly completionTimeout: number = 120000; // 120 seconds

  // OpenAI configuration
  private readonly useOpenAI: boolean;
  private readonly openAIApiKey: string;
  private readonly openAIBaseUrl: string = 'https://api.openai.com/v1';
  private readonly openAIModel: string;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {
    this.baseUrl =
      this.configService.get<string>('OLLAMA_API_URL') ||
      'http://localhost:11434';
    this.embeddingModel =
      this.configService.get<string>('OLLAMA_EMBEDDING_MODEL') ||
      'nomic-embed-text';
    this.llmModel =
      this.configService.get<string>('OLLAMA_LLM_MODEL') || 'llama3:8b';
    this.fastLlmModel =
      this.configService.get<string>('OLLAMA_FAST_LLM_MODEL') || 'llama3.2:3b';

    this.useOpenAI = this.configService.get<string>('USE_OPENAI') === '1';
    this.openAIApiKey = this.configService.get<string>('OPENAI_API_KEY') || '';
    this.openAIModel =
      this.configService.get<string>('OPENAI_MODEL') || 'gpt-4.1-nano';

    if (this.useOpenAI) {
      this.logger.log('🔵 OpenAI mode enabled - using GPT for completions');
      if (!this.openAIApiKey) {
        this.logger.warn('⚠ USE_OPENAI=1 but OPENAI_API_KEY is not set!');
      }
    }
  }

  async onModuleInit() {
    const isHealthy = await this.checkHealth();
    if (isHealthy) {
      await this.validateRequiredModels();
    }
  }

  async checkHealth(): Promise<boolean> {
    try {
      this.logger.debug(`🔍 Checking Ollama health at ${this.baseUrl}...`);

      const response = await firstValueFrom(
        this.httpService.get<unknown>(`${this.baseUrl}/api/version`, {
          timeout: 5000,
        }),
      );
      const version =
        isRecord(response.data) && typeof response.data.version === 'string'
          ? response.data.version
          : 'unknown';

      this.logger.log(`✓ Ollama service is healthy (version: ${version})`);
      return true;
    } catch (error) {
      this.logger.error(
        `✗ Ollama service is not accessible: ${errorMessage(error)}`,
      );

      if (process.env.NODE_ENV === 'development') {
        this.logger.warn('⚠ Make sure Ollama is running: ollama serve');
      }

      return false;
    }
  }

  async listModels(): Promise<string[]> {
    try {
      const response = await firstValueFrom(
        this.httpService.get<unknown>(`${this.baseUrl}/api/tags`, {
          timeout: 10000,
        }),
      );

      const models =
        isRecord(response.data) && Array.isArray(response.data.models)
          ? response.data.models
          : [];
      const modelNames = models
        .map((model: unknown) =>
          isRecord(model) && typeof model.name === 'string' ? model.name : '',
        )
        .filter(Boolean);

      this.logger.log(
        `Found ${modelNames.length} models: ${modelNames.join(', ')}`,
      );

      return modelNames;
    } catch (error) {
      this.logger.error(`Failed to list models: ${errorMessage(error)}`);
      return [];
    }
  }

  private async validateRequiredModels(): Promise<void> {
    const models = await this.listModels();

    const requiredModels = [this.embeddingModel, this.llmModel];
    const missingModels = requiredModels.filter(
      (model) => !models.some((m) => m.includes(model.split(':')[0])),
    );

    if (missingModels.length > 0) {
      this.logger.warn(
        `⚠ Missing required models: ${missingModels.join(', ')}. ` +
          `Pull them with: ollama pull ${missingModels.join(' && ollama pull ')}`,
      );
    } else {
      this.logger.log(`✓ All required models are available`);
    }
  }

  async generateEmbedding(
    text: string,
    signal?: AbortSignal,
  ): Promise<number[]> {
    const model = this.embeddingModel;

    try {
      this.logger.debug(
        `Generating embedding for text (${text.length} chars) with model ${model}`,
      );

      const response = await this.retryRequest(
        () =>
          firstValueFrom(
            this.httpService.post<OllamaEmbeddingResponse>(
              `${this.baseUrl}/api/embeddings`,
              { model, prompt: text },
              { timeout: this.embeddingTimeout, signal },
            ),
          ),
        2,
      );

      const embedding: unknown = response.data.embedding;
      if (!Array.isArray(embedding)) {
        throw new Error('Invalid embedding response format');
      }

      return embedding.filter((value): value is number => typeof value === 'number');
    } catch (error) {
      this.logger.error(`Failed to generate embedding: ${errorMessage(error)}`);

      if (isAxiosError(error) && error.response?.status === 404) {
        throw new Error(
          `Model "${model}" not found. Pull it with: ollama pull ${model}`,
        );
      }

      throw error;
    }
  }

  async generateCompletion(
    prompt: string,
    options: CompletionOptions = {},
  ): Promise<string> {
    if (this.useOpenAI) {
      return this.generateCompletionOpenAI(prompt, options);
    }

    const modelToUse = options.model || this.llmModel;

    try {
      this.logger.debug(`Generating completion with model ${modelToUse}`);

      const response = await this.retryRequest(
        () =>
          firstValueFrom(
            this.httpService.post<OllamaGenerateResponse>(
              `${this.baseUrl}/api/generate`,
              {
                model: modelToUse,
                prompt,
                stream: false,
                system: options.system,
                options: {
                  temperature: options.temperature ?? 0.7,
                  num_predict: options.maxTokens ?? 600,
                  num_ctx: 4096,
                },
              },
              { timeout: this.completionTimeout, signal: options.signal },
            ),
          ),
        2, // Fewer retries for completions
      );

      const completion = response.data.response;
      if (typeof completion !== 'string') {
        throw new GenerationError('Invalid completion response format');
      }

      this.logger.debug(`✓ Generated completion (${completion.length} chars)`);
      return completion;
    } catch (error) {
      this.logger.error(
        `Failed to generate completion: ${errorMessage(error)}`,
      );

      if (isAxiosError(error) && error.response?.status === 404) {
        throw new GenerationError(
          `Model "${modelToUse}" not found. Pull it with: ollama pull ${modelToUse}`,
        );
      }

      throw error;
    }
  }

  private async generateCompletionOpenAI(
    prompt: string,
    options: CompletionOptions,
  ): Promise<string> {
    const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
    if (options.system) {
      messages.push({ role: 'system', content: options.system });
    }
    messages.push({ role: 'user', content: prompt });

    try {
      const response = await this.retryRequest(
        () =>
          firstValueFrom(
            this.httpService.post<OpenAIChatResponse>(
              `${this.openAIBaseUrl}/chat/completions`,
              {
                model: this.openAIModel,
                messages,
                temperature: options.temperature ?? 0.7,
                max_tokens: options.maxTokens ?? 600,
              },
              {
                timeout: this.completionTimeout,
                signal: options.signal,
                headers: {
                  Authorization: `Bearer ${this.openAIApiKey}`,
                  'Content-Type': 'application/json',
                },
              },
            ),
          ),
        2,
      );

      const completion = response.data.choices?.[0]?.message?.content;
      if (!completion) {
        throw new GenerationError('Invalid OpenAI completion response format');
      }

      return completion;
    } catch (error) {
      this.logger.error(
        `Failed to generate OpenAI completion: ${errorMessage(error)}`,
      );

      if (isAxiosError(error) && error.response?.status === 401) {
        throw new Error(
          'Invalid OpenAI API key. Please check your OPENAI_API_KEY.',
        );
      }

      throw error;
    }
  }

  /**
   * Retry a request with exponential backoff. Client errors and cancelled
   * requests are not retried.
   */
  private async retryRequest<T>(
    requestFn: () => Promise<T>,
    maxRetries: number,
  ): Promise<T> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        return await requestFn();
      } catch (error) {
        lastError = error;

        if (isCancel(error)) {
          throw error;
        }
        if (
          isAxiosError(error) &&
          error.response &&
          [400, 401, 404].includes(error.response.status)
        ) {
          throw error;
        }

        if (attempt < maxRetries) {
          const delay = Math.pow(2, attempt) * 500;
          this.logger.warn(
            `Request failed (attempt ${attempt + 1}/${maxRetries + 1}), ` +
              `retrying in ${delay}ms...`,
          );
          await this.delay(delay);
        }
      }
    }

    throw lastError;
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  getFastLlmModel(): string {
    return this.fastLlmModel;
  }
}
