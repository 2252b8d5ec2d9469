import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { EmbeddingsService } from './embeddings.service';
import { OllamaService } from '../llm/ollama.service';

describe('EmbeddingsService', () => {
  let service: EmbeddingsService;
  let generateEmbedding: jest.Mock;

  beforeEach(async () => {
    generateEmbedding = jest.fn().mockResolvedValue([0.1, 0.2, 0.3]);
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        EmbeddingsService,
        { provide: OllamaService, useValue: { generateEmbedding } },
        { provide: ConfigService, useValue: new ConfigService({ qdrant: { vectorSize: 3 } }) },
      ],
    }).compile();

    service = module.get<EmbeddingsService>(EmbeddingsService);
  });

  it('should embed normalised text once and serve repeats from the cache', async () => {
    const signal = new AbortController().signal;

    const first = await service.generateEmbedding('  What degree\n did you   study? ', signal);
    const second = await service.generateEmbedding('What degree did you study?');

    expect(first).toEqual([0.1, 0.2, 0.3]);
    expect(second).toEqual(first);
    expect(generateEmbedding).toHaveBeenCalledTimes(1);
    expect(generateEmbedding).toHaveBeenCalledWith('What degree did you study?', signal);
    expect(service.getCacheStats().size).toBe(1);
  });

  it('should refuse to embed empty text', async () => {
    await expect(service.generateEmbedding('   ')).rejects.toThrow('Cannot embed empty text');
    expect(generateEmbedding).not.toHaveBeenCalled();
  });

  it('should reject vectors of the wrong size or all zeros', async () => {
    generateEmbedding.mockResolvedValueOnce([0.1, 0.2]).mockResolvedValueOnce([0, 0, 0]);

    await expect(service.generateEmbedding('first')).rejects.toThrow(
      'Generated embedding failed validation',
    );
    await expect(service.generateEmbedding('second')).rejects.toThrow(
      'Generated embedding failed validation',
    );
    expect(service.getCacheStats().size).toBe(0);
  });
});
