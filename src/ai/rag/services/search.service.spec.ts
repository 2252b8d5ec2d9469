import { TestingModule } from '@nestjs/testing';
import { SearchService } from './search.service';
import {
  RagTestingFakes,
  RagTestingOptions,
  createRagTestingModule,
} from '../testing/rag-testing.module';

describe('SearchService', () => {
  let moduleRef: TestingModule;
  let service: SearchService;
  let fakes: RagTestingFakes;

  async function build(options: RagTestingOptions) {
    ({ moduleRef, fakes } = await createRagTestingModule(options));
    service = moduleRef.get(SearchService);
  }

  afterEach(async () => {
    await moduleRef.close();
  });

  describe('retrieve', () => {
    beforeEach(async () => {
      await build({ semanticScores: { 'edu-1': 0.75, 'edu-2': 0.82, 'proj-1': 0.65 } });
    });

    it('should rank chunks found by both methods above semantic-only ones', async () => {
      const outcome = await service.retrieve('What degree did you study?', 12, ['education']);

      expect(outcome.degraded).toBe(false);
      expect(
        outcome.results.map((r) => [r.chunk.id, r.method, r.matchedBy.join('+')]),
      ).toEqual([
        ['edu-2', 'lexical', 'lexical+semantic'],
        ['edu-1', 'semantic', 'semantic'],
      ]);
      expect(outcome.results[0].score).toBe(1);
      expect(outcome.results[0].fusedScore).toBeCloseTo(1.1);
    });

    it('should return the same list for the same input', async () => {
      const first = await service.retrieve('What degree did you study?', 12, ['education']);
      const second = await service.retrieve('What degree did you study?', 12, ['education']);

      expect(second).toEqual(first);
    });

    it('should only return chunks from the allowed sources', async () => {
      const outcome = await service.retrieve('TypeScript platform', 10, ['projects', 'case-study']);

      expect(outcome.results.map((r) => r.chunk.id).sort()).toEqual(['cs-1', 'proj-1']);
    });

    it('should drop semantic matches below the similarity threshold', async () => {
      const outcome = await service.retrieve('unrelated words', 10, ['projects']);

      expect(outcome.results).toEqual([]);
    });

    it('should return nothing for k <= 0', async () => {
      const outcome = await service.retrieve('What degree did you study?', 0, null);

      expect(outcome).toEqual({ results: [], degraded: false });
      expect(fakes.searchVectors).not.toHaveBeenCalled();
    });

    it('should degrade to lexical results when embeddings fail', async () => {
      fakes.embed.mockRejectedValue(new Error('embedding service unreachable'));

      const outcome = await service.retrieve('What degree did you study?', 12, ['education']);

      expect(outcome.degraded).toBe(true);
      expect(outcome.degradedReason).toBe('semantic_unavailable: embedding service unreachable');
      expect(outcome.results.map((r) => r.chunk.id)).toEqual(['edu-2']);
    });

    it('should propagate failures of a cancelled request', async () => {
      const controller = new AbortController();
      controller.abort();
      fakes.embed.mockRejectedValue(new Error('aborted'));

      await expect(
        service.retrieve('What degree did you study?', 12, ['education'], controller.signal),
      ).rejects.toThrow('aborted');
    });
  });

  describe('tie-break', () => {
    const semanticScores = { 'exp-1': 0.8, 'resume-1': 0.8 };

    it('should order equal scores by the default source priority', async () => {
      await build({ semanticScores });

      const outcome = await service.retrieve('zzz qqq', 10, null);

      expect(outcome.results.map((r) => r.chunk.id)).toEqual(['resume-1', 'exp-1']);
    });

    it('should follow a configured source priority', async () => {
      await build({
        semanticScores,
        config: {
          sourcePriority: [
            'experience',
            'resume',
            'education',
            'projects',
            'case-study',
            'skills',
            'profile',
          ],
        },
      });

      const outcome = await service.retrieve('zzz qqq', 10, null);

      expect(outcome.results.map((r) => r.chunk.id)).toEqual(['exp-1', 'resume-1']);
    });
  });
});
