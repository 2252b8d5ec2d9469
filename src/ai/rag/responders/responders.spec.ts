import { Test, TestingModule } from '@nestjs/testing';
import {
  NO_CONTEXT_RESPONSE,
  RESPONDERS,
  ResponderInput,
  ResponderRegistry,
  citedSources,
  firstSentence,
  sanitizeCitations,
} from './index';
import { LLMCacheService } from '../services/llm-cache.service';
import { ChunkRef, INTENTS, Intent, ToolResult } from '../rag.types';

const SOURCES: ChunkRef[] = [
  {
    id: 'proj-1',
    sourceCategory: 'projects',
    title: 'Trailmap',
    score: 0.9,
    method: 'semantic',
    matchedBy: ['semantic'],
    citation: '[1]',
    excerpt: 'Hiking route planner built with Leaflet. It suggests loops.',
  },
  {
    id: 'skills-1',
    sourceCategory: 'skills',
    title: 'Core skills',
    score: 0.8,
    method: 'lexical',
    matchedBy: ['lexical'],
    citation: '[2]',
    excerpt: 'TypeScript, NestJS and PostgreSQL.',
  },
];

const REPO_TOOL: ToolResult = {
  toolId: 'github.repos',
  succeeded: true,
  data: [],
  summary: '- trailmap (TypeScript), 12 stars: Route planner',
};

describe('sanitizeCitations', () => {
  it('should keep valid markers and drop ones without a source', () => {
    expect(sanitizeCitations('Trailmap [1] uses Leaflet [3].', 2)).toBe('Trailmap [1] uses Leaflet.');
    expect(sanitizeCitations('Nothing cited [1]', 0)).toBe('Nothing cited');
  });
});

describe('citedSources', () => {
  it('should keep only the sources the answer points at', () => {
    expect(citedSources('Core stack is TypeScript [2].', SOURCES).map((s) => s.id)).toEqual([
      'skills-1',
    ]);
  });

  it('should keep every source when the answer has no markers', () => {
    expect(citedSources('Trailmap uses Leaflet.', SOURCES)).toEqual(SOURCES);
  });
});

describe('firstSentence', () => {
  it('should stop at the first sentence boundary', () => {
    expect(firstSentence('Built in 2020. Still running.')).toBe('Built in 2020.');
    expect(firstSentence('Version 2.0 shipped')).toBe('Version 2.0 shipped');
  });
});

describe('Responders', () => {
  let registry: ResponderRegistry;
  let cachedCall: jest.Mock;

  const input = (overrides: Partial<ResponderInput> = {}): ResponderInput => ({
    query: 'What have you built?',
    context: '[1] (projects) Trailmap\nHiking route planner built with Leaflet.',
    sources: SOURCES,
    toolResults: [],
    strategy: 'generative',
    ...overrides,
  });

  beforeEach(async () => {
    cachedCall = jest.fn();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ...RESPONDERS,
        { provide: LLMCacheService, useValue: { cachedCall, keyFor: () => 'llm:test-key' } },
      ],
    }).compile();

    registry = module.get<ResponderRegistry>(ResponderRegistry);
  });

  it('should have a responder for every intent', () => {
    for (const intent of INTENTS) {
      expect(registry.forIntent(intent).intent).toBe(intent);
    }
  });

  it('should answer generically without calling the model when there is nothing to use', async () => {
    const outcome = await registry
      .forIntent(Intent.GENERAL)
      .respond(input({ sources: [], toolResults: [{ ...REPO_TOOL, succeeded: false }] }));

    expect(outcome).toEqual({ ok: true, text: NO_CONTEXT_RESPONSE, strategy: 'generative' });
    expect(cachedCall).not.toHaveBeenCalled();
  });

  it('should generate from the numbered context and strip unknown citations', async () => {
    cachedCall.mockResolvedValue('Trailmap plans hikes [1][4].');

    const outcome = await registry.forIntent(Intent.PERSONAL_PROJECT).respond(input());

    expect(outcome).toEqual({
      ok: true,
      text: 'Trailmap plans hikes [1].',
      strategy: 'generative',
      cacheKey: 'llm:test-key',
    });
    expect(cachedCall).toHaveBeenCalledWith(
      expect.stringContaining('CONTEXT:\n[1] (projects) Trailmap'),
      { temperature: 0.6, maxTokens: 600, bypassCache: false },
      undefined,
    );
  });

  it('should skip the completion cache on a retry attempt', async () => {
    cachedCall.mockResolvedValue('Trailmap plans hikes [1].');

    await registry.forIntent(Intent.PERSONAL_PROJECT).respond(input({ attempt: 1 }));

    expect(cachedCall).toHaveBeenCalledWith(
      expect.any(String),
      { temperature: 0.6, maxTokens: 600, bypassCache: true },
      undefined,
    );
  });

  it('should report an empty generation', async () => {
    cachedCall.mockResolvedValue('   ');

    const outcome = await registry.forIntent(Intent.GENERAL).respond(input());

    expect(outcome).toEqual({
      ok: false,
      reason: 'empty_generation',
      strategy: 'generative',
      cacheKey: 'llm:test-key',
    });
  });

  it('should report a model error', async () => {
    cachedCall.mockRejectedValue(new Error('model offline'));

    const outcome = await registry.forIntent(Intent.EDUCATION).respond(input());

    expect(outcome).toEqual({
      ok: false,
      reason: 'generation_error: model offline',
      strategy: 'generative',
    });
  });

  describe('extractive', () => {
    it('should list first sentences under the lead by default', async () => {
      const outcome = await registry
        .forIntent(Intent.EXPERIENCE)
        .respond(input({ strategy: 'extractive', sources: SOURCES.slice(0, 1) }));

      expect(outcome.ok && outcome.text.split('\n').slice(1)).toEqual([
        '- Trailmap: Hiking route planner built with Leaflet. [1]',
      ]);
      expect(cachedCall).not.toHaveBeenCalled();
    });

    it('should show project titles as headings', async () => {
      const outcome = await registry
        .forIntent(Intent.PERSONAL_PROJECT)
        .respond(input({ strategy: 'extractive', sources: SOURCES.slice(0, 1) }));

      expect(outcome).toEqual({
        ok: true,
        strategy: 'extractive',
        text: [
          'Some of the projects I have built:',
          '- Trailmap [1]',
          '  Hiking route planner built with Leaflet. It suggests loops.',
        ].join('\n'),
      });
    });

    it('should tag skills with their source category', async () => {
      const outcome = await registry
        .forIntent(Intent.SKILLS)
        .respond(input({ strategy: 'extractive', sources: SOURCES.slice(1) }));

      expect(outcome.ok && outcome.text).toBe(
        'My main skills, with where they show up in my work:\n- [skills] TypeScript, NestJS and PostgreSQL. [2]',
      );
    });

    it('should put repository data first in a project tour', async () => {
      const outcome = await registry
        .forIntent(Intent.PROJECT_TOUR)
        .respond(input({ strategy: 'extractive', sources: [], toolResults: [REPO_TOOL] }));

      expect(outcome.ok && outcome.text).toBe(
        "Here's a quick tour of what I've built:\n- trailmap (TypeScript), 12 stars: Route planner",
      );
    });
  });
});
