import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { of } from 'rxjs';
import { GithubReposProvider, parseRepos } from './github-repos.provider';
import { ToolInvocationError } from '../../common/utils/errors';
import { testAssistantConfig } from '../rag/testing/rag-testing.module';

const REPOS = [
  { name: 'zeta', description: 'Z', html_url: 'https://example.test/zeta', language: 'Go', stargazers_count: 3 },
  { name: 'alpha', description: 'A', html_url: 'https://example.test/alpha', language: null, stargazers_count: 3 },
  { name: 'trailmap', description: 'Route planner', html_url: 'https://example.test/trailmap', language: 'TypeScript', stargazers_count: 12 },
  { name: 'forked', fork: true, stargazers_count: 50 },
  { name: 'old', archived: true, stargazers_count: 40 },
];

describe('parseRepos', () => {
  it('should drop forks and archived repositories and sort by stars then name', () => {
    expect(parseRepos(REPOS).map((repo) => repo.name)).toEqual(['trailmap', 'alpha', 'zeta']);
  });

  it('should reject a body that is not a list', () => {
    expect(() => parseRepos({ message: 'Not Found' })).toThrow(
      'Unexpected GitHub response: expected an array',
    );
  });
});

describe('GithubReposProvider', () => {
  let provider: GithubReposProvider;
  let get: jest.Mock;

  async function build(githubOwner: string) {
    get = jest.fn().mockReturnValue(of({ data: REPOS }));
    const defaults = testAssistantConfig();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        GithubReposProvider,
        { provide: HttpService, useValue: { get } },
        {
          provide: ConfigService,
          useValue: new ConfigService({
            assistant: testAssistantConfig({ tools: { ...defaults.tools, githubOwner } }),
          }),
        },
      ],
    }).compile();

    provider = module.get<GithubReposProvider>(GithubReposProvider);
  }

  it('should summarise the most starred repositories', async () => {
    await build('test-owner');

    const output = await provider.invoke({ limit: 2 }, new AbortController().signal);

    expect(output.summary).toBe(
      '- trailmap (TypeScript), 12 stars: Route planner\n- alpha, 3 stars: A',
    );
    expect(get).toHaveBeenCalledWith(
      'https://api.github.com/users/test-owner/repos',
      expect.objectContaining({ params: { per_page: 100, sort: 'updated' } }),
    );
  });

  it('should fail when no owner is configured', async () => {
    await build('');

    await expect(provider.invoke({}, new AbortController().signal)).rejects.toBeInstanceOf(
      ToolInvocationError,
    );
    expect(get).not.toHaveBeenCalled();
  });
});
