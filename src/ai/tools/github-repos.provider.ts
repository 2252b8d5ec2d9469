import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';
import { ToolOutput, ToolProvider } from './tool.types';
import { ToolInput } from '../rag/rag.types';
import { AssistantConfig } from '../../config/assistant.config';
import { ToolInvocationError } from '../../common/utils/errors';
import { isRecord, readNumber, readString } from '../../common/utils/guards';

export interface RepoSummary {
  name: string;
  description: string;
  url: string;
  language: string | null;
  stars: number;
}

const DEFAULT_LIMIT = 6;
const MAX_LIMIT = 20;

export function parseRepos(body: unknown): RepoSummary[] {
  if (!Array.isArray(body)) {
    throw new Error('Unexpected GitHub response: expected an array');
  }

  const repos: RepoSummary[] = [];
  for (const item of body) {
    if (!isRecord(item) || item.fork === true || item.archived === true) continue;
    const name = readString(item, 'name');
    if (!name) continue;
    repos.push({
      name,
      description: readString(item, 'description') ?? '',
      url: readString(item, 'html_url') ?? '',
      language: readString(item, 'language') ?? null,
      stars: readNumber(item, 'stargazers_count') ?? 0,
    });
  }

  return repos.sort(
    (a, b) => b.stars - a.stars || a.name.localeCompare(b.name),
  );
}

/** Public repositories of the portfolio owner, most starred first. */
@Injectable()
export class GithubReposProvider implements ToolProvider {
  readonly id = 'github.repos';
  readonly description = "Lists the portfolio owner's public GitHub repositories";
  private readonly logger = new Logger(GithubReposProvider.name);

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {}

  async invoke(input: ToolInput, signal: AbortSignal): Promise<ToolOutput> {
    const { githubOwner, githubToken } =
      this.configService.getOrThrow<AssistantConfig>('assistant').tools;
    if (!githubOwner) {
      throw new ToolInvocationError(this.id, 'GITHUB_OWNER is not configured');
    }

    const requested = readNumber(input, 'limit') ?? DEFAULT_LIMIT;
    const limit = Math.max(1, Math.min(MAX_LIMIT, Math.floor(requested)));

    this.logger.debug(`🐙 Fetching repositories for ${githubOwner} (limit ${limit})`);
    const response = await firstValueFrom(
      this.httpService.get<unknown>(
        `https://api.github.com/users/${encodeURIComponent(githubOwner)}/repos`,
        {
          params: { per_page: 100, sort: 'updated' },
          headers: {
            Accept: 'application/vnd.github+json',
            ...(githubToken ? { Authorization: `Bearer ${githubToken}` } : {}),
          },
          signal,
        },
      ),
    );

    const repos = parseRepos(response.data).slice(0, limit);
    const summary = repos.length
      ? repos
          .map(
            (repo) =>
              `- ${repo.name}${repo.language ? ` (${repo.language})` : ''}, ${repo.stars} stars${repo.description ? `: ${repo.description}` : ''}`,
          )
          .join('\n')
      : `No public repositories found for ${githubOwner}.`;

    return { data: repos, summary };
  }
}
