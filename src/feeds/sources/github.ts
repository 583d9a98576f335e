/**
 * SignalRadar — GitHub Repository Source
 *
 * Runs a repository search through Octokit.
 * Stars → likes, forks → shares, open issues → replies.
 */

import { Octokit } from 'octokit';
import { z } from 'zod';
import { SourceAdapter, type FetchContext } from '../base';
import { buildItem } from '../normalizer';
import { MalformedItem, SourceUnavailable } from '../../lib/errors';
import { errorMessage } from '../../lib/logger';
import type { GitHubSourceConfig, Item } from '../../types';

// ============================================================
// SEARCH CLIENT
// ============================================================

export interface RepoSearchParams {
  q: string;
  sort: 'stars' | 'updated';
  perPage: number;
}

/**
 * The slice of the GitHub API this source needs.
 */
export interface GitHubRepoSearch {
  searchRepositories(params: RepoSearchParams, signal: AbortSignal): Promise<unknown[]>;
}

export function createOctokitSearch(token?: string): GitHubRepoSearch {
  const octokit = new Octokit(token ? { auth: token } : {});

  return {
    async searchRepositories(params, signal) {
      const response = await octokit.rest.search.repos({
        q: params.q,
        sort: params.sort,
        order: 'desc',
        per_page: params.perPage,
        request: { signal },
      });
      return response.data.items;
    },
  };
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

// ============================================================
// SOURCE
// ============================================================

const RepoSchema = z.object({
  id: z.number(),
  full_name: z.string(),
  html_url: z.string(),
  description: z.string().nullable().optional(),
  language: z.string().nullable().optional(),
  topics: z.array(z.string()).optional(),
  stargazers_count: z.number().optional(),
  forks_count: z.number().optional(),
  open_issues_count: z.number().optional(),
  pushed_at: z.string().nullable().optional(),
  updated_at: z.string().nullable().optional(),
  owner: z.object({ login: z.string(), id: z.number().optional() }).nullable().optional(),
});

export class GitHubSource extends SourceAdapter<'github'> {
  readonly kind = 'github' as const;

  constructor(private readonly search: GitHubRepoSearch) {
    super();
  }

  async *fetch(source: GitHubSourceConfig, context: FetchContext): AsyncGenerator<Item, void, undefined> {
    let repos: unknown[];
    try {
      repos = await this.search.searchRepositories(
        { q: source.query, sort: source.sort, perPage: source.maxItems },
        context.signal
      );
    } catch (error) {
      const status = statusOf(error);
      const reason =
        status === 401 || status === 403
          ? `authentication rejected (HTTP ${status})`
          : `search failed: ${errorMessage(error)}`;
      throw new SourceUnavailable(source.name, reason, { cause: error });
    }

    yield* this.normalizeEntries(source.name, repos, raw => this.toItem(source, raw, context), context);
  }

  private toItem(source: GitHubSourceConfig, raw: unknown, context: FetchContext): Item {
    const parsed = RepoSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedItem(source.name, 'unexpected repository format');
    }
    const repo = parsed.data;
    const topics = repo.topics ?? [];
    const body = [repo.description ?? '', topics.length > 0 ? `Topics: ${topics.join(', ')}` : '']
      .filter(Boolean)
      .join('. ');

    return buildItem({
      externalId: String(repo.id),
      sourceKind: this.kind,
      sourceName: source.name,
      title: repo.full_name,
      body,
      url: repo.html_url,
      authorId: repo.owner?.id !== undefined ? String(repo.owner.id) : repo.owner?.login,
      authorName: repo.owner?.login,
      engagement: {
        likes: repo.stargazers_count,
        shares: repo.forks_count,
        replies: repo.open_issues_count,
      },
      publishedAt: repo.pushed_at ?? repo.updated_at,
      tags: source.tags,
      fetchedAt: context.now,
    });
  }
}
