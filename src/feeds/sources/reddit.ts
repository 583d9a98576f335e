/**
 * SignalRadar — Reddit Source
 *
 * Reads subreddit listings from the public JSON endpoints.
 * Upvotes → likes, crossposts → shares, comments → replies.
 */

import { z } from 'zod';
import { SourceAdapter, type FetchContext } from '../base';
import { buildItem, fromEpochSeconds } from '../normalizer';
import { MalformedItem, SourceUnavailable } from '../../lib/errors';
import { errorMessage } from '../../lib/logger';
import type { Item, RedditSourceConfig } from '../../types';

const REDDIT_BASE = 'https://www.reddit.com';

const ListingSchema = z.object({
  data: z.object({
    children: z.array(z.object({ kind: z.string(), data: z.unknown() })),
  }),
});

const RedditPostSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  title: z.string(),
  selftext: z.string().optional(),
  url: z.string().optional(),
  permalink: z.string(),
  author: z.string().optional(),
  author_fullname: z.string().optional(),
  ups: z.number().optional(),
  num_comments: z.number().optional(),
  num_crossposts: z.number().optional(),
  created_utc: z.number().optional(),
  is_self: z.boolean().optional(),
  stickied: z.boolean().optional(),
});

type RedditPost = z.infer<typeof RedditPostSchema>;

export class RedditSource extends SourceAdapter<'reddit'> {
  readonly kind = 'reddit' as const;

  async *fetch(source: RedditSourceConfig, context: FetchContext): AsyncGenerator<Item, void, undefined> {
    let failures = 0;
    let lastError: unknown;

    for (const subreddit of source.subreddits) {
      let posts: unknown[];
      try {
        posts = await this.fetchListing(source, subreddit, context);
      } catch (error) {
        if (context.signal.aborted) throw error;
        failures++;
        lastError = error;
        this.logger.warn(`Failed to fetch r/${subreddit}`, { source: source.name, error: errorMessage(error) });
        continue;
      }

      yield* this.normalizeEntries(source.name, posts, raw => this.toItem(source, raw, context), context);
    }

    // One dead subreddit is tolerated; all of them failing means the source is down
    if (source.subreddits.length > 0 && failures === source.subreddits.length) {
      throw lastError instanceof SourceUnavailable
        ? lastError
        : new SourceUnavailable(source.name, errorMessage(lastError), { cause: lastError });
    }
  }

  private async fetchListing(
    source: RedditSourceConfig,
    subreddit: string,
    context: FetchContext
  ): Promise<unknown[]> {
    const url = `${REDDIT_BASE}/r/${encodeURIComponent(subreddit)}/${source.sort}.json?limit=${source.maxItems}&raw_json=1`;
    const parsed = ListingSchema.safeParse(await this.requestJson(source.name, url, context));
    if (!parsed.success) {
      throw new SourceUnavailable(source.name, `unexpected listing format for r/${subreddit}`);
    }

    return parsed.data.data.children
      .filter(child => child.kind === 't3')
      .map(child => child.data)
      .filter(data => !isStickied(data));
  }

  private toItem(source: RedditSourceConfig, raw: unknown, context: FetchContext): Item {
    const parsed = RedditPostSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedItem(source.name, 'unexpected post format');
    }
    const post: RedditPost = parsed.data;
    const permalink = `${REDDIT_BASE}${post.permalink}`;

    return buildItem({
      externalId: post.name ?? `t3_${post.id}`,
      sourceKind: this.kind,
      sourceName: source.name,
      title: post.title,
      body: post.selftext,
      url: post.is_self || !post.url ? permalink : post.url,
      authorId: post.author_fullname ?? post.author,
      authorName: post.author,
      engagement: {
        likes: post.ups,
        shares: post.num_crossposts,
        replies: post.num_comments,
      },
      publishedAt: fromEpochSeconds(post.created_utc),
      tags: source.tags,
      fetchedAt: context.now,
    });
  }
}

function isStickied(data: unknown): boolean {
  return typeof data === 'object' && data !== null && 'stickied' in data && data.stickied === true;
}
