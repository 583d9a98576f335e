/**
 * SignalRadar — X / Twitter Source
 *
 * v2 recent search with an app bearer token. Author follower counts
 * come from the user expansion.
 */

import { z } from 'zod';
import { SourceAdapter, type FetchContext } from '../base';
import { buildItem } from '../normalizer';
import { MalformedItem, SourceUnavailable } from '../../lib/errors';
import type { Item, TwitterSourceConfig } from '../../types';

const SEARCH_URL = 'https://api.twitter.com/2/tweets/search/recent';

const UserSchema = z.object({
  id: z.string(),
  username: z.string(),
  name: z.string().optional(),
  public_metrics: z.object({ followers_count: z.number().optional() }).optional(),
});

const SearchResponseSchema = z.object({
  data: z.array(z.unknown()).optional(),
  includes: z.object({ users: z.array(UserSchema).optional() }).optional(),
});

const TweetSchema = z.object({
  id: z.string(),
  text: z.string(),
  author_id: z.string().optional(),
  created_at: z.string().optional(),
  lang: z.string().optional(),
  public_metrics: z
    .object({
      like_count: z.number().optional(),
      retweet_count: z.number().optional(),
      reply_count: z.number().optional(),
    })
    .optional(),
});

type TwitterUser = z.infer<typeof UserSchema>;

export class TwitterSource extends SourceAdapter<'twitter'> {
  readonly kind = 'twitter' as const;

  constructor(private readonly bearerToken?: string) {
    super();
  }

  async *fetch(source: TwitterSourceConfig, context: FetchContext): AsyncGenerator<Item, void, undefined> {
    if (!this.bearerToken) {
      throw new SourceUnavailable(source.name, 'no bearer token configured');
    }

    const params = new URLSearchParams({
      query: source.query,
      max_results: String(source.maxItems),
      'tweet.fields': 'created_at,public_metrics,lang,author_id',
      expansions: 'author_id',
      'user.fields': 'public_metrics,username,name',
    });

    const parsed = SearchResponseSchema.safeParse(
      await this.requestJson(source.name, `${SEARCH_URL}?${params.toString()}`, context, {
        Authorization: `Bearer ${this.bearerToken}`,
      })
    );
    if (!parsed.success) {
      throw new SourceUnavailable(source.name, 'unexpected search response format');
    }

    const users = new Map<string, TwitterUser>();
    for (const user of parsed.data.includes?.users ?? []) {
      users.set(user.id, user);
    }

    yield* this.normalizeEntries(
      source.name,
      parsed.data.data ?? [],
      raw => this.toItem(source, raw, users, context),
      context
    );
  }

  private toItem(
    source: TwitterSourceConfig,
    raw: unknown,
    users: Map<string, TwitterUser>,
    context: FetchContext
  ): Item {
    const parsed = TweetSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedItem(source.name, 'unexpected tweet format');
    }
    const tweet = parsed.data;
    const author = tweet.author_id ? users.get(tweet.author_id) : undefined;
    const url = author
      ? `https://x.com/${author.username}/status/${tweet.id}`
      : `https://x.com/i/web/status/${tweet.id}`;

    return buildItem({
      externalId: tweet.id,
      sourceKind: this.kind,
      sourceName: source.name,
      title: '',
      body: tweet.text,
      url,
      authorId: tweet.author_id,
      authorName: author?.username,
      authorFollowers: author?.public_metrics?.followers_count,
      engagement: {
        likes: tweet.public_metrics?.like_count,
        shares: tweet.public_metrics?.retweet_count,
        replies: tweet.public_metrics?.reply_count,
      },
      publishedAt: tweet.created_at,
      language: tweet.lang,
      tags: source.tags,
      fetchedAt: context.now,
    });
  }
}
