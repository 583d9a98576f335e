/**
 * SignalRadar — Hacker News Source
 *
 * Uses the official HN Firebase API. Story points map to likes,
 * comment count to replies.
 */

import { z } from 'zod';
import { SourceAdapter, type FetchContext } from '../base';
import { buildItem, fromEpochSeconds } from '../normalizer';
import { MalformedItem, SourceUnavailable } from '../../lib/errors';
import { errorMessage } from '../../lib/logger';
import type { HackerNewsSourceConfig, Item } from '../../types';

const HN_API_BASE = 'https://hacker-news.firebaseio.com/v0';
const BATCH_SIZE = 10;

const StoryIdsSchema = z.array(z.number().int());

const HNStorySchema = z.object({
  id: z.number().int(),
  type: z.string(),
  title: z.string().optional(),
  url: z.string().optional(),
  text: z.string().optional(),
  score: z.number().optional(),
  by: z.string().optional(),
  time: z.number().optional(),
  descendants: z.number().optional(),
  dead: z.boolean().optional(),
  deleted: z.boolean().optional(),
});

type HNStory = z.infer<typeof HNStorySchema>;

export class HackerNewsSource extends SourceAdapter<'hacker_news'> {
  readonly kind = 'hacker_news' as const;

  async *fetch(source: HackerNewsSourceConfig, context: FetchContext): AsyncGenerator<Item, void, undefined> {
    const listed = StoryIdsSchema.safeParse(
      await this.requestJson(source.name, `${HN_API_BASE}/${source.list}stories.json`, context)
    );
    if (!listed.success) {
      throw new SourceUnavailable(source.name, 'unexpected story list format');
    }

    // Fetch extra ids so the score filter still fills maxItems
    const ids = listed.data.slice(0, source.maxItems * 2);
    let yielded = 0;

    for (let i = 0; i < ids.length && yielded < source.maxItems; i += BATCH_SIZE) {
      const batch = await Promise.all(
        ids.slice(i, i + BATCH_SIZE).map(id => this.fetchStory(source.name, id, context))
      );

      const stories = batch.filter(
        (s): s is HNStory =>
          s !== null && s.type === 'story' && !s.dead && !s.deleted && (s.score ?? 0) >= source.minScore
      );

      for (const item of this.normalizeEntries(source.name, stories, story => this.toItem(source, story, context), context)) {
        if (yielded >= source.maxItems) return;
        yielded++;
        yield item;
      }
    }
  }

  private toItem(source: HackerNewsSourceConfig, story: HNStory, context: FetchContext): Item {
    if (!story.title) {
      throw new MalformedItem(source.name, 'story without title', String(story.id));
    }
    return buildItem({
      externalId: String(story.id),
      sourceKind: this.kind,
      sourceName: source.name,
      title: story.title,
      body: story.text,
      url: story.url || `https://news.ycombinator.com/item?id=${story.id}`,
      authorId: story.by,
      authorName: story.by,
      engagement: { likes: story.score, replies: story.descendants },
      publishedAt: fromEpochSeconds(story.time),
      tags: source.tags,
      fetchedAt: context.now,
    });
  }

  /**
   * A single story that fails to load is skipped, not the whole source.
   */
  private async fetchStory(sourceName: string, id: number, context: FetchContext): Promise<HNStory | null> {
    try {
      const res = await fetch(`${HN_API_BASE}/item/${id}.json`, { signal: context.signal });
      if (!res.ok) return null;
      const body: unknown = await res.json();
      if (body === null) return null;
      const parsed = HNStorySchema.safeParse(body);
      if (!parsed.success) {
        context.onMalformed(new MalformedItem(sourceName, 'unexpected story format', String(id)));
        return null;
      }
      return parsed.data;
    } catch (error) {
      if (context.signal.aborted) throw new SourceUnavailable(sourceName, 'aborted', { cause: error });
      this.logger.debug('Story fetch failed', { id, error: errorMessage(error) });
      return null;
    }
  }
}
