/**
 * SignalRadar — RSS / Atom Source
 *
 * Downloads the feed document and parses it with rss-parser.
 * Feeds carry no engagement counters, so every entry starts at zero.
 */

import Parser from 'rss-parser';
import { SourceAdapter, type FetchContext } from '../base';
import { buildItem } from '../normalizer';
import { SourceUnavailable } from '../../lib/errors';
import { errorMessage } from '../../lib/logger';
import type { Item, RssSourceConfig } from '../../types';

interface FeedExtras {
  language?: string;
}

interface EntryExtras {
  id?: string;
  author?: string;
  categories?: unknown[];
}

type RssEntry = Parser.Item & EntryExtras;

const ACCEPT = 'application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.8, */*;q=0.5';

/**
 * Category values are plain strings in most feeds and `{ _: text }` objects in some.
 */
function categoryLabels(values: unknown[] | undefined): string[] {
  const labels: string[] = [];
  for (const value of values ?? []) {
    if (typeof value === 'string') {
      labels.push(value);
    } else if (value && typeof value === 'object' && '_' in value && typeof value._ === 'string') {
      labels.push(value._);
    }
  }
  return labels;
}

export class RssSource extends SourceAdapter<'rss'> {
  readonly kind = 'rss' as const;

  private readonly parser = new Parser<FeedExtras, EntryExtras>({
    customFields: { feed: ['language'] },
  });

  async *fetch(source: RssSourceConfig, context: FetchContext): AsyncGenerator<Item, void, undefined> {
    const res = await this.request(source.name, source.url, context, { Accept: ACCEPT });

    let feed: FeedExtras & Parser.Output<EntryExtras>;
    try {
      feed = await this.parser.parseString(await res.text());
    } catch (error) {
      throw new SourceUnavailable(source.name, `unreadable feed: ${errorMessage(error)}`, { cause: error });
    }

    this.logger.debug('Feed parsed', { source: source.name, entries: feed.items.length });

    yield* this.normalizeEntries(
      source.name,
      feed.items,
      (entry: RssEntry) =>
        buildItem({
          externalId: entry.guid || entry.id || entry.link || entry.title || '',
          sourceKind: this.kind,
          sourceName: source.name,
          title: entry.title,
          body: entry.contentSnippet || entry.content || entry.summary,
          url: entry.link,
          authorId: entry.creator || entry.author,
          authorName: entry.creator || entry.author,
          publishedAt: entry.isoDate || entry.pubDate,
          language: feed.language,
          tags: [...source.tags, ...categoryLabels(entry.categories)],
          fetchedAt: context.now,
        }),
      context
    );
  }
}
