/**
 * SignalRadar — Feeds Module
 *
 * Source adapters: fetch from one kind of external source and
 * normalize entries into Items.
 */

export { SourceAdapter, AdapterRegistry, type FetchContext } from './base';

export {
  buildItem,
  composeText,
  stripHtml,
  resolvePublishedAt,
  fromEpochSeconds,
  normalizeLanguage,
  toCount,
  toEngagement,
  type ItemDraft,
  type ResolvedTimestamp,
} from './normalizer';

export {
  createDefaultRegistry,
  createOctokitSearch,
  RssSource,
  HackerNewsSource,
  RedditSource,
  GitHubSource,
  TwitterSource,
  type DefaultRegistryOptions,
  type GitHubRepoSearch,
  type RepoSearchParams,
} from './sources';
