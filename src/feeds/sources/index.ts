/**
 * SignalRadar — Built-in Sources
 */

import { AdapterRegistry } from '../base';
import { RssSource } from './rss';
import { HackerNewsSource } from './hacker-news';
import { RedditSource } from './reddit';
import { GitHubSource, createOctokitSearch, type GitHubRepoSearch } from './github';
import { TwitterSource } from './twitter';

export { RssSource } from './rss';
export { HackerNewsSource } from './hacker-news';
export { RedditSource } from './reddit';
export { GitHubSource, createOctokitSearch, type GitHubRepoSearch, type RepoSearchParams } from './github';
export { TwitterSource } from './twitter';

export interface DefaultRegistryOptions {
  githubToken?: string;
  twitterBearerToken?: string;
  /** Replaces the Octokit-backed search client */
  githubSearch?: GitHubRepoSearch;
}

/**
 * Registry with one adapter per built-in source kind.
 */
export function createDefaultRegistry(options: DefaultRegistryOptions = {}): AdapterRegistry {
  return new AdapterRegistry()
    .register(new RssSource())
    .register(new HackerNewsSource())
    .register(new RedditSource())
    .register(new GitHubSource(options.githubSearch ?? createOctokitSearch(options.githubToken)))
    .register(new TwitterSource(options.twitterBearerToken));
}
