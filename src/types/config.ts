/**
 * SignalRadar — Configuration Schema
 *
 * Every section is a closed set of keys: an unknown key is a
 * configuration error, never silently ignored.
 */

import { z } from 'zod';
import { SourceKindSchema } from './item';

// ============================================================
// DEFAULTS
// ============================================================

export const DEFAULT_STUB_PATTERNS = [
  'read more',
  'click here',
  'coming soon',
  'continue reading',
  'full article',
  'lorem ipsum',
  '(no title)',
  'no title',
  'untitled',
] as const;

// ============================================================
// DOMAIN + TOPICS
// ============================================================

const TermListSchema = z.array(z.string().trim().min(1));

export const DomainConfigSchema = z
  .object({
    keywords: TermListSchema.default([]),
    excludeKeywords: TermListSchema.default([]),
    /** Accepted language codes; empty accepts every language */
    languages: TermListSchema.default([]),
  })
  .strict();

/** Canonical topic → trigger terms */
export const TopicVocabularySchema = z.record(z.string().trim().min(1), TermListSchema.min(1));

// ============================================================
// SOURCES
// ============================================================

const sourceBase = {
  name: z.string().trim().min(1),
  enabled: z.boolean().default(true),
  /** Extra tags merged into every item from this source */
  tags: TermListSchema.default([]),
};

export const RssSourceConfigSchema = z
  .object({
    ...sourceBase,
    kind: z.literal('rss'),
    url: z.string().url(),
  })
  .strict();

export const HackerNewsSourceConfigSchema = z
  .object({
    ...sourceBase,
    kind: z.literal('hacker_news'),
    list: z.enum(['top', 'new', 'best']).default('new'),
    maxItems: z.number().int().positive().default(30),
    minScore: z.number().int().min(0).default(0),
  })
  .strict();

export const RedditSourceConfigSchema = z
  .object({
    ...sourceBase,
    kind: z.literal('reddit'),
    subreddits: TermListSchema.min(1),
    sort: z.enum(['new', 'hot', 'top', 'rising']).default('new'),
    maxItems: z.number().int().positive().max(100).default(25),
  })
  .strict();

export const GitHubSourceConfigSchema = z
  .object({
    ...sourceBase,
    kind: z.literal('github'),
    query: z.string().trim().min(1),
    sort: z.enum(['stars', 'updated']).default('updated'),
    maxItems: z.number().int().positive().max(100).default(30),
  })
  .strict();

export const TwitterSourceConfigSchema = z
  .object({
    ...sourceBase,
    kind: z.literal('twitter'),
    query: z.string().trim().min(1),
    maxItems: z.number().int().min(10).max(100).default(50),
  })
  .strict();

export const SourceConfigSchema = z.discriminatedUnion('kind', [
  RssSourceConfigSchema,
  HackerNewsSourceConfigSchema,
  RedditSourceConfigSchema,
  GitHubSourceConfigSchema,
  TwitterSourceConfigSchema,
]);

export type RssSourceConfig = z.infer<typeof RssSourceConfigSchema>;
export type HackerNewsSourceConfig = z.infer<typeof HackerNewsSourceConfigSchema>;
export type RedditSourceConfig = z.infer<typeof RedditSourceConfigSchema>;
export type GitHubSourceConfig = z.infer<typeof GitHubSourceConfigSchema>;
export type TwitterSourceConfig = z.infer<typeof TwitterSourceConfigSchema>;
export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type SourceConfigInput = z.input<typeof SourceConfigSchema>;

/** Source config narrowed to one kind */
export type SourceConfigOf<K extends SourceConfig['kind']> = Extract<SourceConfig, { kind: K }>;

// ============================================================
// SCORING
// ============================================================

const WeightSchema = z.number().finite().min(0);

export const ScoringWeightsSchema = z
  .object({
    likes: WeightSchema.default(1.0),
    shares: WeightSchema.default(2.0),
    replies: WeightSchema.default(1.5),
    /** Multiplier on ln(1 + followers) */
    authority: WeightSchema.default(1.0),
    /** Multiplier on the feedback weighted sum */
    feedback: WeightSchema.default(3.0),
  })
  .strict();

export const RecencyConfigSchema = z
  .object({
    halfLifeHours: z.number().positive().default(48),
    /** Extra multiplier when the publish time was inferred from fetch time */
    inferredTimestampFactor: z.number().min(0).max(1).default(1),
  })
  .strict();

export const ScoringConfigSchema = z
  .object({
    weights: ScoringWeightsSchema.default({}),
    sourceBonus: z.record(SourceKindSchema, z.number().finite()).default({}),
    tagBonus: z.record(z.string().min(1), z.number().finite()).default({}),
    recency: RecencyConfigSchema.default({}),
  })
  .strict();

export type ScoringWeights = z.infer<typeof ScoringWeightsSchema>;
export type ScoringConfig = z.infer<typeof ScoringConfigSchema>;

// ============================================================
// DEDUP / QUALITY / EXTRACTION / FETCH
// ============================================================

export const SimilarityAlgorithmSchema = z.enum(['levenshtein', 'sequence', 'token_set']);
export type SimilarityAlgorithm = z.infer<typeof SimilarityAlgorithmSchema>;

export const DedupConfigSchema = z
  .object({
    titleThreshold: z.number().min(0).max(1).default(0.8),
    contentThreshold: z.number().min(0).max(1).default(0.7),
    windowDays: z.number().int().positive().default(7),
    algorithm: SimilarityAlgorithmSchema.default('levenshtein'),
  })
  .strict();

export const QualityConfigSchema = z
  .object({
    minLength: z.number().int().min(0).default(40),
    stubPatterns: TermListSchema.default([...DEFAULT_STUB_PATTERNS]),
    /** 0 disables the age check */
    maxAgeDays: z.number().min(0).default(0),
  })
  .strict();

export const ExtractionConfigSchema = z
  .object({
    topK: z.number().int().positive().default(10),
    /** Bigrams must repeat at least this often to rank as phrases */
    minPhraseFrequency: z.number().int().min(2).default(2),
  })
  .strict();

export const FetchConfigSchema = z
  .object({
    timeoutMs: z.number().int().positive().default(15_000),
    concurrency: z.number().int().min(1).max(64).default(8),
    maxItemsPerSource: z.number().int().positive().default(100),
  })
  .strict();

export type DedupConfig = z.infer<typeof DedupConfigSchema>;
export type QualityConfig = z.infer<typeof QualityConfigSchema>;
export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;
export type FetchConfig = z.infer<typeof FetchConfigSchema>;
export type DomainConfig = z.infer<typeof DomainConfigSchema>;
export type TopicVocabulary = z.infer<typeof TopicVocabularySchema>;

// ============================================================
// ROOT
// ============================================================

export const RadarConfigSchema = z
  .object({
    domain: DomainConfigSchema.default({}),
    topics: TopicVocabularySchema.default({}),
    sources: z.array(SourceConfigSchema).default([]),
    scoring: ScoringConfigSchema.default({}),
    dedup: DedupConfigSchema.default({}),
    quality: QualityConfigSchema.default({}),
    extraction: ExtractionConfigSchema.default({}),
    fetch: FetchConfigSchema.default({}),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (config.domain.keywords.length === 0 && Object.keys(config.topics).length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['domain', 'keywords'],
        message: 'at least one inclusion keyword or topic is required',
      });
    }

    const seen = new Set<string>();
    config.sources.forEach((source, index) => {
      if (seen.has(source.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sources', index, 'name'],
          message: `duplicate source name "${source.name}"`,
        });
      }
      seen.add(source.name);
    });
  });

export type RadarConfig = z.output<typeof RadarConfigSchema>;
export type RadarConfigInput = z.input<typeof RadarConfigSchema>;
