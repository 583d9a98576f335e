/**
 * SignalRadar — Keyword & Topic Extractor
 *
 * Position-weighted keyword ranking over lemmatized content tokens,
 * with repeated bigrams ranked alongside single words. Topics come
 * from a configured vocabulary of trigger terms.
 */

import type { ExtractionConfig, Item, TopicVocabulary } from '../types';
import { containsTerm, isStopword, lemmatize, tokenize } from './tokenizer';

export interface Extraction {
  /** Best first */
  keywords: string[];
  topics: Set<string>;
  /** Every content lemma in the text */
  lemmas: Set<string>;
}

interface Candidate {
  term: string;
  weight: number;
  count: number;
  order: number;
}

export class KeywordExtractor {
  constructor(
    private readonly vocabulary: TopicVocabulary,
    private readonly config: ExtractionConfig
  ) {}

  extract(text: string): Extraction {
    const keywords = this.rankKeywords(text);
    const lemmas = new Set(
      tokenize(text)
        .filter(token => !isStopword(token))
        .map(lemmatize)
    );
    return { keywords, topics: this.matchTopics(text, keywords, lemmas), lemmas };
  }

  // ============================================================
  // KEYWORDS
  // ============================================================

  private rankKeywords(text: string): string[] {
    const tokens = tokenize(text);
    // Content positions, with null marking a stopword gap
    const sequence = tokens.map(token => (isStopword(token) ? null : lemmatize(token)));
    const n = sequence.filter(lemma => lemma !== null).length;
    if (n === 0) return [];

    const unigrams = new Map<string, Candidate>();
    const bigrams = new Map<string, Candidate>();
    let order = 0;
    let position = 0;

    const add = (table: Map<string, Candidate>, term: string, weight: number): void => {
      const existing = table.get(term);
      if (existing) {
        existing.weight += weight;
        existing.count++;
      } else {
        table.set(term, { term, weight, count: 1, order: order++ });
      }
    };

    for (let j = 0; j < sequence.length; j++) {
      const lemma = sequence[j];
      if (lemma === null) continue;

      const weight = 1 + (n - position) / n;
      add(unigrams, lemma, weight);

      const following = sequence[j + 1];
      if (following !== undefined && following !== null) {
        add(bigrams, `${lemma} ${following}`, weight);
      }
      position++;
    }

    const candidates = [
      ...unigrams.values(),
      ...Array.from(bigrams.values()).filter(c => c.count >= this.config.minPhraseFrequency),
    ];

    return candidates
      .sort((a, b) => b.weight - a.weight || a.order - b.order)
      .slice(0, this.config.topK)
      .map(c => c.term);
  }

  // ============================================================
  // TOPICS
  // ============================================================

  private matchTopics(text: string, keywords: string[], lemmas: Set<string>): Set<string> {
    const keywordSet = new Set(keywords);
    const topics = new Set<string>();

    for (const [topic, triggers] of Object.entries(this.vocabulary)) {
      const hit = triggers.some(trigger => {
        const term = trigger.trim().toLowerCase();
        if (containsTerm(text, term)) return true;
        if (keywordSet.has(term)) return true;
        return !term.includes(' ') && lemmas.has(lemmatize(term));
      });
      if (hit) topics.add(topic);
    }
    return topics;
  }
}

/**
 * Item with adapter tags merged with extracted topics, and keywords attached.
 */
export function applyExtraction(item: Item, extraction: Extraction): Item {
  const tags = new Set(item.tags.map(t => t.toLowerCase()));
  for (const topic of extraction.topics) tags.add(topic.toLowerCase());
  return { ...item, tags: [...tags].sort(), keywords: [...extraction.keywords] };
}
