/**
 * SignalRadar — Relevance Gate
 *
 * Exclusion keywords win over everything; then the item's declared
 * language; then at least one inclusion keyword or topic must hit.
 * Both keyword lists match whole words or, for single words, their lemma.
 */

import type { DomainConfig, Item, RelevanceRejectReason } from '../types';
import type { Extraction } from './extractor';
import { containsTerm, lemmatize } from './tokenizer';

export type RelevanceVerdict =
  | { relevant: true; matchedKeywords: string[]; topics: string[] }
  | { relevant: false; reason: RelevanceRejectReason; detail: string };

function keywordHits(text: string, keyword: string, extraction: Extraction): boolean {
  if (containsTerm(text, keyword)) return true;
  const term = keyword.trim().toLowerCase();
  return !term.includes(' ') && extraction.lemmas.has(lemmatize(term));
}

export function evaluateRelevance(item: Item, extraction: Extraction, domain: DomainConfig): RelevanceVerdict {
  const excluded = domain.excludeKeywords.find(keyword => keywordHits(item.text, keyword, extraction));
  if (excluded !== undefined) {
    return { relevant: false, reason: 'excluded', detail: `matched exclusion keyword "${excluded}"` };
  }

  if (item.language && domain.languages.length > 0) {
    const accepted = domain.languages.map(l => l.toLowerCase());
    if (!accepted.includes(item.language.toLowerCase())) {
      return { relevant: false, reason: 'language', detail: `language "${item.language}" not accepted` };
    }
  }

  const matchedKeywords = domain.keywords.filter(keyword => keywordHits(item.text, keyword, extraction));
  const topics = [...extraction.topics].sort();

  if (matchedKeywords.length === 0 && topics.length === 0) {
    return { relevant: false, reason: 'no_match', detail: 'no inclusion keyword or topic matched' };
  }
  return { relevant: true, matchedKeywords, topics };
}
