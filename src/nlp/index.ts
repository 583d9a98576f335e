/**
 * SignalRadar — NLP Module
 */

export { tokenize, lemmatize, isStopword, containsTerm, termPattern } from './tokenizer';
export { KeywordExtractor, applyExtraction, type Extraction } from './extractor';
export { evaluateRelevance, type RelevanceVerdict } from './relevance';
