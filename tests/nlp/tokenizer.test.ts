/**
 * Tests for tokenization, lemmatization and term matching
 */

import { describe, it, expect } from 'vitest';
import { containsTerm, isStopword, lemmatize, tokenize } from '../../src/nlp/tokenizer';

describe('tokenize', () => {
  it('should drop URLs, mentions, short tokens and numbers', () => {
    expect(tokenize('Check https://x.io/a @bob #ROS2 robots, 2026 AI-driven  -arms- ok')).toEqual([
      'check',
      'ros2',
      'robots',
      'ai-driven',
      'arms',
    ]);
  });

  it('should return nothing for empty text', () => {
    expect(tokenize('')).toEqual([]);
  });
});

describe('lemmatize', () => {
  it.each([
    ['robots', 'robot'],
    ['studies', 'study'],
    ['classes', 'class'],
    ['boxes', 'box'],
    ['matches', 'match'],
    ['wishes', 'wish'],
    ['status', 'status'],
    ['analysis', 'analysis'],
    ['glass', 'glass'],
    ['children', 'child'],
    ['gas', 'gas'],
  ])('%s → %s', (token, lemma) => {
    expect(lemmatize(token)).toBe(lemma);
  });
});

describe('isStopword', () => {
  it('should recognise common function words', () => {
    expect(isStopword('the')).toBe(true);
    expect(isStopword('robot')).toBe(false);
  });
});

describe('containsTerm', () => {
  it('should match whole words only', () => {
    expect(containsTerm('ROS2 released', 'ros')).toBe(false);
    expect(containsTerm('Robotics weekly', 'robot')).toBe(false);
    expect(containsTerm('New ROS release', 'ros')).toBe(true);
  });

  it('should allow any whitespace inside multi-word terms', () => {
    expect(containsTerm('Dense point\n  cloud maps', 'Point Cloud')).toBe(true);
  });

  it('should never match an empty term', () => {
    expect(containsTerm('anything', '  ')).toBe(false);
  });
});
