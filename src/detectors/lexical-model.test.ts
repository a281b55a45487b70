import { describe, it, expect } from 'vitest';

import { ConfigError } from '../errors.js';
import { createLexicalDetector, loadLexicon, parseLexicon, scoreLexical, tokenize } from './lexical-model.js';

const lexicon = parseLexicon({
  version: 3,
  models: {
    harmful_content: {
      terms: { explosive: 0.5, detonator: 0.6, bomb: 0.45, 'pipe bomb': 0.9 }
    }
  }
});

const weights = lexicon.models.get('harmful_content') ?? new Map<string, number>();

describe('tokenize', () => {
  it('lowercases word tokens and keeps contractions together', () => {
    expect(tokenize("Don't STOP now").map((token) => token.text)).toEqual(["don't", 'stop', 'now']);
  });
});

describe('scoreLexical', () => {
  it('combines term weights as a noisy-OR', () => {
    const { score, spans } = scoreLexical('Explosive and detonator', weights);
    expect(score).toBeCloseTo(0.8, 10);
    expect(spans).toEqual([
      { start: 0, end: 9, label: 'lexicon_term' },
      { start: 14, end: 23, label: 'lexicon_term' }
    ]);
  });

  it('counts a repeated term once', () => {
    expect(scoreLexical('explosive, explosive!', weights).score).toBe(0.5);
  });

  it('scores two-word phrases alongside their parts', () => {
    const { score, spans } = scoreLexical('a pipe bomb', weights);
    expect(score).toBeCloseTo(0.945, 10);
    expect(spans).toEqual([
      { start: 2, end: 11, label: 'lexicon_term' },
      { start: 7, end: 11, label: 'lexicon_term' }
    ]);
  });

  it('scores zero when no term is present', () => {
    expect(scoreLexical('What is diabetes?', weights)).toEqual({ score: 0, spans: [] });
  });
});

describe('parseLexicon', () => {
  it('reads the version and lowercases terms', () => {
    const parsed = parseLexicon({ models: { prompt_injection: { terms: { Jailbreak: 0.8 } } } });
    expect(parsed.version).toBe(1);
    expect(parsed.models.get('prompt_injection')?.get('jailbreak')).toBe(0.8);
    expect(lexicon.version).toBe(3);
  });

  it('rejects weights outside [0, 1)', () => {
    expect(() => parseLexicon({ models: { harmful_content: { terms: { bomb: 1 } } } })).toThrow(
      'Lexicon weight for "harmful_content.bomb" must be a number in [0, 1)'
    );
  });

  it('rejects a model without terms', () => {
    expect(() => parseLexicon({ models: { harmful_content: {} } })).toThrow(ConfigError);
  });
});

describe('createLexicalDetector', () => {
  it('blocks once the combined score reaches the threshold', async () => {
    const detector = createLexicalDetector('harmful_content', lexicon);
    expect(detector?.name).toBe('lexical_harmful_content');

    const result = await detector?.detect('Explosive and detonator', 0.75);
    expect(result).toEqual({
      decision: 'block',
      score: 0.8,
      reason: 'harmful_content_detected',
      matchedSpans: [
        { start: 0, end: 9, label: 'lexicon_term' },
        { start: 14, end: 23, label: 'lexicon_term' }
      ]
    });
  });

  it('is absent for kinds the lexicon does not cover', () => {
    expect(createLexicalDetector('prompt_injection', lexicon)).toBeUndefined();
  });

  it('ships a lexicon for both input detectors', () => {
    const shipped = loadLexicon();
    expect([...shipped.models.keys()].sort()).toEqual(['harmful_content', 'prompt_injection']);
    expect(scoreLexical('My email is john@example.com, what is diabetes?', shipped.models.get('harmful_content') ?? new Map()).score).toBe(0);
  });

  it('fails with a ConfigError for a missing lexicon file', () => {
    expect(() => loadLexicon('/nonexistent/lexicon.json')).toThrow(ConfigError);
  });
});
