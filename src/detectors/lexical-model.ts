import { readFileSync } from 'fs';

import { ConfigError, errorMessage } from '../errors.js';
import type { Detector, DetectorOptions, DetectionResult, InputDetectorKind, MatchedSpan } from '../types/index.js';
import { DETECTION_REASON, result } from './threshold.js';

export const DEFAULT_LEXICON_PATH = new URL('../../data/lexicon.json', import.meta.url);

const TOKEN_PATTERN = /[\p{L}\p{N}]+(?:'\p{L}+)?/gu;

/** Term weights per detector kind. Terms are single tokens or two-token phrases. */
export interface Lexicon {
  readonly version: number;
  readonly models: ReadonlyMap<string, ReadonlyMap<string, number>>;
}

interface Token {
  text: string;
  start: number;
  end: number;
}

export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const start = match.index ?? 0;
    tokens.push({ text: match[0].toLowerCase(), start, end: start + match[0].length });
  }
  return tokens;
}

export function parseLexicon(raw: unknown): Lexicon {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError('Lexicon must be an object');
  }
  const version = 'version' in raw && typeof raw.version === 'number' ? raw.version : 1;
  const modelsRaw = 'models' in raw ? raw.models : undefined;
  if (typeof modelsRaw !== 'object' || modelsRaw === null) {
    throw new ConfigError('Lexicon field "models" must be an object');
  }

  const models = new Map<string, Map<string, number>>();
  for (const [kind, model] of Object.entries(modelsRaw)) {
    const terms: unknown = typeof model === 'object' && model !== null && 'terms' in model ? model.terms : undefined;
    if (typeof terms !== 'object' || terms === null) {
      throw new ConfigError(`Lexicon model "${kind}" must have a "terms" object`);
    }
    const weights = new Map<string, number>();
    for (const [term, weight] of Object.entries(terms)) {
      if (typeof weight !== 'number' || weight < 0 || weight >= 1) {
        throw new ConfigError(`Lexicon weight for "${kind}.${term}" must be a number in [0, 1)`);
      }
      weights.set(term.toLowerCase(), weight);
    }
    models.set(kind, weights);
  }

  return { version, models };
}

export function loadLexicon(path: string | URL = DEFAULT_LEXICON_PATH): Lexicon {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to read lexicon at "${String(path)}": ${errorMessage(err)}`, { cause: err });
  }
  return parseLexicon(raw);
}

/**
 * Noisy-OR over the distinct lexicon terms found in the text:
 * score = 1 - Π(1 - w). Each term contributes once, at its first occurrence.
 */
export function scoreLexical(text: string, weights: ReadonlyMap<string, number>): { score: number; spans: MatchedSpan[] } {
  const tokens = tokenize(text);
  const seen = new Set<string>();
  const spans: MatchedSpan[] = [];
  let survival = 1;

  const consider = (term: string, start: number, end: number) => {
    const weight = weights.get(term);
    if (weight === undefined || seen.has(term)) return;
    seen.add(term);
    survival *= 1 - weight;
    spans.push({ start, end, label: 'lexicon_term' });
  };

  tokens.forEach((token, i) => {
    consider(token.text, token.start, token.end);
    const next = tokens[i + 1];
    if (next) consider(`${token.text} ${next.text}`, token.start, next.end);
  });

  spans.sort((a, b) => a.start - b.start || a.end - b.end);
  return { score: 1 - survival, spans };
}

export function createLexicalDetector(kind: InputDetectorKind, lexicon: Lexicon): Detector | undefined {
  const weights = lexicon.models.get(kind);
  if (!weights) return undefined;

  return {
    name: `lexical_${kind}`,
    isAvailable: () => weights.size > 0,
    async detect(text: string, threshold: number, options: DetectorOptions = {}): Promise<DetectionResult> {
      const { score, spans } = scoreLexical(text, weights);
      return result(score, threshold, options.action, DETECTION_REASON[kind], spans);
    }
  };
}
