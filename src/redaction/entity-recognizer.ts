import type { Candidate } from './patterns.js';

export const ENTITY_LABELS = ['PERSON', 'LOCATION', 'ORGANIZATION', 'DATE'] as const;

export type EntityLabel = (typeof ENTITY_LABELS)[number];

export function isEntityLabel(label: string): label is EntityLabel {
  return ENTITY_LABELS.some((known) => known === label);
}

/** Named-entity capability. Optional: the engine skips the pass when it is missing. */
export interface EntityRecognizer {
  readonly name: string;
  isAvailable(): boolean;
  recognize(text: string, labels: readonly EntityLabel[]): Promise<Candidate[]>;
}

interface EntityRule {
  label: EntityLabel;
  pattern: RegExp;
  /** Capture group holding the entity; 0 for the whole match. */
  group: number;
}

// Proper names are Title Case; all-caps words (including masks) never match
const NAME = '[A-Z][a-z]+(?:[ \\t]+[A-Z][a-z]+){0,2}';
const MONTH = '(?:January|February|March|April|May|June|July|August|September|October|November|December)';

const RULES: readonly EntityRule[] = [
  { label: 'PERSON', pattern: new RegExp(`\\b(?:[Mm]y name is|[Nn]amed|[Cc]alled)\\s+(${NAME})`, 'g'), group: 1 },
  { label: 'PERSON', pattern: new RegExp(`\\b(?:Mr|Mrs|Ms|Dr|Prof)\\.?\\s+(${NAME})`, 'g'), group: 1 },
  {
    label: 'LOCATION',
    pattern: /\b\d{1,5}\s+(?:[A-Z][a-z]+\s+){1,3}(?:Street|St|Avenue|Ave|Road|Rd|Boulevard|Blvd|Lane|Ln|Drive)\b\.?/g,
    group: 0
  },
  { label: 'LOCATION', pattern: new RegExp(`\\b(?:live in|living in|born in|located in|based in)\\s+(${NAME})`, 'g'), group: 1 },
  {
    label: 'ORGANIZATION',
    pattern: /\b(?:[A-Z][a-z]+[ \t]+){1,3}(?:Inc|Corp|LLC|Ltd|Hospital|Clinic|University|Bank)\b\.?/g,
    group: 0
  },
  { label: 'DATE', pattern: new RegExp(`\\b${MONTH}\\s+\\d{1,2}(?:st|nd|rd|th)?(?:,\\s*\\d{4})?`, 'g'), group: 0 },
  { label: 'DATE', pattern: /\b\d{4}-\d{2}-\d{2}\b/g, group: 0 },
  { label: 'DATE', pattern: /\b\d{1,2}\/\d{1,2}\/\d{2,4}\b/g, group: 0 }
];

/**
 * Cue-based recognizer for the built-in entity labels. It only reports
 * spans it has a contextual cue for (a title, "my name is", a street suffix).
 */
export class HeuristicEntityRecognizer implements EntityRecognizer {
  readonly name = 'heuristic_entities';

  isAvailable(): boolean {
    return true;
  }

  async recognize(text: string, labels: readonly EntityLabel[]): Promise<Candidate[]> {
    const wanted = new Set(labels);
    const found: Candidate[] = [];

    for (const rule of RULES) {
      if (!wanted.has(rule.label)) continue;
      for (const match of text.matchAll(rule.pattern)) {
        const entity = match[rule.group];
        if (!entity) continue;
        const start = (match.index ?? 0) + match[0].indexOf(entity);
        found.push({ start, end: start + entity.length, label: rule.label });
      }
    }
    return found;
  }
}
