export interface PatternRule {
  label: string;
  pattern: RegExp;
}

// Order breaks ties between matches of equal start and length
export const PII_PATTERNS: readonly PatternRule[] = [
  {
    label: 'EMAIL',
    pattern: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g
  },
  {
    // Visa, MC, Amex, Discover; with or without spaces/dashes
    label: 'CREDIT_CARD',
    pattern: /\b(?:4[0-9]{12}(?:[0-9]{3})?|5[1-5][0-9]{14}|3[47][0-9]{13}|6(?:011|5[0-9]{2})[0-9]{12}|(?:\d{4}[\s-]){3}\d{4})\b/g
  },
  {
    // 123-45-6789 or 123 45 6789
    label: 'SSN',
    pattern: /\b(?!000|666|9\d{2})\d{3}[-\s](?!00)\d{2}[-\s](?!0000)\d{4}\b/g
  },
  {
    label: 'PHONE',
    pattern: /(?:\+?1[-.\s]?)?(?:\(?\d{3}\)?[-.\s]?)?\d{3}[-.\s]\d{4}\b/g
  },
  {
    label: 'IP_ADDRESS',
    pattern: /\b(?:(?:25[0-5]|2[0-4]\d|1?\d?\d)\.){3}(?:25[0-5]|2[0-4]\d|1?\d?\d)\b/g
  }
];

export const PATTERN_LABELS: readonly string[] = PII_PATTERNS.map((rule) => rule.label);

export interface Candidate {
  start: number;
  end: number;
  label: string;
}

export function findPatternMatches(text: string, rules: readonly PatternRule[] = PII_PATTERNS): Candidate[] {
  const found: Candidate[] = [];
  for (const { label, pattern } of rules) {
    for (const match of text.matchAll(pattern)) {
      const start = match.index ?? 0;
      if (match[0].length > 0) found.push({ start, end: start + match[0].length, label });
    }
  }
  return found;
}
