import type { Detector, DetectorOptions, DetectionResult, MatchedSpan } from '../types/index.js';
import { DETECTION_REASON, markerPattern, result, spanOf } from './threshold.js';

export const HARMFUL_REASON = DETECTION_REASON.harmful_content;

// Hard refusal patterns - immediate block, no exceptions
const HARD_REFUSAL_PATTERNS: RegExp[] = [
  // Illegal activity
  /how\s+to\s+(make|create|build)\s+(a\s+)?(bomb|explosive|weapon)/i,
  /synthesi[sz]e\s+(meth|fentanyl|heroin|nerve\s+agent)/i,
  /child\s+(porn|abuse|exploitation)/i,

  // Self-harm facilitation
  /how\s+to\s+(kill|harm)\s+(myself|yourself|someone)/i,
  /suicide\s+methods/i,
  /most\s+painless\s+way\s+to\s+die/i,

  // Explicit exploitation
  /hack\s+into\s+(someone's|their|a)\s+(account|system|network)/i,
  /steal\s+(credit\s+card|identity|credentials|passwords?)/i,
  /write\s+(a\s+)?(ransomware|keylogger|malware)/i
];

// Weighted cues; a prompt needs several of them to reach a typical threshold
const HARMFUL_CUES: [RegExp, number][] = [
  [/\bkill(ing)?\b/i, 0.35],
  [/\bweapons?\b/i, 0.25],
  [/\bexplosives?\b/i, 0.35],
  [/\bpoison(ing)?\b/i, 0.3],
  [/\bhurt\b/i, 0.2],
  [/\battack\b/i, 0.2],
  [/\bstab\b/i, 0.3],
  [/\bshoot\b/i, 0.25],
  [/\bhate\b/i, 0.15],
  [/\bmalware\b/i, 0.3],
  [/\bovers?dose\b/i, 0.3],
  [/\bundetectable\b/i, 0.2]
];

export function scoreHarmful(text: string, markers: readonly string[] = []): { score: number; spans: MatchedSpan[] } {
  for (const marker of markers) {
    const match = markerPattern(marker).exec(text);
    if (match) return { score: 1, spans: [spanOf(match, 'harmful_marker')] };
  }

  for (const pattern of HARD_REFUSAL_PATTERNS) {
    const match = pattern.exec(text);
    if (match) return { score: 1, spans: [spanOf(match, 'harmful_pattern')] };
  }

  let score = 0;
  const spans: MatchedSpan[] = [];
  for (const [pattern, weight] of HARMFUL_CUES) {
    const match = pattern.exec(text);
    if (match) {
      score += weight;
      spans.push(spanOf(match, 'harmful_cue'));
    }
  }

  spans.sort((a, b) => a.start - b.start);
  return { score: Math.min(1, score), spans };
}

export const heuristicHarmfulDetector: Detector = {
  name: 'heuristic_harmful',
  isAvailable: () => true,
  async detect(text: string, threshold: number, options: DetectorOptions = {}): Promise<DetectionResult> {
    const { score, spans } = scoreHarmful(text, options.markers);
    return result(score, threshold, options.action, HARMFUL_REASON, spans);
  }
};
