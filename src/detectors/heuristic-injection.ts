import type { Detector, DetectorOptions, DetectionResult, MatchedSpan } from '../types/index.js';
import { DETECTION_REASON, markerPattern, result, spanOf } from './threshold.js';

export const INJECTION_REASON = DETECTION_REASON.prompt_injection;

// Prompt injection and manipulation patterns
const INJECTION_PATTERNS: RegExp[] = [
  // Explicit overrides
  /ignore\s+(all\s+)?(the\s+)?(previous|prior|above|earlier)\s+(instructions?|prompts?|context|commands?)/i,
  /disregard\s+(all\s+)?(the\s+)?(previous|prior|above|earlier)\s+(instructions?|prompts?|context)/i,
  /forget\s+(everything|all)\s+(you('ve|\s+have)\s+been\s+told|above|before)/i,

  // Instruction smuggling
  /\[SYSTEM\]/i,
  /\[INST\]/i,
  /<\|im_start\|>/i,
  /<<SYS>>/i,
  /<\/?system>/i,
  /###\s*(Instruction|System|Human|Assistant):/i,

  // Role confusion
  /from\s+now\s+on,?\s+(you|your)\s+(are|role|persona)/i,
  /your\s+(real|true|actual|new)\s+(role|purpose|task|objective)\s+is/i,
  /you\s+are\s+now\s+(DAN|jailbroken|unrestricted)/i,

  // Authority escalation
  /admin\s+mode/i,
  /developer\s+mode/i,
  /override\s+(safety|content|filter)/i,
  /unlock\s+(all|full)\s+(capabilities|features)/i,
  /reveal\s+(the\s+|your\s+)?(system|hidden)\s+(prompt|instructions)/i,

  // Encoding tricks
  /base64\s*:\s*[A-Za-z0-9+/=]{20,}/i,
  /\\x[0-9a-f]{2}/i,
  /&#x?[0-9a-f]+;/i
];

// Suspicion cues (accumulated)
const SUSPICION_PATTERNS: [RegExp, number][] = [
  [/ignore/i, 1],
  [/previous/i, 1],
  [/instruction/i, 2],
  [/pretend/i, 2],
  [/hypothetical/i, 1],
  [/imagine\s+you/i, 2],
  [/let's\s+play\s+a\s+game/i, 2],
  [/in\s+this\s+story/i, 1],
  [/fictional/i, 1],
  [/roleplay/i, 2],
  [/act\s+as/i, 1]
];

// Accumulated cue weight that maps to a score of 1
const SUSPICION_SCALE = 10;

export function scoreInjection(text: string, markers: readonly string[] = []): { score: number; spans: MatchedSpan[] } {
  for (const marker of markers) {
    const match = markerPattern(marker).exec(text);
    if (match) return { score: 1, spans: [spanOf(match, 'injection_marker')] };
  }

  for (const pattern of INJECTION_PATTERNS) {
    const match = pattern.exec(text);
    if (match) return { score: 1, spans: [spanOf(match, 'injection_pattern')] };
  }

  let suspicion = 0;
  const spans: MatchedSpan[] = [];
  for (const [pattern, weight] of SUSPICION_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      suspicion += weight;
      spans.push(spanOf(match, 'injection_cue'));
    }
  }

  spans.sort((a, b) => a.start - b.start);
  return { score: Math.min(1, suspicion / SUSPICION_SCALE), spans };
}

export const heuristicInjectionDetector: Detector = {
  name: 'heuristic_injection',
  isAvailable: () => true,
  async detect(text: string, threshold: number, options: DetectorOptions = {}): Promise<DetectionResult> {
    const { score, spans } = scoreInjection(text, options.markers);
    return result(score, threshold, options.action, INJECTION_REASON, spans);
  }
};
