import type { Decision, DetectionResult, InputDetectorKind, MatchedSpan } from '../types/index.js';

export const DETECTION_REASON: Readonly<Record<InputDetectorKind, string>> = {
  prompt_injection: 'prompt_injection_detected',
  harmful_content: 'harmful_content_detected'
};

/** A detector triggers iff its score reaches the threshold. */
export function isTriggered(score: number, threshold: number): boolean {
  return score >= threshold;
}

export function decide(score: number, threshold: number, action: 'block' | 'flag' = 'block'): Decision {
  return isTriggered(score, threshold) ? action : 'allow';
}

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

export function result(
  score: number,
  threshold: number,
  action: 'block' | 'flag' | undefined,
  reason: string,
  matchedSpans: MatchedSpan[]
): DetectionResult {
  const decision = decide(score, threshold, action);
  return {
    decision,
    score: Number(clamp01(score).toFixed(3)),
    ...(decision !== 'allow' ? { reason } : {}),
    matchedSpans: decision !== 'allow' ? matchedSpans : []
  };
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Case-insensitive, whitespace-tolerant literal match
export function markerPattern(marker: string): RegExp {
  const words = marker.trim().split(/\s+/).map(escapeRegExp);
  return new RegExp(words.join('\\s+'), 'i');
}

export function spanOf(match: RegExpExecArray, label: string): MatchedSpan {
  return { start: match.index, end: match.index + match[0].length, label };
}
