import { DetectorUnavailableError, RequestCancelledError, errorMessage, isAbortError } from '../errors.js';
import type { Decision, Detector, DetectorOptions, DetectionResult, MatchedSpan } from '../types/index.js';

const RANK: Record<Decision, number> = { allow: 0, flag: 1, block: 2 };

/**
 * Logical OR of sub-decisions (block > flag > allow); score is the max of the
 * scores that were reported.
 */
export function combineResults(results: readonly DetectionResult[]): DetectionResult {
  let decision: Decision = 'allow';
  let reason: string | undefined;
  let score: number | undefined;
  const spans: MatchedSpan[] = [];

  for (const r of results) {
    if (RANK[r.decision] > RANK[decision]) {
      decision = r.decision;
      reason = r.reason;
    }
    if (r.score !== undefined) score = score === undefined ? r.score : Math.max(score, r.score);
    spans.push(...r.matchedSpans);
  }

  spans.sort((a, b) => a.start - b.start || a.end - b.end);
  return {
    decision,
    ...(score !== undefined ? { score } : {}),
    ...(reason !== undefined ? { reason } : {}),
    matchedSpans: spans
  };
}

function withDegradation(combined: DetectionResult, degraded: readonly string[]): DetectionResult {
  if (degraded.length === 0) return combined;
  const notes = degraded.map((detail) => `degraded:${detail}`).join(';');
  return { ...combined, reason: combined.reason ? `${combined.reason};${notes}` : notes };
}

/**
 * Runs every available sub-detector concurrently and ORs the outcomes. A sub
 * that is unavailable or fails is recorded in the reason. The hybrid itself is
 * unavailable when no sub produced a result, or under `failureMode: closed`
 * when any sub is missing and the others did not block.
 */
export function createHybridDetector(name: string, subs: readonly Detector[]): Detector {
  return {
    name,
    isAvailable: () => subs.some((sub) => sub.isAvailable()),
    async detect(text: string, threshold: number, options: DetectorOptions = {}): Promise<DetectionResult> {
      const degraded: string[] = [];
      const running: Promise<DetectionResult>[] = [];

      for (const sub of subs) {
        if (sub.isAvailable()) running.push(sub.detect(text, threshold, options));
        else degraded.push(`${sub.name}_unavailable`);
      }

      const settled = await Promise.allSettled(running);
      const results: DetectionResult[] = [];
      for (const outcome of settled) {
        if (outcome.status === 'fulfilled') {
          results.push(outcome.value);
          continue;
        }
        const err: unknown = outcome.reason;
        if (err instanceof RequestCancelledError) throw err;
        if (options.signal?.aborted && isAbortError(err)) throw new RequestCancelledError();
        degraded.push(err instanceof DetectorUnavailableError ? err.detail : `sub_strategy_failed(${errorMessage(err)})`);
      }

      if (results.length === 0) {
        throw new DetectorUnavailableError(degraded.join(','), `No ${name} sub-strategy produced a result`);
      }
      const combined = combineResults(results);
      if (degraded.length > 0 && options.failureMode === 'closed' && combined.decision !== 'block') {
        throw new DetectorUnavailableError(degraded.join(','), `${name} is missing a sub-strategy`);
      }
      return withDegradation(combined, degraded);
    }
  };
}
