import type { PiiSource, RemovedEntity } from '../types/index.js';
import type { Candidate } from './patterns.js';

// A rendered mask, or one that was already present in the input
export const MASK_TOKEN = /\[[A-Z_]+\]/g;

export function maskFor(label: string): string {
  return `[${label}]`;
}

interface Segment {
  renderedStart: number;
  renderedEnd: number;
  originalStart: number;
  masked: boolean;
}

export interface Rendering {
  text: string;
  segments: Segment[];
}

/** Renders `original` with each region replaced by its mask. Regions must be sorted and disjoint. */
export function render(original: string, regions: readonly RemovedEntity[]): Rendering {
  const segments: Segment[] = [];
  let text = '';
  let cursor = 0;

  const push = (chunk: string, originalStart: number, masked: boolean) => {
    if (chunk.length === 0) return;
    segments.push({ renderedStart: text.length, renderedEnd: text.length + chunk.length, originalStart, masked });
    text += chunk;
  };

  for (const region of regions) {
    push(original.slice(cursor, region.start), cursor, false);
    push(maskFor(region.label), region.start, true);
    cursor = region.end;
  }
  push(original.slice(cursor), cursor, false);

  return { text, segments };
}

function overlaps(a: { start: number; end: number }, b: { start: number; end: number }): boolean {
  return a.start < b.end && b.start < a.end;
}

/** Earliest start wins, then the longer span; later overlapping candidates are dropped. */
export function selectDisjoint(candidates: readonly Candidate[]): Candidate[] {
  const ordered = candidates
    .map((candidate, index) => ({ candidate, index }))
    .sort(
      (a, b) =>
        a.candidate.start - b.candidate.start ||
        b.candidate.end - b.candidate.start - (a.candidate.end - a.candidate.start) ||
        a.index - b.index
    );

  const chosen: Candidate[] = [];
  for (const { candidate } of ordered) {
    const last = chosen[chosen.length - 1];
    if (!last || candidate.start >= last.end) chosen.push(candidate);
  }
  return chosen;
}

/**
 * Maps candidates found in the rendered text back to original offsets.
 * Candidates touching any mask token are dropped, so a pass never reaches
 * into text that is already redacted.
 */
export function toOriginal(rendering: Rendering, candidates: readonly Candidate[], source: PiiSource): RemovedEntity[] {
  const masks = Array.from(rendering.text.matchAll(MASK_TOKEN), (m) => {
    const start = m.index ?? 0;
    return { start, end: start + m[0].length };
  });

  const mapped: RemovedEntity[] = [];
  for (const candidate of selectDisjoint(candidates)) {
    if (masks.some((mask) => overlaps(mask, candidate))) continue;
    const segment = rendering.segments.find(
      (s) => !s.masked && s.renderedStart <= candidate.start && candidate.end <= s.renderedEnd
    );
    if (!segment) continue;
    const offset = segment.originalStart - segment.renderedStart;
    mapped.push({ start: candidate.start + offset, end: candidate.end + offset, label: candidate.label, source });
  }
  return mapped;
}

export function mergeRegions(existing: readonly RemovedEntity[], added: readonly RemovedEntity[]): RemovedEntity[] {
  return [...existing, ...added].sort((a, b) => a.start - b.start);
}
