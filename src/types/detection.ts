import type { BackendPolicy, FailureMode, StrategyKey } from './policy.js';

export type Decision = 'allow' | 'block' | 'flag';

export type TraceDecision = Decision | 'redacted';

export interface MatchedSpan {
  start: number;
  end: number;
  label: string;
}

export interface DetectionResult {
  decision: Decision;
  /** In [0, 1]; absent when the strategy produces no score. */
  score?: number;
  reason?: string;
  matchedSpans: MatchedSpan[];
}

export interface DetectorOptions {
  entityTypes?: readonly string[];
  markers?: readonly string[];
  action?: 'block' | 'flag';
  /** Timeout and retry settings for strategies that call the generation backend. */
  backend?: BackendPolicy;
  /** Detector failure posture. Composite strategies treat a missing sub-strategy as a failure under `closed`. */
  failureMode?: FailureMode;
  signal?: AbortSignal;
}

export type DetectorFn = (text: string, threshold: number, options?: DetectorOptions) => Promise<DetectionResult>;

/**
 * A detector implementation. `isAvailable()` is checked before every call;
 * an unavailable detector is never invoked.
 */
export interface Detector {
  readonly name: string;
  isAvailable(): boolean;
  detect: DetectorFn;
}

export type PiiSource = 'pattern' | 'entity' | 'backend';

export interface RemovedEntity {
  /** Offsets into the text before any redaction. */
  start: number;
  end: number;
  label: string;
  source: PiiSource;
}

export interface RedactionResult {
  redactedText: string;
  entitiesRemoved: RemovedEntity[];
}

export interface TraceStep {
  readonly step_name: string;
  readonly strategy_used?: StrategyKey;
  readonly decision: TraceDecision;
  readonly reason?: string;
  readonly sequence_index: number;
}

export type TraceStepInput = Omit<TraceStep, 'sequence_index'>;

/** Read side of a request's trace. */
export interface TraceView {
  steps(): readonly TraceStep[];
  readonly length: number;
}
