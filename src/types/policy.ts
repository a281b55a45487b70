export type DetectorKind = 'prompt_injection' | 'harmful_content' | 'pii_redaction';

export type InputDetectorKind = Exclude<DetectorKind, 'pii_redaction'>;

export type StrategyVariant = 'heuristic' | 'model_based' | 'backend_assisted' | 'hybrid';

// Names used in policy files and on the wire
export type StrategyKey = 'heuristic' | 'ml' | 'llm' | 'hybrid';

export type DetectorAction = 'block' | 'flag';

export type FailureMode = 'open' | 'closed';

export type ExecutionMode = 'sequential' | 'concurrent';

export const DETECTOR_KINDS: readonly DetectorKind[] = ['prompt_injection', 'harmful_content', 'pii_redaction'];

export const INPUT_DETECTOR_KINDS: readonly InputDetectorKind[] = ['prompt_injection', 'harmful_content'];

export const STRATEGY_BY_KEY: Readonly<Record<StrategyKey, StrategyVariant>> = {
  heuristic: 'heuristic',
  ml: 'model_based',
  llm: 'backend_assisted',
  hybrid: 'hybrid'
};

export const KEY_BY_STRATEGY: Readonly<Record<StrategyVariant, StrategyKey>> = {
  heuristic: 'heuristic',
  model_based: 'ml',
  backend_assisted: 'llm',
  hybrid: 'hybrid'
};

export interface DetectorPolicy {
  readonly enabled: boolean;
  readonly strategy: StrategyVariant;
  readonly threshold: number;
  /** What a triggered detector does. `flag` records without halting. */
  readonly action: DetectorAction;
  readonly entityTypes: readonly string[];
  /** Extra literal phrases the heuristic strategy treats as hard matches. */
  readonly markers: readonly string[];
}

export type DetectorPolicies = Readonly<Record<DetectorKind, DetectorPolicy>>;

export interface BackendPolicy {
  readonly model: string;
  readonly timeoutMs: number;
  /** Total attempts, first call included. */
  readonly maxAttempts: number;
  readonly backoffMs: number;
  readonly maxBackoffMs: number;
  readonly failureMode: FailureMode;
}

export interface Policy {
  readonly version: string;
  /** sha256 of the canonical policy document */
  readonly fingerprint: string;
  readonly detectors: DetectorPolicies;
  readonly order: readonly InputDetectorKind[];
  readonly execution: ExecutionMode;
  readonly detectorFailureMode: FailureMode;
  readonly backend: BackendPolicy;
  readonly responseScreening: {
    readonly enabled: boolean;
    readonly detectors: DetectorPolicies;
  };
  readonly events: {
    readonly previewChars: number;
  };
}

/** Wire form of a detector entry, as written in policy files and served by /api/policy. */
export interface DetectorPolicyDocument {
  enabled: boolean;
  strategy: StrategyKey;
  threshold: number;
  action: DetectorAction;
  entity_types: string[];
  markers: string[];
}

export interface PolicyDocument {
  version: string;
  fingerprint: string;
  enabled_detectors: Record<DetectorKind, DetectorPolicyDocument>;
  detectors: {
    order: InputDetectorKind[];
    execution: ExecutionMode;
    failure_mode: FailureMode;
  };
  backend: {
    model: string;
    timeout_ms: number;
    max_attempts: number;
    backoff_ms: number;
    max_backoff_ms: number;
    failure_mode: FailureMode;
  };
  response_screening: {
    enabled: boolean;
    detectors: Record<DetectorKind, DetectorPolicyDocument>;
  };
  events: {
    preview_chars: number;
  };
}
