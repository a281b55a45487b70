import { DetectorUnavailableError, UnsupportedStrategyError } from '../errors.js';
import {
  createBackendJudge,
  createHybridDetector,
  createLexicalDetector,
  heuristicHarmfulDetector,
  heuristicInjectionDetector,
  type Lexicon
} from '../detectors/index.js';
import type { GenerationBackend } from '../inference/router.js';
import type { RedactionEngine, RedactionOutcome } from '../redaction/index.js';
import {
  DETECTOR_KINDS,
  INPUT_DETECTOR_KINDS,
  KEY_BY_STRATEGY,
  type BackendPolicy,
  type Detector,
  type DetectorKind,
  type DetectionResult,
  type InputDetectorKind,
  type Policy,
  type StrategyVariant
} from '../types/index.js';

export interface RedactorOptions {
  entityTypes: readonly string[];
  backend?: BackendPolicy;
  signal?: AbortSignal;
}

/** A `pii_redaction` strategy: masks the text and reports what it removed. */
export interface Redactor {
  readonly name: string;
  redact(text: string, options: RedactorOptions): Promise<RedactionOutcome>;
}

type RegistryKey = `${InputDetectorKind}:${StrategyVariant}`;

function keyOf(kind: InputDetectorKind, variant: StrategyVariant): RegistryKey {
  return `${kind}:${variant}`;
}

/**
 * Maps (detector kind, strategy) pairs to implementations: detectors for the
 * input kinds, redactors for `pii_redaction`. Built once at startup; every
 * pair an enabled policy entry names must resolve.
 */
export class StrategyRegistry {
  private readonly entries = new Map<RegistryKey, { kind: InputDetectorKind; variant: StrategyVariant; detector: Detector }>();
  private readonly redactors = new Map<StrategyVariant, Redactor>();

  register(kind: InputDetectorKind, variant: StrategyVariant, detector: Detector): this {
    this.entries.set(keyOf(kind, variant), { kind, variant, detector });
    return this;
  }

  registerRedactor(variant: StrategyVariant, redactor: Redactor): this {
    this.redactors.set(variant, redactor);
    return this;
  }

  has(kind: DetectorKind, variant: StrategyVariant): boolean {
    return kind === 'pii_redaction' ? this.redactors.has(variant) : this.entries.has(keyOf(kind, variant));
  }

  resolve(kind: InputDetectorKind, variant: StrategyVariant): Detector {
    const entry = this.entries.get(keyOf(kind, variant));
    if (!entry) {
      throw new UnsupportedStrategyError(kind, KEY_BY_STRATEGY[variant]);
    }
    return entry.detector;
  }

  resolveRedactor(variant: StrategyVariant): Redactor {
    const redactor = this.redactors.get(variant);
    if (!redactor) {
      throw new UnsupportedStrategyError('pii_redaction', KEY_BY_STRATEGY[variant]);
    }
    return redactor;
  }

  /** Throws UnsupportedStrategyError for the first enabled entry that does not resolve. */
  assertSupports(policy: Policy): void {
    const tables = policy.responseScreening.enabled
      ? [policy.detectors, policy.responseScreening.detectors]
      : [policy.detectors];
    for (const table of tables) {
      for (const kind of DETECTOR_KINDS) {
        const entry = table[kind];
        if (!entry.enabled) continue;
        if (kind === 'pii_redaction') this.resolveRedactor(entry.strategy);
        else this.resolve(kind, entry.strategy);
      }
    }
  }

  /** Registered pairs with their current availability, for the health endpoint. */
  describe(): { kind: string; strategy: string; detector: string; available: boolean }[] {
    const detectors = Array.from(this.entries.values(), ({ kind, variant, detector }) => ({
      kind,
      strategy: KEY_BY_STRATEGY[variant],
      detector: detector.name,
      available: detector.isAvailable()
    }));
    const redactors = Array.from(this.redactors, ([variant, redactor]) => ({
      kind: 'pii_redaction',
      strategy: KEY_BY_STRATEGY[variant],
      detector: redactor.name,
      available: true
    }));
    return [...detectors, ...redactors];
  }
}

/** Stands in for a strategy whose dependency is missing from this process. */
export function unavailableDetector(name: string, detail: string): Detector {
  return {
    name,
    isAvailable: () => false,
    async detect(): Promise<DetectionResult> {
      throw new DetectorUnavailableError(detail);
    }
  };
}

/** Binds the redaction engine to one strategy's passes. */
export function createRedactor(engine: RedactionEngine, variant: StrategyVariant): Redactor {
  return {
    name: `pii_${KEY_BY_STRATEGY[variant]}`,
    redact: (text, options) => engine.redact(text, { ...options, strategy: variant })
  };
}

export interface RegistryDependencies {
  redaction: RedactionEngine;
  lexicon?: Lexicon;
  backend?: GenerationBackend;
  backendName?: string;
}

const HEURISTICS: Record<InputDetectorKind, Detector> = {
  prompt_injection: heuristicInjectionDetector,
  harmful_content: heuristicHarmfulDetector
};

export function createDefaultRegistry(deps: RegistryDependencies): StrategyRegistry {
  const registry = new StrategyRegistry();

  for (const kind of INPUT_DETECTOR_KINDS) {
    const heuristic = HEURISTICS[kind];
    const judge = deps.backend
      ? createBackendJudge(kind, deps.backend, deps.backendName)
      : unavailableDetector(`backend_judge_${kind}`, 'backend_not_configured');

    registry.register(kind, 'heuristic', heuristic);
    registry.register(kind, 'backend_assisted', judge);
    registry.register(kind, 'hybrid', createHybridDetector(`hybrid_${kind}`, [heuristic, judge]));

    const lexical = deps.lexicon ? createLexicalDetector(kind, deps.lexicon) : undefined;
    if (lexical) registry.register(kind, 'model_based', lexical);
  }

  const variants: StrategyVariant[] = ['heuristic', 'model_based', 'backend_assisted', 'hybrid'];
  for (const variant of variants) {
    registry.registerRedactor(variant, createRedactor(deps.redaction, variant));
  }

  return registry;
}
