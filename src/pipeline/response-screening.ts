import type { RedactionOutcome } from '../redaction/index.js';
import type { StrategyRegistry } from '../strategies/index.js';
import { KEY_BY_STRATEGY, type DetectorPolicy, type Policy, type TraceStepInput } from '../types/index.js';
import type { DetectionOrchestrator } from './orchestrator.js';
import type { TraceRecorder } from './trace.js';

export const RESPONSE_STEP_PREFIX = 'response_';

/** Trace entry for a redaction pass: `redacted` when anything was masked. */
export function redactionStep(stepName: string, entry: DetectorPolicy, outcome: RedactionOutcome): TraceStepInput {
  const labels = Array.from(new Set(outcome.entitiesRemoved.map((entity) => entity.label)));
  const parts = [...(labels.length > 0 ? [`masked:${labels.join(',')}`] : []), ...outcome.notes];
  return {
    step_name: stepName,
    strategy_used: KEY_BY_STRATEGY[entry.strategy],
    decision: outcome.entitiesRemoved.length > 0 ? 'redacted' : 'allow',
    ...(parts.length > 0 ? { reason: parts.join(';') } : {})
  };
}

export type ResponseScreeningOutcome =
  | { decision: 'allow'; text: string; redaction?: RedactionOutcome }
  | { decision: 'block'; reason: string };

/**
 * Output-side screening: the input detectors run again over the generated
 * text, then PII redaction. A block never carries the generated text.
 */
export class ResponseScreeningOrchestrator {
  constructor(
    private readonly orchestrator: DetectionOrchestrator,
    private readonly registry: StrategyRegistry
  ) {}

  async screen(text: string, policy: Policy, trace: TraceRecorder, signal?: AbortSignal): Promise<ResponseScreeningOutcome> {
    const { enabled, detectors } = policy.responseScreening;
    if (!enabled) return { decision: 'allow', text };

    const outcome = await this.orchestrator.run(
      text,
      {
        detectors,
        order: policy.order,
        execution: policy.execution,
        failureMode: policy.detectorFailureMode,
        backend: policy.backend,
        stepPrefix: RESPONSE_STEP_PREFIX
      },
      trace,
      signal
    );
    if (outcome.decision === 'block') {
      return { decision: 'block', reason: outcome.reason ?? 'response_blocked' };
    }

    const pii = detectors.pii_redaction;
    if (!pii.enabled) return { decision: 'allow', text };

    const redaction = await this.registry.resolveRedactor(pii.strategy).redact(text, {
      entityTypes: pii.entityTypes,
      backend: policy.backend,
      signal
    });
    trace.append(redactionStep(`${RESPONSE_STEP_PREFIX}pii_redaction`, pii, redaction));
    return { decision: 'allow', text: redaction.redactedText, redaction };
  }
}
