import type { Logger } from 'pino';

import { DetectorUnavailableError, RequestCancelledError, errorMessage } from '../errors.js';
import { DETECTION_REASON } from '../detectors/index.js';
import { raceAbort } from '../inference/retry.js';
import type { StrategyRegistry } from '../strategies/index.js';
import {
  KEY_BY_STRATEGY,
  type BackendPolicy,
  type Decision,
  type DetectorPolicies,
  type DetectorPolicy,
  type ExecutionMode,
  type FailureMode,
  type InputDetectorKind,
  type TraceStep
} from '../types/index.js';
import type { TraceRecorder } from './trace.js';

export const FAIL_CLOSED_REASON = 'detector_unavailable_fail_closed';

export interface ScreeningPlan {
  detectors: DetectorPolicies;
  order: readonly InputDetectorKind[];
  execution: ExecutionMode;
  failureMode: FailureMode;
  backend: BackendPolicy;
  /** Prepended to every step name, e.g. `response_` for output screening. */
  stepPrefix?: string;
}

export interface ScreeningOutcome {
  decision: 'allow' | 'block';
  reason?: string;
  /** Steps appended by this run, in the order they were recorded. */
  steps: TraceStep[];
}

interface StepOutcome {
  decision: Decision;
  reason?: string;
}

/**
 * Runs the enabled input-side detectors in policy order and stops at the
 * first block. Every detector that reaches a conclusion gets exactly one
 * trace step; detectors that never ran leave none.
 */
export class DetectionOrchestrator {
  constructor(
    private readonly registry: StrategyRegistry,
    private readonly logger?: Logger
  ) {}

  async run(text: string, plan: ScreeningPlan, trace: TraceRecorder, signal?: AbortSignal): Promise<ScreeningOutcome> {
    const kinds = plan.order.filter((kind) => plan.detectors[kind].enabled);
    return plan.execution === 'concurrent'
      ? this.runConcurrent(text, kinds, plan, trace, signal)
      : this.runSequential(text, kinds, plan, trace, signal);
  }

  private async runSequential(
    text: string,
    kinds: readonly InputDetectorKind[],
    plan: ScreeningPlan,
    trace: TraceRecorder,
    signal?: AbortSignal
  ): Promise<ScreeningOutcome> {
    const steps: TraceStep[] = [];

    for (const kind of kinds) {
      if (signal?.aborted) throw new RequestCancelledError();

      let outcome: StepOutcome;
      try {
        outcome = await this.invoke(kind, text, plan, signal);
      } catch (err) {
        if (signal?.aborted) throw new RequestCancelledError();
        throw err;
      }

      steps.push(this.record(kind, plan, outcome, trace));
      if (outcome.decision === 'block') {
        return { decision: 'block', reason: outcome.reason, steps };
      }
    }

    return { decision: 'allow', steps };
  }

  private async runConcurrent(
    text: string,
    kinds: readonly InputDetectorKind[],
    plan: ScreeningPlan,
    trace: TraceRecorder,
    signal?: AbortSignal
  ): Promise<ScreeningOutcome> {
    if (signal?.aborted) throw new RequestCancelledError();

    const siblings = new AbortController();
    const shared = signal ? AbortSignal.any([signal, siblings.signal]) : siblings.signal;
    const steps: TraceStep[] = [];
    const state: { blocked: boolean; reason?: string } = { blocked: false };

    const tasks = kinds.map(async (kind) => {
      const outcome = await raceAbort(this.invoke(kind, text, plan, shared), shared);
      // Results that arrive after a block are discarded
      if (state.blocked) return;
      steps.push(this.record(kind, plan, outcome, trace));
      if (outcome.decision === 'block') {
        state.blocked = true;
        state.reason = outcome.reason;
        siblings.abort();
      }
    });

    const settled = await Promise.allSettled(tasks);
    if (signal?.aborted) throw new RequestCancelledError();

    for (const outcome of settled) {
      if (outcome.status === 'rejected' && !siblings.signal.aborted) throw outcome.reason;
    }

    return state.blocked ? { decision: 'block', reason: state.reason, steps } : { decision: 'allow', steps };
  }

  private async invoke(kind: InputDetectorKind, text: string, plan: ScreeningPlan, signal?: AbortSignal): Promise<StepOutcome> {
    const entry: DetectorPolicy = plan.detectors[kind];
    const detector = this.registry.resolve(kind, entry.strategy);

    if (!detector.isAvailable()) {
      return this.unavailable(kind, plan, `${detector.name}_unavailable`);
    }

    try {
      const result = await detector.detect(text, entry.threshold, {
        entityTypes: entry.entityTypes,
        markers: entry.markers,
        action: entry.action,
        backend: plan.backend,
        failureMode: plan.failureMode,
        signal
      });
      if (result.decision === 'allow') return { decision: 'allow', reason: result.reason };
      return { decision: result.decision, reason: result.reason ?? DETECTION_REASON[kind] };
    } catch (err) {
      if (err instanceof RequestCancelledError || signal?.aborted) throw err;
      if (err instanceof DetectorUnavailableError) return this.unavailable(kind, plan, err.detail);
      this.logger?.error({ detector: detector.name, error: errorMessage(err) }, 'Detector failed');
      return this.unavailable(kind, plan, 'detector_error');
    }
  }

  private unavailable(kind: InputDetectorKind, plan: ScreeningPlan, detail: string): StepOutcome {
    this.logger?.warn({ detector: kind, detail, failureMode: plan.failureMode }, 'Detector unavailable');
    return plan.failureMode === 'closed'
      ? { decision: 'block', reason: FAIL_CLOSED_REASON }
      : { decision: 'allow', reason: `detector_unavailable:${detail}` };
  }

  private record(kind: InputDetectorKind, plan: ScreeningPlan, outcome: StepOutcome, trace: TraceRecorder): TraceStep {
    return trace.append({
      step_name: `${plan.stepPrefix ?? ''}${kind}`,
      strategy_used: KEY_BY_STRATEGY[plan.detectors[kind].strategy],
      decision: outcome.decision,
      ...(outcome.reason !== undefined ? { reason: outcome.reason } : {})
    });
  }
}
