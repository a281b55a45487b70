import type { TraceStep, TraceStepInput } from '../types/index.js';

/** Append-only step record for one request. Never shared across requests. */
export class TraceRecorder {
  private readonly recorded: TraceStep[] = [];

  append(step: TraceStepInput): TraceStep {
    const frozen: TraceStep = Object.freeze({
      step_name: step.step_name,
      ...(step.strategy_used !== undefined ? { strategy_used: step.strategy_used } : {}),
      decision: step.decision,
      ...(step.reason !== undefined ? { reason: step.reason } : {}),
      sequence_index: this.recorded.length
    });
    this.recorded.push(frozen);
    return frozen;
  }

  steps(): readonly TraceStep[] {
    return Object.freeze([...this.recorded]);
  }

  get length(): number {
    return this.recorded.length;
  }
}
