import { describe, it, expect, vi, type Mock } from 'vitest';

import { DetectorUnavailableError, RequestCancelledError } from '../errors.js';
import { createHybridDetector, heuristicInjectionDetector } from '../detectors/index.js';
import { validatePolicy } from '../policy/index.js';
import { StrategyRegistry, unavailableDetector } from '../strategies/index.js';
import { policyDocument, silentLogger } from '../testing/helpers.js';
import type { DetectionResult, Detector, DetectorFn, Policy } from '../types/index.js';
import { DetectionOrchestrator, FAIL_CLOSED_REASON, type ScreeningPlan } from './orchestrator.js';
import { TraceRecorder } from './trace.js';

type FakeDetector = Detector & { detect: Mock<DetectorFn> };

function fake(name: string, impl: DetectorFn, available = true): FakeDetector {
  return { name, isAvailable: () => available, detect: vi.fn<DetectorFn>(impl) };
}

const returning = (result: DetectionResult): DetectorFn => async () => result;

const hanging: DetectorFn = (_text, _threshold, options) => {
  const signal = options?.signal;
  return new Promise<DetectionResult>((_resolve, reject) => {
    if (signal?.aborted) return reject(signal.reason);
    signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
};

const BLOCK: DetectionResult = { decision: 'block', score: 1, reason: 'prompt_injection_detected', matchedSpans: [] };
const ALLOW: DetectionResult = { decision: 'allow', score: 0, matchedSpans: [] };

function planOf(policy: Policy, overrides: Partial<ScreeningPlan> = {}): ScreeningPlan {
  return {
    detectors: policy.detectors,
    order: policy.order,
    execution: policy.execution,
    failureMode: policy.detectorFailureMode,
    backend: policy.backend,
    ...overrides
  };
}

function setup(injection: FakeDetector, harmful: FakeDetector) {
  const registry = new StrategyRegistry()
    .register('prompt_injection', 'heuristic', injection)
    .register('harmful_content', 'heuristic', harmful);
  return {
    orchestrator: new DetectionOrchestrator(registry, silentLogger()),
    policy: validatePolicy(policyDocument()),
    trace: new TraceRecorder()
  };
}

describe('DetectionOrchestrator', () => {
  describe('sequential', () => {
    it('stops at the first block', async () => {
      const injection = fake('injection', returning(BLOCK));
      const harmful = fake('harmful', returning(ALLOW));
      const { orchestrator, policy, trace } = setup(injection, harmful);

      const outcome = await orchestrator.run('text', planOf(policy), trace);

      expect(outcome.decision).toBe('block');
      expect(outcome.reason).toBe('prompt_injection_detected');
      expect(trace.steps()).toEqual([
        {
          step_name: 'prompt_injection',
          strategy_used: 'heuristic',
          decision: 'block',
          reason: 'prompt_injection_detected',
          sequence_index: 0
        }
      ]);
      expect(harmful.detect).not.toHaveBeenCalled();
    });

    it('passes the policy entry to the detector', async () => {
      const injection = fake('injection', returning(ALLOW));
      const { orchestrator, policy, trace } = setup(injection, fake('harmful', returning(ALLOW)));

      await orchestrator.run('text', planOf(policy), trace);

      expect(injection.detect.mock.calls[0]?.[1]).toBe(0.5);
      expect(injection.detect.mock.calls[0]?.[2]).toMatchObject({
        markers: ['ignore previous instructions'],
        action: 'block'
      });
    });

    it('records a flag and keeps going', async () => {
      const injection = fake('injection', returning({ decision: 'flag', matchedSpans: [] }));
      const harmful = fake('harmful', returning(ALLOW));
      const { orchestrator, policy, trace } = setup(injection, harmful);

      const outcome = await orchestrator.run('text', planOf(policy), trace);

      expect(outcome.decision).toBe('allow');
      expect(trace.steps().map((step) => [step.step_name, step.decision, step.reason])).toEqual([
        ['prompt_injection', 'flag', 'prompt_injection_detected'],
        ['harmful_content', 'allow', undefined]
      ]);
    });

    it('follows the policy order and skips disabled detectors', async () => {
      const doc = policyDocument();
      doc.detectors.order = ['harmful_content', 'prompt_injection'];
      doc.enabled_detectors.prompt_injection.enabled = false;
      const injection = fake('injection', returning(BLOCK));
      const harmful = fake('harmful', returning(ALLOW));
      const { orchestrator, trace } = setup(injection, harmful);

      const outcome = await orchestrator.run('text', planOf(validatePolicy(doc)), trace);

      expect(outcome.decision).toBe('allow');
      expect(trace.steps().map((step) => step.step_name)).toEqual(['harmful_content']);
      expect(injection.detect).not.toHaveBeenCalled();
    });

    it('prefixes step names', async () => {
      const { orchestrator, policy, trace } = setup(fake('i', returning(ALLOW)), fake('h', returning(ALLOW)));
      await orchestrator.run('text', planOf(policy, { stepPrefix: 'response_' }), trace);
      expect(trace.steps().map((step) => step.step_name)).toEqual(['response_prompt_injection', 'response_harmful_content']);
    });
  });

  describe('unavailable detectors', () => {
    it('allow with a reason under fail-open', async () => {
      const injection = fake('judge', returning(BLOCK), false);
      const harmful = fake('harmful', returning(ALLOW));
      const { orchestrator, policy, trace } = setup(injection, harmful);

      const outcome = await orchestrator.run('text', planOf(policy), trace);

      expect(outcome.decision).toBe('allow');
      expect(trace.steps()[0]).toMatchObject({ decision: 'allow', reason: 'detector_unavailable:judge_unavailable' });
      expect(injection.detect).not.toHaveBeenCalled();
      expect(harmful.detect).toHaveBeenCalledTimes(1);
    });

    it('block under fail-closed', async () => {
      const harmful = fake('harmful', returning(ALLOW));
      const { orchestrator, policy, trace } = setup(fake('judge', returning(ALLOW), false), harmful);

      const outcome = await orchestrator.run('text', planOf(policy, { failureMode: 'closed' }), trace);

      expect(outcome).toMatchObject({ decision: 'block', reason: FAIL_CLOSED_REASON });
      expect(harmful.detect).not.toHaveBeenCalled();
    });

    it('blocks a hybrid missing its backend judge under fail-closed', async () => {
      const hybrid = createHybridDetector('hybrid_prompt_injection', [
        heuristicInjectionDetector,
        unavailableDetector('backend_judge_prompt_injection', 'backend_not_configured')
      ]);
      const document = policyDocument();
      document.enabled_detectors.prompt_injection.strategy = 'hybrid';
      const registry = new StrategyRegistry()
        .register('prompt_injection', 'hybrid', hybrid)
        .register('harmful_content', 'heuristic', fake('harmful', returning(ALLOW)));
      const policy = validatePolicy(document);
      const trace = new TraceRecorder();

      const closed = await new DetectionOrchestrator(registry, silentLogger()).run(
        'What is diabetes?',
        planOf(policy, { failureMode: 'closed' }),
        trace
      );
      const open = await new DetectionOrchestrator(registry, silentLogger()).run(
        'What is diabetes?',
        planOf(policy),
        new TraceRecorder()
      );

      expect(closed).toMatchObject({ decision: 'block', reason: FAIL_CLOSED_REASON });
      expect(trace.steps()).toEqual([
        {
          step_name: 'prompt_injection',
          strategy_used: 'hybrid',
          decision: 'block',
          reason: FAIL_CLOSED_REASON,
          sequence_index: 0
        }
      ]);
      expect(open.decision).toBe('allow');
      expect(open.steps[0]).toMatchObject({
        decision: 'allow',
        reason: 'degraded:backend_judge_prompt_injection_unavailable'
      });
    });

    it('uses the detail of a DetectorUnavailableError', async () => {
      const injection = fake('judge', async () => {
        throw new DetectorUnavailableError('backend_unavailable');
      });
      const { orchestrator, policy, trace } = setup(injection, fake('harmful', returning(ALLOW)));

      await orchestrator.run('text', planOf(policy), trace);

      expect(trace.steps()[0]?.reason).toBe('detector_unavailable:backend_unavailable');
    });

    it('treats other detector errors as unavailable', async () => {
      const injection = fake('broken', async () => {
        throw new Error('boom');
      });
      const { orchestrator, policy, trace } = setup(injection, fake('harmful', returning(ALLOW)));

      await orchestrator.run('text', planOf(policy), trace);

      expect(trace.steps()[0]?.reason).toBe('detector_unavailable:detector_error');
    });
  });

  describe('concurrent', () => {
    it('aborts siblings after a block and discards their results', async () => {
      const injection = fake('injection', returning(BLOCK));
      const harmful = fake('harmful', hanging);
      const { orchestrator, policy, trace } = setup(injection, harmful);

      const outcome = await orchestrator.run('text', planOf(policy, { execution: 'concurrent' }), trace);

      expect(outcome).toMatchObject({ decision: 'block', reason: 'prompt_injection_detected' });
      expect(trace.length).toBe(1);
      expect(harmful.detect.mock.calls[0]?.[2]?.signal?.aborted).toBe(true);
    });

    it('records every step when nothing blocks', async () => {
      const { orchestrator, policy, trace } = setup(fake('i', returning(ALLOW)), fake('h', returning(ALLOW)));

      const outcome = await orchestrator.run('text', planOf(policy, { execution: 'concurrent' }), trace);

      expect(outcome.decision).toBe('allow');
      expect(trace.steps().map((step) => step.sequence_index)).toEqual([0, 1]);
    });

    it('raises RequestCancelledError when the caller aborts', async () => {
      const { orchestrator, policy, trace } = setup(fake('i', hanging), fake('h', hanging));
      const controller = new AbortController();

      const running = orchestrator.run('text', planOf(policy, { execution: 'concurrent' }), trace, controller.signal);
      controller.abort();

      await expect(running).rejects.toBeInstanceOf(RequestCancelledError);
      expect(trace.length).toBe(0);
    });
  });

  it('raises RequestCancelledError when a sequential run is aborted', async () => {
    const harmful = fake('h', returning(ALLOW));
    const { orchestrator, policy, trace } = setup(fake('i', hanging), harmful);
    const controller = new AbortController();

    const running = orchestrator.run('text', planOf(policy), trace, controller.signal);
    controller.abort();

    await expect(running).rejects.toBeInstanceOf(RequestCancelledError);
    expect(harmful.detect).not.toHaveBeenCalled();
  });
});
