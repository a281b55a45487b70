import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';

import { ExternalServiceError, IllegalTransitionError, RequestCancelledError, ValidationError, errorMessage } from '../errors.js';
import type { EventLogger } from '../events/index.js';
import type { GenerationBackend } from '../inference/router.js';
import { withRetry } from '../inference/retry.js';
import type { PolicyStore } from '../policy/index.js';
import type { RedactionEngine } from '../redaction/index.js';
import type { SessionExchange, SessionStore } from '../sessions/index.js';
import type { StrategyRegistry } from '../strategies/index.js';
import {
  BACKEND_FALLBACK_MESSAGE,
  WITHHELD_OUTPUT,
  type PipelineState,
  type Policy,
  type RequestContext,
  type ShieldEventType,
  type ShieldRequest,
  type ShieldResponse,
  type TerminalState
} from '../types/index.js';
import type { DetectionOrchestrator } from './orchestrator.js';
import { redactionStep, type ResponseScreeningOrchestrator } from './response-screening.js';
import { TraceRecorder } from './trace.js';

export const BACKEND_STEP = 'backend_generation';
export const BACKEND_FAIL_OPEN_REASON = 'backend_unavailable_fail_open';
export const BACKEND_FAIL_CLOSED_REASON = 'backend_unavailable_fail_closed';

const SESSION_ID_PATTERN = /^[A-Za-z0-9_.:-]{1,128}$/;

const TRANSITIONS: Readonly<Record<PipelineState, readonly PipelineState[]>> = {
  received: ['input_screening'],
  input_screening: ['blocked_input', 'redacting'],
  redacting: ['backend_invocation'],
  // A fail-closed backend ends the request without output screening
  backend_invocation: ['output_screening', 'blocked_output'],
  output_screening: ['blocked_output', 'completed'],
  blocked_input: [],
  blocked_output: [],
  completed: []
};

export function transition(ctx: RequestContext, to: PipelineState): void {
  if (!TRANSITIONS[ctx.state].includes(to)) {
    throw new IllegalTransitionError(ctx.state, to);
  }
  ctx.state = to;
}

export function validateShieldRequest(body: unknown, maxInputChars?: number): ShieldRequest {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  const prompt = 'prompt' in body ? body.prompt : undefined;
  if (typeof prompt !== 'string' || prompt.trim() === '') {
    throw new ValidationError('Field "prompt" must be a non-empty string');
  }
  if (maxInputChars !== undefined && prompt.length > maxInputChars) {
    throw new ValidationError(`Field "prompt" exceeds ${maxInputChars} characters`);
  }

  const sessionId = 'session_id' in body ? body.session_id : undefined;
  if (sessionId === undefined || sessionId === null) return { prompt };
  if (typeof sessionId !== 'string' || !SESSION_ID_PATTERN.test(sessionId)) {
    throw new ValidationError('Field "session_id" must be 1-128 characters of [A-Za-z0-9_.:-]');
  }
  return { prompt, session_id: sessionId };
}

export function withSessionHistory(history: readonly SessionExchange[], prompt: string): string {
  if (history.length === 0) return prompt;
  const turns = history.map((turn) => `User: ${turn.prompt}\nAssistant: ${turn.response}`);
  return `Previous conversation:\n${turns.join('\n')}\n\nUser: ${prompt}`;
}

export interface ShieldPipelineDependencies {
  policies: PolicyStore;
  orchestrator: DetectionOrchestrator;
  screening: ResponseScreeningOrchestrator;
  registry: StrategyRegistry;
  /** Pattern masking for event previews. */
  redaction: RedactionEngine;
  backend: GenerationBackend;
  backendName?: string;
  events: EventLogger;
  sessions?: SessionStore;
  logger: Logger;
  maxInputChars?: number;
}

type BackendOutcome =
  | { kind: 'generated'; text: string }
  | { kind: 'fallback'; text: string }
  | { kind: 'failed'; reason: string };

/**
 * Coordinates one request through input screening, redaction, generation
 * and output screening. Each terminal state emits exactly one event.
 */
export class ShieldPipeline {
  private readonly deps: ShieldPipelineDependencies;
  private readonly logger: Logger;

  constructor(deps: ShieldPipelineDependencies) {
    this.deps = deps;
    this.logger = deps.logger;
  }

  async handle(body: unknown, signal?: AbortSignal): Promise<ShieldResponse> {
    const request = validateShieldRequest(body, this.deps.maxInputChars);
    // One snapshot per request; a reload mid-request does not affect it
    const policy = this.deps.policies.current();
    const trace = new TraceRecorder();
    const ctx: RequestContext = {
      requestId: uuidv4(),
      sessionId: request.session_id,
      originalPrompt: request.prompt,
      state: 'received',
      trace
    };
    const log = this.logger.child({ request_id: ctx.requestId });

    try {
      return await this.run(ctx, trace, policy, log, signal);
    } catch (err) {
      if (err instanceof RequestCancelledError) {
        log.info({ state: ctx.state }, 'Request cancelled');
      }
      throw err;
    }
  }

  private async run(
    ctx: RequestContext,
    trace: TraceRecorder,
    policy: Policy,
    log: Logger,
    signal?: AbortSignal
  ): Promise<ShieldResponse> {
    const { orchestrator, screening, registry, redaction } = this.deps;

    transition(ctx, 'input_screening');
    const input = await orchestrator.run(
      ctx.originalPrompt,
      {
        detectors: policy.detectors,
        order: policy.order,
        execution: policy.execution,
        failureMode: policy.detectorFailureMode,
        backend: policy.backend
      },
      trace,
      signal
    );

    if (input.decision === 'block') {
      const reason = input.reason ?? 'blocked';
      this.finish(ctx, 'blocked_input', reason);
      await this.emit('BLOCK', redaction.mask(ctx.originalPrompt), ctx, policy, log, { stage: 'input', reason });
      return { status: 'blocked', reason, trace: trace.steps(), request_id: ctx.requestId };
    }

    transition(ctx, 'redacting');
    const pii = policy.detectors.pii_redaction;
    let processed = ctx.originalPrompt;
    if (pii.enabled) {
      const redacted = await registry.resolveRedactor(pii.strategy).redact(ctx.originalPrompt, {
        entityTypes: pii.entityTypes,
        backend: policy.backend,
        signal
      });
      trace.append(redactionStep('pii_redaction', pii, redacted));
      processed = redacted.redactedText;
      if (redacted.entitiesRemoved.length > 0) {
        await this.emit('REDACT', redacted.redactedText, ctx, policy, log, {
          stage: 'input',
          entities_removed: String(redacted.entitiesRemoved.length),
          labels: Array.from(new Set(redacted.entitiesRemoved.map((e) => e.label))).join(',')
        });
      }
    }

    ctx.processedPrompt = processed;

    transition(ctx, 'backend_invocation');
    const generated = await this.generate(processed, ctx.sessionId, policy, log, signal);
    if (generated.kind === 'failed') {
      trace.append({ step_name: BACKEND_STEP, decision: 'block', reason: generated.reason });
      return this.blockOutput(ctx, trace, policy, log, generated.reason);
    }
    ctx.backendResponse = generated.text;
    trace.append({
      step_name: BACKEND_STEP,
      decision: 'allow',
      ...(generated.kind === 'fallback' ? { reason: BACKEND_FAIL_OPEN_REASON } : {})
    });

    transition(ctx, 'output_screening');
    const output = await screening.screen(generated.text, policy, trace, signal);
    if (output.decision === 'block') {
      return this.blockOutput(ctx, trace, policy, log, output.reason);
    }

    ctx.finalResponse = output.text;
    if (output.redaction && output.redaction.entitiesRemoved.length > 0) {
      await this.emit('REDACT', output.text, ctx, policy, log, {
        stage: 'output',
        entities_removed: String(output.redaction.entitiesRemoved.length)
      });
    }

    this.finish(ctx, 'completed');
    if (ctx.sessionId && this.deps.sessions) {
      this.deps.sessions.append(ctx.sessionId, processed, output.text);
    }
    await this.emit('SUCCESS', output.text, ctx, policy, log, { steps: String(trace.length) });

    return {
      status: 'success',
      original_prompt: ctx.originalPrompt,
      processed_prompt: processed,
      llm_response: output.text,
      trace: trace.steps(),
      request_id: ctx.requestId
    };
  }

  /**
   * Calls the backend under the policy's retry settings. Exhaustion resolves
   * by `backend.failure_mode`: open substitutes a fallback message, closed
   * reports the failure. Cancellation propagates.
   */
  private async generate(
    prompt: string,
    sessionId: string | undefined,
    policy: Policy,
    log: Logger,
    signal?: AbortSignal
  ): Promise<BackendOutcome> {
    const { backend, backendName, sessions } = this.deps;
    const input = sessionId && sessions ? withSessionHistory(sessions.history(sessionId), prompt) : prompt;

    try {
      if (!backend.isAvailable(backendName)) {
        throw new ExternalServiceError(`Backend ${backendName ?? '(default)'} is not available`, 0);
      }
      const response = await withRetry(
        (attemptSignal) => backend.infer({ input, model: policy.backend.model, signal: attemptSignal }, backendName),
        policy.backend,
        {
          signal,
          onRetry: (attempt, error, delayMs) =>
            log.warn({ attempt, delayMs, error: errorMessage(error) }, 'Backend call failed, retrying')
        }
      );
      return { kind: 'generated', text: response.output };
    } catch (err) {
      if (!(err instanceof ExternalServiceError)) throw err;
      log.error({ error: err.message, failureMode: policy.backend.failureMode }, 'Backend unavailable');
      return policy.backend.failureMode === 'open'
        ? { kind: 'fallback', text: BACKEND_FALLBACK_MESSAGE }
        : { kind: 'failed', reason: BACKEND_FAIL_CLOSED_REASON };
    }
  }

  private async blockOutput(
    ctx: RequestContext,
    trace: TraceRecorder,
    policy: Policy,
    log: Logger,
    reason: string
  ): Promise<ShieldResponse> {
    this.finish(ctx, 'blocked_output', reason);
    // The preview shows the redacted prompt; blocked output is never logged
    await this.emit('BLOCK', ctx.processedPrompt ?? '', ctx, policy, log, { stage: 'output', reason });
    return {
      status: 'blocked_response',
      reason,
      llm_output_blocked: WITHHELD_OUTPUT,
      trace: trace.steps(),
      request_id: ctx.requestId
    };
  }

  private finish(ctx: RequestContext, state: TerminalState, reason?: string): void {
    transition(ctx, state);
    ctx.terminalDecision = { state, ...(reason !== undefined ? { reason } : {}) };
  }

  private async emit(
    type: ShieldEventType,
    preview: string,
    ctx: RequestContext,
    policy: Policy,
    log: Logger,
    extra: Record<string, string>
  ): Promise<void> {
    const metadata: Record<string, string> = {
      request_id: ctx.requestId,
      policy_version: policy.version,
      ...(ctx.sessionId ? { session_id: ctx.sessionId } : {}),
      ...extra
    };
    log.info({ event_type: type, state: ctx.state, ...extra }, 'Shield decision');
    try {
      await this.deps.events.record(type, preview, metadata, policy.events.previewChars);
    } catch (err) {
      // The response is still returned; the lost event is visible in the service log
      log.error({ event_type: type, error: errorMessage(err) }, 'Failed to append shield event');
    }
  }
}
