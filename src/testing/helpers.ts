import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import pino, { type Logger } from 'pino';
import { vi, type Mock } from 'vitest';

import type { GenerationBackend, InferenceRequest, InferenceResponse } from '../inference/router.js';

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export function tempDir(prefix = 'prompt-shield-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function reply(output: string): InferenceResponse {
  return { output, model: 'test-model', latencyMs: 1 };
}

/** Resolves only when the request signal aborts, like a backend that never answers. */
export function hang(request: InferenceRequest): Promise<InferenceResponse> {
  return new Promise((_resolve, reject) => {
    request.signal?.addEventListener('abort', () => reject(request.signal?.reason), { once: true });
  });
}

type InferFn = (request: InferenceRequest, backendName?: string) => Promise<InferenceResponse>;

export type StubBackend = GenerationBackend & { infer: Mock<InferFn> };

export function stubBackend(
  impl: (request: InferenceRequest) => Promise<InferenceResponse> = async () => reply('Generated answer.'),
  available = true
): StubBackend {
  return {
    infer: vi.fn<InferFn>(impl),
    isAvailable: () => available,
    getAvailableBackends: () => (available ? ['stub'] : [])
  };
}

/** A complete policy document; tests adjust the fields they care about. */
export function policyDocument() {
  return {
    version: 'test-1',
    enabled_detectors: {
      prompt_injection: {
        enabled: true,
        strategy: 'heuristic',
        threshold: 0.5,
        markers: ['ignore previous instructions']
      },
      harmful_content: { enabled: true, strategy: 'heuristic', threshold: 0.5 },
      pii_redaction: { enabled: true, strategy: 'heuristic', threshold: 0.5, entity_types: ['EMAIL', 'PHONE'] }
    },
    detectors: {
      order: ['prompt_injection', 'harmful_content'],
      execution: 'sequential',
      failure_mode: 'open'
    },
    backend: {
      model: 'test-model',
      timeout_ms: 50,
      max_attempts: 2,
      backoff_ms: 1,
      max_backoff_ms: 2,
      failure_mode: 'open'
    },
    response_screening: { enabled: true },
    events: { preview_chars: 40 }
  };
}
