export type ShieldErrorCode =
  | 'CONFIG_ERROR'
  | 'VALIDATION_ERROR'
  | 'UNSUPPORTED_STRATEGY'
  | 'DETECTOR_UNAVAILABLE'
  | 'EXTERNAL_SERVICE_ERROR'
  | 'REQUEST_CANCELLED'
  | 'ILLEGAL_TRANSITION';

export class ShieldError extends Error {
  readonly code: ShieldErrorCode;

  constructor(code: ShieldErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ShieldError';
    this.code = code;
  }
}

export class ConfigError extends ShieldError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_ERROR', message, options);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends ShieldError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
  }
}

export class UnsupportedStrategyError extends ShieldError {
  constructor(kind: string, strategy: string) {
    super('UNSUPPORTED_STRATEGY', `No "${strategy}" strategy is registered for detector "${kind}"`);
    this.name = 'UnsupportedStrategyError';
  }
}

export class DetectorUnavailableError extends ShieldError {
  /** Short machine-readable cause, surfaced in trace reasons. */
  readonly detail: string;

  constructor(detail: string, message?: string) {
    super('DETECTOR_UNAVAILABLE', message ?? `Detector unavailable: ${detail}`);
    this.name = 'DetectorUnavailableError';
    this.detail = detail;
  }
}

export class ExternalServiceError extends ShieldError {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super('EXTERNAL_SERVICE_ERROR', message, options);
    this.name = 'ExternalServiceError';
    this.attempts = attempts;
  }
}

export class RequestCancelledError extends ShieldError {
  constructor(message = 'Request was cancelled') {
    super('REQUEST_CANCELLED', message);
    this.name = 'RequestCancelledError';
  }
}

export class IllegalTransitionError extends ShieldError {
  constructor(from: string, to: string) {
    super('ILLEGAL_TRANSITION', `Illegal pipeline transition ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}
