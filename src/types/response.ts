import type { TraceStep } from './detection.js';

export interface SuccessResponse {
  status: 'success';
  original_prompt: string;
  processed_prompt: string;
  llm_response: string;
  trace: readonly TraceStep[];
  request_id: string;
}

export interface BlockedResponse {
  status: 'blocked';
  reason: string;
  trace: readonly TraceStep[];
  request_id: string;
}

export interface BlockedOutputResponse {
  status: 'blocked_response';
  reason: string;
  llm_output_blocked: string;
  trace: readonly TraceStep[];
  request_id: string;
}

export type ShieldResponse = SuccessResponse | BlockedResponse | BlockedOutputResponse;

export interface ErrorResponse {
  status: 'error';
  reason: string;
}

// Stands in for generated text that was withheld from the caller.
export const WITHHELD_OUTPUT = '[withheld by output screening]';

export const BACKEND_FALLBACK_MESSAGE = 'The language model is temporarily unavailable. Please try again later.';
