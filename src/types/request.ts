import type { TraceView } from './detection.js';

export interface ShieldRequest {
  prompt: string;
  session_id?: string;
}

export type PipelineState =
  | 'received'
  | 'input_screening'
  | 'blocked_input'
  | 'redacting'
  | 'backend_invocation'
  | 'output_screening'
  | 'blocked_output'
  | 'completed';

export type TerminalState = Extract<PipelineState, 'blocked_input' | 'blocked_output' | 'completed'>;

export interface RequestContext {
  readonly requestId: string;
  readonly sessionId?: string;
  readonly originalPrompt: string;
  state: PipelineState;
  processedPrompt?: string;
  backendResponse?: string;
  finalResponse?: string;
  terminalDecision?: {
    state: TerminalState;
    reason?: string;
  };
  readonly trace: TraceView;
}
