export type ShieldEventType = 'BLOCK' | 'REDACT' | 'SUCCESS';

export interface ShieldEvent {
  readonly event_type: ShieldEventType;
  /** UTC, ISO-8601 */
  readonly timestamp: string;
  readonly preview: string;
  readonly metadata: Readonly<Record<string, string>>;
}
