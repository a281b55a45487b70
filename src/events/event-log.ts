import { existsSync, mkdirSync } from 'fs';
import { appendFile, readFile } from 'fs/promises';
import { dirname } from 'path';
import { v4 as uuidv4 } from 'uuid';

import type { ShieldEvent, ShieldEventType } from '../types/index.js';

/** Every log line is `SHIELD_EVENT <json>`; other lines are ignored on read. */
export const EVENT_SENTINEL = 'SHIELD_EVENT';

const EVENT_TYPES: readonly ShieldEventType[] = ['BLOCK', 'REDACT', 'SUCCESS'];

export function truncatePreview(text: string, maxChars: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxChars) return text;
  return chars.slice(0, Math.max(0, maxChars - 1)).join('') + '…';
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((v) => typeof v === 'string')
  );
}

export function parseEventLine(line: string): ShieldEvent | undefined {
  if (!line.startsWith(`${EVENT_SENTINEL} `)) return undefined;

  let raw: unknown;
  try {
    raw = JSON.parse(line.slice(EVENT_SENTINEL.length + 1));
  } catch {
    return undefined;
  }
  if (typeof raw !== 'object' || raw === null) return undefined;

  const eventType = 'event_type' in raw ? raw.event_type : undefined;
  const type = EVENT_TYPES.find((t) => t === eventType);
  const timestamp = 'timestamp' in raw && typeof raw.timestamp === 'string' ? raw.timestamp : undefined;
  const preview = 'preview' in raw && typeof raw.preview === 'string' ? raw.preview : undefined;
  const metadata = 'metadata' in raw && isStringRecord(raw.metadata) ? raw.metadata : undefined;
  if (!type || timestamp === undefined || preview === undefined || !metadata) return undefined;

  return { event_type: type, timestamp, preview, metadata };
}

/**
 * Append-only security event log. Appends go through a single queue so
 * concurrent requests never interleave partial lines.
 */
export class EventLogger {
  private readonly logPath: string;
  private tail: Promise<void> = Promise.resolve();

  constructor(logPath: string) {
    this.logPath = logPath;

    const dir = dirname(logPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  get path(): string {
    return this.logPath;
  }

  append(event: ShieldEvent): Promise<void> {
    const line = `${EVENT_SENTINEL} ${JSON.stringify(event)}\n`;
    const write = this.tail.then(() => appendFile(this.logPath, line, 'utf-8'));
    // The queue moves on after a failed write; the caller still sees the rejection
    this.tail = write.then(
      () => undefined,
      () => undefined
    );
    return write;
  }

  async record(
    type: ShieldEventType,
    preview: string,
    metadata: Record<string, string>,
    previewChars: number
  ): Promise<ShieldEvent> {
    const event: ShieldEvent = Object.freeze({
      event_type: type,
      timestamp: new Date().toISOString(),
      preview: truncatePreview(preview, previewChars),
      metadata: Object.freeze({ event_id: uuidv4(), ...metadata })
    });
    await this.append(event);
    return event;
  }

  /** Up to `limit` events, most recent first. Malformed lines are skipped. */
  async query(limit: number): Promise<ShieldEvent[]> {
    await this.tail;
    if (limit <= 0 || !existsSync(this.logPath)) return [];

    const content = await readFile(this.logPath, 'utf-8');
    const events: ShieldEvent[] = [];
    const lines = content.split('\n');
    for (let i = lines.length - 1; i >= 0 && events.length < limit; i--) {
      const event = parseEventLine(lines[i]);
      if (event) events.push(event);
    }
    return events;
  }
}
