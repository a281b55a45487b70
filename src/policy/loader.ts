import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';

import { ConfigError, errorMessage } from '../errors.js';
import { hashObject } from '../crypto/index.js';
import {
  DETECTOR_KINDS,
  INPUT_DETECTOR_KINDS,
  KEY_BY_STRATEGY,
  STRATEGY_BY_KEY,
  type DetectorAction,
  type DetectorKind,
  type DetectorPolicies,
  type DetectorPolicy,
  type DetectorPolicyDocument,
  type ExecutionMode,
  type FailureMode,
  type InputDetectorKind,
  type Policy,
  type PolicyDocument,
  type StrategyKey
} from '../types/index.js';

/** A path to a YAML/JSON policy file, or an already-parsed document. */
export type PolicySource = string | { document: unknown; origin?: string };

const STRATEGY_KEYS: StrategyKey[] = ['heuristic', 'ml', 'llm', 'hybrid'];
const ACTIONS: DetectorAction[] = ['block', 'flag'];
const FAILURE_MODES: FailureMode[] = ['open', 'closed'];
const EXECUTION_MODES: ExecutionMode[] = ['sequential', 'concurrent'];

const DEFAULT_STRATEGY: Record<DetectorKind, StrategyKey> = {
  prompt_injection: 'heuristic',
  harmful_content: 'ml',
  pii_redaction: 'heuristic'
};

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function objectField(obj: RawObject, key: string, field: string, required = false): RawObject | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    if (required) throw new ConfigError(`Policy field "${field}" is required`);
    return undefined;
  }
  if (!isObject(value)) {
    throw new ConfigError(`Policy field "${field}" must be an object`);
  }
  return value;
}

function stringField(obj: RawObject, key: string, field: string, fallback?: string): string {
  const value = obj[key];
  if (value === undefined && fallback !== undefined) return fallback;
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`Policy field "${field}" must be a non-empty string`);
  }
  return value;
}

function booleanField(obj: RawObject, key: string, field: string, fallback?: boolean): boolean {
  const value = obj[key];
  if (value === undefined && fallback !== undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`Policy field "${field}" must be a boolean`);
  }
  return value;
}

function numberField(
  obj: RawObject,
  key: string,
  field: string,
  fallback: number,
  check: { min: number; max?: number; integer?: boolean }
): number {
  const value = obj[key] ?? fallback;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigError(`Policy field "${field}" must be a finite number`);
  }
  if (check.integer && !Number.isInteger(value)) {
    throw new ConfigError(`Policy field "${field}" must be an integer`);
  }
  if (value < check.min || (check.max !== undefined && value > check.max)) {
    const range = check.max !== undefined ? `[${check.min}, ${check.max}]` : `>= ${check.min}`;
    throw new ConfigError(`Policy field "${field}" must be in ${range}, got ${value}`);
  }
  return value;
}

function enumField<T extends string>(obj: RawObject, key: string, field: string, allowed: readonly T[], fallback: T): T {
  const value = obj[key] ?? fallback;
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigError(`Policy field "${field}" must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

function stringListField(obj: RawObject, key: string, field: string): string[] {
  const value = obj[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ConfigError(`Policy field "${field}" must be an array of strings`);
  }
  return value.map((item, i) => {
    if (typeof item !== 'string' || item.trim() === '') {
      throw new ConfigError(`Policy field "${field}[${i}]" must be a non-empty string`);
    }
    return item;
  });
}

function parseDetector(kind: DetectorKind, raw: unknown, field: string, base?: DetectorPolicy): DetectorPolicy {
  if (raw === undefined || raw === null) {
    if (base) return base;
    throw new ConfigError(`Policy field "${field}" is required`);
  }
  if (!isObject(raw)) {
    throw new ConfigError(`Policy field "${field}" must be an object`);
  }

  const enabled = booleanField(raw, 'enabled', `${field}.enabled`, base?.enabled);
  const baseKey = base ? KEY_BY_STRATEGY[base.strategy] : DEFAULT_STRATEGY[kind];
  const strategyKey = enumField(raw, 'strategy', `${field}.strategy`, STRATEGY_KEYS, baseKey);
  const threshold = numberField(raw, 'threshold', `${field}.threshold`, base?.threshold ?? 0.5, { min: 0, max: 1 });
  const action = enumField(raw, 'action', `${field}.action`, ACTIONS, base?.action ?? 'block');
  const entityTypes = raw['entity_types'] === undefined && base
    ? [...base.entityTypes]
    : stringListField(raw, 'entity_types', `${field}.entity_types`).map((t) => t.toUpperCase());
  const markers = raw['markers'] === undefined && base
    ? [...base.markers]
    : stringListField(raw, 'markers', `${field}.markers`);

  if (kind === 'pii_redaction' && enabled && entityTypes.length === 0) {
    throw new ConfigError(`Policy field "${field}.entity_types" must be non-empty when PII redaction is enabled`);
  }

  return {
    enabled,
    strategy: STRATEGY_BY_KEY[strategyKey],
    threshold,
    action,
    entityTypes: Array.from(new Set(entityTypes)),
    markers
  };
}

function parseDetectors(raw: RawObject, field: string, base?: DetectorPolicies): DetectorPolicies {
  const known = new Set<string>(DETECTOR_KINDS);
  for (const key of Object.keys(raw)) {
    if (!known.has(key)) {
      throw new ConfigError(`Unknown detector "${key}" in ${field}. Valid: ${DETECTOR_KINDS.join(', ')}`);
    }
  }
  return {
    prompt_injection: parseDetector('prompt_injection', raw['prompt_injection'], `${field}.prompt_injection`, base?.prompt_injection),
    harmful_content: parseDetector('harmful_content', raw['harmful_content'], `${field}.harmful_content`, base?.harmful_content),
    pii_redaction: parseDetector('pii_redaction', raw['pii_redaction'], `${field}.pii_redaction`, base?.pii_redaction)
  };
}

function parseOrder(raw: unknown): InputDetectorKind[] {
  if (raw === undefined || raw === null) return [...INPUT_DETECTOR_KINDS];
  if (!Array.isArray(raw)) {
    throw new ConfigError('Policy field "detectors.order" must be an array');
  }
  const order: InputDetectorKind[] = [];
  for (const item of raw) {
    const kind = INPUT_DETECTOR_KINDS.find((k) => k === item);
    if (kind === undefined) {
      throw new ConfigError(
        `Unknown detector "${String(item)}" in detectors.order. Valid: ${INPUT_DETECTOR_KINDS.join(', ')}`
      );
    }
    if (order.includes(kind)) {
      throw new ConfigError(`Detector "${kind}" appears twice in detectors.order`);
    }
    order.push(kind);
  }
  // Detectors left out of the order run after the listed ones
  for (const kind of INPUT_DETECTOR_KINDS) {
    if (!order.includes(kind)) order.push(kind);
  }
  return order;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export function validatePolicy(raw: unknown): Policy {
  if (!isObject(raw)) {
    throw new ConfigError('Policy must be an object');
  }

  const detectorsRaw = objectField(raw, 'enabled_detectors', 'enabled_detectors', true) ?? {};
  const detectors = parseDetectors(detectorsRaw, 'enabled_detectors');

  const orchestration = objectField(raw, 'detectors', 'detectors') ?? {};
  const backendRaw = objectField(raw, 'backend', 'backend', true) ?? {};
  const screeningRaw = objectField(raw, 'response_screening', 'response_screening') ?? {};
  const screeningDetectors = objectField(screeningRaw, 'detectors', 'response_screening.detectors') ?? {};
  const eventsRaw = objectField(raw, 'events', 'events') ?? {};

  const backoffMs = numberField(backendRaw, 'backoff_ms', 'backend.backoff_ms', 250, { min: 0 });

  const policy: Omit<Policy, 'fingerprint'> = {
    version: stringField(raw, 'version', 'version', '1'),
    detectors,
    order: parseOrder(orchestration['order']),
    execution: enumField(orchestration, 'execution', 'detectors.execution', EXECUTION_MODES, 'sequential'),
    detectorFailureMode: enumField(orchestration, 'failure_mode', 'detectors.failure_mode', FAILURE_MODES, 'open'),
    backend: {
      model: stringField(backendRaw, 'model', 'backend.model'),
      timeoutMs: numberField(backendRaw, 'timeout_ms', 'backend.timeout_ms', 15000, { min: 1, integer: true }),
      maxAttempts: numberField(backendRaw, 'max_attempts', 'backend.max_attempts', 2, { min: 1, max: 10, integer: true }),
      backoffMs,
      maxBackoffMs: numberField(backendRaw, 'max_backoff_ms', 'backend.max_backoff_ms', Math.max(backoffMs, 4000), {
        min: backoffMs
      }),
      failureMode: enumField(backendRaw, 'failure_mode', 'backend.failure_mode', FAILURE_MODES, 'open')
    },
    responseScreening: {
      enabled: booleanField(screeningRaw, 'enabled', 'response_screening.enabled', false),
      detectors: parseDetectors(screeningDetectors, 'response_screening.detectors', detectors)
    },
    events: {
      previewChars: numberField(eventsRaw, 'preview_chars', 'events.preview_chars', 200, { min: 1, integer: true })
    }
  };

  return deepFreeze({ ...policy, fingerprint: hashObject(policy) });
}

export function readPolicySource(source: PolicySource): unknown {
  if (typeof source !== 'string') return source.document;
  try {
    const content = readFileSync(source, 'utf-8');
    const document: unknown = parseYaml(content);
    return document;
  } catch (err) {
    throw new ConfigError(`Failed to read policy at "${source}": ${errorMessage(err)}`, { cause: err });
  }
}

export function loadPolicy(source: PolicySource): Policy {
  return validatePolicy(readPolicySource(source));
}

function detectorToDocument(policy: DetectorPolicy): DetectorPolicyDocument {
  return {
    enabled: policy.enabled,
    strategy: KEY_BY_STRATEGY[policy.strategy],
    threshold: policy.threshold,
    action: policy.action,
    entity_types: [...policy.entityTypes],
    markers: [...policy.markers]
  };
}

function detectorsToDocument(detectors: DetectorPolicies): Record<DetectorKind, DetectorPolicyDocument> {
  return {
    prompt_injection: detectorToDocument(detectors.prompt_injection),
    harmful_content: detectorToDocument(detectors.harmful_content),
    pii_redaction: detectorToDocument(detectors.pii_redaction)
  };
}

/** Wire form served by GET /api/policy. Parsing it again yields an equal policy. */
export function toPolicyDocument(policy: Policy): PolicyDocument {
  return {
    version: policy.version,
    fingerprint: policy.fingerprint,
    enabled_detectors: detectorsToDocument(policy.detectors),
    detectors: {
      order: [...policy.order],
      execution: policy.execution,
      failure_mode: policy.detectorFailureMode
    },
    backend: {
      model: policy.backend.model,
      timeout_ms: policy.backend.timeoutMs,
      max_attempts: policy.backend.maxAttempts,
      backoff_ms: policy.backend.backoffMs,
      max_backoff_ms: policy.backend.maxBackoffMs,
      failure_mode: policy.backend.failureMode
    },
    response_screening: {
      enabled: policy.responseScreening.enabled,
      detectors: detectorsToDocument(policy.responseScreening.detectors)
    },
    events: {
      preview_chars: policy.events.previewChars
    }
  };
}
