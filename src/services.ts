import type { Logger } from 'pino';

import type { ServiceConfig } from './config.js';
import { loadLexicon, type Lexicon } from './detectors/index.js';
import { EventLogger } from './events/index.js';
import { InferenceRouter, type GenerationBackend } from './inference/router.js';
import {
  DetectionOrchestrator,
  ResponseScreeningOrchestrator,
  ShieldPipeline
} from './pipeline/index.js';
import { PolicyStore, type PolicySource } from './policy/index.js';
import { HeuristicEntityRecognizer, RedactionEngine, type EntityRecognizer } from './redaction/index.js';
import { SessionStore } from './sessions/index.js';
import { createDefaultRegistry, type StrategyRegistry } from './strategies/index.js';

export interface ShieldServices {
  config: ServiceConfig;
  backend: GenerationBackend;
  registry: StrategyRegistry;
  policies: PolicyStore;
  redaction: RedactionEngine;
  events: EventLogger;
  sessions: SessionStore;
  pipeline: ShieldPipeline;
  /** Where reloads read the policy from. */
  policySource: PolicySource;
}

export interface ServiceOverrides {
  backend?: GenerationBackend;
  lexicon?: Lexicon;
  /** `null` runs without an entity recognizer. */
  recognizer?: EntityRecognizer | null;
  policy?: PolicySource;
}

/**
 * Wires the shield components. The policy is loaded and checked against the
 * registry here, so an unsupported strategy fails at startup.
 */
export function createServices(config: ServiceConfig, logger: Logger, overrides: ServiceOverrides = {}): ShieldServices {
  const backend = overrides.backend ?? new InferenceRouter(config.inference.backends, config.inference.default);
  const recognizer = overrides.recognizer === null ? undefined : (overrides.recognizer ?? new HeuristicEntityRecognizer());

  const redaction = new RedactionEngine({
    recognizer,
    backend,
    logger: logger.child({ component: 'redaction' })
  });
  const registry = createDefaultRegistry({
    redaction,
    backend,
    lexicon: overrides.lexicon ?? loadLexicon()
  });

  const policies = new PolicyStore({ check: (policy) => registry.assertSupports(policy) });
  policies.onChange((next, previous) => {
    logger.info(
      { version: next.version, fingerprint: next.fingerprint, previous: previous?.fingerprint },
      previous ? 'Policy reloaded' : 'Policy loaded'
    );
  });
  const policySource = overrides.policy ?? config.policy.path;
  policies.load(policySource);

  const orchestrator = new DetectionOrchestrator(registry, logger.child({ component: 'orchestrator' }));
  const screening = new ResponseScreeningOrchestrator(orchestrator, registry);
  const events = new EventLogger(config.events.log_path);
  const sessions = new SessionStore({ ttlMs: config.sessions.ttl_ms, maxHistory: config.sessions.max_history });

  const pipeline = new ShieldPipeline({
    policies,
    orchestrator,
    screening,
    registry,
    redaction,
    backend,
    events,
    sessions,
    logger: logger.child({ component: 'pipeline' }),
    maxInputChars: config.rate_limits.max_input_chars
  });

  return { config, backend, registry, policies, redaction, events, sessions, pipeline, policySource };
}
