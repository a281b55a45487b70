import { describe, it, expect } from 'vitest';

import { heuristicInjectionDetector, parseLexicon } from '../detectors/index.js';
import { UnsupportedStrategyError } from '../errors.js';
import { validatePolicy } from '../policy/index.js';
import { RedactionEngine } from '../redaction/index.js';
import { policyDocument, reply, stubBackend } from '../testing/helpers.js';
import { StrategyRegistry, createDefaultRegistry, createRedactor, unavailableDetector } from './registry.js';

const lexicon = parseLexicon({ models: { harmful_content: { terms: { detonator: 0.6 } } } });

describe('StrategyRegistry', () => {
  it('resolves registered pairs', () => {
    const registry = new StrategyRegistry().register('prompt_injection', 'heuristic', heuristicInjectionDetector);
    expect(registry.resolve('prompt_injection', 'heuristic')).toBe(heuristicInjectionDetector);
    expect(registry.has('prompt_injection', 'hybrid')).toBe(false);
  });

  it('keeps pii redactors apart from detectors', () => {
    const redactor = createRedactor(new RedactionEngine(), 'heuristic');
    const registry = new StrategyRegistry().registerRedactor('heuristic', redactor);

    expect(registry.resolveRedactor('heuristic')).toBe(redactor);
    expect(registry.has('pii_redaction', 'heuristic')).toBe(true);
    expect(registry.has('prompt_injection', 'heuristic')).toBe(false);
    expect(() => registry.resolveRedactor('hybrid')).toThrow(
      'No "hybrid" strategy is registered for detector "pii_redaction"'
    );
  });

  it('fails with UnsupportedStrategyError naming the wire key', () => {
    const registry = new StrategyRegistry();
    expect(() => registry.resolve('harmful_content', 'model_based')).toThrow(UnsupportedStrategyError);
    expect(() => registry.resolve('harmful_content', 'model_based')).toThrow(
      'No "ml" strategy is registered for detector "harmful_content"'
    );
  });
});

describe('createDefaultRegistry', () => {
  const redaction = new RedactionEngine();

  it('registers a model-based strategy only where the lexicon has a model', () => {
    const registry = createDefaultRegistry({ redaction, lexicon });
    expect(registry.has('harmful_content', 'model_based')).toBe(true);
    expect(registry.has('prompt_injection', 'model_based')).toBe(false);
  });

  it('keeps backend strategies resolvable but unavailable without a backend', async () => {
    const registry = createDefaultRegistry({ redaction });
    const judge = registry.resolve('prompt_injection', 'backend_assisted');

    expect(judge.isAvailable()).toBe(false);
    await expect(judge.detect('text', 0.5)).rejects.toMatchObject({ detail: 'backend_not_configured' });
    expect(registry.resolve('prompt_injection', 'hybrid').isAvailable()).toBe(true);
  });

  it('wires the backend judge when a backend is given', async () => {
    const backend = stubBackend(async () => reply('unsafe'));
    const registry = createDefaultRegistry({ redaction, backend });

    const result = await registry.resolve('harmful_content', 'backend_assisted').detect('text', 0.5);
    expect(result.decision).toBe('block');
    expect(backend.infer).toHaveBeenCalledTimes(1);
  });

  it('supports every pii strategy', () => {
    const registry = createDefaultRegistry({ redaction });
    for (const variant of ['heuristic', 'model_based', 'backend_assisted', 'hybrid'] as const) {
      expect(registry.has('pii_redaction', variant)).toBe(true);
    }
  });

  it('rejects a policy whose pii strategy has no redactor', () => {
    const registry = new StrategyRegistry()
      .register('prompt_injection', 'heuristic', heuristicInjectionDetector)
      .register('harmful_content', 'heuristic', heuristicInjectionDetector);

    expect(() => registry.assertSupports(validatePolicy(policyDocument()))).toThrow(
      'No "heuristic" strategy is registered for detector "pii_redaction"'
    );
  });

  it('rejects a policy naming an unregistered pair', () => {
    const registry = createDefaultRegistry({ redaction });
    const doc = policyDocument();
    doc.enabled_detectors.prompt_injection.strategy = 'ml';

    expect(() => registry.assertSupports(validatePolicy(doc))).toThrow(
      'No "ml" strategy is registered for detector "prompt_injection"'
    );
  });

  it('ignores disabled entries', () => {
    const registry = createDefaultRegistry({ redaction });
    const doc = policyDocument();
    doc.enabled_detectors.prompt_injection.strategy = 'ml';
    doc.enabled_detectors.prompt_injection.enabled = false;
    doc.response_screening.enabled = false;

    expect(() => registry.assertSupports(validatePolicy(doc))).not.toThrow();
  });

  it('describes registered pairs with their wire keys', () => {
    const registry = createDefaultRegistry({ redaction, lexicon });
    expect(registry.describe()).toContainEqual({
      kind: 'harmful_content',
      strategy: 'ml',
      detector: 'lexical_harmful_content',
      available: true
    });
    expect(registry.describe()).toContainEqual({
      kind: 'pii_redaction',
      strategy: 'llm',
      detector: 'pii_llm',
      available: true
    });
  });
});

describe('createRedactor', () => {
  it('runs the passes of its own strategy', async () => {
    const engine = new RedactionEngine();
    const outcome = await createRedactor(engine, 'model_based').redact('Mail me at a@b.io', { entityTypes: ['EMAIL', 'PERSON'] });

    expect(outcome).toEqual({
      redactedText: 'Mail me at [EMAIL]',
      entitiesRemoved: [{ start: 11, end: 17, label: 'EMAIL', source: 'pattern' }],
      notes: ['entity_pass_unavailable']
    });
  });

  it('leaves text without PII untouched', async () => {
    const outcome = await createRedactor(new RedactionEngine(), 'heuristic').redact('What is diabetes?', { entityTypes: ['EMAIL'] });
    expect(outcome).toEqual({ redactedText: 'What is diabetes?', entitiesRemoved: [], notes: [] });
  });
});

describe('unavailableDetector', () => {
  it('never reports available', () => {
    expect(unavailableDetector('x', 'missing').isAvailable()).toBe(false);
  });
});
