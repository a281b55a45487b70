import type { Logger } from 'pino';

import { RequestCancelledError, errorMessage } from '../errors.js';
import { DEFAULT_JUDGE_RETRY } from '../detectors/backend-judge.js';
import type { GenerationBackend } from '../inference/router.js';
import type { BackendPolicy, RedactionResult, RemovedEntity, StrategyVariant } from '../types/index.js';
import { findBackendEntities } from './backend-pass.js';
import { isEntityLabel, type EntityLabel, type EntityRecognizer } from './entity-recognizer.js';
import { findPatternMatches } from './patterns.js';
import { mergeRegions, render, toOriginal } from './regions.js';

export const ENTITY_PASS_UNAVAILABLE = 'entity_pass_unavailable';
export const BACKEND_PASS_UNAVAILABLE = 'backend_pass_unavailable';

export interface RedactOptions {
  strategy: StrategyVariant;
  entityTypes: readonly string[];
  backend?: BackendPolicy;
  signal?: AbortSignal;
}

export interface RedactionOutcome extends RedactionResult {
  /** Passes that were configured but could not run. */
  notes: string[];
}

export interface RedactionEngineOptions {
  recognizer?: EntityRecognizer;
  backend?: GenerationBackend;
  backendName?: string;
  logger?: Logger;
}

const ENTITY_STRATEGIES: readonly StrategyVariant[] = ['model_based', 'hybrid'];
const BACKEND_STRATEGIES: readonly StrategyVariant[] = ['backend_assisted', 'hybrid'];

/**
 * Runs the patterns over the rendered text until a round finds nothing new.
 * A mask edge opens a word boundary, so masking one value can expose a value
 * glued to it.
 */
function patternPass(text: string, regions: RemovedEntity[]): RemovedEntity[] {
  let current = regions;
  for (;;) {
    const rendering = render(text, current);
    const found = toOriginal(rendering, findPatternMatches(rendering.text), 'pattern');
    if (found.length === 0) return current;
    current = mergeRegions(current, found);
  }
}

/**
 * Masks PII in three passes: patterns (always), named entities, then the
 * generation backend. Each pass sees the text as rendered by the passes
 * before it; every removed span is recorded against the original text.
 */
export class RedactionEngine {
  private readonly recognizer?: EntityRecognizer;
  private readonly backend?: GenerationBackend;
  private readonly backendName?: string;
  private readonly logger?: Logger;

  constructor(options: RedactionEngineOptions = {}) {
    this.recognizer = options.recognizer;
    this.backend = options.backend;
    this.backendName = options.backendName;
    this.logger = options.logger;
  }

  async redact(text: string, options: RedactOptions): Promise<RedactionOutcome> {
    const notes: string[] = [];
    let regions = patternPass(text, []);

    const entityLabels = options.entityTypes.filter(isEntityLabel);
    if (ENTITY_STRATEGIES.includes(options.strategy) && entityLabels.length > 0) {
      const found = await this.entityPass(text, regions, entityLabels);
      if (found) regions = patternPass(text, mergeRegions(regions, found));
      else notes.push(ENTITY_PASS_UNAVAILABLE);
    }

    if (BACKEND_STRATEGIES.includes(options.strategy)) {
      const found = await this.backendPass(text, regions, options);
      if (found) regions = patternPass(text, mergeRegions(regions, found));
      else notes.push(BACKEND_PASS_UNAVAILABLE);
    }

    return { redactedText: render(text, regions).text, entitiesRemoved: regions, notes };
  }

  /** Pattern pass only. Used where no backend call is allowed, such as log previews. */
  mask(text: string): string {
    return render(text, patternPass(text, [])).text;
  }

  private async entityPass(
    text: string,
    regions: readonly RemovedEntity[],
    labels: readonly EntityLabel[]
  ): Promise<RemovedEntity[] | undefined> {
    const recognizer = this.recognizer;
    if (!recognizer?.isAvailable()) return undefined;
    const rendering = render(text, regions);
    try {
      return toOriginal(rendering, await recognizer.recognize(rendering.text, labels), 'entity');
    } catch (err) {
      this.logger?.warn({ recognizer: recognizer.name, error: errorMessage(err) }, 'Entity pass failed');
      return undefined;
    }
  }

  private async backendPass(
    text: string,
    regions: readonly RemovedEntity[],
    options: RedactOptions
  ): Promise<RemovedEntity[] | undefined> {
    const backend = this.backend;
    if (!backend?.isAvailable(this.backendName)) return undefined;
    const rendering = render(text, regions);
    try {
      const candidates = await findBackendEntities(
        backend,
        rendering.text,
        {
          entityTypes: options.entityTypes,
          retry: options.backend ?? DEFAULT_JUDGE_RETRY,
          model: options.backend?.model,
          signal: options.signal
        },
        this.backendName
      );
      return toOriginal(rendering, candidates, 'backend');
    } catch (err) {
      if (err instanceof RequestCancelledError) throw err;
      this.logger?.warn({ error: errorMessage(err) }, 'Backend redaction pass failed');
      return undefined;
    }
  }
}
