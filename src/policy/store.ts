import type { Policy } from '../types/index.js';
import { ConfigError, errorMessage } from '../errors.js';
import { loadPolicy, type PolicySource } from './loader.js';

export type PolicyCheck = (policy: Policy) => void;
export type PolicyListener = (next: Policy, previous: Policy | undefined) => void;

export interface PolicyStoreOptions {
  /** Extra validation run on every candidate snapshot before it becomes active. */
  check?: PolicyCheck;
}

/**
 * Holds the active policy snapshot. Readers take the reference once per
 * request; reload swaps the reference and never mutates a live snapshot.
 */
export class PolicyStore {
  private active?: Policy;
  private readonly check?: PolicyCheck;
  private readonly listeners: PolicyListener[] = [];

  constructor(options: PolicyStoreOptions = {}) {
    this.check = options.check;
  }

  load(source: PolicySource): Policy {
    const policy = this.build(source);
    this.swap(policy);
    return policy;
  }

  current(): Policy {
    if (!this.active) {
      throw new ConfigError('No policy has been loaded');
    }
    return this.active;
  }

  /** On failure the previously active snapshot stays in place and the error propagates. */
  reload(source: PolicySource): Policy {
    return this.load(source);
  }

  onChange(listener: PolicyListener): void {
    this.listeners.push(listener);
  }

  private build(source: PolicySource): Policy {
    const policy = loadPolicy(source);
    if (this.check) {
      try {
        this.check(policy);
      } catch (err) {
        if (err instanceof ConfigError) throw err;
        throw new ConfigError(`Policy rejected: ${errorMessage(err)}`, { cause: err });
      }
    }
    return policy;
  }

  private swap(next: Policy): void {
    const previous = this.active;
    this.active = next;
    for (const listener of this.listeners) listener(next, previous);
  }
}
