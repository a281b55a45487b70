import { describe, it, expect } from 'vitest';

import { SessionStore } from './store.js';

function clock(start = 1_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    }
  };
}

describe('SessionStore', () => {
  it('creates sessions on first use and records exchanges', () => {
    const time = clock();
    const store = new SessionStore({ ttlMs: 1000, maxHistory: 5, now: time.now });

    store.append('s1', 'hello', 'hi there');

    expect(store.history('s1')).toEqual([{ prompt: 'hello', response: 'hi there', at: new Date(1_000).toISOString() }]);
    expect(store.size).toBe(1);
  });

  it('keeps only the most recent exchanges', () => {
    const store = new SessionStore({ ttlMs: 1000, maxHistory: 2 });
    for (const n of [1, 2, 3]) store.append('s1', `p${n}`, `r${n}`);

    expect(store.history('s1').map((exchange) => exchange.prompt)).toEqual(['p2', 'p3']);
  });

  it('keeps no history when the limit is zero', () => {
    const store = new SessionStore({ ttlMs: 1000, maxHistory: 0 });
    store.append('s1', 'p', 'r');
    expect(store.history('s1')).toEqual([]);
  });

  it('expires sessions after the ttl since last use', () => {
    const time = clock();
    const store = new SessionStore({ ttlMs: 1000, maxHistory: 5, now: time.now });
    store.append('s1', 'p', 'r');

    time.advance(1000);
    expect(store.get('s1')).toBeDefined();

    time.advance(1);
    expect(store.get('s1')).toBeUndefined();
    expect(store.history('s1')).toEqual([]);
  });

  it('extends the ttl on use', () => {
    const time = clock();
    const store = new SessionStore({ ttlMs: 1000, maxHistory: 5, now: time.now });
    store.append('s1', 'p1', 'r1');
    time.advance(800);
    store.append('s1', 'p2', 'r2');
    time.advance(800);

    expect(store.history('s1')).toHaveLength(2);
  });

  it('resets only live sessions', () => {
    const time = clock();
    const store = new SessionStore({ ttlMs: 1000, maxHistory: 5, now: time.now });
    store.append('s1', 'p', 'r');

    expect(store.reset('s1')).toBe(true);
    expect(store.reset('s1')).toBe(false);

    store.append('s2', 'p', 'r');
    time.advance(2000);
    expect(store.reset('s2')).toBe(false);
  });

  it('prunes expired sessions', () => {
    const time = clock();
    const store = new SessionStore({ ttlMs: 1000, maxHistory: 5, now: time.now });
    store.append('old', 'p', 'r');
    time.advance(900);
    store.append('fresh', 'p', 'r');
    time.advance(200);

    expect(store.prune()).toBe(1);
    expect(store.size).toBe(1);
    expect(store.get('fresh')).toBeDefined();
  });
});
