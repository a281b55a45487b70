import { writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { describe, it, expect } from 'vitest';

import { defaultConfig, loadConfig, parseConfig } from './config.js';
import { ConfigError } from './errors.js';
import { tempDir } from './testing/helpers.js';

describe('parseConfig', () => {
  it('returns the defaults for an empty document', () => {
    expect(parseConfig(null, '/srv/shield')).toEqual(defaultConfig('/srv/shield'));
  });

  it('merges sections over the defaults and resolves paths', () => {
    const config = parseConfig(
      {
        server: { port: 9000 },
        events: { log_path: 'var/events.log', default_limit: 50 },
        sessions: { max_history: 3 }
      },
      '/srv/shield'
    );

    expect(config.server).toEqual({ port: 9000, host: '127.0.0.1' });
    expect(config.events).toEqual({ log_path: '/srv/shield/var/events.log', default_limit: 50, max_limit: 1000 });
    expect(config.sessions).toEqual({ ttl_ms: 1_800_000, max_history: 3 });
  });

  it('reads backend entries', () => {
    const config = parseConfig({
      inference: {
        backends: [{ name: 'local', type: 'ollama', model: 'llama3', base_url: 'http://127.0.0.1:11434' }],
        default: 'local'
      }
    });
    expect(config.inference).toEqual({
      backends: [{ name: 'local', type: 'ollama', model: 'llama3', baseUrl: 'http://127.0.0.1:11434' }],
      default: 'local'
    });
  });

  it('rejects invalid values', () => {
    expect(() => parseConfig({ rate_limits: { requests_per_minute: 0 } })).toThrow(
      'Config field "rate_limits.requests_per_minute" must be an integer >= 1'
    );
    expect(() => parseConfig({ inference: { backends: [{ name: 'x', type: 'openai', model: 'm' }] } })).toThrow(
      'Config field "inference.backends[0].type" must be one of: anthropic, ollama'
    );
    expect(() => parseConfig({ inference: { default: 'missing' } })).toThrow(
      'Config field "inference.default" names unknown backend "missing"'
    );
    expect(() => parseConfig({ server: 'fast' })).toThrow('Config section "server" must be an object');
  });
});

describe('loadConfig', () => {
  it('reads the file named by PROMPT_SHIELD_CONFIG and applies env overrides', () => {
    const dir = tempDir();
    writeFileSync(join(dir, 'shield.yaml'), 'server:\n  port: 9100\npolicy:\n  path: custom-policy.yaml\n');

    const config = loadConfig(
      { PROMPT_SHIELD_CONFIG: 'shield.yaml', HOST: '0.0.0.0', PROMPT_SHIELD_EVENT_LOG: 'out/events.log' },
      dir
    );

    expect(config.server).toEqual({ port: 9100, host: '0.0.0.0' });
    expect(config.policy.path).toBe(resolve(dir, 'custom-policy.yaml'));
    expect(config.events.log_path).toBe(resolve(dir, 'out/events.log'));
  });

  it('lets PORT and PROMPT_SHIELD_POLICY win over the file', () => {
    const dir = tempDir();
    writeFileSync(join(dir, 'shield.yaml'), 'server:\n  port: 9100\n');

    const config = loadConfig({ PROMPT_SHIELD_CONFIG: 'shield.yaml', PORT: '7000', PROMPT_SHIELD_POLICY: '/etc/policy.yaml' }, dir);

    expect(config.server.port).toBe(7000);
    expect(config.policy.path).toBe('/etc/policy.yaml');
  });

  it('fails when PROMPT_SHIELD_CONFIG points to a missing file', () => {
    expect(() => loadConfig({ PROMPT_SHIELD_CONFIG: 'nope.yaml' }, tempDir())).toThrow(ConfigError);
  });

  it('fails on unreadable YAML and bad PORT values', () => {
    const dir = tempDir();
    writeFileSync(join(dir, 'shield.yaml'), 'server: [\n');
    expect(() => loadConfig({ PROMPT_SHIELD_CONFIG: 'shield.yaml' }, dir)).toThrow(/^Failed to read config at/);

    writeFileSync(join(dir, 'ok.yaml'), 'server:\n  port: 1\n');
    expect(() => loadConfig({ PROMPT_SHIELD_CONFIG: 'ok.yaml', PORT: 'abc' }, dir)).toThrow('PORT must be an integer, got "abc"');
  });
});
