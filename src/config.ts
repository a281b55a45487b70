import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';

import { ConfigError, errorMessage } from './errors.js';
import type { InferenceBackend } from './inference/router.js';

export interface ServiceConfig {
  server: {
    port: number;
    host: string;
  };
  cors: {
    allowed_origins: string[];
  };
  rate_limits: {
    requests_per_minute: number;
    max_input_chars: number;
  };
  inference: {
    backends: InferenceBackend[];
    default: string;
  };
  policy: {
    path: string;
  };
  events: {
    log_path: string;
    default_limit: number;
    max_limit: number;
  };
  sessions: {
    ttl_ms: number;
    max_history: number;
  };
}

export function defaultConfig(cwd: string = process.cwd()): ServiceConfig {
  return {
    server: { port: 8088, host: '127.0.0.1' },
    cors: {
      allowed_origins: ['http://localhost:3000']
    },
    rate_limits: {
      requests_per_minute: 600,
      max_input_chars: 8000
    },
    inference: {
      backends: [
        { name: 'claude', type: 'anthropic', model: 'claude-3-5-haiku-latest' },
        { name: 'local', type: 'ollama', model: 'mistral' }
      ],
      default: 'claude'
    },
    policy: {
      path: resolve(cwd, 'policy.yaml')
    },
    events: {
      log_path: resolve(cwd, 'logs', 'shield-events.log'),
      default_limit: 200,
      max_limit: 1000
    },
    sessions: {
      ttl_ms: 30 * 60 * 1000,
      max_history: 10
    }
  };
}

export function configPaths(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): string[] {
  return [
    ...(env.PROMPT_SHIELD_CONFIG ? [resolve(cwd, env.PROMPT_SHIELD_CONFIG)] : []),
    resolve(cwd, 'prompt-shield.yaml'),
    resolve(homedir(), '.prompt-shield', 'config.yaml'),
    resolve(homedir(), '.config', 'prompt-shield', 'config.yaml')
  ];
}

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawObject, key: string): RawObject {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isObject(value)) throw new ConfigError(`Config section "${key}" must be an object`);
  return value;
}

function str(obj: RawObject, key: string, field: string, fallback: string): string {
  const value = obj[key] ?? fallback;
  if (typeof value !== 'string' || value === '') {
    throw new ConfigError(`Config field "${field}" must be a non-empty string`);
  }
  return value;
}

function int(obj: RawObject, key: string, field: string, fallback: number, min = 0): number {
  const value = obj[key] ?? fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new ConfigError(`Config field "${field}" must be an integer >= ${min}`);
  }
  return value;
}

function strList(obj: RawObject, key: string, field: string, fallback: string[]): string[] {
  const value = obj[key] ?? fallback;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(`Config field "${field}" must be an array of strings`);
  }
  return value;
}

function parseBackend(raw: unknown, index: number): InferenceBackend {
  const field = `inference.backends[${index}]`;
  if (!isObject(raw)) throw new ConfigError(`Config field "${field}" must be an object`);

  const type = raw['type'];
  if (type !== 'anthropic' && type !== 'ollama') {
    throw new ConfigError(`Config field "${field}.type" must be one of: anthropic, ollama`);
  }
  const baseUrl = raw['base_url'];
  const apiKeyEnv = raw['api_key_env'];
  return {
    name: str(raw, 'name', `${field}.name`, ''),
    type,
    model: str(raw, 'model', `${field}.model`, ''),
    ...(typeof baseUrl === 'string' ? { baseUrl } : {}),
    ...(typeof apiKeyEnv === 'string' ? { apiKeyEnv } : {})
  };
}

/** Merges a parsed YAML document over the defaults. Paths resolve against `cwd`. */
export function parseConfig(raw: unknown, cwd: string = process.cwd()): ServiceConfig {
  const defaults = defaultConfig(cwd);
  if (raw === undefined || raw === null) return defaults;
  if (!isObject(raw)) throw new ConfigError('Config must be an object');

  const server = section(raw, 'server');
  const cors = section(raw, 'cors');
  const limits = section(raw, 'rate_limits');
  const inference = section(raw, 'inference');
  const policy = section(raw, 'policy');
  const events = section(raw, 'events');
  const sessions = section(raw, 'sessions');

  const backendsRaw = inference['backends'];
  if (backendsRaw !== undefined && !Array.isArray(backendsRaw)) {
    throw new ConfigError('Config field "inference.backends" must be an array');
  }
  const backends = backendsRaw ? backendsRaw.map(parseBackend) : defaults.inference.backends;
  const defaultBackend = str(inference, 'default', 'inference.default', backends[0]?.name ?? defaults.inference.default);
  if (!backends.some((backend) => backend.name === defaultBackend)) {
    throw new ConfigError(`Config field "inference.default" names unknown backend "${defaultBackend}"`);
  }

  const defaultLimit = int(events, 'default_limit', 'events.default_limit', defaults.events.default_limit, 1);

  return {
    server: {
      port: int(server, 'port', 'server.port', defaults.server.port),
      host: str(server, 'host', 'server.host', defaults.server.host)
    },
    cors: {
      allowed_origins: strList(cors, 'allowed_origins', 'cors.allowed_origins', defaults.cors.allowed_origins)
    },
    rate_limits: {
      requests_per_minute: int(limits, 'requests_per_minute', 'rate_limits.requests_per_minute', defaults.rate_limits.requests_per_minute, 1),
      max_input_chars: int(limits, 'max_input_chars', 'rate_limits.max_input_chars', defaults.rate_limits.max_input_chars, 1)
    },
    inference: { backends, default: defaultBackend },
    policy: {
      path: resolve(cwd, str(policy, 'path', 'policy.path', defaults.policy.path))
    },
    events: {
      log_path: resolve(cwd, str(events, 'log_path', 'events.log_path', defaults.events.log_path)),
      default_limit: defaultLimit,
      max_limit: int(events, 'max_limit', 'events.max_limit', Math.max(defaults.events.max_limit, defaultLimit), defaultLimit)
    },
    sessions: {
      ttl_ms: int(sessions, 'ttl_ms', 'sessions.ttl_ms', defaults.sessions.ttl_ms, 1),
      max_history: int(sessions, 'max_history', 'sessions.max_history', defaults.sessions.max_history)
    }
  };
}

function applyEnv(config: ServiceConfig, env: NodeJS.ProcessEnv, cwd: string): ServiceConfig {
  const port = env.PORT !== undefined ? Number(env.PORT) : undefined;
  if (port !== undefined && (!Number.isInteger(port) || port < 0)) {
    throw new ConfigError(`PORT must be an integer, got "${env.PORT}"`);
  }
  return {
    ...config,
    server: {
      port: port ?? config.server.port,
      host: env.HOST || config.server.host
    },
    policy: {
      path: env.PROMPT_SHIELD_POLICY ? resolve(cwd, env.PROMPT_SHIELD_POLICY) : config.policy.path
    },
    events: {
      ...config.events,
      log_path: env.PROMPT_SHIELD_EVENT_LOG ? resolve(cwd, env.PROMPT_SHIELD_EVENT_LOG) : config.events.log_path
    }
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): ServiceConfig {
  if (env.PROMPT_SHIELD_CONFIG && !existsSync(resolve(cwd, env.PROMPT_SHIELD_CONFIG))) {
    throw new ConfigError(`PROMPT_SHIELD_CONFIG points to a missing file: ${env.PROMPT_SHIELD_CONFIG}`);
  }
  for (const path of configPaths(env, cwd)) {
    if (existsSync(path)) {
      let raw: unknown;
      try {
        raw = parseYaml(readFileSync(path, 'utf-8'));
      } catch (err) {
        throw new ConfigError(`Failed to read config at "${path}": ${errorMessage(err)}`, { cause: err });
      }
      return applyEnv(parseConfig(raw, cwd), env, cwd);
    }
  }

  return applyEnv(defaultConfig(cwd), env, cwd);
}
