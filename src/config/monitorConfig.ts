// Configuration loader
// Built once at startup from environment variables (and .env) plus CLI overrides,
// then passed explicitly; core modules never read the environment

import dotenv from 'dotenv';
import { EntityKind } from '../domain/types/types';

export type StateBackend = 'file' | 'redis';

export interface MonitorConfig {
  target: string;
  subnet: string;
  scan: {
    nmapPath: string;
    timeoutsMs: Record<EntityKind, number>;
  };
  webhook: {
    url?: string;
    username: string;
    timeoutMs: number;
  };
  state: {
    backend: StateBackend;
    files: Record<EntityKind, string>;
    redis: {
      host: string;
      port: number;
      db: number;
    };
    keyPrefix: string;
  };
  logFile?: string;
}

export interface ConfigOverrides {
  target?: string;
  subnet?: string;
  nmapPath?: string;
  webhookUrl?: string;
  stateBackend?: string;
  logFile?: string;
}

export type Environment = Record<string, string | undefined>;

/**
 * Load a .env file into process.env. Variables already set are not overridden.
 */
export function loadEnvironment(envFile?: string): Environment {
  dotenv.config(envFile ? { path: envFile } : undefined);
  return process.env;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

// Blank entries (`WEBHOOK_URL=` in a .env file) fall through to the next candidate
function firstPresent(...values: (string | undefined)[]): string | undefined {
  for (const value of values) {
    const present = nonEmpty(value);
    if (present !== undefined) {
      return present;
    }
  }
  return undefined;
}

function required(name: string, value: string | undefined): string {
  const present = nonEmpty(value);
  if (!present) {
    throw new Error(`Missing required configuration: ${name}`);
  }
  return present;
}

function positiveInteger(name: string, value: string | undefined, fallback: number): number {
  const present = nonEmpty(value);
  if (present === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(present) || parseInt(present, 10) <= 0) {
    throw new Error(`Invalid configuration ${name}: expected a positive integer, got "${present}"`);
  }
  return parseInt(present, 10);
}

function nonNegativeInteger(name: string, value: string | undefined, fallback: number): number {
  const present = nonEmpty(value);
  if (present === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(present)) {
    throw new Error(`Invalid configuration ${name}: expected a non-negative integer, got "${present}"`);
  }
  return parseInt(present, 10);
}

function stateBackend(value: string | undefined): StateBackend {
  const present = nonEmpty(value) ?? 'file';
  if (present !== 'file' && present !== 'redis') {
    throw new Error(`Invalid configuration STATE_BACKEND: expected "file" or "redis", got "${present}"`);
  }
  return present;
}

export function loadConfig(env: Environment, overrides: ConfigOverrides = {}): MonitorConfig {
  return {
    target: required('TARGET', firstPresent(overrides.target, env.TARGET)),
    subnet: required('SUBNET', firstPresent(overrides.subnet, env.SUBNET)),
    scan: {
      nmapPath: firstPresent(overrides.nmapPath, env.NMAP_PATH) ?? 'nmap',
      timeoutsMs: {
        ports: positiveInteger('PORT_SCAN_TIMEOUT_MS', env.PORT_SCAN_TIMEOUT_MS, 300000),
        hosts: positiveInteger('HOST_SCAN_TIMEOUT_MS', env.HOST_SCAN_TIMEOUT_MS, 120000),
      },
    },
    webhook: {
      url: firstPresent(overrides.webhookUrl, env.WEBHOOK_URL, env.DISCORD_WEBHOOK),
      username: nonEmpty(env.WEBHOOK_USERNAME) ?? 'Webhooks BOT',
      timeoutMs: positiveInteger('WEBHOOK_TIMEOUT_MS', env.WEBHOOK_TIMEOUT_MS, 10000),
    },
    state: {
      backend: stateBackend(firstPresent(overrides.stateBackend, env.STATE_BACKEND)),
      files: {
        ports: nonEmpty(env.PREV_PORTS_FILE) ?? './state/ports.json',
        hosts: nonEmpty(env.PREV_HOSTS_FILE) ?? './state/hosts.json',
      },
      redis: {
        host: nonEmpty(env.REDIS_HOST) ?? 'localhost',
        port: positiveInteger('REDIS_PORT', env.REDIS_PORT, 6379),
        db: nonNegativeInteger('REDIS_DB', env.REDIS_DB, 0),
      },
      keyPrefix: nonEmpty(env.STATE_KEY_PREFIX) ?? 'netdrift:snapshot',
    },
    logFile: firstPresent(overrides.logFile, env.LOG_FILE),
  };
}
