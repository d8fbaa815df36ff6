import { parseConfig } from '@stacksmith/shared';
import type { Config } from '@stacksmith/shared';
import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return value !== null && typeof value === 'object' && !Array.isArray(value)
    ? { ...(value as Record<string, unknown>) }
    : {};
}

function readJson(path: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`Config file ${path} must contain a JSON object`);
  }
  return parsed as Record<string, unknown>;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): Config {
  let raw: Record<string, unknown> = {};

  // 1. Try configPath if provided, else look for stacksmith.json in CWD
  if (configPath) {
    const resolved = resolve(configPath);
    if (!existsSync(resolved)) {
      throw new Error(`Config file not found: ${resolved}`);
    }
    raw = readJson(resolved);
  } else {
    const defaultPath = resolve('stacksmith.json');
    if (existsSync(defaultPath)) {
      raw = readJson(defaultPath);
    }
  }

  // 2. Build nested structure, applying env var overrides
  const stacksmith = section(raw, 'stacksmith');
  const apply = section(raw, 'apply');
  const logging = section(raw, 'logging');

  if (env.STACKSMITH_STACK_FILE) {
    stacksmith.stackFile = env.STACKSMITH_STACK_FILE;
  }
  if (env.STACKSMITH_STATE_BACKEND) {
    stacksmith.stateBackend = env.STACKSMITH_STATE_BACKEND;
  }
  if (env.STACKSMITH_STATE_PATH) {
    stacksmith.statePath = env.STACKSMITH_STATE_PATH;
  }
  if (env.STACKSMITH_PROVIDER_DB) {
    stacksmith.providerDbPath = env.STACKSMITH_PROVIDER_DB;
  }

  if (env.STACKSMITH_PARALLELISM) {
    apply.parallelism = parseInt(env.STACKSMITH_PARALLELISM, 10);
  }
  if (env.STACKSMITH_MAX_ATTEMPTS) {
    apply.maxAttempts = parseInt(env.STACKSMITH_MAX_ATTEMPTS, 10);
  }
  if (env.STACKSMITH_FAIL_FAST) {
    apply.failFast = env.STACKSMITH_FAIL_FAST === 'true' || env.STACKSMITH_FAIL_FAST === '1';
  }

  if (env.STACKSMITH_LOG_LEVEL) {
    logging.level = env.STACKSMITH_LOG_LEVEL;
  }

  // 3. Validate with parseConfig (zod) and return typed Config
  return parseConfig({
    stacksmith,
    apply,
    logging,
  });
}
