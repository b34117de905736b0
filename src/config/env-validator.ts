/**
 * Startup configuration validator.
 *
 * Produces structured, redaction-safe diagnostics for:
 *   - Missing required config keys.
 *   - Format/type violations on plain env vars.
 *
 * and turns a clean environment into typed settings for the `watch` and
 * `check` commands. No secret values are ever included in the output.
 */

import { statSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { CONFIG_SCHEMA } from './env-schema.js';
import type { ConfigKeySpec, ConfigUsage } from './env-schema.js';
import { ConfigError } from '../utils/errors.js';
import { isLogLevel } from '../utils/logger.js';
import { DEFAULT_FIRST_RUN_EXIT } from '../types/check-result.js';
import { MAX_QUIET_PERIOD_MS } from '../services/debounce-coalescer.js';

// ── Public types ──────────────────────────────────────────────────────────────

export type Env = Record<string, string | undefined>;

export type ConfigIssueClass = 'missing_required' | 'format_error';

export interface ConfigIssue {
  /** Affected config key. */
  key: string;
  class: ConfigIssueClass;
  message: string;
  /** Actionable remediation hint (no secret values). */
  remediation: string;
}

export interface ConfigValidationResult {
  ok: boolean;
  presentKeys: string[];
  issues: ConfigIssue[];
  /** ISO-8601 timestamp of validation run. */
  validatedAt: string;
}

export interface CheckSettings {
  apiUrl: string;
  password: string;
  hashPath: string;
  sidCachePath: string;
  firstRunExitCode: number;
}

export interface WatchSettings extends CheckSettings {
  watchDir: string;
  include: RegExp | null;
  exclude: RegExp | null;
  quietPeriodMs: number;
  onChangeCommand: string | null;
}

export const DEFAULT_DEBOUNCE_SECONDS = 3;

const DEFAULT_STATE_DIR = path.join(os.tmpdir(), 'pi_hole_config_hash');

// ── Internal helpers ─────────────────────────────────────────────────────────

function readValue(env: Env, key: string): string | null {
  const raw = env[key];
  return typeof raw === 'string' && raw.trim().length > 0 ? raw : null;
}

function compileRegex(source: string): RegExp | string {
  try {
    return new RegExp(source);
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}

/**
 * Validate format constraints for a present key.
 * Returns an issue string if invalid, null if ok.
 */
function formatError(spec: ConfigKeySpec, raw: string): string | null {
  const value = raw.trim();

  switch (spec.key) {
    case 'WATCH_DIR': {
      try {
        if (!statSync(path.resolve(value)).isDirectory()) {
          return `WATCH_DIR must be a directory, got '${value}'.`;
        }
      } catch {
        return `Watch directory does not exist: ${path.resolve(value)}`;
      }
      break;
    }
    case 'WATCH_INCLUDE':
    case 'WATCH_EXCLUDE': {
      const compiled = compileRegex(raw);
      if (typeof compiled === 'string') {
        return `${spec.key} is not a valid regular expression: ${compiled}`;
      }
      break;
    }
    case 'DEBOUNCE_TIME': {
      const parsed = Number(value);
      if (!Number.isFinite(parsed) || parsed < 0) {
        return `DEBOUNCE_TIME must be a non-negative number of seconds, got '${value}'.`;
      }
      if (Math.round(parsed * 1000) > MAX_QUIET_PERIOD_MS) {
        return `DEBOUNCE_TIME must be at most ${MAX_QUIET_PERIOD_MS / 1000} seconds, got '${value}'.`;
      }
      break;
    }
    case 'PIHOLE_API_URL': {
      let url: URL;
      try {
        url = new URL(value);
      } catch {
        return `PIHOLE_API_URL must be a valid URL, got '${value}'.`;
      }
      if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        return `PIHOLE_API_URL must use http or https, got '${url.protocol}'.`;
      }
      break;
    }
    case 'PIHOLE_HASH_FIRST_RUN_EXIT': {
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < 0 || parsed > 255) {
        return `PIHOLE_HASH_FIRST_RUN_EXIT must be an integer in range 0–255, got '${value}'.`;
      }
      break;
    }
    case 'LOG_LEVEL': {
      if (!isLogLevel(value.toLowerCase())) {
        return `LOG_LEVEL must be one of debug, info, warn, error, got '${value}'.`;
      }
      break;
    }
    default:
      break;
  }

  return null;
}

// ── Public API ───────────────────────────────────────────────────────────────

/**
 * Validate every key the given command consumes. Secret keys are only checked
 * for presence.
 */
export function validateRuntimeConfig(
  usage: ConfigUsage,
  env: Env = process.env,
  now: () => Date = () => new Date(),
): ConfigValidationResult {
  const issues: ConfigIssue[] = [];
  const presentKeys: string[] = [];

  for (const spec of CONFIG_SCHEMA) {
    if (!spec.usedBy.includes(usage)) {
      continue;
    }

    const raw = readValue(env, spec.key);

    if (raw === null) {
      if (spec.class === 'required') {
        issues.push({
          key: spec.key,
          class: 'missing_required',
          message: `${spec.key} environment variable is required. ${spec.description}`,
          remediation: spec.remediation,
        });
      }
      continue;
    }

    presentKeys.push(spec.key);

    const formatErr = spec.type === 'env' ? formatError(spec, raw) : null;
    if (formatErr) {
      issues.push({
        key: spec.key,
        class: 'format_error',
        message: formatErr,
        remediation: spec.remediation,
      });
    }
  }

  return {
    ok: issues.length === 0,
    presentKeys: presentKeys.sort(),
    issues,
    validatedAt: now().toISOString(),
  };
}

function requireValid(usage: ConfigUsage, env: Env): void {
  const result = validateRuntimeConfig(usage, env);
  if (!result.ok) {
    throw new ConfigError(result.issues);
  }
}

function buildCheckSettings(env: Env): CheckSettings {
  const firstRunRaw = readValue(env, 'PIHOLE_HASH_FIRST_RUN_EXIT');

  return {
    apiUrl: (readValue(env, 'PIHOLE_API_URL') ?? '').trim(),
    password: readValue(env, 'PIHOLE_PASSWORD') ?? '',
    hashPath: path.resolve(readValue(env, 'PIHOLE_HASH_PATH')?.trim() ?? path.join(DEFAULT_STATE_DIR, 'config.md5')),
    sidCachePath: path.resolve(readValue(env, 'PIHOLE_SID_CACHE_PATH')?.trim() ?? path.join(DEFAULT_STATE_DIR, 'sid.json')),
    firstRunExitCode: firstRunRaw === null ? DEFAULT_FIRST_RUN_EXIT : Number(firstRunRaw.trim()),
  };
}

/**
 * Settings for a standalone hash check.
 * @throws ConfigError listing every fatal issue (no secret values).
 */
export function loadCheckSettings(env: Env = process.env): CheckSettings {
  requireValid('check', env);
  return buildCheckSettings(env);
}

/**
 * Settings for the long-running watcher.
 * @throws ConfigError listing every fatal issue (no secret values).
 */
export function loadWatchSettings(env: Env = process.env): WatchSettings {
  requireValid('watch', env);

  const include = readValue(env, 'WATCH_INCLUDE');
  const exclude = readValue(env, 'WATCH_EXCLUDE');
  const debounceRaw = readValue(env, 'DEBOUNCE_TIME');
  const debounceSeconds = debounceRaw === null ? DEFAULT_DEBOUNCE_SECONDS : Number(debounceRaw.trim());

  return {
    ...buildCheckSettings(env),
    watchDir: path.resolve((readValue(env, 'WATCH_DIR') ?? '').trim()),
    include: include === null ? null : new RegExp(include),
    exclude: exclude === null ? null : new RegExp(exclude),
    quietPeriodMs: Math.round(debounceSeconds * 1000),
    onChangeCommand: readValue(env, 'ONCHANGE_CMD'),
  };
}
