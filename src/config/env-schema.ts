/**
 * Registry of every environment key the watcher reads.
 *
 * Each entry declares:
 *   - `key`         The exact env variable name.
 *   - `type`        Whether the value is a sensitive secret or a plain env var.
 *   - `class`       'required' | 'optional'.
 *   - `scope`       Subsystem that owns the key.
 *   - `description` Human-readable purpose.
 *   - `remediation` Actionable hint when the key is missing or invalid.
 */

export type ConfigKeyClass = 'required' | 'optional';

export type ConfigKeyType = 'secret' | 'env';

export type ConfigKeyScope = 'watch' | 'api' | 'state' | 'runtime';

/** Commands that consume a key. `check` never needs the watch settings. */
export type ConfigUsage = 'watch' | 'check';

export interface ConfigKeySpec {
  key: string;
  type: ConfigKeyType;
  class: ConfigKeyClass;
  scope: ConfigKeyScope;
  usedBy: readonly ConfigUsage[];
  description: string;
  remediation: string;
}

export const CONFIG_SCHEMA: readonly ConfigKeySpec[] = [
  // ── Watch ────────────────────────────────────────────────────────────────────
  {
    key: 'WATCH_DIR',
    type: 'env',
    class: 'required',
    scope: 'watch',
    usedBy: ['watch'],
    description: 'Directory watched recursively for configuration file changes.',
    remediation: 'Set WATCH_DIR to an existing directory, e.g. WATCH_DIR=/etc/pihole.',
  },
  {
    key: 'WATCH_INCLUDE',
    type: 'env',
    class: 'optional',
    scope: 'watch',
    usedBy: ['watch'],
    description: 'Regular expression an absolute event path must match to count.',
    remediation: 'Set WATCH_INCLUDE to a valid regular expression, e.g. WATCH_INCLUDE=\\.(toml|conf)$.',
  },
  {
    key: 'WATCH_EXCLUDE',
    type: 'env',
    class: 'optional',
    scope: 'watch',
    usedBy: ['watch'],
    description: 'Regular expression that rejects matching absolute event paths.',
    remediation: 'Set WATCH_EXCLUDE to a valid regular expression, e.g. WATCH_EXCLUDE=\\.db(-journal)?$.',
  },
  {
    key: 'DEBOUNCE_TIME',
    type: 'env',
    class: 'optional',
    scope: 'watch',
    usedBy: ['watch'],
    description: 'Quiet period in seconds before a burst of changes is evaluated (default: 3).',
    remediation: 'Set DEBOUNCE_TIME to a number of seconds between 0 and 2147483.647, e.g. DEBOUNCE_TIME=2.5.',
  },
  {
    key: 'ONCHANGE_CMD',
    type: 'env',
    class: 'optional',
    scope: 'watch',
    usedBy: ['watch'],
    description: 'Shell command launched once per detected configuration change.',
    remediation: 'Set ONCHANGE_CMD to the sync command to run, e.g. ONCHANGE_CMD="nebula-sync run".',
  },

  // ── Pi-hole API ──────────────────────────────────────────────────────────────
  {
    key: 'PIHOLE_API_URL',
    type: 'env',
    class: 'required',
    scope: 'api',
    usedBy: ['watch', 'check'],
    description: 'Base URL of the Pi-hole web server exposing /api.',
    remediation: 'Set PIHOLE_API_URL to an http(s) URL, e.g. PIHOLE_API_URL=http://127.0.0.1:8080.',
  },
  {
    key: 'PIHOLE_PASSWORD',
    type: 'secret',
    class: 'required',
    scope: 'api',
    usedBy: ['watch', 'check'],
    description: 'Web interface / app password used to open an API session.',
    remediation: 'Set PIHOLE_PASSWORD in your .env file.',
  },

  // ── State ────────────────────────────────────────────────────────────────────
  {
    key: 'PIHOLE_HASH_PATH',
    type: 'env',
    class: 'optional',
    scope: 'state',
    usedBy: ['watch', 'check'],
    description: 'File holding the last summary hash (default: <tmpdir>/pi_hole_config_hash/config.md5).',
    remediation: 'Set PIHOLE_HASH_PATH to a writable file path.',
  },
  {
    key: 'PIHOLE_SID_CACHE_PATH',
    type: 'env',
    class: 'optional',
    scope: 'state',
    usedBy: ['watch', 'check'],
    description: 'File caching the API session id (default: <tmpdir>/pi_hole_config_hash/sid.json).',
    remediation: 'Set PIHOLE_SID_CACHE_PATH to a writable file path.',
  },
  {
    key: 'PIHOLE_HASH_FIRST_RUN_EXIT',
    type: 'env',
    class: 'optional',
    scope: 'state',
    usedBy: ['check'],
    description: 'Exit code of `check` when no previous hash existed (default: 1).',
    remediation: 'Set PIHOLE_HASH_FIRST_RUN_EXIT to an integer between 0 and 255.',
  },

  // ── Runtime ──────────────────────────────────────────────────────────────────
  {
    key: 'LOG_LEVEL',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    usedBy: ['watch', 'check'],
    description: "Minimum log level: 'debug', 'info', 'warn' or 'error' (default: info).",
    remediation: 'Set LOG_LEVEL to one of debug, info, warn, error.',
  },
  {
    key: 'LOG_DIR',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    usedBy: ['watch', 'check'],
    description: "Directory for the daily markdown log (default: ./memory). 'off' disables file logging.",
    remediation: "Set LOG_DIR to a writable directory or to 'off'.",
  },
] as const;

