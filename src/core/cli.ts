import { CONFIG_SCHEMA } from '../config/env-schema.js';
import { loadCheckSettings, loadWatchSettings, type CheckSettings, type Env } from '../config/env-validator.js';
import { ConfigError, describeError } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';
import { EXIT_CHECK_ERROR, EXIT_CONFIG_ERROR, exitCodeFor, type ChangeDetector } from '../types/check-result.js';
import type { ChangeWatcher } from '../services/change-watcher.js';
import { createHashPipeline, startMonitor, type MonitorDependencies } from './monitor.js';

// ── Help text ────────────────────────────────────────────────────────────────

const ENV_HELP = CONFIG_SCHEMA
  .map((spec) => `  ${spec.key.padEnd(28)}${spec.class === 'required' ? '(required) ' : ''}${spec.description}`)
  .join('\n');

const HELP_TEXT = `
Usage: pihole-config-watch [command]

Commands:
  watch               Watch WATCH_DIR and run ONCHANGE_CMD on real changes (default)
  check               Run one hash check and exit with its status

Options:
  --help, -h          Show this help message

Exit codes (check):
  0  configuration unchanged
  1  configuration changed (first run: PIHOLE_HASH_FIRST_RUN_EXIT, default 1)
  2  configuration error
  3  API or state error

Environment:
${ENV_HELP}
`.trim();

const KNOWN_COMMANDS = new Set(['watch', 'check', '--help', '-h']);

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
  if (!argv.includes('--help') && !argv.includes('-h')) return false;

  console.log(HELP_TEXT);
  process.exitCode = 0;
  return true;
}

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets a non-zero exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
  if (argv.length === 0) return false;

  const command = argv[0];
  if (KNOWN_COMMANDS.has(command)) return false;

  console.error(`[pihole-config-watch] Unknown command: '${command}'`);
  console.error(`Run 'pihole-config-watch --help' to see available commands.`);
  process.exitCode = 1;
  return true;
}

export interface CheckCliOptions {
  env?: Env;
  createDetector?: (settings: CheckSettings) => ChangeDetector;
}

/**
 * Handle the `check` command: one standalone hash comparison.
 * The message goes to stdout, or stderr for errors; the exit code carries the status.
 */
export async function handleCheckCli(argv: string[], options: CheckCliOptions = {}): Promise<boolean> {
  if (argv[0] !== 'check') return false;

  let settings: CheckSettings;
  try {
    settings = loadCheckSettings(options.env ?? process.env);
  } catch (err) {
    reportStartupError(err);
    return true;
  }

  const detector = options.createDetector?.(settings) ?? createHashPipeline(settings);

  try {
    const result = await detector.check();
    if (result.status === 'error') {
      console.error(result.message);
    } else {
      console.log(result.message);
    }
    process.exitCode = exitCodeFor(result, settings.firstRunExitCode);
  } catch (err) {
    console.error(`Hash check raised an unexpected error: ${describeError(err)}`);
    process.exitCode = EXIT_CHECK_ERROR;
  }

  return true;
}

export interface WatchCliOptions extends MonitorDependencies {
  env?: Env;
}

/**
 * Handle the default `watch` command.
 * Resolves to the running watcher, or `null` when startup was refused.
 */
export async function handleWatchCli(argv: string[], options: WatchCliOptions = {}): Promise<ChangeWatcher | null> {
  if (argv.length > 0 && argv[0] !== 'watch') return null;

  try {
    const settings = loadWatchSettings(options.env ?? process.env);
    return await startMonitor(settings, options);
  } catch (err) {
    reportStartupError(err);
    return null;
  }
}

function reportStartupError(err: unknown): void {
  if (err instanceof ConfigError) {
    for (const issue of err.issues) {
      console.error(`[pihole-config-watch] ${issue.message} ${issue.remediation}`);
    }
    process.exitCode = EXIT_CONFIG_ERROR;
    return;
  }

  const message = describeError(err);
  console.error(`[pihole-config-watch] Startup failed: ${message}`);
  void logThought(`[Startup] ${message}`, 'error');
  process.exitCode = 1;
}
