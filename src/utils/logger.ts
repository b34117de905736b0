import * as fs from 'node:fs/promises';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

const SENSITIVE_ENV_KEYS = ['PIHOLE_PASSWORD'];
const REDACTED = '[REDACTED]';

const KEY_VALUE_PATTERNS: RegExp[] = [
    /("(?:sid|password)"\s*:\s*")([^"]+)(")/gi,
    /(X-FTL-SID:\s*)(\S+)()/gi,
    /(\b(?:password|sid)=)([^\s&]+)()/gi,
];

export function isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(LEVEL_ORDER, value);
}

function currentLevel(): LogLevel {
    const configured = (process.env.LOG_LEVEL ?? '').trim().toLowerCase();
    return isLogLevel(configured) ? configured : 'info';
}

function resolveLogDir(): string | null {
    const configured = process.env.LOG_DIR?.trim();
    if (configured === 'off') return null;
    return path.resolve(configured || 'memory');
}

function timestamp(date: Date = new Date()): string {
    return date.toISOString().replace('T', ' ').slice(0, 19);
}

/**
 * Redact credentials before anything is printed or persisted.
 * Covers the configured API password and session ids in JSON, header and query form.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text;

    for (const key of SENSITIVE_ENV_KEYS) {
        const value = process.env[key];
        if (value && value.length >= 4) {
            scrubbed = scrubbed.split(value).join(REDACTED);
        }
    }

    for (const pattern of KEY_VALUE_PATTERNS) {
        scrubbed = scrubbed.replace(pattern, (_match, prefix: string, _value: string, suffix: string) =>
            `${prefix}${REDACTED}${suffix}`,
        );
    }

    return scrubbed;
}

async function appendToDailyLog(line: string): Promise<void> {
    const dir = resolveLogDir();
    if (!dir) return;

    const file = path.join(dir, `${new Date().toISOString().slice(0, 10)}.md`);
    try {
        await fs.mkdir(dir, { recursive: true });
        await fs.appendFile(file, `${line}\n`, 'utf8');
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[Logger] Failed to append to ${file}: ${message}`);
    }
}

/**
 * Record a runtime observation on the console and in the daily log file.
 * Never throws.
 */
export async function logThought(message: string, level: LogLevel = 'info'): Promise<void> {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel()]) return;

    const line = `${timestamp()} [${level.toUpperCase()}] ${scrubSensitiveText(message)}`;

    if (level === 'error') {
        console.error(line);
    } else if (level === 'warn') {
        console.warn(line);
    } else {
        console.log(line);
    }

    await appendToDailyLog(line);
}

/** Log a launched shell command together with its outcome. */
export async function logSystemCommand(command: string, output: string, exitCode: number | null): Promise<void> {
    const level: LogLevel = exitCode === 0 ? 'info' : 'warn';
    const detail = output ? ` ${output}` : '';
    await logThought(`[Command] \`${command}\` exited with ${exitCode ?? 'signal'}.${detail}`, level);
}
