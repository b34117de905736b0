#!/usr/bin/env node
import 'dotenv/config';
import { handleCheckCli, handleHelpCli, handleUnknownCommand, handleWatchCli } from './core/cli.js';
import { logThought } from './utils/logger.js';

const argv = process.argv.slice(2);

// ── One-shot commands ────────────────────────────────────────────────────────

if (handleHelpCli(argv)) {
    process.exit(process.exitCode ?? 0);
}

if (handleUnknownCommand(argv)) {
    process.exit(process.exitCode ?? 1);
}

if (await handleCheckCli(argv)) {
    process.exit(process.exitCode ?? 0);
}

// ── Watcher ──────────────────────────────────────────────────────────────────

const watcher = await handleWatchCli(argv);
if (!watcher) {
    process.exit(process.exitCode ?? 2);
}

const shutdown = (signal: NodeJS.Signals): void => {
    void logThought(`Received ${signal}.`);
    watcher.stop().then(
        () => process.exit(0),
        (err: unknown) => {
            const message = err instanceof Error ? err.message : String(err);
            console.error(`[pihole-config-watch] Shutdown failed: ${message}`);
            process.exit(1);
        },
    );
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
