import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { logSystemCommand, logThought } from '../utils/logger.js';
import { ActionError } from '../utils/errors.js';

export type SpawnLike = (command: string, options: SpawnOptions) => ChildProcess;

/** Launches the configured follow-up command; resolves to whether it was launched. */
export type FollowUpRunner = (command: string) => Promise<boolean>;

/**
 * Launch `command` through the shell without waiting for it to finish.
 * Resolves once the process has spawned (true) or failed to spawn (false).
 * Output is not captured. A launch failure is logged and swallowed.
 */
export async function runFollowUpCommand(command: string, spawnImpl: SpawnLike = spawn): Promise<boolean> {
    const normalized = command.trim();
    if (!normalized) {
        await logThought('[FollowUp] Empty command; nothing to run.', 'warn');
        return false;
    }

    await logThought(`[FollowUp] Executing: ${normalized}`);

    let child: ChildProcess;
    try {
        child = spawnImpl(normalized, {
            shell: true,
            stdio: 'inherit',
            windowsHide: true,
        });
    } catch (err) {
        await reportLaunchFailure(normalized, err);
        return false;
    }

    child.once('exit', (code, signal) => {
        void logSystemCommand(normalized, signal ? `terminated by ${signal}` : '', code);
    });

    return new Promise<boolean>((resolve) => {
        let launched = false;
        child.once('spawn', () => {
            launched = true;
            resolve(true);
        });
        child.on('error', (err) => {
            void reportLaunchFailure(normalized, err);
            if (!launched) resolve(false);
        });
    });
}

async function reportLaunchFailure(command: string, cause: unknown): Promise<void> {
    const failure = new ActionError(command, cause);
    await logThought(`[FollowUp] ${failure.message}`, 'error');
}
