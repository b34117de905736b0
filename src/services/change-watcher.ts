import * as fs from 'node:fs/promises';
import { logThought } from '../utils/logger.js';
import { describeError } from '../utils/errors.js';
import type { ChangeDetector, CheckResult } from '../types/check-result.js';
import type {
    FileEventSource,
    FileSnapshot,
    RawEventKind,
    RawFileEvent,
} from '../types/file-watcher.js';
import { DebounceCoalescer } from './debounce-coalescer.js';
import { runFollowUpCommand, type FollowUpRunner } from './follow-up-action.js';

/** Event kinds that may indicate a content change. */
export const ALLOWED_EVENT_KINDS: ReadonlySet<RawEventKind> = new Set<RawEventKind>([
    'modified',
    'created',
    'moved',
    'closed-write',
]);

export type DiscardReason = 'kind' | 'include' | 'exclude' | 'unchanged';

export type StatFn = (path: string) => Promise<FileSnapshot>;

export interface ChangeWatcherOptions {
    rootDir: string;
    include?: RegExp | null;
    exclude?: RegExp | null;
    quietPeriodMs: number;
    onChangeCommand?: string | null;
    source: FileEventSource;
    detector: ChangeDetector;
    runFollowUp?: FollowUpRunner;
    stat?: StatFn;
    now?: () => number;
}

export interface ChangeWatcherStats {
    eventsReceived: number;
    eventsForwarded: number;
    eventsDiscarded: Record<DiscardReason, number>;
    checksRun: number;
    followUpsLaunched: number;
}

async function statSnapshot(filePath: string): Promise<FileSnapshot> {
    const stats = await fs.stat(filePath, { bigint: true });
    return { mtimeNs: stats.mtimeNs, size: stats.size };
}

function isMissingFileError(err: unknown): boolean {
    if (typeof err !== 'object' || err === null || !('code' in err)) return false;
    return err.code === 'ENOENT' || err.code === 'ENOTDIR';
}

/**
 * Filters raw filesystem events, coalesces the survivors and, once activity has
 * settled, runs one change-detection pass. A detected change launches the
 * follow-up command once.
 */
export class ChangeWatcher {
    readonly #rootDir: string;
    readonly #include: RegExp | null;
    readonly #exclude: RegExp | null;
    readonly #onChangeCommand: string | null;
    readonly #source: FileEventSource;
    readonly #detector: ChangeDetector;
    readonly #runFollowUp: FollowUpRunner;
    readonly #stat: StatFn;
    readonly #coalescer: DebounceCoalescer;
    readonly #snapshots: Map<string, FileSnapshot> = new Map();
    readonly #stats: ChangeWatcherStats = {
        eventsReceived: 0,
        eventsForwarded: 0,
        eventsDiscarded: { kind: 0, include: 0, exclude: 0, unchanged: 0 },
        checksRun: 0,
        followUpsLaunched: 0,
    };

    #unsubscribe: (() => void) | null = null;
    #stopping: Promise<void> | null = null;

    constructor(options: ChangeWatcherOptions) {
        this.#rootDir = options.rootDir;
        this.#include = options.include ?? null;
        this.#exclude = options.exclude ?? null;
        this.#onChangeCommand = options.onChangeCommand ?? null;
        this.#source = options.source;
        this.#detector = options.detector;
        this.#runFollowUp = options.runFollowUp ?? ((command) => runFollowUpCommand(command));
        this.#stat = options.stat ?? statSnapshot;
        this.#coalescer = new DebounceCoalescer(() => this.#syncConfigs(), {
            quietPeriodMs: options.quietPeriodMs,
            now: options.now,
        });
    }

    get coalescer(): DebounceCoalescer {
        return this.#coalescer;
    }

    get snapshotCount(): number {
        return this.#snapshots.size;
    }

    stats(): ChangeWatcherStats {
        return {
            ...this.#stats,
            eventsDiscarded: { ...this.#stats.eventsDiscarded },
        };
    }

    /** Subscribe and start the source. A stopped watcher cannot be restarted. */
    async start(): Promise<void> {
        if (this.#stopping) {
            throw new Error('ChangeWatcher cannot be restarted after stop(); create a new instance.');
        }
        if (this.#unsubscribe) return;

        this.#unsubscribe = this.#source.onEvent((event) => {
            void this.handleEvent(event);
        });
        await this.#source.start(this.#rootDir);
    }

    /** Stop watching and wait for a check that is already running. Idempotent. */
    stop(): Promise<void> {
        if (!this.#stopping) {
            const drained = this.#coalescer.stop();
            this.#unsubscribe?.();
            this.#unsubscribe = null;
            this.#stopping = this.#shutdown(drained);
        }
        return this.#stopping;
    }

    /**
     * Run one raw event through the filter pipeline. Resolves to true when the
     * event was forwarded to the coalescer.
     */
    async handleEvent(event: RawFileEvent): Promise<boolean> {
        this.#stats.eventsReceived += 1;

        if (event.isDirectory || !ALLOWED_EVENT_KINDS.has(event.kind)) {
            return this.#discard('kind');
        }

        if (this.#include && !this.#include.test(event.path)) {
            return this.#discard('include');
        }

        if (this.#exclude && this.#exclude.test(event.path)) {
            return this.#discard('exclude');
        }

        if (!(await this.#hasRealChange(event.path))) {
            await logThought(`[ChangeWatcher] Skipping ${event.path}; metadata unchanged.`, 'debug');
            return this.#discard('unchanged');
        }

        await logThought(`[ChangeWatcher] File changed (${event.kind}): ${event.path}`, 'debug');
        this.#stats.eventsForwarded += 1;
        this.#coalescer.notify();
        return true;
    }

    #discard(reason: DiscardReason): false {
        this.#stats.eventsDiscarded[reason] += 1;
        return false;
    }

    async #hasRealChange(filePath: string): Promise<boolean> {
        let current: FileSnapshot;
        try {
            current = await this.#stat(filePath);
        } catch (err) {
            if (isMissingFileError(err)) {
                this.#snapshots.delete(filePath);
                return true;
            }
            await logThought(`[ChangeWatcher] Unable to stat ${filePath}: ${describeError(err)}`, 'warn');
            return true;
        }

        const previous = this.#snapshots.get(filePath);
        if (previous && previous.mtimeNs === current.mtimeNs && previous.size === current.size) {
            return false;
        }

        this.#snapshots.set(filePath, current);
        return true;
    }

    async #syncConfigs(): Promise<void> {
        await logThought('[ChangeWatcher] Debounced change detected; running hash check.');
        const result = await this.#runCheck();

        if (result.summaryHash) {
            await logThought(`[ChangeWatcher] Current config hash: ${result.summaryHash}`);
        }

        switch (result.status) {
            case 'changed':
                await logThought('[ChangeWatcher] Configuration change detected.');
                await this.#launchFollowUp();
                break;
            case 'unchanged':
                await logThought('[ChangeWatcher] Configuration unchanged. Skipping sync.');
                break;
            case 'first-run':
                await logThought('[ChangeWatcher] First run; baseline hash stored. Skipping sync.');
                break;
            case 'error':
                await logThought('[ChangeWatcher] Hash check failed; skipping sync.', 'warn');
                break;
        }
    }

    async #runCheck(): Promise<CheckResult> {
        this.#stats.checksRun += 1;

        let result: CheckResult;
        try {
            result = await this.#detector.check();
        } catch (err) {
            result = {
                status: 'error',
                summaryHash: null,
                previousHash: null,
                message: `Hash check raised an unexpected error: ${describeError(err)}`,
            };
        }

        await logThought(`[ChangeWatcher] ${result.message}`, result.status === 'error' ? 'error' : 'info');
        return result;
    }

    async #launchFollowUp(): Promise<void> {
        if (!this.#onChangeCommand) {
            await logThought('[ChangeWatcher] No ONCHANGE_CMD configured; skipping.');
            return;
        }

        if (await this.#runFollowUp(this.#onChangeCommand)) {
            this.#stats.followUpsLaunched += 1;
        }
    }

    async #shutdown(drained: Promise<void>): Promise<void> {
        await logThought('[ChangeWatcher] Shutting down.');
        await this.#source.stop();
        await drained;
    }
}
