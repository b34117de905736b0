import path from 'node:path';
import { watch, type FSWatcher } from 'chokidar';
import { logThought } from '../utils/logger.js';
import type {
    FileEventSource,
    RawEventKind,
    RawFileEvent,
    RawFileEventListener,
} from '../types/file-watcher.js';

export interface ChokidarEventSourceOptions {
    /** How long a file size must stay unchanged before a write is reported. */
    stabilityThresholdMs?: number;
    pollIntervalMs?: number;
}

const CHOKIDAR_EVENTS: ReadonlyArray<{ name: 'add' | 'change' | 'unlink' | 'addDir' | 'unlinkDir'; kind: RawEventKind; isDirectory: boolean }> = [
    { name: 'add', kind: 'created', isDirectory: false },
    { name: 'change', kind: 'modified', isDirectory: false },
    { name: 'unlink', kind: 'deleted', isDirectory: false },
    { name: 'addDir', kind: 'created', isDirectory: true },
    { name: 'unlinkDir', kind: 'deleted', isDirectory: true },
];

/**
 * Recursive filesystem event source backed by `chokidar`.
 *
 * `awaitWriteFinish` holds back `add`/`change` until the file has stopped
 * growing, which gives close-after-write semantics on every platform.
 */
export class ChokidarEventSource implements FileEventSource {
    readonly #listeners: Set<RawFileEventListener> = new Set();
    readonly #stabilityThresholdMs: number;
    readonly #pollIntervalMs: number;
    #watcher: FSWatcher | null = null;

    constructor(options: ChokidarEventSourceOptions = {}) {
        this.#stabilityThresholdMs = options.stabilityThresholdMs ?? 300;
        this.#pollIntervalMs = options.pollIntervalMs ?? 100;
    }

    onEvent(listener: RawFileEventListener): () => void {
        this.#listeners.add(listener);
        return () => {
            this.#listeners.delete(listener);
        };
    }

    async start(rootDir: string): Promise<void> {
        if (this.#watcher) return; // Already watching

        const directory = path.resolve(rootDir);
        const watcher = watch(directory, {
            persistent: true,
            ignoreInitial: true,
            awaitWriteFinish: {
                stabilityThreshold: this.#stabilityThresholdMs,
                pollInterval: this.#pollIntervalMs,
            },
        });

        for (const { name, kind, isDirectory } of CHOKIDAR_EVENTS) {
            watcher.on(name, (filePath: string) => {
                this.#emit({ kind, isDirectory, path: path.resolve(filePath) });
            });
        }

        watcher.on('error', (err: unknown) => {
            const message = err instanceof Error ? err.message : String(err);
            void logThought(`[FileWatcher] Error while watching ${directory}: ${message}`, 'error');
        });

        this.#watcher = watcher;
        await logThought(`[FileWatcher] Watching ${directory}`);
    }

    async stop(): Promise<void> {
        const watcher = this.#watcher;
        if (!watcher) return;

        this.#watcher = null;
        await watcher.close();
        await logThought('[FileWatcher] Stopped watching.', 'debug');
    }

    #emit(event: RawFileEvent): void {
        for (const listener of this.#listeners) {
            try {
                listener(event);
            } catch (err) {
                const message = err instanceof Error ? err.message : String(err);
                void logThought(`[FileWatcher] Listener threw an error: ${message}`, 'error');
            }
        }
    }
}
