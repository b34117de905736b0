import type { CheckSettings, WatchSettings } from '../config/env-validator.js';
import type { FileEventSource } from '../types/file-watcher.js';
import { ChangeWatcher } from '../services/change-watcher.js';
import { CredentialCache } from '../services/credential-cache.js';
import { ChokidarEventSource } from '../services/file-watcher.js';
import { HashPipeline } from '../services/hash-pipeline.js';
import { HashStore } from '../services/hash-store.js';
import { PiholeApiClient, type FetchLike } from '../services/pihole-api.js';
import { logThought } from '../utils/logger.js';

export interface MonitorDependencies {
    fetch?: FetchLike;
    source?: FileEventSource;
}

/** Assemble the change-detection pipeline from validated settings. */
export function createHashPipeline(settings: CheckSettings, fetchImpl?: FetchLike): HashPipeline {
    return new HashPipeline({
        client: new PiholeApiClient({ baseUrl: settings.apiUrl, fetch: fetchImpl }),
        password: settings.password,
        credentials: new CredentialCache({ filePath: settings.sidCachePath }),
        hashStore: new HashStore(settings.hashPath),
    });
}

/** Build and start the long-running watcher. */
export async function startMonitor(settings: WatchSettings, deps: MonitorDependencies = {}): Promise<ChangeWatcher> {
    const watcher = new ChangeWatcher({
        rootDir: settings.watchDir,
        include: settings.include,
        exclude: settings.exclude,
        quietPeriodMs: settings.quietPeriodMs,
        onChangeCommand: settings.onChangeCommand,
        source: deps.source ?? new ChokidarEventSource(),
        detector: createHashPipeline(settings, deps.fetch),
    });

    await logThought(
        `[Monitor] Watching ${settings.watchDir} (quiet period ${settings.quietPeriodMs}ms` +
        `${settings.include ? `, include ${settings.include.source}` : ''}` +
        `${settings.exclude ? `, exclude ${settings.exclude.source}` : ''}).`,
    );
    await watcher.start();
    return watcher;
}
