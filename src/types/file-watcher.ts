/**
 * Kinds of raw notifications a filesystem event source may deliver. Only some
 * of them mean file content could have changed.
 */
export type RawEventKind =
    | 'modified'
    | 'created'
    | 'moved'
    | 'deleted'
    | 'opened'
    | 'closed-write'
    | 'closed-nowrite';

/** Raw filesystem notification as delivered by the event source. */
export interface RawFileEvent {
    kind: RawEventKind;
    /** Absolute path of the affected file or directory. */
    path: string;
    isDirectory: boolean;
}

/** Callback invoked for every raw filesystem event. */
export type RawFileEventListener = (event: RawFileEvent) => void;

/** Recursive watcher over one directory tree. */
export interface FileEventSource {
    start(rootDir: string): Promise<void>;
    stop(): Promise<void>;
    /** Subscribe to raw events. Returns an unsubscribe function. */
    onEvent(listener: RawFileEventListener): () => void;
}

/** Per-path memory of the last seen metadata, used to drop no-op notifications. */
export interface FileSnapshot {
    mtimeNs: bigint;
    size: bigint;
}
