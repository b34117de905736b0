import * as fs from 'node:fs/promises';
import path from 'node:path';

/** Single-file store for the last summary hash. */
export class HashStore {
    readonly #filePath: string;

    constructor(filePath: string) {
        this.#filePath = filePath;
    }

    get filePath(): string {
        return this.#filePath;
    }

    /** Returns null on first run (no file yet). */
    async read(): Promise<string | null> {
        try {
            const raw = await fs.readFile(this.#filePath, 'ascii');
            return raw.trim();
        } catch (err) {
            const fsError = err as NodeJS.ErrnoException;
            if (fsError.code === 'ENOENT') return null;
            throw new Error(`Failed to read stored hash at ${this.#filePath}: ${fsError.message}`, { cause: err });
        }
    }

    async write(hash: string): Promise<void> {
        await fs.mkdir(path.dirname(this.#filePath), { recursive: true });
        await fs.writeFile(this.#filePath, `${hash}\n`, 'ascii');
    }
}
