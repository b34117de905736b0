import { logThought } from '../utils/logger.js';
import { CallbackError } from '../utils/errors.js';

export type CoalescerState = 'idle' | 'accumulating' | 'running' | 'stopped';

export type CoalescedCallback = () => Promise<void> | void;

/** Longest delay `setTimeout` honours; larger values fire after 1 ms. */
export const MAX_QUIET_PERIOD_MS = 2_147_483_647;

export interface DebounceCoalescerOptions {
    /** Quiet period that must pass without a new signal before the callback fires. */
    quietPeriodMs: number;
    now?: () => number;
}

/**
 * Collapses a burst of change signals into a single callback invocation.
 *
 * Every `notify()` pushes the deadline out to `now + quietPeriodMs`, so the
 * callback only fires once signals have stopped for a full quiet period. At most
 * one callback is in flight; signals arriving while it runs are folded into one
 * follow-up cycle that starts when it settles.
 */
export class DebounceCoalescer {
    readonly #callback: CoalescedCallback;
    readonly #quietPeriodMs: number;
    readonly #now: () => number;

    #state: CoalescerState = 'idle';
    #timer: NodeJS.Timeout | null = null;
    #deadline: number | null = null;
    #lastSignalAt: number | null = null;
    #signalledWhileRunning = false;
    #inFlight: Promise<void> | null = null;
    #firedCount = 0;

    constructor(callback: CoalescedCallback, options: DebounceCoalescerOptions) {
        this.#callback = callback;
        this.#quietPeriodMs = Math.min(Math.max(0, Math.floor(options.quietPeriodMs)), MAX_QUIET_PERIOD_MS);
        this.#now = options.now ?? (() => Date.now());
    }

    get state(): CoalescerState {
        return this.#state;
    }

    get quietPeriodMs(): number {
        return this.#quietPeriodMs;
    }

    /** Epoch ms of the last accepted signal, or null before the first one. */
    get lastSignalAt(): number | null {
        return this.#lastSignalAt;
    }

    /** Epoch ms at which the pending callback is due, or null when nothing is pending. */
    get deadline(): number | null {
        return this.#deadline;
    }

    get firedCount(): number {
        return this.#firedCount;
    }

    notify(): void {
        if (this.#state === 'stopped') return;

        this.#lastSignalAt = this.#now();

        if (this.#state === 'running') {
            this.#signalledWhileRunning = true;
            return;
        }

        this.#state = 'accumulating';
        this.#arm();
    }

    /**
     * Cancel any pending window and refuse further signals. Resolves once a
     * callback that was already running has finished. Safe to call repeatedly.
     */
    stop(): Promise<void> {
        if (this.#state !== 'stopped') {
            this.#state = 'stopped';
            this.#disarm();
            this.#signalledWhileRunning = false;
            void logThought('[Debounce] Stop requested.', 'debug');
        }

        return this.#inFlight ?? Promise.resolve();
    }

    #arm(): void {
        if (this.#timer) {
            clearTimeout(this.#timer);
        }
        this.#deadline = this.#now() + this.#quietPeriodMs;
        this.#timer = setTimeout(() => {
            this.#timer = null;
            this.#fire();
        }, this.#quietPeriodMs);
    }

    #disarm(): void {
        if (this.#timer) {
            clearTimeout(this.#timer);
            this.#timer = null;
        }
        this.#deadline = null;
    }

    #fire(): void {
        if (this.#state !== 'accumulating') return;

        this.#state = 'running';
        this.#deadline = null;
        this.#firedCount += 1;
        void logThought('[Debounce] Quiet period elapsed; invoking callback.', 'debug');

        this.#inFlight = this.#invoke().finally(() => {
            this.#inFlight = null;
            this.#settle();
        });
    }

    async #invoke(): Promise<void> {
        try {
            await this.#callback();
        } catch (err) {
            const failure = new CallbackError(err);
            await logThought(`[Debounce] ${failure.message}`, 'error');
        }
    }

    #settle(): void {
        if (this.#state === 'stopped') return;

        if (this.#signalledWhileRunning) {
            this.#signalledWhileRunning = false;
            this.#state = 'accumulating';
            this.#arm();
            return;
        }

        this.#state = 'idle';
    }
}
