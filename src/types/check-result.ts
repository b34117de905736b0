/** Outcome of comparing the freshly computed summary hash with the stored one. */
export type CheckStatus = 'unchanged' | 'changed' | 'first-run' | 'error';

export interface CheckResult {
    readonly status: CheckStatus;
    /** Combined digest of all resources; null when the check failed. */
    readonly summaryHash: string | null;
    readonly previousHash: string | null;
    readonly message: string;
}

/** Anything able to run one change-detection pass. */
export interface ChangeDetector {
    check(): Promise<CheckResult>;
}

export const EXIT_UNCHANGED = 0;
export const EXIT_CHANGED = 1;
export const EXIT_CONFIG_ERROR = 2;
export const EXIT_CHECK_ERROR = 3;
export const DEFAULT_FIRST_RUN_EXIT = 1;

/** Process exit status for a standalone check. */
export function exitCodeFor(result: CheckResult, firstRunExitCode: number = DEFAULT_FIRST_RUN_EXIT): number {
    switch (result.status) {
        case 'unchanged':
            return EXIT_UNCHANGED;
        case 'changed':
            return EXIT_CHANGED;
        case 'first-run':
            return firstRunExitCode;
        case 'error':
            return EXIT_CHECK_ERROR;
    }
}
