export interface SolveOptions {
    /** Wall-clock budget in seconds; the search reports 'unknown' when it runs out */
    maxSeconds?: number;
    /** Maximum number of case splits before the search reports 'unknown' */
    maxDecisions?: number;
    /** First variable to branch on */
    startBranch?: number;
    /**
     * Callback for progress updates.
     * @param depth The branch counter of the decision being made.
     * @param message A descriptive message about the current step.
     */
    onProgress?: (depth: number, message: string) => void;
}

export const DEFAULTS = {
    maxSeconds: 0,
    maxDecisions: 0,
    startBranch: 1,
    verbosity: 'standard',
} as const;
