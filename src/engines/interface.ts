/**
 * Solver Engine Interface
 *
 * Contract between the search core and the collaborators that feed it
 * validated problems and report its verdicts.
 */

import type { CnfProblem, SearchStatistics } from '../types/clause.js';
import type { SolveOptions } from '../types/options.js';
import type { SatStatus } from '../types/responses.js';

/**
 * Result of a satisfiability check
 */
export interface SatResult {
    /** 'unknown' when the budget ran out before a verdict */
    status: SatStatus;
    /** The verdict; absent when status is 'unknown' */
    sat?: boolean;
    /** Why the search stopped without a verdict */
    reason?: string;
    /** Statistics about the computation */
    statistics: SearchStatistics & {
        timeMs: number;
        variables: number;
        clauses: number;
    };
}

/**
 * Satisfiability engine.
 */
export interface SatEngine {
    /** Unique name of the engine */
    readonly name: string;

    /**
     * Decide satisfiability of a validated problem.
     * @returns SatResult with status 'sat', 'unsat' or 'unknown'
     */
    checkSat(problem: CnfProblem, options?: SolveOptions): SatResult;
}
