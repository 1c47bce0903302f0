/**
 * Response types for the solver
 */

import type { SearchStatistics } from './clause.js';

/**
 * Verbosity level for responses
 */
export type Verbosity = 'minimal' | 'standard' | 'detailed';

/**
 * Outcome of a search. 'unknown' means the budget ran out first.
 */
export type SatStatus = 'sat' | 'unsat' | 'unknown';

/**
 * Verdict text printed by the reporting layer
 */
export type Verdict = 'SATISFIABLE' | 'UNSATISFIABLE' | 'UNKNOWN';

/**
 * Minimal response - just the verdict
 */
export interface MinimalSolveResponse {
    status: SatStatus;
    result: Verdict;
}

/**
 * Standard response - includes problem size and timing
 */
export interface StandardSolveResponse extends MinimalSolveResponse {
    message: string;
    variables: number;
    clauses: number;
    timeMs: number;
}

/**
 * Detailed response - includes search counters
 */
export interface DetailedSolveResponse extends StandardSolveResponse {
    engineUsed: string;
    statistics: SearchStatistics;
}

/**
 * Union type for solve responses
 */
export type SolveResponse = MinimalSolveResponse | StandardSolveResponse | DetailedSolveResponse;
