/**
 * Shared type definitions for the DPLL solver
 */

// Re-export error types
export {
    SolverException,
    isSolverException,
    createParseError,
    createHeaderError,
    createInvalidLiteralError,
    createVariableRangeError,
    createBranchExhaustedError,
    createInvalidOptionsError,
    serializeSolverError,
} from './errors.js';

export type {
    SolverErrorCode,
    ErrorSpan,
    SolverError,
} from './errors.js';

// Re-export clause types for CNF
export { createStatistics } from './clause.js';

export type {
    Literal,
    Clause,
    Formula,
    CnfProblem,
    SearchStatistics,
} from './clause.js';

// Re-export response types
export type {
    Verbosity,
    SatStatus,
    Verdict,
    MinimalSolveResponse,
    StandardSolveResponse,
    DetailedSolveResponse,
    SolveResponse,
} from './responses.js';

// Re-export options
export {
    DEFAULTS
} from './options.js';

export type {
    SolveOptions,
} from './options.js';
