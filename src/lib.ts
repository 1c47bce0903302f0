/**
 * DPLL SAT solver - Library Entry Point
 *
 * Exports the core functionality of the library for use in other projects.
 * This file should NOT import the CLI or anything that reads the environment.
 */

// Core Engine
export { solve, dpll, simplify, createDPLLEngine, createSearchContext, DPLLEngine } from './engines/dpll.js';
export type { SearchContext } from './engines/dpll.js';
export type { SatEngine, SatResult } from './engines/interface.js';

// Clause store and simplification rules
export * from './logic/index.js';

// DIMACS reader
export { parseDimacs, clauseCountMismatch } from './parser/index.js';
export type { DimacsResult } from './parser/index.js';

// Reporting
export { formatVerdict, buildSolveReport, exitCodeFor } from './utils/response.js';

// Configuration
export { loadConfig, parseBudget } from './config.js';
export type { SolverConfig, Budget } from './config.js';

// Types and Interfaces
export * from './types/index.js';
