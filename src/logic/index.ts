/**
 * Core Logic Modules
 *
 * Centralizes exports for the clause store and the simplification rules.
 */

export * from './formula.js';
export * from './propagate.js';
export * from './pureLiterals.js';
