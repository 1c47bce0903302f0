/**
 * CNF Clause Types
 *
 * Types for representing propositional formulas in Conjunctive Normal Form (CNF).
 */

/**
 * A literal is a nonzero integer: the magnitude names the variable,
 * the sign gives the polarity (negative means the variable is false).
 */
export type Literal = number;

/**
 * A clause is a disjunction of literals. The empty clause is false.
 */
export type Clause = Literal[];

/**
 * A CNF formula is a conjunction of clauses. The empty formula is true.
 */
export type Formula = Clause[];

/**
 * A validated problem, as read from DIMACS input.
 */
export interface CnfProblem {
    /** Declared upper bound on variable magnitude */
    variableCount: number;
    /** Clause count declared in the header */
    clauseCount: number;
    /** Clauses after tautology removal */
    clauses: Formula;
}

/**
 * Counters updated by the simplification steps and the search.
 */
export interface SearchStatistics {
    /** Case splits performed */
    decisions: number;
    /** Unit clauses resolved */
    propagations: number;
    /** Pure literals eliminated */
    pureLiterals: number;
    /** Deepest branch counter reached */
    maxDepth: number;
}

export function createStatistics(): SearchStatistics {
    return { decisions: 0, propagations: 0, pureLiterals: 0, maxDepth: 0 };
}
