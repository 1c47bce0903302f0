/**
 * Clause Store
 *
 * Builds validated CNF formulas and provides the copy helpers the search
 * uses to keep sibling branches isolated.
 */

import type { Formula, Literal } from '../types/clause.js';
import { createInvalidLiteralError, createVariableRangeError } from '../types/errors.js';

/**
 * Build a formula from raw literal sequences.
 *
 * Literals must be nonzero integers no larger in magnitude than
 * `variableCount`. Tautological clauses are dropped, duplicate literals are
 * collapsed, and clauses that were empty on input are kept.
 */
export function buildFormula(
    rawClauses: ReadonlyArray<ReadonlyArray<number>>,
    variableCount: number
): Formula {
    const formula: Formula = [];

    rawClauses.forEach((raw, clauseIndex) => {
        const seen = new Set<Literal>();
        let tautology = false;

        for (const lit of raw) {
            if (!Number.isInteger(lit) || lit === 0) {
                throw createInvalidLiteralError(lit, clauseIndex);
            }
            if (Math.abs(lit) > variableCount) {
                throw createVariableRangeError(lit, variableCount, clauseIndex);
            }
            if (seen.has(-lit)) {
                tautology = true;
            }
            seen.add(lit);
        }

        if (!tautology) {
            formula.push([...seen]);
        }
    });

    return formula;
}

/**
 * True if the clause contains some literal and its negation.
 */
export function isTautology(clause: readonly Literal[]): boolean {
    const seen = new Set(clause);
    return clause.some(lit => seen.has(-lit));
}

export function hasEmptyClause(formula: Formula): boolean {
    return formula.some(clause => clause.length === 0);
}

/**
 * Structural clone: fresh outer and inner arrays.
 */
export function cloneFormula(formula: Formula): Formula {
    return formula.map(clause => clause.slice());
}

/**
 * Clone the formula and append the unit clause `[literal]`.
 */
export function withUnit(formula: Formula, literal: Literal): Formula {
    const copy = cloneFormula(formula);
    copy.push([literal]);
    return copy;
}

/**
 * Total number of literal occurrences across all clauses.
 */
export function literalCount(formula: Formula): number {
    let count = 0;
    for (const clause of formula) {
        count += clause.length;
    }
    return count;
}
