/**
 * Pure-Literal Elimination
 */

import type { Formula, Literal, SearchStatistics } from '../types/clause.js';

/**
 * Literals whose negation occurs nowhere in the formula, in first-seen order.
 */
export function findPureLiterals(formula: Formula): Literal[] {
    const occurring = new Set<Literal>();
    for (const clause of formula) {
        for (const lit of clause) {
            occurring.add(lit);
        }
    }

    const pure: Literal[] = [];
    for (const lit of occurring) {
        if (!occurring.has(-lit)) {
            pure.push(lit);
        }
    }
    return pure;
}

/**
 * Remove every clause containing a pure literal, rescanning until no pure
 * literal is left. Removing clauses can make other literals pure, hence the
 * loop. Returns the input unchanged when it has no pure literals.
 */
export function eliminatePureLiterals(formula: Formula, stats?: SearchStatistics): Formula {
    let current = formula;

    for (let pure = findPureLiterals(current); pure.length > 0; pure = findPureLiterals(current)) {
        const satisfied = new Set(pure);
        current = current.filter(clause => !clause.some(lit => satisfied.has(lit)));
        if (stats) stats.pureLiterals += pure.length;
    }

    return current;
}
