/**
 * Unit Propagation
 *
 * Resolves unit clauses against a formula until none remain.
 */

import type { Clause, Formula, Literal, SearchStatistics } from '../types/clause.js';

export function isUnit(clause: Clause): boolean {
    return clause.length === 1;
}

/**
 * Find the first unit clause's literal, or undefined.
 */
export function findUnit(formula: Formula): Literal | undefined {
    for (const clause of formula) {
        if (isUnit(clause)) {
            return clause[0];
        }
    }
    return undefined;
}

/**
 * Assert `literal`: drop the clauses it satisfies and strike its negation
 * from the rest.
 */
export function assign(formula: Formula, literal: Literal): Formula {
    const negated = -literal;
    const result: Formula = [];

    for (const clause of formula) {
        if (clause.includes(literal)) {
            continue;
        }
        if (clause.includes(negated)) {
            result.push(clause.filter(lit => lit !== negated));
        } else {
            result.push(clause);
        }
    }

    return result;
}

/**
 * Exhaustive unit propagation.
 *
 * Always takes the first unit clause in formula order. The input is not
 * mutated; untouched clauses are shared with the result, so callers copy
 * before mutating (see `cloneFormula`).
 *
 * The result may contain an empty clause or be empty altogether; callers
 * check both.
 */
export function unitPropagate(formula: Formula, stats?: SearchStatistics): Formula {
    let current = formula;

    for (let unit = findUnit(current); unit !== undefined; unit = findUnit(current)) {
        current = assign(current, unit);
        if (stats) stats.propagations++;
    }

    return current;
}
