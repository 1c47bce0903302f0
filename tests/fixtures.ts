/**
 * Shared test fixtures for consistent, DRY testing.
 */
import type { Formula } from '../src/types/clause';

export interface FormulaFixture {
    variableCount: number;
    clauses: Formula;
    expected: boolean;
}

// === Common Formulas ===
export const FORMULAS: Record<string, FormulaFixture> = {
    // Every clause over two variables: no assignment survives
    allClausesTwoVars: {
        variableCount: 2,
        clauses: [[1, 2], [-1, 2], [1, -2], [-1, -2]],
        expected: false,
    },
    // Needs one split; the positive branch succeeds
    oneSplitSat: {
        variableCount: 2,
        clauses: [[1, 2], [-1, -2], [1, -2]],
        expected: true,
    },
    // Variable 1 is irrelevant but never pure; 2 and 3 are contradictory
    twoLevelUnsat: {
        variableCount: 3,
        clauses: [[1, 2, 3], [-1, 2, 3], [2, -3], [-2, 3], [-2, -3]],
        expected: false,
    },
    // Odd parity over three variables
    parity: {
        variableCount: 3,
        clauses: [[1, 2, 3], [1, -2, -3], [-1, 2, -3], [-1, -2, 3]],
        expected: true,
    },
};

export const DIMACS = {
    sat: 'c two variables, one clause\np cnf 2 1\n1 2 0\n',
    unsat: 'p cnf 1 2\n1 0\n-1 0\n',
    twoLevelUnsat: 'p cnf 3 5\n1 2 3 0\n-1 2 3 0\n2 -3 0\n-2 3 0\n-2 -3 0\n',
};

/**
 * Pigeonhole principle: `pigeons` pigeons in `holes` holes, one per hole.
 * Unsatisfiable whenever pigeons > holes.
 */
export function pigeonhole(pigeons: number, holes: number): { variableCount: number; clauses: Formula } {
    const v = (p: number, h: number) => (p - 1) * holes + h;
    const clauses: Formula = [];

    for (let p = 1; p <= pigeons; p++) {
        const somewhere: number[] = [];
        for (let h = 1; h <= holes; h++) somewhere.push(v(p, h));
        clauses.push(somewhere);
    }
    for (let h = 1; h <= holes; h++) {
        for (let p = 1; p <= pigeons; p++) {
            for (let q = p + 1; q <= pigeons; q++) {
                clauses.push([-v(p, h), -v(q, h)]);
            }
        }
    }

    return { variableCount: pigeons * holes, clauses };
}

/**
 * Deterministic random k-CNF generator (linear congruential).
 */
export function randomCnf(seed: number, variableCount: number, clauseCount: number, width: number): number[][] {
    let state = seed >>> 0;
    const next = () => {
        state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
        return state;
    };

    const clauses: number[][] = [];
    for (let i = 0; i < clauseCount; i++) {
        const clause: number[] = [];
        for (let j = 0; j < width; j++) {
            const variable = (next() % variableCount) + 1;
            clause.push(next() % 2 === 0 ? variable : -variable);
        }
        clauses.push(clause);
    }
    return clauses;
}

/**
 * Reference answer by enumerating every assignment.
 */
export function bruteForceSat(clauses: Formula, variableCount: number): boolean {
    for (let mask = 0; mask < (1 << variableCount); mask++) {
        const value = (lit: number) => {
            const bit = (mask >> (Math.abs(lit) - 1)) & 1;
            return lit > 0 ? bit === 1 : bit === 0;
        };
        if (clauses.every(clause => clause.some(value))) {
            return true;
        }
    }
    return false;
}

/**
 * Run `fn` and return what it threw, or undefined.
 */
export function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (e) {
        return e;
    }
    return undefined;
}
