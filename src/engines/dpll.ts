/**
 * DPLL Engine
 *
 * Recursive Davis-Putnam-Logemann-Loveland search. Each call simplifies its
 * formula with unit propagation and pure-literal elimination, then splits on
 * the next variable in numeric order. Partial assignments are never stored:
 * they live in the unit clauses the ancestors appended, which propagation has
 * already consumed.
 */

import type { CnfProblem, Formula, SearchStatistics } from '../types/clause.js';
import { createStatistics } from '../types/clause.js';
import type { SolveOptions } from '../types/options.js';
import { createBranchExhaustedError } from '../types/errors.js';
import { hasEmptyClause, withUnit } from '../logic/formula.js';
import { unitPropagate } from '../logic/propagate.js';
import { eliminatePureLiterals } from '../logic/pureLiterals.js';
import { parseBudget } from '../config.js';
import type { SatEngine, SatResult } from './interface.js';

/**
 * State shared by every call of one search.
 */
export interface SearchContext {
    variableCount: number;
    startBranch: number;
    stats: SearchStatistics;
    /** Epoch milliseconds after which the search gives up; 0 for none */
    deadline: number;
    /** Split limit; 0 for none */
    maxDecisions: number;
    onProgress?: (depth: number, message: string) => void;
}

/**
 * Thrown to unwind the recursion when the budget runs out.
 * Never escapes `solve`.
 */
class BudgetExceeded extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'BudgetExceeded';
    }
}

export function createSearchContext(variableCount: number, options: SolveOptions = {}): SearchContext {
    const budget = parseBudget({
        maxSeconds: options.maxSeconds,
        maxDecisions: options.maxDecisions,
        startBranch: options.startBranch,
    });
    return {
        variableCount,
        startBranch: budget.startBranch,
        stats: createStatistics(),
        deadline: budget.maxSeconds > 0 ? Date.now() + budget.maxSeconds * 1000 : 0,
        maxDecisions: budget.maxDecisions,
        onProgress: options.onProgress,
    };
}

/**
 * Simplify: unit propagation to a fixed point, then pure-literal elimination.
 */
export function simplify(formula: Formula, stats?: SearchStatistics): Formula {
    return eliminatePureLiterals(unitPropagate(formula, stats), stats);
}

/**
 * True iff `formula` is satisfiable over the variables numbered `branch` and
 * above. Variables below `branch` were fixed by ancestor calls.
 *
 * @throws SolverException BRANCH_EXHAUSTED when the counter passes the
 *   variable count on an undecided formula
 */
export function dpll(formula: Formula, branch: number, context: SearchContext): boolean {
    const { stats } = context;
    stats.maxDepth = Math.max(stats.maxDepth, branch - context.startBranch);

    if (context.deadline > 0 && Date.now() > context.deadline) {
        throw new BudgetExceeded('time limit reached');
    }

    const simplified = simplify(formula, stats);

    if (simplified.length === 0) {
        return true;
    }
    if (hasEmptyClause(simplified)) {
        return false;
    }

    if (branch > context.variableCount) {
        throw createBranchExhaustedError(branch, context.variableCount, simplified.length);
    }
    if (context.maxDecisions > 0 && stats.decisions >= context.maxDecisions) {
        throw new BudgetExceeded(`decision limit of ${context.maxDecisions} reached`);
    }

    stats.decisions++;
    context.onProgress?.(branch, `split on variable ${branch} with ${simplified.length} clauses left`);

    return dpll(withUnit(simplified, branch), branch + 1, context)
        || dpll(withUnit(simplified, -branch), branch + 1, context);
}

/**
 * Decide satisfiability of `formula`, whose literals are bounded by
 * `variableCount`. Never prints; the caller reports the verdict.
 */
export function solve(formula: Formula, variableCount: number, options: SolveOptions = {}): SatResult {
    const startTime = Date.now();
    const context = createSearchContext(variableCount, options);

    const finish = (partial: Pick<SatResult, 'status' | 'sat' | 'reason'>): SatResult => ({
        ...partial,
        statistics: {
            ...context.stats,
            timeMs: Date.now() - startTime,
            variables: variableCount,
            clauses: formula.length,
        },
    });

    try {
        const sat = dpll(formula, context.startBranch, context);
        return finish({ status: sat ? 'sat' : 'unsat', sat });
    } catch (e) {
        if (e instanceof BudgetExceeded) {
            return finish({ status: 'unknown', reason: e.message });
        }
        throw e;
    }
}

/**
 * DPLL-based satisfiability engine.
 */
export class DPLLEngine implements SatEngine {
    readonly name = 'dpll';

    constructor(private readonly defaults: SolveOptions = {}) {}

    checkSat(problem: CnfProblem, options: SolveOptions = {}): SatResult {
        return solve(problem.clauses, problem.variableCount, { ...this.defaults, ...options });
    }
}

/**
 * Factory function to create a DPLLEngine
 */
export function createDPLLEngine(defaults?: SolveOptions): DPLLEngine {
    return new DPLLEngine(defaults);
}
