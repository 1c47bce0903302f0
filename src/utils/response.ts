import type { SatResult } from '../engines/interface.js';
import type {
    DetailedSolveResponse,
    SolveResponse,
    StandardSolveResponse,
    Verbosity,
    Verdict,
} from '../types/index.js';

/**
 * Verdict line for a result
 */
export function formatVerdict(result: SatResult): Verdict {
    switch (result.status) {
        case 'sat': return 'SATISFIABLE';
        case 'unsat': return 'UNSATISFIABLE';
        case 'unknown': return 'UNKNOWN';
    }
}

/**
 * Process exit code: 10 for SAT, 20 for UNSAT, 0 when undecided.
 */
export function exitCodeFor(result: SatResult): number {
    switch (result.status) {
        case 'sat': return 10;
        case 'unsat': return 20;
        case 'unknown': return 0;
    }
}

function describeResult(result: SatResult): string {
    const { variables, clauses } = result.statistics;
    switch (result.status) {
        case 'sat': return `Formula with ${variables} variables and ${clauses} clauses is satisfiable`;
        case 'unsat': return `Formula with ${variables} variables and ${clauses} clauses is unsatisfiable`;
        case 'unknown': return `Search stopped without a verdict: ${result.reason ?? 'budget exhausted'}`;
    }
}

/**
 * Build a solve report based on verbosity level.
 */
export function buildSolveReport(
    result: SatResult,
    verbosity: Verbosity,
    engineName: string = 'dpll'
): SolveResponse {
    const base = {
        status: result.status,
        result: formatVerdict(result),
    };

    if (verbosity === 'minimal') {
        return base;
    }

    const standard: StandardSolveResponse = {
        ...base,
        message: describeResult(result),
        variables: result.statistics.variables,
        clauses: result.statistics.clauses,
        timeMs: result.statistics.timeMs,
    };

    if (verbosity === 'standard') {
        return standard;
    }

    const { decisions, propagations, pureLiterals, maxDepth } = result.statistics;
    const detailed: DetailedSolveResponse = {
        ...standard,
        engineUsed: engineName,
        statistics: { decisions, propagations, pureLiterals, maxDepth },
    };
    return detailed;
}
