/**
 * Verdict reporting tests
 */

import { buildSolveReport, exitCodeFor, formatVerdict } from '../src/utils/response';
import type { SatResult } from '../src/engines/interface';

function result(status: SatResult['status'], extra: Partial<SatResult> = {}): SatResult {
    return {
        status,
        sat: status === 'unknown' ? undefined : status === 'sat',
        statistics: {
            timeMs: 7,
            variables: 2,
            clauses: 3,
            decisions: 4,
            propagations: 5,
            pureLiterals: 6,
            maxDepth: 1,
        },
        ...extra,
    };
}

describe('formatVerdict', () => {
    it('names each outcome', () => {
        expect(formatVerdict(result('sat'))).toBe('SATISFIABLE');
        expect(formatVerdict(result('unsat'))).toBe('UNSATISFIABLE');
        expect(formatVerdict(result('unknown'))).toBe('UNKNOWN');
    });
});

describe('exitCodeFor', () => {
    it('follows the 10/20 convention', () => {
        expect(exitCodeFor(result('sat'))).toBe(10);
        expect(exitCodeFor(result('unsat'))).toBe(20);
        expect(exitCodeFor(result('unknown'))).toBe(0);
    });
});

describe('buildSolveReport', () => {
    it('minimal reports only the verdict', () => {
        expect(buildSolveReport(result('sat'), 'minimal')).toEqual({ status: 'sat', result: 'SATISFIABLE' });
    });

    it('standard adds size, timing and a message', () => {
        expect(buildSolveReport(result('unsat'), 'standard')).toEqual({
            status: 'unsat',
            result: 'UNSATISFIABLE',
            message: 'Formula with 2 variables and 3 clauses is unsatisfiable',
            variables: 2,
            clauses: 3,
            timeMs: 7,
        });
    });

    it('detailed adds the engine and search counters', () => {
        expect(buildSolveReport(result('sat'), 'detailed')).toEqual({
            status: 'sat',
            result: 'SATISFIABLE',
            message: 'Formula with 2 variables and 3 clauses is satisfiable',
            variables: 2,
            clauses: 3,
            timeMs: 7,
            engineUsed: 'dpll',
            statistics: { decisions: 4, propagations: 5, pureLiterals: 6, maxDepth: 1 },
        });
    });

    it('explains an unknown outcome', () => {
        const report = buildSolveReport(result('unknown', { reason: 'time limit reached' }), 'standard');
        expect(report).toMatchObject({
            result: 'UNKNOWN',
            message: 'Search stopped without a verdict: time limit reached',
        });
    });
});
