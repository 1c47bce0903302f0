/**
 * Unit Propagation Tests
 */

import { assign, findUnit, unitPropagate } from '../src/logic/propagate';
import { createStatistics } from '../src/types/clause';

describe('assign', () => {
    it('drops satisfied clauses and strikes the negation', () => {
        expect(assign([[1, -2], [2, 3]], 2)).toEqual([[1]]);
    });

    it('leaves unrelated clauses untouched', () => {
        const untouched = [4, 5];
        const result = assign([[1], untouched], 1);
        expect(result).toEqual([[4, 5]]);
        expect(result[0]).toBe(untouched);
    });
});

describe('findUnit', () => {
    it('returns the first unit literal', () => {
        expect(findUnit([[1, 2], [-3], [4]])).toBe(-3);
    });

    it('returns undefined without unit clauses', () => {
        expect(findUnit([[1, 2], []])).toBeUndefined();
    });
});

describe('unitPropagate', () => {
    it('propagates through chains of newly created units', () => {
        const stats = createStatistics();
        const result = unitPropagate([[1], [-1, 2], [-2, 3], [4, 5]], stats);
        expect(result).toEqual([[4, 5]]);
        expect(stats.propagations).toBe(3);
    });

    it('produces an empty clause on conflicting units', () => {
        expect(unitPropagate([[1], [-1], [2, 3]])).toEqual([[], [2, 3]]);
    });

    it('empties the formula when every clause is satisfied', () => {
        expect(unitPropagate([[1]])).toEqual([]);
    });

    it('derives the contradiction in [[1,2],[-1],[-2]]', () => {
        expect(unitPropagate([[1, 2], [-1], [-2]])).toEqual([[]]);
    });

    it('does not mutate its input', () => {
        const formula = [[1], [-1, 2], [2, 3]];
        unitPropagate(formula);
        expect(formula).toEqual([[1], [-1, 2], [2, 3]]);
    });

    it('is idempotent at its fixed point', () => {
        const once = unitPropagate([[1], [-1, 2, 3], [-2, -3], [3, 4]]);
        expect(once).toEqual([[2, 3], [-2, -3], [3, 4]]);
        expect(unitPropagate(once)).toEqual(once);
    });

    it('is a no-op without unit clauses', () => {
        const formula = [[1, 2], [-1, -2]];
        expect(unitPropagate(formula)).toBe(formula);
    });
});
