import type { Token } from '../types/parser.js';
import type { CnfProblem } from '../types/clause.js';
import { createHeaderError, createVariableRangeError } from '../types/errors.js';
import { buildFormula } from '../logic/formula.js';

const HEADER = /^p\s+cnf\s+(\d+)\s+(\d+)$/;

/**
 * Parsed problem plus what the reader noticed along the way.
 */
export interface DimacsResult extends CnfProblem {
    /** Clauses read from the input, tautologies included */
    parsedClauseCount: number;
    /** Tautological clauses dropped while building the formula */
    droppedTautologies: number;
}

/**
 * Parser for DIMACS CNF
 *
 * Grammar:
 *   file   = HEADER clause* EOF
 *   clause = INTEGER* '0'      (the final '0' may be missing at EOF)
 */
export class Parser {
    private tokens: Token[];
    private pos: number = 0;

    constructor(tokens: Token[]) {
        this.tokens = tokens;
    }

    parse(): DimacsResult {
        const { variableCount, clauseCount } = this.parseHeader();
        const raw: number[][] = [];
        let clause: number[] = [];
        let open = false;

        for (let token = this.current(); token.type !== 'EOF'; token = this.advance()) {
            if (token.type === 'HEADER') {
                throw createHeaderError('Duplicate header', token.line, token.source);
            }

            const literal = Number(token.value);
            if (literal === 0) {
                raw.push(clause);
                clause = [];
                open = false;
                continue;
            }
            if (Math.abs(literal) > variableCount) {
                throw createVariableRangeError(literal, variableCount, raw.length, {
                    line: token.line,
                    col: token.col,
                    context: token.source,
                });
            }
            clause.push(literal);
            open = true;
        }

        if (open) {
            raw.push(clause);
        }

        const clauses = buildFormula(raw, variableCount);
        return {
            variableCount,
            clauseCount,
            clauses,
            parsedClauseCount: raw.length,
            droppedTautologies: raw.length - clauses.length,
        };
    }

    private parseHeader(): { variableCount: number; clauseCount: number } {
        const token = this.current();
        if (token.type === 'EOF') {
            throw createHeaderError("Missing 'p cnf' header");
        }
        if (token.type !== 'HEADER') {
            throw createHeaderError('Clause found before the header', token.line, token.source);
        }

        const m = token.value.match(HEADER);
        if (!m) {
            throw createHeaderError(`Malformed header '${token.value}'`, token.line, token.source);
        }

        const variableCount = Number(m[1]);
        const clauseCount = Number(m[2]);
        if (!Number.isSafeInteger(variableCount) || !Number.isSafeInteger(clauseCount)) {
            throw createHeaderError(`Header counts out of range in '${token.value}'`, token.line, token.source);
        }

        this.advance();
        return { variableCount, clauseCount };
    }

    private current(): Token {
        return this.tokens[this.pos] || { type: 'EOF', value: '', line: 0, col: 0, source: '' };
    }

    private advance(): Token {
        this.pos++;
        return this.current();
    }
}
