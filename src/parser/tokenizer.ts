import type { Token, TokenType } from '../types/parser.js';
import { createParseError } from '../types/errors.js';

const INTEGER = /^-?\d+$/;

/**
 * Line-oriented tokenizer for DIMACS CNF text
 *
 * Comment lines ('c ...') and blank lines are skipped, a 'p' line becomes a
 * single HEADER token, and every other line is split into INTEGER tokens.
 * A line starting with '%' ends the input.
 */
export class Tokenizer {
    private lines: string[];
    private tokens: Token[] = [];

    constructor(input: string) {
        this.lines = input.split(/\r?\n/);
    }

    tokenize(): Token[] {
        for (let i = 0; i < this.lines.length; i++) {
            const source = this.lines[i];
            const line = i + 1;
            const trimmed = source.trim();

            if (trimmed === '' || trimmed.startsWith('c')) continue;

            if (trimmed.startsWith('%')) {
                this.addToken('EOF', '%', line, source.indexOf('%') + 1, source);
                return this.tokens;
            }

            if (trimmed.startsWith('p')) {
                this.addToken('HEADER', trimmed, line, source.indexOf('p') + 1, source);
                continue;
            }

            for (const match of source.matchAll(/\S+/g)) {
                const value = match[0];
                const col = (match.index ?? 0) + 1;
                if (!INTEGER.test(value)) {
                    throw createParseError(`Unexpected token '${value}'`, line, col, source);
                }
                this.addToken('INTEGER', value, line, col, source);
            }
        }

        this.addToken('EOF', '', this.lines.length, 1, '');
        return this.tokens;
    }

    private addToken(type: TokenType, value: string, line: number, col: number, source: string): void {
        this.tokens.push({ type, value, line, col, source });
    }
}
