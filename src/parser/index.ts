import { Tokenizer } from './tokenizer.js';
import { Parser } from './parser.js';
import type { DimacsResult } from './parser.js';

export { Tokenizer } from './tokenizer.js';
export { Parser } from './parser.js';
export type { DimacsResult } from './parser.js';

/**
 * Parse DIMACS CNF text into a validated problem
 */
export function parseDimacs(input: string): DimacsResult {
    const tokenizer = new Tokenizer(input);
    const tokens = tokenizer.tokenize();
    const parser = new Parser(tokens);
    return parser.parse();
}

/**
 * Describe a disagreement between the header's clause count and the clauses
 * actually read, or undefined when they match.
 */
export function clauseCountMismatch(result: DimacsResult): string | undefined {
    if (result.clauseCount === result.parsedClauseCount) {
        return undefined;
    }
    return `Header declares ${result.clauseCount} clauses but ${result.parsedClauseCount} were read`;
}
