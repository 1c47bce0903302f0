/**
 * Parser Types
 */

export type TokenType =
    | 'HEADER'        // p cnf <vars> <clauses>
    | 'INTEGER'       // literal, or 0 terminating a clause
    | 'EOF';          // end of input, or a '%' line

export interface Token {
    type: TokenType;
    value: string;
    /** 1-based line number */
    line: number;
    /** 1-based column of the first character */
    col: number;
    /** Full text of the source line, for error context */
    source: string;
}
