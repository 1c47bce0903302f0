/**
 * Structured Error System for the DPLL solver
 *
 * Provides machine-readable errors with codes, spans, and suggestions.
 */

/**
 * Error codes for solver operations
 */
export type SolverErrorCode =
  | 'PARSE_ERROR'            // Malformed token in DIMACS input
  | 'INVALID_HEADER'         // Missing, duplicated or malformed "p cnf" line
  | 'INVALID_LITERAL'        // Zero or non-integer literal inside a clause
  | 'VARIABLE_OUT_OF_RANGE'  // Literal magnitude exceeds the declared variable count
  | 'BRANCH_EXHAUSTED'       // Search ran out of variables on an undecided formula
  | 'INVALID_OPTIONS';       // Bad configuration value

/**
 * Source location span for error reporting
 */
export interface ErrorSpan {
  start: number;
  end: number;
  line?: number;
  col?: number;
}

/**
 * Structured error with code, message, span, and suggestions
 */
export interface SolverError {
  code: SolverErrorCode;
  message: string;
  span?: ErrorSpan;
  suggestion?: string;
  context?: string;          // The offending line or token
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping SolverError for throw/catch patterns
 */
export class SolverException extends Error {
  public readonly error: SolverError;

  constructor(error: SolverError) {
    super(error.message);
    this.name = 'SolverException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SolverException);
    }
  }

  get code(): SolverErrorCode {
    return this.error.code;
  }

  toJSON(): SolverError {
    return this.error;
  }
}

export function isSolverException(e: unknown): e is SolverException {
  return e instanceof SolverException;
}

/**
 * Create a parse error pointing at a token in the input
 */
export function createParseError(
  message: string,
  line: number,
  col: number,
  context?: string
): SolverException {
  return new SolverException({
    code: 'PARSE_ERROR',
    message: `Line ${line}: ${message}`,
    span: { start: col - 1, end: col, line, col },
    suggestion: 'Clauses must be whitespace-separated integers terminated by 0',
    context,
  });
}

/**
 * Create a header error
 */
export function createHeaderError(
  message: string,
  line?: number,
  context?: string
): SolverException {
  return new SolverException({
    code: 'INVALID_HEADER',
    message: line !== undefined ? `Line ${line}: ${message}` : message,
    span: line !== undefined ? { start: 0, end: context?.length ?? 0, line, col: 1 } : undefined,
    suggestion: "Expected a single header of the form 'p cnf <variables> <clauses>' before the first clause",
    context,
  });
}

export function createInvalidLiteralError(
  literal: unknown,
  clauseIndex: number
): SolverException {
  return new SolverException({
    code: 'INVALID_LITERAL',
    message: `Clause ${clauseIndex}: ${String(literal)} is not a valid literal`,
    suggestion: 'Literals are nonzero integers; 0 only terminates a clause in DIMACS text',
    details: { literal: String(literal), clauseIndex },
  });
}

/**
 * Create an out-of-range variable error, located in the input when the
 * caller knows where the literal came from
 */
export function createVariableRangeError(
  literal: number,
  variableCount: number,
  clauseIndex: number,
  location?: { line: number; col: number; context?: string }
): SolverException {
  const prefix = location ? `Line ${location.line}` : `Clause ${clauseIndex}`;
  return new SolverException({
    code: 'VARIABLE_OUT_OF_RANGE',
    message: `${prefix}: literal ${literal} exceeds the declared variable count ${variableCount}`,
    span: location
      ? { start: location.col - 1, end: location.col - 1 + String(literal).length, line: location.line, col: location.col }
      : undefined,
    suggestion: 'Increase the variable count in the header or renumber the variables',
    context: location?.context,
    details: { literal, variableCount, clauseIndex },
  });
}

/**
 * Create a branch exhaustion error. This is an internal assertion: it can
 * only be raised when a formula references variables beyond its bound.
 */
export function createBranchExhaustedError(
  branch: number,
  variableCount: number,
  remainingClauses: number
): SolverException {
  return new SolverException({
    code: 'BRANCH_EXHAUSTED',
    message: `Branch counter ${branch} exceeds variable count ${variableCount} with ${remainingClauses} undecided clauses`,
    details: { branch, variableCount, remainingClauses },
  });
}

export function createInvalidOptionsError(
  message: string,
  details?: Record<string, unknown>
): SolverException {
  return new SolverException({
    code: 'INVALID_OPTIONS',
    message: `Invalid options: ${message}`,
    details,
  });
}

/**
 * Serialize a SolverError for JSON output
 */
export function serializeSolverError(error: SolverError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.span && { span: error.span }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}
