/**
 * Solver configuration
 *
 * Budgets and verbosity come from DEFAULTS, then the environment
 * (DPLL_MAX_SECONDS, DPLL_MAX_DECISIONS, DPLL_VERBOSITY), then whatever the
 * caller passes explicitly.
 */

import { z } from 'zod';
import { DEFAULTS } from './types/options.js';
import type { Verbosity } from './types/responses.js';
import { createInvalidOptionsError } from './types/errors.js';

export const verbositySchema = z.enum(['minimal', 'standard', 'detailed']);

/**
 * Numeric search limits. Zero disables a limit.
 */
export const budgetSchema = z.object({
    maxSeconds: z.number().finite().nonnegative().optional(),
    maxDecisions: z.number().int().nonnegative().optional(),
    startBranch: z.number().int().min(1).optional(),
});

export type Budget = z.infer<typeof budgetSchema>;

const envSchema = z.object({
    DPLL_MAX_SECONDS: z.coerce.number().finite().nonnegative().optional(),
    DPLL_MAX_DECISIONS: z.coerce.number().int().nonnegative().optional(),
    DPLL_VERBOSITY: verbositySchema.optional(),
});

export interface SolverConfig {
    maxSeconds: number;
    maxDecisions: number;
    verbosity: Verbosity;
}

function describeIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

/**
 * Validate search limits, throwing INVALID_OPTIONS on bad values.
 */
export function parseBudget(input: Budget): Required<Budget> {
    const parsed = budgetSchema.safeParse(input);
    if (!parsed.success) {
        throw createInvalidOptionsError(describeIssues(parsed.error), { input });
    }
    return {
        maxSeconds: parsed.data.maxSeconds ?? DEFAULTS.maxSeconds,
        maxDecisions: parsed.data.maxDecisions ?? DEFAULTS.maxDecisions,
        startBranch: parsed.data.startBranch ?? DEFAULTS.startBranch,
    };
}

/**
 * Read configuration from an environment map (usually process.env).
 */
export function loadConfig(env: Record<string, string | undefined>): SolverConfig {
    const parsed = envSchema.safeParse({
        DPLL_MAX_SECONDS: env.DPLL_MAX_SECONDS,
        DPLL_MAX_DECISIONS: env.DPLL_MAX_DECISIONS,
        DPLL_VERBOSITY: env.DPLL_VERBOSITY,
    });
    if (!parsed.success) {
        throw createInvalidOptionsError(describeIssues(parsed.error));
    }
    return {
        maxSeconds: parsed.data.DPLL_MAX_SECONDS ?? DEFAULTS.maxSeconds,
        maxDecisions: parsed.data.DPLL_MAX_DECISIONS ?? DEFAULTS.maxDecisions,
        verbosity: parsed.data.DPLL_VERBOSITY ?? DEFAULTS.verbosity,
    };
}
