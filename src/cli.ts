#!/usr/bin/env node
import 'dotenv/config';
import { readFileSync } from 'fs';
import { parseDimacs, clauseCountMismatch } from './parser/index.js';
import { createDPLLEngine } from './engines/dpll.js';
import { loadConfig, verbositySchema } from './config.js';
import { buildSolveReport, exitCodeFor, formatVerdict } from './utils/response.js';
import { createLogger } from './utils/logger.js';
import { createInvalidOptionsError, isSolverException, serializeSolverError } from './types/errors.js';
import type { Verbosity } from './types/index.js';

const VERSION = '1.0.0';
const HELP = `
DPLL SAT solver v${VERSION}

Usage:
  dpll-sat [file.cnf]         Decide satisfiability of a DIMACS CNF file
  dpll-sat < file.cnf         Read the formula from stdin (also with '-')

Options:
  --json                   Print a JSON report instead of the verdict line
  --verbosity=<level>      Report detail for --json (minimal, standard, detailed)
  --max-seconds=<n>        Give up with UNKNOWN after n seconds (0 = no limit)
  --max-decisions=<n>      Give up with UNKNOWN after n case splits (0 = no limit)
  --verbose                Print progress and statistics on stderr
  --help, -h               Show this help
  --version, -v            Show version

Environment:
  DPLL_MAX_SECONDS, DPLL_MAX_DECISIONS, DPLL_VERBOSITY

Exit status: 10 satisfiable, 20 unsatisfiable, 0 unknown, 1 error.
`;

export interface CliArgs {
    file?: string;
    json: boolean;
    verbose: boolean;
    help: boolean;
    version: boolean;
    verbosity?: Verbosity;
    maxSeconds?: number;
    maxDecisions?: number;
}

export interface CliIO {
    stdout: (line: string) => void;
    stderr: (line: string) => void;
    /** Read the named file, or stdin when undefined */
    readInput: (file: string | undefined) => string;
    env: Record<string, string | undefined>;
}

function numericFlag(name: string, value: string | undefined): number {
    const n = Number(value);
    if (value === undefined || value.trim() === '' || !Number.isFinite(n)) {
        throw createInvalidOptionsError(`--${name} expects a number, got '${value ?? ''}'`);
    }
    return n;
}

/**
 * Parse command-line arguments (without the node and script entries).
 */
export function parseArgs(args: string[]): CliArgs {
    const parsed: CliArgs = { json: false, verbose: false, help: false, version: false };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
        const flag = eq >= 0 ? arg.slice(0, eq) : arg;
        const inline = eq >= 0 ? arg.slice(eq + 1) : undefined;
        const value = (): string | undefined => inline ?? args[++i];

        switch (flag) {
            case '--help': case '-h': parsed.help = true; break;
            case '--version': case '-v': parsed.version = true; break;
            case '--json': parsed.json = true; break;
            case '--verbose': parsed.verbose = true; break;
            case '--max-seconds': parsed.maxSeconds = numericFlag('max-seconds', value()); break;
            case '--max-decisions': parsed.maxDecisions = numericFlag('max-decisions', value()); break;
            case '--verbosity': {
                const level = verbositySchema.safeParse(value());
                if (!level.success) {
                    throw createInvalidOptionsError(`--verbosity must be one of ${verbositySchema.options.join(', ')}`);
                }
                parsed.verbosity = level.data;
                break;
            }
            default:
                if (arg !== '-' && arg.startsWith('-')) {
                    throw createInvalidOptionsError(`Unknown option '${arg}'`);
                }
                if (parsed.file !== undefined) {
                    throw createInvalidOptionsError('Only one input file may be given');
                }
                parsed.file = arg;
        }
    }

    return parsed;
}

/**
 * Run the CLI and return the process exit code.
 */
export function run(args: string[], io: CliIO): number {
    let cli: CliArgs;
    try {
        cli = parseArgs(args);
    } catch (e) {
        if (!isSolverException(e)) throw e;
        io.stderr(`Error: ${e.message}`);
        return 1;
    }
    const log = createLogger(cli.verbose, io.stderr);

    if (cli.help) {
        io.stdout(HELP);
        return 0;
    }
    if (cli.version) {
        io.stdout(VERSION);
        return 0;
    }

    try {
        const config = loadConfig(io.env);
        const file = cli.file === '-' ? undefined : cli.file;
        let input: string;
        try {
            input = io.readInput(file);
        } catch (e) {
            if (!(e instanceof Error)) throw e;
            log.error(`Cannot read ${file ?? 'stdin'}: ${e.message}`);
            return 1;
        }
        const problem = parseDimacs(input);

        const mismatch = clauseCountMismatch(problem);
        if (mismatch) log.warn(mismatch);
        log.debug(`Read ${problem.variableCount} variables, ${problem.parsedClauseCount} clauses (${problem.droppedTautologies} tautologies dropped)`);

        const engine = createDPLLEngine();
        const result = engine.checkSat(problem, {
            maxSeconds: cli.maxSeconds ?? config.maxSeconds,
            maxDecisions: cli.maxDecisions ?? config.maxDecisions,
            onProgress: cli.verbose ? (depth, message) => log.debug(`[${depth}] ${message}`) : undefined,
        });

        const { decisions, propagations, pureLiterals, maxDepth, timeMs } = result.statistics;
        log.debug(`decisions=${decisions} propagations=${propagations} pure=${pureLiterals} depth=${maxDepth} time=${timeMs}ms`);
        if (result.reason) log.warn(result.reason);

        if (cli.json) {
            io.stdout(JSON.stringify(buildSolveReport(result, cli.verbosity ?? config.verbosity, engine.name), null, 2));
        } else {
            io.stdout(formatVerdict(result));
        }
        return exitCodeFor(result);
    } catch (e) {
        if (isSolverException(e)) {
            if (cli.json) {
                io.stdout(JSON.stringify({ error: serializeSolverError(e.error) }, null, 2));
            }
            log.error(e.message);
            if (e.error.suggestion) log.info(e.error.suggestion);
            return 1;
        }
        throw e;
    }
}

if (require.main === module) {
    const code = run(process.argv.slice(2), {
        stdout: line => console.log(line),
        stderr: line => console.error(line),
        readInput: file => readFileSync(file ?? 0, 'utf-8'),
        env: process.env,
    });
    process.exit(code);
}
