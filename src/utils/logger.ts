import chalk from 'chalk';

export interface Logger {
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
    /** Only printed in verbose mode */
    debug(message: string): void;
}

/**
 * Diagnostics logger for the CLI. Everything goes to stderr so stdout
 * carries only the verdict.
 */
export function createLogger(verbose: boolean, sink: (line: string) => void = line => console.error(line)): Logger {
    return {
        info: message => sink(chalk.cyan(message)),
        warn: message => sink(chalk.yellow(`Warning: ${message}`)),
        error: message => sink(chalk.red(`Error: ${message}`)),
        debug: message => {
            if (verbose) sink(chalk.gray(message));
        },
    };
}
