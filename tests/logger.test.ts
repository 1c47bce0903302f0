/**
 * CLI logger tests
 */

import chalk from 'chalk';
import { createLogger } from '../src/utils/logger';

describe('createLogger', () => {
    const originalLevel = chalk.level;

    beforeAll(() => {
        chalk.level = 0;
    });

    afterAll(() => {
        chalk.level = originalLevel;
    });

    it('prefixes warnings and errors', () => {
        const lines: string[] = [];
        const log = createLogger(false, line => lines.push(line));
        log.info('reading');
        log.warn('header mismatch');
        log.error('bad input');
        expect(lines).toEqual(['reading', 'Warning: header mismatch', 'Error: bad input']);
    });

    it('prints debug lines only when verbose', () => {
        const quiet: string[] = [];
        createLogger(false, line => quiet.push(line)).debug('hidden');
        expect(quiet).toEqual([]);

        const loud: string[] = [];
        createLogger(true, line => loud.push(line)).debug('shown');
        expect(loud).toEqual(['shown']);
    });
});
