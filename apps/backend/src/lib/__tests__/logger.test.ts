/// <reference types="vitest" />

import { describe, it, expect, beforeEach } from 'vitest';
import pino from 'pino';
import { PinoLogger } from '../logger.js';

describe('PinoLogger', () => {
    let lines: string[];
    let logger: PinoLogger;

    beforeEach(() => {
        lines = [];
        const instance = pino(
            { level: 'trace', base: undefined, timestamp: false },
            { write: (line: string) => { lines.push(line); } }
        );
        logger = new PinoLogger(instance);
    });

    const records = (): unknown[] => lines.map(line => JSON.parse(line));

    it('should log a plain message', () => {
        logger.info('started');

        expect(records()).toEqual([{ level: 30, msg: 'started' }]);
    });

    it('should log structured fields with a message', () => {
        logger.warn({ attempt: 2 }, 'retrying');

        expect(records()).toEqual([{ level: 40, attempt: 2, msg: 'retrying' }]);
    });

    it('should map every level', () => {
        logger.trace('t');
        logger.debug('d');
        logger.error('e');
        logger.fatal('f');

        expect(records()).toEqual([
            { level: 10, msg: 't' },
            { level: 20, msg: 'd' },
            { level: 50, msg: 'e' },
            { level: 60, msg: 'f' }
        ]);
    });

    it('should carry child bindings', () => {
        logger.child({ module: 'subscription' }).info({ index: 5 }, 'New ledger block');

        expect(records()).toEqual([{ level: 30, module: 'subscription', index: 5, msg: 'New ledger block' }]);
    });

    it('should expose the underlying level', () => {
        expect(logger.level).toBe('trace');
    });
});
