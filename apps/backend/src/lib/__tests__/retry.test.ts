/// <reference types="vitest" />

import { describe, it, expect, afterEach, vi } from 'vitest';
import { retry } from '../retry.js';

describe('retry', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('should return the first successful result', async () => {
        const fn = vi.fn().mockResolvedValue('ok');

        await expect(retry(fn)).resolves.toBe('ok');
        expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should retry until the call succeeds', async () => {
        const fn = vi.fn()
            .mockRejectedValueOnce(new Error('first'))
            .mockResolvedValueOnce('second');

        await expect(retry(fn, { delayMs: 0 })).resolves.toBe('second');
        expect(fn).toHaveBeenCalledTimes(2);
    });

    it('should rethrow the last error after retries + 1 attempts', async () => {
        const fn = vi.fn()
            .mockRejectedValueOnce(new Error('e1'))
            .mockRejectedValueOnce(new Error('e2'))
            .mockRejectedValueOnce(new Error('e3'));

        await expect(retry(fn, { retries: 2, delayMs: 0 })).rejects.toThrow('e3');
        expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should stop early when shouldRetry declines', async () => {
        const fn = vi.fn().mockRejectedValue(new Error('permanent'));

        await expect(retry(fn, { delayMs: 0, shouldRetry: () => false })).rejects.toThrow('permanent');
        expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should wrap non-Error rejections', async () => {
        const fn = vi.fn().mockRejectedValue('plain');

        await expect(retry(fn, { retries: 0 })).rejects.toThrow('plain');
    });

    it('should grow the delay by the backoff factor', async () => {
        vi.useFakeTimers();
        const fn = vi.fn().mockRejectedValue(new Error('down'));
        const onRetry = vi.fn();

        const assertion = expect(retry(fn, { retries: 2, delayMs: 100, factor: 3, onRetry })).rejects.toThrow('down');
        await vi.advanceTimersByTimeAsync(400);
        await assertion;

        expect(fn).toHaveBeenCalledTimes(3);
        expect(onRetry.mock.calls.map(call => call[2])).toEqual([100, 300]);
        expect(onRetry.mock.calls.map(call => call[0])).toEqual([1, 2]);
    });
});
