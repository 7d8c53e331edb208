/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { isSameBlock, normalizeBlock, normalizeConfig } from '../ledger-normalizer.js';
import { ValidationError } from '../../../lib/errors.js';

function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    return null;
}

describe('normalizeBlock', () => {
    it('should map the wire payload onto the block model', () => {
        const block = normalizeBlock({
            index: 42,
            hash: 'ABCDEF',
            previous_hash: '0A0B0C',
            timestamp: 1_700_000_000_000,
            transactions: [
                { id: 'tx-1', accepted: false, instructions: [{ op: 'transfer', amount: 5 }] },
                { id: 'tx-2' }
            ]
        });

        expect(block).toEqual({
            index: 42,
            hash: 'abcdef',
            parentHash: '0a0b0c',
            timestamp: new Date(1_700_000_000_000),
            transactions: [
                { id: 'tx-1', blockIndex: 42, accepted: false, instructions: [{ op: 'transfer', amount: 5 }] },
                { id: 'tx-2', blockIndex: 42, accepted: true, instructions: [] }
            ]
        });
    });

    it('should treat a missing or null previous hash as genesis', () => {
        expect(normalizeBlock({ index: 0, hash: 'aa', timestamp: 0 }).parentHash).toBeNull();
        expect(normalizeBlock({ index: 0, hash: 'aa', previous_hash: null, timestamp: 0 }).parentHash).toBeNull();
    });

    it('should default to an empty transaction list', () => {
        expect(normalizeBlock({ index: 3, hash: 'bb', timestamp: 10 }).transactions).toEqual([]);
    });

    it('should reject malformed payloads with the failing fields', () => {
        const error = captureError(() => normalizeBlock({ index: -1, hash: '', timestamp: 1 }));

        expect(error).toBeInstanceOf(ValidationError);
        expect(error).toHaveProperty('message', 'Malformed block payload from ledger');
        expect(error).toHaveProperty('code', 'VALIDATION_ERROR');
        expect(error).toHaveProperty('details.index');
        expect(error).toHaveProperty('details.hash');
    });

    it('should reject non-object payloads', () => {
        expect(() => normalizeBlock('not a block')).toThrow(ValidationError);
        expect(() => normalizeBlock(null)).toThrow(ValidationError);
    });
});

describe('normalizeConfig', () => {
    it('should map the block interval', () => {
        expect(normalizeConfig({ block_interval_ms: 2500 })).toEqual({ blockIntervalMs: 2500 });
    });

    it('should carry the maximum block size when present', () => {
        expect(normalizeConfig({ block_interval_ms: 2500, max_block_size: 512 })).toEqual({
            blockIntervalMs: 2500,
            maxBlockSize: 512
        });
    });

    it('should reject a non-positive block interval', () => {
        expect(() => normalizeConfig({ block_interval_ms: 0 })).toThrow('Malformed config payload from ledger');
    });
});

describe('isSameBlock', () => {
    it('should compare blocks by hash', () => {
        expect(isSameBlock({ hash: 'aa' }, { hash: 'aa' })).toBe(true);
        expect(isSameBlock({ hash: 'aa' }, { hash: 'bb' })).toBe(false);
    });

    it('should treat an empty cursor as different from any block', () => {
        expect(isSameBlock(null, { hash: 'aa' })).toBe(false);
    });
});
