import { z } from 'zod';
import type { ILedgerBlock, ILedgerConfig, ILedgerTransaction } from '@ledgerwatch/types';
import { ValidationError } from '../../lib/errors.js';

/**
 * Wire schemas for the ledger HTTP API and their mapping onto the shared models.
 *
 * The ledger speaks snake_case JSON; everything past this file only sees the
 * normalized `ILedgerBlock` / `ILedgerConfig` shapes.
 */

const rawTransactionSchema = z.object({
    id: z.string().min(1),
    accepted: z.boolean().default(true),
    instructions: z.array(z.record(z.unknown())).default([])
});

const rawBlockSchema = z.object({
    index: z.number().int().nonnegative(),
    hash: z.string().min(1),
    previous_hash: z.string().min(1).nullable().optional(),
    timestamp: z.number().nonnegative(),
    transactions: z.array(rawTransactionSchema).default([])
});

const rawConfigSchema = z.object({
    block_interval_ms: z.number().int().positive(),
    max_block_size: z.number().int().positive().optional()
});

/**
 * Validate a latest-block payload and convert it to an `ILedgerBlock`.
 *
 * @throws {ValidationError} When the payload does not match the wire schema
 */
export function normalizeBlock(payload: unknown): ILedgerBlock {
    const parsed = rawBlockSchema.safeParse(payload);
    if (!parsed.success) {
        throw new ValidationError('Malformed block payload from ledger', parsed.error.flatten().fieldErrors);
    }

    const raw = parsed.data;
    const transactions: ILedgerTransaction[] = raw.transactions.map(tx => ({
        id: tx.id,
        blockIndex: raw.index,
        accepted: tx.accepted,
        instructions: tx.instructions
    }));

    return {
        index: raw.index,
        hash: raw.hash.toLowerCase(),
        parentHash: raw.previous_hash ? raw.previous_hash.toLowerCase() : null,
        timestamp: new Date(raw.timestamp),
        transactions
    };
}

/**
 * Validate a config payload and convert it to an `ILedgerConfig`.
 *
 * @throws {ValidationError} When the payload does not match the wire schema
 */
export function normalizeConfig(payload: unknown): ILedgerConfig {
    const parsed = rawConfigSchema.safeParse(payload);
    if (!parsed.success) {
        throw new ValidationError('Malformed config payload from ledger', parsed.error.flatten().fieldErrors);
    }

    const config: ILedgerConfig = { blockIntervalMs: parsed.data.block_interval_ms };
    if (parsed.data.max_block_size !== undefined) {
        config.maxBlockSize = parsed.data.max_block_size;
    }
    return config;
}

/**
 * Blocks are equal when their content hashes are equal.
 */
export function isSameBlock(a: Pick<ILedgerBlock<unknown>, 'hash'> | null, b: Pick<ILedgerBlock<unknown>, 'hash'>): boolean {
    return a !== null && a.hash === b.hash;
}
