import 'dotenv/config';
import { z } from 'zod';

const booleanFlag = z
    .union([
        z.boolean(),
        z
            .string()
            .transform(value => value.trim().toLowerCase())
            .transform(value => ['1', 'true', 'yes', 'on'].includes(value))
    ]);

const envSchema = z.object({
    // NODE_ENV is set by the runtime tooling (don't set in .env)
    NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
    LEDGER_RPC_URL: z.string().url().default('http://127.0.0.1:7771'),
    LEDGER_API_KEY: z.string().optional(),
    LEDGER_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    ENABLE_BLOCK_LOG: booleanFlag.default(true)
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
    console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
    throw new Error('Failed to parse environment variables');
}

export type EnvConfig = z.infer<typeof envSchema>;

export const env: EnvConfig = parsed.data;
