import { z } from 'zod';

const intFromEnv = (fallback: number) =>
    z.preprocess(
        v => (v === undefined || v === '' ? fallback : Number(v)),
        z.number().int()
    );

export const ConfigSchema = z.object({
    PORT: intFromEnv(3000).pipe(z.number().min(0).max(65535)),
    DB_PATH: z.string().min(1).default('claims.db'),
    MAX_BYTES_IN_HASH: intFromEnv(64).pipe(z.number().positive()),
    BLOCK_TIME_MS: intFromEnv(6000).pipe(z.number().nonnegative())
});

export interface RegistryConfig {
    port: number;
    dbPath: string;
    maxBytesInHash: number;
    /** 0 disables timed production; blocks are sealed on request. */
    blockTimeMs: number;
}

export class ConfigurationError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigurationError';
    }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RegistryConfig {
    const result = ConfigSchema.safeParse(env);
    if (!result.success) {
        throw new ConfigurationError(
            result.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        );
    }
    return {
        port: result.data.PORT,
        dbPath: result.data.DB_PATH,
        maxBytesInHash: result.data.MAX_BYTES_IN_HASH,
        blockTimeMs: result.data.BLOCK_TIME_MS
    };
}
