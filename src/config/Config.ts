import { z } from 'zod';

const optionalInt = (min: number) => z.preprocess(
    value => (value === undefined || value === '' ? undefined : Number(value)),
    z.number().int().min(min).optional()
);

const EnvSchema = z.object({
    PORT: z.preprocess(
        value => (value === undefined || value === '' ? 3000 : Number(value)),
        z.number().int().min(0).max(65535)
    ),
    DB_PATH: z.string().min(1).default('pao.db'),
    MAX_DELEGATION_DEPTH: z.preprocess(
        value => (value === undefined || value === '' ? 16 : Number(value)),
        z.number().int().min(0)
    ),
    STAGING_TIMEOUT_MS: optionalInt(1)
});

export interface AppConfig {
    port: number;
    dbPath: string;
    maxDelegationDepth: number;
    stagingTimeoutMs?: number;
}

/**
 * Reads the service configuration from the environment.
 * Throws with every offending variable listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new Error(`Invalid configuration: ${issues}`);
    }
    const { PORT, DB_PATH, MAX_DELEGATION_DEPTH, STAGING_TIMEOUT_MS } = parsed.data;
    return {
        port: PORT,
        dbPath: DB_PATH,
        maxDelegationDepth: MAX_DELEGATION_DEPTH,
        ...(STAGING_TIMEOUT_MS !== undefined ? { stagingTimeoutMs: STAGING_TIMEOUT_MS } : {})
    };
}
