import { z } from 'zod';

const flag = z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((v) => v === 'true' || v === '1');

const ConfigSchema = z.object({
    ACCESS_PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    ACCESS_DB_PATH: z.string().min(1).default('access.db'),
    ACCESS_OBJECT_ID: z.string().min(1).default('sample'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    LOG_PRETTY: flag,
    HANDOVER_VALIDITY_SECONDS: z.coerce.number().int().positive().default(172800),
    AUTH_MAX_SKEW_MS: z.coerce.number().int().positive().default(30000)
});

export interface AccessConfig {
    port: number;
    dbPath: string;
    objectId: string;
    logLevel: z.infer<typeof ConfigSchema>['LOG_LEVEL'];
    logPretty: boolean;
    handoverValidityMs: number;
    authMaxSkewMs: number;
}

/**
 * Reads configuration from the environment. Throws listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AccessConfig {
    const parsed = ConfigSchema.safeParse(env);
    if (!parsed.success) {
        const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
        throw new Error(`Invalid configuration: ${details}`);
    }

    const c = parsed.data;
    return {
        port: c.ACCESS_PORT,
        dbPath: c.ACCESS_DB_PATH,
        objectId: c.ACCESS_OBJECT_ID,
        logLevel: c.LOG_LEVEL,
        logPretty: c.LOG_PRETTY,
        handoverValidityMs: c.HANDOVER_VALIDITY_SECONDS * 1000,
        authMaxSkewMs: c.AUTH_MAX_SKEW_MS
    };
}
