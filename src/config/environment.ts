// src/config/environment.ts
import { z } from 'zod';
import { parseRate, Rate } from '../shared/utils/rate.util';

const booleanString = z
    .enum(['true', 'false', '1', '0'])
    .transform(val => val === 'true' || val === '1');

const rateString = z.string().transform((val, ctx): Rate => {
    try {
        return parseRate(val);
    } catch (error) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: error instanceof Error ? error.message : String(error)
        });
        return z.NEVER;
    }
});

// true, false, a hop count or a comma separated list of addresses/CIDRs
const trustProxy = z.string().transform((val): boolean | number | string[] => {
    const value = val.trim();
    if (value === 'true' || value === 'false') {
        return value === 'true';
    }
    if (/^\d+$/.test(value)) {
        return Number(value);
    }
    return value.split(',').map(entry => entry.trim()).filter(entry => entry.length > 0);
});

// Host names; a leading dot also matches subdomains, "*" matches anything
const hostList = z.string().transform(val =>
    val.split(',').map(host => host.trim().toLowerCase()).filter(host => host.length > 0)
);

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

const DEFAULT_HSTS_SECONDS = 31536000;

const timeZone = z.string().refine(val => {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone: val });
        return true;
    } catch {
        return false;
    }
}, 'Unknown time zone');

const environmentSchema = z.object({
    // Application
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().min(0).max(65535).default(3333),
    LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
    CORS_ORIGIN: z.string().default('http://localhost:3000'),
    ENABLE_SWAGGER: booleanString.default('true'),
    TIME_ZONE: timeZone.default('UTC'),

    // HTTP hardening
    TRUST_PROXY: trustProxy.default('false'),
    ALLOWED_HOSTS: hostList.default(''),
    SECURE_SSL_REDIRECT: booleanString.default('false'),
    // Unset: one year in production, off elsewhere
    SECURE_HSTS_SECONDS: z.coerce.number().int().min(0).optional(),

    // Database - PostgreSQL
    DATABASE_URL: z.string().url().optional().or(z.literal('').transform(() => undefined)),
    POSTGRES_HOST: z.string().default('localhost'),
    POSTGRES_PORT: z.coerce.number().int().default(5432),
    POSTGRES_DB: z.string().default('ledger'),
    POSTGRES_USER: z.string().default('ledger'),
    POSTGRES_PASSWORD: z.string().default(''),
    POSTGRES_MAX_CONNECTIONS: z.coerce.number().int().min(1).default(10),

    // Security - JWT
    JWT_SECRET: z.string().min(32, 'JWT_SECRET must be at least 32 characters long'),
    JWT_ACCESS_TTL: z.coerce.number().int().min(1).default(300),
    JWT_REFRESH_TTL: z.coerce.number().int().min(1).default(86400),

    // Throttling
    THROTTLE_USER_RATE: rateString.default('500/day'),
    THROTTLE_ANON_RATE: rateString.default('5/minute')
}).transform(env => ({
    ...env,
    SECURE_HSTS_SECONDS: env.SECURE_HSTS_SECONDS ?? (env.NODE_ENV === 'production' ? DEFAULT_HSTS_SECONDS : 0)
}));

export type Environment = z.infer<typeof environmentSchema>;

export class ConfigurationError extends Error {
    constructor(public readonly problems: string[]) {
        super(`Invalid configuration: ${problems.join('; ')}`);
        this.name = 'ConfigurationError';
    }
}

/**
 * Validates a set of environment variables. Throws ConfigurationError listing
 * every invalid variable.
 */
export function loadConfig(source: NodeJS.ProcessEnv | Record<string, string | undefined> = process.env): Environment {
    const result = environmentSchema.safeParse(source);
    if (!result.success) {
        throw new ConfigurationError(
            result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        );
    }
    return result.data;
}

export class ConfigService {
    private static instance: ConfigService;
    private readonly config: Environment;

    constructor(config: Environment) {
        this.config = config;
    }

    static getInstance(): ConfigService {
        if (!ConfigService.instance) {
            ConfigService.instance = new ConfigService(loadConfig());
        }
        return ConfigService.instance;
    }

    get<K extends keyof Environment>(key: K): Environment[K] {
        return this.config[key];
    }

    getAll(): Environment {
        return { ...this.config };
    }

    getDatabaseUrl(): string {
        if (this.config.DATABASE_URL) {
            return this.config.DATABASE_URL;
        }
        const user = encodeURIComponent(this.config.POSTGRES_USER);
        const password = encodeURIComponent(this.config.POSTGRES_PASSWORD);
        return `postgresql://${user}:${password}@${this.config.POSTGRES_HOST}:${this.config.POSTGRES_PORT}/${this.config.POSTGRES_DB}`;
    }
}
