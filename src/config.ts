/**
 * Configuration Module
 *
 * Builds the server configuration from environment variables. A
 * `WP_DB_URL` fills in any connection field that is not set on its own.
 *
 * @module config
 */

import { z } from 'zod';
import { DatabaseConfig, ServerConfig } from './types.js';
import { ConfigError } from './errors.js';

type Env = Record<string, string | undefined>;

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
    if (value === undefined) {
        return defaultValue;
    }

    const normalized = value.trim().toLowerCase();

    if (['1', 'true', 'yes', 'on'].includes(normalized)) {
        return true;
    }

    if (['0', 'false', 'no', 'off'].includes(normalized)) {
        return false;
    }

    return defaultValue;
}

function decodeUrlComponent(value: string): string {
    try {
        return decodeURIComponent(value);
    } catch {
        return value;
    }
}

interface UrlSettings {
    host?: string;
    port?: string;
    user?: string;
    password?: string;
    database?: string;
}

export function parseDatabaseUrl(connectionString: string): UrlSettings {
    let parsed: URL;

    try {
        parsed = new URL(connectionString);
    } catch {
        throw new ConfigError('WP_DB_URL is not a valid URL');
    }

    const protocol = parsed.protocol.toLowerCase();

    if (protocol !== 'mysql:' && protocol !== 'mariadb:') {
        throw new ConfigError(`Unsupported database protocol in WP_DB_URL: ${parsed.protocol}`);
    }

    const database = parsed.pathname.replace(/^\/+/, '');

    return {
        host: parsed.hostname || undefined,
        port: parsed.port || undefined,
        user: parsed.username ? decodeUrlComponent(parsed.username) : undefined,
        password: parsed.password ? decodeUrlComponent(parsed.password) : undefined,
        database: database ? decodeUrlComponent(database) : undefined
    };
}

/** Treats empty strings as unset */
function pick(...values: Array<string | undefined>): string | undefined {
    return values.find(value => value !== undefined && value.trim() !== '');
}

const positiveInt = (name: string) =>
    z.coerce
        .number({ invalid_type_error: `${name} must be a number` })
        .int(`${name} must be an integer`)
        .positive(`${name} must be positive`);

const envSchema = z.object({
    host: z.string().min(1),
    port: positiveInt('WP_DB_PORT').max(65535, 'WP_DB_PORT must be at most 65535'),
    socketPath: z.string().optional(),
    user: z.string().min(1, 'WP_DB_USER must not be empty'),
    password: z.string(),
    database: z.string().min(1, 'WP_DB_NAME must not be empty'),
    tablePrefix: z.string().regex(/^[A-Za-z0-9_]*$/, 'WP_TABLE_PREFIX may only contain letters, digits and underscores'),
    maxRows: positiveInt('WP_MAX_ROWS'),
    queryTimeoutSeconds: positiveInt('WP_QUERY_TIMEOUT'),
    poolMin: z.coerce.number().int('WP_DB_POOL_MIN must be an integer').min(0, 'WP_DB_POOL_MIN must not be negative'),
    poolMax: positiveInt('WP_DB_POOL_MAX'),
    connectTimeoutSeconds: positiveInt('WP_DB_CONNECT_TIMEOUT'),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent'], {
        errorMap: () => ({ message: 'WP_LOG_LEVEL must be one of debug, info, warn, error, silent' })
    })
}).refine(value => value.poolMin <= value.poolMax, {
    message: 'WP_DB_POOL_MIN must not exceed WP_DB_POOL_MAX'
});

/**
 * Creates the server configuration from environment variables
 */
export function loadConfig(env: Env = process.env): ServerConfig {
    const url = pick(env.WP_DB_URL);
    const fromUrl = url ? parseDatabaseUrl(url) : {};

    const parsed = envSchema.safeParse({
        host: pick(env.WP_DB_HOST, fromUrl.host) ?? '127.0.0.1',
        port: pick(env.WP_DB_PORT, fromUrl.port) ?? '3306',
        socketPath: pick(env.WP_DB_SOCKET),
        user: pick(env.WP_DB_USER, fromUrl.user) ?? 'root',
        password: env.WP_DB_PASSWORD ?? fromUrl.password ?? '',
        database: pick(env.WP_DB_NAME, fromUrl.database) ?? 'wordpress',
        tablePrefix: env.WP_TABLE_PREFIX?.trim() ?? '',
        maxRows: pick(env.WP_MAX_ROWS) ?? '1000',
        queryTimeoutSeconds: pick(env.WP_QUERY_TIMEOUT) ?? '30',
        poolMin: pick(env.WP_DB_POOL_MIN) ?? '1',
        poolMax: pick(env.WP_DB_POOL_MAX) ?? '5',
        connectTimeoutSeconds: pick(env.WP_DB_CONNECT_TIMEOUT) ?? '10',
        logLevel: pick(env.WP_LOG_LEVEL)?.toLowerCase() ?? 'info'
    });

    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => issue.message).join('; ');
        throw new ConfigError(`Invalid configuration: ${issues}`);
    }

    const values = parsed.data;

    const db: DatabaseConfig = {
        host: values.host,
        port: values.port,
        socketPath: values.socketPath,
        user: values.user,
        password: values.password,
        database: values.database,
        ssl: parseBooleanEnv(env.WP_DB_SSL, false),
        sslRejectUnauthorized: parseBooleanEnv(env.WP_DB_SSL_REJECT_UNAUTHORIZED, true),
        connectTimeoutMs: values.connectTimeoutSeconds * 1000,
        pool: {
            min: values.poolMin,
            max: values.poolMax
        }
    };

    return {
        db,
        tablePrefix: values.tablePrefix,
        maxRows: values.maxRows,
        queryTimeoutSeconds: values.queryTimeoutSeconds,
        logLevel: values.logLevel
    };
}

/**
 * Connection target for log lines, without credentials
 */
export function describeTarget(config: DatabaseConfig): string {
    if (config.socketPath) {
        return `${config.user}@${config.socketPath} (socket) db=${config.database}`;
    }

    return `${config.user}@${config.host}:${config.port}/${config.database}`;
}
