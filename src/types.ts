/**
 * Database connection configuration
 *
 * Exactly one transport is used: `socketPath` when present, otherwise
 * `host`/`port`.
 */
export interface DatabaseConfig {
    host: string;
    port: number;
    socketPath?: string;
    user: string;
    password: string;
    database: string;
    ssl: boolean;
    sslRejectUnauthorized: boolean;
    connectTimeoutMs: number;
    pool: {
        min: number;
        max: number;
    };
}

/**
 * Full server configuration
 */
export interface ServerConfig {
    db: DatabaseConfig;
    /** Fixed table prefix; empty string triggers auto-detection */
    tablePrefix: string;
    maxRows: number;
    queryTimeoutSeconds: number;
    logLevel: LogLevel;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * JSON-safe scalar a row value is reduced to before leaving the executor
 */
export type JsonScalar = string | number | boolean | null;

export type Row = Record<string, JsonScalar>;

/**
 * Rows as handed back by the driver, before serialization
 */
export type RawRow = Record<string, unknown>;

export type OutputFormat = 'json' | 'csv';

export type RejectionReason =
    | 'multiple-statements'
    | 'disallowed-verb'
    | 'disallowed-keyword'
    | 'system-schema-access';

/**
 * Validation result from query validator
 */
export type ValidationOutcome =
    | { approved: true }
    | { approved: false; reason: RejectionReason; message: string };

export type ExecutionErrorKind =
    | 'timeout'
    | 'pool_exhausted'
    | 'connection_error'
    | 'query_error'
    | 'not_initialized';

/**
 * Classified execution failure.
 * `message` is safe to show to callers, `detail` is for the log only.
 */
export interface ExecutionError {
    kind: ExecutionErrorKind;
    message: string;
    detail: string;
}

export type ExecutionResult =
    | { ok: true; rows: Row[]; hasMore: boolean }
    | { ok: false; error: ExecutionError };

/**
 * Query execution limits
 */
export const LIMITS = {
    TOOL_DEFAULT: 100,
    TIMEOUT_GRACE_MS: 5000,
    ACQUIRE_TIMEOUT_MS: 10000,
    SHUTDOWN_GRACE_MS: 5000,
    CATALOG_TABLES: 2000,
    CATALOG_COLUMNS: 10000,
    CONTENT_PREVIEW: 200
} as const;

/**
 * Known WordPress core table suffixes (without prefix)
 */
export const WP_CORE_SUFFIXES = [
    'posts',
    'postmeta',
    'comments',
    'commentmeta',
    'terms',
    'termmeta',
    'term_taxonomy',
    'term_relationships',
    'options',
    'users',
    'usermeta',
    'links'
] as const;

/**
 * Schemas that belong to the database engine rather than the application
 */
export const SYSTEM_SCHEMAS = [
    'information_schema',
    'mysql',
    'performance_schema',
    'sys'
] as const;
