/**
 * Connection Manager Module
 *
 * Owns the process-wide MySQL connection pool: creates it once at startup,
 * detects the table prefix, publishes an immutable {@link DatabaseContext}
 * and drains the pool on shutdown.
 *
 * @module connection-manager
 */

import mysql from 'mysql2';
import { DatabaseConfig, LIMITS, RawRow, ServerConfig } from './types.js';
import { NotInitializedError, StartupError, sanitizeMessage } from './errors.js';
import { LeaseTracker, PooledConnection, QueryExecutor, QueryPool } from './query-executor.js';
import { prefixFromOptionsTable } from './prefix-resolver.js';
import { describeTarget } from './config.js';
import { logger } from './logger.js';

/**
 * Everything a request needs, fixed for the lifetime of the process
 */
export interface DatabaseContext {
    readonly database: string;
    /** Base table prefix of the main site */
    readonly prefix: string;
    readonly maxRows: number;
    readonly queryTimeoutSeconds: number;
    readonly executor: QueryExecutor;
}

/**
 * Source of the context for request handlers
 */
export interface ContextProvider {
    getContext(): DatabaseContext;
}

export type PoolFactory = (config: DatabaseConfig) => QueryPool;

const PREFIX_DETECTION_SQL =
    'SELECT TABLE_NAME FROM information_schema.TABLES ' +
    "WHERE TABLE_SCHEMA = ? AND TABLE_NAME LIKE '%options' " +
    'ORDER BY CHAR_LENGTH(TABLE_NAME), TABLE_NAME LIMIT 1';

/**
 * The parts of a mysql2 query used here. Rows arrive as `result` events
 * after the `fields` event of a result set.
 */
export interface DriverQuery {
    on(event: 'fields', listener: () => void): this;
    on(event: 'result', listener: (row: unknown) => void): this;
    on(event: 'error', listener: (error: Error) => void): this;
    on(event: 'end', listener: () => void): this;
}

export interface DriverConnection {
    query(sql: string, values: unknown[]): DriverQuery;
    /** Stops reading from the socket */
    pause(): void;
    release(): void;
    destroy(): void;
}

/**
 * The callback API of a mysql2 pool
 */
export interface DriverPool {
    getConnection(callback: (error: Error | null, connection: DriverConnection) => void): void;
    end(callback: (error: Error | null) => void): void;
}

function isRecord(value: unknown): value is RawRow {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface ReadResult {
    rows: RawRow[];
    /** Reading stopped at the cap with the rest of the result unread */
    stopped: boolean;
}

/**
 * Streams the rows of a statement, pausing the connection once `maxRows`
 * rows are in. Statements without a result set (OK packets) yield no rows.
 */
export function readRows(
    connection: DriverConnection,
    sql: string,
    params: readonly unknown[],
    maxRows: number = Number.POSITIVE_INFINITY
): Promise<ReadResult> {
    return new Promise<ReadResult>((resolve, reject) => {
        const rows: RawRow[] = [];
        let inResultSet = false;
        let settled = false;

        const finish = (stopped: boolean): void => {
            if (!settled) {
                settled = true;
                resolve({ rows, stopped });
            }
        };

        connection.query(sql, [...params])
            .on('fields', () => {
                inResultSet = true;
            })
            .on('result', row => {
                if (settled || !inResultSet || !isRecord(row)) {
                    return;
                }

                rows.push(row);

                if (rows.length >= maxRows) {
                    connection.pause();
                    finish(true);
                }
            })
            .on('error', error => {
                if (!settled) {
                    settled = true;
                    reject(error);
                }
            })
            .on('end', () => finish(false));
    });
}

function describeError(error: unknown): string {
    return sanitizeMessage(error instanceof Error ? error.message : String(error));
}

/**
 * {@link QueryPool} over a mysql2 pool. A connection whose result was cut
 * short at the row cap is destroyed on release.
 */
export class MysqlQueryPool implements QueryPool {
    private readonly leases = new LeaseTracker();

    constructor(private readonly pool: DriverPool) {}

    getConnection(): Promise<PooledConnection> {
        return new Promise<PooledConnection>((resolve, reject) => {
            this.pool.getConnection((error, connection) => {
                if (error) {
                    reject(error);
                    return;
                }
                resolve(this.lease(connection));
            });
        });
    }

    private lease(connection: DriverConnection): PooledConnection {
        this.leases.lease();
        let returned = false;
        let unread = false;

        const giveBack = (close: boolean): void => {
            if (returned) {
                return;
            }
            returned = true;

            if (close || unread) {
                connection.destroy();
            } else {
                connection.release();
            }
            this.leases.settle();
        };

        return {
            query: async (sql, params, maxRows) => {
                const { rows, stopped } = await readRows(connection, sql, params, maxRows);
                unread = unread || stopped;
                return rows;
            },
            release: () => giveBack(false),
            destroy: () => giveBack(true)
        };
    }

    waitForDrain(timeoutMs: number): Promise<boolean> {
        return this.leases.waitForDrain(timeoutMs);
    }

    end(): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            this.pool.end(error => (error ? reject(error) : resolve()));
        });
    }
}

/**
 * Creates a mysql2 pool over either a Unix socket or TCP
 */
export function createMysqlPool(config: DatabaseConfig): MysqlQueryPool {
    const transport = config.socketPath
        ? { socketPath: config.socketPath }
        : { host: config.host, port: config.port };

    const ssl = config.ssl
        ? { rejectUnauthorized: config.sslRejectUnauthorized }
        : undefined;

    const pool = mysql.createPool({
        ...transport,
        user: config.user,
        password: config.password,
        database: config.database,
        connectionLimit: config.pool.max,
        maxIdle: config.pool.min,
        idleTimeout: 60000,
        waitForConnections: true,
        queueLimit: 0,
        connectTimeout: config.connectTimeoutMs,
        multipleStatements: false,
        dateStrings: true,
        decimalNumbers: true,
        supportBigNumbers: true,
        ssl
    });

    return new MysqlQueryPool(pool);
}

/**
 * Connection Manager class
 * Manages the database connection pool and the published context
 */
export class ConnectionManager implements ContextProvider {
    private context: DatabaseContext | null = null;
    private pool: QueryPool | null = null;
    private starting = false;

    constructor(private readonly poolFactory: PoolFactory = createMysqlPool) {}

    /**
     * Creates the pool, verifies connectivity, detects the table prefix and
     * publishes the context. On failure nothing is published and the pool is
     * closed.
     */
    async initialize(config: ServerConfig): Promise<DatabaseContext> {
        if (this.starting || this.pool) {
            throw new StartupError('Connection manager already initialized');
        }
        this.starting = true;

        const target = describeTarget(config.db);
        let pool: QueryPool | null = null;

        try {
            if (config.db.socketPath) {
                logger.info(`Connecting via socket: ${config.db.socketPath}`);
            }

            pool = this.poolFactory(config.db);
            await this.warmUp(pool, config.db.pool.min);
            logger.info(`Connected to ${target}`);

            const executor = new QueryExecutor(pool, {
                queryTimeoutMs: config.queryTimeoutSeconds * 1000,
                acquireTimeoutMs: Math.max(config.db.connectTimeoutMs, LIMITS.ACQUIRE_TIMEOUT_MS)
            });

            let prefix = config.tablePrefix;

            if (!prefix) {
                prefix = await this.detectPrefix(executor, config.db.database);
                logger.info(`Auto-detected table prefix: '${prefix}'`);
            }

            const context: DatabaseContext = Object.freeze({
                database: config.db.database,
                prefix,
                maxRows: config.maxRows,
                queryTimeoutSeconds: config.queryTimeoutSeconds,
                executor
            });

            this.pool = pool;
            this.context = context;

            return context;
        } catch (error) {
            logger.error(`Failed to initialize database connection to ${target}`, error);

            if (pool) {
                await pool.end().catch((endError: unknown) => {
                    logger.warn('Failed to close connection pool after startup failure', {
                        error: describeError(endError)
                    });
                });
            }

            if (error instanceof StartupError) {
                throw error;
            }
            throw new StartupError(`Database connection failed: ${target} - ${describeError(error)}`, { cause: error });
        } finally {
            this.starting = false;
        }
    }

    /**
     * Opens `size` connections at once and returns them, proving the
     * credentials work and filling the pool to its minimum
     */
    private async warmUp(pool: QueryPool, size: number): Promise<void> {
        const attempts = await Promise.allSettled(
            Array.from({ length: Math.max(1, size) }, () => pool.getConnection())
        );

        let failure: unknown = null;

        for (const attempt of attempts) {
            if (attempt.status === 'fulfilled') {
                attempt.value.release();
            } else if (failure === null) {
                failure = attempt.reason;
            }
        }

        if (failure !== null) {
            throw failure;
        }
    }

    private async detectPrefix(executor: QueryExecutor, database: string): Promise<string> {
        const result = await executor.execute(PREFIX_DETECTION_SQL, [database], 1);

        if (!result.ok) {
            throw new StartupError(`Table prefix detection failed: ${result.error.message}`);
        }

        const names = result.rows
            .map(row => row.TABLE_NAME)
            .filter((name): name is string => typeof name === 'string');

        return prefixFromOptionsTable(names);
    }

    /**
     * Gets the published context
     *
     * @throws NotInitializedError before `initialize` completed or after `close`
     */
    getContext(): DatabaseContext {
        if (!this.context) {
            throw new NotInitializedError();
        }

        return this.context;
    }

    isReady(): boolean {
        return this.context !== null;
    }

    /**
     * Stops handing out the context, waits up to `graceMs` for leased
     * connections and closes the pool
     */
    async close(graceMs: number = LIMITS.SHUTDOWN_GRACE_MS): Promise<void> {
        const pool = this.pool;
        this.context = null;
        this.pool = null;

        if (!pool) {
            return;
        }

        if (pool.waitForDrain) {
            const drained = await pool.waitForDrain(graceMs);
            if (!drained) {
                logger.warn(`Closing pool with connections still in use after ${graceMs}ms`);
            }
        }

        await pool.end();
        logger.info('Connection pool closed');
    }
}
