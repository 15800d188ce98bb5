/**
 * Query Executor Module
 *
 * Runs one statement on a pooled connection under a server-side and a
 * client-side time limit, reads no more than one row past the limit and
 * reports truncation.
 * Statements reaching this module are assumed to be validated already.
 *
 * @module query-executor
 */

import { ExecutionError, ExecutionResult, LIMITS, RawRow } from './types.js';
import { TimeoutError, classifyError, isConnectionPoisoned } from './errors.js';
import { cleanRows } from './serialize.js';
import { logger } from './logger.js';

/**
 * A connection leased from a {@link QueryPool}
 */
export interface PooledConnection {
    /**
     * Runs a statement and resolves with at most `maxRows` rows. When reading
     * stops at `maxRows`, the rest of the result stays unread and `release()`
     * closes the connection instead of returning it.
     */
    query(sql: string, params: readonly unknown[], maxRows?: number): Promise<RawRow[]>;
    /** Returns the connection to the pool */
    release(): void;
    /** Closes the connection and removes it from the pool */
    destroy(): void;
}

export interface QueryPool {
    getConnection(): Promise<PooledConnection>;
    /**
     * Resolves true once no connection is leased, false if `timeoutMs`
     * elapses first
     */
    waitForDrain?(timeoutMs: number): Promise<boolean>;
    end(): Promise<void>;
}

/**
 * Counts leased connections so shutdown can wait for in-flight queries
 */
export class LeaseTracker {
    private leased = 0;
    private drainWaiters: Array<() => void> = [];

    get active(): number {
        return this.leased;
    }

    lease(): void {
        this.leased += 1;
    }

    settle(): void {
        this.leased = Math.max(0, this.leased - 1);

        if (this.leased === 0) {
            const waiters = this.drainWaiters;
            this.drainWaiters = [];
            waiters.forEach(waiter => waiter());
        }
    }

    waitForDrain(timeoutMs: number): Promise<boolean> {
        if (this.leased === 0) {
            return Promise.resolve(true);
        }

        return new Promise<boolean>(resolve => {
            const timer = setTimeout(() => {
                this.drainWaiters = this.drainWaiters.filter(waiter => waiter !== onDrain);
                resolve(false);
            }, timeoutMs);

            const onDrain = (): void => {
                clearTimeout(timer);
                resolve(true);
            };

            this.drainWaiters.push(onDrain);
        });
    }
}

export interface ExecutorOptions {
    queryTimeoutMs: number;
    /** Added to `queryTimeoutMs` for the client-side wait */
    timeoutGraceMs?: number;
    acquireTimeoutMs?: number;
}

const SET_EXECUTION_TIME_SQL = 'SET SESSION MAX_EXECUTION_TIME = ?';

/**
 * Rejects with {@link TimeoutError} if `promise` has not settled after
 * `timeoutMs`. The underlying operation keeps running; a late settlement is
 * ignored.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const timer = setTimeout(() => reject(new TimeoutError(timeoutMs, operation)), timeoutMs);

        promise.then(
            value => {
                clearTimeout(timer);
                resolve(value);
            },
            (error: unknown) => {
                clearTimeout(timer);
                reject(error);
            }
        );
    });
}

function preview(sql: string): string {
    const singleLine = sql.replace(/\s+/g, ' ').trim();
    return singleLine.length > LIMITS.CONTENT_PREVIEW
        ? `${singleLine.slice(0, LIMITS.CONTENT_PREVIEW)}...`
        : singleLine;
}

export class QueryExecutor {
    private readonly queryTimeoutMs: number;
    private readonly timeoutGraceMs: number;
    private readonly acquireTimeoutMs: number;

    constructor(private readonly pool: QueryPool, options: ExecutorOptions) {
        this.queryTimeoutMs = Math.max(1, Math.round(options.queryTimeoutMs));
        this.timeoutGraceMs = options.timeoutGraceMs ?? LIMITS.TIMEOUT_GRACE_MS;
        this.acquireTimeoutMs = options.acquireTimeoutMs ?? LIMITS.ACQUIRE_TIMEOUT_MS;
    }

    /**
     * Executes a statement, reading at most `limit + 1` rows, and returns at
     * most `limit` of them
     *
     * @returns `hasMore` is true when the statement produced more than
     *   `limit` rows
     */
    async execute(sql: string, params: readonly unknown[], limit: number): Promise<ExecutionResult> {
        const rowLimit = Math.max(0, Math.floor(limit));
        let connection: PooledConnection;

        try {
            connection = await this.acquire();
        } catch (error) {
            return this.fail(classifyError(error, 'acquire'), sql);
        }

        let poisoned = false;

        try {
            const rows = await withTimeout(
                this.run(connection, sql, params, rowLimit + 1),
                this.queryTimeoutMs + this.timeoutGraceMs,
                'Query'
            );

            const hasMore = rows.length > rowLimit;

            return {
                ok: true,
                rows: cleanRows(hasMore ? rows.slice(0, rowLimit) : rows),
                hasMore
            };
        } catch (error) {
            const failure = classifyError(error, 'execute');
            poisoned = isConnectionPoisoned(failure);

            if (failure.kind === 'timeout') {
                failure.message = `Query timed out after ${this.queryTimeoutMs / 1000}s.`;
            }

            return this.fail(failure, sql);
        } finally {
            if (poisoned) {
                connection.destroy();
            } else {
                connection.release();
            }
        }
    }

    private async run(
        connection: PooledConnection,
        sql: string,
        params: readonly unknown[],
        maxRows: number
    ): Promise<RawRow[]> {
        // Server-side ceiling, so the database kills the statement even if
        // the client gives up waiting
        await connection.query(SET_EXECUTION_TIME_SQL, [this.queryTimeoutMs]);
        return connection.query(sql, params, maxRows);
    }

    private async acquire(): Promise<PooledConnection> {
        const pending = this.pool.getConnection();

        try {
            return await withTimeout(pending, this.acquireTimeoutMs, 'Connection acquisition');
        } catch (error) {
            if (error instanceof TimeoutError) {
                void pending.then(
                    late => late.release(),
                    (lateError: unknown) => logger.debug('Late connection acquisition failed', {
                        error: lateError instanceof Error ? lateError.message : String(lateError)
                    })
                );
            }
            throw error;
        }
    }

    private fail(error: ExecutionError, sql: string): ExecutionResult {
        logger.error(`Query execution failed (${error.kind})`, undefined, {
            detail: error.detail,
            sql: preview(sql)
        });

        return { ok: false, error };
    }
}
