/**
 * Query Tools
 *
 * `wp_query` runs caller-supplied SQL after validation; `wp_search_posts`
 * is a parameterized title/content search.
 *
 * @module tools/query
 */

import { z } from 'zod';
import { LIMITS } from '../types.js';
import { validate } from '../query-validator.js';
import { logger } from '../logger.js';
import {
    FORMAT_PROPERTY,
    LIMIT_PROPERTY,
    SITE_ID_PROPERTY,
    clampLimit,
    defineTool,
    errorResult,
    escapeLike,
    executionFailure,
    formatArg,
    limitArg,
    optionalText,
    quoteTable,
    requiredText,
    rowsResult,
    runSql,
    siteIdArg,
    sitePrefix,
    textProperty
} from './registry.js';

const MAX_SQL_LENGTH = 5000;

export const queryTool = defineTool({
    name: 'wp_query',
    title: 'Execute Read-Only SQL Query',
    description:
        'Executes a read-only SQL statement against the WordPress database. Only single SELECT, SHOW, ' +
        'DESCRIBE and EXPLAIN statements are allowed; system schemas are off limits. ' +
        'has_more is true when more rows exist than the limit.',
    properties: {
        sql: textProperty('SQL statement to execute.'),
        limit: LIMIT_PROPERTY,
        format: FORMAT_PROPERTY
    },
    required: ['sql'],
    input: z.object({
        sql: z.string().trim().min(1).max(MAX_SQL_LENGTH),
        limit: limitArg,
        format: formatArg
    }).strict(),
    async run(context, input) {
        const verdict = validate(input.sql);

        if (!verdict.approved) {
            logger.warn(`Rejected query (${verdict.reason})`);
            return errorResult('validation_rejected', verdict.message, { reason: verdict.reason });
        }

        const limit = clampLimit(context, input.limit);
        const result = await context.executor.execute(input.sql, [], limit);

        if (!result.ok) {
            return executionFailure(result.error);
        }

        return rowsResult(result.rows, input.format, {
            row_count: result.rows.length,
            has_more: result.hasMore,
            limit,
            rows: result.rows
        });
    }
});

export const searchPostsTool = defineTool({
    name: 'wp_search_posts',
    title: 'Search WordPress Posts',
    description:
        'Searches post titles and content for a literal phrase, newest first. ' +
        'Optionally filter by post_type and post_status (default: publish).',
    properties: {
        search: textProperty('Text to look for in post_title and post_content.'),
        post_type: textProperty('Post type, e.g. "post", "page", "product".'),
        post_status: textProperty('Post status (default: publish).'),
        site_id: SITE_ID_PROPERTY,
        limit: LIMIT_PROPERTY,
        format: FORMAT_PROPERTY
    },
    required: ['search'],
    input: z.object({
        search: requiredText.max(500),
        post_type: optionalText,
        post_status: z.string().trim().min(1).default('publish'),
        site_id: siteIdArg,
        limit: limitArg,
        format: formatArg
    }).strict(),
    async run(context, input) {
        const posts = quoteTable(`${sitePrefix(context, input.site_id)}posts`);
        const pattern = `%${escapeLike(input.search)}%`;

        let sql =
            'SELECT ID, post_title, post_type, post_status, post_date, post_author, ' +
            `SUBSTRING(post_content, 1, ${LIMITS.CONTENT_PREVIEW}) AS content_preview ` +
            `FROM ${posts} ` +
            'WHERE (post_title LIKE ? OR post_content LIKE ?)';
        const params: unknown[] = [pattern, pattern];

        if (input.post_type) {
            sql += ' AND post_type = ?';
            params.push(input.post_type);
        }

        sql += ' AND post_status = ?';
        params.push(input.post_status);

        sql += ' ORDER BY post_date DESC';

        const result = await runSql(context, sql, params, clampLimit(context, input.limit));

        if (!result.ok) {
            return executionFailure(result.error);
        }

        return rowsResult(result.rows, input.format, {
            search: input.search,
            posts: result.rows,
            has_more: result.hasMore
        });
    }
});
