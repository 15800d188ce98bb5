/**
 * Content Connect Tools
 *
 * Post-to-post and post-to-user relationships stored in the `post_to_post`
 * (id1, id2, name, order) and `post_to_user` (post_id, user_id, name,
 * user_order, post_order) tables of the WP Content Connect plugin.
 *
 * @module tools/connections
 */

import { z } from 'zod';
import { LIMITS, Row } from '../types.js';
import {
    FORMAT_PROPERTY,
    LIMIT_PROPERTY,
    SITE_ID_PROPERTY,
    clampLimit,
    defineTool,
    executionFailure,
    formatArg,
    idArg,
    idProperty,
    limitArg,
    optionalText,
    quoteTable,
    requiredText,
    rowsResult,
    runSql,
    siteIdArg,
    sitePrefix,
    stringColumn,
    textProperty
} from './registry.js';

const CONNECTION_TABLES = ['post_to_post', 'post_to_user'] as const;

const NAME_FILTER_PROPERTY = textProperty('Relationship name to restrict to.');

export const listConnectionNamesTool = defineTool({
    name: 'wp_list_connection_names',
    title: 'List Connection Names (WP Content Connect)',
    description:
        'Lists the relationship names found in the post_to_post and post_to_user tables with the number ' +
        'of connections each. Tables that do not exist are skipped.',
    properties: {
        site_id: SITE_ID_PROPERTY,
        format: FORMAT_PROPERTY
    },
    input: z.object({
        site_id: siteIdArg,
        format: formatArg
    }).strict(),
    async run(context, input) {
        const p = sitePrefix(context, input.site_id);
        const candidates = CONNECTION_TABLES.map(suffix => `${p}${suffix}`);

        const existing = await runSql(
            context,
            'SELECT TABLE_NAME FROM information_schema.TABLES WHERE TABLE_SCHEMA = ? AND TABLE_NAME IN (?, ?)',
            [context.database, ...candidates],
            LIMITS.CATALOG_TABLES
        );

        if (!existing.ok) {
            return executionFailure(existing.error);
        }

        const present = new Set(stringColumn(existing.rows, 'TABLE_NAME'));
        const rows: Row[] = [];
        let hasMore = false;

        for (const suffix of CONNECTION_TABLES) {
            const table = `${p}${suffix}`;
            if (!present.has(table)) {
                continue;
            }

            const counts = await runSql(
                context,
                `SELECT name, COUNT(*) AS connection_count FROM ${quoteTable(table)} GROUP BY name ORDER BY name`
            );

            if (!counts.ok) {
                return executionFailure(counts.error);
            }

            rows.push(...counts.rows.map(row => ({ source: suffix, ...row })));
            hasMore = hasMore || counts.hasMore;
        }

        return rowsResult(rows, input.format, {
            tables: [...present].sort(),
            connection_names: rows,
            has_more: hasMore
        });
    }
});

type Direction = 'from' | 'to' | 'any';

/**
 * Join and filter for the side of `post_to_post` the post sits on
 */
export function directionClause(direction: Direction, postId: number): { join: string; where: string; params: number[] } {
    switch (direction) {
        case 'from':
            return { join: 'p.ID = pp.id2', where: 'pp.id1 = ?', params: [postId] };
        case 'to':
            return { join: 'p.ID = pp.id1', where: 'pp.id2 = ?', params: [postId] };
        case 'any':
            // The join placeholder comes first in the statement
            return {
                join: 'p.ID = CASE WHEN pp.id1 = ? THEN pp.id2 ELSE pp.id1 END',
                where: '(pp.id1 = ? OR pp.id2 = ?)',
                params: [postId, postId, postId]
            };
    }
}

export const getConnectedPostsTool = defineTool({
    name: 'wp_get_connected_posts',
    title: 'Get Connected Posts (WP Content Connect)',
    description:
        'Lists posts connected to a post through post_to_post. direction "from" treats the post as id1, ' +
        '"to" as id2, "any" (default) matches either side.',
    properties: {
        post_id: idProperty('Source post ID.'),
        name: NAME_FILTER_PROPERTY,
        direction: {
            type: 'string',
            enum: ['from', 'to', 'any'],
            description: 'Which side of the connection the post is on (default: any).'
        },
        site_id: SITE_ID_PROPERTY,
        limit: LIMIT_PROPERTY,
        format: FORMAT_PROPERTY
    },
    required: ['post_id'],
    input: z.object({
        post_id: idArg,
        name: optionalText,
        direction: z.enum(['from', 'to', 'any']).default('any'),
        site_id: siteIdArg,
        limit: limitArg,
        format: formatArg
    }).strict(),
    async run(context, input) {
        const p = sitePrefix(context, input.site_id);
        const clause = directionClause(input.direction, input.post_id);

        let sql =
            'SELECT p.ID, p.post_title, p.post_type, p.post_status, ' +
            'pp.name AS relationship_name, pp.`order` AS relationship_order ' +
            `FROM ${quoteTable(`${p}post_to_post`)} pp ` +
            `JOIN ${quoteTable(`${p}posts`)} p ON ${clause.join} ` +
            `WHERE ${clause.where}`;
        const params: unknown[] = [...clause.params];

        if (input.name) {
            sql += ' AND pp.name = ?';
            params.push(input.name);
        }

        sql += ' ORDER BY pp.`order`, p.post_title';

        const result = await runSql(context, sql, params, clampLimit(context, input.limit));

        if (!result.ok) {
            return executionFailure(result.error);
        }

        return rowsResult(result.rows, input.format, {
            post_id: input.post_id,
            direction: input.direction,
            connected_posts: result.rows,
            has_more: result.hasMore
        });
    }
});

export const getConnectedUsersTool = defineTool({
    name: 'wp_get_connected_users',
    title: 'Get Connected Users (WP Content Connect)',
    description: 'Lists users connected to a post through post_to_user.',
    properties: {
        post_id: idProperty('Post ID.'),
        name: NAME_FILTER_PROPERTY,
        site_id: SITE_ID_PROPERTY,
        limit: LIMIT_PROPERTY,
        format: FORMAT_PROPERTY
    },
    required: ['post_id'],
    input: z.object({
        post_id: idArg,
        name: optionalText,
        site_id: siteIdArg,
        limit: limitArg,
        format: formatArg
    }).strict(),
    async run(context, input) {
        const p = sitePrefix(context, input.site_id);

        // users live at the base prefix on every site
        let sql =
            'SELECT u.ID, u.user_login, u.user_email, u.display_name, ' +
            'pu.name AS relationship_name, pu.user_order ' +
            `FROM ${quoteTable(`${p}post_to_user`)} pu ` +
            `JOIN ${quoteTable(`${context.prefix}users`)} u ON u.ID = pu.user_id ` +
            'WHERE pu.post_id = ?';
        const params: unknown[] = [input.post_id];

        if (input.name) {
            sql += ' AND pu.name = ?';
            params.push(input.name);
        }

        sql += ' ORDER BY pu.user_order, u.display_name';

        const result = await runSql(context, sql, params, clampLimit(context, input.limit));

        if (!result.ok) {
            return executionFailure(result.error);
        }

        return rowsResult(result.rows, input.format, {
            post_id: input.post_id,
            connected_users: result.rows,
            has_more: result.hasMore
        });
    }
});

export const getUserConnectedPostsTool = defineTool({
    name: 'wp_get_user_connected_posts',
    title: 'Get Posts Connected to a User (WP Content Connect)',
    description: 'Lists posts connected to a user through post_to_user; the reverse of wp_get_connected_users.',
    properties: {
        user_id: idProperty('User ID.'),
        name: NAME_FILTER_PROPERTY,
        site_id: SITE_ID_PROPERTY,
        limit: LIMIT_PROPERTY,
        format: FORMAT_PROPERTY
    },
    required: ['user_id'],
    input: z.object({
        user_id: idArg,
        name: optionalText,
        site_id: siteIdArg,
        limit: limitArg,
        format: formatArg
    }).strict(),
    async run(context, input) {
        const p = sitePrefix(context, input.site_id);

        let sql =
            'SELECT p.ID, p.post_title, p.post_type, p.post_status, ' +
            'pu.name AS relationship_name, pu.post_order ' +
            `FROM ${quoteTable(`${p}post_to_user`)} pu ` +
            `JOIN ${quoteTable(`${p}posts`)} p ON p.ID = pu.post_id ` +
            'WHERE pu.user_id = ?';
        const params: unknown[] = [input.user_id];

        if (input.name) {
            sql += ' AND pu.name = ?';
            params.push(input.name);
        }

        sql += ' ORDER BY pu.post_order, p.post_title';

        const result = await runSql(context, sql, params, clampLimit(context, input.limit));

        if (!result.ok) {
            return executionFailure(result.error);
        }

        return rowsResult(result.rows, input.format, {
            user_id: input.user_id,
            connected_posts: result.rows,
            has_more: result.hasMore
        });
    }
});

export const listConnectedPostsTool = defineTool({
    name: 'wp_list_connected_posts',
    title: 'List All Connected Posts (WP Content Connect)',
    description: 'Lists every post pair connected under one relationship name.',
    properties: {
        name: textProperty('Relationship name, e.g. "related-articles".'),
        site_id: SITE_ID_PROPERTY,
        limit: LIMIT_PROPERTY,
        format: FORMAT_PROPERTY
    },
    required: ['name'],
    input: z.object({
        name: requiredText,
        site_id: siteIdArg,
        limit: limitArg,
        format: formatArg
    }).strict(),
    async run(context, input) {
        const p = sitePrefix(context, input.site_id);
        const posts = quoteTable(`${p}posts`);

        const result = await runSql(
            context,
            'SELECT p1.ID AS from_post_id, p1.post_title AS from_post_title, p1.post_type AS from_post_type, ' +
            'p2.ID AS to_post_id, p2.post_title AS to_post_title, p2.post_type AS to_post_type, ' +
            'pp.`order` AS connection_order ' +
            `FROM ${quoteTable(`${p}post_to_post`)} pp ` +
            `JOIN ${posts} p1 ON p1.ID = pp.id1 ` +
            `JOIN ${posts} p2 ON p2.ID = pp.id2 ` +
            'WHERE pp.name = ? ' +
            'ORDER BY pp.`order`, p1.post_title, p2.post_title',
            [input.name],
            clampLimit(context, input.limit)
        );

        if (!result.ok) {
            return executionFailure(result.error);
        }

        const connections = result.rows.map(row => ({
            from_post: {
                ID: row.from_post_id ?? null,
                post_title: row.from_post_title ?? null,
                post_type: row.from_post_type ?? null
            },
            to_post: {
                ID: row.to_post_id ?? null,
                post_title: row.to_post_title ?? null,
                post_type: row.to_post_type ?? null
            },
            order: row.connection_order ?? null
        }));

        return rowsResult(result.rows, input.format, {
            relationship_name: input.name,
            connections,
            has_more: result.hasMore
        });
    }
});
