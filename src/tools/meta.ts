/**
 * Meta Tools
 *
 * Key-value meta for posts, users and comments. Users are shared across a
 * multisite network, so user meta is always read at the base prefix.
 *
 * @module tools/meta
 */

import { z } from 'zod';
import { DatabaseContext } from '../connection-manager.js';
import { OutputFormat } from '../types.js';
import {
    FORMAT_PROPERTY,
    SITE_ID_PROPERTY,
    ToolResult,
    defineTool,
    executionFailure,
    formatArg,
    idArg,
    idProperty,
    optionalText,
    quoteTable,
    rowsResult,
    runSql,
    siteIdArg,
    sitePrefix,
    textProperty
} from './registry.js';

interface MetaLookup {
    table: string;
    idColumn: string;
    id: number;
    metaKey: string | undefined;
    format: OutputFormat;
}

/**
 * Builds the meta statement; a key containing `%` is matched with LIKE
 */
export function buildMetaQuery(table: string, idColumn: string, id: number, metaKey?: string): { sql: string; params: unknown[] } {
    let sql = `SELECT * FROM ${quoteTable(table)} WHERE ${idColumn} = ?`;
    const params: unknown[] = [id];

    if (metaKey) {
        sql += metaKey.includes('%') ? ' AND meta_key LIKE ?' : ' AND meta_key = ?';
        params.push(metaKey);
    }

    sql += ' ORDER BY meta_key';

    return { sql, params };
}

async function getMeta(context: DatabaseContext, lookup: MetaLookup): Promise<ToolResult> {
    const { sql, params } = buildMetaQuery(lookup.table, lookup.idColumn, lookup.id, lookup.metaKey);
    const result = await runSql(context, sql, params);

    if (!result.ok) {
        return executionFailure(result.error);
    }

    return rowsResult(result.rows, lookup.format, {
        [lookup.idColumn]: lookup.id,
        meta: result.rows,
        has_more: result.hasMore
    });
}

const META_KEY_PROPERTY = textProperty('Meta key to filter by. Exact match, or a LIKE pattern when it contains %.');

export const getPostMetaTool = defineTool({
    name: 'wp_get_post_meta',
    title: 'Get Meta for a Post',
    description:
        'Returns the postmeta rows of a post, e.g. custom fields, WooCommerce product data or SEO metadata.',
    properties: {
        post_id: idProperty('Post ID.'),
        meta_key: META_KEY_PROPERTY,
        site_id: SITE_ID_PROPERTY,
        format: FORMAT_PROPERTY
    },
    required: ['post_id'],
    input: z.object({
        post_id: idArg,
        meta_key: optionalText,
        site_id: siteIdArg,
        format: formatArg
    }).strict(),
    run: (context, input) => getMeta(context, {
        table: `${sitePrefix(context, input.site_id)}postmeta`,
        idColumn: 'post_id',
        id: input.post_id,
        metaKey: input.meta_key,
        format: input.format
    })
});

export const getUserMetaTool = defineTool({
    name: 'wp_get_user_meta',
    title: 'Get Meta for a User',
    description:
        'Returns the usermeta rows of a user, e.g. capabilities, roles and preferences. ' +
        'User tables are shared by every site of a multisite network.',
    properties: {
        user_id: idProperty('User ID.'),
        meta_key: META_KEY_PROPERTY,
        format: FORMAT_PROPERTY
    },
    required: ['user_id'],
    input: z.object({
        user_id: idArg,
        meta_key: optionalText,
        format: formatArg
    }).strict(),
    run: (context, input) => getMeta(context, {
        table: `${context.prefix}usermeta`,
        idColumn: 'user_id',
        id: input.user_id,
        metaKey: input.meta_key,
        format: input.format
    })
});

export const getCommentMetaTool = defineTool({
    name: 'wp_get_comment_meta',
    title: 'Get Meta for a Comment',
    description: 'Returns the commentmeta rows of a comment.',
    properties: {
        comment_id: idProperty('Comment ID.'),
        meta_key: META_KEY_PROPERTY,
        site_id: SITE_ID_PROPERTY,
        format: FORMAT_PROPERTY
    },
    required: ['comment_id'],
    input: z.object({
        comment_id: idArg,
        meta_key: optionalText,
        site_id: siteIdArg,
        format: formatArg
    }).strict(),
    run: (context, input) => getMeta(context, {
        table: `${sitePrefix(context, input.site_id)}commentmeta`,
        idColumn: 'comment_id',
        id: input.comment_id,
        metaKey: input.meta_key,
        format: input.format
    })
});
