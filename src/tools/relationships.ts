/**
 * Relationship Tools
 *
 * Maps the implicit joins between WordPress core tables. WordPress declares
 * no foreign keys, so the relationships are known facts filtered by which
 * tables actually exist.
 *
 * @module tools/relationships
 */

import { z } from 'zod';
import { DatabaseContext } from '../connection-manager.js';
import { LIMITS } from '../types.js';
import { detectSitePrefixes, subSitePattern } from '../prefix-resolver.js';
import {
    SITE_ID_PROPERTY,
    ToolResult,
    defineTool,
    escapeLike,
    executionFailure,
    runSql,
    siteIdArg,
    sitePrefix,
    stringColumn,
    textResult
} from './registry.js';

interface ColumnRef {
    table: string;
    column: string;
}

export type Relationship =
    | {
        name: string;
        type: 'one_to_many' | 'many_to_one';
        from: ColumnRef;
        to: ColumnRef;
        description: string;
    }
    | {
        name: string;
        type: 'many_to_many';
        from: ColumnRef;
        through: { table: string; columns: [string, string] };
        to: ColumnRef;
        description: string;
    }
    | {
        name: string;
        type: 'self_referential';
        table: string;
        column: string;
        references: string;
        description: string;
    };

/**
 * Lists the known WordPress relationships whose tables are all present
 */
export function buildWpRelationships(prefix: string, tables: readonly string[]): Relationship[] {
    const present = new Set(tables);
    const has = (suffix: string): boolean => present.has(`${prefix}${suffix}`);
    const ref = (suffix: string, column: string): ColumnRef => ({ table: `${prefix}${suffix}`, column });
    const relationships: Relationship[] = [];

    if (has('posts') && has('postmeta')) {
        relationships.push({
            name: 'post_meta',
            type: 'one_to_many',
            from: ref('posts', 'ID'),
            to: ref('postmeta', 'post_id'),
            description: 'Each post has zero or more meta key-value pairs.'
        });
    }

    if (has('posts') && has('term_relationships')) {
        relationships.push({
            name: 'post_term_relationships',
            type: 'many_to_many',
            from: ref('posts', 'ID'),
            through: { table: `${prefix}term_relationships`, columns: ['object_id', 'term_taxonomy_id'] },
            to: ref('term_taxonomy', 'term_taxonomy_id'),
            description: 'Posts link to term_taxonomy entries through term_relationships; object_id is the post ID.'
        });
    }

    if (has('term_taxonomy') && has('terms')) {
        relationships.push({
            name: 'taxonomy_term',
            type: 'many_to_one',
            from: ref('term_taxonomy', 'term_id'),
            to: ref('terms', 'term_id'),
            description: 'Each term_taxonomy row references a term and adds its taxonomy and hierarchy.'
        });
    }

    if (has('term_taxonomy')) {
        relationships.push({
            name: 'taxonomy_hierarchy',
            type: 'self_referential',
            table: `${prefix}term_taxonomy`,
            column: 'parent',
            references: 'term_id of the parent term',
            description: 'Hierarchical taxonomies point at the parent term through parent.'
        });
    }

    if (has('terms') && has('termmeta')) {
        relationships.push({
            name: 'term_meta',
            type: 'one_to_many',
            from: ref('terms', 'term_id'),
            to: ref('termmeta', 'term_id'),
            description: 'Each term can have meta key-value pairs.'
        });
    }

    if (has('posts') && has('comments')) {
        relationships.push({
            name: 'post_comments',
            type: 'one_to_many',
            from: ref('posts', 'ID'),
            to: ref('comments', 'comment_post_ID'),
            description: 'Each post has zero or more comments.'
        });
    }

    if (has('comments') && has('commentmeta')) {
        relationships.push({
            name: 'comment_meta',
            type: 'one_to_many',
            from: ref('comments', 'comment_ID'),
            to: ref('commentmeta', 'comment_id'),
            description: 'Each comment can have meta key-value pairs.'
        });
    }

    if (has('comments')) {
        relationships.push({
            name: 'comment_hierarchy',
            type: 'self_referential',
            table: `${prefix}comments`,
            column: 'comment_parent',
            references: 'comment_ID',
            description: 'Threaded comments reference their parent through comment_parent.'
        });
    }

    if (has('users') && has('usermeta')) {
        relationships.push({
            name: 'user_meta',
            type: 'one_to_many',
            from: ref('users', 'ID'),
            to: ref('usermeta', 'user_id'),
            description: 'Each user has meta key-value pairs (roles, capabilities, preferences).'
        });
    }

    if (has('users') && has('posts')) {
        relationships.push({
            name: 'post_author',
            type: 'many_to_one',
            from: ref('posts', 'post_author'),
            to: ref('users', 'ID'),
            description: 'Each post has one author.'
        });
    }

    if (has('posts')) {
        relationships.push({
            name: 'post_hierarchy',
            type: 'self_referential',
            table: `${prefix}posts`,
            column: 'post_parent',
            references: 'ID',
            description: 'Pages, attachments and revisions reference their parent post through post_parent.'
        });
    }

    return relationships;
}

/**
 * Condition selecting the tables of the site using `prefix`. Under the main
 * site's prefix, tables of numbered sub-sites (`wp_2_posts`) are excluded.
 */
export function siteTablesCondition(context: DatabaseContext, prefix: string): { sql: string; params: string[] } {
    const like = { sql: 'TABLE_NAME LIKE ?', params: [`${escapeLike(prefix)}%`] };

    if (prefix !== context.prefix) {
        return like;
    }

    return {
        sql: `${like.sql} AND TABLE_NAME NOT REGEXP ?`,
        params: [...like.params, subSitePattern(context.prefix)]
    };
}

export type SiteTables =
    | { ok: true; tables: string[]; hasMore: boolean }
    | { ok: false; result: ToolResult };

/**
 * Table names belonging to one site, at most `LIMITS.CATALOG_TABLES`
 */
export async function listSiteTables(context: DatabaseContext, prefix: string): Promise<SiteTables> {
    const condition = siteTablesCondition(context, prefix);
    const result = await runSql(
        context,
        `SELECT TABLE_NAME FROM information_schema.TABLES WHERE TABLE_SCHEMA = ? AND ${condition.sql} ORDER BY TABLE_NAME`,
        [context.database, ...condition.params],
        LIMITS.CATALOG_TABLES
    );

    if (!result.ok) {
        return { ok: false, result: executionFailure(result.error) };
    }

    return { ok: true, tables: stringColumn(result.rows, 'TABLE_NAME'), hasMore: result.hasMore };
}

export const getRelationshipsTool = defineTool({
    name: 'wp_get_relationships',
    title: 'Map WordPress Table Relationships',
    description:
        'Maps how WordPress posts, terms, users, comments and meta tables are related ' +
        '(posts -> postmeta, posts -> term_relationships -> term_taxonomy -> terms, posts -> comments, ' +
        'users -> usermeta, posts -> users via post_author). Also reports multisite sub-site prefixes.',
    properties: {
        site_id: SITE_ID_PROPERTY
    },
    input: z.object({ site_id: siteIdArg }).strict(),
    async run(context, input) {
        const prefix = sitePrefix(context, input.site_id);
        const siteTables = await listSiteTables(context, prefix);

        if (!siteTables.ok) {
            return siteTables.result;
        }

        // Every sub-site has its own options table
        const optionsTables = await runSql(
            context,
            'SELECT TABLE_NAME FROM information_schema.TABLES ' +
            'WHERE TABLE_SCHEMA = ? AND TABLE_NAME REGEXP ? ORDER BY TABLE_NAME',
            [context.database, subSitePattern(context.prefix, 'options')],
            LIMITS.CATALOG_TABLES
        );

        if (!optionsTables.ok) {
            return executionFailure(optionsTables.error);
        }

        const sitePrefixes = detectSitePrefixes(context.prefix, stringColumn(optionsTables.rows, 'TABLE_NAME'));

        return textResult(JSON.stringify({
            prefix,
            is_multisite: sitePrefixes.length > 1,
            site_prefixes: sitePrefixes,
            has_more_sites: optionsTables.hasMore,
            relationships: buildWpRelationships(prefix, siteTables.tables),
            has_more_tables: siteTables.hasMore
        }, null, 2));
    }
});
