import { describe, expect, it } from 'vitest';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { ContextProvider, DatabaseContext } from '../connection-manager.js';
import { NotInitializedError } from '../errors.js';
import { QueryExecutor } from '../query-executor.js';
import { WP_CORE_SUFFIXES } from '../types.js';
import { FakePool, QueryHandler, driverError, numberedRows } from '../testing/fake-pool.js';
import { TOOLS, callTool, listToolDefinitions } from './index.js';
import { buildMetaQuery } from './meta.js';
import { directionClause } from './connections.js';
import { buildWpRelationships } from './relationships.js';
import { escapeLike, quoteTable } from './registry.js';

function harness(handler: QueryHandler = () => [], maxRows = 1000) {
    const pool = new FakePool(handler);
    const context: DatabaseContext = {
        database: 'wordpress',
        prefix: 'wp_',
        maxRows,
        queryTimeoutSeconds: 30,
        executor: new QueryExecutor(pool, { queryTimeoutMs: 30000 })
    };
    const provider: ContextProvider = { getContext: () => context };
    return { pool, provider };
}

async function callJson(provider: ContextProvider, name: string, args: Record<string, unknown>): Promise<unknown> {
    const result = await callTool(provider, name, args);
    return JSON.parse(result.text);
}

const EXPECTED_TOOLS = [
    'wp_list_tables',
    'wp_describe_table',
    'wp_get_schema',
    'wp_get_relationships',
    'wp_query',
    'wp_search_posts',
    'wp_get_post_terms',
    'wp_get_term_posts',
    'wp_list_taxonomies',
    'wp_get_post_meta',
    'wp_get_user_meta',
    'wp_get_comment_meta',
    'wp_list_connection_names',
    'wp_get_connected_posts',
    'wp_get_connected_users',
    'wp_get_user_connected_posts',
    'wp_list_connected_posts',
    'wp_list_shadow_taxonomies',
    'wp_get_shadow_related_posts',
    'wp_get_shadow_source_post',
    'wp_list_shadow_posts'
];

describe('tool catalog', () => {
    it('registers every tool once', () => {
        expect(listToolDefinitions().map(tool => tool.name)).toEqual(EXPECTED_TOOLS);
        expect(TOOLS).toHaveLength(21);
    });

    it('marks every tool read-only', () => {
        for (const { annotations } of listToolDefinitions()) {
            expect(annotations).toMatchObject({
                readOnlyHint: true,
                destructiveHint: false,
                idempotentHint: true,
                openWorldHint: false
            });
            expect(annotations.title.length).toBeGreaterThan(0);
        }
    });

    it('uses flat parameters and declares every required one', () => {
        for (const { name, inputSchema } of listToolDefinitions()) {
            expect(inputSchema.type).toBe('object');
            expect(inputSchema.properties, name).not.toHaveProperty('params');
            for (const required of inputSchema.required ?? []) {
                expect(inputSchema.properties, `${name}.${required}`).toHaveProperty(required);
            }
        }
    });

    it.each([
        ['wp_query', ['sql']],
        ['wp_search_posts', ['search']],
        ['wp_describe_table', ['table']],
        ['wp_get_post_meta', ['post_id']],
        ['wp_get_connected_posts', ['post_id']],
        ['wp_list_connected_posts', ['name']],
        ['wp_get_shadow_related_posts', ['post_id', 'taxonomy', 'meta_key']],
        ['wp_get_shadow_source_post', ['term_id', 'meta_key']]
    ])('%s requires %j', (name, required) => {
        const tool = listToolDefinitions().find(definition => definition.name === name);
        expect(tool?.inputSchema.required).toEqual(required);
    });

    it.each(['wp_list_connection_names', 'wp_list_shadow_taxonomies', 'wp_list_tables', 'wp_get_relationships'])(
        '%s has no required parameters',
        name => {
            const tool = listToolDefinitions().find(definition => definition.name === name);
            expect(tool?.inputSchema.required).toBeUndefined();
        }
    );
});

describe('callTool', () => {
    it('rejects unknown tools', async () => {
        const { provider } = harness();

        const call = callTool(provider, 'wp_drop_everything', {});

        await expect(call).rejects.toBeInstanceOf(McpError);
        await expect(call).rejects.toMatchObject({ code: ErrorCode.MethodNotFound });
    });

    it('rejects invalid arguments', async () => {
        const { provider } = harness();

        await expect(callTool(provider, 'wp_get_post_meta', { post_id: 'abc' }))
            .rejects.toMatchObject({ code: ErrorCode.InvalidParams });
        await expect(callTool(provider, 'wp_get_post_meta', { post_id: 0 }))
            .rejects.toMatchObject({ code: ErrorCode.InvalidParams });
        await expect(callTool(provider, 'wp_query', {}))
            .rejects.toMatchObject({ code: ErrorCode.InvalidParams });
    });

    it('rejects table names with other characters', async () => {
        const { provider, pool } = harness();

        await expect(callTool(provider, 'wp_describe_table', { table: 'wp_posts`; DROP' }))
            .rejects.toMatchObject({ code: ErrorCode.InvalidParams });
        expect(pool.acquired).toBe(0);
    });

    it('answers not_initialized while the database is starting', async () => {
        const provider: ContextProvider = {
            getContext: () => {
                throw new NotInitializedError();
            }
        };

        const result = await callTool(provider, 'wp_list_taxonomies', {});

        expect(result.isError).toBe(true);
        expect(JSON.parse(result.text)).toEqual({
            error: 'Database connection not initialized. Server may still be starting up.',
            code: 'not_initialized'
        });
    });

    it('reports unexpected failures as internal_error', async () => {
        const provider: ContextProvider = {
            getContext: () => {
                throw new Error('boom');
            }
        };

        expect(await callJson(provider, 'wp_list_taxonomies', {})).toEqual({
            error: 'An unexpected error occurred.',
            code: 'internal_error'
        });
    });

    it('reports execution errors with their kind', async () => {
        const { provider } = harness(() => {
            throw driverError("Table 'wordpress.wp_term_taxonomy' doesn't exist", { code: 'ER_NO_SUCH_TABLE', errno: 1146 });
        });

        const result = await callTool(provider, 'wp_list_taxonomies', {});

        expect(result.isError).toBe(true);
        expect(JSON.parse(result.text)).toEqual({ error: 'Database query failed.', code: 'query_error' });
    });
});

describe('wp_query', () => {
    it('never reaches the database with a rejected statement', async () => {
        const { provider, pool } = harness();

        const result = await callTool(provider, 'wp_query', { sql: 'DELETE FROM wp_posts' });

        expect(result.isError).toBe(true);
        expect(JSON.parse(result.text)).toEqual({
            error: 'Only SELECT, SHOW, DESCRIBE, EXPLAIN statements are allowed.',
            code: 'validation_rejected',
            reason: 'disallowed-verb'
        });
        expect(pool.acquired).toBe(0);
    });

    it('returns rows with the truncation flag', async () => {
        const { provider, pool } = harness(() => numberedRows(3));

        expect(await callJson(provider, 'wp_query', { sql: 'SELECT id FROM wp_posts', limit: 2 })).toEqual({
            row_count: 2,
            has_more: true,
            limit: 2,
            rows: [{ id: 1 }, { id: 2 }]
        });
        expect(pool.queries).toEqual([{ sql: 'SELECT id FROM wp_posts', params: [] }]);
    });

    it('caps the limit at the server maximum', async () => {
        const { provider } = harness(() => numberedRows(1), 5);

        expect(await callJson(provider, 'wp_query', { sql: 'SELECT 1', limit: 500 })).toMatchObject({ limit: 5 });
    });

    it('renders CSV', async () => {
        const { provider } = harness(() => [{ ID: 1, post_title: 'Hello, world' }]);

        const result = await callTool(provider, 'wp_query', { sql: 'SELECT ID, post_title FROM wp_posts', format: 'csv' });

        expect(result.text).toBe('ID,post_title\r\n1,"Hello, world"\r\n');
    });
});

describe('wp_search_posts', () => {
    it('escapes LIKE wildcards and binds every value', async () => {
        const { provider, pool } = harness();

        await callTool(provider, 'wp_search_posts', { search: '100%_off', post_type: 'product', site_id: 3 });

        expect(pool.queries[0].sql).toBe(
            'SELECT ID, post_title, post_type, post_status, post_date, post_author, ' +
            'SUBSTRING(post_content, 1, 200) AS content_preview ' +
            'FROM `wp_3_posts` ' +
            'WHERE (post_title LIKE ? OR post_content LIKE ?) AND post_type = ? AND post_status = ? ' +
            'ORDER BY post_date DESC LIMIT ?'
        );
        expect(pool.queries[0].params).toEqual(['%100\\%\\_off%', '%100\\%\\_off%', 'product', 'publish', 101]);
    });
});

describe('meta tools', () => {
    it('reads user meta at the base prefix with a LIKE key', async () => {
        const { provider, pool } = harness(() => [{ umeta_id: 1, user_id: 7, meta_key: 'wp_capabilities', meta_value: 'a:0:{}' }]);

        const payload = await callJson(provider, 'wp_get_user_meta', { user_id: 7, meta_key: 'wp_%' });

        expect(pool.queries[0]).toEqual({
            sql: 'SELECT * FROM `wp_usermeta` WHERE user_id = ? AND meta_key LIKE ? ORDER BY meta_key LIMIT ?',
            params: [7, 'wp_%', 1001]
        });
        expect(payload).toEqual({
            user_id: 7,
            meta: [{ umeta_id: 1, user_id: 7, meta_key: 'wp_capabilities', meta_value: 'a:0:{}' }],
            has_more: false
        });
    });

    it('flags meta rows past the server row limit', async () => {
        const { provider, pool } = harness(() => numberedRows(3), 2);

        expect(await callJson(provider, 'wp_get_post_meta', { post_id: 5 })).toEqual({
            post_id: 5,
            meta: [{ id: 1 }, { id: 2 }],
            has_more: true
        });
        expect(pool.queries[0].params).toEqual([5, 3]);
    });

    it('matches plain keys exactly', () => {
        expect(buildMetaQuery('wp_2_postmeta', 'post_id', 5, '_price')).toEqual({
            sql: 'SELECT * FROM `wp_2_postmeta` WHERE post_id = ? AND meta_key = ? ORDER BY meta_key',
            params: [5, '_price']
        });
        expect(buildMetaQuery('wp_postmeta', 'post_id', 5)).toEqual({
            sql: 'SELECT * FROM `wp_postmeta` WHERE post_id = ? ORDER BY meta_key',
            params: [5]
        });
    });
});

describe('wp_describe_table', () => {
    it('reports unknown tables', async () => {
        const { provider } = harness(() => []);

        const result = await callTool(provider, 'wp_describe_table', { table: 'nope' });

        expect(result.isError).toBe(true);
        expect(JSON.parse(result.text)).toEqual({ error: "Table 'wp_nope' not found.", code: 'table_not_found' });
    });

    it('returns columns and indexes', async () => {
        const { provider, pool } = harness(sql => sql.includes('COLUMNS')
            ? [{ COLUMN_NAME: 'ID', COLUMN_TYPE: 'bigint(20) unsigned' }]
            : [{ INDEX_NAME: 'PRIMARY', COLUMN_NAME: 'ID' }]);

        expect(await callJson(provider, 'wp_describe_table', { table: 'posts', site_id: 2 })).toEqual({
            table: 'wp_2_posts',
            columns: [{ COLUMN_NAME: 'ID', COLUMN_TYPE: 'bigint(20) unsigned' }],
            indexes: [{ INDEX_NAME: 'PRIMARY', COLUMN_NAME: 'ID' }]
        });
        expect(pool.queries[0].params).toEqual(['wordpress', 'wp_2_posts', 10001]);
    });
});

describe('wp_get_schema', () => {
    it('batches column and index lookups for core tables', async () => {
        const { provider, pool } = harness(sql => {
            if (sql.includes('information_schema.COLUMNS')) {
                return [
                    { TABLE_NAME: 'wp_postmeta', COLUMN_NAME: 'meta_id' },
                    { TABLE_NAME: 'wp_posts', COLUMN_NAME: 'ID' }
                ];
            }
            if (sql.includes('information_schema.STATISTICS')) {
                return [{ TABLE_NAME: 'wp_posts', INDEX_NAME: 'PRIMARY', COLUMN_NAME: 'ID' }];
            }
            return [{ TABLE_NAME: 'wp_custom' }, { TABLE_NAME: 'wp_postmeta' }, { TABLE_NAME: 'wp_posts' }, { TABLE_NAME: 'wp_2_posts' }];
        });

        const payload = await callJson(provider, 'wp_get_schema', {});

        expect(pool.queries).toHaveLength(3);
        expect(pool.queries[0].params).toEqual(['wordpress', 'wp\\_%', '^wp_[0-9]+_', 2001]);
        expect(pool.queries[1].params).toEqual(['wordpress', 'wp_postmeta', 'wp_posts', 10001]);
        expect(payload).toEqual({
            database: 'wordpress',
            prefix: 'wp_',
            table_count: 2,
            has_more: false,
            tables: {
                wp_postmeta: { columns: [{ COLUMN_NAME: 'meta_id' }], indexes: [] },
                wp_posts: { columns: [{ COLUMN_NAME: 'ID' }], indexes: [{ INDEX_NAME: 'PRIMARY', COLUMN_NAME: 'ID' }] }
            },
            relationships: buildWpRelationships('wp_', ['wp_postmeta', 'wp_posts'])
        });
    });

    it('returns an empty schema without further queries', async () => {
        const { provider, pool } = harness(() => []);

        expect(await callJson(provider, 'wp_get_schema', { include_plugins: true })).toEqual({
            database: 'wordpress',
            prefix: 'wp_',
            table_count: 0,
            has_more: false,
            tables: {},
            relationships: []
        });
        expect(pool.queries).toHaveLength(1);
    });
});

/**
 * Answers information_schema.TABLES lookups over `names` the way MySQL
 * applies the escaped LIKE prefix and the NOT REGEXP exclusion
 */
function tableCatalog(names: readonly string[]): QueryHandler {
    return (sql, params) => {
        if (!sql.includes('information_schema.TABLES')) {
            return [];
        }
        const prefix = String(params[1]).slice(0, -1).replace(/\\(.)/g, '$1');
        const excluded = sql.includes('NOT REGEXP') ? new RegExp(String(params[2])) : null;
        return names
            .filter(name => name.startsWith(prefix) && !excluded?.test(name))
            .sort()
            .map(name => ({ TABLE_NAME: name }));
    };
}

describe('site table listings', () => {
    const mainTables = WP_CORE_SUFFIXES.map(suffix => `wp_${suffix}`);
    const subSiteTables = Array.from({ length: 249 }, (_, index) => index + 2).flatMap(site =>
        ['posts', 'postmeta', 'comments', 'commentmeta', 'terms', 'termmeta', 'term_taxonomy', 'term_relationships', 'options']
            .map(suffix => `wp_${site}_${suffix}`));

    it('keeps main-site tables when sub-site tables outnumber the catalog limit', async () => {
        const { provider } = harness(tableCatalog([...subSiteTables, ...mainTables]));

        expect(await callJson(provider, 'wp_list_tables', {})).toEqual({
            tables: [...mainTables].sort().map(name => ({ TABLE_NAME: name })),
            has_more: false
        });
        expect(await callJson(provider, 'wp_get_schema', {})).toMatchObject({
            table_count: mainTables.length,
            has_more: false
        });
    });

    it('lists a sub-site without the main-site exclusion', async () => {
        const { provider, pool } = harness(tableCatalog([...subSiteTables, ...mainTables]));

        const payload = await callJson(provider, 'wp_list_tables', { site_id: 7 });

        expect(payload).toHaveProperty('tables', [
            'wp_7_commentmeta', 'wp_7_comments', 'wp_7_options', 'wp_7_postmeta', 'wp_7_posts',
            'wp_7_term_relationships', 'wp_7_term_taxonomy', 'wp_7_termmeta', 'wp_7_terms'
        ].map(name => ({ TABLE_NAME: name })));
        expect(pool.queries[0].params).toEqual(['wordpress', 'wp\\_7\\_%', 2001]);
    });

    it('reports truncation of a long listing', async () => {
        const plugins = Array.from({ length: 2005 }, (_, index) => `wp_plugin_${index}`);
        const { provider } = harness(tableCatalog(plugins));

        const payload = await callJson(provider, 'wp_list_tables', {});

        expect(payload).toHaveProperty('has_more', true);
        expect(payload).toHaveProperty('tables.length', 2000);
    });
});

describe('wp_get_relationships', () => {
    it('reports multisite prefixes', async () => {
        const { provider } = harness(sql => sql.includes('LIKE')
            ? [{ TABLE_NAME: 'wp_posts' }, { TABLE_NAME: 'wp_postmeta' }]
            : [{ TABLE_NAME: 'wp_2_options' }, { TABLE_NAME: 'wp_3_options' }]);

        const payload = await callJson(provider, 'wp_get_relationships', {});

        expect(payload).toMatchObject({
            prefix: 'wp_',
            is_multisite: true,
            site_prefixes: ['wp_', 'wp_2_', 'wp_3_'],
            has_more_sites: false,
            has_more_tables: false
        });
        expect(payload).toHaveProperty('relationships', buildWpRelationships('wp_', ['wp_posts', 'wp_postmeta']));
    });
});

describe('buildWpRelationships', () => {
    it('includes only relationships whose tables exist', () => {
        expect(buildWpRelationships('wp_', ['wp_posts', 'wp_postmeta']).map(rel => rel.name))
            .toEqual(['post_meta', 'post_hierarchy']);
    });

    it('covers the full core schema', () => {
        const core = ['posts', 'postmeta', 'terms', 'termmeta', 'term_taxonomy', 'term_relationships',
            'comments', 'commentmeta', 'users', 'usermeta'].map(suffix => `wp_${suffix}`);

        expect(buildWpRelationships('wp_', core).map(rel => rel.name)).toEqual([
            'post_meta',
            'post_term_relationships',
            'taxonomy_term',
            'taxonomy_hierarchy',
            'term_meta',
            'post_comments',
            'comment_meta',
            'comment_hierarchy',
            'user_meta',
            'post_author',
            'post_hierarchy'
        ]);
    });
});

describe('connection tools', () => {
    it('binds the post ID once per placeholder in either direction', () => {
        expect(directionClause('any', 5)).toEqual({
            join: 'p.ID = CASE WHEN pp.id1 = ? THEN pp.id2 ELSE pp.id1 END',
            where: '(pp.id1 = ? OR pp.id2 = ?)',
            params: [5, 5, 5]
        });
        expect(directionClause('from', 5).params).toEqual([5]);
    });

    it('nests connected post pairs', async () => {
        const { provider, pool } = harness(() => [{
            from_post_id: 10,
            from_post_title: 'Article',
            from_post_type: 'post',
            to_post_id: 20,
            to_post_title: 'Office',
            to_post_type: 'office',
            connection_order: 0
        }]);

        expect(await callJson(provider, 'wp_list_connected_posts', { name: 'article-office' })).toEqual({
            relationship_name: 'article-office',
            connections: [{
                from_post: { ID: 10, post_title: 'Article', post_type: 'post' },
                to_post: { ID: 20, post_title: 'Office', post_type: 'office' },
                order: 0
            }],
            has_more: false
        });
        expect(pool.queries[0].params).toEqual(['article-office', 101]);
    });

    it('counts names only in connection tables that exist', async () => {
        const { provider, pool } = harness(sql => sql.includes('information_schema')
            ? [{ TABLE_NAME: 'wp_post_to_post' }]
            : [{ name: 'related', connection_count: 4 }]);

        expect(await callJson(provider, 'wp_list_connection_names', {})).toEqual({
            tables: ['wp_post_to_post'],
            connection_names: [{ source: 'post_to_post', name: 'related', connection_count: 4 }],
            has_more: false
        });
        expect(pool.queries[1].sql).toBe(
            'SELECT name, COUNT(*) AS connection_count FROM `wp_post_to_post` GROUP BY name ORDER BY name LIMIT ?'
        );
    });
});

describe('shadow tools', () => {
    it('stops after the term lookup when the post has no shadow terms', async () => {
        const { provider, pool } = harness(() => []);

        expect(await callJson(provider, 'wp_get_shadow_related_posts', {
            post_id: 12,
            taxonomy: 'shadow_office',
            meta_key: 'shadow_post_id'
        })).toEqual({
            post_id: 12,
            taxonomy: 'shadow_office',
            shadow_terms: [],
            related_posts: [],
            has_more: false
        });
        expect(pool.queries).toHaveLength(1);
        expect(pool.queries[0].params).toEqual(['shadow_post_id', '12', 'shadow_office', 1001]);
    });

    it('excludes the source post from related posts', async () => {
        const { provider, pool } = harness(sql => sql.startsWith('SELECT t.term_id')
            ? [{ term_id: 4, name: 'Office A', slug: 'office-a' }, { term_id: 9, name: 'Office B', slug: 'office-b' }]
            : [{ ID: 30, post_title: 'Neighbour', post_type: 'post', post_status: 'publish', term_id: 4, term_name: 'Office A' }]);

        await callTool(provider, 'wp_get_shadow_related_posts', {
            post_id: 12,
            taxonomy: 'shadow_office',
            meta_key: 'shadow_post_id'
        });

        expect(pool.queries[1].sql).toContain('WHERE tt.term_id IN (?, ?) AND p.ID != ?');
        expect(pool.queries[1].params).toEqual([4, 9, 12, 101]);
    });

    it('returns null when a term has no source post', async () => {
        const { provider } = harness(() => []);

        expect(await callJson(provider, 'wp_get_shadow_source_post', { term_id: 4, meta_key: 'shadow_post_id' }))
            .toEqual({ term_id: 4, source_post: null });
    });
});

describe('registry helpers', () => {
    it('escapes LIKE metacharacters', () => {
        expect(escapeLike('a\\b%c_d')).toBe('a\\\\b\\%c\\_d');
    });

    it('back-quotes table names', () => {
        expect(quoteTable('wp_posts')).toBe('`wp_posts`');
        expect(quoteTable('odd`name')).toBe('`odd``name`');
    });
});
