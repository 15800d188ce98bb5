/**
 * Schema Tools
 *
 * Table listing and structure inspection through information_schema.
 *
 * @module tools/schema
 */

import { z } from 'zod';
import { LIMITS, Row, WP_CORE_SUFFIXES } from '../types.js';
import { resolveTable } from '../prefix-resolver.js';
import { rowsToCsv } from '../serialize.js';
import { buildWpRelationships, listSiteTables, siteTablesCondition } from './relationships.js';
import {
    FORMAT_PROPERTY,
    SITE_ID_PROPERTY,
    defineTool,
    errorResult,
    executionFailure,
    formatArg,
    placeholders,
    runSql,
    siteIdArg,
    sitePrefix,
    textProperty,
    textResult
} from './registry.js';

export const listTablesTool = defineTool({
    name: 'wp_list_tables',
    title: 'List WordPress Database Tables',
    description:
        'Lists the tables of a site with engine, estimated row count and data/index size in KB. ' +
        'Use filter (a LIKE pattern such as "%woocommerce%") to search across all prefixes.',
    properties: {
        site_id: SITE_ID_PROPERTY,
        filter: textProperty('LIKE pattern on the table name. Defaults to the tables of the site.')
    },
    input: z.object({
        site_id: siteIdArg,
        filter: z.string().trim().min(1).optional()
    }).strict(),
    async run(context, input) {
        const condition = input.filter
            ? { sql: 'TABLE_NAME LIKE ?', params: [input.filter] }
            : siteTablesCondition(context, sitePrefix(context, input.site_id));

        const result = await runSql(
            context,
            'SELECT TABLE_NAME, ENGINE, TABLE_ROWS, ' +
            'ROUND(DATA_LENGTH / 1024, 2) AS data_kb, ' +
            'ROUND(INDEX_LENGTH / 1024, 2) AS index_kb ' +
            'FROM information_schema.TABLES ' +
            `WHERE TABLE_SCHEMA = ? AND ${condition.sql} ` +
            'ORDER BY TABLE_NAME',
            [context.database, ...condition.params],
            LIMITS.CATALOG_TABLES
        );

        if (!result.ok) {
            return executionFailure(result.error);
        }

        return textResult(JSON.stringify({ tables: result.rows, has_more: result.hasMore }, null, 2));
    }
});

export const describeTableTool = defineTool({
    name: 'wp_describe_table',
    title: 'Describe a WordPress Table',
    description:
        'Shows column definitions and indexes for a table. Accepts a full table name ("wp_posts") ' +
        'or a suffix ("posts") resolved against the site prefix.',
    properties: {
        table: textProperty('Table name or suffix, letters, digits and underscores only.'),
        site_id: SITE_ID_PROPERTY,
        format: FORMAT_PROPERTY
    },
    required: ['table'],
    input: z.object({
        table: z.string().trim().regex(/^[A-Za-z0-9_]+$/, 'table may only contain letters, digits and underscores'),
        site_id: siteIdArg,
        format: formatArg
    }).strict(),
    async run(context, input) {
        const table = resolveTable(sitePrefix(context, input.site_id), input.table);

        const columns = await runSql(
            context,
            'SELECT COLUMN_NAME, COLUMN_TYPE, IS_NULLABLE, COLUMN_KEY, COLUMN_DEFAULT, EXTRA ' +
            'FROM information_schema.COLUMNS ' +
            'WHERE TABLE_SCHEMA = ? AND TABLE_NAME = ? ' +
            'ORDER BY ORDINAL_POSITION',
            [context.database, table],
            LIMITS.CATALOG_COLUMNS
        );

        if (!columns.ok) {
            return executionFailure(columns.error);
        }

        if (columns.rows.length === 0) {
            return errorResult('table_not_found', `Table '${table}' not found.`);
        }

        if (input.format === 'csv') {
            return textResult(rowsToCsv(columns.rows));
        }

        const indexes = await runSql(
            context,
            'SELECT INDEX_NAME, COLUMN_NAME, NON_UNIQUE, SEQ_IN_INDEX ' +
            'FROM information_schema.STATISTICS ' +
            'WHERE TABLE_SCHEMA = ? AND TABLE_NAME = ? ' +
            'ORDER BY INDEX_NAME, SEQ_IN_INDEX',
            [context.database, table],
            LIMITS.CATALOG_COLUMNS
        );

        if (!indexes.ok) {
            return executionFailure(indexes.error);
        }

        return textResult(JSON.stringify({
            table,
            columns: columns.rows,
            indexes: indexes.rows
        }, null, 2));
    }
});

interface TableSchema {
    columns: Row[];
    indexes: Row[];
}

/**
 * Moves rows into their table's bucket, dropping the TABLE_NAME column
 */
function groupByTable(rows: readonly Row[], schema: Map<string, TableSchema>, key: keyof TableSchema): void {
    for (const { TABLE_NAME: tableName, ...rest } of rows) {
        if (typeof tableName === 'string') {
            schema.get(tableName)?.[key].push(rest);
        }
    }
}

export const getSchemaTool = defineTool({
    name: 'wp_get_schema',
    title: 'Generate Full WordPress Database Schema',
    description:
        'Returns every table of a site with its columns and indexes plus the known WordPress relationships. ' +
        'Only core tables are included unless include_plugins is true. CSV output lists one row per column.',
    properties: {
        site_id: SITE_ID_PROPERTY,
        include_plugins: {
            type: 'boolean',
            description: 'Include non-core (plugin) tables (default: false).'
        },
        format: FORMAT_PROPERTY
    },
    input: z.object({
        site_id: siteIdArg,
        include_plugins: z.boolean().default(false),
        format: formatArg
    }).strict(),
    async run(context, input) {
        const prefix = sitePrefix(context, input.site_id);
        const siteTables = await listSiteTables(context, prefix);

        if (!siteTables.ok) {
            return siteTables.result;
        }

        const coreTables = new Set<string>(WP_CORE_SUFFIXES.map(suffix => `${prefix}${suffix}`));
        const tables = input.include_plugins
            ? siteTables.tables
            : siteTables.tables.filter(name => coreTables.has(name));

        const schema = new Map<string, TableSchema>(tables.map(name => [name, { columns: [], indexes: [] }]));

        if (tables.length > 0) {
            const inList = placeholders(tables.length);

            const columns = await runSql(
                context,
                'SELECT TABLE_NAME, COLUMN_NAME, COLUMN_TYPE, IS_NULLABLE, COLUMN_KEY, COLUMN_DEFAULT, EXTRA ' +
                'FROM information_schema.COLUMNS ' +
                `WHERE TABLE_SCHEMA = ? AND TABLE_NAME IN (${inList}) ` +
                'ORDER BY TABLE_NAME, ORDINAL_POSITION',
                [context.database, ...tables],
                LIMITS.CATALOG_COLUMNS
            );

            if (!columns.ok) {
                return executionFailure(columns.error);
            }

            const indexes = await runSql(
                context,
                'SELECT TABLE_NAME, INDEX_NAME, COLUMN_NAME, NON_UNIQUE ' +
                'FROM information_schema.STATISTICS ' +
                `WHERE TABLE_SCHEMA = ? AND TABLE_NAME IN (${inList}) ` +
                'ORDER BY TABLE_NAME, INDEX_NAME, SEQ_IN_INDEX',
                [context.database, ...tables],
                LIMITS.CATALOG_COLUMNS
            );

            if (!indexes.ok) {
                return executionFailure(indexes.error);
            }

            groupByTable(columns.rows, schema, 'columns');
            groupByTable(indexes.rows, schema, 'indexes');
        }

        if (input.format === 'csv') {
            const flat: Row[] = [];
            for (const [table, { columns }] of schema) {
                flat.push(...columns.map(column => ({ table, ...column })));
            }
            return textResult(rowsToCsv(flat));
        }

        return textResult(JSON.stringify({
            database: context.database,
            prefix,
            table_count: schema.size,
            has_more: siteTables.hasMore,
            tables: Object.fromEntries(schema),
            relationships: buildWpRelationships(prefix, tables)
        }, null, 2));
    }
});
