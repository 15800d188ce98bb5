/**
 * Term and taxonomy tools
 *
 * @module tools/terms
 */

import { z } from 'zod';
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
    rowsResult,
    runSql,
    siteIdArg,
    sitePrefix,
    textProperty
} from './registry.js';

export const getPostTermsTool = defineTool({
    name: 'wp_get_post_terms',
    title: 'Get Terms for a Post',
    description:
        'Lists the taxonomy terms assigned to a post (posts -> term_relationships -> term_taxonomy -> terms). ' +
        'Optionally restrict to one taxonomy such as category, post_tag or product_cat.',
    properties: {
        post_id: idProperty('Post ID.'),
        taxonomy: textProperty('Taxonomy to restrict to.'),
        site_id: SITE_ID_PROPERTY,
        format: FORMAT_PROPERTY
    },
    required: ['post_id'],
    input: z.object({
        post_id: idArg,
        taxonomy: optionalText,
        site_id: siteIdArg,
        format: formatArg
    }).strict(),
    async run(context, input) {
        const p = sitePrefix(context, input.site_id);

        let sql =
            'SELECT t.term_id, t.name, t.slug, tt.taxonomy, tt.description, tt.count, tt.parent ' +
            `FROM ${quoteTable(`${p}term_relationships`)} tr ` +
            `JOIN ${quoteTable(`${p}term_taxonomy`)} tt ON tr.term_taxonomy_id = tt.term_taxonomy_id ` +
            `JOIN ${quoteTable(`${p}terms`)} t ON tt.term_id = t.term_id ` +
            'WHERE tr.object_id = ?';
        const params: unknown[] = [input.post_id];

        if (input.taxonomy) {
            sql += ' AND tt.taxonomy = ?';
            params.push(input.taxonomy);
        }

        sql += ' ORDER BY tt.taxonomy, t.name';

        const result = await runSql(context, sql, params);

        if (!result.ok) {
            return executionFailure(result.error);
        }

        return rowsResult(result.rows, input.format, {
            post_id: input.post_id,
            terms: result.rows,
            has_more: result.hasMore
        });
    }
});

export const getTermPostsTool = defineTool({
    name: 'wp_get_term_posts',
    title: 'Get Posts for a Term',
    description:
        'Lists the posts assigned to a term (terms -> term_taxonomy -> term_relationships -> posts), newest first.',
    properties: {
        term_id: idProperty('Term ID.'),
        post_type: textProperty('Post type to restrict to.'),
        post_status: textProperty('Post status (default: publish).'),
        site_id: SITE_ID_PROPERTY,
        limit: LIMIT_PROPERTY,
        format: FORMAT_PROPERTY
    },
    required: ['term_id'],
    input: z.object({
        term_id: idArg,
        post_type: optionalText,
        post_status: z.string().trim().min(1).default('publish'),
        site_id: siteIdArg,
        limit: limitArg,
        format: formatArg
    }).strict(),
    async run(context, input) {
        const p = sitePrefix(context, input.site_id);

        let sql =
            'SELECT p.ID, p.post_title, p.post_type, p.post_status, p.post_date, p.post_author, tt.taxonomy ' +
            `FROM ${quoteTable(`${p}terms`)} t ` +
            `JOIN ${quoteTable(`${p}term_taxonomy`)} tt ON t.term_id = tt.term_id ` +
            `JOIN ${quoteTable(`${p}term_relationships`)} tr ON tt.term_taxonomy_id = tr.term_taxonomy_id ` +
            `JOIN ${quoteTable(`${p}posts`)} p ON tr.object_id = p.ID ` +
            'WHERE t.term_id = ?';
        const params: unknown[] = [input.term_id];

        if (input.post_type) {
            sql += ' AND p.post_type = ?';
            params.push(input.post_type);
        }

        sql += ' AND p.post_status = ?';
        params.push(input.post_status);

        sql += ' ORDER BY p.post_date DESC';

        const result = await runSql(context, sql, params, clampLimit(context, input.limit));

        if (!result.ok) {
            return executionFailure(result.error);
        }

        return rowsResult(result.rows, input.format, {
            term_id: input.term_id,
            posts: result.rows,
            has_more: result.hasMore
        });
    }
});

export const listTaxonomiesTool = defineTool({
    name: 'wp_list_taxonomies',
    title: 'List WordPress Taxonomies',
    description:
        'Lists the taxonomies in use with their number of terms and total assignments, most terms first.',
    properties: {
        site_id: SITE_ID_PROPERTY,
        format: FORMAT_PROPERTY
    },
    input: z.object({
        site_id: siteIdArg,
        format: formatArg
    }).strict(),
    async run(context, input) {
        const termTaxonomy = quoteTable(`${sitePrefix(context, input.site_id)}term_taxonomy`);

        const result = await runSql(
            context,
            'SELECT taxonomy, COUNT(*) AS term_count, SUM(count) AS total_usage ' +
            `FROM ${termTaxonomy} ` +
            'GROUP BY taxonomy ORDER BY term_count DESC, taxonomy'
        );

        if (!result.ok) {
            return executionFailure(result.error);
        }

        return rowsResult(result.rows, input.format, { taxonomies: result.rows, has_more: result.hasMore });
    }
});
