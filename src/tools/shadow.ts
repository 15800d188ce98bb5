/**
 * Shadow Taxonomy Tools
 *
 * In a shadow taxonomy every source post owns a term whose term meta stores
 * the post's ID. Posts assigned to that term are related to the source post.
 *
 * @module tools/shadow
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
    placeholders,
    quoteTable,
    requiredText,
    rowsResult,
    runSql,
    siteIdArg,
    sitePrefix,
    textProperty
} from './registry.js';

const TAXONOMY_PROPERTY = textProperty('Shadow taxonomy name.');
const META_KEY_PROPERTY = textProperty('Term meta key holding the source post ID.');

function tables(prefix: string) {
    return {
        posts: quoteTable(`${prefix}posts`),
        terms: quoteTable(`${prefix}terms`),
        termmeta: quoteTable(`${prefix}termmeta`),
        termTaxonomy: quoteTable(`${prefix}term_taxonomy`),
        termRelationships: quoteTable(`${prefix}term_relationships`)
    };
}

export const listShadowTaxonomiesTool = defineTool({
    name: 'wp_list_shadow_taxonomies',
    title: 'List Shadow Taxonomies',
    description:
        'Finds taxonomy and term meta key pairs whose meta values are IDs of existing posts, ' +
        'i.e. candidate shadow taxonomies, with the number of terms using each.',
    properties: {
        site_id: SITE_ID_PROPERTY,
        format: FORMAT_PROPERTY
    },
    input: z.object({
        site_id: siteIdArg,
        format: formatArg
    }).strict(),
    async run(context, input) {
        const t = tables(sitePrefix(context, input.site_id));

        const result = await runSql(
            context,
            'SELECT tt.taxonomy, tm.meta_key, COUNT(DISTINCT tm.term_id) AS term_count ' +
            `FROM ${t.termmeta} tm ` +
            `JOIN ${t.termTaxonomy} tt ON tt.term_id = tm.term_id ` +
            `JOIN ${t.posts} p ON p.ID = CAST(tm.meta_value AS UNSIGNED) ` +
            "WHERE tm.meta_value REGEXP '^[0-9]+$' " +
            'GROUP BY tt.taxonomy, tm.meta_key ' +
            'ORDER BY term_count DESC, tt.taxonomy, tm.meta_key'
        );

        if (!result.ok) {
            return executionFailure(result.error);
        }

        return rowsResult(result.rows, input.format, { shadow_taxonomies: result.rows, has_more: result.hasMore });
    }
});

export const getShadowRelatedPostsTool = defineTool({
    name: 'wp_get_shadow_related_posts',
    title: 'Get Related Posts via Shadow Taxonomy',
    description:
        'Finds the shadow terms of a source post (term meta meta_key = post ID) and lists the other posts ' +
        'assigned to those terms.',
    properties: {
        post_id: idProperty('Source post ID.'),
        taxonomy: TAXONOMY_PROPERTY,
        meta_key: META_KEY_PROPERTY,
        site_id: SITE_ID_PROPERTY,
        limit: LIMIT_PROPERTY,
        format: FORMAT_PROPERTY
    },
    required: ['post_id', 'taxonomy', 'meta_key'],
    input: z.object({
        post_id: idArg,
        taxonomy: requiredText,
        meta_key: requiredText,
        site_id: siteIdArg,
        limit: limitArg,
        format: formatArg
    }).strict(),
    async run(context, input) {
        const t = tables(sitePrefix(context, input.site_id));

        const terms = await runSql(
            context,
            'SELECT t.term_id, t.name, t.slug ' +
            `FROM ${t.terms} t ` +
            `JOIN ${t.termmeta} tm ON t.term_id = tm.term_id ` +
            `JOIN ${t.termTaxonomy} tt ON t.term_id = tt.term_id ` +
            'WHERE tm.meta_key = ? AND tm.meta_value = ? AND tt.taxonomy = ?',
            [input.meta_key, String(input.post_id), input.taxonomy]
        );

        if (!terms.ok) {
            return executionFailure(terms.error);
        }

        const termIds = terms.rows.map(row => row.term_id);

        if (termIds.length === 0) {
            return rowsResult([], input.format, {
                post_id: input.post_id,
                taxonomy: input.taxonomy,
                shadow_terms: [],
                related_posts: [],
                has_more: false
            });
        }

        const posts = await runSql(
            context,
            'SELECT DISTINCT p.ID, p.post_title, p.post_type, p.post_status, t.term_id, t.name AS term_name ' +
            `FROM ${t.posts} p ` +
            `JOIN ${t.termRelationships} tr ON p.ID = tr.object_id ` +
            `JOIN ${t.termTaxonomy} tt ON tr.term_taxonomy_id = tt.term_taxonomy_id ` +
            `JOIN ${t.terms} t ON tt.term_id = t.term_id ` +
            `WHERE tt.term_id IN (${placeholders(termIds.length)}) AND p.ID != ? ` +
            'ORDER BY p.post_title',
            [...termIds, input.post_id],
            clampLimit(context, input.limit)
        );

        if (!posts.ok) {
            return executionFailure(posts.error);
        }

        return rowsResult(posts.rows, input.format, {
            post_id: input.post_id,
            taxonomy: input.taxonomy,
            shadow_terms: terms.rows,
            related_posts: posts.rows,
            has_more: posts.hasMore
        });
    }
});

export const getShadowSourcePostTool = defineTool({
    name: 'wp_get_shadow_source_post',
    title: 'Get Source Post for a Shadow Term',
    description: 'Returns the post a shadow term stands for, read from the term meta meta_key.',
    properties: {
        term_id: idProperty('Shadow term ID.'),
        meta_key: META_KEY_PROPERTY,
        site_id: SITE_ID_PROPERTY,
        format: FORMAT_PROPERTY
    },
    required: ['term_id', 'meta_key'],
    input: z.object({
        term_id: idArg,
        meta_key: requiredText,
        site_id: siteIdArg,
        format: formatArg
    }).strict(),
    async run(context, input) {
        const t = tables(sitePrefix(context, input.site_id));

        const result = await runSql(
            context,
            'SELECT p.ID, p.post_title, p.post_type, p.post_status, p.post_date, ' +
            't.name AS term_name, t.slug AS term_slug ' +
            `FROM ${t.termmeta} tm ` +
            `JOIN ${t.terms} t ON tm.term_id = t.term_id ` +
            `JOIN ${t.posts} p ON CAST(tm.meta_value AS UNSIGNED) = p.ID ` +
            'WHERE tm.term_id = ? AND tm.meta_key = ?',
            [input.term_id, input.meta_key],
            1
        );

        if (!result.ok) {
            return executionFailure(result.error);
        }

        return rowsResult(result.rows, input.format, {
            term_id: input.term_id,
            source_post: result.rows[0] ?? null
        });
    }
});

export const listShadowPostsTool = defineTool({
    name: 'wp_list_shadow_posts',
    title: 'List All Posts in a Shadow Taxonomy',
    description:
        'Lists every post assigned to a term of the shadow taxonomy with the term and the source post it stands for.',
    properties: {
        taxonomy: TAXONOMY_PROPERTY,
        meta_key: META_KEY_PROPERTY,
        site_id: SITE_ID_PROPERTY,
        limit: LIMIT_PROPERTY,
        format: FORMAT_PROPERTY
    },
    required: ['taxonomy', 'meta_key'],
    input: z.object({
        taxonomy: requiredText,
        meta_key: requiredText,
        site_id: siteIdArg,
        limit: limitArg,
        format: formatArg
    }).strict(),
    async run(context, input) {
        const t = tables(sitePrefix(context, input.site_id));

        const result = await runSql(
            context,
            'SELECT p.ID, p.post_title, p.post_type, ' +
            't.term_id AS shadow_term_id, t.name AS shadow_term_name, ' +
            'source.ID AS source_post_id, source.post_title AS source_post_title, ' +
            'source.post_type AS source_post_type ' +
            `FROM ${t.posts} p ` +
            `JOIN ${t.termRelationships} tr ON p.ID = tr.object_id ` +
            `JOIN ${t.termTaxonomy} tt ON tr.term_taxonomy_id = tt.term_taxonomy_id ` +
            `JOIN ${t.terms} t ON tt.term_id = t.term_id ` +
            `JOIN ${t.termmeta} tm ON t.term_id = tm.term_id AND tm.meta_key = ? ` +
            `JOIN ${t.posts} source ON CAST(tm.meta_value AS UNSIGNED) = source.ID ` +
            'WHERE tt.taxonomy = ? ' +
            'ORDER BY source.post_title, p.post_title',
            [input.meta_key, input.taxonomy],
            clampLimit(context, input.limit)
        );

        if (!result.ok) {
            return executionFailure(result.error);
        }

        return rowsResult(result.rows, input.format, {
            taxonomy: input.taxonomy,
            meta_key: input.meta_key,
            posts: result.rows,
            has_more: result.hasMore
        });
    }
});
