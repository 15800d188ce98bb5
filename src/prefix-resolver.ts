/**
 * Prefix Resolver Module
 *
 * Maps a base table prefix and a multisite blog ID onto physical table names.
 * The main site uses the bare prefix (`wp_posts`); sub-site N uses
 * `${prefix}${N}_` (`wp_3_posts`).
 *
 * @module prefix-resolver
 */

/**
 * Prefix used when none is configured and none can be detected
 */
export const DEFAULT_PREFIX = 'wp_';

const OPTIONS_SUFFIX = 'options';

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Returns the table prefix for a site. Absent, 1 and non-positive IDs all
 * resolve to the main site.
 */
export function resolvePrefix(basePrefix: string, siteId?: number | null): string {
    if (siteId !== undefined && siteId !== null && siteId > 1) {
        return `${basePrefix}${siteId}_`;
    }

    return basePrefix;
}

/**
 * Accepts either a full table name (`wp_posts`) or a suffix (`posts`)
 */
export function resolveTable(prefix: string, table: string): string {
    if (table.startsWith(prefix)) {
        return table;
    }

    return `${prefix}${table}`;
}

/**
 * Lists the base prefix plus every sub-site prefix (`wp_2_`, `wp_3_`, ...)
 * found among the given table names, sorted and without duplicates.
 */
export function detectSitePrefixes(basePrefix: string, tableNames: readonly string[]): string[] {
    const prefixes = new Set<string>([basePrefix]);
    const pattern = new RegExp(`^${escapeRegExp(basePrefix)}(\\d+)_`);

    for (const name of tableNames) {
        const match = pattern.exec(name);
        if (match) {
            prefixes.add(`${basePrefix}${match[1]}_`);
        }
    }

    return [...prefixes].sort();
}

/**
 * Derives the base prefix from the first `*options` table name
 * (`wp_options` -> `wp_`).
 */
export function prefixFromOptionsTable(tableNames: readonly string[]): string {
    const optionsTable = tableNames.find(name => name.endsWith(OPTIONS_SUFFIX));

    if (optionsTable === undefined) {
        return DEFAULT_PREFIX;
    }

    return optionsTable.slice(0, -OPTIONS_SUFFIX.length);
}

/**
 * Regular expression source matching the tables of numbered sub-sites under
 * `basePrefix` (`^wp_[0-9]+_`), or only their `tableSuffix` table
 * (`^wp_[0-9]+_options$`). Usable both in JavaScript and with MySQL `REGEXP`.
 */
export function subSitePattern(basePrefix: string, tableSuffix?: string): string {
    const pattern = `^${escapeRegExp(basePrefix)}[0-9]+_`;
    return tableSuffix ? `${pattern}${escapeRegExp(tableSuffix)}$` : pattern;
}
