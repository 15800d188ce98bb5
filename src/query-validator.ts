/**
 * Query Validator Module
 *
 * Validates SQL queries to ensure only read-only operations are allowed.
 * Works lexically: comments outside quoted text are stripped, then a fixed
 * sequence of pattern checks runs on the result, string literals included.
 * The text that is executed is never rewritten.
 *
 * @module query-validator
 */

import { RejectionReason, SYSTEM_SCHEMAS, ValidationOutcome } from './types.js';

/**
 * Statement types a query may start with
 */
export const ALLOWED_STATEMENTS = ['SELECT', 'SHOW', 'DESCRIBE', 'EXPLAIN'] as const;

/**
 * Keywords that indicate data modification, DDL or file access
 */
export const FORBIDDEN_KEYWORDS = [
    'INSERT',
    'UPDATE',
    'DELETE',
    'DROP',
    'ALTER',
    'CREATE',
    'TRUNCATE',
    'REPLACE',
    'GRANT',
    'REVOKE',
    'LOAD',
    'LOAD_FILE',
    'INTO OUTFILE',
    'INTO DUMPFILE'
] as const;

const LEADING_STATEMENT = new RegExp(`^(${ALLOWED_STATEMENTS.join('|')})\\b`, 'i');

const FORBIDDEN_PATTERN = new RegExp(
    `\\b(${FORBIDDEN_KEYWORDS.map(keyword => keyword.replace(' ', '\\s+')).join('|')})\\b`,
    'i'
);

const SYSTEM_SCHEMA_PATTERNS = SYSTEM_SCHEMAS.map(schema => ({
    schema,
    patterns: [
        // information_schema.TABLES
        new RegExp(`\\b${schema}\\s*\\.`, 'i'),
        // `information_schema`.TABLES
        new RegExp(`\`${schema}\`\\s*\\.`, 'i'),
        // `information_schema`` `TABLES` and information_schema`TABLES`
        new RegExp(`\\b${schema}\\s*\``, 'i')
    ]
}));

const QUOTES = new Set(["'", '"', '`']);

/**
 * Index just past the quoted span opening at `start`. Doubled quotes and,
 * outside backticks, backslash escapes stay inside the span. An
 * unterminated span runs to the end of the text.
 */
function quotedSpanEnd(sql: string, start: number): number {
    const quote = sql[start];
    let index = start + 1;

    while (index < sql.length) {
        const char = sql[index];

        if (char === '\\' && quote !== '`') {
            index += 2;
        } else if (char === quote) {
            if (sql[index + 1] !== quote) {
                return index + 1;
            }
            index += 2;
        } else {
            index += 1;
        }
    }

    return sql.length;
}

/** `--` only opens a comment when followed by whitespace, a control character or the end */
function opensDashComment(sql: string, index: number): boolean {
    if (sql[index] !== '-' || sql[index + 1] !== '-') {
        return false;
    }

    const after = sql.charCodeAt(index + 2);
    return Number.isNaN(after) || after <= 32;
}

function lineEnd(sql: string, from: number): number {
    const newline = sql.indexOf('\n', from);
    return newline === -1 ? sql.length : newline;
}

/**
 * Removes block, `--` and `#` comments that sit outside quoted text. Each
 * comment becomes a single space so tokens on either side cannot fuse
 * (`DR/**\/OP` stays two words). A `/*! ... *\/` comment runs on the
 * server: its markers are removed and its body kept.
 */
export function stripComments(sql: string): string {
    let result = '';
    let index = 0;
    let inExecutableComment = false;

    while (index < sql.length) {
        const char = sql[index];
        const next = sql[index + 1];

        if (QUOTES.has(char)) {
            const end = quotedSpanEnd(sql, index);
            result += sql.slice(index, end);
            index = end;
        } else if (char === '/' && next === '*' && sql[index + 2] === '!') {
            inExecutableComment = true;
            result += ' ';
            index += 3;
            // optional server version, e.g. /*!50000
            while (index < sql.length && /[0-9]/.test(sql[index])) {
                index += 1;
            }
        } else if (char === '/' && next === '*') {
            const close = sql.indexOf('*/', index + 2);
            result += ' ';
            index = close === -1 ? sql.length : close + 2;
        } else if (inExecutableComment && char === '*' && next === '/') {
            inExecutableComment = false;
            result += ' ';
            index += 2;
        } else if (char === '#' || opensDashComment(sql, index)) {
            result += ' ';
            index = lineEnd(sql, index);
        } else {
            result += char;
            index += 1;
        }
    }

    return result;
}

function containsMultipleStatements(cleanSql: string): boolean {
    const trimmed = cleanSql.trimEnd();
    const withoutTerminator = (trimmed.endsWith(';') ? trimmed.slice(0, -1) : trimmed).trimEnd();

    return withoutTerminator.includes(';');
}

function startsWithAllowedStatement(cleanSql: string): boolean {
    const trimmed = cleanSql.trimStart();
    const unwrapped = trimmed.startsWith('(') ? trimmed.slice(1) : trimmed;

    return LEADING_STATEMENT.test(unwrapped);
}

function findForbiddenKeyword(cleanSql: string): string | null {
    const match = FORBIDDEN_PATTERN.exec(cleanSql);
    return match ? match[1].toUpperCase().replace(/\s+/g, ' ') : null;
}

function findSystemSchema(cleanSql: string): string | null {
    for (const { schema, patterns } of SYSTEM_SCHEMA_PATTERNS) {
        if (patterns.some(pattern => pattern.test(cleanSql))) {
            return schema;
        }
    }

    return null;
}

function reject(reason: RejectionReason, message: string): ValidationOutcome {
    return { approved: false, reason, message };
}

/**
 * Validates a query and returns which rule rejected it, if any
 *
 * @param sql - The SQL text as submitted
 */
export function validate(sql: string): ValidationOutcome {
    const cleanSql = stripComments(sql);

    if (containsMultipleStatements(cleanSql)) {
        return reject('multiple-statements', 'Multiple SQL statements are not allowed.');
    }

    if (!startsWithAllowedStatement(cleanSql)) {
        return reject(
            'disallowed-verb',
            `Only ${ALLOWED_STATEMENTS.join(', ')} statements are allowed.`
        );
    }

    const forbiddenKeyword = findForbiddenKeyword(cleanSql);

    if (forbiddenKeyword) {
        return reject(
            'disallowed-keyword',
            `Write/DDL operations are not allowed (found '${forbiddenKeyword}'). Read-only access only.`
        );
    }

    const systemSchema = findSystemSchema(cleanSql);

    if (systemSchema) {
        return reject('system-schema-access', `Access to system schema '${systemSchema}' is not allowed.`);
    }

    return { approved: true };
}

/**
 * Checks if a query passes every validation rule
 */
export function isReadOnly(sql: string): boolean {
    return validate(sql).approved;
}
