/**
 * Serialization Module
 *
 * Reduces driver values to JSON-safe scalars and renders row sets as JSON or
 * CSV text.
 *
 * @module serialize
 */

import { JsonScalar, OutputFormat, RawRow, Row } from './types.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

function decodeBytes(bytes: Uint8Array): string {
    try {
        return utf8.decode(bytes);
    } catch {
        return `<binary ${bytes.byteLength} bytes>`;
    }
}

/**
 * Makes a single value JSON-serializable
 */
export function serializeValue(value: unknown): JsonScalar {
    if (value === null || value === undefined) {
        return null;
    }

    if (typeof value === 'string' || typeof value === 'boolean') {
        return value;
    }

    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : String(value);
    }

    if (typeof value === 'bigint') {
        return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
            ? Number(value)
            : value.toString();
    }

    // Buffer is a Uint8Array subclass
    if (value instanceof Uint8Array) {
        return decodeBytes(value);
    }

    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? null : value.toISOString();
    }

    if (value instanceof Set) {
        return JSON.stringify([...value]);
    }

    if (typeof value === 'object') {
        return JSON.stringify(value);
    }

    return String(value);
}

/**
 * Makes all row values JSON-serializable, keeping column order
 */
export function cleanRows(rows: readonly RawRow[]): Row[] {
    return rows.map(row => {
        const cleaned: Row = {};

        for (const [column, value] of Object.entries(row)) {
            cleaned[column] = serializeValue(value);
        }

        return cleaned;
    });
}

function escapeCsvValue(value: JsonScalar): string {
    if (value === null) {
        return '';
    }

    const text = String(value);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Converts rows to CSV using the first row's columns as the header
 */
export function rowsToCsv(rows: readonly Row[]): string {
    if (rows.length === 0) {
        return '';
    }

    const columns = Object.keys(rows[0]);
    const lines = [columns.map(escapeCsvValue).join(',')];

    for (const row of rows) {
        lines.push(columns.map(column => escapeCsvValue(row[column] ?? null)).join(','));
    }

    return `${lines.join('\r\n')}\r\n`;
}

/**
 * Formats rows as CSV, or as pretty-printed JSON of `wrapper` (falling back
 * to the bare rows)
 */
export function formatOutput(rows: readonly Row[], format: OutputFormat, wrapper?: object): string {
    if (format === 'csv') {
        return rowsToCsv(rows);
    }

    return JSON.stringify(wrapper ?? rows, null, 2);
}
