/**
 * Tool Registry Module
 *
 * Shared plumbing for the MCP tools: definition shape, argument parsing,
 * common input properties and the JSON error payloads.
 *
 * @module tools/registry
 */

import { z } from 'zod';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { ContextProvider, DatabaseContext } from '../connection-manager.js';
import { ExecutionError, ExecutionResult, LIMITS, OutputFormat, Row } from '../types.js';
import { NotInitializedError } from '../errors.js';
import { resolvePrefix } from '../prefix-resolver.js';
import { formatOutput } from '../serialize.js';

export type ToolErrorCode =
    | ExecutionError['kind']
    | 'validation_rejected'
    | 'table_not_found'
    | 'internal_error';

/**
 * Text returned to the client; `isError` marks a tool-level failure
 */
export interface ToolResult {
    text: string;
    isError?: boolean;
}

export interface ToolAnnotations {
    title: string;
    readOnlyHint: true;
    destructiveHint: false;
    idempotentHint: true;
    openWorldHint: false;
}

type JsonSchemaProperty = Record<string, unknown>;

/**
 * What `tools/list` advertises for a tool
 */
export interface ToolDefinition {
    name: string;
    description: string;
    inputSchema: {
        type: 'object';
        properties: Record<string, JsonSchemaProperty>;
        required?: string[];
    };
    annotations: ToolAnnotations;
}

export interface RegisteredTool {
    readonly definition: ToolDefinition;
    call(provider: ContextProvider, args: unknown): Promise<ToolResult>;
}

interface ToolOptions<T> {
    name: string;
    title: string;
    description: string;
    properties: Record<string, JsonSchemaProperty>;
    required?: string[];
    input: z.ZodType<T, z.ZodTypeDef, unknown>;
    run(context: DatabaseContext, input: T): Promise<ToolResult>;
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

/**
 * Builds a tool from its advertised schema, its argument parser and its
 * handler. Invalid arguments raise `InvalidParams`; a call before the
 * database is ready yields a `not_initialized` result.
 */
export function defineTool<T>(options: ToolOptions<T>): RegisteredTool {
    const definition: ToolDefinition = {
        name: options.name,
        description: options.description,
        inputSchema: {
            type: 'object',
            properties: options.properties,
            ...(options.required && options.required.length > 0 ? { required: options.required } : {})
        },
        annotations: {
            title: options.title,
            readOnlyHint: true,
            destructiveHint: false,
            idempotentHint: true,
            openWorldHint: false
        }
    };

    return {
        definition,
        async call(provider, args) {
            const parsed = options.input.safeParse(args ?? {});

            if (!parsed.success) {
                throw new McpError(ErrorCode.InvalidParams, `Invalid arguments for ${options.name}: ${formatIssues(parsed.error)}`);
            }

            let context: DatabaseContext;

            try {
                context = provider.getContext();
            } catch (error) {
                if (error instanceof NotInitializedError) {
                    return errorResult('not_initialized', error.message);
                }
                throw error;
            }

            return options.run(context, parsed.data);
        }
    };
}

/*
 * Argument parsers
 */

export const siteIdArg = z.number().int().nullish();
export const formatArg = z.enum(['json', 'csv']).default('json');
export const limitArg = z.number().int().positive().default(LIMITS.TOOL_DEFAULT);
export const idArg = z.number().int().positive();
export const optionalText = z.string().trim().nullish().transform(value => value || undefined);
export const requiredText = z.string().trim().min(1);

/*
 * Advertised properties
 */

export const SITE_ID_PROPERTY: JsonSchemaProperty = {
    type: 'integer',
    description: 'Multisite blog ID. Omit or use 1 for the main site.'
};

export const FORMAT_PROPERTY: JsonSchemaProperty = {
    type: 'string',
    enum: ['json', 'csv'],
    description: 'Output format (default: json).'
};

export const LIMIT_PROPERTY: JsonSchemaProperty = {
    type: 'integer',
    minimum: 1,
    description: `Maximum rows to return (default: ${LIMITS.TOOL_DEFAULT}, capped by the server row limit).`
};

export function idProperty(description: string): JsonSchemaProperty {
    return { type: 'integer', minimum: 1, description };
}

export function textProperty(description: string): JsonSchemaProperty {
    return { type: 'string', description };
}

/*
 * Helpers shared by the tool modules
 */

export function sitePrefix(context: DatabaseContext, siteId: number | null | undefined): string {
    return resolvePrefix(context.prefix, siteId);
}

/**
 * Back-quotes a physical table name
 */
export function quoteTable(name: string): string {
    return `\`${name.replace(/`/g, '``')}\``;
}

/**
 * Escapes the LIKE wildcards (and the escape character) in a literal
 */
export function escapeLike(value: string): string {
    return value.replace(/\\/g, '\\\\').replace(/%/g, '\\%').replace(/_/g, '\\_');
}

export function clampLimit(context: DatabaseContext, limit: number): number {
    return Math.min(limit, context.maxRows);
}

export function placeholders(count: number): string {
    return Array.from({ length: count }, () => '?').join(', ');
}

export function textResult(text: string): ToolResult {
    return { text };
}

/**
 * Renders rows as CSV or as the JSON `wrapper`
 */
export function rowsResult(rows: readonly Row[], format: OutputFormat, wrapper: object): ToolResult {
    return textResult(formatOutput(rows, format, wrapper));
}

export function errorResult(code: ToolErrorCode, message: string, extra?: Record<string, string>): ToolResult {
    return {
        text: JSON.stringify({ error: message, code, ...extra }),
        isError: true
    };
}

export function executionFailure(error: ExecutionError): ToolResult {
    return errorResult(error.kind, error.message);
}

/**
 * Runs a statement built by a tool. ` LIMIT ?` is appended and bound to
 * `limit + 1`, so the server stops one row past the limit.
 */
export function runSql(
    context: DatabaseContext,
    sql: string,
    params: readonly unknown[] = [],
    limit: number = context.maxRows
): Promise<ExecutionResult> {
    return context.executor.execute(`${sql} LIMIT ?`, [...params, limit + 1], limit);
}

/**
 * Reads a string column from every row, skipping other value kinds
 */
export function stringColumn(rows: readonly Row[], column: string): string[] {
    return rows
        .map(row => row[column])
        .filter((value): value is string => typeof value === 'string');
}
