/**
 * Tool catalog and dispatch
 *
 * @module tools
 */

import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { ContextProvider } from '../connection-manager.js';
import { UNEXPECTED_ERROR_MESSAGE } from '../errors.js';
import { logger } from '../logger.js';
import { RegisteredTool, ToolDefinition, ToolResult, errorResult } from './registry.js';
import { describeTableTool, getSchemaTool, listTablesTool } from './schema.js';
import { getRelationshipsTool } from './relationships.js';
import { queryTool, searchPostsTool } from './query.js';
import { getPostTermsTool, getTermPostsTool, listTaxonomiesTool } from './terms.js';
import { getCommentMetaTool, getPostMetaTool, getUserMetaTool } from './meta.js';
import {
    getConnectedPostsTool,
    getConnectedUsersTool,
    getUserConnectedPostsTool,
    listConnectedPostsTool,
    listConnectionNamesTool
} from './connections.js';
import {
    getShadowRelatedPostsTool,
    getShadowSourcePostTool,
    listShadowPostsTool,
    listShadowTaxonomiesTool
} from './shadow.js';

export const TOOLS: readonly RegisteredTool[] = [
    // Schema & structure
    listTablesTool,
    describeTableTool,
    getSchemaTool,
    getRelationshipsTool,
    // Querying
    queryTool,
    searchPostsTool,
    // Terms
    getPostTermsTool,
    getTermPostsTool,
    listTaxonomiesTool,
    // Meta
    getPostMetaTool,
    getUserMetaTool,
    getCommentMetaTool,
    // Content Connect
    listConnectionNamesTool,
    getConnectedPostsTool,
    getConnectedUsersTool,
    getUserConnectedPostsTool,
    listConnectedPostsTool,
    // Shadow taxonomies
    listShadowTaxonomiesTool,
    getShadowRelatedPostsTool,
    getShadowSourcePostTool,
    listShadowPostsTool
];

const TOOLS_BY_NAME = new Map(TOOLS.map(tool => [tool.definition.name, tool]));

export function listToolDefinitions(): ToolDefinition[] {
    return TOOLS.map(tool => tool.definition);
}

/**
 * Runs a tool by name. Protocol errors (unknown tool, invalid arguments)
 * are thrown as {@link McpError}; anything else unexpected is logged and
 * returned as an `internal_error` result.
 */
export async function callTool(provider: ContextProvider, name: string, args: unknown): Promise<ToolResult> {
    const tool = TOOLS_BY_NAME.get(name);

    if (!tool) {
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }

    try {
        return await tool.call(provider, args);
    } catch (error) {
        if (error instanceof McpError) {
            throw error;
        }

        logger.error(`Tool ${name} failed`, error);
        return errorResult('internal_error', UNEXPECTED_ERROR_MESSAGE);
    }
}
