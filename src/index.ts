#!/usr/bin/env node
/**
 * WordPress Read-Only MCP Server Entry Point
 *
 * MCP server that provides read-only access to a WordPress MySQL database,
 * including multisite networks. Tools cover:
 * - Tables, columns, indexes and core relationships
 * - Validated read-only SQL and post search
 * - Terms, taxonomies and post/user/comment meta
 * - WP Content Connect and shadow taxonomy relationships
 *
 * @module index
 */

import 'dotenv/config';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema
} from '@modelcontextprotocol/sdk/types.js';

import { ConnectionManager } from './connection-manager.js';
import { describeTarget, loadConfig } from './config.js';
import { logger } from './logger.js';
import { callTool, listToolDefinitions } from './tools/index.js';

/**
 * Server configuration
 */
const SERVER_NAME = 'wp-readonly-mcp';
const SERVER_VERSION = '1.0.0';

/**
 * Creates and configures the MCP server
 */
function createServer(connectionManager: ConnectionManager): Server {
    const server = new Server(
        {
            name: SERVER_NAME,
            version: SERVER_VERSION
        },
        {
            capabilities: {
                tools: {}
            }
        }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => {
        return {
            tools: listToolDefinitions()
        };
    });

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;
        const result = await callTool(connectionManager, name, args);

        return {
            content: [
                {
                    type: 'text',
                    text: result.text
                }
            ],
            ...(result.isError ? { isError: true } : {})
        };
    });

    return server;
}

function registerShutdown(connectionManager: ConnectionManager): void {
    let shuttingDown = false;

    const shutdown = async (signal: string): Promise<void> => {
        if (shuttingDown) {
            return;
        }
        shuttingDown = true;
        logger.info(`Received ${signal}, shutting down`);

        try {
            await connectionManager.close();
        } catch (error) {
            logger.error('Error while closing connection pool', error);
        }

        process.exit(0);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
    try {
        const config = loadConfig();
        logger.setLevel(config.logLevel);

        if (config.db.password === '') {
            logger.warn(`WP_DB_PASSWORD is empty; connecting to ${describeTarget(config.db)} without a password`);
        }

        const connectionManager = new ConnectionManager();
        const server = createServer(connectionManager);
        registerShutdown(connectionManager);

        // Accept protocol traffic while the pool starts; early tool calls
        // get not_initialized
        await server.connect(new StdioServerTransport());
        logger.info(`${SERVER_NAME} v${SERVER_VERSION} started`);

        await connectionManager.initialize(config);
    } catch (error) {
        logger.error('Failed to start MCP server', error);
        process.exit(1);
    }
}

// Run the server
void main();
