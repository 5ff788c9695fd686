#!/usr/bin/env node
import 'dotenv/config';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { AdsClient } from './ads.js';
import { TOOLS, callTool } from './ads-tools.js';
import { VERSION } from './cli.js';
import { createAdsClient } from './client.js';
import { loadConfig } from './config.js';
import { logger } from './logger.js';

const config = loadConfig();

let client: Promise<AdsClient> | undefined;

// Created on first use so a missing token surfaces as a tool error.
function getClient(): Promise<AdsClient> {
  if (!client) {
    const pending = createAdsClient({ sandbox: config.sandbox, config });
    pending.catch(() => {
      client = undefined;
    });
    client = pending;
  }
  return client;
}

const server = new Server(
  {
    name: 'ads-search',
    version: VERSION,
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: TOOLS,
}));

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  logger.debug('Tool call', { name });
  return callTool(name, args, getClient);
});

await server.connect(new StdioServerTransport());
logger.info('ads-search MCP server listening on stdio', { sandbox: config.sandbox });
