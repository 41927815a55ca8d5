#!/usr/bin/env node
/**
 * for-sale-check MCP Server.
 *
 * Model Context Protocol server answering one question: is a domain
 * advertised for sale through a DNSSEC-signed `_for-sale` TXT record?
 *
 * Features:
 * - check_for_sale: DNS (+ optional RDAP) for-sale check
 * - build_for_sale_record: compose a record for a domain owner to publish
 * - stdio or Streamable HTTP transport, REST API in HTTP mode
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';

import { config } from './config.js';
import { logger, generateRequestId, setRequestId, clearRequestId } from './utils/logger.js';
import { wrapError, ForSaleError } from './utils/errors.js';
import { formatRecordResult, formatToolResult, formatToolError } from './utils/format.js';
import { createForSaleLookup, type ForSaleLookup } from './forsale/lookup.js';
import {
  buildForSaleRecordTool,
  checkForSaleTool,
  executeBuildForSaleRecord,
  executeCheckForSale,
} from './tools/index.js';
import { getTransportConfig, formatTransportInfo } from './transports/index.js';
import { createHttpTransport } from './transports/http.js';

// ═══════════════════════════════════════════════════════════════════════════
// Server Configuration
// ═══════════════════════════════════════════════════════════════════════════

export const SERVER_NAME = 'for-sale-check';
export const SERVER_VERSION = '0.1.0';

/**
 * All available tools.
 */
const TOOLS: Tool[] = [checkForSaleTool, buildForSaleRecordTool];

// ═══════════════════════════════════════════════════════════════════════════
// Server Implementation
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Create and configure the MCP server around a shared lookup.
 */
export function createServer(lookup: ForSaleLookup): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOLS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;
    const requestId = generateRequestId();

    try {
      setRequestId(requestId);
      logger.info('Tool call started', { tool: name, request_id: requestId });

      const text = await executeToolCall(lookup, name, args ?? {}, extra.signal);

      logger.info('Tool call completed', { tool: name, request_id: requestId });

      return {
        content: [
          {
            type: 'text',
            text,
          },
        ],
      };
    } catch (error) {
      const wrapped = wrapError(error);

      logger.error('Tool call failed', {
        tool: name,
        request_id: requestId,
        error: wrapped.message,
        code: wrapped.code,
      });

      // Return error as content (MCP pattern)
      return {
        content: [
          {
            type: 'text',
            text: formatToolError(wrapped, config.outputFormat),
          },
        ],
        isError: true,
      };
    } finally {
      clearRequestId();
    }
  });

  return server;
}

/**
 * Execute a tool call by name and render its result.
 */
export async function executeToolCall(
  lookup: ForSaleLookup,
  name: string,
  args: Record<string, unknown>,
  signal?: AbortSignal,
): Promise<string> {
  switch (name) {
    case 'check_for_sale': {
      const result = await executeCheckForSale(lookup, args, signal);
      logger.debug('For-sale verdict', { domain: result.domain, for_sale: result.forSale });
      return formatToolResult(result, config.outputFormat);
    }

    case 'build_for_sale_record':
      return formatRecordResult(executeBuildForSaleRecord(args), config.outputFormat);

    default:
      throw new ForSaleError(
        'UNKNOWN_TOOL',
        `Unknown tool: ${name}`,
        `The tool "${name}" is not available.`,
        {
          retryable: false,
          suggestedAction: `Available tools: ${TOOLS.map((t) => t.name).join(', ')}`,
        },
      );
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// Startup
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Main entry point.
 */
async function main(): Promise<void> {
  const transportConfig = getTransportConfig();

  logger.info('for-sale-check starting', {
    version: SERVER_VERSION,
    node_version: process.version,
    transport: formatTransportInfo(transportConfig),
    doh_url: config.dohUrl,
    rdap_only_confirms: config.policy.rdapOnlyConfirms,
  });

  // One lookup (and cache) for the whole process
  const lookup = createForSaleLookup(config);
  let stop: () => Promise<void>;

  if (transportConfig.type === 'http') {
    const http = createHttpTransport({
      createServer: () => createServer(lookup),
      lookup,
      config: transportConfig,
      name: SERVER_NAME,
    });
    await http.start();
    stop = () => http.stop();
  } else {
    const server = createServer(lookup);
    await server.connect(new StdioServerTransport());
    stop = () => server.close();
  }

  logger.info('for-sale-check ready', {
    tools: TOOLS.length,
    transport: transportConfig.type,
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down...', { signal });
    stop()
      .catch((error: unknown) => {
        logger.logError('Shutdown failed', wrapError(error));
      })
      .finally(() => {
        lookup.destroy();
        process.exit(0);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Failed to start server', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  });
}
