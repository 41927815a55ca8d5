/**
 * HTTP Transport for the MCP Server
 *
 * Implements the MCP Streamable HTTP transport and serves the REST API
 * from the same Express app.
 *
 * Routes:
 * - POST /mcp - JSON-RPC message endpoint
 * - GET /mcp - SSE stream for server-initiated messages
 * - DELETE /mcp - End a session
 * - /api/* - REST API
 * - GET /health - Health check endpoint
 * - GET / - Server info
 */

import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { randomUUID } from 'node:crypto';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { HttpTransportConfig } from './index.js';
import type { ForSaleLookup } from '../forsale/lookup.js';
import { createApiRouter } from '../api/routes.js';
import { logger } from '../utils/logger.js';
import { wrapError } from '../utils/errors.js';

export interface HttpTransportOptions {
  /** Builds one MCP server per session */
  createServer: () => Server;
  lookup: ForSaleLookup;
  config: HttpTransportConfig;
  /** Name reported by `GET /` */
  name?: string;
}

function sessionIdOf(req: Request): string | undefined {
  const header = req.headers['mcp-session-id'];
  return typeof header === 'string' ? header : undefined;
}

/**
 * Creates an Express server with MCP HTTP transport and the REST API.
 *
 * @returns Object with Express app and start/stop functions
 */
export function createHttpTransport(options: HttpTransportOptions) {
  const { config, lookup } = options;
  const app = express();

  // Middleware
  app.use(express.json({ limit: '64kb' }));

  // CORS configuration
  const corsOptions: cors.CorsOptions = {
    origin: config.corsOrigins,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: [
      'Content-Type',
      'Authorization',
      'Mcp-Session-Id',
      'Last-Event-ID'
    ],
    exposedHeaders: ['Mcp-Session-Id'],
  };
  app.use(cors(corsOptions));

  // Rate limiting - 100 requests per minute per IP
  const limiter = rateLimit({
    windowMs: 60 * 1000,
    max: 100,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      error: 'Too many requests',
      message: 'Rate limit exceeded. Please try again later.',
      retryAfter: 60
    },
    skip: (req) => req.path === '/health',
  });
  app.use(limiter);

  // Active sessions: each has its own transport and MCP server
  const sessions = new Map<string, { transport: StreamableHTTPServerTransport; server: Server }>();

  app.use('/api', createApiRouter(lookup));

  /**
   * MCP endpoint
   */
  app.all('/mcp', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const sessionId = sessionIdOf(req);
      const session = sessionId ? sessions.get(sessionId) : undefined;

      if (req.method === 'GET' || req.method === 'DELETE') {
        if (!session) {
          res.status(400).json({
            error: 'No active session',
            message: 'Establish a session first with POST /mcp'
          });
          return;
        }
        await session.transport.handleRequest(req, res);
        return;
      }

      if (req.method !== 'POST') {
        res.status(405).json({
          error: 'Method not allowed',
          allowed: ['GET', 'POST', 'DELETE']
        });
        return;
      }

      if (session) {
        await session.transport.handleRequest(req, res, req.body);
        return;
      }

      if (sessionId) {
        res.status(404).json({
          error: 'Session not found',
          message: 'Invalid or expired session ID'
        });
        return;
      }

      // New session
      const server = options.createServer();
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: (sid) => {
          sessions.set(sid, { transport, server });
          logger.debug('MCP session started', { session_id: sid });
        },
      });

      transport.onclose = () => {
        const sid = transport.sessionId;
        if (sid) {
          sessions.delete(sid);
          logger.debug('MCP session closed', { session_id: sid });
        }
      };

      transport.onerror = (error) => {
        logger.logError('HTTP transport error', error);
      };

      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      next(error);
    }
  });

  /**
   * Health check endpoint
   */
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      transport: 'http',
      activeSessions: sessions.size,
      pendingLookups: lookup.pending,
      uptime: process.uptime()
    });
  });

  /**
   * Server info endpoint
   */
  app.get('/', (_req: Request, res: Response) => {
    res.json({
      name: options.name ?? 'for-sale-check',
      transport: 'Streamable HTTP',
      endpoints: {
        mcp: '/mcp',
        forSale: '/api/for-sale/{domain}',
        tool: '/api/tools/check_for_sale',
        health: '/health'
      },
    });
  });

  /**
   * 404 handler
   */
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not found',
      message: 'Use /mcp for MCP protocol, /api for REST, /health for health check'
    });
  });

  /**
   * Error handler
   */
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.logError('HTTP transport unhandled error', wrapError(err));
    if (res.headersSent) {
      return;
    }
    res.status(500).json({
      error: 'Internal server error',
    });
  });

  let httpServer: ReturnType<typeof app.listen> | null = null;

  return {
    app,

    /**
     * Start the HTTP server
     */
    start(): Promise<void> {
      const { port, host } = config;

      return new Promise((resolve, reject) => {
        const listening = app.listen(port, host, () => {
          resolve();
        });
        listening.on('error', (err: NodeJS.ErrnoException) => {
          if (err.code === 'EADDRINUSE') {
            reject(new Error(`Port ${port} is already in use`));
          } else {
            reject(err);
          }
        });
        httpServer = listening;
      });
    },

    /**
     * Stop the HTTP server and close all sessions
     */
    async stop(): Promise<void> {
      for (const { transport, server } of sessions.values()) {
        await transport.close();
        await server.close();
      }
      sessions.clear();

      const current = httpServer;
      httpServer = null;
      if (current) {
        await new Promise<void>((resolve, reject) => {
          current.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      }
    },
  };
}
