/**
 * Transport selection: stdio for MCP clients that spawn the server,
 * HTTP for web clients, the REST API and health checks.
 */

import { ConfigurationError } from '../utils/errors.js';

export interface StdioTransportConfig {
  type: 'stdio';
}

export interface HttpTransportConfig {
  type: 'http';
  port: number;
  host: string;
  corsOrigins: string[];
}

export type TransportConfig = StdioTransportConfig | HttpTransportConfig;

export type TransportType = TransportConfig['type'];

const DEFAULT_PORT = 3000;
const DEFAULT_HOST = '0.0.0.0';

function flagValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  return index === -1 ? undefined : argv[index + 1];
}

function parsePort(raw: string, origin: string): number {
  const port = Number(raw);
  if (!/^\d+$/.test(raw) || port < 1 || port > 65535) {
    throw new ConfigurationError(
      `${origin} must be a port number, got "${raw}"`,
      `Set ${origin} to an integer between 1 and 65535.`,
    );
  }
  return port;
}

/**
 * Pick the transport from CLI flags, then the environment.
 *
 * `--stdio` always wins. `--http`, `--port <n>` or `MCP_TRANSPORT=http`
 * select HTTP; a `--port` flag beats `MCP_PORT`.
 *
 * @example
 * ```bash
 * for-sale-check                                    # stdio
 * for-sale-check --http --port 8080
 * MCP_TRANSPORT=http MCP_PORT=3001 for-sale-check
 * ```
 *
 * @throws ConfigurationError on a malformed port
 */
export function getTransportConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): TransportConfig {
  if (argv.includes('--stdio')) {
    return { type: 'stdio' };
  }

  const portFlag = flagValue(argv, '--port');
  const wantsHttp =
    argv.includes('--http') || argv.includes('--port') || env.MCP_TRANSPORT === 'http';
  if (!wantsHttp) {
    return { type: 'stdio' };
  }

  let port = DEFAULT_PORT;
  if (portFlag !== undefined) {
    port = parsePort(portFlag, '--port');
  } else if (env.MCP_PORT) {
    port = parsePort(env.MCP_PORT, 'MCP_PORT');
  }

  const corsOrigins = (env.CORS_ORIGINS ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  return {
    type: 'http',
    port,
    host: env.MCP_HOST || DEFAULT_HOST,
    corsOrigins: corsOrigins.length > 0 ? corsOrigins : ['*'],
  };
}

/**
 * One-line description for startup logs.
 */
export function formatTransportInfo(config: TransportConfig): string {
  return config.type === 'stdio' ? 'stdio (standard I/O)' : `HTTP on ${config.host}:${config.port}`;
}
