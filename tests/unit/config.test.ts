import { loadConfig, DEFAULT_DOH_URL, DEFAULT_RDAP_BOOTSTRAP_URL } from '../../src/config';
import { getTransportConfig, formatTransportInfo } from '../../src/transports';
import { ConfigurationError } from '../../src/utils/errors';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      logLevel: 'info',
      outputFormat: 'text',
      dohUrl: DEFAULT_DOH_URL,
      rdapBootstrapUrl: DEFAULT_RDAP_BOOTSTRAP_URL,
      policy: {
        rdapOnlyConfirms: true,
        failureCacheTtl: 30,
        cacheMaxEntries: 10000,
      },
      defaults: {
        enableRdapCheck: false,
        cacheTTL: 300,
        timeout: 5,
      },
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      LOG_LEVEL: 'DEBUG',
      OUTPUT_FORMAT: 'json',
      FORSALE_DOH_URL: 'https://dns.example.net/dns-query',
      FORSALE_RDAP_ONLY_CONFIRMS: 'false',
      FORSALE_FAILURE_CACHE_TTL: '10',
      FORSALE_DEFAULT_RDAP: '1',
      FORSALE_DEFAULT_TIMEOUT: '2',
    });

    expect(config.logLevel).toBe('debug');
    expect(config.outputFormat).toBe('json');
    expect(config.dohUrl).toBe('https://dns.example.net/dns-query');
    expect(config.policy.rdapOnlyConfirms).toBe(false);
    expect(config.policy.failureCacheTtl).toBe(10);
    expect(config.defaults.enableRdapCheck).toBe(true);
    expect(config.defaults.timeout).toBe(2);
  });

  it('falls back on unparsable values', () => {
    const config = loadConfig({
      LOG_LEVEL: 'verbose',
      OUTPUT_FORMAT: 'yaml',
      FORSALE_DEFAULT_CACHE_TTL: 'soon',
    });

    expect(config.logLevel).toBe('info');
    expect(config.outputFormat).toBe('text');
    expect(config.defaults.cacheTTL).toBe(300);
  });
});

describe('getTransportConfig', () => {
  it('defaults to stdio', () => {
    expect(getTransportConfig([], {})).toEqual({ type: 'stdio' });
  });

  it('selects HTTP from flags', () => {
    expect(getTransportConfig(['--http', '--port', '8080'], {})).toEqual({
      type: 'http',
      port: 8080,
      host: '0.0.0.0',
      corsOrigins: ['*'],
    });
  });

  it('selects HTTP from the environment', () => {
    const config = getTransportConfig([], {
      MCP_TRANSPORT: 'http',
      MCP_PORT: '3001',
      MCP_HOST: '127.0.0.1',
      CORS_ORIGINS: 'https://a.example, https://b.example',
    });

    expect(config).toEqual({
      type: 'http',
      port: 3001,
      host: '127.0.0.1',
      corsOrigins: ['https://a.example', 'https://b.example'],
    });
    expect(formatTransportInfo(config)).toBe('HTTP on 127.0.0.1:3001');
  });

  it('refuses malformed ports', () => {
    expect(() => getTransportConfig(['--port', 'http'], {})).toThrow(ConfigurationError);
    expect(() => getTransportConfig([], { MCP_TRANSPORT: 'http', MCP_PORT: '70000' })).toThrow(
      'Invalid configuration: MCP_PORT must be a port number, got "70000"',
    );
  });

  it('prefers the --port flag over MCP_PORT', () => {
    expect(getTransportConfig(['--port', '8081'], { MCP_PORT: '3001' })).toMatchObject({
      type: 'http',
      port: 8081,
    });
  });

  it('lets --stdio win', () => {
    expect(getTransportConfig(['--stdio', '--http'], { MCP_TRANSPORT: 'http' })).toEqual({
      type: 'stdio',
    });
  });
});
