import axios from 'axios';
import { DohDnssecResolver, decodeTxtData, extractTxtRecords } from '../../src/forsale/resolver';
import {
  DnssecValidationError,
  NxDomainError,
  ResolutionError,
  TimeoutError,
} from '../../src/utils/errors';

jest.mock('axios');

const mockedAxios = jest.mocked(axios);

const ENDPOINT = 'https://doh.test/dns-query';

/** TXT rdata in presentation format */
function txt(value: string): string {
  return `"${value.replace(/["\\]/g, '\\$&')}"`;
}

/** Answer DoH queries by record type */
function respondByType(bodies: Record<string, unknown>) {
  mockedAxios.get.mockImplementation(async (_url, config) => {
    const params: unknown = config?.params;
    const type =
      typeof params === 'object' && params !== null && 'type' in params ? params.type : undefined;
    if (typeof type === 'string' && type in bodies) {
      return { status: 200, data: bodies[type] };
    }
    throw new Error(`Unexpected query type: ${String(type)}`);
  });
}

describe('decodeTxtData', () => {
  it('unescapes quoted strings', () => {
    expect(decodeTxtData(txt('v=FORSALE1;{"price":"USD:1000"}'))).toBe(
      'v=FORSALE1;{"price":"USD:1000"}',
    );
  });

  it('joins multiple character-strings', () => {
    expect(decodeTxtData('"v=FORSALE1;{\\"price\\":" "\\"USD:1\\"}"')).toBe(
      'v=FORSALE1;{"price":"USD:1"}',
    );
  });

  it('decodes \\DDD escapes as octets', () => {
    expect(decodeTxtData('"caf\\195\\169"')).toBe('café');
  });

  it('takes unquoted data as-is', () => {
    expect(decodeTxtData('  plain text ')).toBe('plain text');
  });

  it('rejects malformed data', () => {
    expect(decodeTxtData('"unterminated')).toBeNull();
    expect(decodeTxtData('"\\256"')).toBeNull();
    expect(decodeTxtData('"a" junk "b"')).toBeNull();
  });
});

describe('extractTxtRecords', () => {
  it('follows CNAMEs inside the answer', () => {
    const records = extractTxtRecords('_for-sale.example.com', [
      { name: '_for-sale.example.com.', type: 5, TTL: 60, data: 'offers.example.net.' },
      { name: 'offers.example.net.', type: 16, TTL: 120, data: txt('v=FORSALE1;{}') },
      { name: 'other.example.net.', type: 16, TTL: 120, data: txt('unrelated') },
    ]);

    expect(records).toEqual([{ text: 'v=FORSALE1;{}', ttl: 120 }]);
  });
});

describe('DohDnssecResolver', () => {
  const resolver = new DohDnssecResolver({ endpoint: ENDPOINT });
  const options = { timeoutMs: 1000 };

  beforeEach(() => {
    mockedAxios.get.mockReset();
  });

  it('returns authenticated TXT records', async () => {
    respondByType({
      TXT: {
        Status: 0,
        AD: true,
        Answer: [
          { name: '_for-sale.example.com', type: 16, TTL: 300, data: txt('v=FORSALE1;{"price":"USD:1000"}') },
          { name: '_for-sale.example.com', type: 16, TTL: 300, data: txt('some other text') },
        ],
      },
    });

    await expect(resolver.resolve('example.com', options)).resolves.toEqual({
      name: '_for-sale.example.com',
      records: [
        { text: 'v=FORSALE1;{"price":"USD:1000"}', ttl: 300 },
        { text: 'some other text', ttl: 300 },
      ],
      dnssecAuthenticated: true,
      rcode: 0,
    });

    expect(mockedAxios.get).toHaveBeenCalledWith(
      ENDPOINT,
      expect.objectContaining({
        params: { name: '_for-sale.example.com', type: 'TXT', do: 1, cd: 0 },
        headers: { Accept: 'application/dns-json' },
      }),
    );
  });

  it('rejects unauthenticated answers', async () => {
    respondByType({ TXT: { Status: 0, AD: false, Answer: [] } });

    await expect(resolver.resolve('example.com', options)).rejects.toBeInstanceOf(
      DnssecValidationError,
    );
  });

  it('maps DNSSEC SERVFAILs to validation errors', async () => {
    respondByType({
      TXT: { Status: 2, extended_dns_errors: [{ info_code: 6, extra_text: 'DNSSEC Bogus' }] },
    });

    await expect(resolver.resolve('example.com', options)).rejects.toBeInstanceOf(
      DnssecValidationError,
    );
  });

  it('maps DNSSEC comments to validation errors', async () => {
    respondByType({ TXT: { Status: 2, Comment: 'EDE(9): DNSKEY Missing' } });

    await expect(resolver.resolve('example.com', options)).rejects.toBeInstanceOf(
      DnssecValidationError,
    );
  });

  it('maps other SERVFAILs to resolution errors', async () => {
    respondByType({ TXT: { Status: 2, Comment: 'EDE(22): No Reachable Authority' } });

    const error = await resolver.resolve('example.com', options).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ResolutionError);
    expect(error).toMatchObject({ rcode: 2 });
  });

  it('reports other rcodes by name', async () => {
    respondByType({ TXT: { Status: 5 } });

    const error = await resolver.resolve('example.com', options).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ResolutionError);
    expect(error).toMatchObject({
      rcode: 5,
      message: 'DNS resolution failed for _for-sale.example.com: REFUSED',
    });
  });

  it('returns an empty answer when only the record is missing', async () => {
    respondByType({
      TXT: { Status: 3, AD: true },
      SOA: { Status: 0, AD: true, Answer: [] },
    });

    await expect(resolver.resolve('example.com', options)).resolves.toEqual({
      name: '_for-sale.example.com',
      records: [],
      dnssecAuthenticated: true,
      rcode: 3,
    });
  });

  it('reports a domain that does not exist', async () => {
    respondByType({
      TXT: { Status: 3, AD: true },
      SOA: { Status: 3, AD: true },
    });

    await expect(resolver.resolve('example.com', options)).rejects.toBeInstanceOf(NxDomainError);
  });

  it('requires authenticated denial of existence', async () => {
    respondByType({ TXT: { Status: 3, AD: false } });

    await expect(resolver.resolve('example.com', options)).rejects.toBeInstanceOf(
      DnssecValidationError,
    );
    expect(mockedAxios.get).toHaveBeenCalledTimes(1);
  });

  it('maps HTTP errors and malformed bodies to resolution errors', async () => {
    mockedAxios.get.mockResolvedValueOnce({ status: 503, data: '' });
    await expect(resolver.resolve('example.com', options)).rejects.toThrow(
      'DNS resolution failed for _for-sale.example.com: resolver returned HTTP 503',
    );

    mockedAxios.get.mockResolvedValueOnce({ status: 200, data: '<html>' });
    await expect(resolver.resolve('example.com', options)).rejects.toThrow(
      'DNS resolution failed for _for-sale.example.com: malformed resolver response',
    );
  });

  it('separates transport failures from timeouts', async () => {
    mockedAxios.get.mockRejectedValueOnce(
      Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }),
    );
    await expect(resolver.resolve('example.com', options)).rejects.toBeInstanceOf(
      ResolutionError,
    );

    mockedAxios.get.mockRejectedValueOnce(
      Object.assign(new Error('timeout of 1000ms exceeded'), { code: 'ECONNABORTED' }),
    );
    await expect(resolver.resolve('example.com', options)).rejects.toBeInstanceOf(TimeoutError);
  });

  it('aborts the request when the deadline passes', async () => {
    let requestSignal: { aborted: boolean } | undefined;
    mockedAxios.get.mockImplementation(
      (_url, config) =>
        new Promise((_resolve, reject) => {
          requestSignal = config?.signal;
          config?.signal?.addEventListener?.('abort', () => reject(new Error('canceled')));
        }),
    );

    await expect(resolver.resolve('example.com', { timeoutMs: 20 })).rejects.toBeInstanceOf(
      TimeoutError,
    );
    expect(requestSignal?.aborted).toBe(true);
  });
});
