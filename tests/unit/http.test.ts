import request from 'supertest';
import { createHttpTransport } from '../../src/transports/http';
import { createServer } from '../../src/server';
import { ForSaleLookup } from '../../src/forsale/lookup';
import type { RawAnswer } from '../../src/types';

const ANSWER: RawAnswer = {
  name: '_for-sale.example.com',
  records: [{ text: 'v=FORSALE1;{"price":"USD:5"}', ttl: 300 }],
  dnssecAuthenticated: true,
  rcode: 0,
};

describe('HTTP transport', () => {
  let lookup: ForSaleLookup;

  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    lookup = new ForSaleLookup({
      resolver: { resolve: jest.fn(async () => ANSWER) },
      rdapChecker: { crossCheck: jest.fn(async () => ({ tagPresent: false, reachable: true })) },
    });
  });

  afterEach(() => {
    lookup.destroy();
    jest.restoreAllMocks();
  });

  function app() {
    return createHttpTransport({
      createServer: () => createServer(lookup),
      lookup,
      config: { type: 'http', port: 3000, host: '127.0.0.1', corsOrigins: ['*'] },
    }).app;
  }

  it('reports health without sessions', async () => {
    const res = await request(app()).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      status: 'ok',
      transport: 'http',
      activeSessions: 0,
      pendingLookups: 0,
    });
  });

  it('mounts the REST API', async () => {
    const res = await request(app()).get('/api/for-sale/example.com');

    expect(res.status).toBe(200);
    expect(res.body.data).toMatchObject({ forSale: true, price: 'USD:5' });
  });

  it('requires a session for GET /mcp', async () => {
    const res = await request(app()).get('/mcp');

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('No active session');
  });

  it('rejects unknown session ids', async () => {
    const res = await request(app())
      .post('/mcp')
      .set('Mcp-Session-Id', 'no-such-session')
      .send({ jsonrpc: '2.0', id: 1, method: 'tools/list' });

    expect(res.status).toBe(404);
    expect(res.body.error).toBe('Session not found');
  });

  it('answers unknown paths with 404', async () => {
    const res = await request(app()).get('/nowhere');

    expect(res.status).toBe(404);
    expect(res.body.error).toBe('Not found');
  });
});
