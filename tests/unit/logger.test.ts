import { logger, truncateValues, setRequestId, clearRequestId } from '../../src/utils/logger';

describe('truncateValues', () => {
  it('leaves short values alone', () => {
    expect(truncateValues({ a: 'short', n: 3, list: ['x'] })).toEqual({
      a: 'short',
      n: 3,
      list: ['x'],
    });
  });

  it('truncates long strings at any depth', () => {
    const long = 'x'.repeat(350);
    expect(truncateValues({ nested: [long] })).toEqual({
      nested: [`${'x'.repeat(300)}…[50 more]`],
    });
  });
});

describe('logger', () => {
  afterEach(() => {
    clearRequestId();
    jest.restoreAllMocks();
  });

  it('writes JSON lines to stderr with the request id', () => {
    const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    setRequestId('req_test');

    logger.warn('Something happened', { domain: 'example.com' });

    expect(spy).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(spy.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: 'warn',
      message: 'Something happened',
      request_id: 'req_test',
      domain: 'example.com',
    });
  });

  it('filters messages below the configured level', () => {
    const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    logger.debug('Too chatty');

    expect(spy).not.toHaveBeenCalled();
  });
});
