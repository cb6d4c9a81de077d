import nock from 'nock';
import { HttpClient, HttpRequestError } from '../http';
import { type LogEntry, Logger, LogLevel } from '../logger';

const BASE_URL = 'https://api.example.test';

function buildClient(retries = 1, entries: LogEntry[] = []): HttpClient {
  return new HttpClient({
    retries,
    retryDelayMs: 1,
    logger: new Logger(LogLevel.DEBUG, {}, (entry) => entries.push(entry))
  });
}

describe('HttpClient', () => {
  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  it('returns parsed JSON and sends query parameters', async () => {
    nock(BASE_URL)
      .get('/stats')
      .query({ part: 'statistics', id: 'UC123' })
      .reply(200, { items: [{ id: 'UC123' }] });

    const payload = await buildClient().getJson(`${BASE_URL}/stats`, {
      query: { part: 'statistics', id: 'UC123', key: undefined }
    });

    expect(payload).toEqual({ items: [{ id: 'UC123' }] });
  });

  it('returns page text untouched', async () => {
    nock(BASE_URL).get('/page').reply(200, '<p>1,234 members</p>', {
      'Content-Type': 'text/html'
    });

    await expect(buildClient().getText(`${BASE_URL}/page`)).resolves.toBe('<p>1,234 members</p>');
  });

  it('sends custom headers', async () => {
    nock(BASE_URL, { reqheaders: { Authorization: 'Bearer test-token' } })
      .get('/private')
      .reply(200, { ok: true });

    await expect(
      buildClient().getJson(`${BASE_URL}/private`, {
        headers: { Authorization: 'Bearer test-token' }
      })
    ).resolves.toEqual({ ok: true });
  });

  it('retries a 503 once and succeeds', async () => {
    const scope = nock(BASE_URL)
      .get('/flaky')
      .reply(503, 'unavailable')
      .get('/flaky')
      .reply(200, { ok: true });

    await expect(buildClient().getJson(`${BASE_URL}/flaky`)).resolves.toEqual({ ok: true });
    expect(scope.isDone()).toBe(true);
  });

  it('stops after a single retry', async () => {
    const entries: LogEntry[] = [];
    nock(BASE_URL).get('/down').times(2).reply(503, 'unavailable');

    const request = buildClient(1, entries).getJson(`${BASE_URL}/down`);

    await expect(request).rejects.toBeInstanceOf(HttpRequestError);
    await expect(request).rejects.toMatchObject({ status: 503, method: 'GET' });
    expect(
      entries.filter((entry) => entry.message === `Request returned error status: GET ${BASE_URL}/down`)
    ).toHaveLength(2);
  });

  it('does not retry client errors', async () => {
    const entries: LogEntry[] = [];
    nock(BASE_URL).get('/missing').reply(404, 'not found');

    await expect(buildClient(1, entries).getText(`${BASE_URL}/missing`)).rejects.toMatchObject({
      status: 404
    });
    expect(entries.filter((entry) => entry.level === 'WARN')).toHaveLength(1);
  });

  it('makes a single attempt when retries are disabled', async () => {
    nock(BASE_URL).get('/once').reply(500, 'error');

    await expect(buildClient(0).getJson(`${BASE_URL}/once`)).rejects.toMatchObject({
      status: 500
    });
  });
});
