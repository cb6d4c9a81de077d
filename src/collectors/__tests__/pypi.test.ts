import fs from 'node:fs';
import path from 'node:path';
import nock from 'nock';
import { HttpClient } from '../../utils/http';
import { Logger, LogLevel } from '../../utils/logger';
import { PyPICollector } from '../pypi';

const PYPISTATS = 'https://pypistats.org';
const PYPI = 'https://pypi.org';

function readFixture(filename: string): string {
  const fullPath = path.resolve(__dirname, '../../..', 'tests/__fixtures__', filename);
  return fs.readFileSync(fullPath, 'utf-8');
}

const logger = new Logger(LogLevel.ERROR, {}, () => undefined);

function buildCollector(): PyPICollector {
  return new PyPICollector({
    section: { enabled: true, package: 'example-package' },
    http: new HttpClient({ retries: 0, logger }),
    logger
  });
}

describe('PyPICollector', () => {
  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  it('reads recent downloads and the latest version from the public APIs', async () => {
    nock(PYPISTATS)
      .get('/api/packages/example-package/recent')
      .reply(200, {
        data: { last_day: 120, last_month: 4000, last_week: 900 },
        package: 'example-package',
        type: 'recent_downloads'
      });
    nock(PYPI)
      .get('/pypi/example-package/json')
      .reply(200, { info: { name: 'example-package', version: '1.4.2' } });

    const record = await buildCollector().collect();

    expect(record).toEqual({
      kind: 'pypi',
      enabled: true,
      status: 'ok',
      method: 'api',
      downloads_last_day: 120,
      downloads_last_week: 900,
      downloads_last_month: 4000,
      latest_version: '1.4.2'
    });
  });

  it('scrapes the statistics and project pages when the API fails', async () => {
    nock(PYPISTATS)
      .get('/api/packages/example-package/recent')
      .reply(503, 'unavailable')
      .get('/packages/example-package')
      .reply(200, readFixture('pypistats-package.html'));
    nock(PYPI)
      .get('/pypi/example-package/json')
      .reply(503, 'unavailable')
      .get('/project/example-package/')
      .reply(200, readFixture('pypi-project.html'));

    const record = await buildCollector().collect();

    expect(record).toEqual({
      kind: 'pypi',
      enabled: true,
      status: 'ok',
      method: 'scrape',
      downloads_last_day: 1024,
      downloads_last_week: 7311,
      downloads_last_month: 30452,
      latest_version: '1.4.2'
    });
  });

  it('reports partial results when the version cannot be scraped', async () => {
    nock(PYPISTATS)
      .get('/api/packages/example-package/recent')
      .reply(200, { data: { last_day: 'n/a' } })
      .get('/packages/example-package')
      .reply(200, readFixture('pypistats-package.html'));
    nock(PYPI)
      .get('/pypi/example-package/json')
      .reply(200, { info: { version: '1.4.2' } })
      .get('/project/example-package/')
      .reply(404, 'not found');

    const record = await buildCollector().collect();

    expect(record).toEqual({
      kind: 'pypi',
      enabled: true,
      status: 'partial',
      method: 'scrape',
      downloads_last_day: 1024,
      downloads_last_week: 7311,
      downloads_last_month: 30452,
      latest_version: ''
    });
  });
});
