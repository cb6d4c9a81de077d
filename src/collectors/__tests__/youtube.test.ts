import fs from 'node:fs';
import path from 'node:path';
import nock from 'nock';
import type { YouTubeSection } from '../../config/yaml-types';
import { HttpClient } from '../../utils/http';
import { Logger, LogLevel } from '../../utils/logger';
import { YouTubeCollector } from '../youtube';

const API_BASE_URL = 'https://www.googleapis.com';
const SITE_BASE_URL = 'https://www.youtube.com';
const CHANNEL_ID = 'UCabcdefghij1234567890';

function readFixture(filename: string): string {
  const fullPath = path.resolve(__dirname, '../../..', 'tests/__fixtures__', filename);
  return fs.readFileSync(fullPath, 'utf-8');
}

const logger = new Logger(LogLevel.ERROR, {}, () => undefined);

function buildCollector(section: Partial<YouTubeSection> = {}): YouTubeCollector {
  return new YouTubeCollector({
    section: { enabled: true, channel: '@example-channel', ...section },
    http: new HttpClient({ retries: 0, logger }),
    logger
  });
}

describe('YouTubeCollector', () => {
  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  it('resolves the handle once and reads channel statistics', async () => {
    const api = nock(API_BASE_URL)
      .get('/youtube/v3/channels')
      .query({ part: 'id', forHandle: '@example-channel', key: 'test-key' })
      .once()
      .reply(200, { items: [{ id: CHANNEL_ID }] })
      .get('/youtube/v3/channels')
      .query({ part: 'statistics', id: CHANNEL_ID, key: 'test-key' })
      .times(2)
      .reply(200, {
        items: [
          {
            id: CHANNEL_ID,
            statistics: { subscriberCount: '1500', viewCount: '250000', videoCount: '42' }
          }
        ]
      });

    const collector = buildCollector({ credential: 'test-key' });
    const first = await collector.collect();
    const second = await collector.collect();

    const expected = {
      kind: 'youtube',
      enabled: true,
      status: 'ok',
      method: 'api',
      subscribers: 1500,
      total_views: 250000,
      video_count: 42,
      channel_url: `${SITE_BASE_URL}/@example-channel`
    };
    expect(first).toEqual(expected);
    expect(second).toEqual(expected);
    expect(api.isDone()).toBe(true);
  });

  it('uses a channel id directly without resolving it', async () => {
    nock(API_BASE_URL)
      .get('/youtube/v3/channels')
      .query({ part: 'statistics', id: CHANNEL_ID, key: 'test-key' })
      .reply(200, {
        items: [{ id: CHANNEL_ID, statistics: { subscriberCount: '10', viewCount: '20', videoCount: '3' } }]
      });

    const record = await buildCollector({ channel: CHANNEL_ID, credential: 'test-key' }).collect();

    expect(record).toMatchObject({
      status: 'ok',
      method: 'api',
      subscribers: 10,
      video_count: 3,
      channel_url: `${SITE_BASE_URL}/channel/${CHANNEL_ID}`
    });
  });

  it('keeps the configured channel URL on a disabled record', async () => {
    const record = await buildCollector({ enabled: false }).collect();

    expect(record).toMatchObject({
      status: 'disabled',
      enabled: false,
      channel_url: `${SITE_BASE_URL}/@example-channel`
    });
  });

  it('scrapes the channel page when no API key is configured', async () => {
    nock(SITE_BASE_URL)
      .get('/@example-channel/about')
      .reply(200, readFixture('youtube-channel-about.html'));

    const record = await buildCollector().collect();

    expect(record).toEqual({
      kind: 'youtube',
      enabled: true,
      status: 'ok',
      method: 'scrape',
      subscribers: 12300,
      total_views: 1234567,
      video_count: 321,
      channel_url: `${SITE_BASE_URL}/@example-channel`
    });
  });

  it('marks a scrape that only finds the view count as partial', async () => {
    nock(SITE_BASE_URL)
      .get('/@example-channel/about')
      .reply(200, readFixture('youtube-channel-views-only.html'));

    const record = await buildCollector().collect();

    expect(record).toEqual({
      kind: 'youtube',
      enabled: true,
      status: 'partial',
      method: 'scrape',
      subscribers: 0,
      total_views: 1234567,
      video_count: 0,
      channel_url: `${SITE_BASE_URL}/@example-channel`
    });
  });

  it('falls back to scraping when the API rejects the key', async () => {
    nock(API_BASE_URL)
      .get('/youtube/v3/channels')
      .query(true)
      .reply(403, { error: { code: 403, message: 'API key not valid' } });
    nock(SITE_BASE_URL)
      .get('/@example-channel/about')
      .reply(200, readFixture('youtube-channel-views-only.html'));

    const record = await buildCollector({ credential: 'test-key' }).collect();

    expect(record).toMatchObject({ status: 'partial', method: 'scrape', total_views: 1234567 });
  });

  it('records a failure when the API and the page both fail', async () => {
    nock(API_BASE_URL).get('/youtube/v3/channels').query(true).reply(500, 'backend error');
    nock(SITE_BASE_URL).get('/@example-channel/about').reply(404, 'not found');

    const record = await buildCollector({ credential: 'test-key' }).collect();

    expect(record).toEqual({
      kind: 'youtube',
      enabled: true,
      status: 'failed',
      method: '',
      subscribers: 0,
      total_views: 0,
      video_count: 0,
      channel_url: `${SITE_BASE_URL}/@example-channel`
    });
  });
});
