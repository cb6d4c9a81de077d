/**
 * YouTube channel collector
 * Data API v3 when a key is configured, otherwise the public channel page.
 */

import { z } from 'zod';
import type { YouTubeSection } from '../config/yaml-types';
import { parseMetricNumber } from '../extraction';
import type { SourceRecordOf, YouTubeMetrics } from '../types';
import type { FieldPlan } from '../types/extraction';
import { SourceError } from '../utils/errors';
import { AbstractSourceCollector } from './base';
import type { ApiAttempt, ScrapeOutcome } from './types';

const API_BASE_URL = 'https://www.googleapis.com/youtube/v3';
const SITE_BASE_URL = 'https://www.youtube.com';

const ChannelListSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.string(),
        statistics: z
          .object({
            subscriberCount: z.string().optional(),
            viewCount: z.string().optional(),
            videoCount: z.string().optional(),
          })
          .optional(),
      })
    )
    .default([]),
});

type ChannelPageField = 'subscribers' | 'total_views' | 'video_count';

const CHANNEL_PAGE_PLAN: FieldPlan<ChannelPageField> = [
  {
    field: 'subscribers',
    matchers: [
      {
        kind: 'regex',
        name: 'subscriber-count-text',
        pattern: /"subscriberCountText":\{[^}]*?"simpleText":"([^"]+?)\s+subscribers?"/,
      },
      {
        kind: 'regex',
        name: 'header-metadata',
        pattern: /"content":"([\d.,]+\s?[KMB]?)\s+subscribers?"/,
      },
      { kind: 'regex', name: 'subscribers-label', pattern: /([\d.,]+\s?[KMB]?)\s+subscribers?\b/ },
    ],
  },
  {
    field: 'total_views',
    matchers: [
      { kind: 'regex', name: 'view-count-text', pattern: /"viewCountText":"([\d.,\s]+)\s+views?"/ },
      {
        kind: 'regex',
        name: 'view-count-simple-text',
        pattern: /"viewCountText":\{"simpleText":"([\d.,\s]+)\s+views?"\}/,
      },
    ],
  },
  {
    field: 'video_count',
    matchers: [
      {
        kind: 'regex',
        name: 'videos-count-runs',
        pattern: /"videosCountText":\{"runs":\[\{"text":"([\d.,]+)"/,
      },
      {
        kind: 'regex',
        name: 'header-metadata',
        pattern: /"content":"([\d.,]+\s?[KMB]?)\s+videos?"/,
      },
      { kind: 'regex', name: 'videos-label', pattern: /([\d.,]+\s?[KMB]?)\s+videos\b/ },
    ],
  },
];

export class YouTubeCollector extends AbstractSourceCollector<'youtube', YouTubeSection> {
  readonly kind = 'youtube' as const;
  private resolvedChannelId?: string;

  private get isHandle(): boolean {
    return this.section.channel.startsWith('@');
  }

  get channelUrl(): string {
    return this.isHandle
      ? `${SITE_BASE_URL}/${this.section.channel}`
      : `${SITE_BASE_URL}/channel/${this.section.channel}`;
  }

  protected apiAttempts(): ApiAttempt<'youtube'>[] {
    const apiKey = this.section.credential;
    if (!apiKey) {
      this.logger.info('No YouTube API key provided, scraping the channel page');
      return [];
    }
    return [{ name: 'authenticated', run: () => this.fetchStatistics(apiKey) }];
  }

  protected async scrape(): Promise<ScrapeOutcome<'youtube'>> {
    const url = this.section.url ?? `${this.channelUrl}/about`;
    const { values, attempted, extracted } = await this.scrapePage(url, CHANNEL_PAGE_PLAN);
    return { values, attempted, extracted };
  }

  /**
   * The configured channel URL, also on failed and disabled records, so the
   * history column does not change with the retrieval path
   */
  protected finalize(record: SourceRecordOf<'youtube'>): SourceRecordOf<'youtube'> {
    return { ...record, channel_url: this.channelUrl };
  }

  /**
   * Channel id for the configured handle, looked up once per run
   */
  async resolveChannelId(apiKey: string): Promise<string> {
    if (!this.isHandle) {
      return this.section.channel;
    }
    if (this.resolvedChannelId) {
      return this.resolvedChannelId;
    }

    const payload = ChannelListSchema.parse(
      await this.http.getJson(`${API_BASE_URL}/channels`, {
        query: { part: 'id', forHandle: this.section.channel, key: apiKey },
      })
    );
    const [channel] = payload.items;
    if (!channel) {
      throw new SourceError(this.kind, `No channel found for handle ${this.section.channel}`);
    }

    this.resolvedChannelId = channel.id;
    this.logger.debug('Resolved channel handle', {
      handle: this.section.channel,
      channelId: channel.id,
    });
    return channel.id;
  }

  private async fetchStatistics(apiKey: string): Promise<YouTubeMetrics | undefined> {
    const channelId = await this.resolveChannelId(apiKey);
    const payload = ChannelListSchema.parse(
      await this.http.getJson(`${API_BASE_URL}/channels`, {
        query: { part: 'statistics', id: channelId, key: apiKey },
      })
    );

    const statistics = payload.items[0]?.statistics;
    const subscribers = parseMetricNumber(statistics?.subscriberCount);
    const totalViews = parseMetricNumber(statistics?.viewCount);
    const videoCount = parseMetricNumber(statistics?.videoCount);

    if (subscribers === undefined || totalViews === undefined || videoCount === undefined) {
      return undefined;
    }

    return {
      subscribers,
      total_views: totalViews,
      video_count: videoCount,
      channel_url: this.channelUrl,
    };
  }
}
