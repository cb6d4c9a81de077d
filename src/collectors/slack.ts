import { z } from 'zod';
import type { SlackSection } from '../config/yaml-types';
import type { SlackMetrics } from '../types';
import type { FieldPlan } from '../types/extraction';
import { SourceError } from '../utils/errors';
import { AbstractSourceCollector } from './base';
import type { ApiAttempt, ScrapeOutcome } from './types';

const USERS_LIST_URL = 'https://slack.com/api/users.list';
const PAGE_LIMIT = 200;
const MAX_PAGES = 100;
const SLACKBOT_ID = 'USLACKBOT';

const UsersListSchema = z.object({
  ok: z.boolean(),
  error: z.string().optional(),
  members: z
    .array(
      z.object({
        id: z.string(),
        deleted: z.boolean().optional(),
        is_bot: z.boolean().optional(),
      })
    )
    .default([]),
  response_metadata: z.object({ next_cursor: z.string().optional() }).optional(),
});

const COMMUNITY_PAGE_PLAN: FieldPlan<'members'> = [
  {
    field: 'members',
    matchers: [
      {
        kind: 'regex',
        name: 'members-label',
        pattern: /(\d[\d.,]*\s?[KkMm]?)\+?\s*(?:<[^>]+>\s*)*members\b/i,
      },
    ],
  },
];

/**
 * Slack workspace collector. users.list needs a bot token; without one only a
 * configured public community page can be scraped.
 */
export class SlackCollector extends AbstractSourceCollector<'slack', SlackSection> {
  readonly kind = 'slack' as const;

  protected apiAttempts(): ApiAttempt<'slack'>[] {
    const token = this.section.credential;
    if (!token) {
      this.logger.warn('No Slack token provided, Slack has no public API');
      return [];
    }
    return [{ name: 'authenticated', run: () => this.countMembers(token) }];
  }

  protected async scrape(): Promise<ScrapeOutcome<'slack'> | undefined> {
    if (!this.section.url) {
      return undefined;
    }
    const { values, attempted, extracted } = await this.scrapePage(
      this.section.url,
      COMMUNITY_PAGE_PLAN
    );
    return { values, attempted, extracted };
  }

  private async countMembers(token: string): Promise<SlackMetrics> {
    let members = 0;
    let bots = 0;
    let cursor: string | undefined;

    for (let page = 0; page < MAX_PAGES; page++) {
      const payload = UsersListSchema.parse(
        await this.http.getJson(USERS_LIST_URL, {
          headers: { Authorization: `Bearer ${token}` },
          query: { limit: PAGE_LIMIT, cursor },
        })
      );

      if (!payload.ok) {
        throw new SourceError(this.kind, `users.list rejected: ${payload.error ?? 'unknown error'}`);
      }

      for (const member of payload.members) {
        if (member.deleted) {
          continue;
        }
        if (member.is_bot || member.id === SLACKBOT_ID) {
          bots++;
        } else {
          members++;
        }
      }

      cursor = payload.response_metadata?.next_cursor || undefined;
      if (!cursor) {
        break;
      }
    }

    return { members, bots };
  }
}
