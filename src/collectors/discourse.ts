import type { DiscourseSection } from '../config/yaml-types';
import { extractFields } from '../extraction';
import type { DiscourseMetrics } from '../types';
import type { FieldPlan } from '../types/extraction';
import type { HttpRequestOptions } from '../utils/http';
import { AbstractSourceCollector } from './base';
import type { ApiAttempt, ScrapeOutcome } from './types';

type ForumField = keyof DiscourseMetrics;

// Older forums report singular counters, newer ones the plural form.
const ABOUT_JSON_PLAN: FieldPlan<ForumField> = [
  {
    field: 'users',
    matchers: [
      { kind: 'jsonPath', name: 'users-count', path: 'about.stats.users_count' },
      { kind: 'jsonPath', name: 'user-count', path: 'about.stats.user_count' },
    ],
  },
  {
    field: 'topics',
    matchers: [
      { kind: 'jsonPath', name: 'topics-count', path: 'about.stats.topics_count' },
      { kind: 'jsonPath', name: 'topic-count', path: 'about.stats.topic_count' },
    ],
  },
  {
    field: 'posts',
    matchers: [
      { kind: 'jsonPath', name: 'posts-count', path: 'about.stats.posts_count' },
      { kind: 'jsonPath', name: 'post-count', path: 'about.stats.post_count' },
    ],
  },
  {
    field: 'active_users_30d',
    matchers: [
      { kind: 'jsonPath', name: 'active-users-30-days', path: 'about.stats.active_users_30_days' },
      { kind: 'jsonPath', name: 'users-30-days', path: 'about.stats.users_30_days' },
    ],
  },
];

const preloadedCounter = (key: string): RegExp =>
  new RegExp(String.raw`(?:&quot;|")${key}(?:&quot;|"):\s*(\d+)`);

const labelledCount = (label: string): RegExp =>
  new RegExp(String.raw`(\d[\d.,]*\s?[kKmM]?)\s*(?:<[^>]+>\s*)*${label}\b`, 'i');

const ABOUT_PAGE_PLAN: FieldPlan<ForumField> = [
  {
    field: 'users',
    matchers: [
      { kind: 'regex', name: 'preloaded-users-count', pattern: preloadedCounter('users_count') },
      { kind: 'regex', name: 'users-label', pattern: labelledCount('(?:users|members)') },
    ],
  },
  {
    field: 'topics',
    matchers: [
      { kind: 'regex', name: 'preloaded-topics-count', pattern: preloadedCounter('topics_count') },
      { kind: 'regex', name: 'topics-label', pattern: labelledCount('topics') },
    ],
  },
  {
    field: 'posts',
    matchers: [
      { kind: 'regex', name: 'preloaded-posts-count', pattern: preloadedCounter('posts_count') },
      { kind: 'regex', name: 'posts-label', pattern: labelledCount('posts') },
    ],
  },
  {
    field: 'active_users_30d',
    matchers: [
      {
        kind: 'regex',
        name: 'preloaded-active-users',
        pattern: preloadedCounter('active_users_30_days'),
      },
    ],
  },
];

/**
 * Discourse forum statistics from the site's about document
 */
export class DiscourseCollector extends AbstractSourceCollector<'discourse', DiscourseSection> {
  readonly kind = 'discourse' as const;

  private aboutUrl(suffix: '' | '.json'): string {
    return new URL(`/about${suffix}`, this.section.base_url).toString();
  }

  protected apiAttempts(): ApiAttempt<'discourse'>[] {
    const apiKey = this.section.credential;
    const attempts: ApiAttempt<'discourse'>[] = [];

    if (apiKey) {
      attempts.push({
        name: 'authenticated',
        run: () =>
          this.fetchAbout({
            headers: { 'Api-Key': apiKey, 'Api-Username': this.section.api_username },
          }),
      });
    }
    attempts.push({ name: 'public', run: () => this.fetchAbout() });

    return attempts;
  }

  protected async scrape(): Promise<ScrapeOutcome<'discourse'>> {
    const { values, attempted, extracted } = await this.scrapePage(
      this.aboutUrl(''),
      ABOUT_PAGE_PLAN
    );
    return { values, attempted, extracted };
  }

  private async fetchAbout(options?: HttpRequestOptions): Promise<DiscourseMetrics | undefined> {
    const payload = await this.http.getJson(this.aboutUrl('.json'), options);
    const { values } = extractFields(payload, ABOUT_JSON_PLAN);
    const { users, topics, posts, active_users_30d } = values;

    if (
      users === undefined ||
      topics === undefined ||
      posts === undefined ||
      active_users_30d === undefined
    ) {
      return undefined;
    }
    return { users, topics, posts, active_users_30d };
  }
}
