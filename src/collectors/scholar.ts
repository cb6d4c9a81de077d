/**
 * Google Scholar collector
 * Scholar has no API; every author profile is scraped on its own and the
 * results are combined.
 */

import type { ScholarSection } from '../config/yaml-types';
import type { FieldExtraction } from '../extraction';
import type { ScholarMetrics } from '../types';
import type { FieldPlan } from '../types/extraction';
import { describeError } from '../utils/errors';
import { AbstractSourceCollector } from './base';
import type { ApiAttempt, ScrapeOutcome } from './types';

type ProfileField = 'citations' | 'h_index' | 'i10_index';

const statRowPattern = (label: string): RegExp =>
  new RegExp(`${label}</a>\\s*</td>\\s*<td class="gsc_rsb_std">\\s*([\\d.,]+)`, 'i');

const PROFILE_PLAN: FieldPlan<ProfileField> = [
  {
    field: 'citations',
    matchers: [
      { kind: 'regex', name: 'citations-row', pattern: statRowPattern('Citations') },
      { kind: 'selector', name: 'stats-table-row-1', selector: '#gsc_rsb_st tbody tr:nth-child(1) td.gsc_rsb_std' },
    ],
  },
  {
    field: 'h_index',
    matchers: [
      { kind: 'regex', name: 'h-index-row', pattern: statRowPattern('h-index') },
      { kind: 'selector', name: 'stats-table-row-2', selector: '#gsc_rsb_st tbody tr:nth-child(2) td.gsc_rsb_std' },
    ],
  },
  {
    field: 'i10_index',
    matchers: [
      { kind: 'regex', name: 'i10-index-row', pattern: statRowPattern('i10-index') },
      { kind: 'selector', name: 'stats-table-row-3', selector: '#gsc_rsb_st tbody tr:nth-child(3) td.gsc_rsb_std' },
    ],
  },
];

export class ScholarCollector extends AbstractSourceCollector<'scholar', ScholarSection> {
  readonly kind = 'scholar' as const;

  protected apiAttempts(): ApiAttempt<'scholar'>[] {
    return [];
  }

  profileUrl(authorId: string): string {
    const url = new URL('/citations', this.section.base_url);
    url.searchParams.set('user', authorId);
    url.searchParams.set('hl', 'en');
    return url.toString();
  }

  protected async scrape(): Promise<ScrapeOutcome<'scholar'>> {
    const profiles: FieldExtraction<ProfileField>[] = [];

    for (const authorId of this.section.authors) {
      try {
        profiles.push(await this.scrapePage(this.profileUrl(authorId), PROFILE_PLAN));
      } catch (error) {
        this.logger.warn('Scholar profile unavailable', {
          author: authorId,
          error: describeError(error),
        });
      }
    }

    return combineProfiles(profiles);
  }
}

/**
 * Citations and i10-index add up across authors; h-index is the best single one
 */
export function combineProfiles(
  profiles: FieldExtraction<ProfileField>[]
): ScrapeOutcome<'scholar'> {
  const values: Partial<ScholarMetrics> = {};
  let contributing = 0;

  for (const profile of profiles) {
    if (profile.extracted === 0) {
      continue;
    }
    contributing++;

    const { citations, h_index, i10_index } = profile.values;
    if (citations !== undefined) {
      values.citations = (values.citations ?? 0) + citations;
    }
    if (h_index !== undefined) {
      values.h_index = Math.max(values.h_index ?? 0, h_index);
    }
    if (i10_index !== undefined) {
      values.i10_index = (values.i10_index ?? 0) + i10_index;
    }
  }

  const extracted = PROFILE_PLAN.filter(({ field }) => values[field] !== undefined).length;
  if (contributing > 0) {
    values.profiles = contributing;
  }

  return { values, attempted: PROFILE_PLAN.length, extracted };
}
