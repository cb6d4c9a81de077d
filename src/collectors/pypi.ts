import { z } from 'zod';
import type { PyPISection } from '../config/yaml-types';
import { extractField, TextPage } from '../extraction';
import type { PyPIMetrics } from '../types';
import type { FieldPlan, Matcher } from '../types/extraction';
import { describeError } from '../utils/errors';
import { AbstractSourceCollector } from './base';
import type { ApiAttempt, ScrapeOutcome } from './types';

const PYPISTATS_BASE_URL = 'https://pypistats.org';
const PYPI_BASE_URL = 'https://pypi.org';

const RecentDownloadsSchema = z.object({
  data: z.object({
    last_day: z.number().int().nonnegative(),
    last_week: z.number().int().nonnegative(),
    last_month: z.number().int().nonnegative(),
  }),
});

const PackageInfoSchema = z.object({
  info: z.object({ version: z.string().min(1) }),
});

type DownloadField = 'downloads_last_day' | 'downloads_last_week' | 'downloads_last_month';

const downloadsLabel = (period: string): RegExp =>
  new RegExp(String.raw`last ${period}:?\s*(?:<[^>]+>\s*)*([\d.,\s]*\d)`, 'i');

const STATS_PAGE_PLAN: FieldPlan<DownloadField> = [
  {
    field: 'downloads_last_day',
    matchers: [{ kind: 'regex', name: 'last-day-label', pattern: downloadsLabel('day') }],
  },
  {
    field: 'downloads_last_week',
    matchers: [{ kind: 'regex', name: 'last-week-label', pattern: downloadsLabel('week') }],
  },
  {
    field: 'downloads_last_month',
    matchers: [{ kind: 'regex', name: 'last-month-label', pattern: downloadsLabel('month') }],
  },
];

const VERSION_MATCHERS: readonly Matcher[] = [
  {
    kind: 'regex',
    name: 'package-header',
    pattern: /<h1 class="package-header__name">\s*[^<]*?\s(\d[^\s<]*)\s*<\/h1>/,
  },
  { kind: 'regex', name: 'pip-install-command', pattern: /pip install [\w.-]+==([^\s<"]+)/ },
];

/**
 * PyPI download statistics (pypistats.org) and latest release (pypi.org).
 * Both are public; there is no authenticated path.
 */
export class PyPICollector extends AbstractSourceCollector<'pypi', PyPISection> {
  readonly kind = 'pypi' as const;

  protected apiAttempts(): ApiAttempt<'pypi'>[] {
    return [{ name: 'public', run: () => this.fetchFromApi() }];
  }

  protected async scrape(): Promise<ScrapeOutcome<'pypi'>> {
    const pkg = encodeURIComponent(this.section.package);
    const values: Partial<PyPIMetrics> = {};
    let extracted = 0;

    try {
      const downloads = await this.scrapePage(
        `${PYPISTATS_BASE_URL}/packages/${pkg}`,
        STATS_PAGE_PLAN
      );
      Object.assign(values, downloads.values);
      extracted += downloads.extracted;
    } catch (error) {
      this.logger.warn('Download statistics page unavailable', { error: describeError(error) });
    }

    try {
      const url = `${PYPI_BASE_URL}/project/${pkg}/`;
      const page = new TextPage(await this.http.getText(url), url);
      const version = extractField(page, VERSION_MATCHERS, 'string');
      if (version.succeeded && typeof version.value === 'string') {
        values.latest_version = version.value;
        extracted++;
      }
    } catch (error) {
      this.logger.warn('Project page unavailable', { error: describeError(error) });
    }

    return { values, attempted: STATS_PAGE_PLAN.length + 1, extracted };
  }

  private async fetchFromApi(): Promise<PyPIMetrics> {
    const pkg = encodeURIComponent(this.section.package);
    const [recent, info] = await Promise.all([
      this.http.getJson(`${PYPISTATS_BASE_URL}/api/packages/${pkg}/recent`),
      this.http.getJson(`${PYPI_BASE_URL}/pypi/${pkg}/json`),
    ]);

    const { data } = RecentDownloadsSchema.parse(recent);
    const { info: packageInfo } = PackageInfoSchema.parse(info);

    return {
      downloads_last_day: data.last_day,
      downloads_last_week: data.last_week,
      downloads_last_month: data.last_month,
      latest_version: packageInfo.version,
    };
  }
}
