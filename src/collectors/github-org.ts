/**
 * GitHub organization collector
 * Aggregates stars, forks and contributors across every public repository
 * of an organization.
 */

import type { Octokit } from '@octokit/rest';
import type { GitHubOrgSection } from '../config/yaml-types';
import type { GitHubOrgMetrics } from '../types';
import type { FieldPlan } from '../types/extraction';
import { AbstractSourceCollector } from './base';
import {
  collectContributorLogins,
  COUNT,
  countOpenIssuesAndPulls,
  createOctokit,
  GITHUB_PAGE_SIZE,
  paginateUntilShort
} from './github-common';
import type { ApiAttempt, ScrapeOutcome } from './types';

type OrgPageField = 'repo_count' | 'followers';

const ORG_PAGE_PLAN: FieldPlan<OrgPageField> = [
  {
    field: 'repo_count',
    matchers: [
      { kind: 'selector', name: 'repositories-tab-counter', selector: '#repositories-repo-tab-count' },
      {
        kind: 'selector',
        name: 'repositories-nav-counter',
        selector: 'a[href*="/repositories"] span.Counter',
        attribute: 'title',
      },
      {
        kind: 'regex',
        name: 'repositories-label',
        pattern: new RegExp(String.raw`Repositories\s*(?:<[^>]+>\s*)*${COUNT}`, 'i'),
      },
    ],
  },
  {
    field: 'followers',
    matchers: [
      {
        kind: 'regex',
        name: 'followers-link',
        pattern: new RegExp(String.raw`${COUNT}\s*(?:<[^>]+>\s*)*followers`, 'i'),
      },
    ],
  },
];

export class GitHubOrgCollector extends AbstractSourceCollector<'github_org', GitHubOrgSection> {
  readonly kind = 'github_org' as const;

  protected apiAttempts(): ApiAttempt<'github_org'>[] {
    const attempts: ApiAttempt<'github_org'>[] = [];
    const token = this.section.credential;

    if (token) {
      attempts.push({ name: 'authenticated', run: () => this.fetchMetrics(this.octokit(token)) });
    } else {
      this.logger.warn('No GitHub token provided, using the public API (rate limited)');
    }
    attempts.push({ name: 'public', run: () => this.fetchMetrics(this.octokit()) });

    return attempts;
  }

  private octokit(token?: string): Octokit {
    return createOctokit({ token, timeoutMs: this.http.timeoutMs, logger: this.logger });
  }

  protected async scrape(): Promise<ScrapeOutcome<'github_org'>> {
    const url = this.section.url ?? `https://github.com/${encodeURIComponent(this.section.org)}`;
    const { values, attempted, extracted } = await this.scrapePage(url, ORG_PAGE_PLAN);
    return { values, attempted, extracted };
  }

  private async fetchMetrics(octokit: Octokit): Promise<GitHubOrgMetrics> {
    const org = this.section.org;

    const repos = await paginateUntilShort(async (page) => {
      const { data } = await octokit.repos.listForOrg({
        org,
        type: 'public',
        per_page: GITHUB_PAGE_SIZE,
        page,
      });
      return data;
    });

    let stars = 0;
    let forks = 0;
    const contributors = new Set<string>();

    for (const repo of repos) {
      stars += repo.stargazers_count ?? 0;
      forks += repo.forks_count ?? 0;
      await collectContributorLogins(octokit, org, repo.name, contributors);
    }

    const { open_issues, open_prs } = await countOpenIssuesAndPulls(octokit, `org:${org}`);
    const { data: profile } = await octokit.orgs.get({ org });

    this.logger.debug('Aggregated organization repositories', {
      repositories: repos.length,
      contributors: contributors.size,
    });

    return {
      repo_count: repos.length,
      stars,
      forks,
      contributors: contributors.size,
      open_issues,
      open_prs,
      followers: profile.followers ?? 0,
    };
  }
}
