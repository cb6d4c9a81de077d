import type { Octokit } from '@octokit/rest';
import type { GitHubRepoSection } from '../config/yaml-types';
import type { GitHubRepoMetrics } from '../types';
import type { FieldPlan } from '../types/extraction';
import { AbstractSourceCollector } from './base';
import {
  collectContributorLogins,
  COUNT,
  countOpenIssuesAndPulls,
  createOctokit
} from './github-common';
import type { ApiAttempt, ScrapeOutcome } from './types';

type RepoPageField = 'stars' | 'forks' | 'watchers';

const REPO_PAGE_PLAN: FieldPlan<RepoPageField> = [
  {
    field: 'stars',
    matchers: [
      { kind: 'selector', name: 'star-counter-title', selector: '#repo-stars-counter-star', attribute: 'title' },
      { kind: 'selector', name: 'star-counter', selector: '#repo-stars-counter-star' },
      { kind: 'regex', name: 'stars-label', pattern: new RegExp(String.raw`${COUNT}\s*(?:<[^>]+>\s*)*stars?\b`, 'i') },
    ],
  },
  {
    field: 'forks',
    matchers: [
      { kind: 'selector', name: 'fork-counter-title', selector: '#repo-network-counter', attribute: 'title' },
      { kind: 'regex', name: 'forks-label', pattern: new RegExp(String.raw`${COUNT}\s*(?:<[^>]+>\s*)*forks?\b`, 'i') },
    ],
  },
  {
    field: 'watchers',
    matchers: [
      { kind: 'regex', name: 'watching-label', pattern: new RegExp(String.raw`${COUNT}\s*(?:<[^>]+>\s*)*watching\b`, 'i') },
    ],
  },
];

/**
 * Single repository collector
 */
export class GitHubRepoCollector extends AbstractSourceCollector<'github_repo', GitHubRepoSection> {
  readonly kind = 'github_repo' as const;

  private get ownerAndName(): { owner: string; repo: string } {
    const [owner, repo] = this.section.repository.split('/');
    return { owner, repo };
  }

  protected apiAttempts(): ApiAttempt<'github_repo'>[] {
    const token = this.section.credential;
    const attempts: ApiAttempt<'github_repo'>[] = [];

    if (token) {
      attempts.push({ name: 'authenticated', run: () => this.fetchMetrics(this.octokit(token)) });
    }
    attempts.push({ name: 'public', run: () => this.fetchMetrics(this.octokit()) });

    return attempts;
  }

  private octokit(token?: string): Octokit {
    return createOctokit({ token, timeoutMs: this.http.timeoutMs, logger: this.logger });
  }

  protected async scrape(): Promise<ScrapeOutcome<'github_repo'>> {
    const url = this.section.url ?? `https://github.com/${this.section.repository}`;
    const { values, attempted, extracted } = await this.scrapePage(url, REPO_PAGE_PLAN);
    return { values, attempted, extracted };
  }

  private async fetchMetrics(octokit: Octokit): Promise<GitHubRepoMetrics> {
    const { owner, repo } = this.ownerAndName;
    const { data } = await octokit.repos.get({ owner, repo });

    const contributors = new Set<string>();
    await collectContributorLogins(octokit, owner, repo, contributors);

    const { open_issues, open_prs } = await countOpenIssuesAndPulls(
      octokit,
      `repo:${owner}/${repo}`
    );

    return {
      stars: data.stargazers_count,
      forks: data.forks_count,
      watchers: data.subscribers_count,
      contributors: contributors.size,
      open_issues,
      open_prs,
    };
  }
}
