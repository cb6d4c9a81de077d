/**
 * Shared GitHub API helpers for the organization and repository collectors
 */

import { Octokit } from '@octokit/rest';
import { toError } from '../utils/errors';
import type { Logger } from '../utils/logger';

export const GITHUB_PAGE_SIZE = 100;
const MAX_PAGES = 50;
const USER_AGENT = 'community-metrics-collector';

export interface OctokitOptions {
  /** Omitted for the anonymous (public, rate limited) client */
  token?: string;
  /** Deadline of each GitHub API call */
  timeoutMs: number;
  logger: Logger;
}

/**
 * fetch for Octokit: every call gets its own deadline and a request log line
 */
export function createTimedFetch(timeoutMs: number, logger: Logger): typeof fetch {
  return async (input, init) => {
    const method = init?.method ?? 'GET';
    const url = input instanceof Request ? input.url : input.toString();
    const started = Date.now();

    try {
      const response = await fetch(input, { ...init, signal: AbortSignal.timeout(timeoutMs) });
      logger.logRequest(method, url, Date.now() - started, response.status);
      return response;
    } catch (error) {
      logger.logRequest(method, url, Date.now() - started, undefined, toError(error));
      throw error;
    }
  };
}

export function createOctokit({ token, timeoutMs, logger }: OctokitOptions): Octokit {
  const request = { fetch: createTimedFetch(timeoutMs, logger) };
  return new Octokit(
    token ? { auth: token, userAgent: USER_AGENT, request } : { userAgent: USER_AGENT, request }
  );
}

/**
 * Request pages until one comes back shorter than the page size
 */
export async function paginateUntilShort<T>(
  fetchPage: (page: number) => Promise<T[]>,
  perPage: number = GITHUB_PAGE_SIZE
): Promise<T[]> {
  const items: T[] = [];

  for (let page = 1; page <= MAX_PAGES; page++) {
    const batch = await fetchPage(page);
    items.push(...batch);
    if (batch.length < perPage) {
      break;
    }
  }

  return items;
}

/**
 * Add the logins of every contributor of a repository to `into`
 */
export async function collectContributorLogins(
  octokit: Octokit,
  owner: string,
  repo: string,
  into: Set<string>
): Promise<void> {
  const contributors = await paginateUntilShort(async (page) => {
    const { data } = await octokit.repos.listContributors({
      owner,
      repo,
      per_page: GITHUB_PAGE_SIZE,
      page,
    });
    // empty repositories answer 204 with no body
    return Array.isArray(data) ? data : [];
  });

  for (const contributor of contributors) {
    if (contributor.login) {
      into.add(contributor.login);
    }
  }
}

/**
 * Total hits of an issue search, e.g. `org:acme is:pr is:open`
 */
export async function countSearchResults(octokit: Octokit, query: string): Promise<number> {
  const { data } = await octokit.search.issuesAndPullRequests({ q: query, per_page: 1 });
  return data.total_count;
}

export async function countOpenIssuesAndPulls(
  octokit: Octokit,
  scope: string
): Promise<{ open_issues: number; open_prs: number }> {
  const [open_issues, open_prs] = await Promise.all([
    countSearchResults(octokit, `${scope} is:issue is:open`),
    countSearchResults(octokit, `${scope} is:pr is:open`),
  ]);
  return { open_issues, open_prs };
}

/**
 * Counters on github.com pages, e.g. `1.2k stars`
 */
export const COUNT = String.raw`(\d[\d.,]*\s?[kKmM]?)`;
