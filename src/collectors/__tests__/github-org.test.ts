import fs from 'node:fs';
import path from 'node:path';
import { Octokit } from '@octokit/rest';
import nock from 'nock';
import type { GitHubOrgSection } from '../../config/yaml-types';
import { HttpClient } from '../../utils/http';
import { Logger, LogLevel } from '../../utils/logger';
import { GitHubOrgCollector } from '../github-org';

jest.mock('@octokit/rest');

const MockedOctokit = Octokit as jest.MockedClass<typeof Octokit>;

function readFixture(filename: string): string {
  const fullPath = path.resolve(__dirname, '../../..', 'tests/__fixtures__', filename);
  return fs.readFileSync(fullPath, 'utf-8');
}

const logger = new Logger(LogLevel.ERROR, {}, () => undefined);

function buildCollector(section: Partial<GitHubOrgSection> = {}): GitHubOrgCollector {
  return new GitHubOrgCollector({
    section: { enabled: true, org: 'example-org', ...section },
    http: new HttpClient({ retries: 0, logger }),
    logger
  });
}

function buildOctokitMock() {
  return {
    repos: {
      listForOrg: jest.fn().mockResolvedValue({
        data: [
          { name: 'alpha', stargazers_count: 10, forks_count: 1 },
          { name: 'beta', stargazers_count: 20, forks_count: 2 },
          { name: 'gamma', stargazers_count: 5, forks_count: 0 }
        ]
      }),
      listContributors: jest.fn(({ repo }: { repo: string }) => {
        const byRepo: Record<string, unknown> = {
          alpha: [{ login: 'alice' }, { login: 'bob' }],
          beta: [{ login: 'bob' }, { login: 'carol' }],
          gamma: ''
        };
        return Promise.resolve({ data: byRepo[repo] });
      })
    },
    search: {
      issuesAndPullRequests: jest.fn(({ q }: { q: string }) =>
        Promise.resolve({ data: { total_count: q.includes('is:issue') ? 7 : 2 } })
      )
    },
    orgs: {
      get: jest.fn().mockResolvedValue({ data: { followers: 40 } })
    }
  };
}

describe('GitHubOrgCollector', () => {
  beforeAll(() => {
    nock.disableNetConnect();
  });

  beforeEach(() => {
    MockedOctokit.mockReset();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  it('sums stars and forks across repositories from the public API', async () => {
    const octokit = buildOctokitMock();
    MockedOctokit.mockImplementation(() => octokit as unknown as Octokit);

    const record = await buildCollector().collect();

    expect(record).toEqual({
      kind: 'github_org',
      enabled: true,
      status: 'ok',
      method: 'api',
      repo_count: 3,
      stars: 35,
      forks: 3,
      contributors: 3,
      open_issues: 7,
      open_prs: 2,
      followers: 40
    });
    expect(MockedOctokit).toHaveBeenCalledTimes(1);
    expect(MockedOctokit).toHaveBeenCalledWith({
      userAgent: 'community-metrics-collector',
      request: { fetch: expect.any(Function) }
    });
    expect(octokit.repos.listForOrg).toHaveBeenCalledWith({
      org: 'example-org',
      type: 'public',
      per_page: 100,
      page: 1
    });
    expect(octokit.search.issuesAndPullRequests).toHaveBeenCalledWith({
      q: 'org:example-org is:pr is:open',
      per_page: 1
    });
  });

  it('requests further pages while they come back full', async () => {
    const octokit = buildOctokitMock();
    const fullPage = Array.from({ length: 100 }, (_, index) => ({
      name: `repo-${index}`,
      stargazers_count: 1,
      forks_count: 0
    }));
    octokit.repos.listForOrg
      .mockResolvedValueOnce({ data: fullPage })
      .mockResolvedValueOnce({ data: [{ name: 'last', stargazers_count: 4, forks_count: 1 }] });
    octokit.repos.listContributors.mockResolvedValue({ data: [] });
    MockedOctokit.mockImplementation(() => octokit as unknown as Octokit);

    const record = await buildCollector().collect();

    expect(octokit.repos.listForOrg).toHaveBeenCalledTimes(2);
    expect(record).toMatchObject({ repo_count: 101, stars: 104, forks: 1, contributors: 0 });
  });

  it('falls back to the public API when the authenticated attempt fails', async () => {
    const rejected = buildOctokitMock();
    rejected.repos.listForOrg.mockRejectedValue(
      Object.assign(new Error('Bad credentials'), { status: 401 })
    );
    const accepted = buildOctokitMock();
    MockedOctokit.mockImplementationOnce(() => rejected as unknown as Octokit).mockImplementationOnce(
      () => accepted as unknown as Octokit
    );

    const record = await buildCollector({ credential: 'test-token' }).collect();

    expect(MockedOctokit).toHaveBeenNthCalledWith(1, {
      auth: 'test-token',
      userAgent: 'community-metrics-collector',
      request: { fetch: expect.any(Function) }
    });
    expect(MockedOctokit).toHaveBeenNthCalledWith(2, {
      userAgent: 'community-metrics-collector',
      request: { fetch: expect.any(Function) }
    });
    expect(record).toMatchObject({ status: 'ok', method: 'api', stars: 35 });
  });

  it('scrapes the organization page when the API is unavailable', async () => {
    const octokit = buildOctokitMock();
    octokit.repos.listForOrg.mockRejectedValue(
      Object.assign(new Error('API rate limit exceeded'), { status: 403 })
    );
    MockedOctokit.mockImplementation(() => octokit as unknown as Octokit);
    nock('https://github.com').get('/example-org').reply(200, readFixture('github-org-page.html'));

    const record = await buildCollector().collect();

    expect(record).toEqual({
      kind: 'github_org',
      enabled: true,
      status: 'ok',
      method: 'scrape',
      repo_count: 42,
      stars: 0,
      forks: 0,
      contributors: 0,
      open_issues: 0,
      open_prs: 0,
      followers: 1200
    });
  });

  it('records a failure with sentinels when both paths fail', async () => {
    const octokit = buildOctokitMock();
    octokit.repos.listForOrg.mockRejectedValue(new Error('getaddrinfo ENOTFOUND api.github.com'));
    MockedOctokit.mockImplementation(() => octokit as unknown as Octokit);
    nock('https://github.com').get('/example-org').reply(200, '<html><body>Not much here</body></html>');

    const record = await buildCollector().collect();

    expect(record).toEqual({
      kind: 'github_org',
      enabled: true,
      status: 'failed',
      method: '',
      repo_count: 0,
      stars: 0,
      forks: 0,
      contributors: 0,
      open_issues: 0,
      open_prs: 0,
      followers: 0
    });
  });

  it('reports a disabled section without calling anything', async () => {
    const record = await buildCollector({ enabled: false }).collect();

    expect(record).toMatchObject({ kind: 'github_org', enabled: false, status: 'disabled', method: '' });
    expect(MockedOctokit).not.toHaveBeenCalled();
  });
});
