import type { SourcesSection } from '../config/yaml-types';
import { SOURCE_KINDS, type SourceKind } from '../types';
import type { HttpClient } from '../utils/http';
import type { Logger } from '../utils/logger';
import { DiscourseCollector } from './discourse';
import { GitHubOrgCollector } from './github-org';
import { GitHubRepoCollector } from './github-repo';
import { PyPICollector } from './pypi';
import { ScholarCollector } from './scholar';
import { SlackCollector } from './slack';
import type { SourceCollector } from './types';
import { YouTubeCollector } from './youtube';

interface CollectorDeps {
  http: HttpClient;
  logger?: Logger;
}

function createCollector(
  kind: SourceKind,
  sources: SourcesSection,
  deps: CollectorDeps
): SourceCollector | undefined {
  switch (kind) {
    case 'github_org':
      return sources.github_org && new GitHubOrgCollector({ section: sources.github_org, ...deps });
    case 'github_repo':
      return (
        sources.github_repo && new GitHubRepoCollector({ section: sources.github_repo, ...deps })
      );
    case 'youtube':
      return sources.youtube && new YouTubeCollector({ section: sources.youtube, ...deps });
    case 'scholar':
      return sources.scholar && new ScholarCollector({ section: sources.scholar, ...deps });
    case 'slack':
      return sources.slack && new SlackCollector({ section: sources.slack, ...deps });
    case 'pypi':
      return sources.pypi && new PyPICollector({ section: sources.pypi, ...deps });
    case 'discourse':
      return sources.discourse && new DiscourseCollector({ section: sources.discourse, ...deps });
    default: {
      const unsupported: never = kind;
      throw new Error(`Unsupported source kind: ${String(unsupported)}`);
    }
  }
}

/**
 * One collector per configured section, in column order. Disabled sections
 * still get a collector; the aggregator decides what runs.
 */
export function createCollectors(
  sources: SourcesSection,
  http: HttpClient,
  logger?: Logger
): SourceCollector[] {
  return SOURCE_KINDS.map((kind) => createCollector(kind, sources, { http, logger })).filter(
    (collector): collector is SourceCollector => Boolean(collector)
  );
}
