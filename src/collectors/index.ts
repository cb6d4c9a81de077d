/**
 * Central export point for all source collectors
 */

export { AbstractSourceCollector } from './base';
export { DiscourseCollector } from './discourse';
export { createCollectors } from './factory';
export { GitHubOrgCollector } from './github-org';
export { GitHubRepoCollector } from './github-repo';
export { PyPICollector } from './pypi';
export { combineProfiles, ScholarCollector } from './scholar';
export { SlackCollector } from './slack';
export type { ApiAttempt, ApiAttemptName, CollectorInit, ScrapeOutcome, SourceCollector } from './types';
export { YouTubeCollector } from './youtube';
