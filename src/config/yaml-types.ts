import { z } from 'zod';

const sectionBase = {
  enabled: z.boolean().default(true),
  /** Falls back to the matching environment variable */
  credential: z.string().min(1).optional(),
};

export const GitHubOrgSectionSchema = z.object({
  ...sectionBase,
  org: z.string().min(1),
  /** Public organization page, scraped when the API is unavailable */
  url: z.string().url().optional(),
});

export const GitHubRepoSectionSchema = z.object({
  ...sectionBase,
  repository: z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'Must be in format owner/repo'),
  url: z.string().url().optional(),
});

export const YouTubeSectionSchema = z.object({
  ...sectionBase,
  /** Channel handle (`@name`) or channel id (`UC...`) */
  channel: z
    .string()
    .regex(/^(@[\w.-]+|UC[\w-]{10,})$/, 'Must be a handle (@name) or a channel id (UC...)'),
  url: z.string().url().optional(),
});

export const ScholarSectionSchema = z.object({
  enabled: z.boolean().default(true),
  /** Google Scholar author ids, the `user=` parameter of a profile URL */
  authors: z.array(z.string().min(1)).min(1),
  base_url: z.string().url().default('https://scholar.google.com'),
});

export const SlackSectionSchema = z.object({
  ...sectionBase,
  /** Public community page showing a member count */
  url: z.string().url().optional(),
});

export const PyPISectionSchema = z.object({
  enabled: z.boolean().default(true),
  package: z.string().regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'Must be a PyPI package name'),
});

export const DiscourseSectionSchema = z.object({
  ...sectionBase,
  base_url: z.string().url(),
  api_username: z.string().min(1).default('system'),
});

export const SourcesSectionSchema = z
  .object({
    github_org: GitHubOrgSectionSchema,
    github_repo: GitHubRepoSectionSchema,
    youtube: YouTubeSectionSchema,
    scholar: ScholarSectionSchema,
    slack: SlackSectionSchema,
    pypi: PyPISectionSchema,
    discourse: DiscourseSectionSchema,
  })
  .partial()
  .strict();

export const OutputSectionSchema = z.object({
  dir: z.string().min(1).default('metrics'),
  history_file: z.string().min(1).default('community_metrics.csv'),
  latest_file: z.string().min(1).default('latest.json'),
});

export const CollectionSectionSchema = z.object({
  concurrency: z.number().int().positive().default(4),
  source_timeout_ms: z.number().int().positive().default(60000),
  run_budget_ms: z.number().int().positive().default(300000),
  request_timeout_ms: z.number().int().positive().default(10000),
  retries: z.number().int().min(0).max(1).default(1),
  growth_window_days: z.number().int().positive().default(30),
});

export const MetricsFileSchema = z.object({
  output: OutputSectionSchema.default({}),
  collection: CollectionSectionSchema.default({}),
  sources: SourcesSectionSchema,
});

export type GitHubOrgSection = z.infer<typeof GitHubOrgSectionSchema>;
export type GitHubRepoSection = z.infer<typeof GitHubRepoSectionSchema>;
export type YouTubeSection = z.infer<typeof YouTubeSectionSchema>;
export type ScholarSection = z.infer<typeof ScholarSectionSchema>;
export type SlackSection = z.infer<typeof SlackSectionSchema>;
export type PyPISection = z.infer<typeof PyPISectionSchema>;
export type DiscourseSection = z.infer<typeof DiscourseSectionSchema>;
export type SourcesSection = z.infer<typeof SourcesSectionSchema>;
export type OutputSection = z.infer<typeof OutputSectionSchema>;
export type CollectionSection = z.infer<typeof CollectionSectionSchema>;
export type MetricsFile = z.infer<typeof MetricsFileSchema>;
