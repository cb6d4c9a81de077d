/**
 * Configuration management: YAML settings plus credentials from the environment
 */

import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';
import type { Logger } from '../utils/logger';
import { DEFAULT_CONFIG_PATH, loadMetricsFile } from './yaml-loader';
import type { MetricsFile, SourcesSection } from './yaml-types';

// Load .env file if it exists
dotenv.config();

const optionalSecret = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

/**
 * Environment variable schema
 */
const EnvSchema = z.object({
  GITHUB_TOKEN: optionalSecret,
  YOUTUBE_API_KEY: optionalSecret,
  SLACK_TOKEN: optionalSecret,
  DISCOURSE_API_KEY: optionalSecret,
  DISCOURSE_API_USERNAME: optionalSecret,
  METRICS_CONFIG: optionalSecret,
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * Pre-validated settings handed to the collectors
 */
export interface MetricsSettings extends MetricsFile {
  configPath: string;
  logLevel: EnvConfig['LOG_LEVEL'];
}

export function parseEnvironment(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const invalid = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid environment: ${invalid.join('; ')}`);
  }
  return result.data;
}

/**
 * Overlay credentials from the environment; the environment wins over the file
 */
export function applyEnvironment(sources: SourcesSection, env: EnvConfig): SourcesSection {
  const { github_org, github_repo, youtube, slack, discourse } = sources;

  return {
    ...sources,
    github_org: github_org && {
      ...github_org,
      credential: env.GITHUB_TOKEN ?? github_org.credential,
    },
    github_repo: github_repo && {
      ...github_repo,
      credential: env.GITHUB_TOKEN ?? github_repo.credential,
    },
    youtube: youtube && {
      ...youtube,
      credential: env.YOUTUBE_API_KEY ?? youtube.credential,
    },
    slack: slack && {
      ...slack,
      credential: env.SLACK_TOKEN ?? slack.credential,
    },
    discourse: discourse && {
      ...discourse,
      credential: env.DISCOURSE_API_KEY ?? discourse.credential,
      api_username: env.DISCOURSE_API_USERNAME ?? discourse.api_username,
    },
  };
}

class Configuration {
  private settings?: MetricsSettings;

  /**
   * Load and validate configuration
   */
  async load(configPath?: string, env: NodeJS.ProcessEnv = process.env): Promise<MetricsSettings> {
    if (this.settings) {
      return this.settings;
    }

    const environment = parseEnvironment(env);
    const resolvedPath = configPath ?? environment.METRICS_CONFIG ?? DEFAULT_CONFIG_PATH;
    const file = await loadMetricsFile(resolvedPath);

    this.settings = {
      ...file,
      sources: applyEnvironment(file.sources, environment),
      configPath: resolvedPath,
      logLevel: environment.LOG_LEVEL,
    };
    return this.settings;
  }

  /**
   * Reload configuration (useful for testing)
   */
  async reload(configPath?: string, env?: NodeJS.ProcessEnv): Promise<MetricsSettings> {
    this.settings = undefined;
    return this.load(configPath, env);
  }

  /**
   * Log configuration with secrets redacted
   */
  logConfig(logger: Logger): void {
    if (!this.settings) {
      return;
    }

    const sources: Record<string, unknown> = {};
    for (const [name, section] of Object.entries(this.settings.sources)) {
      if (!section) {
        continue;
      }
      sources[name] =
        'credential' in section && section.credential
          ? { ...section, credential: this.redactSecret(section.credential) }
          : section;
    }

    logger.info('Configuration loaded', {
      configPath: this.settings.configPath,
      output: this.settings.output,
      collection: this.settings.collection,
      sources,
    });
  }

  private redactSecret(secret: string): string {
    if (secret.length <= 8) {
      return '***';
    }
    return `${secret.substring(0, 4)}...${secret.substring(secret.length - 4)}`;
  }
}

// Export singleton instance
export const config = new Configuration();

export { clearConfigCache, DEFAULT_CONFIG_PATH, loadMetricsFile, parseMetricsFile } from './yaml-loader';
export * from './yaml-types';
