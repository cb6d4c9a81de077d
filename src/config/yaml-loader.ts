import { promises as fs } from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import type { ZodError } from 'zod';
import { ConfigurationError } from '../utils/errors';
import { type MetricsFile, MetricsFileSchema } from './yaml-types';

export const DEFAULT_CONFIG_PATH = path.resolve(process.cwd(), 'config', 'metrics.yaml');

const cache = new Map<string, MetricsFile>();

async function readYamlFile(filePath: string): Promise<unknown> {
  let fileContents: string;
  try {
    fileContents = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigurationError(`Missing configuration file: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  try {
    return YAML.parse(fileContents, { prettyErrors: true });
  } catch (error) {
    throw new ConfigurationError(
      `Invalid YAML in ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function formatIssues(error: ZodError): { message: string; missing: string[] } {
  const missing = error.issues
    .filter((issue) => issue.code === 'invalid_type' && issue.received === 'undefined')
    .map((issue) => issue.path.join('.'));

  const invalid = error.issues
    .filter((issue) => !(issue.code === 'invalid_type' && issue.received === 'undefined'))
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`);

  let message = 'Invalid metrics configuration:';
  if (missing.length > 0) {
    message += `\nMissing required settings: ${missing.join(', ')}`;
  }
  if (invalid.length > 0) {
    message += `\nInvalid settings: ${invalid.join('; ')}`;
  }
  return { message, missing };
}

/**
 * Validate an already parsed configuration document
 */
export function parseMetricsFile(value: unknown): MetricsFile {
  const result = MetricsFileSchema.safeParse(value);
  if (!result.success) {
    const { message, missing } = formatIssues(result.error);
    throw new ConfigurationError(message, missing);
  }
  return result.data;
}

/**
 * Read and validate the YAML settings file; parsed files are cached by path
 */
export async function loadMetricsFile(filePath: string = DEFAULT_CONFIG_PATH): Promise<MetricsFile> {
  const resolvedPath = path.resolve(filePath);
  const cached = cache.get(resolvedPath);
  if (cached) {
    return cached;
  }

  const parsed = parseMetricsFile(await readYamlFile(resolvedPath));
  cache.set(resolvedPath, parsed);
  return parsed;
}

export function clearConfigCache(): void {
  cache.clear();
}
