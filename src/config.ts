import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from './errors.js';
import type { ScanConfig } from './types.js';

export const CONFIG_FILE_NAMES: readonly string[] = ['.depscout.yml', '.depscout.yaml', 'depscout.config.yml'];

const configFileSchema = z
  .object({
    format: z.enum(['terminal', 'json', 'markdown']).optional(),
    excludeDirs: z.array(z.string().min(1)).optional(),
    ignorePackages: z.array(z.string().min(1)).optional(),
    allowPackages: z.array(z.string().min(1)).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Read the project-level config file from rootDir, if there is one.
 */
export function loadConfigFile(rootDir: string): ConfigFile | undefined {
  for (const fileName of CONFIG_FILE_NAMES) {
    const configPath = resolve(rootDir, fileName);
    if (existsSync(configPath)) {
      return parseConfigFileContent(readFileSync(configPath, 'utf-8'), configPath);
    }
  }
  return undefined;
}

export function parseConfigFileContent(content: string, source = 'config'): ConfigFile {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(`Invalid YAML in ${source}: ${errorMessage(error)}`);
  }

  // An empty file parses to null
  if (raw === null || raw === undefined) return {};

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.');
    throw new ConfigurationError(`Invalid ${source}: ${issue?.message ?? 'unknown error'}${field ? ` at "${field}"` : ''}`, field);
  }
  return parsed.data;
}

export function buildConfig(overrides: Partial<ScanConfig> = {}): ScanConfig {
  const rootDir = resolve(overrides.rootDir ?? process.cwd());
  const file = loadConfigFile(rootDir) ?? {};

  return {
    rootDir,
    format: overrides.format ?? file.format ?? 'terminal',
    excludeDirs: overrides.excludeDirs ?? file.excludeDirs ?? [],
    ignorePackages: overrides.ignorePackages ?? file.ignorePackages ?? [],
    allowPackages: overrides.allowPackages ?? file.allowPackages ?? [],
    logLevel: overrides.logLevel,
  };
}
