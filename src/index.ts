import type { ScanConfig, ScanResult } from './types.js';
import { buildConfig } from './config.js';
import { setLogLevel } from './logger.js';
import { scanProject } from './scanner/scanner.js';

export type {
  FileType,
  Ecosystem,
  PolicyScope,
  OutputFormat,
  LogLevel,
  SourceLocation,
  Package,
  ParseFailure,
  ScanSummary,
  ScanResult,
  ScanConfig,
} from './types.js';

export * from './parser/index.js';
export { InclusionPolicy, DEFAULT_POLICY } from './policy/inclusion-policy.js';
export type { PolicyOverrides } from './policy/inclusion-policy.js';
export { ALL_SCOPE_RULES, DEV_INDICATOR_RULE } from './policy/rules.js';
export type { ExclusionRule, ScopeRules } from './policy/rules.js';
export {
  normalizeVersion,
  firstConstraint,
  splitPythonConstraint,
  normalizeNpmVersion,
} from './policy/version.js';
export { discoverManifestFiles, DEFAULT_EXCLUDED_DIRS } from './scanner/discovery.js';
export { PackageInventory, mergePackages } from './scanner/inventory.js';
export { scanProject, summarize } from './scanner/scanner.js';
export { formatOutput } from './reporter/index.js';
export { buildConfig, loadConfigFile, parseConfigFileContent } from './config.js';
export { ParsingError, ConfigurationError } from './errors.js';
export { logger, setLogLevel } from './logger.js';

/**
 * Build the dependency inventory of a project directory.
 */
export async function scanDependencies(
  overrides: Partial<ScanConfig> = {}
): Promise<ScanResult> {
  return scanWithConfig(buildConfig(overrides));
}

/** Scan with a configuration already resolved by `buildConfig`; the config file is not read again. */
export async function scanWithConfig(config: ScanConfig): Promise<ScanResult> {
  if (config.logLevel) setLogLevel(config.logLevel);
  return scanProject(config);
}
