import { basename } from 'node:path';
import { ParsingError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { detectFormat, parseManifest } from '../parser/router.js';
import { readSourceFile } from '../parser/source-file.js';
import { InclusionPolicy } from '../policy/inclusion-policy.js';
import type { Ecosystem, Package, ParseFailure, ScanConfig, ScanResult, ScanSummary } from '../types.js';
import { discoverManifestFiles } from './discovery.js';
import { PackageInventory } from './inventory.js';

/**
 * Discover, parse and merge every dependency file under `config.rootDir`.
 * A file that fails to parse is logged and listed in `failures`; the scan
 * carries on with the rest.
 */
export function scanProject(config: ScanConfig): ScanResult {
  const policy = new InclusionPolicy({
    ignorePackages: config.ignorePackages,
    allowPackages: config.allowPackages,
  });
  const files = discoverManifestFiles(config.rootDir, config.excludeDirs);
  const inventory = new PackageInventory();
  const failures: ParseFailure[] = [];

  for (const path of files) {
    const format = detectFormat(basename(path));
    if (!format) continue;

    try {
      const packages = parseManifest(readSourceFile(path), policy);
      logger.info(`Parsed ${packages.length} packages from ${path}`, { fileType: format.fileType });
      inventory.addAll(packages);
    } catch (error) {
      const message = errorMessage(error);
      logger.warn(`Failed to parse ${path}: ${message}`, { fileType: format.fileType });
      failures.push({
        filePath: error instanceof ParsingError ? error.filePath : path,
        fileType: format.fileType,
        message,
        lineNumber: error instanceof ParsingError ? error.lineNumber : undefined,
      });
    }
  }

  const packages = inventory.toArray();
  const summary = summarize(packages, files.length, failures.length);
  logger.info(`Found ${summary.totalPackages} packages in ${summary.filesScanned} files`);

  return { rootDir: config.rootDir, packages, failures, summary };
}

export function summarize(packages: readonly Package[], filesScanned: number, filesFailed: number): ScanSummary {
  const byEcosystem: Partial<Record<Ecosystem, number>> = {};
  let totalLocations = 0;

  for (const pkg of packages) {
    byEcosystem[pkg.ecosystem] = (byEcosystem[pkg.ecosystem] ?? 0) + 1;
    totalLocations += pkg.sourceLocations.length;
  }

  return {
    filesScanned,
    filesFailed,
    totalPackages: packages.length,
    totalLocations,
    byEcosystem,
  };
}
