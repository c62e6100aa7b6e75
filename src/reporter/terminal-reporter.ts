import pc from 'picocolors';
import type { Ecosystem, ScanResult } from '../types.js';
import { displayPath, groupByEcosystem } from './grouping.js';

const ECOSYSTEM_COLORS: Record<Ecosystem, (s: string) => string> = {
  pypi: pc.blue,
  conda: pc.green,
  npm: pc.red,
  docker: pc.cyan,
  debian: pc.magenta,
  rpm: pc.yellow,
  alpine: pc.cyan,
};

export function formatTerminal(result: ScanResult): string {
  const lines: string[] = [];

  lines.push(pc.bold('\nDependency Inventory'));
  lines.push(pc.dim('\u2500'.repeat(50)));

  if (result.packages.length === 0) {
    lines.push(pc.green('\n\u2713 No dependencies found.'));
  }

  for (const [ecosystem, packages] of groupByEcosystem(result.packages)) {
    const color = ECOSYSTEM_COLORS[ecosystem];

    lines.push('');
    lines.push(color(pc.bold(`${ecosystem.toUpperCase()} (${packages.length})`)));

    for (const pkg of packages) {
      lines.push(`  ${pc.bold(pkg.name)}${pc.dim('@')}${pkg.version}`);
      for (const location of pkg.sourceLocations) {
        lines.push(`    ${pc.dim(`${displayPath(result.rootDir, location.filePath)}:${location.lineNumber}`)}`);
      }
    }
  }

  if (result.failures.length > 0) {
    lines.push('');
    lines.push(pc.yellow(pc.bold(`\u26A0 Skipped files (${result.failures.length})`)));
    for (const failure of result.failures) {
      lines.push(`  ${pc.yellow('\u2717')} ${displayPath(result.rootDir, failure.filePath)}: ${failure.message}`);
    }
  }

  const { summary } = result;
  lines.push('');
  lines.push(pc.dim('\u2500'.repeat(50)));
  lines.push(`Total: ${summary.totalPackages} packages, ${summary.totalLocations} locations`);
  lines.push(pc.dim(`Scanned: ${summary.filesScanned} files (${summary.filesFailed} failed)`));
  lines.push('');

  return lines.join('\n');
}
