import type { ScanResult } from '../types.js';
import { displayPath, groupByEcosystem } from './grouping.js';

function cell(text: string): string {
  return text.replace(/\|/g, '\\|');
}

export function formatMarkdown(result: ScanResult): string {
  const lines: string[] = [];
  const groups = groupByEcosystem(result.packages);

  lines.push('# Dependency Inventory');
  lines.push('');

  lines.push('## Summary');
  lines.push('');
  lines.push('| Ecosystem | Packages |');
  lines.push('| --- | --- |');
  for (const [ecosystem, packages] of groups) {
    lines.push(`| ${ecosystem} | ${packages.length} |`);
  }
  lines.push(`| **Total** | **${result.summary.totalPackages}** |`);
  lines.push('');
  lines.push(`- Files scanned: ${result.summary.filesScanned}`);
  lines.push(`- Files failed: ${result.summary.filesFailed}`);
  lines.push(`- Source locations: ${result.summary.totalLocations}`);
  lines.push('');

  for (const [ecosystem, packages] of groups) {
    lines.push(`## ${ecosystem}`);
    lines.push('');
    lines.push('| Package | Version | Locations |');
    lines.push('| --- | --- | --- |');
    for (const pkg of packages) {
      const locations = pkg.sourceLocations
        .map(location => `\`${displayPath(result.rootDir, location.filePath)}:${location.lineNumber}\``)
        .join('<br>');
      lines.push(`| \`${cell(pkg.name)}\` | \`${cell(pkg.version)}\` | ${locations} |`);
    }
    lines.push('');
  }

  if (result.failures.length > 0) {
    lines.push('## Skipped Files');
    lines.push('');
    for (const failure of result.failures) {
      lines.push(`- \`${displayPath(result.rootDir, failure.filePath)}\`: ${failure.message}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
