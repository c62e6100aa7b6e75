import { relative, sep } from 'node:path';
import type { Ecosystem, Package } from '../types.js';

export const ECOSYSTEM_ORDER: readonly Ecosystem[] = ['pypi', 'conda', 'npm', 'docker', 'debian', 'rpm', 'alpine'];

/** Packages grouped by ecosystem in display order; empty groups are left out. */
export function groupByEcosystem(packages: readonly Package[]): Array<[Ecosystem, Package[]]> {
  const groups = new Map<Ecosystem, Package[]>();
  for (const pkg of packages) {
    const group = groups.get(pkg.ecosystem);
    if (group) group.push(pkg);
    else groups.set(pkg.ecosystem, [pkg]);
  }

  const ordered: Array<[Ecosystem, Package[]]> = [];
  for (const ecosystem of ECOSYSTEM_ORDER) {
    const group = groups.get(ecosystem);
    if (group) ordered.push([ecosystem, group]);
  }
  return ordered;
}

/** Path relative to the scanned root, with forward slashes. */
export function displayPath(rootDir: string, filePath: string): string {
  const rel = relative(rootDir, filePath);
  if (!rel || rel.startsWith('..')) return filePath;
  return rel.split(sep).join('/');
}
