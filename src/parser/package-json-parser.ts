import { DEFAULT_POLICY } from '../policy/inclusion-policy.js';
import type { InclusionPolicy } from '../policy/inclusion-policy.js';
import { normalizeNpmVersion } from '../policy/version.js';
import type { Package } from '../types.js';
import { PackageCollector } from './package-builder.js';
import { isRecord } from './source-file.js';
import type { SourceFile } from './source-file.js';
import { escapeRegExp, parseJsonObject } from './structured.js';

/** devDependencies are never reported. */
export const REPORTED_SECTIONS: readonly string[] = ['dependencies', 'peerDependencies', 'optionalDependencies'];

export function parsePackageJson(file: SourceFile, policy: InclusionPolicy = DEFAULT_POLICY): Package[] {
  const raw = parseJsonObject(file);
  const collector = new PackageCollector(policy, 'javascript');

  for (const section of REPORTED_SECTIONS) {
    const entries = raw[section];
    if (!isRecord(entries)) continue;

    const sectionLine = file.findLine(new RegExp(`^\\s*"${section}"\\s*:`)) ?? 1;

    for (const [name, spec] of Object.entries(entries)) {
      if (typeof spec !== 'string') continue;

      const lineNumber = file.findLine(new RegExp(`"${escapeRegExp(name)}"\\s*:`), sectionLine) ?? sectionLine;
      collector.add({
        name,
        version: normalizeNpmVersion(spec),
        ecosystem: 'npm',
        location: file.location(lineNumber, `"${name}": "${spec}"`, 'package-json'),
      });
    }
  }

  return collector.packages;
}
