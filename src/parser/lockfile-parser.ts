import { isMap } from 'yaml';
import { DEFAULT_POLICY } from '../policy/inclusion-policy.js';
import type { InclusionPolicy } from '../policy/inclusion-policy.js';
import { normalizeNpmVersion, normalizeVersion } from '../policy/version.js';
import type { Package } from '../types.js';
import { PackageCollector } from './package-builder.js';
import { isRecord, stringField } from './source-file.js';
import type { SourceFile } from './source-file.js';
import {
  escapeRegExp,
  parseJsonObject,
  parseYamlDocument,
  yamlMapEntries,
  yamlNodeLine,
  yamlScalarValue,
} from './structured.js';

/**
 * Parse yarn.lock content (classic v1 and berry).
 *
 * Each block starts with an unindented header listing one or more specifiers
 * that resolved to the same version; the indented `version` line holds the
 * resolved version, which is what gets reported.
 */
export function parseYarnLock(file: SourceFile, policy: InclusionPolicy = DEFAULT_POLICY): Package[] {
  const collector = new PackageCollector(policy, 'javascript');
  let currentName: string | undefined;

  file.lines.forEach((raw, index) => {
    const trimmed = raw.trim();
    if (!trimmed || trimmed.startsWith('#')) return;

    if (!/^\s/.test(raw)) {
      currentName = trimmed.endsWith(':') ? parseYarnHeader(trimmed.slice(0, -1)) : undefined;
      return;
    }

    // Only the block's own fields sit at two spaces; dependency lists are deeper
    if (!currentName || !/^ {2}\S/.test(raw)) return;

    const versionMatch = /^version:?\s+"?([^"\s]+)"?$/.exec(trimmed);
    if (!versionMatch) return;

    collector.add({
      name: currentName,
      version: normalizeVersion(versionMatch[1]!),
      ecosystem: 'npm',
      location: file.location(index + 1, trimmed, 'yarn-lock'),
    });
    currentName = undefined;
  });

  return collector.packages;
}

/**
 * Package name from a block header such as
 * `"@babel/core@^7.0.0", "@babel/core@^7.1.0"` or `lodash@npm:^4.17.20`.
 * Workspace and metadata blocks yield undefined.
 */
export function parseYarnHeader(header: string): string | undefined {
  const first = (header.split(',')[0] ?? '').trim().replace(/^"|"$/g, '');
  if (first.includes('@workspace:')) return undefined;

  // For scoped names the second @ delimits the range
  const at = first.startsWith('@') ? first.indexOf('@', 1) : first.indexOf('@');
  if (at <= 0) return undefined;
  return first.slice(0, at);
}

/**
 * Parse package-lock.json / npm-shrinkwrap.json. lockfileVersion 3 has only
 * the flat `packages` map, version 1 only the nested `dependencies` tree, and
 * version 2 carries both; every shape present is read, so each declaring line
 * becomes a location.
 */
export function parseNpmLock(file: SourceFile, policy: InclusionPolicy = DEFAULT_POLICY): Package[] {
  const raw = parseJsonObject(file);
  const collector = new PackageCollector(policy, 'javascript');

  const packages = raw['packages'];
  if (isRecord(packages)) {
    let cursor = topLevelKeyLine(file, 'packages');

    for (const [key, value] of Object.entries(packages)) {
      // "" is the root project; paths outside node_modules are workspace sources
      if (!key.includes('node_modules/') || !isRecord(value)) continue;
      if (value['dev'] === true || value['link'] === true) continue;

      const version = stringField(value, 'version');
      if (!version) continue;

      const name = key.slice(key.lastIndexOf('node_modules/') + 'node_modules/'.length);
      const lineNumber = file.findLine(`"${key}"`, cursor) ?? cursor;
      cursor = lineNumber;

      collector.add({
        name,
        version: normalizeVersion(version),
        ecosystem: 'npm',
        location: file.location(lineNumber, `${key}: ${version}`, 'npm-lock'),
      });
    }
  }

  const dependencies = raw['dependencies'];
  if (isRecord(dependencies)) {
    readDependencyTree(file, dependencies, [], topLevelKeyLine(file, 'dependencies'), collector);
  }

  return collector.packages;
}

/**
 * Line of a key of the root object. Root keys share the indentation of the
 * first key in the file, which keeps `"dependencies"` maps nested inside
 * `packages` entries from matching.
 */
function topLevelKeyLine(file: SourceFile, key: string): number {
  const firstKey = file.findLine(/^\s*"[^"]*"\s*:/);
  if (firstKey !== undefined) {
    const indent = /^\s*/.exec(file.line(firstKey))?.[0] ?? '';
    const line = file.findLine(new RegExp(`^${indent}"${escapeRegExp(key)}"\\s*:`));
    if (line !== undefined) return line;
  }
  return file.findLine(`"${key}"`) ?? 1;
}

function readDependencyTree(
  file: SourceFile,
  dependencies: Record<string, unknown>,
  path: readonly string[],
  parentLine: number,
  collector: PackageCollector,
): void {
  let cursor = parentLine;

  for (const [name, info] of Object.entries(dependencies)) {
    if (!isRecord(info)) continue;

    const lineNumber = file.findLine(new RegExp(`"${escapeRegExp(name)}"\\s*:\\s*\\{`), cursor) ?? cursor;
    cursor = lineNumber;
    const entryPath = [...path, name];

    const version = stringField(info, 'version');
    if (version && info['dev'] !== true) {
      collector.add({
        name,
        version: normalizeVersion(version),
        ecosystem: 'npm',
        location: file.location(lineNumber, `${entryPath.join('/')}: ${version}`, 'npm-lock'),
      });
    }

    const nested = info['dependencies'];
    if (isRecord(nested)) {
      readDependencyTree(file, nested, entryPath, lineNumber, collector);
    }
  }
}

const PNPM_DEPENDENCY_SECTIONS: readonly string[] = ['dependencies', 'optionalDependencies', 'devDependencies'];

/**
 * Parse pnpm-lock.yaml. Reports the direct dependency ranges (top level for
 * v5, per importer for v6+) and every resolved entry of the `packages` map.
 */
export function parsePnpmLock(file: SourceFile, policy: InclusionPolicy = DEFAULT_POLICY): Package[] {
  const doc = parseYamlDocument(file);
  const collector = new PackageCollector(policy, 'javascript');

  const readSections = (owner: unknown, prefix: string): void => {
    for (const section of PNPM_DEPENDENCY_SECTIONS) {
      const sectionNode = yamlMapEntries(owner).find(entry => entry.key === section);
      if (!sectionNode) continue;

      for (const { key: name, keyNode, value } of yamlMapEntries(sectionNode.value)) {
        const spec = pnpmSpecifier(value);
        if (!spec) continue;
        collector.add({
          name,
          version: normalizeNpmVersion(spec),
          ecosystem: 'npm',
          location: file.location(yamlNodeLine(file, keyNode), `${prefix}${section}.${name}: ${spec}`, 'pnpm-lock'),
        });
      }
    }
  };

  readSections(doc.contents, '');

  for (const { key: importer, value } of yamlMapEntries(doc.get('importers', true))) {
    readSections(value, `importers.${importer}.`);
  }

  for (const { key, keyNode, value } of yamlMapEntries(doc.get('packages', true))) {
    if (isMap(value) && value.get('dev') === true) continue;

    const parsed = parsePnpmPackageKey(key);
    if (!parsed) continue;

    collector.add({
      name: parsed.name,
      version: normalizeVersion(parsed.version),
      ecosystem: 'npm',
      location: file.location(yamlNodeLine(file, keyNode), `packages.${key}`, 'pnpm-lock'),
    });
  }

  return collector.packages;
}

/** Range of a direct dependency: a plain string (v5) or `{ specifier, version }` (v6+). */
function pnpmSpecifier(value: unknown): string | undefined {
  const scalar = yamlScalarValue(value);
  if (typeof scalar === 'string') return scalar;
  if (typeof scalar === 'number') return String(scalar);

  const entries = yamlMapEntries(value);
  const specifier = entries.find(entry => entry.key === 'specifier') ?? entries.find(entry => entry.key === 'version');
  const text = specifier ? yamlScalarValue(specifier.value) : undefined;
  return typeof text === 'string' ? text : undefined;
}

/**
 * Name and version from a `packages` key:
 *
 *   /lodash/4.17.21               (v5)
 *   /@babel/core/7.12.9_peer@1.0  (v5, peer suffix)
 *   /lodash@4.17.21               (v6)
 *   '@babel/core@7.12.9(react@18)' (v9)
 */
export function parsePnpmPackageKey(key: string): { name: string; version: string } | undefined {
  const spec = key.replace(/^\//, '').replace(/\(.*$/, '');

  const slashForm = /^((?:@[^/]+\/)?[^/@]+)\/(\d[^/]*)$/.exec(spec);
  if (slashForm) {
    return { name: slashForm[1]!, version: slashForm[2]!.replace(/_.*$/, '') };
  }

  const at = spec.lastIndexOf('@');
  if (at <= 0) return undefined;

  const name = spec.slice(0, at);
  const version = spec.slice(at + 1);
  if (!version || (name.startsWith('@') && !name.includes('/'))) return undefined;
  return { name, version };
}
