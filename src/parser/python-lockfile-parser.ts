import { DEFAULT_POLICY } from '../policy/inclusion-policy.js';
import type { InclusionPolicy } from '../policy/inclusion-policy.js';
import { normalizeVersion } from '../policy/version.js';
import type { FileType, Package } from '../types.js';
import { PackageCollector } from './package-builder.js';
import { isList, isRecord, stringField } from './source-file.js';
import type { SourceFile } from './source-file.js';
import { escapeRegExp, parseTomlTable } from './structured.js';

/**
 * poetry.lock and uv.lock both list locked packages as `[[package]]` tables
 * with a name and a version.
 */
function parseTomlLockfile(file: SourceFile, fileType: FileType, policy: InclusionPolicy): Package[] {
  const data = parseTomlTable(file);
  const collector = new PackageCollector(policy, 'python');
  const entries = data['package'];
  if (!isList(entries)) return collector.packages;

  let cursor = 1;
  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    const name = stringField(entry, 'name');
    const version = stringField(entry, 'version');
    if (!name || !version) continue;

    const namePattern = new RegExp(`^\\s*name\\s*=\\s*["']${escapeRegExp(name)}["']`);
    const lineNumber = file.findLine(namePattern, cursor) ?? cursor;
    cursor = lineNumber;

    if (isProjectItself(entry)) continue;

    collector.add({
      name,
      version: normalizeVersion(version),
      ecosystem: 'pypi',
      location: file.location(lineNumber, `${name} = "${version}"`, fileType),
    });
  }

  return collector.packages;
}

// uv records the project being locked with an editable or virtual source
function isProjectItself(entry: Record<string, unknown>): boolean {
  const source = entry['source'];
  return isRecord(source) && ('editable' in source || 'virtual' in source);
}

export function parsePoetryLock(file: SourceFile, policy: InclusionPolicy = DEFAULT_POLICY): Package[] {
  return parseTomlLockfile(file, 'poetry-lock', policy);
}

export function parseUvLock(file: SourceFile, policy: InclusionPolicy = DEFAULT_POLICY): Package[] {
  return parseTomlLockfile(file, 'uv-lock', policy);
}
