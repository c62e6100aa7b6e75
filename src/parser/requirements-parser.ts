import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { ParsingError } from '../errors.js';
import { logger } from '../logger.js';
import { DEFAULT_POLICY } from '../policy/inclusion-policy.js';
import type { InclusionPolicy } from '../policy/inclusion-policy.js';
import { firstConstraint, splitPythonConstraint } from '../policy/version.js';
import type { Ecosystem, Package, SourceLocation } from '../types.js';
import { PackageCollector } from './package-builder.js';
import type { PackageCandidate } from './package-builder.js';
import { readSourceFile } from './source-file.js';
import type { SourceFile } from './source-file.js';

/** A single PEP 508-style requirement, as written in requirements files and pyproject lists. */
export interface RequirementSpec {
  readonly name: string;
  /** Operator plus first constraint (`>=3.2.0`), or `latest`. */
  readonly version: string;
  readonly extras: readonly string[];
  readonly environmentMarker: string | undefined;
  readonly editable: boolean;
  readonly url: string | undefined;
}

const PEP508_NAME = /^[A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?$/;
const URL_MARKER = /(?:git\+|hg\+|svn\+|bzr\+|https?:\/\/|file:)/;
const DIRECT_REFERENCE = /^([A-Za-z0-9][A-Za-z0-9._-]*(?:\s*\[[^\]]*\])?)\s*@\s*(\S+)$/;
const ARCHIVE_SUFFIX = /\.(?:tar\.gz|tar\.bz2|tar\.xz|tgz|zip|whl)$/i;
const INCLUDE_DIRECTIVE = /^(?:-r|--requirement)(?:\s+|=)(.+)$/;
const EDITABLE_DIRECTIVE = /^(?:-e|--editable)(?:\s+|=)(.+)$/;

/**
 * Parse one requirement line. Returns undefined for blank lines, comments,
 * option lines and anything that yields no valid package name.
 */
export function parseRequirementSpec(text: string): RequirementSpec | undefined {
  let line = stripInlineComment(text).trim();
  if (!line) return undefined;

  let editable = false;
  const editableMatch = EDITABLE_DIRECTIVE.exec(line);
  if (editableMatch) {
    editable = true;
    line = editableMatch[1]!.trim();
  }
  if (line.startsWith('-')) return undefined;

  line = line.replace(/\s+--hash[=\s]\S+/g, '').trim();

  const hasUrl = URL_MARKER.test(line);

  let environmentMarker: string | undefined;
  // A URL may itself contain ';', so there the marker needs whitespace before it
  const markerIndex = hasUrl ? line.search(/\s;/) : line.indexOf(';');
  if (markerIndex !== -1) {
    environmentMarker = line.slice(markerIndex).replace(/^\s*;/, '').trim() || undefined;
    line = line.slice(0, markerIndex).trim();
  }

  let url: string | undefined;
  if (hasUrl) {
    const direct = DIRECT_REFERENCE.exec(line);
    const eggIndex = line.indexOf('#egg=');
    if (direct) {
      line = direct[1]!;
      url = direct[2]!;
    } else if (eggIndex !== -1) {
      url = line.slice(0, eggIndex).trim();
      line = (line.slice(eggIndex + '#egg='.length).split('&')[0] ?? '').trim();
    } else {
      url = line;
      const derived = nameFromUrl(line);
      if (!derived) return undefined;
      line = derived;
    }
  }

  let extras: string[] = [];
  const extrasMatch = /\[([^\]]*)\]/.exec(line);
  if (extrasMatch) {
    extras = extrasMatch[1]!.split(',').map(extra => extra.trim()).filter(Boolean);
    line = line.replace(extrasMatch[0], '');
  }

  // `name (>=1.0)` is the legacy parenthesized form
  line = line.replace(/[()]/g, ' ').trim();

  let name: string;
  let version: string;
  const constraint = splitPythonConstraint(line);
  if (constraint) {
    const first = firstConstraint(constraint.rest);
    if (!first) return undefined;
    name = constraint.name.trim();
    version = constraint.operator + first;
  } else {
    name = line;
    version = 'latest';
  }

  if (!PEP508_NAME.test(name)) return undefined;

  return { name, version, extras, environmentMarker, editable, url };
}

export function requirementCandidate(
  spec: RequirementSpec,
  location: SourceLocation,
  ecosystem: Ecosystem = 'pypi',
): PackageCandidate {
  return {
    name: spec.name,
    version: spec.version,
    ecosystem,
    location,
    extras: spec.extras,
    environmentMarker: spec.environmentMarker,
    editable: spec.editable,
    url: spec.url,
  };
}

/**
 * Parse a requirements file, following `-r` includes relative to the file.
 * `includeChain` holds the files currently being parsed so a cyclic include
 * is refused instead of recursing forever.
 */
export function parseRequirementsFile(
  file: SourceFile,
  policy: InclusionPolicy = DEFAULT_POLICY,
  includeChain: ReadonlySet<string> = new Set(),
): Package[] {
  const chain = new Set(includeChain).add(file.path);
  const collector = new PackageCollector(policy, 'python');

  for (const { lineNumber, text } of logicalLines(file)) {
    const line = stripInlineComment(text).trim();
    if (!line) continue;

    const include = INCLUDE_DIRECTIVE.exec(line);
    if (include) {
      collector.addAll(parseInclude(file, include[1]!.trim(), lineNumber, policy, chain));
      continue;
    }

    const spec = parseRequirementSpec(line);
    if (spec) {
      collector.add(requirementCandidate(spec, file.location(lineNumber, text, 'requirements')));
    }
  }

  return collector.packages;
}

function parseInclude(
  file: SourceFile,
  target: string,
  lineNumber: number,
  policy: InclusionPolicy,
  chain: ReadonlySet<string>,
): Package[] {
  const includePath = resolve(dirname(file.path), target);

  if (!existsSync(includePath)) {
    logger.debug(`Skipping missing requirements include ${target}`, { file: file.path, line: lineNumber });
    return [];
  }

  try {
    if (chain.has(includePath)) {
      throw new ParsingError(`Cyclic requirements include: ${target}`, file.path, lineNumber);
    }
    return parseRequirementsFile(readSourceFile(includePath), policy, chain);
  } catch (error) {
    if (!(error instanceof ParsingError)) throw error;
    logger.warn(`Skipping requirements include ${target}: ${error.message}`, { file: file.path, line: lineNumber });
    return [];
  }
}

interface LogicalLine {
  readonly lineNumber: number;
  readonly text: string;
}

/** Join backslash continuations; each logical line reports its first physical line. */
function logicalLines(file: SourceFile): LogicalLine[] {
  const result: LogicalLine[] = [];
  let buffer: string[] = [];
  let start = 0;

  file.lines.forEach((raw, index) => {
    if (buffer.length === 0) start = index + 1;
    const trimmed = raw.trim();

    if (trimmed.endsWith('\\') && !trimmed.startsWith('#')) {
      buffer.push(trimmed.slice(0, -1).trim());
      return;
    }

    buffer.push(trimmed);
    result.push({ lineNumber: start, text: buffer.filter(Boolean).join(' ') });
    buffer = [];
  });

  if (buffer.length > 0) {
    result.push({ lineNumber: start, text: buffer.filter(Boolean).join(' ') });
  }

  return result;
}

/** `#` starts a comment at line start or after whitespace, so `#egg=` survives. */
function stripInlineComment(text: string): string {
  return text.replace(/(^|\s)#.*$/, '');
}

function nameFromUrl(url: string): string | undefined {
  const withoutFragment = url.split('#')[0]?.split('?')[0] ?? '';
  const segments = withoutFragment.split('/').filter(Boolean);
  let last = segments[segments.length - 1] ?? '';

  // git+https://host/org/repo.git@v1.2 → repo
  const at = last.indexOf('@');
  if (at > 0) last = last.slice(0, at);

  last = last.replace(/\.git$/, '');
  if (ARCHIVE_SUFFIX.test(last)) {
    const isWheel = /\.whl$/i.test(last);
    last = last.replace(ARCHIVE_SUFFIX, '');
    last = isWheel ? (last.split('-')[0] ?? '') : last.replace(/-\d[\w.]*$/, '');
  }

  return PEP508_NAME.test(last) ? last : undefined;
}
