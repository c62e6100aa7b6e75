import { isSeq } from 'yaml';
import { ParsingError } from '../errors.js';
import { logger } from '../logger.js';
import { DEFAULT_POLICY } from '../policy/inclusion-policy.js';
import type { InclusionPolicy } from '../policy/inclusion-policy.js';
import { firstConstraint } from '../policy/version.js';
import type { FileType, Package } from '../types.js';
import { PackageCollector } from './package-builder.js';
import { parseRequirementSpec, requirementCandidate } from './requirements-parser.js';
import { isList, isRecord, stringField } from './source-file.js';
import type { SourceFile } from './source-file.js';
import { escapeRegExp, parseTomlTable, parseYamlDocument, yamlMapEntries, yamlNodeLine, yamlScalarValue } from './structured.js';

interface TomlSection {
  readonly path: readonly string[];
  /** Text of the line the section starts at, used to anchor line lookups. */
  readonly anchor: string | RegExp;
  /** Table header the anchor is searched after. */
  readonly within?: string;
}

const PYPROJECT_SECTIONS: readonly TomlSection[] = [
  { path: ['project', 'dependencies'], anchor: /^\s*dependencies\s*=/, within: '[project]' },
  { path: ['build-system', 'requires'], anchor: '[build-system]' },
  { path: ['tool', 'poetry', 'dependencies'], anchor: '[tool.poetry.dependencies]' },
  { path: ['tool', 'poetry', 'dev-dependencies'], anchor: '[tool.poetry.dev-dependencies]' },
];

/**
 * pyproject.toml: PEP 621 dependency lists, optional-dependency groups, the
 * build-system requirements, and Poetry dependency tables (including groups).
 */
export function parsePyprojectToml(file: SourceFile, policy: InclusionPolicy = DEFAULT_POLICY): Package[] {
  const data = parseTomlTable(file);
  const collector = new PackageCollector(policy, 'python');
  const tomlFile = new TomlDependencyReader(file, 'pyproject-toml', collector);

  for (const section of PYPROJECT_SECTIONS) {
    const fromLine = section.within ? file.findLine(section.within) ?? 1 : 1;
    tomlFile.read(getPath(data, section.path), section.path, section.anchor, fromLine);
  }

  const optional = getPath(data, ['project', 'optional-dependencies']);
  if (isRecord(optional)) {
    const anchor = file.findLine('optional-dependencies') ?? 1;
    for (const [group, deps] of Object.entries(optional)) {
      tomlFile.read(deps, ['project', 'optional-dependencies', group], new RegExp(`^\\s*"?${escapeRegExp(group)}"?\\s*=`), anchor);
    }
  }

  const groups = getPath(data, ['tool', 'poetry', 'group']);
  if (isRecord(groups)) {
    for (const [group, config] of Object.entries(groups)) {
      if (!isRecord(config)) continue;
      tomlFile.read(config['dependencies'], ['tool', 'poetry', 'group', group, 'dependencies'], `[tool.poetry.group.${group}.dependencies]`);
    }
  }

  return collector.packages;
}

/** Pipfile: `[packages]` and `[dev-packages]` tables. */
export function parsePipfile(file: SourceFile, policy: InclusionPolicy = DEFAULT_POLICY): Package[] {
  const data = parseTomlTable(file);
  const collector = new PackageCollector(policy, 'python');
  const tomlFile = new TomlDependencyReader(file, 'pipfile', collector);

  for (const section of ['packages', 'dev-packages']) {
    tomlFile.read(data[section], [section], `[${section}]`);
  }

  return collector.packages;
}

/**
 * Reads TOML dependency declarations in either shape: a list of requirement
 * strings, or a table of name → version string / spec table.
 */
class TomlDependencyReader {
  private readonly file: SourceFile;
  private readonly fileType: FileType;
  private readonly collector: PackageCollector;

  constructor(file: SourceFile, fileType: FileType, collector: PackageCollector) {
    this.file = file;
    this.fileType = fileType;
    this.collector = collector;
  }

  read(deps: unknown, path: readonly string[], anchor: string | RegExp, fromLine = 1): void {
    if (deps === undefined) return;
    const sectionLine = this.file.findLine(anchor, fromLine) ?? fromLine;
    const label = path.join('.');

    if (isList(deps)) {
      let cursor = sectionLine;
      for (const entry of deps) {
        if (typeof entry !== 'string') continue;
        const lineNumber = this.file.findLine(entry, cursor) ?? sectionLine;
        cursor = lineNumber;

        const spec = parseRequirementSpec(entry);
        if (spec) {
          this.collector.add(requirementCandidate(spec, this.file.location(lineNumber, `${label}: ${entry}`, this.fileType)));
        }
      }
      return;
    }

    if (isRecord(deps)) {
      for (const [name, value] of Object.entries(deps)) {
        this.readTableEntry(name, value, label, sectionLine);
      }
    }
  }

  private readTableEntry(name: string, value: unknown, label: string, sectionLine: number): void {
    // Poetry's interpreter constraint, not a package
    if (name.toLowerCase() === 'python') return;

    const spec = isList(value) ? value[0] : value;
    const entryPattern = new RegExp(`^\\s*["']?${escapeRegExp(name)}["']?\\s*=`);
    const lineNumber = this.file.findLine(entryPattern, sectionLine) ?? sectionLine;

    if (typeof spec === 'string') {
      this.collector.add({
        name,
        version: spec.trim() || 'latest',
        ecosystem: 'pypi',
        location: this.file.location(lineNumber, `${label}.${name}: ${spec}`, this.fileType),
      });
      return;
    }

    if (!isRecord(spec)) return;

    if (spec['optional'] === true) {
      logger.debug(`Skipping optional dependency ${name}`, { file: this.file.path });
      return;
    }

    const rawExtras = spec['extras'];
    const extras = isList(rawExtras) ? rawExtras.filter((extra): extra is string => typeof extra === 'string') : [];

    this.collector.add({
      name,
      version: stringField(spec, 'version')?.trim() || 'latest',
      ecosystem: 'pypi',
      location: this.file.location(lineNumber, `${label}.${name}: ${describeTable(spec)}`, this.fileType),
      extras,
      environmentMarker: stringField(spec, 'markers'),
      editable: spec['develop'] === true || spec['editable'] === true,
      url: stringField(spec, 'git') ?? stringField(spec, 'url') ?? stringField(spec, 'path'),
    });
  }
}

function describeTable(spec: Record<string, unknown>): string {
  const parts = Object.entries(spec).map(([key, value]) => `${key} = ${JSON.stringify(value)}`);
  return `{ ${parts.join(', ')} }`;
}

function getPath(data: Record<string, unknown>, path: readonly string[]): unknown {
  let current: unknown = data;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

const SETUP_REQUIRES_KEYWORD = /["']?\b(install_requires|setup_requires)["']?\s*[=:]\s*\[/g;

/**
 * setup.py, scanned as text. Finds `install_requires=[...]` literals and reads
 * the quoted strings inside; the script is never evaluated, so requirements
 * built from variables or function calls are not seen. `setup_requires` is
 * build-only and discarded.
 */
export function parseSetupPy(file: SourceFile, policy: InclusionPolicy = DEFAULT_POLICY): Package[] {
  const collector = new PackageCollector(policy, 'python');
  const content = file.content;

  for (const match of content.matchAll(SETUP_REQUIRES_KEYWORD)) {
    const open = (match.index ?? 0) + match[0].length - 1;
    const close = findClosingBracket(content, open);
    if (close === -1) {
      throw new ParsingError(`Unterminated ${match[1]} list`, file.path, file.lineAt(open));
    }
    if (match[1] === 'setup_requires') continue;

    const body = blankComments(content.slice(open + 1, close));
    for (const literal of body.matchAll(/(["'])((?:\\.|(?!\1)[^\\\n])*)\1/g)) {
      const spec = parseRequirementSpec(literal[2] ?? '');
      if (!spec) continue;
      const lineNumber = file.lineAt(open + 1 + (literal.index ?? 0));
      collector.add(requirementCandidate(spec, file.location(lineNumber, file.line(lineNumber), 'setup-py')));
    }
  }

  return collector.packages;
}

/** `#` comments outside string literals replaced by spaces; offsets are unchanged. */
function blankComments(text: string): string {
  let result = '';
  let quote: string | undefined;

  for (let i = 0; i < text.length; i++) {
    const char = text[i] ?? '';

    if (quote) {
      result += char;
      if (char === '\\' && i + 1 < text.length) result += text[++i] ?? '';
      else if (char === quote || char === '\n') quote = undefined;
      continue;
    }

    if (char === '#') {
      const newline = text.indexOf('\n', i);
      const end = newline === -1 ? text.length : newline;
      result += ' '.repeat(end - i);
      i = end - 1;
      continue;
    }

    if (char === '"' || char === "'") quote = char;
    result += char;
  }

  return result;
}

/** Index of the `]` matching the `[` at `open`, skipping strings and comments; -1 if none. */
function findClosingBracket(content: string, open: number): number {
  let depth = 0;
  let quote: string | undefined;

  for (let i = open; i < content.length; i++) {
    const char = content[i];

    if (quote) {
      if (char === '\\') i++;
      else if (char === quote) quote = undefined;
      continue;
    }

    if (char === '"' || char === "'") quote = char;
    else if (char === '#') {
      const newline = content.indexOf('\n', i);
      if (newline === -1) return -1;
      i = newline;
    } else if (char === '[') depth++;
    else if (char === ']') {
      depth--;
      if (depth === 0) return i;
    }
  }

  return -1;
}

/**
 * setup.cfg: `install_requires` under `[options]`, either on the key's line or
 * as indented lines following it.
 */
export function parseSetupCfg(file: SourceFile, policy: InclusionPolicy = DEFAULT_POLICY): Package[] {
  const collector = new PackageCollector(policy, 'python');
  let section = '';
  let inInstallRequires = false;

  file.lines.forEach((raw, index) => {
    const lineNumber = index + 1;
    const line = raw.trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) return;

    const header = /^\[([^\]]+)\]$/.exec(line);
    if (header) {
      section = header[1]!.trim();
      inInstallRequires = false;
      return;
    }

    const indented = /^\s/.test(raw);
    if (inInstallRequires && !indented) inInstallRequires = false;

    if (section === 'options' && !indented) {
      const key = /^install_requires\s*[=:]\s*(.*)$/.exec(line);
      if (!key) return;
      inInstallRequires = true;
      addRequirement(key[1]!, lineNumber, raw);
      return;
    }

    if (inInstallRequires) addRequirement(line, lineNumber, raw);
  });

  function addRequirement(text: string, lineNumber: number, raw: string): void {
    const spec = parseRequirementSpec(text);
    if (spec) collector.add(requirementCandidate(spec, file.location(lineNumber, raw, 'setup-cfg')));
  }

  return collector.packages;
}

/**
 * Conda environment files. Plain entries are conda match specs
 * (`[channel::]name[=version[=build]]`); a nested `pip:` list holds
 * requirement strings.
 */
export function parseCondaEnvironment(file: SourceFile, policy: InclusionPolicy = DEFAULT_POLICY): Package[] {
  const doc = parseYamlDocument(file);
  const collector = new PackageCollector(policy, 'python');
  const dependencies = doc.get('dependencies', true);
  if (!isSeq(dependencies)) return collector.packages;

  for (const item of dependencies.items) {
    const value = yamlScalarValue(item);

    if (typeof value === 'string') {
      const spec = parseCondaSpec(value);
      if (!spec) continue;
      const lineNumber = yamlNodeLine(file, item);
      collector.add({
        name: spec.name,
        version: spec.version,
        ecosystem: 'conda',
        location: file.location(lineNumber, `dependencies: ${value}`, 'conda-environment'),
      });
      continue;
    }

    const pip = yamlMapEntries(item).find(entry => entry.key === 'pip');
    if (!pip || !isSeq(pip.value)) continue;

    for (const pipItem of pip.value.items) {
      const requirement = yamlScalarValue(pipItem);
      if (typeof requirement !== 'string') continue;
      const spec = parseRequirementSpec(requirement);
      if (!spec) continue;
      const lineNumber = yamlNodeLine(file, pipItem);
      collector.add(requirementCandidate(spec, file.location(lineNumber, `dependencies.pip: ${requirement}`, 'conda-environment')));
    }
  }

  return collector.packages;
}

interface CondaSpec {
  readonly name: string;
  readonly version: string;
}

export function parseCondaSpec(text: string): CondaSpec | undefined {
  let spec = text.trim();
  const channel = spec.indexOf('::');
  if (channel !== -1) spec = spec.slice(channel + 2);

  const match = /^([A-Za-z0-9_][A-Za-z0-9._-]*)\s*(.*)$/.exec(spec);
  if (!match) return undefined;

  const name = match[1]!;
  const rest = match[2]!.trim();
  if (!rest) return { name, version: 'latest' };

  let version: string;
  if (rest.startsWith('==')) {
    const exact = rest.slice(2).split(/[=\s]/)[0] ?? '';
    version = exact ? `==${exact}` : '';
  } else if (rest.startsWith('=')) {
    // numpy=1.21.0=py39h… → 1.21.0
    version = rest.slice(1).split(/[=\s]/)[0] ?? '';
  } else if (/^[<>!~]/.test(rest)) {
    version = firstConstraint(rest);
  } else {
    // `numpy 1.21 py39_0`
    version = rest.split(/\s+/)[0] ?? '';
  }

  return version ? { name, version } : undefined;
}
