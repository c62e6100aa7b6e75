import { ParsingError } from '../errors.js';
import { DEFAULT_POLICY } from '../policy/inclusion-policy.js';
import type { InclusionPolicy } from '../policy/inclusion-policy.js';
import type { FileType, Package, PolicyScope } from '../types.js';
import { parseComposeFile } from './compose-parser.js';
import { parseDockerfile } from './dockerfile-parser.js';
import { parseNpmLock, parsePnpmLock, parseYarnLock } from './lockfile-parser.js';
import { parsePackageJson } from './package-json-parser.js';
import { parsePoetryLock, parseUvLock } from './python-lockfile-parser.js';
import {
  parseCondaEnvironment,
  parsePipfile,
  parsePyprojectToml,
  parseSetupCfg,
  parseSetupPy,
} from './python-manifest-parser.js';
import { parseRequirementsFile } from './requirements-parser.js';
import { readSourceFile } from './source-file.js';
import type { SourceFile } from './source-file.js';

export interface ManifestFormat {
  readonly fileType: FileType;
  readonly scope: PolicyScope;
  matches(fileName: string): boolean;
  parse(file: SourceFile, policy: InclusionPolicy): Package[];
}

function named(...names: string[]): (fileName: string) => boolean {
  const set = new Set(names);
  return fileName => set.has(fileName);
}

/** Checked in order; the first match wins. */
export const MANIFEST_FORMATS: readonly ManifestFormat[] = [
  {
    fileType: 'requirements',
    scope: 'python',
    matches: fileName => /^requirements.*\.txt$/i.test(fileName) || /requirements\.txt$/i.test(fileName),
    parse: (file, policy) => parseRequirementsFile(file, policy),
  },
  { fileType: 'pyproject-toml', scope: 'python', matches: named('pyproject.toml'), parse: parsePyprojectToml },
  { fileType: 'setup-py', scope: 'python', matches: named('setup.py'), parse: parseSetupPy },
  { fileType: 'setup-cfg', scope: 'python', matches: named('setup.cfg'), parse: parseSetupCfg },
  { fileType: 'pipfile', scope: 'python', matches: named('Pipfile'), parse: parsePipfile },
  { fileType: 'poetry-lock', scope: 'python', matches: named('poetry.lock'), parse: parsePoetryLock },
  { fileType: 'uv-lock', scope: 'python', matches: named('uv.lock'), parse: parseUvLock },
  {
    fileType: 'conda-environment',
    scope: 'python',
    matches: named('environment.yml', 'environment.yaml', 'conda.yml', 'conda.yaml'),
    parse: parseCondaEnvironment,
  },
  { fileType: 'package-json', scope: 'javascript', matches: named('package.json'), parse: parsePackageJson },
  { fileType: 'yarn-lock', scope: 'javascript', matches: named('yarn.lock'), parse: parseYarnLock },
  {
    fileType: 'npm-lock',
    scope: 'javascript',
    matches: named('package-lock.json', 'npm-shrinkwrap.json'),
    parse: parseNpmLock,
  },
  { fileType: 'pnpm-lock', scope: 'javascript', matches: named('pnpm-lock.yaml'), parse: parsePnpmLock },
  {
    fileType: 'dockerfile',
    scope: 'container',
    matches: fileName =>
      fileName === 'Dockerfile' ||
      fileName === 'dockerfile' ||
      fileName.startsWith('Dockerfile.') ||
      fileName.endsWith('.Dockerfile') ||
      fileName.endsWith('.dockerfile'),
    parse: parseDockerfile,
  },
  {
    fileType: 'docker-compose',
    scope: 'image',
    matches: fileName => /^docker-compose.*\.ya?ml$/.test(fileName) || /^compose\.ya?ml$/.test(fileName),
    parse: parseComposeFile,
  },
];

export function detectFormat(fileName: string): ManifestFormat | undefined {
  return MANIFEST_FORMATS.find(format => format.matches(fileName));
}

export function isManifestFile(fileName: string): boolean {
  return detectFormat(fileName) !== undefined;
}

/**
 * Route a file to its parser. Blank and comment-only files produce no
 * packages for every format; unknown file names are refused.
 */
export function parseManifest(file: SourceFile, policy: InclusionPolicy = DEFAULT_POLICY): Package[] {
  const format = detectFormat(file.name);
  if (!format) {
    throw new ParsingError(`Unsupported dependency file: ${file.name}`, file.path);
  }
  if (file.isBlank) return [];
  return format.parse(file, policy);
}

export function parseManifestFile(path: string, policy: InclusionPolicy = DEFAULT_POLICY): Package[] {
  return parseManifest(readSourceFile(path), policy);
}
