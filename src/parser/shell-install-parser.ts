import { normalizeNpmVersion } from '../policy/version.js';
import type { PackageCandidate } from './package-builder.js';
import { parseRequirementSpec } from './requirements-parser.js';

/** A package named by an install command, not yet tied to a file location. */
export type InstalledPackage = Omit<PackageCandidate, 'location'>;

interface InstallManager {
  readonly id: string;
  /** Index of the first argument after the install subcommand, or undefined when `words` is not an install. */
  argumentStart(words: readonly string[]): number | undefined;
  /** Flags whose value is the following word. */
  readonly valueFlags: ReadonlySet<string>;
  parseArgument(word: string): InstalledPackage | undefined;
}

const ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=/;
const REDIRECTION_ONLY = /^(?:\d|&)?(?:>>?|<)$/;
const REDIRECTION = /^(?:\d|&)?[<>]/;

/**
 * Position of the subcommand: the first non-flag word after the program,
 * skipping the values of flags that take one.
 */
function subcommandAt(words: readonly string[], from: number, valueFlags: ReadonlySet<string>, subcommands: readonly string[]): number | undefined {
  for (let i = from; i < words.length; i++) {
    const word = words[i]!;
    if (word.startsWith('-')) {
      if (valueFlags.has(word)) i++;
      continue;
    }
    return subcommands.includes(word) ? i + 1 : undefined;
  }
  return undefined;
}

function programManager(
  id: string,
  programs: readonly string[],
  subcommands: readonly string[],
  valueFlags: readonly string[],
  parseArgument: (word: string) => InstalledPackage | undefined,
): InstallManager {
  const flags = new Set(valueFlags);
  return {
    id,
    valueFlags: flags,
    argumentStart: words => (programs.includes(words[0] ?? '') ? subcommandAt(words, 1, flags, subcommands) : undefined),
    parseArgument,
  };
}

function parseDebianArgument(word: string): InstalledPackage | undefined {
  const [spec = '', version] = splitOnce(word, '=');
  // `pkg/bookworm-backports` selects a release, not a version
  const name = spec.split('/')[0] ?? '';
  if (!/^[a-z0-9][a-z0-9+.-]*$/i.test(name)) return undefined;
  return { name, version: version || 'latest', ecosystem: 'debian' };
}

const RPM_VERSIONED = /^(.+?)-(\d[\w.+~:]*(?:-\d[\w.+~:]*)?)$/;

function parseRpmArgument(word: string): InstalledPackage | undefined {
  if (!/^[a-z0-9][\w+.-]*$/i.test(word)) return undefined;
  const versioned = RPM_VERSIONED.exec(word);
  if (versioned) return { name: versioned[1]!, version: versioned[2]!, ecosystem: 'rpm' };
  return { name: word, version: 'latest', ecosystem: 'rpm' };
}

const APK_CONSTRAINT = /^([^=~<>]+)(~=|>=|<=|=|~|>|<)(.+)$/;

function parseAlpineArgument(word: string): InstalledPackage | undefined {
  const constrained = APK_CONSTRAINT.exec(word);
  if (constrained) {
    const operator = constrained[2]!;
    const version = operator === '=' ? constrained[3]! : operator + constrained[3]!;
    return { name: constrained[1]!, version, ecosystem: 'alpine' };
  }
  if (!/^[a-z0-9][\w+.-]*$/i.test(word)) return undefined;
  return { name: word, version: 'latest', ecosystem: 'alpine' };
}

function parsePipArgument(word: string): InstalledPackage | undefined {
  const spec = parseRequirementSpec(word);
  if (!spec) return undefined;
  return {
    name: spec.name,
    version: spec.version,
    ecosystem: 'pypi',
    extras: spec.extras,
    environmentMarker: spec.environmentMarker,
    editable: spec.editable,
    url: spec.url,
  };
}

const NPM_NAME = /^(?:@[\w.-]+\/)?[\w.-]+$/;

function parseNpmArgument(word: string): InstalledPackage | undefined {
  const at = word.lastIndexOf('@');
  // A leading @ belongs to the scope
  const name = at > 0 ? word.slice(0, at) : word;
  const range = at > 0 ? word.slice(at + 1) : '';
  if (!NPM_NAME.test(name) || name.startsWith('.')) return undefined;
  return { name, version: range ? normalizeNpmVersion(range) : 'latest', ecosystem: 'npm' };
}

const PIP_VALUE_FLAGS = [
  '-i', '--index-url', '--extra-index-url', '-c', '--constraint', '-t', '--target',
  '--trusted-host', '-f', '--find-links', '--prefix', '--root', '--platform', '--python-version',
];

const PIP_MANAGER = programManager('pip', [], ['install'], PIP_VALUE_FLAGS, parsePipArgument);

const NPM_VALUE_FLAGS = ['--registry', '--prefix'];

const YARN_MANAGER = programManager('yarn', ['yarn'], ['add', 'global'], NPM_VALUE_FLAGS, parseNpmArgument);

export const INSTALL_MANAGERS: readonly InstallManager[] = [
  programManager('apt', ['apt-get', 'apt', 'aptitude'], ['install'], ['-o', '-t', '--target-release', '--option'], parseDebianArgument),
  programManager('rpm', ['yum', 'dnf', 'microdnf', 'zypper'], ['install', 'in'], ['--repository', '--setopt', '--enablerepo', '--disablerepo', '--installroot'], parseRpmArgument),
  programManager('apk', ['apk'], ['add'], ['--repository', '-X', '--virtual', '-t', '--root', '-p'], parseAlpineArgument),
  {
    ...PIP_MANAGER,
    argumentStart: words => {
      const program = words[0] ?? '';
      if (/^pip[\d.]*$/.test(program)) return subcommandAt(words, 1, PIP_MANAGER.valueFlags, ['install']);
      if (/^python[\d.]*$/.test(program) && words[1] === '-m' && words[2] === 'pip') {
        return subcommandAt(words, 3, PIP_MANAGER.valueFlags, ['install']);
      }
      return undefined;
    },
  },
  programManager('npm', ['npm'], ['install', 'i', 'add'], NPM_VALUE_FLAGS, parseNpmArgument),
  {
    ...YARN_MANAGER,
    argumentStart: words => {
      const start = YARN_MANAGER.argumentStart(words);
      // `yarn global add`; other `yarn global` commands install nothing
      if (start !== undefined && words[start - 1] === 'global') {
        return words[start] === 'add' ? start + 1 : undefined;
      }
      return start;
    },
  },
  programManager('pnpm', ['pnpm'], ['add', 'install'], NPM_VALUE_FLAGS, parseNpmArgument),
];

/**
 * Packages installed by a shell command line. The line is split at `&&`,
 * `||`, `;` and `|` and each segment is matched against the known package
 * managers on its own.
 */
export function parseInstallCommands(command: string): InstalledPackage[] {
  const installed: InstalledPackage[] = [];
  for (const segment of command.split(/&&|\|\||;|\|/)) {
    installed.push(...parseInstallSegment(segment));
  }
  return installed;
}

export function parseInstallSegment(segment: string): InstalledPackage[] {
  const words = commandWords(segment);
  for (const manager of INSTALL_MANAGERS) {
    const start = manager.argumentStart(words);
    if (start === undefined) continue;

    // Requirements-file installs are covered by parsing the file itself
    if (manager.id === 'pip' && words.some(isRequirementFlag)) return [];
    return installArguments(words.slice(start), manager.valueFlags)
      .map(word => manager.parseArgument(word))
      .filter((pkg): pkg is InstalledPackage => pkg !== undefined);
  }
  return [];
}

/** Words of a segment with quotes removed and leading `VAR=value` / `sudo` dropped. */
function commandWords(segment: string): string[] {
  const words = segment
    .trim()
    .split(/\s+/)
    .map(word => word.replace(/^["']+|["']+$/g, ''))
    .filter(Boolean);

  let start = 0;
  while (start < words.length && (ASSIGNMENT.test(words[start]!) || words[start] === 'sudo')) start++;
  return words.slice(start);
}

function installArguments(words: readonly string[], valueFlags: ReadonlySet<string>): string[] {
  const args: string[] = [];
  for (let i = 0; i < words.length; i++) {
    const word = words[i]!;
    if (REDIRECTION_ONLY.test(word)) {
      i++;
      continue;
    }
    if (word.startsWith('-')) {
      if (valueFlags.has(word)) i++;
      continue;
    }
    if (REDIRECTION.test(word) || word.includes('://') || /[$`()]/.test(word)) continue;
    args.push(word);
  }
  return args;
}

function isRequirementFlag(word: string): boolean {
  return word === '-r' || word === '--requirement' || word.startsWith('--requirement=') || /^-r\S/.test(word);
}

function splitOnce(text: string, separator: string): string[] {
  const index = text.indexOf(separator);
  if (index === -1) return [text];
  return [text.slice(0, index), text.slice(index + separator.length)];
}
