import { DEFAULT_POLICY } from '../policy/inclusion-policy.js';
import type { InclusionPolicy } from '../policy/inclusion-policy.js';
import type { Package } from '../types.js';
import { PackageCollector } from './package-builder.js';
import { parseInstallCommands } from './shell-install-parser.js';
import { isList } from './source-file.js';
import type { SourceFile } from './source-file.js';

/** One logical Dockerfile instruction, continuations joined. */
export interface DockerInstruction {
  /** Upper-cased, e.g. `FROM`. */
  readonly keyword: string;
  readonly args: string;
  /** First physical line. */
  readonly lineNumber: number;
  readonly text: string;
}

export interface ImageReference {
  readonly name: string;
  /** Tag, else digest, else `latest`. */
  readonly version: string;
}

/**
 * Split `[registry[:port]/]name[:tag][@digest]`. A colon only starts a tag
 * when it comes after the last slash, so registry ports are left alone.
 * Returns undefined for `scratch` and references with unresolved variables.
 */
export function parseImageReference(spec: string): ImageReference | undefined {
  let image = spec.trim();
  if (!image || image.includes('$')) return undefined;

  let digest: string | undefined;
  const at = image.indexOf('@');
  if (at !== -1) {
    digest = image.slice(at + 1);
    image = image.slice(0, at);
  }

  let tag: string | undefined;
  const colon = image.lastIndexOf(':');
  if (colon > image.lastIndexOf('/')) {
    tag = image.slice(colon + 1);
    image = image.slice(0, colon);
  }

  if (!image || image.toLowerCase() === 'scratch') return undefined;
  return { name: image, version: tag || digest || 'latest' };
}

/**
 * Logical instructions of a Dockerfile. Lines ending in a backslash continue
 * onto the next; comment and blank lines inside a continuation are dropped.
 */
export function readInstructions(file: SourceFile): DockerInstruction[] {
  const instructions: DockerInstruction[] = [];
  let parts: string[] = [];
  let startLine = 0;

  const flush = (): void => {
    const text = parts.join(' ').trim();
    parts = [];
    if (!text) return;
    const [keyword = '', ...rest] = text.split(/\s+/);
    instructions.push({ keyword: keyword.toUpperCase(), args: rest.join(' '), lineNumber: startLine, text });
  };

  file.lines.forEach((raw, index) => {
    const trimmed = raw.trim();
    const continuing = parts.length > 0;
    if (!trimmed || trimmed.startsWith('#')) return;

    if (!continuing) startLine = index + 1;

    if (trimmed.endsWith('\\')) {
      parts.push(trimmed.slice(0, -1).trim());
      return;
    }
    parts.push(trimmed);
    flush();
  });
  flush();

  return instructions;
}

/**
 * Base images from `FROM` and packages installed by `RUN` commands. `ARG`
 * defaults declared earlier in the file are substituted into `FROM`; stage
 * aliases are not reported as images.
 */
export function parseDockerfile(file: SourceFile, policy: InclusionPolicy = DEFAULT_POLICY): Package[] {
  const collector = new PackageCollector(policy, 'container');
  const buildArgs = new Map<string, string>();
  const stages = new Set<string>();

  for (const instruction of readInstructions(file)) {
    const location = file.location(instruction.lineNumber, instruction.text, 'dockerfile');

    switch (instruction.keyword) {
      case 'ARG':
        for (const [name, value] of argDefaults(instruction.args)) buildArgs.set(name, value);
        break;

      case 'FROM': {
        const words = instruction.args.split(/\s+/).filter(word => !word.startsWith('--'));
        const image = substituteArgs(words[0] ?? '', buildArgs);
        const alias = words[1]?.toLowerCase() === 'as' ? words[2] : undefined;

        const reference = stages.has(image.toLowerCase()) ? undefined : parseImageReference(image);
        if (reference) {
          collector.add({ ...reference, ecosystem: 'docker', location }, 'image');
        }
        if (alias) stages.add(alias.toLowerCase());
        break;
      }

      case 'RUN':
        for (const installed of parseInstallCommands(shellCommand(instruction.args))) {
          collector.add({ ...installed, location });
        }
        break;
    }
  }

  return collector.packages;
}

function argDefaults(args: string): Array<[string, string]> {
  const defaults: Array<[string, string]> = [];
  for (const word of args.split(/\s+/)) {
    const match = /^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/.exec(word);
    if (match) defaults.push([match[1]!, match[2]!.replace(/^["']|["']$/g, '')]);
  }
  return defaults;
}

/** Replace `$NAME`, `${NAME}` and `${NAME:-default}`; unknown names stay as written. */
function substituteArgs(text: string, buildArgs: ReadonlyMap<string, string>): string {
  return text.replace(
    /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::?-([^}]*))?\}|\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (whole: string, braced: string | undefined, fallback: string | undefined, bare: string | undefined) => {
      const value = buildArgs.get(braced ?? bare ?? '');
      return value ?? fallback ?? whole;
    },
  );
}

/** Exec form `["apt-get", "install", "x"]` becomes a plain command line. */
function shellCommand(args: string): string {
  if (!args.startsWith('[')) return args;
  let parsed: unknown;
  try {
    parsed = JSON.parse(args);
  } catch {
    return args;
  }
  return isList(parsed) ? parsed.filter((part): part is string => typeof part === 'string').join(' ') : args;
}
