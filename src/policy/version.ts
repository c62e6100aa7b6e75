// Longest first so `>=` is never split as `>`.
export const PYTHON_OPERATORS: readonly string[] = ['===', '~=', '==', '!=', '<=', '>=', '<', '>'];

const STRIP_PREFIXES: readonly string[] = ['>=', '<=', '==', '!=', '~=', '>', '<', '^', '~'];

const NPM_RANGE_PREFIXES: readonly string[] = ['^', '~', '>=', '<=', '>', '<', '='];

const NPM_TAGS: ReadonlySet<string> = new Set(['latest', 'next', 'beta', 'alpha', 'canary']);

/**
 * Bare version for comparison: leading operators removed, anything after an
 * environment-marker `;` dropped, surrounding quotes stripped.
 */
export function normalizeVersion(version: string): string {
  let result = version.trim();

  for (const prefix of STRIP_PREFIXES) {
    if (result.startsWith(prefix)) {
      result = result.slice(prefix.length).trim();
    }
  }

  const semicolon = result.indexOf(';');
  if (semicolon !== -1) {
    result = result.slice(0, semicolon).trim();
  }

  return result.replace(/^["']+|["']+$/g, '');
}

/** `>=1.0,<2.0` → `>=1.0` */
export function firstConstraint(constraint: string): string {
  return (constraint.split(',')[0] ?? '').trim();
}

export interface PythonConstraint {
  readonly name: string;
  readonly operator: string;
  /** Everything after the operator, untrimmed of further constraints. */
  readonly rest: string;
}

/**
 * Split `name<op>rest` at the earliest operator position, preferring the
 * longest operator there. Returns undefined when no operator is present.
 */
export function splitPythonConstraint(spec: string): PythonConstraint | undefined {
  let index = -1;
  let operator = '';

  for (const op of PYTHON_OPERATORS) {
    const at = spec.indexOf(op);
    if (at === -1) continue;
    if (index === -1 || at < index || (at === index && op.length > operator.length)) {
      index = at;
      operator = op;
    }
  }

  if (index === -1) return undefined;
  return {
    name: spec.slice(0, index),
    operator,
    rest: spec.slice(index + operator.length),
  };
}

/**
 * Reduce an npm range to the first version it names.
 *
 *   ^4.17.20           → 4.17.20
 *   1.2.3 - 2.0.0      → 1.2.3
 *   ^1.0.0 || ^2.0.0   → 1.0.0
 *   git+https://…      → git
 *   file:../lib        → local
 */
export function normalizeNpmVersion(spec: string): string {
  let version = spec.trim();

  if (version.startsWith('file:') || version.startsWith('link:')) return 'local';
  if (isVcsSpec(version)) return 'git';
  if (NPM_TAGS.has(version)) return version;

  for (const prefix of NPM_RANGE_PREFIXES) {
    if (version.startsWith(prefix)) {
      version = version.slice(prefix.length).trim();
      break;
    }
  }

  if (version.includes(' - ')) {
    version = (version.split(' - ')[0] ?? '').trim();
  } else if (version.includes('||')) {
    version = (version.split('||')[0] ?? '').trim();
  }

  // `1.0.0 <2.0.0` keeps the lower bound
  const space = version.search(/\s/);
  if (space !== -1) {
    version = version.slice(0, space);
  }

  return version;
}

function isVcsSpec(spec: string): boolean {
  if (/^(git\+|git:|github:|gitlab:|bitbucket:|https?:)/.test(spec)) return true;
  // owner/repo shorthand, optionally with a #ref
  return /^[\w.-]+\/[\w.-]+(#.*)?$/.test(spec) && !spec.startsWith('.');
}
