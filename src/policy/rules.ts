import type { PolicyScope } from '../types.js';

export interface ExclusionRule {
  readonly id: string;
  readonly description: string;
  /** Receives the lower-cased package name. */
  matches(name: string): boolean;
}

export interface ScopeRules {
  readonly scope: PolicyScope;
  /** Names kept even when an exclusion rule matches them. */
  readonly allowList: ReadonlySet<string>;
  readonly rules: readonly ExclusionRule[];
}

function substringRule(id: string, description: string, patterns: readonly string[]): ExclusionRule {
  return {
    id,
    description,
    matches: name => patterns.some(pattern => name.includes(pattern)),
  };
}

function exactRule(id: string, description: string, names: readonly string[]): ExclusionRule {
  const set = new Set(names);
  return {
    id,
    description,
    matches: name => set.has(name),
  };
}

function prefixRule(id: string, description: string, prefixes: readonly string[]): ExclusionRule {
  return {
    id,
    description,
    matches: name => prefixes.some(prefix => name.startsWith(prefix)),
  };
}

/**
 * Substring match, so it also catches real packages such as `pytest-cov` or
 * `libpq-dev`. Scope allow-lists and the `allowPackages` setting override it.
 */
export const DEV_INDICATOR_RULE = substringRule(
  'dev-indicator',
  'Name looks like a development, test, mock or demo package',
  ['test', 'dev', 'debug', 'mock', 'stub', 'example', 'sample', 'demo'],
);

export const PYTHON_RULES: ScopeRules = {
  scope: 'python',
  allowList: new Set(['coverage', 'tox', 'setuptools', 'wheel', 'twine', 'build']),
  rules: [
    DEV_INDICATOR_RULE,
    exactRule('python-lint-tool', 'Code formatter or linter', ['black', 'flake8', 'mypy', 'pylint', 'pre-commit']),
  ],
};

export const JAVASCRIPT_RULES: ScopeRules = {
  scope: 'javascript',
  allowList: new Set(),
  rules: [
    DEV_INDICATOR_RULE,
    exactRule('js-build-tool', 'Bundler, compiler, linter or test framework', [
      'webpack', 'babel', 'eslint', 'prettier', 'jest', 'mocha',
      'chai', 'sinon', 'karma', 'jasmine', 'typescript', 'ts-node',
      'nodemon', 'concurrently', 'cross-env', 'rimraf', 'husky',
      'lint-staged', 'parcel', 'rollup', 'vite',
    ]),
    prefixRule('type-definitions', 'Type-only package', ['@types/']),
    substringRule('bundler-plugin', 'Bundler, compiler or linter plugin', [
      'webpack-', 'babel-', 'eslint-', '@babel/', '@webpack/',
    ]),
  ],
};

export const CONTAINER_RULES: ScopeRules = {
  scope: 'container',
  allowList: new Set(),
  rules: [
    DEV_INDICATOR_RULE,
    exactRule('container-utility', 'Common image utility or toolchain package', [
      'curl', 'wget', 'ca-certificates', 'gnupg', 'lsb-release',
      'apt-transport-https', 'software-properties-common',
      'build-essential', 'make', 'gcc', 'g++', 'git', 'sudo',
    ]),
  ],
};

/**
 * Base images. Only the repository's last path segment is matched, so a
 * registry host such as `registry.dev.example.io` never excludes an image.
 */
export const IMAGE_RULES: ScopeRules = {
  scope: 'image',
  allowList: new Set(),
  rules: [
    {
      id: 'placeholder-image',
      description: 'Empty or shell-only base image',
      matches: name => ['scratch', 'busybox'].includes(name.slice(name.lastIndexOf('/') + 1)),
    },
  ],
};

export const ALL_SCOPE_RULES: Readonly<Record<PolicyScope, ScopeRules>> = {
  python: PYTHON_RULES,
  javascript: JAVASCRIPT_RULES,
  container: CONTAINER_RULES,
  image: IMAGE_RULES,
};
