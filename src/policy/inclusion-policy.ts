import { logger } from '../logger.js';
import type { PolicyScope } from '../types.js';
import { ALL_SCOPE_RULES } from './rules.js';
import type { ScopeRules } from './rules.js';

const MAX_NAME_LENGTH = 214;

export interface PolicyOverrides {
  readonly ignorePackages?: readonly string[];
  readonly allowPackages?: readonly string[];
}

/**
 * Decides whether a discovered name/version pair is reported. Every parser
 * asks this before it creates a Package.
 */
export class InclusionPolicy {
  private readonly scopes: Readonly<Record<PolicyScope, ScopeRules>>;
  private readonly ignored: ReadonlySet<string>;
  private readonly allowed: ReadonlySet<string>;

  constructor(overrides: PolicyOverrides = {}, scopes: Readonly<Record<PolicyScope, ScopeRules>> = ALL_SCOPE_RULES) {
    this.scopes = scopes;
    this.ignored = new Set((overrides.ignorePackages ?? []).map(name => name.trim().toLowerCase()));
    this.allowed = new Set((overrides.allowPackages ?? []).map(name => name.trim().toLowerCase()));
  }

  includes(scope: PolicyScope, name: string, version: string): boolean {
    if (!isPlausibleName(name) || !version.trim()) return false;

    const reason = this.explain(scope, name);
    if (reason) {
      logger.debug(`Excluding ${name}@${version}`, { scope, rule: reason });
      return false;
    }
    return true;
  }

  /**
   * Id of the rule that excludes `name` in `scope`, or undefined when the
   * name would be reported. Version validity is not considered.
   */
  explain(scope: PolicyScope, name: string): string | undefined {
    const normalized = name.trim().toLowerCase();

    if (this.ignored.has(normalized)) return 'ignored-by-config';

    const rules = this.scopes[scope];
    if (this.allowed.has(normalized) || rules.allowList.has(normalized)) return undefined;

    return rules.rules.find(rule => rule.matches(normalized))?.id;
  }
}

function isPlausibleName(name: string): boolean {
  const trimmed = name.trim();
  return trimmed.length > 0 && trimmed.length <= MAX_NAME_LENGTH && /[a-z0-9]/i.test(trimmed);
}

export const DEFAULT_POLICY = new InclusionPolicy();
