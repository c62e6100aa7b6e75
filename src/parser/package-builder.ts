import type { InclusionPolicy } from '../policy/inclusion-policy.js';
import type { Ecosystem, Package, PolicyScope, SourceLocation } from '../types.js';

export interface PackageCandidate {
  readonly name: string;
  readonly version: string;
  readonly ecosystem: Ecosystem;
  readonly location: SourceLocation;
  readonly extras?: readonly string[];
  readonly environmentMarker?: string;
  readonly editable?: boolean;
  readonly url?: string;
}

/**
 * Turn a candidate into a Package, or undefined when its name or version is
 * empty or the policy excludes it.
 */
export function buildPackage(
  candidate: PackageCandidate,
  policy: InclusionPolicy,
  scope: PolicyScope,
): Package | undefined {
  const name = candidate.name.trim();
  const version = candidate.version.trim();
  if (!name || !version) return undefined;
  if (!policy.includes(scope, name, version)) return undefined;

  return {
    name: normalizePackageName(name),
    version,
    ecosystem: candidate.ecosystem,
    sourceLocations: [candidate.location],
    extras: candidate.extras ?? [],
    environmentMarker: candidate.environmentMarker || undefined,
    editable: candidate.editable ?? false,
    url: candidate.url || undefined,
  };
}

export function normalizePackageName(name: string): string {
  return name.trim().toLowerCase();
}

/** Collects built packages, skipping rejected candidates. */
export class PackageCollector {
  readonly packages: Package[] = [];
  private readonly policy: InclusionPolicy;
  private readonly scope: PolicyScope;

  constructor(policy: InclusionPolicy, scope: PolicyScope) {
    this.policy = policy;
    this.scope = scope;
  }

  /** `scope` overrides the collector's own for a single candidate. */
  add(candidate: PackageCandidate, scope: PolicyScope = this.scope): void {
    const pkg = buildPackage(candidate, this.policy, scope);
    if (pkg) this.packages.push(pkg);
  }

  addAll(packages: readonly Package[]): void {
    this.packages.push(...packages);
  }
}
