import { normalizePackageName } from '../parser/package-builder.js';
import type { Package, SourceLocation } from '../types.js';

function mergeKey(pkg: Package): string {
  return `${normalizePackageName(pkg.name)}\u0000${pkg.version}`;
}

function locationKey(location: SourceLocation): string {
  return `${location.filePath}:${location.lineNumber}`;
}

interface Entry {
  readonly first: Package;
  readonly locations: SourceLocation[];
  readonly seen: Set<string>;
}

/**
 * De-duplicated package set keyed by (normalized name, version). Records
 * sharing a key are combined into one whose locations are the union, in the
 * order they were added; the first record's ecosystem and modifiers are kept.
 * Input records are never mutated.
 */
export class PackageInventory {
  private readonly entries = new Map<string, Entry>();

  get size(): number {
    return this.entries.size;
  }

  add(pkg: Package): void {
    const key = mergeKey(pkg);
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { first: pkg, locations: [], seen: new Set() };
      this.entries.set(key, entry);
    }

    for (const location of pkg.sourceLocations) {
      const id = locationKey(location);
      if (entry.seen.has(id)) continue;
      entry.seen.add(id);
      entry.locations.push(location);
    }
  }

  addAll(packages: Iterable<Package>): void {
    for (const pkg of packages) this.add(pkg);
  }

  /** Merged records in first-seen key order. */
  toArray(): Package[] {
    return [...this.entries.values()].map(({ first, locations }) => ({
      ...first,
      name: normalizePackageName(first.name),
      sourceLocations: [...locations],
    }));
  }
}

export function mergePackages(lists: Iterable<readonly Package[]>): Package[] {
  const inventory = new PackageInventory();
  for (const list of lists) inventory.addAll(list);
  return inventory.toArray();
}
