/**
 * Group Alias Compression
 *
 * Rewrites a target set as the smallest list of hierarchy groups and leftover
 * targets that expands back to exactly the same set.
 */

import { Target } from './types';
import { DEFAULT_TARGET_HIERARCHY, TargetHierarchy } from './hierarchy';

export function sortTargets(targets: Iterable<Target>): Target[] {
  return [...targets].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export class GroupAliasCompressor {
  constructor(private readonly hierarchy: TargetHierarchy = DEFAULT_TARGET_HIERARCHY) {}

  /**
   * Aliases are ambiguous when a real target carries a group's name.
   */
  canUseGroupAliases(targets: Iterable<Target>): boolean {
    const groups = this.hierarchy.nonLeafTargets();
    for (const t of targets) {
      if (groups.has(t)) return false;
    }
    return true;
  }

  /**
   * Sorted list of group names and targets covering `targets` exactly.
   * Groups are tried top-down so the largest fully covered group wins;
   * single-target groups are never used.
   */
  compress(targets: Iterable<Target>): string[] {
    const remaining = new Set(targets);
    const tokens: string[] = [];

    for (const group of this.hierarchy.groups()) {
      const members = this.hierarchy.targets(group);
      if (members.size > 1 && [...members].every((t) => remaining.has(t))) {
        tokens.push(group);
        for (const t of members) remaining.delete(t);
      }
    }
    return sortTargets([...tokens, ...remaining]);
  }

  /** Leaf targets of an alias, or an empty set when it is not a group. */
  expand(alias: string): ReadonlySet<Target> {
    return this.hierarchy.isGroup(alias) ? this.hierarchy.targets(alias) : new Set<Target>();
  }
}
