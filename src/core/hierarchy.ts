/**
 * Target Hierarchy
 *
 * A static tree grouping KLib targets by platform family. Groups are used
 * as aliases when rendering merged dumps and as the search space when a
 * dump has to be inferred for a target the host cannot compile.
 */

import { Target } from './types';

// ─── Table ──────────────────────────────────────────────────────────────────

export interface HierarchyTable {
  name: string;
  children?: HierarchyTable[];
}

function group(name: string, ...children: HierarchyTable[]): HierarchyTable {
  return { name, children };
}

function leaves(...names: string[]): HierarchyTable[] {
  return names.map((name) => ({ name }));
}

export const DEFAULT_HIERARCHY_TABLE: HierarchyTable = group(
  'all',
  { name: 'js' },
  group('wasm', ...leaves('wasmJs', 'wasmWasi')),
  group(
    'native',
    group(
      'apple',
      group('macos', ...leaves('macosArm64', 'macosX64')),
      group('ios', ...leaves('iosArm64', 'iosSimulatorArm64', 'iosX64')),
      group('tvos', ...leaves('tvosArm64', 'tvosSimulatorArm64', 'tvosX64')),
      group(
        'watchos',
        ...leaves('watchosArm32', 'watchosArm64', 'watchosDeviceArm64', 'watchosSimulatorArm64', 'watchosX64')
      )
    ),
    group('linux', ...leaves('linuxArm64', 'linuxX64')),
    group('mingw', ...leaves('mingwX64')),
    group(
      'androidNative',
      ...leaves('androidNativeArm32', 'androidNativeArm64', 'androidNativeX64', 'androidNativeX86')
    )
  )
);

/**
 * Ancestors for target names missing from the tree (retired or future
 * targets), matched by the longest name prefix.
 */
export const DEFAULT_FALLBACK_PARENTS: ReadonlyArray<[prefix: string, group: string]> = [
  ['androidNative', 'androidNative'],
  ['linux', 'linux'],
  ['mingw', 'mingw'],
  ['macos', 'macos'],
  ['ios', 'ios'],
  ['tvos', 'tvos'],
  ['watchos', 'watchos'],
  ['wasm', 'wasm'],
  ['js', 'all'],
];

// ─── Hierarchy ──────────────────────────────────────────────────────────────

export interface HierarchyNode {
  readonly name: string;
  readonly parent: string | null;
  readonly children: readonly HierarchyNode[];
}

export class TargetHierarchy {
  readonly root: HierarchyNode;
  private readonly index = new Map<string, HierarchyNode>();
  private readonly leafSets = new Map<string, ReadonlySet<Target>>();
  private readonly fallbackParents: ReadonlyArray<[string, string]>;

  constructor(
    table: HierarchyTable = DEFAULT_HIERARCHY_TABLE,
    fallbackParents: ReadonlyArray<[string, string]> = DEFAULT_FALLBACK_PARENTS
  ) {
    this.root = this.build(table, null);
    this.fallbackParents = [...fallbackParents].sort((a, b) => b[0].length - a[0].length);
  }

  private build(table: HierarchyTable, parent: string | null): HierarchyNode {
    if (this.index.has(table.name)) {
      throw new Error(`Duplicate target hierarchy entry: "${table.name}"`);
    }
    const children: HierarchyNode[] = [];
    const node: HierarchyNode = { name: table.name, parent, children };
    this.index.set(table.name, node);

    for (const child of table.children ?? []) {
      children.push(this.build(child, table.name));
    }

    const leafSet = new Set<Target>();
    if (children.length === 0) {
      leafSet.add(table.name);
    } else {
      for (const child of children) {
        for (const t of this.leafSets.get(child.name) ?? []) leafSet.add(t);
      }
    }
    this.leafSets.set(table.name, leafSet);
    return node;
  }

  /**
   * Transitive leaf targets of a group; `{name}` for a leaf, empty when unknown.
   */
  targets(name: string): ReadonlySet<Target> {
    return this.leafSets.get(name) ?? new Set<Target>();
  }

  /**
   * Immediate ancestor group. Unknown names are treated as leaves whose
   * parent comes from the fallback prefix table.
   */
  parent(name: string): string | null {
    const node = this.index.get(name);
    if (node) return node.parent;

    for (const [prefix, ancestor] of this.fallbackParents) {
      if (name.startsWith(prefix)) return ancestor;
    }
    return null;
  }

  /** Names of every group (non-leaf) node. */
  nonLeafTargets(): Set<string> {
    const result = new Set<string>();
    for (const node of this.index.values()) {
      if (node.children.length > 0) result.add(node.name);
    }
    return result;
  }

  /** Group names in pre-order: every group comes before its subgroups. */
  groups(): string[] {
    const result: string[] = [];
    const visit = (node: HierarchyNode): void => {
      if (node.children.length === 0) return;
      result.push(node.name);
      node.children.forEach(visit);
    };
    visit(this.root);
    return result;
  }

  isGroup(name: string): boolean {
    const node = this.index.get(name);
    return node !== undefined && node.children.length > 0;
  }
}

export const DEFAULT_TARGET_HIERARCHY = new TargetHierarchy();
