/**
 * ABI Dump Merger
 *
 * Combines single-target dumps into one multi-target document in which every
 * declaration knows the targets it exists on, projects that document down to
 * common or target-specific declarations, and renders it back to text.
 *
 * Declarations live in an arena addressed by index. Index 0 is a synthetic
 * root whose target set is the set of targets known to the document. Each
 * declaration remembers its position among the siblings of every target's
 * dump, so that sibling order agrees with each target's own dump.
 */

import {
  AbiDumpFormat,
  DeclarationEntry,
  DumpHeader,
  DumpSink,
  DumpSourceFormat,
  MergerState,
  RenderingSetting,
  Target,
} from './types';
import { ConflictError, ParseError, RenderError } from './errors';
import { GroupAliasCompressor, sortTargets } from './aliases';
import { DEFAULT_TARGET_HIERARCHY, TargetHierarchy } from './hierarchy';
import {
  ALIAS_PREFIX,
  DUMP_MARKER,
  INDENT,
  ParsedDeclaration,
  SETTING_PREFIX,
  SETTINGS_MARKER,
  TARGETS_PREFIX,
  TARGETS_SUFFIX,
  UNIQUE_NAME_PREFIX,
  formatTargetList,
  parseDump,
} from './parser';

// ─── Arena ──────────────────────────────────────────────────────────────────

const ROOT = 0;
const TARGET_NAME = /^[^\s,[\]]+$/;

interface DeclarationRecord {
  readonly signature: string;
  readonly opensBlock: boolean;
  readonly children: number[];
  readonly childIndex: Map<string, number>;
  targets: Set<Target>;
  /** Position among its siblings in each target's dump. */
  order: Map<Target, number>;
}

function createRecord(
  signature: string,
  opensBlock: boolean,
  targets: Iterable<Target> = []
): DeclarationRecord {
  return {
    signature,
    opensBlock,
    children: [],
    childIndex: new Map(),
    targets: new Set(targets),
    order: new Map(),
  };
}

function sameSettings(a: RenderingSetting[], b: RenderingSetting[]): boolean {
  return a.length === b.length && a.every((s, i) => s.key === b[i].key && s.value === b[i].value);
}

function assertTargetName(target: Target): void {
  if (!TARGET_NAME.test(target)) {
    throw new Error(`Invalid target name "${target}"`);
  }
}

export interface AbiDumpMergerOptions {
  /** Hierarchy used for group aliases (default: the built-in KLib hierarchy) */
  hierarchy?: TargetHierarchy;
}

// ─── Merger ─────────────────────────────────────────────────────────────────

export class AbiDumpMerger {
  private nodes: DeclarationRecord[] = [createRecord('', false)];
  private header: DumpHeader = { uniqueName: null, settings: [] };
  private currentState: MergerState = 'empty';
  private format: DumpSourceFormat | null = null;
  private readonly hierarchy: TargetHierarchy;
  private readonly aliases: GroupAliasCompressor;

  constructor(options: AbiDumpMergerOptions = {}) {
    this.hierarchy = options.hierarchy ?? DEFAULT_TARGET_HIERARCHY;
    this.aliases = new GroupAliasCompressor(this.hierarchy);
  }

  get state(): MergerState {
    return this.currentState;
  }

  /** Format of the text that populated this merger: per-target dumps or a merged dump. */
  get sourceFormat(): DumpSourceFormat | null {
    return this.format;
  }

  /** Known targets, sorted. */
  get targets(): Target[] {
    return sortTargets(this.known);
  }

  get uniqueName(): string | null {
    return this.header.uniqueName;
  }

  /** True when the document holds no declarations (it may still know targets). */
  get isEmpty(): boolean {
    return this.nodes[ROOT].children.length === 0;
  }

  private get known(): Set<Target> {
    return this.nodes[ROOT].targets;
  }

  private set known(targets: Set<Target>) {
    this.nodes[ROOT].targets = targets;
  }

  // ─── Population ─────────────────────────────────────────────────────────

  /**
   * Merge a single-target dump into the document.
   */
  addIndividualDump(target: Target, source: string): void {
    assertTargetName(target);
    const parsed = parseDump(source);

    if (parsed.targets !== null || parsed.aliases.size > 0) {
      throw new ParseError(`The dump for target ${target} carries a targets header; expected a single-target dump`);
    }
    if (this.known.has(target)) {
      throw new ConflictError(`A dump for target ${target} has already been added`);
    }
    const header = this.combineHeader(parsed.header, target);
    this.validateIndividual(parsed.declarations, target);

    this.mergeIndividual(ROOT, parsed.declarations, target);
    this.known.add(target);
    this.header = header;
    this.format = this.format ?? 'individual';
    if (this.currentState === 'empty') this.currentState = 'populated';
  }

  private combineHeader(incoming: DumpHeader, target: Target): DumpHeader {
    const { uniqueName, settings } = this.header;

    if (uniqueName !== null && incoming.uniqueName !== null && uniqueName !== incoming.uniqueName) {
      throw new ConflictError(
        `The dump for target ${target} belongs to library "${incoming.uniqueName}", ` +
          `but previous dumps belong to "${uniqueName}"`
      );
    }
    if (settings.length > 0 && incoming.settings.length > 0 && !sameSettings(settings, incoming.settings)) {
      throw new ConflictError(`The dump for target ${target} was rendered with different settings`);
    }

    return {
      uniqueName: uniqueName ?? incoming.uniqueName,
      settings: settings.length > 0 ? settings : [...incoming.settings],
    };
  }

  private validateIndividual(declarations: ParsedDeclaration[], target: Target): void {
    const seen = new Set<string>();
    for (const decl of declarations) {
      if (decl.targets !== null) {
        throw new ParseError('Target annotations are not allowed in a single-target dump', decl.line);
      }
      if (seen.has(decl.signature)) {
        throw new ConflictError(
          `Declaration "${decl.signature}" appears twice in the dump for target ${target} (line ${decl.line})`
        );
      }
      seen.add(decl.signature);
      this.validateIndividual(decl.children, target);
    }
  }

  private mergeIndividual(parentId: number, declarations: ParsedDeclaration[], target: Target): void {
    let previous: number | null = null;
    for (const [position, decl] of declarations.entries()) {
      const id = this.findOrInsert(parentId, decl.signature, decl.opensBlock, previous);
      const record = this.nodes[id];
      record.targets.add(target);
      record.order.set(target, position);
      this.mergeIndividual(id, decl.children, target);
      previous = id;
    }
    this.reorder(parentId);
  }

  /**
   * Load a previously rendered multi-target dump. Group aliases are expanded
   * through the hierarchy.
   */
  loadMergedDump(source: string): void {
    if (this.currentState !== 'empty') {
      throw new Error('A merged dump can only be loaded into an empty merger');
    }
    const parsed = parseDump(source);

    if (parsed.targets === null) {
      throw new ParseError('The merged dump has no targets header');
    }
    if (parsed.targets.length === 0) {
      throw new ParseError('The merged dump declares no targets');
    }
    const headerTargets = new Set<Target>();
    for (const t of parsed.targets) {
      if (!TARGET_NAME.test(t) || headerTargets.has(t)) {
        throw new ParseError(`Invalid or duplicate target "${t}" in the targets header`);
      }
      headerTargets.add(t);
    }

    for (const [alias, members] of parsed.aliases) {
      const expected = this.aliases.expand(alias);
      if (expected.size === 0) {
        throw new ParseError(`Unknown target group alias "${alias}"`);
      }
      if (members.length !== expected.size || !members.every((m) => expected.has(m))) {
        throw new ParseError(
          `Alias "${alias}" lists ${formatTargetList(members)}, ` +
            `but the group consists of ${formatTargetList(sortTargets(expected))}`
        );
      }
    }

    try {
      this.known = headerTargets;
      this.loadMerged(ROOT, parsed.declarations, headerTargets);
    } catch (error) {
      this.nodes = [createRecord('', false)];
      throw error;
    }

    this.header = { uniqueName: parsed.header.uniqueName, settings: [...parsed.header.settings] };
    this.format = 'merged';
    this.currentState = 'populated';
  }

  private loadMerged(parentId: number, declarations: ParsedDeclaration[], parentTargets: Set<Target>): void {
    const headerTargets = this.known;
    let previous: number | null = null;

    for (const [position, decl] of declarations.entries()) {
      if (decl.targets === null) {
        throw new ParseError('Declaration has no target annotation', decl.line);
      }
      if (decl.targets.length === 0) {
        throw new ParseError('Declaration has an empty target annotation', decl.line);
      }

      const targets = new Set<Target>();
      for (const entry of decl.targets) {
        if (headerTargets.has(entry)) {
          targets.add(entry);
          continue;
        }
        const expanded = this.aliases.expand(entry);
        if (expanded.size === 0) {
          throw new ParseError(`Unknown target or alias "${entry}"`, decl.line);
        }
        for (const t of expanded) {
          if (!headerTargets.has(t)) {
            throw new ParseError(`Alias "${entry}" covers ${t}, which is missing from the targets header`, decl.line);
          }
          targets.add(t);
        }
      }

      for (const t of targets) {
        if (!parentTargets.has(t)) {
          throw new ParseError(`Declaration is annotated with ${t}, but its enclosing declaration is not`, decl.line);
        }
      }
      if (this.nodes[parentId].childIndex.has(decl.signature)) {
        throw new ParseError(`Duplicate declaration "${decl.signature}"`, decl.line);
      }

      const id = this.findOrInsert(parentId, decl.signature, decl.opensBlock, previous);
      const record = this.nodes[id];
      record.targets = targets;
      for (const t of targets) record.order.set(t, position);
      this.loadMerged(id, decl.children, targets);
      previous = id;
    }
  }

  // ─── Projection ─────────────────────────────────────────────────────────

  /**
   * Keep only declarations present on every known target.
   */
  retainCommonAbi(): void {
    this.requirePopulated('retain the common ABI');
    const known = this.known;
    this.rebuild((_, record) => this.coversAll(record, known));
    this.currentState = 'projected';
  }

  /**
   * Keep only declarations that exist on `target` but not on every known
   * target, together with the declarations enclosing them, all narrowed to
   * `target`.
   */
  retainTargetSpecificAbi(target: Target): void {
    this.requirePopulated('retain a target-specific ABI');
    assertTargetName(target);
    const known = this.known;
    const kept = new Set<number>();

    if (known.has(target)) {
      const mark = (id: number): boolean => {
        let hasKeptChild = false;
        for (const child of this.nodes[id].children) {
          if (mark(child)) hasKeptChild = true;
        }
        const record = this.nodes[id];
        const specific = record.targets.has(target) && !this.coversAll(record, known);
        if (specific || hasKeptChild) kept.add(id);
        return specific || hasKeptChild;
      };
      for (const child of this.nodes[ROOT].children) mark(child);
    }

    const narrowed = new Set([target]);
    this.rebuild((id) => kept.has(id), narrowed);
    this.known = new Set(narrowed);
    this.currentState = 'projected';
  }

  /**
   * Splice the declarations of a single-target merger into this one.
   */
  mergeTargetSpecific(other: AbiDumpMerger): void {
    this.requirePopulated('merge target-specific declarations');
    if (other === this) {
      throw new Error('A merger cannot be merged into itself');
    }
    if (other.known.size !== 1) {
      throw new Error(
        `Expected a dump reduced to a single target, got targets ${formatTargetList(other.targets)}`
      );
    }

    const copy = (otherId: number, thisId: number): void => {
      let previous: number | null = null;
      for (const childId of other.nodes[otherId].children) {
        const child = other.nodes[childId];
        const id = this.findOrInsert(thisId, child.signature, child.opensBlock, previous);
        const record = this.nodes[id];
        for (const t of child.targets) record.targets.add(t);
        for (const [t, position] of child.order) record.order.set(t, position);
        copy(childId, id);
        previous = id;
      }
      this.reorder(thisId);
    };
    copy(ROOT, ROOT);

    for (const t of other.known) this.known.add(t);
  }

  /**
   * Attribute every declaration, at every depth, to exactly `newTargets`.
   */
  overrideTargets(newTargets: Iterable<Target>): void {
    this.requirePopulated('override targets');
    const next = new Set(newTargets);
    if (next.size === 0) {
      throw new Error('Cannot override targets with an empty target set');
    }
    next.forEach(assertTargetName);

    for (const record of this.nodes) {
      record.targets = new Set(next);
      record.children.forEach((childId, position) => {
        this.nodes[childId].order = new Map([...next].map((t): [Target, number] => [t, position]));
      });
    }
  }

  /**
   * Forget the given targets; declarations left without targets are dropped.
   */
  removeTargets(targets: Iterable<Target>): void {
    this.requirePopulated('remove targets');
    const removed = new Set(targets);

    for (const record of this.nodes) {
      for (const t of removed) record.targets.delete(t);
    }
    this.rebuild((_, record) => record.targets.size > 0);
    this.currentState = this.known.size === 0 ? 'empty' : 'projected';
  }

  // ─── Rendering ──────────────────────────────────────────────────────────

  /**
   * Write the document to `sink`.
   */
  dump(sink: DumpSink, format: AbiDumpFormat = {}): void {
    const includeTargets = format.includeTargets ?? true;
    const useGroupAliases = format.useGroupAliases ?? false;

    if (this.currentState === 'empty') {
      throw new RenderError('Nothing to render: no dump has been added');
    }
    if (!includeTargets && this.known.size !== 1) {
      throw new RenderError(
        `Target annotations can only be omitted for a single-target dump, ` +
          `but the dump has targets ${formatTargetList(this.targets)}`
      );
    }

    const aliasing = includeTargets && useGroupAliases && this.aliases.canUseGroupAliases(this.known);
    const usedAliases = new Set<string>();
    const annotations = new Map<string, string>();

    const annotate = (targets: Set<Target>): string => {
      const sorted = sortTargets(targets);
      const key = sorted.join(',');
      const cached = annotations.get(key);
      if (cached !== undefined) return cached;

      const entries = aliasing ? this.aliases.compress(sorted) : sorted;
      if (aliasing) {
        for (const entry of entries) {
          if (this.hierarchy.isGroup(entry)) usedAliases.add(entry);
        }
      }
      const rendered = formatTargetList(entries);
      annotations.set(key, rendered);
      return rendered;
    };

    const body: string[] = [];
    const renderNode = (id: number, depth: number): void => {
      const record = this.nodes[id];
      const indent = INDENT.repeat(depth);
      const suffix = includeTargets ? `${TARGETS_SUFFIX}${annotate(record.targets)}` : '';
      body.push(`${indent}${record.signature}${suffix}`);
      for (const child of record.children) renderNode(child, depth + 1);
      if (record.opensBlock) body.push(`${indent}}`);
    };
    for (const child of this.nodes[ROOT].children) renderNode(child, 0);

    const lines: string[] = [DUMP_MARKER];
    if (includeTargets) {
      lines.push(`${TARGETS_PREFIX}${formatTargetList(this.targets)}`);
      for (const alias of sortTargets(usedAliases)) {
        lines.push(`${ALIAS_PREFIX}${alias} => ${formatTargetList(sortTargets(this.hierarchy.targets(alias)))}`);
      }
    }
    if (this.header.settings.length > 0) {
      lines.push(SETTINGS_MARKER);
      for (const { key, value } of this.header.settings) {
        lines.push(`${SETTING_PREFIX}${key}: ${value}`);
      }
    }
    if (this.header.uniqueName !== null) {
      lines.push('');
      lines.push(`${UNIQUE_NAME_PREFIX}<${this.header.uniqueName}>`);
    }
    lines.push(...body);

    sink.write(lines.join('\n') + '\n');
  }

  /**
   * Render the document to a string.
   */
  render(format: AbiDumpFormat = {}): string {
    const chunks: string[] = [];
    this.dump({ write: (chunk: string) => chunks.push(chunk) }, format);
    return chunks.join('');
  }

  // ─── Inspection ─────────────────────────────────────────────────────────

  /**
   * Every declaration, depth-first in rendering order.
   */
  declarations(): DeclarationEntry[] {
    const entries: DeclarationEntry[] = [];
    const walk = (id: number, path: string[]): void => {
      for (const childId of this.nodes[id].children) {
        const child = this.nodes[childId];
        const childPath = [...path, child.signature];
        entries.push({ path: childPath, targets: sortTargets(child.targets) });
        walk(childId, childPath);
      }
    };
    walk(ROOT, []);
    return entries;
  }

  // ─── Helpers ────────────────────────────────────────────────────────────

  private requirePopulated(operation: string): void {
    if (this.currentState === 'empty') {
      throw new Error(`Cannot ${operation}: no dump has been added`);
    }
  }

  private coversAll(record: DeclarationRecord, known: Set<Target>): boolean {
    if (record.targets.size !== known.size) return false;
    for (const t of known) {
      if (!record.targets.has(t)) return false;
    }
    return true;
  }

  /**
   * Find the child with `signature`, or insert it right after the sibling
   * `after` (at the end when null).
   */
  private findOrInsert(parentId: number, signature: string, opensBlock: boolean, after: number | null): number {
    const parent = this.nodes[parentId];
    const existing = parent.childIndex.get(signature);
    if (existing !== undefined) return existing;

    const id = this.nodes.length;
    this.nodes.push(createRecord(signature, opensBlock));
    const at = after === null ? parent.children.length : parent.children.lastIndexOf(after) + 1;
    parent.children.splice(at, 0, id);
    parent.childIndex.set(signature, id);
    return id;
  }

  /**
   * Restore each target's sibling order under `parentId` after a merge.
   * Siblings the targets do not order among themselves keep their current
   * order; when targets disagree, the remaining siblings keep their current
   * order too.
   */
  private reorder(parentId: number): void {
    const children = this.nodes[parentId].children;
    const count = children.length;
    if (count < 2) return;

    const byTarget = new Map<Target, Array<[position: number, index: number]>>();
    children.forEach((id, index) => {
      for (const [target, position] of this.nodes[id].order) {
        const entries = byTarget.get(target);
        if (entries) entries.push([position, index]);
        else byTarget.set(target, [[position, index]]);
      }
    });

    const indegree = new Array<number>(count).fill(0);
    const successors: number[][] = children.map(() => []);
    let ordered = true;
    for (const entries of byTarget.values()) {
      entries.sort((a, b) => a[0] - b[0]);
      for (let i = 1; i < entries.length; i++) {
        const [from, to] = [entries[i - 1][1], entries[i][1]];
        if (from > to) ordered = false;
        successors[from].push(to);
        indegree[to]++;
      }
    }
    if (ordered) return;

    // Topological order, lowest current index first
    const placed = new Array<boolean>(count).fill(false);
    const result: number[] = [];
    while (result.length < count) {
      let next = indegree.findIndex((degree, index) => degree === 0 && !placed[index]);
      if (next === -1) next = placed.indexOf(false);
      placed[next] = true;
      result.push(children[next]);
      for (const successor of successors[next]) indegree[successor]--;
    }
    children.splice(0, count, ...result);
  }

  /**
   * Copy the declarations accepted by `keep` (and whose parents were kept)
   * into a fresh arena, optionally narrowing their targets.
   */
  private rebuild(keep: (id: number, record: DeclarationRecord) => boolean, narrow?: ReadonlySet<Target>): void {
    const previous = this.nodes;
    const next: DeclarationRecord[] = [createRecord('', false, previous[ROOT].targets)];

    const copy = (oldId: number, newParentId: number): void => {
      for (const childId of previous[oldId].children) {
        const child = previous[childId];
        if (!keep(childId, child)) continue;

        const id = next.length;
        const record = createRecord(child.signature, child.opensBlock, narrow ?? child.targets);
        for (const [t, position] of child.order) {
          if (record.targets.has(t)) record.order.set(t, position);
        }
        next.push(record);
        next[newParentId].children.push(id);
        next[newParentId].childIndex.set(child.signature, id);
        copy(childId, id);
      }
    };

    copy(ROOT, ROOT);
    this.nodes = next;
  }
}
