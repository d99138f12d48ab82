/**
 * AbiValidator: Main API
 *
 * Drives the dump pipeline of one project:
 * - Building per-target dumps from compiled artifacts
 * - Merging them into a multi-target dump
 * - Inferring dumps for targets the host cannot compile
 * - Checking the merged dump against the committed reference
 * - Replacing the reference
 */

import {
  AbiReader,
  DumpCheckReport,
  DumpStore,
  KLibDumpFilters,
  Logger,
  ReportFormat,
  Target,
} from './core/types';
import { AbiDumpMerger } from './core/merger';
import { sortTargets } from './core/aliases';
import { DEFAULT_TARGET_HIERARCHY, TargetHierarchy } from './core/hierarchy';
import { inferAbiForUnsupportedTarget, InferenceResult } from './core/inference';
import { formatTargetList } from './core/parser';
import { createCheckReport } from './core/differ';
import { formatReport } from './core/reporter';
import { FileStore, FileStoreOptions } from './store/file-store';
import { DEFAULT_DUMP_FILTERS } from './reader/filters';
import { dumpArtifact } from './reader/renderer';
import { JsonAbiReader } from './reader/json';
import { createConsoleLogger } from './utils/logger';

export interface AbiValidatorOptions {
  /** Directory layout for a FileStore, or a custom store */
  store: FileStoreOptions | DumpStore;

  /** Project name; dumps are stored as `<projectName>.klib.api` */
  projectName: string;

  /** Every target the project is configured for */
  targets: Target[];

  /** Targets the host compiler cannot build (default: none) */
  unsupportedTargets?: Target[];

  /** Targets excluded from generation regardless of host support (default: none) */
  bannedTargets?: Target[];

  /** Collapse target lists into group names in merged dumps (default: true) */
  useTargetGroupAliases?: boolean;

  /** Fail when the reference and the supported targets disagree (default: false) */
  strictValidation?: boolean;

  /** Declarations left out of per-target dumps (default: none) */
  filters?: KLibDumpFilters;

  /** Artifact reader (default: JsonAbiReader) */
  reader?: AbiReader;

  /** Diagnostics sink (default: console) */
  logger?: Logger;

  hierarchy?: TargetHierarchy;
}

// ─── AbiValidator Class ─────────────────────────────────────────────────────

export class AbiValidator {
  private readonly store: DumpStore;
  private readonly projectName: string;
  private readonly targets: Target[];
  private readonly unsupported: Set<Target>;
  private readonly banned: Set<Target>;
  private readonly useTargetGroupAliases: boolean;
  private readonly strictValidation: boolean;
  private readonly filters: KLibDumpFilters;
  private readonly reader: AbiReader;
  private readonly logger: Logger;
  private readonly hierarchy: TargetHierarchy;

  constructor(options: AbiValidatorOptions) {
    this.store = 'readReference' in options.store ? options.store : new FileStore(options.store);
    this.projectName = options.projectName;
    this.targets = sortTargets(new Set(options.targets));
    this.unsupported = new Set(options.unsupportedTargets ?? []);
    this.banned = new Set(options.bannedTargets ?? []);
    this.useTargetGroupAliases = options.useTargetGroupAliases ?? true;
    this.strictValidation = options.strictValidation ?? false;
    this.filters = options.filters ?? DEFAULT_DUMP_FILTERS;
    this.reader = options.reader ?? new JsonAbiReader();
    this.logger = options.logger ?? createConsoleLogger();
    this.hierarchy = options.hierarchy ?? DEFAULT_TARGET_HIERARCHY;

    if (this.banned.size > 0) {
      this.logger.warn(
        `Banned targets are configured: ${formatTargetList(sortTargets(this.banned))}. ` +
          `If you don't know what it means, please make sure that the list is empty.`
      );
    }
  }

  /**
   * Configured targets the host can build, sorted.
   */
  supportedTargets(): Target[] {
    return this.targets.filter((t) => !this.unsupported.has(t) && !this.banned.has(t));
  }

  /**
   * Configured targets whose dumps have to be inferred, sorted.
   */
  inferredTargets(): Target[] {
    const supported = new Set(this.supportedTargets());
    return this.targets.filter((t) => !supported.has(t));
  }

  /**
   * Render the dump of one compiled artifact and store it as the target's dump.
   */
  async buildTargetDump(target: Target, artifactPath: string): Promise<string> {
    if (!this.supportedTargets().includes(target)) {
      throw new Error(`Target ${target} is not a supported target of project ${this.projectName}`);
    }
    const dump = dumpArtifact(this.reader, artifactPath, this.filters);
    await this.store.writeTargetDump(this.projectName, target, dump);
    return dump;
  }

  /**
   * Merge the dumps of every supported target and store the result.
   */
  async merge(): Promise<string> {
    for (const target of this.inferredTargets()) {
      this.logger.warn(
        `Target ${target} is not supported by the host compiler and the KLib ABI dump could not be generated for it.`
      );
    }
    return this.mergeTargets(this.supportedTargets());
  }

  /**
   * Infer and store the dump of a target the host cannot build, using the
   * reference dump for its target-specific declarations.
   */
  async inferTarget(target: Target): Promise<InferenceResult> {
    const supported = this.supportedTargets();
    if (supported.includes(target)) {
      throw new Error(`Target ${target} is supported by the host; its dump is generated, not inferred`);
    }

    const dumps = new Map<Target, string>();
    for (const t of supported) {
      const text = await this.store.readTargetDump(this.projectName, t);
      if (text !== null) dumps.set(t, text);
    }

    const result = inferAbiForUnsupportedTarget({
      unsupportedTarget: target,
      supportedTargets: dumps.keys(),
      dumps,
      image: await this.store.readReference(this.projectName),
      hierarchy: this.hierarchy,
    });

    for (const warning of result.warnings) this.logger.warn(warning);
    await this.store.writeTargetDump(this.projectName, target, result.dump);
    return result;
  }

  /**
   * Infer every unsupported target, then merge all configured targets.
   */
  async mergeAll(): Promise<string> {
    const inferred = this.inferredTargets();
    for (const target of inferred) {
      await this.inferTarget(target);
    }
    return this.mergeTargets(this.targets);
  }

  /**
   * Load the reference dump reduced to the supported targets, or null when
   * there is no reference.
   */
  async extractReference(): Promise<string | null> {
    const text = await this.store.readReference(this.projectName);
    if (text === null) return null;
    if (text.trim().length === 0) {
      this.logger.warn(`The reference ABI dump of project ${this.projectName} is empty.`);
      return null;
    }

    const merger = new AbiDumpMerger({ hierarchy: this.hierarchy });
    merger.loadMergedDump(text);

    const supported = new Set(this.supportedTargets());
    const referenceTargets = merger.targets;
    const missing = sortTargets([...supported].filter((t) => !referenceTargets.includes(t)));
    const removed = referenceTargets.filter((t) => !supported.has(t));

    if (this.strictValidation) {
      if (missing.length > 0) {
        throw new Error(
          `The reference ABI dump does not contain targets ${formatTargetList(missing)}; ` +
            `update the dump to validate them.`
        );
      }
      if (removed.length > 0) {
        throw new Error(
          `Validation could not be performed as targets ${formatTargetList(removed)} ` +
            `are not supported by the host compiler.`
        );
      }
    }

    if (removed.length > 0) {
      this.logger.info(`Targets ${formatTargetList(removed)} are left out of the validation.`);
      merger.removeTargets(removed);
    }
    if (merger.state === 'empty') return null;

    return merger.render({ useGroupAliases: this.useTargetGroupAliases });
  }

  /**
   * Compare the merged dump of the supported targets with the reference.
   */
  async check(): Promise<DumpCheckReport> {
    const expected = await this.extractReference();
    if (expected === null) {
      throw new Error(
        `Expected a reference ABI dump for project ${this.projectName}; run the dump command first.`
      );
    }
    const actual = await this.merge();
    return createCheckReport(this.projectName, expected, actual);
  }

  /**
   * Merge all targets, inferring the unsupported ones, and write the result
   * as the new reference.
   */
  async dump(): Promise<string> {
    const merged = await this.mergeAll();
    await this.store.writeReference(this.projectName, merged);
    return merged;
  }

  format(report: DumpCheckReport, format: ReportFormat = 'console'): string {
    return formatReport(report, format);
  }

  // ─── Private ──────────────────────────────────────────────────────────────

  private async mergeTargets(targets: Target[]): Promise<string> {
    if (targets.length === 0) {
      throw new Error(
        `KLib ABI dump/validation of project ${this.projectName} requires at least one supported target, but none were found.`
      );
    }

    const merger = new AbiDumpMerger({ hierarchy: this.hierarchy });
    for (const target of targets) {
      const text = await this.store.readTargetDump(this.projectName, target);
      if (text === null) {
        throw new Error(`No ABI dump was found for target ${target} of project ${this.projectName}`);
      }
      merger.addIndividualDump(target, text);
    }

    const merged = merger.render({ useGroupAliases: this.useTargetGroupAliases });
    await this.store.writeMergedDump(this.projectName, merged);
    return merged;
  }
}
