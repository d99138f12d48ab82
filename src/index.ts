/**
 * abi-dump-validator
 *
 * Merge, infer and validate multi-target KLib ABI dumps.
 *
 * @example
 * ```typescript
 * import { AbiValidator } from 'abi-dump-validator';
 *
 * const validator = new AbiValidator({
 *   store: { buildDir: './build/abi', apiDir: './api' },
 *   projectName: 'my-library',
 *   targets: ['iosArm64', 'linuxX64', 'mingwX64'],
 *   unsupportedTargets: ['iosArm64'],
 * });
 *
 * const report = await validator.check();
 * if (report.hasChanges) {
 *   console.log(validator.format(report, 'console'));
 * }
 * ```
 */

// ─── Main API ───────────────────────────────────────────────────────────────
export { AbiValidator, AbiValidatorOptions } from './validator';

// ─── Core Types ─────────────────────────────────────────────────────────────
export {
  Target,
  TargetSet,
  RenderingSetting,
  DumpHeader,
  AbiDumpFormat,
  DumpSink,
  MergerState,
  DumpSourceFormat,
  DeclarationEntry,
  DumpChange,
  DumpChangeType,
  DumpCheckReport,
  ReportFormat,
  Logger,
  DumpStore,
  AbiDeclaration,
  AbiDeclarationKind,
  AbiSignatureVersion,
  LibraryAbi,
  SignatureVersion,
  KLibDumpFilters,
  AbiReadingFilter,
  AbiReader,
} from './core/types';
export { AbiDumpError, ParseError, ConflictError, RenderError, InferenceError } from './core/errors';

// ─── Core Engines (for advanced usage) ──────────────────────────────────────
export { AbiDumpMerger, AbiDumpMergerOptions } from './core/merger';
export {
  TargetHierarchy,
  HierarchyTable,
  HierarchyNode,
  DEFAULT_TARGET_HIERARCHY,
  DEFAULT_HIERARCHY_TABLE,
  DEFAULT_FALLBACK_PARENTS,
} from './core/hierarchy';
export { GroupAliasCompressor, sortTargets } from './core/aliases';
export { parseDump, ParsedDump, ParsedDeclaration } from './core/parser';
export { inferAbiForUnsupportedTarget, findMatchingTargets, InferenceInput, InferenceResult } from './core/inference';
export { diffDumps, normalizeDump, createCheckReport } from './core/differ';
export { formatReport } from './core/reporter';

// ─── Store ──────────────────────────────────────────────────────────────────
export { FileStore, FileStoreOptions } from './store/file-store';

// ─── Readers ────────────────────────────────────────────────────────────────
export {
  JsonAbiReader,
  parseLibraryAbi,
  renderLibraryAbi,
  dumpArtifact,
  DEFAULT_DUMP_FILTERS,
  createDumpFilters,
  toAbiQualifiedName,
  toReadingFilters,
  isExcluded,
  selectSignatureVersion,
  parseSignatureVersion,
} from './reader';

// ─── Utilities ──────────────────────────────────────────────────────────────
export { createConsoleLogger, silentLogger } from './utils/logger';
