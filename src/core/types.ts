/**
 * Canonical type definitions for abi-dump-validator.
 * These types describe targets, dump documents, reports and the options
 * shared across the tool.
 */

// ─── Targets ────────────────────────────────────────────────────────────────

/** A compilation target name (e.g. 'linuxX64', 'iosArm64', 'wasmJs'). Case-sensitive. */
export type Target = string;

/** A set of targets. Never empty once attached to a declaration. */
export type TargetSet = ReadonlySet<Target>;

// ─── Dump Document ──────────────────────────────────────────────────────────

export interface RenderingSetting {
  key: string;
  value: string;
}

export interface DumpHeader {
  /** Library unique name from `// Library unique name: <name>` */
  uniqueName: string | null;

  /** Ordered `// - key: value` entries under `// Rendering settings:` */
  settings: RenderingSetting[];
}

export interface AbiDumpFormat {
  /** Annotate every declaration with its targets (default: true) */
  includeTargets?: boolean;

  /** Replace target lists matching a hierarchy group with the group name (default: false) */
  useGroupAliases?: boolean;
}

/** Anything text can be written to: a stream, a buffer collector, ... */
export interface DumpSink {
  write(chunk: string): unknown;
}

export type MergerState = 'empty' | 'populated' | 'projected';

/** Which text format populated a merger, if any. */
export type DumpSourceFormat = 'individual' | 'merged';

export interface DeclarationEntry {
  /** Signatures from the top-level declaration down to this one */
  path: string[];

  /** Sorted targets of this declaration */
  targets: Target[];
}

// ─── Dump Comparison ────────────────────────────────────────────────────────

export type DumpChangeType = 'added' | 'removed';

export interface DumpChange {
  type: DumpChangeType;

  /** The dump line, without line terminator */
  line: string;

  /** 1-based line number in the expected dump (removed) or the actual dump (added) */
  lineNumber: number;
}

export interface DumpCheckReport {
  /** Project or dump name */
  name: string;

  /** ISO timestamp of the comparison */
  timestamp: string;

  /** All differing lines, in dump order */
  changes: DumpChange[];

  summary: {
    added: number;
    removed: number;
    total: number;
  };

  /** Whether the actual dump differs from the reference */
  hasChanges: boolean;
}

export type ReportFormat = 'console' | 'json' | 'markdown';

// ─── Diagnostics ────────────────────────────────────────────────────────────

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

// ─── Store Interface ────────────────────────────────────────────────────────

export interface DumpStore {
  /** Load the individual dump generated for a target, or null when absent */
  readTargetDump(project: string, target: Target): Promise<string | null>;

  /** Save the individual dump for a target */
  writeTargetDump(project: string, target: Target, content: string): Promise<void>;

  /** Load the last merged dump, or null when absent */
  readMergedDump(project: string): Promise<string | null>;

  /** Save the merged dump */
  writeMergedDump(project: string, content: string): Promise<void>;

  /** Load the committed reference dump, or null when absent */
  readReference(project: string): Promise<string | null>;

  /** Replace the committed reference dump */
  writeReference(project: string, content: string): Promise<void>;
}

// ─── Library ABI (reader output) ────────────────────────────────────────────

export type AbiDeclarationKind = 'class' | 'function' | 'property' | 'constructor' | 'enumEntry';

export interface AbiDeclaration {
  kind: AbiDeclarationKind;

  /** Qualified name in `package/Class.member` form (e.g. 'com.example/Foo.bar') */
  qualifiedName: string;

  /** Rendered declaration without its signature (e.g. 'final fun bar(): kotlin/Int') */
  text: string;

  /** Signature per signature version number */
  signatures?: Record<string, string>;

  /** Qualified names of the annotations on this declaration */
  annotations?: string[];

  /** Members, accessors, nested classes */
  declarations?: AbiDeclaration[];
}

export interface AbiSignatureVersion {
  versionNumber: number;

  /** Whether the reader can render signatures of this version */
  supportedByReader: boolean;
}

export interface LibraryAbi {
  uniqueName: string;

  /** Manifest properties rendered into the dump header (platform, compiler version, ...) */
  manifest?: Record<string, string>;

  signatureVersions: AbiSignatureVersion[];

  declarations: AbiDeclaration[];
}

export type SignatureVersion = number | 'latest';

export interface KLibDumpFilters {
  /** Packages (and their subpackages) whose declarations are left out of a dump */
  ignoredPackages: string[];

  /** Classes left out of a dump, in binary form (e.g. 'com.example.Outer$Inner') */
  ignoredClasses: string[];

  /** Annotations marking non-public declarations, which are left out of a dump */
  nonPublicMarkers: string[];

  /** Signature version to render (default: the latest the library and reader support) */
  signatureVersion: SignatureVersion;
}

export type AbiReadingFilter =
  | { kind: 'excludedClasses'; classes: string[] }
  | { kind: 'nonPublicMarkers'; markers: string[] }
  | { kind: 'excludedPackages'; packages: string[] };

/** Reads the ABI of a compiled library artifact. */
export interface AbiReader {
  read(artifactPath: string): LibraryAbi;
}
