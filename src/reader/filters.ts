/**
 * Dump Filters
 *
 * Which declarations of a library are left out of its dump, and which
 * signature version the dump shows.
 */

import { AbiDeclaration, AbiReadingFilter, KLibDumpFilters, LibraryAbi, SignatureVersion } from '../core/types';

/**
 * No filters, latest signature version.
 */
export const DEFAULT_DUMP_FILTERS: Readonly<KLibDumpFilters> = Object.freeze({
  ignoredPackages: [],
  ignoredClasses: [],
  nonPublicMarkers: [],
  signatureVersion: 'latest',
});

export function createDumpFilters(options: Partial<KLibDumpFilters> = {}): KLibDumpFilters {
  return {
    ignoredPackages: [...(options.ignoredPackages ?? DEFAULT_DUMP_FILTERS.ignoredPackages)],
    ignoredClasses: [...(options.ignoredClasses ?? DEFAULT_DUMP_FILTERS.ignoredClasses)],
    nonPublicMarkers: [...(options.nonPublicMarkers ?? DEFAULT_DUMP_FILTERS.nonPublicMarkers)],
    signatureVersion: options.signatureVersion ?? DEFAULT_DUMP_FILTERS.signatureVersion,
  };
}

// ─── Qualified Names ────────────────────────────────────────────────────────

/**
 * Split a binary class name on `$` into nested class segments. A `$` at the
 * start of a segment, at the end of the name, or following another `$` is
 * part of the name.
 */
function classNameToCompoundName(name: string): string {
  if (name.length === 0) return name;

  const segments: string[] = [];
  let current = '';

  for (let idx = 0; idx < name.length; idx++) {
    const c = name[idx];
    if (c !== '$' || current.length === 0 || idx === name.length - 1) {
      current += c;
      continue;
    }
    // Outer$$$sub -> Outer.$$sub
    if (current.endsWith('$')) {
      current += c;
      continue;
    }
    segments.push(current);
    current = '';
  }
  if (current.length > 0) segments.push(current);

  return segments.join('.');
}

/**
 * Convert a binary name ('com.example.Outer$Inner') into the qualified form
 * used in dumps ('com.example/Outer.Inner'). Returns null for blank names
 * and names already containing '/'.
 */
export function toAbiQualifiedName(name: string): string | null {
  if (name.trim().length === 0 || name.includes('/')) return null;

  const idx = name.lastIndexOf('.');
  if (idx === -1) {
    return `/${classNameToCompoundName(name)}`;
  }
  return `${name.substring(0, idx)}/${classNameToCompoundName(name.substring(idx + 1))}`;
}

function toQualifiedNames(names: string[]): string[] {
  return names.map(toAbiQualifiedName).filter((n): n is string => n !== null);
}

// ─── Reading Filters ────────────────────────────────────────────────────────

/**
 * Translate dump filters into reading filters, skipping empty ones.
 */
export function toReadingFilters(filters: KLibDumpFilters): AbiReadingFilter[] {
  const result: AbiReadingFilter[] = [];

  const classes = toQualifiedNames(filters.ignoredClasses);
  if (classes.length > 0) result.push({ kind: 'excludedClasses', classes });

  const markers = toQualifiedNames(filters.nonPublicMarkers);
  if (markers.length > 0) result.push({ kind: 'nonPublicMarkers', markers });

  if (filters.ignoredPackages.length > 0) {
    result.push({ kind: 'excludedPackages', packages: [...filters.ignoredPackages] });
  }

  return result;
}

function packageOf(declaration: AbiDeclaration): string {
  const slash = declaration.qualifiedName.indexOf('/');
  return slash < 0 ? '' : declaration.qualifiedName.substring(0, slash);
}

function matches(filter: AbiReadingFilter, declaration: AbiDeclaration): boolean {
  switch (filter.kind) {
    case 'excludedClasses':
      return declaration.kind === 'class' && filter.classes.includes(declaration.qualifiedName);
    case 'nonPublicMarkers':
      return (declaration.annotations ?? []).some((a) => filter.markers.includes(a));
    case 'excludedPackages': {
      const pkg = packageOf(declaration);
      return filter.packages.some((p) => pkg === p || pkg.startsWith(`${p}.`));
    }
  }
}

/**
 * Whether any filter excludes the declaration. Filters are evaluated in order.
 */
export function isExcluded(declaration: AbiDeclaration, filters: AbiReadingFilter[]): boolean {
  return filters.some((f) => matches(f, declaration));
}

// ─── Signature Version ──────────────────────────────────────────────────────

/**
 * Pick the signature version to render among the versions both the library
 * and the reader support.
 */
export function selectSignatureVersion(library: LibraryAbi, requested: SignatureVersion): number {
  const supported = library.signatureVersions
    .filter((v) => v.supportedByReader)
    .map((v) => v.versionNumber)
    .sort((a, b) => a - b);

  if (requested === 'latest') {
    if (supported.length === 0) {
      throw new Error(`Can't choose a signature version for library ${library.uniqueName}`);
    }
    return supported[supported.length - 1];
  }

  if (!supported.includes(requested)) {
    throw new Error(
      `Unsupported KLib signature version '${requested}'. Supported versions are: [${supported.join(', ')}]`
    );
  }
  return requested;
}

/**
 * Parse a `--signature-version` value.
 */
export function parseSignatureVersion(value: string): SignatureVersion {
  const trimmed = value.trim().toLowerCase();
  if (trimmed === 'latest') return 'latest';
  if (!/^\d+$/.test(trimmed) || parseInt(trimmed, 10) < 1) {
    throw new Error(`Invalid signature version "${value}": expected a positive number or "latest"`);
  }
  return parseInt(trimmed, 10);
}
