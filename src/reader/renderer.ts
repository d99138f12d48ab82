/**
 * Single-Target Dump Renderer
 *
 * Renders the ABI of one compiled library (as returned by an AbiReader)
 * into single-target dump text, applying dump filters on the way.
 */

import { AbiDeclaration, AbiReader, KLibDumpFilters, LibraryAbi } from '../core/types';
import { DUMP_MARKER, INDENT, SETTING_PREFIX, SETTINGS_MARKER, UNIQUE_NAME_PREFIX } from '../core/parser';
import { DEFAULT_DUMP_FILTERS, isExcluded, selectSignatureVersion, toReadingFilters } from './filters';

function renderDeclaration(
  declaration: AbiDeclaration,
  depth: number,
  version: number,
  lines: string[],
  filters: ReturnType<typeof toReadingFilters>
): void {
  if (isExcluded(declaration, filters)) return;

  if (declaration.text.trim().length === 0 || /[\r\n]/.test(declaration.text)) {
    throw new Error(`Declaration ${declaration.qualifiedName} has no single-line text`);
  }

  const indent = INDENT.repeat(depth);
  const isClass = declaration.kind === 'class';
  const signature = declaration.signatures?.[String(version)];

  let line = `${indent}${declaration.text.trim()}${isClass ? ' {' : ''}`;
  if (signature) line += ` // ${signature}`;
  lines.push(line);

  for (const member of declaration.declarations ?? []) {
    renderDeclaration(member, depth + 1, version, lines, filters);
  }

  if (isClass) lines.push(`${indent}}`);
}

/**
 * Render a library's ABI as a single-target dump.
 */
export function renderLibraryAbi(library: LibraryAbi, filters: KLibDumpFilters = DEFAULT_DUMP_FILTERS): string {
  const version = selectSignatureVersion(library, filters.signatureVersion);
  const readingFilters = toReadingFilters(filters);

  const lines: string[] = [
    DUMP_MARKER,
    SETTINGS_MARKER,
    `${SETTING_PREFIX}Signature version: ${version}`,
    `${SETTING_PREFIX}Show manifest properties: true`,
    `${SETTING_PREFIX}Show declarations: true`,
    '',
    `${UNIQUE_NAME_PREFIX}<${library.uniqueName}>`,
  ];
  for (const [key, value] of Object.entries(library.manifest ?? {})) {
    lines.push(`// ${key}: ${value}`);
  }

  for (const declaration of library.declarations) {
    renderDeclaration(declaration, 0, version, lines, readingFilters);
  }

  return lines.join('\n') + '\n';
}

/**
 * Read a compiled artifact and render its single-target dump.
 */
export function dumpArtifact(reader: AbiReader, artifactPath: string, filters: KLibDumpFilters): string {
  return renderLibraryAbi(reader.read(artifactPath), filters);
}
