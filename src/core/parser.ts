/**
 * Dump Text Parser
 *
 * Turns single-target and multi-target dump text into a declaration tree.
 * Nesting is expressed by four-space indentation; class bodies additionally
 * open with `{` and close with a `}` line at the same depth.
 */

import { DumpHeader } from './types';
import { ParseError } from './errors';

// ─── Markers ────────────────────────────────────────────────────────────────

export const DUMP_MARKER = '// Klib ABI Dump';
export const TARGETS_PREFIX = '// Targets: ';
export const ALIAS_PREFIX = '// Alias: ';
export const SETTINGS_MARKER = '// Rendering settings:';
export const SETTING_PREFIX = '// - ';
export const UNIQUE_NAME_PREFIX = '// Library unique name: ';
export const TARGETS_SUFFIX = ' // Targets: ';
export const INDENT = '    ';

// ─── Parsed Shapes ──────────────────────────────────────────────────────────

export interface ParsedDeclaration {
  /** Full declaration text without indentation or target annotation */
  signature: string;

  /** Whether the declaration opens a `{ ... }` block */
  opensBlock: boolean;

  /** Target annotation entries, or null when the line has none */
  targets: string[] | null;

  /** 1-based source line */
  line: number;

  children: ParsedDeclaration[];
}

export interface ParsedDump {
  header: DumpHeader;

  /** Entries of the `// Targets:` header, or null when absent */
  targets: string[] | null;

  /** `// Alias:` header entries */
  aliases: Map<string, string[]>;

  declarations: ParsedDeclaration[];
}

// ─── Helpers ────────────────────────────────────────────────────────────────

/**
 * Parse `[a, b, c]` into its entries.
 */
export function parseTargetList(text: string, line: number): string[] {
  const trimmed = text.trim();
  if (!trimmed.startsWith('[') || !trimmed.endsWith(']')) {
    throw new ParseError(`Malformed target list: ${trimmed}`, line);
  }
  const inner = trimmed.slice(1, -1).trim();
  if (inner === '') return [];

  const entries = inner.split(',').map((e) => e.trim());
  if (entries.some((e) => e === '')) {
    throw new ParseError(`Empty entry in target list: ${trimmed}`, line);
  }
  return entries;
}

export function formatTargetList(entries: string[]): string {
  return `[${entries.join(', ')}]`;
}

/**
 * A declaration opens a block when the text before its signature comment ends with `{`.
 */
export function opensBlock(signature: string): boolean {
  const commentIdx = signature.indexOf(' // ');
  const declaration = commentIdx >= 0 ? signature.slice(0, commentIdx) : signature;
  return declaration.trimEnd().endsWith('{');
}

function splitTargets(text: string, line: number): { signature: string; targets: string[] | null } {
  const idx = text.lastIndexOf(TARGETS_SUFFIX);
  if (idx < 0 || !text.endsWith(']')) {
    return { signature: text, targets: null };
  }
  return {
    signature: text.slice(0, idx),
    targets: parseTargetList(text.slice(idx + TARGETS_SUFFIX.length), line),
  };
}

// ─── Header ─────────────────────────────────────────────────────────────────

interface HeaderState {
  header: DumpHeader;
  targets: string[] | null;
  aliases: Map<string, string[]>;
  inSettings: boolean;
}

function parseHeaderLine(text: string, line: number, state: HeaderState): void {
  if (text.startsWith(TARGETS_PREFIX)) {
    if (state.targets !== null) {
      throw new ParseError('Duplicate targets header', line);
    }
    state.targets = parseTargetList(text.slice(TARGETS_PREFIX.length), line);
    state.inSettings = false;
    return;
  }

  if (text.startsWith(ALIAS_PREFIX)) {
    const body = text.slice(ALIAS_PREFIX.length);
    const arrow = body.indexOf(' => ');
    if (arrow < 0) {
      throw new ParseError(`Malformed alias header: ${text}`, line);
    }
    const name = body.slice(0, arrow).trim();
    if (name === '' || state.aliases.has(name)) {
      throw new ParseError(`Invalid or duplicate alias "${name}"`, line);
    }
    state.aliases.set(name, parseTargetList(body.slice(arrow + 4), line));
    state.inSettings = false;
    return;
  }

  if (text === SETTINGS_MARKER) {
    state.inSettings = true;
    return;
  }

  if (state.inSettings && text.startsWith(SETTING_PREFIX)) {
    const entry = text.slice(SETTING_PREFIX.length);
    const colon = entry.indexOf(':');
    if (colon < 0) {
      throw new ParseError(`Malformed rendering setting: ${text}`, line);
    }
    state.header.settings.push({
      key: entry.slice(0, colon).trim(),
      value: entry.slice(colon + 1).trim(),
    });
    return;
  }

  state.inSettings = false;

  if (text.startsWith(UNIQUE_NAME_PREFIX)) {
    const raw = text.slice(UNIQUE_NAME_PREFIX.length).trim();
    state.header.uniqueName = raw.startsWith('<') && raw.endsWith('>') ? raw.slice(1, -1) : raw;
  }
  // The dump marker and manifest properties (platform, compiler version, ...) carry no ABI.
}

// ─── Parser ─────────────────────────────────────────────────────────────────

/**
 * Parse dump text. Target annotations are returned as found; whether they are
 * required or forbidden is up to the caller.
 */
export function parseDump(source: string): ParsedDump {
  const state: HeaderState = {
    header: { uniqueName: null, settings: [] },
    targets: null,
    aliases: new Map(),
    inSettings: false,
  };

  const declarations: ParsedDeclaration[] = [];
  // chain[d] is the most recent declaration at depth d on the current path
  const chain: ParsedDeclaration[] = [];
  // depths of blocks still waiting for their `}`
  const openBlocks: number[] = [];
  let inHeader = true;

  const lines = source.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    const raw = lines[i].trimEnd();

    if (raw.trim() === '') {
      if (inHeader) state.inSettings = false;
      continue;
    }

    if (inHeader && raw.startsWith('//')) {
      parseHeaderLine(raw, lineNo, state);
      continue;
    }
    inHeader = false;

    const indent = raw.length - raw.trimStart().length;
    if (raw.slice(0, indent).includes('\t')) {
      throw new ParseError('Tabs are not allowed in indentation', lineNo);
    }
    if (indent % INDENT.length !== 0) {
      throw new ParseError(`Indentation of ${indent} spaces is not a multiple of ${INDENT.length}`, lineNo);
    }
    const depth = indent / INDENT.length;
    const text = raw.slice(indent);

    if (text === '}') {
      if (openBlocks.length === 0 || openBlocks[openBlocks.length - 1] !== depth) {
        throw new ParseError('Unbalanced closing brace', lineNo);
      }
      openBlocks.pop();
      chain.length = depth;
      continue;
    }

    if (text.startsWith('//')) {
      throw new ParseError(`Unexpected comment among declarations: ${text}`, lineNo);
    }

    if (openBlocks.length > 0 && openBlocks[openBlocks.length - 1] >= depth) {
      throw new ParseError('Missing closing brace before this declaration', lineNo);
    }
    if (depth > chain.length) {
      throw new ParseError('Declaration is indented deeper than its enclosing declaration allows', lineNo);
    }

    const { signature, targets } = splitTargets(text, lineNo);
    const declaration: ParsedDeclaration = {
      signature,
      opensBlock: opensBlock(signature),
      targets,
      line: lineNo,
      children: [],
    };

    if (depth === 0) {
      declarations.push(declaration);
    } else {
      chain[depth - 1].children.push(declaration);
    }

    chain.length = depth;
    chain.push(declaration);
    if (declaration.opensBlock) openBlocks.push(depth);
  }

  if (openBlocks.length > 0) {
    throw new ParseError('Unexpected end of dump: unclosed block');
  }

  return {
    header: state.header,
    targets: state.targets,
    aliases: state.aliases,
    declarations,
  };
}
