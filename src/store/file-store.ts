/**
 * File-based Dump Store
 *
 * Keeps dumps as plain text files on the local filesystem. The reference
 * dump lives in the API directory, which is committed to version control.
 *
 * Directory structure:
 *   <buildDir>/
 *     <target>/
 *       <project>.klib.api   → per-target dump
 *     <project>.klib.api     → merged dump
 *   <apiDir>/
 *     <project>.klib.api     → reference dump
 */

import * as fs from 'fs';
import * as path from 'path';
import { DumpStore, Target } from '../core/types';

export const DUMP_FILE_EXTENSION = '.klib.api';

export interface FileStoreOptions {
  /** Directory for generated dumps */
  buildDir: string;

  /** Directory holding the committed reference dump */
  apiDir: string;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

/**
 * Reject names that would escape their directory.
 */
function checkSegment(kind: string, value: string): string {
  if (value.length === 0 || value === '.' || value === '..' || /[\\/\0]/.test(value)) {
    throw new Error(`Invalid ${kind} name "${value}"`);
  }
  return value;
}

export function dumpFileName(project: string): string {
  return `${checkSegment('project', project)}${DUMP_FILE_EXTENSION}`;
}

function readIfExists(file: string): string | null {
  if (!fs.existsSync(file)) return null;
  return fs.readFileSync(file, 'utf-8');
}

function writeCreatingDirs(file: string, content: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content, 'utf-8');
}

// ─── File Store Implementation ──────────────────────────────────────────────

export class FileStore implements DumpStore {
  private readonly buildDir: string;
  private readonly apiDir: string;

  constructor(options: FileStoreOptions) {
    this.buildDir = path.resolve(options.buildDir);
    this.apiDir = path.resolve(options.apiDir);
  }

  targetDumpPath(project: string, target: Target): string {
    return path.join(this.buildDir, checkSegment('target', target), dumpFileName(project));
  }

  mergedDumpPath(project: string): string {
    return path.join(this.buildDir, dumpFileName(project));
  }

  referencePath(project: string): string {
    return path.join(this.apiDir, dumpFileName(project));
  }

  async readTargetDump(project: string, target: Target): Promise<string | null> {
    return readIfExists(this.targetDumpPath(project, target));
  }

  async writeTargetDump(project: string, target: Target, content: string): Promise<void> {
    writeCreatingDirs(this.targetDumpPath(project, target), content);
  }

  async readMergedDump(project: string): Promise<string | null> {
    return readIfExists(this.mergedDumpPath(project));
  }

  async writeMergedDump(project: string, content: string): Promise<void> {
    writeCreatingDirs(this.mergedDumpPath(project), content);
  }

  async readReference(project: string): Promise<string | null> {
    return readIfExists(this.referencePath(project));
  }

  async writeReference(project: string, content: string): Promise<void> {
    writeCreatingDirs(this.referencePath(project), content);
  }
}
