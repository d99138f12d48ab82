#!/usr/bin/env node

/**
 * abi-dump-validator CLI
 *
 * Commands:
 *   dump-target - Render the dump of one compiled target
 *   merge       - Merge per-target dumps into a multi-target dump
 *   infer       - Infer the dump of a target the host cannot build
 *   check       - Compare the merged dump with the reference dump
 *   dump        - Replace the reference dump
 *   targets     - Show the target hierarchy
 */

import { Command, InvalidArgumentError } from 'commander';
import * as fs from 'fs';
import { AbiValidator } from './validator';
import { createDumpFilters, parseSignatureVersion } from './reader/filters';
import { DEFAULT_TARGET_HIERARCHY, HierarchyNode } from './core/hierarchy';
import { formatTargetList } from './core/parser';
import { sortTargets } from './core/aliases';
import { ReportFormat, SignatureVersion } from './core/types';
import { createConsoleLogger } from './utils/logger';

export const BANNED_TARGETS_ENV = 'ABI_VALIDATOR_BANNED_TARGETS';

const program = new Command();

program
  .name('abi-dump-validator')
  .description('Merge, infer and validate multi-target KLib ABI dumps.')
  .version('1.0.0');

// ─── Common Options ─────────────────────────────────────────────────────────

interface StoreOptions {
  project: string;
  buildDir: string;
  apiDir: string;
}

interface TargetOptions extends StoreOptions {
  targets: string[];
  unsupported: string[];
  bannedTargets?: string[];
  groupAliases: boolean;
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function parseReportFormat(value: string): ReportFormat {
  if (value === 'console' || value === 'json' || value === 'markdown') return value;
  throw new InvalidArgumentError('Expected one of: console, json, markdown');
}

function parseVersionOption(value: string): SignatureVersion {
  try {
    return parseSignatureVersion(value);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
}

function withStoreOptions(command: Command): Command {
  return command
    .requiredOption('-p, --project <name>', 'Project name (dump file is <name>.klib.api)')
    .option('-b, --build-dir <dir>', 'Directory for generated dumps', './build/abi')
    .option('--api-dir <dir>', 'Directory of the reference dump', './api');
}

function withTargetOptions(command: Command): Command {
  return withStoreOptions(command)
    .requiredOption('--targets <list>', 'Comma-separated configured targets', parseList)
    .option('--unsupported <list>', 'Comma-separated targets the host cannot build', parseList, [])
    .option('--banned-targets <list>', `Comma-separated banned targets (default: $${BANNED_TARGETS_ENV})`, parseList)
    .option('--no-group-aliases', 'Do not collapse target lists into group names');
}

function bannedTargets(opts: TargetOptions): string[] {
  return opts.bannedTargets ?? parseList(process.env[BANNED_TARGETS_ENV] ?? '');
}

function getValidator(opts: TargetOptions, extra: { strictValidation?: boolean } = {}): AbiValidator {
  return new AbiValidator({
    store: { buildDir: opts.buildDir, apiDir: opts.apiDir },
    projectName: opts.project,
    targets: opts.targets,
    unsupportedTargets: opts.unsupported,
    bannedTargets: bannedTargets(opts),
    useTargetGroupAliases: opts.groupAliases,
    strictValidation: extra.strictValidation,
    logger: createConsoleLogger(),
  });
}

function fail(error: unknown): never {
  console.error(`❌ Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
}

// ─── dump-target Command ────────────────────────────────────────────────────

interface DumpTargetOptions extends StoreOptions {
  target: string;
  artifact: string;
  ignoredPackages: string[];
  ignoredClasses: string[];
  nonPublicMarkers: string[];
  signatureVersion: SignatureVersion;
}

withStoreOptions(
  program
    .command('dump-target')
    .description('Render the dump of one compiled target from its ABI descriptor')
)
  .requiredOption('-t, --target <name>', 'Target name (e.g., linuxX64)')
  .requiredOption('-a, --artifact <file>', 'ABI descriptor (JSON) of the compiled library')
  .option('--ignored-packages <list>', 'Comma-separated packages to leave out', parseList, [])
  .option('--ignored-classes <list>', 'Comma-separated classes to leave out', parseList, [])
  .option('--non-public-markers <list>', 'Comma-separated annotations marking non-public API', parseList, [])
  .option('--signature-version <n>', 'Signature version to render, or "latest"', parseVersionOption, 'latest')
  .action(async (opts: DumpTargetOptions) => {
    try {
      const validator = new AbiValidator({
        store: { buildDir: opts.buildDir, apiDir: opts.apiDir },
        projectName: opts.project,
        targets: [opts.target],
        filters: createDumpFilters({
          ignoredPackages: opts.ignoredPackages,
          ignoredClasses: opts.ignoredClasses,
          nonPublicMarkers: opts.nonPublicMarkers,
          signatureVersion: opts.signatureVersion,
        }),
        logger: createConsoleLogger(),
      });
      await validator.buildTargetDump(opts.target, opts.artifact);

      console.log(`✅ ABI dump for ${opts.target} saved`);
      console.log(`   Project: ${opts.project}`);
      console.log(`   Stored:  ${opts.buildDir}`);
    } catch (error) {
      fail(error);
    }
  });

// ─── merge Command ──────────────────────────────────────────────────────────

interface MergeOptions extends TargetOptions {
  all?: boolean;
}

withTargetOptions(program.command('merge').description('Merge per-target dumps into a multi-target dump'))
  .option('--all', 'Infer dumps for unsupported targets and merge every target')
  .action(async (opts: MergeOptions) => {
    try {
      const validator = getValidator(opts);
      if (opts.all) {
        await validator.mergeAll();
      } else {
        await validator.merge();
      }
      console.log(`✅ Merged ABI dump saved to ${opts.buildDir}`);
    } catch (error) {
      fail(error);
    }
  });

// ─── infer Command ──────────────────────────────────────────────────────────

interface InferOptions extends TargetOptions {
  target: string;
}

withTargetOptions(program.command('infer').description('Infer the dump of a target the host cannot build'))
  .requiredOption('-t, --target <name>', 'Unsupported target to infer')
  .action(async (opts: InferOptions) => {
    try {
      const result = await getValidator(opts).inferTarget(opts.target);
      console.log(`✅ Inferred ABI dump for ${opts.target} from ${formatTargetList(result.matchingTargets)}`);
    } catch (error) {
      fail(error);
    }
  });

// ─── check Command ──────────────────────────────────────────────────────────

interface CheckOptions extends TargetOptions {
  strict?: boolean;
  format: ReportFormat;
  output?: string;
}

withTargetOptions(program.command('check').description('Compare the merged dump with the reference dump'))
  .option('--strict', 'Fail when the reference and the supported targets disagree')
  .option('-f, --format <format>', 'Report format: console, json, markdown', parseReportFormat, 'console')
  .option('-o, --output <file>', 'Write report to file instead of stdout')
  .action(async (opts: CheckOptions) => {
    try {
      const validator = getValidator(opts, { strictValidation: opts.strict });
      const report = await validator.check();
      const formatted = validator.format(report, opts.format);

      if (opts.output) {
        fs.writeFileSync(opts.output, formatted, 'utf-8');
        console.log(`📄 Report written to ${opts.output}`);
      } else {
        console.log(formatted);
      }

      if (report.hasChanges) {
        process.exit(1);
      }
    } catch (error) {
      fail(error);
    }
  });

// ─── dump Command ───────────────────────────────────────────────────────────

withTargetOptions(program.command('dump').description('Replace the reference dump with the merged dump of all targets'))
  .action(async (opts: TargetOptions) => {
    try {
      await getValidator(opts).dump();
      console.log(`✅ Reference ABI dump updated in ${opts.apiDir}`);
    } catch (error) {
      fail(error);
    }
  });

// ─── targets Command ────────────────────────────────────────────────────────

function printNode(node: HierarchyNode, depth: number): void {
  const marker = node.children.length > 0 ? '▸' : '•';
  console.log(`${'  '.repeat(depth)}${marker} ${node.name}`);
  for (const child of node.children) printNode(child, depth + 1);
}

program
  .command('targets')
  .description('Show the target hierarchy, or the targets of one group')
  .option('-g, --group <name>', 'Group to expand')
  .action((opts: { group?: string }) => {
    try {
      if (!opts.group) {
        printNode(DEFAULT_TARGET_HIERARCHY.root, 0);
        return;
      }
      const targets = sortTargets(DEFAULT_TARGET_HIERARCHY.targets(opts.group));
      if (targets.length === 0) {
        console.log(`📭 Unknown group or target: ${opts.group}`);
        return;
      }
      console.log(`📋 ${opts.group} (${targets.length}):\n`);
      for (const target of targets) {
        console.log(`  • ${target}`);
      }
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync(process.argv).catch(fail);
