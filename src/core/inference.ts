/**
 * ABI Inference for Unsupported Targets
 *
 * When the host cannot compile a target, its dump is inferred from the
 * closest supported relatives in the target hierarchy: the declarations they
 * all share, plus whatever the previous reference dump recorded as specific
 * to the unsupported target.
 */

import { Target } from './types';
import { InferenceError } from './errors';
import { AbiDumpMerger } from './merger';
import { sortTargets } from './aliases';
import { DEFAULT_TARGET_HIERARCHY, TargetHierarchy } from './hierarchy';

export interface InferenceInput {
  /** Target whose dump cannot be generated on this host */
  unsupportedTarget: Target;

  /** Targets with generated dumps */
  supportedTargets: Iterable<Target>;

  /** Individual dump text per supported target */
  dumps: ReadonlyMap<Target, string>;

  /** Previous merged reference dump; undefined or null when there is none */
  image?: string | null;

  hierarchy?: TargetHierarchy;
}

export interface InferenceResult {
  /** Inferred single-target dump for the unsupported target */
  dump: string;

  /** Supported targets the dump was inferred from, sorted */
  matchingTargets: Target[];

  /** Non-fatal diagnostics for the caller to report */
  warnings: string[];
}

/**
 * Walk up the hierarchy from `unsupportedTarget` until a group contains at
 * least one supported target, and return those targets.
 */
export function findMatchingTargets(
  unsupportedTarget: Target,
  supportedTargets: Iterable<Target>,
  hierarchy: TargetHierarchy = DEFAULT_TARGET_HIERARCHY
): Target[] {
  const supported = new Set(supportedTargets);
  let current: string | null = unsupportedTarget;

  while (current !== null) {
    const matching = [...hierarchy.targets(current)].filter((t) => supported.has(t));
    if (matching.length > 0) return sortTargets(matching);
    current = hierarchy.parent(current);
  }

  throw new InferenceError(
    unsupportedTarget,
    `The target ${unsupportedTarget} is not supported by the host compiler ` +
      `and there are no targets similar to ${unsupportedTarget} to infer a dump from.`
  );
}

/**
 * Infer a dump for a target the host cannot compile.
 */
export function inferAbiForUnsupportedTarget(input: InferenceInput): InferenceResult {
  const { unsupportedTarget, dumps } = input;
  const hierarchy = input.hierarchy ?? DEFAULT_TARGET_HIERARCHY;
  const warnings: string[] = [];

  const matchingTargets = findMatchingTargets(unsupportedTarget, input.supportedTargets, hierarchy);

  const common = new AbiDumpMerger({ hierarchy });
  for (const target of matchingTargets) {
    const dump = dumps.get(target);
    if (dump === undefined) {
      throw new Error(`No dump was provided for supported target ${target}`);
    }
    common.addIndividualDump(target, dump);
  }
  common.retainCommonAbi();

  const image = input.image;
  if (image !== undefined && image !== null) {
    if (image.trim().length > 0) {
      const specific = new AbiDumpMerger({ hierarchy });
      specific.loadMergedDump(image);
      specific.retainTargetSpecificAbi(unsupportedTarget);
      common.mergeTargetSpecific(specific);
    } else {
      warnings.push(
        `The reference ABI dump exists but is empty; it is ignored while inferring the dump for ${unsupportedTarget}.`
      );
    }
  }

  common.overrideTargets([unsupportedTarget]);
  const dump = common.render({ includeTargets: false });

  warnings.push(
    `An ABI dump for target ${unsupportedTarget} was inferred from the ABI generated for targets ` +
      `[${matchingTargets.join(', ')}] as the former target is not supported by the host compiler. ` +
      `The inferred dump may not reflect the actual ABI of ${unsupportedTarget}; ` +
      `regenerate it on a host supporting all required targets.`
  );

  return { dump, matchingTargets, warnings };
}
