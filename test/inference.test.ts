/**
 * Tests for ABI inference of unsupported targets
 */

import { findMatchingTargets, inferAbiForUnsupportedTarget } from '../src/core/inference';
import { InferenceError } from '../src/core/errors';
import { BAR_FUN, FOO_BAR, FOO_BAR_BAZ, FOO_CLASS, HEADER_LINES, singleTargetDump } from './fixtures/dumps';

const ARM_FUN = 'final fun arm(): kotlin/Unit // org.example/arm|arm(){}[0]';
const LEGACY_FUN = 'final fun legacy(): kotlin/Unit // org.example/Foo.legacy|legacy(){}[0]';

const LINUX_DUMPS = new Map([
  ['linuxArm64', singleTargetDump(FOO_CLASS, `    ${BAR_FUN}`, '}', ARM_FUN)],
  ['linuxX64', FOO_BAR],
  ['mingwX64', FOO_BAR_BAZ],
]);

describe('Unsupported target inference', () => {
  // ─── Matching Targets ─────────────────────────────────────────────────

  describe('findMatchingTargets()', () => {
    test('uses the closest group with supported targets', () => {
      expect(findMatchingTargets('iosX64', ['iosArm64', 'linuxX64'])).toEqual(['iosArm64']);
      expect(findMatchingTargets('iosX64', ['linuxX64', 'macosArm64'])).toEqual(['macosArm64']);
      expect(findMatchingTargets('wasmJs', ['linuxX64', 'js'])).toEqual(['js', 'linuxX64']);
    });

    test('places unknown targets by their name prefix', () => {
      expect(findMatchingTargets('linuxArm32', ['linuxArm64', 'linuxX64', 'mingwX64'])).toEqual([
        'linuxArm64',
        'linuxX64',
      ]);
    });

    test('fails when no relative is supported', () => {
      expect(() => findMatchingTargets('solarisX64', ['linuxX64'])).toThrow(InferenceError);
      expect(() => findMatchingTargets('linuxArm32', [])).toThrow(
        'The target linuxArm32 is not supported by the host compiler and there are no targets similar to linuxArm32 to infer a dump from.'
      );
    });

    test('reports the target on the error', () => {
      try {
        findMatchingTargets('solarisX64', []);
        throw new Error('Expected an InferenceError');
      } catch (error) {
        expect(error).toBeInstanceOf(InferenceError);
        expect(error instanceof InferenceError && error.target).toBe('solarisX64');
      }
    });
  });

  // ─── Inference ────────────────────────────────────────────────────────

  describe('inferAbiForUnsupportedTarget()', () => {
    test('infers the common ABI of the closest relatives', () => {
      const result = inferAbiForUnsupportedTarget({
        unsupportedTarget: 'linuxArm32',
        supportedTargets: LINUX_DUMPS.keys(),
        dumps: LINUX_DUMPS,
      });

      expect(result.matchingTargets).toEqual(['linuxArm64', 'linuxX64']);
      expect(result.dump).toBe(FOO_BAR);
      expect(result.warnings).toHaveLength(1);
      expect(result.warnings[0]).toContain(
        'An ABI dump for target linuxArm32 was inferred from the ABI generated for targets [linuxArm64, linuxX64]'
      );
    });

    test('adds the declarations the reference recorded for the target', () => {
      const image = [
        '// Klib ABI Dump',
        '// Targets: [linuxArm32, linuxArm64, linuxX64]',
        ...HEADER_LINES.slice(1),
        `${FOO_CLASS} // Targets: [linuxArm32, linuxArm64, linuxX64]`,
        `    ${BAR_FUN} // Targets: [linuxArm32, linuxArm64, linuxX64]`,
        `    ${LEGACY_FUN} // Targets: [linuxArm32]`,
        '}',
      ].join('\n');

      const result = inferAbiForUnsupportedTarget({
        unsupportedTarget: 'linuxArm32',
        supportedTargets: LINUX_DUMPS.keys(),
        dumps: LINUX_DUMPS,
        image,
      });

      expect(result.dump).toBe(singleTargetDump(FOO_CLASS, `    ${BAR_FUN}`, `    ${LEGACY_FUN}`, '}'));
      expect(result.warnings).toHaveLength(1);
    });

    test('warns about an empty reference', () => {
      const result = inferAbiForUnsupportedTarget({
        unsupportedTarget: 'linuxArm32',
        supportedTargets: LINUX_DUMPS.keys(),
        dumps: LINUX_DUMPS,
        image: '  \n',
      });

      expect(result.dump).toBe(FOO_BAR);
      expect(result.warnings).toHaveLength(2);
      expect(result.warnings[0]).toBe(
        'The reference ABI dump exists but is empty; it is ignored while inferring the dump for linuxArm32.'
      );
    });

    test('requires a dump for every matching target', () => {
      expect(() =>
        inferAbiForUnsupportedTarget({
          unsupportedTarget: 'linuxArm32',
          supportedTargets: ['linuxArm64', 'linuxX64'],
          dumps: new Map([['linuxArm64', FOO_BAR]]),
        })
      ).toThrow('No dump was provided for supported target linuxX64');
    });

    test('fails without any supported relative', () => {
      expect(() =>
        inferAbiForUnsupportedTarget({
          unsupportedTarget: 'linuxArm32',
          supportedTargets: [],
          dumps: new Map(),
        })
      ).toThrow(InferenceError);
    });
  });
});
