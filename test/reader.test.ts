/**
 * Tests for dump filters, the per-target renderer and the JSON reader
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  DEFAULT_DUMP_FILTERS,
  createDumpFilters,
  isExcluded,
  parseSignatureVersion,
  selectSignatureVersion,
  toAbiQualifiedName,
  toReadingFilters,
} from '../src/reader/filters';
import { renderLibraryAbi } from '../src/reader/renderer';
import { JsonAbiReader, parseLibraryAbi } from '../src/reader/json';
import { AbiDumpMerger } from '../src/core/merger';
import { AbiDeclaration, LibraryAbi } from '../src/core/types';

const TEST_DIR = path.join(__dirname, '.test-reader');

beforeEach(() => {
  if (fs.existsSync(TEST_DIR)) {
    fs.rmSync(TEST_DIR, { recursive: true, force: true });
  }
});

afterAll(() => {
  if (fs.existsSync(TEST_DIR)) {
    fs.rmSync(TEST_DIR, { recursive: true, force: true });
  }
});

const LIBRARY: LibraryAbi = {
  uniqueName: 'org.example:lib',
  manifest: { Platform: 'NATIVE' },
  signatureVersions: [
    { versionNumber: 1, supportedByReader: true },
    { versionNumber: 2, supportedByReader: true },
  ],
  declarations: [
    {
      kind: 'class',
      qualifiedName: 'org.example/Foo',
      text: 'final class org.example/Foo',
      signatures: { '1': 'org.example/Foo|-1234', '2': 'org.example/Foo|null[0]' },
      declarations: [
        {
          kind: 'function',
          qualifiedName: 'org.example/Foo.bar',
          text: 'final fun bar(): kotlin/Int',
          signatures: { '2': 'org.example/Foo.bar|bar(){}[0]' },
        },
        {
          kind: 'function',
          qualifiedName: 'org.example/Foo.secret',
          text: 'final fun secret(): kotlin/Unit',
          annotations: ['org.example/InternalApi'],
          signatures: { '2': 'org.example/Foo.secret|secret(){}[0]' },
        },
      ],
    },
    {
      kind: 'function',
      qualifiedName: 'org.internal/helper',
      text: 'final fun org.internal/helper(): kotlin/Unit',
      signatures: { '2': 'org.internal/helper|helper(){}[0]' },
    },
  ],
};

function header(version: number): string[] {
  return [
    '// Klib ABI Dump',
    '// Rendering settings:',
    `// - Signature version: ${version}`,
    '// - Show manifest properties: true',
    '// - Show declarations: true',
    '',
    '// Library unique name: <org.example:lib>',
    '// Platform: NATIVE',
  ];
}

function declaration(qualifiedName: string, extra: Partial<AbiDeclaration> = {}): AbiDeclaration {
  return { kind: 'function', qualifiedName, text: 'fun f()', ...extra };
}

describe('Dump filters', () => {
  // ─── Qualified Names ──────────────────────────────────────────────────

  describe('toAbiQualifiedName()', () => {
    test('separates the package from the class path', () => {
      expect(toAbiQualifiedName('org.example.Foo')).toBe('org.example/Foo');
      expect(toAbiQualifiedName('org.example.Outer$Inner')).toBe('org.example/Outer.Inner');
      expect(toAbiQualifiedName('Foo')).toBe('/Foo');
    });

    test('keeps dollar signs that do not separate nested classes', () => {
      expect(toAbiQualifiedName('org.example.Outer$$$sub')).toBe('org.example/Outer.$$sub');
      expect(toAbiQualifiedName('org.example.Foo$')).toBe('org.example/Foo$');
      expect(toAbiQualifiedName('$Foo')).toBe('/$Foo');
    });

    test('rejects blank and already qualified names', () => {
      expect(toAbiQualifiedName('   ')).toBeNull();
      expect(toAbiQualifiedName('org.example/Foo')).toBeNull();
    });
  });

  // ─── Reading Filters ──────────────────────────────────────────────────

  describe('toReadingFilters()', () => {
    test('produces nothing for the defaults', () => {
      expect(toReadingFilters(DEFAULT_DUMP_FILTERS)).toEqual([]);
    });

    test('produces filters in a fixed order', () => {
      const filters = createDumpFilters({
        ignoredPackages: ['org.internal'],
        ignoredClasses: ['org.example.Outer$Hidden'],
        nonPublicMarkers: ['org.example.InternalApi'],
      });
      expect(toReadingFilters(filters)).toEqual([
        { kind: 'excludedClasses', classes: ['org.example/Outer.Hidden'] },
        { kind: 'nonPublicMarkers', markers: ['org.example/InternalApi'] },
        { kind: 'excludedPackages', packages: ['org.internal'] },
      ]);
    });

    test('drops names that cannot be qualified', () => {
      expect(toReadingFilters(createDumpFilters({ ignoredClasses: ['', 'org/Foo'] }))).toEqual([]);
    });
  });

  describe('isExcluded()', () => {
    const filters = toReadingFilters(
      createDumpFilters({
        ignoredPackages: ['org.internal'],
        ignoredClasses: ['org.example.Hidden'],
        nonPublicMarkers: ['org.example.InternalApi'],
      })
    );

    test('excludes packages and their subpackages', () => {
      expect(isExcluded(declaration('org.internal/helper'), filters)).toBe(true);
      expect(isExcluded(declaration('org.internal.impl/Helper'), filters)).toBe(true);
      expect(isExcluded(declaration('org.internalx/helper'), filters)).toBe(false);
    });

    test('excludes classes by name', () => {
      expect(isExcluded(declaration('org.example/Hidden', { kind: 'class' }), filters)).toBe(true);
      expect(isExcluded(declaration('org.example/Hidden'), filters)).toBe(false);
    });

    test('excludes declarations with a non-public marker', () => {
      expect(isExcluded(declaration('org.example/f', { annotations: ['org.example/InternalApi'] }), filters)).toBe(true);
      expect(isExcluded(declaration('org.example/f', { annotations: ['org.example/Other'] }), filters)).toBe(false);
    });
  });

  // ─── Signature Versions ───────────────────────────────────────────────

  describe('selectSignatureVersion()', () => {
    const library: LibraryAbi = {
      ...LIBRARY,
      signatureVersions: [
        { versionNumber: 1, supportedByReader: true },
        { versionNumber: 2, supportedByReader: true },
        { versionNumber: 3, supportedByReader: false },
      ],
    };

    test('picks the latest supported version', () => {
      expect(selectSignatureVersion(library, 'latest')).toBe(2);
    });

    test('accepts an explicitly supported version', () => {
      expect(selectSignatureVersion(library, 1)).toBe(1);
    });

    test('rejects an unsupported version', () => {
      expect(() => selectSignatureVersion(library, 3)).toThrow(
        "Unsupported KLib signature version '3'. Supported versions are: [1, 2]"
      );
    });

    test('fails when the reader supports no version', () => {
      expect(() => selectSignatureVersion({ ...library, signatureVersions: [] }, 'latest')).toThrow(
        "Can't choose a signature version for library org.example:lib"
      );
    });

    test('parses option values', () => {
      expect(parseSignatureVersion('latest')).toBe('latest');
      expect(parseSignatureVersion(' LATEST ')).toBe('latest');
      expect(parseSignatureVersion('2')).toBe(2);
      expect(() => parseSignatureVersion('0')).toThrow('Invalid signature version "0"');
      expect(() => parseSignatureVersion('two')).toThrow('Invalid signature version "two"');
    });
  });
});

describe('Per-target renderer', () => {
  test('renders every declaration with the latest signatures', () => {
    expect(renderLibraryAbi(LIBRARY)).toBe(
      [
        ...header(2),
        'final class org.example/Foo { // org.example/Foo|null[0]',
        '    final fun bar(): kotlin/Int // org.example/Foo.bar|bar(){}[0]',
        '    final fun secret(): kotlin/Unit // org.example/Foo.secret|secret(){}[0]',
        '}',
        'final fun org.internal/helper(): kotlin/Unit // org.internal/helper|helper(){}[0]',
        '',
      ].join('\n')
    );
  });

  test('leaves out filtered declarations', () => {
    const filters = createDumpFilters({ ignoredPackages: ['org.internal'], nonPublicMarkers: ['org.example.InternalApi'] });
    expect(renderLibraryAbi(LIBRARY, filters)).toBe(
      [
        ...header(2),
        'final class org.example/Foo { // org.example/Foo|null[0]',
        '    final fun bar(): kotlin/Int // org.example/Foo.bar|bar(){}[0]',
        '}',
        '',
      ].join('\n')
    );
  });

  test('leaves out an excluded class with its members', () => {
    const filters = createDumpFilters({ ignoredClasses: ['org.example.Foo'] });
    expect(renderLibraryAbi(LIBRARY, filters)).toBe(
      [...header(2), 'final fun org.internal/helper(): kotlin/Unit // org.internal/helper|helper(){}[0]', ''].join('\n')
    );
  });

  test('renders signatures of the requested version', () => {
    const filters = createDumpFilters({ ignoredPackages: ['org.internal'], signatureVersion: 1 });
    const rendered = renderLibraryAbi(LIBRARY, filters).split('\n');
    expect(rendered[2]).toBe('// - Signature version: 1');
    expect(rendered.slice(8, 10)).toEqual([
      'final class org.example/Foo { // org.example/Foo|-1234',
      '    final fun bar(): kotlin/Int',
    ]);
  });

  test('keeps ignored packages out of the merged dump', () => {
    const filters = createDumpFilters({ ignoredPackages: ['org.internal'] });
    const merger = new AbiDumpMerger();
    merger.addIndividualDump('linuxX64', renderLibraryAbi(LIBRARY, filters));
    merger.addIndividualDump('mingwX64', renderLibraryAbi(LIBRARY, filters));

    expect(merger.declarations().map((d) => d.path[d.path.length - 1])).toEqual([
      'final class org.example/Foo { // org.example/Foo|null[0]',
      'final fun bar(): kotlin/Int // org.example/Foo.bar|bar(){}[0]',
      'final fun secret(): kotlin/Unit // org.example/Foo.secret|secret(){}[0]',
    ]);
    expect(merger.render()).not.toContain('org.internal/helper');
  });

  test('rejects multi-line declaration text', () => {
    const broken: LibraryAbi = { ...LIBRARY, declarations: [declaration('org.example/f', { text: 'fun f()\nfun g()' })] };
    expect(() => renderLibraryAbi(broken)).toThrow('Declaration org.example/f has no single-line text');
  });
});

describe('JsonAbiReader', () => {
  function writeDescriptor(name: string, content: string): string {
    fs.mkdirSync(TEST_DIR, { recursive: true });
    const file = path.join(TEST_DIR, name);
    fs.writeFileSync(file, content, 'utf-8');
    return file;
  }

  test('reads a valid descriptor', () => {
    const file = writeDescriptor('lib.json', JSON.stringify(LIBRARY));
    expect(new JsonAbiReader().read(file)).toEqual(LIBRARY);
  });

  test('fails for a missing file', () => {
    const file = path.join(TEST_DIR, 'missing.json');
    expect(() => new JsonAbiReader().read(file)).toThrow(`File does not exist: ${file}`);
  });

  test('rejects descriptors that do not match the schema', () => {
    const { uniqueName: _ignored, ...withoutName } = LIBRARY;
    expect(() => parseLibraryAbi(JSON.stringify(withoutName), 'lib.json')).toThrow(/^Invalid ABI descriptor lib\.json: /);
    expect(() => parseLibraryAbi(JSON.stringify({ ...LIBRARY, declarations: [{ kind: 'macro' }] }))).toThrow(
      'Invalid ABI descriptor <input>'
    );
  });

  test('rejects line breaks in manifest values and signatures', () => {
    const manifest = { ...LIBRARY, manifest: { Platform: 'NATIVE\n// Forged: true' } };
    expect(() => parseLibraryAbi(JSON.stringify(manifest), 'lib.json')).toThrow(
      'Invalid ABI descriptor lib.json: /manifest/Platform: must match pattern'
    );

    const forged = declaration('org.example/f', { signatures: { '2': 'f|f(){}[0]\nfun g()' } });
    const signature = { ...LIBRARY, declarations: [forged] };
    expect(() => parseLibraryAbi(JSON.stringify(signature), 'lib.json')).toThrow(
      'Invalid ABI descriptor lib.json: /declarations/0/signatures/2: must match pattern'
    );
  });

  test('rejects malformed JSON', () => {
    expect(() => parseLibraryAbi('{', 'lib.json')).toThrow('Failed to parse ABI descriptor lib.json');
  });
});
