import { describe, it, expect } from 'vitest';
import { extractModInfo, hashContent } from './mod-extractor';
import { ExtractionError } from '../../utils/errors';
import { buildFabricJar, buildZip, sha256 } from '../../../test-config/mocks/test-helpers';

const FORGE_TOML = `
modLoader = "javafml"
loaderVersion = "[47,)"

[[mods]]
modId = "examplemod"
version = "2.3.1"
displayName = "Example Mod"

[[dependencies.examplemod]]
modId = "forge"
mandatory = true
versionRange = "[47,)"
side = "BOTH"

[[dependencies.examplemod]]
modId = "minecraft"
mandatory = true
versionRange = "[1.20.1]"
side = "CLIENT"
`;

async function expectExtractionError(
  promise: Promise<unknown>,
  kind: ExtractionError['kind'],
): Promise<ExtractionError> {
  const error = await promise.then(
    () => null,
    (reason: unknown) => reason,
  );
  expect(error).toBeInstanceOf(ExtractionError);
  if (!(error instanceof ExtractionError)) {
    throw new Error('expected an ExtractionError');
  }
  expect(error.kind).toBe(kind);
  return error;
}

describe('extractModInfo', () => {
  describe('fabric.mod.json', () => {
    it.each([
      ['client', 'client-only'],
      ['server', 'server-only'],
      ['*', 'both'],
    ] as const)('maps environment %s to %s', async (environment, expected) => {
      const bytes = await buildFabricJar('sodium', '0.5.8', environment);

      const info = await extractModInfo(bytes, 'sodium-0.5.8.jar');

      expect(info.sideSupport).toBe(expected);
    });

    it('treats a missing environment as unknown and fills in every field', async () => {
      const bytes = await buildZip({
        'fabric.mod.json': JSON.stringify({
          id: 'lithium',
          name: 'Lithium',
          version: '0.11.2',
        }),
      });

      const info = await extractModInfo(bytes, 'lithium.jar');

      expect(info).toEqual({
        modId: 'lithium',
        name: 'Lithium',
        version: '0.11.2',
        filename: 'lithium.jar',
        contentHash: sha256(bytes),
        size: bytes.length,
        sideSupport: 'unknown',
        format: 'fabric-json',
        loader: 'fabric',
      });
    });

    it('rejects a fabric.mod.json without a version', async () => {
      const bytes = await buildZip({
        'fabric.mod.json': JSON.stringify({ id: 'broken' }),
      });

      const error = await expectExtractionError(
        extractModInfo(bytes, 'broken.jar'),
        'metadata-parse-error',
      );
      expect(error.filename).toBe('broken.jar');
      expect(error.message).toBe(
        'Malformed fabric.mod.json in broken.jar: version: Required',
      );
    });

    it('rejects invalid JSON without falling back to the manifest', async () => {
      const bytes = await buildZip({
        'fabric.mod.json': '{ not json',
        'META-INF/MANIFEST.MF': 'Implementation-Title: Fallback\n',
      });

      await expectExtractionError(
        extractModInfo(bytes, 'broken.jar'),
        'metadata-parse-error',
      );
    });
  });

  describe('mods.toml', () => {
    it('reads the first mod and prefers the first loader dependency side', async () => {
      const bytes = await buildZip({ 'META-INF/mods.toml': FORGE_TOML });

      const info = await extractModInfo(bytes, 'examplemod-2.3.1.jar');

      expect(info.modId).toBe('examplemod');
      expect(info.name).toBe('Example Mod');
      expect(info.version).toBe('2.3.1');
      expect(info.sideSupport).toBe('both');
      expect(info.format).toBe('forge-toml');
      expect(info.loader).toBe('forge');
    });

    it('uses the side declared on the mod entry over dependencies', async () => {
      const toml = FORGE_TOML.replace(
        'displayName = "Example Mod"',
        'displayName = "Example Mod"\nside = "CLIENT"',
      );
      const bytes = await buildZip({ 'META-INF/mods.toml': toml });

      const info = await extractModInfo(bytes, 'examplemod.jar');

      expect(info.sideSupport).toBe('client-only');
    });

    it('resolves ${file.jarVersion} from the manifest', async () => {
      const bytes = await buildZip({
        'META-INF/mods.toml': '[[mods]]\nmodId = "jarver"\nversion = "${file.jarVersion}"\n',
        'META-INF/MANIFEST.MF':
          'Manifest-Version: 1.0\r\nImplementation-Version: 4.5.6\r\n',
      });

      const info = await extractModInfo(bytes, 'jarver.jar');

      expect(info.version).toBe('4.5.6');
      expect(info.sideSupport).toBe('unknown');
    });

    it('falls back to unknown when ${file.jarVersion} has no manifest', async () => {
      const bytes = await buildZip({
        'META-INF/mods.toml': '[[mods]]\nmodId = "jarver"\nversion = "${file.jarVersion}"\n',
      });

      const info = await extractModInfo(bytes, 'jarver.jar');

      expect(info.version).toBe('unknown');
    });

    it('prefers neoforge.mods.toml and reports the neoforge loader', async () => {
      const bytes = await buildZip({
        'META-INF/neoforge.mods.toml':
          '[[mods]]\nmodId = "neomod"\nversion = "1.0.0"\n\n[[dependencies.neomod]]\nmodId = "neoforge"\nside = "SERVER"\n',
        'META-INF/mods.toml': '[[mods]]\nmodId = "oldmod"\nversion = "0.1"\n',
      });

      const info = await extractModInfo(bytes, 'neomod.jar');

      expect(info.modId).toBe('neomod');
      expect(info.sideSupport).toBe('server-only');
      expect(info.loader).toBe('neoforge');
    });

    it('wins over fabric.mod.json when both are present', async () => {
      const bytes = await buildZip({
        'META-INF/mods.toml': '[[mods]]\nmodId = "dual"\nversion = "1.0"\n',
        'fabric.mod.json': JSON.stringify({ id: 'dual-fabric', version: '9.9' }),
      });

      const info = await extractModInfo(bytes, 'dual.jar');

      expect(info.modId).toBe('dual');
      expect(info.format).toBe('forge-toml');
    });

    it('rejects a TOML syntax error', async () => {
      const bytes = await buildZip({ 'META-INF/mods.toml': '[[mods]\nmodId = ' });

      await expectExtractionError(
        extractModInfo(bytes, 'bad.jar'),
        'metadata-parse-error',
      );
    });

    it('rejects a mods.toml without any [[mods]] entry', async () => {
      const bytes = await buildZip({ 'META-INF/mods.toml': 'modLoader = "javafml"\n' });

      await expectExtractionError(
        extractModInfo(bytes, 'empty.jar'),
        'metadata-parse-error',
      );
    });
  });

  describe('mcmod.info', () => {
    it('reads the first element of an array', async () => {
      const bytes = await buildZip({
        'mcmod.info': JSON.stringify([
          { modid: 'oldmod', name: 'Old Mod', version: '1.7.10-2' },
          { modid: 'second', version: '1' },
        ]),
      });

      const info = await extractModInfo(bytes, 'oldmod.jar');

      expect(info.modId).toBe('oldmod');
      expect(info.name).toBe('Old Mod');
      expect(info.version).toBe('1.7.10-2');
      expect(info.sideSupport).toBe('unknown');
      expect(info.format).toBe('legacy-mcmod');
    });

    it('reads the modList form', async () => {
      const bytes = await buildZip({
        'META-INF/mcmod.info': JSON.stringify({
          modListVersion: 2,
          modList: [{ modid: 'listed', version: '3.0' }],
        }),
      });

      const info = await extractModInfo(bytes, 'listed.jar');

      expect(info.modId).toBe('listed');
      expect(info.version).toBe('3.0');
    });
  });

  describe('MANIFEST.MF', () => {
    it('derives identity from the implementation title', async () => {
      const bytes = await buildZip({
        'META-INF/MANIFEST.MF':
          'Manifest-Version: 1.0\nImplementation-Title: Cool Library-Core\nImplementation-Version: 2.0\n',
      });

      const info = await extractModInfo(bytes, 'cool.jar');

      expect(info.modId).toBe('cool_library_core');
      expect(info.name).toBe('Cool Library-Core');
      expect(info.version).toBe('2.0');
      expect(info.format).toBe('manifest');
    });

    it('joins continuation lines', async () => {
      const bytes = await buildZip({
        'META-INF/MANIFEST.MF': 'Bundle-Name: Very Long\n  Name\nBundle-Version: 7\n',
      });

      const info = await extractModInfo(bytes, 'long.jar');

      expect(info.name).toBe('Very Long Name');
      expect(info.version).toBe('7');
    });

    it('falls through to the filename when the manifest has no title', async () => {
      const bytes = await buildZip({
        'META-INF/MANIFEST.MF': 'Manifest-Version: 1.0\nCreated-By: 17\n',
      });

      const info = await extractModInfo(bytes, 'Plain Lib 1.2.jar');

      expect(info.modId).toBe('plain_lib_1.2');
      expect(info.version).toBe('unknown');
      expect(info.format).toBe('anonymous');
    });
  });

  describe('anonymous archives', () => {
    it('normalizes the filename stem into the mod id', async () => {
      const bytes = await buildZip({ 'assets/readme.txt': 'hello' });

      const info = await extractModInfo(bytes, 'My Cool+Mod (Final).JAR');

      expect(info.modId).toBe('my_cool_mod_final_');
      expect(info.name).toBe('my_cool_mod_final_');
      expect(info.version).toBe('unknown');
      expect(info.sideSupport).toBe('unknown');
      expect(info.loader).toBe('unknown');
    });
  });

  it('reports bytes that are not a zip as a corrupt archive', async () => {
    const error = await expectExtractionError(
      extractModInfo(Buffer.from('definitely not a zip'), 'fake.jar'),
      'corrupt-archive',
    );
    expect(error.filename).toBe('fake.jar');
  });

  it('hashes the full archive bytes', async () => {
    const first = await buildFabricJar('samemod', '1.0.0', '*');
    const second = await buildFabricJar('samemod', '1.0.0', '*', {
      'assets/extra.txt': 'changed',
    });

    const a = await extractModInfo(first, 'samemod.jar');
    const b = await extractModInfo(second, 'samemod.jar');

    expect(a.contentHash).toBe(hashContent(first));
    expect(a.contentHash).not.toBe(b.contentHash);
    expect(a.version).toBe(b.version);
  });
});
