import { describe, it, before, after, mock } from 'node:test';
import assert from 'node:assert';
import { mkdir, symlink } from 'node:fs/promises';
import { join } from 'node:path';
import { CatalogStore } from './catalog-store.js';
import { RomIdentifier, rate } from './identifier.js';
import type { CatalogLookup } from './identifier.js';
import { createMemoryLogger } from './logging.js';
import type { CatalogEntry, CatalogMatch, Fingerprint, IdentificationReport, IdentificationResult, RenamingReport } from './types.js';
import { buildDat, makeTempDir, removeDir, romFor, writeFixture } from '../tests/fixtures.js';

const MARIO = 'mario rom bytes';
const ZELDA = 'zelda rom bytes';
const TETRIS = 'tetris rom bytes';

describe('RomIdentifier', () => {
  let dir: string;
  let store: CatalogStore;

  before(async () => {
    dir = await makeTempDir();

    const mario = await romFor('Super Mario Bros. (World).nes', MARIO);
    const zelda = await romFor('Legend of Zelda, The (USA).nes', ZELDA);
    const tetris = await romFor('Tetris (World).gb', TETRIS);
    const dat = buildDat(
      [
        { name: 'Super Mario Bros. (World)', roms: [mario] },
        { name: 'Legend of Zelda, The (USA)', roms: [{ name: zelda.name, sha1: zelda.sha1 }] },
        { name: 'Tetris (World)', roms: [{ name: tetris.name, crc: tetris.crc }] },
      ],
      'Test Set'
    );

    store = new CatalogStore();
    assert.strictEqual(await store.loadSource(await writeFixture(join(dir, 'test.dat'), dat)), true);

    await writeFixture(join(dir, 'roms', 'mario.nes'), MARIO);
    await writeFixture(join(dir, 'roms', 'Super Mario Bros. (World).nes'), MARIO);
    await writeFixture(join(dir, 'roms', 'super mario bros. (world).NES'), MARIO);
    await writeFixture(join(dir, 'roms', 'zelda.nes'), ZELDA);
    await writeFixture(join(dir, 'roms', 'handheld', 'tetris.gb'), TETRIS);
    await writeFixture(join(dir, 'roms', 'homebrew.nes'), 'unknown rom bytes');
    await writeFixture(join(dir, 'roms', 'readme.txt'), MARIO);
  });

  after(async () => {
    await removeDir(dir);
  });

  describe('identify', () => {
    it('should identify a ROM by MD5', async () => {
      const identifier = new RomIdentifier(store);
      const filePath = join(dir, 'roms', 'mario.nes');

      const result = await identifier.identify(filePath);

      assert.strictEqual(result.status, 'success');
      assert.strictEqual(result.filePath, filePath);
      assert.strictEqual(result.fileName, 'mario.nes');
      assert.strictEqual(result.identified, true);
      assert.strictEqual(result.catalog, 'Test Set');
      assert.strictEqual(result.matchType, 'md5');
      assert.strictEqual(result.matchConfidence, 1.0);
      assert.strictEqual(result.correctName, 'Super Mario Bros. (World).nes');
      assert.strictEqual(result.matchedEntry?.description, 'Super Mario Bros. (World)');
      assert.strictEqual(result.nameMatches, false);
      assert.strictEqual(result.fingerprint?.size, MARIO.length);
    });

    it('should report a matching name', async () => {
      const identifier = new RomIdentifier(store);

      const result = await identifier.identify(join(dir, 'roms', 'Super Mario Bros. (World).nes'));

      assert.strictEqual(result.identified, true);
      assert.strictEqual(result.nameMatches, true);
    });

    it('should compare names case-sensitively', async () => {
      const identifier = new RomIdentifier(store);

      const result = await identifier.identify(join(dir, 'roms', 'super mario bros. (world).NES'));

      assert.strictEqual(result.identified, true);
      assert.strictEqual(result.nameMatches, false);
    });

    it('should fall back to SHA-1 and CRC32 matches', async () => {
      const identifier = new RomIdentifier(store);

      const zelda = await identifier.identify(join(dir, 'roms', 'zelda.nes'));
      const tetris = await identifier.identify(join(dir, 'roms', 'handheld', 'tetris.gb'));

      assert.strictEqual(zelda.matchType, 'sha1');
      assert.strictEqual(zelda.matchConfidence, 0.99);
      assert.strictEqual(zelda.correctName, 'Legend of Zelda, The (USA).nes');
      assert.strictEqual(tetris.matchType, 'crc32');
      assert.strictEqual(tetris.matchConfidence, 0.95);
      assert.strictEqual(tetris.correctName, 'Tetris (World).gb');
    });

    it('should return an unidentified success for unknown content', async () => {
      const identifier = new RomIdentifier(store);

      const result = await identifier.identify(join(dir, 'roms', 'homebrew.nes'));

      assert.strictEqual(result.status, 'success');
      assert.strictEqual(result.identified, false);
      assert.strictEqual(result.matchType, undefined);
      assert.strictEqual(result.correctName, undefined);
      assert.strictEqual(result.nameMatches, undefined);
      assert.strictEqual(result.fingerprint?.size, 'unknown rom bytes'.length);
    });

    it('should reject a missing file', async () => {
      const identifier = new RomIdentifier(store);
      const filePath = join(dir, 'roms', 'missing.nes');

      const result = await identifier.identify(filePath);

      assert.strictEqual(result.status, 'error');
      assert.strictEqual(result.errorKind, 'validation');
      assert.strictEqual(result.message, `File not found: ${filePath}`);
      assert.strictEqual(result.identified, false);
      assert.strictEqual(result.fingerprint, undefined);
    });

    it('should reject a directory', async () => {
      const identifier = new RomIdentifier(store);
      const filePath = join(dir, 'roms', 'folder.nes');
      await mkdir(filePath, { recursive: true });

      const result = await identifier.identify(filePath);

      assert.strictEqual(result.status, 'error');
      assert.strictEqual(result.message, `File not found: ${filePath}`);
    });

    it('should reject files without a ROM extension', async () => {
      const identifier = new RomIdentifier(store);
      const filePath = join(dir, 'roms', 'readme.txt');

      const result = await identifier.identify(filePath);

      assert.strictEqual(result.status, 'error');
      assert.strictEqual(result.errorKind, 'validation');
      assert.strictEqual(result.message, `Not a ROM file: ${filePath}`);
    });

    it('should identify by fingerprint alone', async () => {
      const entry: CatalogEntry = {
        name: 'game1.nes',
        description: 'Game 1',
        size: '131072',
        md5: '1a2b3c4d5e6f7g8h9i0j',
        crc32: 'abcd1234',
        sha1: '1a2b3c4d5e6f7g8h9i0j1k2l3m4n5o6p7q8r9s0t',
      };
      const findByFingerprint = mock.fn(
        (_fingerprint: Fingerprint): CatalogMatch | null => ({
          entry,
          catalog: 'Test Database',
          matchType: 'md5',
          confidence: 1.0,
        })
      );
      const findByName = mock.fn(() => []);
      const lookup: CatalogLookup & { findByName: typeof findByName } = { findByFingerprint, findByName };
      const identifier = new RomIdentifier(lookup);

      const result = await identifier.identify(join(dir, 'roms', 'homebrew.nes'));

      assert.strictEqual(findByFingerprint.mock.callCount(), 1);
      assert.strictEqual(findByFingerprint.mock.calls[0].arguments[0].size, 'unknown rom bytes'.length);
      assert.strictEqual(findByName.mock.callCount(), 0);
      assert.strictEqual(result.identified, true);
      assert.strictEqual(result.correctName, 'game1.nes');
      assert.strictEqual(result.catalog, 'Test Database');
      assert.strictEqual(result.nameMatches, false);
    });
  });

  describe('identifyDirectory', () => {
    it('should identify every ROM file recursively', async () => {
      const identifier = new RomIdentifier(store);

      const results = await identifier.identifyDirectory(join(dir, 'roms'));

      assert.deepStrictEqual(
        results.map((r) => r.fileName),
        [
          'Super Mario Bros. (World).nes',
          'homebrew.nes',
          'mario.nes',
          'super mario bros. (world).NES',
          'zelda.nes',
          'tetris.gb',
        ]
      );
    });

    it('should stay in the top directory when not recursive', async () => {
      const identifier = new RomIdentifier(store);

      const results = await identifier.identifyDirectory(join(dir, 'roms'), false);

      assert.strictEqual(results.length, 5);
      assert.ok(results.every((r) => !r.filePath.includes('handheld')));
    });

    it('should include symlinked ROM files', async () => {
      const identifier = new RomIdentifier(store);
      const linked = join(dir, 'linked');
      await writeFixture(join(linked, 'plain.nes'), ZELDA);
      await symlink(join(dir, 'roms', 'mario.nes'), join(linked, 'link.nes'));

      const results = await identifier.identifyDirectory(linked, false);

      assert.deepStrictEqual(
        results.map((r) => [r.fileName, r.correctName]),
        [
          ['link.nes', 'Super Mario Bros. (World).nes'],
          ['plain.nes', 'Legend of Zelda, The (USA).nes'],
        ]
      );
    });

    it('should return nothing for a missing directory', async () => {
      const logger = createMemoryLogger();
      const identifier = new RomIdentifier(store, { logger });

      const results = await identifier.identifyDirectory(join(dir, 'nowhere'));

      assert.deepStrictEqual(results, []);
      assert.strictEqual(logger.entries.length, 1);
      assert.strictEqual(logger.entries[0].level, 'error');
      assert.strictEqual(logger.entries[0].msg, 'Directory not found');
    });

    it('should return nothing for a file path', async () => {
      const identifier = new RomIdentifier(store);

      assert.deepStrictEqual(await identifier.identifyDirectory(join(dir, 'roms', 'mario.nes')), []);
    });
  });

  describe('generateReport', () => {
    function result(identified: boolean, nameMatches?: boolean): IdentificationResult {
      return { filePath: '/roms/x.nes', fileName: 'x.nes', status: 'success', identified, nameMatches };
    }

    it('should summarize results', async () => {
      const identifier = new RomIdentifier(store);
      const results = [result(true, true), result(true, false), result(false), result(false)];

      const report = await identifier.generateReport(results);

      assert.strictEqual(report.total, 4);
      assert.strictEqual(report.identified, 2);
      assert.strictEqual(report.identificationRate, 0.5);
      assert.strictEqual(report.correct, 1);
      assert.strictEqual(report.correctNameRate, 0.5);
      assert.strictEqual(report.results, results);
    });

    it('should report zero rates for no results', async () => {
      const report = await new RomIdentifier(store).generateReport([]);

      assert.deepStrictEqual(report, {
        total: 0,
        identified: 0,
        identificationRate: 0,
        correct: 0,
        correctNameRate: 0,
        results: [],
      });
    });

    it('should hand the report to a sink', async () => {
      const written: (IdentificationReport | RenamingReport)[] = [];
      const identifier = new RomIdentifier(store);

      const report = await identifier.generateReport([result(true, true)], {
        write: async (r) => {
          written.push(r);
        },
      });

      assert.deepStrictEqual(written, [report]);
    });

    it('should still return the report when the sink fails', async () => {
      const logger = createMemoryLogger();
      const identifier = new RomIdentifier(store, { logger });

      const report = await identifier.generateReport([result(false)], {
        write: async () => {
          throw new Error('disk full');
        },
      });

      assert.strictEqual(report.total, 1);
      assert.strictEqual(logger.entries[0].level, 'error');
      assert.strictEqual(logger.entries[0].error, 'disk full');
    });
  });
});

describe('rate', () => {
  it('should divide and guard against zero', () => {
    assert.strictEqual(rate(1, 4), 0.25);
    assert.strictEqual(rate(3, 0), 0);
  });
});
