import * as os from 'node:os';
import * as path from 'node:path';

import fs from 'fs-extra';
import { afterEach, describe, expect, it } from 'vitest';

import {
  detectTarCompression,
  extractArchive,
  isArchive,
  stripArchiveExtension,
  withExtractedArchive,
  withFixtureDirectory,
} from '../../suite/components/archive.ts';
import { EXTRACT_TMP_PREFIX } from '../../suite/components/constants.ts';
import {
  ArchiveError,
  FixtureError,
  UnsupportedArchiveError,
} from '../../suite/components/errors.ts';
import {
  FIXTURES_DIR,
  cleanupTemp,
  createTar,
  createZip,
  makeTempDir,
} from './fixtures.ts';

const TREE = { 'readme.txt': 'hello archive\n', 'data/values.txt': '1\n2\n3\n' };

async function readTree(dir: string) {
  return {
    readme: await fs.readFile(path.join(dir, 'readme.txt'), 'utf8'),
    values: await fs.readFile(path.join(dir, 'data', 'values.txt'), 'utf8'),
  };
}

afterEach(cleanupTemp);

describe('archive names', () => {
  it('recognizes archive suffixes case-insensitively', () => {
    expect(isArchive('state.zip')).toBe(true);
    expect(isArchive('STATE.TAR.GZ')).toBe(true);
    expect(isArchive('state.tgz')).toBe(true);
    expect(isArchive('state.txz')).toBe(true);
    expect(isArchive('state.txt')).toBe(false);
    expect(isArchive('state')).toBe(false);
  });

  it('strips simple and compound suffixes', () => {
    expect(stripArchiveExtension('initial_state.zip')).toBe('initial_state');
    expect(stripArchiveExtension('initial_state.tar.gz')).toBe('initial_state');
    expect(stripArchiveExtension('final_state.tar.bz2')).toBe('final_state');
    expect(stripArchiveExtension('fixture.tbz2')).toBe('fixture');
    expect(stripArchiveExtension('initial_state.txt')).toBe('initial_state.txt');
    expect(stripArchiveExtension('initial_state')).toBe('initial_state');
  });
});

describe('detectTarCompression', () => {
  it('reads bzip2 and xz magic bytes', async () => {
    expect(await detectTarCompression(path.join(FIXTURES_DIR, 'archives', 'tree.tar.bz2'))).toBe(
      'bzip2',
    );
    expect(await detectTarCompression(path.join(FIXTURES_DIR, 'archives', 'tree.tar.xz'))).toBe(
      'xz',
    );
  });

  it('tells gzip from plain tar', async () => {
    const dir = await makeTempDir();
    const gz = await createTar(path.join(dir, 'a.tar.gz'), TREE, { gzip: true });
    const plain = await createTar(path.join(dir, 'a.tar'), TREE);

    expect(await detectTarCompression(gz)).toBe('gzip');
    expect(await detectTarCompression(plain)).toBe('none');
  });
});

describe('extractArchive', () => {
  it('extracts a zip into a temp directory and removes it on release', async () => {
    const dir = await makeTempDir();
    const zip = await createZip(path.join(dir, 'tree.zip'), TREE);

    const tree = await extractArchive(zip);
    expect(await readTree(tree.path)).toEqual({ readme: 'hello archive\n', values: '1\n2\n3\n' });

    await tree.release();
    expect(await fs.pathExists(tree.path)).toBe(false);
    // second release is a no-op
    await tree.release();
  });

  it.each([
    ['tar', { gzip: false }, 'tree.tar'],
    ['tar.gz', { gzip: true }, 'tree.tar.gz'],
    ['tgz', { gzip: true }, 'tree.tgz'],
  ])('extracts %s archives', async (_label, opts, name) => {
    const dir = await makeTempDir();
    const archive = await createTar(path.join(dir, name), TREE, opts);

    await withExtractedArchive(archive, async (out) => {
      expect(await readTree(out)).toEqual({ readme: 'hello archive\n', values: '1\n2\n3\n' });
    });
  });

  it.each(['tree.tar.bz2', 'tree.tar.xz'])('extracts checked-in %s', async (name) => {
    await withExtractedArchive(path.join(FIXTURES_DIR, 'archives', name), async (out) => {
      expect(await readTree(out)).toEqual({ readme: 'hello archive\n', values: '1\n2\n3\n' });
    });
  });

  it('rejects unrecognized extensions', async () => {
    await expect(extractArchive('/nowhere/state.rar')).rejects.toBeInstanceOf(
      UnsupportedArchiveError,
    );
  });

  it('reports a corrupt zip as INVALID_ARCHIVE', async () => {
    const dir = await makeTempDir();
    const bad = path.join(dir, 'bad.zip');
    await fs.writeFile(bad, 'this is not a zip file');

    const err = await extractArchive(bad).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ArchiveError);
    expect(err).toMatchObject({ code: 'INVALID_ARCHIVE', type: 'archive' });
  });

  it('fails and cleans up when a zip entry cannot be written', async () => {
    const dir = await makeTempDir();
    // "a" lands as a file, so "a/b.txt" has no directory to go into
    const zip = await createZip(path.join(dir, 'clash.zip'), { a: 'file\n', 'a/b.txt': 'b\n' });
    const extractDirs = async () =>
      (await fs.readdir(os.tmpdir())).filter((n) => n.startsWith(EXTRACT_TMP_PREFIX)).sort();
    const before = await extractDirs();

    await expect(extractArchive(zip)).rejects.toBeInstanceOf(ArchiveError);
    expect(await extractDirs()).toEqual(before);
  });

  it('releases the temp directory when the callback throws', async () => {
    const dir = await makeTempDir();
    const zip = await createZip(path.join(dir, 'tree.zip'), TREE);
    let seen = '';

    await expect(
      withExtractedArchive(zip, async (out) => {
        seen = out;
        throw new Error('callback failed');
      }),
    ).rejects.toThrow('callback failed');
    expect(seen).not.toBe('');
    expect(await fs.pathExists(seen)).toBe(false);
  });
});

describe('withFixtureDirectory', () => {
  it('passes directories straight through', async () => {
    const dir = await makeTempDir();
    expect(await withFixtureDirectory(dir, async (d) => d)).toBe(dir);
  });

  it('rejects plain files', async () => {
    const dir = await makeTempDir();
    const file = path.join(dir, 'notes.txt');
    await fs.writeFile(file, 'notes\n');

    await expect(withFixtureDirectory(file, async (d) => d)).rejects.toBeInstanceOf(FixtureError);
  });
});
