// suite/components/archive.ts
import { open, readFile } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { pipeline } from 'node:stream/promises';

import fs from 'fs-extra';
import { xz } from '@napi-rs/lzma';
import Bunzip from 'seek-bzip';
import * as tar from 'tar';
import yauzl from 'yauzl';

import { EXTRACT_TMP_PREFIX } from './constants.ts';
import {
  ArchiveError,
  FixtureError,
  UnsupportedArchiveError,
  errorMessage,
} from './errors.ts';

/** Suffixes treated as archives; matched on the name only, never by content */
export const ARCHIVE_EXTENSIONS = [
  '.zip',
  '.tar',
  '.gz',
  '.tgz',
  '.bz2',
  '.tbz2',
  '.xz',
  '.txz',
] as const;

export type TarCompression = 'none' | 'gzip' | 'bzip2' | 'xz';

/** An archive extracted into a temp directory, removed by release() */
export type ExtractedTree = {
  path: string;
  release: () => Promise<void>;
};

function archiveSuffix(p: string): string | undefined {
  const ext = path.extname(p).toLowerCase();
  return ARCHIVE_EXTENSIONS.find((e) => e === ext);
}

export function isArchive(p: string): boolean {
  return archiveSuffix(p) !== undefined;
}

/** "a.tar.gz" → "a", "a.zip" → "a", "a.txt" → "a.txt" */
export function stripArchiveExtension(name: string): string {
  let base = name;
  while (isArchive(base) && path.extname(base).length < base.length) {
    base = base.slice(0, -path.extname(base).length);
  }
  return base;
}

/** Identify tar compression from the container's leading bytes */
export async function detectTarCompression(archivePath: string): Promise<TarCompression> {
  const handle = await open(archivePath, 'r');
  try {
    const header = Buffer.alloc(6);
    const { bytesRead } = await handle.read(header, 0, header.length, 0);
    const b = header.subarray(0, bytesRead);

    if (b.length >= 2 && b[0] === 0x1f && b[1] === 0x8b) return 'gzip';
    if (b.length >= 3 && b.subarray(0, 3).toString('latin1') === 'BZh') return 'bzip2';
    if (b.length === 6 && b.equals(Buffer.from([0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00]))) {
      return 'xz';
    }
    return 'none';
  } finally {
    await handle.close();
  }
}

function classifyFailure(archivePath: string, destDir: string, error: unknown): ArchiveError {
  if (error instanceof ArchiveError) return error;
  const message = errorMessage(error);
  if (message.includes('EACCES') || message.includes('EPERM')) {
    return new ArchiveError(
      `Permission denied extracting to ${destDir}: ${message}`,
      'PERMISSION_DENIED',
      { cause: error },
    );
  }
  if (
    message.includes('TAR') ||
    message.includes('zlib') ||
    message.includes('unexpected end') ||
    message.includes('central directory') ||
    message.toLowerCase().includes('bzip') ||
    message.toLowerCase().includes('xz')
  ) {
    return new ArchiveError(
      `Invalid or corrupt archive at ${archivePath}: ${message}`,
      'INVALID_ARCHIVE',
      { cause: error },
    );
  }
  return new ArchiveError(`Failed to extract ${archivePath}: ${message}`, 'EXTRACTION_FAILED', {
    cause: error,
  });
}

/** Feed an uncompressed tar stream held in memory to the unpacker */
function unpackTarBuffer(data: Buffer, destDir: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const unpack = tar.x({ cwd: destDir, strict: true });
    unpack.on('error', reject);
    unpack.on('close', () => resolve());
    unpack.end(data);
  });
}

async function extractTar(archivePath: string, destDir: string): Promise<void> {
  const compression = await detectTarCompression(archivePath);
  switch (compression) {
    case 'none':
    case 'gzip':
      // tar recognizes gzip from the stream itself
      await tar.x({ file: archivePath, cwd: destDir, strict: true });
      return;
    case 'bzip2':
      await unpackTarBuffer(Bunzip.decode(await readFile(archivePath)), destDir);
      return;
    case 'xz':
      await unpackTarBuffer(await xz.decompress(await readFile(archivePath)), destDir);
      return;
  }
}

function extractZip(archivePath: string, destDir: string): Promise<void> {
  const root = path.resolve(destDir);

  return new Promise((resolve, reject) => {
    yauzl.open(archivePath, { lazyEntries: true }, (err, zipfile) => {
      if (err || !zipfile) {
        reject(err ?? new Error(`Failed to open zip archive at ${archivePath}`));
        return;
      }

      const fail = (e: unknown) => {
        zipfile.close();
        reject(e);
      };

      zipfile.on('error', reject);
      zipfile.on('end', () => resolve());
      zipfile.on('entry', (entry) => {
        const entryPath = path.resolve(root, entry.fileName);

        if (entryPath !== root && !entryPath.startsWith(root + path.sep)) {
          fail(
            new ArchiveError(
              `Path traversal detected in archive ${archivePath}: ${entry.fileName}`,
              'INVALID_ARCHIVE',
            ),
          );
          return;
        }

        if (entry.fileName.endsWith('/')) {
          fs.ensureDir(entryPath)
            .then(() => zipfile.readEntry())
            .catch(fail);
          return;
        }

        fs.ensureDir(path.dirname(entryPath))
          .then(() => {
            zipfile.openReadStream(entry, (streamErr, readStream) => {
              if (streamErr || !readStream) {
                fail(streamErr ?? new Error(`Failed to read entry ${entry.fileName}`));
                return;
              }
              pipeline(readStream, fs.createWriteStream(entryPath))
                .then(() => zipfile.readEntry())
                .catch(fail);
            });
          })
          .catch(fail);
      });

      zipfile.readEntry();
    });
  });
}

/**
 * Extract a recognized archive into a fresh temp directory.
 * The directory is removed again when extraction fails.
 */
export async function extractArchive(archivePath: string): Promise<ExtractedTree> {
  const suffix = archiveSuffix(archivePath);
  if (!suffix) {
    throw new UnsupportedArchiveError(
      `Unsupported archive type: ${archivePath}. Supported: ${ARCHIVE_EXTENSIONS.join(', ')}`,
    );
  }

  const destDir = await fs.mkdtemp(path.join(os.tmpdir(), EXTRACT_TMP_PREFIX));
  try {
    if (suffix === '.zip') await extractZip(archivePath, destDir);
    else await extractTar(archivePath, destDir);
  } catch (e) {
    await fs.remove(destDir);
    throw classifyFailure(archivePath, destDir, e);
  }

  let released = false;
  return {
    path: destDir,
    release: async () => {
      if (released) return;
      released = true;
      await fs.remove(destDir);
    },
  };
}

export async function withExtractedArchive<T>(
  archivePath: string,
  fn: (dir: string) => Promise<T>,
): Promise<T> {
  const tree = await extractArchive(archivePath);
  try {
    return await fn(tree.path);
  } finally {
    await tree.release();
  }
}

/**
 * Expose a fixture entry as a plain directory for the duration of `fn`.
 * Directories pass straight through; archives are extracted and released.
 */
export async function withFixtureDirectory<T>(
  fixturePath: string,
  fn: (dir: string) => Promise<T>,
): Promise<T> {
  const stat = await fs.stat(fixturePath);
  if (stat.isDirectory()) return fn(fixturePath);
  if (isArchive(fixturePath)) return withExtractedArchive(fixturePath, fn);
  throw new FixtureError(`${fixturePath} is neither a directory nor a recognized archive`);
}
