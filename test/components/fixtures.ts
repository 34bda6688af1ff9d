// test/components/fixtures.ts
import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

import archiver from 'archiver';
import fs from 'fs-extra';
import * as tar from 'tar';

import { createLogger, type Logger } from '../../suite/components/logger.ts';

/** Checked-in fixtures (test/fixtures) */
export const FIXTURES_DIR = fileURLToPath(new URL('../fixtures/', import.meta.url));

/** Map of relative file path → content; a trailing "/" declares an empty directory */
export type TreeSpec = Record<string, string | Buffer>;

const created: string[] = [];

/** Fresh temp directory (real path), removed by cleanupTemp() */
export async function makeTempDir(prefix = 'fs-scenarios-test-'): Promise<string> {
  const dir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)));
  created.push(dir);
  return dir;
}

export async function cleanupTemp(): Promise<void> {
  for (const dir of created.splice(0)) await fs.remove(dir);
}

export async function writeTree(root: string, files: TreeSpec): Promise<string> {
  await fs.ensureDir(root);
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(root, rel);
    if (rel.endsWith('/')) {
      await fs.ensureDir(full);
    } else {
      await fs.outputFile(full, content);
    }
  }
  return root;
}

/**
 * Write a zip archive at `dest` holding `files`.
 *
 * @example
 * await createZip(path.join(dir, 'state.zip'), { 'a.txt': 'alpha\n', 'docs/': '' });
 */
export function createZip(dest: string, files: TreeSpec): Promise<string> {
  return new Promise((resolve, reject) => {
    fs.ensureDirSync(path.dirname(dest));
    const output = fs.createWriteStream(dest);
    const archive = archiver('zip', { zlib: { level: 9 } });

    output.on('close', () => resolve(dest));
    output.on('error', reject);
    archive.on('error', reject);
    archive.pipe(output);

    for (const [name, content] of Object.entries(files)) {
      if (name.endsWith('/')) continue;
      archive.append(content, { name });
    }
    archive.finalize().catch(reject);
  });
}

/** Write a tar (gzip-compressed with `gzip: true`) archive at `dest` holding `files` */
export async function createTar(
  dest: string,
  files: TreeSpec,
  opts: { gzip?: boolean } = {},
): Promise<string> {
  const source = await makeTempDir('fs-scenarios-tar-src-');
  await writeTree(source, files);
  await fs.ensureDir(path.dirname(dest));
  await tar.create({ gzip: opts.gzip ?? false, file: dest, cwd: source }, ['.']);
  return dest;
}

/** Logger writing into a temp directory, plus a reader for what it wrote */
export async function tempLogger(
  name = 'test',
): Promise<{ log: Logger; lines: () => Promise<string[]> }> {
  const dir = await makeTempDir('fs-scenarios-log-');
  const log = createLogger(path.join(dir, `${name}.log`));
  return {
    log,
    lines: async () => {
      await log.close();
      return (await fs.readFile(log.filePath, 'utf8')).split('\n').filter((l) => l !== '');
    },
  };
}
