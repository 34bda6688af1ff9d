// suite/components/isolated-dir.ts
import * as os from 'node:os';
import * as path from 'node:path';

import fs from 'fs-extra';

import type { ExternalConnection } from '../types/scenario.ts';
import { WORKDIR_TMP_PREFIX } from './constants.ts';
import { FixtureError } from './errors.ts';

export type IsolationOptions = {
  /** Parent of the scratch directory; defaults to the OS temp dir */
  tmpRoot?: string;
  prefix?: string;
  externalConnections?: ExternalConnection[];
  /** Leave the scratch directory on disk after release */
  keep?: boolean;
};

export type IsolatedDirectory = {
  /** Absolute path of the (initially empty) scratch directory */
  path: string;
  /** Working directory before isolation */
  originalDir: string;
  release: () => Promise<void>;
};

async function connect(
  connection: ExternalConnection,
  originalDir: string,
  workDir: string,
): Promise<void> {
  const external = path.resolve(originalDir, connection.externalPath);
  if (!(await fs.pathExists(external))) {
    throw new FixtureError(
      `Could not connect ${external} to the working directory, does not exist`,
    );
  }
  const internal = connection.internalPath ?? path.basename(external);
  const strategy = connection.strategy ?? 'symlink';

  if (typeof strategy === 'function') {
    await strategy(external, internal);
    return;
  }

  const dest = path.resolve(workDir, internal);
  await fs.ensureDir(path.dirname(dest));
  if (strategy === 'symlink') {
    await fs.symlink(external, dest);
  } else {
    await fs.copy(external, dest);
  }
}

/**
 * Create an empty scratch directory and make it the process working directory.
 * External connections are applied inside it before this resolves.
 * release() restores the previous working directory and removes the scratch
 * directory; it is safe to call more than once.
 */
export async function acquireIsolatedDirectory(
  opts: IsolationOptions = {},
): Promise<IsolatedDirectory> {
  const originalDir = process.cwd();
  const tmpRoot = opts.tmpRoot ?? os.tmpdir();
  await fs.ensureDir(tmpRoot);
  const workDir = await fs.realpath(
    await fs.mkdtemp(path.join(tmpRoot, opts.prefix ?? WORKDIR_TMP_PREFIX)),
  );

  let released = false;
  const release = async () => {
    if (released) return;
    released = true;
    try {
      process.chdir(originalDir);
    } finally {
      if (!opts.keep) await fs.remove(workDir);
    }
  };

  try {
    process.chdir(workDir);
    for (const connection of opts.externalConnections ?? []) {
      await connect(connection, originalDir, workDir);
    }
  } catch (e) {
    await release();
    throw e;
  }

  return { path: workDir, originalDir, release };
}

export async function withIsolatedDirectory<T>(
  opts: IsolationOptions,
  fn: (dir: IsolatedDirectory) => Promise<T>,
): Promise<T> {
  const dir = await acquireIsolatedDirectory(opts);
  try {
    return await fn(dir);
  } finally {
    await dir.release();
  }
}
