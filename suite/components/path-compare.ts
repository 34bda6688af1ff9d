// suite/components/path-compare.ts
import { createHash } from 'node:crypto';
import * as path from 'node:path';

import fg from 'fast-glob';
import fs from 'fs-extra';

import type {
  ComparisonOptions,
  ComparisonResult,
  Mismatch,
  NamesCompareOptions,
  PathKind,
} from '../types/compare.ts';
import { isArchive, withExtractedArchive } from './archive.ts';

export const DEFAULT_COMPARISON_OPTIONS: Readonly<ComparisonOptions> = {
  leftMustHaveAll: true,
  rightMustHaveAll: true,
};

/** Display names used in mismatch messages in place of temp paths */
export type CompareLabels = { left?: string; right?: string };

/** A real location plus the name it is reported under */
type Side = { real: string; label: string };

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/** Decode a file as strict UTF-8; undefined when it is not text */
export async function readText(file: string): Promise<string | undefined> {
  const bytes = await fs.readFile(file);
  try {
    return utf8.decode(bytes);
  } catch {
    return undefined;
  }
}

/** Lines with "\n", "\r\n" and "\r" terminators normalized away */
export function splitLines(text: string): string[] {
  return text.split(/\r\n|\r|\n/);
}

export async function classifyPath(p: string): Promise<PathKind> {
  const stat = await fs.stat(p);
  if (stat.isDirectory()) return 'directory';
  if (isArchive(p)) return 'archive';
  return (await readText(p)) !== undefined ? 'text' : 'binary';
}

async function sha256(file: string): Promise<string> {
  return createHash('sha256')
    .update(await fs.readFile(file))
    .digest('hex');
}

/** Every file (no directories) below `dir`, POSIX-relative, sorted */
export async function listRelativeFiles(dir: string): Promise<string[]> {
  const files = await fg('**/*', { cwd: dir, dot: true, onlyFiles: true });
  return files.sort();
}

function child(side: Side, name: string): Side {
  return { real: path.join(side.real, name), label: path.join(side.label, name) };
}

/**
 * Recursive structural comparison of two filesystem paths.
 *
 * Explicit options apply to the top directory level (or the root of a
 * top-level archive); every recursion below it uses the configured defaults.
 */
export class PathComparator {
  readonly defaults: Readonly<ComparisonOptions>;

  constructor(defaults: Partial<ComparisonOptions> = {}) {
    this.defaults = { ...DEFAULT_COMPARISON_OPTIONS, ...defaults };
  }

  async compare(
    a: string,
    b: string,
    options: Partial<ComparisonOptions> = {},
    labels: CompareLabels = {},
  ): Promise<ComparisonResult> {
    const mismatches: Mismatch[] = [];
    await this.comparePath(
      { real: a, label: labels.left ?? a },
      { real: b, label: labels.right ?? b },
      { ...this.defaults, ...options },
      mismatches,
    );
    return { equal: mismatches.length === 0, mismatches };
  }

  /**
   * Compare only the sets of relative file paths below two directories.
   * With `allowExtra`, `actual` may hold files `expected` does not.
   */
  async namesEqual(
    expected: string,
    actual: string,
    opts: NamesCompareOptions = {},
    labels: CompareLabels = {},
  ): Promise<ComparisonResult> {
    const left = labels.left ?? expected;
    const right = labels.right ?? actual;
    const expectedFiles = await listRelativeFiles(expected);
    const actualFiles = await listRelativeFiles(actual);
    const actualSet = new Set(actualFiles);
    const expectedSet = new Set(expectedFiles);

    const mismatches: Mismatch[] = [];
    for (const f of expectedFiles) {
      if (!actualSet.has(f)) {
        mismatches.push({ kind: 'names', left, right, detail: `${f} is missing from ${right}` });
      }
    }
    if (!opts.allowExtra) {
      for (const f of actualFiles) {
        if (!expectedSet.has(f)) {
          mismatches.push({
            kind: 'names',
            left,
            right,
            detail: `${f} was not expected in ${right}`,
          });
        }
      }
    }
    return { equal: mismatches.length === 0, mismatches };
  }

  private async comparePath(
    a: Side,
    b: Side,
    options: ComparisonOptions,
    out: Mismatch[],
  ): Promise<void> {
    const [aExists, bExists] = await Promise.all([fs.pathExists(a.real), fs.pathExists(b.real)]);
    if (!aExists || !bExists) {
      for (const missing of [aExists ? undefined : a, bExists ? undefined : b]) {
        if (missing) out.push(this.mismatch('missing', a, b, `${missing.label} does not exist`));
      }
      return;
    }

    const kind = await classifyPath(a.real);
    if (kind !== 'directory' && (await fs.stat(b.real)).isDirectory()) {
      const detail = `${b.label} is a directory, expected a file like ${a.label}`;
      out.push(this.mismatch('kind', a, b, detail));
      return;
    }

    switch (kind) {
      case 'directory':
        return this.compareDirectories(a, b, options, out);
      case 'archive':
        return this.compareArchives(a, b, options, out);
      case 'text':
        return this.compareTextFiles(a, b, out);
      case 'binary':
        return this.compareHashes(a, b, out);
    }
  }

  private async compareDirectories(
    a: Side,
    b: Side,
    options: ComparisonOptions,
    out: Mismatch[],
  ): Promise<void> {
    if (!(await fs.stat(b.real)).isDirectory()) {
      const detail = `${b.label} is not a directory, expected a directory like ${a.label}`;
      out.push(this.mismatch('kind', a, b, detail));
      return;
    }

    const leftNames = (await fs.readdir(a.real)).sort();
    const rightNames = (await fs.readdir(b.real)).sort();
    const left = new Set(leftNames);
    const right = new Set(rightNames);

    if (options.leftMustHaveAll) {
      for (const name of rightNames.filter((n) => !left.has(n))) {
        const extra = child(b, name);
        out.push(this.mismatch('extra', a, extra, `${extra.label} is not present in ${a.label}`));
      }
    }
    if (options.rightMustHaveAll) {
      for (const name of leftNames.filter((n) => !right.has(n))) {
        const absent = child(a, name);
        out.push(this.mismatch('absent', absent, b, `${absent.label} is missing from ${b.label}`));
      }
    }

    // Only names on both sides are compared further
    for (const name of leftNames.filter((n) => right.has(n))) {
      await this.comparePath(child(a, name), child(b, name), { ...this.defaults }, out);
    }
  }

  private async compareArchives(
    a: Side,
    b: Side,
    options: ComparisonOptions,
    out: Mismatch[],
  ): Promise<void> {
    await withExtractedArchive(a.real, (aDir) =>
      withExtractedArchive(b.real, (bDir) =>
        this.compareDirectories(
          { real: aDir, label: `${a.label}!` },
          { real: bDir, label: `${b.label}!` },
          options,
          out,
        ),
      ),
    );
  }

  private async compareTextFiles(a: Side, b: Side, out: Mismatch[]): Promise<void> {
    const [aText, bText] = await Promise.all([readText(a.real), readText(b.real)]);
    if (aText === undefined) return this.compareHashes(a, b, out);
    if (bText === undefined) {
      const detail = `${b.label} is not a text file, expected text like ${a.label}`;
      out.push(this.mismatch('encoding', a, b, detail));
      return;
    }

    const expected = splitLines(aText);
    const actual = splitLines(bText);
    for (let i = 0; i < Math.max(expected.length, actual.length); i++) {
      if (i >= actual.length) {
        const detail = `${b.label} ends on line ${i + 1}, expected to continue`;
        out.push({ ...this.mismatch('length', a, b, detail), line: i + 1 });
        return;
      }
      if (i >= expected.length) {
        out.push({
          ...this.mismatch('length', a, b, `${b.label} continues past line ${i}, expected to end`),
          line: i + 1,
        });
        return;
      }
      if (expected[i] !== actual[i]) {
        out.push({
          ...this.mismatch('line', a, b, `${b.label} does not match ${a.label} on line ${i + 1}`),
          line: i + 1,
        });
        return;
      }
    }
  }

  private async compareHashes(a: Side, b: Side, out: Mismatch[]): Promise<void> {
    const [aHash, bHash] = await Promise.all([sha256(a.real), sha256(b.real)]);
    if (aHash !== bHash) {
      out.push(this.mismatch('hash', a, b, `Hash of ${b.label} does not match ${a.label}`));
    }
  }

  private mismatch(kind: Mismatch['kind'], a: Side, b: Side, detail: string): Mismatch {
    return { kind, left: a.label, right: b.label, detail };
  }
}

const defaultComparator = new PathComparator();

export function comparePaths(
  a: string,
  b: string,
  options?: Partial<ComparisonOptions>,
  labels?: CompareLabels,
): Promise<ComparisonResult> {
  return defaultComparator.compare(a, b, options, labels);
}

export async function pathsEqual(
  a: string,
  b: string,
  options?: Partial<ComparisonOptions>,
): Promise<boolean> {
  return (await defaultComparator.compare(a, b, options)).equal;
}

export function compareFileNames(
  expected: string,
  actual: string,
  opts?: NamesCompareOptions,
  labels?: CompareLabels,
): Promise<ComparisonResult> {
  return defaultComparator.namesEqual(expected, actual, opts, labels);
}
