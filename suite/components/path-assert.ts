// suite/components/path-assert.ts
import type { ComparisonOptions } from '../types/compare.ts';
import type { Logger } from '../types/logger.ts';
import { ComparisonMismatchError } from './errors.ts';
import { plural } from './format.ts';
import { comparePaths, type CompareLabels } from './path-compare.ts';
import { logBoxCount } from './proc.ts';

export type PathAssertOptions = Partial<ComparisonOptions> & { labels?: CompareLabels };

/**
 * Assert two paths are equivalent. Throws ComparisonMismatchError listing every
 * mismatch; with a logger, the list is also written as a box.
 */
export async function assertPathsEqual(
  a: string,
  b: string,
  options: PathAssertOptions = {},
  log?: Logger,
): Promise<void> {
  const { labels, ...compareOptions } = options;
  log?.step(`Compare ${labels?.left ?? a} with ${labels?.right ?? b}`);

  const result = await comparePaths(a, b, compareOptions, labels);
  if (result.equal) {
    log?.pass('paths are equivalent');
    return;
  }

  const n = result.mismatches.length;
  logBoxCount(
    log,
    'mismatches',
    result.mismatches.map((m) => m.detail),
    plural(n, 'mismatch', 'mismatches'),
  );
  log?.fail(`${plural(n, 'mismatch', 'mismatches')}`);
  throw new ComparisonMismatchError(result.mismatches);
}

export async function assertPathsNotEqual(
  a: string,
  b: string,
  options: PathAssertOptions = {},
  log?: Logger,
): Promise<void> {
  const { labels, ...compareOptions } = options;
  const left = labels?.left ?? a;
  const right = labels?.right ?? b;
  log?.step(`Compare ${left} with ${right} (expect differences)`);

  const result = await comparePaths(a, b, compareOptions, labels);
  if (result.equal) {
    log?.fail('paths are equivalent');
    throw new Error(`Expected ${left} and ${right} to differ, but they are equivalent`);
  }
  log?.pass(`differ: ${result.mismatches[0].detail}`);
}
