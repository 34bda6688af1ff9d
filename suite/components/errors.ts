// suite/components/errors.ts
import type { Mismatch } from '../types/compare.ts';

/**
 * Error codes for archive extraction operations.
 */
export type ArchiveErrorCode = 'INVALID_ARCHIVE' | 'EXTRACTION_FAILED' | 'PERMISSION_DENIED';

export type SerializedError = {
  readonly type:
    | 'configuration'
    | 'ambiguous-fixture'
    | 'missing-state'
    | 'fixture'
    | 'unsupported-archive'
    | 'archive'
    | 'comparison-mismatch';
  readonly message: string;
  readonly code?: string;
};

/**
 * Base class for every error the harness raises.
 * ConfigurationError aborts a whole suite; all others are scoped to one scenario
 * or one operation.
 */
export abstract class ScenarioError extends Error {
  abstract readonly type: SerializedError['type'];
  readonly code: string | undefined;

  constructor(message: string, code?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedError {
    const result: SerializedError = { type: this.type, message: this.message };
    return this.code !== undefined ? { ...result, code: this.code } : result;
  }
}

/** Missing or invalid suite configuration (fixtures root absent or nonexistent) */
export class ConfigurationError extends ScenarioError {
  readonly type = 'configuration' as const;
}

/** More than one initial/final state candidate in a fixture */
export class AmbiguousFixtureError extends ScenarioError {
  readonly type = 'ambiguous-fixture' as const;
  readonly candidates: readonly string[];

  constructor(message: string, candidates: readonly string[]) {
    super(message);
    this.candidates = candidates;
  }
}

/** Initial or final state absent where it is required */
export class MissingStateError extends ScenarioError {
  readonly type = 'missing-state' as const;
}

/** A fixture entry that cannot be used as a directory tree */
export class FixtureError extends ScenarioError {
  readonly type = 'fixture' as const;
}

export class UnsupportedArchiveError extends ScenarioError {
  readonly type = 'unsupported-archive' as const;
}

export class ArchiveError extends ScenarioError {
  readonly type = 'archive' as const;

  constructor(message: string, code: ArchiveErrorCode, options?: { cause?: unknown }) {
    super(message, code, options);
  }
}

/** Structural or content inequality between an expected and an actual tree */
export class ComparisonMismatchError extends ScenarioError {
  readonly type = 'comparison-mismatch' as const;
  readonly mismatches: readonly Mismatch[];

  constructor(mismatches: readonly Mismatch[], header = 'Paths are not equivalent') {
    const count = `${mismatches.length} mismatch${mismatches.length === 1 ? '' : 'es'}`;
    super([`${header} (${count}):`, ...mismatches.map((m) => `  - ${m.detail}`)].join('\n'));
    this.mismatches = mismatches;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Normalize anything thrown into an Error instance */
export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
