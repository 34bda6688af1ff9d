// suite/components/logger.ts
import path from 'node:path';

import fs from 'fs-extra';

import type { Logger } from '../types/logger.ts';
import { DEFAULT_BOX_WIDTH, makeRule } from './format.ts';
import {
  ENV_LOG_STAMP,
  LOG_BASE_DIR,
  SCENARIOS_LOG_DIR,
  SUITE_LOG_FILE,
} from './constants.ts';

export type { Logger } from '../types/logger.ts';

/** Default box indent. */
const DEFAULT_BOX_IND = '      ';

/** Suggested default for “step detail” indent. */
export const STEP_DETAIL_INDENT = 4;

// Interpret indent with a fallback and modifiers:
// - undefined  → use fallback
// - number     → absolute spaces
// - string "+n"/"-n" → relative to fallback length
// - any other string → literal prefix (e.g. "│ ")
function resolveIndent(ind: number | string | undefined, fallback: string): string {
  if (ind === undefined) return fallback;
  if (typeof ind === 'number') return ' '.repeat(Math.max(0, ind));

  const m = ind.match(/^([+-])(\d+)$/);
  if (m) {
    const sign = m[1] === '+' ? 1 : -1;
    const next = Math.max(0, fallback.length + sign * parseInt(m[2], 10));
    return ' '.repeat(next);
  }
  return ind;
}

/**
 * Return a view of a logger that prefixes write/pass/warn/fail and step details
 * with the given indent. Step headers stay left-justified.
 */
export function withIndent(base: Logger, indent: number | string): Logger {
  const pad = typeof indent === 'number' ? ' '.repeat(Math.max(0, indent)) : indent;

  return {
    filePath: base.filePath,
    step: (title, details, ind) => base.step(title, details, ind ?? pad),
    pass: (msg, ind) => base.pass(msg, ind ?? pad),
    warn: (msg, ind) => base.warn(msg, ind ?? pad),
    fail: (msg, ind) => base.fail(msg, ind ?? pad),
    write: (line, ind) => base.write(line, ind ?? pad),
    boxStart: (title, opts) =>
      base.boxStart(title, { width: opts?.width, indent: opts?.indent ?? pad }),
    boxLine: (line, opts) =>
      base.boxLine(line, { width: opts?.width, indent: opts?.indent ?? pad }),
    boxEnd: (label, opts) =>
      base.boxEnd(label, {
        width: opts?.width,
        indent: opts?.indent ?? pad,
        suffix: opts?.suffix,
      }),
    close: () => base.close(),
  };
}

export function createLogger(filePath: string): Logger {
  let counter = 0;
  fs.ensureDirSync(path.dirname(filePath));
  const stream = fs.createWriteStream(filePath, { flags: 'a' });

  const append = (line: string) => {
    stream.write(line.endsWith('\n') ? line : line + '\n', 'utf8');
  };

  const step: Logger['step'] = (title, details = '', indent) => {
    counter += 1;
    append(`${counter}) ${title}`);
    if (details) append(`${resolveIndent(indent, '   ')}${details}`);
  };

  const pass: Logger['pass'] = (msg = 'PASS', indent) =>
    append(`${resolveIndent(indent, '   ')}✅ ${msg}`);

  const warn: Logger['warn'] = (msg, indent) =>
    append(`${resolveIndent(indent, '   ')}⚠️ ${msg}`);

  const fail: Logger['fail'] = (msg, indent) =>
    append(`${resolveIndent(indent, '   ')}❌ ${msg}`);

  const write: Logger['write'] = (line, indent) =>
    append(`${resolveIndent(indent, '    ')}${line}`);

  const boxStart: Logger['boxStart'] = (title, opts) => {
    const ind = resolveIndent(opts?.indent, DEFAULT_BOX_IND);
    append(ind + makeRule('┌', title, opts?.width ?? DEFAULT_BOX_WIDTH));
  };

  const boxLine: Logger['boxLine'] = (line, opts) => {
    const ind = resolveIndent(opts?.indent, DEFAULT_BOX_IND);
    const contentWidth = Math.max(0, (opts?.width ?? DEFAULT_BOX_WIDTH) - 2); // "│ " prefix

    if (!line) {
      append(ind + '│');
      return;
    }

    for (const l of line.replace(/\r\n/g, '\n').split('\n')) {
      if (l.length <= contentWidth || contentWidth === 0) {
        append(ind + '│ ' + l);
        continue;
      }
      // hard wrap; no hyphenation
      for (let i = 0; i < l.length; i += contentWidth) {
        append(ind + '│ ' + l.slice(i, i + contentWidth));
      }
    }
  };

  const boxEnd: Logger['boxEnd'] = (label, opts) => {
    const ind = resolveIndent(opts?.indent, DEFAULT_BOX_IND);
    const full = opts?.suffix ? `${label} ${opts.suffix}` : label;
    append(ind + makeRule('└', full, opts?.width ?? DEFAULT_BOX_WIDTH));
  };

  const close = () =>
    new Promise<void>((resolve) => {
      stream.end(resolve);
    });

  return { filePath, step, pass, warn, fail, write, boxStart, boxLine, boxEnd, close };
}

// Run stamp, e.g. 2025-09-30T09-45-12-345Z
export function makeLogStamp(d = new Date()): string {
  return d.toISOString().replace(/[:.]/g, '-');
}

// Sanitize scenario names into safe filenames.
export function sanitizeLogName(name: string): string {
  return name.replace(/[^\w.+-]/g, '_');
}

/**
 * Current run stamp. The Vitest global setup publishes one; library callers
 * outside that setup get a fresh stamp on first use, shared for the process.
 */
export function ensureLogStamp(): string {
  const existing = process.env[ENV_LOG_STAMP];
  if (existing) return existing;
  const stamp = makeLogStamp();
  process.env[ENV_LOG_STAMP] = stamp;
  return stamp;
}

// <logs>/<stamp>
export function buildLogRoot(stamp: string): string {
  return path.join(LOG_BASE_DIR, stamp);
}

// <logs>/<stamp>/suite.log
export function buildSuiteLogPath(stamp: string): string {
  return path.join(buildLogRoot(stamp), SUITE_LOG_FILE);
}

// <logs>/<stamp>/scenarios/<scenario>.log
export function buildScenarioLogPath(stamp: string, scenario: string): string {
  return path.join(buildLogRoot(stamp), SCENARIOS_LOG_DIR, `${sanitizeLogName(scenario)}.log`);
}

export function scenarioLogger(scenario: string): Logger {
  return createLogger(buildScenarioLogPath(ensureLogStamp(), scenario));
}
