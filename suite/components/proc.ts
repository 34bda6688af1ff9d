// suite/components/proc.ts
import { execa } from 'execa';

import type { Logger } from '../types/logger.ts';

export type SimpleExec = { exitCode: number };

export type ExecBoxedOptions = {
  cwd?: string;
  env?: Record<string, string | undefined>;
  title?: string; // boxStart title
  markStderr?: boolean; // prefix stderr lines with "! "
  argsWrapWidth?: number; // wrap args if JSON length > width
};

function writeArgs(log: Logger | undefined, args: string[], argsWrapWidth?: number) {
  const single = JSON.stringify(args);
  if (!argsWrapWidth || single.length <= argsWrapWidth) {
    log?.write(`args=${single}`);
    return;
  }

  // Pack as many tokens per line as fit within argsWrapWidth.
  const lines: string[] = [];
  let current = '';
  for (const tok of args.map((a) => JSON.stringify(a))) {
    if (current.length === 0) {
      current = tok;
    } else if (current.length + 2 + tok.length <= argsWrapWidth) {
      current += `, ${tok}`;
    } else {
      lines.push(current);
      current = tok;
    }
  }
  if (current) lines.push(current);

  log?.write('args=[');
  lines.forEach((line, i) => log?.write(`  ${line}${i === lines.length - 1 ? '' : ','}`, '+2'));
  log?.write(']');
}

/**
 * Write cmd/args lines, then run the process.
 * Opens a box only when the first chunk of output arrives.
 * Resolves with the exit code; never rejects on a non-zero exit.
 */
export async function execBoxed(
  log: Logger | undefined,
  cmd: string,
  args: string[],
  opts: ExecBoxedOptions = {},
): Promise<SimpleExec> {
  const { title = 'process output', markStderr = true, argsWrapWidth, cwd, env } = opts;

  log?.write(`cmd=${cmd}`);
  writeArgs(log, args, argsWrapWidth);

  const child = execa(cmd, args, {
    cwd,
    env,
    windowsHide: true,
    encoding: 'utf8',
    reject: false,
  });

  let opened = false;
  const emit = (chunk: Buffer | string, prefix: string) => {
    const s = chunk.toString();
    if (!s || !log) return;
    if (!opened) {
      log.boxStart(title);
      opened = true;
    }
    for (const line of s.replace(/\r\n/g, '\n').split('\n')) {
      if (line) log.boxLine(prefix + line);
    }
  };

  child.stdout?.on('data', (buf: Buffer) => emit(buf, ''));
  child.stderr?.on('data', (buf: Buffer) => emit(buf, markStderr ? '! ' : ''));

  const result = await child;
  const exitCode = result.exitCode ?? 1;

  if (opened) log?.boxEnd(`exit code: ${exitCode}`);

  return { exitCode };
}

/**
 * Write a boxed list with a count footer, e.g. "└─ 2 mismatches ───".
 */
export function logBoxCount(
  log: Logger | undefined,
  title: string,
  lines: string[],
  countLabel: string,
): void {
  if (!log) return;
  log.boxStart(title);
  for (const l of lines) log.boxLine(l);
  log.boxEnd(countLabel);
}
