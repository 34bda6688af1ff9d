// suite/components/config.ts
import * as path from 'node:path';

import fs from 'fs-extra';
import { z } from 'zod';

import {
  CHECK_STRATEGIES,
  type ExternalConnection,
  type ScenarioSuiteConfig,
} from '../types/scenario.ts';
import {
  DEFAULT_FINAL_STATE_NAME,
  DEFAULT_INITIAL_STATE_NAME,
  ENV_KEEP_WORKDIR,
} from './constants.ts';
import { ConfigurationError, errorMessage } from './errors.ts';

type ConnectionFn = (externalPath: string, internalPath: string) => void | Promise<void>;

/** What callers pass in; everything except fixturesRoot has a default */
export type ScenarioConfigInput = Partial<ScenarioSuiteConfig>;

const connectionSchema = z
  .object({
    externalPath: z.string().min(1),
    internalPath: z.string().min(1).optional(),
    strategy: z
      .union([
        z.enum(['symlink', 'copy']),
        z.custom<ConnectionFn>((v) => typeof v === 'function', {
          message: 'Expected "symlink", "copy" or a function',
        }),
      ])
      .optional(),
  })
  .strict();

const configSchema = z
  .object({
    // Presence is checked after parsing so the error can say it was not configured
    fixturesRoot: z.string().optional(),
    checkStrategy: z.enum(CHECK_STRATEGIES).default('contents'),
    allowMissingInitialState: z.boolean().default(true),
    allowMissingFinalState: z.boolean().default(false),
    allowExtraFinalItems: z.boolean().default(false),
    initialStateName: z.string().min(1).default(DEFAULT_INITIAL_STATE_NAME),
    finalStateName: z.string().min(1).default(DEFAULT_FINAL_STATE_NAME),
    externalConnections: z.array(connectionSchema).default([]),
    keepWorkDir: z.boolean().default(false),
  })
  .strict();

function describeIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
}

function envKeepWorkDir(): boolean {
  return process.env[ENV_KEEP_WORKDIR] === '1';
}

/**
 * Validate a suite configuration and fill in defaults.
 * Relative fixturesRoot and external connection paths resolve against `baseDir`.
 */
export function resolveScenarioConfig(
  input: ScenarioConfigInput | undefined,
  baseDir: string = process.cwd(),
): ScenarioSuiteConfig {
  return parseConfig(input ?? {}, baseDir);
}

function parseConfig(raw: unknown, baseDir: string): ScenarioSuiteConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid scenario configuration: ${describeIssues(parsed.error.issues)}`,
    );
  }

  const { fixturesRoot, externalConnections, keepWorkDir, ...rest } = parsed.data;
  if (!fixturesRoot) {
    throw new ConfigurationError('fixturesRoot is required but was not configured');
  }

  const connections: ExternalConnection[] = externalConnections.map((c) => ({
    ...c,
    externalPath: path.resolve(baseDir, c.externalPath),
  }));

  return {
    ...rest,
    fixturesRoot: path.resolve(baseDir, fixturesRoot),
    externalConnections: connections,
    keepWorkDir: keepWorkDir || envKeepWorkDir(),
  };
}

/** Read a JSON configuration file; its relative paths resolve against its own directory */
export function loadScenarioConfig(file: string): ScenarioSuiteConfig {
  const abs = path.resolve(file);
  let raw: unknown;
  try {
    raw = fs.readJsonSync(abs);
  } catch (e) {
    const message = `Could not read scenario configuration ${abs}: ${errorMessage(e)}`;
    throw new ConfigurationError(message, undefined, { cause: e });
  }
  return parseConfig(raw, path.dirname(abs));
}
