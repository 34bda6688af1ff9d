// suite/components/detail-io.ts
import * as path from 'node:path';

import fs from 'fs-extra';
import type { z } from 'zod';

import { buildLogRoot } from './logger.ts';
import { ENV_LOG_STAMP, SCENARIO_DETAIL_FILE, SCENARIOS_LOG_DIR } from './constants.ts';

export function stampFromEnv(): string | null {
  return process.env[ENV_LOG_STAMP] || null;
}

/** Read a JSON artifact; `fallback` when it cannot be read or fails `schema` */
export function loadJsonSafe<T>(
  p: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: T,
): T {
  let raw: unknown;
  try {
    raw = fs.readJsonSync(p);
  } catch {
    return fallback;
  }
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : fallback;
}

export function saveJson(p: string, data: unknown): void {
  fs.ensureDirSync(path.dirname(p));
  fs.writeFileSync(p, JSON.stringify(data, null, 2));
}

// <logs>/<stamp>/scenarios/_scenario-detail.json
export function scenarioDetailPath(stamp: string | null = stampFromEnv()): string | null {
  if (!stamp) return null;
  return path.join(buildLogRoot(stamp), SCENARIOS_LOG_DIR, SCENARIO_DETAIL_FILE);
}
