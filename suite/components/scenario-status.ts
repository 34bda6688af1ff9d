// suite/components/scenario-status.ts
import { z } from 'zod';

import type { ScenarioStep } from '../types/scenario.ts';
import { loadJsonSafe, saveJson, scenarioDetailPath } from './detail-io.ts';

export type ScenarioSeverity = 'ok' | 'warn' | 'fail';
const rank: Record<ScenarioSeverity, number> = { ok: 0, warn: 1, fail: 2 };

export function worst(a: ScenarioSeverity, b: ScenarioSeverity): ScenarioSeverity {
  return rank[a] >= rank[b] ? a : b;
}

export type ScenarioDetailMeta = {
  mismatchCount?: number;
  note?: string;
};

export type ScenarioStepDetail = {
  severity: ScenarioSeverity;
  meta?: ScenarioDetailMeta;
};

export type ScenarioDetailStore = Record<
  string, // scenario name
  Partial<Record<ScenarioStep, ScenarioStepDetail>>
>;

const stepDetailSchema = z.object({
  severity: z.enum(['ok', 'warn', 'fail']),
  meta: z.object({ mismatchCount: z.number().optional(), note: z.string().optional() }).optional(),
});

const detailStoreSchema: z.ZodType<ScenarioDetailStore, z.ZodTypeDef, unknown> = z.record(
  z.string(),
  z.object({
    stage: stepDetailSchema.optional(),
    execute: stepDetailSchema.optional(),
    check: stepDetailSchema.optional(),
  }),
);

export function loadScenarioDetail(p: string | null = scenarioDetailPath()): ScenarioDetailStore {
  return p ? loadJsonSafe(p, detailStoreSchema, {}) : {};
}

/**
 * Record one step's severity into the run's _scenario-detail.json.
 * Repeated records for the same step keep the worst severity and merge meta.
 * No-op when no run stamp is published.
 */
export function recordScenarioStep(
  scenario: string,
  step: ScenarioStep,
  next: ScenarioSeverity,
  meta?: ScenarioDetailMeta,
): void {
  const p = scenarioDetailPath();
  if (!p) return;

  const data = loadScenarioDetail(p);
  const steps = data[scenario] ?? {};
  const prev = steps[step];

  steps[step] = {
    severity: worst(prev?.severity ?? 'ok', next),
    meta: { ...(prev?.meta ?? {}), ...(meta ?? {}) },
  };
  data[scenario] = steps;
  saveJson(p, data);
}

/** Worst severity across all recorded steps of one scenario */
export function scenarioSeverity(
  steps: Partial<Record<ScenarioStep, ScenarioStepDetail>>,
): ScenarioSeverity {
  return Object.values(steps).reduce<ScenarioSeverity>(
    (acc, d) => (d ? worst(acc, d.severity) : acc),
    'ok',
  );
}
