// suite/components/vitest-scenarios.ts
import { describe, it } from 'vitest';

import type { ScenarioCallback } from '../types/scenario.ts';
import { resolveScenarioConfig, type ScenarioConfigInput } from './config.ts';
import { SCENARIO_TEST_TIMEOUT_MS } from './constants.ts';
import { ScenarioRunner, assertOutcome, type ScenarioRunnerDeps } from './scenario-runner.ts';

export type ScenarioSuiteOptions = ScenarioRunnerDeps & {
  timeoutMs?: number;
  /** Base for relative config paths; defaults to the process cwd */
  baseDir?: string;
};

/**
 * Declare one Vitest test per scenario under the fixtures root.
 *
 * Configuration is resolved and fixtures enumerated while the file is being
 * collected, so a bad fixtures root fails the whole file before any scenario
 * runs. Each test runs its scenario in a fresh isolated working directory.
 */
export function defineScenarioSuite(
  title: string,
  config: ScenarioConfigInput,
  callback: ScenarioCallback,
  opts: ScenarioSuiteOptions = {},
): ScenarioRunner {
  const { timeoutMs = SCENARIO_TEST_TIMEOUT_MS, baseDir, ...deps } = opts;
  const runner = new ScenarioRunner(resolveScenarioConfig(config, baseDir), deps);
  const scenarios = runner.scenarios();

  describe(title, () => {
    for (const scenario of scenarios) {
      it(
        scenario.name,
        async () => {
          assertOutcome(await runner.runIsolated(scenario, callback));
        },
        timeoutMs,
      );
    }
  });

  return runner;
}
