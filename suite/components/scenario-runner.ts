// suite/components/scenario-runner.ts
import * as path from 'node:path';

import fs from 'fs-extra';

import type { ComparisonResult } from '../types/compare.ts';
import type { Logger } from '../types/logger.ts';
import type {
  Scenario,
  ScenarioCallback,
  ScenarioOutcome,
  ScenarioStep,
  ScenarioSuiteConfig,
} from '../types/scenario.ts';
import { withFixtureDirectory } from './archive.ts';
import { ComparisonMismatchError, MissingStateError, errorMessage, toError } from './errors.ts';
import { plural, toPosix } from './format.ts';
import { acquireIsolatedDirectory, type IsolatedDirectory } from './isolated-dir.ts';
import { STEP_DETAIL_INDENT, scenarioLogger, withIndent } from './logger.ts';
import { PathComparator } from './path-compare.ts';
import { logBoxCount } from './proc.ts';
import { ScenarioRepository } from './scenario-repository.ts';
import { recordScenarioStep } from './scenario-status.ts';

/** Display name of the working directory in mismatch messages */
const WORKDIR_LABEL = 'workdir';

export type ScenarioRunnerDeps = {
  repository?: ScenarioRepository;
  comparator?: PathComparator;
  /** Logger factory, one logger per scenario run */
  createLog?: (scenario: string) => Logger;
};

/**
 * Drives one scenario through stage → execute → check.
 *
 * Scenario-scoped failures never escape run()/runIsolated(); they come back as
 * a failed outcome naming the step. Use assertOutcome() to turn that into a throw.
 */
export class ScenarioRunner {
  readonly config: ScenarioSuiteConfig;
  private readonly repository: ScenarioRepository;
  private readonly comparator: PathComparator;
  private readonly createLog: (scenario: string) => Logger;

  constructor(config: ScenarioSuiteConfig, deps: ScenarioRunnerDeps = {}) {
    this.config = config;
    this.repository = deps.repository ?? new ScenarioRepository(config);
    this.comparator = deps.comparator ?? new PathComparator();
    this.createLog = deps.createLog ?? scenarioLogger;
  }

  scenarios(): Scenario[] {
    return this.repository.scenarios();
  }

  /** Run in an existing working directory, which is left in place afterwards */
  async run(
    scenario: Scenario,
    callback: ScenarioCallback,
    workDir: string,
  ): Promise<ScenarioOutcome> {
    const started = Date.now();
    const log = this.createLog(scenario.name);
    const current: { step: ScenarioStep } = { step: 'stage' };

    log.write(`fixture=${scenario.fixturePath}`, 0);
    log.write(`workDir=${workDir}`, 0);

    try {
      await withFixtureDirectory(scenario.fixturePath, async (fixtureDir) => {
        current.step = 'stage';
        await this.stage(scenario, fixtureDir, workDir, log);

        current.step = 'execute';
        log.step('Execute scenario callback');
        await callback(scenario.name, fixtureDir, {
          workDir,
          log: withIndent(log, STEP_DETAIL_INDENT),
        });
        log.pass();
        recordScenarioStep(scenario.name, 'execute', 'ok');

        current.step = 'check';
        await this.check(scenario, fixtureDir, workDir, log);
      });
      return { scenario, state: 'passed', durationMs: Date.now() - started };
    } catch (e) {
      const error = toError(e);
      log.fail(`${current.step} failed: ${error.message.split('\n')[0]}`);
      recordScenarioStep(scenario.name, current.step, 'fail', {
        note: errorMessage(error).split('\n')[0],
        ...(error instanceof ComparisonMismatchError
          ? { mismatchCount: error.mismatches.length }
          : {}),
      });
      return {
        scenario,
        state: 'failed',
        failedStep: current.step,
        error,
        durationMs: Date.now() - started,
      };
    } finally {
      await log.close();
    }
  }

  /**
   * Run in a fresh isolated working directory with the configured external
   * connections. The directory is released afterwards unless keepWorkDir is set.
   */
  async runIsolated(scenario: Scenario, callback: ScenarioCallback): Promise<ScenarioOutcome> {
    const started = Date.now();
    let dir: IsolatedDirectory;
    try {
      dir = await acquireIsolatedDirectory({
        externalConnections: this.config.externalConnections,
        keep: this.config.keepWorkDir,
      });
    } catch (e) {
      const error = toError(e);
      const log = this.createLog(scenario.name);
      log.step('Prepare working directory');
      log.fail(error.message);
      await log.close();
      recordScenarioStep(scenario.name, 'stage', 'fail', { note: error.message });
      return {
        scenario,
        state: 'failed',
        failedStep: 'stage',
        error,
        durationMs: Date.now() - started,
      };
    }

    try {
      return await this.run(scenario, callback, dir.path);
    } finally {
      await dir.release();
    }
  }

  private async stage(
    scenario: Scenario,
    fixtureDir: string,
    workDir: string,
    log: Logger,
  ): Promise<void> {
    log.step('Stage initial state');
    const initial = await this.repository.findInitialState(fixtureDir);

    if (!initial.found) {
      if (!this.config.allowMissingInitialState) {
        throw new MissingStateError(
          `Initial state ${this.config.initialStateName} not found in ${fixtureDir}`,
        );
      }
      log.pass('no initial state, working directory left empty');
      recordScenarioStep(scenario.name, 'stage', 'ok', { note: 'no initial state' });
      return;
    }

    // Merge into whatever external connections already placed there
    await withFixtureDirectory(initial.path, (stateDir) =>
      fs.copy(stateDir, workDir, { overwrite: true }),
    );
    log.pass(`copied ${path.basename(initial.path)}`);
    recordScenarioStep(scenario.name, 'stage', 'ok');
  }

  private async check(
    scenario: Scenario,
    fixtureDir: string,
    workDir: string,
    log: Logger,
  ): Promise<void> {
    const { checkStrategy, allowExtraFinalItems } = this.config;
    log.step(`Check final state (${checkStrategy})`);

    if (checkStrategy === 'none') {
      log.pass('no check configured');
      recordScenarioStep(scenario.name, 'check', 'ok', { note: 'not checked' });
      return;
    }

    const final = await this.repository.findFinalState(fixtureDir);
    if (!final.found) {
      if (!this.config.allowMissingFinalState) {
        throw new MissingStateError(
          `Final state ${this.config.finalStateName} not found in ${fixtureDir}`,
        );
      }
      log.warn('no final state, check skipped');
      recordScenarioStep(scenario.name, 'check', 'warn', { note: 'no final state' });
      return;
    }

    const labels = {
      left: toPosix(path.join(scenario.name, path.basename(final.path))),
      right: WORKDIR_LABEL,
    };
    const result: ComparisonResult = await withFixtureDirectory(final.path, (expectedDir) =>
      checkStrategy === 'names'
        ? this.comparator.namesEqual(
            expectedDir,
            workDir,
            { allowExtra: allowExtraFinalItems },
            labels,
          )
        : this.comparator.compare(
            expectedDir,
            workDir,
            { leftMustHaveAll: !allowExtraFinalItems, rightMustHaveAll: true },
            labels,
          ),
    );

    if (!result.equal) {
      const n = result.mismatches.length;
      logBoxCount(
        log,
        'mismatches',
        result.mismatches.map((m) => m.detail),
        plural(n, 'mismatch', 'mismatches'),
      );
      throw new ComparisonMismatchError(
        result.mismatches,
        `Final state of ${scenario.name} does not match`,
      );
    }

    log.pass('final state matches');
    recordScenarioStep(scenario.name, 'check', 'ok', { mismatchCount: 0 });
  }
}

/** Throw the failure carried by an outcome; no-op for a passed one */
export function assertOutcome(outcome: ScenarioOutcome): void {
  if (outcome.state === 'passed') return;
  throw (
    outcome.error ??
    new Error(`Scenario ${outcome.scenario.name} failed during ${outcome.failedStep ?? 'run'}`)
  );
}
