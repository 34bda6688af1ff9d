// suite/global-setup.ts
import path from 'node:path';
import { pathToFileURL } from 'node:url';

import {
  buildLogRoot,
  buildScenarioLogPath,
  buildSuiteLogPath,
  createLogger,
  makeLogStamp,
} from './components/logger.ts';
import { ENV_LOG_STAMP } from './components/constants.ts';
import { scenarioDetailPath } from './components/detail-io.ts';
import { errorMessage } from './components/errors.ts';
import {
  loadScenarioDetail,
  scenarioSeverity,
  type ScenarioSeverity,
} from './components/scenario-status.ts';
import type { Logger } from './types/logger.ts';
import type { ScenarioStep } from './types/scenario.ts';

const ICON: Record<ScenarioSeverity, string> = { ok: '✅', warn: '⚠️', fail: '❌' };
const STEPS: readonly ScenarioStep[] = ['stage', 'execute', 'check'];

// Always print a pointer to this run's logs
function printLogsPointer(stamp: string) {
  const abs = path.resolve(buildLogRoot(stamp));
  console.log(`\n📝 Logs for this run: ${abs}`);
  console.log(`   ${pathToFileURL(abs).toString()}\n`);
}

function writeScenarioSummary(log: Logger, stamp: string) {
  const detail = loadScenarioDetail(scenarioDetailPath(stamp));
  const names = Object.keys(detail).sort((a, b) => a.localeCompare(b));
  if (names.length === 0) {
    log.write('(no scenario detail recorded)');
    return;
  }

  const counts: Record<ScenarioSeverity, number> = { ok: 0, warn: 0, fail: 0 };
  log.boxStart('Scenarios');
  for (const name of names) {
    const steps = detail[name] ?? {};
    const sev = scenarioSeverity(steps);
    counts[sev] += 1;
    log.boxLine(`• ${ICON[sev]} ${name} - ${sev.toUpperCase()}`);

    for (const step of STEPS) {
      const info = steps[step];
      if (!info) continue;
      const meta = info.meta ?? {};
      const extra = [
        meta.mismatchCount !== undefined ? `mismatches: ${meta.mismatchCount}` : '',
        meta.note ?? '',
      ]
        .filter(Boolean)
        .join('; ');
      const suffix = extra ? `  (${extra})` : '';
      log.boxLine(`    - ${ICON[info.severity]} ${step}: ${info.severity.toUpperCase()}${suffix}`);
    }
    log.boxLine(`    - log: ${pathToFileURL(buildScenarioLogPath(stamp, name)).toString()}`);
  }
  const { ok, fail, warn } = counts;
  log.boxEnd(`(scenarios: ${names.length}, passed: ${ok}, failed: ${fail}, warning: ${warn})`);
}

export default async function globalSetup(): Promise<() => Promise<void>> {
  const stamp = makeLogStamp();
  process.env[ENV_LOG_STAMP] = stamp;
  const suiteLog = createLogger(buildSuiteLogPath(stamp));

  suiteLog.step('Suite: publish run stamp');
  suiteLog.write(`stamp=${stamp}`);
  suiteLog.write(`logs=${buildLogRoot(stamp)}`);
  suiteLog.pass();

  // Anchor for the scenario summary written at teardown
  suiteLog.step('Run Tests');

  return async () => {
    suiteLog.step('Scenario summary');
    try {
      writeScenarioSummary(suiteLog, stamp);
    } catch (e) {
      suiteLog.write(`(failed to render scenario summary: ${errorMessage(e)})`);
    } finally {
      await suiteLog.close();
      printLogsPointer(stamp);
    }
  };
}
