// suite/index.ts
export * from './components/errors.ts';
export {
  ARCHIVE_EXTENSIONS,
  extractArchive,
  isArchive,
  stripArchiveExtension,
  withExtractedArchive,
  withFixtureDirectory,
  type ExtractedTree,
} from './components/archive.ts';
export {
  PathComparator,
  compareFileNames,
  comparePaths,
  pathsEqual,
  type CompareLabels,
} from './components/path-compare.ts';
export { assertPathsEqual, assertPathsNotEqual } from './components/path-assert.ts';
export { ScenarioRepository, discoverScenarios } from './components/scenario-repository.ts';
export { ScenarioRunner, assertOutcome } from './components/scenario-runner.ts';
export {
  acquireIsolatedDirectory,
  withIsolatedDirectory,
  type IsolatedDirectory,
  type IsolationOptions,
} from './components/isolated-dir.ts';
export {
  loadScenarioConfig,
  resolveScenarioConfig,
  type ScenarioConfigInput,
} from './components/config.ts';
export { commandScenario } from './components/command-scenario.ts';
export { defineScenarioSuite } from './components/vitest-scenarios.ts';
export { createLogger, scenarioLogger } from './components/logger.ts';
export type * from './types/compare.ts';
export type * from './types/logger.ts';
export type * from './types/scenario.ts';
