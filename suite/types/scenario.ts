// suite/types/scenario.ts
import type { Logger } from './logger.ts';

export const CHECK_STRATEGIES = ['none', 'names', 'contents'] as const;

/** none = no final check, names = relative file paths only, contents = full comparison */
export type CheckStrategy = (typeof CHECK_STRATEGIES)[number];

export type ConnectionStrategy =
  | 'symlink'
  | 'copy'
  | ((externalPath: string, internalPath: string) => void | Promise<void>);

export type ExternalConnection = {
  /** Absolute, or relative to the working directory before isolation */
  externalPath: string;
  /** Relative destination inside the isolated directory; defaults to the basename */
  internalPath?: string;
  strategy?: ConnectionStrategy;
};

export type ScenarioSuiteConfig = {
  fixturesRoot: string;
  checkStrategy: CheckStrategy;
  allowMissingInitialState: boolean;
  allowMissingFinalState: boolean;
  allowExtraFinalItems: boolean;
  initialStateName: string;
  finalStateName: string;
  externalConnections: ExternalConnection[];
  keepWorkDir: boolean;
};

export type Scenario = {
  readonly name: string;
  /** Absolute path of the fixture directory or archive */
  readonly fixturePath: string;
};

export type StateLookup = { found: false } | { found: true; path: string };

export type ScenarioStep = 'stage' | 'execute' | 'check';

export type ScenarioContext = {
  workDir: string;
  log: Logger;
};

export type ScenarioCallback = (
  scenarioName: string,
  scenarioFixturePath: string,
  context: ScenarioContext,
) => void | Promise<void>;

export type ScenarioOutcome = {
  scenario: Scenario;
  state: 'passed' | 'failed';
  failedStep?: ScenarioStep;
  error?: Error;
  durationMs: number;
};
