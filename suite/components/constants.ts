// suite/components/constants.ts
import * as path from 'node:path';

// Directory path segments
export const LOGS_DIR = 'logs';
export const SCENARIOS_LOG_DIR = 'scenarios';

// Environment variable names
export const ENV_LOG_STAMP = 'FS_SCENARIOS_LOG_STAMP';
export const ENV_LOG_DIR = 'FS_SCENARIOS_LOG_DIR';
export const ENV_KEEP_WORKDIR = 'FS_SCENARIOS_KEEP_WORKDIR';

// Resolved once: isolation changes the working directory while scenarios run
export const LOG_BASE_DIR: string = path.resolve(process.env[ENV_LOG_DIR] || LOGS_DIR);

// JSON artifact filenames
export const SCENARIO_DETAIL_FILE = '_scenario-detail.json';

// Log filenames
export const SUITE_LOG_FILE = 'suite.log';

// Temp directory prefixes
export const EXTRACT_TMP_PREFIX = 'fs-scenarios-extract-';
export const WORKDIR_TMP_PREFIX = 'fs-scenarios-work-';

// Fixture marker defaults
export const DEFAULT_INITIAL_STATE_NAME = 'initial_state';
export const DEFAULT_FINAL_STATE_NAME = 'final_state';

// Test-level timeout (Vitest it(..., timeout))
export const SCENARIO_TEST_TIMEOUT_MS = 120_000; // 2 minutes - scenario callbacks may run CLIs
