import * as path from 'node:path';

import fg from 'fast-glob';
import fs from 'fs-extra';

import { commandScenario } from '../../suite/components/command-scenario.ts';
import { defineScenarioSuite } from '../../suite/components/vitest-scenarios.ts';
import type { ScenarioCallback } from '../../suite/types/scenario.ts';
import { FIXTURES_DIR } from '../components/fixtures.ts';

const MANIFEST = 'manifest.txt';

// Writes manifest.txt listing every other .txt file in the working directory
const writeManifest: ScenarioCallback = async (_name, _fixture, { workDir, log }) => {
  const files = (await fg('**/*.txt', { cwd: workDir, dot: true, ignore: [MANIFEST] })).sort();
  log.write(`files=${files.length}`);
  await fs.writeFile(path.join(workDir, MANIFEST), files.map((f) => `${f}\n`).join(''));
};

defineScenarioSuite(
  'manifest scenarios',
  { fixturesRoot: path.join(FIXTURES_DIR, 'scenarios') },
  writeManifest,
);

defineScenarioSuite(
  'command scenarios',
  { fixturesRoot: path.join(FIXTURES_DIR, 'commands') },
  commandScenario(process.execPath, [
    '-e',
    "require('node:fs').writeFileSync('done.txt', process.argv[1] + '\\n')",
    '{name}',
  ]),
);
