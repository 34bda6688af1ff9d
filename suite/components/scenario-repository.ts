// suite/components/scenario-repository.ts
import * as path from 'node:path';

import fs from 'fs-extra';

import type { Scenario, ScenarioSuiteConfig, StateLookup } from '../types/scenario.ts';
import { stripArchiveExtension } from './archive.ts';
import { AmbiguousFixtureError, ConfigurationError } from './errors.ts';

/**
 * Enumerate one scenario per immediate child of the fixtures root.
 * Names are the entry names without archive suffixes; collisions get _1, _2, ...
 * Synchronous so it can run while Vitest collects tests.
 */
export function discoverScenarios(fixturesRoot: string | undefined): Scenario[] {
  if (!fixturesRoot) {
    throw new ConfigurationError('fixturesRoot is required but was not configured');
  }
  const root = path.resolve(fixturesRoot);
  if (!fs.pathExistsSync(root)) {
    throw new ConfigurationError(`Could not find fixtures root ${root}`);
  }
  if (!fs.statSync(root).isDirectory()) {
    throw new ConfigurationError(`Fixtures root ${root} is not a directory`);
  }

  const taken = new Set<string>();
  const scenarios: Scenario[] = [];
  for (const entry of fs.readdirSync(root).sort()) {
    const base = stripArchiveExtension(entry);
    let name = base;
    for (let i = 1; taken.has(name); i++) name = `${base}_${i}`;
    taken.add(name);
    scenarios.push(Object.freeze({ name, fixturePath: path.join(root, entry) }));
  }
  return scenarios;
}

/**
 * Find the single child of `fixtureDir` whose name, without archive suffixes,
 * equals `markerName`. More than one candidate is always an error.
 */
export async function findStateEntry(fixtureDir: string, markerName: string): Promise<StateLookup> {
  const matches = (await fs.readdir(fixtureDir))
    .filter((entry) => stripArchiveExtension(entry) === markerName)
    .sort();

  if (matches.length === 0) return { found: false };
  if (matches.length > 1) {
    throw new AmbiguousFixtureError(
      `Found multiple ${markerName} entries in ${fixtureDir}: ${matches.join(', ')}`,
      matches,
    );
  }
  return { found: true, path: path.join(fixtureDir, matches[0]) };
}

export class ScenarioRepository {
  private readonly config: Pick<
    ScenarioSuiteConfig,
    'fixturesRoot' | 'initialStateName' | 'finalStateName'
  >;
  private cached: Scenario[] | undefined;

  constructor(
    config: Pick<ScenarioSuiteConfig, 'fixturesRoot' | 'initialStateName' | 'finalStateName'>,
  ) {
    this.config = config;
  }

  /** Scenario descriptors, enumerated once */
  scenarios(): Scenario[] {
    this.cached ??= discoverScenarios(this.config.fixturesRoot);
    return [...this.cached];
  }

  findInitialState(fixtureDir: string): Promise<StateLookup> {
    return findStateEntry(fixtureDir, this.config.initialStateName);
  }

  findFinalState(fixtureDir: string): Promise<StateLookup> {
    return findStateEntry(fixtureDir, this.config.finalStateName);
  }
}
