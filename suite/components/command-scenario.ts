// suite/components/command-scenario.ts
import type { ScenarioCallback } from '../types/scenario.ts';
import { execBoxed } from './proc.ts';

export type CommandScenarioOptions = {
  env?: Record<string, string | undefined>;
  /** Box title for the captured output */
  title?: string;
  argsWrapWidth?: number;
};

/** Replace {name} and {fixture} in one argument */
export function substituteArg(arg: string, name: string, fixture: string): string {
  return arg.replace(/\{name\}/g, name).replace(/\{fixture\}/g, fixture);
}

/**
 * A scenario callback that runs `cmd args` inside the working directory.
 * Output is boxed into the scenario log; a non-zero exit fails the scenario.
 */
export function commandScenario(
  cmd: string,
  args: string[] = [],
  opts: CommandScenarioOptions = {},
): ScenarioCallback {
  return async (name, fixture, { workDir, log }) => {
    const resolved = args.map((a) => substituteArg(a, name, fixture));
    const { exitCode } = await execBoxed(log, cmd, resolved, {
      cwd: workDir,
      env: opts.env,
      title: opts.title ?? cmd,
      argsWrapWidth: opts.argsWrapWidth,
    });
    if (exitCode !== 0) {
      throw new Error(`${cmd} exited with code ${exitCode}`);
    }
  };
}
