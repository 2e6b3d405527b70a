import type { Command } from 'commander';
import { parseCheckpointOptions } from '../boundaries/cli-parser';
import { setSilentMode, setVerboseMode } from '../output/logger';
import { printCheckpoint } from '../output/reporter';
import { stagesFrom } from '../pipeline/stages';
import { detectSessionCheckpoint, openSession } from './session';
import { EXIT_OK, reportFailure, resolveDeps, type CommandDeps, type ResolvedDeps } from './types';

export async function runCheckpoint(company: string | undefined, raw: unknown, deps: ResolvedDeps): Promise<number> {
  try {
    const options = parseCheckpointOptions(raw);
    setVerboseMode(options.verbose);
    setSilentMode(options.json);

    const session = openSession(company, options, 'existing', deps.cwd);
    const detection = detectSessionCheckpoint(session);
    const remaining = stagesFrom(detection.checkpoint);

    if (options.json) {
      console.log(
        JSON.stringify(
          { dir: session.dir, checkpoint: detection.checkpoint, reason: detection.reason, remaining },
          null,
          2
        )
      );
    } else {
      printCheckpoint(session.dir, detection, remaining);
    }
    return EXIT_OK;
  } catch (e: unknown) {
    return reportFailure(e, 'Detecting checkpoint');
  }
}

export function registerCheckpointCommand(program: Command, deps: CommandDeps = {}): void {
  program
    .command('checkpoint')
    .description('Show which stage a memo version would resume from')
    .argument('[company]', 'company or deal name')
    .option('--firm <firm>', 'firm whose io/ directory holds the deal')
    .option('--deal <deal>', 'deal name inside the firm directory')
    .option('--version <version>', 'version to inspect, e.g. v0.0.2')
    .option('--json', 'print the detection as JSON')
    .option('--config <path>', 'path to a .memoforge.ini file')
    .option('-v, --verbose', 'enable verbose logging')
    .action(async (company: string | undefined, opts: unknown) => {
      const resolved = resolveDeps(deps);
      resolved.exit(await runCheckpoint(company, opts, resolved));
    });
}
