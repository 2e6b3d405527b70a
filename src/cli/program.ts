import { Command } from 'commander';
import { CLI_VERSION } from '../config/constants';
import { registerAssembleCommand } from './assemble-command';
import { registerCheckpointCommand } from './checkpoint-command';
import { registerCitationCommands } from './consolidate-command';
import { registerFactCheckCommand } from './fact-check-command';
import { registerGenerateCommands } from './generate-command';
import { registerInitCommand } from './init-command';
import type { CommandDeps } from './types';

/**
 * The memoforge command tree. Root options are only read before the
 * subcommand name, so `checkpoint Acme --version v0.0.2` reaches the
 * subcommand instead of printing the CLI version.
 */
export function createProgram(deps: CommandDeps = {}, root: Command = new Command()): Command {
  root
    .name('memoforge')
    .description('Investment memo pipeline with checkpoint resume, citation consolidation and fact verification')
    .version(CLI_VERSION)
    .enablePositionalOptions();

  registerGenerateCommands(root, deps);
  registerCheckpointCommand(root, deps);
  registerFactCheckCommand(root, deps);
  registerCitationCommands(root, deps);
  registerAssembleCommand(root, deps);
  registerInitCommand(root, deps);
  return root;
}
