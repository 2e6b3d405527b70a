import type { Command } from 'commander';
import * as path from 'path';
import { parseDocumentOptions, parseGenerateOptions } from '../boundaries/cli-parser';
import { log, setVerboseMode } from '../output/logger';
import { printRunSummary } from '../output/reporter';
import type { StageContext } from '../pipeline/context';
import { reconstructState } from '../pipeline/reconstruct';
import { runPipeline } from '../pipeline/runner';
import { createState, type MemoState } from '../pipeline/state';
import type { Checkpoint } from '../pipeline/stages';
import type { DocumentOptions } from '../schemas/cli-schemas';
import {
  detectSessionCheckpoint,
  openSession,
  pipelineSettings,
  readDeckText,
  type DocumentSession,
} from './session';
import {
  EXIT_OK,
  envStrictness,
  reportFailure,
  resolveDeps,
  type CommandDeps,
  type ResolvedDeps,
} from './types';

export function resumeHint(company: string | undefined, options: Partial<Pick<DocumentOptions, 'firm' | 'deal'>>): string {
  const parts = ['memoforge resume'];
  if (company) parts.push(JSON.stringify(company));
  if (options.firm) parts.push('--firm', options.firm);
  if (options.deal) parts.push('--deal', options.deal);
  return parts.join(' ');
}

async function execute(
  session: DocumentSession,
  state: MemoState,
  from: Checkpoint,
  deps: ResolvedDeps,
  deckText?: string
): Promise<void> {
  const ctx: StageContext = {
    repo: session.repo,
    generators: deps.generators(),
    outline: session.outline,
    settings: pipelineSettings(session.config, envStrictness(deps.env)),
    ...(session.deal ? { deal: session.deal } : {}),
    ...(deckText ? { deckText } : {}),
    ...(deps.signal ? { signal: deps.signal } : {}),
    now: deps.now,
  };

  const result = await runPipeline(ctx, state, { from });
  printRunSummary(path.relative(deps.cwd, session.dir) || session.dir, result.status, state.overallScore);
}

export async function runGenerate(company: string, raw: unknown, deps: ResolvedDeps): Promise<number> {
  let hint = resumeHint(company, {});
  try {
    const options = parseGenerateOptions(raw);
    setVerboseMode(options.verbose);
    hint = resumeHint(company, options);

    const session = openSession(company, options, 'new', deps.cwd);
    log(`Generating ${session.company.name} memo in ${path.relative(deps.cwd, session.dir) || session.dir}`);
    const deckText = readDeckText(options.deck, session, deps.cwd);
    await execute(session, createState(session.company), 'start', deps, deckText);
    return EXIT_OK;
  } catch (e: unknown) {
    return reportFailure(e, 'Generating memo', hint);
  }
}

export async function runResume(company: string | undefined, raw: unknown, deps: ResolvedDeps): Promise<number> {
  let hint = resumeHint(company, {});
  try {
    const options = parseDocumentOptions(raw);
    setVerboseMode(options.verbose);
    hint = resumeHint(company, options);

    const session = openSession(company, options, 'existing', deps.cwd);
    const detection = detectSessionCheckpoint(session);
    if (detection.checkpoint === 'complete') {
      log(`${session.repo.name} is already complete`);
      return EXIT_OK;
    }

    log(`Resuming ${session.repo.name} at ${detection.checkpoint} (${detection.reason})`);
    const state = reconstructState(session.repo, session.company);
    await execute(session, state, detection.checkpoint, deps);
    return EXIT_OK;
  } catch (e: unknown) {
    return reportFailure(e, 'Resuming memo', hint);
  }
}

/*
 * Registers `generate` and `resume`, the two commands that run the pipeline.
 */
export function registerGenerateCommands(program: Command, deps: CommandDeps = {}): void {
  program
    .command('generate')
    .description('Generate a new memo version for a company')
    .argument('<company>', 'company or deal name')
    .option('--firm <firm>', 'firm whose io/ directory holds the deal')
    .option('--deal <deal>', 'deal name inside the firm directory')
    .option('--url <url>', 'company website, checked against research')
    .option('--deck <file>', 'pre-extracted pitch deck text (.txt or .md)')
    .option('--description <text>', 'one-line company description')
    .option('--config <path>', 'path to a .memoforge.ini file')
    .option('-v, --verbose', 'enable verbose logging')
    .action(async (company: string, opts: unknown) => {
      const resolved = resolveDeps(deps);
      resolved.exit(await runGenerate(company, opts, resolved));
    });

  program
    .command('resume')
    .description('Continue the latest (or a given) memo version from its checkpoint')
    .argument('[company]', 'company or deal name')
    .option('--firm <firm>', 'firm whose io/ directory holds the deal')
    .option('--deal <deal>', 'deal name inside the firm directory')
    .option('--version <version>', 'version to resume, e.g. v0.0.2')
    .option('--url <url>', 'company website, checked against research')
    .option('--config <path>', 'path to a .memoforge.ini file')
    .option('-v, --verbose', 'enable verbose logging')
    .action(async (company: string | undefined, opts: unknown) => {
      const resolved = resolveDeps(deps);
      resolved.exit(await runResume(company, opts, resolved));
    });
}
