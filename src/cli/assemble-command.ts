import type { Command } from 'commander';
import { parseDocumentOptions } from '../boundaries/cli-parser';
import { insertTableOfContents } from '../citations/toc';
import { ProcessingError } from '../errors/index';
import { log, setVerboseMode } from '../output/logger';
import { assembleSections } from '../pipeline/handlers/cite';
import { loadSections } from '../pipeline/handlers/sections';
import { openSession, pipelineSettings } from './session';
import { EXIT_OK, reportFailure, resolveDeps, type CommandDeps, type ResolvedDeps } from './types';

/**
 * Rebuilds the final draft of a memo version from its header and the
 * section files in 2-sections/, after sections were edited by hand.
 * Nothing is sent to a model.
 */
export async function runAssemble(company: string | undefined, raw: unknown, deps: ResolvedDeps): Promise<number> {
  try {
    const options = parseDocumentOptions(raw);
    setVerboseMode(options.verbose);

    const session = openSession(company, options, 'existing', deps.cwd);
    const sections = loadSections(session);
    if (sections.length === 0) {
      throw new ProcessingError(`No drafted sections to assemble in ${session.repo.name}`);
    }

    const ctx = { repo: session.repo, settings: pipelineSettings(session.config) };
    const assembled = assembleSections(ctx, sections);
    const toc = insertTableOfContents(assembled.text);
    if (toc.inserted) session.repo.writeText('final-draft', toc.text);

    log(
      `✓ Assembled ${assembled.sections} sections with ${assembled.citations} citations into ` +
        `${session.repo.name}/${session.repo.finalDraftFileName}`
    );
    return EXIT_OK;
  } catch (e: unknown) {
    return reportFailure(e, 'Assembling memo');
  }
}

export function registerAssembleCommand(program: Command, deps: CommandDeps = {}): void {
  program
    .command('assemble')
    .description('Rebuild the final draft from the section files of a memo version')
    .argument('[company]', 'company or deal name')
    .option('--firm <firm>', 'firm whose io/ directory holds the deal')
    .option('--deal <deal>', 'deal name inside the firm directory')
    .option('--version <version>', 'version to assemble, e.g. v0.0.2')
    .option('--config <path>', 'path to a .memoforge.ini file')
    .option('-v, --verbose', 'enable verbose logging')
    .action(async (company: string | undefined, opts: unknown) => {
      const resolved = resolveDeps(deps);
      resolved.exit(await runAssemble(company, opts, resolved));
    });
}
