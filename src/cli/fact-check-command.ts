import type { Command } from 'commander';
import { parseFactCheckOptions } from '../boundaries/cli-parser';
import { factCheckDocument } from '../fact-check/scorer';
import { log, setSilentMode, setVerboseMode, warn } from '../output/logger';
import { printFactCheckReport } from '../output/reporter';
import { openSession, pipelineSettings } from './session';
import {
  EXIT_FAILURE,
  EXIT_OK,
  envStrictness,
  reportFailure,
  resolveDeps,
  type CommandDeps,
  type ResolvedDeps,
} from './types';

/**
 * Fact-checks the drafted sections of a memo version without touching the
 * pipeline. Exits 1 when the report requires a rewrite.
 */
export async function runFactCheckCommand(company: string | undefined, raw: unknown, deps: ResolvedDeps): Promise<number> {
  try {
    const options = parseFactCheckOptions(raw);
    setVerboseMode(options.verbose);
    setSilentMode(options.json);

    const session = openSession(company, options, 'existing', deps.cwd);
    const settings = pipelineSettings(session.config, options.strictness ?? envStrictness(deps.env));
    const research = session.repo.readArtifact('research');
    if (!research) {
      warn(`[memoforge] ${session.repo.name} has no research artifact; claims are checked for citations only`);
    }

    const sections = session.repo.listSections().flatMap((id) => {
      const content = session.repo.readSection(id);
      if (content === undefined) return [];
      const name = session.outline.sections.find((s) => s.number === id.number)?.name ?? id.slug;
      return [{ name, content }];
    });

    const report = factCheckDocument(sections, research, session.company.url, {
      strictness: settings.strictness,
      thresholds: settings.evidence,
    });

    if (options.save) {
      session.repo.writeArtifact('fact-check', report);
      log(`Saved fact-check report to ${session.repo.name}`);
    }

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      printFactCheckReport(report, { showAll: options.verbose });
    }
    return report.requiresRewrite ? EXIT_FAILURE : EXIT_OK;
  } catch (e: unknown) {
    return reportFailure(e, 'Fact-checking memo');
  }
}

export function registerFactCheckCommand(program: Command, deps: CommandDeps = {}): void {
  program
    .command('fact-check')
    .description('Check the claims of a memo version against its citations and research')
    .argument('[company]', 'company or deal name')
    .option('--firm <firm>', 'firm whose io/ directory holds the deal')
    .option('--deal <deal>', 'deal name inside the firm directory')
    .option('--version <version>', 'version to check, e.g. v0.0.2')
    .option('--url <url>', 'company website, checked against research')
    .option('--strictness <level>', 'low, medium or high')
    .option('--json', 'print the report as JSON')
    .option('--save', 'write 4-fact-check.json into the version directory')
    .option('--config <path>', 'path to a .memoforge.ini file')
    .option('-v, --verbose', 'list every non-trivial claim, not only critical ones')
    .action(async (company: string | undefined, opts: unknown) => {
      const resolved = resolveDeps(deps);
      resolved.exit(await runFactCheckCommand(company, opts, resolved));
    });
}
