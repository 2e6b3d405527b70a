import type { Command } from 'commander';
import fg from 'fast-glob';
import { existsSync, readFileSync, statSync, writeFileSync } from 'fs';
import * as path from 'path';
import { parseConsolidateOptions } from '../boundaries/cli-parser';
import { consolidateCitations } from '../citations/consolidator';
import { mergeCitationBlocks } from '../citations/merge';
import { DocumentNotFoundError } from '../errors/index';
import { describeDiagnostic } from '../footnotes';
import { log, warn } from '../output/logger';
import { printConsolidation } from '../output/reporter';
import { EXIT_OK, reportFailure, resolveDeps, type CommandDeps, type ResolvedDeps } from './types';

export async function runConsolidate(file: string, raw: unknown, deps: ResolvedDeps): Promise<number> {
  try {
    const options = parseConsolidateOptions(raw);
    const input = path.resolve(deps.cwd, file);
    if (!existsSync(input)) {
      throw new DocumentNotFoundError(`File not found: ${file}`, [input]);
    }

    const result = consolidateCitations(readFileSync(input, 'utf-8'), {
      dedupe: options.dedupe,
      backReferences: options.backrefs,
    });
    printConsolidation(file, result, options.dryRun);

    const output = options.output ? path.resolve(deps.cwd, options.output) : input;
    if (!options.dryRun && (result.changed || output !== input)) {
      writeFileSync(output, result.text, 'utf-8');
      if (output !== input) log(`Wrote ${path.relative(deps.cwd, output) || output}`);
    }
    return EXIT_OK;
  } catch (e: unknown) {
    return reportFailure(e, 'Consolidating citations');
  }
}

/**
 * Collapses repeated citations blocks inside each markdown file of a
 * directory (section drafts, section research), keeping labels as they are.
 */
export async function runFixCitations(dir: string, deps: ResolvedDeps): Promise<number> {
  try {
    const root = path.resolve(deps.cwd, dir);
    if (!existsSync(root) || !statSync(root).isDirectory()) {
      throw new DocumentNotFoundError(`Directory not found: ${dir}`, [root]);
    }

    const files = fg.sync('**/*.md', { cwd: root, onlyFiles: true }).sort();
    let fixed = 0;
    for (const rel of files) {
      const full = path.join(root, rel);
      const result = mergeCitationBlocks(readFileSync(full, 'utf-8'));
      for (const diagnostic of result.diagnostics) {
        warn(`[memoforge] ${rel}: ${describeDiagnostic(diagnostic)}`);
      }
      if (!result.changed) continue;
      writeFileSync(full, result.text, 'utf-8');
      log(`✓ ${rel}: merged ${result.blocks} citation blocks`);
      fixed++;
    }

    log(`Fixed ${fixed} of ${files.length} files`);
    return EXIT_OK;
  } catch (e: unknown) {
    return reportFailure(e, 'Fixing citations');
  }
}

export function registerCitationCommands(program: Command, deps: CommandDeps = {}): void {
  program
    .command('consolidate')
    .description('Merge the per-section citations blocks of a markdown file into one')
    .argument('<file>', 'markdown file')
    .option('-o, --output <file>', 'write here instead of in place')
    .option('--dry-run', 'report without writing')
    .option('--dedupe', 'merge identical sources under one label')
    .option('--backrefs', 'list the sections citing each shared source')
    .action(async (file: string, opts: unknown) => {
      const resolved = resolveDeps(deps);
      resolved.exit(await runConsolidate(file, opts, resolved));
    });

  program
    .command('fix-citations')
    .description('Collapse repeated citations blocks in every markdown file of a directory')
    .argument('<dir>', 'directory, e.g. a version directory or its 1-research/')
    .action(async (dir: string) => {
      const resolved = resolveDeps(deps);
      resolved.exit(await runFixCitations(dir, resolved));
    });
}
