import type { Command } from 'commander';
import { existsSync, writeFileSync } from 'fs';
import * as path from 'path';
import { DEFAULT_CONFIG_FILENAME } from '../config/constants';
import { error, log } from '../output/logger';
import { EXIT_FAILURE, EXIT_OK, resolveDeps, type CommandDeps, type ResolvedDeps } from './types';

// Template for .memoforge.ini configuration file
const CONFIG_TEMPLATE = `# memoforge configuration
# Paths are relative to this file.
OutputRoot=output
IoRoot=io
DataRoot=data
Concurrency=4
QualityThreshold=8.0
# Outline=direct-investment

[fact-check]
Strictness=high
HighRiskEvidenceRatio=0.5
MediumRiskEvidenceRatio=0.4
NamedEntityEvidenceRatio=0.6

[citations]
BackReferences=true
`;

// Template for .env.memoforge environment file
const ENV_TEMPLATE = `# memoforge environment
# Rename this file to .env, or copy its contents into your existing .env file.

# Generalist model (required)
ANTHROPIC_API_KEY=your-anthropic-api-key-here
# ANTHROPIC_MODEL=claude-3-7-sonnet-latest
# ANTHROPIC_MAX_TOKENS=8192
# ANTHROPIC_TEMPERATURE=0.2

# Web-search model (optional; research runs without web search when unset)
# PERPLEXITY_API_KEY=your-perplexity-api-key-here
# PERPLEXITY_MODEL=sonar-pro

# FACT_CHECK_STRICTNESS=high
`;

export const ENV_FILENAME = '.env.memoforge';

interface InitOptions {
  force?: boolean;
}

export function runInit(opts: InitOptions, deps: ResolvedDeps): number {
  const configPath = path.join(deps.cwd, DEFAULT_CONFIG_FILENAME);
  const envPath = path.join(deps.cwd, ENV_FILENAME);

  // Check for existing files without --force
  if (!opts.force) {
    const existingFiles: string[] = [];
    if (existsSync(configPath)) existingFiles.push(DEFAULT_CONFIG_FILENAME);
    if (existsSync(envPath)) existingFiles.push(ENV_FILENAME);

    if (existingFiles.length > 0) {
      error(`Error: The following files already exist:`);
      for (const file of existingFiles) {
        error(`  • ${file}`);
      }
      error(`\nUse --force to overwrite existing files.`);
      return EXIT_FAILURE;
    }
  }

  try {
    writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    writeFileSync(envPath, ENV_TEMPLATE, 'utf-8');
  } catch (e: unknown) {
    const err = e instanceof Error ? e : new Error(String(e));
    error(`Error: Failed to write configuration files: ${err.message}`);
    return EXIT_FAILURE;
  }

  log(`✓ Configuration files created successfully!\n`);
  log(`Next steps:`);
  log(`  1. Rename ${ENV_FILENAME} to .env, or copy its contents into your existing .env file`);
  log(`  2. Set ANTHROPIC_API_KEY (and PERPLEXITY_API_KEY for web search)`);
  log(`  3. Run 'memoforge generate "Company Name" --url https://company.example' to write a memo`);
  return EXIT_OK;
}

/**
 * Registers the 'init' command with Commander.
 * This command writes a starter .memoforge.ini and environment file.
 */
export function registerInitCommand(program: Command, deps: CommandDeps = {}): void {
  program
    .command('init')
    .description('Create memoforge configuration files in the current directory')
    .option('--force', 'Overwrite existing configuration files')
    .action((opts: InitOptions) => {
      const resolved = resolveDeps(deps);
      resolved.exit(runInit(opts, resolved));
    });
}
