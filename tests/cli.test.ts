import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { resumeHint } from '../src/cli/generate-command';
import { ENV_FILENAME } from '../src/cli/init-command';
import { createProgram } from '../src/cli/program';
import type { CommandDeps } from '../src/cli/types';
import { CLI_VERSION, DEFAULT_CONFIG_FILENAME } from '../src/config/constants';
import { setSilentMode, setVerboseMode } from '../src/output/logger';
import { PIPELINE_STAGES } from '../src/pipeline/stages';
import type { Generators } from '../src/providers/provider-factory';
import { ScriptedGenerator, memoAnswer } from './scripted-generator';

const RESEARCH_JSON = JSON.stringify({ company: { name: 'Acme' }, topics: {}, sources: [] });

describe('CLI commands', () => {
  let cwd: string;
  let codes: number[];
  let generators: Generators;

  const deps = (): CommandDeps => ({
    cwd: () => cwd,
    env: {},
    generators: () => generators,
    now: () => new Date('2026-01-01T00:00:00Z'),
    exit: (code) => {
      codes.push(code);
    },
  });

  const run = async (...args: string[]): Promise<void> => {
    await createProgram(deps()).parseAsync(['node', 'memoforge', ...args]);
  };

  const versionDir = (name: string): string => {
    const dir = path.join(cwd, 'output', name);
    mkdirSync(dir, { recursive: true });
    return dir;
  };

  beforeEach(() => {
    cwd = mkdtempSync(path.join(tmpdir(), 'memoforge-cli-'));
    codes = [];
    const writer = new ScriptedGenerator(memoAnswer(9));
    generators = { writer, search: writer, hasWebSearch: false };
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
    setSilentMode(false);
    setVerboseMode(false);
    vi.restoreAllMocks();
  });

  describe('generate and resume', () => {
    it('writes a complete memo and reports it complete on resume', async () => {
      writeFileSync(path.join(cwd, 'deck.txt'), 'Acme deck: workflow software, 40 customers.');

      await run('generate', 'Acme', '--deck', 'deck.txt', '--description', 'Workflow software');

      const dir = path.join(cwd, 'output', 'Acme-v0.0.1');
      const state = JSON.parse(readFileSync(path.join(dir, 'state.json'), 'utf-8'));
      expect(codes).toEqual([0]);
      expect(state.status).toBe('complete');
      expect(state.overallScore).toBe(9);
      expect(existsSync(path.join(dir, '0-deck-analysis.json'))).toBe(true);
      expect(existsSync(path.join(dir, '6-Acme-v0.0.1.md'))).toBe(true);

      await run('resume', 'Acme');

      expect(codes).toEqual([0, 0]);
      expect(console.log).toHaveBeenCalledWith('Acme-v0.0.1 is already complete');
    });

    it('names the failed stage and how to resume', async () => {
      const writer = new ScriptedGenerator(() => {
        throw new Error('model down');
      });
      generators = { writer, search: writer, hasWebSearch: false };

      await run('generate', 'Acme', '--firm', 'north', '--deal', 'Acme');

      expect(codes).toEqual([1]);
      expect(console.error).toHaveBeenCalledWith("Error: Stage 'research' failed: model down");
      expect(console.error).toHaveBeenCalledWith(
        'Completed stages are saved. Resume with: memoforge resume "Acme" --firm north --deal Acme'
      );
    });

    it('fails to resume a company with no versions', async () => {
      await run('resume', 'Acme');

      expect(codes).toEqual([1]);
      expect(console.error).toHaveBeenCalledWith('Error: No output directory found for Acme');
    });
  });

  describe('resumeHint', () => {
    it('quotes the company name', () => {
      expect(resumeHint('Acme Robotics', {})).toBe('memoforge resume "Acme Robotics"');
      expect(resumeHint(undefined, { firm: 'north', deal: 'acme' })).toBe('memoforge resume --firm north --deal acme');
    });
  });

  describe('checkpoint', () => {
    it('prints the detected checkpoint as JSON', async () => {
      const dir = versionDir('Acme-v0.0.1');
      writeFileSync(path.join(dir, '1-research.json'), RESEARCH_JSON);

      await run('checkpoint', 'Acme', '--json');

      expect(codes).toEqual([0]);
      expect(console.log).toHaveBeenCalledTimes(1);
      const printed = vi.mocked(console.log).mock.calls[0]?.[0];
      expect(JSON.parse(String(printed))).toEqual({
        dir,
        checkpoint: 'draft',
        reason: 'research artifact exists',
        remaining: PIPELINE_STAGES.slice(1),
      });
    });

    it('inspects the requested version', async () => {
      versionDir('Acme-v0.0.1');
      writeFileSync(path.join(versionDir('Acme-v0.0.2'), '1-research.json'), RESEARCH_JSON);

      await run('checkpoint', 'Acme', '--version', 'v0.0.1', '--json');

      expect(codes).toEqual([0]);
      const printed = vi.mocked(console.log).mock.calls[0]?.[0];
      expect(JSON.parse(String(printed)).checkpoint).toBe('start');
    });
  });

  describe('root options', () => {
    it('prints the CLI version only before a subcommand', async () => {
      let printed = '';
      const cli = createProgram(deps())
        .exitOverride()
        .configureOutput({ writeOut: (text) => (printed += text) });

      await expect(cli.parseAsync(['node', 'memoforge', '--version'])).rejects.toMatchObject({
        code: 'commander.version',
      });
      expect(printed).toBe(`${CLI_VERSION}\n`);
      expect(codes).toEqual([]);
    });
  });

  describe('assemble', () => {
    const writeSection = (dir: string, file: string, content: string): void => {
      mkdirSync(path.join(dir, '2-sections'), { recursive: true });
      writeFileSync(path.join(dir, '2-sections', file), content);
    };

    it('rebuilds the final draft from the section files', async () => {
      const dir = versionDir('Acme-v0.0.1');
      writeSection(dir, '01-executive-summary.md', '## Executive Summary\n\nAcme [^1].\n\n### Citations\n\n[^1]: One\n');
      writeSection(dir, '02-team.md', '## Team\n\nTeam [^1].\n\n### Citations\n\n[^1]: Two\n');

      await run('assemble', 'Acme');

      expect(codes).toEqual([0]);
      expect(console.log).toHaveBeenCalledWith(
        '✓ Assembled 2 sections with 2 citations into Acme-v0.0.1/6-Acme-v0.0.1.md'
      );
      const draft = readFileSync(path.join(dir, '6-Acme-v0.0.1.md'), 'utf-8');
      expect(draft).toContain('- [Team](#team)');
      expect(draft).toContain('## Team\n\nTeam [^2].');
      expect(draft).toContain('### Citations\n\n[^1]: One\n\n[^2]: Two\n');
    });

    it('assembles the requested version', async () => {
      const older = versionDir('Acme-v0.0.1');
      versionDir('Acme-v0.0.2');
      writeSection(older, '01-executive-summary.md', '## Executive Summary\n\nAcme grew.\n');

      await run('assemble', 'Acme', '--version', 'v0.0.1');

      expect(codes).toEqual([0]);
      expect(existsSync(path.join(older, '6-Acme-v0.0.1.md'))).toBe(true);
    });

    it('exits 1 when no sections were drafted', async () => {
      versionDir('Acme-v0.0.1');

      await run('assemble', 'Acme');

      expect(codes).toEqual([1]);
      expect(console.error).toHaveBeenCalledWith('Error: No drafted sections to assemble in Acme-v0.0.1');
    });
  });

  describe('fact-check', () => {
    it('exits 1 and reports an uncited financial claim', async () => {
      const dir = versionDir('Acme-v0.0.1');
      writeFileSync(path.join(dir, '1-research.json'), RESEARCH_JSON);
      mkdirSync(path.join(dir, '2-sections'));
      writeFileSync(
        path.join(dir, '2-sections', '02-business-overview.md'),
        '## Business Overview\n\nAcme raised $5M in seed funding.\n'
      );

      await run('fact-check', 'Acme', '--json', '--save');

      expect(codes).toEqual([1]);
      const report = JSON.parse(String(vi.mocked(console.log).mock.calls[0]?.[0]));
      expect(report.requiresRewrite).toBe(true);
      expect(report.criticalClaims).toBe(1);
      expect(report.sections[0].section).toBe('Business Overview');
      expect(report.sections[0].flaggedClaims[0].claim).toBe('Acme raised $5M in seed funding.');
      expect(existsSync(path.join(dir, '4-fact-check.json'))).toBe(true);
    });

    it('exits 0 when every claim is cited', async () => {
      const dir = versionDir('Acme-v0.0.1');
      mkdirSync(path.join(dir, '2-sections'));
      writeFileSync(
        path.join(dir, '2-sections', '02-business-overview.md'),
        '## Business Overview\n\nAcme raised $5M in seed funding.[^1]\n'
      );

      await run('fact-check', 'Acme', '--json');

      expect(codes).toEqual([0]);
      const report = JSON.parse(String(vi.mocked(console.log).mock.calls[0]?.[0]));
      expect(report.verifiedClaims).toBe(1);
      expect(existsSync(path.join(dir, '4-fact-check.json'))).toBe(false);
    });
  });

  describe('consolidate', () => {
    const TWO_SECTIONS = [
      '## Alpha',
      '',
      'Claim one [^1] and two [^2].',
      '',
      '### Citations',
      '',
      '[^1]: Source A',
      '[^2]: Source B',
      '',
      '## Beta',
      '',
      'Claim three [^1].',
      '',
      '### Citations',
      '',
      '[^1]: Source C',
      '',
    ].join('\n');

    const CONSOLIDATED = [
      '## Alpha',
      '',
      'Claim one [^1] and two [^2].',
      '',
      '## Beta',
      '',
      'Claim three [^3].',
      '',
      '### Citations',
      '',
      '[^1]: Source A',
      '',
      '[^2]: Source B',
      '',
      '[^3]: Source C',
      '',
    ].join('\n');

    it('rewrites the file in place', async () => {
      const file = path.join(cwd, 'memo.md');
      writeFileSync(file, TWO_SECTIONS);

      await run('consolidate', 'memo.md');

      expect(codes).toEqual([0]);
      expect(readFileSync(file, 'utf-8')).toBe(CONSOLIDATED);
    });

    it('leaves the file alone on a dry run', async () => {
      const file = path.join(cwd, 'memo.md');
      writeFileSync(file, TWO_SECTIONS);

      await run('consolidate', 'memo.md', '--dry-run');

      expect(readFileSync(file, 'utf-8')).toBe(TWO_SECTIONS);
    });

    it('writes to --output and keeps the input', async () => {
      writeFileSync(path.join(cwd, 'memo.md'), TWO_SECTIONS);

      await run('consolidate', 'memo.md', '-o', 'out.md');

      expect(readFileSync(path.join(cwd, 'memo.md'), 'utf-8')).toBe(TWO_SECTIONS);
      expect(readFileSync(path.join(cwd, 'out.md'), 'utf-8')).toBe(CONSOLIDATED);
    });

    it('fails on a missing file', async () => {
      await run('consolidate', 'missing.md');

      expect(codes).toEqual([1]);
      expect(console.error).toHaveBeenCalledWith('Error: File not found: missing.md');
    });
  });

  describe('fix-citations', () => {
    it('merges repeated blocks in every markdown file', async () => {
      const dir = path.join(cwd, 'sections');
      mkdirSync(dir);
      writeFileSync(
        path.join(dir, '04-team.md'),
        [
          '## Team',
          '',
          'Text [^1] and [^deck].',
          '',
          '### Citations',
          '',
          '[^1]: One',
          '',
          '---',
          '',
          'More [^2].',
          '',
          '### Citations',
          '',
          '[^2]: Two',
          '[^deck]: Pitch deck',
          '[^1]: One again',
          '',
        ].join('\n')
      );
      writeFileSync(path.join(dir, '01-summary.md'), '## Summary\n\nNo sources yet.\n');

      await run('fix-citations', 'sections');

      expect(codes).toEqual([0]);
      expect(readFileSync(path.join(dir, '04-team.md'), 'utf-8')).toBe(
        [
          '## Team',
          '',
          'Text [^1] and [^deck].',
          '',
          '---',
          '',
          'More [^2].',
          '',
          '### Citations',
          '',
          '[^deck]: Pitch deck',
          '',
          '[^1]: One',
          '',
          '[^2]: Two',
          '',
        ].join('\n')
      );
      expect(readFileSync(path.join(dir, '01-summary.md'), 'utf-8')).toBe('## Summary\n\nNo sources yet.\n');
      expect(console.log).toHaveBeenCalledWith('Fixed 1 of 2 files');
    });
  });

  describe('init', () => {
    it(`creates ${DEFAULT_CONFIG_FILENAME} and ${ENV_FILENAME}`, async () => {
      await run('init');

      expect(codes).toEqual([0]);
      const config = readFileSync(path.join(cwd, DEFAULT_CONFIG_FILENAME), 'utf-8');
      expect(config).toContain('OutputRoot=output');
      expect(config).toContain('Concurrency=4');
      expect(config).toContain('[fact-check]');
      const env = readFileSync(path.join(cwd, ENV_FILENAME), 'utf-8');
      expect(env).toContain('ANTHROPIC_API_KEY=your-anthropic-api-key-here');
      expect(env).toContain('# PERPLEXITY_API_KEY=');
    });

    it('refuses to overwrite existing files without --force', async () => {
      const configPath = path.join(cwd, DEFAULT_CONFIG_FILENAME);
      writeFileSync(configPath, 'existing content');

      await run('init');

      expect(codes).toEqual([1]);
      expect(readFileSync(configPath, 'utf-8')).toBe('existing content');
      expect(existsSync(path.join(cwd, ENV_FILENAME))).toBe(false);
    });

    it('overwrites existing files with --force', async () => {
      writeFileSync(path.join(cwd, DEFAULT_CONFIG_FILENAME), 'old config');
      writeFileSync(path.join(cwd, ENV_FILENAME), 'old env');

      await run('init', '--force');

      expect(codes).toEqual([0]);
      expect(readFileSync(path.join(cwd, DEFAULT_CONFIG_FILENAME), 'utf-8')).toContain('# memoforge configuration');
      expect(readFileSync(path.join(cwd, ENV_FILENAME), 'utf-8')).toContain('# memoforge environment');
    });
  });
});
