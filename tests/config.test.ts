import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { loadConfig, parseIni } from '../src/boundaries/config-loader';
import { loadDealConfig, resolveDealPath } from '../src/boundaries/deal-loader';
import { loadOutline, teamSectionNumber } from '../src/boundaries/outline-loader';
import { pipelineSettings } from '../src/cli/session';
import { DEFAULT_CONFIG_FILENAME } from '../src/config/constants';
import { ConfigError, ValidationError } from '../src/errors/index';

describe('Config (.memoforge.ini)', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = mkdtempSync(path.join(tmpdir(), 'memoforge-config-'));
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  it('uses defaults when no config file exists', () => {
    const config = loadConfig(cwd);

    expect(config.configDir).toBe(cwd);
    expect(config.outputRoot).toBe(path.join(cwd, 'output'));
    expect(config.ioRoot).toBe(path.join(cwd, 'io'));
    expect(config.dataRoot).toBe(path.join(cwd, 'data'));
    expect(config.concurrency).toBe(4);
    expect(config.qualityThreshold).toBe(8);
    expect(config.outline).toBeUndefined();
    expect(config.factCheck).toEqual({ highRisk: 0.5, mediumRisk: 0.4, namedEntity: 0.6 });
    expect(config.citations).toEqual({ backReferences: true });
  });

  it('reads globals and sections relative to the config file', () => {
    writeFileSync(
      path.join(cwd, DEFAULT_CONFIG_FILENAME),
      [
        '# memoforge',
        'OutputRoot=memos',
        'Concurrency=2',
        'QualityThreshold=7.5',
        'Outline=custom/outline.yaml',
        '',
        '[fact-check]',
        'Strictness=Medium',
        'HighRiskEvidenceRatio=0.7',
        '',
        '[citations]',
        'BackReferences=False',
      ].join('\n')
    );

    const config = loadConfig(cwd);

    expect(config.outputRoot).toBe(path.join(cwd, 'memos'));
    expect(config.concurrency).toBe(2);
    expect(config.qualityThreshold).toBe(7.5);
    expect(config.outline).toBe(path.join(cwd, 'custom', 'outline.yaml'));
    expect(config.factCheck).toEqual({ strictness: 'medium', highRisk: 0.7, mediumRisk: 0.4, namedEntity: 0.6 });
    expect(config.citations.backReferences).toBe(false);
  });

  it('keeps a built-in outline name as a name', () => {
    writeFileSync(path.join(cwd, DEFAULT_CONFIG_FILENAME), 'Outline=direct-investment\n');
    expect(loadConfig(cwd).outline).toBe('direct-investment');
  });

  it('errors when an explicit config path is missing', () => {
    expect(() => loadConfig(cwd, 'missing.ini')).toThrow(ConfigError);
    expect(() => loadConfig(cwd, 'missing.ini')).toThrow(`Missing configuration file at ${path.join(cwd, 'missing.ini')}`);
  });

  it('rejects invalid values', () => {
    writeFileSync(path.join(cwd, DEFAULT_CONFIG_FILENAME), 'Concurrency=0\n');
    expect(() => loadConfig(cwd)).toThrow(ValidationError);
  });

  it('derives pipeline settings with the command-line strictness first', () => {
    writeFileSync(path.join(cwd, DEFAULT_CONFIG_FILENAME), '[fact-check]\nStrictness=low\n');
    const config = loadConfig(cwd);

    expect(pipelineSettings(config).strictness).toBe('low');
    expect(pipelineSettings(config, 'high')).toEqual({
      concurrency: 4,
      strictness: 'high',
      evidence: { highRisk: 0.5, mediumRisk: 0.4, namedEntity: 0.6 },
      qualityThreshold: 8,
      backReferences: true,
    });
  });
});

describe('parseIni', () => {
  it('skips comments and groups keys by section', () => {
    const doc = parseIni('; note\nOutputRoot = "memos"\n\n[citations]\nBackReferences = true\n# trailing');
    expect(doc).toEqual({
      globals: { OutputRoot: 'memos' },
      sections: { citations: { BackReferences: 'true' } },
    });
  });
});

describe('loadOutline', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = mkdtempSync(path.join(tmpdir(), 'memoforge-outline-'));
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  it('loads the built-in outline by default', () => {
    const outline = loadOutline();
    expect(outline.name).toBe('direct-investment');
    expect(outline.sections).toHaveLength(10);
    expect(outline.sections[0]?.slug).toBe('executive-summary');
    expect(teamSectionNumber(outline)).toBe(4);
  });

  it('sorts sections and derives missing slugs', () => {
    writeFileSync(
      path.join(cwd, 'short.yaml'),
      'name: short\nsections:\n  - number: 2\n    name: Team & Board\n  - number: 1\n    name: Executive Summary\n'
    );

    const outline = loadOutline('short.yaml', cwd);

    expect(outline.sections.map((s) => [s.number, s.slug])).toEqual([
      [1, 'executive-summary'],
      [2, 'team-board'],
    ]);
    expect(outline.sections[0]?.targetWords).toBe(500);
    expect(teamSectionNumber(outline)).toBe(2);
  });

  it('rejects duplicate section numbers', () => {
    writeFileSync(
      path.join(cwd, 'dup.yaml'),
      'name: dup\nsections:\n  - number: 1\n    name: One\n  - number: 1\n    name: Again\n'
    );
    expect(() => loadOutline('dup.yaml', cwd)).toThrow(ValidationError);
  });

  it('errors on a missing outline file', () => {
    expect(() => loadOutline('nope.yaml', cwd)).toThrow(`Outline file not found: ${path.join(cwd, 'nope.yaml')}`);
  });

  it('errors on an unknown built-in outline', () => {
    expect(() => loadOutline('fund-commitment', cwd)).toThrow(ConfigError);
  });
});

describe('loadDealConfig', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), 'memoforge-deal-'));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  const roots = (): { ioRoot: string; dataRoot: string } => ({
    ioRoot: path.join(root, 'io'),
    dataRoot: path.join(root, 'data'),
  });

  it('returns undefined when there is no deal file', () => {
    expect(loadDealConfig({ company: 'Acme' }, roots())).toBeUndefined();
  });

  it('prefers inputs/deal.json inside a firm deal directory', () => {
    const dealDir = path.join(root, 'io', 'north', 'deals', 'Acme');
    mkdirSync(path.join(dealDir, 'inputs'), { recursive: true });
    writeFileSync(path.join(dealDir, 'inputs', 'deal.json'), JSON.stringify({ company: 'Acme Inc', deck: 'deck.txt' }));
    writeFileSync(path.join(dealDir, 'Acme.json'), JSON.stringify({ company: 'Other' }));

    const deal = loadDealConfig({ firm: 'north', deal: 'Acme' }, roots());

    expect(deal?.config.company).toBe('Acme Inc');
    expect(deal && resolveDealPath(deal, 'deck.txt')).toBe(path.join(dealDir, 'inputs', 'deck.txt'));
  });

  it('ignores an invalid deal file with a warning', () => {
    mkdirSync(path.join(root, 'data'));
    writeFileSync(path.join(root, 'data', 'Acme.json'), JSON.stringify({ screenshots: { team: 'team.png' } }));

    expect(loadDealConfig({ company: 'Acme' }, roots())).toBeUndefined();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });
});
