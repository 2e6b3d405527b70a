import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { DocumentNotFoundError, ValidationError } from '../src/errors/index';
import { FsDocumentRepository } from '../src/repository/fs-repository';
import { parseSectionFileName, sectionFileName } from '../src/repository/base-repository';
import {
  listVersionDirs,
  nextVersionDir,
  outputsDir,
  parseVersion,
  resolveVersionDir,
  sanitizeName,
} from '../src/repository/versioning';

describe('FsDocumentRepository', () => {
  let dir: string;

  beforeEach(() => {
    dir = path.join(mkdtempSync(path.join(tmpdir(), 'memoforge-repo-')), 'Acme-v0.0.1');
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(path.dirname(dir), { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('writes artifacts where a later run finds them', () => {
    const writer = new FsDocumentRepository(dir);
    writer.writeArtifact('research', { company: { name: 'Acme' }, topics: { market: 'Logistics' }, sources: [] });
    writer.writeSection({ number: 10, slug: 'recommendation' }, '## Recommendation\n');
    writer.writeSection({ number: 2, slug: 'business-overview' }, '## Business Overview\n');
    writer.writeText('final-draft', '# Acme\n');

    expect(readFileSync(path.join(dir, '1-research.json'), 'utf-8')).toBe(
      `${JSON.stringify({ company: { name: 'Acme' }, topics: { market: 'Logistics' }, sources: [] }, null, 2)}\n`
    );
    expect(readFileSync(path.join(dir, '6-Acme-v0.0.1.md'), 'utf-8')).toBe('# Acme\n');

    const reader = new FsDocumentRepository(dir);
    expect(reader.name).toBe('Acme-v0.0.1');
    expect(reader.listSections()).toEqual([
      { number: 2, slug: 'business-overview' },
      { number: 10, slug: 'recommendation' },
    ]);
    expect(reader.readArtifact('research')?.topics).toEqual({ market: 'Logistics' });
  });

  it('treats truncated and malformed JSON as missing', () => {
    mkdirSync(dir, { recursive: true });
    writeFileSync(path.join(dir, '1-research.json'), '{"c');
    writeFileSync(path.join(dir, '0-deck-analysis.json'), '{"summary": "Acme deck",');

    const repo = new FsDocumentRepository(dir);
    expect(repo.readArtifact('research')).toBeUndefined();
    expect(repo.readArtifact('deck-analysis')).toBeUndefined();
    expect(repo.readAll().json).toEqual({});
  });

  it('falls back to the legacy final draft name', () => {
    mkdirSync(dir, { recursive: true });
    writeFileSync(path.join(dir, '4-final-draft.md'), '# Legacy draft\n');

    expect(new FsDocumentRepository(dir).readText('final-draft')).toBe('# Legacy draft\n');
  });

  it('returns an empty snapshot for a directory that does not exist yet', () => {
    const snapshot = new FsDocumentRepository(dir).readAll();
    expect(snapshot).toEqual({ json: {}, sections: [], sectionResearch: [] });
  });
});

describe('section file names', () => {
  it('pads the section number', () => {
    expect(sectionFileName({ number: 3, slug: 'market-context' })).toBe('03-market-context.md');
  });

  it('parses names and rejects others', () => {
    expect(parseSectionFileName('07-traction-milestones.md')).toEqual({ number: 7, slug: 'traction-milestones' });
    expect(parseSectionFileName('notes.md')).toBeUndefined();
  });
});

describe('versioning', () => {
  let root: string;
  let roots: { outputRoot: string; ioRoot: string };

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), 'memoforge-versions-'));
    roots = { outputRoot: path.join(root, 'output'), ioRoot: path.join(root, 'io') };
    for (const name of ['Acme-Corp-v0.0.1', 'Acme-Corp-v0.0.10', 'Acme-Corp-v0.0.2', 'Acme-Corp-notes']) {
      mkdirSync(path.join(roots.outputRoot, name), { recursive: true });
    }
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('sanitizes company names', () => {
    expect(sanitizeName('Acme Corp')).toBe('Acme-Corp');
    expect(sanitizeName('Acme, Inc.')).toBe('Acme-Inc');
  });

  it('lists version directories in version order', () => {
    const versions = listVersionDirs({ company: 'Acme Corp' }, roots).map((v) => path.basename(v.dir));
    expect(versions).toEqual(['Acme-Corp-v0.0.1', 'Acme-Corp-v0.0.2', 'Acme-Corp-v0.0.10']);
  });

  it('resolves the latest or a requested version', () => {
    const location = { company: 'Acme Corp' };
    expect(path.basename(resolveVersionDir(location, roots))).toBe('Acme-Corp-v0.0.10');
    expect(path.basename(resolveVersionDir(location, roots, '0.0.2'))).toBe('Acme-Corp-v0.0.2');
    expect(() => resolveVersionDir(location, roots, 'v9.9.9')).toThrow(DocumentNotFoundError);
    expect(() => resolveVersionDir({ company: 'Globex' }, roots)).toThrow('No output directory found for Globex');
  });

  it('picks the next patch version for a new run', () => {
    expect(nextVersionDir({ company: 'Acme Corp' }, roots)).toBe(path.join(roots.outputRoot, 'Acme-Corp-v0.0.11'));
    expect(nextVersionDir({ company: 'Globex' }, roots)).toBe(path.join(roots.outputRoot, 'Globex-v0.0.1'));
  });

  it('places firm-scoped deals under the io root', () => {
    expect(outputsDir({ firm: 'northwind', deal: 'Acme' }, roots)).toBe(
      path.join(roots.ioRoot, 'northwind', 'deals', 'Acme', 'outputs')
    );
  });

  it('rejects malformed versions', () => {
    expect(parseVersion('v1.2.3')).toEqual({ major: 1, minor: 2, patch: 3 });
    expect(() => parseVersion('1.2')).toThrow(ValidationError);
  });
});
