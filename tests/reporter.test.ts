import { describe, it, expect, afterEach, vi } from 'vitest';
import stripAnsi from 'strip-ansi';
import { formatFindingRow, printRunSummary, wrapText } from '../src/output/reporter';
import type { FactCheckRecord } from '../src/schemas/fact-check-schemas';

describe('wrapText', () => {
  it('breaks lines at word boundaries', () => {
    expect(wrapText('Acme raised $5M in seed funding.', 20)).toEqual(['Acme raised $5M in', 'seed funding.']);
  });

  it('keeps a word longer than the width on its own line', () => {
    expect(wrapText('see https://example.com/a/very/long/path now', 10)).toEqual([
      'see',
      'https://example.com/a/very/long/path',
      'now',
    ]);
  });

  it('returns one empty line for empty text', () => {
    expect(wrapText('   ', 10)).toEqual(['']);
  });
});

describe('formatFindingRow', () => {
  const record: FactCheckRecord = {
    claim: 'Acme raised $5M in seed funding.',
    claimType: 'financial',
    hasCitation: false,
    confidence: 'suspicious',
    severity: 'critical',
    recommendedAction: 'remove',
    reasoning: 'No evidence',
  };

  it('pads the severity column and indents continuation lines', () => {
    const rows = formatFindingRow(record, { severityWidth: 9, messageWidth: 20 }).map((row) => stripAnsi(row));
    expect(rows).toEqual([
      '    critical  Acme raised $5M in',
      '              seed funding.',
      '              remove: No evidence',
    ]);
  });
});

describe('printRunSummary', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports a held memo with its score', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    printRunSummary('output/Acme-v0.0.1', 'human_review', 6.25);
    expect(stripAnsi(String(log.mock.calls[0]?.[0]))).toBe(
      '! Score 6.3/10 is below the quality threshold; memo held for human review in output/Acme-v0.0.1'
    );
  });

  it('prints a dash when no score exists', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    printRunSummary('output/Acme-v0.0.1', 'complete', undefined);
    expect(stripAnsi(String(log.mock.calls[0]?.[0]))).toBe('✓ Memo complete in output/Acme-v0.0.1 (score -)');
  });
});
