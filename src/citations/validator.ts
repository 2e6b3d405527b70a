import {
  analyzeSegments,
  citationBlocks,
  describeDiagnostic,
  isErrorDiagnostic,
  tokenizeDocument,
} from '../footnotes';

const FORMAT_RE =
  /(\d{4}),\s+([A-Za-z]{3})\s+(\d{2})\.\s+(.+?)\s+Published:\s+(\d{4}-\d{2}-\d{2})\s*\|\s*Updated:\s+(\S+)\s*(?:\|\s*URL:\s*(https?:\/\/\S+))?/;

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];
const DAY_MS = 24 * 60 * 60 * 1000;
const MAX_AGE_YEARS = 10;

export type CitationIssueSeverity = 'error' | 'warning';

export interface CitationIssue {
  label: string;
  severity: CitationIssueSeverity;
  message: string;
}

export interface CitationValidationReport {
  totalCitations: number;
  validCitations: number;
  issues: string[];
  warnings: string[];
}

/** Calendar date as UTC midnight, or undefined when the parts do not form a real date. */
function utcDate(year: number, monthIndex: number, day: number): Date | undefined {
  const date = new Date(Date.UTC(year, monthIndex, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== monthIndex || date.getUTCDate() !== day) {
    return undefined;
  }
  return date;
}

function parseIsoDate(value: string): Date | undefined {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) return undefined;
  return utcDate(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
}

function isoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Checks one definition against the house citation format:
 * `YYYY, Mon DD. Title. Published: YYYY-MM-DD | Updated: YYYY-MM-DD | URL: https://...`
 */
export function validateCitation(label: string, text: string, now: Date): { issues: CitationIssue[]; url?: string } {
  const issues: CitationIssue[] = [];
  const push = (severity: CitationIssueSeverity, message: string): void => {
    issues.push({ label, severity, message });
  };

  const match = FORMAT_RE.exec(text);
  if (!match) {
    push(
      'error',
      'Citation format invalid (expected: YYYY, MMM DD. Title. Published: YYYY-MM-DD | Updated: YYYY-MM-DD | URL: https://...)'
    );
    return { issues };
  }

  const [, year = '', month = '', day = '', , published = '', updated = '', url] = match;
  if (!url) push('error', 'Missing URL in citation');

  const monthIndex = MONTHS.indexOf(month.toLowerCase());
  const display = monthIndex === -1 ? undefined : utcDate(Number(year), monthIndex, Number(day));
  const publishedDate = parseIsoDate(published);

  if (!display || !publishedDate) {
    push('error', `Invalid date format: ${year}, ${month} ${day} / ${published}`);
    return { issues, url };
  }

  if (display.getTime() !== publishedDate.getTime()) {
    const updatedDate = updated === 'N/A' ? undefined : parseIsoDate(updated);
    if (updatedDate && updatedDate.getTime() === display.getTime()) {
      push('warning', `Display date (${isoDay(display)}) uses Updated date instead of Published date (${published})`);
    } else if (updatedDate) {
      push('error', `Display date (${isoDay(display)}) doesn't match Published (${published}) or Updated (${updated})`);
    } else {
      push('warning', `Display date (${isoDay(display)}) doesn't match Published date (${published})`);
    }
  }

  if (publishedDate.getTime() > now.getTime()) {
    push('error', `Published date (${published}) is in the future`);
  }

  const yearsOld = (now.getTime() - publishedDate.getTime()) / DAY_MS / 365.25;
  if (yearsOld > MAX_AGE_YEARS) {
    push('warning', `Published date (${published}) is ${Math.floor(yearsOld)} years old - may be outdated`);
  }

  return { issues, url };
}

/**
 * Validates every definition of a consolidated document: format, dates and
 * repeated URLs, plus dangling markers and orphan definitions.
 * URL reachability is not probed.
 */
export function validateCitationDefinitions(
  text: string,
  options: { now?: Date } = {}
): CitationValidationReport {
  const now = options.now ?? new Date();
  const segments = tokenizeDocument(text);
  const definitions = citationBlocks(segments).flatMap((b) => b.definitions);

  if (definitions.length === 0) {
    return { totalCitations: 0, validCitations: 0, issues: ['No citations found in memo'], warnings: [] };
  }

  const issues: string[] = [];
  const warnings: string[] = [];
  const urls = new Map<string, string[]>();
  let validCitations = 0;

  for (const def of definitions) {
    const result = validateCitation(def.label, def.text, now);
    if (result.url) {
      const labels = urls.get(result.url) ?? [];
      labels.push(def.label);
      urls.set(result.url, labels);
    }
    if (result.issues.length === 0) {
      validCitations++;
      continue;
    }
    for (const issue of result.issues) {
      const line = `[^${issue.label}]: ${issue.message}`;
      if (issue.severity === 'error') issues.push(line);
      else warnings.push(line);
    }
  }

  for (const [url, labels] of urls) {
    if (labels.length > 1) {
      warnings.push(`Duplicate URL used in citations ${labels.map((l) => `[^${l}]`).join(', ')}: ${url.slice(0, 80)}`);
    }
  }

  for (const diagnostic of analyzeSegments(segments)) {
    const message = describeDiagnostic(diagnostic);
    if (isErrorDiagnostic(diagnostic)) issues.push(message);
    else warnings.push(message);
  }

  return { totalCitations: definitions.length, validCitations, issues, warnings };
}
