import chalk from 'chalk';
import stripAnsi from 'strip-ansi';
import type { CheckpointDetection } from '../checkpoint/detector';
import type { ConsolidationResult } from '../citations/consolidator';
import { describeDiagnostic, isErrorDiagnostic } from '../footnotes';
import type { CitationValidation, RunStatus } from '../schemas/artifact-schemas';
import type { FactCheckRecord, FactCheckReport, Severity } from '../schemas/fact-check-schemas';
import { debug, log } from './logger';

function severityLabel(severity: Severity): string {
  switch (severity) {
    case 'critical':
      return chalk.red('critical');
    case 'high':
      return chalk.yellow('high');
    case 'medium':
      return chalk.cyan('medium');
    case 'low':
      return chalk.dim('low');
  }
}

function colorScore(value: number, max: number, text: string): string {
  const ratio = max > 0 ? value / max : 0;
  if (ratio >= 0.9) return chalk.greenBright(text);
  if (ratio >= 0.7) return chalk.green(text);
  if (ratio >= 0.5) return chalk.yellow(text);
  return chalk.red(text);
}

/** Word-wraps `text` to `width` visible columns. */
export function wrapText(text: string, width: number): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let current = '';
  for (const w of words) {
    if (current && stripAnsi(current).length + 1 + stripAnsi(w).length > width) {
      lines.push(current);
      current = w;
    } else {
      current = current ? `${current} ${w}` : w;
    }
  }
  if (current) lines.push(current);
  return lines.length > 0 ? lines : [''];
}

export function printStageBanner(stage: string, position: number, total: number): void {
  log(`${chalk.dim(`[${position}/${total}]`)} ${chalk.bold(stage)}`);
}

export function printStageDone(stage: string): void {
  debug(`  ${chalk.green('✓')} ${stage}`);
}

export function printCheckpoint(dir: string, detection: CheckpointDetection, remaining: string[]): void {
  log(chalk.underline(dir));
  const mark = detection.checkpoint === 'complete' ? chalk.green('✓') : chalk.cyan('→');
  log(`  ${mark} ${chalk.bold(detection.checkpoint)}  ${chalk.dim(detection.reason)}`);
  if (remaining.length > 0) {
    log(`  ${chalk.dim('remaining:')} ${remaining.join(' → ')}`);
  }
}

/** One finding: severity column padded to a fixed visible width, then the wrapped claim. */
export function formatFindingRow(record: FactCheckRecord, opts: { severityWidth?: number; messageWidth?: number } = {}): string[] {
  const severityWidth = opts.severityWidth ?? 9;
  const termCols = process.stdout.columns || 100;
  const messageWidth = opts.messageWidth ?? Math.max(40, termCols - severityWidth - 6);

  const colored = severityLabel(record.severity);
  const pad = Math.max(0, severityWidth - stripAnsi(colored).length);
  const prefix = `    ${colored}${' '.repeat(pad)} `;
  const contPrefix = ' '.repeat(stripAnsi(prefix).length);

  const lines = wrapText(record.claim, messageWidth);
  const rows = lines.map((line, i) => `${i === 0 ? prefix : contPrefix}${line}`);
  rows.push(`${contPrefix}${chalk.dim(`${record.recommendedAction}: ${record.reasoning}`)}`);
  return rows;
}

export function printFactCheckReport(report: FactCheckReport, opts: { showAll?: boolean } = {}): void {
  if (report.entityMismatch) {
    log(
      chalk.red(
        `✖ Research describes ${report.entityMismatch.found}, expected ${report.entityMismatch.expected}; every section needs a rewrite`
      )
    );
  }

  for (const section of report.sections) {
    const mark = section.requiresRewrite ? chalk.red('✖') : chalk.green('✓');
    const pct = `${Math.round(section.score * 100)}%`;
    log(`  ${mark} ${chalk.cyan(section.section)}  ${colorScore(section.score, 1, pct)} cited (${section.verifiedClaims}/${section.totalClaims})`);

    const shown = opts.showAll ? section.claims.filter((c) => c.severity !== 'low') : section.flaggedClaims;
    for (const record of shown) {
      for (const row of formatFindingRow(record)) log(row);
    }
  }

  const okMark = report.requiresRewrite ? chalk.red('✖') : chalk.green('✓');
  const overall = `${Math.round(report.overallScore * 100)}%`;
  log(
    `${okMark} ${colorScore(report.overallScore, 1, overall)} of ${report.totalClaims} claims cited, ` +
      `${report.criticalClaims} critical (strictness ${report.strictness})`
  );
}

export function printCitationValidation(report: CitationValidation): void {
  for (const issue of report.issues) log(`  ${chalk.red('error')}    ${issue}`);
  for (const warning of report.warnings) log(`  ${chalk.yellow('warning')}  ${warning}`);
  const okMark = report.issues.length === 0 ? chalk.green('✓') : chalk.red('✖');
  log(`${okMark} ${report.validCitations}/${report.totalCitations} citations valid`);
}

export function printConsolidation(file: string, result: ConsolidationResult, dryRun: boolean): void {
  const verb = dryRun ? 'would consolidate' : 'consolidated';
  switch (result.status) {
    case 'nothing-to-consolidate':
      log(`${chalk.dim('-')} ${file}: no citations found`);
      break;
    case 'already-consolidated':
      log(`${chalk.green('✓')} ${file}: already consolidated (${result.citations} citations)`);
      break;
    case 'consolidated':
      log(`${chalk.green('✓')} ${file}: ${verb} ${result.blocks} blocks into ${result.citations} citations`);
      break;
  }
  for (const diagnostic of result.diagnostics) {
    const label = isErrorDiagnostic(diagnostic) ? chalk.red('error') : chalk.yellow('warning');
    log(`  ${label}  ${describeDiagnostic(diagnostic)}`);
  }
}

export function printRunSummary(dir: string, status: RunStatus, overallScore: number | undefined): void {
  const score = overallScore === undefined ? '-' : colorScore(overallScore, 10, `${overallScore.toFixed(1)}/10`);
  if (status === 'complete') {
    log(`${chalk.green('✓')} Memo complete in ${dir} (score ${score})`);
  } else {
    log(`${chalk.yellow('!')} Score ${score} is below the quality threshold; memo held for human review in ${dir}`);
  }
}
