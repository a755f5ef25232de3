import chalk from 'chalk';
import stripAnsi from 'strip-ansi';
import { Attribute, type Outcome, type VerificationResult } from '../corroboration/types';
import type { TokenUsageStats } from '../types/token-usage';

export interface BatchSummary {
  attribute: Attribute;
  people: number;
  verified: number;
  partial: number;
  unresolved: number;
  failures: number;
  cancelled: number;
  outputPath: string;
}

function outcomeLabel(outcome: Outcome): string {
  switch (outcome) {
    case 'verified':
    case 'conflict_resolved':
      return chalk.green(outcome);
    case 'no_corroboration':
    case 'partial':
    case 'conflict_inconclusive':
      return chalk.yellow(outcome);
    case 'no_evidence':
      return chalk.red(outcome);
  }
}

function padVisible(text: string, width: number): string {
  const visible = stripAnsi(text).length;
  return text + ' '.repeat(Math.max(0, width - visible));
}

export function describeValue(result: VerificationResult): string {
  switch (result.attribute) {
    case Attribute.BirthYear:
      return result.birthYear === null ? '-' : String(result.birthYear);
    case Attribute.LifeStatus:
      return result.deathYear === null ? result.status : `${result.status} (${result.deathYear})`;
    case Attribute.Nationality: {
      const verified = result.nationalities.join(', ') || '-';
      return result.unverifiedNationalities.length > 0
        ? `${verified} ${chalk.dim(`(unverified: ${result.unverifiedNationalities.join(', ')})`)}`
        : verified;
    }
  }
}

/*
 * One summary row per person:
 *   L2  verified               1950         Ada Lovelace  scanned 2/10
 */
export function printResultRow(result: VerificationResult, maxScans: number): void {
  const level = `L${result.verifiedLevel}`;
  const row = [
    `  ${padVisible(chalk.bold(level), 4)}`,
    padVisible(outcomeLabel(result.outcome), 23),
    padVisible(describeValue(result), 14),
    padVisible(chalk.cyan(result.personName), 24),
    chalk.dim(`scanned ${result.scannedCount}/${maxScans}`),
  ].join(' ');
  console.log(row);
  if (result.error) {
    console.log(`       ${chalk.red('error:')} ${result.error}`);
  }
}

export function printBatchSummary(summary: BatchSummary): void {
  const okMark = summary.failures === 0 && summary.cancelled === 0 ? chalk.green('✓') : chalk.red('✖');
  const peopleTxt = summary.people === 1 ? '1 person' : `${summary.people} people`;
  console.log('');
  console.log(
    `${okMark} ${summary.attribute}: ${chalk.green(`${summary.verified} verified`)}, ` +
      `${chalk.yellow(`${summary.partial} partial`)}, ${chalk.red(`${summary.unresolved} unresolved`)} of ${peopleTxt}.`
  );
  if (summary.failures > 0) {
    const failTxt = summary.failures === 1 ? '1 failed scan' : `${summary.failures} failed scans`;
    console.log(chalk.red(`✖ ${failTxt}`));
  }
  if (summary.cancelled > 0) {
    console.log(chalk.red(`✖ ${summary.cancelled} cancelled before finishing`));
  }
  console.log(chalk.dim(`Records appended to ${summary.outputPath}`));
}

export function printTokenUsage(stats: TokenUsageStats): void {
  console.log(chalk.bold('\nToken Usage:'));
  console.log(`  - Input tokens: ${stats.totalInputTokens.toLocaleString()}`);
  console.log(`  - Output tokens: ${stats.totalOutputTokens.toLocaleString()}`);
  if (stats.totalCost !== undefined) {
    console.log(`  - Total cost: $${stats.totalCost.toFixed(4)}`);
  }
}
