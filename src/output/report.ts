import chalk from 'chalk';
import { StringRef, npos } from '../adt/string-ref';
import { FileOccurrences, ScanStats } from '../analysis/occurrences';
import { Suggestion } from '../analysis/suggestions';
import { OutputFormat } from '../utils/config';
import { formatDuration } from './progress';

// [NOTE]: Result of the single-shot commands (find, count, split, slice, distance)
export type CommandResult = Record<string, string | number | boolean | null>;

export function formatIndex(index: number): number | null {
  return index === npos ? null : index;
}

// [NOTE]: Quoted so empty and whitespace-only views stay visible
export function quote(ref: StringRef): string {
  return JSON.stringify(ref.toString());
}

export function formatResult(result: CommandResult, format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(result, null, 2);
  }
  return Object.entries(result)
    .map(([key, value]) => `${chalk.bold(key)}: ${value === null ? chalk.gray('none') : String(value)}`)
    .join('\n');
}

export function formatSuggestions(word: StringRef, suggestions: Suggestion[], format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify({
      word: word.toString(),
      suggestions: suggestions.map(s => ({ candidate: s.candidate.toString(), distance: s.distance })),
    }, null, 2);
  }

  if (suggestions.length === 0) {
    return chalk.yellow(`No close matches for ${quote(word)}.`);
  }

  const lines = [chalk.bold(`Did you mean (for ${quote(word)}):`)];
  for (const { candidate, distance } of suggestions) {
    lines.push(`  ${chalk.green(candidate.toString())} ${chalk.gray(`(distance ${distance})`)}`);
  }
  return lines.join('\n');
}

export function formatScanReport(results: FileOccurrences[], stats: ScanStats, format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify({ results, stats }, null, 2);
  }

  const lines: string[] = [''];
  for (const result of results) {
    if (result.error) {
      lines.push(`  ${chalk.bold(result.file)} ${chalk.red(`skipped: ${result.error}`)}`);
      continue;
    }
    const countColor = result.count > 0 ? chalk.green : chalk.gray;
    let line = `  ${chalk.bold(result.file)} ${countColor(`${result.count} match(es)`)}`;
    if (result.first && result.last) {
      line += chalk.gray(
        ` first ${result.first.line}:${result.first.column}, last ${result.last.line}:${result.last.column}`
      );
    }
    lines.push(line);
  }

  lines.push('');
  lines.push(chalk.bold('Summary:'));
  lines.push(`  Files scanned: ${chalk.green(stats.filesScanned)}`);
  lines.push(`  Files skipped: ${chalk.yellow(stats.filesSkipped)}`);
  lines.push(`  Total matches: ${chalk.green(stats.totalMatches)}`);
  lines.push(`  Total time:    ${chalk.cyan(formatDuration(stats.elapsedMs))}`);
  lines.push('');

  return lines.join('\n');
}
