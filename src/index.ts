#!/usr/bin/env node

// [!IMPORTANT]: Load environment variables from .env file first
import 'dotenv/config';

// [!IMPORTANT]: CLI entry point, installed as the `strref` bin

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { StringRef } from './adt/string-ref';
import { readWordList, suggest } from './analysis/suggestions';
import { scanFiles } from './analysis/occurrences';
import { ProgressReporter } from './output/progress';
import { formatIndex, formatResult, formatScanReport, formatSuggestions, quote } from './output/report';
import { OutputFormat, getEncoding, getOutputConfig, getScanConfig, getSuggestConfig } from './utils/config';

interface OutputOptions {
  output?: OutputFormat;
}

// [NOTE]: Read inside the command so a config error goes through guarded()
function outputFormat(options: OutputOptions): OutputFormat {
  return options.output ?? getOutputConfig().format;
}

function parseIndex(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function parseFormat(value: string): OutputFormat {
  if (value !== 'text' && value !== 'json') {
    throw new InvalidArgumentError('Expected "text" or "json".');
  }
  return value;
}

// [NOTE]: Same failure handling for every command
function guarded<A extends unknown[]>(action: (...args: A) => Promise<void> | void): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      console.error(chalk.red('\nError:'), error instanceof Error ? error.message : error);
      process.exit(1);
    }
  };
}

function view(text: string): StringRef {
  return new StringRef(text, undefined, getEncoding());
}

const program = new Command();

program
  .name('strref')
  .description('Search, slice and compare text through zero-copy string views')
  .version('1.0.0');

// [NOTE]: --output is shared by every command
function withOutput(command: Command): Command {
  return command.option('--output <format>', 'Output format: text, json (default: config/strref.json)', parseFormat);
}

withOutput(
  program
    .command('find')
    .description('Print the index of the first (or last) occurrence of a needle')
    .argument('<text>', 'text to search')
    .argument('<needle>', 'substring to look for')
    .option('-r, --reverse', 'search from the end', false)
    .option('--from <index>', 'start index (the last index to consider with --reverse)', parseIndex)
).action(guarded((text: string, needle: string, options: OutputOptions & { reverse: boolean; from?: number }) => {
  const ref = view(text);
  const index = options.reverse
    ? ref.rfind(needle, options.from ?? StringRef.npos)
    : ref.find(needle, options.from ?? 0);
  console.log(formatResult({ text, needle, index: formatIndex(index) }, outputFormat(options)));
}));

withOutput(
  program
    .command('count')
    .description('Count occurrences of a needle, overlapping ones included')
    .argument('<text>', 'text to search')
    .argument('<needle>', 'substring to count')
).action(guarded((text: string, needle: string, options: OutputOptions) => {
  console.log(formatResult({ text, needle, occurrences: view(text).countStr(needle) }, outputFormat(options)));
}));

withOutput(
  program
    .command('split')
    .description('Split text around the first (or last) separator')
    .argument('<text>', 'text to split')
    .argument('<sep>', 'separator')
    .option('-r, --reverse', 'split around the last separator', false)
).action(guarded((text: string, sep: string, options: OutputOptions & { reverse: boolean }) => {
  const ref = view(text);
  const [before, after] = options.reverse ? ref.rsplit(sep) : ref.split(sep);
  console.log(formatResult({ found: ref.contains(sep), before: quote(before), after: quote(after) }, outputFormat(options)));
}));

withOutput(
  program
    .command('slice')
    .description('Print text[start, end); bounds are clamped and swapped when reversed')
    .argument('<text>', 'text to slice')
    .argument('<start>', 'start index', parseIndex)
    .argument('[end]', 'end index (defaults to the end of the text)', parseIndex)
).action(guarded((text: string, start: number, end: number | undefined, options: OutputOptions) => {
  const ref = view(text);
  const slice = end === undefined ? ref.substr(start) : ref.slice(start, end);
  console.log(formatResult({ result: quote(slice), length: slice.length }, outputFormat(options)));
}));

withOutput(
  program
    .command('distance')
    .description('Levenshtein distance between two strings')
    .argument('<a>', 'first string')
    .argument('<b>', 'second string')
    .option('-i, --ignore-case', 'fold ASCII letters before comparing', false)
).action(guarded((a: string, b: string, options: OutputOptions & { ignoreCase: boolean }) => {
  const distance = view(a).editDistance(b, !options.ignoreCase);
  console.log(formatResult({ a, b, distance }, outputFormat(options)));
}));

withOutput(
  program
    .command('suggest')
    .description('Suggest the closest entries of a word list (one word per line)')
    .argument('<word>', 'word to look up')
    .argument('<wordlist>', 'path to the word list')
    .option('--max-distance <n>', 'largest edit distance to report', parseIndex)
    .option('--max-results <n>', 'number of suggestions to print', parseIndex)
    .option('-i, --ignore-case', 'fold ASCII letters before comparing')
).action(guarded((
  word: string,
  wordlist: string,
  options: OutputOptions & { maxDistance?: number; maxResults?: number; ignoreCase?: boolean }
) => {
  const defaults = getSuggestConfig();
  const output = outputFormat(options);
  const progress = new ProgressReporter({ silent: output === 'json' });

  progress.start(`Reading ${wordlist}...`);
  let candidates: StringRef[];
  try {
    candidates = readWordList(wordlist, getEncoding());
  } catch (error) {
    progress.stop();
    throw error;
  }
  progress.succeed(`Loaded ${candidates.length} candidate(s)`);

  const target = view(word);
  const suggestions = suggest(target, candidates, {
    maxDistance: options.maxDistance ?? defaults.maxDistance,
    maxResults: options.maxResults ?? defaults.maxResults,
    caseSensitive: options.ignoreCase === undefined ? defaults.caseSensitive : !options.ignoreCase,
  });
  console.log(formatSuggestions(target, suggestions, output));
}));

withOutput(
  program
    .command('scan')
    .description('Count a pattern in files and locate its first and last match')
    .argument('<pattern>', 'pattern to count')
    .argument('<files...>', 'files to scan')
    .option('-w, --whole-word', 'only count matches that are complete words')
    .option('--verbose', 'show skipped files', false)
).action(guarded(async (
  pattern: string,
  files: string[],
  options: OutputOptions & { wholeWord?: boolean; verbose: boolean }
) => {
  const defaults = getScanConfig();
  const output = outputFormat(options);
  const progress = new ProgressReporter({ verbose: options.verbose, silent: output === 'json' });

  const { results, stats } = await scanFiles(pattern, files, {
    wholeWord: options.wholeWord ?? defaults.wholeWord,
    maxFileBytes: defaults.maxFileBytes,
    encoding: getEncoding(),
  }, progress);

  console.log(formatScanReport(results, stats, output));
}));

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red('\nError:'), error instanceof Error ? error.message : error);
  process.exit(1);
});
