import * as fs from 'fs';
import { StringRef, npos } from '../adt/string-ref';
import { ProgressReporter } from '../output/progress';
import { LineColumn, countWholeWords, findWholeWord, isWholeWordAt, lineColumnAt } from '../utils/string-utils';

export interface ScanOptions {
  wholeWord: boolean;
  maxFileBytes: number;
  encoding: BufferEncoding;
}

// [NOTE]: Occurrence summary for one text
export interface Occurrences {
  count: number;
  first: LineColumn | null;
  last: LineColumn | null;
}

export interface FileOccurrences extends Occurrences {
  file: string;
  error?: string;   // Set when the file was skipped
}

export interface ScanStats {
  filesScanned: number;
  filesSkipped: number;
  totalMatches: number;
  elapsedMs: number;
}

function lastWholeWord(text: StringRef, pattern: StringRef): number {
  let index = text.rfind(pattern);
  while (index !== npos && !isWholeWordAt(text, index, pattern.length)) {
    index = index === 0 ? npos : text.rfind(pattern, index - 1);
  }
  return index;
}

/**
 * Counts `pattern` in `text`, overlapping matches included, and locates the
 * first and last match.
 */
export function scanText(text: StringRef, pattern: StringRef, wholeWord = false): Occurrences {
  if (pattern.empty()) {
    throw new Error('Scan pattern must not be empty');
  }

  const count = wholeWord ? countWholeWords(text, pattern) : text.countStr(pattern);
  const first = wholeWord ? findWholeWord(text, pattern) : text.find(pattern);
  const last = wholeWord ? lastWholeWord(text, pattern) : text.rfind(pattern);

  return {
    count,
    first: first === npos ? null : lineColumnAt(text, first),
    last: last === npos ? null : lineColumnAt(text, last),
  };
}

export async function scanFiles(
  pattern: string,
  files: string[],
  options: ScanOptions,
  progress: ProgressReporter
): Promise<{ results: FileOccurrences[]; stats: ScanStats }> {
  const startedAt = Date.now();
  const needle = new StringRef(pattern, undefined, options.encoding);
  if (needle.empty()) {
    throw new Error('Scan pattern must not be empty');
  }
  const results: FileOccurrences[] = [];
  const stats: ScanStats = { filesScanned: 0, filesSkipped: 0, totalMatches: 0, elapsedMs: 0 };

  progress.start(`Scanning ${files.length} file(s) for "${pattern}"...`);

  for (const [i, file] of files.entries()) {
    progress.update(`Scanning ${file} (${i + 1}/${files.length})`);
    try {
      const { size } = await fs.promises.stat(file);
      if (size > options.maxFileBytes) {
        throw new Error(`larger than ${options.maxFileBytes} bytes`);
      }
      // [NOTE]: The view borrows the file buffer, nothing is copied per match
      const text = new StringRef(await fs.promises.readFile(file), undefined, options.encoding);
      const occurrences = scanText(text, needle, options.wholeWord);
      results.push({ file, ...occurrences });
      stats.filesScanned++;
      stats.totalMatches += occurrences.count;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      progress.verboseLog(`Skipped ${file}: ${message}`);
      results.push({ file, count: 0, first: null, last: null, error: message });
      stats.filesSkipped++;
    }
  }

  stats.elapsedMs = Date.now() - startedAt;
  if (stats.filesSkipped > 0) {
    progress.warn(`Scanned ${stats.filesScanned} file(s), skipped ${stats.filesSkipped}`);
  } else {
    progress.succeed(`Scanned ${stats.filesScanned} file(s)`);
  }

  return { results, stats };
}
