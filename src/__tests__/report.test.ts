import { StringRef, npos } from '../adt/string-ref';
import { formatIndex, formatResult, formatScanReport, formatSuggestions, quote } from '../output/report';
import { formatDuration } from '../output/progress';

describe('report', () => {
  it('should map npos to null', () => {
    expect(formatIndex(npos)).toBeNull();
    expect(formatIndex(4)).toBe(4);
  });

  it('should quote views so blanks stay visible', () => {
    expect(quote(new StringRef(' a '))).toBe('" a "');
    expect(quote(new StringRef())).toBe('""');
  });

  it('should render command results as JSON', () => {
    expect(JSON.parse(formatResult({ needle: 'b', index: null }, 'json'))).toEqual({ needle: 'b', index: null });
  });

  it('should render suggestions as JSON', () => {
    const output = formatSuggestions(new StringRef('appel'), [{ candidate: new StringRef('apple'), distance: 2 }], 'json');

    expect(JSON.parse(output)).toEqual({ word: 'appel', suggestions: [{ candidate: 'apple', distance: 2 }] });
  });

  it('should render scan results as JSON', () => {
    const results = [{ file: 'a.txt', count: 1, first: { line: 1, column: 2 }, last: { line: 1, column: 2 } }];
    const stats = { filesScanned: 1, filesSkipped: 0, totalMatches: 1, elapsedMs: 5 };

    expect(JSON.parse(formatScanReport(results, stats, 'json'))).toEqual({ results, stats });
  });

  it('should format durations', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(1500)).toBe('1.5s');
  });
});
