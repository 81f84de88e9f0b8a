import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { StringRef } from '../adt/string-ref';
import { readWordList, suggest } from '../analysis/suggestions';
import { splitLines } from '../utils/string-utils';

const WORDS = 'apple\nApply\n  apply \n\napple\nbanana\nmaple\n';

describe('suggest', () => {
  const candidates = splitLines(new StringRef(WORDS));
  const word = new StringRef('appel');

  it('should rank close candidates by distance then bytes', () => {
    const result = suggest(word, candidates, { maxDistance: 2, maxResults: 5, caseSensitive: true });

    expect(result.map(s => [s.candidate.toString(), s.distance])).toEqual([
      ['apple', 2],
      ['apply', 2],
    ]);
  });

  it('should fold case when asked and cap the results', () => {
    const result = suggest(word, candidates, { maxDistance: 2, maxResults: 2, caseSensitive: false });

    expect(result.map(s => s.candidate.toString())).toEqual(['Apply', 'apple']);
  });

  it('should return nothing past the distance limit', () => {
    expect(suggest(word, candidates, { maxDistance: 0, maxResults: 5, caseSensitive: true })).toEqual([]);
  });

  it('should read one candidate per line from a file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'strref-words-'));
    const file = path.join(dir, 'words.txt');
    fs.writeFileSync(file, WORDS);

    try {
      expect(readWordList(file).map(String)).toEqual(['apple', 'Apply', '  apply ', '', 'apple', 'banana', 'maple']);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
