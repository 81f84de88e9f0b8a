import { StringRef } from '../adt/string-ref';
import { StringRefMap } from '../adt/string-ref-map';

describe('StringRefMap', () => {
  it('should key entries by content, not identity', () => {
    const map = new StringRefMap<number>();
    map.set(new StringRef('xkeyx').substr(1, 3), 1);

    expect(map.get(new StringRef('key'))).toBe(1);
    expect(map.get('key')).toBe(1);
    expect(map.has('kez')).toBe(false);
    expect(map.size).toBe(1);
  });

  it('should overwrite an existing key', () => {
    const map = new StringRefMap<string>([['a', 'first']]);
    map.set(new StringRef('a'), 'second');

    expect(map.size).toBe(1);
    expect(map.get('a')).toBe('second');
  });

  it('should delete entries', () => {
    const map = new StringRefMap<number>([['a', 1], ['b', 2]]);

    expect(map.delete('a')).toBe(true);
    expect(map.delete('a')).toBe(false);
    expect(map.delete('missing')).toBe(false);
    expect(map.size).toBe(1);
    expect(map.has('b')).toBe(true);
  });

  it('should iterate over its entries', () => {
    const map = new StringRefMap<number>([['one', 1], ['two', 2], ['three', 3]]);

    const entries = [...map].map(([key, value]) => [key.toString(), value]);
    expect(entries.sort()).toEqual([['one', 1], ['three', 3], ['two', 2]]);
    expect([...map.values()].sort()).toEqual([1, 2, 3]);
    expect([...map.keys()].map(String).sort()).toEqual(['one', 'three', 'two']);
  });

  it('should encode string keys with the map encoding', () => {
    const latin = new StringRef('é', undefined, 'latin1');
    const map = new StringRefMap<number>([[latin, 1]], 'latin1');

    expect(latin.equals('é')).toBe(true);
    expect(map.get('é')).toBe(1);
    expect(map.has(new StringRef('é'))).toBe(false);

    map.set('é', 2);
    expect(map.size).toBe(1);
    expect(map.get(latin)).toBe(2);
  });

  it('should clear all entries', () => {
    const map = new StringRefMap<number>([['a', 1]]);
    map.clear();

    expect(map.size).toBe(0);
    expect(map.get('a')).toBeUndefined();
  });
});
