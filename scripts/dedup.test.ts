/**
 * Unit tests for deduplication helpers
 */

import { describe, it, expect } from 'vitest';
import { dedupeBy, dedupeFresh } from './dedup.js';

describe('dedupeBy', () => {
  it('should keep the first occurrence of each key in order', () => {
    const items = [
      { id: 'b', n: 1 },
      { id: 'a', n: 2 },
      { id: 'b', n: 3 },
      { id: 'c', n: 4 },
      { id: 'a', n: 5 }
    ];

    expect(dedupeBy(items, item => item.id)).toEqual([
      { id: 'b', n: 1 },
      { id: 'a', n: 2 },
      { id: 'c', n: 4 }
    ]);
  });

  it('should return an empty list for empty input', () => {
    expect(dedupeBy([], (item: string) => item)).toEqual([]);
  });
});

describe('dedupeFresh', () => {
  it('should mark every surviving entry as new without mutating the input', () => {
    const input = [{ repoName: 'x/one' }, { repoName: 'x/one' }, { repoName: 'x/two' }];
    const result = dedupeFresh(input);

    expect(result).toEqual([
      { repoName: 'x/one', isNew: true },
      { repoName: 'x/two', isNew: true }
    ]);
    expect(input[0]).toEqual({ repoName: 'x/one' });
  });
});
