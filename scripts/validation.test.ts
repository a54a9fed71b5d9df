/**
 * Unit tests for input validation
 */

import { describe, it, expect } from 'vitest';
import { ValidationError, parseIntegerOption, parseRepositoryReference, validateSearchParams } from './validation.js';

describe('validateSearchParams', () => {
  it('should accept a sensible search', () => {
    expect(validateSearchParams({ minStars: 0, maxStars: 100, limit: 100, daysFilter: 0 })).toEqual({ valid: true, errors: [] });
  });

  it('should reject an empty or inverted star range', () => {
    expect(validateSearchParams({ minStars: 100, maxStars: 100, limit: 10 }).errors)
      .toEqual(['min-stars must be less than max-stars']);
    expect(validateSearchParams({ minStars: 500, maxStars: 100, limit: 10 }).errors)
      .toEqual(['min-stars must be less than max-stars']);
  });

  it('should reject negative or fractional star bounds without comparing them', () => {
    expect(validateSearchParams({ minStars: -1, maxStars: 1.5, limit: 10 }).errors).toEqual([
      'min-stars must be a non-negative integer',
      'max-stars must be a non-negative integer'
    ]);
  });

  it('should keep the limit between 1 and 100', () => {
    expect(validateSearchParams({ minStars: 0, maxStars: 10, limit: 0 }).errors).toEqual(['limit must be between 1 and 100']);
    expect(validateSearchParams({ minStars: 0, maxStars: 10, limit: 101 }).errors).toEqual(['limit must be between 1 and 100']);
  });

  it('should reject a negative days filter', () => {
    expect(validateSearchParams({ minStars: 0, maxStars: 10, limit: 5, daysFilter: -3 }).errors)
      .toEqual(['days-filter must be a non-negative integer']);
  });
});

describe('parseRepositoryReference', () => {
  it('should parse owner/repo', () => {
    expect(parseRepositoryReference('octo/sample')).toEqual({ owner: 'octo', repo: 'sample' });
  });

  it('should parse GitHub URLs with or without scheme, .git suffix and trailing slash', () => {
    expect(parseRepositoryReference('https://github.com/octo/sample')).toEqual({ owner: 'octo', repo: 'sample' });
    expect(parseRepositoryReference('github.com/octo/sample.git')).toEqual({ owner: 'octo', repo: 'sample' });
    expect(parseRepositoryReference('https://www.github.com/octo/my.repo/')).toEqual({ owner: 'octo', repo: 'my.repo' });
  });

  it('should reject anything that is not exactly two path segments', () => {
    expect(parseRepositoryReference('octo')).toBeNull();
    expect(parseRepositoryReference('octo/sample/tree')).toBeNull();
    expect(parseRepositoryReference('https://github.com/octo/sample/issues')).toBeNull();
    expect(parseRepositoryReference('octo/sam ple')).toBeNull();
    expect(parseRepositoryReference('/sample')).toBeNull();
  });
});

describe('parseIntegerOption', () => {
  it('should parse whole numbers', () => {
    expect(parseIntegerOption('--limit', '25')).toBe(25);
    expect(parseIntegerOption('--min-stars', '-5')).toBe(-5);
  });

  it('should reject partial numbers', () => {
    expect(() => parseIntegerOption('--limit', '10abc')).toThrow(ValidationError);
    expect(() => parseIntegerOption('--limit', '2.5')).toThrow('--limit must be an integer');
  });
});
