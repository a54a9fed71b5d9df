/**
 * Input validation for searches, repository references and config values
 */

/**
 * Validation error class
 */
export class ValidationError extends Error {
  constructor(message: string, public field?: string, public value?: unknown) {
    super(message);
    this.name = 'ValidationError';
  }
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export const MAX_SEARCH_LIMIT = 100;

export interface SearchBounds {
  minStars: number;
  maxStars: number;
  limit: number;
  daysFilter?: number;
}

/**
 * Check star bounds and limit before any network call
 */
export function validateSearchParams(params: SearchBounds): ValidationResult {
  const errors: string[] = [];

  if (!Number.isInteger(params.minStars) || params.minStars < 0) {
    errors.push('min-stars must be a non-negative integer');
  }
  if (!Number.isInteger(params.maxStars) || params.maxStars < 0) {
    errors.push('max-stars must be a non-negative integer');
  }
  if (errors.length === 0 && params.minStars >= params.maxStars) {
    errors.push('min-stars must be less than max-stars');
  }
  if (!Number.isInteger(params.limit) || params.limit <= 0 || params.limit > MAX_SEARCH_LIMIT) {
    errors.push(`limit must be between 1 and ${MAX_SEARCH_LIMIT}`);
  }
  if (params.daysFilter !== undefined && (!Number.isInteger(params.daysFilter) || params.daysFilter < 0)) {
    errors.push('days-filter must be a non-negative integer');
  }

  return {
    valid: errors.length === 0,
    errors
  };
}

export interface RepositoryReference {
  owner: string;
  repo: string;
}

const NAME_SEGMENT = /^[A-Za-z0-9_.-]+$/;

/**
 * Parse "owner/repo" or a GitHub URL into its parts
 */
export function parseRepositoryReference(input: string): RepositoryReference | null {
  let path = input.trim();

  if (path.includes('github.com')) {
    path = path
      .replace(/^https?:\/\//, '')
      .replace(/^(www\.)?github\.com\//, '')
      .replace(/\.git$/, '')
      .replace(/\/+$/, '');
  }

  const parts = path.split('/');
  if (parts.length !== 2) {
    return null;
  }

  const [owner, repo] = parts;
  if (!NAME_SEGMENT.test(owner) || !NAME_SEGMENT.test(repo)) {
    return null;
  }

  return { owner, repo };
}

/**
 * Parse an integer option value, rejecting partial numbers like "10abc"
 */
export function parseIntegerOption(name: string, raw: string): number {
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new ValidationError(`${name} must be an integer`, name, raw);
  }
  return Number.parseInt(raw, 10);
}
