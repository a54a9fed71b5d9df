/**
 * Search strategies and the provider that runs them against GitHub
 */

import type { GitHubClient, SearchPage } from './github-client.js';

export type SearchSort = 'stars' | 'updated' | 'created';

export interface SearchStrategy {
  sort: SearchSort;
  minStars: number;
  maxStars: number;
  topic?: string;
}

/**
 * Anything that can run strategy-indexed repository searches
 */
export interface SearchProvider {
  search(
    strategyIndex: number,
    minStars: number,
    maxStars: number,
    limit: number,
    offset: number
  ): Promise<SearchPage & { query?: string }>;
}

const STRATEGY_TOPICS = ['machine-learning', 'web-development', 'data-science', 'automation'];

export const STRATEGY_COUNT = 12;

// Ceiling for the widened range used by the "created" strategy
const CREATED_RANGE_CEILING = 50000;

/**
 * Resolve the strategy for an attempt index. Indexes wrap around the fixed list.
 */
export function resolveStrategy(index: number, minStars: number, maxStars: number): SearchStrategy {
  const slot = ((index % STRATEGY_COUNT) + STRATEGY_COUNT) % STRATEGY_COUNT;
  const third = Math.floor((maxStars - minStars) / 3);
  const twoThirds = Math.floor((2 * (maxStars - minStars)) / 3);

  switch (slot) {
    case 0:
      return { sort: 'stars', minStars, maxStars };
    case 1:
      return { sort: 'updated', minStars, maxStars };
    case 2:
      return { sort: 'created', minStars, maxStars };
    case 3:
      return { sort: 'stars', minStars, maxStars: minStars + third };
    case 4:
      return { sort: 'stars', minStars: minStars + third + 1, maxStars: minStars + twoThirds };
    case 5:
      return { sort: 'stars', minStars: minStars + twoThirds + 1, maxStars };
    case 6:
      return { sort: 'updated', minStars: Math.max(100, minStars - 200), maxStars: maxStars + 1000 };
    case 7:
      return { sort: 'created', minStars, maxStars: Math.min(CREATED_RANGE_CEILING, maxStars * 2) };
    default:
      return { sort: 'stars', minStars, maxStars, topic: STRATEGY_TOPICS[slot - 8] };
  }
}

/**
 * Build the GitHub search query string for a strategy
 */
export function buildSearchQuery(strategy: SearchStrategy, language: string): string {
  const parts = [
    `language:${language}`,
    `stars:${strategy.minStars}..${strategy.maxStars}`,
    'archived:false',
    'fork:false'
  ];

  if (strategy.topic) {
    parts.push(`topic:${strategy.topic}`);
  }
  // stars is GitHub's default ordering for these queries
  if (strategy.sort !== 'stars') {
    parts.push(`sort:${strategy.sort}`);
  }

  return parts.join(' ');
}

/**
 * Search provider backed by the GitHub GraphQL search API
 */
export class GitHubSearchProvider implements SearchProvider {
  constructor(
    private client: Pick<GitHubClient, 'searchRepositories'>,
    private targetLanguage: string
  ) {}

  async search(
    strategyIndex: number,
    minStars: number,
    maxStars: number,
    limit: number,
    offset: number
  ): Promise<SearchPage & { query: string }> {
    const query = buildSearchQuery(resolveStrategy(strategyIndex, minStars, maxStars), this.targetLanguage);
    const page = await this.client.searchRepositories(query, limit, offset);
    return { ...page, query };
  }
}
