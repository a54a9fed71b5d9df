/**
 * GitHub API client with authentication, rate limiting, and retry logic
 */

import { Octokit } from '@octokit/rest';
import { normalizeError, isRetryable, SelectorError } from './error-handler.js';
import type { CandidateRepository, RateLimitSnapshot } from './types.js';

export interface GitHubClientConfig {
  token: string;
  timeoutMs: number;
  maxRetries: number;
  backoffMultiplier: number;
  retryBaseDelayMs?: number;
}

export interface ClientStats {
  apiCallsUsed: number;
  retries: number;
  rateLimitRemaining: number | null;
}

export interface SearchPage {
  repositories: CandidateRepository[];
  rateLimit?: RateLimitSnapshot;
}

export interface RepositoryDetails {
  fullName: string;
  stars: number;
  license: string | null;
  description: string;
  language: string | null;
  url: string;
  sizeKb: number;
  pushedAt: string | null;
}

export interface CommitInfo {
  sha: string;
  date: string | null;
}

export interface IssueInfo {
  title: string;
  url: string;
}

export interface IssuePage {
  issues: IssueInfo[];
  hasNextPage: boolean;
}

export interface ContentEntry {
  name: string;
  type: string;
}

type ResponseHeaders = Record<string, string | number | undefined>;

/**
 * Lookups the deep analyzer depends on
 */
export type RepositoryLookups = Pick<
  GitHubClient,
  'getRepository' | 'listRecentCommits' | 'listOpenIssues' | 'listRootContents'
>;

// GitHub only serves the first 1000 results of any search
export const SEARCH_RESULT_WINDOW = 1000;

const RATE_LIMIT_FLOOR = 10;

const SEARCH_QUERY = /* GraphQL */ `
  query ($searchQuery: String!, $first: Int!, $cursor: String) {
    rateLimit {
      remaining
      cost
      resetAt
    }
    search(query: $searchQuery, type: REPOSITORY, first: $first, after: $cursor) {
      nodes {
        ... on Repository {
          nameWithOwner
          stargazerCount
          description
          url
          pushedAt
          licenseInfo {
            spdxId
            name
          }
          languages(first: 10, orderBy: { field: SIZE, direction: DESC }) {
            totalSize
            edges {
              size
              node {
                name
              }
            }
          }
          repositoryTopics(first: 10) {
            nodes {
              topic {
                name
              }
            }
          }
        }
      }
    }
  }
`;

interface SearchNode {
  nameWithOwner?: string;
  stargazerCount?: number;
  description?: string | null;
  url?: string;
  pushedAt?: string | null;
  licenseInfo?: { spdxId: string | null; name: string | null } | null;
  languages?: {
    totalSize: number;
    edges: Array<{ size: number; node: { name: string } }>;
  } | null;
  repositoryTopics?: { nodes: Array<{ topic: { name: string } }> } | null;
}

interface SearchResponse {
  rateLimit: { remaining: number; cost: number; resetAt: string } | null;
  search: { nodes: Array<SearchNode | null> };
}

/**
 * Encode a result offset as a GitHub search cursor
 */
export function offsetToCursor(offset: number): string | null {
  if (offset <= 0) {
    return null;
  }
  return Buffer.from(`cursor:${offset}`).toString('base64');
}

function toCandidate(node: SearchNode): CandidateRepository | null {
  if (!node.nameWithOwner) {
    return null;
  }

  return {
    fullName: node.nameWithOwner,
    stars: node.stargazerCount ?? 0,
    license: node.licenseInfo ? { spdxId: node.licenseInfo.spdxId, name: node.licenseInfo.name } : null,
    description: node.description ?? '',
    url: node.url ?? `https://github.com/${node.nameWithOwner}`,
    languages: (node.languages?.edges ?? []).map(edge => ({ name: edge.node.name, bytes: edge.size })),
    totalLanguageBytes: node.languages?.totalSize ?? 0,
    topics: (node.repositoryTopics?.nodes ?? []).map(entry => entry.topic.name),
    pushedAt: node.pushedAt ?? null
  };
}

function hasNextLink(link: string | number | undefined): boolean {
  return typeof link === 'string' && /rel="next"/.test(link);
}

/**
 * GitHub API client with built-in rate limiting and retries
 */
export class GitHubClient {
  private octokit: Octokit;
  private config: GitHubClientConfig;
  private apiCallsUsed: number = 0;
  private retries: number = 0;
  private rateLimitRemaining: number | null = null;
  private rateLimitReset: number | null = null;   // epoch ms

  constructor(config: GitHubClientConfig, octokit?: Octokit) {
    this.config = config;
    this.octokit = octokit ?? new Octokit({
      auth: config.token,
      userAgent: 'repo-scout/1.0.0',
      request: {
        retries: 0 // handled by executeWithRetry
      }
    });
  }

  /**
   * Calculate delay for exponential backoff
   */
  private calculateBackoffDelay(attempt: number): number {
    const baseDelay = this.config.retryBaseDelayMs ?? 1000;
    return baseDelay * Math.pow(this.config.backoffMultiplier, attempt);
  }

  /**
   * Sleep for specified milliseconds
   */
  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  private recordHeaders(headers: ResponseHeaders): void {
    const remaining = Number(headers['x-ratelimit-remaining']);
    const reset = Number(headers['x-ratelimit-reset']);

    if (Number.isFinite(remaining)) {
      this.rateLimitRemaining = remaining;
    }
    if (Number.isFinite(reset)) {
      this.rateLimitReset = reset * 1000;
    }
  }

  private async waitForRateLimit(): Promise<void> {
    if (this.rateLimitRemaining === null || this.rateLimitRemaining >= RATE_LIMIT_FLOOR || this.rateLimitReset === null) {
      return;
    }

    const waitTime = this.rateLimitReset - Date.now() + 1000;
    if (waitTime > 0) {
      console.log(`⚠️ Rate limit nearly exceeded. Waiting ${Math.ceil(waitTime / 1000)} seconds...`);
      await this.sleep(waitTime);
    }
    this.rateLimitRemaining = null;
  }

  /**
   * Execute API request with retry logic and rate limiting
   */
  private async executeWithRetry<T>(operation: (signal: AbortSignal) => Promise<T>, label: string): Promise<T> {
    let lastError: SelectorError | null = null;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      await this.waitForRateLimit();

      try {
        const result = await operation(AbortSignal.timeout(this.config.timeoutMs));
        this.apiCallsUsed++;
        return result;
      } catch (error) {
        this.apiCallsUsed++;
        lastError = normalizeError(error, { operation: label });

        if (!isRetryable(lastError) || attempt === this.config.maxRetries) {
          throw lastError;
        }

        const delay = this.calculateBackoffDelay(attempt);
        this.retries++;
        console.log(`⚠️ ${label} failed (${lastError.code}), retrying in ${delay}ms (attempt ${attempt + 1}/${this.config.maxRetries + 1})`);
        await this.sleep(delay);
      }
    }

    throw lastError ?? normalizeError(new Error('Max retries exceeded'), { operation: label });
  }

  /**
   * Search repositories through the GraphQL search connection
   */
  async searchRepositories(query: string, first: number, offset: number = 0): Promise<SearchPage> {
    if (offset >= SEARCH_RESULT_WINDOW) {
      return { repositories: [] };
    }

    const pageSize = Math.min(first, SEARCH_RESULT_WINDOW - offset);
    const response = await this.executeWithRetry(
      signal => this.octokit.graphql<SearchResponse>(SEARCH_QUERY, {
        searchQuery: query,
        first: pageSize,
        cursor: offsetToCursor(offset),
        request: { signal }
      }),
      'searchRepositories'
    );

    if (response.rateLimit) {
      this.rateLimitRemaining = response.rateLimit.remaining;
      this.rateLimitReset = Date.parse(response.rateLimit.resetAt);
    }

    const repositories: CandidateRepository[] = [];
    for (const node of response.search.nodes) {
      const candidate = node ? toCandidate(node) : null;
      if (candidate) {
        repositories.push(candidate);
      }
    }

    return {
      repositories,
      rateLimit: response.rateLimit
        ? { remaining: response.rateLimit.remaining, cost: response.rateLimit.cost }
        : undefined
    };
  }

  /**
   * Get repository details
   */
  async getRepository(owner: string, repo: string): Promise<RepositoryDetails> {
    const response = await this.executeWithRetry(
      signal => this.octokit.rest.repos.get({ owner, repo, request: { signal } }),
      'getRepository'
    );
    this.recordHeaders(response.headers);

    const data = response.data;
    return {
      fullName: data.full_name,
      stars: data.stargazers_count,
      license: data.license?.spdx_id ?? data.license?.name ?? null,
      description: data.description ?? '',
      language: data.language ?? null,
      url: data.html_url,
      sizeKb: data.size,
      pushedAt: data.pushed_at ?? null
    };
  }

  /**
   * List the most recent commits on the default branch
   */
  async listRecentCommits(owner: string, repo: string, perPage: number = 5): Promise<CommitInfo[]> {
    const response = await this.executeWithRetry(
      signal => this.octokit.rest.repos.listCommits({ owner, repo, per_page: perPage, request: { signal } }),
      'listRecentCommits'
    );
    this.recordHeaders(response.headers);

    return response.data.map(commit => ({
      sha: commit.sha,
      date: commit.commit.committer?.date ?? commit.commit.author?.date ?? null
    }));
  }

  /**
   * List open issues, optionally filtered by label (pull requests excluded)
   */
  async listOpenIssues(
    owner: string,
    repo: string,
    options: { labels?: string; perPage?: number } = {}
  ): Promise<IssuePage> {
    const response = await this.executeWithRetry(
      signal => this.octokit.rest.issues.listForRepo({
        owner,
        repo,
        state: 'open',
        labels: options.labels,
        per_page: options.perPage ?? 30,
        request: { signal }
      }),
      'listOpenIssues'
    );
    this.recordHeaders(response.headers);

    return {
      issues: response.data
        .filter(issue => !issue.pull_request)
        .map(issue => ({ title: issue.title, url: issue.html_url })),
      hasNextPage: hasNextLink(response.headers.link)
    };
  }

  /**
   * List files and directories at the repository root
   */
  async listRootContents(owner: string, repo: string): Promise<ContentEntry[]> {
    const response = await this.executeWithRetry(
      signal => this.octokit.rest.repos.getContent({ owner, repo, path: '', request: { signal } }),
      'listRootContents'
    );
    this.recordHeaders(response.headers);

    const data = response.data;
    if (!Array.isArray(data)) {
      return [{ name: data.name, type: data.type }];
    }
    return data.map(entry => ({ name: entry.name, type: entry.type }));
  }

  /**
   * Get API usage statistics
   */
  getStats(): ClientStats {
    return {
      apiCallsUsed: this.apiCallsUsed,
      retries: this.retries,
      rateLimitRemaining: this.rateLimitRemaining
    };
  }
}

/**
 * Create GitHub client from configuration
 */
export function createGitHubClient(config: GitHubClientConfig): GitHubClient {
  return new GitHubClient(config);
}
