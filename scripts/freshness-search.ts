/**
 * Freshness search orchestrator
 * Coordinates search → score → freshness filter → dedupe → persist
 */

import { filterGoodCandidates } from './candidate-scorer.js';
import type { CandidateScorer } from './candidate-scorer.js';
import { dedupeFresh } from './dedup.js';
import {
  createSearchError,
  ErrorCode,
  ErrorSeverity,
  normalizeError,
  SelectorError
} from './error-handler.js';
import type { HistoryStore } from './history-store.js';
import type { SearchProvider } from './search-provider.js';
import type { ScoredCandidate } from './types.js';
import { validateSearchParams } from './validation.js';

export const DEFAULT_RATE_LIMIT_REMAINING = 5000;

export interface FreshSearchParams {
  minStars: number;
  maxStars: number;
  limit: number;
  daysFilter: number;
  freshOnly: boolean;
  forceRefresh: boolean;
  targetCount?: number;
  maxAttempts?: number;
}

export interface AttemptReport {
  attempt: number;
  offset: number;
  query?: string;
  found: number;
  passing: number;
  kept: number;
  error?: string;
}

export interface FreshSearchResult {
  results: Array<ScoredCandidate & { isNew: true }>;
  rateLimitRemaining: number;
  startingOffset: number;
  attempts: AttemptReport[];
  warnings: string[];
}

export interface OrchestratorOptions {
  verbose?: boolean;
}

/**
 * Finds candidates the user has not seen recently
 */
export class FreshnessSearchOrchestrator {
  private provider: SearchProvider;
  private scorer: Pick<CandidateScorer, 'scoreAll'>;
  private store: HistoryStore;
  private options: OrchestratorOptions;
  private warnings: string[] = [];

  constructor(
    provider: SearchProvider,
    scorer: Pick<CandidateScorer, 'scoreAll'>,
    store: HistoryStore,
    options: OrchestratorOptions = {}
  ) {
    this.provider = provider;
    this.scorer = scorer;
    this.store = store;
    this.options = { verbose: false, ...options };
  }

  /**
   * Log message with timestamp
   */
  private log(message: string, level: 'info' | 'warn' | 'error' = 'info'): void {
    const timestamp = new Date().toISOString();
    const prefix = level === 'error' ? '❌' : level === 'warn' ? '⚠️' : 'ℹ️';

    if (this.options.verbose || level !== 'info') {
      console.log(`[${timestamp}] ${prefix} ${message}`);
    }
  }

  /**
   * Run a history store call, falling back when the store itself throws
   */
  private async guarded<T>(operation: string, call: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await call();
    } catch (error) {
      const warning = `History store ${operation} failed: ${normalizeError(error).message}`;
      this.warnings.push(warning);
      this.log(warning, 'warn');
      return fallback;
    }
  }

  async findFreshCandidates(params: FreshSearchParams): Promise<FreshSearchResult> {
    const validation = validateSearchParams(params);
    if (!validation.valid) {
      throw new SelectorError(
        validation.errors.join('; '),
        ErrorCode.VALIDATION_FAILED,
        ErrorSeverity.LOW,
        { component: 'search', operation: 'findFreshCandidates' },
        false
      );
    }

    const { minStars, maxStars, limit, daysFilter, freshOnly, forceRefresh } = params;
    const targetCount = params.targetCount ?? 3;
    const maxAttempts = params.maxAttempts ?? 3;
    const effectiveAttempts = forceRefresh || !freshOnly ? 1 : maxAttempts;

    this.warnings = [];
    const startingOffset = await this.guarded('offset lookup', () => this.store.offsetFor(minStars, maxStars), 0);
    const accumulated: ScoredCandidate[] = [];
    const attempts: AttemptReport[] = [];
    let rateLimitRemaining = DEFAULT_RATE_LIMIT_REMAINING;
    let failures = 0;
    let lastFailure: SelectorError | null = null;

    this.log(`🔍 Searching ${minStars}..${maxStars} stars (limit ${limit}, up to ${effectiveAttempts} attempt(s), starting offset ${startingOffset})`);

    for (let attempt = 0; attempt < effectiveAttempts; attempt++) {
      const offset = startingOffset + attempt * limit;
      const report: AttemptReport = { attempt, offset, found: 0, passing: 0, kept: 0 };
      attempts.push(report);

      let page: Awaited<ReturnType<SearchProvider['search']>>;
      try {
        page = await this.provider.search(attempt, minStars, maxStars, limit, offset);
      } catch (error) {
        lastFailure = normalizeError(error, { component: 'search', operation: `attempt ${attempt}` });
        failures++;
        report.error = lastFailure.message;
        this.log(`Attempt ${attempt + 1} failed: ${lastFailure.message}`, 'warn');
        continue;
      }

      report.query = page.query;
      report.found = page.repositories.length;
      if (page.rateLimit) {
        rateLimitRemaining = page.rateLimit.remaining;
      }

      if (page.repositories.length === 0) {
        this.log(`Attempt ${attempt + 1}: no repositories at offset ${offset}`);
        continue;
      }

      let batch = filterGoodCandidates(this.scorer.scoreAll(page.repositories));
      report.passing = batch.length;
      if (batch.length === 0) {
        this.log(`Attempt ${attempt + 1}: none of ${report.found} repositories passed the criteria`);
        continue;
      }

      if (!forceRefresh && (freshOnly || attempt === 0)) {
        const candidates = batch;
        batch = await this.guarded('freshness check', () => this.store.unseen(candidates, daysFilter), candidates);
      }

      report.kept = batch.length;
      accumulated.push(...batch);
      this.log(`Attempt ${attempt + 1}: ${report.found} found, ${report.passing} passing, ${report.kept} fresh`);

      if (forceRefresh || accumulated.length >= targetCount) {
        break;
      }
    }

    if (failures > 0 && failures === attempts.length) {
      throw createSearchError(
        `All ${failures} search attempt(s) failed: ${lastFailure?.message ?? 'unknown error'}`,
        { operation: 'findFreshCandidates', originalError: lastFailure?.code }
      );
    }
    if (failures > 0) {
      this.warnings.push(`${failures} of ${attempts.length} search attempt(s) failed and were skipped`);
    }

    const results = dedupeFresh(accumulated);

    if (results.length > 0) {
      await this.guarded(
        'save',
        () => this.store.add(results, { type: 'search', minStars, maxStars, limit }, startingOffset),
        undefined
      );
    }

    this.log(`✓ ${results.length} fresh candidate(s), rate limit remaining ${rateLimitRemaining}`);

    return {
      results,
      rateLimitRemaining,
      startingOffset,
      attempts,
      warnings: [...this.warnings]
    };
  }
}

/**
 * Create orchestrator from its collaborators
 */
export function createFreshnessSearch(
  provider: SearchProvider,
  scorer: Pick<CandidateScorer, 'scoreAll'>,
  store: HistoryStore,
  options: OrchestratorOptions = {}
): FreshnessSearchOrchestrator {
  return new FreshnessSearchOrchestrator(provider, scorer, store, options);
}
