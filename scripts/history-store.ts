/**
 * History Store
 *
 * Per-user record of repositories already shown, backed by SQLite.
 * Every operation degrades instead of throwing: failures are logged as
 * warnings and the neutral value (0, [], everything unseen) is returned.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { createStorageError } from './error-handler.js';
import type {
  Clock,
  HistoryStats,
  RepositoryObservation,
  SearchCriteria,
  SearchEvent,
  TrackedRepository
} from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const OFFSET_WINDOW_DAYS = 1;
const RECENT_DAYS = 7;

/**
 * Operations the search orchestrator relies on
 */
export interface HistoryStore {
  offsetFor(minStars: number, maxStars: number): Promise<number>;
  add(repos: RepositoryObservation[], criteria: SearchCriteria, offset: number): Promise<void>;
  unseen<T extends { repoName: string }>(repos: T[], days: number): Promise<T[]>;
  stats(): Promise<HistoryStats>;
  cleanup(daysToKeep: number): Promise<number>;
  reset(): Promise<void>;
}

export interface HistoryStoreOptions {
  databasePath: string;
  userId: string;
  clock?: Clock;
}

/**
 * Database record representation (SQLite format with JSON strings and integer booleans)
 */
interface TrackedRepositoryRecord {
  user_id: string;
  repo_name: string;
  stars: number;
  license: string;
  language_percentage: string;
  estimated_file_count: number;
  url: string;
  description: string;
  first_shown: string;
  last_shown: string;
  show_count: number;
  passes_criteria: number;        // SQLite boolean (0/1)
  analysis_score: number | null;
  search_criteria: string | null; // JSON
}

interface SearchEventRecord {
  user_id: string;
  searched_at: string;
  min_stars: number;
  max_stars: number;
  limit_requested: number;
  repos_found: number;
  new_repos_shown: number;
  search_criteria: string;
  search_offset: number;
}

interface UpsertParams {
  userId: string;
  repoName: string;
  stars: number;
  license: string;
  languagePercentage: string;
  estimatedFileCount: number;
  url: string;
  description: string;
  now: string;
  passesCriteria: number;
  analysisScore: number | null;
  searchCriteria: string;
}

const UPSERT_COLUMNS = `
  INSERT INTO tracked_repositories (
    user_id, repo_name, stars, license, language_percentage, estimated_file_count,
    url, description, first_shown, last_shown, show_count, passes_criteria,
    analysis_score, search_criteria
  ) VALUES (
    @userId, @repoName, @stars, @license, @languagePercentage, @estimatedFileCount,
    @url, @description, @now, @now, 1, @passesCriteria,
    @analysisScore, @searchCriteria
  )
  ON CONFLICT(user_id, repo_name) DO UPDATE SET
    stars = excluded.stars,
    license = excluded.license,
    language_percentage = excluded.language_percentage,
    estimated_file_count = excluded.estimated_file_count,
    description = excluded.description,
    last_shown = MAX(last_shown, excluded.last_shown),
    show_count = show_count + 1,
    analysis_score = COALESCE(excluded.analysis_score, analysis_score)`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse stored search criteria, tolerating rows written by hand or by older versions
 */
export function parseSearchCriteria(raw: string | null): SearchCriteria | null {
  if (!raw) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    console.warn(`⚠️ Ignoring unreadable search criteria: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }

  if (!isRecord(parsed)) {
    return null;
  }
  if (parsed.type === 'manual_analysis') {
    return { type: 'manual_analysis' };
  }

  const { minStars, maxStars, limit } = parsed;
  if (typeof minStars === 'number' && typeof maxStars === 'number' && typeof limit === 'number') {
    return { type: 'search', minStars, maxStars, limit };
  }
  return null;
}

function formatBackupTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * SQLite-backed history store, one pair of tables shared by all users
 *
 * @example
 * ```typescript
 * const store = await openHistoryStore({ databasePath: 'repositories.db', userId: 'alice' });
 * try {
 *   const fresh = await store.unseen(candidates, 7);
 *   await store.add(fresh, { type: 'search', minStars: 500, maxStars: 50000, limit: 100 }, 0);
 *   console.log(await store.stats());
 * } finally {
 *   store.close();
 * }
 * ```
 */
export class SqliteHistoryStore implements HistoryStore {
  private db: Database.Database | null = null;
  private databasePath: string;
  private userId: string;
  private clock: Clock;

  constructor(options: HistoryStoreOptions) {
    this.databasePath = options.databasePath;
    this.userId = options.userId;
    this.clock = options.clock ?? (() => new Date());
  }

  getUserId(): string {
    return this.userId;
  }

  /**
   * Open the database and create the schema if needed
   */
  async initialize(): Promise<void> {
    try {
      if (this.databasePath !== ':memory:') {
        const dir = path.dirname(this.databasePath);
        if (!fs.existsSync(dir)) {
          fs.mkdirSync(dir, { recursive: true });
        }
      }

      this.db = new Database(this.databasePath);
      this.createSchema(this.db);
    } catch (error) {
      throw createStorageError(
        `Failed to open history database: ${error instanceof Error ? error.message : String(error)}`,
        this.databasePath,
        { operation: 'initialize' }
      );
    }
  }

  private createSchema(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS tracked_repositories (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id TEXT NOT NULL,
        repo_name TEXT NOT NULL,
        stars INTEGER NOT NULL DEFAULT 0,
        license TEXT NOT NULL DEFAULT '',
        language_percentage TEXT NOT NULL DEFAULT '',
        estimated_file_count INTEGER NOT NULL DEFAULT 0,
        url TEXT NOT NULL DEFAULT '',
        description TEXT NOT NULL DEFAULT '',
        first_shown TEXT NOT NULL,
        last_shown TEXT NOT NULL,
        show_count INTEGER NOT NULL DEFAULT 1 CHECK (show_count >= 1),
        passes_criteria INTEGER NOT NULL DEFAULT 0,
        analysis_score REAL CHECK (analysis_score IS NULL OR (analysis_score >= 0 AND analysis_score <= 5)),
        search_criteria TEXT,
        UNIQUE (user_id, repo_name)
      )
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS search_events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id TEXT NOT NULL,
        searched_at TEXT NOT NULL,
        min_stars INTEGER NOT NULL,
        max_stars INTEGER NOT NULL,
        limit_requested INTEGER NOT NULL,
        repos_found INTEGER NOT NULL,
        new_repos_shown INTEGER NOT NULL,
        search_criteria TEXT NOT NULL,
        search_offset INTEGER NOT NULL DEFAULT 0
      )
    `);

    db.exec(`
      CREATE INDEX IF NOT EXISTS idx_tracked_user_last_shown ON tracked_repositories(user_id, last_shown);
      CREATE INDEX IF NOT EXISTS idx_tracked_user_analysis_score ON tracked_repositories(user_id, analysis_score);
      CREATE INDEX IF NOT EXISTS idx_events_user_range ON search_events(user_id, min_stars, max_stars, searched_at);
    `);
  }

  private requireDb(): Database.Database {
    if (!this.db) {
      throw new Error('Database not initialized. Call initialize() first.');
    }
    return this.db;
  }

  private warn(operation: string, error: unknown): void {
    console.warn(`⚠️ Database error during ${operation}: ${error instanceof Error ? error.message : String(error)}`);
  }

  private cutoff(days: number): string {
    return new Date(this.clock().getTime() - days * DAY_MS).toISOString();
  }

  /**
   * Highest offset used for this star range in the last day (0 if none)
   */
  async offsetFor(minStars: number, maxStars: number): Promise<number> {
    try {
      const row = this.requireDb().prepare<[string, number, number, string], { offset: number | null }>(`
        SELECT MAX(search_offset) AS offset FROM search_events
        WHERE user_id = ? AND min_stars = ? AND max_stars = ? AND searched_at > ?
      `).get(this.userId, minStars, maxStars, this.cutoff(OFFSET_WINDOW_DAYS));

      return row?.offset ?? 0;
    } catch (error) {
      this.warn('offset lookup', error);
      return 0;
    }
  }

  private upsert(db: Database.Database, repo: RepositoryObservation, criteria: SearchCriteria, updatePasses: boolean): void {
    const sql = updatePasses
      ? `${UPSERT_COLUMNS},\n    passes_criteria = excluded.passes_criteria`
      : UPSERT_COLUMNS;

    db.prepare<UpsertParams>(sql).run({
      userId: this.userId,
      repoName: repo.repoName,
      stars: repo.stars,
      license: repo.license,
      languagePercentage: repo.languagePercentage,
      estimatedFileCount: repo.estimatedFileCount,
      url: repo.url,
      description: repo.description,
      now: this.clock().toISOString(),
      passesCriteria: repo.passesCriteria ? 1 : 0,
      analysisScore: repo.analysisScore ?? null,
      searchCriteria: JSON.stringify(criteria)
    });
  }

  /**
   * Upsert repositories and append one search event with the given offset
   */
  async add(repos: RepositoryObservation[], criteria: SearchCriteria, offset: number): Promise<void> {
    let db: Database.Database;
    try {
      db = this.requireDb();
    } catch (error) {
      this.warn('add', error);
      return;
    }

    const exists = db.prepare<[string, string], { found: number }>(
      'SELECT 1 AS found FROM tracked_repositories WHERE user_id = ? AND repo_name = ?'
    );
    let newlyTracked = 0;

    for (const repo of repos) {
      try {
        const known = exists.get(this.userId, repo.repoName) !== undefined;
        this.upsert(db, repo, criteria, false);
        if (!known) {
          newlyTracked++;
        }
      } catch (error) {
        this.warn(`add (${repo.repoName})`, error);
      }
    }

    try {
      db.prepare<SearchEventRecord>(`
        INSERT INTO search_events (
          user_id, searched_at, min_stars, max_stars, limit_requested,
          repos_found, new_repos_shown, search_criteria, search_offset
        ) VALUES (
          @user_id, @searched_at, @min_stars, @max_stars, @limit_requested,
          @repos_found, @new_repos_shown, @search_criteria, @search_offset
        )
      `).run({
        user_id: this.userId,
        searched_at: this.clock().toISOString(),
        min_stars: criteria.type === 'search' ? criteria.minStars : 0,
        max_stars: criteria.type === 'search' ? criteria.maxStars : 0,
        limit_requested: criteria.type === 'search' ? criteria.limit : 0,
        repos_found: repos.length,
        new_repos_shown: newlyTracked,
        search_criteria: JSON.stringify(criteria),
        search_offset: offset
      });
    } catch (error) {
      this.warn('search event logging', error);
    }
  }

  /**
   * Record a deep analysis result; no search event is logged
   */
  async recordAnalysis(repo: RepositoryObservation & { analysisScore: number }): Promise<boolean> {
    try {
      this.upsert(this.requireDb(), repo, { type: 'manual_analysis' }, true);
      return true;
    } catch (error) {
      this.warn('analysis recording', error);
      return false;
    }
  }

  /**
   * Repositories not shown to this user within the last `days` days
   */
  async unseen<T extends { repoName: string }>(repos: T[], days: number): Promise<T[]> {
    try {
      const rows = this.requireDb().prepare<[string, string], { repo_name: string }>(
        'SELECT repo_name FROM tracked_repositories WHERE user_id = ? AND last_shown > ?'
      ).all(this.userId, this.cutoff(days));

      const shown = new Set(rows.map(row => row.repo_name));
      return repos.filter(repo => !shown.has(repo.repoName));
    } catch (error) {
      this.warn('freshness check', error);
      return repos;
    }
  }

  async stats(): Promise<HistoryStats> {
    const empty: HistoryStats = {
      userId: this.userId,
      total: 0,
      passing: 0,
      recent: 0,
      searches: 0,
      averageAnalysisScore: 0
    };

    try {
      const db = this.requireDb();
      const row = db.prepare<[string, string], {
        total: number;
        passing: number | null;
        recent: number | null;
        average: number | null;
      }>(`
        SELECT
          COUNT(*) AS total,
          SUM(CASE WHEN passes_criteria = 1 THEN 1 ELSE 0 END) AS passing,
          SUM(CASE WHEN last_shown > ? THEN 1 ELSE 0 END) AS recent,
          AVG(analysis_score) AS average
        FROM tracked_repositories
        WHERE user_id = ?
      `).get(this.cutoff(RECENT_DAYS), this.userId);

      const searches = db.prepare<[string], { count: number }>(
        'SELECT COUNT(*) AS count FROM search_events WHERE user_id = ?'
      ).get(this.userId);

      return {
        userId: this.userId,
        total: row?.total ?? 0,
        passing: row?.passing ?? 0,
        recent: row?.recent ?? 0,
        searches: searches?.count ?? 0,
        averageAnalysisScore: row?.average ? Math.round(row.average * 100) / 100 : 0
      };
    } catch (error) {
      this.warn('statistics', error);
      return empty;
    }
  }

  /**
   * Delete unanalyzed repositories and search events older than the cutoff
   * @returns Number of repositories plus events removed
   */
  async cleanup(daysToKeep: number): Promise<number> {
    try {
      const db = this.requireDb();
      const cutoff = this.cutoff(daysToKeep);

      const repos = db.prepare<[string, string]>(
        'DELETE FROM tracked_repositories WHERE user_id = ? AND last_shown < ? AND analysis_score IS NULL'
      ).run(this.userId, cutoff);
      const events = db.prepare<[string, string]>(
        'DELETE FROM search_events WHERE user_id = ? AND searched_at < ?'
      ).run(this.userId, cutoff);

      return repos.changes + events.changes;
    } catch (error) {
      this.warn('cleanup', error);
      return 0;
    }
  }

  /**
   * Remove every row belonging to this user
   */
  async reset(): Promise<void> {
    try {
      const db = this.requireDb();
      const clear = db.transaction((userId: string) => {
        db.prepare('DELETE FROM tracked_repositories WHERE user_id = ?').run(userId);
        db.prepare('DELETE FROM search_events WHERE user_id = ?').run(userId);
      });
      clear(this.userId);
      console.log(`✓ Reset history for user: ${this.userId}`);
    } catch (error) {
      this.warn('reset', error);
    }
  }

  async getRepository(repoName: string): Promise<TrackedRepository | null> {
    try {
      const row = this.requireDb().prepare<[string, string], TrackedRepositoryRecord>(
        'SELECT * FROM tracked_repositories WHERE user_id = ? AND repo_name = ?'
      ).get(this.userId, repoName);

      return row ? this.fromDbRecord(row) : null;
    } catch (error) {
      this.warn('repository lookup', error);
      return null;
    }
  }

  /**
   * All tracked repositories, most recently shown first
   */
  async listRepositories(): Promise<TrackedRepository[]> {
    return this.query(
      'SELECT * FROM tracked_repositories WHERE user_id = ? ORDER BY last_shown DESC, repo_name',
      'listing'
    );
  }

  async listAnalyzed(): Promise<TrackedRepository[]> {
    return this.query(
      `SELECT * FROM tracked_repositories
       WHERE user_id = ? AND analysis_score IS NOT NULL
       ORDER BY analysis_score DESC, stars DESC`,
      'analyzed listing'
    );
  }

  async topAnalyzed(limit: number = 10): Promise<TrackedRepository[]> {
    const analyzed = await this.listAnalyzed();
    return analyzed.slice(0, limit);
  }

  /**
   * Most recent search events, newest first
   */
  async recentSearches(limit: number = 5): Promise<SearchEvent[]> {
    try {
      const rows = this.requireDb().prepare<[string, number], SearchEventRecord>(
        'SELECT * FROM search_events WHERE user_id = ? ORDER BY searched_at DESC, id DESC LIMIT ?'
      ).all(this.userId, limit);

      const events: SearchEvent[] = [];
      for (const row of rows) {
        const criteria = parseSearchCriteria(row.search_criteria);
        if (criteria) {
          events.push({
            userId: row.user_id,
            searchedAt: row.searched_at,
            minStars: row.min_stars,
            maxStars: row.max_stars,
            limitRequested: row.limit_requested,
            reposFound: row.repos_found,
            newReposShown: row.new_repos_shown,
            criteria,
            offset: row.search_offset
          });
        }
      }
      return events;
    } catch (error) {
      this.warn('search history listing', error);
      return [];
    }
  }

  /**
   * @returns Whether a row was updated
   */
  async updateAnalysisScore(repoName: string, score: number, passesCriteria?: boolean): Promise<boolean> {
    try {
      const db = this.requireDb();
      const result = passesCriteria === undefined
        ? db.prepare<[number, string, string]>(
            'UPDATE tracked_repositories SET analysis_score = ? WHERE user_id = ? AND repo_name = ?'
          ).run(score, this.userId, repoName)
        : db.prepare<[number, number, string, string]>(
            'UPDATE tracked_repositories SET analysis_score = ?, passes_criteria = ? WHERE user_id = ? AND repo_name = ?'
          ).run(score, passesCriteria ? 1 : 0, this.userId, repoName);

      return result.changes > 0;
    } catch (error) {
      this.warn('analysis score update', error);
      return false;
    }
  }

  /**
   * Copy the database to a backup file
   * @returns Path to the backup file, or an empty string when the backup failed
   */
  async backup(backupPath?: string): Promise<string> {
    const target = backupPath ?? `backup_${this.userId}_${formatBackupTimestamp(this.clock())}.db`;
    try {
      await this.requireDb().backup(target);
      return target;
    } catch (error) {
      this.warn('backup', error);
      return '';
    }
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private async query(sql: string, operation: string): Promise<TrackedRepository[]> {
    try {
      const rows = this.requireDb().prepare<[string], TrackedRepositoryRecord>(sql).all(this.userId);
      return rows.map(row => this.fromDbRecord(row));
    } catch (error) {
      this.warn(operation, error);
      return [];
    }
  }

  private fromDbRecord(record: TrackedRepositoryRecord): TrackedRepository {
    return {
      userId: record.user_id,
      repoName: record.repo_name,
      stars: record.stars,
      license: record.license,
      languagePercentage: record.language_percentage,
      estimatedFileCount: record.estimated_file_count,
      url: record.url,
      description: record.description,
      firstShown: record.first_shown,
      lastShown: record.last_shown,
      showCount: record.show_count,
      passesCriteria: record.passes_criteria === 1,
      analysisScore: record.analysis_score,
      searchCriteria: parseSearchCriteria(record.search_criteria)
    };
  }
}

/**
 * Create and initialize a history store
 */
export async function openHistoryStore(options: HistoryStoreOptions): Promise<SqliteHistoryStore> {
  const store = new SqliteHistoryStore(options);
  await store.initialize();
  return store;
}
