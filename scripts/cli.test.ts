/**
 * Integration tests for the command line interface
 * GitHub is replaced by in-process fakes; history lives in a test database
 */

import { describe, it, expect, beforeEach, afterEach, vi, MockInstance } from 'vitest';
import { existsSync, mkdirSync, readFileSync, unlinkSync } from 'fs';
import { CliDependencies, parseArgs, runCli } from './cli.js';
import { RepositoryLookups } from './github-client.js';
import { HistoryStoreOptions, openHistoryStore } from './history-store.js';
import { SearchProvider } from './search-provider.js';
import { CandidateRepository } from './types.js';
import { ValidationError } from './validation.js';

const NOW = new Date('2026-03-01T12:00:00Z');
const DB_PATH = 'test-data/test-cli.db';
const CSV_PATH = 'test-data/test-cli-results.csv';
const EXPORT_PATH = 'test-data/test-cli-export.json';
const BACKUP_PATH = 'test-data/test-cli-backup.db';

const env = {
  GITHUB_TOKEN: 'test-secret',
  REPO_SCOUT_DB: DB_PATH,
  REPO_SCOUT_USER: 'cli-user'
};

const createRepo = (fullName: string): CandidateRepository => ({
  fullName,
  stars: 1200,
  license: { spdxId: 'MIT', name: 'MIT License' },
  description: `About ${fullName}`,
  url: `https://github.com/${fullName}`,
  languages: [{ name: 'Python', bytes: 1000 }],
  totalLanguageBytes: 1000,
  topics: [],
  pushedAt: null
});

const provider: SearchProvider = {
  search: async () => ({
    repositories: [createRepo('octo/one'), createRepo('octo/two'), createRepo('octo/three')],
    rateLimit: { remaining: 4800, cost: 1 }
  })
};

const lookups: RepositoryLookups = {
  getRepository: async (owner, repo) => ({
    fullName: `${owner}/${repo}`,
    stars: 900,
    license: 'MIT',
    description: 'A tidy little library with a clear purpose and good documentation',
    language: 'Python',
    url: `https://github.com/${owner}/${repo}`,
    sizeKb: 512,
    pushedAt: '2026-02-28T12:00:00Z'
  }),
  listRecentCommits: async () => [{ sha: 'abc123', date: '2026-02-28T12:00:00Z' }],
  listOpenIssues: async () => ({ issues: [], hasNextPage: false }),
  listRootContents: async () => [
    { name: 'README.md', type: 'file' },
    { name: 'LICENSE', type: 'file' },
    { name: 'CONTRIBUTING.md', type: 'file' }
  ]
};

const deps: CliDependencies = {
  env,
  createProvider: () => provider,
  createLookups: () => lookups,
  now: () => NOW
};

const openTestStore = () => openHistoryStore({ databasePath: DB_PATH, userId: 'cli-user', clock: () => NOW });

describe('parseArgs', () => {
  it('should split command, positionals, flags and values', () => {
    const args = parseArgs(['analyze', 'octo/sample', '--verbose', '--limit=5', '--user', 'alice']);

    expect(args.command).toBe('analyze');
    expect(args.positionals).toEqual(['octo/sample']);
    expect([...args.flags]).toEqual(['--verbose']);
    expect(args.values.get('--limit')).toBe('5');
    expect(args.values.get('--user')).toBe('alice');
  });

  it('should take a negative number as an option value', () => {
    expect(parseArgs(['cleanup', '--days', '-1']).values.get('--days')).toBe('-1');
  });

  it('should reject a valued option without a value', () => {
    expect(() => parseArgs(['search', '--limit'])).toThrow(ValidationError);
    expect(() => parseArgs(['search', '--limit='])).toThrow('--limit requires a value');
  });
});

describe('runCli', () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  const logged = () => logSpy.mock.calls.map(call => call.map(String).join(' '));
  const errors = () => errorSpy.mock.calls.map(call => call.map(String).join(' '));

  const removeTestFiles = () => {
    for (const file of [DB_PATH, CSV_PATH, EXPORT_PATH, BACKUP_PATH]) {
      if (existsSync(file)) {
        unlinkSync(file);
      }
    }
  };

  beforeEach(() => {
    if (!existsSync('test-data')) {
      mkdirSync('test-data', { recursive: true });
    }
    removeTestFiles();
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeTestFiles();
  });

  describe('general', () => {
    it('should print help without a command', async () => {
      expect(await runCli([], deps)).toBe(0);
      expect(logged()[0]).toContain('Usage: repo-scout <command> [options]');
    });

    it('should print help for --help on any command', async () => {
      expect(await runCli(['search', '--help'], deps)).toBe(0);
      expect(logged()[0]).toContain('Usage: repo-scout <command> [options]');
    });

    it('should fail on unknown commands', async () => {
      expect(await runCli(['fly'], deps)).toBe(1);
      expect(errors()).toEqual(['❌ Unknown command: fly']);
    });

    it('should fail on an option missing its value', async () => {
      expect(await runCli(['search', '--limit'], deps)).toBe(1);
      expect(errors()).toEqual(['❌ --limit requires a value']);
    });

    it('should open the history of the user named on the command line', async () => {
      const opened: HistoryStoreOptions[] = [];
      const code = await runCli(['stats', '--user', 'someone'], {
        ...deps,
        openStore: options => {
          opened.push(options);
          return openHistoryStore({ ...options, databasePath: ':memory:' });
        }
      });

      expect(code).toBe(0);
      expect(opened.map(options => options.userId)).toEqual(['someone']);
      expect(logged()[0]).toBe('📊 Repository History Statistics (user: someone)');
    });
  });

  describe('search', () => {
    it('should reject an inverted star range before searching', async () => {
      expect(await runCli(['search', '--min-stars', '500', '--max-stars', '100'], deps)).toBe(1);
      expect(errors()).toEqual(['❌ min-stars must be less than max-stars']);
      expect(existsSync(DB_PATH)).toBe(false);
    });

    it('should reject non-numeric option values', async () => {
      expect(await runCli(['search', '--limit', 'ten'], deps)).toBe(1);
      expect(errors()).toEqual(['❌ --limit must be an integer']);
    });

    it('should require a GitHub token', async () => {
      expect(await runCli(['search'], { ...deps, env: { REPO_SCOUT_DB: DB_PATH } })).toBe(1);
      expect(errors()).toEqual(['❌ GITHUB_TOKEN environment variable is required']);
    });

    it('should show fresh repositories once and record them in the history', async () => {
      const args = ['search', '--min-stars', '100', '--max-stars', '5000', '--limit', '10'];

      expect(await runCli(args, deps)).toBe(0);
      expect(logged()).toContain('✅ Found 3 fresh repositories for you!\n');
      expect(logged()).toContain(' 1. 🆕 octo/one');
      expect(logged()).toContain('📊 History: 3 repos tracked, 3 shown recently (user: cli-user)');
      expect(logged()).toContain('✅ Rate limit remaining: 4800');

      logSpy.mockClear();
      expect(await runCli(args, deps)).toBe(0);
      expect(logged()).toContain('❌ No fresh repositories found. Try adjusting your search parameters.');

      const store = await openTestStore();
      try {
        expect(await store.stats()).toMatchObject({ total: 3, searches: 1 });
      } finally {
        store.close();
      }
    });

    it('should show repositories again on force refresh', async () => {
      await runCli(['search'], deps);
      logSpy.mockClear();

      expect(await runCli(['search', '--force-refresh'], deps)).toBe(0);
      expect(logged()).toContain('✅ Found 3 fresh repositories for you!\n');
    });

    it('should export the results to CSV when asked', async () => {
      expect(await runCli(['search', '--export-csv', '--output', CSV_PATH], deps)).toBe(0);

      const lines = readFileSync(CSV_PATH, 'utf-8').split('\r\n');
      expect(lines).toHaveLength(5);
      expect(lines[1].startsWith('octo/one,1200,MIT,30,100.0%,')).toBe(true);
      expect(logged()).toContain(`✅ Results exported to ${CSV_PATH}`);
    });
  });

  describe('analyze', () => {
    it('should reject references that are not owner/repo', async () => {
      expect(await runCli(['analyze', 'not-a-repo'], deps)).toBe(1);
      expect(errors()).toEqual(['❌ Invalid format. Use: owner/repo or full GitHub URL']);
    });

    it('should print the analysis and save the score to the history', async () => {
      expect(await runCli(['analyze', 'https://github.com/octo/sample'], deps)).toBe(0);

      // activity 5, opportunity 0, complexity 5, maintainability 5 -> 3.25 -> 3.3
      expect(logged()).toContain('\n🔴 Overall Suitability Score: 3.3/5.0');
      expect(logged()).toContain('\n💾 Analysis saved to your history');

      const store = await openTestStore();
      try {
        const tracked = await store.getRepository('octo/sample');
        expect(tracked?.analysisScore).toBe(3.3);
        expect(tracked?.passesCriteria).toBe(false);
        expect(tracked?.searchCriteria).toEqual({ type: 'manual_analysis' });
      } finally {
        store.close();
      }
    });

    it('should fail when the repository cannot be fetched', async () => {
      const missing: RepositoryLookups = {
        ...lookups,
        getRepository: async () => {
          throw Object.assign(new Error('Not Found'), { status: 404 });
        }
      };

      expect(await runCli(['analyze', 'octo/missing'], { ...deps, createLookups: () => missing })).toBe(1);
      expect(errors()).toEqual(['❌ Could not analyze repository octo/missing']);
      expect(existsSync(DB_PATH)).toBe(false);
    });
  });

  describe('history maintenance', () => {
    it('should ask for confirmation before cleanup and reset', async () => {
      expect(await runCli(['cleanup'], deps)).toBe(0);
      expect(await runCli(['reset'], deps)).toBe(0);
      expect(logged()).toEqual([
        '⚠️ This will delete old repository data. Use --confirm to proceed.',
        '⚠️ This will delete ALL your tracked repositories. Use --confirm to proceed.'
      ]);
    });

    it('should reject a negative cleanup age', async () => {
      expect(await runCli(['cleanup', '--confirm', '--days', '-1'], deps)).toBe(1);
      expect(errors()).toEqual(['❌ --days must be a non-negative integer']);
    });

    it('should clear the history on a confirmed reset', async () => {
      await runCli(['search'], deps);

      expect(await runCli(['reset', '--confirm'], deps)).toBe(0);
      expect(logged()).toContain('✅ Reset complete. All repository history cleared.');

      const store = await openTestStore();
      try {
        expect((await store.stats()).total).toBe(0);
      } finally {
        store.close();
      }
    });

    it('should report removed entries on a confirmed cleanup', async () => {
      expect(await runCli(['cleanup', '--confirm'], deps)).toBe(0);
      expect(logged()).toContain('🗑️ Cleanup complete. Removed 0 old entries.');
    });
  });

  describe('export and backup', () => {
    it('should report an empty history instead of writing a file', async () => {
      expect(await runCli(['export'], deps)).toBe(0);
      expect(logged()).toContain('❌ No repositories to export');
    });

    it('should reject unknown formats', async () => {
      expect(await runCli(['export', '--format', 'xml'], deps)).toBe(1);
      expect(errors()).toEqual(['❌ Unknown format: xml. Use one of: json, yaml, csv, markdown']);
    });

    it('should export the history as JSON', async () => {
      await runCli(['search'], deps);

      expect(await runCli(['export', '--format', 'json', '--output', EXPORT_PATH], deps)).toBe(0);

      const document: unknown = JSON.parse(readFileSync(EXPORT_PATH, 'utf-8'));
      expect(document).toMatchObject({ export_info: { total_repositories: 3, format: 'json' } });
      expect(logged()).toContain(`✅ Exported 3 repositories to ${EXPORT_PATH}`);
      expect(logged()).toContain('   Top licenses: MIT (3)');
    });

    it('should back up the database to the given path', async () => {
      expect(await runCli(['backup', '--output', BACKUP_PATH], deps)).toBe(0);
      expect(existsSync(BACKUP_PATH)).toBe(true);
      expect(logged()).toContain(`✅ History backed up to: ${BACKUP_PATH}`);
    });
  });
});
