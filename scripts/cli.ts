#!/usr/bin/env node

/**
 * Command line interface for the repository scout
 */

import { existsSync, realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { CandidateScorer } from './candidate-scorer.js';
import { ConfigManager, loadEnvironment, SelectorConfig, validateEnvironment } from './config.js';
import { createDeepAnalyzer, isFetchFailure, SCORE_WEIGHTS } from './deep-analyzer.js';
import { reportError } from './error-handler.js';
import {
  defaultExportFilename,
  EXPORT_FORMATS,
  isExportFormat,
  summarizeRepositories,
  writeExport
} from './export.js';
import { FreshnessSearchOrchestrator, FreshSearchResult } from './freshness-search.js';
import { createGitHubClient, RepositoryLookups } from './github-client.js';
import { HistoryStoreOptions, openHistoryStore, SqliteHistoryStore } from './history-store.js';
import { GitHubSearchProvider, SearchProvider } from './search-provider.js';
import type { SuitabilityAnalysis, TrackedRepository } from './types.js';
import {
  parseIntegerOption,
  parseRepositoryReference,
  validateSearchParams,
  ValidationError
} from './validation.js';

const VALUE_OPTIONS = new Set([
  '--min-stars',
  '--max-stars',
  '--limit',
  '--days-filter',
  '--days',
  '--format',
  '--output',
  '--user',
  '--config'
]);

const DEFAULT_CLEANUP_DAYS = 90;

export interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  flags: Set<string>;
  values: Map<string, string>;
}

/**
 * Collaborators the commands are built from; tests swap in fakes
 */
export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  openStore?: (options: HistoryStoreOptions) => Promise<SqliteHistoryStore>;
  createProvider?: (config: SelectorConfig) => SearchProvider;
  createLookups?: (config: SelectorConfig) => RepositoryLookups;
  now?: () => Date;
}

/**
 * Split argv into command, positionals, boolean flags and valued options
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Set<string>();
  const values = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (!arg.startsWith('-') || arg === '-') {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq > 0 ? arg.slice(0, eq) : arg;

    if (VALUE_OPTIONS.has(name)) {
      const value = eq > 0 ? arg.slice(eq + 1) : argv[++i];
      if (value === undefined || value === '') {
        throw new ValidationError(`${name} requires a value`, name);
      }
      values.set(name, value);
    } else {
      flags.add(name);
    }
  }

  return {
    command: positionals[0],
    positionals: positionals.slice(1),
    flags,
    values
  };
}

function optionalInteger(args: ParsedArgs, name: string): number | undefined {
  const raw = args.values.get(name);
  return raw === undefined ? undefined : parseIntegerOption(name, raw);
}

function printHelp(): void {
  console.log(`
Repository Scout

Find well-scoped open source repositories for a first contribution and
keep a per-user history so repeated searches surface fresh results.

Usage: repo-scout <command> [options]

Commands:
  search              Search GitHub for fresh candidate repositories
  analyze <repo>      Deep suitability analysis of owner/repo or a GitHub URL
  stats               Show your history statistics
  cleanup --confirm   Delete unanalyzed history older than --days (default 90)
  reset --confirm     Delete all of your tracked repositories and searches
  info                Show selection criteria and usage examples
  export              Export your history (--format json|yaml|csv|markdown)
  backup              Copy the history database (--output <path>)

Search options:
  --min-stars <n>     Minimum stars
  --max-stars <n>     Maximum stars
  --limit <n>         Results per search attempt (1-100)
  --days-filter <n>   Hide repositories shown in the last n days
  --fresh-only        Only show repositories not seen recently (default)
  --allow-repeats     Include repositories you have seen before
  --force-refresh     Ignore all history filtering
  --export-csv        Also write the results to a CSV file

Global options:
  --user <id>         History owner (default: REPO_SCOUT_USER or $USER)
  --config <path>     YAML config file (default: repo-scout.yml)
  --verbose, -v       Enable verbose logging
  --help, -h          Show this help message

Examples:
  repo-scout search --limit 20
  repo-scout search --days-filter 14
  repo-scout analyze owner/repo
  repo-scout export --format csv --output history.csv
`);
}

function printNoResultsGuidance(): void {
  console.log('❌ No fresh repositories found. Try adjusting your search parameters.');
  console.log('💡 Try: --allow-repeats to see repos you have seen before');
  console.log('💡 Or: --force-refresh to ignore all filtering');
  console.log('💡 Or: change --min-stars and --max-stars range');
}

function printSearchResults(result: FreshSearchResult, targetLanguage: string): void {
  console.log(`✅ Found ${result.results.length} fresh repositories for you!\n`);

  result.results.forEach((repo, index) => {
    const position = String(index + 1).padStart(2, ' ');
    console.log(`${position}. ${repo.isNew ? '🆕' : '🔁'} ${repo.repoName}`);
    console.log(`    ⭐ ${repo.stars.toLocaleString('en-US')} stars | 📜 ${repo.license} | 📊 ${repo.languagePercentage} ${targetLanguage}`);
    console.log(`    🔗 ${repo.url}`);
    if (repo.description) {
      console.log(`    📝 ${repo.description}`);
    }
    console.log();
  });
}

function printAnalysis(analysis: SuitabilityAnalysis): void {
  const { scores } = analysis;

  console.log(`\n📊 Repository Analysis: ${analysis.repoName}`);
  if (analysis.repository) {
    console.log(`⭐ Stars: ${analysis.repository.stars.toLocaleString('en-US')}`);
    console.log(`📜 License: ${analysis.repository.license}`);
    console.log(`📝 Description: ${analysis.repository.description || 'No description'}`);
  }

  const emoji = analysis.overallScore >= 4.2 ? '🟢' : analysis.overallScore >= 3.5 ? '🟡' : '🔴';
  console.log(`\n${emoji} Overall Suitability Score: ${analysis.overallScore.toFixed(1)}/5.0`);

  console.log('\n📈 Detailed Scoring:');
  console.log(`🔥 Activity Score: ${scores.activity.toFixed(1)}/5.0 (${SCORE_WEIGHTS.activity}% weight)`);
  console.log(`🎯 Opportunity Score: ${scores.opportunity.toFixed(1)}/5.0 (${SCORE_WEIGHTS.opportunity}% weight)`);
  console.log(`⚙️ Complexity Score: ${scores.complexity.toFixed(1)}/5.0 (${SCORE_WEIGHTS.complexity}% weight)`);
  console.log(`🔧 Maintainability Score: ${scores.maintainability.toFixed(1)}/5.0 (${SCORE_WEIGHTS.maintainability}% weight)`);

  console.log('\n💡 Recommendation:');
  console.log(`   ${analysis.recommendation}`);

  if (analysis.opportunities.length > 0) {
    console.log(`\n🎯 Contribution Opportunities Found (${analysis.opportunities.length}):`);
    analysis.opportunities.forEach((opportunity, index) => {
      console.log(`  ${index + 1}. [${opportunity.type}] ${opportunity.title}`);
      console.log(`     🔗 ${opportunity.url}`);
    });
  } else {
    console.log('\n🔍 No specific contribution opportunities found');
  }

  if (analysis.reasons.length > 0) {
    console.log('\n✅ Positive Factors:');
    analysis.reasons.forEach(reason => console.log(`   ${reason}`));
  }
  if (analysis.warnings.length > 0) {
    console.log('\n⚠️ Potential Issues:');
    analysis.warnings.forEach(warning => console.log(`   ${warning}`));
  }
}

function printTracked(repos: TrackedRepository[]): void {
  for (const repo of repos) {
    const score = repo.analysisScore === null ? '' : ` | 🎯 ${repo.analysisScore}/5`;
    console.log(`   • ${repo.repoName} (⭐ ${repo.stars.toLocaleString('en-US')}${score})`);
  }
}

class CommandRunner {
  private config: SelectorConfig;
  private args: ParsedArgs;
  private deps: CliDependencies;
  private store: SqliteHistoryStore | null = null;

  constructor(config: SelectorConfig, args: ParsedArgs, deps: CliDependencies) {
    this.config = config;
    this.args = args;
    this.deps = deps;
  }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  private async openStore(): Promise<SqliteHistoryStore> {
    if (!this.store) {
      const options: HistoryStoreOptions = {
        databasePath: this.config.storage.databasePath,
        userId: this.config.storage.userId,
        clock: () => this.now()
      };
      this.store = this.deps.openStore ? await this.deps.openStore(options) : await openHistoryStore(options);
    }
    return this.store;
  }

  close(): void {
    this.store?.close();
    this.store = null;
  }

  private requireToken(): boolean {
    const environment = validateEnvironment(this.config);
    environment.errors.forEach(error => console.error(`❌ ${error}`));
    return environment.valid;
  }

  async run(command: string): Promise<number> {
    switch (command) {
      case 'search':
        return this.search();
      case 'analyze':
        return this.analyze();
      case 'stats':
        return this.stats();
      case 'cleanup':
        return this.cleanup();
      case 'reset':
        return this.reset();
      case 'info':
        return this.info();
      case 'export':
        return this.exportHistory();
      case 'backup':
        return this.backup();
      default:
        console.error(`❌ Unknown command: ${command}`);
        console.log('💡 Run repo-scout --help to see available commands');
        return 1;
    }
  }

  private async search(): Promise<number> {
    const { flags } = this.args;
    const params = {
      minStars: optionalInteger(this.args, '--min-stars') ?? this.config.search.minStars,
      maxStars: optionalInteger(this.args, '--max-stars') ?? this.config.search.maxStars,
      limit: optionalInteger(this.args, '--limit') ?? this.config.search.limit,
      daysFilter: optionalInteger(this.args, '--days-filter') ?? this.config.search.daysFilter,
      freshOnly: !flags.has('--allow-repeats'),
      forceRefresh: flags.has('--force-refresh'),
      targetCount: this.config.search.targetCount,
      maxAttempts: this.config.search.maxAttempts
    };

    const validation = validateSearchParams(params);
    if (!validation.valid) {
      validation.errors.forEach(error => console.error(`❌ ${error}`));
      return 1;
    }
    if (!this.requireToken()) {
      return 1;
    }

    const store = await this.openStore();
    const provider = this.deps.createProvider
      ? this.deps.createProvider(this.config)
      : new GitHubSearchProvider(createGitHubClient(this.config.github), this.config.criteria.targetLanguage);
    const orchestrator = new FreshnessSearchOrchestrator(
      provider,
      new CandidateScorer(this.config.criteria),
      store,
      { verbose: flags.has('--verbose') || flags.has('-v') }
    );

    console.log('⚡ Repository search');
    console.log(`👤 User: ${store.getUserId()}`);

    const result = await orchestrator.findFreshCandidates(params);
    if (result.startingOffset > 0) {
      console.log(`🔄 Search offset: ${result.startingOffset} (for fresh GitHub results)`);
    }
    result.warnings.forEach(warning => console.log(`⚠️ ${warning}`));

    if (result.results.length === 0) {
      printNoResultsGuidance();
      return 0;
    }

    printSearchResults(result, this.config.criteria.targetLanguage);
    const stats = await store.stats();
    console.log(`📊 History: ${stats.total} repos tracked, ${stats.recent} shown recently (user: ${stats.userId})`);
    console.log(`✅ Rate limit remaining: ${result.rateLimitRemaining}`);

    if (flags.has('--export-csv')) {
      const tracked: TrackedRepository[] = [];
      for (const repo of result.results) {
        const row = await store.getRepository(repo.repoName);
        if (row) {
          tracked.push(row);
        }
      }
      const output = this.args.values.get('--output') ?? defaultExportFilename(store.getUserId(), 'csv', this.now());
      writeExport(tracked, 'csv', output, this.now());
      console.log(`✅ Results exported to ${output}`);
    }

    return 0;
  }

  private async analyze(): Promise<number> {
    const input = this.args.positionals[0];
    const reference = input ? parseRepositoryReference(input) : null;
    if (!reference) {
      console.error('❌ Invalid format. Use: owner/repo or full GitHub URL');
      return 1;
    }
    if (!this.requireToken()) {
      return 1;
    }

    const lookups = this.deps.createLookups ? this.deps.createLookups(this.config) : createGitHubClient(this.config.github);
    const analyzer = createDeepAnalyzer(lookups, this.config.criteria.targetLanguage, () => this.now());

    console.log(`🔍 Analyzing ${reference.owner}/${reference.repo}...`);
    const analysis = await analyzer.analyze(reference.owner, reference.repo);

    if (isFetchFailure(analysis)) {
      console.error(`❌ Could not analyze repository ${analysis.repoName}`);
      analysis.warnings.slice(1).forEach(warning => console.error(`   ${warning}`));
      console.log('💡 Make sure the repository exists and your GitHub token is valid');
      return 1;
    }

    printAnalysis(analysis);

    if (analysis.overallScore > 0 && analysis.repository) {
      const store = await this.openStore();
      const saved = await store.recordAnalysis({
        repoName: analysis.repoName,
        stars: analysis.repository.stars,
        license: analysis.repository.license,
        languagePercentage: '',
        estimatedFileCount: 0,
        url: analysis.repository.url,
        description: analysis.repository.description,
        passesCriteria: analysis.isSuitable,
        analysisScore: analysis.overallScore
      });
      console.log(saved ? '\n💾 Analysis saved to your history' : '\n⚠️ Could not save analysis to your history');
    }

    return 0;
  }

  private async stats(): Promise<number> {
    const store = await this.openStore();
    const stats = await store.stats();

    console.log(`📊 Repository History Statistics (user: ${stats.userId})`);
    console.log(`   Total repositories tracked:     ${stats.total}`);
    console.log(`   Repositories passing criteria:  ${stats.passing}`);
    console.log(`   Repositories shown recently:    ${stats.recent}`);
    console.log(`   Total searches performed:       ${stats.searches}`);
    console.log(`   Average analysis score:         ${stats.averageAnalysisScore}`);

    const top = await store.topAnalyzed(5);
    if (top.length > 0) {
      console.log('\n🏆 Top analyzed repositories:');
      printTracked(top);
    }

    const searches = await store.recentSearches(3);
    if (searches.length > 0) {
      console.log('\n🕑 Recent searches:');
      for (const search of searches) {
        console.log(`   • ${search.searchedAt.slice(0, 16).replace('T', ' ')} ${search.minStars}..${search.maxStars} stars, ${search.newReposShown}/${search.reposFound} new`);
      }
    }

    if (stats.total > 0) {
      console.log('\n💡 Use --days-filter to control freshness (default: 7 days)');
      console.log('💡 Use --allow-repeats to see repos you have seen before');
      console.log('💡 Use --force-refresh to ignore all filtering');
    }
    return 0;
  }

  private async cleanup(): Promise<number> {
    if (!this.args.flags.has('--confirm')) {
      console.log('⚠️ This will delete old repository data. Use --confirm to proceed.');
      return 0;
    }

    const days = optionalInteger(this.args, '--days') ?? DEFAULT_CLEANUP_DAYS;
    if (days < 0) {
      console.error('❌ --days must be a non-negative integer');
      return 1;
    }

    const store = await this.openStore();
    const deleted = await store.cleanup(days);
    console.log(`🗑️ Cleanup complete. Removed ${deleted} old entries.`);
    return 0;
  }

  private async reset(): Promise<number> {
    if (!this.args.flags.has('--confirm')) {
      console.log('⚠️ This will delete ALL your tracked repositories. Use --confirm to proceed.');
      return 0;
    }

    const store = await this.openStore();
    await store.reset();
    console.log('✅ Reset complete. All repository history cleared.');
    return 0;
  }

  private info(): number {
    const { search, criteria } = this.config;

    console.log('🚀 Repository Scout');
    console.log('\n📋 Selection Criteria:');
    console.log(`   • Search range: ${search.minStars.toLocaleString('en-US')} - ${search.maxStars.toLocaleString('en-US')} stars`);
    console.log(`   • Fewer than ${criteria.maxStars.toLocaleString('en-US')} stars to pass`);
    console.log(`   • ${criteria.targetLanguage} share above ${(criteria.minLanguageFraction * 100).toFixed(0)}% of the codebase`);
    console.log(`   • Estimated files: ${criteria.minFileEstimate}-${criteria.maxFileEstimate}`);
    console.log(`   • License: must be in the approved list (${criteria.allowedLicenses.length} allowed)`);

    console.log('\n🔄 Fresh Results:');
    console.log(`   • Up to ${search.maxAttempts} search strategies per run, aiming for ${search.targetCount} fresh repositories`);
    console.log(`   • Repositories shown in the last ${search.daysFilter} days are hidden`);
    console.log(`   • History is kept per user in ${this.config.storage.databasePath} (user: ${this.config.storage.userId})`);
    return 0;
  }

  private async exportHistory(): Promise<number> {
    const format = this.args.values.get('--format') ?? 'json';
    if (!isExportFormat(format)) {
      console.error(`❌ Unknown format: ${format}. Use one of: ${EXPORT_FORMATS.join(', ')}`);
      return 1;
    }

    const store = await this.openStore();
    const repos = await store.listRepositories();
    if (repos.length === 0) {
      console.log('❌ No repositories to export');
      return 0;
    }

    const output = this.args.values.get('--output') ?? defaultExportFilename(store.getUserId(), format, this.now());
    const count = writeExport(repos, format, output, this.now());
    const summary = summarizeRepositories(repos);

    console.log(`✅ Exported ${count} repositories to ${output}`);
    console.log(`   Passing criteria: ${summary.passingCriteria}/${summary.totalRepositories}`);
    console.log(`   Average stars: ${summary.averageStars.toLocaleString('en-US')}`);
    const licenses = summary.licenseDistribution.slice(0, 3).map(entry => `${entry.license} (${entry.count})`);
    console.log(`   Top licenses: ${licenses.join(', ')}`);
    return 0;
  }

  private async backup(): Promise<number> {
    const store = await this.openStore();
    const path = await store.backup(this.args.values.get('--output'));
    if (!path) {
      console.error('❌ Backup failed');
      return 1;
    }
    console.log(`✅ History backed up to: ${path}`);
    return 0;
  }
}

/**
 * Run one CLI invocation
 * @returns Process exit code
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  if (!args.command || args.command === 'help' || args.flags.has('--help') || args.flags.has('-h')) {
    printHelp();
    return 0;
  }

  let runner: CommandRunner | null = null;
  try {
    const manager = new ConfigManager(args.values.get('--config') ?? 'repo-scout.yml', deps.env ?? process.env);
    const userId = args.values.get('--user');
    const config = manager.loadConfig(userId ? { storage: { userId } } : {});

    runner = new CommandRunner(config, args, deps);
    return await runner.run(args.command);
  } catch (error) {
    if (error instanceof ValidationError) {
      console.error(`❌ ${error.message}`);
    } else {
      reportError(error);
    }
    return 1;
  } finally {
    runner?.close();
  }
}

async function main(): Promise<void> {
  loadEnvironment();
  const code = await runCli(process.argv.slice(2));
  process.exit(code);
}

function isDirectRun(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && existsSync(entry) && realpathSync(entry) === fileURLToPath(import.meta.url);
}

if (isDirectRun()) {
  main().catch(error => {
    reportError(error);
    process.exit(1);
  });
}
