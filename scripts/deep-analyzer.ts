/**
 * Deep suitability analysis of a single repository
 */

import { attempt, ErrorCode, LookupResult } from './error-handler.js';
import type { ContentEntry, RepositoryDetails, RepositoryLookups } from './github-client.js';
import type {
  Clock,
  ComponentScores,
  ContributionOpportunity,
  OpportunityType,
  RecommendationLevel,
  SuitabilityAnalysis
} from './types.js';

export const REPOSITORY_NOT_FOUND_WARNING = 'Could not fetch repository data';

export const SUITABILITY_THRESHOLD = 3.5;

// Percent weights: activity, opportunity, complexity, maintainability
export const SCORE_WEIGHTS = {
  activity: 30,
  opportunity: 35,
  complexity: 20,
  maintainability: 15
} as const;

const RECOMMENDATIONS: Array<{ min: number; level: RecommendationLevel; text: string }> = [
  { min: 4.2, level: 'excellent', text: '🎯 EXCELLENT choice for a first contribution. High activity with great opportunities.' },
  { min: 3.5, level: 'good', text: '✅ GOOD choice. Should have suitable contribution opportunities.' },
  { min: 2.5, level: 'moderate', text: '⚠️ MODERATE choice. May require more effort to find good contribution opportunities.' },
  { min: -Infinity, level: 'not-recommended', text: '❌ NOT RECOMMENDED. Consider looking for more active repositories with clearer opportunities.' }
];

const OPPORTUNITY_LABELS: Array<{ type: OpportunityType; label: string; cap: number; weight: number }> = [
  { type: 'good-first-issue', label: 'good first issue', cap: 3, weight: 1.0 },
  { type: 'help-wanted', label: 'help wanted', cap: 2, weight: 0.8 },
  { type: 'bug', label: 'bug', cap: 2, weight: 0.6 }
];

const MAX_SCORE = 5;
const MAX_OPPORTUNITIES = 5;
const TITLE_LIMIT = 60;
const DAY_MS = 24 * 60 * 60 * 1000;

interface PartialScore {
  score: number;
  reasons: string[];
  warnings: string[];
}

export interface DeepAnalyzerOptions {
  targetLanguage: string;
  clock?: Clock;
}

/**
 * Round to one decimal, half away from zero
 */
export function roundToTenth(value: number): number {
  // toFixed strips binary noise such as 46.49999999 before rounding
  return Math.round(Number((value * 10).toFixed(6))) / 10;
}

/**
 * Weighted combination of the four component scores
 */
export function combineScores(scores: ComponentScores): number {
  const weighted =
    scores.activity * SCORE_WEIGHTS.activity +
    scores.opportunity * SCORE_WEIGHTS.opportunity +
    scores.complexity * SCORE_WEIGHTS.complexity +
    scores.maintainability * SCORE_WEIGHTS.maintainability;

  return roundToTenth(weighted / 100);
}

export function recommendationFor(overallScore: number): { level: RecommendationLevel; text: string } {
  const bucket = RECOMMENDATIONS.find(entry => overallScore >= entry.min) ?? RECOMMENDATIONS[RECOMMENDATIONS.length - 1];
  return { level: bucket.level, text: bucket.text };
}

/**
 * Score from days since the most recent commit
 */
export function activityBand(daysSinceCommit: number): number {
  if (daysSinceCommit <= 7) return 5;
  if (daysSinceCommit <= 30) return 4;
  if (daysSinceCommit <= 90) return 3;
  if (daysSinceCommit <= 180) return 2;
  return 1;
}

/**
 * Size/language/description score, before lookups
 */
export function assessComplexity(details: RepositoryDetails, targetLanguage: string): PartialScore {
  const reasons: string[] = [];
  const warnings: string[] = [];
  const sizeMb = details.sizeKb / 1024;
  const sizeLabel = `${sizeMb.toFixed(0)} MB`;
  let score: number;

  if (sizeMb > 200) {
    score = 2;
    warnings.push(`⚠️ Very large repository (${sizeLabel})`);
  } else if (sizeMb > 100) {
    score = 3;
    warnings.push(`⚠️ Large repository (${sizeLabel})`);
  } else if (sizeMb > 50) {
    score = 4;
    reasons.push(`⚠️ Medium-sized repository (${sizeLabel})`);
  } else {
    score = 5;
    reasons.push(`✅ Manageable size (${sizeLabel})`);
  }

  if (details.language !== null && details.language.toLowerCase() === targetLanguage.toLowerCase()) {
    reasons.push(`✅ ${targetLanguage}-primary repository`);
  } else {
    score = Math.max(1, score - 1);
  }

  if (details.description.length > 50) {
    reasons.push('✅ Well documented');
  } else {
    score = Math.max(1, score - 0.5);
  }

  return { score: Math.min(Math.max(score, 0), MAX_SCORE), reasons, warnings };
}

/**
 * Score from the root directory listing
 */
export function assessMaintainability(contents: ContentEntry[]): PartialScore {
  const files = contents
    .filter(entry => entry.type === 'file')
    .map(entry => entry.name.toLowerCase());
  const reasons: string[] = [];
  let score = 0;

  if (files.some(file => file.includes('contributing'))) {
    score += 2;
    reasons.push('✅ Has contributing guidelines');
  }
  if (files.includes('readme.md') || files.includes('readme.rst')) {
    score += 1.5;
    reasons.push('✅ Has README');
  }
  if (files.some(file => file.includes('license'))) {
    score += 1.5;
    reasons.push('✅ Has license file');
  }

  return { score: Math.min(score, MAX_SCORE), reasons, warnings: [] };
}

function truncateTitle(title: string): string {
  return title.length > TITLE_LIMIT ? `${title.slice(0, TITLE_LIMIT)}...` : title;
}

/**
 * Whether an analysis failed because the repository could not be fetched
 */
export function isFetchFailure(analysis: SuitabilityAnalysis): boolean {
  return analysis.warnings.includes(REPOSITORY_NOT_FOUND_WARNING);
}

/**
 * Analyzes a repository through several sequential lookups
 */
export class DeepAnalyzer {
  private lookups: RepositoryLookups;
  private targetLanguage: string;
  private clock: Clock;

  constructor(lookups: RepositoryLookups, options: DeepAnalyzerOptions) {
    this.lookups = lookups;
    this.targetLanguage = options.targetLanguage;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Analyze a repository. Never throws.
   */
  async analyze(owner: string, repo: string): Promise<SuitabilityAnalysis> {
    const repoName = `${owner}/${repo}`;
    const details = await attempt(() => this.lookups.getRepository(owner, repo));

    if (!details.ok) {
      const warnings = [REPOSITORY_NOT_FOUND_WARNING];
      if (details.error.code !== ErrorCode.API_NOT_FOUND) {
        warnings.push(`⚠️ ${details.reason}`);
      }
      return this.emptyAnalysis(repoName, warnings);
    }

    const activity = await this.checkActivity(owner, repo);
    const opportunity = await this.findOpportunities(owner, repo);
    const complexity = assessComplexity(details.value, this.targetLanguage);
    const maintainability = await this.checkMaintainability(owner, repo);

    const scores: ComponentScores = {
      activity: activity.score,
      opportunity: opportunity.score,
      complexity: complexity.score,
      maintainability: maintainability.score
    };
    const overallScore = combineScores(scores);
    const recommendation = recommendationFor(overallScore);

    return {
      repoName,
      repository: {
        fullName: details.value.fullName,
        stars: details.value.stars,
        license: details.value.license ?? 'Unknown',
        description: details.value.description,
        language: details.value.language,
        url: details.value.url,
        sizeKb: details.value.sizeKb
      },
      scores,
      overallScore,
      isSuitable: overallScore >= SUITABILITY_THRESHOLD,
      recommendationLevel: recommendation.level,
      recommendation: recommendation.text,
      reasons: [...activity.reasons, ...complexity.reasons, ...maintainability.reasons],
      warnings: [...activity.warnings, ...opportunity.warnings, ...complexity.warnings, ...maintainability.warnings],
      opportunities: opportunity.items
    };
  }

  private emptyAnalysis(repoName: string, warnings: string[]): SuitabilityAnalysis {
    const recommendation = recommendationFor(0);
    return {
      repoName,
      repository: null,
      scores: { activity: 0, opportunity: 0, complexity: 0, maintainability: 0 },
      overallScore: 0,
      isSuitable: false,
      recommendationLevel: recommendation.level,
      recommendation: recommendation.text,
      reasons: [],
      warnings,
      opportunities: []
    };
  }

  private daysSince(date: string): number {
    return Math.floor((this.clock().getTime() - Date.parse(date)) / DAY_MS);
  }

  private async checkActivity(owner: string, repo: string): Promise<PartialScore> {
    const reasons: string[] = [];
    const warnings: string[] = [];

    const commits = await attempt(() => this.lookups.listRecentCommits(owner, repo, 5));
    if (!commits.ok) {
      return { score: 0, reasons, warnings: [`⚠️ Could not check activity: ${commits.reason}`] };
    }

    const latest = commits.value.find(commit => commit.date !== null);
    if (!latest || latest.date === null) {
      return { score: 0, reasons, warnings };
    }

    const days = this.daysSince(latest.date);
    let score = activityBand(days);
    const recency = `(last commit ${days} days ago)`;

    if (score >= 4) {
      reasons.push(`✅ Recently active ${recency}`);
    } else if (score === 3) {
      reasons.push(`⚠️ Moderately active ${recency}`);
    } else if (score === 2) {
      reasons.push(`⚠️ Less active ${recency}`);
    } else {
      warnings.push(`❌ Low activity ${recency}`);
    }

    const discussion = await attempt(() => this.lookups.listOpenIssues(owner, repo, { perPage: 1 }));
    if (!discussion.ok) {
      warnings.push(`⚠️ Could not check issue activity: ${discussion.reason}`);
    } else if (discussion.value.hasNextPage) {
      score += 0.5;
      reasons.push('📋 Active issue discussions');
    }

    return { score: Math.min(score, MAX_SCORE), reasons, warnings };
  }

  private async findOpportunities(
    owner: string,
    repo: string
  ): Promise<PartialScore & { items: ContributionOpportunity[] }> {
    const items: ContributionOpportunity[] = [];
    const warnings: string[] = [];
    let score = 0;

    for (const { type, label, cap, weight } of OPPORTUNITY_LABELS) {
      const result: LookupResult<{ issues: Array<{ title: string; url: string }> }> =
        await attempt(() => this.lookups.listOpenIssues(owner, repo, { labels: label, perPage: 5 }));

      if (!result.ok) {
        warnings.push(`⚠️ Could not check "${label}" issues: ${result.reason}`);
        continue;
      }

      const counted = result.value.issues.slice(0, cap);
      score += counted.length * weight;
      for (const issue of counted) {
        items.push({ type, title: truncateTitle(issue.title), url: issue.url });
      }
    }

    return {
      score: Math.min(roundToTenth(score), MAX_SCORE),
      reasons: [],
      warnings,
      items: items.slice(0, MAX_OPPORTUNITIES)
    };
  }

  private async checkMaintainability(owner: string, repo: string): Promise<PartialScore> {
    const contents = await attempt(() => this.lookups.listRootContents(owner, repo));
    if (!contents.ok) {
      return { score: 0, reasons: [], warnings: [`⚠️ Could not check maintainability: ${contents.reason}`] };
    }
    return assessMaintainability(contents.value);
  }
}

/**
 * Create analyzer from configuration
 */
export function createDeepAnalyzer(lookups: RepositoryLookups, targetLanguage: string, clock?: Clock): DeepAnalyzer {
  return new DeepAnalyzer(lookups, { targetLanguage, clock });
}
