/**
 * Core data types for the repository scout
 */

export type Clock = () => Date;

export interface LanguageShare {
  name: string;
  bytes: number;
}

export interface CandidateLicense {
  spdxId: string | null;        // "MIT", "NOASSERTION"
  name: string | null;          // "MIT License"
}

/**
 * Repository as returned by one search call, before scoring
 */
export interface CandidateRepository {
  fullName: string;             // "owner/repo"
  stars: number;
  license: CandidateLicense | null;
  description: string;
  url: string;
  languages: LanguageShare[];
  totalLanguageBytes: number;
  topics: string[];
  pushedAt: string | null;
}

export interface ScoredCandidate {
  repoName: string;
  stars: number;
  license: string;              // SPDX id, license name or "Unknown"
  licenseOk: boolean;
  languageFraction: number;     // 0..1 share of target-language bytes
  languagePercentage: string;   // "80.0%"
  estimatedFileCount: number;
  url: string;
  description: string;
  passesCriteria: boolean;
  isNew?: boolean;
}

export interface RateLimitSnapshot {
  remaining: number;
  cost: number;
}

export type SearchCriteria =
  | { type: 'search'; minStars: number; maxStars: number; limit: number }
  | { type: 'manual_analysis' };

/**
 * One observation of a repository handed to the history store
 */
export interface RepositoryObservation {
  repoName: string;
  stars: number;
  license: string;
  languagePercentage: string;
  estimatedFileCount: number;
  url: string;
  description: string;
  passesCriteria: boolean;
  analysisScore?: number | null;
}

/**
 * Repository persisted in a user's history
 */
export interface TrackedRepository {
  userId: string;
  repoName: string;
  stars: number;
  license: string;
  languagePercentage: string;
  estimatedFileCount: number;
  url: string;
  description: string;
  firstShown: string;           // ISO timestamp
  lastShown: string;            // ISO timestamp, >= firstShown
  showCount: number;            // >= 1
  passesCriteria: boolean;
  analysisScore: number | null; // 0..5 when present
  searchCriteria: SearchCriteria | null;
}

export interface SearchEvent {
  userId: string;
  searchedAt: string;
  minStars: number;
  maxStars: number;
  limitRequested: number;
  reposFound: number;
  newReposShown: number;
  criteria: SearchCriteria;
  offset: number;
}

export interface HistoryStats {
  userId: string;
  total: number;
  passing: number;
  recent: number;
  searches: number;
  averageAnalysisScore: number;
}

export type OpportunityType = 'good-first-issue' | 'help-wanted' | 'bug';

export interface ContributionOpportunity {
  type: OpportunityType;
  title: string;
  url: string;
}

export type RecommendationLevel = 'excellent' | 'good' | 'moderate' | 'not-recommended';

export interface ComponentScores {
  activity: number;
  opportunity: number;
  complexity: number;
  maintainability: number;
}

export interface RepositorySummary {
  fullName: string;
  stars: number;
  license: string;
  description: string;
  language: string | null;
  url: string;
  sizeKb: number;
}

export interface SuitabilityAnalysis {
  repoName: string;
  repository: RepositorySummary | null;
  scores: ComponentScores;
  overallScore: number;         // 0..5, one decimal
  isSuitable: boolean;
  recommendationLevel: RecommendationLevel;
  recommendation: string;
  reasons: string[];
  warnings: string[];
  opportunities: ContributionOpportunity[];   // at most 5
}
