/**
 * Pass/fail scoring of search candidates against the contribution criteria
 */

import type { CriteriaConfig } from './config.js';
import type { CandidateLicense, CandidateRepository, ScoredCandidate } from './types.js';

const DESCRIPTION_LIMIT = 100;
const FILE_ESTIMATE_FACTOR = 30;

export type ScoringCriteria = Pick<CriteriaConfig, 'targetLanguage' | 'maxStars' | 'minLanguageFraction' | 'allowedLicenses'>;

function normalizeLicense(value: string): string {
  return value.toUpperCase().replace(/[-_\s]/g, '');
}

/**
 * Whether a license identifier matches an entry of the allow-list
 */
export function isLicenseAllowed(identifier: string | null, allowedLicenses: string[]): boolean {
  if (!identifier) {
    return false;
  }

  const normalized = normalizeLicense(identifier);
  return allowedLicenses.some(allowed => {
    const candidate = normalizeLicense(allowed);
    return candidate.length > 0 && (normalized === candidate || normalized.includes(candidate));
  });
}

/**
 * Match a license by SPDX id first, then by name
 * @returns The label to display and whether it is allowed
 */
export function resolveLicense(
  license: CandidateLicense | null,
  allowedLicenses: string[]
): { label: string; ok: boolean } {
  if (!license) {
    return { label: 'Unknown', ok: false };
  }
  if (isLicenseAllowed(license.spdxId, allowedLicenses)) {
    return { label: license.spdxId ?? 'Unknown', ok: true };
  }
  if (isLicenseAllowed(license.name, allowedLicenses)) {
    return { label: license.name ?? 'Unknown', ok: true };
  }
  return { label: license.spdxId || license.name || 'Unknown', ok: false };
}

/**
 * Share of the repository's bytes written in the target language
 */
export function languageFraction(repository: CandidateRepository, targetLanguage: string): number {
  if (repository.totalLanguageBytes <= 0) {
    return 0;
  }

  const target = targetLanguage.toLowerCase();
  const bytes = repository.languages
    .filter(language => language.name.toLowerCase() === target)
    .reduce((sum, language) => sum + language.bytes, 0);

  return bytes / repository.totalLanguageBytes;
}

/**
 * Rough file count derived from the language share
 */
export function estimateFileCount(fraction: number): number {
  return Math.max(1, Math.floor(fraction * FILE_ESTIMATE_FACTOR));
}

function truncateDescription(description: string): string {
  return description.length > DESCRIPTION_LIMIT
    ? `${description.slice(0, DESCRIPTION_LIMIT)}...`
    : description;
}

/**
 * Scores candidates. Pure: no I/O, no state beyond the criteria.
 */
export class CandidateScorer {
  constructor(private criteria: ScoringCriteria) {}

  score(repository: CandidateRepository): ScoredCandidate {
    const license = resolveLicense(repository.license, this.criteria.allowedLicenses);
    const fraction = languageFraction(repository, this.criteria.targetLanguage);

    return {
      repoName: repository.fullName,
      stars: repository.stars,
      license: license.label,
      licenseOk: license.ok,
      languageFraction: fraction,
      languagePercentage: `${(fraction * 100).toFixed(1)}%`,
      estimatedFileCount: estimateFileCount(fraction),
      url: repository.url,
      description: truncateDescription(repository.description),
      passesCriteria: license.ok &&
        repository.stars < this.criteria.maxStars &&
        fraction > this.criteria.minLanguageFraction
    };
  }

  scoreAll(repositories: CandidateRepository[]): ScoredCandidate[] {
    return repositories.map(repository => this.score(repository));
  }
}

/**
 * Keep only candidates that pass the criteria, in their original order
 */
export function filterGoodCandidates(candidates: ScoredCandidate[]): ScoredCandidate[] {
  return candidates.filter(candidate => candidate.passesCriteria);
}
