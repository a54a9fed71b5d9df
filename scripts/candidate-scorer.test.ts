/**
 * Unit tests for CandidateScorer
 */

import { describe, it, expect } from 'vitest';
import {
  CandidateScorer,
  estimateFileCount,
  filterGoodCandidates,
  isLicenseAllowed,
  languageFraction,
  resolveLicense
} from './candidate-scorer.js';
import { CandidateRepository } from './types.js';

const criteria = {
  targetLanguage: 'Python',
  maxStars: 10000,
  minLanguageFraction: 0.7,
  allowedLicenses: ['MIT', 'Apache-2.0', 'BSD-3-Clause']
};

const createRepo = (overrides: Partial<CandidateRepository> = {}): CandidateRepository => ({
  fullName: 'octo/sample',
  stars: 2000,
  license: { spdxId: 'MIT', name: 'MIT License' },
  description: 'A sample project',
  url: 'https://github.com/octo/sample',
  languages: [
    { name: 'Python', bytes: 800 },
    { name: 'Shell', bytes: 200 }
  ],
  totalLanguageBytes: 1000,
  topics: [],
  pushedAt: null,
  ...overrides
});

describe('CandidateScorer', () => {
  const scorer = new CandidateScorer(criteria);

  it('should pass a small MIT repository that is mostly Python', () => {
    const scored = scorer.score(createRepo());

    expect(scored.languageFraction).toBe(0.8);
    expect(scored.languagePercentage).toBe('80.0%');
    expect(scored.estimatedFileCount).toBe(24);
    expect(scored.license).toBe('MIT');
    expect(scored.licenseOk).toBe(true);
    expect(scored.passesCriteria).toBe(true);
  });

  it('should apply the star ceiling exclusively', () => {
    expect(scorer.score(createRepo({ stars: 9999 })).passesCriteria).toBe(true);
    expect(scorer.score(createRepo({ stars: 10000 })).passesCriteria).toBe(false);
  });

  it('should require strictly more than the minimum language share', () => {
    const atThreshold = createRepo({
      languages: [{ name: 'Python', bytes: 700 }, { name: 'C', bytes: 300 }],
      totalLanguageBytes: 1000
    });
    const justAbove = createRepo({
      languages: [{ name: 'Python', bytes: 7000001 }, { name: 'C', bytes: 2999999 }],
      totalLanguageBytes: 10000000
    });

    expect(scorer.score(atThreshold).passesCriteria).toBe(false);
    expect(scorer.score(justAbove).passesCriteria).toBe(true);
  });

  it('should fail repositories without license information', () => {
    const scored = scorer.score(createRepo({ license: null }));

    expect(scored.license).toBe('Unknown');
    expect(scored.licenseOk).toBe(false);
    expect(scored.passesCriteria).toBe(false);
  });

  it('should fall back to the license name when the SPDX id is not allowed', () => {
    const scored = scorer.score(createRepo({ license: { spdxId: 'NOASSERTION', name: 'The MIT License' } }));

    expect(scored.license).toBe('The MIT License');
    expect(scored.licenseOk).toBe(true);
  });

  it('should report zero share when no language bytes are known', () => {
    const scored = scorer.score(createRepo({ languages: [], totalLanguageBytes: 0 }));

    expect(scored.languageFraction).toBe(0);
    expect(scored.languagePercentage).toBe('0.0%');
    expect(scored.estimatedFileCount).toBe(1);
    expect(scored.passesCriteria).toBe(false);
  });

  it('should truncate long descriptions to 100 characters', () => {
    const scored = scorer.score(createRepo({ description: 'x'.repeat(150) }));

    expect(scored.description).toBe(`${'x'.repeat(100)}...`);
    expect(scorer.score(createRepo({ description: 'y'.repeat(100) })).description).toBe('y'.repeat(100));
  });
});

describe('license matching', () => {
  it('should ignore case, dashes, underscores and spaces', () => {
    expect(isLicenseAllowed('apache_2.0', criteria.allowedLicenses)).toBe(true);
    expect(isLicenseAllowed('BSD 3 Clause', criteria.allowedLicenses)).toBe(true);
  });

  it('should accept identifiers that contain an allowed entry', () => {
    expect(isLicenseAllowed('MIT License', criteria.allowedLicenses)).toBe(true);
  });

  it('should reject unlisted and missing licenses', () => {
    expect(isLicenseAllowed('GPL-3.0', criteria.allowedLicenses)).toBe(false);
    expect(isLicenseAllowed(null, criteria.allowedLicenses)).toBe(false);
    expect(resolveLicense({ spdxId: null, name: null }, criteria.allowedLicenses)).toEqual({ label: 'Unknown', ok: false });
  });
});

describe('derived values', () => {
  it('should match the target language case-insensitively', () => {
    const repo = createRepo({ languages: [{ name: 'python', bytes: 500 }], totalLanguageBytes: 1000 });
    expect(languageFraction(repo, 'Python')).toBe(0.5);
  });

  it('should never estimate fewer than one file', () => {
    expect(estimateFileCount(0)).toBe(1);
    expect(estimateFileCount(0.02)).toBe(1);
    expect(estimateFileCount(1)).toBe(30);
  });
});

describe('filterGoodCandidates', () => {
  it('should keep passing candidates in their original order', () => {
    const scorer = new CandidateScorer(criteria);
    const scored = scorer.scoreAll([
      createRepo({ fullName: 'a/one' }),
      createRepo({ fullName: 'b/two', stars: 20000 }),
      createRepo({ fullName: 'c/three' }),
      createRepo({ fullName: 'd/four', license: null })
    ]);

    expect(filterGoodCandidates(scored).map(candidate => candidate.repoName)).toEqual(['a/one', 'c/three']);
  });
});
