/**
 * Export tracked repositories to JSON, YAML, CSV or Markdown
 */

import { writeFileSync } from 'fs';
import * as yaml from 'js-yaml';
import { createExportError } from './error-handler.js';
import type { TrackedRepository } from './types.js';

export const EXPORT_FORMATS = ['json', 'yaml', 'csv', 'markdown'] as const;

export type ExportFormat = typeof EXPORT_FORMATS[number];

const EXTENSIONS: Record<ExportFormat, string> = {
  json: 'json',
  yaml: 'yaml',
  csv: 'csv',
  markdown: 'md'
};

const CSV_COLUMNS = [
  'repo_name',
  'stars',
  'license',
  'estimated_file_count',
  'language_percentage',
  'url',
  'description',
  'first_shown',
  'last_shown',
  'show_count',
  'passes_criteria',
  'analysis_score',
  'search_min_stars',
  'search_max_stars',
  'search_limit'
] as const;

type CsvColumn = typeof CSV_COLUMNS[number];

export interface ExportRecord {
  repo_name: string;
  stars: number;
  license: string;
  estimated_file_count: number;
  language_percentage: string;
  url: string;
  description: string;
  first_shown: string;
  last_shown: string;
  show_count: number;
  passes_criteria: boolean;
  analysis_score: number | null;
  search_criteria:
    | { type: 'search'; min_stars: number; max_stars: number; limit: number }
    | { type: 'manual_analysis' }
    | null;
}

export interface ExportDocument {
  export_info: {
    exported_at: string;
    total_repositories: number;
    format: ExportFormat;
  };
  repositories: ExportRecord[];
}

export interface RepositorySummaryStats {
  totalRepositories: number;
  passingCriteria: number;
  averageStars: number;
  licenseDistribution: Array<{ license: string; count: number }>;
  mostRecent: string | null;
}

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some(format => format === value);
}

export function toExportRecord(repo: TrackedRepository): ExportRecord {
  const criteria = repo.searchCriteria;
  return {
    repo_name: repo.repoName,
    stars: repo.stars,
    license: repo.license,
    estimated_file_count: repo.estimatedFileCount,
    language_percentage: repo.languagePercentage,
    url: repo.url,
    description: repo.description,
    first_shown: repo.firstShown,
    last_shown: repo.lastShown,
    show_count: repo.showCount,
    passes_criteria: repo.passesCriteria,
    analysis_score: repo.analysisScore,
    search_criteria: criteria === null
      ? null
      : criteria.type === 'search'
        ? { type: 'search', min_stars: criteria.minStars, max_stars: criteria.maxStars, limit: criteria.limit }
        : { type: 'manual_analysis' }
  };
}

function buildDocument(repos: TrackedRepository[], format: ExportFormat, now: Date): ExportDocument {
  return {
    export_info: {
      exported_at: now.toISOString(),
      total_repositories: repos.length,
      format
    },
    repositories: repos.map(toExportRecord)
  };
}

export function toJsonDocument(repos: TrackedRepository[], now: Date = new Date()): string {
  return JSON.stringify(buildDocument(repos, 'json', now), null, 2);
}

export function toYamlDocument(repos: TrackedRepository[], now: Date = new Date()): string {
  return yaml.dump(buildDocument(repos, 'yaml', now), { lineWidth: -1, noRefs: true, sortKeys: false });
}

/**
 * Quote a CSV field when it contains a delimiter, quote or line break
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function csvRow(repo: TrackedRepository): Record<CsvColumn, string> {
  const criteria = repo.searchCriteria?.type === 'search' ? repo.searchCriteria : null;
  return {
    repo_name: repo.repoName,
    stars: String(repo.stars),
    license: repo.license,
    estimated_file_count: String(repo.estimatedFileCount),
    language_percentage: repo.languagePercentage,
    url: repo.url,
    description: repo.description,
    first_shown: repo.firstShown,
    last_shown: repo.lastShown,
    show_count: String(repo.showCount),
    passes_criteria: String(repo.passesCriteria),
    analysis_score: repo.analysisScore === null ? '' : String(repo.analysisScore),
    search_min_stars: criteria ? String(criteria.minStars) : '',
    search_max_stars: criteria ? String(criteria.maxStars) : '',
    search_limit: criteria ? String(criteria.limit) : ''
  };
}

/**
 * CSV with search criteria flattened into columns, CRLF line endings
 */
export function toCsv(repos: TrackedRepository[]): string {
  const lines = [CSV_COLUMNS.join(',')];
  for (const repo of repos) {
    const row = csvRow(repo);
    lines.push(CSV_COLUMNS.map(column => escapeCsvField(row[column])).join(','));
  }
  return `${lines.join('\r\n')}\r\n`;
}

function formatExportDate(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}

export function toMarkdown(repos: TrackedRepository[], now: Date = new Date()): string {
  const lines = [
    '# Repository History Export',
    '',
    `**Exported:** ${formatExportDate(now)}`,
    `**Total Repositories:** ${repos.length}`,
    ''
  ];

  repos.forEach((repo, index) => {
    lines.push(
      `## ${index + 1}. ${repo.repoName}`,
      '',
      `- **⭐ Stars:** ${repo.stars.toLocaleString('en-US')}`,
      `- **📜 License:** ${repo.license}`,
      `- **📊 Language share:** ${repo.languagePercentage}`,
      `- **📁 Est. files:** ${repo.estimatedFileCount}`,
      `- **👀 Times shown:** ${repo.showCount}`,
      `- **✅ Passes criteria:** ${repo.passesCriteria ? 'Yes' : 'No'}`
    );
    if (repo.analysisScore !== null) {
      lines.push(`- **🎯 Analysis score:** ${repo.analysisScore}/5`);
    }
    lines.push(
      `- **🔗 URL:** [${repo.repoName}](${repo.url})`,
      `- **📝 Description:** ${repo.description}`,
      `- **📅 First seen:** ${repo.firstShown.slice(0, 10)}`,
      `- **📅 Last seen:** ${repo.lastShown.slice(0, 10)}`,
      '',
      '---',
      ''
    );
  });

  return lines.join('\n');
}

/**
 * Aggregate figures over an exported collection
 */
export function summarizeRepositories(repos: TrackedRepository[]): RepositorySummaryStats {
  const licenses = new Map<string, number>();
  for (const repo of repos) {
    licenses.set(repo.license, (licenses.get(repo.license) ?? 0) + 1);
  }

  // sort is stable, so ties keep first-seen order
  const licenseDistribution = [...licenses.entries()]
    .map(([license, count]) => ({ license, count }))
    .sort((a, b) => b.count - a.count);

  const mostRecent = repos.reduce<string | null>(
    (latest, repo) => (latest === null || repo.lastShown > latest ? repo.lastShown : latest),
    null
  );

  return {
    totalRepositories: repos.length,
    passingCriteria: repos.filter(repo => repo.passesCriteria).length,
    averageStars: repos.length > 0
      ? Math.round(repos.reduce((sum, repo) => sum + repo.stars, 0) / repos.length)
      : 0,
    licenseDistribution,
    mostRecent: mostRecent ? mostRecent.slice(0, 10) : null
  };
}

export function defaultExportFilename(userId: string, format: ExportFormat, now: Date = new Date()): string {
  const stamp = now.toISOString().slice(0, 19).replace(/-|:/g, '').replace('T', '_');
  return `repositories_${userId}_${stamp}.${EXTENSIONS[format]}`;
}

export function renderExport(repos: TrackedRepository[], format: ExportFormat, now: Date = new Date()): string {
  switch (format) {
    case 'json':
      return toJsonDocument(repos, now);
    case 'yaml':
      return toYamlDocument(repos, now);
    case 'csv':
      return toCsv(repos);
    case 'markdown':
      return toMarkdown(repos, now);
  }
}

/**
 * Render and write an export file
 * @returns Number of repositories written
 */
export function writeExport(
  repos: TrackedRepository[],
  format: ExportFormat,
  filePath: string,
  now: Date = new Date()
): number {
  try {
    writeFileSync(filePath, renderExport(repos, format, now), 'utf-8');
  } catch (error) {
    throw createExportError(
      `Failed to write ${format} export: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }
  return repos.length;
}
