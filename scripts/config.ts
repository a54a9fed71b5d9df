/**
 * Configuration management for the repository scout
 *
 * Precedence for every option: explicit override > environment > YAML file > built-in default.
 */

import { config as loadDotenv } from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { fileURLToPath } from 'url';
import * as yaml from 'js-yaml';
import { ValidationError, ValidationResult, validateSearchParams } from './validation.js';
import { createConfigError } from './error-handler.js';

export interface CriteriaConfig {
  targetLanguage: string;
  maxStars: number;             // candidates must have fewer stars than this
  minLanguageFraction: number;  // candidates need strictly more than this share
  minFileEstimate: number;
  maxFileEstimate: number;
  allowedLicenses: string[];
}

/**
 * System configuration interface
 */
export interface SelectorConfig {
  github: {
    token: string;
    timeoutMs: number;
    maxRetries: number;
    backoffMultiplier: number;
  };
  search: {
    minStars: number;
    maxStars: number;
    limit: number;
    daysFilter: number;
    targetCount: number;
    maxAttempts: number;
  };
  criteria: CriteriaConfig;
  storage: {
    databasePath: string;
    userId: string;
  };
}

export interface ConfigOverrides {
  github?: Partial<SelectorConfig['github']>;
  search?: Partial<SelectorConfig['search']>;
  criteria?: Partial<CriteriaConfig>;
  storage?: Partial<SelectorConfig['storage']>;
}

/**
 * Default configuration values (allowed licenses come from data/allowed-licenses.json)
 */
export const DEFAULT_CONFIG = {
  github: {
    timeoutMs: 30000,
    maxRetries: 3,
    backoffMultiplier: 2
  },
  search: {
    minStars: 500,
    maxStars: 50000,
    limit: 100,
    daysFilter: 7,
    targetCount: 3,
    maxAttempts: 3
  },
  criteria: {
    targetLanguage: 'Python',
    maxStars: 10000,
    minLanguageFraction: 0.7,
    minFileEstimate: 15,
    maxFileEstimate: 100
  },
  storage: {
    databasePath: 'repositories.db'
  }
} as const;

export const DEFAULT_USER_ID = 'default_user';

/**
 * Load variables from a .env file into process.env
 */
export function loadEnvironment(path?: string): void {
  loadDotenv(path ? { path } : undefined);
}

function resolveDataFile(name: string): string {
  // Sources live in scripts/, compiled output in dist/scripts/
  const candidates = [
    fileURLToPath(new URL(`../data/${name}`, import.meta.url)),
    fileURLToPath(new URL(`../../data/${name}`, import.meta.url))
  ];
  return candidates.find(candidate => existsSync(candidate)) ?? candidates[0];
}

/**
 * Load the license allow-list
 */
export function loadAllowedLicenses(filePath: string = resolveDataFile('allowed-licenses.json')): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw createConfigError(
      `Failed to load license allow-list: ${error instanceof Error ? error.message : String(error)}`,
      { resource: filePath }
    );
  }

  if (!Array.isArray(parsed) || !parsed.every((entry): entry is string => typeof entry === 'string')) {
    throw new ValidationError('allowed licenses file must contain an array of strings', 'allowedLicenses');
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSection(root: Record<string, unknown>, key: string): Record<string, unknown> {
  const section = root[key];
  if (section === undefined || section === null) {
    return {};
  }
  if (!isRecord(section)) {
    throw new ValidationError(`${key} must be a mapping`, key, section);
  }
  return section;
}

function readNumber(section: Record<string, unknown>, path: string, key: string): number | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new ValidationError(`${path}.${key} must be a number`, `${path}.${key}`, value);
  }
  return value;
}

function readString(section: Record<string, unknown>, path: string, key: string): string | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${path}.${key} must be a string`, `${path}.${key}`, value);
  }
  return value;
}

function readStringList(section: Record<string, unknown>, path: string, key: string): string[] | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === 'string')) {
    throw new ValidationError(`${path}.${key} must be a list of strings`, `${path}.${key}`, value);
  }
  return value;
}

function readEnvInteger(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new ValidationError(`${name} must be a non-negative integer`, name, raw);
  }
  return Number.parseInt(raw, 10);
}

function readEnvString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name];
  return raw && raw.trim() !== '' ? raw.trim() : undefined;
}

/**
 * Configuration validation functions
 */
export class ConfigValidator {

  static validate(config: SelectorConfig): SelectorConfig {
    const { github, search, criteria, storage } = config;

    if (!Number.isInteger(github.maxRetries) || github.maxRetries < 0) {
      throw new ValidationError('github.maxRetries must be a non-negative integer', 'github.maxRetries', github.maxRetries);
    }
    if (github.backoffMultiplier < 1) {
      throw new ValidationError('github.backoffMultiplier must be >= 1', 'github.backoffMultiplier', github.backoffMultiplier);
    }
    if (github.timeoutMs <= 0) {
      throw new ValidationError('github.timeoutMs must be positive', 'github.timeoutMs', github.timeoutMs);
    }

    const bounds = validateSearchParams(search);
    if (!bounds.valid) {
      throw new ValidationError(`search: ${bounds.errors.join(', ')}`, 'search', search);
    }
    if (!Number.isInteger(search.targetCount) || search.targetCount < 1) {
      throw new ValidationError('search.targetCount must be at least 1', 'search.targetCount', search.targetCount);
    }
    if (!Number.isInteger(search.maxAttempts) || search.maxAttempts < 1) {
      throw new ValidationError('search.maxAttempts must be at least 1', 'search.maxAttempts', search.maxAttempts);
    }

    if (criteria.targetLanguage.trim() === '') {
      throw new ValidationError('criteria.targetLanguage must not be empty', 'criteria.targetLanguage');
    }
    if (criteria.minLanguageFraction < 0 || criteria.minLanguageFraction > 1) {
      throw new ValidationError('criteria.minLanguageFraction must be between 0 and 1', 'criteria.minLanguageFraction', criteria.minLanguageFraction);
    }
    if (criteria.maxStars <= 0) {
      throw new ValidationError('criteria.maxStars must be positive', 'criteria.maxStars', criteria.maxStars);
    }
    if (criteria.minFileEstimate > criteria.maxFileEstimate) {
      throw new ValidationError('criteria.minFileEstimate must not exceed criteria.maxFileEstimate', 'criteria.minFileEstimate');
    }
    if (criteria.allowedLicenses.length === 0) {
      throw new ValidationError('criteria.allowedLicenses must not be empty', 'criteria.allowedLicenses');
    }

    if (storage.databasePath.trim() === '') {
      throw new ValidationError('storage.databasePath must not be empty', 'storage.databasePath');
    }
    if (storage.userId.trim() === '') {
      throw new ValidationError('storage.userId must not be empty', 'storage.userId');
    }

    return config;
  }
}

/**
 * Configuration file manager
 */
export class ConfigManager {
  private configPath: string;
  private env: NodeJS.ProcessEnv;

  constructor(configPath: string = 'repo-scout.yml', env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.env = env;
  }

  /**
   * Load configuration from file, environment and overrides
   */
  loadConfig(overrides: ConfigOverrides = {}): SelectorConfig {
    const fileConfig = this.readConfigFile();
    return ConfigValidator.validate(this.merge(fileConfig, overrides));
  }

  /**
   * Validate configuration without returning it
   */
  validateConfigFile(): ValidationResult {
    const errors: string[] = [];

    try {
      this.loadConfig();
    } catch (error) {
      errors.push(error instanceof Error ? error.message : String(error));
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  private readConfigFile(): Record<string, unknown> {
    if (!existsSync(this.configPath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(readFileSync(this.configPath, 'utf-8'));
    } catch (error) {
      throw createConfigError(
        `Failed to load config file: ${error instanceof Error ? error.message : String(error)}`,
        { resource: this.configPath }
      );
    }

    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ValidationError('config file must contain a mapping', 'root', parsed);
    }
    return parsed;
  }

  private merge(file: Record<string, unknown>, overrides: ConfigOverrides): SelectorConfig {
    const env = this.env;
    const github = readSection(file, 'github');
    const search = readSection(file, 'search');
    const criteria = readSection(file, 'criteria');
    const storage = readSection(file, 'storage');

    return {
      github: {
        token: overrides.github?.token
          ?? readEnvString(env, 'GITHUB_TOKEN')
          ?? readString(github, 'github', 'token')
          ?? '',
        timeoutMs: overrides.github?.timeoutMs
          ?? readNumber(github, 'github', 'timeoutMs')
          ?? DEFAULT_CONFIG.github.timeoutMs,
        maxRetries: overrides.github?.maxRetries
          ?? readNumber(github, 'github', 'maxRetries')
          ?? DEFAULT_CONFIG.github.maxRetries,
        backoffMultiplier: overrides.github?.backoffMultiplier
          ?? readNumber(github, 'github', 'backoffMultiplier')
          ?? DEFAULT_CONFIG.github.backoffMultiplier
      },
      search: {
        minStars: overrides.search?.minStars
          ?? readEnvInteger(env, 'MIN_STARS')
          ?? readNumber(search, 'search', 'minStars')
          ?? DEFAULT_CONFIG.search.minStars,
        maxStars: overrides.search?.maxStars
          ?? readEnvInteger(env, 'MAX_STARS')
          ?? readNumber(search, 'search', 'maxStars')
          ?? DEFAULT_CONFIG.search.maxStars,
        limit: overrides.search?.limit
          ?? readEnvInteger(env, 'DEFAULT_LIMIT')
          ?? readNumber(search, 'search', 'limit')
          ?? DEFAULT_CONFIG.search.limit,
        daysFilter: overrides.search?.daysFilter
          ?? readNumber(search, 'search', 'daysFilter')
          ?? DEFAULT_CONFIG.search.daysFilter,
        targetCount: overrides.search?.targetCount
          ?? readNumber(search, 'search', 'targetCount')
          ?? DEFAULT_CONFIG.search.targetCount,
        maxAttempts: overrides.search?.maxAttempts
          ?? readNumber(search, 'search', 'maxAttempts')
          ?? DEFAULT_CONFIG.search.maxAttempts
      },
      criteria: {
        targetLanguage: overrides.criteria?.targetLanguage
          ?? readString(criteria, 'criteria', 'targetLanguage')
          ?? DEFAULT_CONFIG.criteria.targetLanguage,
        maxStars: overrides.criteria?.maxStars
          ?? readNumber(criteria, 'criteria', 'maxStars')
          ?? DEFAULT_CONFIG.criteria.maxStars,
        minLanguageFraction: overrides.criteria?.minLanguageFraction
          ?? readNumber(criteria, 'criteria', 'minLanguageFraction')
          ?? DEFAULT_CONFIG.criteria.minLanguageFraction,
        minFileEstimate: overrides.criteria?.minFileEstimate
          ?? readNumber(criteria, 'criteria', 'minFileEstimate')
          ?? DEFAULT_CONFIG.criteria.minFileEstimate,
        maxFileEstimate: overrides.criteria?.maxFileEstimate
          ?? readNumber(criteria, 'criteria', 'maxFileEstimate')
          ?? DEFAULT_CONFIG.criteria.maxFileEstimate,
        allowedLicenses: overrides.criteria?.allowedLicenses
          ?? readStringList(criteria, 'criteria', 'allowedLicenses')
          ?? loadAllowedLicenses()
      },
      storage: {
        databasePath: overrides.storage?.databasePath
          ?? readEnvString(env, 'REPO_SCOUT_DB')
          ?? readString(storage, 'storage', 'databasePath')
          ?? DEFAULT_CONFIG.storage.databasePath,
        userId: overrides.storage?.userId
          ?? readEnvString(env, 'REPO_SCOUT_USER')
          ?? readString(storage, 'storage', 'userId')
          ?? readEnvString(env, 'USER')
          ?? readEnvString(env, 'USERNAME')
          ?? DEFAULT_USER_ID
      }
    };
  }
}

/**
 * Validate environment requirements for commands that call GitHub
 */
export function validateEnvironment(config: SelectorConfig): ValidationResult {
  const errors: string[] = [];

  if (!config.github.token) {
    errors.push('GITHUB_TOKEN environment variable is required');
  }

  return {
    valid: errors.length === 0,
    errors
  };
}
