/**
 * Missing Subtitles Configuration
 */

import { config as dotenvConfig } from 'dotenv';
import {
  parseCsvList,
  parseLogLevel,
  parseOptionalPositiveInt,
  validateEnum,
  validateNonNegativeInt,
  validatePositiveInt,
} from '@subgap/plugin-utils';
import { DEFAULT_OPENSUBTITLES_BASE_URL, DEFAULT_USER_AGENT } from './opensubtitles-client.js';
import { isTwoLetterCode, normalizeLanguageSet } from './languages.js';
import { ACQUISITION_METHODS, MEDIA_KINDS } from './types.js';
import type { MissingSubtitlesConfig } from './types.js';

dotenvConfig();

export const DEFAULT_PLEX_URL = 'http://localhost:32400';
export const DEFAULT_REPORT_PATH = 'subtitle_download_report.txt';

type Env = Record<string, string | undefined>;

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: Env = process.env): MissingSubtitlesConfig {
  const languages = normalizeLanguageSet(parseCsvList(env.SUBTITLE_LANGUAGES));

  return {
    plex_url: optional(env.PLEX_URL) ?? DEFAULT_PLEX_URL,
    plex_token: optional(env.PLEX_TOKEN),
    opensubtitles_api_key: optional(env.OPENSUBTITLES_API_KEY),
    opensubtitles_username: optional(env.OPENSUBTITLES_USERNAME),
    opensubtitles_password: optional(env.OPENSUBTITLES_PASSWORD),
    opensubtitles_base_url: optional(env.OPENSUBTITLES_BASE_URL) ?? DEFAULT_OPENSUBTITLES_BASE_URL,
    opensubtitles_user_agent: optional(env.OPENSUBTITLES_USER_AGENT) ?? DEFAULT_USER_AGENT,
    languages: languages.length > 0 ? languages : ['en'],
    method: validateEnum(env.SUBTITLE_METHOD, ACQUISITION_METHODS, 'local') ?? 'local',
    library: optional(env.SUBTITLE_LIBRARY),
    media_kind: validateEnum(env.SUBTITLE_MEDIA_TYPE, MEDIA_KINDS),
    max_downloads: parseOptionalPositiveInt(env.MAX_DOWNLOADS),
    report_path: optional(env.SUBTITLE_REPORT_PATH) ?? DEFAULT_REPORT_PATH,
    request_interval_ms: validateNonNegativeInt(env.REQUEST_INTERVAL_MS, 1000),
    delegated_settle_ms: validateNonNegativeInt(env.DELEGATED_SETTLE_MS, 2000),
    http_timeout_ms: validatePositiveInt(env.HTTP_TIMEOUT_MS, 30000),
    log_level: parseLogLevel(env.LOG_LEVEL) ?? 'info',
  };
}

export interface CliOverrides {
  method?: string;
  plexUrl?: string;
  plexToken?: string;
  opensubtitlesApiKey?: string;
  opensubtitlesUsername?: string;
  opensubtitlesPassword?: string;
  languages?: string[];
  library?: string;
  type?: string;
  maxDownloads?: string;
  report?: string;
  verbose?: boolean;
}

/**
 * Command-line values win over the environment. Throws on values that
 * cannot be interpreted, since a silent fallback would change what the run does.
 */
export function applyCliOverrides(base: MissingSubtitlesConfig, options: CliOverrides): MissingSubtitlesConfig {
  const config: MissingSubtitlesConfig = { ...base };

  if (options.method !== undefined) {
    const method = validateEnum(options.method, ACQUISITION_METHODS);
    if (!method) throw new Error(`Unknown method "${options.method}" (expected local or delegated)`);
    config.method = method;
  }
  if (options.type !== undefined) {
    const kind = validateEnum(options.type, MEDIA_KINDS);
    if (!kind) throw new Error(`Unknown media type "${options.type}" (expected movie or episode)`);
    config.media_kind = kind;
  }
  if (options.maxDownloads !== undefined) {
    const max = parseOptionalPositiveInt(options.maxDownloads);
    if (max === undefined) throw new Error(`--max-downloads must be a positive integer, got "${options.maxDownloads}"`);
    config.max_downloads = max;
  }
  if (options.languages !== undefined && options.languages.length > 0) {
    config.languages = normalizeLanguageSet(options.languages.flatMap((entry) => parseCsvList(entry)));
  }

  if (options.plexUrl) config.plex_url = options.plexUrl;
  if (options.plexToken) config.plex_token = options.plexToken;
  if (options.opensubtitlesApiKey) config.opensubtitles_api_key = options.opensubtitlesApiKey;
  if (options.opensubtitlesUsername) config.opensubtitles_username = options.opensubtitlesUsername;
  if (options.opensubtitlesPassword) config.opensubtitles_password = options.opensubtitlesPassword;
  if (options.library) config.library = options.library;
  if (options.report) config.report_path = options.report;
  if (options.verbose) config.log_level = 'debug';

  return config;
}

export interface ConfigProblems {
  errors: string[];
  warnings: string[];
}

export function validateConfig(config: MissingSubtitlesConfig): ConfigProblems {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!config.plex_token) {
    errors.push('PLEX_TOKEN is required');
  }

  if (config.method === 'local') {
    if (!config.opensubtitles_api_key) {
      errors.push('OPENSUBTITLES_API_KEY is required for the local method');
    }
    if (!config.opensubtitles_username || !config.opensubtitles_password) {
      errors.push('OPENSUBTITLES_USERNAME and OPENSUBTITLES_PASSWORD are required for the local method');
    }
  }

  if (config.languages.length === 0) {
    errors.push('At least one subtitle language is required');
  }
  for (const language of config.languages) {
    if (!isTwoLetterCode(language)) {
      warnings.push(`Language code "${language}" is not a 2-letter code`);
    }
  }

  return { errors, warnings };
}
