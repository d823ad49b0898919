/**
 * Configuration and connectivity check run before the first real run
 */

import { dirname } from 'node:path';
import { createLogger, maskSecret } from '@subgap/plugin-utils';
import { validateConfig } from './config.js';
import type {
  ApiKeyCheck,
  CatalogSession,
  LibrarySection,
  MediaLibrary,
  MissingSubtitlesConfig,
  QuotaSnapshot,
  SubtitleStorage,
} from './types.js';

const logger = createLogger('missing-subtitles:status');

/** The catalog calls the status check needs */
export interface CatalogDiagnostics {
  readonly session: Readonly<CatalogSession>;
  verifyApiKey(): Promise<ApiKeyCheck>;
  login(): Promise<boolean>;
  probeQuota(): Promise<QuotaSnapshot | null>;
}

export interface StatusReport {
  info: string[];
  warnings: string[];
  issues: string[];
}

export function isReady(report: StatusReport): boolean {
  return report.issues.length === 0;
}

export interface StatusCheckerOptions {
  config: MissingSubtitlesConfig;
  storage: SubtitleStorage;
  library?: MediaLibrary;
  catalog?: CatalogDiagnostics;
}

export class StatusChecker {
  private config: MissingSubtitlesConfig;
  private storage: SubtitleStorage;
  private library?: MediaLibrary;
  private catalog?: CatalogDiagnostics;

  constructor(options: StatusCheckerOptions) {
    this.config = options.config;
    this.storage = options.storage;
    this.library = options.library;
    this.catalog = options.catalog;
  }

  async checkAll(): Promise<StatusReport> {
    const report: StatusReport = { info: [], warnings: [], issues: [] };

    this.checkConfiguration(report);
    const sections = await this.checkPlex(report);

    if (this.config.method === 'local') {
      if (sections) {
        await this.checkWritePermission(report, sections);
      }
      await this.checkCatalog(report);
    } else {
      report.info.push('Delegated method: Plex fetches subtitles itself, OpenSubtitles is not contacted');
    }

    logger.debug('Status check complete', {
      issues: report.issues.length,
      warnings: report.warnings.length,
    });
    return report;
  }

  private checkConfiguration(report: StatusReport): void {
    const { config } = this;
    const problems = validateConfig(config);

    report.info.push(`PLEX_URL: ${config.plex_url}`);
    if (config.plex_token) {
      report.info.push(`PLEX_TOKEN: ${maskSecret(config.plex_token)}`);
    }
    report.info.push(`Method: ${config.method}`);
    report.info.push(`Languages: ${config.languages.join(', ')}`);

    if (config.method === 'local') {
      if (config.opensubtitles_api_key) {
        report.info.push(`OPENSUBTITLES_API_KEY: ${maskSecret(config.opensubtitles_api_key)}`);
      }
      if (config.opensubtitles_username) {
        report.info.push(`OPENSUBTITLES_USERNAME: ${config.opensubtitles_username}`);
      }
    }

    report.issues.push(...problems.errors);
    report.warnings.push(...problems.warnings);
  }

  private async checkPlex(report: StatusReport): Promise<LibrarySection[] | null> {
    if (!this.library) {
      return null;
    }

    try {
      const server = await this.library.getServerInfo();
      report.info.push(`Plex server: ${server.name} (version ${server.version}, ${server.platform})`);

      const sections = await this.library.listSections();
      const movies = sections.filter((section) => section.type === 'movie');
      const shows = sections.filter((section) => section.type === 'show');
      report.info.push(`Libraries: ${movies.length} movie, ${shows.length} TV`);
      for (const section of [...movies, ...shows]) {
        const count = await this.library.countEntries(section);
        const noun = section.type === 'movie' ? 'movie' : 'show';
        report.info.push(`  ${section.title}: ${count} ${count === 1 ? noun : `${noun}s`}`);
      }
      if (movies.length + shows.length === 0) {
        report.warnings.push('No movie or TV libraries found on the Plex server');
      }
      return [...movies, ...shows];
    } catch (error) {
      report.issues.push(
        `Cannot connect to Plex at ${this.config.plex_url}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }
  }

  private async checkWritePermission(report: StatusReport, sections: LibrarySection[]): Promise<void> {
    const library = this.library;
    if (!library || sections.length === 0) {
      return;
    }

    try {
      const [first] = await library.listItems(sections[0]);
      if (!first) {
        report.warnings.push(`Library "${sections[0].title}" is empty, write permission not checked`);
        return;
      }
      const item = await library.loadItem(first.key);
      if (!item.filePath) {
        report.warnings.push(`"${item.title}" has no file path, write permission not checked`);
        return;
      }

      const directory = dirname(item.filePath);
      if (await this.storage.canWrite(directory)) {
        report.info.push(`Write permission OK: ${directory}`);
      } else {
        report.issues.push(`No write permission in ${directory} (needed to save subtitle files)`);
      }
    } catch (error) {
      report.warnings.push(
        `Could not check write permission: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private async checkCatalog(report: StatusReport): Promise<void> {
    const catalog = this.catalog;
    if (!catalog) {
      return;
    }

    const check = await catalog.verifyApiKey();
    switch (check.status) {
      case 'valid': {
        report.info.push('OpenSubtitles API key is valid');
        if (check.rateLimitRemaining !== undefined) {
          report.info.push(`API rate limit: ${check.rateLimitRemaining}/${check.rateLimitLimit ?? '?'} requests remaining`);
        }
        break;
      }
      case 'invalid':
        report.issues.push('OpenSubtitles API key is invalid');
        break;
      case 'rate-limited':
        report.warnings.push('OpenSubtitles API is rate limiting this key, try again later');
        break;
      case 'unreachable':
        report.issues.push('Cannot reach the OpenSubtitles API');
        break;
      default:
        report.warnings.push(`OpenSubtitles API answered with status ${check.httpStatus ?? 'unknown'}`);
    }

    if (!this.config.opensubtitles_username || !this.config.opensubtitles_password) {
      return;
    }

    if (!(await catalog.login())) {
      report.issues.push('OpenSubtitles login failed, check username and password');
      return;
    }
    const { level, allowedDownloads } = catalog.session;
    report.info.push(
      `OpenSubtitles login OK (level: ${level ?? 'unknown'}, daily downloads: ${allowedDownloads ?? 'unknown'})`,
    );

    const quota = await catalog.probeQuota();
    if (!quota) {
      report.warnings.push('Could not read the remaining download quota');
      return;
    }
    report.info.push(`Downloads remaining today: ${quota.remaining}`);
    if (quota.resetTime) {
      report.info.push(`Quota resets in: ${quota.resetTime}`);
    }
    if (quota.remaining <= 0) {
      report.warnings.push('Daily download quota is used up');
    }
  }
}
