/**
 * Wires configuration to the Plex, OpenSubtitles and storage bindings and
 * runs one acquisition pass.
 */

import { createLogger } from '@subgap/plugin-utils';
import type { Sleep } from '@subgap/plugin-utils';
import { AcquisitionOrchestrator } from './acquisition.js';
import { validateConfig } from './config.js';
import { AcquisitionError } from './errors.js';
import { OpenSubtitlesClient } from './opensubtitles-client.js';
import { PlexLibrary } from './plex-client.js';
import { ReportAggregator } from './report.js';
import { LocalSubtitleStorage } from './storage.js';
import type { MediaLibrary, MissingSubtitlesConfig, RunStats, ServerInfo, SubtitleCatalog, SubtitleStorage } from './types.js';

const logger = createLogger('missing-subtitles:runner');

export interface LoginCapableCatalog extends SubtitleCatalog {
  login(): Promise<boolean>;
}

export interface RunContext {
  library: MediaLibrary;
  storage: SubtitleStorage;
  catalog?: LoginCapableCatalog;
}

export function createPlexLibrary(config: MissingSubtitlesConfig): PlexLibrary | undefined {
  if (!config.plex_token) return undefined;
  return new PlexLibrary({
    baseUrl: config.plex_url,
    token: config.plex_token,
    timeoutMs: config.http_timeout_ms,
  });
}

export function createCatalogClient(config: MissingSubtitlesConfig): OpenSubtitlesClient | undefined {
  if (config.method !== 'local' || !config.opensubtitles_api_key) return undefined;
  return new OpenSubtitlesClient({
    apiKey: config.opensubtitles_api_key,
    username: config.opensubtitles_username,
    password: config.opensubtitles_password,
    baseUrl: config.opensubtitles_base_url,
    userAgent: config.opensubtitles_user_agent,
    timeoutMs: config.http_timeout_ms,
    minIntervalMs: config.request_interval_ms,
  });
}

export function createRunContext(config: MissingSubtitlesConfig): RunContext {
  const library = createPlexLibrary(config);
  if (!library) {
    throw new AcquisitionError('initialization', 'PLEX_TOKEN is required');
  }
  return {
    library,
    storage: new LocalSubtitleStorage(),
    catalog: createCatalogClient(config),
  };
}

/**
 * Checks configuration and connectivity. Anything thrown from here means
 * no work should start.
 */
export async function initializeRun(config: MissingSubtitlesConfig, context: RunContext): Promise<ServerInfo> {
  const problems = validateConfig(config);
  for (const warning of problems.warnings) {
    logger.warn(warning);
  }
  if (problems.errors.length > 0) {
    throw new AcquisitionError('initialization', problems.errors.join('; '));
  }
  if (config.method === 'local' && !context.catalog) {
    throw new AcquisitionError('initialization', 'The local method needs OpenSubtitles credentials');
  }

  let server: ServerInfo;
  try {
    server = await context.library.getServerInfo();
  } catch (error) {
    throw new AcquisitionError(
      'initialization',
      `Cannot connect to Plex at ${config.plex_url}: ${error instanceof Error ? error.message : String(error)}`,
      error,
    );
  }
  logger.success(`Connected to Plex server ${server.name}`, { version: server.version });

  // A failed login here is retried on the first download.
  if (context.catalog && !(await context.catalog.login())) {
    logger.warn('OpenSubtitles login failed, downloads will retry it');
  }

  return server;
}

export interface RunOptions {
  signal?: AbortSignal;
  now?: () => Date;
  sleep?: Sleep;
}

export interface RunOutcome {
  stats: RunStats;
  report: ReportAggregator;
  interrupted: boolean;
}

export async function executeRun(
  config: MissingSubtitlesConfig,
  context: RunContext,
  options: RunOptions = {},
): Promise<RunOutcome> {
  const report = new ReportAggregator(config.method, options.now);
  const orchestrator = new AcquisitionOrchestrator({
    method: config.method,
    languages: config.languages,
    library: context.library,
    storage: context.storage,
    catalog: context.catalog,
    report,
    maxDownloads: config.max_downloads,
    libraryName: config.library,
    mediaKind: config.media_kind,
    settleMs: config.delegated_settle_ms,
    sleep: options.sleep,
    now: options.now,
    signal: options.signal,
  });

  logger.info('Looking for missing subtitles', {
    method: config.method,
    languages: config.languages,
    maxDownloads: config.max_downloads,
  });
  const stats = await orchestrator.run();
  return { stats, report, interrupted: options.signal?.aborted === true };
}
