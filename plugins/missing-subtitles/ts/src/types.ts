/**
 * Missing Subtitles Plugin Types
 */

import type { LogLevel } from '@subgap/plugin-utils';

export type AcquisitionMethod = 'local' | 'delegated';
export const ACQUISITION_METHODS: readonly AcquisitionMethod[] = ['local', 'delegated'];

export type MediaKind = 'movie' | 'episode';
export const MEDIA_KINDS: readonly MediaKind[] = ['movie', 'episode'];

export interface MissingSubtitlesConfig {
  plex_url: string;
  plex_token?: string;
  opensubtitles_api_key?: string;
  opensubtitles_username?: string;
  opensubtitles_password?: string;
  opensubtitles_base_url: string;
  opensubtitles_user_agent: string;
  languages: string[];
  method: AcquisitionMethod;
  library?: string;
  media_kind?: MediaKind;
  max_downloads?: number;
  report_path: string;
  request_interval_ms: number;
  delegated_settle_ms: number;
  http_timeout_ms: number;
  log_level: LogLevel;
}

// ============================================================================
// Media library
// ============================================================================

export interface MediaItem {
  key: string;
  title: string;
  kind: MediaKind;
  showTitle?: string;
  seasonNumber?: number;
  episodeNumber?: number;
  imdbId?: string;
  tmdbId?: string;
  /** Raw language codes of the subtitle tracks the library knows about */
  subtitleLanguages: string[];
  filePath?: string;
  fileSize?: number;
}

/** A library entry before its details are loaded */
export interface MediaItemRef {
  key: string;
  title: string;
}

export interface LibrarySection {
  key: string;
  title: string;
  /** Plex section type: movie, show, artist, photo */
  type: string;
}

export interface ServerInfo {
  name: string;
  version: string;
  platform: string;
}

export interface MediaLibrary {
  getServerInfo(): Promise<ServerInfo>;
  listSections(): Promise<LibrarySection[]>;
  listItems(section: LibrarySection): Promise<MediaItemRef[]>;
  /** Top-level entries of a section: movies, or shows rather than episodes */
  countEntries(section: LibrarySection): Promise<number>;
  loadItem(key: string): Promise<MediaItem>;
  /** Asks the server to find and attach a subtitle itself; true when it attached one */
  searchSubtitles(item: MediaItem, language: string): Promise<boolean>;
}

export interface SubtitleStorage {
  exists(path: string): Promise<boolean>;
  fileSize(path: string): Promise<number | undefined>;
  write(path: string, content: Buffer): Promise<void>;
  canWrite(directory: string): Promise<boolean>;
}

// ============================================================================
// Catalog
// ============================================================================

export type SearchIdentity =
  | { kind: 'imdb'; imdbId: string }
  | { kind: 'tmdb'; tmdbId: string }
  | { kind: 'text'; query: string };

export interface SearchQuery {
  identity: SearchIdentity;
  languages: string[];
  seasonNumber?: number;
  episodeNumber?: number;
  fileSize?: number;
}

export interface SubtitleCandidate {
  readonly language: string;
  readonly fileId: number | null;
  readonly rating: number;
  readonly downloadCount: number;
  readonly releaseName: string;
  readonly uploader: string;
}

export interface CatalogSession {
  token: string | null;
  remainingDownloads: number | null;
  level?: string;
  allowedDownloads?: number;
}

export interface QuotaSnapshot {
  remaining: number;
  resetTime?: string;
}

export type ApiKeyStatus = 'valid' | 'invalid' | 'rate-limited' | 'unexpected' | 'unreachable';

export interface ApiKeyCheck {
  status: ApiKeyStatus;
  httpStatus?: number;
  rateLimitRemaining?: string;
  rateLimitLimit?: string;
}

/** The catalog operations the orchestrator depends on */
export interface SubtitleCatalog {
  search(query: SearchQuery): Promise<SubtitleCandidate[] | null>;
  download(fileId: number): Promise<Buffer | null>;
}

// ============================================================================
// Acquisition results
// ============================================================================

export interface DownloadRecord {
  readonly mediaTitle: string;
  readonly mediaKind: MediaKind;
  readonly language: string;
  readonly method: AcquisitionMethod;
  readonly rating?: number;
  readonly downloadCount?: number;
  readonly releaseName?: string;
  readonly uploader?: string;
  readonly filePath?: string;
  readonly timestamp: string;
}

export interface LibraryStats {
  total: number;
  needsSubtitles: number;
  downloaded: number;
  skipped: number;
  errors: number;
}

export interface RunStats extends LibraryStats {
  librariesProcessed: number;
  librariesSkipped: number;
}
