import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import { z } from 'zod';
import { createLogger, defaultSleep, parseRetryAfter, RequestPacer } from '@subgap/plugin-utils';
import type { Clock, Sleep } from '@subgap/plugin-utils';
import type {
  ApiKeyCheck,
  CatalogSession,
  QuotaSnapshot,
  SearchQuery,
  SubtitleCandidate,
  SubtitleCatalog,
} from './types.js';
import { normalizeLanguage } from './languages.js';

const logger = createLogger('missing-subtitles:opensubtitles');

export const DEFAULT_OPENSUBTITLES_BASE_URL = 'https://api.opensubtitles.com/api/v1';
export const DEFAULT_USER_AGENT = 'subgap v1.0.0';

// ============================================================================
// Response schemas
// ============================================================================

const loginResponseSchema = z.object({
  token: z.string().min(1),
  user: z
    .object({
      level: z.string().nullish(),
      allowed_downloads: z.number().nullish(),
    })
    .nullish(),
});

const searchResultSchema = z.object({
  attributes: z.object({
    language: z.string().nullish(),
    download_count: z.number().nullish(),
    ratings: z.number().nullish(),
    release: z.string().nullish(),
    uploader: z.object({ name: z.string().nullish() }).nullish(),
    files: z
      .array(z.object({ file_id: z.number() }))
      .nullish(),
  }),
});

const searchResponseSchema = z.object({
  data: z.array(z.unknown()).nullish(),
});

const downloadResponseSchema = z.object({
  link: z.string().nullish(),
  remaining: z.number().nullish(),
  reset_time: z.string().nullish(),
});

export interface OpenSubtitlesClientOptions {
  apiKey: string;
  username?: string;
  password?: string;
  baseUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
  /** Minimum spacing between the starts of two API calls */
  minIntervalMs?: number;
  http?: AxiosInstance;
  now?: Clock;
  sleep?: Sleep;
}

export function searchParams(query: SearchQuery): Record<string, string | number> {
  // The API redirects requests whose parameters are not in alphabetical order.
  const params: Record<string, string | number> = {};
  if (query.episodeNumber !== undefined) params.episode_number = query.episodeNumber;
  if (query.identity.kind === 'imdb') params.imdb_id = query.identity.imdbId.replace(/^tt/i, '');
  params.languages = [...query.languages].sort().join(',');
  if (query.fileSize !== undefined) params.moviebytesize = query.fileSize;
  if (query.identity.kind === 'text') params.query = query.identity.query;
  if (query.seasonNumber !== undefined) params.season_number = query.seasonNumber;
  if (query.identity.kind === 'tmdb') params.tmdb_id = query.identity.tmdbId;
  return params;
}

export function parseCandidates(payload: unknown): SubtitleCandidate[] {
  const envelope = searchResponseSchema.safeParse(payload);
  if (!envelope.success) {
    logger.warn('Unexpected search response shape');
    return [];
  }

  const candidates: SubtitleCandidate[] = [];
  for (const entry of envelope.data.data ?? []) {
    const parsed = searchResultSchema.safeParse(entry);
    if (!parsed.success) {
      logger.debug('Skipping malformed search result');
      continue;
    }
    const attributes = parsed.data.attributes;
    const file = attributes.files?.[0];
    candidates.push({
      language: normalizeLanguage(attributes.language ?? ''),
      fileId: file?.file_id ?? null,
      rating: attributes.ratings ?? 0,
      downloadCount: attributes.download_count ?? 0,
      releaseName: attributes.release ?? 'Unknown',
      uploader: attributes.uploader?.name ?? 'Unknown',
    });
  }
  return candidates;
}

/**
 * OpenSubtitles REST client. Every API call goes through one pacer; a 429
 * with Retry-After is waited out and retried once.
 */
export class OpenSubtitlesClient implements SubtitleCatalog {
  private apiKey: string;
  private username?: string;
  private password?: string;
  private baseUrl: string;
  private userAgent: string;
  private http: AxiosInstance;
  private pacer: RequestPacer;
  private sleep: Sleep;
  private state: CatalogSession = { token: null, remainingDownloads: null };

  constructor(options: OpenSubtitlesClientOptions) {
    this.apiKey = options.apiKey;
    this.username = options.username;
    this.password = options.password;
    this.baseUrl = options.baseUrl ?? DEFAULT_OPENSUBTITLES_BASE_URL;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 30000 });
    this.sleep = options.sleep ?? defaultSleep;
    this.pacer = new RequestPacer(options.minIntervalMs ?? 1000, {
      now: options.now,
      sleep: this.sleep,
    });
  }

  get session(): Readonly<CatalogSession> {
    return { ...this.state };
  }

  get isAuthenticated(): boolean {
    return this.state.token !== null;
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  private headers(extra: Record<string, string> = {}): Record<string, string> {
    return {
      'Api-Key': this.apiKey,
      'User-Agent': this.userAgent,
      'Content-Type': 'application/json',
      Accept: 'application/json',
      ...extra,
    };
  }

  private paced(config: AxiosRequestConfig): Promise<AxiosResponse<unknown>> {
    return this.pacer.schedule(() =>
      this.http.request<unknown>({
        ...config,
        baseURL: this.baseUrl,
        headers: this.headers(config.headers && typeof config.headers === 'object' ? toStringRecord(config.headers) : {}),
        validateStatus: () => true,
      }),
    );
  }

  private async send(config: AxiosRequestConfig): Promise<AxiosResponse<unknown>> {
    const response = await this.paced(config);
    if (response.status !== 429) {
      return response;
    }

    const waitMs = parseRetryAfter(response.headers['retry-after']);
    if (waitMs === null) {
      logger.warn('Rate limited without a Retry-After header', { kind: 'rate-limited', url: config.url });
      return response;
    }

    logger.warn(`Rate limited, retrying in ${waitMs / 1000}s`, { kind: 'rate-limited', url: config.url });
    await this.sleep(waitMs);
    return this.paced(config);
  }

  // ==========================================================================
  // Operations
  // ==========================================================================

  async login(): Promise<boolean> {
    if (!this.username || !this.password) {
      logger.warn('OpenSubtitles username or password not configured', { kind: 'authentication' });
      return false;
    }

    try {
      const response = await this.paced({
        method: 'POST',
        url: '/login',
        data: { username: this.username, password: this.password },
      });

      if (response.status === 200) {
        const parsed = loginResponseSchema.safeParse(response.data);
        if (!parsed.success) {
          logger.error('OpenSubtitles login response carried no token', { kind: 'authentication' });
          return false;
        }
        this.state.token = parsed.data.token;
        this.state.level = parsed.data.user?.level ?? undefined;
        this.state.allowedDownloads = parsed.data.user?.allowed_downloads ?? undefined;
        logger.success('Logged in to OpenSubtitles', {
          level: this.state.level,
          allowedDownloads: this.state.allowedDownloads,
        });
        return true;
      }

      if (response.status === 401) {
        logger.error('OpenSubtitles login failed: invalid username or password', { kind: 'authentication' });
        return false;
      }

      if (response.status === 429) {
        logger.error('OpenSubtitles login rate limited', { kind: 'rate-limited' });
        return false;
      }

      logger.error('OpenSubtitles login failed', { status: response.status });
      return false;
    } catch (error) {
      logger.error('OpenSubtitles login failed', {
        kind: 'transient-network',
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  async search(query: SearchQuery): Promise<SubtitleCandidate[] | null> {
    try {
      const response = await this.send({ method: 'GET', url: '/subtitles', params: searchParams(query) });

      switch (response.status) {
        case 200: {
          const candidates = parseCandidates(response.data);
          logger.debug(`Search returned ${candidates.length} subtitles`, { languages: query.languages });
          return candidates;
        }
        case 401:
          logger.error('OpenSubtitles rejected the API key', { kind: 'authentication' });
          return null;
        case 406:
          logger.debug('No subtitles matched the search', { languages: query.languages });
          return [];
        case 429:
          logger.error('OpenSubtitles search rate limited', { kind: 'rate-limited' });
          return null;
        default:
          logger.error('OpenSubtitles search failed', { status: response.status });
          return null;
      }
    } catch (error) {
      logger.error('OpenSubtitles search failed', {
        kind: 'transient-network',
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  async download(fileId: number): Promise<Buffer | null> {
    if (this.state.remainingDownloads !== null && this.state.remainingDownloads <= 0) {
      logger.warn('Daily download quota exhausted', { kind: 'quota-exhausted' });
      return null;
    }

    // One fresh login is allowed after the server drops the session.
    for (let attempt = 0; attempt < 2; attempt++) {
      if (this.state.token === null && !(await this.login())) {
        logger.error('Cannot download without an OpenSubtitles session', { kind: 'authentication', fileId });
        return null;
      }

      let response: AxiosResponse<unknown>;
      try {
        response = await this.send({
          method: 'POST',
          url: '/download',
          data: { file_id: fileId },
          headers: { Authorization: `Bearer ${this.state.token ?? ''}` },
        });
      } catch (error) {
        logger.error('Download request failed', {
          kind: 'transient-network',
          fileId,
          error: error instanceof Error ? error.message : String(error),
        });
        return null;
      }

      if (response.status === 401) {
        this.state.token = null;
        if (attempt === 0) {
          logger.warn('OpenSubtitles session expired, logging in again', { kind: 'authentication' });
          continue;
        }
        logger.error('Download rejected after logging in again', { kind: 'authentication', fileId });
        return null;
      }

      if (response.status === 200) {
        return this.fetchLink(response.data, fileId);
      }

      if (response.status === 406) {
        this.recordQuota(response.data);
        logger.error('Download refused: quota reached or file unavailable', { kind: 'quota-exhausted', fileId });
        return null;
      }

      logger.error('Download request failed', {
        kind: response.status === 429 ? 'rate-limited' : 'not-found',
        status: response.status,
        fileId,
      });
      return null;
    }

    return null;
  }

  private recordQuota(payload: unknown): QuotaSnapshot | null {
    const parsed = downloadResponseSchema.safeParse(payload);
    if (!parsed.success || parsed.data.remaining === null || parsed.data.remaining === undefined) {
      return null;
    }
    this.state.remainingDownloads = parsed.data.remaining;
    return { remaining: parsed.data.remaining, resetTime: parsed.data.reset_time ?? undefined };
  }

  private async fetchLink(payload: unknown, fileId: number): Promise<Buffer | null> {
    const quota = this.recordQuota(payload);
    if (quota) {
      logger.debug(`Downloads remaining today: ${quota.remaining}`);
    }

    const parsed = downloadResponseSchema.safeParse(payload);
    const link = parsed.success ? parsed.data.link : undefined;
    if (!link) {
      logger.error('Download response carried no link', { kind: 'not-found', fileId });
      return null;
    }

    try {
      const response = await this.http.get<unknown>(link, {
        responseType: 'arraybuffer',
        headers: { 'User-Agent': this.userAgent },
        validateStatus: () => true,
      });
      if (response.status !== 200) {
        logger.error('Subtitle file fetch failed', { kind: 'not-found', status: response.status, fileId });
        return null;
      }
      return toBuffer(response.data);
    } catch (error) {
      logger.error('Subtitle file fetch failed', {
        kind: 'transient-network',
        fileId,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  // ==========================================================================
  // Diagnostics
  // ==========================================================================

  /** Reads the remaining daily quota without downloading anything */
  async probeQuota(): Promise<QuotaSnapshot | null> {
    if (this.state.token === null && !(await this.login())) {
      return null;
    }

    try {
      const response = await this.send({
        method: 'POST',
        url: '/download',
        data: { file_id: 0 },
        headers: { Authorization: `Bearer ${this.state.token ?? ''}` },
      });
      if (response.status !== 200 && response.status !== 406) {
        logger.warn('Quota probe failed', { status: response.status });
        return null;
      }
      return this.recordQuota(response.data);
    } catch (error) {
      logger.warn('Quota probe failed', {
        kind: 'transient-network',
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  async verifyApiKey(): Promise<ApiKeyCheck> {
    try {
      const response = await this.paced({
        method: 'GET',
        url: '/subtitles',
        params: { languages: 'en', query: 'test' },
      });
      const check: ApiKeyCheck = {
        status: 'unexpected',
        httpStatus: response.status,
        rateLimitRemaining: headerString(response.headers['x-ratelimit-remaining']),
        rateLimitLimit: headerString(response.headers['x-ratelimit-limit']),
      };
      if (response.status === 200) check.status = 'valid';
      else if (response.status === 401 || response.status === 403) check.status = 'invalid';
      else if (response.status === 429) check.status = 'rate-limited';
      return check;
    } catch (error) {
      logger.debug('API key check failed', { error: error instanceof Error ? error.message : String(error) });
      return { status: 'unreachable' };
    }
  }
}

function toStringRecord(headers: object): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === 'string') result[name] = value;
  }
  return result;
}

function headerString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function toBuffer(data: unknown): Buffer | null {
  let bytes: Buffer | null = null;
  if (Buffer.isBuffer(data)) bytes = data;
  else if (data instanceof ArrayBuffer) bytes = Buffer.from(data);
  else if (typeof data === 'string') bytes = Buffer.from(data, 'utf8');
  if (bytes && bytes.length > 0) return bytes;
  logger.error('Subtitle file fetch returned no content', { kind: 'not-found' });
  return null;
}
