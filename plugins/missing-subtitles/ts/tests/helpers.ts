/**
 * In-process stand-ins shared by the plugin tests
 */

import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import { AcquisitionError } from '../src/errors.js';
import type {
  LibrarySection,
  MediaItem,
  MediaItemRef,
  MediaLibrary,
  SearchQuery,
  ServerInfo,
  SubtitleCandidate,
  SubtitleCatalog,
  SubtitleStorage,
} from '../src/types.js';

export interface RecordedRequest {
  method: string;
  url: string;
  params: Record<string, unknown>;
  body: unknown;
  headers: Record<string, string>;
}

export interface FakeReply {
  status: number;
  data?: unknown;
  headers?: Record<string, string>;
}

export type Route = (request: RecordedRequest) => FakeReply | Promise<FakeReply>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** An axios instance whose adapter answers from `route` and records every request */
export function fakeHttp(route: Route): { http: AxiosInstance; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config) => {
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(config.headers.toJSON())) {
      if (value !== undefined && value !== null) {
        headers[name.toLowerCase()] = String(value);
      }
    }

    const rawBody: unknown = config.data;
    const request: RecordedRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      params: isRecord(config.params) ? config.params : {},
      body: typeof rawBody === 'string' && rawBody.length > 0 ? JSON.parse(rawBody) : rawBody,
      headers,
    };
    requests.push(request);

    const reply = await route(request);
    const response: AxiosResponse = {
      data: reply.data ?? '',
      status: reply.status,
      statusText: String(reply.status),
      headers: reply.headers ?? {},
      config,
    };
    return response;
  };

  return { http: axios.create({ adapter }), requests };
}

/** A clock that only moves when something sleeps or the test advances it */
export function fakeClock(start = 0) {
  let time = start;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => time,
    advance: (ms: number) => {
      time += ms;
    },
    sleep: async (ms: number) => {
      sleeps.push(ms);
      time += ms;
    },
  };
}

export function searchResult(
  language: string,
  fileId: number | null,
  ratings: number,
  downloadCount: number,
  release = `release-${fileId ?? 'none'}`,
) {
  return {
    id: String(fileId ?? 0),
    type: 'subtitle',
    attributes: {
      language,
      ratings,
      download_count: downloadCount,
      release,
      uploader: { name: 'uploader-a' },
      files: fileId === null ? [] : [{ file_id: fileId, file_name: `${release}.srt` }],
    },
  };
}

// ============================================================================
// Media library, storage and catalog fakes
// ============================================================================

export function movie(key: string, title: string, extra: Partial<MediaItem> = {}): MediaItem {
  return {
    key,
    title,
    kind: 'movie',
    subtitleLanguages: [],
    filePath: `/media/movies/${title}.mkv`,
    fileSize: 1000,
    ...extra,
  };
}

export function episode(key: string, show: string, season: number, number: number, extra: Partial<MediaItem> = {}): MediaItem {
  return {
    key,
    title: `Episode ${number}`,
    kind: 'episode',
    showTitle: show,
    seasonNumber: season,
    episodeNumber: number,
    subtitleLanguages: [],
    filePath: `/media/tv/${show}/S${season}E${number}.mkv`,
    fileSize: 2000,
    ...extra,
  };
}

export interface FakeLibraryEntry {
  section: LibrarySection;
  items: MediaItem[];
}

export class FakeLibrary implements MediaLibrary {
  readonly searchCalls: Array<[string, string]> = [];
  readonly loaded: string[] = [];
  readonly failingKeys = new Set<string>();
  /** Languages the server's own agent can find, per item key */
  readonly attachable = new Map<string, string[]>();
  private entries: FakeLibraryEntry[];
  private items = new Map<string, MediaItem>();

  constructor(entries: FakeLibraryEntry[]) {
    this.entries = entries;
    for (const entry of entries) {
      for (const item of entry.items) {
        this.items.set(item.key, { ...item, subtitleLanguages: [...item.subtitleLanguages] });
      }
    }
  }

  async getServerInfo(): Promise<ServerInfo> {
    return { name: 'Test Server', version: '1.40.0', platform: 'Linux' };
  }

  async listSections(): Promise<LibrarySection[]> {
    return this.entries.map((entry) => entry.section);
  }

  async listItems(section: LibrarySection): Promise<MediaItemRef[]> {
    const entry = this.entries.find((candidate) => candidate.section.key === section.key);
    return (entry?.items ?? []).map((item) => ({ key: item.key, title: item.title }));
  }

  async countEntries(section: LibrarySection): Promise<number> {
    const entry = this.entries.find((candidate) => candidate.section.key === section.key);
    return new Set(entry?.items.map((item) => item.showTitle ?? item.key)).size;
  }

  async loadItem(key: string): Promise<MediaItem> {
    this.loaded.push(key);
    if (this.failingKeys.has(key)) {
      throw new Error(`metadata for ${key} unavailable`);
    }
    const item = this.items.get(key);
    if (!item) {
      throw new Error(`unknown item ${key}`);
    }
    return { ...item, subtitleLanguages: [...item.subtitleLanguages] };
  }

  async searchSubtitles(item: MediaItem, language: string): Promise<boolean> {
    this.searchCalls.push([item.key, language]);
    const stored = this.items.get(item.key);
    if (!stored || !(this.attachable.get(item.key) ?? []).includes(language)) {
      return false;
    }
    stored.subtitleLanguages.push(language);
    return true;
  }
}

export class MemoryStorage implements SubtitleStorage {
  readonly files = new Map<string, Buffer>();
  failWrites = false;
  writable = true;

  constructor(mediaPaths: string[] = []) {
    for (const path of mediaPaths) {
      this.files.set(path, Buffer.alloc(10));
    }
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(path);
  }

  async fileSize(path: string): Promise<number | undefined> {
    return this.files.get(path)?.length;
  }

  async write(path: string, content: Buffer): Promise<void> {
    if (this.failWrites) {
      throw new AcquisitionError('local-write', `Cannot write ${path}: read-only file system`);
    }
    this.files.set(path, content);
  }

  async canWrite(): Promise<boolean> {
    return this.writable;
  }
}

export function candidate(language: string, fileId: number | null, rating: number, downloadCount: number): SubtitleCandidate {
  return {
    language,
    fileId,
    rating,
    downloadCount,
    releaseName: `release-${fileId ?? 'none'}`,
    uploader: 'uploader-a',
  };
}

export class FakeCatalog implements SubtitleCatalog {
  readonly searches: SearchQuery[] = [];
  readonly downloads: number[] = [];
  readonly failingDownloads = new Set<number>();
  logins = 0;
  private respond: (query: SearchQuery) => SubtitleCandidate[] | null;

  constructor(respond?: (query: SearchQuery) => SubtitleCandidate[] | null) {
    let nextId = 100;
    this.respond = respond ?? ((query) => query.languages.map((language) => candidate(language, nextId++, 8, 500)));
  }

  async search(query: SearchQuery): Promise<SubtitleCandidate[] | null> {
    this.searches.push(query);
    return this.respond(query);
  }

  async download(fileId: number): Promise<Buffer | null> {
    this.downloads.push(fileId);
    if (this.failingDownloads.has(fileId)) {
      return null;
    }
    return Buffer.from(`subtitle ${fileId}`);
  }

  async login(): Promise<boolean> {
    this.logins++;
    return true;
  }
}
