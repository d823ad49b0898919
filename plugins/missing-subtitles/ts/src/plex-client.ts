/**
 * Plex Media Server binding for the media library interface
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { createLogger, HttpError } from '@subgap/plugin-utils';
import type { LibrarySection, MediaItem, MediaItemRef, MediaLibrary, ServerInfo } from './types.js';

const logger = createLogger('missing-subtitles:plex');

const SUBTITLE_STREAM_TYPE = 3;

const idSchema = z.union([z.string(), z.number()]);

const identitySchema = z.object({
  MediaContainer: z.object({
    friendlyName: z.string().nullish(),
    version: z.string().nullish(),
    platform: z.string().nullish(),
  }),
});

const sectionsSchema = z.object({
  MediaContainer: z.object({
    Directory: z.array(z.object({ key: idSchema, title: z.string(), type: z.string() })).nullish(),
  }),
});

const metadataListSchema = z.object({
  MediaContainer: z.object({
    Metadata: z.array(z.object({ ratingKey: idSchema, title: z.string().nullish() })).nullish(),
  }),
});

const streamSchema = z.object({
  streamType: z.number(),
  languageCode: z.string().nullish(),
});

const itemSchema = z.object({
  ratingKey: idSchema,
  title: z.string().nullish(),
  type: z.string(),
  grandparentTitle: z.string().nullish(),
  parentIndex: z.number().nullish(),
  index: z.number().nullish(),
  Guid: z.array(z.object({ id: z.string() })).nullish(),
  Media: z
    .array(
      z.object({
        Part: z
          .array(
            z.object({
              file: z.string().nullish(),
              size: z.number().nullish(),
              Stream: z.array(streamSchema).nullish(),
            }),
          )
          .nullish(),
      }),
    )
    .nullish(),
});

const itemResponseSchema = z.object({
  MediaContainer: z.object({ Metadata: z.array(itemSchema).min(1) }),
});

const subtitleSearchSchema = z.object({
  MediaContainer: z.object({
    Stream: z.array(z.object({ key: z.string().nullish(), displayTitle: z.string().nullish() })).nullish(),
  }),
});

export type PlexItemPayload = z.infer<typeof itemSchema>;

export interface PlexLibraryOptions {
  baseUrl: string;
  token: string;
  timeoutMs?: number;
  http?: AxiosInstance;
}

/** Maps a Plex metadata entry to a media item */
export function toMediaItem(payload: PlexItemPayload): MediaItem {
  const item: MediaItem = {
    key: String(payload.ratingKey),
    title: payload.title ?? 'Unknown',
    kind: payload.type === 'episode' ? 'episode' : 'movie',
    subtitleLanguages: [],
  };

  if (item.kind === 'episode') {
    item.showTitle = payload.grandparentTitle ?? undefined;
    item.seasonNumber = payload.parentIndex ?? undefined;
    item.episodeNumber = payload.index ?? undefined;
  }

  for (const guid of payload.Guid ?? []) {
    if (!item.imdbId && guid.id.startsWith('imdb://')) {
      item.imdbId = guid.id.slice('imdb://'.length);
    } else if (!item.tmdbId && guid.id.startsWith('tmdb://')) {
      item.tmdbId = guid.id.slice('tmdb://'.length);
    }
  }

  const firstPart = payload.Media?.[0]?.Part?.[0];
  if (firstPart?.file) item.filePath = firstPart.file;
  if (firstPart?.size) item.fileSize = firstPart.size;

  for (const media of payload.Media ?? []) {
    for (const part of media.Part ?? []) {
      for (const stream of part.Stream ?? []) {
        if (stream.streamType === SUBTITLE_STREAM_TYPE && stream.languageCode) {
          item.subtitleLanguages.push(stream.languageCode);
        }
      }
    }
  }

  return item;
}

export class PlexLibrary implements MediaLibrary {
  private baseUrl: string;
  private token: string;
  private http: AxiosInstance;

  constructor(options: PlexLibraryOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token;
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 30000 });
  }

  private async request<T>(
    method: 'GET' | 'PUT',
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown> | null,
    params?: Record<string, string | number>,
  ): Promise<T | undefined> {
    const response = await this.http.request<unknown>({
      method,
      url: path,
      baseURL: this.baseUrl,
      params,
      headers: {
        'X-Plex-Token': this.token,
        Accept: 'application/json',
      },
      validateStatus: () => true,
    });

    if (response.status < 200 || response.status >= 300) {
      throw new HttpError(response.status, `Plex ${method} ${path} failed with status ${response.status}`, response.data);
    }
    if (!schema) {
      return undefined;
    }

    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      throw new HttpError(response.status, `Unexpected Plex response for ${path}: ${parsed.error.message}`, response.data);
    }
    return parsed.data;
  }

  private async get<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, params?: Record<string, string | number>): Promise<T> {
    const data = await this.request('GET', path, schema, params);
    if (data === undefined) {
      throw new HttpError(200, `Empty Plex response for ${path}`);
    }
    return data;
  }

  async getServerInfo(): Promise<ServerInfo> {
    const { MediaContainer } = await this.get('/', identitySchema);
    return {
      name: MediaContainer.friendlyName ?? 'Unknown',
      version: MediaContainer.version ?? 'Unknown',
      platform: MediaContainer.platform ?? 'Unknown',
    };
  }

  async listSections(): Promise<LibrarySection[]> {
    const { MediaContainer } = await this.get('/library/sections', sectionsSchema);
    return (MediaContainer.Directory ?? []).map((directory) => ({
      key: String(directory.key),
      title: directory.title,
      type: directory.type,
    }));
  }

  private async listMetadata(path: string): Promise<MediaItemRef[]> {
    const { MediaContainer } = await this.get(path, metadataListSchema);
    return (MediaContainer.Metadata ?? []).map((entry) => ({
      key: String(entry.ratingKey),
      title: entry.title ?? 'Unknown',
    }));
  }

  async countEntries(section: LibrarySection): Promise<number> {
    const entries = await this.listMetadata(`/library/sections/${encodeURIComponent(section.key)}/all`);
    return entries.length;
  }

  async listItems(section: LibrarySection): Promise<MediaItemRef[]> {
    const entries = await this.listMetadata(`/library/sections/${encodeURIComponent(section.key)}/all`);
    if (section.type === 'movie') {
      return entries;
    }
    if (section.type !== 'show') {
      logger.debug(`Library "${section.title}" has type ${section.type}, nothing to list`);
      return [];
    }

    const episodes: MediaItemRef[] = [];
    for (const show of entries) {
      const leaves = await this.listMetadata(`/library/metadata/${encodeURIComponent(show.key)}/allLeaves`);
      episodes.push(...leaves);
    }
    logger.debug(`Library "${section.title}": ${entries.length} shows, ${episodes.length} episodes`);
    return episodes;
  }

  async loadItem(key: string): Promise<MediaItem> {
    const { MediaContainer } = await this.get(`/library/metadata/${encodeURIComponent(key)}`, itemResponseSchema, {
      includeGuids: 1,
    });
    return toMediaItem(MediaContainer.Metadata[0]);
  }

  async searchSubtitles(item: MediaItem, language: string): Promise<boolean> {
    const path = `/library/metadata/${encodeURIComponent(item.key)}/subtitles`;
    const { MediaContainer } = await this.get(path, subtitleSearchSchema, {
      language,
      hearingImpaired: 0,
      forced: 0,
    });

    const match = (MediaContainer.Stream ?? []).find((stream) => stream.key);
    if (!match?.key) {
      logger.debug(`Plex found no ${language} subtitles`, { item: item.title });
      return false;
    }

    await this.request('PUT', path, null, { key: match.key });
    logger.debug(`Plex attached ${match.displayTitle ?? match.key}`, { item: item.title, language });
    return true;
  }
}
