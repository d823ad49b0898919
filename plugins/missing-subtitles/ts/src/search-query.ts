import type { MediaItem, SearchIdentity, SearchQuery } from './types.js';

/**
 * Identity preference: IMDB id, then TMDB id, then free text. Episodes fall
 * back to the show title, movies to their own title.
 */
export function searchIdentity(item: MediaItem): SearchIdentity {
  if (item.imdbId) {
    return { kind: 'imdb', imdbId: item.imdbId };
  }
  if (item.tmdbId) {
    return { kind: 'tmdb', tmdbId: item.tmdbId };
  }
  const query = item.kind === 'episode' ? (item.showTitle ?? item.title) : item.title;
  return { kind: 'text', query };
}

export function buildSearchQuery(item: MediaItem, languages: string[], fileSize?: number): SearchQuery {
  const query: SearchQuery = {
    identity: searchIdentity(item),
    languages: [...languages],
  };

  if (item.kind === 'episode') {
    if (item.seasonNumber !== undefined) query.seasonNumber = item.seasonNumber;
    if (item.episodeNumber !== undefined) query.episodeNumber = item.episodeNumber;
  }

  const size = item.fileSize ?? fileSize;
  if (size !== undefined && size > 0) {
    query.fileSize = size;
  }

  return query;
}

/** "Show - S01E02 - Title" for episodes, the plain title otherwise */
export function displayName(item: Pick<MediaItem, 'kind' | 'title' | 'showTitle' | 'seasonNumber' | 'episodeNumber'>): string {
  if (item.kind !== 'episode') {
    return item.title;
  }
  const season = String(item.seasonNumber ?? 0).padStart(2, '0');
  const episode = String(item.episodeNumber ?? 0).padStart(2, '0');
  return `${item.showTitle ?? 'Unknown'} - S${season}E${episode} - ${item.title}`;
}
