/**
 * Missing Subtitles Plugin
 * Finds media missing subtitles and acquires them from OpenSubtitles or via Plex
 */

export * from './types.js';
export * from './errors.js';
export * from './languages.js';
export * from './selector.js';
export * from './search-query.js';
export * from './opensubtitles-client.js';
export * from './plex-client.js';
export * from './storage.js';
export * from './report.js';
export * from './acquisition.js';
export * from './config.js';
export * from './status.js';
export * from './runner.js';
