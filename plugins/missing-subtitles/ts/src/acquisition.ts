/**
 * Acquisition orchestrator: walks libraries, finds missing subtitle
 * languages and fetches them within the run's download budget.
 */

import { createLogger, defaultSleep } from '@subgap/plugin-utils';
import type { Sleep } from '@subgap/plugin-utils';
import { AcquisitionError } from './errors.js';
import { existingLanguages, missingLanguages, normalizeLanguageSet } from './languages.js';
import { formatTimestamp, ReportAggregator } from './report.js';
import { buildSearchQuery, displayName } from './search-query.js';
import { selectBest } from './selector.js';
import { subtitlePath } from './storage.js';
import type {
  AcquisitionMethod,
  LibrarySection,
  LibraryStats,
  MediaItem,
  MediaItemRef,
  MediaKind,
  MediaLibrary,
  RunStats,
  SubtitleCatalog,
  SubtitleStorage,
} from './types.js';

const logger = createLogger('missing-subtitles:acquisition');

export interface AcquisitionOptions {
  method: AcquisitionMethod;
  languages: string[];
  library: MediaLibrary;
  storage: SubtitleStorage;
  report: ReportAggregator;
  /** Required for the local method */
  catalog?: SubtitleCatalog;
  maxDownloads?: number;
  libraryName?: string;
  mediaKind?: MediaKind;
  /** Wait before checking whether the server attached a subtitle */
  settleMs?: number;
  sleep?: Sleep;
  now?: () => Date;
  signal?: AbortSignal;
}

export function emptyLibraryStats(): LibraryStats {
  return { total: 0, needsSubtitles: 0, downloaded: 0, skipped: 0, errors: 0 };
}

export function emptyRunStats(): RunStats {
  return { ...emptyLibraryStats(), librariesProcessed: 0, librariesSkipped: 0 };
}

const SECTION_KIND: Record<string, MediaKind> = {
  movie: 'movie',
  show: 'episode',
};

export class AcquisitionOrchestrator {
  private method: AcquisitionMethod;
  private languages: string[];
  private library: MediaLibrary;
  private storage: SubtitleStorage;
  private report: ReportAggregator;
  private catalog?: SubtitleCatalog;
  private maxDownloads?: number;
  private libraryName?: string;
  private mediaKind?: MediaKind;
  private settleMs: number;
  private sleep: Sleep;
  private now: () => Date;
  private signal?: AbortSignal;

  constructor(options: AcquisitionOptions) {
    if (options.method === 'local' && !options.catalog) {
      throw new AcquisitionError('initialization', 'The local method needs a subtitle catalog');
    }
    this.method = options.method;
    this.languages = normalizeLanguageSet(options.languages);
    this.library = options.library;
    this.storage = options.storage;
    this.report = options.report;
    this.catalog = options.catalog;
    this.maxDownloads = options.maxDownloads;
    this.libraryName = options.libraryName;
    this.mediaKind = options.mediaKind;
    this.settleMs = options.settleMs ?? 2000;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.signal = options.signal;
  }

  private get interrupted(): boolean {
    return this.signal?.aborted === true;
  }

  // ==========================================================================
  // Single item
  // ==========================================================================

  /**
   * Acquires subtitles for every wanted language the item lacks.
   * Returns how many were acquired, never more than `budget`.
   */
  async acquireForItem(item: MediaItem, budget?: number): Promise<number> {
    if (budget !== undefined && budget <= 0) {
      return 0;
    }
    const missing = missingLanguages(item, this.languages);
    if (missing.length === 0) {
      return 0;
    }
    return this.method === 'delegated'
      ? this.acquireDelegated(item, missing, budget)
      : this.acquireLocal(item, missing, budget);
  }

  private async acquireLocal(item: MediaItem, missing: string[], budget?: number): Promise<number> {
    const name = displayName(item);
    const catalog = this.catalog;
    if (!catalog) {
      throw new AcquisitionError('initialization', 'The local method needs a subtitle catalog');
    }

    const mediaPath = item.filePath;
    if (!mediaPath) {
      logger.warn(`No media file known for ${name}`);
      return 0;
    }
    if (!(await this.storage.exists(mediaPath))) {
      logger.warn(`Media file not found: ${mediaPath}`, { item: name });
      return 0;
    }

    const wanted: string[] = [];
    for (const language of missing) {
      if (await this.storage.exists(subtitlePath(mediaPath, language))) {
        logger.debug(`${language} subtitle already on disk for ${name}`);
      } else {
        wanted.push(language);
      }
    }
    if (wanted.length === 0) {
      return 0;
    }

    const fileSize = item.fileSize ?? (await this.storage.fileSize(mediaPath));
    const candidates = await catalog.search(buildSearchQuery(item, wanted, fileSize));
    if (!candidates || candidates.length === 0) {
      logger.info(`No subtitles found for ${name}`, { languages: wanted });
      return 0;
    }

    let acquired = 0;
    for (const language of wanted) {
      if (budget !== undefined && acquired >= budget) {
        break;
      }

      const best = selectBest(candidates, language);
      if (!best) {
        logger.info(`No ${language} subtitle found for ${name}`);
        continue;
      }
      if (best.fileId === null) {
        logger.warn(`Best ${language} subtitle for ${name} has no file`, { release: best.releaseName });
        continue;
      }

      const content = await catalog.download(best.fileId);
      if (!content) {
        logger.warn(`Could not download ${language} subtitle for ${name}`, { fileId: best.fileId });
        continue;
      }

      const target = subtitlePath(mediaPath, language);
      try {
        await this.storage.write(target, content);
      } catch (error) {
        logger.error(`Could not save ${language} subtitle for ${name}`, {
          kind: error instanceof AcquisitionError ? error.kind : 'local-write',
          error: error instanceof Error ? error.message : String(error),
        });
        continue;
      }

      this.report.add({
        mediaTitle: name,
        mediaKind: item.kind,
        language,
        method: 'local',
        rating: best.rating,
        downloadCount: best.downloadCount,
        releaseName: best.releaseName,
        uploader: best.uploader,
        filePath: target,
        timestamp: formatTimestamp(this.now()),
      });
      logger.success(`Downloaded ${language} subtitle for ${name}`, {
        rating: best.rating,
        downloads: best.downloadCount,
      });
      acquired++;
    }

    return acquired;
  }

  private async acquireDelegated(item: MediaItem, missing: string[], budget?: number): Promise<number> {
    const name = displayName(item);
    let acquired = 0;

    for (const language of missing) {
      if (budget !== undefined && acquired >= budget) {
        break;
      }

      try {
        const attached = await this.library.searchSubtitles(item, language);
        if (!attached) {
          logger.info(`Plex found no ${language} subtitle for ${name}`);
          continue;
        }

        await this.sleep(this.settleMs);
        const refreshed = await this.library.loadItem(item.key);
        if (!existingLanguages(refreshed).has(language)) {
          logger.warn(`Plex did not attach a ${language} subtitle to ${name}`);
          continue;
        }

        this.report.add({
          mediaTitle: name,
          mediaKind: item.kind,
          language,
          method: 'delegated',
          timestamp: formatTimestamp(this.now()),
        });
        logger.success(`Plex downloaded ${language} subtitle for ${name}`);
        acquired++;
      } catch (error) {
        logger.error(`Plex subtitle search failed for ${name}`, {
          language,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return acquired;
  }

  // ==========================================================================
  // Traversal
  // ==========================================================================

  async processLibrary(section: LibrarySection, budget?: number): Promise<LibraryStats> {
    const stats = emptyLibraryStats();
    logger.info(`Processing library "${section.title}"`, { type: section.type });

    let refs: MediaItemRef[];
    try {
      refs = await this.library.listItems(section);
    } catch (error) {
      logger.error(`Could not list library "${section.title}"`, {
        error: error instanceof Error ? error.message : String(error),
      });
      stats.errors++;
      return stats;
    }
    stats.total = refs.length;

    for (let index = 0; index < refs.length; index++) {
      if (this.interrupted) {
        logger.warn('Interrupted, stopping traversal');
        break;
      }
      if (budget !== undefined && stats.downloaded >= budget) {
        stats.skipped = refs.length - index;
        logger.info(`Download limit of ${budget} reached, skipping ${stats.skipped} remaining items`);
        break;
      }

      const ref = refs[index];
      try {
        const item = await this.library.loadItem(ref.key);
        const missing = missingLanguages(item, this.languages);
        if (missing.length === 0) {
          continue;
        }

        stats.needsSubtitles++;
        logger.debug(`[${index + 1}/${refs.length}] ${displayName(item)} needs ${missing.join(', ')}`);
        const remaining = budget === undefined ? undefined : budget - stats.downloaded;
        stats.downloaded += await this.acquireForItem(item, remaining);
      } catch (error) {
        stats.errors++;
        logger.error(`Failed to process ${ref.title}`, {
          key: ref.key,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    logger.info(`Library "${section.title}" done`, { ...stats });
    return stats;
  }

  private eligible(section: LibrarySection): boolean {
    const kind = SECTION_KIND[section.type];
    return kind !== undefined && (this.mediaKind === undefined || this.mediaKind === kind);
  }

  async processAllLibraries(): Promise<RunStats> {
    const totals = emptyRunStats();
    const sections = (await this.library.listSections()).filter((section) => this.eligible(section));

    for (const section of sections) {
      if (this.interrupted) {
        break;
      }

      const remaining = this.maxDownloads === undefined ? undefined : this.maxDownloads - totals.downloaded;
      if (remaining !== undefined && remaining <= 0) {
        totals.librariesSkipped++;
        logger.info(`Download limit reached, skipping library "${section.title}"`);
        continue;
      }

      const stats = await this.processLibrary(section, remaining);
      totals.librariesProcessed++;
      totals.total += stats.total;
      totals.needsSubtitles += stats.needsSubtitles;
      totals.downloaded += stats.downloaded;
      totals.skipped += stats.skipped;
      totals.errors += stats.errors;
    }

    return totals;
  }

  async processLibraryByName(name: string): Promise<RunStats> {
    const sections = await this.library.listSections();
    const section = sections.find((candidate) => candidate.title === name);
    if (!section) {
      logger.error(`Library "${name}" not found`, { available: sections.map((candidate) => candidate.title) });
      return emptyRunStats();
    }
    if (!this.eligible(section)) {
      logger.error(`Library "${name}" holds ${section.type} items, not movies or shows`);
      return emptyRunStats();
    }

    const stats = await this.processLibrary(section, this.maxDownloads);
    return { ...stats, librariesProcessed: 1, librariesSkipped: 0 };
  }

  run(): Promise<RunStats> {
    return this.libraryName ? this.processLibraryByName(this.libraryName) : this.processAllLibraries();
  }
}
