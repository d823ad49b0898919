/**
 * Run report
 */

import { writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { AcquisitionMethod, DownloadRecord } from './types.js';

export const EMPTY_REPORT_MESSAGE = 'No subtitles were downloaded.';

const HEAVY_RULE = '='.repeat(80);
const LIGHT_RULE = '-'.repeat(80);

const METHOD_LABELS: Record<AcquisitionMethod, string> = {
  local: 'local (OpenSubtitles API, files saved next to media)',
  delegated: 'delegated (Plex OpenSubtitles agent)',
};

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as `YYYY-MM-DD HH:MM:SS` */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatCount(value: number): string {
  return String(Math.trunc(value)).replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

export class ReportAggregator {
  private method: AcquisitionMethod;
  private now: () => Date;
  private entries: DownloadRecord[] = [];

  constructor(method: AcquisitionMethod, now: () => Date = () => new Date()) {
    this.method = method;
    this.now = now;
  }

  add(record: DownloadRecord): void {
    this.entries.push(record);
  }

  get records(): readonly DownloadRecord[] {
    return this.entries;
  }

  get count(): number {
    return this.entries.length;
  }

  /** Downloads per language, sorted by code */
  languageBreakdown(): Array<[string, number]> {
    const counts = new Map<string, number>();
    for (const record of this.entries) {
      counts.set(record.language, (counts.get(record.language) ?? 0) + 1);
    }
    return [...counts.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  render(): string {
    if (this.entries.length === 0) {
      return EMPTY_REPORT_MESSAGE;
    }

    const lines: string[] = [
      HEAVY_RULE,
      'SUBTITLE DOWNLOAD REPORT',
      HEAVY_RULE,
      `Total subtitles downloaded: ${this.entries.length}`,
      `Download method: ${METHOD_LABELS[this.method]}`,
      `Generated: ${formatTimestamp(this.now())}`,
      HEAVY_RULE,
    ];

    const movies = this.entries.filter((record) => record.mediaKind === 'movie');
    const episodes = this.entries.filter((record) => record.mediaKind === 'episode');
    this.renderSection(lines, 'MOVIES', movies);
    this.renderSection(lines, 'TV EPISODES', episodes);

    lines.push('', HEAVY_RULE, 'SUMMARY STATISTICS', HEAVY_RULE);
    lines.push(`Total subtitles: ${this.entries.length}`);

    const local = this.entries.filter((record) => record.method === 'local');
    if (local.length > 0) {
      const ratingSum = local.reduce((sum, record) => sum + (record.rating ?? 0), 0);
      const downloadSum = local.reduce((sum, record) => sum + (record.downloadCount ?? 0), 0);
      lines.push(`Average subtitle rating: ${(ratingSum / local.length).toFixed(1)}/10`);
      lines.push(`Total community downloads: ${formatCount(downloadSum)}`);
    }

    lines.push('', 'Language breakdown:');
    for (const [language, count] of this.languageBreakdown()) {
      lines.push(`  ${language.toUpperCase()}: ${count}`);
    }
    lines.push(HEAVY_RULE);

    return lines.join('\n');
  }

  private renderSection(lines: string[], heading: string, records: DownloadRecord[]): void {
    if (records.length === 0) {
      return;
    }

    lines.push('', `${heading} (${records.length} subtitles)`, LIGHT_RULE);
    for (const record of records) {
      lines.push('', record.mediaTitle, `  Language: ${record.language.toUpperCase()}`);
      if (record.method === 'local') {
        lines.push(
          `  Rating: ${(record.rating ?? 0).toFixed(1)}/10`,
          `  Downloads: ${formatCount(record.downloadCount ?? 0)}`,
          `  Release: ${record.releaseName ?? 'Unknown'}`,
          `  Uploader: ${record.uploader ?? 'Unknown'}`,
          `  File: ${record.filePath ? basename(record.filePath) : 'Unknown'}`,
        );
      } else {
        lines.push('  Method: downloaded by the Plex agent');
      }
      lines.push(`  Timestamp: ${record.timestamp}`);
    }
  }

  async save(path: string): Promise<void> {
    await writeFile(path, `${this.render()}\n`, 'utf8');
  }
}
