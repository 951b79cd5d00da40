import { stringify } from 'csv-stringify/sync';
import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { describeError, ToolError } from '../errors';
import type { Joke, Report, ReportFormat, ScrapeResult, TextStats } from '../types';
import Logger from '../utils/logger';

const SERVICE_NAME = 'ReportWriter';

export type ReportFields = Record<string, string | number>;
export type CsvCell = string | number;

export type ReportContent =
  | { format: 'txt'; fields: ReportFields }
  | { format: 'json'; data: unknown }
  | { format: 'csv'; columns: string[]; rows: CsvCell[][] };

export const SCRAPE_COLUMNS = ['index', 'url', 'line'];

export function serializeReport(content: ReportContent): string {
  switch (content.format) {
    case 'txt':
      return Object.entries(content.fields)
        .map(([label, value]) => `${label}: ${value}\n`)
        .join('');
    case 'json':
      return JSON.stringify(content.data, null, 2);
    case 'csv':
      return stringify([content.columns, ...content.rows]);
  }
}

export function scrapeTable(result: ScrapeResult): Extract<ReportContent, { format: 'csv' }> {
  return {
    format: 'csv',
    columns: SCRAPE_COLUMNS,
    rows: result.lines.map((line, i) => [i + 1, result.url, line]),
  };
}

export interface TextReportInput extends TextStats {
  cleaned: string;
  joke: Joke;
}

/**
 * `report_<YYYYMMDD_HHMMSS>_<id>.<format>`, with the UTC creation time.
 */
export function reportFileName(id: string, format: ReportFormat, createdAt: Date): string {
  const stamp = createdAt.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
  return `report_${stamp}_${id}.${format}`;
}

export type ReportSet = Record<ReportFormat, string>;

export class ReportWriter {
  constructor(private readonly dir: string) {}

  async write(content: ReportContent): Promise<Report> {
    const id = uuidv4();
    const createdAt = new Date();
    const filePath = path.join(this.dir, reportFileName(id, content.format, createdAt));

    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(filePath, serializeReport(content), { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      throw new ToolError('storage', `Failed to write report: ${describeError(error)}`, { cause: error });
    }

    Logger.debug(SERVICE_NAME, `Saved ${content.format} report`, { path: filePath });
    return { id, createdAt: createdAt.toISOString(), format: content.format, path: filePath };
  }

  /**
   * Writes the TXT/JSON/CSV triple for a text-processing result and returns the paths by format.
   */
  async writeTextReports({ cleaned, characters, words, joke }: TextReportInput): Promise<ReportSet> {
    const txt = await this.write({
      format: 'txt',
      fields: {
        Cleaned: cleaned,
        Characters: characters,
        Words: words,
        Joke: `${joke.setup} - ${joke.punchline}`,
      },
    });
    const json = await this.write({
      format: 'json',
      data: {
        cleaned,
        characters,
        words,
        joke_setup: joke.setup,
        joke_punchline: joke.punchline,
      },
    });
    const csv = await this.write({
      format: 'csv',
      columns: ['cleaned', 'characters', 'words', 'joke_setup', 'joke_punchline'],
      rows: [[cleaned, characters, words, joke.setup, joke.punchline]],
    });

    return { txt: txt.path, json: json.path, csv: csv.path };
  }
}
