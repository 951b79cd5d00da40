import puppeteer from 'puppeteer-core';
import type { AppConfig } from '../config';
import { attempt, fail, ToolError } from '../errors';
import type { Result } from '../errors';
import type { ScrapeResult } from '../types';
import Logger from '../utils/logger';

const SERVICE_NAME = 'ScraperService';

export interface PageScraper {
  scrape(url: string): Promise<Result<ScrapeResult>>;
}

export function toScrapeResult(url: string, text: string): ScrapeResult {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  return { url, lines };
}

export class BrowserScraper implements PageScraper {
  constructor(private readonly config: AppConfig['scraper']) {}

  private async readVisibleText(url: string, executablePath: string): Promise<string> {
    const browser = await puppeteer.launch({
      executablePath,
      headless: true,
      args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage'],
    });

    try {
      const page = await browser.newPage();
      await page.goto(url, { waitUntil: 'networkidle2', timeout: this.config.timeoutMs });
      return await page.evaluate(() => document.body.innerText);
    } finally {
      await browser.close();
    }
  }

  async scrape(url: string): Promise<Result<ScrapeResult>> {
    const executablePath = this.config.executablePath;
    if (!executablePath) {
      return fail(new ToolError('upstream', 'Browser is not configured. Set CHROME_EXECUTABLE_PATH.'));
    }

    Logger.info(SERVICE_NAME, `Scraping ${url}`);
    const result = await attempt('Browser scrape', async () => toScrapeResult(url, await this.readVisibleText(url, executablePath)));

    if (result.ok) {
      Logger.info(SERVICE_NAME, `Extracted ${result.value.lines.length} lines`, { url });
    } else {
      Logger.error(SERVICE_NAME, 'Scrape failed', { url, error: result.error.message });
    }
    return result;
  }
}
