/**
 * Sponsor Register Client
 *
 * Fetches the raw CSV text of the licensed sponsor register. The gov.uk
 * publication page links several CSV attachments; the worker register is
 * the one whose link mentions "worker".
 */

import { readFile } from 'node:fs/promises';
import * as cheerio from 'cheerio';
import type { RegistrySource } from '../../domain/entities/SponsorRegistry.js';
import { RegistryLoadError } from '../../domain/errors/PipelineErrors.js';

export const SPONSOR_PAGE_URL =
  'https://www.gov.uk/government/publications/register-of-licensed-sponsors-workers';

export interface SponsorRegisterClientConfig {
  timeoutMs: number;
  fetchFn: typeof fetch;
}

const DEFAULT_CONFIG: SponsorRegisterClientConfig = {
  timeoutMs: 30000,
  fetchFn: (input, init) => fetch(input, init),
};

export class SponsorRegisterClient {
  private config: SponsorRegisterClientConfig;

  constructor(config: Partial<SponsorRegisterClientConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Read the register CSV from any supported source
   */
  async readCsv(source: RegistrySource): Promise<string> {
    switch (source.kind) {
      case 'file':
        return this.readFile(source.path);
      case 'url':
        return this.fetchText(source.url);
      case 'publication': {
        const csvUrl = await this.findCsvUrl(source.pageUrl);
        console.log(`[SponsorRegisterClient] Downloading register from ${csvUrl}`);
        return this.fetchText(csvUrl);
      }
    }
  }

  /**
   * Locate the worker register CSV on a publication page
   */
  async findCsvUrl(pageUrl: string): Promise<string> {
    const html = await this.fetchText(pageUrl);
    const csvUrl = selectCsvLink(html);

    if (!csvUrl) {
      throw new RegistryLoadError('No CSV link found on the sponsor register page', { pageUrl });
    }

    return new URL(csvUrl, pageUrl).toString();
  }

  // ===========================================================================
  // PRIVATE HELPERS
  // ===========================================================================

  private async readFile(path: string): Promise<string> {
    try {
      return await readFile(path, 'utf8');
    } catch (error) {
      throw new RegistryLoadError(`Could not read sponsor register file: ${path}`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * The timeout covers the body as well as the headers
   */
  private async fetchText(url: string): Promise<string> {
    let response: Response;
    try {
      response = await this.config.fetchFn(url, {
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw new RegistryLoadError(`Request to ${url} failed`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    if (!response.ok) {
      throw new RegistryLoadError(`Request to ${url} returned ${response.status}`, {
        status: response.status,
      });
    }

    try {
      return await response.text();
    } catch (error) {
      throw new RegistryLoadError(`Download from ${url} was interrupted`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/**
 * Pick the register CSV href from the publication page HTML.
 * Prefers a link whose href or text mentions "worker", else the first CSV link.
 */
export function selectCsvLink(html: string): string | null {
  const $ = cheerio.load(html);
  const links = $('a[href$=".csv"]')
    .toArray()
    .map((el) => ({
      href: $(el).attr('href') ?? '',
      text: $(el).text().trim().toLowerCase(),
    }))
    .filter((link) => link.href !== '');

  const workerLink = links.find(
    (link) => link.href.toLowerCase().includes('worker') || link.text.includes('worker')
  );

  return workerLink?.href ?? links[0]?.href ?? null;
}

/**
 * Interpret a configured source string: an http(s) URL ending in .csv is
 * downloaded directly, any other URL is treated as a publication page, and
 * anything else is a file path.
 */
export function parseRegistrySource(value: string): RegistrySource {
  if (/^https?:\/\//i.test(value)) {
    return new URL(value).pathname.toLowerCase().endsWith('.csv')
      ? { kind: 'url', url: value }
      : { kind: 'publication', pageUrl: value };
  }
  return { kind: 'file', path: value };
}
