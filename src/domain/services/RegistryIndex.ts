/**
 * Registry Index
 *
 * Loads the sponsor register CSV into an ordered, read-only list of
 * entries. Names are only trimmed and lower-cased; legal suffixes such as
 * "Ltd" are left for the fuzzy matcher to absorb.
 */

import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { RegistryEntry, RegistrySource, SponsorRegistry } from '../entities/SponsorRegistry.js';
import { RegistryLoadError } from '../errors/PipelineErrors.js';
import { SponsorRegisterClient } from '../../integrations/registry/SponsorRegisterClient.js';

export const DEFAULT_NAME_COLUMN = 'Organisation Name';

export interface RegistryLoadOptions {
  nameColumn?: string;
}

const csvRowsSchema = z.array(z.array(z.string()));

/**
 * Normalize a company name for indexing and cache keys.
 * Returns null for anything that is not a non-blank string (null, NaN, numbers).
 */
export function normalizeCompanyName(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const normalized = value.trim().toLowerCase();
  return normalized === '' ? null : normalized;
}

/**
 * Build the registry from CSV text with a header row
 */
export function loadRegistry(csvText: string, options: RegistryLoadOptions = {}): SponsorRegistry {
  const nameColumn = options.nameColumn ?? DEFAULT_NAME_COLUMN;

  let rows: string[][];
  try {
    rows = csvRowsSchema.parse(parse(csvText, { bom: true, skip_empty_lines: true }));
  } catch (error) {
    throw new RegistryLoadError('Sponsor register is not valid CSV', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const [header, ...records] = rows;
  if (!header) {
    throw new RegistryLoadError('Sponsor register is empty');
  }

  const columns = header.map((column) => column.trim());
  const nameIndex = columns.indexOf(nameColumn);
  if (nameIndex === -1) {
    throw new RegistryLoadError(`Sponsor register has no "${nameColumn}" column`, { columns });
  }

  const entries: RegistryEntry[] = [];
  for (const record of records) {
    const name = record[nameIndex]?.trim() ?? '';
    const canonicalName = normalizeCompanyName(name);
    if (canonicalName === null) continue;

    const attributes: Record<string, string> = {};
    columns.forEach((column, i) => {
      if (i !== nameIndex) attributes[column] = record[i] ?? '';
    });

    entries.push(Object.freeze({ name, canonicalName, attributes: Object.freeze(attributes) }));
  }

  if (entries.length === 0) {
    throw new RegistryLoadError('Sponsor register contains no organisation names', { nameColumn });
  }

  return Object.freeze({
    entries: Object.freeze(entries),
    nameColumn,
    loadedAt: new Date(),
  });
}

/**
 * Read a source and build the registry from it
 */
export async function loadRegistryFrom(
  source: RegistrySource,
  options: RegistryLoadOptions = {},
  client: SponsorRegisterClient = new SponsorRegisterClient()
): Promise<SponsorRegistry> {
  const csvText = await client.readCsv(source);
  const registry = loadRegistry(csvText, options);
  console.log(`[RegistryIndex] Loaded ${registry.entries.length.toLocaleString('en-GB')} sponsors`);
  return registry;
}
