import { readFile, readdir } from 'node:fs/promises';
import path from 'node:path';
import { parseCsv, type CsvRecord } from './csv.js';
import { DatasetNotFoundError } from './errors.js';
import type { Logger } from './log.js';
import type { AgeGroupKey, FacilityEnrichment, FacilityRecord, ServiceConfig } from './types.js';

export type DatasetConfig = Pick<ServiceConfig, 'dataDir' | 'datasetPrefix' | 'supplementaryFile'>;

// Capacity column per age group in the licensed child care centres export.
const SPACE_COLUMNS = {
  infant: 'IGSPACE',
  toddler: 'TGSPACE',
  preschool: 'PGSPACE',
  kindergarten: 'KGSPACE',
  schoolAge: 'SGSPACE'
} as const satisfies Record<AgeGroupKey, string>;

const EMPTY_ENRICHMENT: FacilityEnrichment = {
  website: null,
  googleRating: null,
  googleReviewsCount: null,
  googleMapsUrl: null
};

function toNumberOrNull(value: string | undefined): number | null {
  if (value === undefined || value.trim() === '') {
    return null;
  }
  const num = Number(value);
  return Number.isFinite(num) ? num : null;
}

function toIntegerOrNull(value: string | undefined): number | null {
  const num = toNumberOrNull(value);
  return num === null ? null : Math.trunc(num);
}

function toStringOrNull(value: string | undefined): string | null {
  const str = value?.trim();
  return str ? str : null;
}

function isFlagSet(value: string | undefined): boolean {
  return value?.trim() === 'Y';
}

/**
 * Picks the newest dataset snapshot in `dataDir`.
 * Snapshots are named `<prefix><YYYYMMDD>.csv`, so reverse lexical order is newest first.
 */
export async function findLatestDataset(config: DatasetConfig): Promise<string> {
  let entries: string[];
  try {
    entries = await readdir(config.dataDir);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new DatasetNotFoundError(config.dataDir);
    }
    throw error;
  }

  const snapshots = entries
    .filter((name) => name.startsWith(config.datasetPrefix) && name.endsWith('.csv'))
    .sort()
    .reverse();

  if (snapshots.length === 0) {
    throw new DatasetNotFoundError(config.dataDir);
  }
  return path.join(config.dataDir, snapshots[0]);
}

export function normalizeFacility(
  raw: CsvRecord,
  enrichment: FacilityEnrichment = EMPTY_ENRICHMENT
): FacilityRecord | null {
  const id = toStringOrNull(raw.LOC_ID);
  if (!id) {
    return null;
  }

  return {
    id,
    name: raw.LOC_NAME?.trim() ?? '',
    address: raw.ADDRESS?.trim() ?? '',
    postalCode: raw.PCODE?.trim() ?? '',
    phone: raw.PHONE?.trim() ?? '',
    geometry: raw.geometry ?? '',
    spaces: {
      infant: toIntegerOrNull(raw[SPACE_COLUMNS.infant]),
      toddler: toIntegerOrNull(raw[SPACE_COLUMNS.toddler]),
      preschool: toIntegerOrNull(raw[SPACE_COLUMNS.preschool]),
      kindergarten: toIntegerOrNull(raw[SPACE_COLUMNS.kindergarten]),
      schoolAge: toIntegerOrNull(raw[SPACE_COLUMNS.schoolAge])
    },
    totalSpaces: toIntegerOrNull(raw.TOTSPACE) ?? 0,
    subsidy: isFlagSet(raw.subsidy),
    cwelcc: isFlagSet(raw.cwelcc_flag),
    ...enrichment
  };
}

export function normalizeEnrichment(raw: CsvRecord): FacilityEnrichment {
  return {
    website: toStringOrNull(raw.website),
    googleRating: toNumberOrNull(raw.google_rating),
    googleReviewsCount: toIntegerOrNull(raw.google_reviews_count),
    googleMapsUrl: toStringOrNull(raw.google_maps_url)
  };
}

async function readOptionalFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Loads the supplementary Places data keyed by facility id.
 * Returns an empty map when the file has not been generated.
 */
export async function loadEnrichment(config: DatasetConfig): Promise<Map<string, FacilityEnrichment>> {
  const text = await readOptionalFile(path.join(config.dataDir, config.supplementaryFile));
  const enrichment = new Map<string, FacilityEnrichment>();
  if (text === null) {
    return enrichment;
  }
  for (const row of parseCsv(text)) {
    const id = toStringOrNull(row.LOC_ID);
    if (id) {
      enrichment.set(id, normalizeEnrichment(row));
    }
  }
  return enrichment;
}

/**
 * Reads the newest dataset snapshot from disk and left-joins the supplementary data.
 * Nothing is cached: every call sees the snapshot currently on disk.
 */
export async function loadFacilities(config: DatasetConfig, log: Logger): Promise<FacilityRecord[]> {
  const datasetPath = await findLatestDataset(config);
  const [text, enrichment] = await Promise.all([readFile(datasetPath, 'utf-8'), loadEnrichment(config)]);

  const facilities = parseCsv(text)
    .map((row) => normalizeFacility(row, enrichment.get(row.LOC_ID?.trim() ?? '')))
    .filter((facility): facility is FacilityRecord => facility !== null);

  log.info('Loaded daycare dataset', {
    file: path.basename(datasetPath),
    count: facilities.length,
    enriched: enrichment.size
  });

  return facilities;
}
