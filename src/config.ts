import path from 'node:path';
import type { ServiceConfig } from './types.js';

const DEFAULT_PORT = 3000;
const DEFAULT_DATA_DIR = 'data';
const DEFAULT_DATASET_PREFIX = 'daycare_list_';
const DEFAULT_SUPPLEMENTARY_FILE = 'daycare_supplementary.csv';
const DEFAULT_GOOGLE_MAPS_BASE_URL = 'https://maps.googleapis.com';
const DEFAULT_SENDGRID_BASE_URL = 'https://api.sendgrid.com';
const DEFAULT_FROM_EMAIL = 'noreply@findmydaycare.com';
const DEFAULT_TARGET_CITY = 'Toronto';
const DEFAULT_TARGET_REGION = 'Ontario, Canada';
const DEFAULT_REQUEST_TIMEOUT = 3000;
const DEFAULT_OVERALL_TIMEOUT = 15000;

function parseInteger(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function optionalString(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  return {
    port: parseInteger(env.PORT, DEFAULT_PORT),
    dataDir: path.resolve(env.DATA_DIR?.trim() || DEFAULT_DATA_DIR),
    datasetPrefix: env.DATASET_PREFIX?.trim() || DEFAULT_DATASET_PREFIX,
    supplementaryFile: env.SUPPLEMENTARY_FILE?.trim() || DEFAULT_SUPPLEMENTARY_FILE,
    googleMapsApiKey: optionalString(env.GOOGLE_MAPS_API_KEY),
    googleMapsBaseUrl: env.GOOGLE_MAPS_BASE_URL?.trim() || DEFAULT_GOOGLE_MAPS_BASE_URL,
    sendgridApiKey: optionalString(env.SENDGRID_API_KEY),
    sendgridBaseUrl: env.SENDGRID_BASE_URL?.trim() || DEFAULT_SENDGRID_BASE_URL,
    fromEmail: env.SENDGRID_FROM_EMAIL?.trim() || DEFAULT_FROM_EMAIL,
    targetCity: env.TARGET_CITY?.trim() || DEFAULT_TARGET_CITY,
    targetRegion: env.TARGET_REGION?.trim() || DEFAULT_TARGET_REGION,
    requestTimeoutMs: parseInteger(env.REQUEST_TIMEOUT_MS, DEFAULT_REQUEST_TIMEOUT),
    overallTimeoutMs: DEFAULT_OVERALL_TIMEOUT
  };
}
