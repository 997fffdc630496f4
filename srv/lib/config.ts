import { ConfigurationError } from "./errors";

export const DEFAULT_ADS_ENDPOINT = "http://services.chromedata.com/Description/7b?wsdl";

export interface AdsConfig {
  endpoint: string;
  country: string;
  language: string;
  concurrency: number;
  timeoutMs: number;
  maxRetries: number;
  clientKey: string;
}

function readInt(name: string, fallback: number, min: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return parsed;
}

/**
 * Reads the client configuration from the environment.
 * Evaluated on every call so env changes (tests, hot reload) are picked up.
 */
export function getConfig(): AdsConfig {
  return {
    endpoint: process.env.CHROMEDATA_ADS_ENDPOINT || DEFAULT_ADS_ENDPOINT,
    country: process.env.CHROMEDATA_COUNTRY || "US",
    language: process.env.CHROMEDATA_LANGUAGE || "en",
    concurrency: readInt("CHROMEDATA_POOL_CONCURRENCY", 15, 1),
    timeoutMs: readInt("CHROMEDATA_TIMEOUT_MS", 10000, 1),
    maxRetries: readInt("CHROMEDATA_MAX_RETRIES", 2, 0),
    clientKey: process.env.CHROMEDATA_CLIENT || "soap",
  };
}
