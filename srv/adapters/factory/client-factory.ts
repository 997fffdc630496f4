import type { DescribeVehicleArgs } from "../../types/ads";
import type { IDescriptionClient } from "../interfaces/description-client.interface";
import { SoapDescriptionClient } from "../soap-description-client";
import { MockDescriptionClient } from "../mock/mock-description-client";
import { getConfig, type AdsConfig } from "../../lib/config";
import { withApiLogging } from "../../lib/api-logger";
import cds from "@sap/cds";

const LOG = cds.log("client-factory");

const FALLBACK_KEY = "mock";

/** Registry of description client constructors by key (CHROMEDATA_CLIENT). */
const CLIENT_REGISTRY: Record<string, (config: AdsConfig) => IDescriptionClient> = {
  soap: (config) =>
    new SoapDescriptionClient(config.endpoint, {
      timeoutMs: config.timeoutMs,
      maxRetries: config.maxRetries,
    }),
  mock: () => new MockDescriptionClient(),
};

let instance: IDescriptionClient | null = null;

/**
 * Wrap describeVehicle with call logging, keeping provider metadata.
 */
function wrapWithLogging(client: IDescriptionClient, endpoint: string): IDescriptionClient {
  return {
    providerName: client.providerName,
    describeVehicle: withApiLogging("describeVehicle", endpoint, (args: DescribeVehicleArgs) =>
      client.describeVehicle(args),
    ),
  };
}

/**
 * Get or create the description client selected by configuration.
 * Unknown keys fall back to the mock client.
 */
export function getDescriptionClient(): IDescriptionClient {
  if (instance) return instance;

  const config = getConfig();
  let key = config.clientKey;
  let factory = CLIENT_REGISTRY[key];
  if (!factory) {
    LOG.warn(`No description client registered for '${key}', falling back to '${FALLBACK_KEY}'`);
    key = FALLBACK_KEY;
    factory = CLIENT_REGISTRY[FALLBACK_KEY];
  }

  LOG.info(`Resolved description client: ${key}`);
  instance = wrapWithLogging(factory(config), key === "soap" ? config.endpoint : key);
  return instance;
}

/**
 * Install a caller-built client. Its calls are logged under its providerName.
 */
export function setDescriptionClient(client: IDescriptionClient): void {
  instance = wrapWithLogging(client, client.providerName);
}

/**
 * Drop the cached client so the next call re-resolves from configuration.
 */
export function invalidateDescriptionClient(): void {
  instance = null;
}
