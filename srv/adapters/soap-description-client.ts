import * as soap from "soap";
import cds from "@sap/cds";
import type { DescribeVehicleArgs } from "../types/ads";
import type { IDescriptionClient } from "./interfaces/description-client.interface";
import { DescriptionServiceError } from "../lib/errors";
import { delay } from "../lib/async-utils";
import { isRecord } from "../lib/guards";
import { DEFAULT_ADS_ENDPOINT } from "../lib/config";

const LOG = cds.log("soap-description-client");

const OPERATION = "describeVehicle";
const DEFAULT_TIMEOUT_MS = 10000;
const MAX_RETRIES = 2;
const RETRY_DELAY_MS = 1000;

export interface SoapDescriptionClientOptions {
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  soapOptions?: soap.IOptions;
}

/** A SOAP fault means the service answered; resending the same payload won't help. */
function isSoapFault(err: unknown): boolean {
  if (!isRecord(err) || !isRecord(err.root)) return false;
  const envelope = err.root.Envelope;
  return isRecord(envelope) && isRecord(envelope.Body) && envelope.Body.Fault !== undefined;
}

/** ADS 7b describeVehicle over SOAP, backed by the `soap` package. */
export class SoapDescriptionClient implements IDescriptionClient {
  readonly providerName = "chromedata-ads";

  private clientPromise: Promise<soap.Client> | null = null;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(
    readonly endpoint = DEFAULT_ADS_ENDPOINT,
    private readonly options: SoapDescriptionClientOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? MAX_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? RETRY_DELAY_MS;
  }

  /** The underlying soap client, created from the WSDL on first use. */
  getSoapClient(): Promise<soap.Client> {
    if (!this.clientPromise) {
      LOG.debug(`Loading WSDL from ${this.endpoint}`);
      this.clientPromise = soap.createClientAsync(this.endpoint, this.options.soapOptions).catch((err: unknown) => {
        this.clientPromise = null;
        throw err;
      });
    }
    return this.clientPromise;
  }

  async describeVehicle(args: DescribeVehicleArgs): Promise<unknown> {
    return this.callWithRetry(args, 0);
  }

  private async callWithRetry(args: DescribeVehicleArgs, attempt: number): Promise<unknown> {
    try {
      const client = await this.getSoapClient();
      const [result] = await client.describeVehicleAsync(args, { timeout: this.timeoutMs });
      return result;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (isSoapFault(err)) {
        throw new DescriptionServiceError(`ADS ${OPERATION} fault: ${message}`, OPERATION, err);
      }
      if (attempt < this.maxRetries) {
        LOG.warn(`ADS ${OPERATION} attempt ${attempt + 1} failed, retrying: ${message}`);
        await delay(this.retryDelayMs * (attempt + 1));
        return this.callWithRetry(args, attempt + 1);
      }
      throw new DescriptionServiceError(
        `ADS ${OPERATION} failed after ${attempt + 1} attempts: ${message}`,
        OPERATION,
        err,
      );
    }
  }
}
