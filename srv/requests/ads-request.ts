import cds from "@sap/cds";
import type { Adapter } from "../adapters/adapter";
import type { IDescriptionClient } from "../adapters/interfaces/description-client.interface";
import type { AdsSwitch, DescribeVehicleArgs, DescribeVehicleParameters } from "../types/ads";
import { getDescriptionClient } from "../adapters/factory/client-factory";
import { AdsResponse } from "../responses/ads-response";
import { getConfig, DEFAULT_ADS_ENDPOINT } from "../lib/config";
import { InvalidVinError } from "../lib/errors";
import { vinValidationFailure } from "../lib/vin-validator";
import { Request, type RequestLocale } from "./request";

const LOG = cds.log("ads-request");

/** A pending raw describeVehicle result, or a thunk that starts one when the pool has room. */
export type PoolRequest = Promise<unknown> | (() => Promise<unknown>);

/** Passed to pool callbacks; stop() ends the pool once in-flight requests settle. */
export interface PoolControl {
  stop(): void;
  readonly stopped: boolean;
}

export type PoolFulfilled = (response: AdsResponse, index: number, pool: PoolControl) => void | Promise<void>;
export type PoolRejected = (reason: unknown, index: number, pool: PoolControl) => void | Promise<void>;

type Settled = { ok: true; value: unknown } | { ok: false; reason: unknown };
type PoolTask = () => Promise<Settled>;

function settle(promise: Promise<unknown>): Promise<Settled> {
  return promise.then(
    (value): Settled => ({ ok: true, value }),
    (reason: unknown): Settled => ({ ok: false, reason }),
  );
}

/** Promises get their handler here, as soon as the pool holds them. */
function toTask(request: PoolRequest): PoolTask {
  if (typeof request === "function") {
    return () => settle(Promise.resolve().then(request));
  }
  const settled = settle(request);
  return () => settled;
}

function* lazyTasks(iterator: Iterator<PoolRequest>): Generator<PoolTask> {
  for (let step = iterator.next(); !step.done; step = iterator.next()) {
    yield toTask(step.value);
  }
}

/**
 * Generators and other one-shot iterators are pulled only as slots free up.
 * Collections (arrays, sets) already hold their promises, so all of them get handlers up front.
 */
function poolTasks(requests: Iterable<PoolRequest>): Iterator<PoolTask> {
  const iterator = requests[Symbol.iterator]();
  const source: object = requests;
  const self: object = iterator;
  if (source === self) return lazyTasks(iterator);
  return Array.from(requests, toTask)[Symbol.iterator]();
}

export interface AdsRequestOptions {
  /** Defaults to the client resolved by the client factory. */
  client?: IDescriptionClient;
  country?: string;
  language?: string;
  /** Default pool concurrency. */
  concurrency?: number;
  /** Reject VINs with a bad check digit before calling the service. Defaults to true. */
  validateVin?: boolean;
}

function localeFrom(options: AdsRequestOptions): RequestLocale {
  const config = getConfig();
  return {
    country: options.country ?? config.country,
    language: options.language ?? config.language,
  };
}

/**
 * Automotive Description Service (ADS 7b) request builder.
 *
 * Pass style-reducing parameters (trimName, manufacturerModelCode, wheelBase,
 * OEMOptionCode, exteriorColorName, interiorColorName, styleName,
 * reducingStyleID, reducingAcode) to improve the chance of an exact style match.
 */
export class AdsRequest extends Request {
  static readonly ADS_ENDPOINT = DEFAULT_ADS_ENDPOINT;

  static readonly DEFAULT_SWITCHES: readonly AdsSwitch[] = [
    "ShowExtendedDescriptions",
    "ShowConsumerInformation",
    "ShowExtendedTechnicalSpecifications",
    "IncludeDefinitions",
    "ShowAvailableEquipment",
  ];

  private readonly parameters: DescribeVehicleParameters = {};
  private readonly switches: AdsSwitch[] = [];
  private readonly client: IDescriptionClient;
  private readonly concurrency: number;
  private readonly validateVin: boolean;

  constructor(adapter: Adapter, options: AdsRequestOptions = {}) {
    super(adapter, localeFrom(options));
    this.client = options.client ?? getDescriptionClient();
    this.concurrency = options.concurrency ?? getConfig().concurrency;
    this.validateVin = options.validateVin ?? true;
  }

  /**
   * Describes a vehicle by VIN and wraps the result for typed access.
   */
  async byVin(vin: string, parameters: DescribeVehicleParameters = {}): Promise<AdsResponse> {
    const result = await this.byVinRaw(vin, parameters);
    return new AdsResponse(result, parameters);
  }

  /**
   * Describes a vehicle by VIN, resolving with the raw service result.
   * Use with pool() to run many lookups together.
   */
  async byVinRaw(vin: string, parameters: DescribeVehicleParameters = {}): Promise<unknown> {
    if (this.validateVin) {
      const failure = vinValidationFailure(vin);
      if (failure) {
        LOG.warn(`Skipping describeVehicle for ${vin}: ${failure} check failed`);
        throw new InvalidVinError(vin, failure);
      }
    }
    LOG.debug(`describeVehicle ${vin} via ${this.client.providerName}`);
    return this.client.describeVehicle(this.buildParameters(vin, parameters));
  }

  /**
   * Runs a set of requests with at most `concurrency` in flight and waits for all of them.
   * Thunks are only started when a slot frees up; plain promises are already running.
   * An exception from a callback stops the pool and rejects it once in-flight callbacks return.
   */
  async pool(
    requests: Iterable<PoolRequest>,
    fulfilled: PoolFulfilled,
    rejected: PoolRejected,
    concurrency = this.concurrency,
  ): Promise<void> {
    return this.runPool(requests, fulfilled, rejected, concurrency, {});
  }

  /**
   * Pools byVinRaw lookups for each VIN; responses carry the given parameters.
   */
  async byVins(
    vins: Iterable<string>,
    fulfilled: PoolFulfilled,
    rejected: PoolRejected,
    parameters: DescribeVehicleParameters = {},
    concurrency = this.concurrency,
  ): Promise<void> {
    const thunks = Array.from(vins, (vin) => () => this.byVinRaw(vin, parameters));
    return this.runPool(thunks, fulfilled, rejected, concurrency, parameters);
  }

  getClient(): IDescriptionClient {
    return this.client;
  }

  /** Add color matched photos to the response. */
  includeColorMatchedPhotos(): this {
    this.parameters.includeMediaGallery = "ColorMatch";
    return this;
  }

  includeAvailableEquipment(): this {
    return this.addSwitch("ShowAvailableEquipment");
  }

  includeExtendedDescriptions(): this {
    return this.addSwitch("ShowExtendedDescriptions");
  }

  /** Exclude fleet-only vehicles and options. */
  excludeFleet(): this {
    this.parameters.vehicleProcessMode = "ExcludeFleetOnly";
    this.parameters.optionsProcessMode = "ExcludeFleetOnly";
    return this;
  }

  /**
   * Merges toggled parameters, account info, the VIN and switches, then caller
   * parameters (later wins). A caller `switch` list replaces the defaults.
   */
  buildParameters(vin: string, parameters: DescribeVehicleParameters = {}): DescribeVehicleArgs {
    const { switch: callerSwitches, ...overrides } = parameters;
    const switches = [...new Set<string>([...AdsRequest.DEFAULT_SWITCHES, ...this.switches])];
    return {
      ...this.parameters,
      accountInfo: this.accountInfo(),
      vin,
      ...overrides,
      switch: callerSwitches ?? switches,
    };
  }

  private addSwitch(name: AdsSwitch): this {
    if (!this.switches.includes(name)) this.switches.push(name);
    return this;
  }

  private async runPool(
    requests: Iterable<PoolRequest>,
    fulfilled: PoolFulfilled,
    rejected: PoolRejected,
    concurrency: number,
    parameters: DescribeVehicleParameters,
  ): Promise<void> {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Pool concurrency must be a positive integer, got ${concurrency}`);
    }

    const tasks = poolTasks(requests);
    let index = 0;
    let stopped = false;
    let failed = false;
    let failure: unknown;

    const control: PoolControl = {
      stop: () => {
        stopped = true;
      },
      get stopped() {
        return stopped;
      },
    };

    const fail = (err: unknown): void => {
      if (!failed) {
        failed = true;
        failure = err;
      }
      stopped = true;
    };

    const worker = async (): Promise<void> => {
      while (!stopped) {
        let step: IteratorResult<PoolTask>;
        try {
          step = tasks.next();
        } catch (err) {
          fail(err);
          return;
        }
        if (step.done) return;

        const idx = index++;
        const outcome = await step.value();
        if (failed) return;

        try {
          if (outcome.ok) {
            let response: AdsResponse | null = null;
            let malformed: unknown;
            try {
              response = new AdsResponse(outcome.value, parameters);
            } catch (err) {
              malformed = err;
            }
            if (response) await fulfilled(response, idx, control);
            else await rejected(malformed, idx, control);
          } else {
            await rejected(outcome.reason, idx, control);
          }
        } catch (err) {
          fail(err);
          return;
        }
      }
    };

    await Promise.all(Array.from({ length: concurrency }, worker));
    LOG.debug(`Pool settled ${index} request(s) at concurrency ${concurrency}`);
    if (failed) throw failure;
  }
}
