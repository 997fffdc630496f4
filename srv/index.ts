export { isValidVin, hasValidVinFormat, vinValidationFailure } from "./lib/vin-validator";
export type { VinValidationFailure } from "./lib/vin-validator";
export { ConfigurationError, InvalidVinError, DescriptionServiceError } from "./lib/errors";
export { getConfig, DEFAULT_ADS_ENDPOINT } from "./lib/config";
export type { AdsConfig } from "./lib/config";
export { withApiLogging, getFailureState, resetFailureCounters } from "./lib/api-logger";
export { Adapter } from "./adapters/adapter";
export type { IAuthProvider } from "./adapters/interfaces/auth-provider.interface";
export type { IDescriptionClient } from "./adapters/interfaces/description-client.interface";
export { EnvAuthProvider } from "./adapters/env-auth.adapter";
export { StaticAuthProvider } from "./adapters/static-auth.adapter";
export { SoapDescriptionClient } from "./adapters/soap-description-client";
export type { SoapDescriptionClientOptions } from "./adapters/soap-description-client";
export { MockDescriptionClient } from "./adapters/mock/mock-description-client";
export {
  getDescriptionClient,
  setDescriptionClient,
  invalidateDescriptionClient,
} from "./adapters/factory/client-factory";
export { Request } from "./requests/request";
export { AdsRequest } from "./requests/ads-request";
export type {
  AdsRequestOptions,
  PoolRequest,
  PoolControl,
  PoolFulfilled,
  PoolRejected,
} from "./requests/ads-request";
export { AdsResponse } from "./responses/ads-response";
export * from "./types/ads";
