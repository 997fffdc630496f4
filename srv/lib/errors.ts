import type { VinValidationFailure } from "./vin-validator";

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class InvalidVinError extends Error {
  constructor(
    readonly vin: string,
    readonly reason: VinValidationFailure,
  ) {
    super(
      reason === "format"
        ? `Invalid VIN format: "${vin}" is not 17 characters of [A-HJ-NPR-Z0-9]`
        : `Invalid VIN checksum: "${vin}"`,
    );
    this.name = "InvalidVinError";
  }
}

/** Raised when a describeVehicle call cannot produce a usable result. */
export class DescriptionServiceError extends Error {
  constructor(
    message: string,
    readonly operation: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "DescriptionServiceError";
  }
}
