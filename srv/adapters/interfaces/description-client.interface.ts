import type { DescribeVehicleArgs } from "../../types/ads";

export interface IDescriptionClient {
  readonly providerName: string;
  /** Resolves with the raw describeVehicle result. */
  describeVehicle(args: DescribeVehicleArgs): Promise<unknown>;
}
