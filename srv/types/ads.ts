/** Types shared by the ADS request builder, clients and response wrapper. */

export interface AccountInfo {
  number: string;
  secret: string;
  country: string;
  language: string;
}

export type AdsSwitch =
  | "ShowExtendedDescriptions"
  | "ShowConsumerInformation"
  | "ShowExtendedTechnicalSpecifications"
  | "IncludeDefinitions"
  | "ShowAvailableEquipment"
  | "IncludeRegionalVehicles"
  | "IncludeTechnicalSpecificationTitles"
  | "ShowConsumerFriendlyNames";

export type ProcessMode = "ExcludeFleetOnly" | "IncludeFleetOnly" | "IncludeAll";

/**
 * Caller overrides merged into the describeVehicle payload. The documented
 * style-reducing hints raise the chance of an exact style match.
 */
export interface DescribeVehicleParameters {
  trimName?: string;
  manufacturerModelCode?: string;
  wheelBase?: number;
  OEMOptionCode?: string | string[];
  exteriorColorName?: string;
  interiorColorName?: string;
  styleName?: string;
  reducingStyleID?: number;
  reducingAcode?: string;
  switch?: string[];
  includeMediaGallery?: "Both" | "ColorMatch" | "Multi-View";
  vehicleProcessMode?: ProcessMode;
  optionsProcessMode?: ProcessMode;
  [name: string]: unknown;
}

export interface DescribeVehicleArgs extends DescribeVehicleParameters {
  accountInfo: AccountInfo;
  vin: string;
  switch: string[];
}

export interface AdsStyle {
  id: number | null;
  name: string | null;
  trim: string | null;
  mfrModelCode: string | null;
  division: string | null;
  model: string | null;
  bodyTypes: string[];
}

export interface AdsEngine {
  engineType: string | null;
  fuelType: string | null;
  horsepower: number | null;
  displacementLiters: number | null;
}

export interface AdsColor {
  code: string | null;
  name: string | null;
  rgbValue: string | null;
}

export interface AdsFactoryOption {
  chromeCode: string | null;
  oemCode: string | null;
  description: string | null;
  msrp: number | null;
}

export interface AdsTechnicalSpecification {
  titleId: number | null;
  values: string[];
}
