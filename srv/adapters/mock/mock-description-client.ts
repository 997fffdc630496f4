import type { DescribeVehicleArgs } from "../../types/ads";
import type { IDescriptionClient } from "../interfaces/description-client.interface";
import { delay } from "../../lib/async-utils";

/** Raw results shaped the way the soap package parses ADS 7b responses. */
const MOCK_DESCRIPTIONS: Record<string, Record<string, unknown>> = {
  "1HGCM82633A004352": {
    attributes: {
      country: "US",
      language: "en",
      modelYear: "2003",
      bestMakeName: "Honda",
      bestModelName: "Accord",
      bestStyleName: "EX V6 Automatic",
      bestTrimName: "EX",
    },
    responseStatus: {
      attributes: { responseCode: "Successful", description: "Successful" },
    },
    vinDescription: {
      attributes: {
        vin: "1HGCM82633A004352",
        modelYear: "2003",
        division: "Honda",
        modelName: "Accord Sdn",
        styleName: "EX V6 Automatic",
        bodyType: "4dr Car",
      },
    },
    style: {
      attributes: {
        id: "253812",
        name: "EX V6 Automatic",
        trim: "EX",
        mfrModelCode: "CM8263JNW",
      },
      division: { attributes: { id: "9" }, $value: "Honda" },
      model: { attributes: { id: "14620" }, $value: "Accord Sdn" },
      bodyType: { attributes: { id: "1" }, $value: "4dr Car" },
    },
    engine: {
      engineType: { attributes: { id: "1" }, $value: "Gas V6" },
      fuelType: { attributes: { id: "1" }, $value: "Gasoline Fuel" },
      horsepower: { attributes: { value: "240", rpm: "6250" } },
      displacement: {
        value: [
          { attributes: { unit: "liters" }, $value: "3.0" },
          { attributes: { unit: "cubic inches" }, $value: "183" },
        ],
      },
    },
    exteriorColor: [
      { attributes: { colorCode: "NH700M", colorName: "Satin Silver Metallic", rgbValue: "C0C0C0" } },
      { attributes: { colorCode: "B92P", colorName: "Eternal Blue Pearl", rgbValue: "1C2A48" } },
    ],
    interiorColor: { attributes: { colorCode: "GR", colorName: "Gray" } },
  },
  JH4KA7561PC008269: {
    attributes: {
      country: "US",
      language: "en",
      modelYear: "1993",
      bestMakeName: "Acura",
      bestModelName: "Legend",
      bestStyleName: "4dr Sedan L Auto",
      bestTrimName: "L",
    },
    responseStatus: {
      attributes: { responseCode: "ConditionallySuccessful", description: "ConditionallySuccessful" },
      status: { attributes: { code: "UnableToDetermineStyle" }, $value: "Multiple styles match this VIN" },
    },
    vinDescription: {
      attributes: {
        vin: "JH4KA7561PC008269",
        modelYear: "1993",
        division: "Acura",
        modelName: "Legend",
        bodyType: "4dr Car",
      },
    },
    style: [
      {
        attributes: { id: "2010", name: "4dr Sedan L Auto", trim: "L", mfrModelCode: "KA756PJW" },
        division: { attributes: { id: "1" }, $value: "Acura" },
        model: { attributes: { id: "3" }, $value: "Legend" },
      },
      {
        attributes: { id: "2011", name: "4dr Sedan LS Auto", trim: "LS", mfrModelCode: "KA766PJW" },
        division: { attributes: { id: "1" }, $value: "Acura" },
        model: { attributes: { id: "3" }, $value: "Legend" },
      },
    ],
  },
};

/** In-process stand-in for the ADS service. Answers from fixtures, no network. */
export class MockDescriptionClient implements IDescriptionClient {
  readonly providerName = "mock";

  constructor(private delayMs = 0) {}

  async describeVehicle(args: DescribeVehicleArgs): Promise<unknown> {
    if (this.delayMs > 0) await delay(this.delayMs);

    const data = MOCK_DESCRIPTIONS[args.vin.toUpperCase()];
    if (!data) {
      throw new Error(`VIN not found: ${args.vin}`);
    }

    return structuredClone(data);
  }
}
