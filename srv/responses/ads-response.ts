import type {
  AdsColor,
  AdsEngine,
  AdsFactoryOption,
  AdsStyle,
  AdsTechnicalSpecification,
  DescribeVehicleParameters,
} from "../types/ads";
import { DescriptionServiceError } from "../lib/errors";
import { isRecord } from "../lib/guards";

const SUCCESS_CODES = new Set(["Successful", "ConditionallySuccessful"]);

/** Repeated elements parse as a single object when only one is present. */
function toArray(node: unknown): unknown[] {
  if (node === undefined || node === null) return [];
  return Array.isArray(node) ? node : [node];
}

function attr(node: unknown, name: string): string | null {
  if (!isRecord(node) || !isRecord(node.attributes)) return null;
  const value = node.attributes[name];
  return value === undefined || value === null ? null : String(value);
}

/** Element text: plain string, or `$value` when the element also carries attributes. */
function textOf(node: unknown): string | null {
  if (typeof node === "string") return node;
  if (typeof node === "number") return String(node);
  if (isRecord(node) && node.$value !== undefined && node.$value !== null) return String(node.$value);
  return null;
}

function toNumber(value: string | null): number | null {
  if (value === null || value.trim() === "") return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function child(node: unknown, name: string): unknown {
  return isRecord(node) ? node[name] : undefined;
}

function toColor(node: unknown): AdsColor {
  return {
    code: attr(node, "colorCode"),
    name: attr(node, "colorName"),
    rgbValue: attr(node, "rgbValue"),
  };
}

/**
 * Typed read access to a describeVehicle result.
 * Absent fields come back as null or an empty list.
 */
export class AdsResponse {
  private readonly raw: Record<string, unknown>;

  constructor(
    raw: unknown,
    private readonly parameters: DescribeVehicleParameters = {},
  ) {
    if (!isRecord(raw)) {
      throw new DescriptionServiceError(
        `Malformed describeVehicle response: expected an object, got ${raw === null ? "null" : typeof raw}`,
        "describeVehicle",
      );
    }
    this.raw = raw;
  }

  getRaw(): Record<string, unknown> {
    return this.raw;
  }

  /** Caller parameters the request was made with. */
  getParameters(): DescribeVehicleParameters {
    return this.parameters;
  }

  get(key: string): unknown {
    return this.raw[key];
  }

  getResponseCode(): string | null {
    return attr(this.raw.responseStatus, "responseCode");
  }

  isSuccessful(): boolean {
    const code = this.getResponseCode();
    return code !== null && SUCCESS_CODES.has(code);
  }

  getStatusMessages(): string[] {
    return toArray(child(this.raw.responseStatus, "status"))
      .map((status) => textOf(status) ?? attr(status, "code"))
      .filter((message): message is string => message !== null);
  }

  getVin(): string | null {
    return attr(this.raw.vinDescription, "vin");
  }

  getModelYear(): number | null {
    return toNumber(attr(this.raw, "modelYear") ?? attr(this.raw.vinDescription, "modelYear"));
  }

  getMakeName(): string | null {
    return attr(this.raw, "bestMakeName") ?? attr(this.raw.vinDescription, "division");
  }

  getModelName(): string | null {
    return attr(this.raw, "bestModelName") ?? attr(this.raw.vinDescription, "modelName");
  }

  getStyleName(): string | null {
    return attr(this.raw, "bestStyleName") ?? attr(this.raw.vinDescription, "styleName");
  }

  getTrimName(): string | null {
    return attr(this.raw, "bestTrimName");
  }

  getStyles(): AdsStyle[] {
    return toArray(this.raw.style).map((style) => ({
      id: toNumber(attr(style, "id")),
      name: attr(style, "name"),
      trim: attr(style, "trim"),
      mfrModelCode: attr(style, "mfrModelCode"),
      division: textOf(child(style, "division")),
      model: textOf(child(style, "model")),
      bodyTypes: toArray(child(style, "bodyType"))
        .map(textOf)
        .filter((body): body is string => body !== null),
    }));
  }

  getEngines(): AdsEngine[] {
    return toArray(this.raw.engine).map((engine) => {
      const liters = toArray(child(child(engine, "displacement"), "value")).find(
        (value) => attr(value, "unit") === "liters",
      );
      return {
        engineType: textOf(child(engine, "engineType")),
        fuelType: textOf(child(engine, "fuelType")),
        horsepower: toNumber(attr(child(engine, "horsepower"), "value")),
        displacementLiters: toNumber(textOf(liters)),
      };
    });
  }

  getExteriorColors(): AdsColor[] {
    return toArray(this.raw.exteriorColor).map(toColor);
  }

  getInteriorColors(): AdsColor[] {
    return toArray(this.raw.interiorColor).map(toColor);
  }

  getFactoryOptions(): AdsFactoryOption[] {
    return toArray(this.raw.factoryOption).map((option) => ({
      chromeCode: attr(option, "chromeCode"),
      oemCode: attr(option, "oemCode"),
      description: textOf(toArray(child(option, "description"))[0]),
      msrp: toNumber(attr(child(option, "price"), "msrpMin")),
    }));
  }

  getTechnicalSpecifications(): AdsTechnicalSpecification[] {
    return toArray(this.raw.technicalSpecification).map((spec) => ({
      titleId: toNumber(attr(spec, "titleId")),
      values: toArray(child(spec, "value"))
        .map((value) => attr(value, "value") ?? textOf(value))
        .filter((value): value is string => value !== null),
    }));
  }

  /** Image URLs from the media gallery (requires includeMediaGallery). */
  getMediaGallery(): string[] {
    return toArray(child(this.raw.mediaGallery, "view"))
      .map((view) => attr(view, "href"))
      .filter((href): href is string => href !== null);
  }
}
