/* eslint-disable @typescript-eslint/no-explicit-any */

const mockDescribeVehicleAsync = jest.fn();
const mockCreateClientAsync = jest.fn();

jest.mock("soap", () => ({
  createClientAsync: (...args: any[]) => mockCreateClientAsync(...args),
}));

jest.mock("@sap/cds", () => ({
  __esModule: true,
  default: {
    log: jest.fn(() => ({ debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() })),
  },
}));

import { SoapDescriptionClient } from "../../../srv/adapters/soap-description-client";
import { DescriptionServiceError } from "../../../srv/lib/errors";
import type { DescribeVehicleArgs } from "../../../srv/types/ads";

const ARGS: DescribeVehicleArgs = {
  accountInfo: { number: "123456", secret: "test-secret", country: "US", language: "en" },
  vin: "1HGCM82633A004352",
  switch: ["ShowAvailableEquipment"],
};

function soapFault(message: string): Error {
  return Object.assign(new Error(message), {
    root: { Envelope: { Body: { Fault: { faultcode: "soap:Server", faultstring: message } } } },
  });
}

describe("SoapDescriptionClient", () => {
  beforeEach(() => {
    mockDescribeVehicleAsync.mockReset();
    mockCreateClientAsync.mockReset();
    mockCreateClientAsync.mockResolvedValue({ describeVehicleAsync: mockDescribeVehicleAsync });
  });

  it("should have provider metadata and the default endpoint", () => {
    const client = new SoapDescriptionClient();
    expect(client.providerName).toBe("chromedata-ads");
    expect(client.endpoint).toBe("http://services.chromedata.com/Description/7b?wsdl");
  });

  it("should not load the WSDL until first use", () => {
    new SoapDescriptionClient("http://ads.test/wsdl");
    expect(mockCreateClientAsync).not.toHaveBeenCalled();
  });

  it("should call describeVehicleAsync and return the parsed result", async () => {
    const result = { vinDescription: { attributes: { vin: ARGS.vin } } };
    mockDescribeVehicleAsync.mockResolvedValueOnce([result, "<raw/>", undefined, "<req/>"]);
    const client = new SoapDescriptionClient("http://ads.test/wsdl", {
      timeoutMs: 2500,
      soapOptions: { disableCache: true },
    });

    await expect(client.describeVehicle(ARGS)).resolves.toBe(result);
    expect(mockCreateClientAsync).toHaveBeenCalledWith("http://ads.test/wsdl", { disableCache: true });
    expect(mockDescribeVehicleAsync).toHaveBeenCalledWith(ARGS, { timeout: 2500 });
  });

  it("should create the soap client once and share it", async () => {
    mockDescribeVehicleAsync.mockResolvedValue([{}]);
    const client = new SoapDescriptionClient("http://ads.test/wsdl");

    await Promise.all([client.describeVehicle(ARGS), client.describeVehicle(ARGS)]);
    await client.describeVehicle(ARGS);

    expect(mockCreateClientAsync).toHaveBeenCalledTimes(1);
    expect(mockDescribeVehicleAsync).toHaveBeenCalledTimes(3);
  });

  it("should retry transport errors", async () => {
    mockDescribeVehicleAsync
      .mockRejectedValueOnce(new Error("ECONNRESET"))
      .mockRejectedValueOnce(new Error("ETIMEDOUT"))
      .mockResolvedValueOnce([{ ok: true }]);
    const client = new SoapDescriptionClient("http://ads.test/wsdl", { maxRetries: 2, retryDelayMs: 0 });

    await expect(client.describeVehicle(ARGS)).resolves.toEqual({ ok: true });
    expect(mockDescribeVehicleAsync).toHaveBeenCalledTimes(3);
  });

  it("should give up after maxRetries with a DescriptionServiceError", async () => {
    const cause = new Error("ECONNRESET");
    mockDescribeVehicleAsync.mockRejectedValue(cause);
    const client = new SoapDescriptionClient("http://ads.test/wsdl", { maxRetries: 1, retryDelayMs: 0 });

    const error = await client.describeVehicle(ARGS).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(DescriptionServiceError);
    expect(error).toHaveProperty("message", "ADS describeVehicle failed after 2 attempts: ECONNRESET");
    expect(error).toHaveProperty("operation", "describeVehicle");
    expect(error).toHaveProperty("cause", cause);
    expect(mockDescribeVehicleAsync).toHaveBeenCalledTimes(2);
  });

  it("should not retry SOAP faults", async () => {
    mockDescribeVehicleAsync.mockRejectedValue(soapFault("Invalid account"));
    const client = new SoapDescriptionClient("http://ads.test/wsdl", { maxRetries: 2, retryDelayMs: 0 });

    await expect(client.describeVehicle(ARGS)).rejects.toThrow(
      "ADS describeVehicle fault: Invalid account",
    );
    expect(mockDescribeVehicleAsync).toHaveBeenCalledTimes(1);
  });

  it("should reload the WSDL after a failed load", async () => {
    mockCreateClientAsync
      .mockRejectedValueOnce(new Error("WSDL unavailable"))
      .mockResolvedValueOnce({ describeVehicleAsync: mockDescribeVehicleAsync });
    mockDescribeVehicleAsync.mockResolvedValue([{ ok: true }]);
    const client = new SoapDescriptionClient("http://ads.test/wsdl", { maxRetries: 0 });

    await expect(client.describeVehicle(ARGS)).rejects.toThrow(
      "ADS describeVehicle failed after 1 attempts: WSDL unavailable",
    );
    await expect(client.describeVehicle(ARGS)).resolves.toEqual({ ok: true });
    expect(mockCreateClientAsync).toHaveBeenCalledTimes(2);
  });
});
