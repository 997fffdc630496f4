import { MockDescriptionClient } from "../../../../srv/adapters/mock/mock-description-client";
import type { DescribeVehicleArgs } from "../../../../srv/types/ads";

function argsFor(vin: string): DescribeVehicleArgs {
  return {
    accountInfo: { number: "123456", secret: "test-secret", country: "US", language: "en" },
    vin,
    switch: [],
  };
}

describe("MockDescriptionClient", () => {
  const client = new MockDescriptionClient();

  it("should have provider metadata", () => {
    expect(client.providerName).toBe("mock");
  });

  it("should describe a known VIN", async () => {
    const result = await client.describeVehicle(argsFor("1HGCM82633A004352"));
    expect(result).toMatchObject({
      attributes: { bestMakeName: "Honda", bestModelName: "Accord" },
      vinDescription: { attributes: { vin: "1HGCM82633A004352" } },
    });
  });

  it("should match VINs case-insensitively", async () => {
    const result = await client.describeVehicle(argsFor("jh4ka7561pc008269"));
    expect(result).toMatchObject({ attributes: { bestMakeName: "Acura" } });
  });

  it("should throw for unknown VIN", async () => {
    await expect(client.describeVehicle(argsFor("11111111111111111"))).rejects.toThrow(
      "VIN not found: 11111111111111111",
    );
  });

  it("should return a copy (not reference) of the fixture", async () => {
    const a = await client.describeVehicle(argsFor("1HGCM82633A004352"));
    const b = await client.describeVehicle(argsFor("1HGCM82633A004352"));
    expect(a).toEqual(b);
    expect(a).not.toBe(b);
  });
});
