import { describe, expect, it } from "vitest";
import { AliasService } from "@/services/api/AliasService";
import { AuthExpiredError } from "@/services/api/errors";
import { Session } from "@/services/api/Session";
import { TelemetryService } from "@/services/api/TelemetryService";
import {
  buildTelemetryRequest,
  coerceTelemetryValue,
  decodeTelemetry,
  deviceKeyToPath,
  friendlyKeyForAlias,
  parseResourcePath,
} from "@/services/telemetry/TelemetryDecoder";
import type { AliasMapping, AliasResource } from "@/types";
import { FakeTransport, envelope, ok, status, testConfig } from "./fixtures/fakeTransport";

const PING_URL = "/telemetry/app/ping";
const ALIAS_URL = "/get-alias";

const aliasEntry = (path: string): AliasResource => {
  const [objectId, instanceId, resourceId] = path.slice(1).split("/");
  return { path, objectId, instanceId, resourceId, name: "", units: "", type: "" };
};

describe("deviceKeyToPath", () => {
  it.each([
    ["34196_00000_00000", "/34196/0/0"],
    ["34183_00001_00003", "/34183/1/3"],
    ["0_00000_00000", "/0/0/0"],
    ["3416_0_5850", "/3416/0/5850"],
    ["10_99999_00010", "/10/99999/10"],
  ])("maps %s to %s", (deviceKey, path) => {
    expect(deviceKeyToPath(deviceKey)).toBe(path);
  });

  it("keeps segments beyond the safe integer range exact", () => {
    expect(deviceKeyToPath("34196_00000_90071992547409930")).toBe("/34196/0/90071992547409930");
  });

  it("returns malformed keys unchanged", () => {
    expect(deviceKeyToPath("34196_00000")).toBe("34196_00000");
    expect(deviceKeyToPath("abc_00000_00000")).toBe("abc_00000_00000");
    expect(deviceKeyToPath("1_2_3_4")).toBe("1_2_3_4");
  });
});

describe("parseResourcePath", () => {
  it("splits a canonical path", () => {
    expect(parseResourcePath("/34197/0/2")).toEqual({
      objectId: "34197",
      instanceId: "0",
      resourceId: "2",
    });
  });

  it("rejects paths without three segments", () => {
    expect(parseResourcePath("/34197/0")).toBeNull();
  });
});

describe("coerceTelemetryValue", () => {
  it("converts numeric strings and booleans to numbers", () => {
    expect(coerceTelemetryValue("87")).toBe(87);
    expect(coerceTelemetryValue(" -3.5 ")).toBe(-3.5);
    expect(coerceTelemetryValue(true)).toBe(1);
    expect(coerceTelemetryValue(false)).toBe(0);
    expect(coerceTelemetryValue(42)).toBe(42);
  });

  it("keeps other strings and drops structured values", () => {
    expect(coerceTelemetryValue("PARKED")).toBe("PARKED");
    expect(coerceTelemetryValue({ nested: 1 })).toBeNull();
  });
});

describe("friendlyKeyForAlias", () => {
  it("uses the friendly name when one exists and the lowercased alias otherwise", () => {
    expect(friendlyKeyForAlias("VEHICLE_STATUS_HV_BATTERY_SOC")).toBe("battery_level");
    expect(friendlyKeyForAlias("SOME_NEW_ALIAS")).toBe("some_new_alias");
  });

  it("does not treat object member names as friendly names", () => {
    expect(friendlyKeyForAlias("constructor")).toBe("constructor");
  });
});

describe("decodeTelemetry", () => {
  it("decodes a battery reading through the reverse map", () => {
    const snapshot = decodeTelemetry([{ deviceKey: "34196_00000_00000", value: "87" }], {
      "/34196/0/0": "VEHICLE_STATUS_HV_BATTERY_SOC",
    });

    expect(snapshot).toEqual({ battery_level: 87 });
  });

  it("keys unmapped items by canonical path and skips unusable ones", () => {
    const snapshot = decodeTelemetry([
      { deviceKey: "34183_00001_00003", value: "PARKED" },
      { deviceKey: "34196_00000_00001", value: null },
      { deviceKey: "", value: 1 },
      { value: 3 },
      { deviceKey: "34199_00000_00002", value: { odd: true } },
      "junk",
    ]);

    expect(snapshot).toEqual({ "/34183/1/3": "PARKED" });
  });

  it("lets a later item overwrite an earlier one with the same device key", () => {
    const snapshot = decodeTelemetry(
      [
        { deviceKey: "34196_00000_00000", value: "80" },
        { deviceKey: "34196_00000_00000", value: "81" },
      ],
      { "/34196/0/0": "VEHICLE_STATUS_HV_BATTERY_SOC" },
    );

    expect(snapshot).toEqual({ battery_level: 81 });
  });

  it("keys raw device keys that shadow object members as plain entries", () => {
    const snapshot = decodeTelemetry(
      [
        { deviceKey: "constructor", value: "1" },
        { deviceKey: "__proto__", value: "2" },
        { deviceKey: "toString", value: "ON" },
      ],
      {},
    );

    expect(Object.entries(snapshot)).toEqual([
      ["constructor", 1],
      ["__proto__", 2],
      ["toString", "ON"],
    ]);
  });

  it("returns an empty snapshot for a non-list payload", () => {
    expect(decodeTelemetry({ deviceKey: "1_0_0" })).toEqual({});
  });
});

describe("buildTelemetryRequest", () => {
  it("requests only wanted aliases present in the mapping", () => {
    const mapping: AliasMapping = {
      VEHICLE_STATUS_HV_BATTERY_SOC: aliasEntry("/34196/0/0"),
      UNWANTED_ALIAS: aliasEntry("/1/0/0"),
    };

    expect(buildTelemetryRequest(mapping)).toEqual({
      resources: [{ objectId: "34196", instanceId: "0", resourceId: "0" }],
      pathToAlias: { "/34196/0/0": "VEHICLE_STATUS_HV_BATTERY_SOC" },
    });
  });

  it("orders resources by the wanted-alias list, not the mapping", () => {
    const mapping: AliasMapping = {
      LOCATION_LATITUDE: aliasEntry("/6/0/0"),
      VEHICLE_STATUS_ODOMETER: aliasEntry("/34199/0/3"),
      VEHICLE_STATUS_HV_BATTERY_SOC: aliasEntry("/34196/0/0"),
    };

    const { resources } = buildTelemetryRequest(mapping);

    expect(resources.map((resource) => resource.objectId)).toEqual(["34196", "34199", "6"]);
  });
});

describe("TelemetryService", () => {
  const setup = (transport: FakeTransport, vin: string | null = "VF1TEST") => {
    const session = new Session({ transport, config: testConfig });
    session.store.getState().setTokens({ accessToken: "test-access", refreshToken: null });
    if (vin) {
      session.setIdentity({ vin, userId: "user-1" });
    }
    return new TelemetryService(session, new AliasService(session));
  };

  it("posts the bare resource array and decodes the response", async () => {
    const transport = new FakeTransport()
      .on(
        ALIAS_URL,
        ok([
          {
            alias: "VEHICLE_STATUS_HV_BATTERY_SOC",
            devObjID: "34196",
            devObjInstID: "0",
            devRsrcID: "0",
          },
        ]),
      )
      .on(PING_URL, envelope([{ deviceKey: "34196_00000_00000", value: "87" }]));

    const snapshot = await setup(transport).getTelemetry();

    expect(snapshot).toEqual({ battery_level: 87 });
    expect(transport.calls(PING_URL)[0].body).toEqual([
      { objectId: "34196", instanceId: "0", resourceId: "0" },
    ]);
  });

  it("skips the fetch without a VIN", async () => {
    const transport = new FakeTransport();

    await expect(setup(transport, null).getTelemetry()).resolves.toBeNull();
    expect(transport.requests).toHaveLength(0);
  });

  it("resolves null when the ping endpoint errors or returns nothing", async () => {
    const failing = new FakeTransport().on(PING_URL, status(500));
    await expect(setup(failing).getTelemetry()).resolves.toBeNull();

    const empty = new FakeTransport().on(PING_URL, envelope([]));
    await expect(setup(empty).getTelemetry()).resolves.toBeNull();
  });

  it("lets authentication failures through", async () => {
    const transport = new FakeTransport().on(PING_URL, status(401));

    await expect(setup(transport).getTelemetry()).rejects.toBeInstanceOf(AuthExpiredError);
  });
});
