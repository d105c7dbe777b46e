import { describe, expect, it } from "vitest";
import { ConnectedCarService } from "@/services/api/ConnectedCarService";
import { AuthError, AuthExpiredError, ProtocolError } from "@/services/api/errors";
import { Session } from "@/services/api/Session";
import { RefreshCoordinator } from "@/services/sync/RefreshCoordinator";
import {
  FakeTransport,
  envelope,
  status,
  testConfig,
  tokenResponse,
} from "./fixtures/fakeTransport";

const VEHICLES_URL = "/user-vehicle";
const PROFILE_URL = "/account/profile";
const LOCATIONS_URL = "/location-favorite";
const PING_URL = "/telemetry/app/ping";
const TOKEN_URL = "/oauth/token";

const VEHICLE = { vinCode: "VF1TEST", userId: "user-1", vehicleName: "Test car" };

const routeHappyPath = (transport: FakeTransport): FakeTransport =>
  transport
    .on(VEHICLES_URL, envelope([VEHICLE]))
    .on(PROFILE_URL, envelope({ email: "driver@example.com" }))
    .on(LOCATIONS_URL, envelope([{ name: "Home" }]))
    .on(PING_URL, envelope([{ deviceKey: "34196_00000_00000", value: "64" }]));

const signedInService = (transport: FakeTransport): ConnectedCarService => {
  const session = new Session({ transport, config: testConfig });
  session.store.getState().setTokens({ accessToken: "test-access", refreshToken: null });
  return new ConnectedCarService(session);
};

describe("ConnectedCarService.getAllData", () => {
  it("aggregates every source and learns the vehicle identity", async () => {
    const service = signedInService(routeHappyPath(new FakeTransport()));

    const result = await service.getAllData();

    expect(result.errors).toEqual([]);
    expect(result.vehicles).toEqual([VEHICLE]);
    expect(result.profile).toEqual({ email: "driver@example.com" });
    expect(result.locations).toEqual([{ name: "Home" }]);
    // No alias catalog route, so the fallback table keys by path
    expect(result.telemetry).toEqual({ "/34196/0/0": 64 });
    expect(service.vin).toBe("VF1TEST");
    expect(service.userId).toBe("user-1");
  });

  it("keeps vehicles and profile when telemetry fails", async () => {
    const transport = new FakeTransport().on(PING_URL, status(500));
    const service = signedInService(routeHappyPath(transport));

    const result = await service.getAllData();

    expect(result.telemetry).toBeNull();
    expect(result.vehicles).toEqual([VEHICLE]);
    expect(result.profile).toEqual({ email: "driver@example.com" });
  });

  it("records hard failures without aborting", async () => {
    const transport = new FakeTransport().on(PROFILE_URL, status(500));
    const service = signedInService(routeHappyPath(transport));

    const result = await service.getAllData();

    expect(result.profile).toBeNull();
    expect(result.vehicles).toEqual([VEHICLE]);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].source).toBe("profile");
    expect(result.errors[0].error).toBeInstanceOf(ProtocolError);
  });

  it("falls back to an empty location list when locations fail", async () => {
    const transport = new FakeTransport().on(LOCATIONS_URL, status(500));
    const service = signedInService(routeHappyPath(transport));

    const result = await service.getAllData();

    expect(result.locations).toEqual([]);
    expect(result.errors).toEqual([]);
  });

  it("lists authentication failures for every source", async () => {
    const transport = new FakeTransport()
      .on(VEHICLES_URL, status(401))
      .on(PROFILE_URL, status(401))
      .on(LOCATIONS_URL, status(401));
    const service = signedInService(transport);

    const result = await service.getAllData();

    // Telemetry is skipped without a VIN
    expect(result.telemetry).toBeNull();
    expect(result.errors.map(({ source }) => source)).toEqual([
      "vehicles",
      "profile",
      "locations",
    ]);
    expect(result.errors.every(({ error }) => error instanceof AuthExpiredError)).toBe(true);
  });
});

describe("RefreshCoordinator", () => {
  const credentials = { email: "driver@example.com", password: "test-password" };

  const createCoordinator = (transport: FakeTransport) => {
    const service = new ConnectedCarService(new Session({ transport, config: testConfig }));
    return { service, coordinator: new RefreshCoordinator(service, credentials) };
  };

  it("logs in on first use", async () => {
    const transport = routeHappyPath(new FakeTransport().on(TOKEN_URL, tokenResponse()));
    const { service, coordinator } = createCoordinator(transport);

    const result = await coordinator.refresh();

    expect(service.session.accessToken).toBe("test-access");
    expect(result.vehicles).toEqual([VEHICLE]);
    expect(transport.calls(TOKEN_URL)).toHaveLength(1);
  });

  it("repeats the cycle once after a token refresh", async () => {
    const transport = routeHappyPath(
      new FakeTransport().on(TOKEN_URL, tokenResponse()).once(VEHICLES_URL, status(401)),
    );
    const { coordinator } = createCoordinator(transport);

    const result = await coordinator.refresh();

    expect(result.errors).toEqual([]);
    expect(result.vehicles).toEqual([VEHICLE]);
    expect(transport.calls(VEHICLES_URL)).toHaveLength(2);
    // login + refresh
    expect(transport.calls(TOKEN_URL)).toHaveLength(2);
  });

  it("re-authenticates when the session cannot be refreshed", async () => {
    const transport = routeHappyPath(
      new FakeTransport()
        .once(TOKEN_URL, tokenResponse())
        .once(VEHICLES_URL, status(401))
        .once(TOKEN_URL, status(403))
        .on(TOKEN_URL, tokenResponse("test-access-2")),
    );
    const { service, coordinator } = createCoordinator(transport);

    const result = await coordinator.refresh();

    expect(result.errors).toEqual([]);
    expect(service.session.accessToken).toBe("test-access-2");
    expect(transport.calls(TOKEN_URL)).toHaveLength(3);
  });

  it("shares an in-flight cycle between overlapping callers", async () => {
    const transport = routeHappyPath(new FakeTransport().on(TOKEN_URL, tokenResponse()));
    const { coordinator } = createCoordinator(transport);

    const [first, second] = await Promise.all([coordinator.refresh(), coordinator.refresh()]);

    expect(second).toBe(first);
    expect(transport.calls(VEHICLES_URL)).toHaveLength(1);
  });

  it("surfaces rejected credentials", async () => {
    const transport = new FakeTransport().on(TOKEN_URL, status(401));
    const { coordinator } = createCoordinator(transport);

    await expect(coordinator.refresh()).rejects.toBeInstanceOf(AuthError);
  });
});
