import type { FavoriteLocation, TelemetrySnapshot, UserProfile, Vehicle } from "@/types";
import { getErrorMessage } from "@/utils/helpers";
import { createLogger } from "@/utils/logger";
import { AliasService } from "./AliasService";
import type { Session } from "./Session";
import { TelemetryService } from "./TelemetryService";
import { VehicleService } from "./VehicleService";

const log = createLogger("ConnectedCar");

export type FetchSource = "vehicles" | "profile" | "telemetry" | "locations";

export interface FetchFailure {
  source: FetchSource;
  error: unknown;
}

/**
 * Best-effort aggregate of one poll. A field is null when its fetch failed;
 * every failure is listed in `errors`. Telemetry is also null when the
 * vehicle reported nothing.
 */
export interface VehicleDataResult {
  vehicles: Vehicle[] | null;
  profile: UserProfile | null;
  telemetry: TelemetrySnapshot | null;
  locations: FavoriteLocation[] | null;
  errors: FetchFailure[];
}

export class ConnectedCarService {
  readonly aliases: AliasService;
  readonly vehicles: VehicleService;
  readonly telemetry: TelemetryService;

  constructor(readonly session: Session) {
    this.aliases = new AliasService(session);
    this.vehicles = new VehicleService(session);
    this.telemetry = new TelemetryService(session, this.aliases);
  }

  get vin(): string | null {
    return this.session.vin;
  }

  get userId(): string | null {
    return this.session.userId;
  }

  async getAllData(): Promise<VehicleDataResult> {
    const errors: FetchFailure[] = [];

    const attempt = async <T>(source: FetchSource, fetch: () => Promise<T>): Promise<T | null> => {
      try {
        return await fetch();
      } catch (error) {
        const message = getErrorMessage(error);
        if (source === "vehicles" || source === "profile") {
          log.warn(`Failed to get ${source}: ${message}`);
        } else {
          log.debug(`${source} unavailable: ${message}`);
        }
        errors.push({ source, error });
        return null;
      }
    };

    // Sequential: telemetry depends on the VIN learned from the vehicle list.
    const vehicles = await attempt("vehicles", () => this.vehicles.getVehicles());
    const profile = await attempt("profile", () => this.vehicles.getProfile());
    const telemetry = await attempt("telemetry", () => this.telemetry.getTelemetry());
    const locations = await attempt("locations", () => this.vehicles.getLocations());

    return { vehicles, profile, telemetry, locations, errors };
  }
}
