import type { FavoriteLocation, UserProfile, Vehicle } from "@/types";
import { API_ENDPOINTS } from "@/utils/constants";
import { isRecord } from "@/utils/helpers";
import { createLogger } from "@/utils/logger";
import { ProtocolError } from "./errors";
import type { Session } from "./Session";

const log = createLogger("Vehicle");

const toVehicle = (entry: Record<string, unknown>): Vehicle => ({
  ...entry,
  vinCode: typeof entry.vinCode === "string" ? entry.vinCode : undefined,
  userId: typeof entry.userId === "string" ? entry.userId : undefined,
});

export class VehicleService {
  constructor(private readonly session: Session) {}

  /** Lists the account's vehicles; the first one fixes the session identity. */
  async getVehicles(): Promise<Vehicle[]> {
    const data = await this.session.request("GET", API_ENDPOINTS.USER_VEHICLES);
    const vehicles = Array.isArray(data) ? data.filter(isRecord).map(toVehicle) : [];

    const [first] = vehicles;
    if (first) {
      this.session.setIdentity({ vin: first.vinCode ?? null, userId: first.userId ?? null });
    }

    return vehicles;
  }

  async getProfile(): Promise<UserProfile> {
    const data = await this.session.request("GET", API_ENDPOINTS.PROFILE);
    return isRecord(data) ? data : {};
  }

  async getLocations(): Promise<FavoriteLocation[]> {
    try {
      const data = await this.session.request("GET", API_ENDPOINTS.FAVORITE_LOCATIONS);
      return Array.isArray(data) ? data.filter(isRecord) : [];
    } catch (error) {
      if (error instanceof ProtocolError) {
        log.debug("Favourite locations unavailable:", error.message);
        return [];
      }
      throw error;
    }
  }
}
