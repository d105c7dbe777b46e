import type { TelemetrySnapshot } from "@/types";
import { buildTelemetryRequest, decodeTelemetry } from "@/services/telemetry/TelemetryDecoder";
import { API_ENDPOINTS } from "@/utils/constants";
import { createLogger } from "@/utils/logger";
import type { AliasService } from "./AliasService";
import { ProtocolError } from "./errors";
import type { Session } from "./Session";

const log = createLogger("Telemetry");

export class TelemetryService {
  constructor(
    private readonly session: Session,
    private readonly aliases: AliasService,
  ) {}

  /**
   * Reads last-known values through the ping endpoint, which answers from the
   * server-side cache without waking the vehicle. Resolves with null when no
   * telemetry is available; authentication failures still propagate.
   */
  async getTelemetry(): Promise<TelemetrySnapshot | null> {
    if (!this.session.vin) {
      log.info("No VIN available, skipping telemetry fetch");
      return null;
    }

    const mapping = await this.aliases.resolve();
    const { resources, pathToAlias } = buildTelemetryRequest(mapping);
    if (resources.length === 0) {
      log.warn("No telemetry resource paths available");
      return null;
    }

    log.debug(
      `Requesting ${resources.length} resources (${
        Object.keys(pathToAlias).length > 0 ? "alias catalog" : "fallback table"
      })`,
    );

    try {
      // The ping endpoint takes the bare array, not an object wrapping it.
      const data = await this.session.request("POST", API_ENDPOINTS.TELEMETRY_PING, resources);
      if (!Array.isArray(data) || data.length === 0) {
        log.debug("No data in ping response");
        return null;
      }

      const snapshot = decodeTelemetry(data, pathToAlias);
      log.debug(`Parsed ${Object.keys(snapshot).length} values`);
      return snapshot;
    } catch (error) {
      if (error instanceof ProtocolError) {
        log.debug("Telemetry request failed:", error.message);
        return null;
      }
      throw error;
    }
  }
}
