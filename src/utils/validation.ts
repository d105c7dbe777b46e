import type { QrParams } from "@/types";
import { PairingError } from "@/services/api/errors";
import { PAIRING_CONFIG } from "./constants";
import { decodeBase64 } from "./helpers";
import { createLogger } from "./logger";

const log = createLogger("Validation");

const hasRequiredQrFields = (params: Record<string, string>): params is QrParams =>
  PAIRING_CONFIG.QR_REQUIRED_FIELDS.every((field) => field in params);

/**
 * Parses the pairing QR payload:
 * `K=<base64 key>&ssid=<session id>&vin=<VIN>&timeout=<seconds>[&profileId=<base64 user id>]`
 */
export const parseQrCode = (content: string): QrParams => {
  if (!content) {
    throw new PairingError("Empty QR code content");
  }

  const params: Record<string, string> = {};
  for (const pair of content.split("&")) {
    const separator = pair.indexOf("=");
    if (separator === -1) {
      continue;
    }
    params[pair.slice(0, separator).trim()] = pair.slice(separator + 1).trim();
  }

  if (!hasRequiredQrFields(params)) {
    const missing = PAIRING_CONFIG.QR_REQUIRED_FIELDS.filter((field) => !(field in params));
    throw new PairingError(`QR code missing required fields: ${missing.join(", ")}`);
  }

  return params;
};

/**
 * Rejects a QR code issued for another vehicle. The profile id check is
 * advisory only: a profile that cannot be decoded or does not match the
 * signed-in user is logged and otherwise ignored.
 */
export const validateQrForVehicle = (
  params: QrParams,
  expectedVin: string,
  expectedUserId?: string | null,
): true => {
  if (params.vin !== expectedVin) {
    throw new PairingError(`QR VIN (${params.vin}) doesn't match vehicle VIN (${expectedVin})`);
  }

  const profileId = params.profileId;
  if (profileId && expectedUserId) {
    try {
      const decoded = decodeBase64(profileId).toString("utf8");
      if (decoded !== expectedUserId) {
        log.warn("QR profile doesn't match the signed-in user; continuing");
      }
    } catch (error) {
      log.warn("QR profile id could not be decoded; continuing", error);
    }
  }

  return true;
};
