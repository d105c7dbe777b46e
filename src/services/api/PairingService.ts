import type { ClientConfig } from "@/config/environment";
import type { ContactInfo, HttpResponse, HttpTransport, PairDataResponse } from "@/types";
import { API_ENDPOINTS, API_TIMEOUTS } from "@/utils/constants";
import { describeBody, getErrorMessage, isRecord } from "@/utils/helpers";
import { createLogger } from "@/utils/logger";
import { PairingError } from "./errors";

const log = createLogger("Pairing");

/** Enrollment calls against the pairing host. Every failure is a PairingError. */
export class PairingService {
  constructor(
    private readonly transport: HttpTransport,
    private readonly config: ClientConfig,
  ) {}

  private async post(endpoint: string, accessToken: string, body: unknown): Promise<HttpResponse> {
    try {
      return await this.transport.request({
        method: "POST",
        url: `${this.config.PAIRING_BASE_URL}${endpoint}`,
        headers: {
          Authorization: `Bearer ${accessToken}`,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body,
        timeoutMs: API_TIMEOUTS.DEFAULT,
      });
    } catch (error) {
      throw new PairingError(`Connection error: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  /** Asks the server to send the OTP for the QR session to the user. */
  async verifySession(
    accessToken: string,
    sessionId: string,
    contact: ContactInfo = {},
    retry = false,
  ): Promise<true> {
    const response = await this.post(API_ENDPOINTS.VERIFY_SESSION, accessToken, {
      ssid: sessionId,
      phoneNumber: contact.phoneNumber ?? null,
      email: contact.email ?? null,
      retry,
    });

    if (response.status !== 200) {
      const text = describeBody(response.data);
      log.error(`Verify session failed: ${response.status} - ${text}`);
      throw new PairingError(`Verify session failed: ${text}`);
    }

    log.info("Verify session successful - OTP sent");
    return true;
  }

  async sendPairData(
    accessToken: string,
    encryptedCsr: string,
    otp: string,
    seed: string,
    sessionId: string,
    contact: ContactInfo = {},
  ): Promise<PairDataResponse> {
    const response = await this.post(API_ENDPOINTS.SEND_PAIR_DATA, accessToken, {
      encryptedCSR: encryptedCsr,
      otp,
      phoneNumber: contact.phoneNumber ?? null,
      email: contact.email ?? null,
      seed,
      sessionId,
    });

    if (response.status !== 200) {
      const text = describeBody(response.data);
      log.error(`Send pair data failed: ${response.status} - ${text}`);
      throw new PairingError(`Pairing failed: ${text}`);
    }

    const data = isRecord(response.data) ? response.data.data : undefined;
    return isRecord(data) ? data : {};
  }
}
