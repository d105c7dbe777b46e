import { Config, type ClientConfig } from "@/config/environment";
import { createSessionStore, type SessionStore } from "@/stores/SessionStore";
import type {
  Credentials,
  HttpMethod,
  HttpResponse,
  HttpTransport,
  VehicleIdentity,
} from "@/types";
import { API_TIMEOUTS, APP_CONFIG, SUCCESS_CODES } from "@/utils/constants";
import { describeBody, getErrorMessage, isRecord } from "@/utils/helpers";
import { createLogger } from "@/utils/logger";
import { AuthService } from "./AuthService";
import {
  AuthExpiredError,
  ProtocolError,
  RetryAfterRefreshError,
} from "./errors";
import { createAxiosTransport } from "./httpClient";

const log = createLogger("Session");

export interface SessionOptions {
  transport?: HttpTransport;
  config?: ClientConfig;
  store?: SessionStore;
}

export interface RequestOptions {
  params?: Record<string, string>;
  timeoutMs?: number;
}

/**
 * One authenticated account. Owns the token state and vehicle identity that
 * every other component reads when building requests.
 */
export class Session {
  readonly transport: HttpTransport;
  readonly config: ClientConfig;
  readonly store: SessionStore;
  private readonly auth: AuthService;
  private refreshPromise: Promise<boolean> | null = null;

  constructor(options: SessionOptions = {}) {
    this.config = options.config ?? Config;
    this.transport = options.transport ?? createAxiosTransport();
    this.store = options.store ?? createSessionStore();
    this.auth = new AuthService(this.transport, this.config);
  }

  get vin(): string | null {
    return this.store.getState().vin;
  }

  get userId(): string | null {
    return this.store.getState().userId;
  }

  get accessToken(): string | null {
    return this.store.getState().accessToken;
  }

  get isAuthenticated(): boolean {
    return this.store.getState().isAuthenticated;
  }

  setIdentity(identity: VehicleIdentity): void {
    this.store.getState().setIdentity(identity);
  }

  async authenticate(email: string, password: string): Promise<true> {
    const credentials: Credentials = { email, password };
    const tokens = await this.auth.login(credentials);
    this.store.getState().setTokens(tokens);
    return true;
  }

  /**
   * Exchanges the refresh token for a new access token. Concurrent callers
   * share a single in-flight exchange.
   */
  refresh(): Promise<boolean> {
    if (!this.refreshPromise) {
      this.refreshPromise = this.performRefresh().finally(() => {
        this.refreshPromise = null;
      });
    }
    return this.refreshPromise;
  }

  private async performRefresh(): Promise<boolean> {
    const { refreshToken } = this.store.getState();
    if (!refreshToken) {
      log.debug("No refresh token held, refresh skipped");
      return false;
    }

    const tokens = await this.auth.refreshToken(refreshToken);
    if (!tokens) {
      return false;
    }

    this.store.getState().applyRefresh(tokens.accessToken, tokens.refreshToken);
    log.debug("Access token refreshed");
    return true;
  }

  buildHeaders(identity: Partial<VehicleIdentity> = {}): Record<string, string> {
    const state = this.store.getState();
    const vin = identity.vin ?? state.vin;
    const userId = identity.userId ?? state.userId;

    const headers: Record<string, string> = {
      Authorization: `Bearer ${state.accessToken ?? ""}`,
      "Content-Type": "application/json",
      Accept: "application/json",
      "x-service-name": APP_CONFIG.serviceName,
      "x-app-version": APP_CONFIG.appVersion,
      "x-device-platform": APP_CONFIG.devicePlatform,
      "x-device-family": APP_CONFIG.deviceFamily,
      "x-device-os-version": APP_CONFIG.deviceOsVersion,
      "x-device-locale": this.config.DEVICE_LOCALE,
      "x-timezone": this.config.TIMEZONE,
      "x-device-identifier": this.config.DEVICE_IDENTIFIER,
    };

    if (vin) {
      headers["x-vin-code"] = vin;
    }
    if (userId) {
      headers["x-player-identifier"] = userId;
    }
    return headers;
  }

  /**
   * Sends one request under the API base and returns the envelope's `data`.
   * A 401 triggers a single refresh; the request is never re-sent here.
   */
  async request(
    method: HttpMethod,
    path: string,
    body?: unknown,
    options: RequestOptions = {},
  ): Promise<unknown> {
    const url = `${this.config.API_BASE_URL}${path}`;
    let response: HttpResponse;

    try {
      response = await this.transport.request({
        method,
        url,
        headers: this.buildHeaders(),
        params: options.params,
        body: method === "POST" ? body : undefined,
        timeoutMs: options.timeoutMs ?? API_TIMEOUTS.DEFAULT,
      });
    } catch (error) {
      log.error("API request failed:", getErrorMessage(error));
      throw new ProtocolError(`API request failed: ${getErrorMessage(error)}`, { cause: error });
    }

    return this.handleResponse(response);
  }

  private async handleResponse(response: HttpResponse): Promise<unknown> {
    if (response.status === 401) {
      if (await this.refresh()) {
        throw new RetryAfterRefreshError();
      }
      throw new AuthExpiredError();
    }

    if (response.status !== 200) {
      throw new ProtocolError(`API error ${response.status}: ${describeBody(response.data)}`, {
        status: response.status,
        body: response.data,
      });
    }

    const envelope = response.data;
    if (!isRecord(envelope)) {
      throw new ProtocolError("API error: malformed response envelope", {
        status: response.status,
        body: envelope,
      });
    }

    if (typeof envelope.code !== "number" || !SUCCESS_CODES.includes(envelope.code)) {
      const message = typeof envelope.message === "string" ? envelope.message : "Unknown error";
      throw new ProtocolError(`API error: ${message}`, {
        status: response.status,
        body: envelope,
      });
    }

    return envelope.data;
  }
}
