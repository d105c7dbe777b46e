import type { ClientConfig } from "@/config/environment";
import type { AuthTokens, Credentials, HttpResponse, HttpTransport } from "@/types";
import { API_ENDPOINTS, API_TIMEOUTS, AUTH_SCOPE } from "@/utils/constants";
import { describeBody, getErrorMessage, isRecord } from "@/utils/helpers";
import { createLogger } from "@/utils/logger";
import { AuthError, ProtocolError } from "./errors";

const log = createLogger("Auth");

const readTokens = (body: unknown): AuthTokens | null => {
  if (!isRecord(body) || typeof body.access_token !== "string" || !body.access_token) {
    return null;
  }
  return {
    accessToken: body.access_token,
    refreshToken: typeof body.refresh_token === "string" ? body.refresh_token : null,
  };
};

/** OAuth2 grants against the identity provider. */
export class AuthService {
  constructor(
    private readonly transport: HttpTransport,
    private readonly config: ClientConfig,
  ) {}

  private get tokenUrl(): string {
    return `https://${this.config.AUTH_DOMAIN}${API_ENDPOINTS.TOKEN}`;
  }

  async login(credentials: Credentials): Promise<AuthTokens> {
    let response: HttpResponse;
    try {
      response = await this.transport.request({
        method: "POST",
        url: this.tokenUrl,
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: {
          client_id: this.config.AUTH_CLIENT_ID,
          audience: this.config.AUTH_AUDIENCE,
          grant_type: "password",
          scope: AUTH_SCOPE,
          username: credentials.email,
          password: credentials.password,
        },
        timeoutMs: API_TIMEOUTS.DEFAULT,
      });
    } catch (error) {
      log.error("Connection error during login:", getErrorMessage(error));
      throw new ProtocolError(`Connection error: ${getErrorMessage(error)}`, { cause: error });
    }

    if (response.status === 401) {
      throw new AuthError("Invalid credentials");
    }

    if (response.status !== 200) {
      log.error(`Login failed: ${response.status} - ${describeBody(response.data)}`);
      throw new ProtocolError(`Authentication failed: ${response.status}`, {
        status: response.status,
        body: response.data,
      });
    }

    const tokens = readTokens(response.data);
    if (!tokens) {
      throw new ProtocolError("Token response did not include an access token", {
        status: response.status,
        body: response.data,
      });
    }

    log.debug("Authentication successful");
    return tokens;
  }

  /** Resolves with null instead of throwing; refresh is best-effort. */
  async refreshToken(refreshToken: string): Promise<AuthTokens | null> {
    try {
      const response = await this.transport.request({
        method: "POST",
        url: this.tokenUrl,
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: {
          client_id: this.config.AUTH_CLIENT_ID,
          grant_type: "refresh_token",
          refresh_token: refreshToken,
        },
        timeoutMs: API_TIMEOUTS.DEFAULT,
      });

      if (response.status !== 200) {
        log.warn(`Token refresh rejected with status ${response.status}`);
        return null;
      }

      return readTokens(response.data);
    } catch (error) {
      log.error("Token refresh failed:", getErrorMessage(error));
      return null;
    }
  }
}
