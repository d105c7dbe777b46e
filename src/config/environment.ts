// Environment configuration
export type Environment = "development" | "production" | "staging";

export interface ClientConfig {
  ENVIRONMENT: Environment;
  DEBUG: boolean;
  API_BASE_URL: string;
  PAIRING_BASE_URL: string;
  AUTH_DOMAIN: string;
  AUTH_CLIENT_ID: string;
  AUTH_AUDIENCE: string;
  DEVICE_IDENTIFIER: string;
  DEVICE_LOCALE: string;
  TIMEZONE: string;
}

const AUTH_DOMAIN = "vinfast-us-prod.us.auth0.com";

const shared = {
  API_BASE_URL: "https://mobile.connected-car.vinfastauto.us",
  PAIRING_BASE_URL: "https://ccarapi.vinfast.com",
  AUTH_DOMAIN,
  AUTH_CLIENT_ID: "xhGY7XKDFSk1Q22rxidvwujfz0EPAbUP",
  AUTH_AUDIENCE: `https://${AUTH_DOMAIN}/api/v2/`,
  DEVICE_IDENTIFIER: "connected-car-client",
  DEVICE_LOCALE: "en-US",
  TIMEZONE: "America/New_York",
};

const configs: Record<Environment, ClientConfig> = {
  // Local development against a mock of the vendor API
  development: {
    ...shared,
    API_BASE_URL: "http://127.0.0.1:3000",
    PAIRING_BASE_URL: "http://127.0.0.1:3000",
    ENVIRONMENT: "development",
    DEBUG: true,
  },

  production: {
    ...shared,
    ENVIRONMENT: "production",
    DEBUG: false,
  },

  // Production hosts with debug logging
  staging: {
    ...shared,
    ENVIRONMENT: "staging",
    DEBUG: true,
  },
};

const isEnvironment = (value: string | undefined): value is Environment =>
  value === "development" || value === "production" || value === "staging";

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ClientConfig => {
  const name = env.CONNECTED_CAR_ENV;
  const base = configs[isEnvironment(name) ? name : "production"];

  return {
    ...base,
    API_BASE_URL: env.CONNECTED_CAR_API_BASE ?? base.API_BASE_URL,
    PAIRING_BASE_URL: env.CONNECTED_CAR_PAIRING_BASE ?? base.PAIRING_BASE_URL,
    AUTH_DOMAIN: env.CONNECTED_CAR_AUTH_DOMAIN ?? base.AUTH_DOMAIN,
    AUTH_CLIENT_ID: env.CONNECTED_CAR_AUTH_CLIENT_ID ?? base.AUTH_CLIENT_ID,
    AUTH_AUDIENCE: env.CONNECTED_CAR_AUTH_AUDIENCE ?? base.AUTH_AUDIENCE,
    DEVICE_IDENTIFIER: env.CONNECTED_CAR_DEVICE_IDENTIFIER ?? base.DEVICE_IDENTIFIER,
  };
};

export const Config = loadConfig();
export default Config;
