export const APP_CONFIG = {
  name: "Connected Car Client",
  serviceName: "CAPP",
  appVersion: "1.10.3",
  devicePlatform: "NodeJS",
  deviceFamily: "Integration",
  deviceOsVersion: "1.0",
};

export const API_ENDPOINTS = {
  TOKEN: "/oauth/token",
  USER_VEHICLES: "/ccarusermgnt/api/v1/user-vehicle",
  PROFILE: "/ccarusermgnt/api/v1/auth0/account/profile",
  FAVORITE_LOCATIONS: "/ccarusermgnt/api/v1/location-favorite",
  ALIAS_CATALOG: "/modelmgmt/api/v2/vehicle-model/mobile-app/vehicle/get-alias",
  TELEMETRY_PING: "/ccaraccessmgmt/api/v1/telemetry/app/ping",
  VERIFY_SESSION: "/ccaraccessmgmt/api/v1/pairing/app/verify-session",
  SEND_PAIR_DATA: "/ccaraccessmgmt/api/v1/pairing/app/send-pair-data",
  REMOTE_COMMAND: "/ccaraccessmgmt/api/v2/remote/app/command",
} as const;

export const API_TIMEOUTS = {
  DEFAULT: 30000,
  COMMAND: 60000,
};

export const AUTH_SCOPE = "offline_access openid profile email";

// Application-level success codes carried in the response envelope
export const SUCCESS_CODES: readonly number[] = [0, 200000];

export const DEFAULT_ALIAS_VERSION = "1.0";

export const POLL_INTERVALS = {
  NORMAL: 4 * 60 * 60, // 4 hours when idle
  CHARGING: 5 * 60, // 5 minutes while the charger reports charging
};

export const POLL_DEFAULTS = {
  OCPP_ENTITY: "sensor.charger_status_connector",
  OCPP_CHARGING_STATE: "Charging",
};

export const PAIRING_CONFIG = {
  RSA_BITS: 2048,
  RSA_EXPONENT: 0x10001,
  SEED_BYTES: 16,
  DEFAULT_DEVICE_NAME: "ConnectedCarClient",
  QR_REQUIRED_FIELDS: ["K", "ssid", "vin", "timeout"],
  DN_SPECIAL_CHARS: [",", "=", "+", "<", ">", "#", ";"],
} as const;

export const COMMAND_CONFIG = {
  WAKE_UP_TIMEOUT: 60000,
  IS_MASTER_PROFILE: true,
};

export const CONTROL_ALIASES = {
  CLIMATE_CONTROL_AIR_CONDITION_ENABLE: "3416_0_5850",
  CLIMATE_CONTROL_TARGET_TEMPERATURE: "3416_0_5851",
  VEHICLE_CONTROL_DOOR_LOCK: "3415_0_5850",
  VEHICLE_CONTROL_DOOR_UNLOCK: "3415_0_5851",
  VEHICLE_CONTROL_HORN: "3417_0_5850",
  VEHICLE_CONTROL_LIGHTS: "3417_0_5851",
} as const;

export type ControlAlias = keyof typeof CONTROL_ALIASES;

export const STORAGE_KEYS = {
  PAIRING_KEYS: "pairing_keys",
};

export const LOG_LEVELS = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;
