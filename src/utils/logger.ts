import { Config } from "@/config/environment";
import { LOG_LEVELS, type LogLevel } from "./constants";

export interface Logger {
  error: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  debug: (message: string, ...details: unknown[]) => void;
}

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);

const resolveLevel = (): number => {
  const configured = process.env.CONNECTED_CAR_LOG_LEVEL?.toUpperCase();
  if (isLogLevel(configured)) {
    return LOG_LEVELS[configured];
  }
  return Config.DEBUG ? LOG_LEVELS.DEBUG : LOG_LEVELS.INFO;
};

const threshold = resolveLevel();

export const createLogger = (tag: string): Logger => {
  const prefix = `[${tag}]`;

  return {
    error: (message, ...details) => {
      if (threshold >= LOG_LEVELS.ERROR) {
        console.error(`${prefix} ${message}`, ...details);
      }
    },
    warn: (message, ...details) => {
      if (threshold >= LOG_LEVELS.WARN) {
        console.warn(`${prefix} ${message}`, ...details);
      }
    },
    info: (message, ...details) => {
      if (threshold >= LOG_LEVELS.INFO) {
        console.log(`${prefix} ${message}`, ...details);
      }
    },
    debug: (message, ...details) => {
      if (threshold >= LOG_LEVELS.DEBUG) {
        console.debug(`${prefix} ${message}`, ...details);
      }
    },
  };
};
