import type {
  AliasMapping,
  ResourceRequest,
  TelemetryRequest,
  TelemetrySnapshot,
  TelemetryValue,
} from "@/types";
import { isRecord } from "@/utils/helpers";
import { FALLBACK_PATHS, FRIENDLY_KEYS, WANTED_ALIASES } from "./aliases";

const INTEGER_SEGMENT = /^\d+$/;
const NUMERIC_VALUE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export const parseResourcePath = (path: string): ResourceRequest | null => {
  const parts = path.replace(/^\/+|\/+$/g, "").split("/");
  if (parts.length !== 3) {
    return null;
  }
  const [objectId, instanceId, resourceId] = parts;
  return { objectId, instanceId, resourceId };
};

/**
 * Device keys arrive as `{objectId}_{instanceId:05d}_{resourceId:05d}`.
 * Returns the canonical `/objectId/instanceId/resourceId` path, or the raw
 * key when it does not have that shape.
 */
export const deviceKeyToPath = (deviceKey: string): string => {
  const parts = deviceKey.split("_");
  if (parts.length !== 3 || !parts.every((part) => INTEGER_SEGMENT.test(part))) {
    return deviceKey;
  }
  return `/${parts.map((part) => part.replace(/^0+(?=\d)/, "")).join("/")}`;
};

export const coerceTelemetryValue = (value: unknown): TelemetryValue | null => {
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return NUMERIC_VALUE.test(trimmed) ? Number(trimmed) : value;
  }
  return null;
};

export const friendlyKeyForAlias = (alias: string): string =>
  Object.hasOwn(FRIENDLY_KEYS, alias) ? FRIENDLY_KEYS[alias] : alias.toLowerCase();

export const buildTelemetryRequest = (mapping: AliasMapping): TelemetryRequest => {
  const resources: ResourceRequest[] = [];
  const pathToAlias: Record<string, string> = {};

  if (Object.keys(mapping).length > 0) {
    for (const alias of WANTED_ALIASES) {
      const entry = mapping[alias];
      if (!entry) {
        continue;
      }
      resources.push({
        objectId: entry.objectId,
        instanceId: entry.instanceId,
        resourceId: entry.resourceId,
      });
      pathToAlias[entry.path] = alias;
    }
    return { resources, pathToAlias };
  }

  for (const path of FALLBACK_PATHS) {
    const request = parseResourcePath(path);
    if (request) {
      resources.push(request);
    }
  }
  return { resources, pathToAlias };
};

export const decodeTelemetry = (
  rawItems: unknown,
  pathToAlias: Record<string, string> = {},
): TelemetrySnapshot => {
  const snapshot: TelemetrySnapshot = {};
  if (!Array.isArray(rawItems)) {
    return snapshot;
  }

  for (const item of rawItems) {
    if (!isRecord(item)) {
      continue;
    }
    const { deviceKey } = item;
    if (typeof deviceKey !== "string" || !deviceKey) {
      continue;
    }
    if (item.value === undefined || item.value === null) {
      continue;
    }

    const value = coerceTelemetryValue(item.value);
    if (value === null) {
      continue;
    }

    const path = deviceKeyToPath(deviceKey);
    const alias = Object.hasOwn(pathToAlias, path) ? pathToAlias[path] : undefined;
    const key = alias ? friendlyKeyForAlias(alias) : path;
    // Raw keys such as "__proto__" must land as own entries.
    Object.defineProperty(snapshot, key, {
      value,
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }

  return snapshot;
};
