import type { AliasCoverage, AliasMapping, AliasResource } from "@/types";
import { API_ENDPOINTS, API_TIMEOUTS, DEFAULT_ALIAS_VERSION } from "@/utils/constants";
import { asString, getErrorMessage, isRecord } from "@/utils/helpers";
import { createLogger } from "@/utils/logger";
import { WANTED_ALIASES } from "@/services/telemetry/aliases";
import type { Session } from "./Session";

const log = createLogger("Alias");

export type AliasCatalog =
  | { shape: "dataResources"; resources: unknown[] }
  | { shape: "dataList"; resources: unknown[] }
  | { shape: "resources"; resources: unknown[] }
  | { shape: "list"; resources: unknown[] }
  | { shape: "unrecognized" };

const nonEmptyList = (value: unknown): unknown[] | null =>
  Array.isArray(value) && value.length > 0 ? value : null;

/**
 * The catalog endpoint has been seen answering with a bare list, an object
 * holding `resources`, or either of those wrapped in `data`.
 */
export const parseAliasCatalog = (body: unknown): AliasCatalog => {
  if (Array.isArray(body)) {
    return { shape: "list", resources: body };
  }
  if (!isRecord(body)) {
    return { shape: "unrecognized" };
  }

  const nested = isRecord(body.data) ? nonEmptyList(body.data.resources) : null;
  if (nested) {
    return { shape: "dataResources", resources: nested };
  }

  const dataList = nonEmptyList(body.data);
  if (dataList) {
    return { shape: "dataList", resources: dataList };
  }

  const resources = nonEmptyList(body.resources);
  if (resources) {
    return { shape: "resources", resources };
  }

  return { shape: "unrecognized" };
};

export const buildAliasMapping = (catalog: AliasCatalog): AliasMapping => {
  if (catalog.shape === "unrecognized") {
    return {};
  }

  const mapping: AliasMapping = {};
  for (const entry of catalog.resources) {
    if (!isRecord(entry)) {
      continue;
    }
    const alias = asString(entry.alias);
    if (!alias) {
      continue;
    }

    const objectId = asString(entry.devObjID);
    const instanceId = asString(entry.devObjInstID, "0");
    const resourceId = asString(entry.devRsrcID, "0");

    const resource: AliasResource = {
      path: `/${objectId}/${instanceId}/${resourceId}`,
      objectId,
      instanceId,
      resourceId,
      name: asString(entry.name),
      units: asString(entry.units),
      type: asString(entry.type),
    };
    mapping[alias] = resource;
  }
  return mapping;
};

export const aliasCoverage = (mapping: AliasMapping): AliasCoverage => ({
  found: WANTED_ALIASES.filter((alias) => alias in mapping),
  missing: WANTED_ALIASES.filter((alias) => !(alias in mapping)),
});

/**
 * Resolves telemetry aliases to resource paths. Resolution is advisory: any
 * failure yields an empty mapping and telemetry falls back to static paths.
 */
export class AliasService {
  private cached: { version: string; mapping: AliasMapping } | null = null;

  constructor(private readonly session: Session) {}

  async resolve(version: string = DEFAULT_ALIAS_VERSION): Promise<AliasMapping> {
    if (this.cached && this.cached.version === version) {
      return this.cached.mapping;
    }

    try {
      const response = await this.session.transport.request({
        method: "GET",
        url: `${this.session.config.API_BASE_URL}${API_ENDPOINTS.ALIAS_CATALOG}`,
        headers: this.session.buildHeaders(),
        params: { version },
        timeoutMs: API_TIMEOUTS.DEFAULT,
      });

      if (response.status !== 200) {
        log.warn(`get-alias returned status ${response.status}`);
        return {};
      }

      const catalog = parseAliasCatalog(response.data);
      const mapping = buildAliasMapping(catalog);
      if (Object.keys(mapping).length === 0) {
        log.debug(`Alias catalog (${catalog.shape}) had no usable entries`);
        return mapping;
      }

      this.cached = { version, mapping };
      const { found, missing } = aliasCoverage(mapping);
      log.debug(
        `Loaded ${Object.keys(mapping).length} alias mappings`,
        `(wanted found: ${found.length}, missing: ${missing.length})`,
      );
      return mapping;
    } catch (error) {
      log.warn("Failed to fetch alias mappings:", getErrorMessage(error));
      return {};
    }
  }

  clear(): void {
    this.cached = null;
  }
}
