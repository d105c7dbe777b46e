export interface AliasResource {
  path: string;
  objectId: string;
  instanceId: string;
  resourceId: string;
  name: string;
  units: string;
  type: string;
}

export type AliasMapping = Record<string, AliasResource>;

export interface ResourceRequest {
  objectId: string;
  instanceId: string;
  resourceId: string;
}

export interface TelemetryRequest {
  resources: ResourceRequest[];
  pathToAlias: Record<string, string>;
}

export type TelemetryValue = number | string;

export type TelemetrySnapshot = Record<string, TelemetryValue>;

export interface AliasCoverage {
  found: string[];
  missing: string[];
}
