import aliasTable from "@/data/telemetry-aliases.json";

/** Telemetry aliases requested on every poll, in request order. */
export const WANTED_ALIASES: readonly string[] = aliasTable.aliases.map((entry) => entry.alias);

export const FRIENDLY_KEYS: Readonly<Record<string, string>> = Object.fromEntries(
  aliasTable.aliases.map((entry) => [entry.alias, entry.key]),
);

// Vendor object ids in the 34xxx range, used when the alias catalog is unavailable.
export const FALLBACK_PATHS: readonly string[] = aliasTable.fallbackPaths;
