import type { ResolverCategory, ResolverRegistry } from "../network/ResolverRegistry.js";
import type { AppLogger } from "../observability/logger.js";
import { formatBytes } from "../utils/bytes.js";
import type { ConfigurationFields } from "./Configuration.js";

const MiB = 1024 * 1024;

export const STORAGE_MEMORY = 1;
export const KEEP_ALWAYS = 2;
export const FIXED_MEMORY_SIZE = 40 * MiB;
export const MAX_AUTO_MEMORY_SIZE = 200 * MiB;
export const DEFAULT_TRAKT_SYNC_HOURS = 6;
export const DEFAULT_CONNECTIONS_LIMIT = 50;

/** Indexed by the `proxy_type` setting. */
export const PROXY_SCHEMES = ["socks4", "socks5", "http", "https"] as const;

export type DeriveContext = {
  /** Total system memory in bytes. */
  totalMemory: number;
  resolvers: ResolverRegistry;
  logger: AppLogger;
};

export type DerivationRule = (draft: ConfigurationFields, context: DeriveContext) => void;

/** Memory-backed storage never moves or keeps files around after playback. */
export const applyStorageOverride: DerivationRule = (draft) => {
  if (draft.downloadStorage !== STORAGE_MEMORY) {
    return;
  }
  draft.completedMove = false;
  draft.keepDownloading = KEEP_ALWAYS;
  draft.keepFilesFinished = KEEP_ALWAYS;
  draft.keepFilesPlaying = KEEP_ALWAYS;
};

export function autoMemorySize(strategy: number, totalMemory: number): number | undefined {
  if (strategy === 0) {
    return FIXED_MEMORY_SIZE;
  }
  const percentage = 5 + 5 * (strategy - 1);
  const size = Math.floor(totalMemory / 100) * percentage;
  if (size <= 0) {
    return undefined;
  }
  return Math.min(size, MAX_AUTO_MEMORY_SIZE);
}

export const applyAdaptiveMemory: DerivationRule = (draft, { totalMemory, logger }) => {
  if (draft.downloadStorage !== STORAGE_MEMORY || !draft.autoMemorySize) {
    return;
  }
  const size = autoMemorySize(draft.autoMemorySizeStrategy, totalMemory);
  if (size === undefined) {
    logger.debug({ strategy: draft.autoMemorySizeStrategy }, "auto memory size not positive, keeping configured size");
    return;
  }
  draft.memorySize = size;
  logger.debug(
    {
      strategy: draft.autoMemorySizeStrategy,
      totalMemory: formatBytes(totalMemory),
      memorySize: formatBytes(size),
    },
    "selected memory size",
  );
};

export const applyTraktDefaults: DerivationRule = (draft) => {
  if (draft.traktToken !== "" && draft.traktSyncFrequency === 0) {
    draft.traktSyncFrequency = DEFAULT_TRAKT_SYNC_HOURS;
  }
};

export const applySubtitleLanguage: DerivationRule = (draft) => {
  if (draft.osdbAutoLanguage || draft.osdbLanguage === "") {
    draft.osdbLanguage = draft.language;
  }
};

export function buildProxyUrl(
  type: number,
  host: string,
  port: number,
  login: string,
  password: string,
): string | undefined {
  const scheme = PROXY_SCHEMES[type];
  if (scheme === undefined) {
    return undefined;
  }
  const credentials = login !== "" || password !== "" ? `${login}:${password}@` : "";
  return `${scheme}://${credentials}${host}:${port}`;
}

export const applyProxyUrl: DerivationRule = (draft, { logger }) => {
  if (!draft.proxyEnabled || draft.proxyHost === "") {
    return;
  }
  const url = buildProxyUrl(draft.proxyType, draft.proxyHost, draft.proxyPort, draft.proxyLogin, draft.proxyPassword);
  if (url === undefined) {
    logger.warn({ proxyType: draft.proxyType }, "unknown proxy type, proxy disabled");
    return;
  }
  draft.proxyUrl = url;
};

export function parseServerList(list: string): string[] {
  return list
    .replace(/\s+/g, "")
    .split(",")
    .filter((entry) => entry.length > 0);
}

function rebuildResolver(
  category: ResolverCategory,
  list: string,
  resolvers: ResolverRegistry,
): string {
  const stripped = list.replace(/\s+/g, "");
  if (stripped !== "") {
    resolvers.replace(category, parseServerList(stripped));
  }
  return stripped;
}

/** A blank list keeps whatever resolver the category already has. */
export const applyDnsResolvers: DerivationRule = (draft, { resolvers }) => {
  draft.publicDnsList = rebuildResolver("public", draft.publicDnsList, resolvers);
  draft.opennicDnsList = rebuildResolver("opennic", draft.opennicDnsList, resolvers);
};

export const applyConnectionsLimit: DerivationRule = (draft) => {
  if (draft.connectionsLimit === 0) {
    draft.connectionsLimit = DEFAULT_CONNECTIONS_LIMIT;
  }
};

/** Order matters: later rules read fields earlier rules override. */
export const DERIVATION_RULES: readonly DerivationRule[] = [
  applyStorageOverride,
  applyAdaptiveMemory,
  applyTraktDefaults,
  applySubtitleLanguage,
  applyProxyUrl,
  applyDnsResolvers,
  applyConnectionsLimit,
];

export function deriveValues(draft: ConfigurationFields, context: DeriveContext): ConfigurationFields {
  for (const rule of DERIVATION_RULES) {
    rule(draft, context);
  }
  return draft;
}
