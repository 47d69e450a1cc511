import { ConfigStore } from "./config/ConfigStore.js";
import { LISTEN_PORT } from "./config/Configuration.js";
import { ConfigurationReconciler } from "./config/ConfigurationReconciler.js";
import { loadDaemonOptions, type DaemonOptions } from "./config/daemonOptions.js";
import { handleRejectedConfiguration } from "./config/rejection.js";
import { ProviderHealthCheck } from "./health/providerHealth.js";
import type { AddonManager, HostBridge } from "./host/HostBridge.js";
import { ResolverRegistry } from "./network/ResolverRegistry.js";
import { appLogger, normalizeError } from "./observability/logger.js";

export { ConfigStore } from "./config/ConfigStore.js";
export {
  LISTEN_PORT,
  addonIcon,
  addonResource,
  redactConfiguration,
  type Configuration,
} from "./config/Configuration.js";
export {
  ConfigurationReconciler,
  PATH_NOT_SET_MESSAGE,
  type ReloadResult,
  type ReloadState,
} from "./config/ConfigurationReconciler.js";
export { loadDaemonOptions, type DaemonOptions } from "./config/daemonOptions.js";
export * from "./config/errors.js";
export { CONFIG_REJECTED_EXIT_CODE, handleRejectedConfiguration } from "./config/rejection.js";
export { ProviderHealthCheck, type ProviderHealthOutcome } from "./health/providerHealth.js";
export type {
  AddonInfo,
  AddonManager,
  HostBridge,
  InstalledAddon,
  PlatformInfo,
  RawSetting,
} from "./host/HostBridge.js";
export { ResolverRegistry, type ResolverCategory } from "./network/ResolverRegistry.js";

export type DaemonRuntime = {
  options: DaemonOptions;
  store: ConfigStore;
  resolvers: ResolverRegistry;
  reconciler: ConfigurationReconciler;
};

export type BootstrapOverrides = {
  options?: DaemonOptions;
  totalMemory?: () => number;
  exit?: (code: number) => void;
  sleep?: (ms: number) => Promise<unknown>;
};

/**
 * Loads the first configuration for a host connection. A rejected
 * configuration sends the user to the settings window and exits the process;
 * any other startup failure exits with status 1.
 *
 * @returns the running daemon state, or `undefined` once an exit was requested
 */
export async function bootstrapDaemon(
  host: HostBridge,
  addons: AddonManager,
  overrides: BootstrapOverrides = {},
): Promise<DaemonRuntime | undefined> {
  const exit = overrides.exit ?? ((code: number) => process.exit(code));
  try {
    const options = overrides.options ?? loadDaemonOptions();
    const store = new ConfigStore();
    const resolvers = new ResolverRegistry();
    const providerHealth = new ProviderHealthCheck(host, addons, {
      title: options.addonTitle,
      providerPrefix: options.providerAddonPrefix,
      aggregatorId: options.providerAggregatorId,
      refreshDelayMs: options.providerRefreshDelayMs,
      installDelayMs: options.providerInstallDelayMs,
      sleep: overrides.sleep,
    });
    const reconciler = new ConfigurationReconciler({
      host,
      store,
      resolvers,
      totalMemory: overrides.totalMemory,
      healthCheck: async (config) => {
        const outcome = await providerHealth.run(config);
        appLogger.debug({ outcome }, "provider health check finished");
      },
    });

    const result = await reconciler.reload();
    if (!result.ok) {
      await handleRejectedConfiguration(host, result, {
        addonId: options.addonId,
        title: options.addonTitle,
        pollIntervalMs: options.settingsPollIntervalMs,
        exit,
        sleep: overrides.sleep,
      });
      return undefined;
    }

    appLogger.info(
      { addonId: options.addonId, version: result.config.info.version, listenPort: LISTEN_PORT },
      "daemon configuration loaded",
    );
    return { options, store, resolvers, reconciler };
  } catch (error) {
    appLogger.error({ err: normalizeError(error) }, "daemon startup failed");
    exit(1);
    return undefined;
  }
}
