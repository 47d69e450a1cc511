/**
 * Provider Health Check
 *
 * Runs after a configuration is published. When no search provider addon is
 * enabled, offers to install the provider aggregator and, once it is active,
 * disables the individual providers it replaces.
 */

import { setTimeout as delay } from "node:timers/promises";

import { addonIcon, type Configuration } from "../config/Configuration.js";
import type { AddonManager, HostBridge, InstalledAddon } from "../host/HostBridge.js";
import { appLogger } from "../observability/logger.js";

export const INSTALL_PROVIDERS_PROMPT = "LOCALIZE[30271]";
export const PROVIDERS_INSTALLED_MESSAGE = "LOCALIZE[30272]";
export const PROVIDERS_MISSING_MESSAGE = "LOCALIZE[30273]";

export type ProviderHealthOptions = {
  title: string;
  /** Addon id prefix shared by every provider addon. */
  providerPrefix: string;
  aggregatorId: string;
  refreshDelayMs: number;
  installDelayMs: number;
  sleep?: (ms: number) => Promise<unknown>;
};

export type ProviderHealthOutcome =
  | "providers-enabled"
  | "declined"
  | "aggregator-installed"
  | "aggregator-missing";

const logger = appLogger.child({ component: "providerHealth" });

export class ProviderHealthCheck {
  private readonly sleep: (ms: number) => Promise<unknown>;

  constructor(
    private readonly host: HostBridge,
    private readonly addons: AddonManager,
    private readonly options: ProviderHealthOptions,
  ) {
    this.sleep = options.sleep ?? delay;
  }

  async run(config: Configuration): Promise<ProviderHealthOutcome> {
    const providers = await this.listProviders();
    if (providers.some((addon) => addon.enabled)) {
      logger.debug({ providers: providers.length }, "provider addons enabled");
      return "providers-enabled";
    }

    logger.info("no provider addon enabled, refreshing addon repositories");
    await this.addons.updateLocalAddons();
    await this.addons.updateAddonRepos();
    await this.sleep(this.options.refreshDelayMs);

    const { title, aggregatorId } = this.options;
    if (!(await this.host.confirmDialog(title, INSTALL_PROVIDERS_PROMPT))) {
      logger.info("provider aggregator installation declined");
      return "declined";
    }

    await this.addons.playUrl(`plugin://${aggregatorId}/`);
    await this.sleep(this.options.installDelayMs);

    const installed = await this.addons.listScriptAddons();
    if (!installed.some((addon) => addon.id === aggregatorId && addon.enabled)) {
      logger.warn({ aggregatorId }, "provider aggregator not enabled after installation");
      await this.host.showDialog(title, PROVIDERS_MISSING_MESSAGE);
      return "aggregator-missing";
    }

    for (const addon of providers) {
      if (addon.id !== aggregatorId) {
        await this.addons.setAddonEnabled(addon.id, false);
      }
    }
    logger.info({ aggregatorId, disabled: providers.length }, "provider aggregator installed");
    await this.host.notify(title, PROVIDERS_INSTALLED_MESSAGE, addonIcon(config));
    return "aggregator-installed";
  }

  private async listProviders(): Promise<InstalledAddon[]> {
    const addons = await this.addons.listScriptAddons();
    return addons.filter((addon) => addon.id.startsWith(this.options.providerPrefix));
  }
}
