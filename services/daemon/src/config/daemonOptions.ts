import { z } from "zod";

import { resolveEnv } from "../utils/env.js";
import { DaemonOptionsError } from "./errors.js";

const durationMs = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

export const DaemonOptionsSchema = z.object({
  addonId: z.string().min(1).default("plugin.video.reelbridge"),
  addonTitle: z.string().min(1).default("Reelbridge"),
  settingsPollIntervalMs: z.coerce.number().int().positive().default(3000),
  providerAddonPrefix: z.string().min(1).default("script.reelbridge."),
  providerAggregatorId: z.string().min(1).default("script.reelbridge.providers"),
  providerRefreshDelayMs: durationMs(10_000),
  providerInstallDelayMs: durationMs(4_000),
});

export type DaemonOptions = z.infer<typeof DaemonOptionsSchema>;

const ENV_NAMES: ReadonlyArray<readonly [keyof DaemonOptions, string]> = [
  ["addonId", "ADDON_ID"],
  ["addonTitle", "ADDON_TITLE"],
  ["settingsPollIntervalMs", "SETTINGS_POLL_INTERVAL_MS"],
  ["providerAddonPrefix", "PROVIDER_ADDON_PREFIX"],
  ["providerAggregatorId", "PROVIDER_AGGREGATOR_ID"],
  ["providerRefreshDelayMs", "PROVIDER_REFRESH_DELAY_MS"],
  ["providerInstallDelayMs", "PROVIDER_INSTALL_DELAY_MS"],
];

/**
 * Reads the daemon's own options from the environment. Unset variables take
 * their defaults.
 *
 * @throws DaemonOptionsError naming every invalid variable
 */
export function loadDaemonOptions(): DaemonOptions {
  const input: Partial<Record<keyof DaemonOptions, string>> = {};
  for (const [key, envName] of ENV_NAMES) {
    const value = resolveEnv(envName);
    if (value !== undefined) {
      input[key] = value;
    }
  }

  const result = DaemonOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new DaemonOptionsError(
      result.error.issues.map((issue) => {
        const envName = ENV_NAMES.find(([key]) => key === issue.path[0])?.[1] ?? issue.path.join(".");
        return `${envName}: ${issue.message}`;
      }),
    );
  }
  return result.data;
}
