import { setTimeout as delay } from "node:timers/promises";

import type { HostBridge } from "../host/HostBridge.js";
import { appLogger } from "../observability/logger.js";
import type { ReloadResult } from "./ConfigurationReconciler.js";

/** Tells the host wrapper the daemon stopped on purpose; it must not report a crash. */
export const CONFIG_REJECTED_EXIT_CODE = 5;

export type RejectionOptions = {
  addonId: string;
  title: string;
  pollIntervalMs: number;
  exit?: (code: number) => void;
  sleep?: (ms: number) => Promise<unknown>;
};

const logger = appLogger.child({ component: "rejection" });

/**
 * Sends the user to the settings window with the rejection message, waits
 * until they close it and stops the process. The next start reloads from
 * whatever they saved.
 */
export async function handleRejectedConfiguration(
  host: HostBridge,
  rejection: Extract<ReloadResult, { ok: false }>,
  options: RejectionOptions,
): Promise<void> {
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const sleep = options.sleep ?? delay;

  logger.warn(
    { code: rejection.error.code, path: rejection.error.path },
    "addon settings not properly set, opening settings window",
  );
  await host.openSettingsUI(options.addonId);
  await host.showDialog(options.title, rejection.message);

  do {
    await sleep(options.pollIntervalMs);
  } while (await host.isSettingsUIOpen());

  logger.info({ exitCode: CONFIG_REJECTED_EXIT_CODE }, "settings window closed, exiting");
  exit(CONFIG_REJECTED_EXIT_CODE);
}
