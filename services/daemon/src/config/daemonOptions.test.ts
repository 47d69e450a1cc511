import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { loadDaemonOptions } from "./daemonOptions.js";
import { DaemonOptionsError } from "./errors.js";

const originalEnv = process.env;

describe("loadDaemonOptions", () => {
  beforeEach(() => {
    process.env = {};
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("applies defaults when nothing is set", () => {
    expect(loadDaemonOptions()).toEqual({
      addonId: "plugin.video.reelbridge",
      addonTitle: "Reelbridge",
      settingsPollIntervalMs: 3000,
      providerAddonPrefix: "script.reelbridge.",
      providerAggregatorId: "script.reelbridge.providers",
      providerRefreshDelayMs: 10_000,
      providerInstallDelayMs: 4_000,
    });
  });

  it("reads and coerces environment overrides", () => {
    process.env.ADDON_ID = "plugin.video.test";
    process.env.SETTINGS_POLL_INTERVAL_MS = "250";
    process.env.PROVIDER_INSTALL_DELAY_MS = "0";

    const options = loadDaemonOptions();

    expect(options.addonId).toBe("plugin.video.test");
    expect(options.settingsPollIntervalMs).toBe(250);
    expect(options.providerInstallDelayMs).toBe(0);
  });

  it("reports invalid variables by name", () => {
    process.env.SETTINGS_POLL_INTERVAL_MS = "0";
    process.env.PROVIDER_REFRESH_DELAY_MS = "soon";

    let caught: unknown;
    try {
      loadDaemonOptions();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DaemonOptionsError);
    if (!(caught instanceof DaemonOptionsError)) return;
    expect(caught.issues).toHaveLength(2);
    expect(caught.issues[0]).toMatch(/^SETTINGS_POLL_INTERVAL_MS: /);
    expect(caught.issues[1]).toMatch(/^PROVIDER_REFRESH_DELAY_MS: /);
  });
});
