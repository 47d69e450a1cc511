import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const readFileSyncMock = vi.fn<(path: string, encoding: BufferEncoding) => string>();

vi.mock("node:fs", () => ({
  readFileSync: readFileSyncMock
}));

let resolveEnv: (name: string, fallback?: string) => string | undefined;

const originalEnv = process.env;

describe("resolveEnv", () => {
  beforeEach(async () => {
    readFileSyncMock.mockReset();
    process.env = { ...originalEnv };
    vi.resetModules();
    const envModule = await import("./env.js");
    resolveEnv = envModule.resolveEnv;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("prefers the contents of the _FILE variable", () => {
    process.env.ADDON_ID_FILE = "/run/secrets/addon-id";
    process.env.ADDON_ID = "plugin.video.from-env";
    readFileSyncMock.mockReturnValue(" plugin.video.from-file \n");

    expect(resolveEnv("ADDON_ID")).toBe("plugin.video.from-file");
    expect(readFileSyncMock).toHaveBeenCalledWith("/run/secrets/addon-id", "utf-8");
  });

  it("falls back to the direct variable when the file cannot be read", () => {
    process.env.ADDON_TITLE_FILE = "/missing";
    process.env.ADDON_TITLE = "Direct";
    readFileSyncMock.mockImplementation(() => {
      throw new Error("ENOENT");
    });

    expect(resolveEnv("ADDON_TITLE")).toBe("Direct");
  });

  it("treats an empty variable as unset", () => {
    process.env.SETTINGS_POLL_INTERVAL_MS = "";

    expect(resolveEnv("SETTINGS_POLL_INTERVAL_MS", "3000")).toBe("3000");
    expect(readFileSyncMock).not.toHaveBeenCalled();
  });
});
