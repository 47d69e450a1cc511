import { existsSync } from "node:fs";
import { mkdir, rm } from "node:fs/promises";
import path, { type PlatformPath } from "node:path";

import type { AddonInfo, HostBridge, PlatformInfo } from "../../host/HostBridge.js";
import { appLogger, normalizeError } from "../../observability/logger.js";
import { applyPlatformQuirk, type QuirkContext } from "./platformQuirks.js";

export type PathResolverOptions = {
  env?: QuirkContext["env"];
  exists?: QuirkContext["exists"];
};

const TEMP_ROOT = "special://temp";

/**
 * Everything before the last separator, normalized without a trailing
 * separator. Folder settings arrive as `/media/downloads/` and resolve to
 * `/media/downloads`; a value without any separator resolves to `"."`.
 * Windows hosts may report either separator.
 */
export function directoryOf(target: string, platformPath: PlatformPath = path): string {
  const separators = platformPath.sep === "\\" ? ["\\", "/"] : [platformPath.sep];
  const index = Math.max(...separators.map((separator) => target.lastIndexOf(separator)));
  if (index < 0) {
    return ".";
  }
  const directory = platformPath.normalize(target.slice(0, index + 1));
  if (directory === platformPath.parse(directory).root) {
    return directory;
  }
  return directory.endsWith(platformPath.sep) ? directory.slice(0, -1) : directory;
}

/** `plugin.video.reelbridge` → `reelbridge` */
function addonShortName(addonId: string): string {
  const segments = addonId.split(".").filter((segment) => segment.length > 0);
  return segments[segments.length - 1] ?? addonId;
}

export class PathResolver {
  private readonly logger = appLogger.child({ component: "PathResolver" });
  private readonly quirkContext: QuirkContext;

  constructor(
    private readonly host: HostBridge,
    options: PathResolverOptions = {},
  ) {
    this.quirkContext = {
      env: options.env ?? process.env,
      exists: options.exists ?? existsSync,
    };
  }

  /**
   * Translates a host path setting and returns its directory component; host
   * translation of a directory setting may end in a file-like token. An empty
   * setting yields `"."`.
   */
  async resolve(virtualPath: string): Promise<string> {
    return directoryOf(await this.host.translatePath(virtualPath));
  }

  async resolveAddonInfo(platform: PlatformInfo): Promise<AddonInfo> {
    const info = await this.host.getAddonInfo();
    const [addonPath, profile, home, hostPath, tempRoot] = await Promise.all([
      this.host.translatePath(info.path),
      this.host.translatePath(info.profile),
      this.host.translatePath(info.home),
      this.host.translatePath(info.hostPath),
      this.host.translatePath(TEMP_ROOT),
    ]);
    const translated: AddonInfo = {
      ...info,
      path: addonPath,
      profile,
      home,
      hostPath,
      tempPath: path.join(tempRoot, addonShortName(info.id)),
    };

    const resolved = applyPlatformQuirk(platform.os, translated, this.quirkContext);
    if (resolved !== translated) {
      this.logger.info(
        { os: platform.os, home: resolved.home, path: resolved.path },
        "rewrote addon paths for platform",
      );
    }
    return resolved;
  }

  /** Prior contents of the temporary directory never survive a reload. */
  async recreateTemporaryDirectory(tempPath: string): Promise<void> {
    try {
      await rm(tempPath, { recursive: true, force: true });
      await mkdir(tempPath, { recursive: true });
    } catch (error) {
      this.logger.warn({ err: normalizeError(error), tempPath }, "could not create temporary directory");
    }
  }
}
