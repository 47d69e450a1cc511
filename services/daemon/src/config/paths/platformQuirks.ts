import path from "node:path";

import type { AddonInfo } from "../../host/HostBridge.js";

export type QuirkContext = {
  env: Readonly<Record<string, string | undefined>>;
  exists(candidate: string): boolean;
};

/** Rewrites host-reported addon paths for one platform. Must not mutate its input. */
export type PlatformQuirk = (info: AddonInfo, context: QuirkContext) => AddonInfo;

const STORE_PACKAGE_MARKER = "XBMCFoundation";
const ANDROID_PRIMARY_STORAGE = "/storage/emulated/0";
const ANDROID_LEGACY_STORAGE = "/storage/emulated/legacy";

function storePackageRoots(env: QuirkContext["env"]): string[] {
  return [
    path.join(env.LOCALAPPDATA ?? "", "/Packages/XBMCFoundation.Kodi_4n2hpmxwrvr6p/LocalCache/Roaming/Kodi/"),
    path.join(env.APPDATA ?? "", "/kodi/"),
  ];
}

function findExistingRoot(roots: string[], child: string, exists: QuirkContext["exists"]): string | undefined {
  return roots.find((root) => exists(path.join(root, child)));
}

function rebase(value: string, oldHome: string, newHome: string): string {
  return path.join(newHome, value.replace(oldHome, ""));
}

/**
 * Store-packaged installs report a virtualized home; the real data lives under
 * one of the package roots.
 */
export const windowsStorePackage: PlatformQuirk = (info, context) => {
  if (!info.hostPath.includes(STORE_PACKAGE_MARKER)) {
    return info;
  }
  const root = findExistingRoot(
    storePackageRoots(context.env),
    `/userdata/addon_data/${info.id}`,
    (candidate) => context.exists(candidate),
  );
  if (root === undefined) {
    return info;
  }
  return {
    ...info,
    path: rebase(info.path, info.home, root),
    profile: rebase(info.profile, info.home, root),
    tempPath: rebase(info.tempPath, info.home, root),
    icon: rebase(info.icon, info.home, root),
    home: root,
  };
};

export const androidLegacyStorage: PlatformQuirk = (info, context) => {
  const legacyPath = info.path.replace(ANDROID_PRIMARY_STORAGE, ANDROID_LEGACY_STORAGE);
  if (legacyPath === info.path || !context.exists(legacyPath)) {
    return info;
  }
  return {
    ...info,
    path: legacyPath,
    profile: info.profile.replace(ANDROID_PRIMARY_STORAGE, ANDROID_LEGACY_STORAGE),
  };
};

export const PLATFORM_QUIRKS: ReadonlyMap<string, PlatformQuirk> = new Map([
  ["windows", windowsStorePackage],
  ["android", androidLegacyStorage],
]);

export function applyPlatformQuirk(os: string, info: AddonInfo, context: QuirkContext): AddonInfo {
  const quirk = PLATFORM_QUIRKS.get(os.toLowerCase());
  return quirk ? quirk(info, context) : info;
}
