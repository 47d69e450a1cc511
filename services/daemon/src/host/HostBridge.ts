/**
 * Boundary to the media-center host. The daemon never talks to the host
 * directly; everything goes through these interfaces so the host transport
 * (JSON-RPC, an embedded interpreter, a test double) can be swapped.
 */

export type AddonInfo = {
  id: string;
  name: string;
  version: string;
  /** Install directory of the addon. */
  path: string;
  /** Per-user data directory of the addon. */
  profile: string;
  /** Host home directory (`special://home`). */
  home: string;
  /** Host installation directory (`special://xbmc`). */
  hostPath: string;
  icon: string;
  /** Scratch directory owned by the addon, recreated on every reload. */
  tempPath: string;
};

export type PlatformInfo = {
  os: string;
  arch: string;
};

export type RawSettingType = "enum" | "number" | "slider" | "bool" | "text" | (string & {});

export type RawSetting = {
  key: string;
  type: RawSettingType;
  value: string;
  /** Slider sub-option: `percent`, `int` or `float`. */
  option?: string;
};

export interface HostBridge {
  getAddonInfo(): Promise<AddonInfo>;
  translatePath(virtualPath: string): Promise<string>;
  getPlatform(): Promise<PlatformInfo>;
  /** ISO 639-1 code of the active UI language. */
  getLanguageCode(): Promise<string>;
  getSettingString(key: string): Promise<string>;
  getAllSettings(): Promise<RawSetting[]>;
  openSettingsUI(addonId: string): Promise<void>;
  showDialog(title: string, message: string): Promise<void>;
  isSettingsUIOpen(): Promise<boolean>;
  notify(title: string, message: string, iconPath: string): Promise<void>;
  confirmDialog(title: string, message: string): Promise<boolean>;
}

export type InstalledAddon = {
  id: string;
  name: string;
  version: string;
  enabled: boolean;
};

export interface AddonManager {
  /** Installed executable script addons, enabled or not. */
  listScriptAddons(): Promise<InstalledAddon[]>;
  setAddonEnabled(id: string, enabled: boolean): Promise<void>;
  updateLocalAddons(): Promise<void>;
  updateAddonRepos(): Promise<void>;
  playUrl(url: string): Promise<void>;
}
