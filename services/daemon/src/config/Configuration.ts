import path from "node:path";

import type { AddonInfo, PlatformInfo } from "../host/HostBridge.js";
import type { AddonSettings } from "./settings/schema.js";

/** Port the daemon's HTTP endpoint listens on for the host plugin. */
export const LISTEN_PORT = 65220;

const MiB = 1024 * 1024;
const KiB = 1024;

export type ConfigurationFields = {
  downloadPath: string;
  torrentsPath: string;
  libraryPath: string;
  info: Readonly<AddonInfo>;
  platform: Readonly<PlatformInfo>;
  language: string;
  temporaryPath: string;
  profilePath: string;
  homePath: string;
  hostPath: string;

  downloadStorage: number;
  autoMemorySize: boolean;
  autoMemorySizeStrategy: number;
  /** Bytes. */
  memorySize: number;
  /** Bytes. */
  bufferSize: number;
  /** Bytes per second, 0 for unlimited. */
  uploadRateLimit: number;
  /** Bytes per second, 0 for unlimited. */
  downloadRateLimit: number;
  limitAfterBuffering: boolean;
  connectionsLimit: number;
  seedTimeLimit: number;
  spoofUserAgent: number;
  keepDownloading: number;
  keepFilesPlaying: number;
  keepFilesFinished: number;
  disableBgProgress: boolean;
  disableBgProgressPlayback: boolean;
  disableUpload: boolean;
  disableDht: boolean;
  disableTcp: boolean;
  disableUtp: boolean;
  disableUpnp: boolean;
  encryptionPolicy: number;
  listenPortMin: number;
  listenPortMax: number;
  listenInterfaces: string;
  listenAutoDetectIp: boolean;
  listenAutoDetectPort: boolean;

  forceUseTrakt: boolean;
  useCacheSelection: boolean;
  useCacheSearch: boolean;
  cacheSearchDuration: number;
  resultsPerPage: number;
  enableOverlayStatus: boolean;
  silentStreamStart: boolean;
  chooseStreamAuto: boolean;
  forceLinkType: boolean;
  useOriginalTitle: boolean;
  addSpecials: boolean;
  showUnairedSeasons: boolean;
  showUnairedEpisodes: boolean;
  smartEpisodeMatch: boolean;
  sortingModeMovies: number;
  sortingModeShows: number;
  resolutionPreferenceMovies: number;
  resolutionPreferenceShows: number;
  percentageAdditionalSeeders: number;

  scrobble: boolean;
  traktUsername: string;
  traktToken: string;
  traktRefreshToken: string;
  traktTokenExpiry: number;
  /** Hours between syncs. */
  traktSyncFrequency: number;
  traktSyncCollections: boolean;
  traktSyncWatchlist: boolean;
  traktSyncUserlists: boolean;
  traktSyncWatched: boolean;
  traktSyncWatchedBack: boolean;

  updateFrequency: number;
  updateDelay: number;
  updateAutoScan: boolean;
  playResume: boolean;
  useCloudHole: boolean;
  cloudHoleKey: string;
  tmdbApiKey: string;

  osdbUser: string;
  osdbPass: string;
  osdbLanguage: string;
  osdbAutoLanguage: boolean;

  usePublicDns: boolean;
  publicDnsList: string;
  opennicDnsList: string;
  customProviderTimeoutEnabled: boolean;
  customProviderTimeout: number;

  proxyUrl: string;
  proxyType: number;
  proxyEnabled: boolean;
  proxyHost: string;
  proxyPort: number;
  proxyLogin: string;
  proxyPassword: string;

  completedMove: boolean;
  completedMoviesPath: string;
  completedShowsPath: string;
};

/** Published snapshot. Frozen once built; a reload always produces a new one. */
export type Configuration = Readonly<ConfigurationFields>;

export type ResolvedEnvironment = {
  downloadPath: string;
  libraryPath: string;
  info: AddonInfo;
  platform: PlatformInfo;
  language: string;
};

/** Copies decoded settings into a mutable draft, converting units. Derivation runs on the draft. */
export function buildConfigurationDraft(env: ResolvedEnvironment, s: AddonSettings): ConfigurationFields {
  return {
    downloadPath: env.downloadPath,
    torrentsPath: path.join(env.downloadPath, "Torrents"),
    libraryPath: env.libraryPath,
    info: env.info,
    platform: env.platform,
    language: env.language,
    temporaryPath: env.info.tempPath,
    profilePath: env.info.profile,
    homePath: env.info.home,
    hostPath: env.info.hostPath,

    downloadStorage: s.download_storage,
    autoMemorySize: s.auto_memory_size,
    autoMemorySizeStrategy: s.auto_memory_size_strategy,
    memorySize: s.memory_size * MiB,
    bufferSize: s.buffer_size * MiB,
    uploadRateLimit: s.max_upload_rate * KiB,
    downloadRateLimit: s.max_download_rate * KiB,
    limitAfterBuffering: s.limit_after_buffering,
    connectionsLimit: s.connections_limit,
    seedTimeLimit: s.seed_time_limit,
    spoofUserAgent: s.spoof_user_agent,
    keepDownloading: s.keep_downloading,
    keepFilesPlaying: s.keep_files_playing,
    keepFilesFinished: s.keep_files_finished,
    disableBgProgress: s.disable_bg_progress,
    disableBgProgressPlayback: s.disable_bg_progress_playback,
    disableUpload: s.disable_upload,
    disableDht: s.disable_dht,
    disableTcp: s.disable_tcp,
    disableUtp: s.disable_utp,
    disableUpnp: s.disable_upnp,
    encryptionPolicy: s.encryption_policy,
    listenPortMin: s.listen_port_min,
    listenPortMax: s.listen_port_max,
    listenInterfaces: s.listen_interfaces,
    listenAutoDetectIp: s.listen_autodetect_ip,
    listenAutoDetectPort: s.listen_autodetect_port,

    forceUseTrakt: s.force_use_trakt,
    useCacheSelection: s.use_cache_selection,
    useCacheSearch: s.use_cache_search,
    cacheSearchDuration: s.cache_search_duration,
    resultsPerPage: s.results_per_page,
    enableOverlayStatus: s.enable_overlay_status,
    silentStreamStart: s.silent_stream_start,
    chooseStreamAuto: s.choose_stream_auto,
    forceLinkType: s.force_link_type,
    useOriginalTitle: s.use_original_title,
    addSpecials: s.add_specials,
    showUnairedSeasons: s.unaired_seasons,
    showUnairedEpisodes: s.unaired_episodes,
    smartEpisodeMatch: s.smart_episode_match,
    sortingModeMovies: s.sorting_mode_movies,
    sortingModeShows: s.sorting_mode_shows,
    resolutionPreferenceMovies: s.resolution_preference_movies,
    resolutionPreferenceShows: s.resolution_preference_shows,
    percentageAdditionalSeeders: s.percentage_additional_seeders,

    scrobble: s.trakt_scrobble,
    traktUsername: s.trakt_username,
    traktToken: s.trakt_token,
    traktRefreshToken: s.trakt_refresh_token,
    traktTokenExpiry: s.trakt_token_expiry,
    traktSyncFrequency: s.trakt_sync,
    traktSyncCollections: s.trakt_sync_collections,
    traktSyncWatchlist: s.trakt_sync_watchlist,
    traktSyncUserlists: s.trakt_sync_userlists,
    traktSyncWatched: s.trakt_sync_watched,
    traktSyncWatchedBack: s.trakt_sync_watchedback,

    updateFrequency: s.library_update_frequency,
    updateDelay: s.library_update_delay,
    updateAutoScan: s.library_auto_scan,
    playResume: s.play_resume,
    useCloudHole: s.use_cloudhole,
    cloudHoleKey: s.cloudhole_key,
    tmdbApiKey: s.tmdb_api_key,

    osdbUser: s.osdb_user,
    osdbPass: s.osdb_pass,
    osdbLanguage: s.osdb_language,
    osdbAutoLanguage: s.osdb_auto_language,

    usePublicDns: s.use_public_dns,
    publicDnsList: s.public_dns_list,
    opennicDnsList: s.opennic_dns_list,
    customProviderTimeoutEnabled: s.custom_provider_timeout_enabled,
    customProviderTimeout: s.custom_provider_timeout,

    proxyUrl: "",
    proxyType: s.proxy_type,
    proxyEnabled: s.proxy_enabled,
    proxyHost: s.proxy_host,
    proxyPort: s.proxy_port,
    proxyLogin: s.proxy_login,
    proxyPassword: s.proxy_password,

    completedMove: s.completed_move,
    completedMoviesPath: s.completed_movies_path,
    completedShowsPath: s.completed_shows_path,
  };
}

export function freezeConfiguration(draft: ConfigurationFields): Configuration {
  return Object.freeze({
    ...draft,
    info: Object.freeze({ ...draft.info }),
    platform: Object.freeze({ ...draft.platform }),
  });
}

const SECRET_FIELDS = [
  "traktToken",
  "traktRefreshToken",
  "cloudHoleKey",
  "tmdbApiKey",
  "osdbPass",
  "proxyPassword",
] as const satisfies ReadonlyArray<keyof ConfigurationFields>;

/** Copy of the snapshot safe to write to logs. */
export function redactConfiguration(config: Configuration): Record<string, unknown> {
  const redacted: Record<string, unknown> = { ...config };
  for (const field of SECRET_FIELDS) {
    if (config[field] !== "") {
      redacted[field] = "[redacted]";
    }
  }
  if (config.proxyPassword !== "" && config.proxyUrl !== "") {
    redacted.proxyUrl = config.proxyUrl.replace(`:${config.proxyPassword}@`, ":[redacted]@");
  }
  return redacted;
}

export function addonIcon(config: Configuration): string {
  return path.join(config.info.path, "icon.png");
}

export function addonResource(config: Configuration, ...segments: string[]): string {
  return path.join(config.info.path, "resources", ...segments);
}
