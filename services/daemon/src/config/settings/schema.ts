/**
 * Addon Settings Schema
 *
 * Declares the expected kind of every host setting the daemon reads. A key
 * missing from the host, or delivered with the wrong kind, decodes to the
 * field's zero value and is reported as an issue instead of failing the
 * reload.
 */

import { z } from "zod";

import type { TypedSettingsMap, TypedValue } from "./coerce.js";

const int = () => z.number().int().catch(0);
const bool = () => z.boolean().catch(false);
const text = () => z.string().catch("");

export const AddonSettingsSchema = z.object({
  // Storage and memory
  download_storage: int(),
  auto_memory_size: bool(),
  auto_memory_size_strategy: int(),
  memory_size: int(),
  buffer_size: int(),

  // Session
  max_upload_rate: int(),
  max_download_rate: int(),
  limit_after_buffering: bool(),
  connections_limit: int(),
  seed_time_limit: int(),
  spoof_user_agent: int(),
  keep_downloading: int(),
  keep_files_playing: int(),
  keep_files_finished: int(),
  disable_bg_progress: bool(),
  disable_bg_progress_playback: bool(),
  disable_upload: bool(),
  disable_dht: bool(),
  disable_tcp: bool(),
  disable_utp: bool(),
  disable_upnp: bool(),
  encryption_policy: int(),
  listen_port_min: int(),
  listen_port_max: int(),
  listen_interfaces: text(),
  listen_autodetect_ip: bool(),
  listen_autodetect_port: bool(),

  // Search and playback
  force_use_trakt: bool(),
  use_cache_selection: bool(),
  use_cache_search: bool(),
  cache_search_duration: int(),
  results_per_page: int(),
  enable_overlay_status: bool(),
  silent_stream_start: bool(),
  choose_stream_auto: bool(),
  force_link_type: bool(),
  use_original_title: bool(),
  add_specials: bool(),
  unaired_seasons: bool(),
  unaired_episodes: bool(),
  smart_episode_match: bool(),
  sorting_mode_movies: int(),
  sorting_mode_shows: int(),
  resolution_preference_movies: int(),
  resolution_preference_shows: int(),
  percentage_additional_seeders: int(),

  // Trakt
  trakt_scrobble: bool(),
  trakt_username: text(),
  trakt_token: text(),
  trakt_refresh_token: text(),
  trakt_token_expiry: int(),
  trakt_sync: int(),
  trakt_sync_collections: bool(),
  trakt_sync_watchlist: bool(),
  trakt_sync_userlists: bool(),
  trakt_sync_watched: bool(),
  trakt_sync_watchedback: bool(),

  // Library
  library_update_frequency: int(),
  library_update_delay: int(),
  library_auto_scan: bool(),
  play_resume: bool(),
  use_cloudhole: bool(),
  cloudhole_key: text(),
  tmdb_api_key: text(),

  // Subtitles
  osdb_user: text(),
  osdb_pass: text(),
  osdb_language: text(),
  osdb_auto_language: bool(),

  // DNS
  use_public_dns: bool(),
  public_dns_list: text(),
  opennic_dns_list: text(),
  custom_provider_timeout_enabled: bool(),
  custom_provider_timeout: int(),

  // Proxy
  proxy_type: int(),
  proxy_enabled: bool(),
  proxy_host: text(),
  proxy_port: int(),
  proxy_login: text(),
  proxy_password: text(),

  // Completion
  completed_move: bool(),
  completed_movies_path: text(),
  completed_shows_path: text(),
});
export type AddonSettings = z.infer<typeof AddonSettingsSchema>;
export type AddonSettingKey = keyof AddonSettings;

export type SettingsIssue =
  | { key: string; reason: "missing" }
  | { key: string; reason: "kind_mismatch"; received: TypedValue["kind"] };

export type DecodedSettings = {
  settings: AddonSettings;
  issues: SettingsIssue[];
};

export function decodeSettings(typed: TypedSettingsMap): DecodedSettings {
  const record: Record<string, unknown> = {};
  for (const [key, entry] of typed) {
    record[key] = entry.value;
  }

  const issues: SettingsIssue[] = [];
  for (const [key, field] of Object.entries(AddonSettingsSchema.shape)) {
    const entry = typed.get(key);
    if (!entry) {
      issues.push({ key, reason: "missing" });
      continue;
    }
    if (!field.removeCatch().safeParse(entry.value).success) {
      issues.push({ key, reason: "kind_mismatch", received: entry.kind });
    }
  }

  return { settings: AddonSettingsSchema.parse(record), issues };
}
