/**
 * Configuration Reconciler
 *
 * Runs one reload: resolves and validates host paths, fetches and types the
 * raw addon settings, derives computed values and publishes a frozen snapshot
 * to the ConfigStore. Path validation is the only step allowed to reject a
 * reload; the caller decides what a rejection means for the process.
 */

import { EventEmitter } from "node:events";
import os from "node:os";
import { performance } from "node:perf_hooks";

import type { HostBridge } from "../host/HostBridge.js";
import type { ResolverRegistry } from "../network/ResolverRegistry.js";
import { appLogger, normalizeError, type AppLogger } from "../observability/logger.js";
import { recordReload } from "../observability/metrics.js";
import type { ConfigStore } from "./ConfigStore.js";
import {
  buildConfigurationDraft,
  freezeConfiguration,
  redactConfiguration,
  type Configuration,
} from "./Configuration.js";
import { deriveValues } from "./derive.js";
import { FilesystemError, PathNotSetError, PathValidationError } from "./errors.js";
import { PathResolver } from "./paths/PathResolver.js";
import { UNSET_PATH, checkWritable } from "./paths/writability.js";
import { coerceSettings } from "./settings/coerce.js";
import { decodeSettings } from "./settings/schema.js";

/** Host-localized "no download path configured" message. */
export const PATH_NOT_SET_MESSAGE = "LOCALIZE[30113]";

export const DOWNLOAD_PATH_SETTING = "download_path";
export const LIBRARY_PATH_SETTING = "library_path";

export type ReloadState =
  | "idle"
  | "resolving-paths"
  | "validating-paths"
  | "fetching-settings"
  | "coercing"
  | "deriving"
  | "publishing"
  | "aborted";

export type ReloadResult =
  | { ok: true; config: Configuration }
  | { ok: false; error: PathValidationError; message: string };

export type ReconcilerDependencies = {
  host: HostBridge;
  store: ConfigStore;
  resolvers: ResolverRegistry;
  pathResolver?: PathResolver;
  /** Total system memory in bytes. */
  totalMemory?: () => number;
  checkWritable?: (target: string) => Promise<void>;
  /** Started after each successful publish and never awaited. */
  healthCheck?: (config: Configuration) => Promise<void>;
  logger?: AppLogger;
};

export class ConfigurationReconciler extends EventEmitter {
  private readonly host: HostBridge;
  private readonly store: ConfigStore;
  private readonly resolvers: ResolverRegistry;
  private readonly pathResolver: PathResolver;
  private readonly totalMemory: () => number;
  private readonly checkWritable: (target: string) => Promise<void>;
  private readonly healthCheck: ((config: Configuration) => Promise<void>) | undefined;
  private readonly logger: AppLogger;
  private currentState: ReloadState = "idle";
  private queue: Promise<unknown> = Promise.resolve();

  constructor(deps: ReconcilerDependencies) {
    super();
    this.host = deps.host;
    this.store = deps.store;
    this.resolvers = deps.resolvers;
    this.pathResolver = deps.pathResolver ?? new PathResolver(deps.host);
    this.totalMemory = deps.totalMemory ?? os.totalmem;
    this.checkWritable = deps.checkWritable ?? checkWritable;
    this.healthCheck = deps.healthCheck;
    this.logger = deps.logger ?? appLogger.child({ component: "ConfigurationReconciler" });
  }

  get state(): ReloadState {
    return this.currentState;
  }

  /**
   * Reloads the configuration. Calls made while a reload is running wait for
   * it and then run in order; a started reload always runs to completion.
   */
  reload(): Promise<ReloadResult> {
    const run = this.queue.then(() => this.runReload());
    this.queue = run.catch(() => undefined);
    return run;
  }

  private transition(next: ReloadState): void {
    const previous = this.currentState;
    this.currentState = next;
    this.emit("stateChange", next, previous);
  }

  private async runReload(): Promise<ReloadResult> {
    const startedAt = performance.now();
    const elapsedSeconds = (): number => (performance.now() - startedAt) / 1000;
    this.logger.info("reloading configuration");

    try {
      const result = await this.reconcile();
      recordReload(result.ok ? "published" : "rejected", elapsedSeconds());
      return result;
    } catch (error) {
      recordReload("failed", elapsedSeconds());
      this.transition("idle");
      throw error;
    }
  }

  private async reconcile(): Promise<ReloadResult> {
    this.transition("resolving-paths");
    const platform = await this.host.getPlatform();
    const info = await this.pathResolver.resolveAddonInfo(platform);
    await this.pathResolver.recreateTemporaryDirectory(info.tempPath);

    this.transition("validating-paths");
    const downloadPath = await this.pathResolver.resolve(await this.host.getSettingString(DOWNLOAD_PATH_SETTING));
    if (downloadPath === UNSET_PATH) {
      return this.abort(new PathNotSetError(downloadPath), PATH_NOT_SET_MESSAGE);
    }
    const downloadFailure = await this.validate(downloadPath);
    if (downloadFailure) {
      this.logger.error({ err: normalizeError(downloadFailure), path: downloadPath }, "cannot write to download path");
      return this.abort(downloadFailure, downloadFailure.message);
    }
    this.logger.info({ path: downloadPath }, "using download path");

    let libraryPath = await this.pathResolver.resolve(await this.host.getSettingString(LIBRARY_PATH_SETTING));
    if (libraryPath === UNSET_PATH) {
      libraryPath = downloadPath;
    } else {
      const libraryFailure = await this.validate(libraryPath);
      if (libraryFailure) {
        this.logger.error({ err: normalizeError(libraryFailure), path: libraryPath }, "cannot write to library path");
        return this.abort(libraryFailure, libraryFailure.message);
      }
    }
    this.logger.info({ path: libraryPath }, "using library path");

    this.transition("fetching-settings");
    const [rawSettings, language] = await Promise.all([
      this.host.getAllSettings(),
      this.host.getLanguageCode(),
    ]);

    this.transition("coercing");
    const { settings, issues } = decodeSettings(coerceSettings(rawSettings));
    if (issues.length > 0) {
      this.logger.warn({ issues }, "addon settings degraded to defaults");
    }

    this.transition("deriving");
    const draft = deriveValues(
      buildConfigurationDraft({ downloadPath, libraryPath, info, platform, language }, settings),
      { totalMemory: this.totalMemory(), resolvers: this.resolvers, logger: this.logger },
    );
    const config = freezeConfiguration(draft);

    this.transition("publishing");
    this.store.replace(config);
    this.transition("idle");

    this.scheduleHealthCheck(config);
    this.logger.debug({ config: redactConfiguration(config) }, "using configuration");
    return { ok: true, config };
  }

  private async validate(target: string): Promise<PathValidationError | undefined> {
    try {
      await this.checkWritable(target);
      return undefined;
    } catch (error) {
      if (error instanceof PathValidationError) {
        return error;
      }
      throw error;
    }
  }

  private abort(error: PathValidationError, message: string): ReloadResult {
    const errno = error instanceof FilesystemError ? error.errno : undefined;
    this.logger.warn({ code: error.code, errno, path: error.path }, "addon settings not properly set");
    this.transition("aborted");
    return { ok: false, error, message };
  }

  private scheduleHealthCheck(config: Configuration): void {
    if (!this.healthCheck) {
      return;
    }
    const healthCheck = this.healthCheck;
    void Promise.resolve()
      .then(() => healthCheck(config))
      .catch((error: unknown) => {
        this.logger.warn({ err: normalizeError(error) }, "provider health check failed");
      });
  }
}
