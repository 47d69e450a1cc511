import type { Configuration } from "./Configuration.js";
import { ConfigurationNotLoadedError } from "./errors.js";

/**
 * Owner of the published configuration snapshot.
 *
 * Publishing is a single synchronous reference swap, so a reader on the event
 * loop sees either the previous snapshot or the next one in full, and never
 * waits on a reload in progress. Readers that kept an older snapshot can keep
 * using it; snapshots are frozen.
 */
export class ConfigStore {
  private current: Configuration | undefined;
  private swaps = 0;

  get(): Configuration {
    if (this.current === undefined) {
      throw new ConfigurationNotLoadedError();
    }
    return this.current;
  }

  peek(): Configuration | undefined {
    return this.current;
  }

  /** Number of snapshots published so far. */
  get version(): number {
    return this.swaps;
  }

  /** @returns the snapshot that was replaced */
  replace(next: Configuration): Configuration | undefined {
    const previous = this.current;
    this.current = next;
    this.swaps += 1;
    return previous;
  }
}
