import { Resolver } from "node:dns/promises";
import ipaddr from "ipaddr.js";

import { appLogger, normalizeError } from "../observability/logger.js";

export type ResolverCategory = "public" | "opennic";

export const DEFAULT_RESOLVER_SERVERS: Readonly<Record<ResolverCategory, readonly string[]>> = {
  public: ["8.8.8.8", "8.8.4.4", "9.9.9.9"],
  opennic: ["193.183.98.66", "172.104.136.243", "89.18.27.167"],
};

export type ResolverEntry = {
  readonly resolver: Resolver;
  readonly servers: readonly string[];
};

function createEntry(servers: readonly string[]): ResolverEntry {
  const resolver = new Resolver();
  resolver.setServers([...servers]);
  return { resolver, servers: Object.freeze([...servers]) };
}

/** Only literal addresses; shorthand and octal IPv4 forms would name a different server. */
function isServerAddress(address: string): boolean {
  return ipaddr.IPv4.isValidFourPartDecimal(address) || ipaddr.IPv6.isValid(address);
}

/**
 * Holds one DNS resolver per lookup category. Each category is replaced
 * wholesale; lookups already running keep the resolver they started with.
 */
export class ResolverRegistry {
  private readonly logger = appLogger.child({ component: "ResolverRegistry" });
  private readonly entries = new Map<ResolverCategory, ResolverEntry>();

  constructor(initial: Readonly<Record<ResolverCategory, readonly string[]>> = DEFAULT_RESOLVER_SERVERS) {
    this.entries.set("public", createEntry(initial.public));
    this.entries.set("opennic", createEntry(initial.opennic));
  }

  get(category: ResolverCategory): ResolverEntry {
    const entry = this.entries.get(category);
    if (!entry) {
      throw new Error(`unknown resolver category: ${category}`);
    }
    return entry;
  }

  servers(category: ResolverCategory): readonly string[] {
    return this.get(category).servers;
  }

  /**
   * Replaces the category's resolver with one using `addresses`, kept as
   * written. Entries that are not dotted-decimal IPv4 or IPv6 addresses are
   * dropped; if none remain the current resolver stays in place.
   *
   * @returns whether the resolver was replaced
   */
  replace(category: ResolverCategory, addresses: readonly string[]): boolean {
    const valid: string[] = [];
    for (const address of addresses) {
      if (isServerAddress(address)) {
        valid.push(address);
      } else {
        this.logger.warn({ category, address }, "ignoring invalid DNS server address");
      }
    }
    if (valid.length === 0) {
      return false;
    }
    try {
      this.entries.set(category, createEntry(valid));
    } catch (error) {
      this.logger.warn({ err: normalizeError(error), category, servers: valid }, "keeping previous DNS resolver");
      return false;
    }
    this.logger.debug({ category, servers: valid }, "replaced DNS resolver");
    return true;
  }
}
