import { describe, expect, it, vi } from "vitest";

vi.mock("../observability/logger.js", () => {
  const logger = { info: vi.fn(), warn: vi.fn(), debug: vi.fn(), error: vi.fn() };
  return {
    appLogger: { child: () => logger },
    normalizeError: (error: unknown) => ({ message: String(error) }),
  };
});

import { DEFAULT_RESOLVER_SERVERS, ResolverRegistry } from "./ResolverRegistry.js";

describe("ResolverRegistry", () => {
  it("starts with the default servers for each category", () => {
    const registry = new ResolverRegistry();

    expect(registry.servers("public")).toEqual(["8.8.8.8", "8.8.4.4", "9.9.9.9"]);
    expect(registry.servers("opennic")).toEqual(DEFAULT_RESOLVER_SERVERS.opennic);
    expect(registry.get("public").resolver.getServers()).toEqual(["8.8.8.8", "8.8.4.4", "9.9.9.9"]);
  });

  it("replaces a single category with a new resolver", () => {
    const registry = new ResolverRegistry();
    const before = registry.get("public");

    expect(registry.replace("public", ["1.1.1.1", "1.0.0.1"])).toBe(true);

    expect(registry.get("public")).not.toBe(before);
    expect(registry.servers("public")).toEqual(["1.1.1.1", "1.0.0.1"]);
    expect(registry.get("public").resolver.getServers()).toEqual(["1.1.1.1", "1.0.0.1"]);
    expect(registry.servers("opennic")).toEqual(DEFAULT_RESOLVER_SERVERS.opennic);
  });

  it("drops entries that are not IP addresses", () => {
    const registry = new ResolverRegistry();

    registry.replace("opennic", ["dns.example", "9.9.9.9"]);

    expect(registry.servers("opennic")).toEqual(["9.9.9.9"]);
  });

  it("rejects shorthand and octal IPv4 forms instead of reinterpreting them", () => {
    const registry = new ResolverRegistry();

    expect(registry.replace("public", ["1", "8.8.8.8:53", "010.1.1.1", "1.1.1.1"])).toBe(true);

    expect(registry.servers("public")).toEqual(["1.1.1.1"]);
  });

  it("keeps IPv6 entries exactly as configured", () => {
    const registry = new ResolverRegistry();

    registry.replace("public", ["2001:4860:4860::8888", "9.9.9.9"]);

    expect(registry.servers("public")).toEqual(["2001:4860:4860::8888", "9.9.9.9"]);
  });

  it("keeps the current resolver when no address is usable", () => {
    const registry = new ResolverRegistry();
    const before = registry.get("opennic");

    expect(registry.replace("opennic", ["not-an-ip", ""])).toBe(false);

    expect(registry.get("opennic")).toBe(before);
  });

  it("freezes the published server list", () => {
    const registry = new ResolverRegistry();

    expect(Object.isFrozen(registry.servers("public"))).toBe(true);
  });
});
