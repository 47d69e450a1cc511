import { describe, expect, it } from "vitest";

import { coerceSetting, coerceSettings, parseFloatOrZero, parseIntegerOrZero } from "./coerce.js";

describe("coerceSetting", () => {
  it("parses enum and number settings as integers", () => {
    expect(coerceSetting({ key: "proxy_type", type: "enum", value: "2" })).toEqual({ kind: "int", value: 2 });
    expect(coerceSetting({ key: "proxy_port", type: "number", value: "-15" })).toEqual({ kind: "int", value: -15 });
  });

  it("degrades an unparsable integer to zero", () => {
    expect(coerceSetting({ key: "proxy_type", type: "enum", value: "socks" })).toEqual({ kind: "int", value: 0 });
    expect(coerceSetting({ key: "proxy_port", type: "number", value: "42.0" })).toEqual({ kind: "int", value: 0 });
    expect(coerceSetting({ key: "proxy_port", type: "number", value: "" })).toEqual({ kind: "int", value: 0 });
  });

  it("truncates percent and int sliders", () => {
    expect(coerceSetting({ key: "buffer_size", type: "slider", option: "percent", value: "42.0" }))
      .toEqual({ kind: "int", value: 42 });
    expect(coerceSetting({ key: "memory_size", type: "slider", option: "int", value: "99.9" }))
      .toEqual({ kind: "int", value: 99 });
  });

  it("keeps the fraction of float sliders", () => {
    expect(coerceSetting({ key: "share_ratio", type: "slider", option: "float", value: "0.5" }))
      .toEqual({ kind: "float", value: 0.5 });
  });

  // Known ambiguity: a float slider that is zero or negative is reported as
  // the integer form, which is 0 because only int/percent sliders fill it.
  it("stores non-positive float sliders as integer zero", () => {
    expect(coerceSetting({ key: "share_ratio", type: "slider", option: "float", value: "0" }))
      .toEqual({ kind: "int", value: 0 });
    expect(coerceSetting({ key: "share_ratio", type: "slider", option: "float", value: "-1.5" }))
      .toEqual({ kind: "int", value: 0 });
  });

  it("stores negative int sliders as integers", () => {
    expect(coerceSetting({ key: "offset", type: "slider", option: "int", value: "-3.7" }))
      .toEqual({ kind: "int", value: -3 });
  });

  it("treats an unknown slider option as zero", () => {
    expect(coerceSetting({ key: "offset", type: "slider", option: "seconds", value: "12" }))
      .toEqual({ kind: "int", value: 0 });
  });

  it("accepts only the exact true token for booleans", () => {
    expect(coerceSetting({ key: "disable_dht", type: "bool", value: "true" })).toEqual({ kind: "bool", value: true });
    expect(coerceSetting({ key: "disable_dht", type: "bool", value: "True" })).toEqual({ kind: "bool", value: false });
    expect(coerceSetting({ key: "disable_dht", type: "bool", value: "1" })).toEqual({ kind: "bool", value: false });
  });

  it("keeps other kinds as raw text", () => {
    expect(coerceSetting({ key: "proxy_host", type: "text", value: " proxy.local " }))
      .toEqual({ kind: "text", value: " proxy.local " });
    expect(coerceSetting({ key: "download_path", type: "folder", value: "/media" }))
      .toEqual({ kind: "text", value: "/media" });
  });
});

describe("coerceSettings", () => {
  it("builds one entry per key and lets later duplicates win", () => {
    const typed = coerceSettings([
      { key: "proxy_type", type: "enum", value: "1" },
      { key: "proxy_enabled", type: "bool", value: "true" },
      { key: "proxy_type", type: "enum", value: "3" },
    ]);

    expect([...typed.entries()]).toEqual([
      ["proxy_type", { kind: "int", value: 3 }],
      ["proxy_enabled", { kind: "bool", value: true }],
    ]);
  });
});

describe("numeric parsers", () => {
  it("rejects surrounding whitespace", () => {
    expect(parseIntegerOrZero(" 7")).toBe(0);
    expect(parseFloatOrZero("1.5 ")).toBe(0);
  });

  it("parses exponent notation as a float", () => {
    expect(parseFloatOrZero("1e3")).toBe(1000);
    expect(parseFloatOrZero(".25")).toBe(0.25);
  });
});
