import type { RawSetting } from "../../host/HostBridge.js";

export type TypedValue =
  | { kind: "int"; value: number }
  | { kind: "float"; value: number }
  | { kind: "bool"; value: boolean }
  | { kind: "text"; value: string };

export type TypedSettingsMap = Map<string, TypedValue>;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const TRUE_TOKEN = "true";

/** Strict base-10 integer; anything else is 0. */
export function parseIntegerOrZero(raw: string): number {
  if (!INTEGER_PATTERN.test(raw)) {
    return 0;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isSafeInteger(parsed) ? parsed : 0;
}

/** Decimal or exponent notation; anything else is 0. */
export function parseFloatOrZero(raw: string): number {
  if (!FLOAT_PATTERN.test(raw)) {
    return 0;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : 0;
}

function coerceSlider(setting: RawSetting): TypedValue {
  let intValue = 0;
  let floatValue = 0;
  switch (setting.option) {
    case "percent":
    case "int":
      intValue = Math.trunc(parseFloatOrZero(setting.value));
      break;
    case "float":
      floatValue = parseFloatOrZero(setting.value);
      break;
    default:
      break;
  }
  // A float slider at zero or below is indistinguishable from an int slider here.
  return floatValue > 0
    ? { kind: "float", value: floatValue }
    : { kind: "int", value: intValue };
}

export function coerceSetting(setting: RawSetting): TypedValue {
  switch (setting.type) {
    case "enum":
    case "number":
      return { kind: "int", value: parseIntegerOrZero(setting.value) };
    case "slider":
      return coerceSlider(setting);
    case "bool":
      return { kind: "bool", value: setting.value === TRUE_TOKEN };
    default:
      return { kind: "text", value: setting.value };
  }
}

/**
 * Converts the host's string-typed settings to native values. Never throws: a
 * malformed value degrades to its zero value instead of failing the batch.
 */
export function coerceSettings(raw: Iterable<RawSetting>): TypedSettingsMap {
  const typed: TypedSettingsMap = new Map();
  for (const setting of raw) {
    typed.set(setting.key, coerceSetting(setting));
  }
  return typed;
}
