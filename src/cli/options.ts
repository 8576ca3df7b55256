import { InvalidArgumentError } from "commander";

import { isPlainObject } from "../core/utils.js";

// Commander argument parsers. Throwing InvalidArgumentError lets commander report the
// offending flag by name.

export function parseId(raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError("Expected a positive integer id.");
  }
  return value;
}

export function parseInteger(raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new InvalidArgumentError("Expected an integer.");
  }
  return value;
}

export function parseNumber(raw: string): number {
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new InvalidArgumentError("Expected a number.");
  }
  return value;
}

/** Accepts a number, or "none" to clear the value. */
export function parseNullableNumber(raw: string): number | null {
  return raw.trim().toLowerCase() === "none" ? null : parseNumber(raw);
}

export function parseBoolean(raw: string): boolean {
  const normalized = raw.trim().toLowerCase();
  if (["true", "yes", "1", "on"].includes(normalized)) return true;
  if (["false", "no", "0", "off"].includes(normalized)) return false;
  throw new InvalidArgumentError("Expected true or false.");
}

export function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new InvalidArgumentError("Expected valid JSON.");
  }
}

export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/** Merges `--patch` with the dedicated flags; flags win, unset flags are dropped. */
export function buildUpdatePatch(
  flags: Record<string, unknown>,
  patch: unknown,
): Record<string, unknown> {
  const base = isPlainObject(patch) ? patch : {};
  const explicit = Object.fromEntries(
    Object.entries(flags).filter(([, value]) => value !== undefined),
  );
  return { ...base, ...explicit };
}
