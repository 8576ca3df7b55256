export function isoNow(): string {
  return new Date().toISOString();
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function isNonEmptyObject(value: unknown): value is Record<string, unknown> {
  return (
    value !== null &&
    typeof value === "object" &&
    !Array.isArray(value) &&
    Object.keys(value).length > 0
  );
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Reads a `--name` / `--no-name` switch straight from argv; the last occurrence before `--`
 * wins. Undefined when neither appears.
 */
export function readArgvFlag(argv: readonly string[], name: string): boolean | undefined {
  let flag: boolean | undefined;
  for (const arg of argv) {
    if (arg === "--") break;
    if (arg === `--${name}`) flag = true;
    else if (arg === `--no-${name}`) flag = false;
  }
  return flag;
}
