/**
 * Environment readers shared by the configuration layer. Each helper takes
 * the variable source explicitly (defaulting to {@link process.env}) so tests
 * can hand in a plain record instead of mutating the process environment.
 */
export type EnvSource = Readonly<Record<string, string | undefined>>;

const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function normalise(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/**
 * Interprets the variable as a boolean. Accepts "1/true/yes/on" and
 * "0/false/no/off"; anything else falls back to the default.
 */
export function readBool(name: string, defaultValue: boolean, env: EnvSource = process.env): boolean {
  const value = normalise(env[name])?.toLowerCase();
  if (value === undefined) {
    return defaultValue;
  }
  if (TRUE_LITERALS.has(value)) {
    return true;
  }
  if (FALSE_LITERALS.has(value)) {
    return false;
  }
  return defaultValue;
}

/** Returns the base-10 integer stored in `name`, or undefined when absent or invalid. */
export function readOptionalInt(
  name: string,
  options?: NumberOptions,
  env: EnvSource = process.env,
): number | undefined {
  const value = normalise(env[name]);
  if (value === undefined || !/^[-+]?\d+$/.test(value)) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(parsed)) {
    return undefined;
  }
  return withinBounds(parsed, options) ? parsed : undefined;
}

export function readInt(
  name: string,
  defaultValue: number,
  options?: NumberOptions,
  env: EnvSource = process.env,
): number {
  return readOptionalInt(name, options, env) ?? defaultValue;
}

/** Returns the finite number stored in `name`, or undefined when absent or invalid. */
export function readOptionalNumber(
  name: string,
  options?: NumberOptions,
  env: EnvSource = process.env,
): number | undefined {
  const value = normalise(env[name]);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  return withinBounds(parsed, options) ? parsed : undefined;
}

export function readNumber(
  name: string,
  defaultValue: number,
  options?: NumberOptions,
  env: EnvSource = process.env,
): number {
  return readOptionalNumber(name, options, env) ?? defaultValue;
}

/** Returns the trimmed value of `name`, treating blank strings as unset. */
export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return normalise(env[name]);
}

/**
 * Reads an enum-like variable. Matching is case-insensitive and the canonical
 * spelling from `allowed` is returned.
 */
export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
  env: EnvSource = process.env,
): T {
  const value = normalise(env[name])?.toLowerCase();
  if (value === undefined) {
    return defaultValue;
  }
  return allowed.find((candidate) => candidate.toLowerCase() === value) ?? defaultValue;
}
