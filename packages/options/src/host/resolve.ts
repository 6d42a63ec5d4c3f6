import { OptionValueError } from "../options/errors";
import { hasKey } from "../options/registry";
import type {
  ChoiceOption,
  OptionDefinition,
  OptionKey,
  OptionSet,
  RangeOption,
} from "../options/types";
import type { IRNG } from "../runtime/rng";

/* ---------------------------------- */
/* Player settings                     */
/* ---------------------------------- */

export type SettingValue = boolean | number | string;

/**
 * `{ value: weight }` - one value is picked proportionally to its weight
 */
export type WeightedSetting = Record<string, number>;

export type RawSetting = SettingValue | WeightedSetting;

export type PlayerSettings = Record<OptionKey, RawSetting>;

/**
 * Resolved option values as integer codes (toggles: 0 | 1)
 */
export type ResolvedOptions = Record<OptionKey, number>;

const RANDOM = "random";
const RANDOM_RANGE = /^random-range-(-?\d+)-(-?\d+)$/;
const INTEGER = /^-?\d+$/;

/**
 * Default value of an option as an integer code
 */
export function defaultValue(definition: OptionDefinition): number {
  switch (definition.kind) {
    case "toggle":
      return 0;
    case "defaultOnToggle":
      return 1;
    case "choice":
    case "range":
      return definition.default;
  }
}

/**
 * Picks one entry of a weights table
 */
function pickWeighted(key: OptionKey, weights: WeightedSetting, rng: IRNG): string {
  const entries = Object.entries(weights);
  let total = 0;
  for (const [, weight] of entries) {
    if (typeof weight !== "number" || !Number.isFinite(weight) || weight < 0) {
      throw new OptionValueError(key, weights, "weights must be non-negative numbers");
    }
    total += weight;
  }
  if (total <= 0) {
    throw new OptionValueError(key, weights, "at least one weight must be positive");
  }

  const roll = rng.next() * total;
  let cumulative = 0;
  let last = "";
  for (const [value, weight] of entries) {
    if (weight === 0) {
      continue;
    }
    cumulative += weight;
    last = value;
    if (roll < cumulative) {
      return value;
    }
  }
  return last;
}

function resolveToggle(key: OptionKey, value: SettingValue): number {
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (value === 0 || value === 1) {
    return value;
  }
  if (typeof value === "string") {
    const normalized = value.toLowerCase();
    if (normalized === "true" || normalized === "on") {
      return 1;
    }
    if (normalized === "false" || normalized === "off") {
      return 0;
    }
  }
  throw new OptionValueError(key, value, "expected true/false, on/off or 0/1");
}

function resolveChoice(definition: ChoiceOption, value: SettingValue): number {
  const codes = Object.values(definition.choices);

  if (typeof value === "number" && codes.includes(value)) {
    return value;
  }
  if (typeof value === "string") {
    const label = value.toLowerCase();
    if (hasKey(definition.choices, label)) {
      return definition.choices[label];
    }
    if (definition.aliases && hasKey(definition.aliases, label)) {
      return definition.aliases[label];
    }
  }

  const labels = Object.keys(definition.choices).join(", ");
  throw new OptionValueError(definition.key, value, `expected one of: ${labels}`);
}

function checkBounds(definition: RangeOption, value: SettingValue, n: number): number {
  if (n < definition.rangeStart || n > definition.rangeEnd) {
    throw new OptionValueError(
      definition.key,
      value,
      `must be between ${definition.rangeStart} and ${definition.rangeEnd}`
    );
  }
  return n;
}

function resolveRange(definition: RangeOption, value: SettingValue, rng: IRNG): number {
  if (typeof value === "number" && Number.isInteger(value)) {
    return checkBounds(definition, value, value);
  }
  if (typeof value === "string") {
    if (INTEGER.test(value)) {
      return checkBounds(definition, value, parseInt(value, 10));
    }
    const match = RANDOM_RANGE.exec(value);
    if (match) {
      const a = parseInt(match[1], 10);
      const b = parseInt(match[2], 10);
      const low = checkBounds(definition, value, Math.min(a, b));
      const high = checkBounds(definition, value, Math.max(a, b));
      return rng.nextInt(low, high);
    }
  }
  throw new OptionValueError(definition.key, value, "expected an integer");
}

function resolveRandom(definition: OptionDefinition, rng: IRNG): number {
  switch (definition.kind) {
    case "toggle":
    case "defaultOnToggle":
      return rng.nextInt(0, 1);
    case "choice": {
      const codes = Array.from(new Set(Object.values(definition.choices)));
      return codes[rng.nextInt(0, codes.length - 1)];
    }
    case "range":
      return rng.nextInt(definition.rangeStart, definition.rangeEnd);
  }
}

/**
 * Resolves a player's setting for one option to an integer code.
 * Unset values take the default; out-of-range values are rejected, never clamped.
 */
export function resolveOptionValue(
  definition: OptionDefinition,
  raw: RawSetting | undefined,
  rng: IRNG
): number {
  if (raw === undefined) {
    return defaultValue(definition);
  }

  const value = typeof raw === "object" ? pickWeighted(definition.key, raw, rng) : raw;

  if (value === RANDOM) {
    return resolveRandom(definition, rng);
  }

  switch (definition.kind) {
    case "toggle":
    case "defaultOnToggle":
      return resolveToggle(definition.key, value);
    case "choice":
      return resolveChoice(definition, value);
    case "range":
      return resolveRange(definition, value, rng);
  }
}

/**
 * Resolves every option of the set. Keys in `settings` that the set does
 * not define are ignored.
 */
export function resolvePlayerOptions(
  optionSet: OptionSet,
  settings: PlayerSettings,
  rng: IRNG
): ResolvedOptions {
  const resolved: ResolvedOptions = {};
  for (const [key, definition] of Object.entries(optionSet.typeHints)) {
    const raw = hasKey(settings, key) ? settings[key] : undefined;
    resolved[key] = resolveOptionValue(definition, raw, rng);
  }
  return resolved;
}
