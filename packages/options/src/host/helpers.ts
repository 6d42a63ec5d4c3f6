import { OptionLookupError } from "../options/errors";
import { hasKey } from "../options/registry";
import type { OptionKey } from "../options/types";
import type { ResolvedOptions } from "./resolve";

/**
 * Gets a resolved option value (integer code)
 */
export function getOptionValue(resolved: ResolvedOptions, key: OptionKey): number {
  if (!hasKey(resolved, key)) {
    throw new OptionLookupError(key);
  }
  return resolved[key];
}

/**
 * True when the resolved value is non-zero
 */
export function isOptionEnabled(resolved: ResolvedOptions, key: OptionKey): boolean {
  return getOptionValue(resolved, key) !== 0;
}
