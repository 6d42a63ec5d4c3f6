import { OptionLookupError } from "./errors";
import { hasKey } from "./registry";
import type { OptionKey, OptionSet } from "./types";

/**
 * Options generated by the Manual framework (category and goal toggles)
 * that should not be offered to players
 */
export const HIDDEN_OPTION_KEYS: readonly OptionKey[] = [
  "co_op",
  "bux_shop",
  "shopsanity_currency",
  "pure_soul",
  "dark_soul",
  "pre_prologue",
  "prologue",
  "chapter1",
  "chapter2",
  "chapter3",
  "chapter4",
];

/**
 * Hides each key in order.
 * Throws OptionLookupError on the first key missing from the option set;
 * keys hidden before it stay hidden.
 */
export function hide(optionSet: OptionSet, keys: readonly OptionKey[]): void {
  for (const key of keys) {
    if (!hasKey(optionSet.typeHints, key)) {
      throw new OptionLookupError(key);
    }
    optionSet.typeHints[key].visibility = "hidden";
  }
}
