import type { OptionKey } from "./types";

/**
 * Raised when an option key is looked up but not defined
 */
export class OptionLookupError extends Error {
  readonly key: OptionKey;

  constructor(key: OptionKey) {
    super(`Option "${key}" is not defined`);
    this.name = "OptionLookupError";
    this.key = key;
  }
}

/**
 * Raised when a player-supplied value cannot be resolved for an option
 */
export class OptionValueError extends Error {
  readonly key: OptionKey;
  readonly value: unknown;

  constructor(key: OptionKey, value: unknown, reason: string) {
    super(`Invalid value ${JSON.stringify(value)} for option "${key}": ${reason}`);
    this.name = "OptionValueError";
    this.key = key;
    this.value = value;
  }
}
