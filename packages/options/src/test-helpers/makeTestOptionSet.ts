import type { OptionDefinition, OptionSet } from '../options/types';

/**
 * Creates a visible toggle definition for a key
 */
export function makeTestToggle(key: string): OptionDefinition {
  return {
    kind: 'toggle',
    key,
    displayName: key,
    description: '',
    visibility: 'visible',
    default: false,
  };
}

/**
 * Creates an option set with one visible toggle per key
 */
export function makeTestOptionSet(keys: readonly string[]): OptionSet {
  const typeHints: Record<string, OptionDefinition> = {};
  for (const key of keys) {
    typeHints[key] = makeTestToggle(key);
  }
  return { typeHints };
}
