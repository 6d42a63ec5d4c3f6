import type { OptionDefinition, OptionRegistry } from "./types";

/**
 * Writes every definition into the registry under its key.
 * An existing binding for the same key is replaced without notice.
 */
export function register(
  catalog: OptionDefinition[],
  registry: OptionRegistry
): OptionRegistry {
  for (const definition of catalog) {
    registry[definition.key] = definition;
  }
  return registry;
}

/**
 * Own-property lookup on a plain-object table
 */
export function hasKey(table: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(table, key);
}
