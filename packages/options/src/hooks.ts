import { createOptionCatalog } from "./options/catalog";
import { register } from "./options/registry";
import { HIDDEN_OPTION_KEYS, hide } from "./options/visibility";
import type {
  OptionGroup,
  OptionGroups,
  OptionHooks,
  OptionRegistry,
  OptionSet,
} from "./options/types";

/**
 * Called before the Manual framework defines its own options.
 * Keys written here win over the framework's on overlap.
 */
export function beforeOptionsDefined(options: OptionRegistry): OptionRegistry {
  return register(createOptionCatalog(), options);
}

/**
 * Called once the final option set exists (framework + contributed).
 * Hides the generated category options players should not see.
 */
export function afterOptionsDefined(optionSet: OptionSet): void {
  hide(optionSet, HIDDEN_OPTION_KEYS);
}

// Add options to a group with groups["Group Name"] = [definition]
export function beforeOptionGroupsCreated(groups: OptionGroups): OptionGroups {
  return groups;
}

export function afterOptionGroupsCreated(groups: OptionGroup[]): OptionGroup[] {
  return groups;
}

export const optionHooks: OptionHooks = {
  beforeOptionsDefined,
  afterOptionsDefined,
  beforeOptionGroupsCreated,
  afterOptionGroupsCreated,
};
