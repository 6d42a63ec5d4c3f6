import { hasKey } from "../options/registry";
import type {
  OptionDefinition,
  OptionGroup,
  OptionGroups,
  OptionHooks,
  OptionRegistry,
  OptionSet,
} from "../options/types";
import { createManualOptions, type ManualGameData } from "./manualOptions";

export type DefinedOptions = {
  optionSet: Readonly<OptionSet>;
  groups: OptionGroup[];
};

export const GAME_OPTIONS_GROUP = "Game Options";
export const CONTRIBUTED_OPTIONS_GROUP = "BlockTales Options";

function buildDefaultGroups(
  manualOptions: OptionDefinition[],
  contributedOptions: OptionDefinition[]
): OptionGroups {
  const groups: OptionGroups = {};
  if (manualOptions.length > 0) {
    groups[GAME_OPTIONS_GROUP] = manualOptions;
  }
  if (contributedOptions.length > 0) {
    groups[CONTRIBUTED_OPTIONS_GROUP] = contributedOptions;
  }
  return groups;
}

/**
 * Freezes the option set, its lookup and every definition in it
 */
function finalize(optionSet: OptionSet): Readonly<OptionSet> {
  for (const definition of Object.values(optionSet.typeHints)) {
    if (definition.kind === "choice") {
      Object.freeze(definition.choices);
      if (definition.aliases) {
        Object.freeze(definition.aliases);
      }
    }
    Object.freeze(definition);
  }
  Object.freeze(optionSet.typeHints);
  return Object.freeze(optionSet);
}

/**
 * Runs option start-up once, hooks in fixed order:
 * beforeOptionsDefined -> framework defaults merge -> afterOptionsDefined
 * -> beforeOptionGroupsCreated -> afterOptionGroupsCreated
 *
 * Errors thrown by hooks are not caught: they abort start-up.
 */
export function defineOptions(gameData: ManualGameData, hooks: OptionHooks): DefinedOptions {
  const contributed = hooks.beforeOptionsDefined({});

  // Contributed keys win: framework options only fill the gaps
  const typeHints: OptionRegistry = { ...contributed };
  const manualOptions: OptionDefinition[] = [];
  for (const definition of createManualOptions(gameData)) {
    if (hasKey(typeHints, definition.key)) {
      continue;
    }
    typeHints[definition.key] = definition;
    manualOptions.push(definition);
  }

  const optionSet: OptionSet = { typeHints };
  hooks.afterOptionsDefined(optionSet);

  const groups = hooks.beforeOptionGroupsCreated(
    buildDefaultGroups(manualOptions, Object.values(contributed))
  );
  const optionGroups = hooks.afterOptionGroupsCreated(
    Object.entries(groups).map(([name, options]) => ({
      name,
      options,
      startCollapsed: false,
    }))
  );

  return {
    optionSet: finalize(optionSet),
    groups: optionGroups,
  };
}
