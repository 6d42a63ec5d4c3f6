import type { OptionDefinition, OptionSet } from "../options/types";
import { manualGameName, type ManualGameData } from "./manualOptions";
import type { SettingValue } from "./resolve";

export type SettingsTemplate = {
  name: string;
  game: string;
  options: Record<string, SettingValue>;
};

/**
 * Default value as a player would write it
 */
function templateValue(definition: OptionDefinition): SettingValue {
  switch (definition.kind) {
    case "toggle":
    case "defaultOnToggle":
      return definition.default;
    case "choice": {
      const entry = Object.entries(definition.choices).find(
        ([, code]) => code === definition.default
      );
      return entry ? entry[0] : definition.default;
    }
    case "range":
      return definition.default;
  }
}

/**
 * Builds a player settings document listing every visible option at its default.
 * Hidden options are left out.
 */
export function buildSettingsTemplate(
  optionSet: OptionSet,
  gameData: ManualGameData,
  playerName: string = "Player{number}"
): SettingsTemplate {
  const options: Record<string, SettingValue> = {};
  for (const [key, definition] of Object.entries(optionSet.typeHints)) {
    if (definition.visibility === "hidden") {
      continue;
    }
    options[key] = templateValue(definition);
  }

  return {
    name: playerName,
    game: manualGameName(gameData),
    options,
  };
}
