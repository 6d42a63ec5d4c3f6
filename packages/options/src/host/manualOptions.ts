import type { ChoiceOption, DefaultOnToggleOption, OptionDefinition } from "../options/types";

/**
 * Manual game data relevant to option generation
 * (read from data/game.json by the tools)
 */
export type ManualGameData = {
  game: string;
  creator: string;
  /** Victory location names, in goal order */
  goals: string[];
  /** yaml_option keys declared by item/location categories */
  categoryOptions: string[];
};

/**
 * Name the world registers under, and that player settings must name:
 * Manual_<game>_<creator>
 */
export function manualGameName(gameData: ManualGameData): string {
  return `Manual_${gameData.game}_${gameData.creator}`;
}

/**
 * Converts a display name to an option label: "Chapter 1" -> "chapter_1"
 */
export function toOptionLabel(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

function createGoalOption(goals: string[]): ChoiceOption {
  const choices: Record<string, number> = {};
  goals.forEach((goal, index) => {
    choices[toOptionLabel(goal)] = index;
  });

  return {
    kind: "choice",
    key: "goal",
    displayName: "Goal",
    description: "Choose your victory condition.",
    visibility: "visible",
    choices,
    default: 0,
  };
}

function createCategoryOption(key: string): DefaultOnToggleOption {
  return {
    kind: "defaultOnToggle",
    key,
    displayName: key,
    description: `Include the items and locations of categories that require "${key}".`,
    visibility: "visible",
    default: true,
  };
}

/**
 * Options the Manual framework defines on its own:
 * the goal choice (when the game declares goals) and one toggle per category option
 */
export function createManualOptions(gameData: ManualGameData): OptionDefinition[] {
  const options: OptionDefinition[] = [];

  if (gameData.goals.length > 0) {
    options.push(createGoalOption(gameData.goals));
  }

  for (const key of gameData.categoryOptions) {
    options.push(createCategoryOption(key));
  }

  return options;
}
