import type {
  ChoiceOption,
  DefaultOnToggleOption,
  OptionDefinition,
  RangeOption,
  ToggleOption,
} from "./types";

type DefinitionInit = {
  key: string;
  displayName: string;
  description: string[];
};

function toggle(init: DefinitionInit): ToggleOption {
  return {
    kind: "toggle",
    key: init.key,
    displayName: init.displayName,
    description: init.description.join("\n"),
    visibility: "visible",
    default: false,
  };
}

function defaultOnToggle(init: DefinitionInit): DefaultOnToggleOption {
  return {
    kind: "defaultOnToggle",
    key: init.key,
    displayName: init.displayName,
    description: init.description.join("\n"),
    visibility: "visible",
    default: true,
  };
}

function choice(
  init: DefinitionInit & { choices: Record<string, number>; default: number }
): ChoiceOption {
  return {
    kind: "choice",
    key: init.key,
    displayName: init.displayName,
    description: init.description.join("\n"),
    visibility: "visible",
    choices: { ...init.choices },
    default: init.default,
  };
}

function range(
  init: DefinitionInit & { rangeStart: number; rangeEnd: number; default: number }
): RangeOption {
  return {
    kind: "range",
    key: init.key,
    displayName: init.displayName,
    description: init.description.join("\n"),
    visibility: "visible",
    rangeStart: init.rangeStart,
    rangeEnd: init.rangeEnd,
    default: init.default,
  };
}

/**
 * Creates the BlockTales option definitions.
 * Returns fresh objects on every call: the host mutates visibility in place.
 */
export function createOptionCatalog(): OptionDefinition[] {
  return [
    range({
      key: "total_characters_to_win_with",
      displayName: "Number of characters to beat the game with before victory",
      description: [
        "Instead of having to beat the game with all characters, you can limit locations to a subset of character victory locations.",
      ],
      rangeStart: 10,
      rangeEnd: 50,
      default: 50,
    }),
    toggle({
      key: "solo_mode",
      displayName: "Solo Mode",
      description: [
        "Enable Solo Mode, a mode where:",
        "1. Additional Party Member Items are removed from the item pool.",
        "2. Cards that are only beneficial in a party are removed from the item pool.",
      ],
    }),
    defaultOnToggle({
      key: "i_spy_logic",
      displayName: "I Spy Logic",
      description: [
        "Toggle if certain BUX Checks require the I Spy Card to obtain.",
        "Recommended for those that have no idea where some of the more hidden BUX are.",
      ],
    }),
    toggle({
      key: "shopsanity",
      displayName: "Shopsanity",
      description: [
        "Add all of the items you can purchase in Shops as Checks.",
        "You do NOT have to buy everything in the Shops if you can't afford it.",
        "Just get to a Shop and you can send its Checks.",
        "Clarifying that now so people don't start grinding TIX for Shop Checks.",
        "(178 Checks)",
      ],
    }),
    defaultOnToggle({
      key: "bux_shop_hints",
      displayName: "BUX Shop Hints",
      description: [
        "Toggle if the BUX Shop Checks will be automatically hinted at the start of the Multiworld.",
        "Disable if you want the items that are held in your BUX Shop to be a mystery...",
      ],
    }),
    defaultOnToggle({
      key: "levelsanity",
      displayName: "Levelsanity",
      description: [
        "Add Level Ups as Checks.",
        "The Regions used for these are rough estimates on where you may level up.",
        "They may be slightly altered as I continue to update the Manual.",
        "(12 Checks)",
      ],
    }),
    defaultOnToggle({
      key: "fishsanity",
      displayName: "Fishsanity",
      description: [
        "Add catching fish as Checks.",
        "This also adds Worm as a Progression Consumable.",
        "You must have the Worm Item to fish.",
        "The fishing spot is located in the Meadows, in a room you normally go through.",
        "If you've been there before, you can easily warp to that room at anytime.",
        "(10 Checks)",
      ],
    }),
    toggle({
      key: "chatsanity",
      displayName: "Chatsanity",
      description: [
        "Add talking to NPCs as Checks.",
        "WARNING: If you enable this, prepare for way too much Filler.",
        "(705 Checks)",
      ],
    }),
    choice({
      key: "cap",
      displayName: "CAP",
      description: [
        "As per Paragraph 4 of the CAP (Chatsanity Acknowledgement Pact), you must agree to the following to enable Chatsanity:",
        "By signing this definitely real contract, you acknowledge the consequences of having the Option 'Chatsanity' turned on, especially when enabled with a non-early Goal.",
        "Furthermore, you are aware of how many Checks and, by extension, how much Filler and/or Traps will be added to the pool for you as a result of this.",
        "Please sign the contract by choosing I Agree below to confirm that this is truly what you want.",
      ],
      choices: { i_agree: 0, i_disagree: 1 },
      default: 0,
    }),
    defaultOnToggle({
      key: "cutscenesanity",
      displayName: "Cutscenesanity",
      description: [
        "Add in-game cutscenes as Checks.",
        "Cutscenes are usually the scenes where one or more of the following occur:",
        "- The screen has black bars on the sides",
        "- Unique NPC and/or Player animations",
        "- Forced interaction with characters that can't be avoided (like Kyoko in Chapter 2)",
        "...or other things that are often unique to cutscenes.",
        "This is a bit iffy to determine what is/isn't a Cutscene, so input is appreciated so I can refine it.",
        "(79 Checks)",
      ],
    }),
    toggle({
      key: "the_pit",
      displayName: "The Pit",
      description: [
        "Adds each floor of the Pit as Checks.",
        "Only enable if you don't mind potential in logic suffering.",
        "(40 Checks)",
      ],
    }),
    defaultOnToggle({
      key: "disable_postgoal_content",
      displayName: "Disable Post-Goal Content",
      description: [
        "Remove Items and Checks that come after your selected Goal.",
        "Recommended for Syncs especially, but could be used in Asyncs, too.",
      ],
    }),
    choice({
      key: "soul_type",
      displayName: "Soul Type",
      description: [
        "How does your soul look on the inside?",
        "This determines if you're going to be a nice person or a heartless person during your run.",
        "For example, Pure expects you to save Accountant Jim with the Dynamite, but Dark expects you to leave him there.",
        "(you monster)",
      ],
      choices: { pure: 0, dark: 1 },
      default: 0,
    }),
  ];
}
