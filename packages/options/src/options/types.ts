// Option Types for the BlockTales Manual options

/* ---------------------------------- */
/* ID Aliases                          */
/* ---------------------------------- */

export type OptionKey = string;
export type ChoiceLabel = string;

/* ---------------------------------- */
/* Visibility                          */
/* ---------------------------------- */

/**
 * Whether an option is presented to players (settings templates, option
 * pages). Hidden options still resolve to their default during generation.
 */
export type Visibility = "visible" | "hidden";

/* ---------------------------------- */
/* Definitions                         */
/* ---------------------------------- */

type OptionBase = {
  key: OptionKey;
  displayName: string;
  description: string;
  visibility: Visibility;
};

export type ToggleOption = OptionBase & {
  kind: "toggle";
  default: false;
};

export type DefaultOnToggleOption = OptionBase & {
  kind: "defaultOnToggle";
  default: true;
};

export type ChoiceOption = OptionBase & {
  kind: "choice";
  choices: Record<ChoiceLabel, number>;
  /** Extra labels accepted on input; never offered in templates */
  aliases?: Record<ChoiceLabel, number>;
  default: number;
};

export type RangeOption = OptionBase & {
  kind: "range";
  rangeStart: number;
  rangeEnd: number;
  default: number;
};

export type OptionDefinition =
  | ToggleOption
  | DefaultOnToggleOption
  | ChoiceOption
  | RangeOption;

/* ---------------------------------- */
/* Registry / Option Set               */
/* ---------------------------------- */

/**
 * Mapping of option key to definition, owned by the host.
 * A later write for the same key replaces the earlier one.
 */
export type OptionRegistry = Record<OptionKey, OptionDefinition>;

/**
 * The host's finalized option set. `typeHints` is the modifiable lookup
 * handed to `afterOptionsDefined`.
 */
export type OptionSet = {
  typeHints: OptionRegistry;
};

/* ---------------------------------- */
/* Groups                              */
/* ---------------------------------- */

export type OptionGroups = Record<string, OptionDefinition[]>;

export type OptionGroup = {
  name: string;
  options: OptionDefinition[];
  startCollapsed: boolean;
};

/* ---------------------------------- */
/* Hooks                               */
/* ---------------------------------- */

export interface OptionHooks {
  beforeOptionsDefined(options: OptionRegistry): OptionRegistry;
  afterOptionsDefined(optionSet: OptionSet): void;
  beforeOptionGroupsCreated(groups: OptionGroups): OptionGroups;
  afterOptionGroupsCreated(groups: OptionGroup[]): OptionGroup[];
}
