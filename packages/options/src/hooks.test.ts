import { describe, it, expect } from "vitest";
import {
  beforeOptionsDefined,
  afterOptionsDefined,
  beforeOptionGroupsCreated,
  afterOptionGroupsCreated,
} from "./hooks";
import { HIDDEN_OPTION_KEYS } from "./options/visibility";
import { OptionLookupError } from "./options/errors";
import type { OptionGroup, OptionGroups, OptionRegistry } from "./options/types";
import { makeTestOptionSet, makeTestToggle } from "./test-helpers/makeTestOptionSet";

describe("beforeOptionsDefined", () => {
  it("adds the BlockTales options to the given mapping", () => {
    const options: OptionRegistry = {};

    const result = beforeOptionsDefined(options);

    expect(result).toBe(options);
    expect(Object.keys(result)).toEqual([
      "total_characters_to_win_with",
      "solo_mode",
      "i_spy_logic",
      "shopsanity",
      "bux_shop_hints",
      "levelsanity",
      "fishsanity",
      "chatsanity",
      "cap",
      "cutscenesanity",
      "the_pit",
      "disable_postgoal_content",
      "soul_type",
    ]);
  });

  it("replaces an option already defined under the same key", () => {
    const result = beforeOptionsDefined({ the_pit: makeTestToggle("the_pit") });

    expect(result.the_pit.displayName).toBe("The Pit");
  });
});

describe("afterOptionsDefined", () => {
  it("hides the generated category options", () => {
    const optionSet = makeTestOptionSet([...HIDDEN_OPTION_KEYS, "solo_mode"]);

    afterOptionsDefined(optionSet);

    expect(optionSet.typeHints.co_op.visibility).toBe("hidden");
    expect(optionSet.typeHints.chapter4.visibility).toBe("hidden");
    expect(optionSet.typeHints.solo_mode.visibility).toBe("visible");
  });

  it("throws when a category option was never defined", () => {
    const optionSet = makeTestOptionSet(["solo_mode"]);

    expect(() => afterOptionsDefined(optionSet)).toThrow(OptionLookupError);
    expect(() => afterOptionsDefined(optionSet)).toThrow('Option "co_op" is not defined');
    expect(optionSet.typeHints.solo_mode.visibility).toBe("visible");
  });
});

describe("option group hooks", () => {
  it("pass groups through unchanged", () => {
    const groups: OptionGroups = { "Game Options": [makeTestToggle("goal")] };
    const created: OptionGroup[] = [
      { name: "Game Options", options: [makeTestToggle("goal")], startCollapsed: false },
    ];

    expect(beforeOptionGroupsCreated(groups)).toBe(groups);
    expect(Object.keys(groups)).toEqual(["Game Options"]);
    expect(afterOptionGroupsCreated(created)).toBe(created);
    expect(created).toHaveLength(1);
  });
});
