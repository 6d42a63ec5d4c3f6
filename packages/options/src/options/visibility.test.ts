import { describe, it, expect } from "vitest";
import { hide, HIDDEN_OPTION_KEYS } from "./visibility";
import { OptionLookupError } from "./errors";
import { makeTestOptionSet } from "../test-helpers/makeTestOptionSet";

describe("hide", () => {
  it("lists the 11 generated category options", () => {
    expect(HIDDEN_OPTION_KEYS).toEqual([
      "co_op",
      "bux_shop",
      "shopsanity_currency",
      "pure_soul",
      "dark_soul",
      "pre_prologue",
      "prologue",
      "chapter1",
      "chapter2",
      "chapter3",
      "chapter4",
    ]);
  });

  it("hides exactly the target keys", () => {
    const optionSet = makeTestOptionSet([...HIDDEN_OPTION_KEYS, "unrelated_key"]);

    hide(optionSet, HIDDEN_OPTION_KEYS);

    for (const key of HIDDEN_OPTION_KEYS) {
      expect(optionSet.typeHints[key].visibility).toBe("hidden");
    }
    expect(optionSet.typeHints.unrelated_key.visibility).toBe("visible");
  });

  it("fails on the first missing key and keeps earlier hides", () => {
    const keys = HIDDEN_OPTION_KEYS.filter((key) => key !== "chapter2");
    const optionSet = makeTestOptionSet(keys);

    let caught: unknown;
    try {
      hide(optionSet, HIDDEN_OPTION_KEYS);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(OptionLookupError);
    expect(caught).toMatchObject({
      key: "chapter2",
      message: 'Option "chapter2" is not defined',
    });

    const hiddenBeforeFailure = HIDDEN_OPTION_KEYS.slice(0, 8);
    for (const key of hiddenBeforeFailure) {
      expect(optionSet.typeHints[key].visibility).toBe("hidden");
    }
    expect(optionSet.typeHints.chapter3.visibility).toBe("visible");
    expect(optionSet.typeHints.chapter4.visibility).toBe("visible");
  });

  it("does nothing for an empty key list", () => {
    const optionSet = makeTestOptionSet(["co_op"]);

    hide(optionSet, []);

    expect(optionSet.typeHints.co_op.visibility).toBe("visible");
  });

  it("hides an already hidden key again without error", () => {
    const optionSet = makeTestOptionSet(["co_op"]);

    hide(optionSet, ["co_op"]);
    hide(optionSet, ["co_op"]);

    expect(optionSet.typeHints.co_op.visibility).toBe("hidden");
  });
});
