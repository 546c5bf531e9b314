import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  FORCED_BLUFF_LABEL,
  handCategory,
  handCategoryLabel,
  handValue,
  isExpectedTotal,
} from "../backend/src/hand.js";

describe("handValue", () => {
  it("busts totals of 20, 21 and 22 to zero", () => {
    assert.equal(handValue(10, 10), 0);
    assert.equal(handValue(10, 11), 0);
    assert.equal(handValue(11, 11), 0);
  });

  it("returns the plain total otherwise", () => {
    assert.equal(handValue(9, 9), 18);
    assert.equal(handValue(9, 10), 19);
    assert.equal(handValue(7, 7), 14);
    assert.equal(handValue(12, 11), 23);
  });
});

describe("handCategory", () => {
  it("maps 19 to high", () => {
    assert.equal(handCategory(9, 10), "high");
  });

  it("maps 16 to 18 to medium", () => {
    assert.equal(handCategory(8, 8), "medium");
    assert.equal(handCategory(8, 9), "medium");
    assert.equal(handCategory(9, 9), "medium");
  });

  it("maps 14 and 15 to low", () => {
    assert.equal(handCategory(7, 7), "low");
    assert.equal(handCategory(7, 8), "low");
  });

  it("has no category for a forced bluff", () => {
    assert.equal(handCategory(10, 10), null);
    assert.equal(handCategory(10, 11), null);
    assert.equal(handCategory(11, 11), null);
  });

  it("folds totals outside 14-22 into medium or low", () => {
    assert.equal(handCategory(12, 12), "medium");
    assert.equal(handCategory(5, 5), "low");
    assert.equal(handCategory(6, 7), "low");
  });
});

describe("handCategoryLabel", () => {
  it("renders the category or the forced-bluff label", () => {
    assert.equal(handCategoryLabel(9, 10), "high");
    assert.equal(handCategoryLabel(10, 11), FORCED_BLUFF_LABEL);
    assert.equal(FORCED_BLUFF_LABEL, "forced_bluff");
  });
});

describe("isExpectedTotal", () => {
  it("accepts 14 through 22 only", () => {
    assert.equal(isExpectedTotal(7, 7), true);
    assert.equal(isExpectedTotal(11, 11), true);
    assert.equal(isExpectedTotal(6, 7), false);
    assert.equal(isExpectedTotal(12, 11), false);
  });
});
