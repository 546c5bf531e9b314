import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  INITIAL_ROLES,
  REVEAL_ORDER,
  allRevealed,
  cardsOf,
  createRoundState,
  markRevealed,
  nextReveal,
  otherRole,
  roleOf,
  swapRoles,
  type RevealStep,
  type VisibleCardState,
} from "../backend/src/round-state.js";
import { plan } from "./helpers.js";

describe("roles", () => {
  it("swaps identities between seats", () => {
    assert.deepEqual(swapRoles(INITIAL_ROLES), { P1: "VP2", P2: "VP1" });
    assert.deepEqual(swapRoles(swapRoles(INITIAL_ROLES)), INITIAL_ROLES);
  });

  it("finds the other seat", () => {
    assert.equal(otherRole("P1"), "P2");
    assert.equal(otherRole("P2"), "P1");
  });
});

describe("createRoundState", () => {
  it("starts hidden with nothing chosen", () => {
    const state = createRoundState(3, plan([9, 10], [7, 8]), INITIAL_ROLES, "DEALING");
    assert.equal(state.index, 3);
    assert.equal(state.phase, "DEALING");
    assert.deepEqual(state.visible, { P1: [false, false], P2: [false, false] });
    assert.deepEqual(state.ready, { P1: false, P2: false });
    assert.equal(state.signal, null);
    assert.equal(state.call, null);
    assert.equal(state.winner, null);
  });

  it("looks cards up through the identity in each seat", () => {
    const swapped = createRoundState(
      1,
      plan([9, 10], [7, 8]),
      swapRoles(INITIAL_ROLES),
      "DEALING"
    );
    assert.deepEqual([...cardsOf(swapped, "P1")], [7, 8]);
    assert.deepEqual([...cardsOf(swapped, "P2")], [9, 10]);
    assert.equal(roleOf(swapped, "VP1"), "P2");
  });
});

describe("reveal order", () => {
  it("alternates seats, first cards before second cards", () => {
    let visible: VisibleCardState = { P1: [false, false], P2: [false, false] };
    const seen: RevealStep[] = [];
    for (let step = nextReveal(visible); step; step = nextReveal(visible)) {
      seen.push(step);
      visible = markRevealed(visible, step);
    }
    assert.deepEqual(seen, [...REVEAL_ORDER]);
    assert.deepEqual(seen, [
      { role: "P1", cardIndex: 0 },
      { role: "P2", cardIndex: 0 },
      { role: "P1", cardIndex: 1 },
      { role: "P2", cardIndex: 1 },
    ]);
    assert.equal(allRevealed(visible), true);
  });

  it("does not mutate the previous flags", () => {
    const before: VisibleCardState = { P1: [false, false], P2: [false, false] };
    const after = markRevealed(before, { role: "P1", cardIndex: 0 });
    assert.deepEqual(before.P1, [false, false]);
    assert.deepEqual(after.P1, [true, false]);
    assert.deepEqual(nextReveal(after), { role: "P2", cardIndex: 0 });
  });
});
