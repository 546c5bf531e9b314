import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { resolveOutcome } from "../backend/src/outcome.js";
import { INITIAL_ROLES, swapRoles } from "../backend/src/round-state.js";
import { plan } from "./helpers.js";

// VP1 holds 19 (high), VP2 holds 15 (low).
const strongVp1 = plan([9, 10], [7, 8]);
// VP1 holds 21 and must bluff, VP2 holds 16.
const forcedVp1 = plan([10, 11], [8, 8]);

describe("resolveOutcome", () => {
  it("cannot decide without a signal", () => {
    const outcome = resolveOutcome({
      plan: strongVp1,
      roles: INITIAL_ROLES,
      signal: null,
      call: "truth",
    });
    assert.deepEqual(outcome, {
      kind: "undetermined",
      winner: null,
      reason: "Undetermined: no signal was set, the outcome cannot be computed.",
      truth: null,
      p1Value: null,
      p2Value: null,
    });
  });

  it("compares values when a true signal is believed", () => {
    const outcome = resolveOutcome({
      plan: strongVp1,
      roles: INITIAL_ROLES,
      signal: "high",
      call: "truth",
    });
    assert.deepEqual(outcome, {
      kind: "showdown",
      winner: "P1",
      reason: "P1 signaled high (correct), P2 believed -> 19 vs 15 -> P1 wins.",
      truth: true,
      p1Value: 19,
      p2Value: 15,
    });
  });

  it("lets P2 win the showdown with the higher hand", () => {
    const outcome = resolveOutcome({
      plan: strongVp1,
      roles: swapRoles(INITIAL_ROLES),
      signal: "low",
      call: "truth",
    });
    assert.equal(outcome.winner, "P2");
    assert.equal(
      outcome.reason,
      "P1 signaled low (correct), P2 believed -> 15 vs 19 -> P2 wins."
    );
  });

  it("scores a busted P2 hand as zero in the showdown", () => {
    const outcome = resolveOutcome({
      plan: plan([7, 7], [10, 10]),
      roles: INITIAL_ROLES,
      signal: "low",
      call: "truth",
    });
    assert.equal(outcome.winner, "P1");
    assert.equal(outcome.p2Value, 0);
  });

  it("declares a draw on equal values", () => {
    const outcome = resolveOutcome({
      plan: plan([8, 9], [9, 8]),
      roles: INITIAL_ROLES,
      signal: "medium",
      call: "truth",
    });
    assert.equal(outcome.kind, "showdown");
    assert.equal(outcome.winner, null);
    assert.equal(
      outcome.reason,
      "P1 signaled medium (correct), P2 believed -> 17 vs 17 -> Draw."
    );
  });

  it("rewards P1 when an honest signal is called a bluff", () => {
    const outcome = resolveOutcome({
      plan: strongVp1,
      roles: INITIAL_ROLES,
      signal: "high",
      call: "bluff",
    });
    assert.equal(outcome.kind, "honest-signal-doubted");
    assert.equal(outcome.winner, "P1");
    assert.equal(
      outcome.reason,
      "P1 signaled the correct category, P2 expected a bluff -> P1 wins."
    );
  });

  it("rewards P2 for catching a bluff", () => {
    const outcome = resolveOutcome({
      plan: strongVp1,
      roles: INITIAL_ROLES,
      signal: "low",
      call: "bluff",
    });
    assert.equal(outcome.kind, "bluff-caught");
    assert.equal(outcome.winner, "P2");
    assert.equal(outcome.truth, false);
    assert.equal(
      outcome.reason,
      "P1 bluffed about the category, P2 caught the bluff -> P2 wins."
    );
  });

  it("rewards P1 for a believed bluff", () => {
    const outcome = resolveOutcome({
      plan: strongVp1,
      roles: INITIAL_ROLES,
      signal: "low",
      call: "truth",
    });
    assert.equal(outcome.kind, "bluff-believed");
    assert.equal(outcome.winner, "P1");
    assert.equal(
      outcome.reason,
      "P1 bluffed about the category, P2 believed -> P1 wins."
    );
  });

  it("treats any signal on a 20-22 hand as a bluff", () => {
    const caught = resolveOutcome({
      plan: forcedVp1,
      roles: INITIAL_ROLES,
      signal: "medium",
      call: "bluff",
    });
    assert.equal(caught.kind, "forced-bluff-caught");
    assert.equal(caught.winner, "P2");
    assert.equal(caught.truth, false);
    assert.equal(
      caught.reason,
      "P1 had to bluff (20-22), P2 expected the bluff -> P2 wins."
    );

    const believed = resolveOutcome({
      plan: forcedVp1,
      roles: INITIAL_ROLES,
      signal: "high",
      call: "truth",
    });
    assert.equal(believed.kind, "forced-bluff-believed");
    assert.equal(believed.winner, "P1");
    assert.equal(
      believed.reason,
      "P1 had to bluff (20-22) and P2 believed -> P1 wins."
    );
  });

  it("uses the hand of the identity sitting in P1", () => {
    // VP2 (16, medium) is P1 after the swap.
    const outcome = resolveOutcome({
      plan: forcedVp1,
      roles: swapRoles(INITIAL_ROLES),
      signal: "medium",
      call: "bluff",
    });
    assert.equal(outcome.kind, "honest-signal-doubted");
    assert.equal(outcome.p1Value, 16);
    assert.equal(outcome.p2Value, 0);
  });
});
