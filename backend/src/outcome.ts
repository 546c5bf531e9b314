import type {
  Call,
  Role,
  RoleMap,
  RoundPlan,
  SignalLevel,
} from "../../shared/schemas.js";
import { handCategory, handValue } from "./hand.js";

export type OutcomeKind =
  | "undetermined"
  | "honest-signal-doubted"
  | "forced-bluff-caught"
  | "bluff-caught"
  | "showdown"
  | "forced-bluff-believed"
  | "bluff-believed";

export interface Outcome {
  kind: OutcomeKind;
  /** `null` for a draw or an undetermined round. */
  winner: Role | null;
  reason: string;
  /** Whether P1's signal matched P1's actual category; `null` without a signal. */
  truth: boolean | null;
  p1Value: number | null;
  p2Value: number | null;
}

export interface OutcomeInput {
  plan: RoundPlan;
  roles: RoleMap;
  signal: SignalLevel | null;
  call: Call;
}

export function resolveOutcome({
  plan,
  roles,
  signal,
  call,
}: OutcomeInput): Outcome {
  if (signal === null) {
    return {
      kind: "undetermined",
      winner: null,
      reason:
        "Undetermined: no signal was set, the outcome cannot be computed.",
      truth: null,
      p1Value: null,
      p2Value: null,
    };
  }

  const p1Cards = plan.identityCards[roles.P1];
  const p2Cards = plan.identityCards[roles.P2];
  const p1Category = handCategory(p1Cards[0], p1Cards[1]);
  const forcedBluff = p1Category === null;
  const truth = signal === p1Category;
  const p1Value = handValue(p1Cards[0], p1Cards[1]);
  const p2Value = handValue(p2Cards[0], p2Cards[1]);
  const values = { truth, p1Value, p2Value };

  switch (call) {
    case "bluff": {
      if (truth) {
        return {
          kind: "honest-signal-doubted",
          winner: "P1",
          reason:
            "P1 signaled the correct category, P2 expected a bluff -> P1 wins.",
          ...values,
        };
      }
      if (forcedBluff) {
        return {
          kind: "forced-bluff-caught",
          winner: "P2",
          reason:
            "P1 had to bluff (20-22), P2 expected the bluff -> P2 wins.",
          ...values,
        };
      }
      return {
        kind: "bluff-caught",
        winner: "P2",
        reason: "P1 bluffed about the category, P2 caught the bluff -> P2 wins.",
        ...values,
      };
    }

    case "truth": {
      if (truth) {
        const winner: Role | null =
          p1Value > p2Value ? "P1" : p2Value > p1Value ? "P2" : null;
        const verdict = winner ? `${winner} wins` : "Draw";
        return {
          kind: "showdown",
          winner,
          reason: `P1 signaled ${signal} (correct), P2 believed -> ${p1Value} vs ${p2Value} -> ${verdict}.`,
          ...values,
        };
      }
      if (forcedBluff) {
        return {
          kind: "forced-bluff-believed",
          winner: "P1",
          reason: "P1 had to bluff (20-22) and P2 believed -> P1 wins.",
          ...values,
        };
      }
      return {
        kind: "bluff-believed",
        winner: "P1",
        reason: "P1 bluffed about the category, P2 believed -> P1 wins.",
        ...values,
      };
    }
  }
}
