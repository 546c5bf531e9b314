// backend/src/intent-handler.ts

import {
  EngineIntentSchema,
  type EngineIntent,
  type PublicState,
} from "../../shared/schemas.js";
import type { IntentResult } from "../../shared/validation.js";
import type { GameEngine } from "./engine.js";
import { isRecoverableEngineError } from "./errors.js";
import type { Debouncer } from "./util/debounce.js";

export interface HandleIntentOptions {
  /** Drops an intent repeated within the debounce interval. */
  debouncer?: Debouncer;
  verbose?: boolean;
}

/** Button identity used for debouncing: the same press from the same seat. */
export function intentKey(intent: EngineIntent): string {
  switch (intent.type) {
    case "start":
    case "next-round":
      return `${intent.type}:${intent.role}`;
    case "reveal":
      return `reveal:${intent.role}:${intent.cardIndex}`;
    case "signal":
      return `signal:${intent.level}`;
    case "call":
      return `call:${intent.decision}`;
  }
}

export function dispatchIntent(
  engine: GameEngine,
  intent: EngineIntent
): PublicState {
  switch (intent.type) {
    case "start":
      return engine.clickStart(intent.role);
    case "reveal":
      return engine.clickRevealCard(intent.role, intent.cardIndex);
    case "signal":
      return engine.signal(intent.level);
    case "call":
      return engine.call(intent.decision, {
        claimedTruth: intent.claimedTruth,
      });
    case "next-round":
      return engine.clickNextRound(intent.role);
  }
}

/**
 * Validates a raw UI intent and applies it to the engine.
 *
 * Rejected actions come back as `{ success: false }` with the engine's reason;
 * anything that is not a recoverable engine error (a failing logger, say)
 * propagates to the caller.
 */
export function handleEngineIntent(
  engine: GameEngine,
  raw: unknown,
  options: HandleIntentOptions = {}
): IntentResult {
  const parsed = EngineIntentSchema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "intent"}: ${issue.message}`)
      .join("; ");
    console.warn(`[intent] Rejected malformed intent: ${reason}`);
    return { success: false, code: "INVALID_INTENT", reason };
  }

  const intent = parsed.data;
  if (options.debouncer && !options.debouncer.allow(intentKey(intent))) {
    if (options.verbose) {
      console.log(`[intent] Debounced ${intentKey(intent)}`);
    }
    return { success: true, state: engine.getPublicState() };
  }

  try {
    const state = dispatchIntent(engine, intent);
    if (options.verbose) {
      console.log(
        `[intent] Applied ${intent.type} -> round ${state.roundIndex}, phase ${state.phase}`
      );
    }
    return { success: true, state };
  } catch (err) {
    if (isRecoverableEngineError(err)) {
      console.warn(`[intent] Rejected ${intent.type}: ${err.message}`);
      return { success: false, code: err.code, reason: err.message };
    }
    throw err;
  }
}
