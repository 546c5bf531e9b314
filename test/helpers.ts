import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { Call, RoundPlan, SignalLevel } from "../shared/schemas.js";
import { GameEngine, type StakesOptions } from "../backend/src/engine.js";
import {
  MemoryEventLog,
  type EventLogger,
  type RoundRecorder,
} from "../backend/src/event-log.js";
import { RoundSchedule } from "../backend/src/schedule.js";

export const FIXED_ISO = "2024-01-01T00:00:00.000Z";
export const fixedClock = () => new Date(FIXED_ISO);

export function plan(
  vp1: [number, number],
  vp2: [number, number]
): RoundPlan {
  return { identityCards: { VP1: vp1, VP2: vp2 } };
}

export function createEngine(
  plans: RoundPlan[],
  options: {
    stakes?: StakesOptions | null;
    recorders?: RoundRecorder[];
    logger?: EventLogger;
  } = {}
): { engine: GameEngine; log: MemoryEventLog } {
  const log = new MemoryEventLog(fixedClock);
  const engine = new GameEngine({
    schedule: new RoundSchedule(plans),
    logger: options.logger ?? log,
    recorders: options.recorders,
    stakes: options.stakes,
  });
  return { engine, log };
}

export function startBoth(engine: GameEngine): void {
  engine.clickStart("P1");
  engine.clickStart("P2");
}

export function revealAll(engine: GameEngine): void {
  engine.clickRevealCard("P1", 0);
  engine.clickRevealCard("P2", 0);
  engine.clickRevealCard("P1", 1);
  engine.clickRevealCard("P2", 1);
}

/** Reveal, signal and call; the round must already be dealing. */
export function playRound(
  engine: GameEngine,
  level: SignalLevel,
  decision: Call
): void {
  revealAll(engine);
  engine.signal(level);
  engine.call(decision);
}

export function nextRound(engine: GameEngine): void {
  engine.clickNextRound("P1");
  engine.clickNextRound("P2");
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "tabletop-bluff-"));
}
