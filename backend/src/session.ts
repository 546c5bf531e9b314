import type { SessionConfig, SessionConfigInput } from "../../shared/schemas.js";
import { resolveSessionConfig } from "./config.js";
import { GameEngine } from "./engine.js";
import { FileEventLog, type Clock } from "./event-log.js";
import { RoundSchedule } from "./schedule.js";
import { SessionCsvLogger } from "./session-csv.js";

export interface Session {
  config: SessionConfig;
  engine: GameEngine;
  eventLog: FileEventLog;
  roundCsv: SessionCsvLogger;
  close(): void;
}

/**
 * Loads the schedule and wires the file-backed event log and the per-session
 * round table into a fresh engine.
 */
export function createSession(
  input: SessionConfigInput,
  clock?: Clock
): Session {
  const config = resolveSessionConfig(input);
  const schedule = RoundSchedule.fromFile(config.schedulePath);

  const eventLog = new FileEventLog({
    sessionId: config.sessionId,
    logDir: config.logDir,
    clock,
  });
  const roundCsv = new SessionCsvLogger({
    logDir: config.logDir,
    sessionId: config.sessionId,
    sessionNumber: config.sessionNumber ?? null,
    block: config.block,
    condition: config.condition,
  });

  const engine = new GameEngine({
    schedule,
    logger: eventLog,
    recorders: [roundCsv],
    stakes: config.payout
      ? {
          pointsPerWin: config.pointsPerWin,
          startPoints: config.payoutStartPoints,
        }
      : null,
  });

  let closed = false;
  return {
    config,
    engine,
    eventLog,
    roundCsv,
    close() {
      if (closed) return;
      closed = true;
      engine.close();
    },
  };
}
