import fs from "node:fs";
import path from "node:path";
import type {
  Actor,
  EventPayload,
  EventRecord,
  Phase,
  Scores,
} from "../../shared/schemas.js";
import type { RoundState } from "./round-state.js";

export type { EventRecord } from "../../shared/schemas.js";

/**
 * Logging collaborator consumed by the engine. `log` must return the record,
 * timestamp included, before the engine moves on.
 */
export interface EventLogger {
  log(
    roundIndex: number,
    phase: Phase,
    actor: Actor,
    action: string,
    payload: EventPayload
  ): EventRecord;
  close?(): void;
}

export interface RecordedEvent {
  record: EventRecord;
  round: RoundState;
  scores: Scores | null;
}

/** Receives every logged event together with the round it belongs to. */
export interface RoundRecorder {
  record(entry: RecordedEvent): void;
  /** Called once a round has been scored. */
  flush?(): void;
  close?(): void;
}

export type Clock = () => Date;

const systemClock: Clock = () => new Date();

function buildRecord(
  roundIndex: number,
  phase: Phase,
  actor: Actor,
  action: string,
  payload: EventPayload,
  now: Date
): EventRecord {
  return {
    roundIndex,
    phase,
    actor,
    action,
    payload: { ...payload },
    tUtcIso: now.toISOString(),
  };
}

export class MemoryEventLog implements EventLogger {
  private readonly records: EventRecord[] = [];

  constructor(private readonly clock: Clock = systemClock) {}

  log(
    roundIndex: number,
    phase: Phase,
    actor: Actor,
    action: string,
    payload: EventPayload
  ): EventRecord {
    const record = buildRecord(
      roundIndex,
      phase,
      actor,
      action,
      payload,
      this.clock()
    );
    this.records.push(record);
    return record;
  }

  getRecords(): readonly EventRecord[] {
    return this.records;
  }

  getRecordsForRound(roundIndex: number): EventRecord[] {
    return this.records.filter((record) => record.roundIndex === roundIndex);
  }

  clear(): void {
    this.records.length = 0;
  }
}

export interface FileEventLogOptions {
  sessionId: string;
  logDir: string;
  clock?: Clock;
}

/** Appends one JSON line per event to `events_<sessionId>.jsonl`. */
export class FileEventLog implements EventLogger {
  readonly filePath: string;
  private readonly sessionId: string;
  private readonly clock: Clock;
  private closed = false;

  constructor({ sessionId, logDir, clock }: FileEventLogOptions) {
    fs.mkdirSync(logDir, { recursive: true });
    this.sessionId = sessionId;
    this.clock = clock ?? systemClock;
    this.filePath = path.join(logDir, `events_${sessionId}.jsonl`);
  }

  log(
    roundIndex: number,
    phase: Phase,
    actor: Actor,
    action: string,
    payload: EventPayload
  ): EventRecord {
    if (this.closed) {
      throw new Error(`Event log ${this.filePath} is closed`);
    }
    const record = buildRecord(
      roundIndex,
      phase,
      actor,
      action,
      payload,
      this.clock()
    );
    const line = JSON.stringify({
      sessionId: this.sessionId,
      ...record,
      tMonoNs: process.hrtime.bigint().toString(),
    });
    fs.appendFileSync(this.filePath, line + "\n", "utf8");
    return record;
  }

  close(): void {
    this.closed = true;
  }
}
