import { describe, it } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";

import { FileEventLog, MemoryEventLog } from "../backend/src/event-log.js";
import { FIXED_ISO, fixedClock, makeTempDir } from "./helpers.js";

describe("MemoryEventLog", () => {
  it("returns the stamped record", () => {
    const log = new MemoryEventLog(fixedClock);
    const record = log.log(0, "WAITING_START", "P1", "start_click", {});
    assert.deepEqual(record, {
      roundIndex: 0,
      phase: "WAITING_START",
      actor: "P1",
      action: "start_click",
      payload: {},
      tUtcIso: FIXED_ISO,
    });
    assert.deepEqual(log.getRecords(), [record]);
  });

  it("copies the payload", () => {
    const log = new MemoryEventLog(fixedClock);
    const payload: Record<string, unknown> = { level: "high" };
    log.log(0, "SIGNAL_WAIT", "P1", "signal", payload);
    payload.level = "low";
    assert.deepEqual(log.getRecords()[0].payload, { level: "high" });
  });

  it("filters by round and clears", () => {
    const log = new MemoryEventLog(fixedClock);
    log.log(0, "ROUND_DONE", "P1", "next_round_click", {});
    log.log(1, "DEALING", "SYS", "phase_change", { to: "DEALING" });
    log.log(1, "DEALING", "P1", "reveal_card", { cardIndex: 0 });

    assert.deepEqual(
      log.getRecordsForRound(1).map((record) => record.action),
      ["phase_change", "reveal_card"]
    );
    log.clear();
    assert.equal(log.getRecords().length, 0);
  });
});

describe("FileEventLog", () => {
  it("appends one JSON line per event", () => {
    const dir = path.join(makeTempDir(), "nested");
    const log = new FileEventLog({ sessionId: "s1", logDir: dir, clock: fixedClock });
    assert.equal(log.filePath, path.join(dir, "events_s1.jsonl"));

    log.log(0, "WAITING_START", "P1", "start_click", {});
    log.log(0, "DEALING", "SYS", "phase_change", { to: "DEALING" });

    const lines = fs.readFileSync(log.filePath, "utf8").trimEnd().split("\n");
    assert.equal(lines.length, 2);

    const first: unknown = JSON.parse(lines[0]);
    assert.ok(first && typeof first === "object" && "tMonoNs" in first);
    const { tMonoNs, ...rest } = first;
    assert.match(String(tMonoNs), /^\d+$/);
    assert.deepEqual(rest, {
      sessionId: "s1",
      roundIndex: 0,
      phase: "WAITING_START",
      actor: "P1",
      action: "start_click",
      payload: {},
      tUtcIso: FIXED_ISO,
    });
    assert.deepEqual(JSON.parse(lines[1]).payload, { to: "DEALING" });
  });

  it("refuses to log after close", () => {
    const log = new FileEventLog({ sessionId: "s2", logDir: makeTempDir() });
    log.close();
    assert.throws(
      () => log.log(0, "WAITING_START", "P1", "start_click", {}),
      /is closed/
    );
  });
});
