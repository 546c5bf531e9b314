import fs from "node:fs";
import path from "node:path";
import Papa from "papaparse";
import type { EventPayload } from "../../shared/schemas.js";
import type { RecordedEvent, RoundRecorder } from "./event-log.js";

export const SESSION_CSV_HEADER = [
  "Session",
  "Block",
  "Condition",
  "Round",
  "Player",
  "Identity",
  "Card1 VP1",
  "Card2 VP1",
  "Card1 VP2",
  "Card2 VP2",
  "Action",
  "Time",
  "Winner",
  "Score VP1",
  "Score VP2",
] as const;

type CsvCell = string | number;

export interface SessionCsvOptions {
  logDir: string;
  sessionId: string;
  sessionNumber: number | null;
  block: number;
  condition: string;
}

export function conditionSlug(condition: string): string {
  return Array.from(condition.toLowerCase())
    .map((ch) => (/[\p{L}\p{N}_-]/u.test(ch) ? ch : "_"))
    .join("");
}

export function sessionCsvFileName(
  sessionId: string,
  sessionNumber: number | null,
  condition: string
): string {
  const identifier = sessionNumber ?? sessionId;
  return `session_${identifier}_${conditionSlug(condition)}.csv`;
}

export function actionLabel(action: string, payload: EventPayload): string {
  switch (action) {
    case "start_click":
      return "Start";
    case "next_round_click":
      return "Next";
    case "signal":
      return typeof payload.level === "string" ? payload.level : "";
    case "call":
      return typeof payload.call === "string" ? payload.call : "";
    case "reveal_card":
      return typeof payload.cardIndex === "number"
        ? `Card ${payload.cardIndex + 1}`
        : action;
    case "phase_change":
      return `Phase -> ${typeof payload.to === "string" ? payload.to : ""}`;
    case "reveal_and_score":
      return "Reveal/Score";
    default:
      return action;
  }
}

/**
 * Per-session round table. Player events plus the system `reveal_and_score`
 * event become rows; rows are appended on `flush()`.
 */
export class SessionCsvLogger implements RoundRecorder {
  readonly filePath: string;
  private readonly options: SessionCsvOptions;
  private buffer: CsvCell[][] = [];
  private writeHeader: boolean;

  constructor(options: SessionCsvOptions) {
    this.options = options;
    this.filePath = path.join(
      options.logDir,
      sessionCsvFileName(
        options.sessionId,
        options.sessionNumber,
        options.condition
      )
    );
    const hasContent =
      fs.existsSync(this.filePath) && fs.statSync(this.filePath).size > 0;
    this.writeHeader = !hasContent;
  }

  record({ record, round, scores }: RecordedEvent): void {
    const { actor, action, payload } = record;
    if (actor === "SYS" && action !== "reveal_and_score") {
      return;
    }

    const vp1 = round.plan.identityCards.VP1;
    const vp2 = round.plan.identityCards.VP2;
    const payloadWinner =
      typeof payload.winner === "string" ? payload.winner : "";
    const winner = payloadWinner || (round.winner ?? "");

    this.buffer.push([
      this.options.sessionNumber ?? this.options.sessionId,
      this.options.block,
      this.options.condition,
      record.roundIndex + 1,
      actor === "SYS" ? "" : actor,
      actor === "SYS" ? "" : round.roles[actor],
      vp1[0],
      vp1[1],
      vp2[0],
      vp2[1],
      actionLabel(action, payload),
      record.tUtcIso,
      winner,
      scores ? scores.VP1 : "",
      scores ? scores.VP2 : "",
    ]);
  }

  /** Rows buffered but not yet written. */
  get pendingRows(): number {
    return this.buffer.length;
  }

  flush(): void {
    if (this.buffer.length === 0 && !this.writeHeader) {
      return;
    }
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });

    const rows: CsvCell[][] = this.writeHeader
      ? [[...SESSION_CSV_HEADER], ...this.buffer]
      : this.buffer;
    fs.appendFileSync(this.filePath, Papa.unparse(rows) + "\r\n", "utf8");
    this.writeHeader = false;
    this.buffer = [];
  }

  close(): void {
    this.flush();
  }
}
