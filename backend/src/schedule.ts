import fs from "node:fs";
import Papa from "papaparse";
import type { Hand, Identity, RoundPlan } from "../../shared/schemas.js";
import { ScheduleEmptyError, ScheduleFormatError } from "./errors.js";
import { isExpectedTotal } from "./hand.js";

interface CardWindow {
  identity: Identity;
  /** 0-based, end exclusive. */
  start: number;
  end: number;
  label: string;
}

// Columns 2-5 hold VP1's cards, columns 8-11 VP2's (1-based, inclusive).
export const CARD_WINDOWS: readonly CardWindow[] = [
  { identity: "VP1", start: 1, end: 5, label: "columns 2-5" },
  { identity: "VP2", start: 7, end: 11, label: "columns 8-11" },
];

const INTEGER_CELL = /^[+-]?\d+$/;

function isBlankRow(row: readonly string[]): boolean {
  return row.every((cell) => (cell ?? "").trim() === "");
}

function parseTwo(
  row: readonly string[],
  window: CardWindow,
  rowNumber: number
): Hand {
  const values: number[] = [];
  for (let i = window.start; i < Math.min(window.end, row.length); i++) {
    const cell = (row[i] ?? "").trim();
    if (!INTEGER_CELL.test(cell)) continue;
    values.push(Number.parseInt(cell, 10));
    if (values.length === 2) break;
  }
  if (values.length < 2) {
    throw new ScheduleFormatError(rowNumber, window.label);
  }
  return [values[0], values[1]];
}

function parsePlan(row: readonly string[], rowNumber: number): RoundPlan {
  const [vp1Window, vp2Window] = CARD_WINDOWS;
  return freezePlan({
    VP1: parseTwo(row, vp1Window, rowNumber),
    VP2: parseTwo(row, vp2Window, rowNumber),
  });
}

function freezePlan(cards: Record<Identity, Hand>): RoundPlan {
  return Object.freeze({
    identityCards: Object.freeze({
      VP1: Object.freeze([cards.VP1[0], cards.VP1[1]] as const),
      VP2: Object.freeze([cards.VP2[0], cards.VP2[1]] as const),
    }),
  });
}

function warnUnexpectedTotals(plan: RoundPlan, rowNumber: number): void {
  for (const identity of ["VP1", "VP2"] as const) {
    const [a, b] = plan.identityCards[identity];
    if (!isExpectedTotal(a, b)) {
      console.warn(
        `[schedule] Row ${rowNumber}: ${identity} total ${a + b} is outside 14-22; ` +
          `category folded to ${a + b >= 16 ? "medium" : "low"}`
      );
    }
  }
}

/**
 * Ordered, immutable list of per-round card assignments.
 *
 * CSV: one round per row. The first two integer cells of each identity's
 * column window are that identity's cards. A first row that does not parse
 * as data is treated as a header.
 */
export class RoundSchedule {
  readonly rounds: readonly RoundPlan[];

  constructor(plans: readonly RoundPlan[]) {
    if (plans.length === 0) {
      throw new ScheduleEmptyError();
    }
    this.rounds = Object.freeze(
      plans.map((plan) => freezePlan(plan.identityCards))
    );
  }

  get length(): number {
    return this.rounds.length;
  }

  at(index: number): RoundPlan | undefined {
    return this.rounds[index];
  }

  static fromRows(rows: readonly (readonly string[])[]): RoundSchedule {
    let start = 0;
    try {
      parsePlan(rows[0] ?? [], 1);
    } catch {
      start = 1;
    }

    const plans: RoundPlan[] = [];
    for (let i = start; i < rows.length; i++) {
      const row = rows[i];
      if (row.length === 0 || isBlankRow(row)) continue;
      const plan = parsePlan(row, i + 1);
      warnUnexpectedTotals(plan, i + 1);
      plans.push(plan);
    }

    if (plans.length === 0) {
      throw new ScheduleEmptyError();
    }
    return new RoundSchedule(plans);
  }

  static fromCsv(text: string): RoundSchedule {
    const result = Papa.parse<string[]>(text, {
      delimiter: ",",
      skipEmptyLines: false,
    });
    const quoteError = result.errors.find((err) => err.type === "Quotes");
    if (quoteError) {
      const rowNumber = (quoteError.row ?? 0) + 1;
      throw new ScheduleFormatError(
        rowNumber,
        "row",
        `Row ${rowNumber}: ${quoteError.message}`
      );
    }
    return RoundSchedule.fromRows(result.data);
  }

  static fromFile(filePath: string): RoundSchedule {
    const raw = fs.readFileSync(filePath, "utf8");
    return RoundSchedule.fromCsv(raw);
  }
}
