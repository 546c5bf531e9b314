import type { CardIndex, Phase, Role } from "../../shared/schemas.js";
import type { EngineErrorCode } from "../../shared/validation.js";

/**
 * Base class for every error the engine raises on purpose.
 *
 * `recoverable` errors are rejected player actions: the engine state is
 * untouched and the UI may re-prompt. Schedule errors are fatal at load time.
 */
export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly recoverable: boolean;

  constructor(code: EngineErrorCode, message: string, recoverable: boolean) {
    super(message);
    this.name = "EngineError";
    this.code = code;
    this.recoverable = recoverable;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ScheduleFormatError extends EngineError {
  readonly row: number;
  readonly window: string;

  constructor(row: number, window: string, detail?: string) {
    super(
      "SCHEDULE_FORMAT",
      detail ?? `Row ${row}: fewer than two cards in ${window}`,
      false
    );
    this.name = "ScheduleFormatError";
    this.row = row;
    this.window = window;
  }
}

export class ScheduleEmptyError extends EngineError {
  constructor(message = "No rounds found in schedule") {
    super("SCHEDULE_EMPTY", message, false);
    this.name = "ScheduleEmptyError";
  }
}

export class IllegalActionError extends EngineError {
  readonly phase: Phase;
  readonly action: string;

  constructor(action: string, phase: Phase) {
    super("ILLEGAL_ACTION", `Action "${action}" not allowed in phase ${phase}`, true);
    this.name = "IllegalActionError";
    this.action = action;
    this.phase = phase;
  }
}

export class SequenceViolationError extends EngineError {
  readonly expected: { role: Role; cardIndex: CardIndex } | null;

  constructor(expected: { role: Role; cardIndex: CardIndex } | null) {
    super(
      "SEQUENCE_VIOLATION",
      expected
        ? `Out of order: next reveal is ${expected.role}, card ${expected.cardIndex + 1}`
        : "All cards are already revealed",
      true
    );
    this.name = "SequenceViolationError";
    this.expected = expected;
  }
}

export class AlreadySetError extends EngineError {
  readonly field: "signal" | "call";

  constructor(field: "signal" | "call") {
    super("ALREADY_SET", `The ${field} for this round is already set`, true);
    this.name = "AlreadySetError";
    this.field = field;
  }
}

export class InvalidArgumentError extends EngineError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message, true);
    this.name = "InvalidArgumentError";
  }
}

export function isRecoverableEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError && err.recoverable;
}
