import type {
  Actor,
  Call,
  CardIndex,
  EventPayload,
  EventRecord,
  Identity,
  Phase,
  PublicState,
  Role,
  Scores,
  SignalLevel,
} from "../../shared/schemas.js";
import {
  AlreadySetError,
  IllegalActionError,
  InvalidArgumentError,
  SequenceViolationError,
} from "./errors.js";
import type { EventLogger, RoundRecorder } from "./event-log.js";
import { handCategoryLabel, handValue } from "./hand.js";
import { resolveOutcome } from "./outcome.js";
import {
  INITIAL_ROLES,
  allRevealed,
  cardsOf,
  createRoundState,
  identityOf,
  markRevealed,
  nextReveal,
  swapRoles,
  type RoundState,
} from "./round-state.js";
import type { RoundSchedule } from "./schedule.js";

export interface StakesOptions {
  /** Points the winning identity earns per decided round. */
  pointsPerWin: number;
  startPoints?: number;
}

export interface GameEngineOptions {
  schedule: RoundSchedule;
  logger: EventLogger;
  recorders?: RoundRecorder[];
  /** Omit or pass `null` to play without stakes. */
  stakes?: StakesOptions | null;
}

export interface CallOptions {
  /** What the UI believes P1's truthfulness was; logged when it disagrees. */
  claimedTruth?: boolean;
}

function isCardIndex(value: number): value is CardIndex {
  return value === 0 || value === 1;
}

/**
 * Round state machine for the bluffing experiment.
 *
 * Every public action validates fully before touching state, commits the
 * resulting state once, then logs each step under the phase it belongs to.
 * Calls are expected to be serialized by the caller.
 */
export class GameEngine {
  private readonly schedule: RoundSchedule;
  private readonly logger: EventLogger;
  private readonly recorders: RoundRecorder[];
  private readonly pointsPerWin: number | null;
  private current: RoundState;
  private scores: Record<Identity, number> | null;

  constructor({ schedule, logger, recorders, stakes }: GameEngineOptions) {
    if (stakes && (!Number.isInteger(stakes.pointsPerWin) || stakes.pointsPerWin <= 0)) {
      throw new InvalidArgumentError(
        `pointsPerWin must be a positive integer, got ${stakes.pointsPerWin}`
      );
    }
    const startPoints = stakes?.startPoints ?? 0;
    if (!Number.isInteger(startPoints) || startPoints < 0) {
      throw new InvalidArgumentError(
        `startPoints must be a non-negative integer, got ${startPoints}`
      );
    }

    this.schedule = schedule;
    this.logger = logger;
    this.recorders = recorders ?? [];
    this.pointsPerWin = stakes ? stakes.pointsPerWin : null;
    this.scores = stakes ? { VP1: startPoints, VP2: startPoints } : null;
    this.current = createRoundState(
      0,
      schedule.rounds[0],
      INITIAL_ROLES,
      "WAITING_START"
    );
  }

  get phase(): Phase {
    return this.current.phase;
  }

  get roundIndex(): number {
    return this.current.index;
  }

  get isFinished(): boolean {
    return this.current.phase === "FINISHED";
  }

  getScores(): Scores | null {
    return this.scoreSnapshot();
  }

  // --- Player actions ---

  /** Both seats press "start"; only round 0 waits for this. */
  clickStart(role: Role): PublicState {
    this.ensurePhase("start", "WAITING_START");
    if (this.current.ready[role]) {
      return this.getPublicState();
    }

    const ready = { ...this.current.ready, [role]: true };
    const bothReady = ready.P1 && ready.P2;
    this.commit({
      ...this.current,
      ready,
      phase: bothReady ? "DEALING" : "WAITING_START",
    });

    this.emit(this.current, "WAITING_START", role, "start_click", {});
    if (bothReady) {
      this.emit(this.current, "DEALING", "SYS", "phase_change", { to: "DEALING" });
    }
    return this.getPublicState();
  }

  clickRevealCard(role: Role, cardIndex: number): PublicState {
    this.ensurePhase("reveal_card", "DEALING");
    if (!isCardIndex(cardIndex)) {
      throw new InvalidArgumentError(`cardIndex must be 0 or 1, got ${cardIndex}`);
    }
    const expected = nextReveal(this.current.visible);
    if (
      expected === null ||
      expected.role !== role ||
      expected.cardIndex !== cardIndex
    ) {
      throw new SequenceViolationError(expected);
    }

    const visible = markRevealed(this.current.visible, expected);
    const done = allRevealed(visible);
    this.commit({
      ...this.current,
      visible,
      phase: done ? "SIGNAL_WAIT" : "DEALING",
    });

    // Value comes from the identity holding the role this round.
    const cards = cardsOf(this.current, role);
    this.emit(this.current, "DEALING", role, "reveal_card", {
      cardIndex,
      value: cards[cardIndex],
      identity: identityOf(this.current, role),
    });
    if (done) {
      this.emit(this.current, "SIGNAL_WAIT", "SYS", "phase_change", {
        to: "SIGNAL_WAIT",
      });
    }
    return this.getPublicState();
  }

  /** P1's claim about the strength of their hand. */
  signal(level: SignalLevel): PublicState {
    if (this.current.signal !== null && !this.isFinished) {
      throw new AlreadySetError("signal");
    }
    this.ensurePhase("signal", "SIGNAL_WAIT");

    this.commit({ ...this.current, signal: level, phase: "CALL_WAIT" });
    this.emit(this.current, "SIGNAL_WAIT", "P1", "signal", {
      level,
      identity: identityOf(this.current, "P1"),
    });
    this.emit(this.current, "CALL_WAIT", "SYS", "phase_change", {
      to: "CALL_WAIT",
    });
    return this.getPublicState();
  }

  /** P2's verdict; resolves, scores and closes the round. */
  call(decision: Call, options: CallOptions = {}): PublicState {
    if (this.current.call !== null && !this.isFinished) {
      throw new AlreadySetError("call");
    }
    this.ensurePhase("call", "CALL_WAIT");

    const { plan, roles, signal } = this.current;
    const outcome = resolveOutcome({ plan, roles, signal, call: decision });

    this.scores = this.awardPoints(outcome.winner);
    this.commit({
      ...this.current,
      call: decision,
      winner: outcome.winner,
      outcomeReason: outcome.reason,
      phase: "ROUND_DONE",
    });

    const callPayload: EventPayload = {
      call: decision,
      identity: roles.P2,
      outcome: outcome.kind,
    };
    if (outcome.truth !== null) {
      callPayload.p1_truth = outcome.truth;
    }
    if (
      options.claimedTruth !== undefined &&
      outcome.truth !== null &&
      options.claimedTruth !== outcome.truth
    ) {
      callPayload.p1_truth_ui = options.claimedTruth;
    }
    if (outcome.winner !== null) {
      callPayload.winner = outcome.winner;
    }
    const scores = this.scoreSnapshot();
    if (scores) {
      callPayload.scores = { ...scores };
    }
    this.emit(this.current, "CALL_WAIT", "P2", "call", callPayload);

    const vp1 = plan.identityCards.VP1;
    const vp2 = plan.identityCards.VP2;
    this.emit(this.current, "REVEAL_SCORE", "SYS", "reveal_and_score", {
      winner: outcome.winner,
      reason: outcome.reason,
      vp1Cards: [vp1[0], vp1[1]],
      vp2Cards: [vp2[0], vp2[1]],
      vp1Value: handValue(vp1[0], vp1[1]),
      vp2Value: handValue(vp2[0], vp2[1]),
      vp1Category: handCategoryLabel(vp1[0], vp1[1]),
      vp2Category: handCategoryLabel(vp2[0], vp2[1]),
      roles: { P1: roles.P1, P2: roles.P2 },
    });
    for (const recorder of this.recorders) {
      recorder.flush?.();
    }

    this.emit(this.current, "ROUND_DONE", "SYS", "phase_change", {
      to: "ROUND_DONE",
    });
    return this.getPublicState();
  }

  /** Both seats press "next round"; roles swap for the following round. */
  clickNextRound(role: Role): PublicState {
    this.ensurePhase("next_round", "ROUND_DONE");
    if (this.current.nextReady[role]) {
      return this.getPublicState();
    }

    const closing: RoundState = {
      ...this.current,
      nextReady: { ...this.current.nextReady, [role]: true },
    };
    if (!(closing.nextReady.P1 && closing.nextReady.P2)) {
      this.commit(closing);
      this.emit(closing, "ROUND_DONE", role, "next_round_click", {});
      return this.getPublicState();
    }

    const plan = this.schedule.at(closing.index + 1);
    if (!plan) {
      this.commit({ ...closing, phase: "FINISHED" });
      this.emit(closing, "ROUND_DONE", role, "next_round_click", {});
      this.emit(this.current, "FINISHED", "SYS", "phase_change", {
        to: "FINISHED",
      });
      return this.getPublicState();
    }

    // Later rounds skip the start handshake and open with dealing.
    const roles = swapRoles(closing.roles);
    this.commit(createRoundState(closing.index + 1, plan, roles, "DEALING"));
    this.emit(closing, "ROUND_DONE", role, "next_round_click", {});
    this.emit(this.current, "DEALING", "SYS", "phase_change", {
      to: "DEALING",
      roles: { P1: roles.P1, P2: roles.P2 },
    });
    return this.getPublicState();
  }

  getPublicState(): PublicState {
    const rs = this.current;
    const visibleValues = (role: Role): [number | null, number | null] => {
      const cards = cardsOf(rs, role);
      const flags = rs.visible[role];
      return [flags[0] ? cards[0] : null, flags[1] ? cards[1] : null];
    };
    const scores = this.scoreSnapshot();

    return {
      roundIndex: rs.index,
      totalRounds: this.schedule.length,
      phase: rs.phase,
      roles: { P1: rs.roles.P1, P2: rs.roles.P2 },
      ready: { P1: rs.ready.P1, P2: rs.ready.P2 },
      nextReady: { P1: rs.nextReady.P1, P2: rs.nextReady.P2 },
      revealed: {
        P1: [rs.visible.P1[0], rs.visible.P1[1]],
        P2: [rs.visible.P2[0], rs.visible.P2[1]],
      },
      visibleCards: { P1: visibleValues("P1"), P2: visibleValues("P2") },
      signal: rs.signal,
      call: rs.call,
      winner: rs.winner,
      winnerIdentity: rs.winner ? rs.roles[rs.winner] : null,
      outcomeReason: rs.outcomeReason,
      scores: scores ? { ...scores } : null,
      isFinished: rs.phase === "FINISHED",
    };
  }

  close(): void {
    for (const recorder of this.recorders) {
      recorder.close?.();
    }
    this.logger.close?.();
  }

  // --- Internals ---

  private ensurePhase(action: string, allowed: Phase): void {
    if (this.current.phase !== allowed) {
      throw new IllegalActionError(action, this.current.phase);
    }
  }

  // One commit per action, before the first record is emitted.
  private commit(next: RoundState): void {
    this.current = next;
  }

  private awardPoints(winner: Role | null): Record<Identity, number> | null {
    if (this.scores === null || this.pointsPerWin === null || winner === null) {
      return this.scores;
    }
    const identity = identityOf(this.current, winner);
    return {
      ...this.scores,
      [identity]: this.scores[identity] + this.pointsPerWin,
    };
  }

  private scoreSnapshot(): Scores | null {
    return this.scores ? { VP1: this.scores.VP1, VP2: this.scores.VP2 } : null;
  }

  private emit(
    round: RoundState,
    phase: Phase,
    actor: Actor,
    action: string,
    payload: EventPayload
  ): EventRecord {
    const record = this.logger.log(round.index, phase, actor, action, payload);
    const scores = this.scoreSnapshot();
    for (const recorder of this.recorders) {
      recorder.record({ record, round, scores });
    }
    return record;
  }
}
