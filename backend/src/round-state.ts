import type {
  Call,
  CardIndex,
  Hand,
  Identity,
  Phase,
  Role,
  RoleMap,
  RoundPlan,
  SignalLevel,
} from "../../shared/schemas.js";

export type RevealFlags = readonly [boolean, boolean];

/** Which of each role's two cards are face up. Flags only ever go true. */
export interface VisibleCardState {
  readonly P1: RevealFlags;
  readonly P2: RevealFlags;
}

export interface RevealStep {
  role: Role;
  cardIndex: CardIndex;
}

export const REVEAL_ORDER: readonly RevealStep[] = [
  { role: "P1", cardIndex: 0 },
  { role: "P2", cardIndex: 0 },
  { role: "P1", cardIndex: 1 },
  { role: "P2", cardIndex: 1 },
];

export interface RoundState {
  readonly index: number;
  readonly plan: RoundPlan;
  readonly roles: RoleMap;
  readonly phase: Phase;
  /** "start" presses, round 0 only. */
  readonly ready: Readonly<Record<Role, boolean>>;
  /** "next round" presses. */
  readonly nextReady: Readonly<Record<Role, boolean>>;
  readonly visible: VisibleCardState;
  readonly signal: SignalLevel | null;
  readonly call: Call | null;
  readonly winner: Role | null;
  readonly outcomeReason: string | null;
}

export const INITIAL_ROLES: RoleMap = Object.freeze({ P1: "VP1", P2: "VP2" });

const HIDDEN: RevealFlags = [false, false];

export function createRoundState(
  index: number,
  plan: RoundPlan,
  roles: RoleMap,
  phase: Phase
): RoundState {
  return {
    index,
    plan,
    roles: Object.freeze({ P1: roles.P1, P2: roles.P2 }),
    phase,
    ready: { P1: false, P2: false },
    nextReady: { P1: false, P2: false },
    visible: { P1: HIDDEN, P2: HIDDEN },
    signal: null,
    call: null,
    winner: null,
    outcomeReason: null,
  };
}

/** The next round's map is the exact inverse of this one. */
export function swapRoles(roles: RoleMap): RoleMap {
  return Object.freeze({ P1: roles.P2, P2: roles.P1 });
}

export function otherRole(role: Role): Role {
  return role === "P1" ? "P2" : "P1";
}

export function identityOf(state: RoundState, role: Role): Identity {
  return state.roles[role];
}

export function roleOf(state: RoundState, identity: Identity): Role {
  return state.roles.P1 === identity ? "P1" : "P2";
}

/** Cards of the identity currently sitting in `role`. */
export function cardsOf(state: RoundState, role: Role): Hand {
  return state.plan.identityCards[identityOf(state, role)];
}

export function nextReveal(visible: VisibleCardState): RevealStep | null {
  return (
    REVEAL_ORDER.find((step) => !visible[step.role][step.cardIndex]) ?? null
  );
}

export function allRevealed(visible: VisibleCardState): boolean {
  return nextReveal(visible) === null;
}

export function markRevealed(
  visible: VisibleCardState,
  step: RevealStep
): VisibleCardState {
  const flags = visible[step.role];
  const updated: RevealFlags =
    step.cardIndex === 0 ? [true, flags[1]] : [flags[0], true];
  return { ...visible, [step.role]: updated };
}
