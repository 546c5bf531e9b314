import { z } from "zod";

// --- Enumerations ---

export const PhaseSchema = z.enum([
  "WAITING_START", // round 0 only: both seats press "start"
  "DEALING", // reveal order: P1 card 1 -> P2 card 1 -> P1 card 2 -> P2 card 2
  "SIGNAL_WAIT", // P1 claims high / medium / low
  "CALL_WAIT", // P2 answers truth / bluff
  "REVEAL_SCORE", // both hands open, outcome scored
  "ROUND_DONE", // result shown, waiting for both "next round" presses
  "FINISHED", // schedule exhausted
]);

export type Phase = z.infer<typeof PhaseSchema>;

/** The seat acting in the current round. */
export const RoleSchema = z.enum(["P1", "P2"]);
export type Role = z.infer<typeof RoleSchema>;

/** The participant, fixed for the whole session. */
export const IdentitySchema = z.enum(["VP1", "VP2"]);
export type Identity = z.infer<typeof IdentitySchema>;

export const SignalLevelSchema = z.enum(["high", "medium", "low"]);
export type SignalLevel = z.infer<typeof SignalLevelSchema>;

export const CallSchema = z.enum(["truth", "bluff"]);
export type Call = z.infer<typeof CallSchema>;

export const ActorSchema = z.enum(["P1", "P2", "SYS"]);
export type Actor = z.infer<typeof ActorSchema>;

export const CardIndexSchema = z.union([z.literal(0), z.literal(1)]);
export type CardIndex = z.infer<typeof CardIndexSchema>;

// --- Round data ---

export type Hand = readonly [number, number];

/** Cards are bound to identities, never to roles. */
export interface RoundPlan {
  readonly identityCards: Readonly<Record<Identity, Hand>>;
}

export const RoleMapSchema = z.object({
  P1: IdentitySchema,
  P2: IdentitySchema,
});

export type RoleMap = Readonly<z.infer<typeof RoleMapSchema>>;

export type Scores = Readonly<Record<Identity, number>>;

// --- Event log ---

export const EventRecordSchema = z.object({
  roundIndex: z.number().int().nonnegative(),
  phase: PhaseSchema,
  actor: ActorSchema,
  action: z.string(),
  payload: z.record(z.string(), z.unknown()),
  tUtcIso: z.string(),
});

export type EventRecord = z.infer<typeof EventRecordSchema>;
export type EventPayload = Record<string, unknown>;

// --- Public snapshot (read by the rendering layer) ---

const PerRoleFlagsSchema = z.object({
  P1: z.boolean(),
  P2: z.boolean(),
});

const RevealFlagsSchema = z.tuple([z.boolean(), z.boolean()]);
const VisibleValuesSchema = z.tuple([
  z.number().int().nullable(),
  z.number().int().nullable(),
]);

export const PublicStateSchema = z.object({
  roundIndex: z.number().int().nonnegative(),
  totalRounds: z.number().int().positive(),
  phase: PhaseSchema,
  roles: RoleMapSchema,
  ready: PerRoleFlagsSchema,
  nextReady: PerRoleFlagsSchema,
  revealed: z.object({ P1: RevealFlagsSchema, P2: RevealFlagsSchema }),
  visibleCards: z.object({ P1: VisibleValuesSchema, P2: VisibleValuesSchema }),
  signal: SignalLevelSchema.nullable(),
  call: CallSchema.nullable(),
  winner: RoleSchema.nullable(),
  winnerIdentity: IdentitySchema.nullable(),
  outcomeReason: z.string().nullable(),
  scores: z.object({ VP1: z.number().int(), VP2: z.number().int() }).nullable(),
  isFinished: z.boolean(),
});

export type PublicState = z.infer<typeof PublicStateSchema>;

// --- Session configuration ---

export const SessionConfigSchema = z.object({
  sessionId: z.string().min(1),
  schedulePath: z.string().min(1),
  logDir: z.string().min(1).default("logs"),
  sessionNumber: z.number().int().nonnegative().nullable().optional(),
  block: z.number().int().positive().default(1),
  condition: z.string().min(1).default("no_payout"),
  payout: z.boolean().default(false),
  pointsPerWin: z.number().int().positive().default(3),
  payoutStartPoints: z.number().int().nonnegative().default(0),
});

export type SessionConfigInput = z.input<typeof SessionConfigSchema>;
export type SessionConfig = z.infer<typeof SessionConfigSchema>;

// --- Intents sent by the UI layer ---

export const StartIntentSchema = z.object({
  type: z.literal("start"),
  role: RoleSchema,
});

export const RevealIntentSchema = z.object({
  type: z.literal("reveal"),
  role: RoleSchema,
  cardIndex: z.number().int(),
});

export const SignalIntentSchema = z.object({
  type: z.literal("signal"),
  level: SignalLevelSchema,
});

export const CallIntentSchema = z.object({
  type: z.literal("call"),
  decision: CallSchema,
  claimedTruth: z.boolean().optional(),
});

export const NextRoundIntentSchema = z.object({
  type: z.literal("next-round"),
  role: RoleSchema,
});

export const EngineIntentSchema = z.discriminatedUnion("type", [
  StartIntentSchema,
  RevealIntentSchema,
  SignalIntentSchema,
  CallIntentSchema,
  NextRoundIntentSchema,
]);

export type EngineIntent = z.infer<typeof EngineIntentSchema>;
