// Centralized environment configuration with defaults
import dotenv from "dotenv";
import {
  SessionConfigSchema,
  type SessionConfig,
  type SessionConfigInput,
} from "../../shared/schemas.js";

// Load environment variables early so that any module importing config picks up .env values.
dotenv.config();

export interface EnvironmentConfig {
  sessionId: string;
  schedulePath: string;
  logDir: string;
  block: number;
  condition: string;
  payoutEnabled: boolean;
  pointsPerWin: number;
  payoutStartPoints: number;
  debounceMs: number;
}

const DEFAULTS = {
  sessionId: "session-1",
  schedulePath: "data/schedule.example.csv",
  logDir: "logs",
  block: 1,
  condition: "no_payout",
  pointsPerWin: 3,
  payoutStartPoints: 0,
  debounceMs: 50,
} as const;

function parseBooleanEnv(value: string | undefined): boolean {
  return value === "true" || value === "1";
}

function parseNumberEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function getEnvironmentConfig(
  env: NodeJS.ProcessEnv = process.env
): EnvironmentConfig {
  return {
    sessionId: env.SESSION_ID || DEFAULTS.sessionId,
    schedulePath: env.SCHEDULE_PATH || DEFAULTS.schedulePath,
    logDir: env.LOG_DIR || DEFAULTS.logDir,
    block: parseNumberEnv(env.BLOCK, DEFAULTS.block),
    condition: env.CONDITION || DEFAULTS.condition,
    payoutEnabled: parseBooleanEnv(env.PAYOUT_ENABLED),
    pointsPerWin: parseNumberEnv(env.POINTS_PER_WIN, DEFAULTS.pointsPerWin),
    payoutStartPoints: parseNumberEnv(
      env.PAYOUT_START_POINTS,
      DEFAULTS.payoutStartPoints
    ),
    debounceMs: parseNumberEnv(env.DEBOUNCE_MS, DEFAULTS.debounceMs),
  };
}

/** Digits of the session id as a number, e.g. "session-12" -> 12. */
export function deriveSessionNumber(sessionId: string): number | null {
  const digits = Array.from(sessionId)
    .filter((ch) => ch >= "0" && ch <= "9")
    .join("");
  return digits ? Number.parseInt(digits, 10) : null;
}

/**
 * Validates session options; the session number falls back to the digits in
 * the session id.
 */
export function resolveSessionConfig(input: SessionConfigInput): SessionConfig {
  const parsed = SessionConfigSchema.parse(input);
  return {
    ...parsed,
    sessionNumber: parsed.sessionNumber ?? deriveSessionNumber(parsed.sessionId),
  };
}

export function sessionConfigFromEnvironment(
  config: EnvironmentConfig = getEnvironmentConfig()
): SessionConfig {
  return resolveSessionConfig({
    sessionId: config.sessionId,
    schedulePath: config.schedulePath,
    logDir: config.logDir,
    block: config.block,
    condition: config.condition,
    payout: config.payoutEnabled,
    pointsPerWin: config.pointsPerWin,
    payoutStartPoints: config.payoutStartPoints,
  });
}

export function getEnvironmentVariablesInfo(
  env: NodeJS.ProcessEnv = process.env
): Array<{
  key: string;
  value: string;
  defaultValue: string;
  isSet: boolean;
}> {
  const config = getEnvironmentConfig(env);

  return [
    {
      key: "SESSION_ID",
      value: config.sessionId,
      defaultValue: DEFAULTS.sessionId,
      isSet: Boolean(env.SESSION_ID),
    },
    {
      key: "SCHEDULE_PATH",
      value: config.schedulePath,
      defaultValue: DEFAULTS.schedulePath,
      isSet: Boolean(env.SCHEDULE_PATH),
    },
    {
      key: "LOG_DIR",
      value: config.logDir,
      defaultValue: DEFAULTS.logDir,
      isSet: Boolean(env.LOG_DIR),
    },
    {
      key: "BLOCK",
      value: String(config.block),
      defaultValue: String(DEFAULTS.block),
      isSet: Boolean(env.BLOCK),
    },
    {
      key: "CONDITION",
      value: config.condition,
      defaultValue: DEFAULTS.condition,
      isSet: Boolean(env.CONDITION),
    },
    {
      key: "PAYOUT_ENABLED",
      value: config.payoutEnabled ? "true" : "false",
      defaultValue: "false",
      isSet: Boolean(env.PAYOUT_ENABLED),
    },
    {
      key: "POINTS_PER_WIN",
      value: String(config.pointsPerWin),
      defaultValue: String(DEFAULTS.pointsPerWin),
      isSet: Boolean(env.POINTS_PER_WIN),
    },
    {
      key: "PAYOUT_START_POINTS",
      value: String(config.payoutStartPoints),
      defaultValue: String(DEFAULTS.payoutStartPoints),
      isSet: Boolean(env.PAYOUT_START_POINTS),
    },
    {
      key: "DEBOUNCE_MS",
      value: String(config.debounceMs),
      defaultValue: String(DEFAULTS.debounceMs),
      isSet: Boolean(env.DEBOUNCE_MS),
    },
  ];
}
