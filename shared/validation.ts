import { z } from "zod";
import { PublicStateSchema } from "./schemas.js";

export const EngineErrorCodeSchema = z.enum([
  "SCHEDULE_FORMAT",
  "SCHEDULE_EMPTY",
  "ILLEGAL_ACTION",
  "SEQUENCE_VIOLATION",
  "ALREADY_SET",
  "INVALID_ARGUMENT",
  "INVALID_INTENT",
]);

export const IntentResultSchema = z.discriminatedUnion("success", [
  z.object({
    success: z.literal(true),
    state: PublicStateSchema,
  }),
  z.object({
    success: z.literal(false),
    code: EngineErrorCodeSchema,
    reason: z.string(),
  }),
]);

export type EngineErrorCode = z.infer<typeof EngineErrorCodeSchema>;
export type IntentResult = z.infer<typeof IntentResultSchema>;
