/**
 * Process configuration from environment variables.
 * Parsed once at start-up; invalid values fail fast.
 */

import { z } from "zod";
import { ValidationError } from "../domain/errors.js";

export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ServiceConfig {
  readonly logLevel: LogLevel;
  /** Re-check star invariants after every committed batch. */
  readonly verifyInvariants: boolean;
  /** First identifier handed out to new colonies, fleets and build requests. */
  readonly identifierStart: number;
}

const envSchema = z.object({
  STAR_LOG_LEVEL: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(LOG_LEVELS))
    .default("warn"),
  STAR_VERIFY_INVARIANTS: z.enum(["true", "false"]).default("true"),
  STAR_ID_START: z.coerce.number().int().positive().default(1),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(
      `Invalid configuration${issue ? ` (${issue.path.join(".")}): ${issue.message}` : ""}`,
      { issues: result.error.issues }
    );
  }
  const { STAR_LOG_LEVEL, STAR_VERIFY_INVARIANTS, STAR_ID_START } = result.data;
  return {
    logLevel: STAR_LOG_LEVEL,
    verifyInvariants: STAR_VERIFY_INVARIANTS === "true",
    identifierStart: STAR_ID_START,
  };
}
