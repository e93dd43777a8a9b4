import { z } from "zod";
import { DEFAULT_PORT } from "./constants";

/**
 * Runtime configuration read from environment variables.
 */

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().positive().default(DEFAULT_PORT),
  STRICT_VALIDATION: z
    .enum(["true", "false"])
    .default("false")
    .transform((value) => value === "true"),
});

export interface AppConfig {
  port: number;
  /** Reject requests that would fall back to a zero result instead of answering 0. */
  strictValidation: boolean;
}

/**
 * Parse configuration from an environment map.
 *
 * @throws ZodError when a variable is set to an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);
  return {
    port: parsed.PORT,
    strictValidation: parsed.STRICT_VALIDATION,
  };
}
