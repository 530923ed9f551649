/**
 * Zod schema for dispatch configuration.
 *
 * Names the environment variables the environment gate consults, so a host
 * tool can brand them (e.g. MYTOOL_OFFLINE) without code changes.
 */

import { z } from "zod";
import { ConfigError } from "@verbgate/sdk";
import { validateInput } from "./validation.js";

const ENV_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const DEFAULT_OFFLINE_VARIABLE = "VERBGATE_OFFLINE";
export const DEFAULT_IGNORE_CHROOT_VARIABLE = "VERBGATE_IGNORE_CHROOT";

export const DispatchConfigSchema = z.object({
  offlineVariable: z
    .string()
    .regex(ENV_NAME, "Must be a valid environment variable name")
    .default(DEFAULT_OFFLINE_VARIABLE),
  ignoreChrootVariable: z
    .string()
    .regex(ENV_NAME, "Must be a valid environment variable name")
    .default(DEFAULT_IGNORE_CHROOT_VARIABLE),
  logLevel: z.enum(["debug", "info", "warn", "error"]).optional(),
}).strict();

export type DispatchConfig = z.infer<typeof DispatchConfigSchema>;

/** Validate raw configuration (parsed JSON, or nothing for all defaults). */
export function loadDispatchConfig(input: unknown = {}): DispatchConfig {
  const result = validateInput(DispatchConfigSchema, input);
  if (!result.success) {
    throw new ConfigError(`Invalid dispatch config: ${result.error}`);
  }
  return result.data;
}
