/**
 * Boolean parsing for environment variables.
 */

import {
  Errno,
  ProbeError,
  probeFalse,
  probeIndeterminate,
  probeTrue,
  type ProbeResult,
} from "@verbgate/sdk";

const TRUE_WORDS = new Set(["1", "yes", "y", "true", "t", "on"]);
const FALSE_WORDS = new Set(["0", "no", "n", "false", "f", "off"]);

/**
 * Parse a boolean word, case-insensitively.
 *
 *   parseBoolean("Yes") → { status: "true" }
 *   parseBoolean("off") → { status: "false" }
 *   parseBoolean("maybe") → indeterminate (EINVAL)
 */
export function parseBoolean(value: string, source = "boolean"): ProbeResult {
  const word = value.toLowerCase();
  if (TRUE_WORDS.has(word)) return probeTrue();
  if (FALSE_WORDS.has(word)) return probeFalse();
  return probeIndeterminate(
    new ProbeError(source, `Invalid boolean value "${value}"`, { errno: Errno.EINVAL }),
  );
}

/**
 * Read a boolean environment variable. Unset is indeterminate (ENXIO) so
 * callers can tell "not configured" apart from an explicit false.
 */
export function getenvBool(name: string, env: NodeJS.ProcessEnv = process.env): ProbeResult {
  const value = env[name];
  if (value === undefined) {
    return probeIndeterminate(
      new ProbeError(name, "Variable is not set", { errno: Errno.ENXIO }),
    );
  }
  return parseBoolean(value, name);
}
