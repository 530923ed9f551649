/**
 * Tri-state result of an environment probe (an env variable, a filesystem
 * check). The indeterminate case carries the error for diagnostics.
 */

import type { ProbeError } from "../errors/base.js";

export type ProbeResult =
  | { readonly status: "true" }
  | { readonly status: "false" }
  | { readonly status: "indeterminate"; readonly error: ProbeError };

export function probeTrue(): ProbeResult {
  return { status: "true" };
}

export function probeFalse(): ProbeResult {
  return { status: "false" };
}

export function probeIndeterminate(error: ProbeError): ProbeResult {
  return { status: "indeterminate", error };
}

export function probeFromBoolean(value: boolean): ProbeResult {
  return value ? probeTrue() : probeFalse();
}
