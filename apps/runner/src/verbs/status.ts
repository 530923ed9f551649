/**
 * Status verb - report how the environment gate sees this process.
 */

import { Errno, type ProbeResult } from "@verbgate/sdk";
import { getenvBool } from "@verbgate/shared";
import { isRunningInChrootOrOffline, runningInChroot } from "@verbgate/core";
import type { RunnerContext } from "./context.js";

function describeOverride(result: ProbeResult): string {
  switch (result.status) {
    case "true":
      return "true";
    case "false":
      return "false";
    case "indeterminate":
      return result.error.errno === Errno.ENXIO ? "unset" : "invalid";
  }
}

function describeChroot(result: ProbeResult): string {
  switch (result.status) {
    case "true":
      return "yes";
    case "false":
      return "no";
    case "indeterminate":
      return "unknown";
  }
}

export function statusVerb(_args: readonly string[], ctx: RunnerContext): number {
  const { config, env, logger } = ctx;

  const override = getenvBool(config.offlineVariable, env);
  const chroot = runningInChroot({ env, ignoreChrootVariable: config.ignoreChrootVariable });
  const offline = isRunningInChrootOrOffline({ env, config, logger });

  ctx.print(`Offline override (${config.offlineVariable}): ${describeOverride(override)}`);
  ctx.print(`Chroot detected: ${describeChroot(chroot)}`);
  ctx.print(`Online-only verbs: ${offline ? "skipped" : "enabled"}`);
  return 0;
}
