import type { RunnerContext } from "./context.js";

/** Only reached once the dispatcher's privilege check has passed. */
export function checkRootVerb(_args: readonly string[], ctx: RunnerContext): number {
  ctx.print("Running with root privileges.");
  return 0;
}
