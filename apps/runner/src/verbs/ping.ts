import type { RunnerContext } from "./context.js";

/** Online-only probe verb; skipped (exit 0, no output) in a chroot or offline. */
export function pingVerb(_args: readonly string[], ctx: RunnerContext): number {
  ctx.print("pong");
  return 0;
}
