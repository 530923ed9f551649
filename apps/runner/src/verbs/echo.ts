import type { RunnerContext } from "./context.js";

export function echoVerb(args: readonly string[], ctx: RunnerContext): number {
  ctx.print(args.slice(1).join(" "));
  return 0;
}
