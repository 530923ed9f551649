/**
 * Verb table types.
 *
 * A verb is a named subcommand with an argument-count contract and a handler.
 * Tables are plain ordered arrays; the end of the array terminates the scan.
 */

/** Bound value that disables a min/max argument check. */
export const VERB_ANY = "any" as const;

export type ArgBound = number | typeof VERB_ANY;

export const VerbFlag = {
  /** Selected when no verb name is given. */
  Default: "default",
  /** Skipped (as a no-op success) when running in a chroot or offline. */
  OnlineOnly: "online-only",
  /** Requires effective uid 0. */
  MustBeRoot: "must-be-root",
} as const;

export type VerbFlag = (typeof VerbFlag)[keyof typeof VerbFlag];

/**
 * Verb handler. `args[0]` is the verb name as typed (or synthesized for the
 * default verb); `args.length` is the argument count.
 *
 * Negative results are error codes, non-negative ones success/exit codes.
 */
export type VerbHandler<T> = (args: readonly string[], userdata: T) => number;

export interface Verb<T> {
  /** Matched exactly (case-sensitive) against the first positional argument */
  readonly name: string;
  /** Inclusive lower bound on the argument count, verb name included */
  readonly minArgs: ArgBound;
  /** Inclusive upper bound on the argument count, verb name included */
  readonly maxArgs: ArgBound;
  readonly flags?: readonly VerbFlag[];
  readonly handler: VerbHandler<T>;
}

export function hasVerbFlag<T>(verb: Verb<T>, flag: VerbFlag): boolean {
  return verb.flags?.includes(flag) ?? false;
}
