/**
 * Verb table validation.
 *
 * dispatchVerb only asserts what it needs to run; defineVerbs checks the
 * whole table once, up front, so a malformed table fails at startup rather
 * than on the first unlucky invocation.
 */

import { z } from "zod";
import { VERB_ANY, VerbFlag, VerbTableError, type Verb } from "@verbgate/sdk";
import { validateInput } from "@verbgate/shared";

const ArgBoundSchema = z.union([z.number().int().nonnegative(), z.literal(VERB_ANY)]);

export const VerbSchema = z
  .object({
    name: z.string().min(1, "Verb name must not be empty"),
    minArgs: ArgBoundSchema,
    maxArgs: ArgBoundSchema,
    flags: z.array(z.nativeEnum(VerbFlag)).optional(),
    handler: z.custom<Verb<unknown>["handler"]>(
      (value) => typeof value === "function",
      "Handler must be a function",
    ),
  })
  .superRefine((verb, ctx) => {
    if (
      typeof verb.minArgs === "number" &&
      typeof verb.maxArgs === "number" &&
      verb.minArgs > verb.maxArgs
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["maxArgs"],
        message: "maxArgs must not be less than minArgs",
      });
    }
  });

export const VerbTableSchema = z
  .array(VerbSchema)
  .min(1, "Verb table must not be empty")
  .superRefine((verbs, ctx) => {
    const seen = new Set<string>();
    verbs.forEach((verb, index) => {
      if (seen.has(verb.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, "name"],
          message: `Duplicate verb name "${verb.name}"`,
        });
      }
      seen.add(verb.name);
    });

    const defaults = verbs.filter((verb) => verb.flags?.includes(VerbFlag.Default));
    if (defaults.length > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Only one verb may carry the default flag (found ${defaults.length})`,
      });
    }
  });

function freezeVerb<T>(verb: Verb<T>): Verb<T> {
  return Object.freeze({
    ...verb,
    flags: verb.flags && Object.freeze([...verb.flags]),
  });
}

/**
 * Validate a verb table and return a frozen copy, entries and flag lists
 * included. Throws VerbTableError.
 */
export function defineVerbs<T>(verbs: readonly Verb<T>[]): readonly Verb<T>[] {
  const result = validateInput(VerbTableSchema, verbs);
  if (!result.success) {
    throw new VerbTableError(`Invalid verb table: ${result.error}`);
  }
  return Object.freeze(verbs.map(freezeVerb));
}
