/**
 * Verb dispatcher.
 *
 * Picks the verb named by argv[cursor] (or the default verb when there is no
 * such argument), checks the argument count, applies the online-only and
 * must-be-root gates, and runs the handler. Recoverable failures are logged
 * once and returned as negative errno values; table or cursor misuse throws.
 */

import {
  ArgumentCursorError,
  Errno,
  VERB_ANY,
  VerbFlag,
  VerbTableError,
  hasVerbFlag,
  type Verb,
} from "@verbgate/sdk";
import { createLogger, type Logger } from "@verbgate/shared";
import { isRunningInChrootOrOffline } from "../gate/environment-gate.js";
import { mustBeRoot } from "../privilege/must-be-root.js";

export interface DispatchOptions {
  /** Index of the verb name in argv, i.e. the first non-option argument. Default: 1 */
  cursor?: number;
  logger?: Logger;
  /** Environment gate for online-only verbs. Default: isRunningInChrootOrOffline */
  isOffline?: () => boolean;
  /** Privilege check for must-be-root verbs; 0 or a negative errno. Default: mustBeRoot */
  mustBeRoot?: () => number;
}

function findVerb<T>(verbs: readonly Verb<T>[], name: string | undefined): Verb<T> | undefined {
  return verbs.find((verb) =>
    name !== undefined ? verb.name === name : hasVerbFlag(verb, VerbFlag.Default),
  );
}

export function dispatchVerb<T>(
  argv: readonly string[],
  verbs: readonly Verb<T>[],
  userdata: T,
  options: DispatchOptions = {},
): number {
  const cursor = options.cursor ?? 1;
  const logger = options.logger ?? createLogger("verbs");

  if (verbs.length === 0 || typeof verbs[0].handler !== "function") {
    throw new VerbTableError("Verb table must contain at least one verb with a handler");
  }
  if (!Number.isInteger(cursor) || cursor < 0 || cursor > argv.length) {
    throw new ArgumentCursorError(cursor, argv.length);
  }

  const name = cursor < argv.length ? argv[cursor] : undefined;
  const verb = findVerb(verbs, name);

  if (!verb) {
    if (name !== undefined) {
      logger.error(`Unknown operation ${name}.`);
    } else {
      logger.error("Requires operation parameter.");
    }
    return -Errno.EINVAL;
  }

  // The default verb is invoked with its own name as the only argument.
  const left = name !== undefined ? argv.length - cursor : 1;

  if (verb.minArgs !== VERB_ANY && left < verb.minArgs) {
    logger.error("Too few arguments.");
    return -Errno.EINVAL;
  }

  if (verb.maxArgs !== VERB_ANY && left > verb.maxArgs) {
    logger.error("Too many arguments.");
    return -Errno.EINVAL;
  }

  if (hasVerbFlag(verb, VerbFlag.OnlineOnly)) {
    const isOffline = options.isOffline ?? (() => isRunningInChrootOrOffline({ logger }));
    if (isOffline()) {
      if (name !== undefined) {
        logger.info(`Running in chroot, ignoring request: ${name}`);
      } else {
        logger.info("Running in chroot, ignoring request.");
      }
      return 0;
    }
  }

  if (hasVerbFlag(verb, VerbFlag.MustBeRoot)) {
    const r = options.mustBeRoot ? options.mustBeRoot() : mustBeRoot({ logger });
    if (r < 0) return r;
  }

  if (name !== undefined) {
    return verb.handler(argv.slice(cursor), userdata);
  }
  return verb.handler([verb.name], userdata);
}
