/**
 * Runner — wires config, logging and the verb table into one dispatch.
 */

import { VerbgateError } from "@verbgate/sdk";
import { createLogger, type DispatchConfig, type Logger } from "@verbgate/shared";
import { dispatchVerb, isRunningInChrootOrOffline } from "@verbgate/core";
import { parseArgs, type ParsedArgs } from "./utils/args.js";
import { loadConfigFile } from "./utils/config-loader.js";
import { RUNNER_VERBS, type RunnerContext } from "./verbs/index.js";

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  print?: (line: string) => void;
  /** Overrides the environment gate (tests) */
  isOffline?: () => boolean;
  /** Overrides the privilege check (tests) */
  mustBeRoot?: () => number;
}

/**
 * Run one CLI invocation. `argv[0]` is the program name.
 * Returns the process exit code: negative dispatch results map to 1.
 */
export function run(argv: readonly string[], options: RunOptions = {}): number {
  const env = options.env ?? process.env;
  const bootLogger = options.logger ?? createLogger("verbgate");

  let parsed: ParsedArgs;
  let config: DispatchConfig;
  try {
    parsed = parseArgs(argv);
    config = loadConfigFile(parsed.flags.config);
  } catch (err) {
    if (err instanceof VerbgateError) {
      bootLogger.error(err.message, { code: err.code });
      return 1;
    }
    throw err;
  }

  const logger =
    options.logger ?? createLogger("verbgate", parsed.flags.verbose ? "debug" : config.logLevel);

  const ctx: RunnerContext = {
    config,
    env,
    logger,
    print: options.print ?? ((line) => console.log(line)),
  };

  const r = dispatchVerb(parsed.argv, RUNNER_VERBS, ctx, {
    cursor: parsed.cursor,
    logger: logger.child("verbs"),
    isOffline: options.isOffline ?? (() => isRunningInChrootOrOffline({ env, config, logger })),
    mustBeRoot: options.mustBeRoot,
  });

  return r < 0 ? 1 : r;
}
