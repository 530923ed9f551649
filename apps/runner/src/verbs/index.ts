/**
 * The runner's verb table. Bounds count the verb name itself, so a verb
 * taking no arguments has maxArgs 1.
 */

import { VERB_ANY, VerbFlag } from "@verbgate/sdk";
import { defineVerbs } from "@verbgate/core";
import type { RunnerContext } from "./context.js";
import { statusVerb } from "./status.js";
import { versionVerb } from "./version.js";
import { pingVerb } from "./ping.js";
import { checkRootVerb } from "./check-root.js";
import { echoVerb } from "./echo.js";

export type { RunnerContext } from "./context.js";

export const RUNNER_VERBS = defineVerbs<RunnerContext>([
  { name: "status", minArgs: VERB_ANY, maxArgs: 1, flags: [VerbFlag.Default], handler: statusVerb },
  { name: "version", minArgs: VERB_ANY, maxArgs: 1, handler: versionVerb },
  { name: "ping", minArgs: VERB_ANY, maxArgs: 1, flags: [VerbFlag.OnlineOnly], handler: pingVerb },
  { name: "check-root", minArgs: VERB_ANY, maxArgs: 1, flags: [VerbFlag.MustBeRoot], handler: checkRootVerb },
  { name: "echo", minArgs: 2, maxArgs: VERB_ANY, handler: echoVerb },
]);
