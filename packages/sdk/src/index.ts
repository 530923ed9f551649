// Types
export { VERB_ANY, VerbFlag, hasVerbFlag } from "./types/verb.js";
export type { ArgBound, Verb, VerbHandler } from "./types/verb.js";

export { probeTrue, probeFalse, probeIndeterminate, probeFromBoolean } from "./types/probe.js";
export type { ProbeResult } from "./types/probe.js";

// Errors
export {
  VerbgateError,
  ProbeError,
  VerbTableError,
  ArgumentCursorError,
  ConfigError,
} from "./errors/base.js";
export { Errno, errnoName } from "./errors/codes.js";
