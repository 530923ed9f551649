export { dispatchVerb } from "./verbs/dispatch.js";
export type { DispatchOptions } from "./verbs/dispatch.js";
export { defineVerbs, VerbSchema, VerbTableSchema } from "./verbs/define.js";

export { isRunningInChrootOrOffline } from "./gate/environment-gate.js";
export type { EnvironmentGateOptions } from "./gate/environment-gate.js";
export { runningInChroot } from "./gate/chroot.js";
export type { ChrootProbeOptions } from "./gate/chroot.js";

export { mustBeRoot } from "./privilege/must-be-root.js";
export type { PrivilegeCheckOptions } from "./privilege/must-be-root.js";
