export { createLogger, isLogLevel } from "./logger/index.js";
export type { Logger, LogLevel } from "./logger/index.js";

export { parseBoolean, getenvBool } from "./env/boolean.js";

export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export {
  DispatchConfigSchema,
  loadDispatchConfig,
  DEFAULT_OFFLINE_VARIABLE,
  DEFAULT_IGNORE_CHROOT_VARIABLE,
} from "./utils/config-schema.js";
export type { DispatchConfig } from "./utils/config-schema.js";
