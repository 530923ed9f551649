/**
 * Environment gate: decides whether online-only verbs should be skipped.
 *
 * The offline override variable is consulted first. An explicit true or false
 * decides on its own; only an unset or unparseable value falls through to
 * chroot detection. External processes (package scriptlets, image builders)
 * set the override to force offline behavior.
 */

import { errnoName, type ProbeResult } from "@verbgate/sdk";
import {
  DEFAULT_IGNORE_CHROOT_VARIABLE,
  DEFAULT_OFFLINE_VARIABLE,
  getenvBool,
  type Logger,
} from "@verbgate/shared";
import { runningInChroot } from "./chroot.js";

export interface EnvironmentGateOptions {
  env?: NodeJS.ProcessEnv;
  config?: {
    offlineVariable?: string;
    ignoreChrootVariable?: string;
  };
  logger?: Logger;
  /** Chroot probe. Default: runningInChroot over the same env and config */
  detectChroot?: () => ProbeResult;
}

export function isRunningInChrootOrOffline(options: EnvironmentGateOptions = {}): boolean {
  const env = options.env ?? process.env;
  const offlineVariable = options.config?.offlineVariable ?? DEFAULT_OFFLINE_VARIABLE;

  const offline = getenvBool(offlineVariable, env);
  switch (offline.status) {
    case "true":
      return true;
    case "false":
      return false;
    case "indeterminate":
      options.logger?.debug(`Parsing ${offlineVariable}: ${offline.error.message}`, {
        errno: errnoName(offline.error.errno),
      });
      break;
  }

  const detectChroot =
    options.detectChroot ??
    (() =>
      runningInChroot({
        env,
        ignoreChrootVariable:
          options.config?.ignoreChrootVariable ?? DEFAULT_IGNORE_CHROOT_VARIABLE,
      }));

  const chroot = detectChroot();
  if (chroot.status === "true") return true;
  if (chroot.status === "indeterminate") {
    options.logger?.debug(`runningInChroot(): ${chroot.error.message}`, {
      errno: errnoName(chroot.error.errno),
    });
  }

  return false;
}
