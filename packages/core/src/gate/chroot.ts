/**
 * Chroot detection.
 *
 * A process is chrooted when its root directory differs from the root of
 * PID 1. Setting the ignore-chroot variable forces "not chrooted".
 */

import { statSync, type Stats } from "node:fs";
import {
  Errno,
  ProbeError,
  probeFalse,
  probeFromBoolean,
  probeIndeterminate,
  type ProbeResult,
} from "@verbgate/sdk";
import { DEFAULT_IGNORE_CHROOT_VARIABLE, getenvBool } from "@verbgate/shared";

export interface ChrootProbeOptions {
  env?: NodeJS.ProcessEnv;
  /** Variable that forces "not chrooted" when true. Default: VERBGATE_IGNORE_CHROOT */
  ignoreChrootVariable?: string;
  /** Root of the init process. Default: /proc/1/root */
  initRootPath?: string;
  /** Root as seen by this process. Default: / */
  rootPath?: string;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function toProbeError(path: string, err: unknown): ProbeError {
  if (isErrnoException(err)) {
    const errno = typeof err.errno === "number" ? Math.abs(err.errno) : Errno.EINVAL;
    return new ProbeError("runningInChroot", `Cannot stat ${path}: ${err.code ?? err.message}`, {
      errno,
      cause: err,
    });
  }
  return new ProbeError("runningInChroot", `Cannot stat ${path}: ${String(err)}`, {
    errno: Errno.EINVAL,
  });
}

/** stat() following symlinks; /proc/1/root is one. */
function statOrError(path: string): Stats | ProbeError {
  try {
    return statSync(path);
  } catch (err) {
    return toProbeError(path, err);
  }
}

export function runningInChroot(options: ChrootProbeOptions = {}): ProbeResult {
  const env = options.env ?? process.env;
  const ignoreVariable = options.ignoreChrootVariable ?? DEFAULT_IGNORE_CHROOT_VARIABLE;

  if (getenvBool(ignoreVariable, env).status === "true") {
    return probeFalse();
  }

  const initRootPath = options.initRootPath ?? "/proc/1/root";
  const rootPath = options.rootPath ?? "/";

  const initRoot = statOrError(initRootPath);
  if (initRoot instanceof ProbeError) return probeIndeterminate(initRoot);

  const root = statOrError(rootPath);
  if (root instanceof ProbeError) return probeIndeterminate(root);

  const same = initRoot.dev === root.dev && initRoot.ino === root.ino;
  return probeFromBoolean(!same);
}
