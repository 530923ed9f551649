import { Errno } from "@verbgate/sdk";
import type { Logger } from "@verbgate/shared";

export interface PrivilegeCheckOptions {
  logger?: Logger;
  /** Effective uid source. Default: process.geteuid (absent on Windows) */
  geteuid?: () => number;
}

/**
 * Returns 0 when running with effective uid 0, otherwise logs and returns
 * -EPERM. Hosts without a uid concept count as unprivileged.
 */
export function mustBeRoot(options: PrivilegeCheckOptions = {}): number {
  const euid = options.geteuid ? options.geteuid() : process.geteuid?.();
  if (euid === 0) {
    return 0;
  }

  options.logger?.error("Need to be root.");
  return -Errno.EPERM;
}
