/**
 * errno values used as dispatch result codes. Handlers and the dispatcher
 * return them negated.
 */

import { constants } from "node:os";
import { getSystemErrorName } from "node:util";

export const Errno = {
  EPERM: constants.errno.EPERM,
  /** `version` verb: package.json could not be read */
  ENOENT: constants.errno.ENOENT,
  ENXIO: constants.errno.ENXIO,
  EINVAL: constants.errno.EINVAL,
} as const;

/** Symbolic name of a positive or negative errno, e.g. 22 → "EINVAL". */
export function errnoName(errno: number): string {
  if (!Number.isInteger(errno) || errno === 0) return `errno ${errno}`;
  try {
    return getSystemErrorName(-Math.abs(errno));
  } catch {
    return `errno ${Math.abs(errno)}`;
  }
}
