import { describe, it, expect, vi } from "vitest";
import { Errno, ProbeError, probeFalse, probeIndeterminate, probeTrue } from "@verbgate/sdk";
import { createCapturingLogger } from "@verbgate/shared/testing";
import { isRunningInChrootOrOffline } from "./environment-gate.js";

describe("isRunningInChrootOrOffline", () => {
  it("returns true for an explicit offline override without probing", () => {
    const detectChroot = vi.fn(probeFalse);

    expect(isRunningInChrootOrOffline({ env: { VERBGATE_OFFLINE: "1" }, detectChroot })).toBe(true);
    expect(detectChroot).not.toHaveBeenCalled();
  });

  it("returns false for an explicit false override even inside a chroot", () => {
    const detectChroot = vi.fn(probeTrue);

    expect(isRunningInChrootOrOffline({ env: { VERBGATE_OFFLINE: "no" }, detectChroot })).toBe(false);
    expect(detectChroot).not.toHaveBeenCalled();
  });

  it("falls back to chroot detection when the override is unset", () => {
    const logger = createCapturingLogger("gate");

    expect(isRunningInChrootOrOffline({ env: {}, logger, detectChroot: probeTrue })).toBe(true);
    expect(logger.entries).toEqual([
      {
        level: "debug",
        module: "gate",
        message: "Parsing VERBGATE_OFFLINE: VERBGATE_OFFLINE: Variable is not set",
        data: { errno: "ENXIO" },
      },
    ]);
  });

  it("falls back to chroot detection when the override is unparseable", () => {
    const logger = createCapturingLogger("gate");

    expect(
      isRunningInChrootOrOffline({ env: { VERBGATE_OFFLINE: "perhaps" }, logger, detectChroot: probeFalse }),
    ).toBe(false);
    expect(logger.entries).toEqual([
      {
        level: "debug",
        module: "gate",
        message: 'Parsing VERBGATE_OFFLINE: VERBGATE_OFFLINE: Invalid boolean value "perhaps"',
        data: { errno: "EINVAL" },
      },
    ]);
  });

  it("returns false and logs when chroot detection is indeterminate", () => {
    const logger = createCapturingLogger("gate");
    const error = new ProbeError("runningInChroot", "Cannot stat /proc/1/root: EPERM", {
      errno: Errno.EPERM,
    });

    const offline = isRunningInChrootOrOffline({
      env: {},
      logger,
      detectChroot: () => probeIndeterminate(error),
    });

    expect(offline).toBe(false);
    expect(logger.entries[1]).toEqual({
      level: "debug",
      module: "gate",
      message: "runningInChroot(): runningInChroot: Cannot stat /proc/1/root: EPERM",
      data: { errno: "EPERM" },
    });
  });

  it("reads a configured override variable", () => {
    const detectChroot = vi.fn(probeFalse);
    const env = { MYTOOL_OFFLINE: "true", VERBGATE_OFFLINE: "false" };

    expect(
      isRunningInChrootOrOffline({ env, config: { offlineVariable: "MYTOOL_OFFLINE" }, detectChroot }),
    ).toBe(true);
  });

  it("passes env and ignore-chroot config to the default probe", () => {
    // An ignored chroot is "not chrooted", whatever the filesystem says.
    const offline = isRunningInChrootOrOffline({
      env: { MYTOOL_IGNORE_CHROOT: "1" },
      config: { ignoreChrootVariable: "MYTOOL_IGNORE_CHROOT" },
    });
    expect(offline).toBe(false);
  });
});
