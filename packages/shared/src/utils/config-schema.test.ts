import { describe, it, expect } from "vitest";
import { ConfigError } from "@verbgate/sdk";
import {
  DispatchConfigSchema,
  loadDispatchConfig,
  DEFAULT_OFFLINE_VARIABLE,
  DEFAULT_IGNORE_CHROOT_VARIABLE,
} from "./config-schema.js";
import { validateInput } from "./validation.js";

describe("DispatchConfigSchema", () => {
  it("fills in default variable names", () => {
    expect(loadDispatchConfig()).toEqual({
      offlineVariable: DEFAULT_OFFLINE_VARIABLE,
      ignoreChrootVariable: DEFAULT_IGNORE_CHROOT_VARIABLE,
    });
  });

  it("accepts custom variable names and a log level", () => {
    const config = loadDispatchConfig({
      offlineVariable: "MYTOOL_OFFLINE",
      ignoreChrootVariable: "MYTOOL_IGNORE_CHROOT",
      logLevel: "debug",
    });
    expect(config.offlineVariable).toBe("MYTOOL_OFFLINE");
    expect(config.ignoreChrootVariable).toBe("MYTOOL_IGNORE_CHROOT");
    expect(config.logLevel).toBe("debug");
  });

  it("rejects invalid variable names with the field path", () => {
    expect(() => loadDispatchConfig({ offlineVariable: "1-bad" })).toThrow(
      "Invalid dispatch config: offlineVariable: Must be a valid environment variable name",
    );
  });

  it("throws ConfigError for unknown keys", () => {
    expect(() => loadDispatchConfig({ offline: true })).toThrow(ConfigError);
  });

  it("rejects unknown log levels", () => {
    const result = validateInput(DispatchConfigSchema, { logLevel: "trace" });
    expect(result.success).toBe(false);
  });
});

describe("validateInput", () => {
  it("returns parsed data on success", () => {
    const result = validateInput(DispatchConfigSchema, {});
    expect(result).toEqual({
      success: true,
      data: {
        offlineVariable: DEFAULT_OFFLINE_VARIABLE,
        ignoreChrootVariable: DEFAULT_IGNORE_CHROOT_VARIABLE,
      },
    });
  });

  it("joins every issue into one message", () => {
    const result = validateInput(DispatchConfigSchema, {
      offlineVariable: "",
      ignoreChrootVariable: "a b",
    });
    expect(result).toEqual({
      success: false,
      error:
        "offlineVariable: Must be a valid environment variable name; " +
        "ignoreChrootVariable: Must be a valid environment variable name",
    });
  });
});
