import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { ConfigError } from "@verbgate/sdk";
import { loadConfigFile } from "../../src/utils/config-loader.js";

describe("loadConfigFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "verbgate-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should return defaults without a path", () => {
    expect(loadConfigFile()).toEqual({
      offlineVariable: "VERBGATE_OFFLINE",
      ignoreChrootVariable: "VERBGATE_IGNORE_CHROOT",
    });
  });

  it("should load and validate a config file", () => {
    const path = join(dir, "verbgate.json");
    writeFileSync(path, JSON.stringify({ offlineVariable: "MYTOOL_OFFLINE", logLevel: "warn" }));

    expect(loadConfigFile(path)).toEqual({
      offlineVariable: "MYTOOL_OFFLINE",
      ignoreChrootVariable: "VERBGATE_IGNORE_CHROOT",
      logLevel: "warn",
    });
  });

  it("should report a missing file with CONFIG_READ_ERROR", () => {
    const path = join(dir, "missing.json");
    try {
      loadConfigFile(path);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (!(err instanceof ConfigError)) return;
      expect(err.code).toBe("CONFIG_READ_ERROR");
      expect(err.message).toContain(`Failed to read config ${path}`);
    }
  });

  it("should report malformed JSON", () => {
    const path = join(dir, "bad.json");
    writeFileSync(path, "{ not json");
    expect(() => loadConfigFile(path)).toThrow(ConfigError);
  });

  it("should report schema violations", () => {
    const path = join(dir, "invalid.json");
    writeFileSync(path, JSON.stringify({ logLevel: "loud" }));
    expect(() => loadConfigFile(path)).toThrow(/^Invalid dispatch config: logLevel: /);
  });
});
