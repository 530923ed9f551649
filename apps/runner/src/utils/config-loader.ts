/**
 * Loads the optional dispatch config file given with --config.
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ConfigError } from "@verbgate/sdk";
import { loadDispatchConfig, type DispatchConfig } from "@verbgate/shared";

export function loadConfigFile(path?: string): DispatchConfig {
  if (path === undefined) {
    return loadDispatchConfig();
  }

  const fullPath = resolve(path);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(fullPath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Failed to read config ${fullPath}: ${err instanceof Error ? err.message : String(err)}`, {
      code: "CONFIG_READ_ERROR",
      cause: err instanceof Error ? err : undefined,
    });
  }

  return loadDispatchConfig(raw);
}
