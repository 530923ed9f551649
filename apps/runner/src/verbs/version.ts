/**
 * Version verb - display version information.
 */

import { readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { Errno } from "@verbgate/sdk";
import type { RunnerContext } from "./context.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

const PackageJsonSchema = z.object({ version: z.string() });

export function versionVerb(_args: readonly string[], ctx: RunnerContext): number {
  try {
    const pkgPath = resolve(__dirname, "../../package.json");
    const pkg = PackageJsonSchema.parse(JSON.parse(readFileSync(pkgPath, "utf-8")));

    ctx.print(`verbgate v${pkg.version}`);
    return 0;
  } catch (err) {
    ctx.logger.error("Failed to read version information", {
      error: err instanceof Error ? err.message : String(err),
    });
    return -Errno.ENOENT;
  }
}
