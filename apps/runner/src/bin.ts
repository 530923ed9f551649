#!/usr/bin/env node

/**
 * verbgate entry point.
 *
 * Usage: verbgate [--config <path>] [--verbose] [verb] [args...]
 *   - verbgate               → "status" (default verb)
 *   - verbgate ping          → skipped in a chroot or with VERBGATE_OFFLINE=1
 *   - verbgate check-root    → requires root
 */

import { run } from "./runner.js";

try {
  process.exitCode = run(process.argv.slice(1));
} catch (err) {
  console.error("Fatal error:", err);
  process.exitCode = 1;
}
