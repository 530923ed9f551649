/**
 * CLI argument parser.
 *
 * Hand-rolled minimal parser - no external CLI framework needed. Options are
 * pulled out wherever they appear (like getopt's permutation) so the verb
 * dispatcher sees `[program, verb, ...args]` with the cursor on the verb.
 * Only known options are accepted; verb arguments that start with a dash go
 * after "--".
 */

import { VerbgateError } from "@verbgate/sdk";

export interface ParsedArgs {
  /** Known options that were given (e.g., { config: "./verbgate.json", verbose: true }) */
  flags: {
    config?: string;
    verbose?: boolean;
  };

  /** Program name followed by the positional arguments */
  argv: string[];

  /** Index of the first positional argument in argv */
  cursor: number;
}

export class UsageError extends VerbgateError {
  constructor(message: string) {
    super(message, "USAGE_ERROR");
    this.name = "UsageError";
  }
}

/**
 * Parse CLI arguments. `argv[0]` is the program name. Throws UsageError on
 * an unknown option or a missing option value.
 *
 * Supported options:
 *   - --config <path>, --config=<path>
 *   - --verbose, -v
 *   - "--" ends option parsing
 *
 * Examples:
 *   parseArgs(["verbgate", "status", "--verbose"]) → { flags: { verbose: true }, argv: ["verbgate", "status"], cursor: 1 }
 *   parseArgs(["verbgate", "--config", "a.json"]) → { flags: { config: "a.json" }, argv: ["verbgate"], cursor: 1 }
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const flags: ParsedArgs["flags"] = {};
  const positional: string[] = [];
  const program = argv.length > 0 ? argv[0] : "verbgate";

  for (let i = 1; i < argv.length; i++) {
    const arg = argv[i];

    // End of options: everything after is positional
    if (arg === "--") {
      positional.push(...argv.slice(i + 1));
      break;
    }

    // A lone dash is an argument (conventionally stdin)
    if (arg === "-" || !arg.startsWith("-")) {
      positional.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const option = eq === -1 ? arg : arg.slice(0, eq);

    switch (option) {
      case "--config":
        if (eq !== -1) {
          flags.config = arg.slice(eq + 1);
        } else if (i + 1 < argv.length) {
          flags.config = argv[++i];
        } else {
          throw new UsageError("Option --config requires a value.");
        }
        break;

      case "--verbose":
      case "-v":
        if (eq !== -1) {
          throw new UsageError(`Option ${option} does not take a value.`);
        }
        flags.verbose = true;
        break;

      default:
        throw new UsageError(`Unknown option ${arg}.`);
    }
  }

  return { flags, argv: [program, ...positional], cursor: 1 };
}
