/**
 * Userdata threaded through every runner verb.
 */

import type { DispatchConfig, Logger } from "@verbgate/shared";

export interface RunnerContext {
  config: DispatchConfig;
  env: NodeJS.ProcessEnv;
  logger: Logger;
  /** Writes one line of verb output (stdout in the CLI) */
  print(line: string): void;
}
