import { Logger } from "./logger";
import { Tracker } from "./tracker";
import type { RemapConfig, RemapContext } from "../types";

/**
 * Build the context shared by every task of a run
 * The logger follows `logging.level` unless one is passed in
 */
export function createContext(
  config: RemapConfig,
  overrides: Partial<Omit<RemapContext, "config">> = {},
): RemapContext {
  return {
    config,
    logger: overrides.logger ?? new Logger(config.logging.level),
    tracker: overrides.tracker ?? new Tracker(),
    verbose: overrides.verbose,
  };
}
