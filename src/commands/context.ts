import type { ProcessorSet } from "../processors/types";

/** Process-level inputs a command runs against. Tests pass their own. */
export interface CommandContext {
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Aborted on SIGINT/SIGTERM. */
  signal?: AbortSignal;
  processors?: ProcessorSet;
  /** Clock for cache entry timestamps. */
  now?: () => number;
}
