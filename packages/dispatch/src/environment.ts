import { OverloadCache } from "./cache.js";
import { noopMemoryManager, type MemoryManager } from "./call-scope.js";
import type { ConversionRouter } from "./conversion/router.js";
import type { TypeDetector } from "./frontend.js";
import { silentLogWriter, type DispatchLogWriter } from "./log.js";

/**
 * Collaborators shared by every overloaded set built on it, including the
 * resolution cache. Sets on one environment share one cache.
 */
export type DispatchEnvironment = {
  readonly detector: TypeDetector;
  readonly router: ConversionRouter;
  readonly cache: OverloadCache;
  readonly memory: MemoryManager;
  readonly logWriter: DispatchLogWriter;
};

export type DispatchEnvironmentOptions = {
  detector: TypeDetector;
  router: ConversionRouter;
  cache?: OverloadCache;
  memory?: MemoryManager;
  logWriter?: DispatchLogWriter;
};

export const createDispatchEnvironment = ({
  detector,
  router,
  cache = new OverloadCache(),
  memory = noopMemoryManager,
  logWriter = silentLogWriter,
}: DispatchEnvironmentOptions): DispatchEnvironment => ({
  detector,
  router,
  cache,
  memory,
  logWriter,
});
