/**
 * Flush-on-exit wiring for the process-wide logger.
 *
 * `exit` listeners cannot wait for asynchronous work, so that path flushes
 * synchronously. `beforeExit` and the termination signals run the full shutdown.
 */

export interface ExitHooks {
  shutdown: () => Promise<unknown>;
  flushSync: () => void;
}

// 128 + signal number
const SIGINT_EXIT_CODE = 130;
const SIGTERM_EXIT_CODE = 143;

let unregister: (() => void) | null = null;

function reportFailure(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`facetkit: logger shutdown failed: ${message}\n`);
}

/**
 * Register exit handlers once per process. Later calls are ignored.
 */
export function registerExitHandlers(hooks: ExitHooks): void {
  if (unregister) {
    return;
  }

  const onBeforeExit = (): void => {
    hooks.shutdown().catch(reportFailure);
  };

  const onExit = (): void => {
    hooks.flushSync();
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    void hooks
      .shutdown()
      .catch(reportFailure)
      .finally(() => {
        // Leave the exit decision to the host when it listens for the signal too
        if (process.listenerCount(signal) <= 1) {
          process.exit(signal === 'SIGINT' ? SIGINT_EXIT_CODE : SIGTERM_EXIT_CODE);
        }
      });
  };

  process.on('beforeExit', onBeforeExit);
  process.on('exit', onExit);
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  unregister = () => {
    process.removeListener('beforeExit', onBeforeExit);
    process.removeListener('exit', onExit);
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
  };
}

export function exitHandlersRegistered(): boolean {
  return unregister !== null;
}

/**
 * Remove the handlers (for testing).
 */
export function resetExitHandlers(): void {
  if (!unregister) {
    return;
  }
  unregister();
  unregister = null;
}
