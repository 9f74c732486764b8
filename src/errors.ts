/**
 * Run-fatal errors. Per-page failures are values (see FetchOutcome), not exceptions.
 */

/** Invalid run configuration, raised before anything is fetched */
export class StartupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StartupError";
  }
}

/** The assembled document could not be written */
export class PersistenceError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not write ${path}: ${reason}`, { cause });
    this.name = "PersistenceError";
    this.path = path;
  }
}

/** The run was stopped by SIGINT or SIGTERM */
export class InterruptedError extends Error {
  readonly signal: NodeJS.Signals;

  constructor(signal: NodeJS.Signals) {
    super(`Interrupted by ${signal}`);
    this.name = "InterruptedError";
    this.signal = signal;
  }
}
