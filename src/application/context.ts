import type { Logger } from 'pino';

/**
 * What every long-running component receives instead of reaching for
 * process-wide state: a logger and the shared shutdown signal.
 */
export interface RuntimeContext {
  readonly log: Logger;
  readonly signal: AbortSignal;
}

/**
 * Owns the shutdown signal for one process lifetime.
 *
 * Created at startup, handed to the bus connection and the pipeline, and
 * aborted once by `requestShutdown()` (usually from a SIGINT/SIGTERM handler).
 * Components observe `signal` cooperatively at loop and sleep boundaries.
 */
export class ServiceContext implements RuntimeContext {
  private readonly controller = new AbortController();

  constructor(readonly log: Logger) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get shuttingDown(): boolean {
    return this.controller.signal.aborted;
  }

  /** Idempotent. Later calls are logged and ignored. */
  requestShutdown(reason: string): void {
    if (this.controller.signal.aborted) {
      this.log.debug({ reason }, 'Shutdown already in progress');
      return;
    }
    this.log.info({ reason }, 'Shutdown requested');
    this.controller.abort(reason);
  }

  /** Same signal, logger bound to a component name. */
  forComponent(component: string): RuntimeContext {
    return { log: this.log.child({ component }), signal: this.signal };
  }
}
