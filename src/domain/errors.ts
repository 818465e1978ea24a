/**
 * Error taxonomy.
 *
 * Only ConfigurationError ends the process. Every other kind is caught at
 * the stage that raised it, logged, and the worker loop moves on.
 * Messages never include credentials or key material.
 */
export class BridgeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Startup-only. `issues` names the offending settings, never their values. */
export class ConfigurationError extends BridgeError {
  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(message);
  }
}

export class ConnectionError extends BridgeError {}

export class DecryptionError extends BridgeError {}

export class DecodeError extends BridgeError {}

/** The store stayed locked after the bounded local retry. */
export class PersistenceBusyError extends BridgeError {}

/** The gateway rejected our credentials. Never retried. */
export class AuthenticationError extends BridgeError {
  constructor(readonly status: number) {
    super(`Gateway rejected credentials (HTTP ${status})`);
  }
}

/** Network error, timeout or non-2xx answer from the gateway. */
export class GatewayTransientError extends BridgeError {
  constructor(
    message: string,
    readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}
