/**
 * Error types raised by assembly, verification and the transaction layer
 */

export class MissingResourceError extends Error {
  constructor(
    public readonly resourcePath: string,
    what = "resource",
  ) {
    super(`Missing ${what}: ${resourcePath}`);
    this.name = "MissingResourceError";
  }
}

export class VerificationFailureError extends Error {
  constructor(
    public readonly target: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Verification of ${target} failed: ${message}`, options);
    this.name = "VerificationFailureError";
  }
}

export class VerificationTimeoutError extends VerificationFailureError {
  constructor(
    target: string,
    public readonly timeoutMs: number,
  ) {
    super(target, `no response within ${timeoutMs}ms`);
    this.name = "VerificationTimeoutError";
  }
}

export class EnvironmentFailureError extends Error {
  constructor(
    public readonly missingPath: string,
    message: string,
  ) {
    super(message);
    this.name = "EnvironmentFailureError";
  }
}

export class TransactionBusyError extends Error {
  constructor(public readonly lockFile: string) {
    super(
      `Another transaction is in progress (lock: ${lockFile}).\n` +
        `  If no other run is active, clear it with 'mirror-config unlock'.`,
    );
    this.name = "TransactionBusyError";
  }
}

export class TransactionStateError extends Error {
  constructor(from: string, to: string) {
    super(`Illegal transaction transition: ${from} → ${to}`);
    this.name = "TransactionStateError";
  }
}

export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SettingsError";
  }
}
