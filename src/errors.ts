/**
 * Error classes for PillTrack Edge.
 *
 * Propagation:
 * - MalformedPayloadError never leaves the advertisement it was raised for
 * - AuthError / NotConfiguredError put a session into local-only mode
 * - RemoteUnavailableError aborts session start
 * - RegistrationConflictError is read as "not found" by the remote setup
 */

export class PillSyncError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PillSyncError";
  }
}

/** Advertisement bytes that do not match either Pill payload layout */
export class MalformedPayloadError extends PillSyncError {
  constructor(message: string) {
    super(message);
    this.name = "MalformedPayloadError";
  }
}

/** Login or token refresh rejected by the brew tracker */
export class AuthError extends PillSyncError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly bodyText: string = ""
  ) {
    super(message);
    this.name = "AuthError";
  }
}

/** No credentials (or no device token) to talk to the brew tracker with */
export class NotConfiguredError extends PillSyncError {
  constructor(message: string) {
    super(message);
    this.name = "NotConfiguredError";
  }
}

/**
 * Network failure, timeout or non-2xx response from the brew tracker.
 * `status` is null when no HTTP response was received.
 */
export class RemoteUnavailableError extends PillSyncError {
  constructor(
    message: string,
    public readonly status: number | null = null,
    public readonly bodyText: string = ""
  ) {
    super(message);
    this.name = "RemoteUnavailableError";
  }
}

/** A brew or hydrometer list came back in a shape we cannot read */
export class RegistrationConflictError extends PillSyncError {
  constructor(message: string) {
    super(message);
    this.name = "RegistrationConflictError";
  }
}

export class SessionNotFoundError extends PillSyncError {
  constructor(public readonly handle: string) {
    super(`Session not found: ${handle}`);
    this.name = "SessionNotFoundError";
  }
}

/** Another active session already tracks the same MAC address */
export class DuplicateSessionError extends PillSyncError {
  constructor(public readonly macAddress: string) {
    super(`A session for ${macAddress} is already active`);
    this.name = "DuplicateSessionError";
  }
}

export class InvalidSessionStateError extends PillSyncError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidSessionStateError";
  }
}

/** Config file missing, unreadable or not matching the expected layout */
export class ConfigFileError extends PillSyncError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigFileError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
