/**
 * Pack Error Types
 *
 * Every failure in pluginpack is scoped to one plugin (or one package during
 * reconciliation). These classes carry that scope and a code so callers can
 * report them without string matching.
 */

/**
 * Error codes for classification.
 */
export type PackErrorCode =
  | 'CONFIG_INVALID'
  | 'CIRCULAR_DEPENDENCY'
  | 'NOT_INSTALLED'
  | 'SETUP_FAILED'
  | 'FETCH_FAILED'
  | 'REMOTE_UNRESOLVED';

/**
 * Base pack error.
 */
export class PackError extends Error {
  constructor(
    public readonly subject: string,
    message: string,
    public readonly code: PackErrorCode,
    options?: { cause?: unknown }
  ) {
    super(`${subject}: ${message}`, options);
    this.name = 'PackError';
  }
}

/**
 * A spec, module path or config unit could not be turned into plugins.
 * The entry is skipped; other entries continue.
 */
export class ConfigurationError extends PackError {
  constructor(subject: string, message: string, options?: { cause?: unknown }) {
    super(subject, message, 'CONFIG_INVALID', options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Two setups depend on each other, directly or transitively.
 */
export class CircularDependencyError extends PackError {
  constructor(
    public readonly dependent: string,
    public readonly dependency: string
  ) {
    super(dependent, `circular setup dependency ${dependent} -> ${dependency}`, 'CIRCULAR_DEPENDENCY');
    this.name = 'CircularDependencyError';
  }
}

/**
 * Setup was requested for a plugin the installer never confirmed.
 */
export class NotInstalledError extends PackError {
  constructor(identity: string) {
    super(identity, 'not installed, cannot run setup', 'NOT_INSTALLED');
    this.name = 'NotInstalledError';
  }
}

/**
 * A setup action threw.
 */
export class SetupError extends PackError {
  constructor(identity: string, cause: unknown) {
    super(
      identity,
      `setup failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      'SETUP_FAILED',
      { cause }
    );
    this.name = 'SetupError';
  }
}

/**
 * Fetching remote state for an installed package failed.
 */
export class FetchError extends PackError {
  constructor(identity: string, cause: unknown) {
    super(
      identity,
      `fetch failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      'FETCH_FAILED',
      { cause }
    );
    this.name = 'FetchError';
  }
}

/**
 * No ref in the resolution chain produced a remote revision.
 */
export class RemoteResolutionError extends PackError {
  constructor(
    identity: string,
    public readonly attempted: readonly string[]
  ) {
    super(identity, `could not resolve remote revision (tried ${attempted.join(', ')})`, 'REMOTE_UNRESOLVED');
    this.name = 'RemoteResolutionError';
  }
}

/**
 * Render any thrown value for a log entry.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
