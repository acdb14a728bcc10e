/**
 * Error taxonomy for the knowledge and moderation core.
 *
 * Local errors (empty input, bad identifiers, bad arguments, configuration)
 * are raised immediately. Store and oracle errors are raised by the
 * collaborators and turned into degraded results by the advisory
 * subsystems. IntegrityFault marks a storage consistency bug.
 */

export type ForumCoreErrorCode =
  | 'EMPTY_INPUT'
  | 'INVALID_IDENTIFIER'
  | 'INVALID_ARGUMENT'
  | 'CONFIGURATION'
  | 'STORE_UNAVAILABLE'
  | 'ORACLE_UNAVAILABLE'
  | 'ORACLE_RESPONSE'
  | 'INTEGRITY_FAULT';

export abstract class ForumCoreError extends Error {
  abstract readonly code: ForumCoreErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class EmptyInputError extends ForumCoreError {
  readonly code = 'EMPTY_INPUT';
}

export class InvalidIdentifierError extends ForumCoreError {
  readonly code = 'INVALID_IDENTIFIER';

  constructor(readonly identifier: string) {
    super(`Invalid UUID format: ${identifier}`);
  }
}

export class InvalidArgumentError extends ForumCoreError {
  readonly code = 'INVALID_ARGUMENT';
}

export class ConfigurationError extends ForumCoreError {
  readonly code = 'CONFIGURATION';
}

export class StoreUnavailableError extends ForumCoreError {
  readonly code = 'STORE_UNAVAILABLE';
}

export class OracleUnavailableError extends ForumCoreError {
  readonly code = 'ORACLE_UNAVAILABLE';
}

/** The oracle answered, but not with something usable. */
export class OracleResponseError extends ForumCoreError {
  readonly code = 'ORACLE_RESPONSE';
}

export class IntegrityFault extends ForumCoreError {
  readonly code = 'INTEGRITY_FAULT';
}
