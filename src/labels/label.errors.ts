import {
  identifierToString,
  LabelIdentifier,
} from './label.types';

export abstract class LabelEngineError extends Error {
  abstract readonly kind: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed placeholder, choice or quoting syntax. */
export class PatternParseError extends LabelEngineError {
  readonly kind = 'pattern-parse';

  constructor(
    readonly pattern: string,
    readonly offset: number,
    reason: string,
  ) {
    super(`${reason} at offset ${offset} in pattern "${pattern}"`);
  }
}

/** Argument count or type mismatch, or a value outside every choice range. */
export class PatternFormatError extends LabelEngineError {
  readonly kind = 'pattern-format';
}

export class StoreUnavailableError extends LabelEngineError {
  readonly kind = 'store-unavailable';
}

/**
 * Raised by a store when a create races with another writer.
 * The resolution engine retries once as a read.
 */
export class LabelWriteConflictError extends LabelEngineError {
  readonly kind = 'write-conflict';

  constructor(readonly identifier: LabelIdentifier) {
    super(`Concurrent write on label ${identifierToString(identifier)}`);
  }
}

/**
 * Not thrown. Logged when a stored label was first seen with another default
 * text than the one a caller is resolving it with.
 */
export class KeyCollisionWarning {
  constructor(
    readonly identifier: LabelIdentifier,
    readonly storedText: string,
    readonly requestedText: string,
  ) {}

  toString(): string {
    return (
      `Key collision on ${identifierToString(this.identifier)}: ` +
      `stored "${this.storedText}", requested "${this.requestedText}"`
    );
  }
}
