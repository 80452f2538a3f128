/**
 * Error types raised by the match digest pipeline
 */

export class MatchDigestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The match cannot be analyzed at all: ball-level structure is missing or unusable.
 */
export class MalformedMatchError extends MatchDigestError {
  readonly fieldPath: string;
  readonly reason: string;

  constructor(fieldPath: string, reason: string) {
    super(`Malformed match record at ${fieldPath}: ${reason}`);
    this.fieldPath = fieldPath;
    this.reason = reason;
  }
}

export class ConfigurationError extends MatchDigestError {}
