/**
 * Base class for errors raised by the masking core.
 * `code` is stable across releases, e.g. "RECOGNIZER_UNAVAILABLE".
 */
export class MailsiftError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The named-entity recognizer could not be loaded or invoked.
 * Fatal to the current mask() call; never retried internally.
 */
export class RecognizerUnavailableError extends MailsiftError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RECOGNIZER_UNAVAILABLE', message, options);
  }
}

/** A configured rule failed to compile. Raised at startup only. */
export class InvalidRulePatternError extends MailsiftError {
  readonly ruleName: string;

  constructor(ruleName: string, message: string, options?: { cause?: unknown }) {
    super('INVALID_RULE_PATTERN', `Rule "${ruleName}": ${message}`, options);
    this.ruleName = ruleName;
  }
}

/** mask() was called before start() completed, or after stop() */
export class EngineNotReadyError extends MailsiftError {
  constructor() {
    super('ENGINE_NOT_READY', 'Masking engine is not started');
  }
}
