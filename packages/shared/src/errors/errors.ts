/**
 * Base error class for Plenar
 */
export class PlenarError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PlenarError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }

    // Maintains proper stack trace for where error was thrown

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * An exactly-one field had no matching element.
 * The enclosing record is not built.
 */
export class RequiredElementMissingError extends PlenarError {
  readonly element: string;
  readonly record: string;

  constructor(element: string, record: string) {
    super(
      `Required element '${element}' missing in ${record}`,
      'REQUIRED_ELEMENT_MISSING',
      { element, record },
    );
    this.name = 'RequiredElementMissingError';
    this.element = element;
    this.record = record;
  }
}

/**
 * Date text present but not a valid DD.MM.YYYY date.
 */
export class MalformedDateError extends PlenarError {
  readonly text: string;

  constructor(text: string, reason: string) {
    super(`Malformed date '${text}': ${reason}`, 'MALFORMED_DATE', { text, reason });
    this.name = 'MalformedDateError';
    this.text = text;
  }
}

/**
 * The top-level element of a schema is absent.
 */
export class EmptyInputError extends PlenarError {
  readonly element: string;

  constructor(element: string) {
    super(`Input has no '${element}' element`, 'EMPTY_INPUT', { element });
    this.name = 'EmptyInputError';
    this.element = element;
  }
}

/**
 * Input is not well-formed markup.
 */
export class MarkupSyntaxError extends PlenarError {
  readonly line?: number;
  readonly column?: number;

  constructor(message: string, position?: { line: number; column: number }) {
    const location = position ? ` (line ${position.line}, column ${position.column})` : '';
    super(`Malformed markup${location}: ${message}`, 'MARKUP_SYNTAX', position);
    this.name = 'MarkupSyntaxError';
    if (position) {
      this.line = position.line;
      this.column = position.column;
    }
  }
}

/**
 * A document stream was iterated a second time.
 */
export class StreamConsumedError extends PlenarError {
  constructor() {
    super('Document stream has already been consumed', 'STREAM_CONSUMED');
    this.name = 'StreamConsumedError';
  }
}

/**
 * The parsed tree matches none of the known schemas.
 */
export class UnknownSchemaError extends PlenarError {
  constructor(source: string) {
    super(`Cannot determine schema of '${source}'`, 'UNKNOWN_SCHEMA', { source });
    this.name = 'UnknownSchemaError';
  }
}

/**
 * Error thrown for configuration issues
 */
export class ConfigurationError extends PlenarError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

/**
 * A store operation failed. The driver error is kept as `cause`.
 */
export class StoreError extends PlenarError {
  readonly collection: string;

  constructor(message: string, collection: string, cause?: unknown) {
    super(message, 'STORE_ERROR', { collection }, { cause });
    this.name = 'StoreError';
    this.collection = collection;
  }
}
