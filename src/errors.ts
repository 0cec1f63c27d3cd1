/**
 * Error types shared by the heading editor, the converter and the CLIs.
 *
 * Every error carries a stable {@link ErrorCode} so callers can branch on the
 * kind of failure without matching on message text.
 *
 * @module errors
 */

export enum ErrorCode {
  INVALID_ACTION = 'INVALID_ACTION',
  MISSING_STYLE = 'MISSING_STYLE',
  UNKNOWN_STYLE = 'UNKNOWN_STYLE',
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  IO_ERROR = 'IO_ERROR',
  MALFORMED_TEMPLATE = 'MALFORMED_TEMPLATE',
  INVALID_CONFIG = 'INVALID_CONFIG',
  INVALID_ARGUMENTS = 'INVALID_ARGUMENTS',
}

/** Base error class for markdown-tools failures. */
export class MarkdownToolsError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'MarkdownToolsError';
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, message: this.message, code: this.code, context: this.context };
  }
}

/** Error thrown for an editor action outside the known set. */
export class InvalidActionError extends MarkdownToolsError {
  constructor(action: string, allowed: readonly string[]) {
    super(
      `Invalid action '${action}'. Expected one of: ${allowed.join(', ')}`,
      ErrorCode.INVALID_ACTION,
      { action },
    );
    this.name = 'InvalidActionError';
  }
}

/** Error thrown when `add_numbers` is requested without a numbering style. */
export class MissingStyleError extends MarkdownToolsError {
  constructor() {
    super('The add_numbers action requires a numbering style (--style)', ErrorCode.MISSING_STYLE);
    this.name = 'MissingStyleError';
  }
}

/** Error thrown for a numbering style name outside the closed set. */
export class UnknownStyleError extends MarkdownToolsError {
  constructor(style: string, allowed: readonly string[]) {
    super(
      `Unknown numbering style '${style}'. Expected one of: ${allowed.join(', ')}`,
      ErrorCode.UNKNOWN_STYLE,
      { style },
    );
    this.name = 'UnknownStyleError';
  }
}

/** Error thrown when the converter is asked for an output format it cannot produce. */
export class UnsupportedFormatError extends MarkdownToolsError {
  constructor(format: string, allowed: readonly string[]) {
    super(
      `Unsupported format '${format}'. Expected one of: ${allowed.join(', ')}`,
      ErrorCode.UNSUPPORTED_FORMAT,
      { format },
    );
    this.name = 'UnsupportedFormatError';
  }
}

/** Error thrown when an input file does not exist. */
export class FileNotFoundError extends MarkdownToolsError {
  constructor(public readonly filePath: string) {
    super(`File not found: ${filePath}`, ErrorCode.FILE_NOT_FOUND, { filePath });
    this.name = 'FileNotFoundError';
  }
}

/** Error thrown for any other read or write failure. */
export class FileAccessError extends MarkdownToolsError {
  constructor(
    public readonly filePath: string,
    reason: string,
  ) {
    super(`Cannot access ${filePath}: ${reason}`, ErrorCode.IO_ERROR, { filePath });
    this.name = 'FileAccessError';
  }
}

/**
 * Raised while loading a DOCX template that cannot be used as a style source.
 *
 * The converter never lets this escape: it falls back to the built-in styles
 * and reports the message as a warning.
 */
export class MalformedTemplateError extends MarkdownToolsError {
  constructor(reason: string) {
    super(`Malformed template: ${reason}`, ErrorCode.MALFORMED_TEMPLATE);
    this.name = 'MalformedTemplateError';
  }
}

/** Error thrown when a config file cannot be parsed or fails validation. */
export class ConfigError extends MarkdownToolsError {
  constructor(filePath: string, reason: string) {
    super(`Invalid config file ${filePath}: ${reason}`, ErrorCode.INVALID_CONFIG, { filePath });
    this.name = 'ConfigError';
  }
}

/** Error thrown for command-line arguments the CLIs cannot accept. */
export class InvalidArgumentsError extends MarkdownToolsError {
  constructor(reason: string) {
    super(reason, ErrorCode.INVALID_ARGUMENTS);
    this.name = 'InvalidArgumentsError';
  }
}

/**
 * Run a file-system operation, translating Node errors into
 * {@link FileNotFoundError} / {@link FileAccessError}.
 */
export async function withFileContext<T>(
  filePath: string,
  operation: () => Promise<T>,
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof MarkdownToolsError) throw error;
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new FileNotFoundError(filePath);
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new FileAccessError(filePath, reason);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
