/**
 * Standard error classes for xmltab
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  PARSE_ERROR = "PARSE_ERROR",
  INFERENCE_ERROR = "INFERENCE_ERROR",
  EXTRACTION_ERROR = "EXTRACTION_ERROR",
}

export type ErrorDetails = Record<string, unknown>;

export class XmlTabError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "XmlTabError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export class ConfigError extends XmlTabError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends XmlTabError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

/**
 * Raised by the tree adapter when a document is not well-formed
 */
export class DocumentParseError extends XmlTabError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.PARSE_ERROR, message, details, options);
    this.name = "DocumentParseError";
  }
}

export class ExtractionError extends XmlTabError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.EXTRACTION_ERROR, message, details, options);
    this.name = "ExtractionError";
  }
}

/**
 * Wrap any thrown value into an XmlTabError, keeping the original as cause
 */
export function toXmlTabError(error: unknown): XmlTabError {
  if (error instanceof XmlTabError) {
    return error;
  }
  return new XmlTabError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}
