export type FaviconErrorCode =
  | "INPUT_NOT_FOUND"
  | "DECODE_FAILED"
  | "PROCESSING_FAILED"
  | "WRITE_FAILED";

export class FaviconError extends Error {
  readonly code: FaviconErrorCode;

  constructor(code: FaviconErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The source image path does not exist, or no conventional candidate was found. */
export class InputNotFoundError extends FaviconError {
  constructor(message: string) {
    super("INPUT_NOT_FOUND", message);
  }
}

/** The source bytes could not be interpreted as an image. */
export class DecodeError extends FaviconError {
  constructor(message: string, cause?: unknown) {
    super("DECODE_FAILED", message, { cause });
  }
}

/** A resize, PNG encode or ICO pack step failed. */
export class ProcessingError extends FaviconError {
  constructor(message: string, cause?: unknown) {
    super("PROCESSING_FAILED", message, { cause });
  }
}

export class WriteError extends FaviconError {
  constructor(message: string, cause?: unknown) {
    super("WRITE_FAILED", message, { cause });
  }
}

export class ConfigError extends Error {}
