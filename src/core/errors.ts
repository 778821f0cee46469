/**
 * Error Handling: Custom error types for generation, encoding and indexing
 */

export type DicomErrorCode =
  | 'INVALID_FORMAT'
  | 'INVALID_OPTIONS'
  | 'INSUFFICIENT_SPACE'
  | 'PAYLOAD_TOO_LARGE'
  | 'ENCODING_FAILURE'
  | 'INDEX_BUILD_FAILURE'
  | 'PARSE_FAILURE';

/**
 * Base class for every error raised by the generator core
 */
export abstract class DicomSynthError extends Error {
  abstract readonly code: DicomErrorCode;

  constructor(message: string, public readonly cause?: Error) {
    super(message);
  }
}

/**
 * Malformed size string or unsupported unit
 */
export class InvalidFormatError extends DicomSynthError {
  readonly code = 'INVALID_FORMAT';

  constructor(message: string, public readonly input: string) {
    super(message);
    this.name = 'InvalidFormatError';
  }
}

/**
 * Generator options rejected by schema validation
 */
export class InvalidOptionsError extends DicomSynthError {
  readonly code = 'INVALID_OPTIONS';

  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'InvalidOptionsError';
  }
}

/**
 * Target size exceeds the free space of the output volume
 */
export class InsufficientSpaceError extends DicomSynthError {
  readonly code = 'INSUFFICIENT_SPACE';

  constructor(
    message: string,
    public readonly requiredBytes: number,
    public readonly availableBytes: number
  ) {
    super(message);
    this.name = 'InsufficientSpaceError';
  }
}

/**
 * A value would not fit in a 32-bit element length field
 */
export class PayloadTooLargeError extends DicomSynthError {
  readonly code = 'PAYLOAD_TOO_LARGE';

  constructor(
    message: string,
    public readonly tag: string,
    public readonly byteLength: number
  ) {
    super(message);
    this.name = 'PayloadTooLargeError';
  }
}

/**
 * A structural invariant of the element stream was violated
 */
export class EncodingError extends DicomSynthError {
  readonly code = 'ENCODING_FAILURE';

  constructor(message: string, public readonly tag?: string, cause?: Error) {
    super(message, cause);
    this.name = 'EncodingError';
  }
}

/**
 * DICOMDIR could not be produced. Instance files stay valid.
 */
export class IndexBuildError extends DicomSynthError {
  readonly code = 'INDEX_BUILD_FAILURE';

  constructor(message: string, public readonly outputDir: string, cause?: Error) {
    super(message, cause);
    this.name = 'IndexBuildError';
  }
}

/**
 * Custom error for DICOM parsing failures
 */
export class DicomParseError extends DicomSynthError {
  readonly code = 'PARSE_FAILURE';

  constructor(
    message: string,
    public readonly tag?: string,
    public readonly offset?: number,
    cause?: Error
  ) {
    super(message, cause);
    this.name = 'DicomParseError';
  }
}

function withContext(message: string, tag?: string, offset?: number): string {
  let fullMessage = message;
  if (tag) {
    fullMessage += ` (tag: ${tag})`;
  }
  if (offset !== undefined) {
    fullMessage += ` (offset: ${offset})`;
  }
  return fullMessage;
}

/**
 * Create a parse error with context
 */
export function createParseError(
  message: string,
  tag?: string,
  offset?: number,
  cause?: Error
): DicomParseError {
  return new DicomParseError(withContext(message, tag, offset), tag, offset, cause);
}

/**
 * Create an encoding error with context
 */
export function createEncodingError(message: string, tag?: string, cause?: Error): EncodingError {
  return new EncodingError(withContext(message, tag), tag, cause);
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
