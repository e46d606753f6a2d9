/**
 * Conversion Errors
 *
 * Document-fatal failures carry a machine-readable code so batch drivers
 * can report them without parsing messages.
 */

export type ConversionErrorCode =
  | 'DOCUMENT_NOT_FOUND'
  | 'DOCUMENT_UNREADABLE'
  | 'OUTPUT_WRITE_FAILED';

export class ConversionError extends Error {
  readonly code: ConversionErrorCode;
  readonly sourceFile: string;

  constructor(code: ConversionErrorCode, sourceFile: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConversionError';
    this.code = code;
    this.sourceFile = sourceFile;
  }
}

export class DocumentNotFoundError extends ConversionError {
  constructor(sourceFile: string) {
    super('DOCUMENT_NOT_FOUND', sourceFile, `Document not found: ${sourceFile}`);
    this.name = 'DocumentNotFoundError';
  }
}

export class DocumentReadError extends ConversionError {
  constructor(sourceFile: string, cause: unknown) {
    super(
      'DOCUMENT_UNREADABLE',
      sourceFile,
      `Unable to read document ${sourceFile}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = 'DocumentReadError';
  }
}

export class OutputWriteError extends ConversionError {
  constructor(sourceFile: string, outputFile: string, cause: unknown) {
    super(
      'OUTPUT_WRITE_FAILED',
      sourceFile,
      `Unable to write ${outputFile}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = 'OutputWriteError';
  }
}

export function isConversionError(error: unknown): error is ConversionError {
  return error instanceof ConversionError;
}
