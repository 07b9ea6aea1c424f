import { DiagnosticIds, type Diagnostic, type DiagnosticId } from './types.js';

function toHexByte(n: number): string {
  return (n & 0xff).toString(16).toUpperCase().padStart(2, '0');
}

/**
 * Base class for every fatal parse/assembly error.
 *
 * Each subclass carries a stable diagnostic ID so the pipeline can report it without
 * inspecting the message text.
 */
export abstract class HexError extends Error {
  abstract readonly id: DiagnosticId;

  protected constructor(
    message: string,
    /** 1-based source line, when the error belongs to one record. */
    readonly line?: number,
  ) {
    super(message);
  }

  toDiagnostic(file: string): Diagnostic {
    return {
      id: this.id,
      severity: 'error',
      message: this.message,
      file,
      ...(this.line !== undefined ? { line: this.line } : {}),
    };
  }
}

export class MalformedLineError extends HexError {
  override readonly name = 'MalformedLineError';
  override readonly id = DiagnosticIds.MalformedLine;

  constructor(
    line: number,
    readonly text: string,
  ) {
    super(`Invalid line: '${text}'`, line);
  }
}

export class ChecksumMismatchError extends HexError {
  override readonly name = 'ChecksumMismatchError';
  override readonly id = DiagnosticIds.ChecksumMismatch;

  constructor(
    line: number,
    readonly expected: number,
    readonly actual: number,
    readonly description: string,
  ) {
    super(
      `Checksum failed for line ${line}, expected ${toHexByte(expected)}, got ${toHexByte(actual)}\n${description}`,
      line,
    );
  }
}

export class UnexpectedRecordAfterEofError extends HexError {
  override readonly name = 'UnexpectedRecordAfterEofError';
  override readonly id = DiagnosticIds.RecordAfterEof;

  constructor(line: number) {
    super('Unexpected record after EOF record', line);
  }
}

export class UnhandledRecordTypeError extends HexError {
  override readonly name = 'UnhandledRecordTypeError';
  override readonly id = DiagnosticIds.UnhandledRecordType;

  constructor(
    line: number,
    readonly type: number,
    description: string,
  ) {
    super(`Unhandled record type: ${description}`, line);
  }
}

export class SegmentAddressLengthError extends HexError {
  override readonly name = 'SegmentAddressLengthError';
  override readonly id = DiagnosticIds.InvalidSegmentAddress;

  constructor(line: number, description: string) {
    super(`Extended segment address record needs 2 data bytes: ${description}`, line);
  }
}

export class MissingEofError extends HexError {
  override readonly name = 'MissingEofError';
  override readonly id = DiagnosticIds.MissingEof;

  constructor() {
    super('Missing EOF record');
  }
}
