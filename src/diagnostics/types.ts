/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A conversion diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `IHX100`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /** Unknown/unclassified diagnostic. */
  Unknown: 'IHX000',

  /** Failed to read the input. */
  IoReadFailed: 'IHX001',

  /** Line does not match the record grammar. */
  MalformedLine: 'IHX100',

  /** Stored checksum differs from the computed one. */
  ChecksumMismatch: 'IHX200',

  /** A record follows the EOF record. */
  RecordAfterEof: 'IHX300',

  /** Record type the assembler does not implement (or an unnamed code). */
  UnhandledRecordType: 'IHX301',

  /** EXTENDED_SEGMENT_ADDRESS record whose data is not exactly two bytes. */
  InvalidSegmentAddress: 'IHX303',

  /** Input ended before an EOF record. */
  MissingEof: 'IHX302',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];
