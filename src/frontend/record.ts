import { ChecksumMismatchError, MalformedLineError } from '../diagnostics/errors.js';

/**
 * Record type codes.
 */
export const RecordTypes = {
  Data: 0x00,
  Eof: 0x01,
  ExtendedSegmentAddress: 0x02,
  StartSegmentAddress: 0x03,
  ExtendedLinearAddress: 0x04,
  StartLinearAddress: 0x05,
} as const;

export type RecordType = (typeof RecordTypes)[keyof typeof RecordTypes];

const RECORD_TYPE_NAMES = [
  'DATA',
  'EOF',
  'EXTENDED_SEGMENT_ADDRESS',
  'START_SEGMENT_ADDRESS',
  'EXTENDED_LINEAR_ADDRESS',
  'START_LINEAR_ADDRESS',
] as const;

export type RecordTypeName = (typeof RECORD_TYPE_NAMES)[number];

/**
 * One parsed line of Intel HEX text.
 *
 * `type` stays a plain byte: codes without a name still parse and are rejected later by the
 * assembler.
 */
export interface HexRecord {
  /** 1-based line number in the source. */
  readonly line: number;
  /** Declared data byte count. Not checked against `data.length`. */
  readonly size: number;
  /** 16-bit line-local address. */
  readonly address: number;
  readonly type: number;
  readonly data: readonly number[];
  readonly checksum: number;
}

const RECORD_RE =
  /^:([0-9A-Fa-f]{2})([0-9A-Fa-f]{4})([0-9A-Fa-f]{2})((?:[0-9A-Fa-f]{2})*)([0-9A-Fa-f]{2})\s*$/;

function toHexByte(n: number): string {
  return (n & 0xff).toString(16).toUpperCase().padStart(2, '0');
}

function toHexWord(n: number): string {
  return (n & 0xffff).toString(16).toUpperCase().padStart(4, '0');
}

/**
 * Parse one line of text into a {@link HexRecord}.
 *
 * The checksum is read but not verified; see {@link validateRecord}.
 */
export function parseRecord(line: number, text: string): HexRecord {
  const m = RECORD_RE.exec(text);
  if (!m) throw new MalformedLineError(line, text);
  const [, size, address, type, data, checksum] = m;
  if (
    size === undefined ||
    address === undefined ||
    type === undefined ||
    data === undefined ||
    checksum === undefined
  ) {
    throw new MalformedLineError(line, text);
  }

  const bytes: number[] = [];
  for (let i = 0; i < data.length; i += 2) {
    bytes.push(Number.parseInt(data.slice(i, i + 2), 16));
  }

  return {
    line,
    size: Number.parseInt(size, 16),
    address: Number.parseInt(address, 16),
    type: Number.parseInt(type, 16),
    data: bytes,
    checksum: Number.parseInt(checksum, 16),
  };
}

export function recordTypeName(type: number): RecordTypeName | undefined {
  return RECORD_TYPE_NAMES[type];
}

/**
 * Two's complement of the 8-bit running sum of size, address bytes, type and data.
 */
export function expectedChecksum(record: HexRecord): number {
  const header = [record.size, (record.address >> 8) & 0xff, record.address & 0xff, record.type];
  const sum = [...header, ...record.data].reduce((acc, b) => (acc + (b & 0xff)) & 0xff, 0);
  return (0x100 - sum) & 0xff;
}

export function isChecksumValid(record: HexRecord): boolean {
  return record.checksum === expectedChecksum(record);
}

/**
 * Throw {@link ChecksumMismatchError} unless the stored checksum matches.
 */
export function validateRecord(record: HexRecord): void {
  const expected = expectedChecksum(record);
  if (record.checksum !== expected) {
    throw new ChecksumMismatchError(record.line, expected, record.checksum, describeRecord(record));
  }
}

/**
 * Big-endian unsigned value of the data bytes, exact for any data length.
 */
export function dataAsInteger(record: HexRecord): bigint {
  return record.data.reduce((acc, b) => (acc << 8n) | BigInt(b), 0n);
}

export function dataAsHex(record: HexRecord, separator = ''): string {
  return record.data.map(toHexByte).join(separator);
}

/**
 * Human-readable one-line rendering, e.g. `0001: DATA: 3 bytes from 0x0030: 02 33 7A`.
 */
export function describeRecord(record: HexRecord): string {
  const typeName = recordTypeName(record.type) ?? `UNKNOWN(0x${toHexByte(record.type)})`;
  const invalid = isChecksumValid(record) ? '' : ' (INVALID CHECKSUM)';
  const line = String(record.line).padStart(4, '0');
  return `${line}: ${typeName}: ${record.size} bytes from 0x${toHexWord(record.address)}: ${dataAsHex(record, ' ')}${invalid}`;
}

/**
 * Canonical text form: colon prefix, uppercase hex, no separators.
 */
export function encodeRecord(record: HexRecord): string {
  return `:${toHexByte(record.size)}${toHexWord(record.address)}${toHexByte(record.type)}${dataAsHex(record)}${toHexByte(record.checksum)}`;
}
