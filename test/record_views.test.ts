import { describe, expect, it } from 'vitest';

import {
  dataAsHex,
  dataAsInteger,
  describeRecord,
  parseRecord,
  recordTypeName,
  RecordTypes,
} from '../src/frontend/record.js';

describe('record views', () => {
  it('reads data bytes as a big-endian integer', () => {
    expect(dataAsInteger(parseRecord(1, ':020000021000EC'))).toBe(0x1000n);
    expect(dataAsInteger(parseRecord(1, ':0400000312345678E5'))).toBe(0x12345678n);
    expect(dataAsInteger(parseRecord(1, ':00000001FF'))).toBe(0n);
  });

  it('keeps every byte of long data exact', () => {
    const record = parseRecord(1, ':09000000010203040506070809CA');
    expect(dataAsInteger(record)).toBe(0x010203040506070809n);
  });

  it('renders data as hex with an optional separator', () => {
    const record = parseRecord(1, ':0300300002337A1E');
    expect(dataAsHex(record)).toBe('02337A');
    expect(dataAsHex(record, ' ')).toBe('02 33 7A');
  });

  it('names the six record types', () => {
    expect(recordTypeName(RecordTypes.Data)).toBe('DATA');
    expect(recordTypeName(RecordTypes.Eof)).toBe('EOF');
    expect(recordTypeName(RecordTypes.ExtendedSegmentAddress)).toBe('EXTENDED_SEGMENT_ADDRESS');
    expect(recordTypeName(RecordTypes.StartSegmentAddress)).toBe('START_SEGMENT_ADDRESS');
    expect(recordTypeName(RecordTypes.ExtendedLinearAddress)).toBe('EXTENDED_LINEAR_ADDRESS');
    expect(recordTypeName(RecordTypes.StartLinearAddress)).toBe('START_LINEAR_ADDRESS');
    expect(recordTypeName(6)).toBeUndefined();
  });

  it('describes a data record', () => {
    expect(describeRecord(parseRecord(1, ':0300300002337A1E'))).toBe(
      '0001: DATA: 3 bytes from 0x0030: 02 33 7A',
    );
  });

  it('describes an EOF record', () => {
    expect(describeRecord(parseRecord(12, ':00000001FF'))).toBe(
      '0012: EOF: 0 bytes from 0x0000: ',
    );
  });

  it('flags an invalid checksum', () => {
    expect(describeRecord(parseRecord(3, ':020000021000ED'))).toBe(
      '0003: EXTENDED_SEGMENT_ADDRESS: 2 bytes from 0x0000: 10 00 (INVALID CHECKSUM)',
    );
  });

  it('describes a record type without a name by its code', () => {
    expect(describeRecord(parseRecord(5, ':00000006FA'))).toBe(
      '0005: UNKNOWN(0x06): 0 bytes from 0x0000: ',
    );
  });

  it('does not truncate line numbers wider than four digits', () => {
    expect(describeRecord(parseRecord(12345, ':00000001FF'))).toBe(
      '12345: EOF: 0 bytes from 0x0000: ',
    );
  });
});
