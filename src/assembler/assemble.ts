import {
  MissingEofError,
  SegmentAddressLengthError,
  UnexpectedRecordAfterEofError,
  UnhandledRecordTypeError,
} from '../diagnostics/errors.js';
import {
  dataAsInteger,
  describeRecord,
  RecordTypes,
  validateRecord,
  type HexRecord,
} from '../frontend/record.js';
import { ImageBuffer } from './image.js';

/**
 * Registers captured from a START_SEGMENT_ADDRESS record.
 *
 * `cs` and `ip` are the first and second data bytes taken as single bytes, not as 16-bit words.
 * They are informational and never used for address resolution.
 */
export interface StartSegment {
  cs?: number;
  ip?: number;
}

/**
 * Result of a successful assembly run.
 */
export interface AssembledImage {
  /** Image bytes from address 0 through the last written byte. */
  bytes: Uint8Array;
  startSegment?: StartSegment;
}

/**
 * Streaming record-to-image state machine. One instance per run.
 *
 * Absolute addresses are `baseAddress + record.address` with no wraparound. The segment base
 * is two bytes times 16, so a record starts at most at `0xFFFF * 16 + 0xFFFF` (`0x10FFEF`)
 * and its up to 255 data bytes end the image at most at `0x1100EE`.
 */
export class ImageAssembler {
  private baseAddress = 0;
  private eofSeen = false;
  private startSegment: StartSegment | undefined;
  private readonly image = new ImageBuffer();

  accept(record: HexRecord): void {
    if (this.eofSeen) throw new UnexpectedRecordAfterEofError(record.line);
    validateRecord(record);

    switch (record.type) {
      case RecordTypes.Data:
        this.image.write(this.baseAddress + record.address, record.data);
        return;
      case RecordTypes.Eof:
        this.eofSeen = true;
        return;
      case RecordTypes.ExtendedSegmentAddress:
        if (record.data.length !== 2) {
          throw new SegmentAddressLengthError(record.line, describeRecord(record));
        }
        this.baseAddress = Number(dataAsInteger(record)) * 16;
        return;
      case RecordTypes.StartSegmentAddress: {
        const [cs, ip] = record.data;
        this.startSegment = { cs, ip };
        return;
      }
      default:
        // EXTENDED_LINEAR_ADDRESS and START_LINEAR_ADDRESS land here as well.
        throw new UnhandledRecordTypeError(record.line, record.type, describeRecord(record));
    }
  }

  finish(): AssembledImage {
    if (!this.eofSeen) throw new MissingEofError();
    return {
      bytes: this.image.toBytes(),
      ...(this.startSegment ? { startSegment: this.startSegment } : {}),
    };
  }
}

/**
 * Assemble a lazy record sequence into an image. The first error aborts the run.
 */
export function assemble(records: Iterable<HexRecord>): AssembledImage {
  const assembler = new ImageAssembler();
  for (const record of records) assembler.accept(record);
  return assembler.finish();
}

/**
 * {@link assemble} over a source that may suspend between records (e.g. a stream reader).
 */
export async function assembleStream(
  records: AsyncIterable<HexRecord> | Iterable<HexRecord>,
): Promise<AssembledImage> {
  const assembler = new ImageAssembler();
  for await (const record of records) assembler.accept(record);
  return assembler.finish();
}
