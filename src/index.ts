export {
  assemble,
  assembleStream,
  ImageAssembler,
  type AssembledImage,
  type StartSegment,
} from './assembler/assemble.js';
export { ImageBuffer } from './assembler/image.js';
export { convert, convertFile } from './convert.js';
export {
  ChecksumMismatchError,
  HexError,
  MalformedLineError,
  MissingEofError,
  SegmentAddressLengthError,
  UnexpectedRecordAfterEofError,
  UnhandledRecordTypeError,
} from './diagnostics/errors.js';
export { DiagnosticIds, type Diagnostic, type DiagnosticId } from './diagnostics/types.js';
export { defaultFormatWriters } from './formats/index.js';
export type { Artifact, BinArtifact, ExplainArtifact, FormatWriters } from './formats/types.js';
export { dump, writeBin } from './formats/writeBin.js';
export { writeExplain } from './formats/writeExplain.js';
export {
  dataAsHex,
  dataAsInteger,
  describeRecord,
  encodeRecord,
  expectedChecksum,
  isChecksumValid,
  parseRecord,
  recordTypeName,
  RecordTypes,
  validateRecord,
  type HexRecord,
  type RecordType,
  type RecordTypeName,
} from './frontend/record.js';
export {
  parseRecords,
  parseRecordStream,
  sourceLines,
  streamSourceLines,
  type SourceLine,
} from './frontend/source.js';
export type { ConvertMode, ConvertOptions, ConvertResult, PipelineDeps } from './pipeline.js';
