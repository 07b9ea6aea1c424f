import type { AssembledImage } from '../assembler/assemble.js';
import type { HexRecord } from '../frontend/record.js';

/**
 * Options for BIN writing (reserved for future options).
 */
export interface WriteBinOptions {}

/**
 * Options for explain-text writing.
 */
export interface WriteExplainOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
}

/**
 * In-memory flat binary artifact.
 */
export interface BinArtifact {
  kind: 'bin';
  path?: string;
  bytes: Uint8Array;
}

/**
 * In-memory explain artifact: one rendered line per record.
 */
export interface ExplainArtifact {
  kind: 'explain';
  path?: string;
  text: string;
}

/**
 * Union of all artifact kinds produced by the converter.
 */
export type Artifact = BinArtifact | ExplainArtifact;

/**
 * Format writers used by the pipeline to turn an image or a record sequence into artifacts.
 */
export interface FormatWriters {
  writeBin(image: AssembledImage, opts?: WriteBinOptions): BinArtifact;
  writeExplain(records: Iterable<HexRecord>, opts?: WriteExplainOptions): ExplainArtifact;
}
