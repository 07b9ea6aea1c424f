import type { Writable } from 'node:stream';

import type { AssembledImage } from '../assembler/assemble.js';
import type { BinArtifact, WriteBinOptions } from './types.js';

/**
 * Create a flat binary artifact from an assembled image.
 *
 * The image already starts at address 0 and has its gaps zero-filled, so the bytes are taken
 * as they are.
 */
export function writeBin(image: AssembledImage, _opts?: WriteBinOptions): BinArtifact {
  return { kind: 'bin', bytes: image.bytes };
}

/**
 * Write the whole image to `sink`, first byte to last, with no framing.
 *
 * Accepts an {@link AssembledImage} or a {@link BinArtifact}.
 */
export function dump(image: Pick<AssembledImage, 'bytes'>, sink: Writable): Promise<void> {
  return new Promise((resolveWrite, rejectWrite) => {
    sink.write(Buffer.from(image.bytes), (err) => {
      if (err) rejectWrite(err);
      else resolveWrite();
    });
  });
}
