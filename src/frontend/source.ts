import type { Readable } from 'node:stream';
import { StringDecoder } from 'node:string_decoder';

import { parseRecord, type HexRecord } from './record.js';

/**
 * A non-blank input line and its 1-based physical line number.
 */
export interface SourceLine {
  line: number;
  text: string;
}

const BLANK_RE = /^\s*$/;

/**
 * Lines of `text`, numbered from 1. Whitespace-only lines are skipped but still counted.
 */
export function* sourceLines(text: string): Generator<SourceLine> {
  const lines = text.split('\n');
  // A trailing newline does not start another line.
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  for (let i = 0; i < lines.length; i++) {
    const lineText = lines[i] ?? '';
    if (BLANK_RE.test(lineText)) continue;
    yield { line: i + 1, text: lineText };
  }
}

/**
 * Stream form of {@link sourceLines}. Lines end at `\n` only, exactly as in the string form,
 * so a carriage return stays with its line.
 */
export async function* streamSourceLines(input: Readable): AsyncGenerator<SourceLine> {
  const decoder = new StringDecoder('utf8');
  let pending = '';
  let line = 0;
  for await (const chunk of input) {
    if (typeof chunk === 'string') pending += chunk;
    else if (chunk instanceof Uint8Array) pending += decoder.write(Buffer.from(chunk));
    else throw new TypeError(`Unsupported stream chunk: ${typeof chunk}`);

    const parts = pending.split('\n');
    // The last part is incomplete until its newline arrives.
    pending = parts.pop() ?? '';
    for (const lineText of parts) {
      line++;
      if (BLANK_RE.test(lineText)) continue;
      yield { line, text: lineText };
    }
  }
  pending += decoder.end();
  if (pending !== '') {
    line++;
    if (!BLANK_RE.test(pending)) yield { line, text: pending };
  }
}

export function* parseRecords(lines: Iterable<SourceLine>): Generator<HexRecord> {
  for (const { line, text } of lines) yield parseRecord(line, text);
}

export async function* parseRecordStream(
  lines: AsyncIterable<SourceLine> | Iterable<SourceLine>,
): AsyncGenerator<HexRecord> {
  for await (const { line, text } of lines) yield parseRecord(line, text);
}
