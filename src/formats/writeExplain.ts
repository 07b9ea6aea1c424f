import { describeRecord, type HexRecord } from '../frontend/record.js';
import type { ExplainArtifact, WriteExplainOptions } from './types.js';

/**
 * Render one description line per record, in input order.
 *
 * Checksums are flagged in the text rather than enforced, and record types are not
 * interpreted, so this never reaches the assembler.
 */
export function writeExplain(
  records: Iterable<HexRecord>,
  opts?: WriteExplainOptions,
): ExplainArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const lines: string[] = [];
  for (const record of records) lines.push(describeRecord(record));
  return { kind: 'explain', text: lines.map((l) => l + lineEnding).join('') };
}
