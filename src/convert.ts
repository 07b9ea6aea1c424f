import { readFile } from 'node:fs/promises';

import { assembleStream } from './assembler/assemble.js';
import { HexError } from './diagnostics/errors.js';
import { DiagnosticIds, type Diagnostic } from './diagnostics/types.js';
import type { HexRecord } from './frontend/record.js';
import { parseRecordStream, sourceLines, type SourceLine } from './frontend/source.js';
import type { Artifact } from './formats/types.js';
import type {
  ConvertFn,
  ConvertMode,
  ConvertOptions,
  ConvertResult,
  PipelineDeps,
} from './pipeline.js';

function withDefaults(
  options: ConvertOptions,
): Required<Pick<ConvertOptions, 'mode' | 'file' | 'lineEnding'>> {
  return {
    mode: options.mode ?? 'bin',
    file: options.file ?? '<input>',
    lineEnding: options.lineEnding ?? '\n',
  };
}

async function collect(records: AsyncIterable<HexRecord>): Promise<HexRecord[]> {
  const out: HexRecord[] = [];
  for await (const record of records) out.push(record);
  return out;
}

async function produce(
  lines: AsyncIterable<SourceLine> | Iterable<SourceLine>,
  mode: ConvertMode,
  lineEnding: '\n' | '\r\n',
  deps: PipelineDeps,
): Promise<Artifact> {
  const records = parseRecordStream(lines);
  if (mode === 'explain') {
    return deps.formats.writeExplain(await collect(records), { lineEnding });
  }
  return deps.formats.writeBin(await assembleStream(records));
}

/**
 * Convert a line sequence into one artifact.
 *
 * Parse and assembly errors become a single error diagnostic and no artifact; anything
 * else (I/O failures from the line source included) propagates.
 */
export const convert: ConvertFn = async (
  lines: AsyncIterable<SourceLine> | Iterable<SourceLine>,
  options: ConvertOptions,
  deps: PipelineDeps,
): Promise<ConvertResult> => {
  const { mode, file, lineEnding } = withDefaults(options);
  try {
    const artifact = await produce(lines, mode, lineEnding, deps);
    return { diagnostics: [], artifacts: [artifact] };
  } catch (err) {
    if (err instanceof HexError) {
      return { diagnostics: [err.toDiagnostic(file)], artifacts: [] };
    }
    throw err;
  }
};

function isIoError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

/**
 * Read `path` and {@link convert} its contents. A read failure becomes an `IHX001` diagnostic.
 */
export async function convertFile(
  path: string,
  options: ConvertOptions,
  deps: PipelineDeps,
): Promise<ConvertResult> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    if (!isIoError(err)) throw err;
    const diagnostic: Diagnostic = {
      id: DiagnosticIds.IoReadFailed,
      severity: 'error',
      message: `Failed to read input "${path}": ${err.message}`,
      file: path,
    };
    return { diagnostics: [diagnostic], artifacts: [] };
  }
  return convert(sourceLines(text), { ...options, file: options.file ?? path }, deps);
}
