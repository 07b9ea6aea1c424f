import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { describe, expect, it, vi } from 'vitest';

import { convert, convertFile } from '../src/convert.js';
import { defaultFormatWriters } from '../src/formats/index.js';
import type { BinArtifact, ExplainArtifact, FormatWriters } from '../src/formats/types.js';
import { sourceLines, type SourceLine } from '../src/frontend/source.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const deps = { formats: defaultFormatWriters };

describe('convert', () => {
  it('assembles a binary artifact by default', async () => {
    const res = await convert(sourceLines(':03000000C3000139\n:00000001FF\n'), {}, deps);
    expect(res.diagnostics).toEqual([]);
    expect(res.artifacts).toEqual([{ kind: 'bin', bytes: Uint8Array.of(0xc3, 0x00, 0x01) }]);
  });

  it('turns a checksum failure into one located diagnostic and no artifacts', async () => {
    const res = await convert(sourceLines(':0300300002337A1F\n:00000001FF\n'), {}, deps);
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics).toEqual([
      {
        id: 'IHX200',
        severity: 'error',
        message:
          'Checksum failed for line 1, expected 1E, got 1F\n' +
          '0001: DATA: 3 bytes from 0x0030: 02 33 7A (INVALID CHECKSUM)',
        file: '<input>',
        line: 1,
      },
    ]);
  });

  it('reports a missing EOF without a line', async () => {
    const res = await convert(sourceLines(':0300300002337A1E\n'), { file: 'image.hex' }, deps);
    expect(res.diagnostics).toEqual([
      { id: 'IHX302', severity: 'error', message: 'Missing EOF record', file: 'image.hex' },
    ]);
  });

  it('explains each record without assembling', async () => {
    const text = ':0300300002337A1F\n\n:00000001FF\n:020000040001F9\n';
    const res = await convert(sourceLines(text), { mode: 'explain' }, deps);
    expect(res.diagnostics).toEqual([]);
    expect(res.artifacts).toEqual([
      {
        kind: 'explain',
        text:
          '0001: DATA: 3 bytes from 0x0030: 02 33 7A (INVALID CHECKSUM)\n' +
          '0003: EOF: 0 bytes from 0x0000: \n' +
          '0004: EXTENDED_LINEAR_ADDRESS: 2 bytes from 0x0000: 00 01\n',
      },
    ]);
  });

  it('uses the requested line ending for explain text', async () => {
    const res = await convert(
      sourceLines(':00000001FF\n'),
      { mode: 'explain', lineEnding: '\r\n' },
      deps,
    );
    const explain = res.artifacts.find((a): a is ExplainArtifact => a.kind === 'explain');
    expect(explain?.text).toBe('0001: EOF: 0 bytes from 0x0000: \r\n');
  });

  it('stops explaining at a malformed line', async () => {
    const res = await convert(sourceLines(':00000001FF\n:oops\n'), { mode: 'explain' }, deps);
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics).toEqual([
      { id: 'IHX100', severity: 'error', message: "Invalid line: ':oops'", file: '<input>', line: 2 },
    ]);
  });

  it('passes work to the injected format writers', async () => {
    const writeBin = vi.fn<FormatWriters['writeBin']>(() => ({
      kind: 'bin',
      bytes: Uint8Array.of(0x42),
    }));
    const formats: FormatWriters = { ...defaultFormatWriters, writeBin };
    const res = await convert(sourceLines(':0100010033CB\n:00000001FF\n'), {}, { formats });
    expect(writeBin).toHaveBeenCalledTimes(1);
    expect(writeBin.mock.calls[0]?.[0].bytes).toEqual(Uint8Array.of(0x00, 0x33));
    expect(res.artifacts).toEqual([{ kind: 'bin', bytes: Uint8Array.of(0x42) }]);
  });

  it('propagates errors that do not come from parsing or assembly', async () => {
    function* failing(): Generator<SourceLine> {
      yield { line: 1, text: ':00000001FF' };
      throw new Error('line source failed');
    }
    await expect(convert(failing(), {}, deps)).rejects.toThrow('line source failed');
  });
});

describe('convertFile', () => {
  it('reads and assembles a file', async () => {
    const res = await convertFile(join(__dirname, 'fixtures', 'segmented.hex'), {}, deps);
    expect(res.diagnostics).toEqual([]);
    const bin = res.artifacts.find((a): a is BinArtifact => a.kind === 'bin');
    expect(bin?.bytes.length).toBe(0x106);
    expect([...(bin?.bytes.subarray(0, 5) ?? [])]).toEqual([0xc3, 0x00, 0x01, 0xaa, 0xbb]);
    expect(bin?.bytes[0x104]).toBe(0x11);
    expect(bin?.bytes[0x105]).toBe(0x22);
  });

  it('names the file in diagnostics', async () => {
    const path = join(__dirname, 'fixtures', 'bad_checksum.hex');
    const res = await convertFile(path, {}, deps);
    expect(res.diagnostics.map((d) => [d.id, d.file, d.line])).toEqual([['IHX200', path, 1]]);
  });

  it('reports an unreadable file as a diagnostic', async () => {
    const path = join(__dirname, 'fixtures', 'missing.hex');
    const res = await convertFile(path, {}, deps);
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics).toHaveLength(1);
    expect(res.diagnostics[0]?.id).toBe('IHX001');
    expect(res.diagnostics[0]?.file).toBe(path);
    expect(res.diagnostics[0]?.message.startsWith(`Failed to read input "${path}": ENOENT`)).toBe(
      true,
    );
  });
});
