#!/usr/bin/env node
import { mkdir, writeFile } from 'node:fs/promises';
import { realpathSync } from 'node:fs';
import { createRequire } from 'node:module';
import { dirname, resolve } from 'node:path';
import type { Readable, Writable } from 'node:stream';
import { fileURLToPath } from 'node:url';

import { convert, convertFile } from './convert.js';
import type { Diagnostic } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import { dump } from './formats/writeBin.js';
import type { Artifact } from './formats/types.js';
import { streamSourceLines } from './frontend/source.js';
import type { ConvertMode, ConvertResult } from './pipeline.js';

type CliExit = { code: number };

type CliOptions = {
  inputFile?: string;
  outputPath?: string;
  mode: ConvertMode;
};

/**
 * Streams the CLI reads from and writes to. Defaults to the process streams.
 */
export interface CliIo {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
}

const STDIN_NAME = '<stdin>';

function usage(): string {
  return [
    'ihexbin [options] [explain] [<input.hex>]',
    '',
    'Options:',
    '  -o, --output <file>   Write the output to <file> instead of stdout',
    '  -e, --explain         Print one description line per record instead of binary',
    '  -V, --version         Print version',
    '  -h, --help            Show help',
    '',
    'Notes:',
    '  - Without <input.hex>, Intel HEX text is read from stdin.',
    '  - A leading `explain` argument is the same as --explain.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function readVersion(): string {
  const require = createRequire(import.meta.url);
  const here = dirname(fileURLToPath(import.meta.url));
  // Built CLI lives in dist/src, sources in src.
  const built = here.replace(/\\/g, '/').endsWith('/dist/src');
  const candidates = built ? [['..', '..'], ['..']] : [['..']];
  for (const rel of candidates) {
    try {
      const pkg = require(resolve(here, ...rel, 'package.json')) as { version?: unknown };
      return String(pkg.version ?? '0.0.0');
    } catch {
      continue;
    }
  }
  return '0.0.0';
}

function parseArgs(argv: string[], io: CliIo): CliOptions | CliExit {
  let outputPath: string | undefined;
  let mode: ConvertMode = 'bin';
  let inputFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      io.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      io.stdout.write(`${readVersion()}\n`);
      return { code: 0 };
    }
    if (a === '-o' || a === '--output' || a.startsWith('--output=')) {
      if (a.startsWith('--output=')) {
        const v = a.slice('--output='.length);
        if (!v) fail(`--output expects a value`);
        outputPath = v;
        continue;
      }
      const v = argv[++i];
      if (!v) fail(`${a} expects a value`);
      outputPath = v;
      continue;
    }
    if (a === '-e' || a === '--explain' || (a === 'explain' && i === 0)) {
      mode = 'explain';
      continue;
    }
    if (a.startsWith('-') && a !== '-') {
      fail(`Unknown option "${a}"`);
    }
    if (inputFile !== undefined || i !== argv.length - 1) {
      fail(`Expected at most one <input.hex> argument (and it must be last)`);
    }
    inputFile = a;
  }

  return {
    // `-` names stdin explicitly.
    ...(inputFile && inputFile !== '-' ? { inputFile } : {}),
    ...(outputPath ? { outputPath } : {}),
    mode,
  };
}

function writeText(sink: Writable, text: string): Promise<void> {
  return new Promise((resolveWrite, rejectWrite) => {
    sink.write(text, (err) => {
      if (err) rejectWrite(err);
      else resolveWrite();
    });
  });
}

async function writeArtifact(
  artifact: Artifact,
  outputPath: string | undefined,
  io: CliIo,
): Promise<void> {
  if (outputPath === undefined) {
    if (artifact.kind === 'bin') await dump(artifact, io.stdout);
    else await writeText(io.stdout, artifact.text);
    return;
  }
  const data = artifact.kind === 'bin' ? Buffer.from(artifact.bytes) : artifact.text;
  const path = resolve(outputPath);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, data);
}

function formatDiagnostic(d: Diagnostic): string {
  const loc = d.line !== undefined ? `${d.file}:${d.line}` : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}`;
}

async function runConversion(parsed: CliOptions, io: CliIo): Promise<ConvertResult> {
  const deps = { formats: defaultFormatWriters };
  if (parsed.inputFile !== undefined) {
    return convertFile(parsed.inputFile, { mode: parsed.mode }, deps);
  }
  return convert(streamSourceLines(io.stdin), { mode: parsed.mode, file: STDIN_NAME }, deps);
}

export async function runCli(
  argv: string[],
  io: CliIo = { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr },
): Promise<number> {
  try {
    const parsed = parseArgs(argv, io);
    if ('code' in parsed) return parsed.code;

    const res = await runConversion(parsed, io);
    for (const d of res.diagnostics) {
      io.stderr.write(`${formatDiagnostic(d)}\n`);
    }
    if (res.diagnostics.some((d) => d.severity === 'error')) {
      return 1;
    }

    for (const artifact of res.artifacts) {
      await writeArtifact(artifact, parsed.outputPath, io);
    }
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    io.stderr.write(`ihexbin: ${msg}\n`);
    io.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function stripExtendedWindowsPrefix(path: string): string {
  if (path.startsWith('\\\\?\\UNC\\')) return `\\\\${path.slice(8)}`;
  if (path.startsWith('\\\\?\\')) return path.slice(4);
  return path;
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const stripped = stripExtendedWindowsPrefix(real);
  const normalized = stripped.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  if (normalizePathForCompare(invokedAs) === normalizePathForCompare(self)) return true;

  // Windows CI can surface different canonical path spellings for the same file.
  // Fall back to stable suffix matching for the built CLI entry path.
  const invoked = normalizePathForCompare(invokedAs);
  const normalizedSelf = normalizePathForCompare(self);
  return invoked.endsWith('/dist/src/cli.js') && normalizedSelf.endsWith('/dist/src/cli.js');
}

if (isDirectCliInvocation(process.argv[1])) {
  // eslint-disable-next-line no-void
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
