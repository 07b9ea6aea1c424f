import type { Diagnostic } from './diagnostics/types.js';
import type { SourceLine } from './frontend/source.js';
import type { Artifact, FormatWriters } from './formats/types.js';

export type ConvertMode = 'bin' | 'explain';

/**
 * Options that influence conversion behavior and which artifact is produced.
 */
export interface ConvertOptions {
  /** `bin` assembles an image (default); `explain` renders one line per record. */
  mode?: ConvertMode;
  /** Name used for the input in diagnostics (default: `<input>`). */
  file?: string;
  /** Line ending for the explain text. */
  lineEnding?: '\n' | '\r\n';
}

/**
 * Result of a conversion run: diagnostics plus any produced artifacts.
 *
 * A run with an error diagnostic produces no artifacts.
 */
export interface ConvertResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
}

/**
 * Dependency injection surface for the conversion pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can be pure/in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level convert function signature used by the pipeline contract.
 */
export type ConvertFn = (
  lines: AsyncIterable<SourceLine> | Iterable<SourceLine>,
  options: ConvertOptions,
  deps: PipelineDeps,
) => Promise<ConvertResult>;
