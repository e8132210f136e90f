/**
 * @arch codeout.core.types
 *
 * Emit pipeline type definitions.
 */
import type { EmitError, FormatterError } from '../../utils/errors.js';

/**
 * Anything that can hand over its full source text.
 * ts-morph SourceFile and Node objects satisfy this.
 */
export interface TextProvider {
  getFullText(): string;
}

/** Generated code as the caller holds it. Never mutated. */
export type GeneratedSource = string | TextProvider;

/** Source of the current time for default identifiers. */
export type Clock = () => Date;

/** Directory and file an artifact is written to. */
export interface ArtifactLocation {
  /** Absolute directory the artifact lands in */
  directory: string;
  /** Absolute path of the artifact file */
  filePath: string;
}

/** What happened in the formatter stage. */
export type FormattingStatus = 'skipped' | 'formatted' | 'failed';

/**
 * Result of one emit call.
 */
export type EmitResult =
  | { status: 'disabled' }
  | {
      status: 'written';
      filePath: string;
      identifier: string;
      /** Content as written, before any formatting */
      content: string;
      formatting: FormattingStatus;
      notified: boolean;
    }
  | { status: 'failed'; error: EmitError };

/** Outcome reported by a formatter. */
export type FormatOutcome =
  | { ok: true; output?: string }
  | { ok: false; error: FormatterError };

/**
 * Rewrites a file in place. Failures are reported, never thrown.
 */
export interface SourceFormatter {
  readonly name: string;
  format(filePath: string): Promise<FormatOutcome>;
}

/**
 * Announces a successful write. May throw or reject; the pipeline ignores it.
 */
export interface Notifier {
  notify(filePath: string): void | Promise<void>;
}
