/**
 * @arch codeout.core.barrel
 *
 * Emit pipeline exports barrel file.
 */
export { Emitter, emit } from './emitter.js';
export type { EmitterOptions } from './emitter.js';
export { defaultIdentifier, resolveIdentifier } from './naming.js';
export { currentDirectory, resolveDirectory, resolveOutputPath, prepareDirectory } from './paths.js';
export type { PathContext } from './paths.js';
export { composeArtifact, harnessBlock, LINT_PRELUDE } from './harness.js';
export { writeArtifact } from './writer.js';
export { CommandFormatter, toFormatterError } from './formatter.js';
export { StdoutNotifier, formatNotification } from './notifier.js';
export type { StatusStream } from './notifier.js';
export type {
  TextProvider,
  GeneratedSource,
  Clock,
  ArtifactLocation,
  FormattingStatus,
  EmitResult,
  FormatOutcome,
  SourceFormatter,
  Notifier,
} from './types.js';
