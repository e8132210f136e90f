/**
 * @arch codeout.core.engine
 *
 * The artifact pipeline: gate, resolve name and path, compose, write,
 * then the optional formatter and notifier stages.
 */
import { mergeConfig, configFromEnv } from '../config/loader.js';
import type { Config, PartialConfig } from '../config/schema.js';
import {
  PathError,
  IoError,
  FormatterError,
  NotifyError,
  ErrorCodes,
} from '../../utils/errors.js';
import { logger, type Logger } from '../../utils/logger.js';
import { resolveIdentifier } from './naming.js';
import { currentDirectory, resolveOutputPath, prepareDirectory } from './paths.js';
import { composeArtifact } from './harness.js';
import { writeArtifact } from './writer.js';
import { CommandFormatter } from './formatter.js';
import { StdoutNotifier } from './notifier.js';
import type {
  Clock,
  EmitResult,
  FormatOutcome,
  FormattingStatus,
  GeneratedSource,
  Notifier,
  SourceFormatter,
} from './types.js';

export interface EmitterOptions {
  /** Partial config; missing fields take schema defaults */
  config?: PartialConfig;
  /** Base for relative and default paths. Defaults to process.cwd() at call time. */
  cwd?: string;
  /** Replaces the command formatter built from config.formatter */
  formatter?: SourceFormatter;
  /** Replaces the stdout notifier */
  notifier?: Notifier;
  clock?: Clock;
}

function sourceText(source: GeneratedSource): string {
  return typeof source === 'string' ? source : source.getFullText();
}

/**
 * Writes generated code to an inspectable, runnable file.
 */
export class Emitter {
  readonly config: Config;
  private readonly cwd?: string;
  private readonly formatter?: SourceFormatter;
  private readonly notifier: Notifier;
  private readonly clock?: Clock;

  constructor(options: EmitterOptions = {}) {
    this.config = mergeConfig(options.config ?? {});
    this.cwd = options.cwd;
    this.formatter = options.formatter;
    this.notifier = options.notifier ?? new StdoutNotifier();
    this.clock = options.clock;
  }

  /**
   * Materialise `source` as `<location>/<identifier><ext>`.
   *
   * Resolves `{ status: 'disabled' }` without touching anything when the
   * master switch is off. Path and write failures come back as
   * `{ status: 'failed' }`; formatter and notifier failures are logged only.
   */
  async emit(source: GeneratedSource, identifier?: string, location?: string): Promise<EmitResult> {
    if (!this.config.enabled) {
      return { status: 'disabled' };
    }

    const log = logger.child('emit');
    const name = resolveIdentifier(identifier, this.config.output.name_prefix, this.clock);

    let cwd: string;
    let filePath: string;
    let content: string;
    try {
      cwd = this.cwd ?? currentDirectory();
      const target = resolveOutputPath(name, location, { cwd, output: this.config.output });
      await prepareDirectory(target.directory);
      filePath = target.filePath;
      log.debug(`Resolved artifact path ${filePath}`);

      content = composeArtifact(sourceText(source), name, this.config.harness);
      await writeArtifact(filePath, content);
      log.debug(`Wrote ${content.length} characters to ${filePath}`);
    } catch (error) {
      if (error instanceof PathError || error instanceof IoError) {
        log.debug(error.message, { code: error.code });
        return { status: 'failed', error };
      }
      throw error;
    }

    const formatting = await this.format(filePath, cwd, log);
    const notified = await this.notify(filePath, log);

    return { status: 'written', filePath, identifier: name, content, formatting, notified };
  }

  private async format(filePath: string, cwd: string, log: Logger): Promise<FormattingStatus> {
    if (!this.config.formatted) {
      return 'skipped';
    }
    const formatter = this.formatter ?? new CommandFormatter(this.config.formatter, cwd);

    let outcome: FormatOutcome;
    try {
      outcome = await formatter.format(filePath);
    } catch (error) {
      outcome = {
        ok: false,
        error: error instanceof FormatterError
          ? error
          : new FormatterError(
              ErrorCodes.FORMATTER_SPAWN_FAILED,
              `${formatter.name} failed: ${error instanceof Error ? error.message : String(error)}`,
              { filePath }
            ),
      };
    }

    if (outcome.ok) {
      log.debug(`Formatted ${filePath} with ${formatter.name}`);
      return 'formatted';
    }
    log.warn(`Could not format ${filePath}: ${outcome.error.message}`, { code: outcome.error.code });
    return 'failed';
  }

  private async notify(filePath: string, log: Logger): Promise<boolean> {
    if (!this.config.notification) {
      return false;
    }
    try {
      await this.notifier.notify(filePath);
      return true;
    } catch (error) {
      const failure = error instanceof NotifyError
        ? error
        : new NotifyError(ErrorCodes.NOTIFY_FAILED, error instanceof Error ? error.message : String(error), {
            filePath,
          });
      log.debug(`Notification skipped: ${failure.message}`, { code: failure.code });
      return false;
    }
  }
}

/**
 * Emit with toggles taken from CODEOUT_* environment variables.
 * With CODEOUT_ENABLED unset this does nothing, so the call can stay in
 * generator code permanently.
 */
export async function emit(source: GeneratedSource, identifier?: string, location?: string): Promise<EmitResult> {
  return new Emitter({ config: configFromEnv(process.env) }).emit(source, identifier, location);
}
