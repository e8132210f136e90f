/**
 * @arch codeout.infra.process
 *
 * External formatter invocation.
 */
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { FormatterError, ErrorCodes } from '../../utils/errors.js';
import type { FormatterSettings } from '../config/schema.js';
import type { FormatOutcome, SourceFormatter } from './types.js';

const execFileAsync = promisify(execFile);

/**
 * Runs `<command> ...args <filePath>` and waits for it to exit.
 * There is no timeout: a formatter that hangs blocks the caller.
 */
export class CommandFormatter implements SourceFormatter {
  constructor(
    private readonly settings: FormatterSettings,
    private readonly cwd?: string
  ) {}

  get name(): string {
    return this.settings.command;
  }

  async format(filePath: string): Promise<FormatOutcome> {
    try {
      const { stdout } = await execFileAsync(this.settings.command, [...this.settings.args, filePath], {
        cwd: this.cwd,
        encoding: 'utf-8',
      });
      return { ok: true, output: stdout };
    } catch (error) {
      return { ok: false, error: toFormatterError(this.settings.command, filePath, error) };
    }
  }
}

/**
 * execFile rejects with a string `code` when the process never started,
 * a numeric `code` when it exited non-zero, and a `signal` when it was killed.
 */
export function toFormatterError(command: string, filePath: string, error: unknown): FormatterError {
  const message = error instanceof Error ? error.message : String(error);
  if (typeof error === 'object' && error !== null) {
    const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr.trim() : '';
    if ('code' in error && typeof error.code === 'number') {
      return new FormatterError(
        ErrorCodes.FORMATTER_EXIT_NONZERO,
        `${command} exited with code ${error.code}`,
        { command, filePath, exitCode: error.code, stderr }
      );
    }
    if ('signal' in error && typeof error.signal === 'string') {
      return new FormatterError(
        ErrorCodes.FORMATTER_EXIT_NONZERO,
        `${command} was killed by ${error.signal}`,
        { command, filePath, signal: error.signal, stderr }
      );
    }
  }
  return new FormatterError(
    ErrorCodes.FORMATTER_SPAWN_FAILED,
    `Could not run ${command}: ${message}`,
    { command, filePath }
  );
}
