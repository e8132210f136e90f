/**
 * @arch codeout.infra.output
 */
import chalk from 'chalk';
import { NotifyError, ErrorCodes } from '../../utils/errors.js';
import type { Notifier } from './types.js';

/** The parts of a Node writable the notifier needs. */
export type StatusStream = Pick<NodeJS.WritableStream, 'write' | 'once' | 'removeListener'>;

export function formatNotification(filePath: string): string {
  return `✓ Wrote generated code to \`${filePath}\``;
}

/**
 * Prints one success line per artifact to stdout.
 *
 * Resolves once the stream has accepted the line. A stream that fails, at
 * once or later through its write callback or `'error'` event, rejects
 * with a NotifyError.
 */
export class StdoutNotifier implements Notifier {
  constructor(private readonly stream: StatusStream = process.stdout) {}

  notify(filePath: string): Promise<void> {
    const line = `${chalk.green(formatNotification(filePath))}\n`;
    const toNotifyError = (error: unknown): NotifyError =>
      new NotifyError(
        ErrorCodes.NOTIFY_FAILED,
        `Could not write status line: ${error instanceof Error ? error.message : String(error)}`,
        { filePath }
      );

    return new Promise((resolve, reject) => {
      let settled = false;
      // Stays attached after a failure so a late 'error' event is consumed.
      const onError = (error: Error): void => {
        if (settled) return;
        settled = true;
        reject(toNotifyError(error));
      };
      this.stream.once('error', onError);

      try {
        this.stream.write(line, (error) => {
          if (settled) return;
          settled = true;
          if (error) {
            reject(toNotifyError(error));
            return;
          }
          this.stream.removeListener('error', onError);
          resolve();
        });
      } catch (error) {
        settled = true;
        this.stream.removeListener('error', onError);
        reject(toNotifyError(error));
      }
    });
  }
}
