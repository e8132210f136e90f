/**
 * @arch codeout.cli.command
 * @intent:cli-output
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { loadConfig, DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import { Emitter } from '../../core/emit/index.js';
import { readFile } from '../../utils/file-system.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

/**
 * Create the emit command.
 */
export function createEmitCommand(): Command {
  return new Command('emit')
    .description('Write generated source to a runnable test artifact')
    .argument('[file]', 'File holding the generated source (reads stdin when omitted)')
    .option('-n, --name <identifier>', 'Identifier of the generated module (default: timestamp)')
    .option('-o, --out <dir>', 'Output directory (default: ./tests)')
    .option('-c, --config <path>', `Config file (default: ${DEFAULT_CONFIG_PATH})`)
    .option('--no-format', 'Skip the external formatter')
    .option('--no-notify', 'Do not print the success line')
    .option('--force', 'Emit even when the master switch is off')
    .option('--verbose', 'Log each pipeline stage')
    .action(async (file: string | undefined, options: EmitCommandOptions) => {
      try {
        await runEmit(file, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

export interface EmitCommandOptions {
  name?: string;
  out?: string;
  config?: string;
  format: boolean;
  notify: boolean;
  force?: boolean;
  verbose?: boolean;
}

/**
 * Read generated source from a file, or from stdin when no file is given.
 */
export async function readSource(
  file: string | undefined,
  projectRoot: string,
  stdin: NodeJS.ReadableStream = process.stdin
): Promise<string> {
  if (file !== undefined) {
    const fullPath = path.resolve(projectRoot, file);
    try {
      return await readFile(fullPath);
    } catch (error) {
      throw new SystemError(
        ErrorCodes.INPUT_READ_ERROR,
        `Cannot read ${fullPath}: ${error instanceof Error ? error.message : String(error)}`,
        { file: fullPath }
      );
    }
  }

  const chunks: Buffer[] = [];
  for await (const chunk of stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

async function runEmit(file: string | undefined, options: EmitCommandOptions): Promise<void> {
  if (options.verbose) {
    log.setLevel('debug');
  }
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);
  const source = await readSource(file, projectRoot);

  const emitter = new Emitter({
    cwd: projectRoot,
    config: {
      ...config,
      enabled: config.enabled || options.force === true,
      formatted: config.formatted && options.format,
      notification: config.notification && options.notify,
    },
  });

  const result = await emitter.emit(source, options.name, options.out);

  switch (result.status) {
    case 'disabled':
      log.warn(`Nothing written: emitting is disabled. Enable it in ${DEFAULT_CONFIG_PATH} or pass --force.`);
      return;
    case 'failed':
      log.error(`${result.error.name} [${result.error.code}]: ${result.error.message}`);
      process.exit(1);
    case 'written':
      log.debug(`Formatting: ${result.formatting}`);
      return;
  }
}
