/**
 * @arch codeout.cli.barrel
 */
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createEmitCommand } from './commands/emit.js';
import { createConfigCommand } from './commands/config.js';
import { createInitCommand } from './commands/init.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PackageJsonSchema = z.object({ version: z.string() });
const VERSION = PackageJsonSchema.parse(
  JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))
).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('codeout')
    .description('Write generated code to runnable, formatted test files')
    .version(VERSION);
  [createEmitCommand, createConfigCommand, createInitCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
