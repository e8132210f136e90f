#!/usr/bin/env node
/**
 * @arch codeout.cli.entry
 */
import { createCli } from './cli/index.js';

await createCli().parseAsync(process.argv);
