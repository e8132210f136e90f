/**
 * @arch codeout.cli.command.meta
 * @intent:cli-output
 */
import { Command } from 'commander';
import { loadConfig } from '../../core/config/loader.js';
import { stringifyYaml } from '../../utils/yaml.js';
import { logger as log } from '../../utils/logger.js';

/**
 * Create the config command: prints the effective configuration.
 */
export function createConfigCommand(): Command {
  return new Command('config')
    .description('Print the effective configuration (file, defaults and CODEOUT_* overrides)')
    .option('-c, --config <path>', 'Config file to load')
    .action(async (options: { config?: string }) => {
      try {
        const config = await loadConfig(process.cwd(), options.config);
        process.stdout.write(stringifyYaml(config));
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}
