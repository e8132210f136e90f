/**
 * @arch codeout.cli.command.meta
 * @intent:cli-output
 */
import { Command } from 'commander';
import { configExists, getConfigPath, getDefaultConfig, DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import { writeYaml } from '../../utils/yaml.js';
import { logger as log } from '../../utils/logger.js';

/**
 * Create the init command.
 */
export function createInitCommand(): Command {
  return new Command('init')
    .description(`Write a ${DEFAULT_CONFIG_PATH} with emitting switched on`)
    .option('--force', 'Overwrite existing configuration')
    .action(async (options: InitOptions) => {
      try {
        await runInit(options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

interface InitOptions {
  force?: boolean;
}

async function runInit(options: InitOptions): Promise<void> {
  const projectRoot = process.cwd();

  if (!options.force && (await configExists(projectRoot))) {
    log.warn(`${DEFAULT_CONFIG_PATH} already exists. Use --force to overwrite.`);
    return;
  }

  await writeYaml(getConfigPath(projectRoot), { ...getDefaultConfig(), enabled: true });
  log.success(`Created ${DEFAULT_CONFIG_PATH}`);
}
