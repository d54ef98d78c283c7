import { createProvider } from '@skyform/provider-cloud';
import chalk from 'chalk';
import { Command } from 'commander';

import { errorMessage, printJson, readAttributes } from '../io';
import type { ProviderFactory } from './resource';

export function createDataCommand(getProvider: ProviderFactory = () => createProvider()): Command {
  const command = new Command('data').description('Query data sources');

  command
    .command('read')
    .description('Read a data source')
    .argument('<type>', 'Data source type')
    .requiredOption('-f, --file <path>', 'JSON file with the data source arguments')
    .action(async (type: string, options: { file: string }) => {
      try {
        const result = await getProvider().readDataSource(type, await readAttributes(options.file));
        printJson(result);
      } catch (error) {
        console.error(chalk.red('Read failed:'), errorMessage(error));
        process.exit(1);
      }
    });

  return command;
}
