import type { IProvider } from '@skyform/contracts';
import { createProvider } from '@skyform/provider-cloud';
import chalk from 'chalk';
import { Command } from 'commander';
import inquirer from 'inquirer';

import { errorMessage, parseTimeout, printJson, readAttributes } from '../io';

export type ProviderFactory = () => IProvider;

interface FileOptions {
  file: string;
  timeout?: string;
}

async function confirmDelete(type: string, id: string, autoApprove: boolean): Promise<boolean> {
  if (autoApprove) return true;

  const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
    {
      type: 'confirm',
      name: 'confirm',
      message: `Do you really want to delete ${type} ${id}?`,
      default: false,
    },
  ]);

  return confirm;
}

export function createResourceCommand(getProvider: ProviderFactory = () => createProvider()): Command {
  const command = new Command('resource').description('Run a single operation against one managed resource');

  command
    .command('create')
    .description('Create a resource and wait until it is ready')
    .argument('<type>', 'Resource type')
    .requiredOption('-f, --file <path>', 'JSON file with the resource attributes')
    .option('--timeout <seconds>', 'Overrides the create timeout')
    .action(async (type: string, options: FileOptions) => {
      try {
        const inputs = await readAttributes(options.file);
        const timeout = parseTimeout(options.timeout);

        console.log(chalk.blue(`Creating ${type}...`));
        const snapshot = await getProvider().create(type, inputs, { timeout });

        console.log(chalk.green(`Created ${type} ${snapshot.id}`));
        printJson(snapshot);
      } catch (error) {
        console.error(chalk.red('Create failed:'), errorMessage(error));
        process.exit(1);
      }
    });

  command
    .command('read')
    .description('Read the current attributes of a resource')
    .argument('<type>', 'Resource type')
    .argument('<id>', 'Resource ID')
    .requiredOption('-f, --file <path>', 'JSON file with the resource attributes')
    .action(async (type: string, id: string, options: FileOptions) => {
      try {
        const snapshot = await getProvider().read(type, id, await readAttributes(options.file));

        if (!snapshot) {
          console.log(chalk.yellow(`${type} ${id} no longer exists.`));
          return;
        }

        printJson(snapshot);
      } catch (error) {
        console.error(chalk.red('Read failed:'), errorMessage(error));
        process.exit(1);
      }
    });

  command
    .command('update')
    .description('Update a resource in place')
    .argument('<type>', 'Resource type')
    .argument('<id>', 'Resource ID')
    .requiredOption('-f, --file <path>', 'JSON file with the desired attributes')
    .requiredOption('--prior <path>', 'JSON file with the attributes as last read')
    .option('--timeout <seconds>', 'Overrides the update timeout')
    .action(async (type: string, id: string, options: FileOptions & { prior: string }) => {
      try {
        const desired = await readAttributes(options.file);
        const prior = await readAttributes(options.prior);
        const timeout = parseTimeout(options.timeout);

        console.log(chalk.blue(`Updating ${type} ${id}...`));
        const snapshot = await getProvider().update(type, id, prior, desired, { timeout });

        console.log(chalk.green(`Updated ${type} ${id}`));
        printJson(snapshot);
      } catch (error) {
        console.error(chalk.red('Update failed:'), errorMessage(error));
        process.exit(1);
      }
    });

  command
    .command('delete')
    .description('Delete a resource')
    .argument('<type>', 'Resource type')
    .argument('<id>', 'Resource ID')
    .requiredOption('-f, --file <path>', 'JSON file with the resource attributes')
    .option('--auto-approve', 'Skip the confirmation prompt')
    .option('--timeout <seconds>', 'Overrides the delete timeout')
    .action(async (type: string, id: string, options: FileOptions & { autoApprove?: boolean }) => {
      try {
        const inputs = await readAttributes(options.file);
        const timeout = parseTimeout(options.timeout);

        const confirmed = await confirmDelete(type, id, options.autoApprove ?? false);
        if (!confirmed) {
          console.log(chalk.yellow('Delete cancelled.'));
          return;
        }

        console.log(chalk.blue(`Deleting ${type} ${id}...`));
        await getProvider().delete(type, id, inputs, { timeout });
        console.log(chalk.green(`Deleted ${type} ${id}`));
      } catch (error) {
        console.error(chalk.red('Delete failed:'), errorMessage(error));
        process.exit(1);
      }
    });

  command
    .command('import')
    .description('Read an existing resource by its import ID')
    .argument('<type>', 'Resource type')
    .argument('<importId>', 'Import ID, e.g. <workspace_id>/<rule_id>')
    .action(async (type: string, importId: string) => {
      try {
        const snapshot = await getProvider().importResource(type, importId);

        console.log(chalk.green(`Imported ${type} ${snapshot.id}`));
        printJson(snapshot);
      } catch (error) {
        console.error(chalk.red('Import failed:'), errorMessage(error));
        process.exit(1);
      }
    });

  return command;
}
