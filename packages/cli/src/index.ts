import { Command } from 'commander';

import { createDataCommand } from './commands/data';
import { createResourceCommand } from './commands/resource';
import { createSchemaCommand } from './commands/schema';

const program = new Command();

program.name('skyform').description('Manage cloud resources one operation at a time').version('0.1.0');

program.addCommand(createResourceCommand());
program.addCommand(createDataCommand());
program.addCommand(createSchemaCommand());

await program.parseAsync();
