import type { ISchema, ISchemaDefinition } from '@skyform/contracts';
import { createProvider } from '@skyform/provider-cloud';
import chalk from 'chalk';
import { Command } from 'commander';

import { errorMessage } from '../io';
import type { ProviderFactory } from './resource';

function describeType(def: ISchemaDefinition): string {
  return def.elemType ? `${def.type}(${def.elemType})` : def.type;
}

function flags(def: ISchemaDefinition): string[] {
  const result: string[] = [];
  if (def.required) result.push('required');
  if (def.optional) result.push('optional');
  if (def.computed) result.push('computed');
  if (def.forceNew) result.push('forces replacement');
  if (def.default !== undefined) result.push(`default ${JSON.stringify(def.default)}`);
  return result;
}

/** One line per attribute, nested blocks indented below their parent */
export function formatSchema(schema: ISchema, indent = '  '): string[] {
  const lines: string[] = [];

  for (const [name, def] of Object.entries(schema)) {
    const meta = [describeType(def), ...flags(def)].join(', ');
    lines.push(`${indent}${name} (${meta})${def.description ? ` - ${def.description}` : ''}`);
    if (def.elem) lines.push(...formatSchema(def.elem, `${indent}  `));
  }

  return lines;
}

export function createSchemaCommand(getProvider: ProviderFactory = () => createProvider()): Command {
  return new Command('schema')
    .description('Show the attributes of a resource or data source type')
    .argument('<type>', 'Resource or data source type')
    .action(async (type: string) => {
      try {
        const schema = await getProvider().getSchema(type);

        console.log(chalk.bold(`${type}:`));
        for (const line of formatSchema(schema)) console.log(line);
      } catch (error) {
        console.error(chalk.red('Error:'), errorMessage(error));
        process.exit(1);
      }
    });
}
