import { Command } from 'commander';
import { bulkCommand, type BulkCommandOptions } from './commands/bulk.js';
import { fieldAddOptionCommand, fieldCreateCommand, fieldDeleteCommand } from './commands/field.js';
import { fieldsExportCommand, fieldsListCommand, fieldsShowCommand, fieldsValidateCommand } from './commands/fields.js';
import { itemClearCommand, itemGetCommand, itemSetByIdCommand, itemSetCommand, type ItemCommandOptions } from './commands/item.js';
import type { CommandOptions } from './commands/context.js';
import { OPTION_COLORS, SUPPORTED_FIELD_TYPES } from './constants.js';
import { logger } from './utils/logger.js';

export { GraphQLExecutor } from './core/executor.js';
export { IdentifierResolver } from './core/resolver.js';
export { FieldMutator } from './core/field-mutator.js';
export { processBatch } from './core/bulk-update.js';
export { parseBulkCsv } from './core/csv-reader.js';
export { createGhTransport } from './utils/gh-auth.js';
export * from './utils/errors.js';
export type * from './types/github.js';
export type * from './types/bulk.js';

const program = new Command();

program
  .name('projfields')
  .description('Resolve, set, clear and bulk-update GitHub Projects field values')
  .version('0.1.0')
  .option('--max-attempts <n>', 'Attempts per API call (default: 3)')
  .option('--retry-delay <ms>', 'First retry delay in ms, doubled per attempt (default: 2000)')
  .option('--timeout <ms>', 'Timeout per API call in ms (default: 30000)')
  .option('--log-file <path>', 'Append a timestamped log to this file')
  .option('--verbose', 'Print debug output');

const item = program
  .command('item')
  .description('Read and write field values of a project item');

item
  .command('get <project_num> <owner> <item_id> [field_name]')
  .description('Get field value(s) for a project item')
  .action(async (projectNumber: string, owner: string, itemId: string, fieldName: string | undefined, _opts: unknown, cmd: Command) => {
    await itemGetCommand(projectNumber, owner, itemId, fieldName, cmd.optsWithGlobals<ItemCommandOptions>());
  });

item
  .command('set <project_num> <owner> <item_id> <field_name> <value>')
  .description('Set a field value by field name and value/option/iteration name')
  .option('--dry-run', 'Show what would change without making changes')
  .action(async (projectNumber: string, owner: string, itemId: string, fieldName: string, value: string, _opts: unknown, cmd: Command) => {
    await itemSetCommand(projectNumber, owner, itemId, fieldName, value, cmd.optsWithGlobals<ItemCommandOptions>());
  });

item
  .command('set-by-id <project_num> <owner> <item_id> <field_id> <option_id>')
  .description('Set a single-select field value by field ID and option ID')
  .option('--dry-run', 'Show what would change without making changes')
  .action(async (projectNumber: string, owner: string, itemId: string, fieldId: string, optionId: string, _opts: unknown, cmd: Command) => {
    await itemSetByIdCommand(projectNumber, owner, itemId, fieldId, optionId, cmd.optsWithGlobals<ItemCommandOptions>());
  });

item
  .command('clear <project_num> <owner> <item_id> <field_name>')
  .description('Clear a field value on a project item')
  .option('--dry-run', 'Show what would change without making changes')
  .action(async (projectNumber: string, owner: string, itemId: string, fieldName: string, _opts: unknown, cmd: Command) => {
    await itemClearCommand(projectNumber, owner, itemId, fieldName, cmd.optsWithGlobals<ItemCommandOptions>());
  });

program
  .command('bulk <project_num> <owner> <csv_file>')
  .description('Bulk update field values from a CSV file (item_id,field_name,value)')
  .option('--dry-run', 'Report what would be updated without making changes')
  .option('--validate', 'With --dry-run, resolve every field and value (read-only)')
  .option('--snapshot-fields', 'Read project fields once for the whole run')
  .option('--row-delay <ms>', 'Pause between rows in ms (default: 500)')
  .option('--report <path>', 'Write the batch report as JSON')
  .option('--failed-output <path>', 'Write failed rows as CSV for a re-run')
  .action(async (projectNumber: string, owner: string, file: string, _opts: unknown, cmd: Command) => {
    await bulkCommand(projectNumber, owner, file, cmd.optsWithGlobals<BulkCommandOptions>());
  });

const fields = program
  .command('fields')
  .description('Discover project fields');

fields
  .command('list <project_num> <owner>')
  .description('List all fields of a project')
  .action(async (projectNumber: string, owner: string, _opts: unknown, cmd: Command) => {
    await fieldsListCommand(projectNumber, owner, cmd.optsWithGlobals<CommandOptions>());
  });

fields
  .command('show <project_num> <owner> <field_name>')
  .description('Show a field with its options or iterations')
  .action(async (projectNumber: string, owner: string, fieldName: string, _opts: unknown, cmd: Command) => {
    await fieldsShowCommand(projectNumber, owner, fieldName, cmd.optsWithGlobals<CommandOptions>());
  });

fields
  .command('validate <project_num> <owner> <field_name> [option_name]')
  .description('Check that a field (and an option or iteration) exists')
  .action(async (projectNumber: string, owner: string, fieldName: string, optionName: string | undefined, _opts: unknown, cmd: Command) => {
    await fieldsValidateCommand(projectNumber, owner, fieldName, optionName, cmd.optsWithGlobals<CommandOptions>());
  });

fields
  .command('export <project_num> <owner>')
  .description('Export the project field schema')
  .option('--format <format>', 'json, csv or markdown', 'json')
  .option('--output <path>', 'Write to a file instead of stdout')
  .action(async (projectNumber: string, owner: string, _opts: unknown, cmd: Command) => {
    await fieldsExportCommand(projectNumber, owner, cmd.optsWithGlobals<CommandOptions & { format?: string; output?: string }>());
  });

const field = program
  .command('field')
  .description('Create, extend and delete project fields');

field
  .command('create <project_num> <owner> <name> <type>')
  .description(`Create a field (${SUPPORTED_FIELD_TYPES.join(', ')})`)
  .option('--option <name...>', 'Option names for a SINGLE_SELECT field')
  .option('--color <color>', `Option color (${OPTION_COLORS.join(', ')})`)
  .action(async (projectNumber: string, owner: string, name: string, type: string, _opts: unknown, cmd: Command) => {
    await fieldCreateCommand(projectNumber, owner, name, type, cmd.optsWithGlobals<CommandOptions & { option?: string[]; color?: string }>());
  });

field
  .command('add-option <project_num> <owner> <field_name> <option_name>')
  .description('Add an option to a SINGLE_SELECT field')
  .option('--color <color>', `Option color (${OPTION_COLORS.join(', ')})`)
  .option('--description <text>', 'Option description (defaults to the option name)')
  .action(async (projectNumber: string, owner: string, fieldName: string, optionName: string, _opts: unknown, cmd: Command) => {
    await fieldAddOptionCommand(projectNumber, owner, fieldName, optionName, cmd.optsWithGlobals<CommandOptions & { color?: string; description?: string }>());
  });

field
  .command('delete <project_num> <owner> <field_name>')
  .description('Delete a field from a project')
  .action(async (projectNumber: string, owner: string, fieldName: string, _opts: unknown, cmd: Command) => {
    await fieldDeleteCommand(projectNumber, owner, fieldName, cmd.optsWithGlobals<CommandOptions>());
  });

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await program.parseAsync(argv);
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}
