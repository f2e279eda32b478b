import { writeFile } from 'node:fs/promises';
import { displayDataType } from '../core/resolver.js';
import { describeField, parseSchemaFormat, renderSchema } from '../core/schema-export.js';
import { logger } from '../utils/logger.js';
import { createContext, type CommandOptions, resolveFieldArgs, resolveProjectArgs, unwrap } from './context.js';

export async function fieldsListCommand(projectNumber: string, owner: string, options: CommandOptions): Promise<void> {
  const ctx = await createContext(options, { transport: options.transport });
  if (!ctx) return;

  logger.info(`Listing fields in project ${projectNumber} (owner: ${owner})`);
  const projectId = await resolveProjectArgs(ctx, projectNumber, owner);
  if (!projectId) return;

  const list = unwrap(await ctx.resolver.getProjectFields(projectId));
  if (!list) return;

  logger.info(`Project: ${list.title}`);
  for (const field of list.fields) {
    logger.info(`  ${describeField(field)}`);
  }
  logger.success(`Found ${list.fields.length} field(s)`);
}

export async function fieldsShowCommand(
  projectNumber: string,
  owner: string,
  fieldName: string,
  options: CommandOptions,
): Promise<void> {
  const ctx = await createContext(options, { transport: options.transport });
  if (!ctx) return;
  const target = await resolveFieldArgs(ctx, projectNumber, owner, fieldName);
  if (!target) return;

  const { field } = target;
  logger.info(`Field: ${field.name}`);
  logger.info(`ID:    ${field.id}`);
  logger.info(`Type:  ${displayDataType(field)}`);

  if (field.dataType === 'SINGLE_SELECT') {
    logger.info('Options:');
    for (const o of field.options) {
      const color = o.color ? ` [${o.color}]` : '';
      logger.info(`  ${o.name} (${o.id})${color}${o.description ? ` - ${o.description}` : ''}`);
    }
  } else if (field.dataType === 'ITERATION') {
    logger.info('Active iterations:');
    for (const i of field.activeIterations) {
      logger.info(`  ${i.title} (${i.id}) start ${i.startDate}, ${i.duration} days`);
    }
    logger.info('Completed iterations:');
    for (const i of field.completedIterations) {
      logger.info(`  ${i.title} (${i.id}) start ${i.startDate}, ${i.duration} days`);
    }
  }
}

export async function fieldsValidateCommand(
  projectNumber: string,
  owner: string,
  fieldName: string,
  optionName: string | undefined,
  options: CommandOptions,
): Promise<void> {
  const ctx = await createContext(options, { transport: options.transport });
  if (!ctx) return;

  logger.info(`Validating field '${fieldName}' in project ${projectNumber} (owner: ${owner})`);
  const target = await resolveFieldArgs(ctx, projectNumber, owner, fieldName);
  if (!target) return;

  logger.success(`Field '${fieldName}' exists`);
  logger.info(`Field ID: ${target.field.id}`);
  logger.info(`Data Type: ${displayDataType(target.field)}`);

  if (optionName !== undefined) {
    const optionId = unwrap(ctx.resolver.resolveOption(target.field, optionName));
    if (!optionId) return;
    logger.success(`'${optionName}' exists in field '${fieldName}'`);
    logger.info(`${target.field.dataType === 'ITERATION' ? 'Iteration' : 'Option'} ID: ${optionId}`);
  }
  logger.success('Field validation complete');
}

export async function fieldsExportCommand(
  projectNumber: string,
  owner: string,
  options: CommandOptions & { format?: string; output?: string },
): Promise<void> {
  const format = unwrap(parseSchemaFormat(options.format ?? 'json'));
  if (!format) return;

  const ctx = await createContext(options, { transport: options.transport });
  if (!ctx) return;

  logger.info(`Exporting project schema for project ${projectNumber} (owner: ${owner}) in ${format} format`);
  const projectId = await resolveProjectArgs(ctx, projectNumber, owner);
  if (!projectId) return;

  const list = unwrap(await ctx.resolver.getProjectFields(projectId));
  if (!list) return;

  const rendered = renderSchema(list, format);
  if (options.output) {
    await writeFile(options.output, rendered, 'utf-8');
    logger.success(`Schema exported to ${options.output}`);
  } else {
    process.stdout.write(rendered);
  }
}
