import { addSelectOption, createField, deleteField, parseFieldType, parseOptionColor } from '../core/github-project.js';
import { displayDataType } from '../core/resolver.js';
import type { NewSelectOption } from '../types/github.js';
import { logger } from '../utils/logger.js';
import { createContext, type CommandOptions, resolveFieldArgs, resolveProjectArgs, unwrap } from './context.js';

export async function fieldCreateCommand(
  projectNumber: string,
  owner: string,
  name: string,
  type: string,
  options: CommandOptions & { option?: string[]; color?: string },
): Promise<void> {
  const dataType = unwrap(parseFieldType(type));
  if (!dataType) return;
  const color = unwrap(parseOptionColor(options.color));
  if (!color) return;

  const selectOptions: NewSelectOption[] = (options.option ?? []).map((optionName) => ({
    name: optionName,
    color,
    description: optionName,
  }));

  const ctx = await createContext(options, { transport: options.transport });
  if (!ctx) return;

  logger.info(`Creating ${dataType} field '${name}' in project ${projectNumber} (owner: ${owner})`);
  const projectId = await resolveProjectArgs(ctx, projectNumber, owner);
  if (!projectId) return;

  const field = unwrap(await createField(ctx.executor, projectId, name, dataType, selectOptions), `Failed to create field '${name}'`);
  if (!field) return;

  logger.success(`Created ${displayDataType(field)} field '${field.name}' (ID: ${field.id})`);
  if (field.dataType === 'SINGLE_SELECT') {
    logger.info(`Created with ${field.options.length} option(s)`);
  }
}

export async function fieldAddOptionCommand(
  projectNumber: string,
  owner: string,
  fieldName: string,
  optionName: string,
  options: CommandOptions & { color?: string; description?: string },
): Promise<void> {
  const color = unwrap(parseOptionColor(options.color));
  if (!color) return;

  const ctx = await createContext(options, { transport: options.transport });
  if (!ctx) return;

  logger.info(`Adding option '${optionName}' to field '${fieldName}'`);
  const target = await resolveFieldArgs(ctx, projectNumber, owner, fieldName);
  if (!target) return;

  const added = unwrap(await addSelectOption(ctx.executor, target.field, {
    name: optionName,
    color,
    description: options.description ?? optionName,
  }));
  if (!added) return;
  logger.success(`Added option '${optionName}' to field '${fieldName}' (Option ID: ${added.id})`);
}

export async function fieldDeleteCommand(
  projectNumber: string,
  owner: string,
  fieldName: string,
  options: CommandOptions,
): Promise<void> {
  const ctx = await createContext(options, { transport: options.transport });
  if (!ctx) return;

  logger.info(`Deleting field '${fieldName}' from project ${projectNumber} (owner: ${owner})`);
  const target = await resolveFieldArgs(ctx, projectNumber, owner, fieldName);
  if (!target) return;

  const deletedId = unwrap(await deleteField(ctx.executor, target.field));
  if (!deletedId) return;
  logger.success(`Deleted field '${fieldName}' (ID: ${deletedId})`);
}
