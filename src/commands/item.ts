import { formatFieldValue, getItemFieldValues } from '../core/github-project.js';
import { logger } from '../utils/logger.js';
import {
  createContext,
  reportFailure,
  resolveFieldArgs,
  resolveProjectArgs,
  unwrap,
  type CommandOptions,
} from './context.js';

export type ItemCommandOptions = CommandOptions & {
  dryRun?: boolean;
};

export async function itemGetCommand(
  projectNumber: string,
  owner: string,
  itemId: string,
  fieldName: string | undefined,
  options: ItemCommandOptions,
): Promise<void> {
  const ctx = await createContext(options, { transport: options.transport });
  if (!ctx) return;
  if (!(await resolveProjectArgs(ctx, projectNumber, owner))) return;

  logger.info(`Getting field values for item ${itemId}`);
  const item = unwrap(await getItemFieldValues(ctx.executor, itemId));
  if (!item) return;

  logger.info(`=== Field Values for: ${item.title} ===`);
  logger.info(`Item ID: ${item.itemId}`);

  if (fieldName !== undefined) {
    const entry = item.values.find((v) => v.fieldName === fieldName);
    if (!entry) {
      logger.warn(`Field '${fieldName}' has no value set for this item`);
      return;
    }
    logger.info(`Field: ${fieldName}`);
    logger.info(`Value: ${formatFieldValue(entry.value)}`);
    if (entry.value.kind === 'singleSelect') {
      logger.info(`Option ID: ${entry.value.optionId}`);
    } else if (entry.value.kind === 'iteration') {
      logger.info(`Iteration ID: ${entry.value.iterationId}`);
      logger.info(`Start Date: ${entry.value.startDate}`);
    }
    logger.success('Retrieved field value');
    return;
  }

  for (const entry of item.values) {
    logger.info(`${entry.fieldName.padEnd(20)} ${entry.value.kind.padEnd(15)} ${formatFieldValue(entry.value)}`);
  }
  logger.success('Retrieved all field values');
}

export async function itemSetCommand(
  projectNumber: string,
  owner: string,
  itemId: string,
  fieldName: string,
  value: string,
  options: ItemCommandOptions,
): Promise<void> {
  logger.info(`Setting field '${fieldName}' to '${value}' for item ${itemId}`);
  if (options.dryRun) {
    logger.info(`DRY RUN MODE: Would set field '${fieldName}' to '${value}'`);
    return;
  }

  const ctx = await createContext(options, { transport: options.transport });
  if (!ctx) return;
  const target = await resolveFieldArgs(ctx, projectNumber, owner, fieldName);
  if (!target) return;

  logger.debug(`Field ID: ${target.field.id}, Data Type: ${target.field.dataType}`);
  const result = await ctx.mutator.setField(target.projectId, itemId, target.field, value);
  if (!result.ok) {
    reportFailure(result.error, `Failed to update field '${fieldName}' on ${itemId}`);
    return;
  }
  logger.success(`Updated field '${fieldName}' to '${value}' for item ${itemId}`);
}

export async function itemSetByIdCommand(
  projectNumber: string,
  owner: string,
  itemId: string,
  fieldId: string,
  optionId: string,
  options: ItemCommandOptions,
): Promise<void> {
  logger.info(`Setting field ${fieldId} to option ${optionId} for item ${itemId}`);
  if (options.dryRun) {
    logger.info(`DRY RUN MODE: Would set field ${fieldId} to option ${optionId}`);
    return;
  }

  const ctx = await createContext(options, { transport: options.transport });
  if (!ctx) return;
  const projectId = await resolveProjectArgs(ctx, projectNumber, owner);
  if (!projectId) return;

  const result = await ctx.mutator.setFieldById(projectId, itemId, fieldId, optionId);
  if (!result.ok) {
    reportFailure(result.error, `Failed to update field ${fieldId} on ${itemId}`);
    return;
  }
  logger.success(`Updated field ${fieldId} to option ${optionId} for item ${itemId}`);
}

export async function itemClearCommand(
  projectNumber: string,
  owner: string,
  itemId: string,
  fieldName: string,
  options: ItemCommandOptions,
): Promise<void> {
  logger.info(`Clearing field '${fieldName}' for item ${itemId}`);
  if (options.dryRun) {
    logger.info(`DRY RUN MODE: Would clear field '${fieldName}'`);
    return;
  }

  const ctx = await createContext(options, { transport: options.transport });
  if (!ctx) return;
  const target = await resolveFieldArgs(ctx, projectNumber, owner, fieldName);
  if (!target) return;

  const result = await ctx.mutator.clearField(target.projectId, itemId, target.field);
  if (!result.ok) {
    reportFailure(result.error, `Failed to clear field '${fieldName}' on ${itemId}`);
    return;
  }
  logger.success(`Cleared field '${fieldName}' for item ${itemId}`);
}
