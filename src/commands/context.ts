import { loadRuntimeConfig, parseProjectNumber, type RawRuntimeOptions, type RuntimeConfig } from '../config.js';
import { GraphQLExecutor } from '../core/executor.js';
import { FieldMutator } from '../core/field-mutator.js';
import { IdentifierResolver } from '../core/resolver.js';
import type { ProjectField } from '../types/github.js';
import type { ProjectFieldsError } from '../utils/errors.js';
import { checkGhAuth, checkProjectScope, createGhTransport, type GraphQLTransport } from '../utils/gh-auth.js';
import { logger, setLogFile, setVerbose } from '../utils/logger.js';
import type { Result } from '../utils/result.js';

/** Runtime flags plus an optional transport in place of the gh CLI. */
export type CommandOptions = RawRuntimeOptions & {
  transport?: GraphQLTransport;
};

export interface CommandContext {
  config: RuntimeConfig;
  executor: GraphQLExecutor;
  resolver: IdentifierResolver;
  mutator: FieldMutator;
}

/**
 * Parse runtime options, check gh, and wire the engine. Returns null (with
 * the exit code set) when the command cannot run.
 */
export async function createContext(
  raw: RawRuntimeOptions,
  options: { snapshotFields?: boolean; transport?: GraphQLTransport } = {},
): Promise<CommandContext | null> {
  const config = loadRuntimeConfig(raw);
  if (!config.ok) {
    reportFailure(config.error);
    return null;
  }

  setLogFile(config.value.logFile);
  if (config.value.verbose) setVerbose(true);

  if (!options.transport) {
    if (!(await checkGhAuth()) || !(await checkProjectScope())) {
      process.exitCode = 1;
      return null;
    }
  }

  const executor = new GraphQLExecutor(
    options.transport ?? createGhTransport({ timeoutMs: config.value.timeout }),
    { policy: { maxAttempts: config.value.maxAttempts, baseDelayMs: config.value.retryDelay } },
  );
  const resolver = new IdentifierResolver(executor, { snapshotFields: options.snapshotFields });
  const mutator = new FieldMutator(executor, resolver);
  return { config: config.value, executor, resolver, mutator };
}

/**
 * Resolve `<project_number> <owner>` arguments to a project node ID.
 */
export async function resolveProjectArgs(ctx: CommandContext, projectNumber: string, owner: string): Promise<string | null> {
  const number = parseProjectNumber(projectNumber);
  if (!number.ok) return reportFailure(number.error);

  const projectId = await ctx.resolver.resolveProject(owner, number.value);
  if (!projectId.ok) return reportFailure(projectId.error);
  logger.debug(`Project ${owner}#${number.value} -> ${projectId.value}`);
  return projectId.value;
}

export async function resolveFieldArgs(
  ctx: CommandContext,
  projectNumber: string,
  owner: string,
  fieldName: string,
): Promise<{ projectId: string; field: ProjectField } | null> {
  const projectId = await resolveProjectArgs(ctx, projectNumber, owner);
  if (!projectId) return null;

  const field = await ctx.resolver.resolveField(projectId, fieldName);
  if (!field.ok) return reportFailure(field.error);
  return { projectId, field: field.value };
}

export function unwrap<T>(result: Result<T>, context?: string): T | null {
  if (!result.ok) return reportFailure(result.error, context);
  return result.value;
}

export function reportFailure(error: ProjectFieldsError, context?: string): null {
  logger.error(context ? `${context}: ${error.message}` : error.message);
  logger.debug(`Error kind: ${error.kind}`);
  process.exitCode = 1;
  return null;
}
