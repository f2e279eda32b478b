import { z } from 'zod';
import { BASE_RETRY_DELAY_MS, BULK_ROW_DELAY_MS, CALL_TIMEOUT_MS, MAX_ATTEMPTS } from './constants.js';
import { ValidationError } from './utils/errors.js';
import { fail, ok, type Result } from './utils/result.js';

/**
 * Raw option values as commander hands them over (strings, or undefined when
 * the flag was not given).
 */
export type RawRuntimeOptions = {
  maxAttempts?: string;
  retryDelay?: string;
  timeout?: string;
  rowDelay?: string;
  logFile?: string;
  verbose?: boolean;
};

const runtimeConfigSchema = z.object({
  maxAttempts: z.coerce.number().int().min(1, 'must be at least 1').max(10, 'cannot exceed 10').default(MAX_ATTEMPTS),
  retryDelay: z.coerce.number().int().min(0, 'cannot be negative').default(BASE_RETRY_DELAY_MS),
  timeout: z.coerce.number().int().positive('must be positive').default(CALL_TIMEOUT_MS),
  rowDelay: z.coerce.number().int().min(0, 'cannot be negative').default(BULK_ROW_DELAY_MS),
  logFile: z.string().min(1).optional(),
  verbose: z.boolean().default(false),
});

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;

export function loadRuntimeConfig(raw: RawRuntimeOptions): Result<RuntimeConfig> {
  const parsed = runtimeConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return fail(new ValidationError(`Invalid option --${kebab(String(issue.path[0]))}: ${issue.message}`));
  }
  return ok(parsed.data);
}

const projectNumberSchema = z.coerce.number().int().positive();

export function parseProjectNumber(input: string): Result<number> {
  const parsed = projectNumberSchema.safeParse(input);
  if (!parsed.success || input.trim() === '') {
    return fail(new ValidationError(`Invalid project number: ${input}`));
  }
  return ok(parsed.data);
}

function kebab(name: string): string {
  return name.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}
