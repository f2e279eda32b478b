import type { ProjectFieldsError } from './errors.js';

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: ProjectFieldsError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: ProjectFieldsError): Result<T> {
  return { ok: false, error };
}
