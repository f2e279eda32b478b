import { z } from 'zod';
import type { FieldValueInput, ProjectField } from '../types/github.js';
import { asNotFound, RemoteLogicalError, UnsupportedFieldTypeError, ValidationError } from '../utils/errors.js';
import { fail, ok, type Result } from '../utils/result.js';
import type { GraphQLExecutor } from './executor.js';
import type { IdentifierResolver } from './resolver.js';

const NUMBER_PATTERN = /^-?\d+(\.\d+)?$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const UPDATE_VALUE_MUTATION = `
  mutation($projectId: ID!, $itemId: ID!, $fieldId: ID!, $value: ProjectV2FieldValue!) {
    updateProjectV2ItemFieldValue(input: {
      projectId: $projectId
      itemId: $itemId
      fieldId: $fieldId
      value: $value
    }) {
      projectV2Item { id }
    }
  }
`;

const CLEAR_VALUE_MUTATION = `
  mutation($projectId: ID!, $itemId: ID!, $fieldId: ID!) {
    clearProjectV2ItemFieldValue(input: {
      projectId: $projectId
      itemId: $itemId
      fieldId: $fieldId
    }) {
      projectV2Item { id }
    }
  }
`;

const itemRefSchema = z.object({ projectV2Item: z.object({ id: z.string() }).nullish() }).nullish();

/**
 * Validates raw string values against a field's type and writes them with the
 * matching mutation payload.
 */
export class FieldMutator {
  constructor(
    private readonly executor: GraphQLExecutor,
    private readonly resolver: IdentifierResolver,
  ) {}

  /**
   * Payload for `rawValue`, or the reason it cannot be written. Makes no
   * remote call.
   */
  buildFieldValue(field: ProjectField, rawValue: string): Result<FieldValueInput> {
    switch (field.dataType) {
      case 'TEXT':
        return ok({ text: rawValue });
      case 'NUMBER':
        if (!NUMBER_PATTERN.test(rawValue)) {
          return fail(new ValidationError(`Invalid number format: ${rawValue}`));
        }
        return ok({ number: parseFloat(rawValue) });
      case 'DATE':
        if (!DATE_PATTERN.test(rawValue)) {
          return fail(new ValidationError(`Invalid date format: ${rawValue} (expected YYYY-MM-DD)`));
        }
        return ok({ date: rawValue });
      case 'SINGLE_SELECT': {
        const optionId = this.resolver.resolveOption(field, rawValue);
        return optionId.ok ? ok({ singleSelectOptionId: optionId.value }) : optionId;
      }
      case 'ITERATION': {
        const iterationId = this.resolver.resolveOption(field, rawValue);
        return iterationId.ok ? ok({ iterationId: iterationId.value }) : iterationId;
      }
      case 'UNSUPPORTED':
        return fail(new UnsupportedFieldTypeError(field.name, field.remoteDataType));
      default: {
        const unexpected: never = field;
        return fail(unsupported(unexpected));
      }
    }
  }

  async setField(projectId: string, itemId: string, field: ProjectField, rawValue: string): Promise<Result<void>> {
    const value = this.buildFieldValue(field, rawValue);
    if (!value.ok) return value;
    return this.writeValue(projectId, itemId, field.id, value.value, `Set field '${field.name}'`);
  }

  /**
   * Set a single-select value from raw IDs, without resolving names.
   */
  async setFieldById(projectId: string, itemId: string, fieldId: string, optionId: string): Promise<Result<void>> {
    if (!fieldId || !optionId) {
      return fail(new ValidationError('Field ID and option ID are required'));
    }
    return this.writeValue(projectId, itemId, fieldId, { singleSelectOptionId: optionId }, `Set field ${fieldId}`);
  }

  async clearField(projectId: string, itemId: string, field: Pick<ProjectField, 'id' | 'name'>): Promise<Result<void>> {
    const result = await this.executor.execute({
      label: `Clear field '${field.name}'`,
      query: CLEAR_VALUE_MUTATION,
      variables: { projectId, itemId, fieldId: field.id },
      schema: z.object({ clearProjectV2ItemFieldValue: itemRefSchema }),
    });
    if (!result.ok) return fail(asNotFound(result.error));
    if (!result.value.clearProjectV2ItemFieldValue?.projectV2Item?.id) {
      return fail(new RemoteLogicalError('Failed to clear field (no item ID returned)'));
    }
    return ok(undefined);
  }

  private async writeValue(
    projectId: string,
    itemId: string,
    fieldId: string,
    value: FieldValueInput,
    label: string,
  ): Promise<Result<void>> {
    const result = await this.executor.execute({
      label,
      query: UPDATE_VALUE_MUTATION,
      variables: { projectId, itemId, fieldId, value },
      schema: z.object({ updateProjectV2ItemFieldValue: itemRefSchema }),
    });
    if (!result.ok) return fail(asNotFound(result.error));
    if (!result.value.updateProjectV2ItemFieldValue?.projectV2Item?.id) {
      return fail(new RemoteLogicalError('Failed to update field (no item ID returned)'));
    }
    return ok(undefined);
  }
}

function unsupported(field: { name?: unknown; dataType?: unknown }): UnsupportedFieldTypeError {
  return new UnsupportedFieldTypeError(String(field.name), String(field.dataType));
}
