import { z } from 'zod';
import { DEFAULT_OPTION_COLOR, ITEM_VALUES_PAGE_SIZE, OPTION_COLORS, SUPPORTED_FIELD_TYPES } from '../constants.js';
import type {
  FieldValue,
  ItemContentType,
  ItemFieldValue,
  ItemFieldValues,
  NewSelectOption,
  OptionColor,
  ProjectField,
  SingleSelectOption,
  SupportedFieldType,
} from '../types/github.js';
import { asNotFound, NotFoundError, RemoteLogicalError, ValidationError } from '../utils/errors.js';
import { fail, ok, type Result } from '../utils/result.js';
import type { GraphQLExecutor } from './executor.js';
import { FIELD_SELECTION, fieldNodeSchema, normalizeField, displayDataType } from './resolver.js';

export function parseFieldType(input: string): Result<SupportedFieldType> {
  const normalized = input.trim().toUpperCase().replace(/-/g, '_');
  const match = SUPPORTED_FIELD_TYPES.find((t) => t === normalized);
  if (!match) {
    return fail(new ValidationError(`Unknown field type: ${input}. Supported types: ${SUPPORTED_FIELD_TYPES.join(', ')}`));
  }
  return ok(match);
}

export function parseOptionColor(input: string | undefined): Result<OptionColor> {
  if (input === undefined) return ok(DEFAULT_OPTION_COLOR);
  const normalized = input.trim().toUpperCase();
  const match = OPTION_COLORS.find((c) => c === normalized);
  if (!match) {
    return fail(new ValidationError(`Unknown option color: ${input}. Supported colors: ${OPTION_COLORS.join(', ')}`));
  }
  return ok(match);
}

/**
 * Create a custom field on a project. Single-select fields need at least one option.
 */
export async function createField(
  executor: GraphQLExecutor,
  projectId: string,
  name: string,
  dataType: SupportedFieldType,
  options: NewSelectOption[] = [],
): Promise<Result<ProjectField>> {
  if (!name.trim()) {
    return fail(new ValidationError('Field name is required'));
  }
  if (dataType === 'SINGLE_SELECT') {
    if (options.length === 0) {
      return fail(new ValidationError('A single-select field needs at least one option'));
    }
    const duplicate = options.find((o, i) => options.findIndex((p) => p.name === o.name) !== i);
    if (duplicate) {
      return fail(new ValidationError(`Option '${duplicate.name}' is listed more than once`));
    }
  }

  const variables: Record<string, unknown> = { projectId, name, dataType };
  if (dataType === 'SINGLE_SELECT') {
    variables.options = options;
  }

  const result = await executor.execute({
    label: `Create field "${name}"`,
    query: `
      mutation($projectId: ID!, $name: String!, $dataType: ProjectV2CustomFieldType!, $options: [ProjectV2SingleSelectFieldOptionInput!]) {
        createProjectV2Field(input: { projectId: $projectId, name: $name, dataType: $dataType, singleSelectOptions: $options }) {
          projectV2Field { ${FIELD_SELECTION} }
        }
      }
    `,
    variables,
    schema: z.object({
      createProjectV2Field: z.object({ projectV2Field: fieldNodeSchema.nullish() }).nullish(),
    }),
  });
  if (!result.ok) return result;

  const node = result.value.createProjectV2Field?.projectV2Field;
  const field = node ? normalizeField(node) : undefined;
  if (!field) {
    return fail(new RemoteLogicalError(`Failed to create field '${name}' (no field ID returned)`));
  }
  return ok(field);
}

/**
 * Append an option to a single-select field. The API replaces the whole
 * option list, so the existing options are sent along; GitHub may assign
 * them new IDs.
 */
export async function addSelectOption(
  executor: GraphQLExecutor,
  field: ProjectField,
  option: NewSelectOption,
): Promise<Result<SingleSelectOption>> {
  if (field.dataType !== 'SINGLE_SELECT') {
    return fail(new ValidationError(`Field '${field.name}' is ${displayDataType(field)}, not SINGLE_SELECT`));
  }
  if (field.options.some((o) => o.name === option.name)) {
    return fail(new ValidationError(`Option '${option.name}' already exists in field '${field.name}'`));
  }

  const options: NewSelectOption[] = field.options.map((o) => {
    const color = parseOptionColor(o.color);
    return {
      name: o.name,
      color: color.ok ? color.value : DEFAULT_OPTION_COLOR,
      description: o.description ?? '',
    };
  });
  options.push(option);

  const result = await executor.execute({
    label: `Add option "${option.name}"`,
    query: `
      mutation($fieldId: ID!, $options: [ProjectV2SingleSelectFieldOptionInput!]!) {
        updateProjectV2Field(input: { fieldId: $fieldId, singleSelectOptions: $options }) {
          projectV2Field { ${FIELD_SELECTION} }
        }
      }
    `,
    variables: { fieldId: field.id, options },
    schema: z.object({
      updateProjectV2Field: z.object({ projectV2Field: fieldNodeSchema.nullish() }).nullish(),
    }),
  });
  if (!result.ok) return result;

  const node = result.value.updateProjectV2Field?.projectV2Field;
  const updated = node ? normalizeField(node) : undefined;
  const added = updated?.dataType === 'SINGLE_SELECT'
    ? updated.options.find((o) => o.name === option.name)
    : undefined;
  if (!added) {
    return fail(new RemoteLogicalError(`Failed to add option '${option.name}' to field '${field.name}'`));
  }
  return ok(added);
}

export async function deleteField(executor: GraphQLExecutor, field: ProjectField): Promise<Result<string>> {
  const result = await executor.execute({
    label: `Delete field "${field.name}"`,
    query: `
      mutation($fieldId: ID!) {
        deleteProjectV2Field(input: { fieldId: $fieldId }) {
          projectV2Field { ${FIELD_SELECTION} }
        }
      }
    `,
    variables: { fieldId: field.id },
    schema: z.object({
      deleteProjectV2Field: z.object({ projectV2Field: fieldNodeSchema.nullish() }).nullish(),
    }),
  });
  if (!result.ok) return result;

  const deletedId = result.value.deleteProjectV2Field?.projectV2Field?.id;
  if (!deletedId) {
    return fail(new RemoteLogicalError(`Failed to delete field '${field.name}'`));
  }
  return ok(deletedId);
}

const fieldValueNodeSchema = z.object({
  __typename: z.string(),
  field: z.object({ id: z.string(), name: z.string() }).nullish(),
  text: z.string().nullish(),
  number: z.number().nullish(),
  date: z.string().nullish(),
  optionId: z.string().nullish(),
  name: z.string().nullish(),
  iterationId: z.string().nullish(),
  title: z.string().nullish(),
  startDate: z.string().nullish(),
  duration: z.number().nullish(),
});

type FieldValueNode = z.infer<typeof fieldValueNodeSchema>;

const itemValuesSchema = z.object({
  node: z.object({
    id: z.string().optional(),
    content: z.object({
      __typename: z.string(),
      title: z.string().nullish(),
      number: z.number().nullish(),
      url: z.string().nullish(),
    }).nullish(),
    fieldValues: z.object({ nodes: z.array(fieldValueNodeSchema.nullable()) }).optional(),
  }).nullable(),
});

const ITEM_VALUES_QUERY = `
  query($itemId: ID!) {
    node(id: $itemId) {
      ... on ProjectV2Item {
        id
        content {
          __typename
          ... on Issue { title number url }
          ... on PullRequest { title number url }
          ... on DraftIssue { title }
        }
        fieldValues(first: ${ITEM_VALUES_PAGE_SIZE}) {
          nodes {
            __typename
            ... on ProjectV2ItemFieldTextValue {
              field { ... on ProjectV2FieldCommon { id name } }
              text
            }
            ... on ProjectV2ItemFieldNumberValue {
              field { ... on ProjectV2FieldCommon { id name } }
              number
            }
            ... on ProjectV2ItemFieldDateValue {
              field { ... on ProjectV2FieldCommon { id name } }
              date
            }
            ... on ProjectV2ItemFieldSingleSelectValue {
              field { ... on ProjectV2FieldCommon { id name } }
              optionId
              name
            }
            ... on ProjectV2ItemFieldIterationValue {
              field { ... on ProjectV2FieldCommon { id name } }
              iterationId
              title
              startDate
              duration
            }
          }
        }
      }
    }
  }
`;

/**
 * Read the typed values set on an item. Values of kinds that cannot be
 * written by value (labels, assignees, ...) are left out.
 */
export async function getItemFieldValues(executor: GraphQLExecutor, itemId: string): Promise<Result<ItemFieldValues>> {
  const result = await executor.execute({
    label: 'Get item field values',
    query: ITEM_VALUES_QUERY,
    variables: { itemId },
    schema: itemValuesSchema,
  });
  if (!result.ok) {
    return fail(asNotFound(result.error, `Item ${itemId} not found or not accessible`));
  }

  const node = result.value.node;
  if (!node?.id) {
    return fail(new NotFoundError(`Item ${itemId} not found or not accessible`));
  }

  const values: ItemFieldValue[] = [];
  for (const raw of node.fieldValues?.nodes ?? []) {
    if (!raw?.field) continue;
    const value = toFieldValue(raw);
    if (value) {
      values.push({ fieldId: raw.field.id, fieldName: raw.field.name, value });
    }
  }

  const content = node.content;
  return ok({
    itemId: node.id,
    title: content?.title ?? 'Unknown Item',
    contentType: content ? contentType(content.__typename) : undefined,
    number: content?.number ?? undefined,
    url: content?.url ?? undefined,
    values,
  });
}

export function toFieldValue(node: FieldValueNode): FieldValue | undefined {
  switch (node.__typename) {
    case 'ProjectV2ItemFieldTextValue':
      return node.text != null ? { kind: 'text', text: node.text } : undefined;
    case 'ProjectV2ItemFieldNumberValue':
      return node.number != null ? { kind: 'number', number: node.number } : undefined;
    case 'ProjectV2ItemFieldDateValue':
      return node.date != null ? { kind: 'date', date: node.date } : undefined;
    case 'ProjectV2ItemFieldSingleSelectValue':
      return node.optionId != null
        ? { kind: 'singleSelect', optionId: node.optionId, name: node.name ?? '' }
        : undefined;
    case 'ProjectV2ItemFieldIterationValue':
      return node.iterationId != null
        ? {
            kind: 'iteration',
            iterationId: node.iterationId,
            title: node.title ?? '',
            startDate: node.startDate ?? '',
            duration: node.duration ?? 0,
          }
        : undefined;
    default:
      return undefined;
  }
}

export function formatFieldValue(value: FieldValue): string {
  switch (value.kind) {
    case 'text':
      return value.text;
    case 'number':
      return String(value.number);
    case 'date':
      return value.date;
    case 'singleSelect':
      return value.name;
    case 'iteration':
      return value.title;
  }
}

function contentType(typename: string): ItemContentType | undefined {
  switch (typename) {
    case 'Issue':
    case 'PullRequest':
    case 'DraftIssue':
      return typename;
    default:
      return undefined;
  }
}
