import type { SUPPORTED_FIELD_TYPES, OPTION_COLORS } from '../constants.js';

export type SupportedFieldType = (typeof SUPPORTED_FIELD_TYPES)[number];

export type OptionColor = (typeof OPTION_COLORS)[number];

export interface SingleSelectOption {
  id: string;
  name: string;
  color?: string;
  description?: string;
}

export interface Iteration {
  id: string;
  title: string;
  startDate: string;
  duration: number;
}

interface FieldBase {
  id: string;
  name: string;
}

export interface TextField extends FieldBase {
  dataType: 'TEXT';
}

export interface NumberField extends FieldBase {
  dataType: 'NUMBER';
}

export interface DateField extends FieldBase {
  dataType: 'DATE';
}

export interface SingleSelectField extends FieldBase {
  dataType: 'SINGLE_SELECT';
  options: SingleSelectOption[];
}

export interface IterationField extends FieldBase {
  dataType: 'ITERATION';
  activeIterations: Iteration[];
  completedIterations: Iteration[];
}

/**
 * A field whose remote type cannot be written by value (TITLE, ASSIGNEES,
 * LABELS, ...). The remote name is kept for display.
 */
export interface UnsupportedField extends FieldBase {
  dataType: 'UNSUPPORTED';
  remoteDataType: string;
}

export type ProjectField =
  | TextField
  | NumberField
  | DateField
  | SingleSelectField
  | IterationField
  | UnsupportedField;

export interface ProjectFieldList {
  projectId: string;
  title: string;
  fields: ProjectField[];
}

/**
 * Input for updateProjectV2ItemFieldValue. Exactly one key is set.
 */
export type FieldValueInput =
  | { text: string }
  | { number: number }
  | { date: string }
  | { singleSelectOptionId: string }
  | { iterationId: string };

/**
 * A value read back from an item.
 */
export type FieldValue =
  | { kind: 'text'; text: string }
  | { kind: 'number'; number: number }
  | { kind: 'date'; date: string }
  | { kind: 'singleSelect'; optionId: string; name: string }
  | { kind: 'iteration'; iterationId: string; title: string; startDate: string; duration: number };

export interface ItemFieldValue {
  fieldId: string;
  fieldName: string;
  value: FieldValue;
}

export type ItemContentType = 'Issue' | 'PullRequest' | 'DraftIssue';

export interface ItemFieldValues {
  itemId: string;
  title: string;
  contentType?: ItemContentType;
  number?: number;
  url?: string;
  values: ItemFieldValue[];
}

export interface NewSelectOption {
  name: string;
  color: OptionColor;
  description: string;
}
