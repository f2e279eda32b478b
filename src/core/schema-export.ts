import type { ProjectField, ProjectFieldList } from '../types/github.js';
import { ValidationError } from '../utils/errors.js';
import { fail, ok, type Result } from '../utils/result.js';
import { displayDataType } from './resolver.js';

export type SchemaFormat = 'json' | 'csv' | 'markdown';

export const SCHEMA_FORMATS: readonly SchemaFormat[] = ['json', 'csv', 'markdown'];

export function parseSchemaFormat(input: string): Result<SchemaFormat> {
  const match = SCHEMA_FORMATS.find((f) => f === input.toLowerCase());
  if (!match) {
    return fail(new ValidationError(`Unknown format: ${input}. Supported formats: ${SCHEMA_FORMATS.join(', ')}`));
  }
  return ok(match);
}

export function renderSchema(list: ProjectFieldList, format: SchemaFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify({ project: { title: list.title, fields: list.fields.map(fieldToJson) } }, null, 2) + '\n';
    case 'csv':
      return schemaCsv(list);
    case 'markdown':
      return schemaMarkdown(list);
  }
}

/**
 * One line per field for terminal listings: name, type, ID and a count of
 * options or iterations where the type has them.
 */
export function describeField(field: ProjectField): string {
  const base = `${field.name} [${displayDataType(field)}] ${field.id}`;
  switch (field.dataType) {
    case 'SINGLE_SELECT':
      return `${base} (${field.options.length} options)`;
    case 'ITERATION':
      return `${base} (${field.activeIterations.length} active, ${field.completedIterations.length} completed iterations)`;
    default:
      return base;
  }
}

function fieldToJson(field: ProjectField) {
  return {
    id: field.id,
    name: field.name,
    dataType: displayDataType(field),
    options: field.dataType === 'SINGLE_SELECT'
      ? field.options.map((o) => ({ id: o.id, name: o.name, color: o.color ?? null, description: o.description ?? null }))
      : null,
    iterations: field.dataType === 'ITERATION' ? field.activeIterations : null,
    completedIterations: field.dataType === 'ITERATION' ? field.completedIterations : null,
  };
}

function csvCell(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

function schemaCsv(list: ProjectFieldList): string {
  const lines = ['Project Title,Field ID,Field Name,Data Type,Option ID,Option Name,Option Color,Option Description'];
  for (const field of list.fields) {
    const head = [list.title, field.id, field.name, displayDataType(field)];
    if (field.dataType === 'SINGLE_SELECT' && field.options.length > 0) {
      for (const o of field.options) {
        lines.push([...head, o.id, o.name, o.color ?? '', o.description ?? ''].map(csvCell).join(','));
      }
    } else {
      lines.push([...head, '', '', '', ''].map(csvCell).join(','));
    }
  }
  return lines.join('\n') + '\n';
}

function schemaMarkdown(list: ProjectFieldList): string {
  const out = [`# Project Schema: ${list.title}`, '', '## Fields', ''];
  for (const field of list.fields) {
    out.push(`### ${field.name}`);
    out.push(`- **ID**: \`${field.id}\``);
    out.push(`- **Type**: ${displayDataType(field)}`);
    if (field.dataType === 'SINGLE_SELECT' && field.options.length > 0) {
      out.push('- **Options**:');
      for (const o of field.options) {
        const color = o.color ? ` - Color: ${o.color}` : '';
        const description = o.description ? ` - ${o.description}` : '';
        out.push(`  - \`${o.name}\` (${o.id})${color}${description}`);
      }
    }
    if (field.dataType === 'ITERATION' && field.activeIterations.length > 0) {
      out.push('- **Iterations**:');
      for (const i of field.activeIterations) {
        out.push(`  - \`${i.title}\` (${i.id}) - Start: ${i.startDate}`);
      }
    }
    out.push('');
  }
  return out.join('\n');
}
