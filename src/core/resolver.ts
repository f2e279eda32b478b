import { z } from 'zod';
import { FIELDS_PAGE_SIZE, VIEWER_OWNER } from '../constants.js';
import type { ProjectField, ProjectFieldList, SingleSelectOption } from '../types/github.js';
import { asNotFound, NotFoundError, ValidationError } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { fail, ok, type Result } from '../utils/result.js';
import type { GraphQLExecutor } from './executor.js';

const projectRefSchema = z.object({ id: z.string().nullish() }).nullish();

const iterationSchema = z.object({
  id: z.string(),
  title: z.string(),
  startDate: z.string(),
  duration: z.number(),
});

export const fieldNodeSchema = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
  dataType: z.string().optional(),
  options: z.array(z.object({
    id: z.string(),
    name: z.string(),
    color: z.string().nullish(),
    description: z.string().nullish(),
  })).optional(),
  configuration: z.object({
    iterations: z.array(iterationSchema).optional(),
    completedIterations: z.array(iterationSchema).optional(),
  }).nullish(),
});

export type FieldNode = z.infer<typeof fieldNodeSchema>;

const projectFieldsSchema = z.object({
  node: z.object({
    title: z.string().optional(),
    fields: z.object({ nodes: z.array(fieldNodeSchema.nullable()) }).optional(),
  }).nullable(),
});

/** Selection set shared by every query that reads field metadata. */
export const FIELD_SELECTION = `
  ... on ProjectV2Field {
    id
    name
    dataType
  }
  ... on ProjectV2SingleSelectField {
    id
    name
    dataType
    options { id name color description }
  }
  ... on ProjectV2IterationField {
    id
    name
    dataType
    configuration {
      iterations { id title startDate duration }
      completedIterations { id title startDate duration }
    }
  }
`;

const PROJECT_FIELDS_QUERY = `
  query($projectId: ID!) {
    node(id: $projectId) {
      ... on ProjectV2 {
        title
        fields(first: ${FIELDS_PAGE_SIZE}) {
          nodes { ${FIELD_SELECTION} }
        }
      }
    }
  }
`;

/**
 * Turn a raw field node into a typed field. Nodes matching none of the
 * fragments come back empty and yield undefined.
 */
export function normalizeField(node: FieldNode): ProjectField | undefined {
  if (!node.id || node.name === undefined) return undefined;
  const base = { id: node.id, name: node.name };

  switch (node.dataType) {
    case 'TEXT':
    case 'NUMBER':
    case 'DATE':
      return { ...base, dataType: node.dataType };
    case 'SINGLE_SELECT':
      return {
        ...base,
        dataType: 'SINGLE_SELECT',
        options: (node.options ?? []).map((o): SingleSelectOption => ({
          id: o.id,
          name: o.name,
          color: o.color ?? undefined,
          description: o.description ?? undefined,
        })),
      };
    case 'ITERATION':
      return {
        ...base,
        dataType: 'ITERATION',
        activeIterations: node.configuration?.iterations ?? [],
        completedIterations: node.configuration?.completedIterations ?? [],
      };
    default:
      return { ...base, dataType: 'UNSUPPORTED', remoteDataType: node.dataType ?? 'UNKNOWN' };
  }
}

export interface ResolverOptions {
  /**
   * Fetch each project's fields once and reuse them for the rest of the run.
   * Rows then see one consistent schema, at the cost of missing renames made
   * while the run is in progress.
   */
  snapshotFields?: boolean;
  logger?: Logger;
}

/**
 * Maps human names (owner, project number, field, option, iteration) to node IDs.
 */
export class IdentifierResolver {
  private readonly projectIds = new Map<string, string>();
  private readonly fieldSnapshots = new Map<string, ProjectFieldList>();
  private readonly snapshotFields: boolean;
  private readonly logger: Logger;

  constructor(
    private readonly executor: GraphQLExecutor,
    options: ResolverOptions = {},
  ) {
    this.snapshotFields = options.snapshotFields ?? false;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * `@me` is the authenticated user, `login/...` a user project, anything
   * else an organization.
   */
  async resolveProject(owner: string, projectNumber: number): Promise<Result<string>> {
    if (!Number.isInteger(projectNumber) || projectNumber <= 0) {
      return fail(new ValidationError(`Invalid project number: ${projectNumber}`));
    }
    const cacheKey = `${owner}#${projectNumber}`;
    const cached = this.projectIds.get(cacheKey);
    if (cached) return ok(cached);

    const scope = ownerScope(owner);
    if (!scope.ok) return scope;

    const { field, login } = scope.value;
    const notFound = `Could not find project ${projectNumber} for owner ${owner}`;

    const result = await this.executor.execute({
      label: `Get project ${owner}#${projectNumber}`,
      query: field === 'viewer'
        ? `query($number: Int!) { viewer { projectV2(number: $number) { id } } }`
        : `query($login: String!, $number: Int!) { ${field}(login: $login) { projectV2(number: $number) { id } } }`,
      variables: field === 'viewer' ? { number: projectNumber } : { login, number: projectNumber },
      schema: z.object({
        viewer: z.object({ projectV2: projectRefSchema }).nullish(),
        user: z.object({ projectV2: projectRefSchema }).nullish(),
        organization: z.object({ projectV2: projectRefSchema }).nullish(),
      }),
    });

    if (!result.ok) {
      return fail(asNotFound(result.error, notFound));
    }

    const projectId = result.value[field]?.projectV2?.id;
    if (!projectId) {
      return fail(new NotFoundError(notFound));
    }
    this.projectIds.set(cacheKey, projectId);
    return ok(projectId);
  }

  async getProjectFields(projectId: string): Promise<Result<ProjectFieldList>> {
    if (this.snapshotFields) {
      const snapshot = this.fieldSnapshots.get(projectId);
      if (snapshot) return ok(snapshot);
    }

    const result = await this.executor.execute({
      label: 'Get project fields',
      query: PROJECT_FIELDS_QUERY,
      variables: { projectId },
      schema: projectFieldsSchema,
    });
    if (!result.ok) return result;

    const node = result.value.node;
    if (!node?.fields) {
      return fail(new NotFoundError(`Project ${projectId} not found or not accessible`));
    }

    const fields: ProjectField[] = [];
    for (const raw of node.fields.nodes) {
      if (!raw) continue;
      const field = normalizeField(raw);
      if (field) fields.push(field);
    }

    const list: ProjectFieldList = { projectId, title: node.title ?? '', fields };
    if (this.snapshotFields) {
      this.fieldSnapshots.set(projectId, list);
    }
    return ok(list);
  }

  /**
   * Exact, case-sensitive match on the field name. The first field wins when
   * the project has several with the same name.
   */
  async resolveField(projectId: string, fieldName: string): Promise<Result<ProjectField>> {
    const list = await this.getProjectFields(projectId);
    if (!list.ok) return list;

    const matches = list.value.fields.filter((f) => f.name === fieldName);
    if (matches.length === 0) {
      return fail(new NotFoundError(`Field '${fieldName}' not found in project`));
    }
    if (matches.length > 1) {
      this.logger.warn(`Project has ${matches.length} fields named '${fieldName}'; using ${matches[0].id}`);
    }
    return ok(matches[0]);
  }

  /**
   * Option ID for a single-select field, iteration ID for an iteration field
   * (active iterations first, then completed ones).
   */
  resolveOption(field: ProjectField, name: string): Result<string> {
    let candidates: Array<{ id: string }>;
    let noun: string;

    switch (field.dataType) {
      case 'SINGLE_SELECT':
        candidates = field.options.filter((o) => o.name === name);
        noun = 'Option';
        break;
      case 'ITERATION': {
        const active = field.activeIterations.filter((i) => i.title === name);
        candidates = active.length > 0 ? active : field.completedIterations.filter((i) => i.title === name);
        noun = 'Iteration';
        break;
      }
      default:
        return fail(new ValidationError(`Field '${field.name}' (${displayDataType(field)}) has no options or iterations`));
    }

    if (candidates.length === 0) {
      return fail(new NotFoundError(`${noun} '${name}' not found in field '${field.name}'`));
    }
    if (candidates.length > 1) {
      this.logger.warn(`Field '${field.name}' has ${candidates.length} entries named '${name}'; using ${candidates[0].id}`);
    }
    return ok(candidates[0].id);
  }
}

export function displayDataType(field: ProjectField): string {
  return field.dataType === 'UNSUPPORTED' ? field.remoteDataType : field.dataType;
}

function ownerScope(owner: string): Result<{ field: 'viewer' | 'user' | 'organization'; login: string }> {
  if (owner === VIEWER_OWNER) {
    return ok({ field: 'viewer', login: '' });
  }
  if (owner.includes('/')) {
    const login = owner.split('/')[0];
    if (!login) return fail(new ValidationError(`Invalid owner: ${owner}`));
    return ok({ field: 'user', login });
  }
  if (!owner) return fail(new ValidationError('Owner is required'));
  return ok({ field: 'organization', login: owner });
}
