import { z } from 'zod';
import type { GraphQLTransport } from '../utils/gh-auth.js';
import { RemoteLogicalError } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { fail, ok, type Result } from '../utils/result.js';
import { withRetry, DEFAULT_RETRY_POLICY, sleep, type RetryPolicy, type Sleep } from '../utils/retry.js';

export interface GraphQLRequest<T> {
  label: string;
  query: string;
  variables?: Record<string, unknown>;
  /** Shape of `data`; anything else is reported as a logical failure. */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export interface ExecutorOptions {
  policy?: RetryPolicy;
  sleep?: Sleep;
  logger?: Logger;
}

const envelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(z.object({ message: z.string() }).passthrough()).optional(),
});

/**
 * Runs GraphQL requests through a transport with bounded retries.
 *
 * Transport failures are retried with exponential backoff. An `errors[]`
 * payload is returned at once: repeating a rejected mutation cannot succeed.
 */
export class GraphQLExecutor {
  private readonly policy: RetryPolicy;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(
    private readonly transport: GraphQLTransport,
    options: ExecutorOptions = {},
  ) {
    this.policy = options.policy ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? defaultLogger;
  }

  async execute<T>(request: GraphQLRequest<T>): Promise<Result<T>> {
    const variables = request.variables ?? {};
    this.logger.debug(`GraphQL ${request.label}: ${JSON.stringify(variables)}`);

    const sent = await withRetry(
      () => this.transport(request.query, variables),
      request.label,
      { policy: this.policy, sleep: this.sleep, logger: this.logger },
    );
    if (!sent.ok) return sent;

    const envelope = envelopeSchema.safeParse(sent.value);
    if (!envelope.success) {
      return fail(new RemoteLogicalError(`${request.label}: response is not a GraphQL envelope`));
    }

    const errors = envelope.data.errors ?? [];
    if (errors.length > 0) {
      return fail(new RemoteLogicalError(errors.map((e) => e.message).join(', ')));
    }

    const data = request.schema.safeParse(envelope.data.data);
    if (!data.success) {
      const issue = data.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      return fail(new RemoteLogicalError(
        `${request.label}: unexpected response${where}: ${issue?.message ?? 'invalid data'}`,
      ));
    }
    return ok(data.data);
  }
}
