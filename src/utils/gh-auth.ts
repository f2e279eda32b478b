import { execFile, spawn } from 'node:child_process';
import { promisify } from 'node:util';
import { CALL_TIMEOUT_MS } from '../constants.js';
import { TransportError } from './errors.js';
import { logger } from './logger.js';

const execFileAsync = promisify(execFile);

/**
 * Sends one GraphQL document and resolves with the decoded response envelope
 * (`{ data, errors }`), whatever it contains. Rejects with TransportError when
 * the call itself did not complete.
 */
export type GraphQLTransport = (query: string, variables: Record<string, unknown>) => Promise<unknown>;

export async function checkGhAuth(): Promise<boolean> {
  try {
    await execFileAsync('gh', ['auth', 'status']);
    return true;
  } catch {
    logger.error('GitHub CLI is not authenticated. Run: gh auth login --scopes project');
    return false;
  }
}

export async function checkProjectScope(): Promise<boolean> {
  try {
    // gh prints the token scopes on stderr for older releases, stdout for newer ones
    const { stdout, stderr } = await execFileAsync('gh', ['auth', 'status']);
    if (`${stdout}\n${stderr}`.includes('project')) {
      return true;
    }
    logger.warn('Project scope (write access) may not be available.');
    logger.info('Consider running: gh auth refresh -s project --hostname github.com');
    return true;
  } catch {
    logger.error('Missing "project" scope. Run: gh auth refresh -s project');
    return false;
  }
}

/**
 * Build a transport that pipes the request body into `gh api graphql --input -`.
 */
export function createGhTransport(options: { timeoutMs?: number } = {}): GraphQLTransport {
  const timeoutMs = options.timeoutMs ?? CALL_TIMEOUT_MS;

  return (query, variables) => {
    const body = JSON.stringify({ query, variables });

    return new Promise((resolve, reject) => {
      const proc = spawn('gh', ['api', 'graphql', '--input', '-'], {
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let settled = false;
      let timedOut = false;

      const timer = setTimeout(() => {
        timedOut = true;
        proc.kill('SIGTERM');
      }, timeoutMs);

      const settle = (fn: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        fn();
      };

      proc.stdout.on('data', (data: Buffer) => { stdout += data.toString(); });
      proc.stderr.on('data', (data: Buffer) => { stderr += data.toString(); });

      proc.on('close', (code: number | null) => {
        if (timedOut) {
          settle(() => reject(new TransportError(`gh api graphql timed out after ${timeoutMs}ms`)));
          return;
        }
        // gh exits 1 when the response carries errors[] but still prints the envelope
        let envelope: unknown;
        try {
          envelope = JSON.parse(stdout);
        } catch {
          const reason = code !== 0 ? (stderr.trim() || `gh exited with code ${code}`) : `Failed to parse GraphQL response: ${stdout}`;
          settle(() => reject(new TransportError(reason)));
          return;
        }
        if (code !== 0 && !hasGraphQLErrors(envelope)) {
          settle(() => reject(new TransportError(stderr.trim() || `gh exited with code ${code}`)));
          return;
        }
        settle(() => resolve(envelope));
      });

      proc.on('error', (err: Error) => {
        settle(() => reject(new TransportError(`Could not run gh: ${err.message}`)));
      });

      // gh may exit before reading the whole body; EPIPE then surfaces here
      proc.stdin.on('error', (err: Error) => {
        settle(() => reject(new TransportError(`Could not write to gh: ${err.message}`)));
      });

      proc.stdin.write(body);
      proc.stdin.end();
    });
  };
}

function hasGraphQLErrors(envelope: unknown): boolean {
  return typeof envelope === 'object' && envelope !== null && 'errors' in envelope;
}
