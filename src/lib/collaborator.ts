import { getLogger } from './logger';
import { ServiceError, UpstreamError, toError } from './errors';

const logger = getLogger('collaborator');

/**
 * Runs a call to an external collaborator under a deadline. Rejections and
 * timeouts surface as `upstream` errors with the original cause attached; the
 * call is never retried here.
 */
export async function callCollaborator<T>(
  name: string,
  timeoutMs: number,
  call: (signal: AbortSignal) => Promise<T>,
  code = 'network_error',
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const outcome: { timedOut: UpstreamError | null } = { timedOut: null };

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const timedOut = new UpstreamError(code, `${name} timed out after ${timeoutMs}ms`, new Error('timeout'), {
        collaborator: name,
        timeoutMs,
      });
      outcome.timedOut = timedOut;
      reject(timedOut);
      controller.abort();
    }, timeoutMs);
    if (typeof timer === 'object' && 'unref' in timer) {
      timer.unref();
    }
  });

  try {
    return await Promise.race([call(controller.signal), deadline]);
  } catch (err) {
    // Whatever the call rejects with once the deadline has fired is reported as the timeout.
    const { timedOut } = outcome;
    if (timedOut) {
      logger.error('Collaborator call timed out', timedOut, { collaborator: name, timeoutMs });
      throw timedOut;
    }
    if (err instanceof ServiceError) {
      logger.error('Collaborator call failed', err, { collaborator: name });
      throw err;
    }
    const cause = toError(err);
    logger.error('Collaborator call failed', cause, { collaborator: name });
    throw new UpstreamError(code, `${name} failed: ${cause.message}`, cause, { collaborator: name });
  } finally {
    if (timer) clearTimeout(timer);
  }
}
