import axios, { isAxiosError } from 'axios';
import { ZodError } from 'zod';
import { AdapterError } from './errors.js';

/**
 * Map an HTTP client failure onto the degraded-source reasons
 */
export function toAdapterError(error: unknown, target: string): AdapterError {
  if (error instanceof AdapterError) {
    return error;
  }
  if (axios.isCancel(error)) {
    return new AdapterError('cancelled', `Request to ${target} was cancelled`, { cause: error });
  }
  if (isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new AdapterError('timeout', `Request to ${target} timed out`, { cause: error });
    }
    if (error.response) {
      const status = error.response.status;
      return new AdapterError('http_error', `${target} responded with HTTP ${status}`, { status, cause: error });
    }
    return new AdapterError('unavailable', `${target} is unreachable: ${error.message}`, { cause: error });
  }
  if (error instanceof ZodError) {
    const issue = error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return new AdapterError('malformed', `Unexpected payload from ${target}${where}`, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new AdapterError('unavailable', `${target} failed: ${message}`, { cause: error });
}
