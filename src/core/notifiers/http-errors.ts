import axios from 'axios';
import { NotifierError, errorMessage } from '../../common/errors';

/**
 * Maps an axios failure onto the notifier error kinds.
 *
 * No response at all is Unreachable, 401/403 is AuthFailed, 5xx is a
 * retryable InvalidResponse and any other status a final one.
 */
export function toNotifierError(target: string, error: unknown): NotifierError {
  if (!axios.isAxiosError(error)) {
    return new NotifierError('InvalidResponse', `${target}: ${errorMessage(error)}`);
  }

  if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
    return new NotifierError('Timeout', `${target} timed out: ${error.message}`);
  }

  const status = error.response?.status;
  if (status === undefined) {
    return new NotifierError('Unreachable', `${target} is unreachable: ${error.message}`);
  }
  if (status === 401 || status === 403) {
    return new NotifierError('AuthFailed', `${target} rejected the credentials (HTTP ${status})`);
  }
  return new NotifierError('InvalidResponse', `${target} answered HTTP ${status}`, status >= 500);
}
