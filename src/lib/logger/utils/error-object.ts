import { errorToString } from '../../error-to-string';
import { DOUBLE_EOL } from '../../constants';

/**
 * Prepare an error object for logging with an optional prefix
 */
export function prepareErrorObjectLog(prefix: string, error: unknown): string {
  prefix = prefix.trim();

  const prefixLine = prefix.length > 0 ? prefix + ': ' + DOUBLE_EOL : '';

  return prefixLine + errorToString(error);
}
