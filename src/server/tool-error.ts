/**
 * Shared error handling for gateway tools: consistent logging and user-facing messages.
 */

import type { ZodError } from 'zod';
import { getLogLevel, error as logError } from '../logger.js';

/** User-facing error message: the underlying cause in DEBUG, a pointer to the logs otherwise. */
export function getToolErrorMessage(error: unknown, fallbackMessage: string): string {
  if (getLogLevel() !== 'DEBUG') {
    return `${fallbackMessage}. See the server logs for details.`;
  }
  const msg = error instanceof Error ? error.message : String(error);
  return `${fallbackMessage}: ${msg}`;
}

export function logToolError(toolName: string, error: unknown): void {
  logError(`Error in ${toolName} tool`, error);
}

/** One line per issue, e.g. `top_k: Number must be less than or equal to 100`. */
export function formatArgumentIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'arguments'}: ${issue.message}`)
    .join('; ');
}
