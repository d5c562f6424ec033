import { ZodError } from 'zod';
import { ADBCommandError } from '../types';

// Format error for MCP response
export function formatErrorForResponse(error: unknown): string {
  if (error instanceof ADBCommandError) {
    let message = `${error.code}: ${error.message}`;

    const suggestion = getErrorSuggestion(error);
    if (suggestion) {
      message += `\n\nSuggestion: ${suggestion}`;
    }

    return message;
  }

  if (error instanceof ZodError) {
    const issues = error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    return `INVALID_ARGUMENT: ${issues.join('; ')}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

// Get a suggestion for fixing the error, when one is known
export function getErrorSuggestion(error: unknown): string | undefined {
  if (error instanceof ADBCommandError) {
    return error.suggestion;
  }

  return undefined;
}

// Whether retrying the same call later might succeed without user action
export function isRecoverableError(error: unknown): boolean {
  if (error instanceof ADBCommandError) {
    switch (error.code) {
      case 'BINARY_NOT_FOUND':
      case 'INVALID_ARGUMENT':
      case 'UNKNOWN_KEY':
        return false; // These require a different call or setup
      default:
        return true; // Device state may change
    }
  }

  return false;
}
