import { AutomationError } from '../types';

// Format error for MCP response
export function formatErrorForResponse(error: unknown): string {
  if (error instanceof AutomationError) {
    let message = `${error.code}: ${error.message}`;

    const suggestion = getErrorSuggestion(error);
    if (suggestion) {
      message += `\n\nSuggestion: ${suggestion}`;
    }

    return message;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

// Check if retrying the same operation could succeed
export function isRecoverableError(error: unknown): boolean {
  if (error instanceof AutomationError) {
    switch (error.code) {
      case 'EMULATOR_NOT_FOUND':
      case 'INVALID_CONFIG':
      case 'PROTOCOL_ERROR':
      case 'BUILD_FAILED':
      case 'ARTIFACT_NOT_FOUND':
        return false; // These require user action
      default:
        return true; // Boot and socket trouble is usually transient
    }
  }

  return false;
}

export function getErrorSuggestion(error: unknown): string | undefined {
  if (error instanceof AutomationError) {
    return error.suggestion;
  }

  return undefined;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
