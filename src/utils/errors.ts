export class StayscopeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StayscopeError';
  }
}

/**
 * Malformed aggregation or range-check input.
 * Fatal to the call; no partial result accompanies it.
 */
export class ValidationError extends StayscopeError {
  constructor(
    message: string,
    public readonly issues: string[] = [message]
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Reserved. An aggregation with zero groups returns an empty list
 * instead of throwing this.
 */
export class EmptyResultError extends StayscopeError {
  constructor(message = 'Aggregation produced no groups') {
    super(message);
    this.name = 'EmptyResultError';
  }
}

export class DataLoadError extends StayscopeError {
  constructor(
    public readonly filePath: string,
    reason: string
  ) {
    super(`Failed to load ${filePath}: ${reason}`);
    this.name = 'DataLoadError';
  }
}

/**
 * Extracts error message from unknown error type
 * @param error - The caught error (unknown type)
 * @returns Error message as string
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Format an error for console display, listing validation issues one per line
 */
export function formatErrorForUser(error: unknown): string {
  const lines = [getErrorMessage(error)];

  if (error instanceof ValidationError && error.issues.length > 1) {
    for (const issue of error.issues) {
      lines.push(`  • ${issue}`);
    }
  }

  return lines.join('\n');
}
