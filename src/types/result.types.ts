// Result and error types for service responses

/**
 * Represents the outcome of an operation that may succeed or fail.
 * Discriminated union prevents invalid states.
 */
export type Result<T> =
  | { readonly success: true; readonly data: T; readonly message: string }        // Success with data
  | { readonly success: true; readonly message: string }                          // Success without data (nothing loaded yet)
  | { readonly success: false; readonly message: string };                        // Failure

export type InputFile = 'activity' | 'orders' | 'trailers' | 'shift-calendar';

/**
 * Fatal input problem: a required column is missing or a value cannot be parsed.
 * Fails the whole cleaning call for that file.
 */
export class SchemaError extends Error {
  constructor(
    message: string,
    public readonly file: InputFile,
    public readonly column: string,
    public readonly row?: number
  ) {
    super(message);
    this.name = 'SchemaError';
  }
}

// ============================================================================
// Type Guards - Shared utility functions for type narrowing
// ============================================================================

/**
 * Type guard to check if Result has data (success with data case).
 */
export function isSuccess<T>(result: Result<T>): result is { readonly success: true; readonly data: T; readonly message: string } {
  return result.success && 'data' in result;
}

/**
 * Type guard to check if Result is empty (success without data case).
 */
export function isEmpty<T>(result: Result<T>): result is { readonly success: true; readonly message: string } {
  return result.success && !('data' in result);
}

export function isSchemaError(error: unknown): error is SchemaError {
  return error instanceof SchemaError;
}
