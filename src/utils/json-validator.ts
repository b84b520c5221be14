/**
 * JSON Validation Utilities
 *
 * Type-safe JSON parsing with schema validation using Zod. Used for the
 * persisted disk index and the CLI's result payloads.
 */

import type { ZodError, ZodType, ZodTypeDef } from 'zod';

// ============================================================================
// Types
// ============================================================================

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: string; zodError?: ZodError };

export interface ValidationOptions {
  /** Custom error message prefix */
  errorPrefix?: string;
}

// ============================================================================
// Parsing Functions
// ============================================================================

/**
 * Parse JSON string with schema validation
 *
 * @param jsonString - Raw JSON string to parse
 * @param schema - Zod schema to validate against
 */
export function parseJSON<T>(
  jsonString: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  options: ValidationOptions = {}
): ParseResult<T> {
  const { errorPrefix = 'JSON validation failed' } = options;

  let rawData: unknown;
  try {
    rawData = JSON.parse(jsonString);
  } catch (error) {
    return {
      success: false,
      error: `${errorPrefix}: Invalid JSON syntax - ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const result = schema.safeParse(rawData);
  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    error: `${errorPrefix}: ${formatZodError(result.error)}`,
    zodError: result.error,
  };
}

/**
 * Format Zod error for display
 */
export function formatZodError(error: ZodError): string {
  const issues = error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });

  return issues.join('; ');
}
