/**
 * Utility functions for security and error handling
 */

/**
 * Sanitize error message to remove potentially sensitive information
 * Removes API keys, access keys and authorization values
 */
export function sanitizeError(errorText: string, maxLength: number = 200): string {
  if (!errorText) return '';

  let sanitized = errorText;

  // Pixabay takes its key as a query parameter
  sanitized = sanitized.replace(/([?&]key=)[^&\s"']+/gi, '$1[API_KEY_REMOVED]');

  // Unsplash access keys
  sanitized = sanitized.replace(/Client-ID\s+[a-zA-Z0-9_-]+/gi, 'Client-ID [TOKEN_REMOVED]');

  // Remove bearer tokens
  sanitized = sanitized.replace(/Bearer\s+[a-zA-Z0-9_-]+/gi, 'Bearer [TOKEN_REMOVED]');

  // Remove authorization headers
  sanitized = sanitized.replace(/authorization[:\s]+[^\s]+/gi, 'authorization: [REMOVED]');

  // Long alphanumeric runs look like API keys
  sanitized = sanitized.replace(/[a-zA-Z0-9]{41,}/g, '[API_KEY_REMOVED]');

  // Limit length
  if (sanitized.length > maxLength) {
    sanitized = sanitized.substring(0, maxLength) + '...';
  }

  return sanitized;
}

/**
 * Sanitize error object for logging/returning
 */
export function sanitizeErrorForResponse(error: unknown): string {
  if (error instanceof Error) {
    return sanitizeError(error.message);
  }
  return sanitizeError(String(error));
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
