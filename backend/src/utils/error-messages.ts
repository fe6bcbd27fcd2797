/**
 * Centralized error and warning messages
 *
 * Single source of truth for log warnings and the messages the HTTP layer
 * returns to the UI.
 */

// =============================================================================
// API KEY ERRORS
// =============================================================================

export const API_KEY_ERRORS = {
  MISSING:
    '⚠️  WARNING: Using placeholder API key. Set GROQ_API_KEY environment variable or provide the platform secret file for production!',

  NOT_CONFIGURED:
    'No inference API key configured. Set GROQ_API_KEY and restart the server.',
};

// =============================================================================
// STORE ERRORS
// =============================================================================

export const STORE_ERRORS = {
  READ_FAILED: (filePath: string) =>
    `⚠️ STORE WARNING: Could not read ${filePath}. Continuing with an empty store.`,

  PARSE_FAILED: (filePath: string) =>
    `⚠️ STORE WARNING: ${filePath} is not valid JSON. Continuing with an empty store.`,

  RECORD_SKIPPED: (identifier: string) =>
    `⚠️ STORE WARNING: Skipping malformed record "${identifier}".`,

  WRITE_FAILED: (filePath: string) =>
    `Failed to write ${filePath}`,

  WRITE_DEGRADED: (operation: string) =>
    `⚠️ STORE WARNING: ${operation} could not be persisted; continuing without it.`,
};

// =============================================================================
// INFERENCE ERRORS
// =============================================================================

export const INFERENCE_ERRORS = {
  API_ERROR: (status: number, statusText: string, body: string) =>
    `Inference API error: ${status} ${statusText} - ${body}`,

  CONNECTION: (detail: string) =>
    `Connection error: ${detail}`,

  MALFORMED_RESPONSE:
    'Inference API returned a response without an assistant message',
};

// =============================================================================
// SERVER ERRORS
// =============================================================================

export const SERVER_ERRORS = {
  STARTUP_FAILED: 'Failed to start server:',
};

// =============================================================================
// USER-FACING ERROR MESSAGES (returned to the UI)
// =============================================================================

export const USER_FACING_ERRORS = {
  INVALID_INPUT: 'Invalid input',
  INTERNAL: 'Internal server error',
  UNAUTHORIZED: 'Unauthorized',
  SESSION_NOT_FOUND: 'Session not found or expired',
  EMPTY_MESSAGE: 'Message is empty',
  EMPTY_TRANSCRIPT: 'Nothing to wrap up yet',
  REPLY_PENDING: 'A reply is still being generated',
  USER_EXISTS: 'User already exists',
  STORE_UNAVAILABLE: 'Account storage is unavailable, please try again later',
  USER_NOT_FOUND: 'User not found',
  INVALID_PASSWORD: 'Invalid password',
};

// =============================================================================
// SUCCESS MESSAGES
// =============================================================================

export const SUCCESS_MESSAGES = {
  LOGIN: 'Login successful!',
  REGISTERED: 'Registration successful!',
  GUEST_CREATED: 'Guest session created!',
  API_CONNECTED: (count: number) =>
    `API Connected - ${count} models available`,
};
