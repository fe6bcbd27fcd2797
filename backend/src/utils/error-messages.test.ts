import { describe, it, expect } from 'vitest';
import {
  API_KEY_ERRORS,
  STORE_ERRORS,
  INFERENCE_ERRORS,
  USER_FACING_ERRORS,
  SUCCESS_MESSAGES,
} from './error-messages.js';

describe('API_KEY_ERRORS', () => {
  it('MISSING names the environment variable and carries a warning indicator', () => {
    expect(API_KEY_ERRORS.MISSING).toContain('GROQ_API_KEY');
    expect(API_KEY_ERRORS.MISSING).toContain('⚠️');
  });
});

describe('STORE_ERRORS', () => {
  it('READ_FAILED includes the file path', () => {
    expect(STORE_ERRORS.READ_FAILED('/data/users.json')).toBe(
      '⚠️ STORE WARNING: Could not read /data/users.json. Continuing with an empty store.'
    );
  });

  it('RECORD_SKIPPED quotes the identifier', () => {
    expect(STORE_ERRORS.RECORD_SKIPPED('bob@example.com')).toContain('"bob@example.com"');
  });

  it('WRITE_FAILED names the file', () => {
    expect(STORE_ERRORS.WRITE_FAILED('users.json')).toBe('Failed to write users.json');
  });
});

describe('INFERENCE_ERRORS', () => {
  it('API_ERROR includes status, status text and body', () => {
    expect(INFERENCE_ERRORS.API_ERROR(429, 'Too Many Requests', 'slow down')).toBe(
      'Inference API error: 429 Too Many Requests - slow down'
    );
  });

  it('CONNECTION prefixes the detail', () => {
    expect(INFERENCE_ERRORS.CONNECTION('ECONNREFUSED')).toBe('Connection error: ECONNREFUSED');
  });
});

describe('USER_FACING_ERRORS', () => {
  it('has a non-empty message for every key', () => {
    for (const message of Object.values(USER_FACING_ERRORS)) {
      expect(message.length).toBeGreaterThan(0);
    }
  });
});

describe('SUCCESS_MESSAGES', () => {
  it('API_CONNECTED reports the model count', () => {
    expect(SUCCESS_MESSAGES.API_CONNECTED(12)).toBe('API Connected - 12 models available');
  });
});
