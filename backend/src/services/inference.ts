/**
 * Contract between the dialogue layer and whatever produces assistant replies.
 * Unary: one request, one assistant message or an InferenceError.
 */

import type { ConnectionStatus, ModelInfo } from '@martin-chat/shared';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
}

export interface InferenceClient {
  complete(request: CompletionRequest): Promise<string>;
}

/** Model listing and reachability, for the UI's status area */
export interface ModelCatalog {
  listModels(): Promise<ModelInfo[]>;
  checkConnection(): Promise<ConnectionStatus>;
}

/**
 * Network failure, non-success status, unusable body or missing credential.
 * The message is meant to be shown to the user as is.
 */
export class InferenceError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InferenceError';
    this.status = status;
  }
}
