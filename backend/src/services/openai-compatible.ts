import { z } from 'zod';
import type { ConnectionStatus, ModelInfo } from '@martin-chat/shared';
import { InferenceError, type ChatMessage, type CompletionRequest, type InferenceClient, type ModelCatalog } from './inference.js';
import { NO_CREDENTIAL } from '../config/loader.js';
import { llmLogger } from '../utils/llmLogger.js';
import { Logger } from '../utils/logger.js';
import { API_KEY_ERRORS, INFERENCE_ERRORS, SUCCESS_MESSAGES } from '../utils/error-messages.js';

// Used when the models endpoint is unreachable
export const FALLBACK_MODELS: ModelInfo[] = [
  { id: 'llama-3.1-70b-versatile', name: 'Llama 3.1 70B Versatile' },
  { id: 'llama-3.1-8b-instant', name: 'Llama 3.1 8B Instant' },
  { id: 'llama-3.2-11b-text-preview', name: 'Llama 3.2 11B Text' },
  { id: 'llama-3.2-3b-preview', name: 'Llama 3.2 3B Preview' },
  { id: 'llama-3.2-1b-preview', name: 'Llama 3.2 1B Preview' },
  { id: 'llama3-groq-70b-8192-tool-use-preview', name: 'Llama 3 Groq 70B Tool Use' },
  { id: 'llama3-groq-8b-8192-tool-use-preview', name: 'Llama 3 Groq 8B Tool Use' },
  { id: 'llama3-70b-8192', name: 'Llama 3 70B' },
  { id: 'llama3-8b-8192', name: 'Llama 3 8B' },
  { id: 'mixtral-8x7b-32768', name: 'Mixtral 8x7B' },
  { id: 'gemma2-9b-it', name: 'Gemma 2 9B IT' },
  { id: 'gemma-7b-it', name: 'Gemma 7B IT' }
];

// Speech and distilled models can't hold a conversation
const NON_CHAT_MODEL_MARKERS = ['whisper', 'distil'];

const CompletionResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      role: z.string().optional(),
      content: z.string().nullable()
    })
  })),
  usage: z.object({
    total_tokens: z.number()
  }).optional()
});

const ModelListSchema = z.object({
  data: z.array(z.object({ id: z.string() }))
});

/** "llama-3.1-8b-instant" -> "Llama 3.1 8B Instant" */
export function toDisplayName(modelId: string): string {
  return modelId
    .replace(/-/g, ' ')
    .toLowerCase()
    .replace(/[a-z]+/g, word => word.charAt(0).toUpperCase() + word.slice(1));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Non-streaming client for OpenAI-compatible chat completion APIs (Groq by default).
 */
export class OpenAICompatibleService implements InferenceClient, ModelCatalog {
  private apiKey: string;
  private baseUrl: string;

  constructor(apiKey: string, baseUrl: string) {
    this.apiKey = apiKey;
    this.baseUrl = baseUrl.replace(/\/$/, ''); // Remove trailing slash
  }

  hasCredential(): boolean {
    return this.apiKey !== NO_CREDENTIAL && this.apiKey.length > 0;
  }

  // Smart path construction - don't double-add /v1
  private endpoint(path: string): string {
    return this.baseUrl.endsWith('/v1')
      ? `${this.baseUrl}/${path}`
      : `${this.baseUrl}/v1/${path}`;
  }

  private headers(): Record<string, string> {
    return {
      'Authorization': `Bearer ${this.apiKey}`,
      'Content-Type': 'application/json'
    };
  }

  async complete(request: CompletionRequest): Promise<string> {
    if (!this.hasCredential()) {
      throw new InferenceError(API_KEY_ERRORS.NOT_CONFIGURED);
    }

    const requestId = `openai-compatible-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
    const startTime = Date.now();
    const endpoint = this.endpoint('chat/completions');
    const requestBody = {
      model: request.model,
      messages: request.messages.map((message): ChatMessage => ({ role: message.role, content: message.content })),
      temperature: request.temperature,
      stream: false
    };

    await llmLogger.logRequest({
      requestId,
      service: 'openai-compatible',
      model: request.model,
      temperature: request.temperature,
      messageCount: requestBody.messages.length,
      endpoint,
      requestBody
    });
    Logger.inference(`[OpenAI-Compatible] ${requestId} -> ${endpoint} (${request.model}, ${requestBody.messages.length} messages)`);

    try {
      let response: Response;
      try {
        response = await fetch(endpoint, {
          method: 'POST',
          headers: this.headers(),
          body: JSON.stringify(requestBody)
        });
      } catch (error) {
        throw new InferenceError(INFERENCE_ERRORS.CONNECTION(errorMessage(error)), undefined, { cause: error });
      }

      if (!response.ok) {
        let errorText: string;
        try {
          errorText = await response.text();
        } catch (error) {
          throw new InferenceError(INFERENCE_ERRORS.CONNECTION(errorMessage(error)), response.status, { cause: error });
        }
        throw new InferenceError(INFERENCE_ERRORS.API_ERROR(response.status, response.statusText, errorText), response.status);
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        throw new InferenceError(INFERENCE_ERRORS.MALFORMED_RESPONSE, response.status, { cause: error });
      }

      const parsed = CompletionResponseSchema.safeParse(body);
      const content = parsed.success ? parsed.data.choices[0]?.message.content : undefined;
      if (typeof content !== 'string') {
        throw new InferenceError(INFERENCE_ERRORS.MALFORMED_RESPONSE, response.status);
      }

      await llmLogger.logResponse({
        requestId,
        service: 'openai-compatible',
        model: request.model,
        content,
        status: response.status,
        duration: Date.now() - startTime,
        tokenCount: parsed.success ? parsed.data.usage?.total_tokens : undefined
      });

      return content;
    } catch (error) {
      Logger.error('[OpenAI-Compatible] Completion failed:', errorMessage(error));
      await llmLogger.logResponse({
        requestId,
        service: 'openai-compatible',
        model: request.model,
        error: errorMessage(error),
        status: error instanceof InferenceError ? error.status : undefined,
        duration: Date.now() - startTime
      });
      throw error;
    }
  }

  // List chat models from the API, falling back to a fixed list
  async listModels(): Promise<ModelInfo[]> {
    if (!this.hasCredential()) {
      return FALLBACK_MODELS;
    }

    try {
      const response = await fetch(this.endpoint('models'), { headers: this.headers() });
      if (!response.ok) {
        Logger.warn(`Models endpoint not available: ${response.status}`);
        return FALLBACK_MODELS;
      }

      const parsed = ModelListSchema.safeParse(await response.json());
      if (!parsed.success) {
        Logger.warn('Models endpoint returned an unexpected body');
        return FALLBACK_MODELS;
      }

      return parsed.data.data
        .filter(model => !NON_CHAT_MODEL_MARKERS.some(marker => model.id.toLowerCase().includes(marker)))
        .map(model => ({ id: model.id, name: toDisplayName(model.id) }));
    } catch (error) {
      Logger.warn('Failed to list models:', errorMessage(error));
      return FALLBACK_MODELS;
    }
  }

  async checkConnection(timeoutMs: number = 5000): Promise<ConnectionStatus> {
    try {
      const response = await fetch(this.endpoint('models'), {
        headers: this.headers(),
        signal: AbortSignal.timeout(timeoutMs)
      });
      if (!response.ok) {
        return { ok: false, message: `API Error: ${response.status}` };
      }

      const parsed = ModelListSchema.safeParse(await response.json());
      const count = parsed.success ? parsed.data.data.length : 0;
      return { ok: true, message: SUCCESS_MESSAGES.API_CONNECTED(count) };
    } catch (error) {
      return { ok: false, message: `Connection Error: ${errorMessage(error).slice(0, 50)}` };
    }
  }
}
