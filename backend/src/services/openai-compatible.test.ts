import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';

// Mock llmLogger
vi.mock('../utils/llmLogger.js', () => ({
  llmLogger: { logRequest: vi.fn(), logResponse: vi.fn() },
}));

import { OpenAICompatibleService, FALLBACK_MODELS, toDisplayName } from './openai-compatible.js';
import { InferenceError, type CompletionRequest } from './inference.js';
import { NO_CREDENTIAL } from '../config/loader.js';
import { llmLogger } from '../utils/llmLogger.js';

const mockLogRequest = vi.mocked(llmLogger.logRequest);
const mockLogResponse = vi.mocked(llmLogger.logResponse);

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function completionBody(content: string | null) {
  return {
    id: 'chatcmpl-1',
    choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: 'stop' }],
    usage: { prompt_tokens: 20, completion_tokens: 5, total_tokens: 25 },
  };
}

function request(overrides: Partial<CompletionRequest> = {}): CompletionRequest {
  return {
    model: 'llama-3.1-8b-instant',
    messages: [
      { role: 'system', content: 'Be kind.' },
      { role: 'user', content: 'Hello' },
    ],
    temperature: 0.7,
    ...overrides,
  };
}

function requestInit(init: RequestInit | undefined): RequestInit {
  if (!init) {
    throw new Error('fetch was called without options');
  }
  return init;
}

describe('OpenAICompatibleService', () => {
  let fetchSpy: MockInstance<Parameters<typeof fetch>, ReturnType<typeof fetch>>;

  beforeEach(() => {
    fetchSpy = vi.spyOn(globalThis, 'fetch');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    mockLogRequest.mockClear();
    mockLogResponse.mockClear();
  });

  describe('complete', () => {
    it('posts a non-streaming request and returns the assistant message', async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse(completionBody('Hi there.')));
      const service = new OpenAICompatibleService('test-key', 'https://api.example.com/openai/v1');

      const reply = await service.complete(request());

      expect(reply).toBe('Hi there.');
      expect(fetchSpy).toHaveBeenCalledTimes(1);
      expect(fetchSpy.mock.calls[0][0]).toBe('https://api.example.com/openai/v1/chat/completions');

      const init = requestInit(fetchSpy.mock.calls[0][1]);
      expect(init.method).toBe('POST');
      expect(init.headers).toEqual({
        'Authorization': 'Bearer test-key',
        'Content-Type': 'application/json',
      });
      expect(JSON.parse(String(init.body))).toEqual({
        model: 'llama-3.1-8b-instant',
        messages: [
          { role: 'system', content: 'Be kind.' },
          { role: 'user', content: 'Hello' },
        ],
        temperature: 0.7,
        stream: false,
      });
    });

    it('adds /v1 when the base URL does not end with it', async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse(completionBody('ok')));
      const service = new OpenAICompatibleService('test-key', 'http://localhost:8080/');

      await service.complete(request());

      expect(fetchSpy.mock.calls[0][0]).toBe('http://localhost:8080/v1/chat/completions');
    });

    it('returns the raw content, reasoning blocks included', async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse(completionBody('<think>plan</think>Answer')));
      const service = new OpenAICompatibleService('test-key', 'https://api.example.com/v1');

      expect(await service.complete(request())).toBe('<think>plan</think>Answer');
    });

    it('logs the request and the response', async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse(completionBody('Logged reply')));
      const service = new OpenAICompatibleService('test-key', 'https://api.example.com/v1');

      await service.complete(request());

      expect(mockLogRequest).toHaveBeenCalledTimes(1);
      expect(mockLogRequest.mock.calls[0][0]).toMatchObject({
        service: 'openai-compatible',
        model: 'llama-3.1-8b-instant',
        temperature: 0.7,
        messageCount: 2,
        endpoint: 'https://api.example.com/v1/chat/completions',
      });
      expect(mockLogResponse).toHaveBeenCalledTimes(1);
      expect(mockLogResponse.mock.calls[0][0]).toMatchObject({
        content: 'Logged reply',
        status: 200,
        tokenCount: 25,
      });
    });

    it('refuses to run without a credential and never touches the network', async () => {
      const service = new OpenAICompatibleService(NO_CREDENTIAL, 'https://api.example.com/v1');

      await expect(service.complete(request())).rejects.toBeInstanceOf(InferenceError);
      expect(fetchSpy).not.toHaveBeenCalled();
    });

    it('throws an InferenceError carrying status and body on non-OK responses', async () => {
      fetchSpy.mockResolvedValueOnce(new Response('rate limited', { status: 429, statusText: 'Too Many Requests' }));
      const service = new OpenAICompatibleService('test-key', 'https://api.example.com/v1');

      const error = await service.complete(request()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InferenceError);
      expect(error).toMatchObject({
        message: 'Inference API error: 429 Too Many Requests - rate limited',
        status: 429,
      });
      expect(mockLogResponse.mock.calls[0][0]).toMatchObject({
        error: 'Inference API error: 429 Too Many Requests - rate limited',
        status: 429,
      });
    });

    it('wraps a failed error-body read as InferenceError', async () => {
      const response = new Response('partial', { status: 500, statusText: 'Internal Server Error' });
      vi.spyOn(response, 'text').mockRejectedValueOnce(new Error('socket hang up'));
      fetchSpy.mockResolvedValueOnce(response);
      const service = new OpenAICompatibleService('test-key', 'https://api.example.com/v1');

      const error = await service.complete(request()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InferenceError);
      expect(error).toMatchObject({ message: 'Connection error: socket hang up', status: 500 });
    });

    it('wraps network failures as InferenceError', async () => {
      fetchSpy.mockRejectedValueOnce(new TypeError('fetch failed'));
      const service = new OpenAICompatibleService('test-key', 'https://api.example.com/v1');

      await expect(service.complete(request())).rejects.toThrow('Connection error: fetch failed');
    });

    it('rejects a body without an assistant message', async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse({ choices: [] }));
      const service = new OpenAICompatibleService('test-key', 'https://api.example.com/v1');

      await expect(service.complete(request())).rejects.toThrow(
        'Inference API returned a response without an assistant message'
      );
    });

    it('rejects a null content', async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse(completionBody(null)));
      const service = new OpenAICompatibleService('test-key', 'https://api.example.com/v1');

      await expect(service.complete(request())).rejects.toBeInstanceOf(InferenceError);
    });
  });

  describe('listModels', () => {
    it('drops speech models and derives display names', async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse({
        object: 'list',
        data: [
          { id: 'llama-3.1-8b-instant' },
          { id: 'whisper-large-v3' },
          { id: 'distil-whisper-large-v3-en' },
          { id: 'gemma2-9b-it' },
        ],
      }));
      const service = new OpenAICompatibleService('test-key', 'https://api.example.com/v1');

      expect(await service.listModels()).toEqual([
        { id: 'llama-3.1-8b-instant', name: 'Llama 3.1 8B Instant' },
        { id: 'gemma2-9b-it', name: 'Gemma2 9B It' },
      ]);
      expect(fetchSpy.mock.calls[0][0]).toBe('https://api.example.com/v1/models');
    });

    it('falls back to the fixed list on an error status', async () => {
      fetchSpy.mockResolvedValueOnce(new Response('nope', { status: 500 }));
      const service = new OpenAICompatibleService('test-key', 'https://api.example.com/v1');

      expect(await service.listModels()).toBe(FALLBACK_MODELS);
    });

    it('falls back to the fixed list when the request fails', async () => {
      fetchSpy.mockRejectedValueOnce(new Error('offline'));
      const service = new OpenAICompatibleService('test-key', 'https://api.example.com/v1');

      expect(await service.listModels()).toBe(FALLBACK_MODELS);
    });

    it('uses the fixed list without a credential', async () => {
      const service = new OpenAICompatibleService(NO_CREDENTIAL, 'https://api.example.com/v1');

      expect(await service.listModels()).toHaveLength(12);
      expect(fetchSpy).not.toHaveBeenCalled();
    });
  });

  describe('checkConnection', () => {
    it('reports the number of models', async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse({ data: [{ id: 'a' }, { id: 'b' }, { id: 'c' }] }));
      const service = new OpenAICompatibleService('test-key', 'https://api.example.com/v1');

      expect(await service.checkConnection()).toEqual({ ok: true, message: 'API Connected - 3 models available' });
    });

    it('reports an error status', async () => {
      fetchSpy.mockResolvedValueOnce(new Response('unauthorized', { status: 401 }));
      const service = new OpenAICompatibleService('test-key', 'https://api.example.com/v1');

      expect(await service.checkConnection()).toEqual({ ok: false, message: 'API Error: 401' });
    });

    it('truncates connection failures to 50 characters', async () => {
      fetchSpy.mockRejectedValueOnce(new Error('x'.repeat(80)));
      const service = new OpenAICompatibleService('test-key', 'https://api.example.com/v1');

      expect(await service.checkConnection()).toEqual({ ok: false, message: `Connection Error: ${'x'.repeat(50)}` });
    });
  });
});

describe('toDisplayName', () => {
  it('title-cases hyphenated model ids', () => {
    expect(toDisplayName('llama-3.1-70b-versatile')).toBe('Llama 3.1 70B Versatile');
    expect(toDisplayName('mixtral-8x7b-32768')).toBe('Mixtral 8X7B 32768');
  });
});
