import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { cleanCodeResponse } from '../src/ai/clean';
import { OllamaProvider } from '../src/ai/providers/ollama';
import type { GenerationConfig } from '../src/ai/types';
import { GenerationError } from '../src/remediation/errors';

const config: GenerationConfig = {
  baseUrl: 'http://ollama.test:11434/',
  model: 'llama3.2',
  temperature: 0.1,
  timeoutMs: 1000,
  maxTokens: 1000,
};

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('Ollama Provider', () => {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse({ response: '' }));

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('generate', () => {
    it('should post the prompt to /api/generate and return the code', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ response: 'cursor.execute(query, (user_id,))' }));
      const provider = new OllamaProvider(config);

      const code = await provider.generate('fix this', { temperature: 0.1 });

      expect(code).toBe('cursor.execute(query, (user_id,))');
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('http://ollama.test:11434/api/generate');
      expect(init?.method).toBe('POST');
      expect(JSON.parse(String(init?.body))).toEqual({
        model: 'llama3.2',
        prompt: 'fix this',
        stream: false,
        options: { temperature: 0.1, top_p: 0.9, top_k: 40, num_predict: 1000 },
      });
    });

    it('should strip markdown fences and lead-in prose', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ response: "Here is the secure version:\n```python\nprint('safe')\n```" })
      );
      const provider = new OllamaProvider(config);

      await expect(provider.generate('fix this', { temperature: 0.1 })).resolves.toBe("print('safe')");
    });

    it('should report a non-2xx status as unavailable', async () => {
      fetchMock.mockResolvedValueOnce(new Response('model not found', { status: 404 }));
      const provider = new OllamaProvider(config);

      const promise = provider.generate('fix this', { temperature: 0.1 });

      await expect(promise).rejects.toBeInstanceOf(GenerationError);
      await expect(promise).rejects.toMatchObject({
        kind: 'unavailable',
        message: 'Ollama request failed with status 404: model not found',
      });
    });

    it('should report a malformed reply as unavailable', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ message: { role: 'assistant' } }));
      const provider = new OllamaProvider(config);

      await expect(provider.generate('fix this', { temperature: 0.1 })).rejects.toMatchObject({
        kind: 'unavailable',
        message: 'Invalid response format from Ollama',
      });
    });

    it('should report a refused connection as unavailable', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
      const provider = new OllamaProvider(config);

      await expect(provider.generate('fix this', { temperature: 0.1 })).rejects.toMatchObject({
        kind: 'unavailable',
        message: 'Network error while communicating with Ollama: fetch failed',
      });
    });

    it('should report a slow backend as a timeout', async () => {
      fetchMock.mockImplementationOnce(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
          })
      );
      const provider = new OllamaProvider({ ...config, timeoutMs: 10 });

      await expect(provider.generate('fix this', { temperature: 0.1 })).rejects.toMatchObject({
        kind: 'timeout',
        message: 'Timeout after 10ms while communicating with Ollama service',
      });
    });

    it('should pass caller cancellation through untouched', async () => {
      const controller = new AbortController();
      fetchMock.mockImplementationOnce(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('request aborted')));
          })
      );
      const provider = new OllamaProvider(config);

      const promise = provider.generate('fix this', { temperature: 0.1, signal: controller.signal });
      controller.abort();

      await expect(promise).rejects.toThrow('request aborted');
      await expect(promise).rejects.not.toBeInstanceOf(GenerationError);
    });
  });

  describe('isAvailable', () => {
    it('should probe the tags endpoint', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ models: [] }));
      const provider = new OllamaProvider(config);

      await expect(provider.isAvailable()).resolves.toBe(true);
      expect(fetchMock.mock.calls[0][0]).toBe('http://ollama.test:11434/api/tags');
    });

    it('should return false when the service is down', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
      const provider = new OllamaProvider(config);

      await expect(provider.isAvailable()).resolves.toBe(false);
    });
  });
});

describe('cleanCodeResponse', () => {
  it('should unwrap a fenced block', () => {
    expect(cleanCodeResponse('```js\nconst id = Number(req.params.id);\n```')).toBe('const id = Number(req.params.id);');
  });

  it('should drop lead-in and trailing notes outside fences', () => {
    expect(cleanCodeResponse('Here is the fix:\nconst a = escape(b);\nNote: escape is imported')).toBe(
      'const a = escape(b);'
    );
  });

  it('should keep prose-looking lines inside fences', () => {
    expect(cleanCodeResponse('```python\nThis = 1\n```')).toBe('This = 1');
  });

  it('should fall back to the trimmed reply when nothing survives', () => {
    expect(cleanCodeResponse('  Here is nothing useful  ')).toBe('Here is nothing useful');
  });
});
