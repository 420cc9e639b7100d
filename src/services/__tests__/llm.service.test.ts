import { describe, it, expect, vi, afterEach } from 'vitest';
import axios, { AxiosError, AxiosHeaders, type AxiosResponse } from 'axios';
import { chatCompletion, isRetryableError } from '../llm.service.js';
import { generateCompletion, truncateMessages } from '../openai.service.js';
import type { ChatMessage } from '../../types/index.js';

const response = <T>(data: T, status = 200): AxiosResponse<T> => ({
  data,
  status,
  statusText: status === 200 ? 'OK' : 'Error',
  headers: {},
  config: { headers: new AxiosHeaders() },
});

const messages: ChatMessage[] = [
  { role: 'system', content: 'Be brief' },
  { role: 'user', content: 'Price?' },
];

describe('LLM transport', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('isRetryableError', () => {
    it('should retry connection failures, rate limits and server errors only', () => {
      expect(isRetryableError(new AxiosError('reset', 'ECONNRESET'))).toBe(true);
      expect(
        isRetryableError(new AxiosError('busy', 'ERR_BAD_RESPONSE', undefined, undefined, response({}, 503)))
      ).toBe(true);
      expect(
        isRetryableError(new AxiosError('slow down', 'ERR_BAD_REQUEST', undefined, undefined, response({}, 429)))
      ).toBe(true);
      expect(
        isRetryableError(new AxiosError('bad', 'ERR_BAD_REQUEST', undefined, undefined, response({}, 400)))
      ).toBe(false);
      expect(isRetryableError(new Error('plain'))).toBe(false);
    });
  });

  describe('chatCompletion', () => {
    it('should return the message content', async () => {
      const post = vi.spyOn(axios, 'post').mockResolvedValueOnce(response({ message: { content: 'About 30000' } }));

      await expect(chatCompletion(messages, { temperature: 0.2, maxTokens: 100 })).resolves.toBe('About 30000');
      expect(post).toHaveBeenCalledWith(
        expect.stringMatching(/\/api\/chat$/),
        expect.objectContaining({ messages, stream: false, options: { temperature: 0.2, num_predict: 100 } }),
        expect.objectContaining({ timeout: expect.any(Number) })
      );
    });

    it('should wrap the failure once retries are used up', async () => {
      vi.spyOn(axios, 'post').mockRejectedValueOnce(new AxiosError('socket hang up', 'ECONNRESET'));

      await expect(chatCompletion(messages, { retries: 0 })).rejects.toThrow(
        'Failed to get response from LLM: socket hang up'
      );
    });
  });

  describe('generateCompletion', () => {
    it('should use the Ollama transport when no API key is configured', async () => {
      vi.spyOn(axios, 'post').mockResolvedValueOnce(response({ message: { content: '{"ok": true}' } }));

      const result = await generateCompletion(messages);

      expect(result.content).toBe('{"ok": true}');
      expect(result.fallbackUsed).toBe(true);
    });
  });

  describe('truncateMessages', () => {
    it('should keep system prompts and the latest messages', () => {
      const history: ChatMessage[] = [
        { role: 'system', content: 'rules' },
        { role: 'user', content: 'one' },
        { role: 'assistant', content: 'two' },
        { role: 'user', content: 'three' },
      ];

      expect(truncateMessages(history, 2).map((m) => m.content)).toEqual(['rules', 'two', 'three']);
      expect(truncateMessages(history, 5)).toHaveLength(4);
    });
  });
});
