/**
 * Ollama chat transport, used directly or as the fallback for OpenAI.
 */

import axios from 'axios';
import env from '../config/env.js';
import logger from '../config/logger.js';
import type { ChatMessage } from '../types/index.js';

export interface LLMOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Number of retry attempts for transient failures */
  retries?: number;
}

/**
 * The single seam every LLM capability depends on. Tests inject fakes.
 */
export type CompletionFn = (messages: ChatMessage[], options?: LLMOptions) => Promise<string>;

export interface LLMHealthResponse {
  available: boolean;
  model: string;
  error?: string;
}

interface OllamaChatResponse {
  message?: { content?: string };
}

const DEFAULT_RETRIES = 2;
const INITIAL_RETRY_DELAY_MS = 1000;

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export function isRetryableError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) return false;

  if (error.code === 'ECONNRESET' || error.code === 'ETIMEDOUT' || error.code === 'ECONNREFUSED') {
    return true;
  }

  const status = error.response?.status;
  return status === 429 || (status !== undefined && status >= 500 && status < 600);
}

const describeError = (error: unknown): { message: string; status?: number; code?: string } => {
  if (axios.isAxiosError(error)) {
    return { message: error.message, status: error.response?.status, code: error.code };
  }
  return { message: error instanceof Error ? error.message : 'Unknown error' };
};

export async function checkHealth(): Promise<LLMHealthResponse> {
  try {
    await axios.get(`${env.llm.baseURL}/api/tags`, { timeout: 5000 });
    return { available: true, model: env.llm.model };
  } catch (error) {
    const details = describeError(error);
    logger.error('[LLM] Health check failed', details);
    return { available: false, model: env.llm.model, error: details.message };
  }
}

/**
 * Send a chat completion request to Ollama with exponential backoff on transient failures.
 */
export const chatCompletion: CompletionFn = async (messages, options = {}) => {
  const maxRetries = options.retries ?? DEFAULT_RETRIES;

  for (let attempt = 0; ; attempt++) {
    try {
      const response = await axios.post<OllamaChatResponse>(
        `${env.llm.baseURL}/api/chat`,
        {
          model: options.model || env.llm.model,
          messages,
          stream: false,
          options: {
            temperature: options.temperature ?? 0.7,
            num_predict: options.maxTokens ?? 2048,
          },
        },
        { timeout: env.llm.timeout }
      );

      return response.data.message?.content ?? '';
    } catch (error) {
      const details = describeError(error);

      if (attempt < maxRetries && isRetryableError(error)) {
        const delayMs = INITIAL_RETRY_DELAY_MS * Math.pow(2, attempt);
        logger.warn('[LLM] Chat completion failed, retrying', {
          attempt: attempt + 1,
          maxRetries,
          delayMs,
          ...details,
        });
        await sleep(delayMs);
        continue;
      }

      logger.error('[LLM] Chat completion failed', { ...details, attemptsMade: attempt + 1 });
      throw new Error(`Failed to get response from LLM: ${details.message}`, { cause: error });
    }
  }
};

export default {
  checkHealth,
  chatCompletion,
};
