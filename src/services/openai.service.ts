/**
 * OpenAI completions with automatic fallback to the Ollama transport.
 *
 * When no API key is configured every request goes straight to Ollama.
 */

import OpenAI from 'openai';
import env from '../config/env.js';
import logger from '../config/logger.js';
import type { ChatMessage } from '../types/index.js';
import { chatCompletion as ollamaChatCompletion, type CompletionFn, type LLMOptions } from './llm.service.js';

let openaiClient: OpenAI | null = null;

const MAX_RETRIES = 3;
const INITIAL_RETRY_DELAY_MS = 1000;

export interface CompletionResult {
  content: string;
  model: string;
  fallbackUsed: boolean;
}

function getOpenAIClient(): OpenAI | null {
  if (!env.openai.apiKey) {
    return null;
  }

  if (!openaiClient) {
    openaiClient = new OpenAI({ apiKey: env.openai.apiKey });
    logger.info('[OpenAI] Client initialized', { model: env.openai.model });
  }

  return openaiClient;
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Keeps the system prompt and the most recent `limit` other messages.
 */
export function truncateMessages(messages: ChatMessage[], limit: number): ChatMessage[] {
  const system = messages.filter((m) => m.role === 'system');
  const others = messages.filter((m) => m.role !== 'system');
  if (others.length <= limit) return [...system, ...others];

  logger.info('[OpenAI] Truncating conversation', {
    originalCount: messages.length,
    keptCount: system.length + limit,
  });
  return [...system, ...others.slice(others.length - limit)];
}

export async function generateCompletion(
  messages: ChatMessage[],
  options: LLMOptions = {}
): Promise<CompletionResult> {
  const { temperature = 0.7, maxTokens = 1500 } = options;
  const client = getOpenAIClient();

  if (client) {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
      try {
        const response = await client.chat.completions.create({
          model: options.model || env.openai.model,
          messages,
          temperature,
          max_tokens: maxTokens,
        });

        const content = response.choices[0]?.message?.content ?? '';
        logger.info('[OpenAI] Request successful', {
          model: response.model,
          totalTokens: response.usage?.total_tokens ?? 0,
          contentLength: content.length,
        });

        return { content, model: response.model, fallbackUsed: false };
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        const status = error instanceof OpenAI.APIError ? error.status : undefined;

        logger.warn('[OpenAI] Request failed', {
          attempt: attempt + 1,
          maxRetries: MAX_RETRIES,
          status,
          message: lastError.message,
        });

        // 4xx other than rate limiting will not succeed on retry
        if (status !== undefined && status >= 400 && status < 500 && status !== 429) {
          break;
        }

        if (attempt < MAX_RETRIES - 1) {
          await sleep(INITIAL_RETRY_DELAY_MS * Math.pow(2, attempt));
        }
      }
    }

    logger.error('[OpenAI] All retries failed, falling back to Ollama', {
      error: lastError?.message,
    });
  }

  const content = await ollamaChatCompletion(messages, { ...options, temperature, maxTokens });
  return { content, model: env.llm.model, fallbackUsed: true };
}

/**
 * Default transport handed to the negotiation capabilities.
 */
export const complete: CompletionFn = async (messages, options) => {
  const result = await generateCompletion(messages, options);
  return result.content;
};

export function getConfig(): { model: string; fallbackModel: string; apiKeyConfigured: boolean } {
  return {
    model: env.openai.model,
    fallbackModel: env.llm.model,
    apiKeyConfigured: Boolean(env.openai.apiKey),
  };
}

export default {
  generateCompletion,
  complete,
  truncateMessages,
  getConfig,
};
