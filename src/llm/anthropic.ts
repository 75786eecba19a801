import Anthropic from '@anthropic-ai/sdk';

import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import type { ImageMimeType, LLMClient } from './client.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';
const MAX_TOKENS = 2048;

type UserContent = Anthropic.MessageParam['content'];

// ── Rate-limit-aware wrapper ────────────────────────────────

function isRateLimitError(err: unknown): boolean {
  if (err instanceof Anthropic.RateLimitError) return true;
  return err instanceof Error && err.message.includes('429');
}

async function withRetry<T>(fn: () => Promise<T>): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isRateLimitError(err) || attempt >= LIMITS.MAX_LLM_RETRIES) throw err;

      const waitMs = attempt * TIMEOUTS.LLM_RETRY_WAIT;
      log.warn(`Rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`);
      await new Promise((r) => setTimeout(r, waitMs));
    }
  }
}

// ── Provider factory ─────────────────────────────────────────

export function createAnthropicClient(
  apiKey: string,
  model?: string,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;
  const client = new Anthropic({ apiKey });

  async function complete(systemPrompt: string, content: UserContent): Promise<string> {
    const response = await withRetry(() =>
      client.messages.create({
        model: resolvedModel,
        max_tokens: MAX_TOKENS,
        system: systemPrompt,
        messages: [{ role: 'user', content }],
        temperature: 0,
      }),
    );

    const text = response.content.find((block) => block.type === 'text');
    if (!text || text.type !== 'text') {
      throw new Error('Anthropic API returned no text content');
    }
    return text.text;
  }

  return {
    generate(systemPrompt: string, userPrompt: string): Promise<string> {
      return complete(systemPrompt, userPrompt);
    },

    generateWithImage(
      systemPrompt: string,
      userPrompt: string,
      imageBase64: string,
      mimeType: ImageMimeType,
    ): Promise<string> {
      return complete(systemPrompt, [
        {
          type: 'image',
          source: { type: 'base64', media_type: mimeType, data: imageBase64 },
        },
        { type: 'text', text: userPrompt },
      ]);
    },
  };
}
