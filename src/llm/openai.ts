import { z } from 'zod';

import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import type { ImageMimeType, LLMClient } from './client.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'gpt-4o-mini';
const COMPLETIONS_URL = 'https://api.openai.com/v1/chat/completions';

// ── Response validation ──────────────────────────────────────

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .nonempty(),
});

type UserContent =
  | string
  | Array<
      | { type: 'text'; text: string }
      | { type: 'image_url'; image_url: { url: string } }
    >;

// ── Rate-limit-aware fetch ───────────────────────────────────

async function fetchWithRetry(
  url: string,
  init: RequestInit,
): Promise<Response> {
  for (let attempt = 1; attempt <= LIMITS.MAX_LLM_RETRIES; attempt++) {
    const response = await fetch(url, init);

    if (response.status === 429) {
      const retryAfter = response.headers.get('retry-after');
      const waitMs = retryAfter
        ? parseFloat(retryAfter) * 1000
        : attempt * TIMEOUTS.LLM_RETRY_WAIT;
      log.warn(`Rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`);
      await new Promise((r) => setTimeout(r, waitMs));
      continue;
    }

    if (!response.ok) {
      const body = await response.text();
      throw new Error(
        `OpenAI API error (${String(response.status)}): ${body}`,
      );
    }

    return response;
  }

  throw new Error('OpenAI API: max retries exceeded due to rate limiting');
}

// ── Provider factory ─────────────────────────────────────────

export function createOpenAIClient(
  apiKey: string,
  model?: string,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;

  async function chat(systemPrompt: string, content: UserContent): Promise<string> {
    const response = await fetchWithRetry(COMPLETIONS_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify({
        model: resolvedModel,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content },
        ],
        temperature: 0,
      }),
    });

    const body: unknown = await response.json();
    return chatResponseSchema.parse(body).choices[0].message.content;
  }

  return {
    generate(systemPrompt: string, userPrompt: string): Promise<string> {
      return chat(systemPrompt, userPrompt);
    },

    generateWithImage(
      systemPrompt: string,
      userPrompt: string,
      imageBase64: string,
      mimeType: ImageMimeType,
    ): Promise<string> {
      return chat(systemPrompt, [
        { type: 'image_url', image_url: { url: `data:${mimeType};base64,${imageBase64}` } },
        { type: 'text', text: userPrompt },
      ]);
    },
  };
}
