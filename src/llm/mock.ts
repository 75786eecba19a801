import type { ImageMimeType, LLMClient } from './client.js';

const DEFAULT_RESPONSE = '{"done":true,"reason":"mock"}';

export interface MockCall {
  systemPrompt: string;
  userPrompt: string;
  image: { base64: string; mimeType: ImageMimeType } | null;
}

export interface MockLLMClient extends LLMClient {
  readonly calls: readonly MockCall[];
}

/**
 * Mock LLM provider for testing.
 * Cycles through provided canned responses, falling back to a default.
 * Text and image calls share one response queue.
 */
export function createMockClient(
  responses?: readonly string[],
): MockLLMClient {
  const calls: MockCall[] = [];

  const next = (call: MockCall): string => {
    const response = responses?.[calls.length] ?? DEFAULT_RESPONSE;
    calls.push(call);
    return response;
  };

  return {
    calls,

    async generate(systemPrompt: string, userPrompt: string): Promise<string> {
      return next({ systemPrompt, userPrompt, image: null });
    },

    async generateWithImage(
      systemPrompt: string,
      userPrompt: string,
      imageBase64: string,
      mimeType: ImageMimeType,
    ): Promise<string> {
      return next({ systemPrompt, userPrompt, image: { base64: imageBase64, mimeType } });
    },
  };
}
