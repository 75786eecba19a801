import { z } from 'zod';

// ── LLMClient interface ──────────────────────────────────────

export type ImageMimeType = 'image/png' | 'image/jpeg' | 'image/gif' | 'image/webp';

export interface LLMClient {
  generate(systemPrompt: string, userPrompt: string): Promise<string>;
  generateWithImage(
    systemPrompt: string,
    userPrompt: string,
    imageBase64: string,
    mimeType: ImageMimeType,
  ): Promise<string>;
}

// ── Config schema ────────────────────────────────────────────

export const llmProviderSchema = z.enum(['anthropic', 'openai', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

// ── Env loader ───────────────────────────────────────────────

export interface LLMConfigOverrides {
  provider?: LLMProvider | undefined;
  model?: string | undefined;
}

/** Env first; a provider or model named in the config file wins over it. */
export function loadLLMConfig(
  overrides: LLMConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): LLMConfig {
  const provider = overrides.provider ?? env['LLM_PROVIDER'] ?? 'anthropic';

  const apiKey = provider === 'anthropic'
    ? env['ANTHROPIC_API_KEY']
    : env['OPENAI_API_KEY'];

  const model = overrides.model ?? env['FLOWHEAL_MODEL'] ?? env['LLM_MODEL'];

  return llmConfigSchema.parse({
    provider,
    apiKey: apiKey === '' ? undefined : apiKey,
    model: model === '' ? undefined : model,
  });
}
