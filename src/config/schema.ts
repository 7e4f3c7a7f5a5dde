import { z } from 'zod';

// Provider types
export const llmProviders = [
  'openai',
  'anthropic',
  'google',
  'ollama',
  'openai-compatible'
] as const;
export type LLMProvider = (typeof llmProviders)[number];

export const embeddingProviders = [
  'openai',
  'google',
  'cohere',
  'mistral',
  'ollama',
  'openai-compatible'
] as const;
export type EmbeddingProvider = (typeof embeddingProviders)[number];

const DEFAULT_BATCH_SIZE = 8;

/**
 * Shared provider checks: cloud providers need an apiKey and take no baseUrl,
 * openai-compatible needs a baseUrl, only openai-compatible takes a providerName.
 */
function refineProvider(
  data: { provider: string; apiKey?: string; baseUrl?: string; providerName?: string },
  ctx: z.RefinementCtx,
  cloudProviders: readonly string[]
): void {
  if (cloudProviders.includes(data.provider)) {
    if (!data.apiKey)
      ctx.addIssue({
        code: 'custom',
        path: ['apiKey'],
        message: `apiKey required for provider '${data.provider}'`
      });
    if (data.baseUrl)
      ctx.addIssue({
        code: 'custom',
        path: ['baseUrl'],
        message: `baseUrl not allowed for provider '${data.provider}'`
      });
  }
  if (data.provider === 'openai-compatible' && !data.baseUrl) {
    ctx.addIssue({
      code: 'custom',
      path: ['baseUrl'],
      message: "baseUrl required for provider 'openai-compatible'"
    });
  }
  if (data.provider !== 'openai-compatible' && data.providerName) {
    ctx.addIssue({
      code: 'custom',
      path: ['providerName'],
      message: "providerName only allowed for provider 'openai-compatible'"
    });
  }
}

export const llmConfigSchema = z
  .object({
    provider: z.enum(llmProviders),
    providerName: z.string().min(1).optional(),
    model: z.string().min(1),
    apiKey: z.string().optional(),
    baseUrl: z.string().url().optional(),
    temperature: z.number().min(0).max(2).optional(),
    maxTokens: z.number().int().positive().optional(),
    /** Retries per structured-output strategy before falling back to the next one */
    maxRetries: z.number().int().min(0).optional(),
    /** Provider-specific options (e.g., reasoningEffort), sent under the provider's key */
    options: z.record(z.string(), z.json()).optional()
  })
  .superRefine((data, ctx) => refineProvider(data, ctx, ['openai', 'anthropic', 'google']));
export type LLMConfig = z.infer<typeof llmConfigSchema>;

export const embeddingConfigSchema = z
  .object({
    provider: z.enum(embeddingProviders),
    providerName: z.string().min(1).optional(),
    model: z.string().min(1),
    dimensions: z.number().int().positive(),
    apiKey: z.string().optional(),
    baseUrl: z.string().url().optional()
  })
  .superRefine((data, ctx) =>
    refineProvider(data, ctx, ['openai', 'google', 'cohere', 'mistral'])
  );
export type EmbeddingConfig = z.infer<typeof embeddingConfigSchema>;

// Config schema
export const configSchema = z
  .object({
    $schema: z.string().optional(),

    llm: llmConfigSchema.optional(),
    embedding: embeddingConfigSchema.optional(),

    engine: z
      .object({
        /** Abort a task run on the first failed chunk instead of recording null */
        strictMode: z.boolean().optional(),
        /** Chunks sent to the backend concurrently */
        batchSize: z.number().int().positive().optional()
      })
      .optional(),

    pipeline: z
      .object({
        inPlace: z.boolean().optional(),
        verbose: z.boolean().optional(),
        validateChain: z.boolean().optional()
      })
      .optional()
  })
  .transform((data) => {
    const engine = {
      strictMode: data.engine?.strictMode ?? false,
      batchSize: data.engine?.batchSize ?? DEFAULT_BATCH_SIZE
    };

    const pipeline = {
      inPlace: data.pipeline?.inPlace ?? false,
      verbose: data.pipeline?.verbose ?? false,
      validateChain: data.pipeline?.validateChain ?? true
    };

    return { ...data, engine, pipeline };
  });

export type ConfigInput = z.input<typeof configSchema>;
export type Config = z.infer<typeof configSchema>;
export type EngineSettings = Config['engine'];
export type PipelineSettings = Config['pipeline'];
