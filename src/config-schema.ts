import { z } from 'zod';

export const DEFAULT_COUNCIL_MODELS = [
  'openai/gpt-5.1',
  'google/gemini-3-pro-preview',
  'anthropic/claude-sonnet-4.5',
  'x-ai/grok-4.1-fast',
];

export const DEFAULT_CHAIRMAN_MODEL = 'x-ai/grok-4.1-fast';

const ProviderSchema = z
  .object({
    /** pi-ai provider id */
    name: z.string().min(1).default('openrouter'),
    apiKey: z.string().optional(),
    baseUrl: z.string().url().optional(),
  })
  .strict();

export const CouncilConfigSchema = z
  .object({
    provider: ProviderSchema.default({}),
    councilModels: z
      .array(z.string().min(1))
      .min(1, 'councilModels needs at least one model')
      .default(() => [...DEFAULT_COUNCIL_MODELS]),
    chairmanModel: z.string().min(1).default(DEFAULT_CHAIRMAN_MODEL),
    factCheck: z.boolean().default(true),
    streaming: z.boolean().default(false),
    timeoutSeconds: z.number().positive().default(120),
    titleModel: z.string().min(1).optional(),
    classifyErrors: z.boolean().default(false),
  })
  .strict();

export type CouncilConfig = z.infer<typeof CouncilConfigSchema>;
export type CouncilConfigInput = z.input<typeof CouncilConfigSchema>;
