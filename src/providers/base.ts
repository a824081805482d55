import { completeSimple, streamSimple, getModels, getProviders } from '@mariozechner/pi-ai';
import type {
  Api,
  AssistantMessage,
  Context,
  KnownProvider,
  Model,
  SimpleStreamOptions,
} from '@mariozechner/pi-ai';
import { ConfigError, GatewayError, errorMessage } from '../errors.js';
import type { GatewayReply, InvokeRequest, ModelGateway } from '../types.js';

export interface GatewayConfig {
  /** pi-ai provider key, e.g. openrouter, openai, anthropic */
  provider: string;
  apiKey?: string;
  baseUrl?: string;
  maxTokens?: number;
}

// ============================================================================
// Pi-ai model resolution
// ============================================================================

export function findProvider(name: string): KnownProvider | undefined {
  return getProviders().find((p) => p === name);
}

export function isRegisteredModel(provider: KnownProvider, modelId: string): boolean {
  const models: Model<Api>[] = getModels(provider);
  return models.some((m) => m.id === modelId);
}

/**
 * Map a model id to a pi-ai Model descriptor.
 * Registered ids are used as-is. Unknown ids borrow the api/baseUrl of the
 * provider's first registered model, which is how OpenRouter-style catalogs
 * that change faster than the registry stay reachable.
 */
export function resolveModel(provider: KnownProvider, modelId: string, baseUrl?: string): Model<Api> {
  const models: Model<Api>[] = getModels(provider);
  const registered = models.find((m) => m.id === modelId);
  const ref = registered ?? models[0];
  if (!ref) {
    throw new GatewayError(`Provider ${provider} has no registered models`, modelId, 'transport');
  }
  return {
    ...ref,
    id: modelId,
    name: registered ? ref.name : modelId,
    baseUrl: baseUrl || ref.baseUrl,
  };
}

/**
 * Explicit config → <PROVIDER>_API_KEY env var.
 * Returns undefined so pi-ai can apply its own env lookup.
 */
export function resolveApiKey(config: GatewayConfig): string | undefined {
  if (config.apiKey) return config.apiKey;
  const envKey = process.env[`${config.provider.toUpperCase().replace(/-/g, '_')}_API_KEY`];
  return envKey || undefined;
}

function extractReply(modelId: string, message: AssistantMessage, elapsedMs: number): GatewayReply {
  if (message.stopReason === 'aborted') {
    throw new GatewayError(`${modelId}: request aborted`, modelId, 'aborted');
  }
  if (message.stopReason === 'error') {
    throw new GatewayError(
      `${modelId}: ${(message.errorMessage ?? 'unknown error').slice(0, 200)}`,
      modelId,
      'http',
    );
  }

  const text: string[] = [];
  const thinking: string[] = [];
  for (const block of message.content) {
    if (block.type === 'text') text.push(block.text);
    else if (block.type === 'thinking') thinking.push(block.thinking);
  }

  const content = text.join('');
  if (!content.trim()) {
    throw new GatewayError(`${modelId} returned empty content`, modelId, 'empty');
  }
  return {
    content,
    elapsedMs,
    ...(thinking.length > 0 ? { reasoningTrace: thinking.join('\n') } : {}),
  };
}

// ============================================================================
// Gateway creation, all through pi-ai
// ============================================================================

/**
 * Create a gateway for one provider. Model ids are resolved per call, so a single
 * gateway serves the whole council and the chairman.
 */
export function createGateway(config: GatewayConfig): ModelGateway {
  const provider = findProvider(config.provider);
  if (!provider) {
    throw new ConfigError(`Unknown provider "${config.provider}"`, [
      `known providers: ${getProviders().join(', ')}`,
    ]);
  }
  const apiKey = resolveApiKey(config);

  const buildContext = (prompt: string): Context => ({
    messages: [
      {
        role: 'user',
        content: [{ type: 'text', text: prompt }],
        timestamp: Date.now(),
      },
    ],
  });

  return {
    name: config.provider,
    async invoke({ modelId, prompt, signal, onDelta }: InvokeRequest): Promise<GatewayReply> {
      const model = resolveModel(provider, modelId, config.baseUrl);
      const opts: SimpleStreamOptions = {
        apiKey,
        maxTokens: config.maxTokens ?? 4096,
        signal,
      };
      const start = Date.now();

      let message: AssistantMessage;
      try {
        if (onDelta) {
          const stream = streamSimple(model, buildContext(prompt), opts);
          for await (const event of stream) {
            if (event.type === 'text_delta') onDelta(event.delta);
          }
          message = await stream.result();
        } else {
          message = await completeSimple(model, buildContext(prompt), opts);
        }
      } catch (err) {
        throw new GatewayError(
          `${modelId}: ${errorMessage(err)}`,
          modelId,
          signal?.aborted ? 'aborted' : 'transport',
        );
      }

      return extractReply(modelId, message, Date.now() - start);
    },
  };
}
