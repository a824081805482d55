import { invokeWithDeadline } from './dispatcher.js';
import { buildTitlePrompt } from './prompts.js';
import type { ModelGateway } from './types.js';

export const DEFAULT_TITLE = 'New Conversation';
export const TITLE_TIMEOUT_MS = 30_000;

export function cleanTitle(raw: string): string {
  const title = raw.trim().replace(/^["']+|["']+$/g, '').trim();
  if (!title) return DEFAULT_TITLE;
  return title.length > 50 ? `${title.slice(0, 47)}...` : title;
}

/** Short conversation title from a fast model. Never throws. */
export async function generateTitle(
  gateway: ModelGateway,
  modelId: string,
  question: string,
  options: { timeoutMs?: number; signal?: AbortSignal } = {},
): Promise<string> {
  try {
    const reply = await invokeWithDeadline(
      gateway,
      modelId,
      buildTitlePrompt(question),
      options.timeoutMs ?? TITLE_TIMEOUT_MS,
      options.signal,
    );
    return cleanTitle(reply.content);
  } catch {
    return DEFAULT_TITLE;
  }
}
