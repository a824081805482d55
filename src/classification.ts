/**
 * Error classification: the chairman sorts the inaccuracies flagged by
 * fact-checkers into a fixed taxonomy. Non-fatal: a failed call yields no
 * classifications.
 */

import type { Anonymizer } from './anonymizer.js';
import { DEFAULT_TIMEOUT_MS, invokeWithDeadline } from './dispatcher.js';
import { buildClassificationPrompt } from './prompts.js';
import { instanceNamer } from './synthesizer.js';
import type { ClassifiedError, FactCheckResult, ModelGateway, ModelResponse } from './types.js';

export const ERROR_TYPES = [
  'Hallucinated Fact',
  'Outdated Information',
  'Numerical/Statistical Error',
  'Misattribution',
  'Overgeneralization',
  'Conflation',
  'Omission of Critical Context',
  'Logical Fallacy',
  'Other',
] as const;

export type ErrorType = (typeof ERROR_TYPES)[number];

const NO_ERRORS = 'NO ERRORS FOUND';
const SECTION = 'ERROR CLASSIFICATIONS:';

function field(block: string, name: string, multiline: boolean): string | undefined {
  const re = multiline
    ? new RegExp(`${name}:\\s*([\\s\\S]+?)(?=\\n(?:MODEL|ERROR_TYPE|CLAIM|EXPLANATION):|$)`, 'i')
    : new RegExp(`${name}:\\s*(.+?)(?:\\n|$)`, 'i');
  const value = re.exec(block)?.[1]?.trim();
  return value || undefined;
}

export function normalizeErrorType(raw: string): ErrorType {
  const wanted = raw.trim().toLowerCase();
  return ERROR_TYPES.find((t) => t.toLowerCase() === wanted) ?? 'Other';
}

/**
 * Parse the "ERROR CLASSIFICATIONS:" section into blocks separated by `---`.
 * Blocks without MODEL or ERROR_TYPE are skipped. The question summary falls
 * back to the question itself, truncated.
 */
export function parseClassification(text: string, question = ''): ClassifiedError[] {
  if (text.includes(NO_ERRORS)) return [];
  const at = text.indexOf(SECTION);
  if (at === -1) return [];

  const summaryMatch = /QUESTION SUMMARY:\s*(.+?)(?:\n|$)/.exec(text);
  const questionSummary = summaryMatch
    ? summaryMatch[1].trim()
    : question.length > 50
      ? `${question.slice(0, 50)}...`
      : question;

  const errors: ClassifiedError[] = [];
  for (const raw of text.slice(at + SECTION.length).split(/\n-{3,}\n?/)) {
    const block = raw.trim();
    if (!block) continue;
    const modelId = field(block, 'MODEL', false);
    const errorType = field(block, 'ERROR_TYPE', false);
    if (!modelId || !errorType) continue;
    errors.push({
      modelId,
      errorType: normalizeErrorType(errorType),
      claim: field(block, 'CLAIM', true) ?? '',
      explanation: field(block, 'EXPLANATION', true) ?? '',
      questionSummary,
    });
  }
  return errors;
}

export interface ErrorSummary {
  totalErrors: number;
  byModel: Record<string, number>;
  byType: Record<string, number>;
  byModelAndType: Record<string, Record<string, number>>;
}

export function summarizeErrors(errors: readonly ClassifiedError[]): ErrorSummary {
  const summary: ErrorSummary = { totalErrors: errors.length, byModel: {}, byType: {}, byModelAndType: {} };
  for (const e of errors) {
    summary.byModel[e.modelId] = (summary.byModel[e.modelId] ?? 0) + 1;
    summary.byType[e.errorType] = (summary.byType[e.errorType] ?? 0) + 1;
    const perModel = (summary.byModelAndType[e.modelId] ??= {});
    perModel[e.errorType] = (perModel[e.errorType] ?? 0) + 1;
  }
  return summary;
}

export interface ClassificationInput {
  question: string;
  stage1: readonly ModelResponse[];
  anonymizer: Anonymizer;
  factChecks: readonly FactCheckResult[];
}

export async function classifyErrors(
  gateway: ModelGateway,
  modelId: string,
  input: ClassificationInput,
  options: { timeoutMs?: number; signal?: AbortSignal } = {},
): Promise<ClassifiedError[]> {
  const name = instanceNamer(input.stage1);
  const labelKey = input.anonymizer.labels().flatMap((label) => {
    const ref = input.anonymizer.resolve(label);
    // Errors are filed against the model, not the instance
    return ref ? [{ label, name: ref.modelId }] : [];
  });
  const prompt = buildClassificationPrompt(
    input.question,
    input.factChecks.map((f) => ({ name: name(f), text: f.rawText })),
    labelKey,
    ERROR_TYPES,
  );
  const reply = await invokeWithDeadline(
    gateway,
    modelId,
    prompt,
    options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    options.signal,
  );
  return parseClassification(reply.content, input.question);
}
