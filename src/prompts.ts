/**
 * Prompt builders. Stage 2 and 3 prompts only ever see labels; real model
 * names appear in the chairman and classification prompts alone.
 */

import { FACT_CHECK_MARKER, RANKING_MARKER } from './parser.js';

export interface LabeledResponse {
  label: string;
  content: string;
}

export interface ChairmanSection {
  /** e.g. "openai/gpt-4o" or "openai/gpt-4o (instance 2)" */
  name: string;
  text: string;
}

export interface ChairmanPromptInput {
  question: string;
  responses: ChairmanSection[];
  labelKey: Array<{ label: string; name: string }>;
  /** Absent when fact-checking was skipped */
  factChecks?: { analyses: ChairmanSection[]; summary: string };
  /** Absent when synthesizing straight from supplied answers */
  rankings?: { analyses: ChairmanSection[]; summary: string };
}

function responsesBlock(responses: LabeledResponse[]): string {
  return responses.map((r) => `Response ${r.label}:\n${r.content}`).join('\n\n');
}

export function buildFactCheckPrompt(question: string, responses: LabeledResponse[]): string {
  const first = responses[0]?.label ?? 'A';
  return `You are a fact-checker evaluating different AI responses to the following question:

Question: ${question}

Here are the responses from different models (anonymized):

${responsesBlock(responses)}

Your task is to fact-check each response thoroughly:

1. For EACH response, identify:
   - **Accurate Claims**: specific claims that are factually correct
   - **Inaccurate Claims**: specific claims that are factually incorrect or misleading, and why
   - **Unverifiable Claims**: claims that cannot be easily verified or are speculative
   - **Missing Important Information**: crucial information the response failed to include

2. At the very end of your analysis, provide a summary section.

IMPORTANT: Your summary MUST be formatted EXACTLY as follows:
- Start with the line "${FACT_CHECK_MARKER}:" (all caps, with colon)
- For each response, on a new line write: "Response X: [ACCURATE/MOSTLY ACCURATE/MIXED/MOSTLY INACCURATE/INACCURATE]"
- After rating all responses, add a line: "MOST RELIABLE: Response X" (the single most factually reliable response)
- Do not put blank lines inside the summary

Example of the correct format for your summary:

${FACT_CHECK_MARKER}:
${responses.map((r, i) => `Response ${r.label}: ${['MOSTLY ACCURATE', 'MIXED', 'ACCURATE'][i % 3]}`).join('\n')}
MOST RELIABLE: Response ${first}

Now provide your detailed fact-check analysis:`;
}

export function buildRankingPrompt(
  question: string,
  responses: LabeledResponse[],
  factCheckAnalyses?: string[],
): string {
  const factCheckSection =
    factCheckAnalyses && factCheckAnalyses.length > 0
      ? `\n\n---\n\nHere are the fact-check analyses from peer reviewers:\n\n${factCheckAnalyses
          .map((text, i) => `Fact-checker ${i + 1}:\n${text}`)
          .join('\n\n')}\n\n---`
      : '';
  const criteria = factCheckSection
    ? `1. Consider both the quality of each response AND the fact-check findings.
2. Evaluate each response individually, taking into account:
   - Factual accuracy (as revealed by the fact-checks)
   - Completeness and helpfulness
   - Clarity and reasoning`
    : `1. Evaluate each response individually, taking into account:
   - Factual accuracy
   - Completeness and helpfulness
   - Clarity and reasoning
2. Explain what each response does well and what it does poorly.`;
  const example = [...responses]
    .reverse()
    .map((r, i) => `${i + 1}. Response ${r.label}`)
    .join('\n');

  return `You are evaluating different responses to the following question:

Question: ${question}

Here are the responses from different models (anonymized):

${responsesBlock(responses)}${factCheckSection}

Your task:
${criteria}
3. Then, at the very end of your response, provide a final ranking.

IMPORTANT: Your final ranking MUST be formatted EXACTLY as follows:
- Start with the line "${RANKING_MARKER}:" (all caps, with colon)
- Then list the responses from best to worst as a numbered list
- Each line should be: number, period, space, then ONLY the response label (e.g., "1. Response A")
- Do not add any other text or explanations in the ranking section

Example of the correct format:

${RANKING_MARKER}:
${example}

Now provide your evaluation and ranking:`;
}

function sections(items: ChairmanSection[], heading: string): string {
  return items.map((s) => `${heading}: ${s.name}\n${s.text}`).join('\n\n');
}

export function buildChairmanPrompt(input: ChairmanPromptInput): string {
  const { question, responses, labelKey, factChecks, rankings } = input;
  const key = labelKey.map((k) => `Response ${k.label} = ${k.name}`).join('\n');

  const factCheckBlock = factChecks
    ? `=== STAGE 2 - Fact-Check Analyses ===
${sections(factChecks.analyses, 'Fact-checker')}

Aggregate fact-check ratings:
${factChecks.summary}

`
    : '';

  const rankingBlock = rankings
    ? `=== STAGE 3 - Peer Rankings ===
${sections(rankings.analyses, 'Ranker')}

Aggregate ranking (lower average position is better):
${rankings.summary}

`
    : '';

  const reviewTask = rankings
    ? `2. **FACT-CHECK VALIDATION**: Review the peer rankings as evaluations. Did any ranker reward an inaccurate response or penalize an accurate one?`
    : `2. **FACT-CHECK VALIDATION**: No peer review was run. Note where the responses contradict each other and which side the evidence supports.`;

  const factCheckTask = factChecks
    ? `1. **FACT-CHECK SYNTHESIS**: Analyze all the fact-check reports. Identify:
   - Claims that multiple fact-checkers agreed were ACCURATE
   - Claims that multiple fact-checkers agreed were INACCURATE (these are confirmed errors)
   - Claims where fact-checkers DISAGREED (these need your judgment)
   - Any factual errors that were missed by some fact-checkers

2. **FACT-CHECK VALIDATION**: Review the fact-checkers themselves. Did any fact-checker make errors in their fact-checking? Note any corrections needed.`
    : `1. **FACT-CHECK SYNTHESIS**: No separate fact-check round was run. Check the individual responses yourself and identify which claims are accurate, which are inaccurate, and where the responses disagree.

${reviewTask}`;

  return `You are the Chairman of an LLM Council. Multiple AI models have answered a user's question${factChecks ? ', fact-checked each other\'s answers,' : ''}${rankings ? " and ranked each other's answers" : ''}.

Original Question: ${question}

Response labels used by the reviewers:
${key}

=== STAGE 1 - Individual Responses ===
${sections(responses, 'Model')}

${factCheckBlock}${rankingBlock}---

Your task as Chairman:

${factCheckTask}

3. **FINAL ANSWER**: Synthesize all of this into a single, comprehensive, FACTUALLY ACCURATE answer to the user's question. Your answer should:
   - Incorporate the best insights from all responses
   - EXCLUDE or CORRECT any claims identified as inaccurate
   - Note any areas of genuine uncertainty
   - Be clear about what is well-established fact vs. opinion or speculation

Structure your response as follows:

## Fact-Check Synthesis
[What was confirmed accurate, what was confirmed inaccurate, and any disagreements]

## Fact-Checker Validation
[Corrections to the reviewers, or confirmation that their analyses were sound]

## Final Council Answer
[Your comprehensive, fact-checked answer to the user's question]

Now provide your Chairman synthesis:`;
}

export function buildTitlePrompt(question: string): string {
  return `Generate a very short title (3-5 words maximum) that summarizes the following question.
The title should be concise and descriptive. Do not use quotes or punctuation in the title.

Question: ${question}

Title:`;
}

export function buildClassificationPrompt(
  question: string,
  analyses: ChairmanSection[],
  labelKey: Array<{ label: string; name: string }>,
  errorTypes: readonly string[],
): string {
  return `You are classifying factual errors found during a fact-checking process.

The original question was about: ${question}

Here are the fact-check analyses from multiple reviewers:

${sections(analyses, 'Fact-checker')}

---

The anonymous response labels map to these models:
${labelKey.map((k) => `Response ${k.label} = ${k.name}`).join('\n')}

---

Your task:
1. Review all the fact-check analyses above
2. Identify ALL claims that were flagged as INACCURATE by fact-checkers
3. For EACH inaccurate claim, classify it into ONE of these error types:

${errorTypes.map((t) => `- ${t}`).join('\n')}

FORMATTING REQUIREMENTS:
- Summarize the question context in 10 words or fewer
- Keep each claim and explanation to 1-2 sentences

If NO inaccuracies were found, respond with:
NO ERRORS FOUND

Otherwise, format your response EXACTLY as follows:

QUESTION SUMMARY: [10-word-or-fewer summary of the question]

ERROR CLASSIFICATIONS:
---
MODEL: [full model identifier, e.g., openai/gpt-4o]
ERROR_TYPE: [one of the error types listed above]
CLAIM: [the inaccurate claim]
EXPLANATION: [why it is wrong]
---

Include one block for EACH inaccurate claim. Multiple errors from the same model each get their own block.

Now classify the errors:`;
}
