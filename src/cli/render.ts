import chalk from 'chalk';
import { ratingLabel } from '../aggregator.js';
import type { ErrorSummary } from '../classification.js';
import type { DeliberationEvent } from '../events.js';
import type { AggregateFactCheck, AggregateRanking, Diagnostic } from '../types.js';

const STAGE_TITLES = {
  stage1_start: 'Stage 1 · Answers',
  fact_check_start: 'Stage 2 · Fact-check',
  stage3_start: 'Stage 3 · Ranking',
  stage4_start: 'Stage 4 · Synthesis',
} as const;

function who(entry: { modelId: string; instanceIndex: number }): string {
  return entry.instanceIndex > 0 ? `${entry.modelId} #${entry.instanceIndex + 1}` : entry.modelId;
}

export function formatFactCheckTable(aggregates: readonly AggregateFactCheck[]): string[] {
  return aggregates.map((a) => {
    const score = a.averageScore === null ? '  -  ' : a.averageScore.toFixed(2);
    const votes = a.mostReliableVotes > 0 ? chalk.yellow(` ★${a.mostReliableVotes}`) : '';
    return `     ${a.label.padEnd(3)}${who(a).padEnd(32)}${ratingLabel(a.consensusRating).padEnd(18)}${score}${votes}`;
  });
}

export function formatRankingTable(aggregates: readonly AggregateRanking[]): string[] {
  return aggregates.map((a, i) => {
    const position = a.averagePosition === null ? '  -  ' : a.averagePosition.toFixed(2);
    const crown = i === 0 && a.averagePosition !== null ? ' 👑' : '';
    return `     ${a.label.padEnd(3)}${who(a).padEnd(32)}${position}${crown}`;
  });
}

export function formatDiagnostic(d: Diagnostic): string {
  const text = `  [${d.stage}] ${d.message}`;
  return d.level === 'warn' ? chalk.yellow(text) : chalk.dim(text);
}

export function formatErrorSummary(summary: ErrorSummary): string[] {
  if (summary.totalErrors === 0) return [chalk.green('  No factual errors classified')];
  const lines = [chalk.bold(`  ${summary.totalErrors} classified error(s)`)];
  for (const [model, types] of Object.entries(summary.byModelAndType)) {
    const parts = Object.entries(types).map(([type, n]) => `${type} ×${n}`);
    lines.push(`     ${model.padEnd(32)}${parts.join(', ')}`);
  }
  return lines;
}

/**
 * Terminal progress for one run. With `live` set, streamed chunks are echoed
 * and a header is printed whenever the speaking entry changes.
 */
export class ProgressRenderer {
  private lastSpeaker: string | null = null;
  private startedAt = Date.now();

  constructor(
    private readonly live: boolean,
    private readonly write: (text: string) => void = (text) => process.stdout.write(text),
  ) {}

  handle(event: DeliberationEvent): void {
    switch (event.type) {
      case 'stage1_start':
      case 'fact_check_start':
      case 'stage3_start':
      case 'stage4_start':
        this.startedAt = Date.now();
        this.lastSpeaker = null;
        this.line('');
        this.line(chalk.bold(`  ▸ ${STAGE_TITLES[event.type]}`) + chalk.dim(` (${event.models.length} call(s))`));
        break;
      case 'stage1_chunk':
      case 'fact_check_chunk':
      case 'stage3_chunk':
      case 'stage4_chunk': {
        if (!this.live) break;
        const speaker = `${event.slot}`;
        if (speaker !== this.lastSpeaker) {
          this.write(`\n${chalk.dim(`    ┌ ${who(event)}`)}\n    `);
          this.lastSpeaker = speaker;
        }
        this.write(event.text.replace(/\n/g, '\n    '));
        break;
      }
      case 'stage1_complete':
        this.done(event.data.map((r) => who(r)));
        break;
      case 'fact_check_complete':
        this.done(event.data.map((r) => who(r)));
        for (const line of formatFactCheckTable(event.metadata.aggregateFactChecks)) this.line(line);
        break;
      case 'stage3_complete':
        this.done(event.data.map((r) => who(r)));
        for (const line of formatRankingTable(event.metadata.aggregateRankings)) this.line(line);
        break;
      case 'stage4_complete':
        this.done([event.data.modelId]);
        break;
      case 'title_complete':
        this.line(chalk.dim(`  Title: ${event.data.title}`));
        break;
      case 'classification_complete':
        this.line(chalk.dim(`  Classified ${event.data.length} error(s)`));
        break;
      case 'error':
        this.line(chalk.red(`  ✗ ${event.stage}: ${event.reason}`));
        break;
    }
  }

  private done(speakers: string[]): void {
    const secs = ((Date.now() - this.startedAt) / 1000).toFixed(1);
    if (this.live && this.lastSpeaker !== null) this.line('');
    this.line(`    ${speakers.map((s) => `${chalk.green('✓')}${chalk.dim(s)}`).join(' ')} ${chalk.dim(`(${secs}s)`)}`);
  }

  private line(text: string): void {
    this.write(`${text}\n`);
  }
}
