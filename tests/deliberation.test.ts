import { describe, it, expect } from 'vitest';
import { Deliberation, streamDeliberation, type DeliberationConfig } from '../src/council.js';
import { ConfigError, DeliberationError } from '../src/errors.js';
import type { DeliberationEvent } from '../src/events.js';
import type { Diagnostic } from '../src/types.js';
import { FakeGateway, delay, hang, type PromptKind, type Responder } from './fakes.js';

const RANK_AB = 'A is thorough.\n\nFINAL RANKING:\n1. Response A\n2. Response B';

/** Answers arrive in council order so labels are predictable. */
function scripted(overrides: Partial<Record<PromptKind, Responder>> = {}): Responder {
  return async (modelId, kind, request) => {
    const override = overrides[kind];
    if (override) return override(modelId, kind, request);
    switch (kind) {
      case 'answer':
        await delay(modelId === 'm1' ? 1 : 15);
        return `${modelId} says Paris`;
      case 'factCheck':
        return 'FACT CHECK SUMMARY:\nResponse A: ACCURATE\nResponse B: MIXED\nMOST RELIABLE: Response A';
      case 'rank':
        return RANK_AB;
      case 'chairman':
        return '## Final Council Answer\nParis is the capital of France.';
      case 'title':
        return '"Capital of France"';
      case 'classify':
        return 'NO ERRORS FOUND';
    }
  };
}

function config(overrides: Partial<DeliberationConfig> = {}): DeliberationConfig {
  return { councilModels: ['m1', 'm2'], chairmanModel: 'chair', factCheck: false, ...overrides };
}

function recorder() {
  const events: DeliberationEvent[] = [];
  return { events, onEvent: (e: DeliberationEvent) => events.push(e), types: () => events.map((e) => e.type) };
}

async function failure(run: Promise<unknown>): Promise<DeliberationError> {
  const err = await run.then(
    () => undefined,
    (e: unknown) => e,
  );
  if (!(err instanceof DeliberationError)) throw new Error(`expected DeliberationError, got ${String(err)}`);
  return err;
}

describe('Deliberation', () => {
  it('runs stages 1, 3 and 4 in order when fact-checking is off', async () => {
    const gateway = new FakeGateway(scripted());
    const { events, onEvent, types } = recorder();
    const states: string[] = [];
    const result = await new Deliberation(gateway, config(), {
      onEvent,
      onTransition: (t) => states.push(t.to),
    }).run('What is the capital of France?');

    expect(types()).toEqual([
      'stage1_start',
      'stage1_complete',
      'stage3_start',
      'stage3_complete',
      'stage4_start',
      'stage4_complete',
    ]);
    expect(states).toEqual([
      'stage1_collecting',
      'stage1_done',
      'stage3_ranking',
      'stage3_done',
      'stage4_synthesizing',
      'complete',
    ]);
    expect(gateway.callsOf('factCheck')).toEqual([]);
    expect(result.factChecks).toBeNull();
    expect(result.aggregateFactChecks).toBeNull();
    expect(result.synthesis).toEqual({
      text: '## Final Council Answer\nParis is the capital of France.',
      modelId: 'chair',
      elapsedMs: 5,
    });
    expect(events[0]).toEqual({ type: 'stage1_start', models: ['m1', 'm2'] });
  });

  it('gives the chairman both council models by name', async () => {
    const gateway = new FakeGateway(scripted());
    await new Deliberation(gateway, config()).run('q');

    const [chairman] = gateway.callsOf('chairman');
    expect(chairman.modelId).toBe('chair');
    expect(chairman.prompt).toContain('Response A = m1\nResponse B = m2');
    expect(chairman.prompt).toContain('Model: m1\nm1 says Paris');
    expect(chairman.prompt).toContain('Model: m2\nm2 says Paris');
    expect(chairman.prompt).toContain('Response A (m1): average position 1.00 from 2 ranking(s)');
  });

  it('never shows model ids to evaluators', async () => {
    const gateway = new FakeGateway(scripted());
    await new Deliberation(gateway, config({ factCheck: true })).run('q');

    for (const call of [...gateway.callsOf('factCheck'), ...gateway.callsOf('rank')]) {
      expect(call.prompt).toContain('Response A:\nm1 says Paris');
      expect(call.prompt).not.toContain('Response A = ');
    }
  });

  it('aggregates fact-checks and feeds them to the rankers', async () => {
    const gateway = new FakeGateway(scripted());
    const { events, onEvent, types } = recorder();
    const result = await new Deliberation(gateway, config({ factCheck: true }), { onEvent }).run('q');

    expect(types().slice(0, 4)).toEqual(['stage1_start', 'stage1_complete', 'fact_check_start', 'fact_check_complete']);
    expect(result.aggregateFactChecks?.map((a) => [a.label, a.consensusRating, a.averageScore, a.mostReliableVotes])).toEqual([
      ['A', 'ACCURATE', 5, 2],
      ['B', 'MIXED', 3, 0],
    ]);
    expect(result.aggregateRankings.map((a) => [a.label, a.averagePosition])).toEqual([
      ['A', 1],
      ['B', 2],
    ]);
    const complete = events.find((e) => e.type === 'fact_check_complete');
    expect(complete?.type === 'fact_check_complete' && complete.metadata.labelToModel).toEqual({
      A: { modelId: 'm1', instanceIndex: 0 },
      B: { modelId: 'm2', instanceIndex: 0 },
    });
    expect(gateway.callsOf('rank')[0].prompt).toContain('Fact-checker 1:\nFACT CHECK SUMMARY:');
  });

  it('runs duplicated models as separate instances', async () => {
    const gateway = new FakeGateway(scripted());
    const result = await new Deliberation(gateway, config({ councilModels: ['m1', 'm2', 'm1'] })).run('q');

    expect(result.stage1).toHaveLength(3);
    expect(result.stage1.filter((r) => r.modelId === 'm1').map((r) => r.instanceIndex).sort()).toEqual([0, 1]);
    expect(Object.keys(result.labelToModel)).toEqual(['A', 'B', 'C']);
    expect(gateway.callsOf('chairman')[0].prompt).toContain('(instance 2)');
  });

  it('continues with three survivors when one of four answers fails', async () => {
    const gateway = new FakeGateway(
      scripted({
        answer: (modelId) => {
          if (modelId === 'm3') throw new Error('rate limited');
          return `${modelId} answer`;
        },
      }),
    );
    const diagnostics: Diagnostic[] = [];
    const result = await new Deliberation(gateway, config({ councilModels: ['m1', 'm2', 'm3', 'm4'] }), {
      onDiagnostic: (d) => diagnostics.push(d),
    }).run('q');

    expect(result.stats[0]).toEqual({ stage: 'stage1', attempted: 4, succeeded: 3 });
    expect(Object.keys(result.labelToModel)).toEqual(['A', 'B', 'C']);
    expect(Object.values(result.labelToModel).some((ref) => ref.modelId === 'm3')).toBe(false);
    expect(diagnostics).toContainEqual({
      level: 'warn',
      stage: 'stage1',
      message: 'm3: rate limited',
      data: { modelId: 'm3', instanceIndex: 0, kind: 'transport' },
    });
    expect(result.diagnostics).toEqual(diagnostics);
  });

  it('fails in stage 1 when every answer fails', async () => {
    const gateway = new FakeGateway(
      scripted({
        answer: () => {
          throw new Error('down');
        },
      }),
    );
    const { events, onEvent } = recorder();
    const err = await failure(
      new Deliberation(gateway, config({ councilModels: ['m1', 'm2', 'm3', 'm4'] }), { onEvent }).run('q'),
    );

    expect(err).toMatchObject({ stage: 'stage1', attempted: 4, succeeded: 0 });
    expect(events.at(-1)).toEqual({
      type: 'error',
      stage: 'stage1',
      reason: 'All 4 model call(s) failed in stage1',
      attempted: 4,
      succeeded: 0,
    });
    expect(gateway.callsOf('rank')).toEqual([]);
  });

  it('fails in stage 4 when the chairman fails and keeps earlier stages', async () => {
    const gateway = new FakeGateway(
      scripted({
        chairman: () => {
          throw new Error('overloaded');
        },
      }),
    );
    const err = await failure(new Deliberation(gateway, config()).run('q'));

    expect(err.stage).toBe('stage4');
    expect(err.attempted).toBe(1);
    expect(err.reason).toBe('Chairman chair failed: chair: overloaded');
    expect(err.partial.stage1).toHaveLength(2);
    expect(err.partial.rankings).toHaveLength(2);
    expect(err.partial.synthesis).toBeUndefined();
  });

  it('records discarded labels without failing the stage', async () => {
    const gateway = new FakeGateway(
      scripted({ rank: () => 'FINAL RANKING:\n1. Response Q\n2. Response B\n3. Response A' }),
    );
    const result = await new Deliberation(gateway, config()).run('q');

    expect(result.rankings[0].discardedLabels).toEqual(['Q']);
    expect(result.aggregateRankings[0]).toMatchObject({ label: 'B', averagePosition: 1 });
    expect(result.diagnostics.some((d) => d.message.endsWith('discarded unknown label(s) Q'))).toBe(true);
  });

  it('keeps raw text when an evaluation cannot be parsed', async () => {
    const gateway = new FakeGateway(scripted({ rank: () => 'I cannot decide.' }));
    const result = await new Deliberation(gateway, config()).run('q');

    expect(result.rankings[0]).toMatchObject({ rawText: 'I cannot decide.', orderedLabels: [], strategy: 'fallback' });
    expect(result.aggregateRankings.every((a) => a.averagePosition === null)).toBe(true);
    expect(result.synthesis.text).toContain('Paris');
  });

  it('streams chunks before each completion event', async () => {
    const gateway = new FakeGateway(scripted({ answer: () => 'Hello world' }));
    const { events, onEvent, types } = recorder();
    await new Deliberation(gateway, config({ councilModels: ['m1'], streaming: true }), { onEvent }).run('q');

    const stage1Chunks = events.filter((e) => e.type === 'stage1_chunk');
    expect(stage1Chunks).toEqual([
      { type: 'stage1_chunk', slot: 0, modelId: 'm1', instanceIndex: 0, text: 'Hello ' },
      { type: 'stage1_chunk', slot: 0, modelId: 'm1', instanceIndex: 0, text: 'world' },
    ]);
    const order = types();
    expect(order.lastIndexOf('stage1_chunk')).toBeLessThan(order.indexOf('stage1_complete'));
    expect(order.lastIndexOf('stage3_chunk')).toBeLessThan(order.indexOf('stage3_complete'));
    expect(order.filter((t) => t === 'stage4_chunk')).toHaveLength(2);
  });

  it('emits no chunks when streaming is off', async () => {
    const gateway = new FakeGateway(scripted());
    const { onEvent, types } = recorder();
    await new Deliberation(gateway, config(), { onEvent }).run('q');
    expect(types().some((t) => t.endsWith('_chunk'))).toBe(false);
  });

  it('ends in failed(cancelled) when aborted mid-stage', async () => {
    const controller = new AbortController();
    const gateway = new FakeGateway(scripted({ answer: (_m, _k, request) => hang(request.signal) }));
    const { events, onEvent } = recorder();
    const states: string[] = [];
    setTimeout(() => controller.abort(), 10);

    const err = await failure(
      new Deliberation(gateway, config(), {
        onEvent,
        signal: controller.signal,
        onTransition: (t) => states.push(t.to),
      }).run('q'),
    );

    expect(err).toMatchObject({ stage: 'cancelled', reason: 'Deliberation cancelled', attempted: 2, succeeded: 0 });
    expect(states.at(-1)).toBe('failed');
    expect(events.at(-1)).toMatchObject({ type: 'error', stage: 'cancelled' });
  });

  it('does not complete a stage that was cancelled after some answers arrived', async () => {
    const controller = new AbortController();
    const gateway = new FakeGateway(
      scripted({ answer: (modelId, _k, request) => (modelId === 'm1' ? 'm1 says Paris' : hang(request.signal)) }),
    );
    const { onEvent, types } = recorder();
    const states: string[] = [];
    setTimeout(() => controller.abort(), 10);

    const err = await failure(
      new Deliberation(gateway, config(), {
        onEvent,
        signal: controller.signal,
        onTransition: (t) => states.push(t.to),
      }).run('q'),
    );

    expect(err.stage).toBe('cancelled');
    expect(types()).toEqual(['stage1_start', 'error']);
    expect(states).toEqual(['stage1_collecting', 'failed']);
    expect(err.partial.stage1).toBeUndefined();
    expect(err.partial.stats).toEqual([]);
  });

  it('emits nothing after completion when a timed-out model keeps streaming', async () => {
    const gateway = new FakeGateway(
      scripted({
        answer: (modelId, _k, request) => {
          if (modelId === 'fast') return 'Paris';
          setTimeout(() => request.onDelta?.('late'), 60);
          return new Promise<string>(() => {});
        },
      }),
    );
    const { onEvent, types } = recorder();
    await new Deliberation(gateway, config({ councilModels: ['fast', 'slow'], streaming: true, timeoutMs: 20 }), {
      onEvent,
    }).run('q');
    await delay(80);

    const order = types();
    expect(order.at(-1)).toBe('stage4_complete');
    expect(order.lastIndexOf('stage1_chunk')).toBeLessThan(order.indexOf('stage1_complete'));
  });

  it('aborts the title call when the run fails', async () => {
    let titleSignal: AbortSignal | undefined;
    const gateway = new FakeGateway(
      scripted({
        answer: () => {
          throw new Error('down');
        },
        title: (_m, _k, request) => {
          titleSignal = request.signal;
          return hang(request.signal);
        },
      }),
    );
    await failure(new Deliberation(gateway, config({ titleModel: 'fast' })).run('q'));

    expect(titleSignal?.aborted).toBe(true);
  });

  it('keeps completed stages when cancelled between stages', async () => {
    const controller = new AbortController();
    const gateway = new FakeGateway(scripted());
    const err = await failure(
      new Deliberation(gateway, config(), {
        signal: controller.signal,
        onEvent: (e) => {
          if (e.type === 'stage1_complete') controller.abort();
        },
      }).run('q'),
    );

    expect(err.stage).toBe('cancelled');
    expect(err.partial.stage1).toHaveLength(2);
    expect(gateway.callsOf('rank')).toEqual([]);
  });

  it('adds a title and error classifications when asked', async () => {
    const gateway = new FakeGateway(
      scripted({
        classify: () =>
          'QUESTION SUMMARY: French capital\n\nERROR CLASSIFICATIONS:\n---\nMODEL: m2\nERROR_TYPE: Conflation\nCLAIM: x\nEXPLANATION: y\n---',
      }),
    );
    const { onEvent, types } = recorder();
    const result = await new Deliberation(
      gateway,
      config({ factCheck: true, titleModel: 'fast', classifyErrors: true }),
      { onEvent },
    ).run('q');

    expect(types().slice(-3)).toEqual(['stage4_complete', 'title_complete', 'classification_complete']);
    expect(result.title).toBe('Capital of France');
    expect(result.classifiedErrors).toEqual([
      { modelId: 'm2', errorType: 'Conflation', claim: 'x', explanation: 'y', questionSummary: 'French capital' },
    ]);
    expect(gateway.callsOf('classify')[0].modelId).toBe('chair');
  });

  it('treats a failed classification as a diagnostic', async () => {
    const gateway = new FakeGateway(
      scripted({
        classify: () => {
          throw new Error('nope');
        },
      }),
    );
    const result = await new Deliberation(gateway, config({ factCheck: true, classifyErrors: true })).run('q');

    expect(result.classifiedErrors).toBeUndefined();
    expect(result.diagnostics.at(-1)).toEqual({
      level: 'warn',
      stage: 'run',
      message: 'Error classification failed: chair: nope',
    });
  });

  it('freezes the result', async () => {
    const gateway = new FakeGateway(scripted());
    const result = await new Deliberation(gateway, config()).run('q');
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.stage1[0])).toBe(true);
    expect(Object.isFrozen(result.aggregateRankings)).toBe(true);
  });

  it('keeps concurrent runs independent', async () => {
    const gateway = new FakeGateway(scripted());
    const deliberation = new Deliberation(gateway, config());
    const [first, second] = await Promise.all([deliberation.run('one'), deliberation.run('two')]);
    expect(first.question).toBe('one');
    expect(second.question).toBe('two');
    expect(first.stats).not.toBe(second.stats);
    expect(first.stats).toHaveLength(3);
  });

  it('synthesizes straight from supplied answers', async () => {
    const gateway = new FakeGateway(scripted());
    const { onEvent, types } = recorder();
    const result = await new Deliberation(gateway, config(), { onEvent }).synthesizeFrom('Capital of France?', [
      { modelId: 'x', content: 'Paris' },
      { modelId: 'y', content: 'Lyon' },
      { modelId: 'x', content: 'Paris, France' },
    ]);

    expect(result.labelToModel).toEqual({
      A: { modelId: 'x', instanceIndex: 0 },
      B: { modelId: 'y', instanceIndex: 0 },
      C: { modelId: 'x', instanceIndex: 1 },
    });
    expect(result.synthesis).toEqual({
      text: '## Final Council Answer\nParis is the capital of France.',
      modelId: 'chair',
      elapsedMs: 5,
    });
    expect(types()).toEqual(['stage4_start', 'stage4_complete']);
    expect(gateway.calls.map((c) => c.kind)).toEqual(['chairman']);
    const prompt = gateway.calls[0].prompt;
    expect(prompt).toContain('Response B = y');
    expect(prompt).toContain('Model: x (instance 2)\nParis, France');
    expect(prompt).not.toContain('STAGE 3');
  });

  it('reports a failed direct synthesis as stage 4', async () => {
    const gateway = new FakeGateway(
      scripted({
        chairman: () => {
          throw new Error('quota');
        },
      }),
    );
    const err = await failure(new Deliberation(gateway, config()).synthesizeFrom('q', [{ modelId: 'x', content: 'a' }]));
    expect(err).toMatchObject({ stage: 'stage4', attempted: 1, succeeded: 0 });
    expect(err.partial.stage1).toHaveLength(1);
  });

  it('needs at least one supplied answer', async () => {
    const deliberation = new Deliberation(new FakeGateway(scripted()), config());
    await expect(deliberation.synthesizeFrom('q', [])).rejects.toThrow(ConfigError);
  });

  it('requires a council', () => {
    expect(() => new Deliberation(new FakeGateway(scripted()), config({ councilModels: [] }))).toThrow(ConfigError);
  });
});

describe('streamDeliberation', () => {
  it('yields every event and ends when the run settles', async () => {
    const gateway = new FakeGateway(scripted());
    const { events, result } = streamDeliberation(gateway, config(), 'q');

    const seen: string[] = [];
    for await (const event of events) seen.push(event.type);

    expect(seen).toEqual([
      'stage1_start',
      'stage1_complete',
      'stage3_start',
      'stage3_complete',
      'stage4_start',
      'stage4_complete',
    ]);
    expect((await result).synthesis.modelId).toBe('chair');
  });

  it('ends iteration with an error event on failure', async () => {
    const gateway = new FakeGateway(
      scripted({
        rank: () => {
          throw new Error('down');
        },
      }),
    );
    const { events, result } = streamDeliberation(gateway, config(), 'q');

    const seen: string[] = [];
    for await (const event of events) seen.push(event.type);

    expect(seen.at(-1)).toBe('error');
    const err = await failure(result);
    expect(err).toMatchObject({ stage: 'stage3', attempted: 2, succeeded: 0 });
  });
});
