import { describe, it, expect } from 'vitest';
import { EventChannel } from './events.js';

async function drain<T>(channel: EventChannel<T>): Promise<T[]> {
  const seen: T[] = [];
  for await (const item of channel) seen.push(item);
  return seen;
}

describe('EventChannel', () => {
  it('delivers buffered events in order, then ends after close', async () => {
    const channel = new EventChannel<number>();
    channel.push(1);
    channel.push(2);
    channel.close();
    expect(await drain(channel)).toEqual([1, 2]);
  });

  it('wakes a waiting consumer', async () => {
    const channel = new EventChannel<string>();
    const consumed = drain(channel);
    channel.push('a');
    setTimeout(() => {
      channel.push('b');
      channel.close();
    }, 5);
    expect(await consumed).toEqual(['a', 'b']);
  });

  it('ignores pushes after close', async () => {
    const channel = new EventChannel<number>();
    channel.close();
    channel.push(1);
    expect(channel.isClosed).toBe(true);
    expect(await drain(channel)).toEqual([]);
  });

  it('closes when the consumer stops early', async () => {
    const channel = new EventChannel<number>();
    const sink = channel.sink;
    sink(1);
    sink(2);
    for await (const item of channel) {
      expect(item).toBe(1);
      break;
    }
    expect(channel.isClosed).toBe(true);
  });
});
