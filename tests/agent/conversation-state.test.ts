import { describe, expect, it } from 'vitest';

import { ChannelContext } from '../../src/agent/conversation/channel_context.js';
import { KeyedLock } from '../../src/agent/conversation/keyed_lock.js';
import { ConversationStateStore } from '../../src/agent/conversation/state_store.js';

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe('ConversationStateStore', () => {
  it('starts every conversation with the system message', () => {
    const store = new ConversationStateStore({ windowSize: 2, initialSystemMessage: 'persona' });

    expect(store.has('u1')).toBe(false);
    expect(store.history('u1')).toEqual([]);
    expect(store.getOrCreate('u1')).toEqual([{ role: 'system', content: 'persona' }]);
    expect(store.has('u1')).toBe(true);
  });

  it('evicts the oldest turns and keeps the system message', () => {
    const store = new ConversationStateStore({ windowSize: 2, initialSystemMessage: 'persona' });
    expect(store.maxLength).toBe(5);

    for (const n of [1, 2, 3]) {
      store.append('u1', 'user', `q${n}`);
      store.append('u1', 'assistant', `a${n}`);
    }

    expect(store.history('u1')).toEqual([
      { role: 'system', content: 'persona' },
      { role: 'user', content: 'q2' },
      { role: 'assistant', content: 'a2' },
      { role: 'user', content: 'q3' },
      { role: 'assistant', content: 'a3' },
    ]);
  });

  it('returns copies', () => {
    const store = new ConversationStateStore({ windowSize: 2, initialSystemMessage: 'persona' });
    store.append('u1', 'user', 'hi');
    store.history('u1').push({ role: 'user', content: 'sneaky' });
    expect(store.history('u1')).toHaveLength(2);
  });

  it('resets to the current system message', () => {
    const store = new ConversationStateStore({ windowSize: 2, initialSystemMessage: 'persona' });

    expect(store.reset('u1')).toBe(false);
    store.append('u1', 'user', 'hi');
    store.refreshSystemMessage('u1', 'persona with context');
    expect(store.reset('u1')).toBe(true);
    expect(store.history('u1')).toEqual([{ role: 'system', content: 'persona with context' }]);
  });

  it('reports false when resetting a conversation that is already empty', () => {
    const store = new ConversationStateStore({ windowSize: 2, initialSystemMessage: 'persona' });
    store.append('u1', 'user', 'hi');
    store.append('u1', 'assistant', 'hello');

    expect(store.reset('u1')).toBe(true);
    expect(store.reset('u1')).toBe(false);
    expect(store.history('u1')).toEqual([{ role: 'system', content: 'persona' }]);

    store.getOrCreate('u2');
    expect(store.reset('u2')).toBe(false);
  });

  it('keeps requesters apart', () => {
    const store = new ConversationStateStore({ windowSize: 2, initialSystemMessage: 'persona' });
    store.append('u1', 'user', 'mine');
    expect(store.history('u2')).toEqual([]);
  });
});

describe('KeyedLock', () => {
  it('serializes work on the same key and leaves other keys free', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    let releaseFirst = () => {};

    const first = lock.runExclusive('a', async () => {
      events.push('first:start');
      await new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });
      events.push('first:end');
    });
    const second = lock.runExclusive('a', async () => {
      events.push('second:start');
    });
    await tick();

    await lock.runExclusive('b', async () => {
      events.push('other');
    });
    expect(events).toEqual(['first:start', 'other']);

    releaseFirst();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'other', 'first:end', 'second:start']);
    expect(lock.activeKeys).toBe(0);
  });

  it('keeps going after a failed holder', async () => {
    const lock = new KeyedLock();
    const failing = lock.runExclusive('a', async () => {
      throw new Error('boom');
    });
    const next = lock.runExclusive('a', async () => 'done');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('done');
  });
});

describe('ChannelContext', () => {
  it('keeps the most recent lines per channel', () => {
    const context = new ChannelContext(2);
    context.record('c1', 'alice', 'one');
    context.record('c1', 'bob', 'two');
    context.record('c1', 'alice', 'three');
    context.record('c2', 'carol', 'elsewhere');

    expect(context.recent('c1')).toEqual(['bob: two', 'alice: three']);
    expect(context.recent('c3')).toEqual([]);
  });

  it('tracks the last exchange per channel and requester', () => {
    const context = new ChannelContext(5);
    context.markExchange('c1', 'u1', 1_000);
    expect(context.lastExchangeAt('c1', 'u1')).toBe(1_000);
    expect(context.lastExchangeAt('c1', 'u2')).toBeNull();
  });
});
