import { describe, it, expect } from 'vitest';
import { createDirectMessage } from '@agent-mesh/protocol';
import { MessageHistory } from './message-history.js';

function message(id: string, timestamp: number) {
  return createDirectMessage({ message_id: id, timestamp, sender_id: 'agent-a', target_agent_id: 'agent-b' });
}

describe('MessageHistory', () => {
  it('keeps messages up to capacity without evicting', () => {
    const history = new MessageHistory({ maxSize: 3, trimBatch: 2 });

    expect(history.add(message('m1', 1))).toBe(0);
    expect(history.add(message('m2', 2))).toBe(0);
    expect(history.add(message('m3', 3))).toBe(0);

    expect(history.size).toBe(3);
    expect(history.capacity).toBe(3);
  });

  it('evicts the oldest batch by timestamp once capacity is exceeded', () => {
    const history = new MessageHistory({ maxSize: 3, trimBatch: 2 });
    history.add(message('late', 30));
    history.add(message('early', 10));
    history.add(message('middle', 20));

    expect(history.add(message('newest', 40))).toBe(2);

    expect(history.size).toBe(2);
    expect(history.has('early')).toBe(false);
    expect(history.has('middle')).toBe(false);
    expect(history.has('late')).toBe(true);
    expect(history.has('newest')).toBe(true);
  });

  it('leaves 901 entries after 1001 inserts with the default sizing', () => {
    const history = new MessageHistory({ maxSize: 1000, trimBatch: 100 });
    for (let i = 0; i < 1001; i++) {
      history.add(message(`m-${i}`, i));
    }

    expect(history.size).toBe(901);
    expect(history.has('m-99')).toBe(false);
    expect(history.has('m-100')).toBe(true);
    expect(history.has('m-1000')).toBe(true);
  });

  it('replaces an entry with the same message_id', () => {
    const history = new MessageHistory({ maxSize: 5, trimBatch: 1 });
    history.add(message('m1', 1));
    const replacement = message('m1', 2);
    history.add(replacement);

    expect(history.size).toBe(1);
    expect(history.get('m1')).toBe(replacement);
  });

  it('returns a snapshot in insertion order', () => {
    const history = new MessageHistory({ maxSize: 5, trimBatch: 1 });
    history.add(message('b', 2));
    history.add(message('a', 1));

    const snapshot = history.values();
    snapshot.pop();

    expect(history.values().map((m) => m.message_id)).toEqual(['b', 'a']);
  });

  it('clears everything', () => {
    const history = new MessageHistory({ maxSize: 5, trimBatch: 1 });
    history.add(message('m1', 1));
    history.clear();

    expect(history.size).toBe(0);
    expect(history.get('m1')).toBeUndefined();
  });
});
